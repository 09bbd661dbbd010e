import 'reflect-metadata';
import { Transform, Type } from 'class-transformer';
import { IsArray, IsEnum, IsOptional, IsString, ValidateBy, ValidateNested, buildMessage } from 'class-validator';

import { FilterOperator, LogicalOperator } from '../interface';
import { parseEnumName } from '../model/filter-value';

import type { TransformFnParams } from 'class-transformer';
import type { ValidationOptions } from 'class-validator';

/**
 * JSON shape of a value slot. Instants travel as ISO strings, tags as their names.
 */
export type WireValue = string | number | boolean | string[] | null;

export function isWireValue(value: unknown): value is WireValue {
    if (value === null || typeof value === 'string' || typeof value === 'boolean') {
        return true;
    }
    if (typeof value === 'number') {
        return Number.isFinite(value);
    }
    return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function IsWireValue(validationOptions?: ValidationOptions): PropertyDecorator {
    return ValidateBy(
        {
            name: 'isWireValue',
            validator: {
                validate: (value: unknown) => isWireValue(value),
                defaultMessage: buildMessage(
                    (eachPrefix) => `${eachPrefix}$property must be null, a string, a finite number, a boolean or an array of strings`,
                    validationOptions,
                ),
            },
        },
        validationOptions,
    );
}

// 🔧 Enumerations are matched by name, ignoring case
function toEnumMember<TValue extends string>(members: readonly TValue[]) {
    return ({ value }: TransformFnParams): unknown => (typeof value === 'string' ? parseEnumName(members, value) ?? value : value);
}

export class FilterConditionDto {
    @IsOptional()
    @IsString()
    id?: string;

    @IsOptional()
    @IsString()
    field?: string;

    @IsOptional()
    @Transform(toEnumMember(Object.values(FilterOperator)))
    @IsEnum(FilterOperator)
    operator?: FilterOperator;

    @IsOptional()
    @IsWireValue()
    value?: WireValue;

    @IsOptional()
    @IsWireValue()
    valueEnd?: WireValue;
}

export class FilterDefinitionDto {
    @IsOptional()
    @Transform(toEnumMember(Object.values(LogicalOperator)))
    @IsEnum(LogicalOperator)
    operator?: LogicalOperator;

    @IsOptional()
    @IsArray()
    @ValidateNested({ each: true })
    @Type(() => FilterConditionDto)
    conditions?: FilterConditionDto[];

    @IsOptional()
    @IsArray()
    @ValidateNested({ each: true })
    @Type(() => FilterDefinitionDto)
    groups?: FilterDefinitionDto[];
}
