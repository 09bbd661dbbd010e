import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';

import { ROUND_TRIP_DATE_PATTERN } from '../constants';
import { FilterDefinitionDto } from '../dto/filter-definition.dto';
import { FilterParseError } from '../filter.error';
import { FilterOperator, LogicalOperator } from '../interface';
import { FilterCondition } from '../model/filter-condition';
import { FilterDefinition } from '../model/filter-definition';
import { FilterValue, parseDatePreset, parseInLastPeriod } from '../model/filter-value';
import { isDatePresetOperator, isRelativeDateOperator } from './filter-operator.helper';

import type { FilterConditionDto, WireValue } from '../dto/filter-definition.dto';
import type { ValidationError } from 'class-validator';

export interface FilterConditionJson {
    id: string;
    field: string;
    operator: FilterOperator;
    value: WireValue;
    valueEnd: WireValue;
}

export interface FilterDefinitionJson {
    operator: LogicalOperator;
    conditions: FilterConditionJson[];
    groups: FilterDefinitionJson[];
}

type ValueSlot = 'value' | 'valueEnd';

/**
 * Camel-cased JSON, indented by two spaces.
 */
export function serialize(filter: FilterDefinition): string {
    return JSON.stringify(toJson(filter), null, 2);
}

/**
 * Parses filter JSON. The literal `null` reads as an empty filter.
 * @throws FilterParseError when the text is not JSON or not a filter tree
 */
export function deserialize(text: string): FilterDefinition {
    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new FilterParseError(`Filter JSON is malformed: ${reason}`, [], { cause: error });
    }
    return fromJson(parsed);
}

export function toJson(filter: FilterDefinition): FilterDefinitionJson {
    return {
        operator: filter.operator,
        conditions: filter.conditions.map((condition) => ({
            id: condition.id,
            field: condition.field,
            operator: condition.operator,
            value: valueToJson(condition.value),
            valueEnd: valueToJson(condition.valueEnd),
        })),
        groups: filter.groups.map((group) => toJson(group)),
    };
}

/**
 * Builds a filter tree from an already parsed JSON value, validating it on the way.
 */
export function fromJson(plain: unknown): FilterDefinition {
    if (plain === null || plain === undefined) {
        return new FilterDefinition();
    }
    if (typeof plain !== 'object' || Array.isArray(plain)) {
        throw new FilterParseError('Filter JSON must be an object');
    }

    const dto = plainToInstance(FilterDefinitionDto, plain);
    const errors = validateSync(dto, { forbidUnknownValues: false });
    if (errors.length > 0) {
        const details = flattenValidationErrors(errors);
        throw new FilterParseError(`Filter JSON is invalid: ${details.join('; ')}`, details);
    }
    return toDefinition(dto);
}

/**
 * Writes a value slot. Invalid dates and non-finite numbers have no JSON form and are written as absent.
 */
export function valueToJson(value: FilterValue): WireValue {
    switch (value.kind) {
        case 'absent':
            return null;
        case 'instant':
            return Number.isNaN(value.value.getTime()) ? null : value.value.toISOString();
        case 'number':
            return Number.isFinite(value.value) ? value.value : null;
        case 'textList':
            return [...value.value];
        default:
            return value.value;
    }
}

/**
 * Reads a value slot. Which tag a string becomes depends on the operator and the slot;
 * a string is an instant only when it is exactly what `toISOString` writes.
 */
export function valueFromJson(raw: WireValue | undefined, operator: FilterOperator, slot: ValueSlot): FilterValue {
    if (raw === null || raw === undefined) {
        return FilterValue.absent();
    }
    if (typeof raw !== 'string') {
        return FilterValue.from(raw);
    }

    if (slot === 'value' && isDatePresetOperator(operator)) {
        const preset = parseDatePreset(raw);
        if (preset) {
            return FilterValue.preset(preset);
        }
    }
    if (slot === 'valueEnd' && isRelativeDateOperator(operator)) {
        const period = parseInLastPeriod(raw);
        if (period) {
            return FilterValue.period(period);
        }
    }
    return isRoundTripInstant(raw) ? FilterValue.instant(new Date(raw)) : FilterValue.text(raw);
}

export function isRoundTripInstant(text: string): boolean {
    if (!ROUND_TRIP_DATE_PATTERN.test(text)) {
        return false;
    }
    const date = new Date(text);
    return !Number.isNaN(date.getTime()) && date.toISOString() === text;
}

function toDefinition(dto: FilterDefinitionDto): FilterDefinition {
    return new FilterDefinition({
        operator: dto.operator ?? LogicalOperator.And,
        conditions: (dto.conditions ?? []).map((condition) => toCondition(condition)),
        groups: (dto.groups ?? []).map((group) => toDefinition(group)),
    });
}

function toCondition(dto: FilterConditionDto): FilterCondition {
    const operator = dto.operator ?? FilterOperator.Equals;
    return new FilterCondition({
        id: dto.id,
        field: dto.field ?? '',
        operator,
        value: valueFromJson(dto.value, operator, 'value'),
        valueEnd: valueFromJson(dto.valueEnd, operator, 'valueEnd'),
    });
}

function flattenValidationErrors(errors: readonly ValidationError[], parentPath = ''): string[] {
    return errors.flatMap((error) => {
        const path = parentPath ? `${parentPath}.${error.property}` : error.property;
        const own = Object.values(error.constraints ?? {}).map((message) => `${path}: ${message}`);
        return [...own, ...flattenValidationErrors(error.children ?? [], path)];
    });
}
