import { randomUUID } from 'crypto';

import { CONDITION_ID_LENGTH } from '../constants';
import { FilterOperator } from '../interface';
import { getOperatorsForType, isRangeOperator, isValuelessOperator } from '../provider/filter-operator.helper';
import { FilterValue } from './filter-value';

import type { FilterField } from '../interface';

export interface FilterConditionInit {
    id?: string;
    field?: string;
    operator?: FilterOperator;
    value?: FilterValue;
    valueEnd?: FilterValue;
}

export function createConditionId(): string {
    return randomUUID().replace(/-/g, '').slice(0, CONDITION_ID_LENGTH);
}

/**
 * A leaf predicate: one field, one operator, up to two operands.
 */
export class FilterCondition {
    id: string;
    /** Must match a `FilterField.name` (case-insensitive) */
    field: string;
    operator: FilterOperator;
    value: FilterValue;
    /** Second operand of range operators, or the unit of InLast/InNext */
    valueEnd: FilterValue;

    constructor(init: FilterConditionInit = {}) {
        this.id = init.id ?? createConditionId();
        this.field = init.field ?? '';
        this.operator = init.operator ?? FilterOperator.Equals;
        this.value = init.value ?? FilterValue.absent();
        this.valueEnd = init.valueEnd ?? FilterValue.absent();
    }

    clone(): FilterCondition {
        return new FilterCondition({
            id: this.id,
            field: this.field,
            operator: this.operator,
            value: FilterValue.clone(this.value),
            valueEnd: FilterValue.clone(this.valueEnd),
        });
    }

    clearValues(): void {
        this.value = FilterValue.absent();
        this.valueEnd = FilterValue.absent();
    }

    /**
     * Switches the field. When the field type changes, the operator falls back to the
     * first one the new type offers and both operands are cleared.
     */
    changeField(name: string, fields: readonly FilterField[]): void {
        const previousType = findField(fields, this.field)?.type;
        this.field = name;

        const next = findField(fields, name);
        if (next && next.type !== previousType) {
            const operators = getOperatorsForType(next.type);
            this.operator = operators[0] ?? FilterOperator.Equals;
            this.clearValues();
        }
    }

    /**
     * Operands survive an operator change only while their shape still fits.
     */
    changeOperator(operator: FilterOperator): void {
        const previous = this.operator;
        this.operator = operator;

        if (isValuelessOperator(operator) || isRangeOperator(operator) !== isRangeOperator(previous)) {
            this.clearValues();
        }
    }
}

export function findField(fields: readonly FilterField[], name: string): FilterField | undefined {
    if (!name) {
        return undefined;
    }
    const wanted = name.toLowerCase();
    return fields.find((field) => field.name.toLowerCase() === wanted);
}
