import { DatePreset, FilterFieldType, FilterOperator, InLastPeriod } from '../interface';

import type { SelectOption } from '../interface';
import type { FilterValue } from '../model/filter-value';

// 🎯 Legal operators per field type, in picker order
export const OPERATORS_BY_TYPE: Readonly<Record<FilterFieldType, readonly FilterOperator[]>> = {
    [FilterFieldType.Text]: [
        FilterOperator.Equals,
        FilterOperator.NotEquals,
        FilterOperator.Contains,
        FilterOperator.NotContains,
        FilterOperator.StartsWith,
        FilterOperator.EndsWith,
        FilterOperator.IsEmpty,
        FilterOperator.IsNotEmpty,
    ],
    [FilterFieldType.Number]: [
        FilterOperator.Equals,
        FilterOperator.NotEquals,
        FilterOperator.GreaterThan,
        FilterOperator.LessThan,
        FilterOperator.GreaterOrEqual,
        FilterOperator.LessOrEqual,
        FilterOperator.Between,
        FilterOperator.IsEmpty,
        FilterOperator.IsNotEmpty,
    ],
    [FilterFieldType.Date]: [
        FilterOperator.Equals,
        FilterOperator.NotEquals,
        FilterOperator.GreaterThan,
        FilterOperator.LessThan,
        FilterOperator.Between,
        FilterOperator.InLast,
        FilterOperator.InNext,
        FilterOperator.DateIs,
        FilterOperator.DateIsNot,
        FilterOperator.IsEmpty,
        FilterOperator.IsNotEmpty,
    ],
    [FilterFieldType.DateTime]: [
        FilterOperator.Equals,
        FilterOperator.NotEquals,
        FilterOperator.GreaterThan,
        FilterOperator.LessThan,
        FilterOperator.Between,
        FilterOperator.InLast,
        FilterOperator.InNext,
        FilterOperator.DateIs,
        FilterOperator.DateIsNot,
        FilterOperator.IsEmpty,
        FilterOperator.IsNotEmpty,
    ],
    [FilterFieldType.Boolean]: [FilterOperator.IsTrue, FilterOperator.IsFalse],
    [FilterFieldType.Enum]: [
        FilterOperator.Equals,
        FilterOperator.NotEquals,
        FilterOperator.In,
        FilterOperator.NotIn,
        FilterOperator.IsEmpty,
        FilterOperator.IsNotEmpty,
    ],
};

const OPERATOR_LABELS: Readonly<Record<FilterOperator, string>> = {
    [FilterOperator.Equals]: 'equals',
    [FilterOperator.NotEquals]: 'not equals',
    [FilterOperator.IsEmpty]: 'is empty',
    [FilterOperator.IsNotEmpty]: 'is not empty',
    [FilterOperator.Contains]: 'contains',
    [FilterOperator.NotContains]: 'not contains',
    [FilterOperator.StartsWith]: 'starts with',
    [FilterOperator.EndsWith]: 'ends with',
    [FilterOperator.GreaterThan]: 'greater than',
    [FilterOperator.LessThan]: 'less than',
    [FilterOperator.GreaterOrEqual]: 'greater or equal',
    [FilterOperator.LessOrEqual]: 'less or equal',
    [FilterOperator.Between]: 'between',
    [FilterOperator.InLast]: 'in the last',
    [FilterOperator.InNext]: 'in the next',
    [FilterOperator.In]: 'is any of',
    [FilterOperator.NotIn]: 'is none of',
    [FilterOperator.IsTrue]: 'is true',
    [FilterOperator.IsFalse]: 'is false',
    [FilterOperator.DateIs]: 'is',
    [FilterOperator.DateIsNot]: 'is not',
};

const DATE_OPERATOR_LABELS: Readonly<Partial<Record<FilterOperator, string>>> = {
    [FilterOperator.GreaterThan]: 'is after',
    [FilterOperator.LessThan]: 'is before',
};

const DATE_PRESET_LABELS: Readonly<Record<DatePreset, string>> = {
    [DatePreset.Today]: 'today',
    [DatePreset.Yesterday]: 'yesterday',
    [DatePreset.Tomorrow]: 'tomorrow',
    [DatePreset.ThisWeek]: 'this week',
    [DatePreset.LastWeek]: 'last week',
    [DatePreset.NextWeek]: 'next week',
    [DatePreset.ThisMonth]: 'this month',
    [DatePreset.LastMonth]: 'last month',
    [DatePreset.NextMonth]: 'next month',
    [DatePreset.ThisQuarter]: 'this quarter',
    [DatePreset.LastQuarter]: 'last quarter',
    [DatePreset.ThisYear]: 'this year',
    [DatePreset.LastYear]: 'last year',
};

const IN_LAST_PERIOD_LABELS: Readonly<Record<InLastPeriod, string>> = {
    [InLastPeriod.Days]: 'days',
    [InLastPeriod.Weeks]: 'weeks',
    [InLastPeriod.Months]: 'months',
};

export function getOperatorsForType(type: FilterFieldType): readonly FilterOperator[] {
    return OPERATORS_BY_TYPE[type] ?? [];
}

export function isOperatorAllowed(type: FilterFieldType, operator: FilterOperator): boolean {
    return getOperatorsForType(type).includes(operator);
}

export function isDateFieldType(type: FilterFieldType): boolean {
    return type === FilterFieldType.Date || type === FilterFieldType.DateTime;
}

/**
 * Display label for an operator; date fields read GreaterThan/LessThan as "is after"/"is before".
 */
export function getOperatorLabel(operator: FilterOperator, fieldType?: FilterFieldType): string {
    if (fieldType !== undefined && isDateFieldType(fieldType)) {
        const dateLabel = DATE_OPERATOR_LABELS[operator];
        if (dateLabel) {
            return dateLabel;
        }
    }
    return OPERATOR_LABELS[operator] ?? operator;
}

export function getOperatorOptions(type: FilterFieldType): SelectOption<FilterOperator>[] {
    return getOperatorsForType(type).map((operator) => ({ value: operator, label: getOperatorLabel(operator, type) }));
}

export function getDatePresetOptions(): SelectOption<DatePreset>[] {
    return Object.values(DatePreset).map((preset) => ({ value: preset, label: DATE_PRESET_LABELS[preset] }));
}

export function getInLastPeriodOptions(): SelectOption<InLastPeriod>[] {
    return Object.values(InLastPeriod).map((period) => ({ value: period, label: IN_LAST_PERIOD_LABELS[period] }));
}

/**
 * The operator itself implies the value.
 */
export function isValuelessOperator(operator: FilterOperator): boolean {
    return (
        operator === FilterOperator.IsEmpty ||
        operator === FilterOperator.IsNotEmpty ||
        operator === FilterOperator.IsTrue ||
        operator === FilterOperator.IsFalse
    );
}

export function isRangeOperator(operator: FilterOperator): boolean {
    return operator === FilterOperator.Between;
}

export function isDatePresetOperator(operator: FilterOperator): boolean {
    return operator === FilterOperator.DateIs || operator === FilterOperator.DateIsNot;
}

export function isRelativeDateOperator(operator: FilterOperator): boolean {
    return operator === FilterOperator.InLast || operator === FilterOperator.InNext;
}

export function isSetOperator(operator: FilterOperator): boolean {
    return operator === FilterOperator.In || operator === FilterOperator.NotIn;
}

/**
 * A required operand is missing. Set operators are never incomplete:
 * an absent candidate list has its own meaning (In → everything, NotIn → nothing).
 */
export function isConditionIncomplete(condition: { operator: FilterOperator; value: FilterValue; valueEnd: FilterValue }): boolean {
    const { operator, value, valueEnd } = condition;

    if (isValuelessOperator(operator) || isSetOperator(operator)) {
        return false;
    }
    if (isRangeOperator(operator)) {
        return value.kind === 'absent' || valueEnd.kind === 'absent';
    }
    return value.kind === 'absent';
}
