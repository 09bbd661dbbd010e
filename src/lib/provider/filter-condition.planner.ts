import { FieldValueKind, FilterFieldType, FilterOperator, InLastPeriod, LogicalOperator } from '../interface';
import { findField } from '../model/filter-condition';
import { parseDatePreset, parseInLastPeriod } from '../model/filter-value';
import { foldCase, parseBoolean, parseDateText, parseNumber } from '../utils/field-value.util';
import { resolveDatePreset, resolveRelativeWindow } from './date-range.resolver';
import { defaultFieldAccessorRegistry } from './field-accessor.registry';
import { silentFilterLogger } from './filter-logger';
import { isConditionIncomplete, isOperatorAllowed } from './filter-operator.helper';

import type { CompareOperator, DatePreset, EntityType, FieldAccessor, FilterEngineOptions, FilterField, StringOperator } from '../interface';
import type { FilterCondition } from '../model/filter-condition';
import type { FilterDefinition } from '../model/filter-definition';
import type { FilterValue } from '../model/filter-value';
import type { FieldAccessorRegistry } from './field-accessor.registry';
import type { FilterLogger } from './filter-logger';

/** A non-null operand already coerced to the accessor kind; strings are case-folded */
export type PlanOperand = string | number | boolean | Date;

export type ConditionCheck =
    | { readonly type: 'empty' }
    | { readonly type: 'boolean'; readonly expected: boolean }
    | { readonly type: 'compare'; readonly op: CompareOperator; readonly operand: PlanOperand }
    | { readonly type: 'string'; readonly op: StringOperator; readonly pattern: string }
    | { readonly type: 'range'; readonly lower: PlanOperand; readonly upper: PlanOperand; readonly upperExclusive: boolean }
    | { readonly type: 'in'; readonly values: readonly string[] };

export interface ConstantPlan {
    readonly type: 'constant';
    readonly value: boolean;
}

export interface CheckPlan<T = object> {
    readonly type: 'check';
    readonly accessor: FieldAccessor<T>;
    readonly check: ConditionCheck;
    readonly negate: boolean;
}

export interface GroupPlan<T = object> {
    readonly type: 'group';
    readonly operator: LogicalOperator;
    readonly children: readonly PlanNode<T>[];
}

export type PlanNode<T = object> = ConstantPlan | CheckPlan<T> | GroupPlan<T>;

export interface PlanContext<T extends object> {
    fields: readonly FilterField[];
    entity: EntityType<T>;
    registry: FieldAccessorRegistry;
    logger: FilterLogger;
    now: Date;
}

const TYPE_BY_KIND: Readonly<Record<FieldValueKind, FilterFieldType>> = {
    [FieldValueKind.String]: FilterFieldType.Text,
    [FieldValueKind.Number]: FilterFieldType.Number,
    [FieldValueKind.Date]: FilterFieldType.DateTime,
    [FieldValueKind.Boolean]: FilterFieldType.Boolean,
};

const COMPARE_BY_OPERATOR: Partial<Record<FilterOperator, CompareOperator>> = {
    [FilterOperator.Equals]: 'eq',
    [FilterOperator.NotEquals]: 'eq',
    [FilterOperator.GreaterThan]: 'gt',
    [FilterOperator.GreaterOrEqual]: 'ge',
    [FilterOperator.LessThan]: 'lt',
    [FilterOperator.LessOrEqual]: 'le',
};

const STRING_BY_OPERATOR: Partial<Record<FilterOperator, StringOperator>> = {
    [FilterOperator.Contains]: 'contains',
    [FilterOperator.NotContains]: 'contains',
    [FilterOperator.StartsWith]: 'startsWith',
    [FilterOperator.EndsWith]: 'endsWith',
};

const NEGATED_OPERATORS: readonly FilterOperator[] = [
    FilterOperator.IsNotEmpty,
    FilterOperator.NotEquals,
    FilterOperator.NotContains,
    FilterOperator.DateIsNot,
    FilterOperator.NotIn,
];

const ALWAYS: ConstantPlan = { type: 'constant', value: true };
const NEVER: ConstantPlan = { type: 'constant', value: false };

export function createPlanContext<T extends object>(
    fields: readonly FilterField[],
    entity: EntityType<T>,
    options: FilterEngineOptions,
): PlanContext<T> {
    return {
        fields,
        entity,
        registry: options.registry ?? defaultFieldAccessorRegistry,
        logger: options.logger ?? silentFilterLogger,
        now: (options.clock ?? (() => new Date()))(),
    };
}

/**
 * 🧭 Resolves a filter tree once per call into checks both backends execute.
 *
 * Blank-field conditions and empty nested groups are dropped here, so a group whose
 * children were all dropped ends up with no children and matches everything.
 */
export function planFilter<T extends object>(filter: FilterDefinition, context: PlanContext<T>): GroupPlan<T> {
    const children: PlanNode<T>[] = [];

    for (const condition of filter.conditions) {
        if (!condition.field) {
            continue;
        }
        children.push(planCondition(condition, context));
    }
    for (const group of filter.groups) {
        if (!group.isEmpty) {
            children.push(planFilter(group, context));
        }
    }
    return { type: 'group', operator: filter.operator, children };
}

export function planCondition<T extends object>(condition: FilterCondition, context: PlanContext<T>): PlanNode<T> {
    const { logger } = context;
    const accessor = context.registry.resolve(context.entity, condition.field);
    if (!accessor) {
        logger.debug(`Unknown field "${condition.field}" on ${context.entity.name}; condition ${condition.id} matches nothing`);
        return NEVER;
    }

    const fieldType = findField(context.fields, condition.field)?.type ?? TYPE_BY_KIND[accessor.kind];
    if (!isOperatorAllowed(fieldType, condition.operator)) {
        logger.debug(`Operator ${condition.operator} is not offered for ${fieldType} field "${condition.field}"; ignored`);
        return ALWAYS;
    }
    if (isConditionIncomplete(condition)) {
        return ALWAYS;
    }

    const check = buildCheck(condition, accessor.kind, context.now);
    if (check.type === 'constant') {
        return check;
    }
    if (check.type === 'uncoercible') {
        logger.debug(`Condition ${condition.id}: ${check.reason}; treated as incomplete`);
        return ALWAYS;
    }

    return {
        type: 'check',
        accessor,
        check,
        negate: NEGATED_OPERATORS.includes(condition.operator),
    };
}

type CheckResult = ConditionCheck | ConstantPlan | { readonly type: 'uncoercible'; readonly reason: string };

function buildCheck(condition: FilterCondition, kind: FieldValueKind, now: Date): CheckResult {
    const { operator, value, valueEnd } = condition;

    switch (operator) {
        case FilterOperator.IsEmpty:
        case FilterOperator.IsNotEmpty:
            return { type: 'empty' };

        case FilterOperator.IsTrue:
        case FilterOperator.IsFalse:
            if (kind !== FieldValueKind.Boolean) {
                return uncoercible(`${operator} on a ${kind} property`);
            }
            return { type: 'boolean', expected: operator === FilterOperator.IsTrue };

        case FilterOperator.Equals:
        case FilterOperator.NotEquals:
        case FilterOperator.GreaterThan:
        case FilterOperator.GreaterOrEqual:
        case FilterOperator.LessThan:
        case FilterOperator.LessOrEqual: {
            const operand = coerceOperand(value, kind);
            const op = COMPARE_BY_OPERATOR[operator];
            if (operand === undefined || op === undefined) {
                return uncoercible(`${value.kind} value does not read as ${kind}`);
            }
            return { type: 'compare', op, operand };
        }

        case FilterOperator.Contains:
        case FilterOperator.NotContains:
        case FilterOperator.StartsWith:
        case FilterOperator.EndsWith: {
            const text = operandText(value);
            const op = STRING_BY_OPERATOR[operator];
            if (text === undefined || op === undefined) {
                return uncoercible(`${value.kind} value has no text form`);
            }
            return { type: 'string', op, pattern: foldCase(text) };
        }

        case FilterOperator.Between: {
            const lower = coerceOperand(value, kind);
            const upper = coerceOperand(valueEnd, kind);
            if (lower === undefined || upper === undefined) {
                return uncoercible(`range bounds do not read as ${kind}`);
            }
            return { type: 'range', lower, upper, upperExclusive: false };
        }

        case FilterOperator.InLast:
        case FilterOperator.InNext: {
            if (kind !== FieldValueKind.Date) {
                return uncoercible(`${operator} on a ${kind} property`);
            }
            const amount = readAmount(value);
            const period = readPeriod(valueEnd);
            if (amount === undefined || period === undefined) {
                return uncoercible('relative window needs a whole amount and a period');
            }
            const window = resolveRelativeWindow(operator, amount, period, now);
            return operator === FilterOperator.InLast
                ? { type: 'compare', op: 'ge', operand: window.start }
                : { type: 'range', lower: window.start, upper: window.end, upperExclusive: false };
        }

        case FilterOperator.DateIs:
        case FilterOperator.DateIsNot: {
            if (kind !== FieldValueKind.Date) {
                return uncoercible(`${operator} on a ${kind} property`);
            }
            const preset = readPreset(value);
            if (preset === undefined) {
                return uncoercible('value names no date preset');
            }
            const range = resolveDatePreset(preset, now);
            return { type: 'range', lower: range.start, upper: range.end, upperExclusive: true };
        }

        case FilterOperator.In:
        case FilterOperator.NotIn: {
            const candidates = readCandidates(value);
            if (candidates.length === 0) {
                return operator === FilterOperator.In ? ALWAYS : NEVER;
            }
            return { type: 'in', values: candidates.map(foldCase) };
        }
    }
}

function uncoercible(reason: string): { readonly type: 'uncoercible'; readonly reason: string } {
    return { type: 'uncoercible', reason };
}

/**
 * Reads a scalar operand as the accessor kind. Strings come back case-folded.
 */
export function coerceOperand(value: FilterValue, kind: FieldValueKind): PlanOperand | undefined {
    switch (kind) {
        case FieldValueKind.String: {
            const text = operandText(value);
            return text === undefined ? undefined : foldCase(text);
        }
        case FieldValueKind.Number:
            if (value.kind === 'number') {
                return Number.isNaN(value.value) ? undefined : value.value;
            }
            return value.kind === 'text' ? parseNumber(value.value) ?? undefined : undefined;
        case FieldValueKind.Date:
            if (value.kind === 'instant') {
                return Number.isNaN(value.value.getTime()) ? undefined : value.value;
            }
            return value.kind === 'text' ? parseDateText(value.value) ?? undefined : undefined;
        case FieldValueKind.Boolean:
            if (value.kind === 'boolean') {
                return value.value;
            }
            return value.kind === 'text' ? parseBoolean(value.value) ?? undefined : undefined;
    }
}

function operandText(value: FilterValue): string | undefined {
    switch (value.kind) {
        case 'text':
        case 'preset':
        case 'period':
            return value.value;
        case 'number':
        case 'boolean':
            return String(value.value);
        case 'instant':
            return value.value.toISOString();
        case 'absent':
        case 'textList':
            return undefined;
    }
}

function readAmount(value: FilterValue): number | undefined {
    const amount = value.kind === 'number' ? value.value : value.kind === 'text' ? parseNumber(value.value) : null;
    return amount === null || !Number.isFinite(amount) ? undefined : Math.trunc(amount);
}

function readPeriod(value: FilterValue): InLastPeriod | undefined {
    switch (value.kind) {
        case 'absent':
            return InLastPeriod.Days;
        case 'period':
            return value.value;
        case 'text':
            return parseInLastPeriod(value.value);
        default:
            return undefined;
    }
}

function readPreset(value: FilterValue): DatePreset | undefined {
    switch (value.kind) {
        case 'preset':
            return value.value;
        case 'text':
            return parseDatePreset(value.value);
        default:
            return undefined;
    }
}

function readCandidates(value: FilterValue): readonly string[] {
    if (value.kind === 'textList') {
        return value.value;
    }
    const single = operandText(value);
    return single === undefined ? [] : [single];
}
