import { LogicalOperator } from '../interface';
import { compareFieldValues, foldCase, isBlankText, matchesText, normalizeFieldValue, satisfiesOrder, toFieldText } from '../utils/field-value.util';
import { createPlanContext, planFilter } from './filter-condition.planner';

import type { EntityType, FilterEngineOptions, FilterField } from '../interface';
import type { FilterDefinition } from '../model/filter-definition';
import type { NormalizedFieldValue } from '../utils/field-value.util';
import type { CheckPlan, ConditionCheck, PlanNode, PlanOperand } from './filter-condition.planner';

export type FilterPredicate<T> = (item: T) => boolean;

/**
 * 🎯 Direct backend: turns a filter tree into an in-memory predicate over `entity` instances.
 *
 * Fields resolve through the accessor registry; "now" is read once from the clock, so every item
 * of one call sees the same date windows.
 *
 * @example
 * ```typescript
 * const matches = evaluate(filter, fields, Person);
 * const adults = people.filter(matches);
 * ```
 */
export function evaluate<T extends object>(
    filter: FilterDefinition,
    fields: readonly FilterField[],
    entity: EntityType<T>,
    options: FilterEngineOptions = {},
): FilterPredicate<T> {
    if (filter.isEmpty) {
        return () => true;
    }

    const plan = planFilter(filter, createPlanContext(fields, entity, options));
    return (item: T) => runNode(plan, item);
}

function runNode<T>(node: PlanNode<T>, item: T): boolean {
    switch (node.type) {
        case 'constant':
            return node.value;
        case 'check':
            return runCheck(node, item);
        case 'group':
            if (node.children.length === 0) {
                return true;
            }
            return node.operator === LogicalOperator.And
                ? node.children.every((child) => runNode(child, item))
                : node.children.some((child) => runNode(child, item));
    }
}

function runCheck<T>(plan: CheckPlan<T>, item: T): boolean {
    const value = normalizeFieldValue(plan.accessor.read(item), plan.accessor.kind);
    const matched = matchesCheck(plan.check, value);
    return plan.negate ? !matched : matched;
}

function matchesCheck(check: ConditionCheck, value: NormalizedFieldValue): boolean {
    switch (check.type) {
        case 'empty':
            return isBlankText(value);

        case 'boolean':
            return check.expected ? value === true : value === false || value === null;

        case 'compare': {
            const order = compareFieldValues(comparable(value), check.operand);
            return order !== undefined && satisfiesOrder(check.op, order);
        }

        case 'string':
            return value !== null && matchesText(check.op, foldCase(toFieldText(value)), check.pattern);

        case 'range':
            return isInRange(comparable(value), check.lower, check.upper, check.upperExclusive);

        case 'in':
            return check.values.includes(foldCase(toFieldText(value)));
    }
}

/**
 * Strings take part in comparisons case-folded, matching the folded operand.
 */
function comparable(value: NormalizedFieldValue): NormalizedFieldValue {
    return typeof value === 'string' ? foldCase(value) : value;
}

function isInRange(value: NormalizedFieldValue, lower: PlanOperand, upper: PlanOperand, upperExclusive: boolean): boolean {
    const fromLower = compareFieldValues(value, lower);
    const toUpper = compareFieldValues(value, upper);
    if (fromLower === undefined || toUpper === undefined) {
        return false;
    }
    return fromLower >= 0 && (upperExclusive ? toUpper < 0 : toUpper <= 0);
}
