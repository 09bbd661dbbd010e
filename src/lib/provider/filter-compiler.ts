import { FieldValueKind, LogicalOperator } from '../interface';
import { createPlanContext, planFilter } from './filter-condition.planner';

import type {
    AndNode,
    BetweenNode,
    CompareNode,
    CompareOperator,
    EntityType,
    ExpressionNode,
    FieldAccessNode,
    FieldAccessor,
    FieldTransform,
    FilterEngineOptions,
    FilterExpression,
    FilterField,
    LiteralNode,
    LiteralValue,
    NotNode,
    OrNode,
    SetMembershipNode,
    StringOperator,
    StringOpNode,
} from '../interface';
import type { FilterDefinition } from '../model/filter-definition';
import type { CheckPlan, ConditionCheck, PlanNode } from './filter-condition.planner';

/**
 * 🔧 Expression backend: compiles a filter tree into a frozen expression tree that can be
 * evaluated in memory or rendered as a SQL `WHERE` fragment.
 *
 * Date presets and relative windows are resolved against the clock at compile time.
 */
export function compile<T extends object>(
    filter: FilterDefinition,
    fields: readonly FilterField[],
    entity: EntityType<T>,
    options: FilterEngineOptions = {},
): FilterExpression<T> {
    const context = createPlanContext(fields, entity, options);
    const root = filter.isEmpty ? literal(true) : lowerPlan(planFilter(filter, context));

    return Object.freeze({ entity, root, resolvedAt: context.now });
}

function lowerPlan<T>(node: PlanNode<T>): ExpressionNode {
    switch (node.type) {
        case 'constant':
            return literal(node.value);
        case 'check':
            return lowerCheck(node);
        case 'group': {
            if (node.children.length === 0) {
                return literal(true);
            }
            const operands = node.children.map((child) => lowerPlan(child));
            if (operands.length === 1) {
                return operands[0];
            }
            return node.operator === LogicalOperator.And ? and(...operands) : or(...operands);
        }
    }
}

function lowerCheck<T>(plan: CheckPlan<T>): ExpressionNode {
    const lowered = lowerConditionCheck(plan.accessor, plan.check);
    return plan.negate ? not(lowered) : lowered;
}

function lowerConditionCheck<T>(accessor: FieldAccessor<T>, check: ConditionCheck): ExpressionNode {
    const isText = accessor.kind === FieldValueKind.String;
    // comparisons run on the folded text form for strings, on the raw value otherwise
    const valueTarget = fieldAccess(accessor, isText ? 'lowerText' : 'none');

    switch (check.type) {
        case 'empty':
            return isText
                ? compare('eq', fieldAccess(accessor, 'trimText'), literal(''))
                : compare('eq', fieldAccess(accessor, 'none'), literal(null));

        case 'boolean':
            // a missing value counts as false whatever the column declares
            if (!check.expected) {
                return or(compare('eq', fieldAccess(accessor, 'none'), literal(null)), compare('eq', fieldAccess(accessor, 'none'), literal(false)));
            }
            return guarded(accessor, compare('eq', fieldAccess(accessor, 'none'), literal(check.expected)), false);

        case 'compare':
            return guarded(accessor, compare(check.op, valueTarget, literal(check.operand)), isText);

        case 'string':
            return guarded(accessor, stringOp(check.op, fieldAccess(accessor, 'lowerText'), check.pattern), true);

        case 'range':
            return guarded(accessor, between(valueTarget, literal(check.lower), literal(check.upper), check.upperExclusive), isText);

        case 'in':
            return Object.freeze<SetMembershipNode>({ type: 'in', target: fieldAccess(accessor, 'lowerText'), values: Object.freeze([...check.values]) });
    }
}

/**
 * Conjoins `IS NOT NULL` so the comparison stays two-valued once rendered as SQL.
 */
function guarded<T>(accessor: FieldAccessor<T>, node: ExpressionNode, always: boolean): ExpressionNode {
    if (!always && !accessor.nullable) {
        return node;
    }
    return and(compare('ne', fieldAccess(accessor, 'none'), literal(null)), node);
}

function fieldAccess<T>(accessor: FieldAccessor<T>, transform: FieldTransform): FieldAccessNode {
    return Object.freeze<FieldAccessNode>({ type: 'field', property: accessor.property, kind: accessor.kind, nullable: accessor.nullable, transform });
}

function literal<TValue extends LiteralValue>(value: TValue): LiteralNode<TValue> {
    return Object.freeze<LiteralNode<TValue>>({ type: 'literal', value });
}

function compare(op: CompareOperator, left: FieldAccessNode, right: LiteralNode): CompareNode {
    return Object.freeze<CompareNode>({ type: 'compare', op, left, right });
}

function stringOp(op: StringOperator, target: FieldAccessNode, pattern: string): StringOpNode {
    return Object.freeze<StringOpNode>({ type: 'string', op, target, pattern });
}

function between(target: FieldAccessNode, lower: LiteralNode, upper: LiteralNode, upperExclusive: boolean): BetweenNode {
    return Object.freeze<BetweenNode>({ type: 'between', target, lower, upper, upperExclusive });
}

function and(...operands: ExpressionNode[]): AndNode {
    return Object.freeze<AndNode>({ type: 'and', operands: Object.freeze(operands) });
}

function or(...operands: ExpressionNode[]): OrNode {
    return Object.freeze<OrNode>({ type: 'or', operands: Object.freeze(operands) });
}

function not(operand: ExpressionNode): NotNode {
    return Object.freeze<NotNode>({ type: 'not', operand });
}
