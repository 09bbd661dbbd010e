import { compareFieldValues, foldCase, matchesText, normalizeFieldValue, satisfiesOrder, toFieldText } from '../utils/field-value.util';
import { defaultFieldAccessorRegistry } from './field-accessor.registry';

import type { EntityType, ExpressionNode, FieldAccessNode, FilterExpression } from '../interface';
import type { NormalizedFieldValue } from '../utils/field-value.util';
import type { FieldAccessorRegistry } from './field-accessor.registry';
import type { FilterPredicate } from './filter-evaluator';

export interface ExpressionEvaluationOptions {
    registry?: FieldAccessorRegistry;
}

type FieldReader<T> = (item: T, node: FieldAccessNode) => NormalizedFieldValue;

/**
 * Renders an expression tree as an in-memory predicate.
 */
export function toPredicate<T extends object>(expression: FilterExpression<T>, options: ExpressionEvaluationOptions = {}): FilterPredicate<T> {
    const readField = createFieldReader(expression.entity, options.registry ?? defaultFieldAccessorRegistry);
    return (item: T) => evaluateNode(expression.root, item, readField);
}

export function evaluateExpression<T extends object>(
    expression: FilterExpression<T>,
    item: T,
    options: ExpressionEvaluationOptions = {},
): boolean {
    return toPredicate(expression, options)(item);
}

function createFieldReader<T extends object>(entity: EntityType<T>, registry: FieldAccessorRegistry): FieldReader<T> {
    return (item, node) => {
        const accessor = registry.resolve(entity, node.property);
        const value = normalizeFieldValue(accessor?.read(item), node.kind);
        return applyTransform(value, node);
    };
}

function applyTransform(value: NormalizedFieldValue, node: FieldAccessNode): NormalizedFieldValue {
    switch (node.transform) {
        case 'none':
            return value;
        case 'lowerText':
            return foldCase(toFieldText(value));
        case 'trimText':
            return toFieldText(value).trim();
    }
}

function evaluateNode<T>(node: ExpressionNode, item: T, readField: FieldReader<T>): boolean {
    switch (node.type) {
        case 'literal':
            return node.value;

        case 'and':
            return node.operands.every((operand) => evaluateNode(operand, item, readField));
        case 'or':
            return node.operands.some((operand) => evaluateNode(operand, item, readField));
        case 'not':
            return !evaluateNode(node.operand, item, readField);

        case 'compare': {
            const left = readField(item, node.left);
            if (node.right.value === null) {
                // comparing with null asks whether the field has a value at all
                return node.op === 'eq' ? left === null : node.op === 'ne' ? left !== null : false;
            }
            const order = compareFieldValues(left, node.right.value);
            return order !== undefined && satisfiesOrder(node.op, order);
        }

        case 'string': {
            const text = readField(item, node.target);
            return typeof text === 'string' && matchesText(node.op, text, node.pattern);
        }

        case 'between': {
            const value = readField(item, node.target);
            const fromLower = compareFieldValues(value, node.lower.value);
            const toUpper = compareFieldValues(value, node.upper.value);
            if (fromLower === undefined || toUpper === undefined) {
                return false;
            }
            return fromLower >= 0 && (node.upperExclusive ? toUpper < 0 : toUpper <= 0);
        }

        case 'in': {
            const value = readField(item, node.target);
            return node.values.includes(toFieldText(value));
        }
    }
}
