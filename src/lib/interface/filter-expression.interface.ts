import type { EntityType, FieldValueKind } from './field-accessor.interface';

/**
 * How a field is read before it reaches its operator.
 * - `none`: the normalized value
 * - `lowerText`: text form, null becoming `''`, folded to lower case
 * - `trimText`: text form without surrounding whitespace
 */
export type FieldTransform = 'none' | 'lowerText' | 'trimText';

export interface FieldAccessNode {
    readonly type: 'field';
    readonly property: string;
    readonly kind: FieldValueKind;
    readonly nullable: boolean;
    readonly transform: FieldTransform;
}

export type LiteralValue = string | number | boolean | Date | null;

export interface LiteralNode<TValue extends LiteralValue = LiteralValue> {
    readonly type: 'literal';
    readonly value: TValue;
}

export type CompareOperator = 'eq' | 'ne' | 'gt' | 'ge' | 'lt' | 'le';

/**
 * `eq` / `ne` against a null literal mean "has no value" / "has a value".
 */
export interface CompareNode {
    readonly type: 'compare';
    readonly op: CompareOperator;
    readonly left: FieldAccessNode;
    readonly right: LiteralNode;
}

export type StringOperator = 'contains' | 'startsWith' | 'endsWith';

export interface StringOpNode {
    readonly type: 'string';
    readonly op: StringOperator;
    readonly target: FieldAccessNode;
    /** Already case-folded */
    readonly pattern: string;
}

export interface BetweenNode {
    readonly type: 'between';
    readonly target: FieldAccessNode;
    readonly lower: LiteralNode;
    readonly upper: LiteralNode;
    readonly upperExclusive: boolean;
}

export interface SetMembershipNode {
    readonly type: 'in';
    readonly target: FieldAccessNode;
    /** Already case-folded, never empty */
    readonly values: readonly string[];
}

export interface AndNode {
    readonly type: 'and';
    readonly operands: readonly ExpressionNode[];
}

export interface OrNode {
    readonly type: 'or';
    readonly operands: readonly ExpressionNode[];
}

export interface NotNode {
    readonly type: 'not';
    readonly operand: ExpressionNode;
}

export type ExpressionNode =
    | CompareNode
    | StringOpNode
    | BetweenNode
    | SetMembershipNode
    | AndNode
    | OrNode
    | NotNode
    | LiteralNode<boolean>;

/**
 * Result of compiling a filter tree against one entity type.
 * Date presets and relative windows are already resolved against `resolvedAt`.
 */
export interface FilterExpression<T = object> {
    readonly entity: EntityType<T>;
    readonly root: ExpressionNode;
    readonly resolvedAt: Date;
}

export interface SqlFilterResult {
    sql: string;
    params: Record<string, unknown>;
}
