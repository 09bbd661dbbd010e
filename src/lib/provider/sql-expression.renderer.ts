import { SQL_PARAMETER_PREFIX } from '../constants';
import { FieldValueKind } from '../interface';

import type { CompareOperator, ExpressionNode, FieldAccessNode, FilterExpression, LiteralValue, SqlFilterResult, StringOperator } from '../interface';
import type { ObjectLiteral, SelectQueryBuilder } from 'typeorm';

export interface SqlRenderOptions {
    /** SQL type non-text columns are cast to for text operators (`VARCHAR`, or `CHAR` on MySQL) */
    textCastType?: string;
    parameterPrefix?: string;
    /** Index of the first emitted parameter; lets several fragments share one query */
    firstParameterIndex?: number;
    /** Converts a literal compared against a raw column into the driver's stored form */
    prepareValue?: (value: LiteralValue, field: FieldAccessNode) => unknown;
}

const COMPARE_SQL: Readonly<Record<CompareOperator, string>> = {
    eq: '=',
    ne: '<>',
    gt: '>',
    ge: '>=',
    lt: '<',
    le: '<=',
};

const LIKE_ESCAPE = '!';

const CHAR_CAST_DRIVERS: readonly string[] = ['mysql', 'mariadb', 'aurora-mysql'];

/**
 * Lowers an expression tree to a parameterized `WHERE` fragment.
 * Fields are written as `alias.property`, which TypeORM maps to column names.
 */
export class SqlExpressionRenderer {
    private readonly params: Record<string, unknown> = {};
    private index: number;

    constructor(
        private readonly alias: string,
        private readonly options: SqlRenderOptions = {},
    ) {
        this.index = options.firstParameterIndex ?? 0;
    }

    render(node: ExpressionNode): SqlFilterResult {
        const sql = this.renderNode(node);
        return { sql, params: { ...this.params } };
    }

    private renderNode(node: ExpressionNode): string {
        switch (node.type) {
            case 'literal':
                return node.value ? '1=1' : '1=0';

            case 'and':
            case 'or': {
                if (node.operands.length === 0) {
                    return node.type === 'and' ? '1=1' : '1=0';
                }
                const joiner = node.type === 'and' ? ' AND ' : ' OR ';
                return node.operands.map((operand) => `(${this.renderNode(operand)})`).join(joiner);
            }

            case 'not':
                return `NOT (${this.renderNode(node.operand)})`;

            case 'compare': {
                const field = this.renderField(node.left);
                const value = node.right.value;
                if (value === null) {
                    if (node.op === 'eq') {
                        return `${field} IS NULL`;
                    }
                    return node.op === 'ne' ? `${field} IS NOT NULL` : '1=0';
                }
                return `${field} ${COMPARE_SQL[node.op]} :${this.bind(value, node.left)}`;
            }

            case 'string':
                return `${this.renderField(node.target)} LIKE :${this.bindRaw(toLikePattern(node.op, node.pattern))} ESCAPE '${LIKE_ESCAPE}'`;

            case 'between': {
                const field = this.renderField(node.target);
                const lower = this.bind(node.lower.value, node.target);
                const upper = this.bind(node.upper.value, node.target);
                return `${field} >= :${lower} AND ${field} ${node.upperExclusive ? '<' : '<='} :${upper}`;
            }

            case 'in':
                return `${this.renderField(node.target)} IN (:...${this.bindRaw([...node.values])})`;
        }
    }

    private renderField(node: FieldAccessNode): string {
        const column = `${this.alias}.${node.property}`;
        if (node.transform === 'none') {
            return column;
        }

        const castType = this.options.textCastType ?? 'VARCHAR';
        const text = node.kind === FieldValueKind.String ? `COALESCE(${column}, '')` : `COALESCE(CAST(${column} AS ${castType}), '')`;

        switch (node.transform) {
            case 'lowerText':
                return `LOWER(${text})`;
            case 'trimText':
                return `TRIM(${text})`;
        }
    }

    /**
     * Values compared against the raw column go through the driver's conversion.
     */
    private bind(value: LiteralValue, field: FieldAccessNode): string {
        const prepared = field.transform === 'none' && this.options.prepareValue ? this.options.prepareValue(value, field) : value;
        return this.bindRaw(prepared);
    }

    private bindRaw(value: unknown): string {
        const name = `${this.options.parameterPrefix ?? SQL_PARAMETER_PREFIX}${this.index++}`;
        this.params[name] = value;
        return name;
    }
}

export function renderSql(expression: FilterExpression | ExpressionNode, alias: string, options: SqlRenderOptions = {}): SqlFilterResult {
    const root = 'root' in expression ? expression.root : expression;
    return new SqlExpressionRenderer(alias, options).render(root);
}

/**
 * `andWhere`s a compiled filter into a query builder over the same entity.
 *
 * @example
 * ```typescript
 * const qb = repository.createQueryBuilder('person');
 * applyFilterExpression(qb, compile(filter, fields, Person));
 * const people = await qb.getMany();
 * ```
 */
export function applyFilterExpression<T extends ObjectLiteral>(qb: SelectQueryBuilder<T>, expression: FilterExpression): SelectQueryBuilder<T> {
    const connection = qb.connection;
    const mainAlias = qb.expressionMap.mainAlias;
    const metadata = mainAlias?.hasMetadata ? mainAlias.metadata : undefined;
    const prefix = SQL_PARAMETER_PREFIX;

    const { sql, params } = renderSql(expression, qb.alias, {
        textCastType: CHAR_CAST_DRIVERS.includes(connection.options.type) ? 'CHAR' : 'VARCHAR',
        parameterPrefix: prefix,
        firstParameterIndex: Object.keys(qb.getParameters()).filter((name) => name.startsWith(prefix)).length,
        prepareValue: (value, field) => {
            const column = metadata?.findColumnWithPropertyName(field.property);
            return column && value !== null ? connection.driver.preparePersistentValue(value, column) : value;
        },
    });

    return qb.andWhere(sql, params);
}

/**
 * `%` and `_` in the user's text match literally.
 */
function toLikePattern(op: StringOperator, pattern: string): string {
    const escaped = pattern.replace(/[!%_]/g, (char) => `${LIKE_ESCAPE}${char}`);
    switch (op) {
        case 'contains':
            return `%${escaped}%`;
        case 'startsWith':
            return `${escaped}%`;
        case 'endsWith':
            return `%${escaped}`;
    }
}
