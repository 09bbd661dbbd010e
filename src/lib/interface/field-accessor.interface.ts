/**
 * Runtime shape a field is normalized to before any comparison.
 */
export enum FieldValueKind {
    String = 'string',
    Number = 'number',
    Date = 'date',
    Boolean = 'boolean',
}

/**
 * Any class whose instances can be filtered. The registry keys its tables by this constructor.
 */
export type EntityType<T = object> = new (...args: never[]) => T;

export interface FieldAccessor<T = object> {
    /** Property name as declared on the entity (original casing) */
    readonly property: string;
    readonly kind: FieldValueKind;
    readonly nullable: boolean;
    read(item: T): unknown;
}

/**
 * Explicit registration of one property.
 * `read` defaults to plain property access.
 */
export interface FieldDescriptor<T = object> {
    kind: FieldValueKind;
    nullable?: boolean;
    read?: (item: T) => unknown;
}

export type FieldDescriptorMap<T = object> = Record<string, FieldDescriptor<T> | FieldValueKind>;
