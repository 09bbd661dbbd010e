/**
 * Data type of a filterable field. Decides which operators the field offers
 * and how operand values are read.
 */
export enum FilterFieldType {
    Text = 'Text',
    Number = 'Number',
    Date = 'Date',
    DateTime = 'DateTime',
    Boolean = 'Boolean',
    Enum = 'Enum',
}

export interface SelectOption<TValue = string> {
    value: TValue;
    label: string;
}

/**
 * Host-supplied metadata for one filterable field.
 * `name` must match (case-insensitively) a readable property of the entity.
 */
export interface FilterField {
    name: string;
    label: string;
    type: FilterFieldType;
    /** Only meaningful for `FilterFieldType.Enum` */
    options?: SelectOption<string>[];
    placeholder?: string;
}
