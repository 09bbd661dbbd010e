/**
 * TypeORM column type → runtime value kind.
 * Used when an accessor table is generated from `@Column` metadata.
 */
import { FieldValueKind } from '../interface';

import type { ColumnMetadataArgs } from 'typeorm/metadata-args/ColumnMetadataArgs';

export const COLUMN_TYPE_KIND_MAP: Readonly<Record<string, FieldValueKind>> = {
    // === strings ===
    varchar: FieldValueKind.String,
    'character varying': FieldValueKind.String,
    char: FieldValueKind.String,
    nvarchar: FieldValueKind.String,
    text: FieldValueKind.String,
    longtext: FieldValueKind.String,
    mediumtext: FieldValueKind.String,
    uuid: FieldValueKind.String,
    enum: FieldValueKind.String,
    'simple-enum': FieldValueKind.String,

    // === numbers ===
    int: FieldValueKind.Number,
    integer: FieldValueKind.Number,
    tinyint: FieldValueKind.Number,
    smallint: FieldValueKind.Number,
    bigint: FieldValueKind.Number,
    float: FieldValueKind.Number,
    double: FieldValueKind.Number,
    real: FieldValueKind.Number,
    decimal: FieldValueKind.Number,
    numeric: FieldValueKind.Number,

    // === boolean ===
    boolean: FieldValueKind.Boolean,
    bool: FieldValueKind.Boolean,

    // === dates ===
    date: FieldValueKind.Date,
    datetime: FieldValueKind.Date,
    timestamp: FieldValueKind.Date,
    timestamptz: FieldValueKind.Date,
    'timestamp with time zone': FieldValueKind.Date,
};

// createDate / updateDate / deleteDate columns carry no explicit type
const DATE_COLUMN_MODES: readonly string[] = ['createDate', 'updateDate', 'deleteDate'];

/**
 * Kind of a TypeORM column, or undefined for types a filter cannot compare (json, blobs, …).
 */
export function resolveColumnKind(column: ColumnMetadataArgs): FieldValueKind | undefined {
    const type = column.options.type;

    if (type === String) {
        return FieldValueKind.String;
    }
    if (type === Number) {
        return FieldValueKind.Number;
    }
    if (type === Boolean) {
        return FieldValueKind.Boolean;
    }
    if (type === Date) {
        return FieldValueKind.Date;
    }
    if (typeof type === 'string') {
        return COLUMN_TYPE_KIND_MAP[type.toLowerCase()];
    }
    if (DATE_COLUMN_MODES.includes(column.mode)) {
        return FieldValueKind.Date;
    }
    if (column.mode === 'version') {
        return FieldValueKind.Number;
    }
    return undefined;
}

export function isColumnNullable(column: ColumnMetadataArgs): boolean {
    return Boolean(column.options.nullable) || column.mode === 'deleteDate';
}
