import { parseISO } from 'date-fns';
import _ from 'lodash';

import { FieldValueKind } from '../interface';

import type { CompareOperator, StringOperator } from '../interface';

export type NormalizedFieldValue = string | number | boolean | Date | null;

/**
 * Reads a raw property value as the accessor's kind.
 * Drivers hand back decimals as strings and booleans as 0/1; both are accepted.
 * Anything that cannot be read as the kind becomes null.
 */
export function normalizeFieldValue(raw: unknown, kind: FieldValueKind): NormalizedFieldValue {
    if (_.isNil(raw)) {
        return null;
    }

    switch (kind) {
        case FieldValueKind.String:
            if (typeof raw === 'string') {
                return raw;
            }
            if (typeof raw === 'number' || typeof raw === 'boolean' || typeof raw === 'bigint') {
                return String(raw);
            }
            return raw instanceof Date ? toValidDate(raw)?.toISOString() ?? null : null;

        case FieldValueKind.Number:
            if (typeof raw === 'number') {
                return Number.isNaN(raw) ? null : raw;
            }
            if (typeof raw === 'bigint') {
                return Number(raw);
            }
            return typeof raw === 'string' ? parseNumber(raw) : null;

        case FieldValueKind.Date:
            if (raw instanceof Date) {
                return toValidDate(raw);
            }
            if (typeof raw === 'string') {
                return parseDateText(raw);
            }
            if (typeof raw === 'number') {
                return toValidDate(new Date(raw));
            }
            return null;

        case FieldValueKind.Boolean:
            if (typeof raw === 'boolean') {
                return raw;
            }
            if (raw === 0 || raw === 1) {
                return raw === 1;
            }
            return typeof raw === 'string' ? parseBoolean(raw) : null;
    }
}

/**
 * The value's own text form; null reads as the empty string.
 */
export function toFieldText(value: NormalizedFieldValue): string {
    if (value === null) {
        return '';
    }
    if (value instanceof Date) {
        return value.toISOString();
    }
    return String(value);
}

/**
 * Culture-invariant case folding shared by every backend.
 */
export function foldCase(text: string): string {
    return text.toLowerCase();
}

export function isBlankText(value: NormalizedFieldValue): boolean {
    return value === null || (typeof value === 'string' && value.trim() === '');
}

/**
 * Orders two values of the same runtime shape. Returns undefined when they cannot be compared.
 */
export function compareFieldValues(left: NormalizedFieldValue, right: NormalizedFieldValue): number | undefined {
    if (left === null || right === null) {
        return undefined;
    }
    if (typeof left === 'number' && typeof right === 'number') {
        return Math.sign(left - right);
    }
    if (left instanceof Date && right instanceof Date) {
        return Math.sign(left.getTime() - right.getTime());
    }
    if (typeof left === 'string' && typeof right === 'string') {
        return left === right ? 0 : left < right ? -1 : 1;
    }
    if (typeof left === 'boolean' && typeof right === 'boolean') {
        return Number(left) - Number(right);
    }
    return undefined;
}

export function satisfiesOrder(op: CompareOperator, order: number): boolean {
    switch (op) {
        case 'eq':
            return order === 0;
        case 'ne':
            return order !== 0;
        case 'gt':
            return order > 0;
        case 'ge':
            return order >= 0;
        case 'lt':
            return order < 0;
        case 'le':
            return order <= 0;
    }
}

export function matchesText(op: StringOperator, text: string, pattern: string): boolean {
    switch (op) {
        case 'contains':
            return text.includes(pattern);
        case 'startsWith':
            return text.startsWith(pattern);
        case 'endsWith':
            return text.endsWith(pattern);
    }
}

export function parseNumber(text: string): number | null {
    const trimmed = text.trim();
    if (trimmed === '') {
        return null;
    }
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
}

export function parseBoolean(text: string): boolean | null {
    const lowered = text.trim().toLowerCase();
    if (lowered === 'true') {
        return true;
    }
    if (lowered === 'false') {
        return false;
    }
    return null;
}

/**
 * ISO text is read the way date-fns reads it: date-only and zone-less forms are local time.
 * Other forms fall back to the `Date` parser.
 */
export function parseDateText(text: string): Date | null {
    const trimmed = text.trim();
    if (trimmed === '') {
        return null;
    }
    return toValidDate(parseISO(trimmed)) ?? toValidDate(new Date(trimmed));
}

function toValidDate(date: Date): Date | null {
    return Number.isNaN(date.getTime()) ? null : date;
}
