import _ from 'lodash';

import { DatePreset, InLastPeriod } from '../interface';

import type {
    AbsentValue,
    BooleanValue,
    InstantValue,
    NumberValue,
    PeriodValue,
    PresetValue,
    TextListValue,
    TextValue,
} from '../interface';

/**
 * Operand slot of a condition (`value` / `valueEnd`).
 * No other runtime shape is legal; every operator site switches on `kind`.
 */
type FilterValueType =
    | AbsentValue
    | TextValue
    | NumberValue
    | BooleanValue
    | InstantValue
    | PresetValue
    | PeriodValue
    | TextListValue;

const ABSENT: AbsentValue = { kind: 'absent' };

/**
 * Constructors and helpers for the `FilterValue` tagged union.
 *
 * @example
 * ```typescript
 * condition.value = FilterValue.number(10);
 * condition.valueEnd = FilterValue.number(20);
 * ```
 */
export const FilterValue = {
    absent: (): FilterValueType => ABSENT,
    text: (value: string): FilterValueType => ({ kind: 'text', value }),
    number: (value: number): FilterValueType => ({ kind: 'number', value }),
    boolean: (value: boolean): FilterValueType => ({ kind: 'boolean', value }),
    instant: (value: Date): FilterValueType => ({ kind: 'instant', value }),
    preset: (value: DatePreset): FilterValueType => ({ kind: 'preset', value }),
    period: (value: InLastPeriod): FilterValueType => ({ kind: 'period', value }),
    textList: (value: string[]): FilterValueType => ({ kind: 'textList', value }),

    /**
     * Wraps a host primitive. Strings are always text; tags must be built explicitly.
     */
    from(raw: string | number | boolean | Date | string[] | null | undefined): FilterValueType {
        if (_.isNil(raw)) {
            return ABSENT;
        }
        if (typeof raw === 'string') {
            return { kind: 'text', value: raw };
        }
        if (typeof raw === 'number') {
            return { kind: 'number', value: raw };
        }
        if (typeof raw === 'boolean') {
            return { kind: 'boolean', value: raw };
        }
        if (raw instanceof Date) {
            return { kind: 'instant', value: raw };
        }
        return { kind: 'textList', value: [...raw] };
    },

    isAbsent(value: FilterValueType): boolean {
        return value.kind === 'absent';
    },

    /**
     * Copies list-typed values; scalar payloads are immutable and shared.
     */
    clone(value: FilterValueType): FilterValueType {
        if (value.kind === 'textList') {
            return { kind: 'textList', value: [...value.value] };
        }
        return value;
    },

    equals(a: FilterValueType, b: FilterValueType): boolean {
        switch (a.kind) {
            case 'absent':
                return b.kind === 'absent';
            case 'instant':
                return b.kind === 'instant' && a.value.getTime() === b.value.getTime();
            case 'textList':
                return b.kind === 'textList' && _.isEqual(a.value, b.value);
            default:
                return 'value' in b && a.kind === b.kind && a.value === b.value;
        }
    },
};

export type FilterValue = FilterValueType;
export type FilterValueKind = FilterValueType['kind'];

/**
 * Case-insensitive lookup of a string-enum member by name.
 */
export function parseEnumName<TValue extends string>(members: readonly TValue[], name: string): TValue | undefined {
    const wanted = name.trim().toLowerCase();
    return members.find((member) => member.toLowerCase() === wanted);
}

export function parseDatePreset(name: string): DatePreset | undefined {
    return parseEnumName(Object.values(DatePreset), name);
}

export function parseInLastPeriod(name: string): InLastPeriod | undefined {
    return parseEnumName(Object.values(InLastPeriod), name);
}
