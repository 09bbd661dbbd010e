/**
 * Calendar-relative windows used by `DateIs` / `DateIsNot`.
 * Each preset resolves to a half-open `[start, end)` range at evaluation time.
 */
export enum DatePreset {
    Today = 'Today',
    Yesterday = 'Yesterday',
    Tomorrow = 'Tomorrow',
    /** ISO week, Monday through Sunday */
    ThisWeek = 'ThisWeek',
    LastWeek = 'LastWeek',
    NextWeek = 'NextWeek',
    ThisMonth = 'ThisMonth',
    LastMonth = 'LastMonth',
    NextMonth = 'NextMonth',
    /** Q1: Jan–Mar, Q2: Apr–Jun, Q3: Jul–Sep, Q4: Oct–Dec */
    ThisQuarter = 'ThisQuarter',
    LastQuarter = 'LastQuarter',
    ThisYear = 'ThisYear',
    LastYear = 'LastYear',
}

/**
 * Unit of the `InLast` / `InNext` window.
 */
export enum InLastPeriod {
    Days = 'Days',
    Weeks = 'Weeks',
    Months = 'Months',
}

export type AbsentValue = { readonly kind: 'absent' };
export type TextValue = { readonly kind: 'text'; readonly value: string };
export type NumberValue = { readonly kind: 'number'; readonly value: number };
export type BooleanValue = { readonly kind: 'boolean'; readonly value: boolean };
export type InstantValue = { readonly kind: 'instant'; readonly value: Date };
export type PresetValue = { readonly kind: 'preset'; readonly value: DatePreset };
export type PeriodValue = { readonly kind: 'period'; readonly value: InLastPeriod };
export type TextListValue = { readonly kind: 'textList'; readonly value: string[] };

export interface DateRange {
    start: Date;
    end: Date;
}
