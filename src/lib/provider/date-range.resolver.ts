import { addDays, addMonths, addQuarters, addWeeks, addYears, startOfDay, startOfMonth, startOfQuarter, startOfWeek, startOfYear } from 'date-fns';

import { DatePreset, FilterOperator, InLastPeriod } from '../interface';

import type { DateRange } from '../interface';

/**
 * Resolves a preset to a half-open `[start, end)` range in local calendar time.
 * Weeks always start on Monday, whatever the host locale says.
 */
export function resolveDatePreset(preset: DatePreset, now: Date): DateRange {
    const today = startOfDay(now);

    switch (preset) {
        case DatePreset.Today:
            return dayRange(today, 0);
        case DatePreset.Yesterday:
            return dayRange(today, -1);
        case DatePreset.Tomorrow:
            return dayRange(today, 1);

        case DatePreset.ThisWeek:
            return weekRange(today, 0);
        case DatePreset.LastWeek:
            return weekRange(today, -1);
        case DatePreset.NextWeek:
            return weekRange(today, 1);

        case DatePreset.ThisMonth:
            return monthRange(today, 0);
        case DatePreset.LastMonth:
            return monthRange(today, -1);
        case DatePreset.NextMonth:
            return monthRange(today, 1);

        case DatePreset.ThisQuarter:
            return quarterRange(today, 0);
        case DatePreset.LastQuarter:
            return quarterRange(today, -1);

        case DatePreset.ThisYear:
            return yearRange(today, 0);
        case DatePreset.LastYear:
            return yearRange(today, -1);
    }
}

/**
 * Window of `InLast` / `InNext`, anchored at `now` with its time of day.
 * InLast: `[now - amount, now]`, InNext: `[now, now + amount]`.
 */
export function resolveRelativeWindow(
    operator: FilterOperator.InLast | FilterOperator.InNext,
    amount: number,
    period: InLastPeriod,
    now: Date,
): DateRange {
    const step = operator === FilterOperator.InLast ? -amount : amount;
    const cutoff = shiftByPeriod(now, step, period);

    return operator === FilterOperator.InLast ? { start: cutoff, end: now } : { start: now, end: cutoff };
}

export function shiftByPeriod(date: Date, amount: number, period: InLastPeriod): Date {
    switch (period) {
        case InLastPeriod.Days:
            return addDays(date, amount);
        case InLastPeriod.Weeks:
            return addDays(date, amount * 7);
        case InLastPeriod.Months:
            return addMonths(date, amount);
    }
}

export function isWithinRange(value: Date, range: DateRange): boolean {
    const time = value.getTime();
    return time >= range.start.getTime() && time < range.end.getTime();
}

function dayRange(today: Date, offset: number): DateRange {
    const start = addDays(today, offset);
    return { start, end: addDays(start, 1) };
}

function weekRange(today: Date, offset: number): DateRange {
    const start = addWeeks(startOfWeek(today, { weekStartsOn: 1 }), offset);
    return { start, end: addWeeks(start, 1) };
}

function monthRange(today: Date, offset: number): DateRange {
    const start = addMonths(startOfMonth(today), offset);
    return { start, end: addMonths(start, 1) };
}

function quarterRange(today: Date, offset: number): DateRange {
    const start = addQuarters(startOfQuarter(today), offset);
    return { start, end: addMonths(start, 3) };
}

function yearRange(today: Date, offset: number): DateRange {
    const start = addYears(startOfYear(today), offset);
    return { start, end: addYears(start, 1) };
}
