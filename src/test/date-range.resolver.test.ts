import { DatePreset, FilterOperator, InLastPeriod } from '../lib/interface';
import { isWithinRange, resolveDatePreset, resolveRelativeWindow, shiftByPeriod } from '../lib/provider/date-range.resolver';

import { FIXED_NOW } from './fixtures/person.fixture';

describe('date range resolution', () => {
    describe('resolveDatePreset', () => {
        it.each([
            [DatePreset.Today, new Date(2024, 0, 17), new Date(2024, 0, 18)],
            [DatePreset.Yesterday, new Date(2024, 0, 16), new Date(2024, 0, 17)],
            [DatePreset.Tomorrow, new Date(2024, 0, 18), new Date(2024, 0, 19)],
            [DatePreset.ThisWeek, new Date(2024, 0, 15), new Date(2024, 0, 22)],
            [DatePreset.LastWeek, new Date(2024, 0, 8), new Date(2024, 0, 15)],
            [DatePreset.NextWeek, new Date(2024, 0, 22), new Date(2024, 0, 29)],
            [DatePreset.ThisMonth, new Date(2024, 0, 1), new Date(2024, 1, 1)],
            [DatePreset.LastMonth, new Date(2023, 11, 1), new Date(2024, 0, 1)],
            [DatePreset.NextMonth, new Date(2024, 1, 1), new Date(2024, 2, 1)],
            [DatePreset.ThisQuarter, new Date(2024, 0, 1), new Date(2024, 3, 1)],
            [DatePreset.LastQuarter, new Date(2023, 9, 1), new Date(2024, 0, 1)],
            [DatePreset.ThisYear, new Date(2024, 0, 1), new Date(2025, 0, 1)],
            [DatePreset.LastYear, new Date(2023, 0, 1), new Date(2024, 0, 1)],
        ])('resolves %s on Wednesday 17 January 2024', (preset, start, end) => {
            expect(resolveDatePreset(preset, FIXED_NOW)).toEqual({ start, end });
        });

        it('starts weeks on Monday even when today is Sunday', () => {
            const sunday = new Date(2024, 0, 21, 23, 30);

            expect(resolveDatePreset(DatePreset.ThisWeek, sunday)).toEqual({
                start: new Date(2024, 0, 15),
                end: new Date(2024, 0, 22),
            });
        });

        it('uses calendar quarters', () => {
            const may = new Date(2024, 4, 20);

            expect(resolveDatePreset(DatePreset.ThisQuarter, may)).toEqual({ start: new Date(2024, 3, 1), end: new Date(2024, 6, 1) });
            expect(resolveDatePreset(DatePreset.LastQuarter, may)).toEqual({ start: new Date(2024, 0, 1), end: new Date(2024, 3, 1) });
        });

        it('produces half-open ranges', () => {
            const today = resolveDatePreset(DatePreset.Today, FIXED_NOW);

            expect(isWithinRange(new Date(2024, 0, 17, 0, 0, 0), today)).toBe(true);
            expect(isWithinRange(new Date(2024, 0, 17, 23, 59, 59), today)).toBe(true);
            expect(isWithinRange(new Date(2024, 0, 18, 0, 0, 0), today)).toBe(false);
        });
    });

    describe('resolveRelativeWindow', () => {
        it('looks back from now for InLast', () => {
            expect(resolveRelativeWindow(FilterOperator.InLast, 7, InLastPeriod.Days, FIXED_NOW)).toEqual({
                start: new Date(2024, 0, 10, 12, 0, 0),
                end: FIXED_NOW,
            });
        });

        it('looks ahead from now for InNext', () => {
            expect(resolveRelativeWindow(FilterOperator.InNext, 2, InLastPeriod.Weeks, FIXED_NOW)).toEqual({
                start: FIXED_NOW,
                end: new Date(2024, 0, 31, 12, 0, 0),
            });
        });

        it('clamps month arithmetic to the end of shorter months', () => {
            const endOfMarch = new Date(2024, 2, 31, 12, 0, 0);

            expect(resolveRelativeWindow(FilterOperator.InLast, 1, InLastPeriod.Months, endOfMarch).start).toEqual(new Date(2024, 1, 29, 12, 0, 0));
        });
    });

    it('shifts by weeks as seven days', () => {
        expect(shiftByPeriod(new Date(2024, 0, 1), 3, InLastPeriod.Weeks)).toEqual(new Date(2024, 0, 22));
    });
});
