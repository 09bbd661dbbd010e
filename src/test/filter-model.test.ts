import { DatePreset, FilterFieldType, FilterOperator, InLastPeriod, LogicalOperator } from '../lib/interface';
import {
    FilterCondition,
    FilterDefinition,
    FilterValue,
    canAddCondition,
    canAddGroup,
    findField,
    isAtConditionLimit,
    parseDatePreset,
    parseInLastPeriod,
} from '../lib/model';

import type { FilterField } from '../lib/interface';

const FIELDS: FilterField[] = [
    { name: 'name', label: 'Name', type: FilterFieldType.Text },
    { name: 'nickname', label: 'Nickname', type: FilterFieldType.Text },
    { name: 'age', label: 'Age', type: FilterFieldType.Number },
    { name: 'active', label: 'Active', type: FilterFieldType.Boolean },
];

describe('FilterValue', () => {
    it('wraps host primitives by their runtime shape', () => {
        expect(FilterValue.from(null)).toEqual({ kind: 'absent' });
        expect(FilterValue.from(undefined)).toEqual({ kind: 'absent' });
        expect(FilterValue.from('abc')).toEqual({ kind: 'text', value: 'abc' });
        expect(FilterValue.from(4.5)).toEqual({ kind: 'number', value: 4.5 });
        expect(FilterValue.from(false)).toEqual({ kind: 'boolean', value: false });
        expect(FilterValue.from(['a', 'b'])).toEqual({ kind: 'textList', value: ['a', 'b'] });

        const instant = new Date(2024, 0, 1);
        expect(FilterValue.from(instant)).toEqual({ kind: 'instant', value: instant });
    });

    it('never reads a string as a tag', () => {
        expect(FilterValue.from('Today')).toEqual({ kind: 'text', value: 'Today' });
    });

    it('compares values structurally', () => {
        expect(FilterValue.equals(FilterValue.text('a'), FilterValue.text('a'))).toBe(true);
        expect(FilterValue.equals(FilterValue.text('1'), FilterValue.number(1))).toBe(false);
        expect(FilterValue.equals(FilterValue.instant(new Date(5)), FilterValue.instant(new Date(5)))).toBe(true);
        expect(FilterValue.equals(FilterValue.textList(['x']), FilterValue.textList(['x']))).toBe(true);
        expect(FilterValue.equals(FilterValue.textList(['x']), FilterValue.textList(['y']))).toBe(false);
        expect(FilterValue.equals(FilterValue.absent(), FilterValue.text(''))).toBe(false);
        expect(FilterValue.equals(FilterValue.preset(DatePreset.Today), FilterValue.preset(DatePreset.Today))).toBe(true);
    });

    it('parses enumeration names case-insensitively', () => {
        expect(parseDatePreset('thisweek')).toBe(DatePreset.ThisWeek);
        expect(parseDatePreset(' LASTYEAR ')).toBe(DatePreset.LastYear);
        expect(parseDatePreset('Fortnight')).toBeUndefined();
        expect(parseInLastPeriod('weeks')).toBe(InLastPeriod.Weeks);
        expect(parseInLastPeriod('hours')).toBeUndefined();
    });
});

describe('FilterCondition', () => {
    it('starts blank with an 8 character hex id', () => {
        const condition = new FilterCondition();

        expect(condition.id).toMatch(/^[0-9a-f]{8}$/);
        expect(condition.field).toBe('');
        expect(condition.operator).toBe(FilterOperator.Equals);
        expect(condition.value).toEqual({ kind: 'absent' });
        expect(condition.valueEnd).toEqual({ kind: 'absent' });
    });

    it('generates distinct ids', () => {
        const ids = new Set(Array.from({ length: 50 }, () => new FilterCondition().id));
        expect(ids.size).toBe(50);
    });

    describe('changeField', () => {
        it('resets operator and values when the field type changes', () => {
            const condition = new FilterCondition({
                field: 'name',
                operator: FilterOperator.Contains,
                value: FilterValue.text('al'),
            });

            condition.changeField('age', FIELDS);

            expect(condition.field).toBe('age');
            expect(condition.operator).toBe(FilterOperator.Equals);
            expect(condition.value).toEqual({ kind: 'absent' });
        });

        it('picks the first operator the new type offers', () => {
            const condition = new FilterCondition({ field: 'name' });

            condition.changeField('active', FIELDS);

            expect(condition.operator).toBe(FilterOperator.IsTrue);
        });

        it('keeps operator and values when the type stays the same', () => {
            const condition = new FilterCondition({
                field: 'name',
                operator: FilterOperator.StartsWith,
                value: FilterValue.text('a'),
            });

            condition.changeField('NICKNAME', FIELDS);

            expect(condition.field).toBe('NICKNAME');
            expect(condition.operator).toBe(FilterOperator.StartsWith);
            expect(condition.value).toEqual({ kind: 'text', value: 'a' });
        });
    });

    describe('changeOperator', () => {
        it('clears values for valueless operators', () => {
            const condition = new FilterCondition({ field: 'name', value: FilterValue.text('x') });

            condition.changeOperator(FilterOperator.IsEmpty);

            expect(condition.value).toEqual({ kind: 'absent' });
        });

        it('clears values when switching into or out of a range', () => {
            const condition = new FilterCondition({ field: 'age', value: FilterValue.number(3) });

            condition.changeOperator(FilterOperator.Between);
            expect(condition.value).toEqual({ kind: 'absent' });

            condition.value = FilterValue.number(1);
            condition.valueEnd = FilterValue.number(9);
            condition.changeOperator(FilterOperator.GreaterThan);
            expect(condition.value).toEqual({ kind: 'absent' });
            expect(condition.valueEnd).toEqual({ kind: 'absent' });
        });

        it('keeps a scalar operand between scalar operators', () => {
            const condition = new FilterCondition({ field: 'age', value: FilterValue.number(3) });

            condition.changeOperator(FilterOperator.LessThan);

            expect(condition.value).toEqual({ kind: 'number', value: 3 });
        });
    });

    it('finds catalog fields ignoring case', () => {
        expect(findField(FIELDS, 'AGE')?.name).toBe('age');
        expect(findField(FIELDS, '')).toBeUndefined();
        expect(findField(FIELDS, 'missing')).toBeUndefined();
    });
});

describe('FilterDefinition', () => {
    it('is empty without conditions and groups', () => {
        const filter = new FilterDefinition();

        expect(filter.isEmpty).toBe(true);
        expect(filter.operator).toBe(LogicalOperator.And);
        expect(filter.totalConditionCount).toBe(0);
    });

    it('counts conditions through nested groups', () => {
        const filter = new FilterDefinition();
        filter.addCondition({ field: 'name' });
        const group = filter.addGroup(LogicalOperator.Or);
        group.addCondition({ field: 'age' });
        group.addGroup();

        // the nested group and the deepest group each hold one blank condition
        expect(filter.totalConditionCount).toBe(4);
    });

    it('adds new groups with one blank condition', () => {
        const filter = new FilterDefinition();

        const group = filter.addGroup(LogicalOperator.Or);

        expect(group.operator).toBe(LogicalOperator.Or);
        expect(group.conditions).toHaveLength(1);
        expect(group.conditions[0].field).toBe('');
        expect(filter.groups).toEqual([group]);
    });

    it('removes direct children by id or reference', () => {
        const filter = new FilterDefinition();
        const first = filter.addCondition({ field: 'name' });
        const second = filter.addCondition(new FilterCondition({ field: 'age' }));
        const group = filter.addGroup();

        expect(filter.removeCondition(first.id)).toBe(true);
        expect(filter.removeCondition(second)).toBe(true);
        expect(filter.removeCondition(second)).toBe(false);
        expect(filter.removeGroup(group)).toBe(true);
        expect(filter.removeGroup(group)).toBe(false);
        expect(filter.isEmpty).toBe(true);
    });

    it('finds conditions at any depth', () => {
        const filter = new FilterDefinition();
        const nested = filter.addGroup().addGroup().addCondition({ field: 'age' });

        expect(filter.findCondition(nested.id)).toBe(nested);
        expect(filter.findCondition('nope')).toBeUndefined();
    });

    describe('clone', () => {
        it('reproduces structure and values', () => {
            const filter = new FilterDefinition({ operator: LogicalOperator.Or });
            filter.addCondition({ field: 'name', operator: FilterOperator.Contains, value: FilterValue.text('a') });
            filter.addGroup().conditions[0].field = 'age';

            const copy = filter.clone();

            expect(copy).not.toBe(filter);
            expect(copy).toEqual(filter);
            expect(copy.conditions[0]).not.toBe(filter.conditions[0]);
            expect(copy.groups[0]).not.toBe(filter.groups[0]);
        });

        it('does not share list values with the original', () => {
            const filter = new FilterDefinition();
            const original = filter.addCondition({
                field: 'status',
                operator: FilterOperator.In,
                value: FilterValue.textList(['active', 'pending']),
            });

            const copy = filter.clone();
            const copied = copy.conditions[0];
            if (copied.value.kind !== 'textList') {
                throw new Error('expected a text list');
            }
            copied.value.value.push('banned');

            expect(original.value).toEqual({ kind: 'textList', value: ['active', 'pending'] });
            expect(copied.value.value).toEqual(['active', 'pending', 'banned']);
        });
    });

    describe('editing limits', () => {
        it('stops adding conditions at the limit', () => {
            const filter = new FilterDefinition();
            filter.addCondition({ field: 'name' });
            filter.addCondition({ field: 'age' });

            expect(isAtConditionLimit(filter, { maxConditions: 2 })).toBe(true);
            expect(canAddCondition(filter, { maxConditions: 2 })).toBe(false);
            expect(canAddCondition(filter, { maxConditions: 3 })).toBe(true);
            expect(canAddCondition(filter)).toBe(true);
        });

        it('limits group nesting depth', () => {
            const filter = new FilterDefinition();

            expect(canAddGroup(filter, 0)).toBe(true);
            expect(canAddGroup(filter, 2)).toBe(true);
            expect(canAddGroup(filter, 3)).toBe(false);
            expect(canAddGroup(filter, 1, { maxDepth: 1 })).toBe(false);
        });

        it('refuses new groups once the condition limit is reached', () => {
            const filter = new FilterDefinition();
            filter.addCondition({ field: 'name' });

            expect(canAddGroup(filter, 0, { maxConditions: 1 })).toBe(false);
        });
    });
});
