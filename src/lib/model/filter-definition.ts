import _ from 'lodash';

import { DEFAULT_MAX_DEPTH } from '../constants';
import { LogicalOperator } from '../interface';
import { FilterCondition } from './filter-condition';

import type { FilterEditLimits } from '../interface';
import type { FilterConditionInit } from './filter-condition';

export interface FilterDefinitionInit {
    operator?: LogicalOperator;
    conditions?: FilterCondition[];
    groups?: FilterDefinition[];
}

/**
 * A group node: child conditions and nested groups combined with AND or OR.
 * An empty definition matches everything.
 */
export class FilterDefinition {
    operator: LogicalOperator;
    conditions: FilterCondition[];
    groups: FilterDefinition[];

    constructor(init: FilterDefinitionInit = {}) {
        this.operator = init.operator ?? LogicalOperator.And;
        this.conditions = init.conditions ?? [];
        this.groups = init.groups ?? [];
    }

    get isEmpty(): boolean {
        return this.conditions.length === 0 && this.groups.length === 0;
    }

    /**
     * Conditions in this group and every nested group.
     */
    get totalConditionCount(): number {
        return this.conditions.length + _.sumBy(this.groups, (group) => group.totalConditionCount);
    }

    clone(): FilterDefinition {
        return new FilterDefinition({
            operator: this.operator,
            conditions: this.conditions.map((condition) => condition.clone()),
            groups: this.groups.map((group) => group.clone()),
        });
    }

    addCondition(condition: FilterCondition | FilterConditionInit = {}): FilterCondition {
        const added = condition instanceof FilterCondition ? condition : new FilterCondition(condition);
        this.conditions.push(added);
        return added;
    }

    /**
     * Removes a direct child condition. Returns false when it is not a child of this group.
     */
    removeCondition(target: FilterCondition | string): boolean {
        const index = this.conditions.findIndex((condition) => (typeof target === 'string' ? condition.id === target : condition === target));
        if (index < 0) {
            return false;
        }
        this.conditions.splice(index, 1);
        return true;
    }

    /**
     * Appends a nested group holding one blank condition, ready for editing.
     */
    addGroup(operator: LogicalOperator = LogicalOperator.And): FilterDefinition {
        const group = new FilterDefinition({ operator, conditions: [new FilterCondition()] });
        this.groups.push(group);
        return group;
    }

    removeGroup(target: FilterDefinition): boolean {
        const index = this.groups.indexOf(target);
        if (index < 0) {
            return false;
        }
        this.groups.splice(index, 1);
        return true;
    }

    findCondition(id: string): FilterCondition | undefined {
        const own = this.conditions.find((condition) => condition.id === id);
        if (own) {
            return own;
        }
        for (const group of this.groups) {
            const nested = group.findCondition(id);
            if (nested) {
                return nested;
            }
        }
        return undefined;
    }
}

/**
 * Editing limits of the condition-row UI. Evaluation never consults them.
 */
export function isAtConditionLimit(root: FilterDefinition, limits: FilterEditLimits = {}): boolean {
    return limits.maxConditions !== undefined && root.totalConditionCount >= limits.maxConditions;
}

export function canAddCondition(root: FilterDefinition, limits: FilterEditLimits = {}): boolean {
    return !isAtConditionLimit(root, limits);
}

/**
 * @param depth nesting level of the group that would receive the new group (root = 0)
 */
export function canAddGroup(root: FilterDefinition, depth: number, limits: FilterEditLimits = {}): boolean {
    const maxDepth = limits.maxDepth ?? DEFAULT_MAX_DEPTH;
    return depth < maxDepth && !isAtConditionLimit(root, limits);
}
