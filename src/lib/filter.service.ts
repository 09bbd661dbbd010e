import { Inject, Injectable, Optional } from '@nestjs/common';

import { FILTER_MODULE_OPTIONS } from './constants';
import { canAddCondition, canAddGroup } from './model/filter-definition';
import { evaluate } from './provider/filter-evaluator';
import { compile } from './provider/filter-compiler';
import { defaultFieldAccessorRegistry } from './provider/field-accessor.registry';
import { FilterLogger } from './provider/filter-logger';
import { deserialize, serialize } from './provider/filter-serializer';
import { applyFilterExpression } from './provider/sql-expression.renderer';

import type { EntityType, FieldDescriptorMap, FilterEngineOptions, FilterExpression, FilterField, FilterModuleOptions } from './interface';
import type { FilterDefinition } from './model/filter-definition';
import type { FieldAccessorRegistry } from './provider/field-accessor.registry';
import type { FilterPredicate } from './provider/filter-evaluator';
import type { ObjectLiteral, SelectQueryBuilder } from 'typeorm';

/**
 * 🎯 Filter operations bound to the module's clock, registry and logging switch.
 */
@Injectable()
export class FilterService {
    private readonly options: FilterModuleOptions;
    private readonly logger: FilterLogger;

    constructor(@Optional() @Inject(FILTER_MODULE_OPTIONS) options?: FilterModuleOptions) {
        this.options = options ?? {};
        this.logger = new FilterLogger(this.options.logging ?? false);
    }

    get registry(): FieldAccessorRegistry {
        return this.options.registry ?? defaultFieldAccessorRegistry;
    }

    registerFields<T extends object>(entity: EntityType<T>, descriptors: FieldDescriptorMap<T>): this {
        this.registry.register(entity, descriptors);
        return this;
    }

    evaluate<T extends object>(filter: FilterDefinition, fields: readonly FilterField[], entity: EntityType<T>): FilterPredicate<T> {
        return evaluate(filter, fields, entity, this.engineOptions());
    }

    compile<T extends object>(filter: FilterDefinition, fields: readonly FilterField[], entity: EntityType<T>): FilterExpression<T> {
        return compile(filter, fields, entity, this.engineOptions());
    }

    filterItems<T extends object>(items: readonly T[], filter: FilterDefinition, fields: readonly FilterField[], entity: EntityType<T>): T[] {
        return items.filter(this.evaluate(filter, fields, entity));
    }

    /**
     * Pushes the filter down to the database as an extra `WHERE` condition.
     */
    applyToQueryBuilder<T extends ObjectLiteral>(
        qb: SelectQueryBuilder<T>,
        filter: FilterDefinition,
        fields: readonly FilterField[],
        entity: EntityType<T>,
    ): SelectQueryBuilder<T> {
        const expression = this.compile(filter, fields, entity);
        this.logger.debug(`Applying filter on ${entity.name} as alias "${qb.alias}"`);
        return applyFilterExpression(qb, expression);
    }

    serialize(filter: FilterDefinition): string {
        return serialize(filter);
    }

    deserialize(text: string): FilterDefinition {
        return deserialize(text);
    }

    canAddCondition(root: FilterDefinition): boolean {
        return canAddCondition(root, this.options.limits);
    }

    canAddGroup(root: FilterDefinition, depth: number): boolean {
        return canAddGroup(root, depth, this.options.limits);
    }

    private engineOptions(): FilterEngineOptions {
        return {
            clock: this.options.clock,
            registry: this.registry,
            logger: this.logger,
        };
    }
}
