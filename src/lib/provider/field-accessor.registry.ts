import { getMetadataArgsStorage } from 'typeorm';

import { isColumnNullable, resolveColumnKind } from '../utils/column-kind-map';

import type { EntityType, FieldAccessor, FieldDescriptor, FieldDescriptorMap, FieldValueKind } from '../interface';

type AccessorTable = Map<string, FieldAccessor>;

interface RegistryStats {
    hits: number;
    misses: number;
    entities: number;
}

/**
 * 🗂️ Name → typed getter tables, one per entity class.
 *
 * A table is built once, on first lookup, from the TypeORM column metadata of the class and its
 * ancestors; `register` adds or overrides entries for plain classes and computed properties.
 * Lookups are case-insensitive. Entries are never replaced after insertion except through `register`.
 */
export class FieldAccessorRegistry {
    private readonly tables = new Map<EntityType, AccessorTable>();
    private readonly stats = { hits: 0, misses: 0 };

    register<T extends object>(entity: EntityType<T>, descriptors: FieldDescriptorMap<T>): this {
        const table = this.tableFor(entity);

        for (const [property, descriptor] of Object.entries(descriptors)) {
            table.set(property.toLowerCase(), createAccessor<T>(property, typeof descriptor === 'string' ? { kind: descriptor } : descriptor));
        }
        return this;
    }

    resolve<T extends object>(entity: EntityType<T>, field: string): FieldAccessor<T> | undefined {
        const accessor = this.tableFor(entity).get(field.toLowerCase());
        if (accessor) {
            this.stats.hits++;
        } else {
            this.stats.misses++;
        }
        return accessor;
    }

    getAccessors<T extends object>(entity: EntityType<T>): FieldAccessor<T>[] {
        return [...this.tableFor(entity).values()];
    }

    has(entity: EntityType): boolean {
        return this.tables.has(entity);
    }

    getStats(): RegistryStats {
        return { ...this.stats, entities: this.tables.size };
    }

    clear(): void {
        this.tables.clear();
        this.stats.hits = 0;
        this.stats.misses = 0;
    }

    private tableFor(entity: EntityType): AccessorTable {
        const cached = this.tables.get(entity);
        if (cached) {
            return cached;
        }

        const table = buildTableFromColumns(entity);
        this.tables.set(entity, table);
        return table;
    }
}

function createAccessor<T extends object>(property: string, descriptor: FieldDescriptor<T>): FieldAccessor<T> {
    const read = descriptor.read ?? ((item: T): unknown => Reflect.get(item, property));
    return Object.freeze({
        property,
        kind: descriptor.kind,
        nullable: descriptor.nullable ?? false,
        read,
    });
}

function buildTableFromColumns(entity: EntityType): AccessorTable {
    const table: AccessorTable = new Map();
    const inheritanceTree = getInheritanceTree(entity);
    const storage = getMetadataArgsStorage();

    for (const column of storage.columns) {
        if (typeof column.target !== 'function' || !inheritanceTree.includes(column.target)) {
            continue;
        }
        const kind: FieldValueKind | undefined = resolveColumnKind(column);
        if (!kind) {
            continue;
        }
        table.set(
            column.propertyName.toLowerCase(),
            createAccessor(column.propertyName, { kind, nullable: isColumnNullable(column) }),
        );
    }
    return table;
}

/**
 * The class followed by its ancestors, stopping before `Object`.
 */
function getInheritanceTree(entity: EntityType): Function[] {
    const result: Function[] = [];
    let current: unknown = entity;

    while (typeof current === 'function' && current !== Object && current !== Function.prototype) {
        result.push(current);
        current = Object.getPrototypeOf(current);
    }
    return result;
}

// 🌍 Process-wide registry used when no registry is passed explicitly
export const defaultFieldAccessorRegistry = new FieldAccessorRegistry();
