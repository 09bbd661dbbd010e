import 'reflect-metadata';
import { Column, CreateDateColumn, DeleteDateColumn, Entity, ManyToOne, PrimaryGeneratedColumn, VersionColumn } from 'typeorm';

import { FieldValueKind } from '../lib/interface';
import { FieldAccessorRegistry } from '../lib/provider/field-accessor.registry';

import { Person } from './fixtures/person.fixture';

abstract class AuditedRecord {
    @PrimaryGeneratedColumn('uuid')
    id!: string;

    @CreateDateColumn()
    createdAt!: Date;

    @DeleteDateColumn()
    deletedAt!: Date | null;

    @VersionColumn()
    revision!: number;
}

@Entity('registry_owners')
class Owner extends AuditedRecord {
    @Column({ type: 'varchar' })
    displayName!: string;
}

@Entity('registry_documents')
class RegistryDocument extends AuditedRecord {
    @Column({ type: 'varchar', length: 120 })
    title!: string;

    @Column({ type: 'decimal', precision: 10, scale: 2, nullable: true })
    price!: string | null;

    @Column({ type: 'simple-json', nullable: true })
    metadata!: Record<string, unknown> | null;

    @ManyToOne(() => Owner)
    owner!: Owner;
}

class Invoice {
    constructor(
        readonly number: string,
        readonly lines: { amount: number }[],
    ) {}
}

describe('FieldAccessorRegistry', () => {
    let registry: FieldAccessorRegistry;

    beforeEach(() => {
        registry = new FieldAccessorRegistry();
    });

    describe('tables built from TypeORM columns', () => {
        it('reads column kinds and nullability', () => {
            expect(registry.resolve(Person, 'name')).toMatchObject({ property: 'name', kind: FieldValueKind.String, nullable: false });
            expect(registry.resolve(Person, 'email')).toMatchObject({ kind: FieldValueKind.String, nullable: true });
            expect(registry.resolve(Person, 'score')).toMatchObject({ kind: FieldValueKind.Number, nullable: true });
            expect(registry.resolve(Person, 'active')).toMatchObject({ kind: FieldValueKind.Boolean, nullable: false });
            expect(registry.resolve(Person, 'lastLoginAt')).toMatchObject({ kind: FieldValueKind.Date, nullable: true });
            expect(registry.resolve(Person, 'id')).toMatchObject({ kind: FieldValueKind.Number });
        });

        it('includes columns declared on base classes', () => {
            expect(registry.resolve(RegistryDocument, 'createdAt')).toMatchObject({ kind: FieldValueKind.Date, nullable: false });
            expect(registry.resolve(RegistryDocument, 'deletedAt')).toMatchObject({ kind: FieldValueKind.Date, nullable: true });
            expect(registry.resolve(RegistryDocument, 'revision')).toMatchObject({ kind: FieldValueKind.Number });
            expect(registry.resolve(RegistryDocument, 'id')).toMatchObject({ kind: FieldValueKind.String });
            expect(registry.resolve(RegistryDocument, 'price')).toMatchObject({ kind: FieldValueKind.Number, nullable: true });
        });

        it('leaves out relations, uncomparable columns and sibling entities', () => {
            expect(registry.resolve(RegistryDocument, 'owner')).toBeUndefined();
            expect(registry.resolve(RegistryDocument, 'metadata')).toBeUndefined();
            expect(registry.resolve(RegistryDocument, 'displayName')).toBeUndefined();
        });

        it('resolves names ignoring case and keeps the declared spelling', () => {
            const accessor = registry.resolve(Person, 'LASTLOGINAT');

            expect(accessor?.property).toBe('lastLoginAt');
        });

        it('reads the property from an instance', () => {
            const person = Object.assign(new Person(), { name: 'Alice' });

            expect(registry.resolve(Person, 'name')?.read(person)).toBe('Alice');
        });
    });

    describe('register', () => {
        it('adds accessors for plain classes', () => {
            registry.register(Invoice, {
                number: FieldValueKind.String,
                total: { kind: FieldValueKind.Number, read: (invoice) => invoice.lines.reduce((sum, line) => sum + line.amount, 0) },
            });

            const invoice = new Invoice('INV-1', [{ amount: 5 }, { amount: 7.5 }]);

            expect(registry.resolve(Invoice, 'number')?.read(invoice)).toBe('INV-1');
            expect(registry.resolve(Invoice, 'Total')?.read(invoice)).toBe(12.5);
            expect(registry.resolve(Invoice, 'total')?.nullable).toBe(false);
        });

        it('overrides generated entries', () => {
            registry.register(Person, { name: { kind: FieldValueKind.String, nullable: true, read: (person) => person.name.toUpperCase() } });

            const accessor = registry.resolve(Person, 'name');

            expect(accessor?.nullable).toBe(true);
            expect(accessor?.read(Object.assign(new Person(), { name: 'bob' }))).toBe('BOB');
            expect(registry.resolve(Person, 'age')?.kind).toBe(FieldValueKind.Number);
        });

        it('lists every accessor of an entity', () => {
            registry.register(Invoice, { number: FieldValueKind.String });

            expect(registry.getAccessors(Invoice).map((accessor) => accessor.property)).toEqual(['number']);
        });
    });

    it('tracks lookups and clears its tables', () => {
        registry.resolve(Person, 'name');
        registry.resolve(Person, 'nope');

        expect(registry.has(Person)).toBe(true);
        expect(registry.getStats()).toEqual({ hits: 1, misses: 1, entities: 1 });

        registry.clear();

        expect(registry.has(Person)).toBe(false);
        expect(registry.getStats()).toEqual({ hits: 0, misses: 0, entities: 0 });
    });
});
