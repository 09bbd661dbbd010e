import 'reflect-metadata';
import { Column, Entity, PrimaryGeneratedColumn } from 'typeorm';

import { FilterFieldType } from '../../lib/interface';

import type { FilterField } from '../../lib/interface';

@Entity('people')
export class Person {
    @PrimaryGeneratedColumn()
    id!: number;

    @Column({ type: 'varchar' })
    name!: string;

    @Column({ type: 'varchar', nullable: true })
    email!: string | null;

    @Column({ type: 'integer' })
    age!: number;

    @Column({ type: 'real', nullable: true })
    score!: number | null;

    @Column({ type: 'boolean' })
    active!: boolean;

    @Column({ type: 'boolean', nullable: true })
    verified!: boolean | null;

    @Column({ type: 'datetime', nullable: true })
    lastLoginAt!: Date | null;

    @Column({ type: 'varchar' })
    status!: string;
}

export const PERSON_FIELDS: FilterField[] = [
    { name: 'name', label: 'Name', type: FilterFieldType.Text },
    { name: 'email', label: 'Email', type: FilterFieldType.Text },
    { name: 'age', label: 'Age', type: FilterFieldType.Number },
    { name: 'score', label: 'Score', type: FilterFieldType.Number },
    { name: 'active', label: 'Active', type: FilterFieldType.Boolean },
    { name: 'verified', label: 'Verified', type: FilterFieldType.Boolean },
    { name: 'lastLoginAt', label: 'Last login', type: FilterFieldType.DateTime },
    {
        name: 'status',
        label: 'Status',
        type: FilterFieldType.Enum,
        options: [
            { value: 'active', label: 'Active' },
            { value: 'inactive', label: 'Inactive' },
            { value: 'pending', label: 'Pending' },
            { value: 'banned', label: 'Banned' },
        ],
    },
];

/** Wednesday, 17 January 2024, noon local time */
export const FIXED_NOW = new Date(2024, 0, 17, 12, 0, 0);

export const fixedClock = (): Date => new Date(FIXED_NOW.getTime());

function person(init: Omit<Person, 'id'>, id: number): Person {
    return Object.assign(new Person(), { id, ...init });
}

export function createPeople(): Person[] {
    return [
        person(
            {
                name: 'Alice',
                email: 'alice@example.com',
                age: 30,
                score: 88.5,
                active: true,
                verified: true,
                lastLoginAt: new Date(2024, 0, 17, 9, 0, 0),
                status: 'active',
            },
            1,
        ),
        person(
            {
                name: 'Bob',
                email: null,
                age: 25,
                score: null,
                active: false,
                verified: null,
                lastLoginAt: new Date(2024, 0, 16, 18, 0, 0),
                status: 'inactive',
            },
            2,
        ),
        person(
            {
                name: 'Carol',
                email: 'carol@test.org',
                age: 41,
                score: 72,
                active: true,
                verified: false,
                lastLoginAt: new Date(2024, 0, 3, 10, 0, 0),
                status: 'pending',
            },
            3,
        ),
        person(
            {
                name: 'dave',
                email: '   ',
                age: 19,
                score: 95,
                active: false,
                verified: true,
                lastLoginAt: null,
                status: 'Active',
            },
            4,
        ),
        person(
            {
                name: 'Eve Adams',
                email: 'eve@example.com',
                age: 20,
                score: 60,
                active: true,
                verified: null,
                lastLoginAt: new Date(2024, 0, 18, 8, 0, 0),
                status: 'banned',
            },
            5,
        ),
    ];
}

export function namesOf(people: readonly Person[]): string[] {
    return people.map((item) => item.name);
}
