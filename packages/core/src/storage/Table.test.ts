import { beforeEach, describe, expect, test } from 'vitest';
import { Table } from './Table';
import { createSchema } from '../schema/Schema';
import { ConstraintError, LookupError, SchemaError } from '../errors';

function createUsersTable(): Table {
    return new Table(createSchema('users', [
        { name: 'id', type: 'INT', primaryKey: true },
        { name: 'name', type: 'VARCHAR', maxLength: 50 },
        { name: 'email', type: 'VARCHAR', unique: true },
        { name: 'active', type: 'BOOLEAN' },
    ]));
}

describe('Table', () => {
    let table: Table;

    beforeEach(() => {
        table = createUsersTable();
        table.insert({ id: 1, name: 'Ann', email: 'ann@example.com', active: true });
        table.insert({ id: 2, name: 'Bo', email: 'bo@example.com', active: false });
        table.insert({ id: 3, name: 'Cy', email: 'cy@example.com', active: true });
    });

    test('indexes the primary key and unique columns', () => {
        expect(table.getIndexedColumns()).toEqual(['id', 'email']);
    });

    test('reports index statistics', () => {
        table.insert({ id: 4, name: 'Dee' });
        expect(table.getIndexStats()).toEqual([
            { column: 'id', uniqueKeys: 4, totalEntries: 4 },
            { column: 'email', uniqueKeys: 3, totalEntries: 3 },
        ]);
    });

    describe('insert', () => {
        test('stores absent nullable columns as NULL in schema order', () => {
            const row = table.insert({ email: 'dee@example.com', id: 4 });
            expect(row.keys()).toEqual(['id', 'name', 'email', 'active']);
            expect(row.toObject()).toEqual({ id: 4, name: null, email: 'dee@example.com', active: null });
        });

        test('rejects a duplicate primary key without changing the table', () => {
            expect(() => table.insert({ id: 1, email: 'new@example.com' }))
                .toThrow('Primary key violation: id=1 already exists');
            expect(table.count()).toBe(3);
            expect(table.selectByColumn('email', 'new@example.com')).toEqual([]);
        });

        test('rejects a duplicate unique value', () => {
            let caught: unknown;
            try {
                table.insert({ id: 9, email: 'bo@example.com' });
            } catch (error) {
                caught = error;
            }
            expect(caught).toBeInstanceOf(ConstraintError);
            expect(caught).toMatchObject({
                column: 'email',
                message: 'Unique constraint violation: email=bo@example.com already exists',
            });
        });

        test('allows several NULLs in a unique column', () => {
            table.insert({ id: 4 });
            table.insert({ id: 5 });
            expect(table.selectByColumn('email', null).map(row => row.get('id'))).toEqual([4, 5]);
        });

        test('rejects a missing primary key', () => {
            expect(() => table.insert({ name: 'Nobody' })).toThrow(SchemaError);
        });

        test('handles columns named after Object.prototype members', () => {
            const odd = new Table(createSchema('odd', [
                { name: 'id', type: 'INT', primaryKey: true },
                { name: 'constructor', type: 'VARCHAR' },
                { name: '__proto__', type: 'VARCHAR' },
            ]));

            const absent = odd.insert({ id: 1 });
            expect(absent.keys()).toEqual(['id', 'constructor', '__proto__']);
            expect(absent.get('constructor')).toBeNull();
            expect(absent.get('__proto__')).toBeNull();

            const present = odd.insert({ id: 2, constructor: 'c', ['__proto__']: 'p' });
            expect(present.get('constructor')).toBe('c');
            expect(present.get('__proto__')).toBe('p');
            expect(odd.selectByColumn('__proto__', 'p').map(row => row.get('id'))).toEqual([2]);
        });
    });

    describe('updateWhere', () => {
        test('updates matching rows and keeps the index in sync', () => {
            const updated = table.updateWhere(row => row.get('active') === true, { name: 'Active' });

            expect(updated).toBe(2);
            expect(table.selectAll().map(row => row.get('name'))).toEqual(['Active', 'Bo', 'Active']);
        });

        test('lets a row keep its own unique value', () => {
            expect(table.updateWhere(row => row.get('id') === 2, { email: 'bo@example.com', active: true })).toBe(1);
        });

        test('moves an indexed value', () => {
            table.updateWhere(row => row.get('id') === 2, { id: 20 });

            expect(table.selectByColumn('id', 2)).toEqual([]);
            expect(table.selectByColumn('id', 20).map(row => row.get('name'))).toEqual(['Bo']);
        });

        test('stops at the first violation, keeping earlier updates', () => {
            expect(() => table.updateWhere(() => true, { email: 'same@example.com' }))
                .toThrow('Unique constraint violation: email=same@example.com already exists');

            expect(table.selectAll().map(row => row.get('email'))).toEqual([
                'same@example.com',
                'bo@example.com',
                'cy@example.com',
            ]);
        });

        test('rejects a value of the wrong type', () => {
            expect(() => table.updateWhere(() => true, { active: 'yes' }))
                .toThrow("Invalid value for column 'active': expected BOOLEAN, got VARCHAR");
        });

        test('returns 0 when nothing matches', () => {
            expect(table.updateWhere(() => false, { name: 'x' })).toBe(0);
        });
    });

    describe('deleteWhere', () => {
        test('removes matching rows and re-indexes later rows', () => {
            expect(table.deleteWhere(row => row.get('id') === 1)).toBe(1);

            expect(table.selectByColumn('id', 3).map(row => row.get('name'))).toEqual(['Cy']);
            expect(table.selectByColumn('email', 'bo@example.com').map(row => row.get('id'))).toEqual([2]);
            expect(table.selectByColumn('id', 1)).toEqual([]);
        });

        test('frees deleted keys for reuse', () => {
            table.deleteWhere(row => row.get('active') === true);
            expect(table.count()).toBe(1);

            table.insert({ id: 1, email: 'ann@example.com' });
            expect(table.selectAll().map(row => row.get('id'))).toEqual([2, 1]);
        });

        test('returns 0 when nothing matches', () => {
            expect(table.deleteWhere(() => false)).toBe(0);
            expect(table.count()).toBe(3);
        });
    });

    describe('reads', () => {
        test('selectAll returns a snapshot', () => {
            const snapshot = table.selectAll();
            table.insert({ id: 4 });
            expect(snapshot).toHaveLength(3);
        });

        test('selectWhere keeps storage order', () => {
            expect(table.selectWhere(row => row.get('active') === true).map(row => row.get('id'))).toEqual([1, 3]);
        });

        test('selectByColumn scans columns without an index', () => {
            expect(table.selectByColumn('name', 'Bo').map(row => row.get('id'))).toEqual([2]);
            expect(table.selectByColumn('active', false).map(row => row.get('id'))).toEqual([2]);
        });

        test('selectByColumn rejects unknown columns', () => {
            expect(() => table.selectByColumn('age', 1)).toThrow(LookupError);
        });
    });

    test('clear removes rows and index entries', () => {
        table.clear();

        expect(table.isEmpty()).toBe(true);
        expect(() => table.insert({ id: 1, email: 'ann@example.com' })).not.toThrow();
    });

    test('getInfo describes the table', () => {
        const info = table.getInfo();
        expect(info.name).toBe('users');
        expect(info.rowCount).toBe(3);
        expect(info.columns[0]).toEqual({
            name: 'id',
            type: 'INT',
            primaryKey: true,
            unique: true,
            nullable: false,
            maxLength: null,
        });
    });
});

describe('Table properties', () => {
    function numbered(count: number): Table {
        const table = new Table(createSchema('items', [
            { name: 'id', type: 'INT', primaryKey: true },
            { name: 'code', type: 'VARCHAR', unique: true },
            { name: 'group_no', type: 'INT' },
        ]));
        for (let id = 1; id <= count; id++) {
            table.insert({ id, code: `c${id}`, group_no: id % 3 });
        }
        return table;
    }

    test('index lookups agree with a linear scan after inserts and deletes', () => {
        const table = numbered(12);
        table.deleteWhere(row => row.get('group_no') === 0);
        table.insert({ id: 3, code: 'c3' });

        for (let id = 1; id <= 12; id++) {
            const scanned = table.selectWhere(row => row.get('id') === id);
            expect(table.selectByColumn('id', id)).toEqual(scanned);
            expect(table.selectByColumn('code', `c${id}`)).toEqual(
                table.selectWhere(row => row.get('code') === `c${id}`)
            );
        }
    });

    test('count is inserts minus deletes for any interleaving', () => {
        const table = numbered(0);
        let expected = 0;
        for (let id = 1; id <= 20; id++) {
            table.insert({ id });
            expected++;
            if (id % 4 === 0) {
                expected -= table.deleteWhere(row => row.get('id') === id - 1);
            }
        }

        expect(expected).toBe(15);
        expect(table.count()).toBe(expected);
    });

    test('deleting at position k re-indexes every later row', () => {
        const table = numbered(6);
        table.deleteWhere(row => row.get('id') === 2);

        for (const id of [3, 4, 5, 6]) {
            const [row] = table.selectByColumn('id', id);
            expect(row.get('code')).toBe(`c${id}`);
        }
    });

    test('coercion of an INT column is stable', () => {
        const schema = numbered(0).getSchema();
        const id = schema.getColumn('id');
        expect(id).toBeDefined();
        if (id) {
            const once = schema.coerceValue('123', id);
            expect(once).toBe(123);
            expect(schema.coerceValue(once, id)).toBe(123);
        }
    });
});
