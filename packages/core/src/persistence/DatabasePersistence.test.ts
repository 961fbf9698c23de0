import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { DATA_KEY, loadDatabase, saveDatabase, SCHEMAS_KEY } from './DatabasePersistence';
import { Database } from '../storage/Database';
import { MemoryStore } from '../storage/MemoryStore';

function seededDatabase(): Database {
    const db = new Database('saved');
    db.createTable('users', [
        { name: 'id', type: 'INT', primaryKey: true },
        { name: 'name', type: 'VARCHAR', maxLength: 40, nullable: false },
        { name: 'active', type: 'BOOLEAN' },
    ]);
    db.insert('users', { id: 1, name: 'Ann', active: true });
    db.insert('users', { id: 2, name: 'Bo' });
    return db;
}

describe('database persistence', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    test('saves schemas and rows under their keys', () => {
        const store = new MemoryStore();
        saveDatabase(seededDatabase(), store);

        expect(store.get(DATA_KEY)).toEqual({
            users: [
                { id: 1, name: 'Ann', active: true },
                { id: 2, name: 'Bo', active: null },
            ],
        });
        expect(store.get(SCHEMAS_KEY)).toEqual({
            users: {
                columns: [
                    { name: 'id', type: 'INT', primaryKey: true, unique: true, nullable: false, maxLength: null },
                    { name: 'name', type: 'VARCHAR', primaryKey: false, unique: false, nullable: false, maxLength: 40 },
                    { name: 'active', type: 'BOOLEAN', primaryKey: false, unique: false, nullable: true, maxLength: null },
                ],
            },
        });
    });

    test('restores tables with their rows and constraints', () => {
        const store = new MemoryStore();
        saveDatabase(seededDatabase(), store);

        const restored = new Database('restored');
        expect(loadDatabase(restored, store)).toEqual(['users']);
        expect(restored.selectAll('users').map(row => row.toObject())).toEqual([
            { id: 1, name: 'Ann', active: true },
            { id: 2, name: 'Bo', active: null },
        ]);
        expect(() => restored.insert('users', { id: 2, name: 'Dup' })).toThrow('Primary key violation: id=2 already exists');
    });

    describe('through a file', () => {
        let dir: string;

        beforeEach(() => {
            dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tinyrel-persist-'));
        });

        afterEach(() => {
            fs.rmSync(dir, { recursive: true, force: true });
        });

        test('survives a reopen', () => {
            const file = path.join(dir, 'db.json');
            saveDatabase(seededDatabase(), new MemoryStore(file));

            const db = new Database();
            loadDatabase(db, new MemoryStore(file));
            expect(db.getTableInfo('users').rowCount).toBe(2);
        });
    });

    test('loading an empty store restores nothing', () => {
        expect(loadDatabase(new Database(), new MemoryStore())).toEqual([]);
    });

    test('skips a table with a bad schema and keeps the others', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        const store = new MemoryStore();
        store.update({
            [SCHEMAS_KEY]: {
                broken: { columns: [{ name: 'x', type: 'FLOAT' }] },
                tags: { columns: [{ name: 'label', type: 'varchar', unique: true }] },
            },
            [DATA_KEY]: { tags: [{ label: 'red' }] },
        });

        const db = new Database();
        expect(loadDatabase(db, store)).toEqual(['tags']);
        expect(db.listTables()).toEqual(['tags']);
        expect(warn).toHaveBeenCalledWith("Warning: Failed to restore table 'broken': Unsupported column type: 'FLOAT'");
    });

    test('reports rows that no longer fit the schema', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        const store = new MemoryStore();
        store.update({
            [SCHEMAS_KEY]: { items: { columns: [{ name: 'id', type: 'INT', primaryKey: true }] } },
            [DATA_KEY]: { items: [{ id: 1 }, { id: 1 }] },
        });

        const db = new Database();
        expect(loadDatabase(db, store)).toEqual([]);
        expect(db.getTableInfo('items').rowCount).toBe(1);
        expect(warn).toHaveBeenCalledWith(
            "Warning: Failed to restore data for table 'items': Primary key violation: id=1 already exists"
        );
    });

    test('rejects a store whose layout is not an object', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        const store = new MemoryStore();
        store.set(SCHEMAS_KEY, ['users']);

        expect(loadDatabase(new Database(), store)).toEqual([]);
        expect(warn).toHaveBeenCalledWith('Warning: Stored database has an invalid layout; nothing restored');
    });
});
