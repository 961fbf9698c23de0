import { beforeEach, describe, expect, test } from 'vitest';
import { PassThrough, Writable } from 'stream';
import { REPL, ReplOptions } from './index';
import { Database } from '../storage/Database';
import { MemoryStore } from '../storage/MemoryStore';
import { saveDatabase } from '../persistence/DatabasePersistence';

describe('REPL', () => {
    let db: Database;
    let written: string[];
    let output: Writable;

    // Lines written to the output so far; clearing `written` starts afresh
    function lines(): string[] {
        const text = written.join('');
        return text === '' ? [] : text.replace(/\n$/, '').split('\n');
    }

    function createRepl(options: Omit<ReplOptions, 'output'> = {}): REPL {
        return new REPL({ database: db, output, ...options });
    }

    beforeEach(() => {
        db = new Database();
        written = [];
        output = new Writable({
            write(chunk: Buffer, _encoding, callback) {
                written.push(chunk.toString());
                callback();
            },
        });
    });

    test('runs a statement once a line ends with a semicolon', () => {
        const repl = createRepl();

        repl.handleLine('CREATE TABLE t (id INT PRIMARY KEY);');

        expect(lines()[0]).toMatch(/^✓ Table 't' created successfully \(\d+ms\)$/);
        expect(db.hasTable('t')).toBe(true);
    });

    test('buffers lines until the statement is complete', () => {
        const repl = createRepl();
        repl.handleLine('CREATE TABLE t (id INT PRIMARY KEY);');
        written = [];

        repl.handleLine('INSERT INTO t');
        expect(lines()).toEqual([]);

        repl.handleLine('  VALUES (1);');
        expect(db.getTable('t').count()).toBe(1);
        expect(lines()[0]).toMatch(/^✓ Inserted 1 row\(s\) into 't'/);
    });

    test('prints failures', () => {
        createRepl().handleLine('SELECT * FROM ghosts;');
        expect(lines()[0]).toBe("✗ LookupError: Table 'ghosts' does not exist");
    });

    describe('dot commands', () => {
        let repl: REPL;

        beforeEach(() => {
            repl = createRepl();
            db.createTable('t', [{ name: 'id', type: 'INT', primaryKey: true }]);
        });

        test('.tables lists tables', () => {
            repl.handleLine('.tables');
            expect(lines()).toContain('│ t          │ 0         │');
        });

        test('.schema shows one table or reports it missing', () => {
            repl.handleLine('.schema t');
            expect(lines()).toContain('  id: INT PRIMARY KEY NOT NULL');

            repl.handleLine('.schema missing');
            expect(lines()).toContain("❌ Table 'missing' does not exist");
        });

        test('.stats summarizes the database', () => {
            db.insert('t', { id: 1 });
            repl.handleLine('.stats');
            expect(lines()).toEqual([
                'Database: tinyrel',
                'Tables: 1',
                'Total rows: 1',
                'Index t.id: 1 key(s), 1 row(s)',
            ]);
        });

        test('.save needs a store', () => {
            repl.handleLine('.save');
            expect(lines()).toEqual(['No persistence configured.']);
        });

        test('.reset removes rows', () => {
            db.insert('t', { id: 1 });
            repl.handleLine('.reset');
            expect(db.getTable('t').count()).toBe(0);
            expect(lines()).toEqual(['All rows removed.']);
        });

        test('.help prints usage', () => {
            repl.handleLine('.HELP');
            expect(lines()).toContain('  .schema [table]  Show the schema of one table, or of every table');
        });

        test('unknown commands are reported', () => {
            repl.handleLine('.nope');
            expect(lines()).toEqual(['Unknown command: .nope. Type .help for available commands.']);
        });
    });

    test('.schema without tables', () => {
        createRepl().handleLine('.schema');
        expect(lines()).toEqual(['No tables exist.']);
    });

    describe('with a store', () => {
        test('restores saved tables on start-up', () => {
            const store = new MemoryStore();
            const saved = new Database();
            saved.createTable('t', [{ name: 'id', type: 'INT' }]);
            saveDatabase(saved, store);

            createRepl({ store });

            expect(lines()).toEqual(['Restored 1 table(s): t']);
            expect(db.listTables()).toEqual(['t']);
        });

        test('.save writes the database', () => {
            const store = new MemoryStore();
            const repl = createRepl({ store });
            repl.handleLine('CREATE TABLE t (id INT);');

            repl.handleLine('.save');

            expect(lines()).toContain('✓ Database saved to memory store');
            expect(store.get('table_schemas')).toHaveProperty('t');
        });

        test('.quit saves and closes once', () => {
            const store = new MemoryStore();
            const repl = createRepl({ store, input: new PassThrough() });
            repl.start();
            expect(repl.running()).toBe(true);

            repl.handleLine('CREATE TABLE t (id INT);');
            repl.handleLine('.quit');

            expect(repl.running()).toBe(false);
            expect(store.get('table_data')).toEqual({ t: [] });
            expect(lines().filter(line => line === 'Goodbye!')).toHaveLength(1);
        });
    });
});
