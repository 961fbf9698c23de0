/**
 * TinyRel - Interactive REPL
 *
 * Provides a command-line interface for interacting with the database.
 *
 * Features:
 * - Multi-line SQL input (a statement runs once a line ends with a semicolon)
 * - Box-drawn result tables
 * - Dot commands: .help, .tables, .schema, .stats, .save, .reset, .clear, .quit
 * - Optional JSON persistence through a MemoryStore
 * - Everything is written to the output stream (stdout by default)
 */

import * as readline from 'readline';
import { Database } from '../storage/Database';
import { MemoryStore } from '../storage/MemoryStore';
import { QueryExecutor } from '../engine/QueryExecutor';
import { loadDatabase, saveDatabase } from '../persistence/DatabasePersistence';
import { errorMessage } from '../errors';
import { formatResult, formatTableInfo } from './format';

const BANNER = `
╔═══════════════════════════════════════════════════════════════╗
║   TinyRel - a minimal relational database                     ║
║   Type .help for commands, or enter SQL ending with ;         ║
╚═══════════════════════════════════════════════════════════════╝
`;

const HELP_TEXT = `
TinyRel REPL Commands:
  .help            Show this help message
  .tables          List all tables
  .schema [table]  Show the schema of one table, or of every table
  .stats           Show database statistics
  .save            Save the database to the persistence file
  .reset           Remove every row from every table
  .clear           Clear the screen
  .quit            Exit the REPL (saves first when persistence is on)

SQL Commands (end with semicolon):
  CREATE TABLE name (col TYPE [PRIMARY KEY] [UNIQUE] [NOT NULL], ...);
  INSERT INTO name [(col1, ...)] VALUES (val1, ...)[, (...)];
  SELECT cols FROM t [[INNER] JOIN t2 ON t.a = t2.b] [WHERE col op val];
  UPDATE t SET col = val[, ...] [WHERE col op val];
  DELETE FROM t [WHERE col op val];
  SHOW TABLES;  DESCRIBE t;  DROP TABLE t;

Data Types: INT, VARCHAR(n), BOOLEAN
Operators:  =  !=  <>  >  <  >=  <=   (one comparison per WHERE; no AND/OR)

Examples:
  CREATE TABLE users (id INT PRIMARY KEY, name VARCHAR(100), active BOOLEAN);
  INSERT INTO users (id, name, active) VALUES (1, 'Alice', TRUE);
  SELECT * FROM users WHERE id = 1;
`;

export interface ReplOptions {
    database?: Database;
    store?: MemoryStore;
    input?: NodeJS.ReadableStream;
    output?: NodeJS.WritableStream;
}

export class REPL {
    private database: Database;
    private executor: QueryExecutor;
    private store?: MemoryStore;
    private input: NodeJS.ReadableStream;
    private output: NodeJS.WritableStream;
    private rl?: readline.Interface;
    private buffer: string;
    private isRunning: boolean;

    constructor(options: ReplOptions = {}) {
        this.database = options.database ?? new Database('tinyrel');
        this.executor = new QueryExecutor(this.database);
        this.store = options.store;
        this.input = options.input ?? process.stdin;
        this.output = options.output ?? process.stdout;
        this.buffer = '';
        this.isRunning = false;

        if (this.store) {
            const restored = loadDatabase(this.database, this.store);
            if (restored.length > 0) {
                this.print(`Restored ${restored.length} table(s): ${restored.join(', ')}`);
            }
        }
    }

    /**
     * Start reading lines from the input stream.
     */
    start(): readline.Interface {
        this.isRunning = true;
        this.print(BANNER);

        const rl = readline.createInterface({
            input: this.input,
            output: this.output,
        });
        this.rl = rl;

        rl.on('line', (line) => {
            this.handleLine(line);
        });

        rl.on('close', () => {
            this.quit();
        });

        this.prompt();
        return rl;
    }

    running(): boolean {
        return this.isRunning;
    }

    private print(text: string): void {
        this.output.write(`${text}\n`);
    }

    private prompt(): void {
        if (!this.rl || !this.isRunning) {
            return;
        }
        this.rl.setPrompt(this.buffer ? '...> ' : 'sql> ');
        this.rl.prompt();
    }

    /**
     * Handle a line of input.
     */
    handleLine(line: string): void {
        const trimmed = line.trim();

        if (!this.buffer && trimmed.startsWith('.')) {
            this.handleCommand(trimmed);
            this.prompt();
            return;
        }

        this.buffer += (this.buffer ? '\n' : '') + line;

        if (this.buffer.trim().endsWith(';')) {
            this.executeBuffer();
        }

        this.prompt();
    }

    private executeBuffer(): void {
        const sql = this.buffer.trim();
        this.buffer = '';

        if (!sql || sql === ';') {
            return;
        }

        this.run(sql);
    }

    private run(sql: string): void {
        const startTime = Date.now();
        const result = this.executor.execute(sql);
        const elapsed = Date.now() - startTime;

        for (const line of formatResult(result, elapsed)) {
            this.print(line);
        }
        this.print('');
    }

    /**
     * Handle special commands.
     */
    private handleCommand(command: string): void {
        const parts = command.split(/\s+/);
        const cmd = parts[0].toLowerCase();
        const arg = parts.slice(1).join(' ');

        switch (cmd) {
            case '.help':
                this.print(HELP_TEXT);
                break;

            case '.tables':
                this.run('SHOW TABLES;');
                break;

            case '.schema':
                this.showSchema(arg);
                break;

            case '.stats':
                this.showStats();
                break;

            case '.save':
                this.saveDatabase();
                break;

            case '.reset':
                this.database.clearAllTables();
                this.print('All rows removed.');
                break;

            case '.clear':
                readline.cursorTo(this.output, 0, 0);
                readline.clearScreenDown(this.output);
                break;

            case '.quit':
            case '.exit':
                this.quit();
                break;

            default:
                this.print(`Unknown command: ${cmd}. Type .help for available commands.`);
        }
    }

    private showSchema(tableName: string): void {
        const names = tableName ? [tableName] : this.database.listTables();
        if (names.length === 0) {
            this.print('No tables exist.');
            return;
        }

        for (const name of names) {
            try {
                for (const line of formatTableInfo(this.database.getTableInfo(name))) {
                    this.print(line);
                }
            } catch (error) {
                this.print(`❌ ${errorMessage(error)}`);
            }
            this.print('');
        }
    }

    private showStats(): void {
        const info = this.database.getDatabaseInfo();
        const totalRows = info.tables.reduce((sum, table) => sum + table.rowCount, 0);

        this.print(`Database: ${info.name}`);
        this.print(`Tables: ${info.tableCount}`);
        this.print(`Total rows: ${totalRows}`);

        for (const table of info.tables) {
            for (const index of this.database.getTable(table.name).getIndexStats()) {
                this.print(
                    `Index ${table.name}.${index.column}: ` +
                    `${index.uniqueKeys} key(s), ${index.totalEntries} row(s)`
                );
            }
        }

        if (this.store) {
            const stats = this.store.getStats();
            this.print(`Storage: ${stats.persistFile ?? '(memory only)'}`);
            this.print(`Storage loaded: ${stats.loaded}`);
        }
    }

    private saveDatabase(): boolean {
        if (!this.store) {
            this.print('No persistence configured.');
            return false;
        }
        saveDatabase(this.database, this.store);
        this.print(`✓ Database saved to ${this.store.getPersistFile() ?? 'memory store'}`);
        return true;
    }

    /**
     * Stop the REPL, saving first when persistence is configured.
     */
    quit(): void {
        if (!this.isRunning) {
            return;
        }
        this.isRunning = false;

        if (this.store) {
            this.saveDatabase();
        }
        this.print('\nGoodbye!\n');
        this.rl?.close();
    }
}
