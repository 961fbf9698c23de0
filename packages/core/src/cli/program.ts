/**
 * TinyRel - Command-line interface
 *
 * Without --execute the interactive REPL starts. With --execute a single
 * statement runs, its result is printed, and the exit code reports success.
 */

import { Command } from 'commander';
import { Database } from '../storage/Database';
import { MemoryStore } from '../storage/MemoryStore';
import { QueryExecutor } from '../engine/QueryExecutor';
import { loadDatabase, saveDatabase } from '../persistence/DatabasePersistence';
import { REPL } from '../repl';
import { formatResult } from '../repl/format';

export const VERSION = '1.0.0';

export interface CliOptions {
    persist?: string;
    execute?: string;
    name: string;
}

/**
 * Run one statement against a database restored from `options.persist`.
 *
 * @returns whether the statement succeeded
 */
export function executeOnce(sql: string, options: CliOptions): boolean {
    const database = new Database(options.name);
    const store = options.persist ? new MemoryStore(options.persist) : undefined;
    if (store) {
        loadDatabase(database, store);
    }

    const startTime = Date.now();
    const result = new QueryExecutor(database).execute(sql);
    for (const line of formatResult(result, Date.now() - startTime)) {
        console.log(line);
    }

    if (result.success && store) {
        saveDatabase(database, store);
    }
    return result.success;
}

export function createProgram(env: NodeJS.ProcessEnv = process.env): Command {
    const program = new Command();

    program
        .name('tinyrel')
        .description('A minimal relational database with a SQL shell')
        .version(VERSION)
        .option('-p, --persist <file>', 'JSON file to load from and save to', env.TINYREL_PERSIST)
        .option('-e, --execute <sql>', 'Execute a single statement and exit')
        .option('-n, --name <name>', 'Database name', 'tinyrel')
        .action((options: CliOptions) => {
            if (options.execute !== undefined) {
                if (!executeOnce(options.execute, options)) {
                    process.exitCode = 1;
                }
                return;
            }

            const database = new Database(options.name);
            const store = options.persist ? new MemoryStore(options.persist) : undefined;
            new REPL({ database, store }).start();
        });

    return program;
}
