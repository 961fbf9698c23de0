/**
 * TinyRel - A Minimal Relational Database Management System
 *
 * Main entry point for the core package.
 *
 * @packageDocumentation
 */

import { Database } from './storage/Database';
import { QueryExecutor } from './engine/QueryExecutor';

// Types
export * from './types';

// Errors
export * from './errors';

// Schema
export { Schema, createSchema, createColumnDefinition, isColumnType, DEFAULT_VARCHAR_LENGTH } from './schema/Schema';

// Storage
export * from './storage';

// Indexing
export { HashIndex } from './index/HashIndex';
export type { IndexStats } from './index/HashIndex';

// Parser
export * from './parser';

// Engine
export { QueryExecutor, formatColumnType, formatConstraints } from './engine/QueryExecutor';
export { compilePredicate, compareValues, evaluateComparison, MATCH_ALL } from './engine/Predicate';

// Join
export { innerJoin, parseColumnRef, qualify } from './join/JoinEngine';

// Persistence
export { saveDatabase, loadDatabase, SCHEMAS_KEY, DATA_KEY } from './persistence/DatabasePersistence';

// REPL
export { REPL } from './repl';
export type { ReplOptions } from './repl';

export interface DatabaseHandle {
    database: Database;
    executor: QueryExecutor;
}

/**
 * Create a database together with a query executor bound to it.
 */
export function createDatabase(name: string = 'tinyrel'): DatabaseHandle {
    const database = new Database(name);
    return { database, executor: new QueryExecutor(database) };
}
