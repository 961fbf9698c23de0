/**
 * TinyRel - Database
 *
 * A named registry of tables plus the cross-table operations (joins) and
 * introspection used by the executor, the shell and the HTTP demo.
 *
 * Design decisions:
 * - Tables are stored in a Map for O(1) lookup by name; names are case-sensitive
 * - No persistence here: see persistence/DatabasePersistence for the store bridge
 * - No shared instance: whoever needs a database constructs and owns one
 */

import { ColumnSpec, DatabaseInfo, TableInfo, Value } from '../types';
import { LookupError, SchemaError } from '../errors';
import { createSchema } from '../schema/Schema';
import { innerJoin } from '../join/JoinEngine';
import { Row } from './Row';
import { RowPredicate, Table } from './Table';

export class Database {
    private readonly tables: Map<string, Table>;
    private readonly name: string;

    constructor(name: string = 'tinyrel') {
        this.name = name;
        this.tables = new Map();
    }

    getName(): string {
        return this.name;
    }

    /**
     * Create a new table from column specs.
     */
    createTable(tableName: string, columns: ColumnSpec[]): Table {
        if (this.tables.has(tableName)) {
            throw new SchemaError(`Table '${tableName}' already exists`);
        }

        const table = new Table(createSchema(tableName, columns));
        this.tables.set(tableName, table);

        return table;
    }

    /**
     * Get a table by name, or fail with LookupError.
     */
    getTable(tableName: string): Table {
        const table = this.tables.get(tableName);
        if (!table) {
            throw new LookupError(`Table '${tableName}' does not exist`);
        }
        return table;
    }

    hasTable(tableName: string): boolean {
        return this.tables.has(tableName);
    }

    /**
     * Table names in creation order.
     */
    listTables(): string[] {
        return Array.from(this.tables.keys());
    }

    dropTable(tableName: string): void {
        if (!this.tables.delete(tableName)) {
            throw new LookupError(`Table '${tableName}' does not exist`);
        }
    }

    insert(tableName: string, rowData: Record<string, unknown>): Row {
        return this.getTable(tableName).insert(rowData);
    }

    selectAll(tableName: string): Row[] {
        return this.getTable(tableName).selectAll();
    }

    selectWhere(tableName: string, predicate: RowPredicate): Row[] {
        return this.getTable(tableName).selectWhere(predicate);
    }

    selectByColumn(tableName: string, column: string, value: Value): Row[] {
        return this.getTable(tableName).selectByColumn(column, value);
    }

    updateWhere(tableName: string, predicate: RowPredicate, updates: Record<string, unknown>): number {
        return this.getTable(tableName).updateWhere(predicate, updates);
    }

    deleteWhere(tableName: string, predicate: RowPredicate): number {
        return this.getTable(tableName).deleteWhere(predicate);
    }

    /**
     * Inner equi-join of two tables. Result columns are named `table.column`.
     */
    joinInner(leftTable: string, rightTable: string, leftColumn: string, rightColumn: string): Row[] {
        return innerJoin(this.getTable(leftTable), this.getTable(rightTable), leftColumn, rightColumn);
    }

    getTableInfo(tableName: string): TableInfo {
        return this.getTable(tableName).getInfo();
    }

    getDatabaseInfo(): DatabaseInfo {
        return {
            name: this.name,
            tableCount: this.tables.size,
            tables: Array.from(this.tables.values()).map(table => table.getInfo()),
        };
    }

    /**
     * Remove every row from every table; schemas are kept.
     */
    clearAllTables(): void {
        for (const table of this.tables.values()) {
            table.clear();
        }
    }
}
