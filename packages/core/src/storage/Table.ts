/**
 * TinyRel - Table Storage
 *
 * Implements in-memory row storage for a single table.
 *
 * Design decisions:
 * - Rows live in an array; a row's position is its array index
 * - PRIMARY KEY and UNIQUE columns get a hash index of value -> positions
 * - Validation, coercion and constraint checks all finish before any mutation
 * - Deleting compacts the array, so every later row is re-indexed
 *   (O(n) per deleted row; fine for small in-memory tables)
 */

import { ColumnDefinition, RowData, TableInfo, Value } from '../types';
import { ConstraintError, LookupError } from '../errors';
import { Schema } from '../schema/Schema';
import { HashIndex, IndexStats } from '../index/HashIndex';
import { Row } from './Row';

export type RowPredicate = (row: Row) => boolean;

export class Table {
    private readonly schema: Schema;
    private rows: Row[];
    private readonly indexes: Map<string, HashIndex>;

    constructor(schema: Schema) {
        this.schema = schema;
        this.rows = [];
        this.indexes = new Map();

        this.initializeIndexes();
    }

    /**
     * Create an empty hash index for every constrained column.
     */
    private initializeIndexes(): void {
        this.indexes.clear();
        for (const column of this.schema.getColumns()) {
            if (column.primaryKey || column.unique) {
                this.indexes.set(column.name, new HashIndex(column.name));
            }
        }
    }

    getSchema(): Schema {
        return this.schema;
    }

    getName(): string {
        return this.schema.name;
    }

    getColumns(): ColumnDefinition[] {
        return this.schema.getColumns();
    }

    hasColumn(name: string): boolean {
        return this.schema.hasColumn(name);
    }

    /**
     * Names of the columns that carry a constraint index.
     */
    getIndexedColumns(): string[] {
        return Array.from(this.indexes.keys());
    }

    getIndexStats(): IndexStats[] {
        return Array.from(this.indexes.values(), index => index.getStats());
    }

    // ==========================================================================
    // WRITES
    // ==========================================================================

    /**
     * Insert a new row.
     *
     * @returns the stored row, with every value coerced to its column type
     */
    insert(rowData: Record<string, unknown>): Row {
        this.schema.validateRow(rowData);
        const coerced = this.schema.coerceRow(rowData);

        this.checkConstraints(coerced);

        // Absent (nullable) columns are stored as NULL, in schema order
        const data: RowData = Object.fromEntries(
            this.schema.getColumnNames().map((name): [string, Value] => [
                name,
                Object.hasOwn(coerced, name) ? coerced[name] : null,
            ])
        );

        const row = new Row(data);
        const position = this.rows.length;
        this.rows.push(row);
        this.addToIndexes(row, position);

        return row;
    }

    /**
     * Update every row matching `predicate` with `updates`.
     *
     * Matching rows are collected first, then updated one at a time. The first
     * failure stops the batch and propagates; rows updated before it stay updated.
     *
     * @returns number of rows updated
     */
    updateWhere(predicate: RowPredicate, updates: Record<string, unknown>): number {
        const targets: Array<[number, Row]> = [];
        this.rows.forEach((row, position) => {
            if (predicate(row)) {
                targets.push([position, row]);
            }
        });

        let updatedCount = 0;
        for (const [position, oldRow] of targets) {
            const merged = { ...oldRow.toObject(), ...updates };

            this.schema.validateRow(merged);
            const newRow = new Row(this.schema.coerceRow(merged));

            this.checkConstraintsForUpdate(oldRow, newRow, position);

            this.removeFromIndexes(oldRow, position);
            this.rows[position] = newRow;
            this.addToIndexes(newRow, position);

            updatedCount++;
        }

        return updatedCount;
    }

    /**
     * Delete every row matching `predicate`.
     *
     * @returns number of rows deleted
     */
    deleteWhere(predicate: RowPredicate): number {
        const positions: number[] = [];
        this.rows.forEach((row, position) => {
            if (predicate(row)) {
                positions.push(position);
            }
        });

        // Highest first, so lower positions are not shifted by earlier removals
        for (let i = positions.length - 1; i >= 0; i--) {
            const position = positions[i];
            this.removeFromIndexes(this.rows[position], position);
            this.rows.splice(position, 1);
            this.reindexFrom(position);
        }

        return positions.length;
    }

    /**
     * Remove every row and reset the indexes.
     */
    clear(): void {
        this.rows = [];
        this.initializeIndexes();
    }

    // ==========================================================================
    // READS
    // ==========================================================================

    /**
     * Snapshot of all rows in storage order.
     */
    selectAll(): Row[] {
        return this.rows.slice();
    }

    selectWhere(predicate: RowPredicate): Row[] {
        return this.rows.filter(row => predicate(row));
    }

    /**
     * Rows whose `column` equals `value`. Uses the constraint index when the
     * column has one; falls back to a linear scan otherwise.
     */
    selectByColumn(column: string, value: Value): Row[] {
        if (!this.schema.hasColumn(column)) {
            throw new LookupError(`Unknown column '${column}' in table '${this.getName()}'`);
        }

        const index = this.indexes.get(column);
        if (index && value !== null) {
            return index.lookup(value).map(position => this.rows[position]);
        }

        return this.rows.filter(row => row.get(column) === value);
    }

    count(): number {
        return this.rows.length;
    }

    isEmpty(): boolean {
        return this.rows.length === 0;
    }

    getInfo(): TableInfo {
        return {
            name: this.getName(),
            rowCount: this.count(),
            columns: this.getColumns().map(column => ({ ...column })),
        };
    }

    // ==========================================================================
    // INDEX MAINTENANCE
    // ==========================================================================

    private checkConstraints(data: RowData): void {
        for (const [column, index] of this.indexes) {
            const value = data[column] ?? null;
            if (index.has(value)) {
                throw this.violation(column, value);
            }
        }
    }

    /**
     * Constraint check for an update: a changed value must be absent from the
     * index, or held only by the row being updated.
     */
    private checkConstraintsForUpdate(oldRow: Row, newRow: Row, position: number): void {
        for (const [column, index] of this.indexes) {
            const oldValue = oldRow.get(column) ?? null;
            const newValue = newRow.get(column) ?? null;

            if (oldValue === newValue) {
                continue;
            }

            const holders = index.lookup(newValue);
            if (holders.some(holder => holder !== position)) {
                throw this.violation(column, newValue);
            }
        }
    }

    private violation(column: string, value: Value): ConstraintError {
        const kind = this.schema.getColumn(column)?.primaryKey
            ? 'Primary key violation'
            : 'Unique constraint violation';
        return new ConstraintError(`${kind}: ${column}=${String(value)} already exists`, column);
    }

    private addToIndexes(row: Row, position: number): void {
        for (const [column, index] of this.indexes) {
            index.add(row.get(column) ?? null, position);
        }
    }

    private removeFromIndexes(row: Row, position: number): void {
        for (const [column, index] of this.indexes) {
            index.remove(row.get(column) ?? null, position);
        }
    }

    /**
     * After removing the row at `start`, every row from `start` on moved down
     * by one position.
     */
    private reindexFrom(start: number): void {
        for (let position = start; position < this.rows.length; position++) {
            const row = this.rows[position];
            this.removeFromIndexes(row, position + 1);
            this.addToIndexes(row, position);
        }
    }
}
