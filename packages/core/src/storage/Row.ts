/**
 * TinyRel - Row
 *
 * An immutable, ordered mapping of column name to value. Rows are never
 * modified after construction; every "mutation" returns a new Row.
 */

import { RowData, Value } from '../types';

export class Row {
    private readonly data: Readonly<RowData>;

    constructor(data: RowData = {}) {
        this.data = Object.freeze({ ...data });
    }

    /**
     * Get the value of a column, or `fallback` when the column is absent.
     */
    get(column: string, fallback?: Value): Value | undefined {
        return this.has(column) ? this.data[column] : fallback;
    }

    has(column: string): boolean {
        return Object.prototype.hasOwnProperty.call(this.data, column);
    }

    keys(): string[] {
        return Object.keys(this.data);
    }

    values(): Value[] {
        return Object.values(this.data);
    }

    entries(): [string, Value][] {
        return Object.entries(this.data);
    }

    get size(): number {
        return this.keys().length;
    }

    withValue(column: string, value: Value): Row {
        return new Row({ ...this.data, [column]: value });
    }

    withoutColumn(column: string): Row {
        const { [column]: _removed, ...rest } = this.data;
        return new Row(rest);
    }

    withColumns(values: RowData): Row {
        return new Row({ ...this.data, ...values });
    }

    /**
     * Keep only the listed columns, in the order given. Unknown names are dropped.
     */
    project(columns: string[]): Row {
        const projected = columns
            .filter(column => this.has(column))
            .map((column): [string, Value] => [column, this.data[column]]);
        return new Row(Object.fromEntries(projected));
    }

    equals(other: Row): boolean {
        const keys = this.keys();
        if (keys.length !== other.size) {
            return false;
        }
        return keys.every(key => other.has(key) && other.get(key) === this.data[key]);
    }

    /**
     * A fresh plain object; changing it does not affect the row.
     */
    toObject(): RowData {
        return { ...this.data };
    }

    toString(): string {
        const pairs = this.entries().map(([key, value]) => `${key}=${String(value)}`);
        return `Row(${pairs.join(', ')})`;
    }
}
