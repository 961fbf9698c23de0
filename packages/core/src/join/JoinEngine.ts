/**
 * TinyRel - Join Engine
 *
 * Implements INNER JOIN as a hash join.
 *
 * Design decisions:
 * - One pass over the right table builds value -> rows for its join column
 * - Each left row probes that map; one output row per match
 * - Output columns are renamed `table.column` so both sides can coexist
 * - NULL join keys never match
 *
 * Time complexity: O(n + m + k) for n left rows, m right rows and k output rows.
 */

import { RowData, Value } from '../types';
import { LookupError } from '../errors';
import { Row } from '../storage/Row';
import { Table } from '../storage/Table';

/**
 * Split a column reference into its table and column parts.
 */
export function parseColumnRef(ref: string): { table?: string; column: string } {
    const dot = ref.indexOf('.');
    if (dot === -1) {
        return { column: ref };
    }
    return { table: ref.slice(0, dot), column: ref.slice(dot + 1) };
}

export function qualify(table: string, column: string): string {
    return `${table}.${column}`;
}

function keyOf(value: Value | undefined): string | undefined {
    if (value === null || value === undefined) {
        return undefined;
    }
    return `${typeof value}:${String(value)}`;
}

/**
 * Perform an INNER JOIN between two tables on `left.leftColumn = right.rightColumn`.
 */
export function innerJoin(
    leftTable: Table,
    rightTable: Table,
    leftColumn: string,
    rightColumn: string
): Row[] {
    const leftName = leftTable.getName();
    const rightName = rightTable.getName();

    if (!leftTable.hasColumn(leftColumn)) {
        throw new LookupError(`Column '${leftColumn}' does not exist in table '${leftName}'`);
    }
    if (!rightTable.hasColumn(rightColumn)) {
        throw new LookupError(`Column '${rightColumn}' does not exist in table '${rightName}'`);
    }

    const buckets = new Map<string, Row[]>();
    for (const row of rightTable.selectAll()) {
        const key = keyOf(row.get(rightColumn));
        if (key === undefined) {
            continue;
        }
        const bucket = buckets.get(key);
        if (bucket) {
            bucket.push(row);
        } else {
            buckets.set(key, [row]);
        }
    }

    const joined: Row[] = [];
    for (const leftRow of leftTable.selectAll()) {
        const key = keyOf(leftRow.get(leftColumn));
        const matches = key === undefined ? undefined : buckets.get(key);
        if (!matches) {
            continue;
        }

        for (const rightRow of matches) {
            const data: RowData = {};
            for (const [column, value] of leftRow.entries()) {
                data[qualify(leftName, column)] = value;
            }
            for (const [column, value] of rightRow.entries()) {
                data[qualify(rightName, column)] = value;
            }
            joined.push(new Row(data));
        }
    }

    return joined;
}
