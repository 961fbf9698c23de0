/**
 * TinyRel - Result formatting for the shell
 */

import { ExecutionResult, RowData, TableInfo } from '../types';
import { formatColumnType, formatConstraints } from '../engine/QueryExecutor';

export function formatValue(value: unknown): string {
    if (value === null || value === undefined) {
        return 'NULL';
    }
    if (typeof value === 'boolean') {
        return value ? 'TRUE' : 'FALSE';
    }
    return String(value);
}

/**
 * Render rows as a box-drawn table, one string per line.
 */
export function renderTable(rows: RowData[], columns: string[]): string[] {
    if (rows.length === 0) {
        return ['(empty result set)'];
    }

    const cols = columns.length > 0 ? columns : Object.keys(rows[0]);

    const widths = cols.map(col =>
        rows.reduce((width, row) => Math.max(width, formatValue(row[col]).length), col.length)
    );
    const rule = (left: string, join: string, right: string): string =>
        left + widths.map(w => '─'.repeat(w)).join(join) + right;
    const line = (cells: string[]): string =>
        '│ ' + cells.map((cell, i) => cell.padEnd(widths[i])).join(' │ ') + ' │';

    return [
        rule('┌─', '─┬─', '─┐'),
        line(cols),
        rule('├─', '─┼─', '─┤'),
        ...rows.map(row => line(cols.map(col => formatValue(row[col])))),
        rule('└─', '─┴─', '─┘'),
    ];
}

export function formatTableInfo(info: TableInfo): string[] {
    const lines = [`Table: ${info.name}`, `Rows: ${info.rowCount}`, 'Columns:'];
    for (const column of info.columns) {
        const constraints = formatConstraints(column);
        const suffix = constraints.length > 0 ? ` ${constraints.join(' ')}` : '';
        lines.push(`  ${column.name}: ${formatColumnType(column)}${suffix}`);
    }
    return lines;
}

/**
 * Lines to print for a statement result.
 */
export function formatResult(result: ExecutionResult, elapsedMs: number): string[] {
    if (!result.success) {
        return [`✗ ${result.errorType}: ${result.error}`];
    }

    const lines = [`✓ ${result.message} (${elapsedMs}ms)`];

    if (result.rows) {
        lines.push(...renderTable(result.rows, result.columns ?? []));
    } else if (result.tableInfo) {
        lines.push(...formatTableInfo(result.tableInfo));
    }

    return lines;
}
