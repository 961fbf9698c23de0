/**
 * TinyRel - Query Executor
 *
 * Executes parsed SQL statements against a database.
 *
 * Design decisions:
 * - Parsing and execution are separate; `executeStatement` accepts a parsed statement
 * - Every failure is caught at statement granularity and returned as a QueryError
 * - Equality on an indexed column is answered from the constraint index
 * - Column names are resolved once, before any row is read
 */

import { Database } from '../storage/Database';
import { Row } from '../storage/Row';
import { RowPredicate, Table } from '../storage/Table';
import { Parser } from '../parser/Parser';
import { innerJoin, parseColumnRef, qualify } from '../join/JoinEngine';
import { compilePredicate, MATCH_ALL } from './Predicate';
import { errorMessage, isTinyRelError, LookupError, SchemaError } from '../errors';
import {
    ColumnDefinition,
    CreateTableStatement,
    DeleteStatement,
    DescribeStatement,
    DropTableStatement,
    ExecutionResult,
    InsertStatement,
    ParsedStatement,
    QueryError,
    QueryResult,
    RowData,
    SelectStatement,
    UpdateStatement,
    Value,
    WhereCondition,
} from '../types';

/**
 * Human-readable column type, e.g. `VARCHAR(50)`.
 */
export function formatColumnType(column: ColumnDefinition): string {
    return column.maxLength !== null ? `${column.type}(${column.maxLength})` : column.type;
}

export function formatConstraints(column: ColumnDefinition): string[] {
    const constraints: string[] = [];
    if (column.primaryKey) {
        constraints.push('PRIMARY KEY');
    } else if (column.unique) {
        constraints.push('UNIQUE');
    }
    if (!column.nullable) {
        constraints.push('NOT NULL');
    }
    return constraints;
}

/**
 * Short label for a statement, used when no SQL text is available.
 */
function describeStatement(statement: ParsedStatement): string {
    switch (statement.type) {
        case 'CREATE_TABLE':
            return `CREATE TABLE ${statement.tableName}`;
        case 'INSERT':
            return `INSERT INTO ${statement.tableName}`;
        case 'SELECT':
            return statement.join
                ? `SELECT FROM ${statement.tableName} JOIN ${statement.join.table}`
                : `SELECT FROM ${statement.tableName}`;
        case 'UPDATE':
            return `UPDATE ${statement.tableName}`;
        case 'DELETE':
            return `DELETE FROM ${statement.tableName}`;
        case 'SHOW_TABLES':
            return 'SHOW TABLES';
        case 'DESCRIBE':
            return `DESCRIBE ${statement.tableName}`;
        case 'DROP_TABLE':
            return `DROP TABLE ${statement.tableName}`;
    }
}

export class QueryExecutor {
    private database: Database;

    constructor(database: Database) {
        this.database = database;
    }

    getDatabase(): Database {
        return this.database;
    }

    /**
     * Execute a SQL query string.
     */
    execute(sql: string): ExecutionResult {
        let statement: ParsedStatement;
        try {
            statement = new Parser(sql).parse();
        } catch (error) {
            return this.failure(error, sql.trim());
        }
        return this.executeStatement(statement, sql.trim());
    }

    /**
     * Execute a parsed statement.
     */
    executeStatement(statement: ParsedStatement, sql: string = describeStatement(statement)): ExecutionResult {
        try {
            switch (statement.type) {
                case 'CREATE_TABLE':
                    return this.executeCreateTable(statement);
                case 'INSERT':
                    return this.executeInsert(statement);
                case 'SELECT':
                    return statement.join
                        ? this.executeJoinSelect(statement)
                        : this.executeSelect(statement);
                case 'UPDATE':
                    return this.executeUpdate(statement);
                case 'DELETE':
                    return this.executeDelete(statement);
                case 'SHOW_TABLES':
                    return this.executeShowTables();
                case 'DESCRIBE':
                    return this.executeDescribe(statement);
                case 'DROP_TABLE':
                    return this.executeDropTable(statement);
            }
        } catch (error) {
            return this.failure(error, sql);
        }
    }

    private failure(error: unknown, statement: string): QueryError {
        return {
            success: false,
            error: errorMessage(error),
            errorType: isTinyRelError(error) ? error.kind : 'Error',
            statement,
        };
    }

    // ==========================================================================
    // STATEMENTS
    // ==========================================================================

    private executeCreateTable(statement: CreateTableStatement): QueryResult {
        const table = this.database.createTable(statement.tableName, statement.columns);

        return {
            success: true,
            message: `Table '${statement.tableName}' created successfully`,
            tableInfo: table.getInfo(),
        };
    }

    /**
     * Insert every VALUES tuple in order. A failing tuple aborts the statement;
     * tuples inserted before it remain.
     */
    private executeInsert(statement: InsertStatement): QueryResult {
        const table = this.database.getTable(statement.tableName);
        const columns = statement.columns.length > 0
            ? statement.columns
            : table.getSchema().getColumnNames();

        const duplicate = columns.find((column, i) => columns.indexOf(column) !== i);
        if (duplicate !== undefined) {
            throw new SchemaError(`Column '${duplicate}' specified more than once`);
        }

        const insertedRows: RowData[] = [];
        for (const values of statement.values) {
            if (columns.length !== values.length) {
                throw new SchemaError(
                    `Column count mismatch: ${columns.length} columns, ${values.length} values`
                );
            }

            const rowData: RowData = Object.fromEntries(
                columns.map((column, i): [string, Value] => [column, values[i]])
            );

            insertedRows.push(table.insert(rowData).toObject());
        }

        return {
            success: true,
            message: `Inserted ${insertedRows.length} row(s) into '${statement.tableName}'`,
            insertedRows,
            rowCount: insertedRows.length,
        };
    }

    private executeSelect(statement: SelectStatement): QueryResult {
        const table = this.database.getTable(statement.tableName);

        const rows = statement.where
            ? this.selectWhere(table, statement.where)
            : table.selectAll();

        let columns: string[];
        let resultRows: RowData[];

        if (statement.columns === '*') {
            columns = table.getSchema().getColumnNames();
            resultRows = rows.map(row => row.toObject());
        } else {
            const keys = statement.columns.map(ref => this.resolveColumn(table, ref));
            columns = statement.columns;
            resultRows = rows.map(row => this.projectAs(row, columns, keys));
        }

        return {
            success: true,
            message: `Selected ${resultRows.length} row(s) from '${statement.tableName}'`,
            rows: resultRows,
            columns,
            rowCount: resultRows.length,
        };
    }

    private selectWhere(table: Table, where: WhereCondition): Row[] {
        const column = this.resolveColumn(table, where.column);

        if (
            where.operator === '=' &&
            where.value !== null &&
            table.getIndexedColumns().includes(column)
        ) {
            return table.selectByColumn(column, where.value);
        }

        return table.selectWhere(compilePredicate(where, column));
    }

    private executeJoinSelect(statement: SelectStatement): QueryResult {
        const join = statement.join;
        if (!join) {
            return this.executeSelect(statement);
        }

        const left = this.database.getTable(statement.tableName);
        const right = this.database.getTable(join.table);
        const [leftColumn, rightColumn] = this.resolveJoinColumns(left, right, join.leftColumn, join.rightColumn);

        let rows = innerJoin(left, right, leftColumn, rightColumn);

        if (statement.where) {
            const key = this.resolveJoinedColumn(left, right, statement.where.column);
            rows = rows.filter(compilePredicate(statement.where, key));
        }

        let columns: string[];
        let resultRows: RowData[];

        if (statement.columns === '*') {
            columns = [
                ...left.getSchema().getColumnNames().map(c => qualify(left.getName(), c)),
                ...right.getSchema().getColumnNames().map(c => qualify(right.getName(), c)),
            ];
            resultRows = rows.map(row => row.toObject());
        } else {
            const keys = statement.columns.map(ref => this.resolveJoinedColumn(left, right, ref));
            columns = statement.columns;
            resultRows = rows.map(row => this.projectAs(row, columns, keys));
        }

        return {
            success: true,
            message: `Selected ${resultRows.length} row(s) from joined tables`,
            rows: resultRows,
            columns,
            rowCount: resultRows.length,
        };
    }

    private executeUpdate(statement: UpdateStatement): QueryResult {
        const table = this.database.getTable(statement.tableName);
        const updatedCount = table.updateWhere(this.predicateFor(table, statement.where), statement.set);

        return {
            success: true,
            message: `Updated ${updatedCount} row(s) in '${statement.tableName}'`,
            updatedCount,
        };
    }

    private executeDelete(statement: DeleteStatement): QueryResult {
        const table = this.database.getTable(statement.tableName);
        const deletedCount = table.deleteWhere(this.predicateFor(table, statement.where));

        return {
            success: true,
            message: `Deleted ${deletedCount} row(s) from '${statement.tableName}'`,
            deletedCount,
        };
    }

    private executeShowTables(): QueryResult {
        const rows = this.database.listTables().map(name => ({
            table_name: name,
            row_count: this.database.getTable(name).count(),
        }));

        return {
            success: true,
            message: `${rows.length} table(s)`,
            rows,
            columns: ['table_name', 'row_count'],
            rowCount: rows.length,
        };
    }

    private executeDescribe(statement: DescribeStatement): QueryResult {
        const table = this.database.getTable(statement.tableName);
        const tableInfo = table.getInfo();

        const rows = tableInfo.columns.map(column => ({
            column_name: column.name,
            data_type: formatColumnType(column),
            constraints: formatConstraints(column).join(', ') || 'NONE',
        }));

        return {
            success: true,
            message: `Table '${tableInfo.name}' has ${rows.length} column(s)`,
            rows,
            columns: ['column_name', 'data_type', 'constraints'],
            rowCount: rows.length,
            tableInfo,
        };
    }

    private executeDropTable(statement: DropTableStatement): QueryResult {
        this.database.dropTable(statement.tableName);

        return {
            success: true,
            message: `Table '${statement.tableName}' dropped`,
        };
    }

    // ==========================================================================
    // HELPER METHODS
    // ==========================================================================

    private predicateFor(table: Table, where: WhereCondition | undefined): RowPredicate {
        return where ? compilePredicate(where, this.resolveColumn(table, where.column)) : MATCH_ALL;
    }

    /**
     * Resolve a bare or `table.column` reference against a single table.
     */
    private resolveColumn(table: Table, ref: string): string {
        const { table: qualifier, column } = parseColumnRef(ref);

        if (qualifier !== undefined && qualifier !== table.getName()) {
            throw new LookupError(`Unknown table '${qualifier}' in column reference '${ref}'`);
        }
        if (!table.hasColumn(column)) {
            throw new LookupError(`Unknown column '${column}' in table '${table.getName()}'`);
        }

        return column;
    }

    /**
     * Resolve a reference against a joined row. Unqualified names resolve to the
     * left table first, then the right.
     */
    private resolveJoinedColumn(left: Table, right: Table, ref: string): string {
        const { table: qualifier, column } = parseColumnRef(ref);

        if (qualifier === undefined) {
            if (left.hasColumn(column)) {
                return qualify(left.getName(), column);
            }
            if (right.hasColumn(column)) {
                return qualify(right.getName(), column);
            }
            throw new LookupError(`Unknown column '${column}' in joined tables`);
        }

        for (const table of [left, right]) {
            if (table.getName() === qualifier) {
                if (!table.hasColumn(column)) {
                    throw new LookupError(`Unknown column '${column}' in table '${qualifier}'`);
                }
                return qualify(qualifier, column);
            }
        }

        throw new LookupError(`Unknown table '${qualifier}' in column reference '${ref}'`);
    }

    /**
     * Work out which side of `ON a = b` belongs to which table.
     *
     * @returns [left table column, right table column]
     */
    private resolveJoinColumns(left: Table, right: Table, first: string, second: string): [string, string] {
        const a = parseColumnRef(first);
        const b = parseColumnRef(second);
        const leftName = left.getName();
        const rightName = right.getName();

        const belongs = (ref: { table?: string }, name: string): boolean =>
            ref.table === undefined || ref.table === name;

        if (belongs(a, leftName) && belongs(b, rightName)) {
            return [a.column, b.column];
        }
        if (belongs(a, rightName) && belongs(b, leftName)) {
            return [b.column, a.column];
        }

        throw new LookupError(
            `Join condition '${first} = ${second}' must reference '${leftName}' and '${rightName}'`
        );
    }

    /**
     * Read `keys` from a row into an object keyed by the names as written.
     */
    private projectAs(row: Row, names: string[], keys: string[]): RowData {
        return Object.fromEntries(
            names.map((name, i): [string, Value] => [name, row.get(keys[i]) ?? null])
        );
    }
}
