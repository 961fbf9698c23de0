/**
 * TinyRel - Core Type Definitions
 *
 * Shared types for the engine: values, column definitions, parsed statements,
 * execution results and the persisted layout.
 */

// =============================================================================
// DATA TYPES
// =============================================================================

/**
 * Supported column types.
 * - INT: integer numbers
 * - VARCHAR: strings with a maximum length
 * - BOOLEAN: true/false
 */
export type ColumnType = 'INT' | 'VARCHAR' | 'BOOLEAN';

export const COLUMN_TYPES: readonly ColumnType[] = ['INT', 'VARCHAR', 'BOOLEAN'];

/**
 * Runtime representation of a stored value.
 * The union is discriminated by `typeof`; INT values are integral numbers.
 */
export type Value = number | string | boolean | null;

/**
 * Plain object form of a row, used at the API boundary.
 */
export type RowData = Record<string, Value>;

// =============================================================================
// SCHEMA DEFINITIONS
// =============================================================================

/**
 * A fully normalized column definition.
 */
export interface ColumnDefinition {
    name: string;
    type: ColumnType;
    primaryKey: boolean;
    unique: boolean;
    nullable: boolean;
    /** Only meaningful for VARCHAR; null for other types. */
    maxLength: number | null;
}

/**
 * Column definition as written by a caller; omitted flags take their defaults.
 */
export interface ColumnSpec {
    name: string;
    type: ColumnType;
    primaryKey?: boolean;
    unique?: boolean;
    nullable?: boolean;
    maxLength?: number | null;
}

/**
 * Introspection view of a table.
 */
export interface TableInfo {
    name: string;
    rowCount: number;
    columns: ColumnDefinition[];
}

export interface DatabaseInfo {
    name: string;
    tableCount: number;
    tables: TableInfo[];
}

// =============================================================================
// QUERY TYPES
// =============================================================================

/**
 * Comparison operators accepted in a WHERE clause.
 */
export type ComparisonOperator = '=' | '!=' | '>' | '<' | '>=' | '<=';

/**
 * WHERE clause condition: a single comparison between a column and a literal.
 * AND/OR are not supported.
 */
export interface WhereCondition {
    column: string;
    operator: ComparisonOperator;
    value: Value;
}

/**
 * JOIN clause specification. Only INNER JOIN with an equality condition.
 */
export interface JoinClause {
    type: 'INNER';
    table: string;
    leftColumn: string;  // e.g. "users.id"
    rightColumn: string; // e.g. "todos.user_id"
}

export interface CreateTableStatement {
    type: 'CREATE_TABLE';
    tableName: string;
    columns: ColumnSpec[];
}

/**
 * Parsed INSERT statement. An empty column list means "every column, in schema order".
 */
export interface InsertStatement {
    type: 'INSERT';
    tableName: string;
    columns: string[];
    values: Value[][];
}

export interface SelectStatement {
    type: 'SELECT';
    columns: string[] | '*';
    tableName: string;
    where?: WhereCondition;
    join?: JoinClause;
}

export interface UpdateStatement {
    type: 'UPDATE';
    tableName: string;
    set: RowData;
    where?: WhereCondition;
}

export interface DeleteStatement {
    type: 'DELETE';
    tableName: string;
    where?: WhereCondition;
}

export interface ShowTablesStatement {
    type: 'SHOW_TABLES';
}

export interface DescribeStatement {
    type: 'DESCRIBE';
    tableName: string;
}

export interface DropTableStatement {
    type: 'DROP_TABLE';
    tableName: string;
}

/**
 * Union of all parsed statements.
 */
export type ParsedStatement =
    | CreateTableStatement
    | InsertStatement
    | SelectStatement
    | UpdateStatement
    | DeleteStatement
    | ShowTablesStatement
    | DescribeStatement
    | DropTableStatement;

// =============================================================================
// QUERY RESULTS
// =============================================================================

/**
 * Result of a successful statement. Which optional keys are present depends on
 * the statement kind.
 */
export interface QueryResult {
    success: true;
    message: string;
    rows?: RowData[];
    columns?: string[];
    rowCount?: number;
    insertedRows?: RowData[];
    updatedCount?: number;
    deletedCount?: number;
    tableInfo?: TableInfo;
}

/**
 * Result of a failed statement.
 */
export interface QueryError {
    success: false;
    error: string;
    errorType: string;
    statement: string;
}

export type ExecutionResult = QueryResult | QueryError;

// =============================================================================
// STORAGE TYPES
// =============================================================================

/**
 * Persisted schema of one table.
 */
export interface SerializedTableSchema {
    columns: ColumnDefinition[];
}

export type SerializedSchemas = Record<string, SerializedTableSchema>;

export type SerializedTableData = Record<string, RowData[]>;
