/**
 * TinyRel - Schema and Type System
 *
 * Column definitions, table schemas, row validation and value coercion.
 *
 * Design decisions:
 * - Definitions are normalized once, at construction: a primary key is always
 *   unique and non-nullable, and VARCHAR always carries a max length
 * - Validation is strict about runtime types; coercion is the only place
 *   textual input is converted
 */

import { ColumnDefinition, ColumnSpec, ColumnType, COLUMN_TYPES, RowData, Value } from '../types';
import { SchemaError } from '../errors';

export const DEFAULT_VARCHAR_LENGTH = 255;

const TRUE_STRINGS = new Set(['true', '1', 'yes', 'on']);
const FALSE_STRINGS = new Set(['false', '0', 'no', 'off']);
const INTEGER_PATTERN = /^\s*[+-]?\d+\s*$/;

/**
 * Check whether an arbitrary string names a column type.
 */
export function isColumnType(value: string): value is ColumnType {
    return COLUMN_TYPES.some(type => type === value);
}

/**
 * Build a normalized column definition from a caller-supplied spec.
 */
export function createColumnDefinition(spec: ColumnSpec): ColumnDefinition {
    if (!spec.name) {
        throw new SchemaError('Column name cannot be empty');
    }
    if (!isColumnType(spec.type)) {
        throw new SchemaError(`Unsupported column type: '${String(spec.type)}'`);
    }

    const primaryKey = spec.primaryKey ?? false;
    let maxLength: number | null = null;

    if (spec.type === 'VARCHAR') {
        maxLength = spec.maxLength ?? DEFAULT_VARCHAR_LENGTH;
        if (!Number.isInteger(maxLength) || maxLength <= 0) {
            throw new SchemaError(`Invalid VARCHAR length for column '${spec.name}': ${maxLength}`);
        }
    }

    return {
        name: spec.name,
        type: spec.type,
        primaryKey,
        unique: primaryKey || (spec.unique ?? false),
        nullable: primaryKey ? false : (spec.nullable ?? true),
        maxLength,
    };
}

/**
 * Describe the runtime type of a value for error messages.
 */
export function describeValueType(value: unknown): string {
    if (value === null) {
        return 'NULL';
    }
    if (typeof value === 'number') {
        return Number.isInteger(value) ? 'INT' : 'FLOAT';
    }
    if (typeof value === 'string') {
        return 'VARCHAR';
    }
    if (typeof value === 'boolean') {
        return 'BOOLEAN';
    }
    return typeof value;
}

function toSafeInteger(text: string): number {
    const parsed = parseInt(text, 10);
    if (!Number.isSafeInteger(parsed)) {
        throw new SchemaError(`Integer out of range: '${text.trim()}'`);
    }
    return parsed;
}

function tooLong(column: ColumnDefinition): SchemaError {
    return new SchemaError(`String too long for column '${column.name}': max ${column.maxLength}`);
}

export class Schema {
    readonly name: string;
    private readonly columns: ReadonlyMap<string, ColumnDefinition>;

    constructor(name: string, columns: ColumnDefinition[]) {
        if (columns.length === 0) {
            throw new SchemaError('Schema must have at least one column');
        }

        const byName = new Map<string, ColumnDefinition>();
        for (const column of columns) {
            if (byName.has(column.name)) {
                throw new SchemaError(`Duplicate column name: '${column.name}'`);
            }
            byName.set(column.name, column);
        }

        const primaryKeys = columns.filter(c => c.primaryKey);
        if (primaryKeys.length > 1) {
            throw new SchemaError('Schema can have at most one primary key');
        }

        this.name = name;
        this.columns = byName;
    }

    getPrimaryKeyColumn(): string | undefined {
        for (const column of this.columns.values()) {
            if (column.primaryKey) {
                return column.name;
            }
        }
        return undefined;
    }

    /**
     * Column names in definition order.
     */
    getColumnNames(): string[] {
        return Array.from(this.columns.keys());
    }

    getColumns(): ColumnDefinition[] {
        return Array.from(this.columns.values());
    }

    getColumn(name: string): ColumnDefinition | undefined {
        return this.columns.get(name);
    }

    hasColumn(name: string): boolean {
        return this.columns.has(name);
    }

    /**
     * Validate a row against this schema.
     *
     * Fails when a non-nullable column is absent, when an unknown column is
     * present, or when a present value does not match its declared type.
     */
    validateRow(row: Record<string, unknown>): void {
        for (const column of this.columns.values()) {
            if (!Object.hasOwn(row, column.name) && !column.nullable) {
                throw new SchemaError(`Required column '${column.name}' is missing`);
            }
        }

        for (const name of Object.keys(row)) {
            if (!this.columns.has(name)) {
                throw new SchemaError(`Unknown column '${name}'`);
            }
        }

        for (const column of this.columns.values()) {
            if (!Object.hasOwn(row, column.name)) {
                continue;
            }
            const value = row[column.name];
            if (!this.matchesType(value, column)) {
                throw new SchemaError(
                    `Invalid value for column '${column.name}': ` +
                    `expected ${column.type}, got ${describeValueType(value)}`
                );
            }
            if (typeof value === 'number' && !Number.isSafeInteger(value)) {
                throw new SchemaError(`Integer out of range for column '${column.name}': ${value}`);
            }
            if (typeof value === 'string' && this.exceedsLength(value, column)) {
                throw tooLong(column);
            }
        }
    }

    private matchesType(value: unknown, column: ColumnDefinition): boolean {
        if (value === null || value === undefined) {
            return column.nullable;
        }

        switch (column.type) {
            case 'INT':
                return typeof value === 'number' && Number.isInteger(value);
            case 'BOOLEAN':
                return typeof value === 'boolean';
            case 'VARCHAR':
                return typeof value === 'string';
        }
    }

    // Length is counted in code points
    private exceedsLength(value: string, column: ColumnDefinition): boolean {
        return column.maxLength !== null && [...value].length > column.maxLength;
    }

    /**
     * Coerce a value to a column's declared type.
     *
     * Strings are converted (integer parse, boolean words, length-checked text);
     * values already of the declared type pass through unchanged.
     */
    coerceValue(value: unknown, column: ColumnDefinition): Value {
        if (value === null || value === undefined) {
            if (column.nullable) {
                return null;
            }
            throw new SchemaError(`Column '${column.name}' cannot be NULL`);
        }

        if (typeof value === 'string') {
            switch (column.type) {
                case 'INT':
                    if (!INTEGER_PATTERN.test(value)) {
                        throw new SchemaError(`Cannot convert '${value}' to INT`);
                    }
                    return toSafeInteger(value);
                case 'BOOLEAN': {
                    const lower = value.trim().toLowerCase();
                    if (TRUE_STRINGS.has(lower)) {
                        return true;
                    }
                    if (FALSE_STRINGS.has(lower)) {
                        return false;
                    }
                    throw new SchemaError(`Cannot convert '${value}' to BOOLEAN`);
                }
                case 'VARCHAR':
                    if (this.exceedsLength(value, column)) {
                        throw tooLong(column);
                    }
                    return value;
            }
        }

        if (column.type === 'INT' && typeof value === 'number' && Number.isInteger(value)) {
            if (!Number.isSafeInteger(value)) {
                throw new SchemaError(`Integer out of range for column '${column.name}': ${value}`);
            }
            return value;
        }
        if (column.type === 'BOOLEAN' && typeof value === 'boolean') {
            return value;
        }

        throw new SchemaError(`Cannot coerce ${describeValueType(value)} to ${column.type}`);
    }

    /**
     * Coerce every present value of a row.
     */
    coerceRow(row: Record<string, unknown>): RowData {
        return Object.fromEntries(
            Object.entries(row).map(([name, value]): [string, Value] => {
                const column = this.columns.get(name);
                if (!column) {
                    throw new SchemaError(`Unknown column '${name}'`);
                }
                return [name, this.coerceValue(value, column)];
            })
        );
    }
}

/**
 * Create a schema from caller-supplied column specs.
 *
 * @example
 * createSchema('users', [
 *     { name: 'id', type: 'INT', primaryKey: true },
 *     { name: 'name', type: 'VARCHAR', maxLength: 100 },
 * ]);
 */
export function createSchema(name: string, specs: ColumnSpec[]): Schema {
    return new Schema(name, specs.map(createColumnDefinition));
}
