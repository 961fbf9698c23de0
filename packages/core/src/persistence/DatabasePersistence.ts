/**
 * TinyRel - Database Persistence
 *
 * Bridges a Database and a MemoryStore. Saving writes two keys:
 *
 * - `table_schemas`: { table: { columns: ColumnDefinition[] } }
 * - `table_data`:    { table: RowData[] }
 *
 * Loading replays CREATE TABLE then INSERT for each table. A table that fails
 * to restore is reported and skipped; the others still load.
 */

import { ColumnSpec, SerializedSchemas, SerializedTableData } from '../types';
import { errorMessage, SchemaError } from '../errors';
import { isColumnType } from '../schema/Schema';
import { Database } from '../storage/Database';
import { isRecord, MemoryStore } from '../storage/MemoryStore';

export const SCHEMAS_KEY = 'table_schemas';
export const DATA_KEY = 'table_data';

export function saveDatabase(database: Database, store: MemoryStore): void {
    const schemas: SerializedSchemas = {};
    const data: SerializedTableData = {};

    for (const name of database.listTables()) {
        const table = database.getTable(name);
        schemas[name] = { columns: table.getInfo().columns };
        data[name] = table.selectAll().map(row => row.toObject());
    }

    store.update({ [SCHEMAS_KEY]: schemas, [DATA_KEY]: data });
}

/**
 * Read a persisted column definition back into a ColumnSpec.
 */
function toColumnSpec(value: unknown): ColumnSpec {
    if (!isRecord(value) || typeof value.name !== 'string' || typeof value.type !== 'string') {
        throw new SchemaError('Malformed column definition');
    }
    const type = value.type.toUpperCase();
    if (!isColumnType(type)) {
        throw new SchemaError(`Unsupported column type: '${value.type}'`);
    }

    const spec: ColumnSpec = { name: value.name, type };
    if (typeof value.primaryKey === 'boolean') {
        spec.primaryKey = value.primaryKey;
    }
    if (typeof value.unique === 'boolean') {
        spec.unique = value.unique;
    }
    if (typeof value.nullable === 'boolean') {
        spec.nullable = value.nullable;
    }
    if (typeof value.maxLength === 'number') {
        spec.maxLength = value.maxLength;
    }
    return spec;
}

function toColumnSpecs(schema: unknown): ColumnSpec[] {
    if (!isRecord(schema) || !Array.isArray(schema.columns)) {
        throw new SchemaError('Malformed table schema');
    }
    return schema.columns.map(toColumnSpec);
}

/**
 * Restore tables and rows from `store` into `database`.
 *
 * @returns names of the tables whose schema and rows were fully restored
 */
export function loadDatabase(database: Database, store: MemoryStore): string[] {
    const schemas = store.get(SCHEMAS_KEY, {});
    const data = store.get(DATA_KEY, {});

    if (!isRecord(schemas) || !isRecord(data)) {
        console.warn('Warning: Stored database has an invalid layout; nothing restored');
        return [];
    }

    const created: string[] = [];
    for (const [name, schema] of Object.entries(schemas)) {
        try {
            database.createTable(name, toColumnSpecs(schema));
            created.push(name);
        } catch (error) {
            console.warn(`Warning: Failed to restore table '${name}': ${errorMessage(error)}`);
        }
    }

    const restored: string[] = [];
    for (const name of created) {
        const rows = data[name] ?? [];
        try {
            if (!Array.isArray(rows)) {
                throw new SchemaError('Stored rows are not a list');
            }
            const table = database.getTable(name);
            for (const row of rows) {
                if (!isRecord(row)) {
                    throw new SchemaError('Stored row is not an object');
                }
                table.insert(row);
            }
            restored.push(name);
        } catch (error) {
            console.warn(`Warning: Failed to restore data for table '${name}': ${errorMessage(error)}`);
        }
    }

    return restored;
}
