/**
 * TinyRel - Storage Module
 *
 * Exports all storage-related classes.
 */

export { Row } from './Row';
export { Table } from './Table';
export type { RowPredicate } from './Table';
export { Database } from './Database';
export { MemoryStore, isRecord } from './MemoryStore';
export type { StoreStats } from './MemoryStore';
