/**
 * TinyRel - Hash Index
 *
 * Constraint index for PRIMARY KEY and UNIQUE columns: maps each non-null value
 * to the set of row positions holding it.
 *
 * Design decisions:
 * - Keys carry their type tag, so 1, "1" and true never collide; equality
 *   matches the exact-value equality used everywhere else in the engine
 * - NULL is never indexed; a constrained column may hold several NULLs
 * - The owning table keeps positions in sync when rows move
 *
 * Time complexity: lookup, add and remove are O(1) average.
 */

import { Value } from '../types';

type IndexKey = `${'number' | 'string' | 'boolean'}:${string}`;

export interface IndexStats {
    column: string;
    uniqueKeys: number;
    totalEntries: number;
}

export class HashIndex {
    private readonly columnName: string;
    private readonly entries: Map<IndexKey, Set<number>>;

    constructor(columnName: string) {
        this.columnName = columnName;
        this.entries = new Map();
    }

    private hashKey(value: string | number | boolean): IndexKey {
        if (typeof value === 'number') {
            return `number:${value}`;
        }
        if (typeof value === 'string') {
            return `string:${value}`;
        }
        return `boolean:${value}`;
    }

    /**
     * Record that `position` holds `value`. NULL is ignored.
     */
    add(value: Value, position: number): void {
        if (value === null) {
            return;
        }
        const key = this.hashKey(value);

        let positions = this.entries.get(key);
        if (!positions) {
            positions = new Set();
            this.entries.set(key, positions);
        }

        positions.add(position);
    }

    remove(value: Value, position: number): void {
        if (value === null) {
            return;
        }
        const key = this.hashKey(value);
        const positions = this.entries.get(key);

        if (positions) {
            positions.delete(position);
            if (positions.size === 0) {
                this.entries.delete(key);
            }
        }
    }

    /**
     * Positions holding `value`, ascending. Empty for NULL or unknown values.
     */
    lookup(value: Value): number[] {
        if (value === null) {
            return [];
        }
        const positions = this.entries.get(this.hashKey(value));
        return positions ? Array.from(positions).sort((a, b) => a - b) : [];
    }

    has(value: Value): boolean {
        return value !== null && this.entries.has(this.hashKey(value));
    }

    /**
     * Number of distinct indexed values.
     */
    size(): number {
        return this.entries.size;
    }

    clear(): void {
        this.entries.clear();
    }

    getStats(): IndexStats {
        let totalEntries = 0;
        for (const positions of this.entries.values()) {
            totalEntries += positions.size;
        }
        return {
            column: this.columnName,
            uniqueKeys: this.entries.size,
            totalEntries,
        };
    }
}
