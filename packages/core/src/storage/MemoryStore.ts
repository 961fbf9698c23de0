/**
 * TinyRel - Memory Store
 *
 * A key-value store held in memory, optionally mirrored to a JSON file.
 *
 * Design decisions:
 * - Every write rewrites the whole file (small data, simple format)
 * - File I/O failures are reported with console.warn and never thrown;
 *   load/backup/restore report success as a boolean
 * - Values must be JSON-serializable
 *
 * File layout:
 * { "metadata": { "savedAt": ISO date, "version": "1.0" }, "data": { key: value } }
 */

import * as fs from 'fs';
import * as path from 'path';
import { errorMessage } from '../errors';

const STORE_VERSION = '1.0';

export interface StoreStats {
    itemCount: number;
    keys: string[];
    persistFile: string | null;
    loaded: boolean;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class MemoryStore {
    private data: Map<string, unknown>;
    private readonly persistFile: string | null;
    private loaded: boolean;

    constructor(persistFile?: string) {
        this.data = new Map();
        this.persistFile = persistFile ?? null;
        this.loaded = false;

        if (this.persistFile && fs.existsSync(this.persistFile)) {
            this.load();
        }
    }

    get(key: string, fallback?: unknown): unknown {
        return this.data.has(key) ? this.data.get(key) : fallback;
    }

    set(key: string, value: unknown): void {
        this.data.set(key, value);
        this.save();
    }

    /**
     * Set several keys with a single write.
     */
    update(entries: Record<string, unknown>): void {
        for (const [key, value] of Object.entries(entries)) {
            this.data.set(key, value);
        }
        this.save();
    }

    delete(key: string): boolean {
        if (!this.data.delete(key)) {
            return false;
        }
        this.save();
        return true;
    }

    has(key: string): boolean {
        return this.data.has(key);
    }

    keys(): string[] {
        return Array.from(this.data.keys());
    }

    clear(): void {
        this.data.clear();
        this.save();
    }

    size(): number {
        return this.data.size;
    }

    getPersistFile(): string | null {
        return this.persistFile;
    }

    /**
     * Reload the store from its persist file.
     */
    load(): boolean {
        if (!this.persistFile || !fs.existsSync(this.persistFile)) {
            return false;
        }

        try {
            this.data = this.readFile(this.persistFile);
            this.loaded = true;
            return true;
        } catch (error) {
            console.warn(`Warning: Failed to load data from ${this.persistFile}: ${errorMessage(error)}`);
            return false;
        }
    }

    /**
     * Write the current contents to `backupFile`.
     */
    backup(backupFile: string): boolean {
        try {
            this.writeFile(backupFile, {
                metadata: {
                    backedUpAt: new Date().toISOString(),
                    version: STORE_VERSION,
                    originalFile: this.persistFile,
                },
                data: Object.fromEntries(this.data),
            });
            return true;
        } catch (error) {
            console.warn(`Warning: Failed to create backup at ${backupFile}: ${errorMessage(error)}`);
            return false;
        }
    }

    /**
     * Replace the contents with those of `backupFile`, then persist them.
     */
    restore(backupFile: string): boolean {
        try {
            this.data = this.readFile(backupFile);
        } catch (error) {
            console.warn(`Warning: Failed to restore from ${backupFile}: ${errorMessage(error)}`);
            return false;
        }
        this.save();
        return true;
    }

    getStats(): StoreStats {
        return {
            itemCount: this.data.size,
            keys: this.keys(),
            persistFile: this.persistFile,
            loaded: this.loaded,
        };
    }

    private save(): void {
        if (!this.persistFile) {
            return;
        }

        try {
            this.writeFile(this.persistFile, {
                metadata: {
                    savedAt: new Date().toISOString(),
                    version: STORE_VERSION,
                },
                data: Object.fromEntries(this.data),
            });
        } catch (error) {
            console.warn(`Warning: Failed to save data to ${this.persistFile}: ${errorMessage(error)}`);
        }
    }

    private readFile(filePath: string): Map<string, unknown> {
        const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));

        if (!isRecord(parsed) || !isRecord(parsed.data)) {
            throw new Error('Invalid file format');
        }

        return new Map(Object.entries(parsed.data));
    }

    private writeFile(filePath: string, content: unknown): void {
        const dir = path.dirname(filePath);
        if (!fs.existsSync(dir)) {
            fs.mkdirSync(dir, { recursive: true });
        }

        fs.writeFileSync(filePath, JSON.stringify(content, null, 2));
    }
}
