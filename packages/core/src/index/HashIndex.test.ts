import { describe, expect, test } from 'vitest';
import { HashIndex } from './HashIndex';

describe('HashIndex', () => {
    test('looks up positions in ascending order', () => {
        const index = new HashIndex('email');
        index.add('a@example.com', 4);
        index.add('a@example.com', 1);
        index.add('b@example.com', 2);

        expect(index.lookup('a@example.com')).toEqual([1, 4]);
        expect(index.lookup('c@example.com')).toEqual([]);
    });

    test('keeps values of different types apart', () => {
        const index = new HashIndex('key');
        index.add(1, 0);
        index.add('1', 1);
        index.add(true, 2);

        expect(index.lookup(1)).toEqual([0]);
        expect(index.lookup('1')).toEqual([1]);
        expect(index.lookup(true)).toEqual([2]);
        expect(index.size()).toBe(3);
    });

    test('never indexes NULL', () => {
        const index = new HashIndex('key');
        index.add(null, 0);

        expect(index.size()).toBe(0);
        expect(index.has(null)).toBe(false);
        expect(index.lookup(null)).toEqual([]);
    });

    test('remove drops empty buckets', () => {
        const index = new HashIndex('key');
        index.add(7, 0);
        index.add(7, 3);

        index.remove(7, 0);
        expect(index.lookup(7)).toEqual([3]);

        index.remove(7, 3);
        expect(index.has(7)).toBe(false);
        expect(index.getStats()).toEqual({ column: 'key', uniqueKeys: 0, totalEntries: 0 });
    });

    test('getStats counts keys and entries', () => {
        const index = new HashIndex('key');
        index.add('x', 0);
        index.add('x', 1);
        index.add('y', 2);

        expect(index.getStats()).toEqual({ column: 'key', uniqueKeys: 2, totalEntries: 3 });

        index.clear();
        expect(index.size()).toBe(0);
    });
});
