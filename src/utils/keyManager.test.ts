import { describe, expect, it } from 'vitest';
import { canonicalCell, fingerprintRow, rowKey } from './keyManager';

describe('canonicalCell', () => {
    it('renders numbers and their text form identically', () => {
        expect(canonicalCell(5)).toBe('5');
        expect(canonicalCell('5')).toBe('5');
        expect(canonicalCell(2.5)).toBe('2.5');
    });

    it('treats null, undefined and NaN as empty', () => {
        expect(canonicalCell(null)).toBe('');
        expect(canonicalCell(undefined)).toBe('');
        expect(canonicalCell(NaN)).toBe('');
    });

    it('normalises negative zero', () => {
        expect(canonicalCell(-0)).toBe('0');
    });

    it('renders booleans and dates', () => {
        expect(canonicalCell(true)).toBe('true');
        expect(canonicalCell(false)).toBe('false');
        expect(canonicalCell(new Date(Date.UTC(2024, 0, 2, 3, 4, 5)))).toBe('2024-01-02T03:04:05.000Z');
    });

    it('keeps strings verbatim', () => {
        expect(canonicalCell(' a ')).toBe(' a ');
    });
});

describe('rowKey', () => {
    it('follows the given column order', () => {
        const row = { a: 1, b: 'x' };
        expect(rowKey(row, ['a', 'b'])).toBe('["1","x"]');
        expect(rowKey(row, ['b', 'a'])).toBe('["x","1"]');
    });

    it('keeps cell boundaries apart', () => {
        expect(rowKey({ a: 'p,q', b: null }, ['a', 'b'])).not.toBe(rowKey({ a: 'p', b: 'q' }, ['a', 'b']));
    });
});

describe('fingerprintRow', () => {
    it('returns the tuple key for the exact strategy', () => {
        expect(fingerprintRow({ id: 1 }, ['id'])).toBe('["1"]');
    });

    it('returns a stable sha256 digest', () => {
        const first = fingerprintRow({ id: 1, v: 'a' }, ['id', 'v'], 'sha256');
        const second = fingerprintRow({ id: '1', v: 'a' }, ['id', 'v'], 'sha256');
        expect(first).toMatch(/^[0-9a-f]{64}$/);
        expect(second).toBe(first);
    });
});
