/**
 * Row key utilities for duplicate detection
 */

import crypto from 'node:crypto';
import type { CellValue, Row } from './excelParser';

export type FingerprintStrategy = 'exact' | 'sha256';

/**
 * Canonical string form of a cell.
 * Numbers and their textual form compare equal (5 vs "5"); empty cells and null are the same.
 */
export function canonicalCell(value: CellValue | undefined): string {
    if (value === null || value === undefined) return '';
    if (typeof value === 'number') {
        // String(-0) is already "0"
        return Number.isNaN(value) ? '' : String(value);
    }
    if (typeof value === 'boolean') return value ? 'true' : 'false';
    if (value instanceof Date) {
        return Number.isNaN(value.getTime()) ? '' : value.toISOString();
    }
    return value;
}

/**
 * Ordered tuple key of a row over the given columns.
 * JSON encoding keeps cell boundaries, so ["a,b"] and ["a", "b"] never collide.
 */
export function rowKey(row: Row, columns: string[]): string {
    return JSON.stringify(columns.map((col) => canonicalCell(row[col])));
}

export function fingerprintRow(row: Row, columns: string[], strategy: FingerprintStrategy = 'exact'): string {
    const key = rowKey(row, columns);
    if (strategy === 'exact') return key;
    return crypto.createHash('sha256').update(key).digest('hex');
}
