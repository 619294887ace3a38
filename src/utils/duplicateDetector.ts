import { createRow, type Row, type Table } from './excelParser';
import { fingerprintRow, type FingerprintStrategy } from './keyManager';

export interface DetectOptions {
    fingerprint?: FingerprintStrategy;
    /** Also skip rows repeated earlier within the incoming table itself */
    dropRepeatedIncoming?: boolean;
}

export interface DetectResult {
    newRows: Row[];
    duplicateCount: number;
}

/**
 * Rows of `alignedIncoming` whose fingerprint is absent from the base fingerprint set.
 * Both tables must already share one column order (see alignColumns).
 */
export function findNewRows(alignedBase: Table, alignedIncoming: Table, options?: DetectOptions): DetectResult {
    const { fingerprint = 'exact', dropRepeatedIncoming = false } = options || {};
    const columns = alignedBase.columns;

    console.log('[Detector] Checking for duplicates...');

    const seen = new Set<string>();
    alignedBase.data.forEach((row) => seen.add(fingerprintRow(row, columns, fingerprint)));

    const newRows: Row[] = [];
    let duplicateCount = 0;

    alignedIncoming.data.forEach((row) => {
        const key = fingerprintRow(row, columns, fingerprint);
        if (seen.has(key)) {
            duplicateCount++;
            return;
        }
        if (dropRepeatedIncoming) seen.add(key);
        newRows.push(createRow(row));
    });

    console.log(`[Detector] Found ${duplicateCount} duplicate rows`);
    console.log(`[Detector] Found ${newRows.length} unique rows to add`);

    return { newRows, duplicateCount };
}
