import type { Table } from './excelParser';
import { alignColumns } from './columnAligner';
import { findNewRows, type DetectOptions } from './duplicateDetector';

export type SheetMergeOutcome = 'merged' | 'no-op';

export interface SheetMergeResult {
    merged: Table;
    rowsAdded: number;
    duplicateCount: number;
    outcome: SheetMergeOutcome;
}

/**
 * Fold the rows of `incoming` that are not already in `base` onto the end of `base`.
 * Base rows keep their order; the merged column set is the sorted union of both.
 */
export function mergeSheet(base: Table, incoming: Table, options?: DetectOptions): SheetMergeResult {
    const { alignedBase, alignedIncoming } = alignColumns(base, incoming);
    const { newRows, duplicateCount } = findNewRows(alignedBase, alignedIncoming, options);

    if (newRows.length === 0) {
        return { merged: alignedBase, rowsAdded: 0, duplicateCount, outcome: 'no-op' };
    }

    const merged: Table = {
        columns: alignedBase.columns,
        data: [...alignedBase.data, ...newRows],
    };

    return {
        merged,
        rowsAdded: merged.data.length - base.data.length,
        duplicateCount,
        outcome: 'merged',
    };
}
