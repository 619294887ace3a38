/**
 * Workbook-level merge: every sheet the two workbooks share is merged with mergeSheet,
 * sheets only in the base are copied through, and per-sheet statistics are collected.
 *
 * When no sheet names match, the first sheet of each workbook is merged instead
 * and the result holds that single sheet under the base sheet's name.
 */

import { cloneTable, getSheet, readWorkbook, type ParsedSheet, type ParsedWorkbook } from './excelParser';
import { resolveSheets, type SheetCatalog } from './sheetCatalog';
import { mergeSheet } from './sheetMerger';
import { MergeError, guardStage } from './errors';
import type { FingerprintStrategy } from './keyManager';

export type MergeMode = 'multi-sheet' | 'fallback';

export interface MergeOptions {
    fingerprint: FingerprintStrategy;
    dropRepeatedIncoming: boolean;
    appendIncomingOnlySheets: boolean;
    headerRow: number;
}

export const DEFAULT_MERGE_OPTIONS: MergeOptions = {
    fingerprint: 'exact',
    dropRepeatedIncoming: false,
    appendIncomingOnlySheets: false,
    headerRow: 1,
};

export interface SheetMergeStats {
    sheetName: string;
    originalRowCount: number;
    finalRowCount: number;
    rowsAdded: number;
    duplicateCount: number;
}

export interface MergeTotals {
    sheetsMerged: number;
    originalRows: number;
    finalRows: number;
    rowsAdded: number;
}

export interface MergeResult {
    mode: MergeMode;
    workbook: ParsedWorkbook;
    sheetStats: SheetMergeStats[];
    totals: MergeTotals;
    catalog: SheetCatalog;
    /** Incoming-only sheets left out of the result */
    droppedIncomingSheets: string[];
}

function mergeOne(sheetName: string, base: ParsedSheet, incoming: ParsedSheet, options: MergeOptions): { sheet: ParsedSheet; stats: SheetMergeStats } {
    console.log(`[Merger] Processing sheet: ${sheetName}`);

    const result = guardStage('merge', `Sheet '${sheetName}' could not be merged`, () => mergeSheet(base, incoming, options));

    const stats: SheetMergeStats = {
        sheetName,
        originalRowCount: base.data.length,
        finalRowCount: result.merged.data.length,
        rowsAdded: result.rowsAdded,
        duplicateCount: result.duplicateCount,
    };

    if (result.outcome === 'no-op') {
        console.log(`[Merger] No new unique rows found in sheet '${sheetName}'`);
    } else {
        console.log(`[Merger] Sheet '${sheetName}' merge completed. Rows: ${stats.originalRowCount} -> ${stats.finalRowCount} (+${stats.rowsAdded})`);
    }

    return { sheet: { name: sheetName, ...result.merged }, stats };
}

export function summarize(sheetStats: SheetMergeStats[]): MergeTotals {
    return sheetStats.reduce<MergeTotals>(
        (acc, s) => ({
            sheetsMerged: acc.sheetsMerged + 1,
            originalRows: acc.originalRows + s.originalRowCount,
            finalRows: acc.finalRows + s.finalRowCount,
            rowsAdded: acc.rowsAdded + s.rowsAdded,
        }),
        { sheetsMerged: 0, originalRows: 0, finalRows: 0, rowsAdded: 0 }
    );
}

export function mergeWorkbooks(base: ParsedWorkbook, incoming: ParsedWorkbook, options?: Partial<MergeOptions>): MergeResult {
    const opts: MergeOptions = { ...DEFAULT_MERGE_OPTIONS, ...options };
    const catalog = resolveSheets(base.sheets.map((s) => s.name), incoming.sheets.map((s) => s.name));

    // === Fallback: no sheet names in common ===
    if (!catalog.hasCommon) {
        const baseFirst = base.sheets[0];
        const incomingFirst = incoming.sheets[0];
        if (!baseFirst || !incomingFirst) {
            throw new MergeError('resolve', 'NO_SHEETS', 'Both workbooks need at least one sheet to merge');
        }

        console.warn(`[Merger] No common sheet names found. Merging first sheets '${baseFirst.name}' <- '${incomingFirst.name}'`);
        const { sheet, stats } = mergeOne(baseFirst.name, baseFirst, incomingFirst, opts);

        return {
            mode: 'fallback',
            workbook: { fileName: base.fileName, sheets: [sheet] },
            sheetStats: [stats],
            totals: summarize([stats]),
            catalog,
            droppedIncomingSheets: [],
        };
    }

    // === Merge each common sheet, copy through base-only sheets in base order ===
    const commonNames = new Set(catalog.common);
    const sheets: ParsedSheet[] = [];
    const sheetStats: SheetMergeStats[] = [];

    for (const baseSheet of base.sheets) {
        if (!commonNames.has(baseSheet.name)) {
            sheets.push(cloneTable(baseSheet));
            console.log(`[Merger] Copied sheet '${baseSheet.name}' from base (no matching sheet in incoming)`);
            continue;
        }

        const incomingSheet = getSheet(incoming, baseSheet.name);
        if (!incomingSheet) continue;

        const { sheet, stats } = mergeOne(baseSheet.name, baseSheet, incomingSheet, opts);
        sheets.push(sheet);
        sheetStats.push(stats);
    }

    let droppedIncomingSheets = catalog.incomingOnly;
    if (catalog.incomingOnly.length > 0) {
        if (opts.appendIncomingOnlySheets) {
            catalog.incomingOnly.forEach((name) => {
                const sheet = getSheet(incoming, name);
                if (sheet) sheets.push(cloneTable(sheet));
                console.log(`[Merger] Appended incoming-only sheet '${name}'`);
            });
            droppedIncomingSheets = [];
        } else {
            console.warn(`[Merger] Incoming-only sheets not merged: ${JSON.stringify(catalog.incomingOnly)}`);
        }
    }

    const totals = summarize(sheetStats);
    console.log(`[Merger] Multi-sheet merge completed. Total new rows added: ${totals.rowsAdded}`);

    return {
        mode: 'multi-sheet',
        workbook: { fileName: base.fileName, sheets },
        sheetStats,
        totals,
        catalog,
        droppedIncomingSheets,
    };
}

export async function mergeWorkbookFiles(basePath: string, incomingPath: string, options?: Partial<MergeOptions>): Promise<MergeResult> {
    const headerRow = options?.headerRow ?? DEFAULT_MERGE_OPTIONS.headerRow;

    console.log('[Merger] Loading base workbook...');
    const base = await readWorkbook(basePath, { headerRow });
    console.log('[Merger] Loading incoming workbook...');
    const incoming = await readWorkbook(incomingPath, { headerRow });

    return mergeWorkbooks(base, incoming, options);
}
