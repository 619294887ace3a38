import { describe, expect, it } from 'vitest';
import { mergeWorkbooks, summarize } from './workbookMerger';
import { MergeError } from './errors';
import { sheet, values, workbook } from '../test/fixtures';

describe('mergeWorkbooks', () => {
    it('merges common sheets and copies base-only sheets through', () => {
        const base = workbook(
            'base.xlsx',
            sheet('S1', ['id'], [[1], [2]]),
            sheet('S2', ['code'], [['x']])
        );
        const incoming = workbook('incoming.xlsx', sheet('S1', ['id'], [[2], [3]]));

        const result = mergeWorkbooks(base, incoming);

        expect(result.mode).toBe('multi-sheet');
        expect(result.workbook.fileName).toBe('base.xlsx');
        expect(result.workbook.sheets.map((s) => s.name)).toEqual(['S1', 'S2']);
        expect(values(result.workbook.sheets[0])).toEqual([[1], [2], [3]]);
        expect(result.workbook.sheets[1]).toEqual(base.sheets[1]);
        expect(result.sheetStats).toEqual([
            { sheetName: 'S1', originalRowCount: 2, finalRowCount: 3, rowsAdded: 1, duplicateCount: 1 },
        ]);
        expect(result.totals).toEqual({ sheetsMerged: 1, originalRows: 2, finalRows: 3, rowsAdded: 1 });
    });

    it('keeps base sheet order', () => {
        const base = workbook('b', sheet('B', ['v'], []), sheet('A', ['v'], []));
        const incoming = workbook('i', sheet('A', ['v'], [[1]]), sheet('B', ['v'], [[2]]));

        const result = mergeWorkbooks(base, incoming);

        expect(result.workbook.sheets.map((s) => s.name)).toEqual(['B', 'A']);
        expect(result.sheetStats.map((s) => s.sheetName)).toEqual(['B', 'A']);
    });

    it('falls back to the first sheet of each workbook when no names match', () => {
        const base = workbook('b', sheet('Data', ['id'], [[1]]), sheet('Notes', ['n'], [['keep']]));
        const incoming = workbook('i', sheet('Sheet1', ['id'], [[1], [5]]));

        const result = mergeWorkbooks(base, incoming);

        expect(result.mode).toBe('fallback');
        expect(result.workbook.sheets).toHaveLength(1);
        expect(result.workbook.sheets[0].name).toBe('Data');
        expect(values(result.workbook.sheets[0])).toEqual([[1], [5]]);
        expect(result.totals.rowsAdded).toBe(1);
        expect(result.droppedIncomingSheets).toEqual([]);
    });

    it('reports incoming-only sheets without merging them', () => {
        const base = workbook('b', sheet('S1', ['id'], [[1]]));
        const incoming = workbook('i', sheet('S1', ['id'], [[1]]), sheet('Extra', ['id'], [[9]]));

        const result = mergeWorkbooks(base, incoming);

        expect(result.workbook.sheets.map((s) => s.name)).toEqual(['S1']);
        expect(result.droppedIncomingSheets).toEqual(['Extra']);
        expect(result.totals.rowsAdded).toBe(0);
    });

    it('appends incoming-only sheets when configured', () => {
        const base = workbook('b', sheet('S1', ['id'], [[1]]));
        const incoming = workbook('i', sheet('S1', ['id'], [[1]]), sheet('Extra', ['id'], [[9]]));

        const result = mergeWorkbooks(base, incoming, { appendIncomingOnlySheets: true });

        expect(result.workbook.sheets.map((s) => s.name)).toEqual(['S1', 'Extra']);
        expect(values(result.workbook.sheets[1])).toEqual([[9]]);
        expect(result.droppedIncomingSheets).toEqual([]);
        expect(result.sheetStats).toHaveLength(1);
    });

    it('passes the detection options to every sheet', () => {
        const base = workbook('b', sheet('S1', ['id'], []));
        const incoming = workbook('i', sheet('S1', ['id'], [[7], [7]]));

        expect(mergeWorkbooks(base, incoming).totals.rowsAdded).toBe(2);
        expect(mergeWorkbooks(base, incoming, { dropRepeatedIncoming: true }).totals.rowsAdded).toBe(1);
    });

    it('fails with NO_SHEETS when a workbook is empty', () => {
        const base = workbook('b');
        const incoming = workbook('i', sheet('S1', ['id'], [[1]]));

        expect(() => mergeWorkbooks(base, incoming)).toThrow(MergeError);
        try {
            mergeWorkbooks(base, incoming);
        } catch (e) {
            expect(e).toBeInstanceOf(MergeError);
            if (e instanceof MergeError) {
                expect(e.stage).toBe('resolve');
                expect(e.code).toBe('NO_SHEETS');
            }
        }
    });
});

describe('summarize', () => {
    it('adds up per-sheet statistics', () => {
        expect(summarize([
            { sheetName: 'a', originalRowCount: 2, finalRowCount: 3, rowsAdded: 1, duplicateCount: 0 },
            { sheetName: 'b', originalRowCount: 5, finalRowCount: 5, rowsAdded: 0, duplicateCount: 4 },
        ])).toEqual({ sheetsMerged: 2, originalRows: 7, finalRows: 8, rowsAdded: 1 });
    });

    it('is all zeros for no sheets', () => {
        expect(summarize([])).toEqual({ sheetsMerged: 0, originalRows: 0, finalRows: 0, rowsAdded: 0 });
    });
});
