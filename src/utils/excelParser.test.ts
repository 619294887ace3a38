import path from 'path';
import ExcelJS from 'exceljs';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
    appendSheet,
    cloneTable,
    listSheetNames,
    parseWorksheet,
    readWorkbook,
    toCellValue,
    writeWorkbook,
} from './excelParser';
import { MergeError } from './errors';
import { makeTempDir, removeDir, sheet, values, workbook } from '../test/fixtures';

describe('toCellValue', () => {
    it('keeps plain values and text as stored', () => {
        expect(toCellValue(3)).toBe(3);
        expect(toCellValue(true)).toBe(true);
        expect(toCellValue('  lot 7 ')).toBe('  lot 7 ');
        expect(toCellValue(null)).toBeNull();
    });

    it('collapses rich text, hyperlinks and formulas', () => {
        expect(toCellValue({ richText: [{ text: 'ab' }, { text: 'c ' }] })).toBe('abc ');
        expect(toCellValue({ text: 'link', hyperlink: 'https://example.test' })).toBe('link');
        expect(toCellValue({ formula: 'A1*2', result: 8, date1904: false })).toBe(8);
        expect(toCellValue({ formula: 'A1', date1904: false })).toBeNull();
        expect(toCellValue({ formula: 'A1/0', result: { error: '#DIV/0!' }, date1904: false })).toBe('#DIV/0!');
        expect(toCellValue({ error: '#N/A' })).toBe('#N/A');
    });
});

describe('parseWorksheet', () => {
    function sheetOf(...rows: unknown[][]): ExcelJS.Worksheet {
        const ws = new ExcelJS.Workbook().addWorksheet('Lots');
        rows.forEach((row) => ws.addRow(row));
        return ws;
    }

    it('names duplicate and blank headers', () => {
        const parsed = parseWorksheet(sheetOf(
            ['id', 'id', null, 'name'],
            [1, 2, 'x', '  bob  '],
            [
                { formula: 'A2*10', result: 10 },
                { richText: [{ text: 'ab' }, { text: 'c' }] },
                { text: 'link', hyperlink: 'https://example.test' },
                { error: '#N/A' },
            ]
        ));

        expect(parsed.name).toBe('Lots');
        expect(parsed.columns).toEqual(['id', 'id_2', 'Col 3', 'name']);
        expect(parsed.data).toEqual([
            { id: 1, id_2: 2, 'Col 3': 'x', name: '  bob  ' },
            { id: 10, id_2: 'abc', 'Col 3': 'link', name: '#N/A' },
        ]);
    });

    it('never gives a repeated header the name of a real one', () => {
        const parsed = parseWorksheet(sheetOf(['a', 'a', 'a_2'], [1, 2, 3]));

        expect(parsed.columns).toEqual(['a', 'a_3', 'a_2']);
        expect(parsed.data).toEqual([{ a: 1, a_3: 2, a_2: 3 }]);
    });

    it('keeps a blank header name free for a real header', () => {
        const parsed = parseWorksheet(sheetOf(['x', null, 'Col 2'], [1, 2, 3]));

        expect(parsed.columns).toEqual(['x', 'Col 2_2', 'Col 2']);
        expect(parsed.data).toEqual([{ x: 1, 'Col 2_2': 2, 'Col 2': 3 }]);
    });

    it('keeps data to the right of the last header', () => {
        const parsed = parseWorksheet(sheetOf(['a'], [1, 'unlabelled'], [2, null, 'far']));

        expect(parsed.columns).toEqual(['a', 'Col 2', 'Col 3']);
        expect(values(parsed)).toEqual([[1, 'unlabelled', null], [2, null, 'far']]);
    });

    it('keeps interior blank rows and drops trailing ones', () => {
        const ws = sheetOf(['code'], ['first'], [null], ['   '], ['after-blank'], [null], [{ formula: 'A1' }]);

        const parsed = parseWorksheet(ws);

        expect(values(parsed)).toEqual([['first'], [null], ['   '], ['after-blank']]);
    });

    it('stores a "__proto__" header as a column', () => {
        const parsed = parseWorksheet(sheetOf(['__proto__', 'x'], [1, 2]));
        const row = parsed.data[0];

        expect(parsed.columns).toEqual(['__proto__', 'x']);
        expect(Object.keys(row)).toEqual(['__proto__', 'x']);
        expect(row['__proto__']).toBe(1);
        expect(row.x).toBe(2);
    });

    it('reads the header from a later row', () => {
        const parsed = parseWorksheet(sheetOf(['Monthly report'], ['lot', 'qty'], ['L1', 4]), 2);

        expect(parsed.columns).toEqual(['lot', 'qty']);
        expect(values(parsed)).toEqual([['L1', 4]]);
    });
});

describe('cloneTable', () => {
    it('copies rows and columns', () => {
        const original = sheet('S', ['a'], [[1]]);
        const copy = cloneTable(original);
        copy.data[0].a = 2;
        copy.columns.push('b');
        expect(original.data[0].a).toBe(1);
        expect(original.columns).toEqual(['a']);
        expect(copy.name).toBe('S');
    });
});

describe('appendSheet', () => {
    it('truncates sheet names Excel would reject', () => {
        const wb = new ExcelJS.Workbook();
        const ws = appendSheet(wb, sheet('A'.repeat(40), ['x'], [[1]]));
        expect(ws.name).toBe('A'.repeat(31));
    });

    it('writes a header row followed by the data', () => {
        const wb = new ExcelJS.Workbook();
        const ws = appendSheet(wb, sheet('S', ['id', 'val'], [[1, 'a'], [2, null]]));
        expect(ws.getRow(1).getCell(1).value).toBe('id');
        expect(ws.getRow(1).getCell(2).value).toBe('val');
        expect(ws.getRow(3).getCell(1).value).toBe(2);
        expect(ws.rowCount).toBe(3);
    });
});

describe('workbook files', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await makeTempDir();
    });

    afterEach(async () => {
        await removeDir(dir);
    });

    it('round-trips sheets through a file', async () => {
        const filePath = path.join(dir, 'book.xlsx');
        await writeWorkbook(
            workbook('book.xlsx', sheet('S1', ['id', 'val'], [[1, 'a'], [2, null]]), sheet('S2', ['x'], [])),
            filePath
        );

        const read = await readWorkbook(filePath);

        expect(read.fileName).toBe(filePath);
        expect(read.sheets.map((s) => s.name)).toEqual(['S1', 'S2']);
        expect(read.sheets[0].columns).toEqual(['id', 'val']);
        expect(values(read.sheets[0])).toEqual([[1, 'a'], [2, null]]);
        expect(read.sheets[1].columns).toEqual(['x']);
        expect(read.sheets[1].data).toEqual([]);
        expect(await listSheetNames(filePath)).toEqual(['S1', 'S2']);
    });

    it('reports an unreadable source', async () => {
        let caught: unknown;
        try {
            await readWorkbook(path.join(dir, 'missing.xlsx'));
        } catch (e) {
            caught = e;
        }
        expect(caught).toBeInstanceOf(MergeError);
        if (caught instanceof MergeError) {
            expect(caught.stage).toBe('resolve');
            expect(caught.code).toBe('SOURCE_UNREADABLE');
        }
    });
});
