import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { createRow, type CellValue, type ParsedSheet, type ParsedWorkbook, type Table } from '../utils/excelParser';

/**
 * Build a table from a header and positional rows
 */
export function table(columns: string[], rows: CellValue[][]): Table {
    return {
        columns,
        data: rows.map((values) => {
            const row = createRow();
            columns.forEach((col, i) => {
                row[col] = values[i] ?? null;
            });
            return row;
        }),
    };
}

export function sheet(name: string, columns: string[], rows: CellValue[][]): ParsedSheet {
    return { name, ...table(columns, rows) };
}

export function workbook(fileName: string, ...sheets: ParsedSheet[]): ParsedWorkbook {
    return { fileName, sheets };
}

/**
 * Rows as positional arrays, in the table's column order
 */
export function values(t: Table): CellValue[][] {
    return t.data.map((row) => t.columns.map((col) => row[col]));
}

export async function makeTempDir(prefix: string = 'sheetfold-'): Promise<string> {
    return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
    await fs.rm(dir, { recursive: true, force: true });
}
