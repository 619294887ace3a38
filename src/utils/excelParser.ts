import ExcelJS from 'exceljs';
import { MergeError } from './errors';

// =============================================================================
// Interfaces
// =============================================================================

export type CellValue = string | number | boolean | Date | null;

export type Row = Record<string, CellValue>;

export interface Table {
    columns: string[];
    data: Row[];
}

export interface ParsedSheet extends Table {
    name: string;
}

export interface ParsedWorkbook {
    fileName: string;
    sheets: ParsedSheet[];
}

export interface ReadOptions {
    headerRow?: number;
}

// Excel refuses longer sheet names
const MAX_SHEET_NAME = 31;

// =============================================================================
// Model helpers
// =============================================================================

/**
 * Empty row without a prototype, so a column named "__proto__" is stored like any other
 */
export function createRow(values?: Row): Row {
    const row: Row = Object.create(null);
    return values ? Object.assign(row, values) : row;
}

export function cloneTable<T extends Table>(table: T): T {
    return {
        ...table,
        columns: [...table.columns],
        data: table.data.map((row) => createRow(row)),
    };
}

export function getSheet(workbook: ParsedWorkbook, name: string): ParsedSheet | undefined {
    return workbook.sheets.find((s) => s.name === name);
}

// =============================================================================
// Parser
// =============================================================================

/**
 * Convert an exceljs cell value into the table model.
 * Text is kept as stored; rich text, hyperlinks and formulas collapse to the text or cached result Excel shows.
 */
export function toCellValue(value: ExcelJS.CellValue): CellValue {
    if (value === null || value === undefined) return null;
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
    if (value instanceof Date) return value;

    if ('richText' in value) {
        return value.richText.map((t) => t.text).join('');
    }
    if ('hyperlink' in value) {
        return toCellValue(value.text);
    }
    if ('formula' in value || 'sharedFormula' in value) {
        const result = value.result;
        if (result === undefined) return null;
        if (typeof result === 'object' && !(result instanceof Date)) return result.error;
        return toCellValue(result);
    }
    if ('error' in value) return value.error;

    return null;
}

function headerText(cell: ExcelJS.Cell): string {
    const value = toCellValue(cell.value);
    if (value === null) return '';
    if (value instanceof Date) return value.toISOString();
    return String(value);
}

/**
 * Header names for `width` columns. Blank headers become `Col N`; repeated headers get `_2`, `_3`...
 * A generated name never takes a name that appears as a real header.
 */
function resolveHeaders(rawHeaders: string[], width: number): string[] {
    const reserved = new Set(rawHeaders.filter((h) => h !== ''));
    const assigned = new Set<string>();
    const columns: string[] = [];

    for (let i = 0; i < width; i++) {
        const raw = rawHeaders[i] ?? '';
        const generated = raw === '';
        const base = generated ? `Col ${i + 1}` : raw;

        let name = base;
        if (assigned.has(name) || (generated && reserved.has(name))) {
            let n = 2;
            while (assigned.has(`${base}_${n}`) || reserved.has(`${base}_${n}`)) n++;
            name = `${base}_${n}`;
        }

        assigned.add(name);
        columns.push(name);
    }

    return columns;
}

export function parseWorksheet(worksheet: ExcelJS.Worksheet, headerRowNumber: number = 1): ParsedSheet {
    const rawHeaders: string[] = [];
    worksheet.getRow(headerRowNumber).eachCell({ includeEmpty: false }, (cell, colNumber) => {
        rawHeaders[colNumber - 1] = headerText(cell);
    });

    // Data to the right of the last header cell still gets a column
    let width = rawHeaders.length;
    let lastRowNumber = headerRowNumber;
    worksheet.eachRow((row, rowNumber) => {
        if (rowNumber <= headerRowNumber) return;
        lastRowNumber = rowNumber;
        row.eachCell({ includeEmpty: false }, (_cell, colNumber) => {
            if (colNumber > width) width = colNumber;
        });
    });

    const columns = resolveHeaders(rawHeaders, width);
    const data: Row[] = [];

    // Interior blank rows are kept as all-null rows
    for (let rowNumber = headerRowNumber + 1; rowNumber <= lastRowNumber; rowNumber++) {
        const row = worksheet.findRow(rowNumber);
        const rowData = createRow();
        columns.forEach((colName, idx) => {
            rowData[colName] = row ? toCellValue(row.getCell(idx + 1).value) : null;
        });
        data.push(rowData);
    }

    // Trailing rows without values are not data
    while (data.length > 0 && columns.every((col) => data[data.length - 1][col] === null)) {
        data.pop();
    }

    return { name: worksheet.name, columns, data };
}

export async function loadExcelWorkbook(filePath: string): Promise<ExcelJS.Workbook> {
    const workbook = new ExcelJS.Workbook();
    try {
        await workbook.xlsx.readFile(filePath);
    } catch (e) {
        console.error(`[ExcelParser] Error loading workbook ${filePath}`, e);
        throw new MergeError('resolve', 'SOURCE_UNREADABLE', `Cannot read workbook ${filePath}`, e);
    }
    return workbook;
}

export async function readWorkbook(filePath: string, options?: ReadOptions): Promise<ParsedWorkbook> {
    const { headerRow = 1 } = options || {};
    const workbook = await loadExcelWorkbook(filePath);

    const sheets = workbook.worksheets.map((worksheet) => {
        const sheet = parseWorksheet(worksheet, headerRow);
        console.log(`[ExcelParser] ${filePath} sheet '${sheet.name}': ${sheet.data.length} rows, ${sheet.columns.length} columns`);
        return sheet;
    });

    return { fileName: filePath, sheets };
}

export async function listSheetNames(filePath: string): Promise<string[]> {
    const workbook = await loadExcelWorkbook(filePath);
    return workbook.worksheets.map((ws) => ws.name);
}

// =============================================================================
// Exporter
// =============================================================================

function formatHeader(worksheet: ExcelJS.Worksheet) {
    const headerRow = worksheet.getRow(1);
    headerRow.eachCell((cell) => {
        cell.fill = {
            type: 'pattern',
            pattern: 'solid',
            fgColor: { argb: 'FFD7E4BC' } // Light Green
        };
        cell.font = { bold: true, color: { argb: 'FF000000' } };
        cell.border = {
            top: { style: 'thin' },
            left: { style: 'thin' },
            bottom: { style: 'thin' },
            right: { style: 'thin' }
        };
    });
}

function autoFitColumns(worksheet: ExcelJS.Worksheet, columnCount: number) {
    for (let i = 1; i <= columnCount; i++) {
        const column = worksheet.getColumn(i);
        let maxLength = 0;
        column.eachCell({ includeEmpty: true }, (cell) => {
            const len = cell.value === null || cell.value === undefined ? 0 : String(cell.value).length;
            if (len > maxLength) maxLength = len;
        });
        column.width = Math.min(Math.max(maxLength + 2, 10), 50);
    }
}

export function appendSheet(workbook: ExcelJS.Workbook, sheet: ParsedSheet): ExcelJS.Worksheet {
    const worksheet = workbook.addWorksheet(sheet.name.substring(0, MAX_SHEET_NAME));

    if (sheet.columns.length === 0) return worksheet;

    worksheet.addRow(sheet.columns);
    sheet.data.forEach((row) => {
        worksheet.addRow(sheet.columns.map((col) => row[col] ?? null));
    });

    formatHeader(worksheet);
    worksheet.autoFilter = {
        from: { row: 1, column: 1 },
        to: { row: sheet.data.length + 1, column: sheet.columns.length }
    };
    autoFitColumns(worksheet, sheet.columns.length);

    return worksheet;
}

export function buildExcelWorkbook(parsed: ParsedWorkbook): ExcelJS.Workbook {
    const workbook = new ExcelJS.Workbook();
    parsed.sheets.forEach((sheet) => appendSheet(workbook, sheet));
    return workbook;
}

export async function writeWorkbook(parsed: ParsedWorkbook, filePath: string): Promise<void> {
    const workbook = buildExcelWorkbook(parsed);
    await workbook.xlsx.writeFile(filePath);
}
