import path from 'path';
import { cloneTable, getSheet, type ParsedSheet, type ParsedWorkbook, type Row, type Table } from './excelParser';
import { MergeError, YieldFormulaError } from './errors';
import { evaluateFormula, parseFormula, referencedColumns, type FormulaNode } from './yieldFormula';

// =============================================================================
// Types
// =============================================================================

export type YieldColumnSpec =
    | { column: string; mode: 'constant'; value: number }
    | { column: string; mode: 'copyColumn'; source: string }
    | { column: string; mode: 'expression'; formula: string };

/** What a formula that does not parse does: fill its column with 0 (with a warning), or fail the run */
export type FormulaErrorPolicy = 'zero' | 'throw';

export interface YieldConfig {
    targetSheet: string;
    columns: YieldColumnSpec[];
    onFormulaError: FormulaErrorPolicy;
}

export const DEFAULT_YIELD_COLUMNS: YieldColumnSpec[] = [
    { column: 'e_yield', mode: 'expression', formula: '[Data 2] / [Data 3]' },
    { column: 'asm_yield', mode: 'expression', formula: '[Data 1] / [Data 2]' },
];

export const DEFAULT_YIELD_CONFIG: YieldConfig = {
    targetSheet: 'Sheet1',
    columns: DEFAULT_YIELD_COLUMNS,
    onFormulaError: 'zero',
};

export interface ZeroFilledColumn {
    column: string;
    reason: string;
}

export interface YieldApplyResult {
    workbook: ParsedWorkbook;
    /** Sheet that received the yield columns */
    sheetName: string;
    /** Columns filled with 0 because an operand was missing or the formula did not parse */
    zeroFilled: ZeroFilledColumn[];
}

// =============================================================================
// Column methods
// =============================================================================

/**
 * Interpret the free-text method convention:
 * "default" sets 0, an existing column name copies that column, anything else is a formula.
 */
export function parseYieldMethod(column: string, method: string, availableColumns: readonly string[]): YieldColumnSpec {
    const trimmed = method.trim();
    if (trimmed.toLowerCase() === 'default') return { column, mode: 'constant', value: 0 };
    if (availableColumns.includes(trimmed)) return { column, mode: 'copyColumn', source: trimmed };
    return { column, mode: 'expression', formula: trimmed };
}

export function describeYieldSpec(spec: YieldColumnSpec): string {
    switch (spec.mode) {
        case 'constant':
            return `${spec.column} = ${spec.value}`;
        case 'copyColumn':
            return `${spec.column} = copy of '${spec.source}'`;
        case 'expression':
            return `${spec.column} = ${spec.formula}`;
    }
}

// =============================================================================
// Column derivation
// =============================================================================

type CellProducer = (row: Row) => Row[string];

interface CompiledSpec {
    produce: CellProducer;
    /** Set when the column falls back to 0 */
    problem?: string;
}

const zero: CellProducer = () => 0;

function compileSpec(spec: YieldColumnSpec, present: ReadonlySet<string>, onFormulaError: FormulaErrorPolicy): CompiledSpec {
    switch (spec.mode) {
        case 'constant': {
            const value = spec.value;
            return { produce: () => value };
        }
        case 'copyColumn': {
            const source = spec.source;
            if (!present.has(source)) return { produce: zero, problem: `missing columns ${JSON.stringify([source])}` };
            return { produce: (row) => row[source] ?? null };
        }
        case 'expression': {
            let node: FormulaNode;
            try {
                node = parseFormula(spec.formula);
            } catch (error) {
                if (onFormulaError === 'throw' || !(error instanceof YieldFormulaError)) throw error;
                return { produce: zero, problem: `invalid formula: ${error.message}` };
            }
            const missing = referencedColumns(node).filter((c) => !present.has(c));
            if (missing.length > 0) return { produce: zero, problem: `missing columns ${JSON.stringify(missing)}` };
            return { produce: (row) => evaluateFormula(node, row) };
        }
    }
}

export interface AddYieldOptions {
    onFormulaError?: FormulaErrorPolicy;
}

/**
 * Append (or overwrite) derived columns. The input table is not modified.
 */
export function addYieldColumns<T extends Table>(
    table: T,
    specs: readonly YieldColumnSpec[],
    options?: AddYieldOptions
): { table: T; zeroFilled: ZeroFilledColumn[] } {
    const { onFormulaError = 'zero' } = options || {};
    const result = cloneTable(table);
    const zeroFilled: ZeroFilledColumn[] = [];

    for (const spec of specs) {
        // Later specs may build on columns added by earlier ones
        const present = new Set(result.columns);
        const { produce, problem } = compileSpec(spec, present, onFormulaError);

        if (problem) {
            console.warn(`[Yield] ${spec.column}: ${problem}. Setting ${spec.column} to 0 for all rows`);
            zeroFilled.push({ column: spec.column, reason: problem });
        } else {
            console.log(`[Yield] Calculated ${describeYieldSpec(spec)}`);
        }

        result.data.forEach((row) => {
            row[spec.column] = produce(row);
        });
        if (!present.has(spec.column)) result.columns.push(spec.column);
    }

    return { table: result, zeroFilled };
}

/**
 * Apply the yield columns to the configured sheet, leaving every other sheet as it is.
 * Falls back to the first sheet when the configured one does not exist.
 */
export function applyYield(workbook: ParsedWorkbook, config: YieldConfig): YieldApplyResult {
    let target: ParsedSheet | undefined = getSheet(workbook, config.targetSheet);
    if (!target) {
        target = workbook.sheets[0];
        if (!target) throw new MergeError('yield', 'NO_SHEETS', 'Workbook has no sheets');
        console.warn(`[Yield] '${config.targetSheet}' not found. Using first sheet '${target.name}' instead`);
    }

    const targetName = target.name;
    const { table, zeroFilled } = addYieldColumns(target, config.columns, { onFormulaError: config.onFormulaError });

    const sheets = workbook.sheets.map((sheet) => (sheet.name === targetName ? table : cloneTable(sheet)));
    console.log(`[Yield] Added yield columns to '${targetName}'. Final shape: ${table.data.length} rows, ${table.columns.length} columns`);

    return {
        workbook: { fileName: workbook.fileName, sheets },
        sheetName: targetName,
        zeroFilled,
    };
}

/**
 * "runs/lot7.xlsx" -> "runs/lot7_with_yields.xlsx"
 */
export function defaultYieldOutputPath(inputPath: string): string {
    const { dir, name, ext } = path.parse(inputPath);
    return path.join(dir, `${name}_with_yields${ext}`);
}
