import { parseArgs } from 'node:util';
import { loadConfig, type ToolkitConfig } from './config';
import { HistoryStore, type HistoryEntryInput } from './db/historyStore';
import { MergeError, YieldFormulaError, describeError } from './utils/errors';
import { listSheetNames, readWorkbook } from './utils/excelParser';
import { persistWorkbook } from './utils/persistence';
import { resolveSheets } from './utils/sheetCatalog';
import { mergeWorkbookFiles, type MergeResult } from './utils/workbookMerger';
import {
    applyYield,
    defaultYieldOutputPath,
    describeYieldSpec,
    parseYieldMethod,
    type YieldColumnSpec
} from './utils/yieldCalculator';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

const USAGE = `Usage: sheetfold <command> [options]

Commands:
  merge <base.xlsx> <incoming.xlsx>   Fold new rows of incoming into base
      --out <path>                    Write here instead of overwriting base
      --dry-run                       Report statistics without writing
      --config <file>                 JSON configuration file
      --no-history                    Do not record the operation
  sheets <base.xlsx> <incoming.xlsx>  Show common and unmatched sheets
  yield <input.xlsx>                  Add yield columns
      --out <path>                    Default: <input>_with_yields.xlsx
      --sheet <name>                  Target sheet (default Sheet1)
      --column <name=method>          default | <column> | <formula>, repeatable
      --strict                        Fail on a formula that does not parse (default: fill 0)
      --config <file>
      --no-history
  history                             List recorded operations
      --limit <n>
      --clear
`;

export interface CliIO {
    out: (line: string) => void;
    err: (line: string) => void;
}

const defaultIO: CliIO = {
    out: (line) => process.stdout.write(`${line}\n`),
    err: (line) => process.stderr.write(`${line}\n`),
};

class UsageError extends Error {}

// =============================================================================
// Reporting
// =============================================================================

export function formatMergeSummary(result: MergeResult): string[] {
    const lines: string[] = [];
    if (result.mode === 'fallback') {
        lines.push('No common sheet names found. Merged the first sheet of each workbook.');
    }

    const { totals } = result;
    lines.push(`Sheets processed: ${result.workbook.sheets.length}`);
    lines.push(`Total original rows: ${totals.originalRows}`);
    lines.push(`Total rows after merge: ${totals.finalRows}`);
    lines.push(`Total new rows added: ${totals.rowsAdded}`);
    lines.push('Per-sheet breakdown:');
    result.sheetStats.forEach((s) => {
        lines.push(`  - ${s.sheetName}: ${s.originalRowCount} -> ${s.finalRowCount} (+${s.rowsAdded})`);
    });

    if (result.droppedIncomingSheets.length > 0) {
        lines.push(`Incoming-only sheets not merged: ${result.droppedIncomingSheets.join(', ')}`);
    }
    if (totals.rowsAdded === 0) {
        lines.push('No new unique rows found to add.');
    }
    return lines;
}

function openHistory(config: ToolkitConfig, enabled: boolean): HistoryStore | null {
    if (!enabled || config.historyDbPath === null) return null;
    return new HistoryStore(config.historyDbPath);
}

/**
 * Log a persisted operation. The files are already written, so a history failure is only a warning.
 */
function recordHistory(config: ToolkitConfig, enabled: boolean, entry: HistoryEntryInput, io: CliIO): void {
    let history: HistoryStore | null = null;
    try {
        history = openHistory(config, enabled);
        history?.record(entry);
    } catch (error) {
        console.error('[DB] Recording history failed:', error);
        io.err(`Warning: history not recorded: ${describeError(error)}`);
    } finally {
        history?.close();
    }
}

// =============================================================================
// Commands
// =============================================================================

async function runMerge(args: string[], io: CliIO): Promise<number> {
    const { values, positionals } = parseArgs({
        args,
        allowPositionals: true,
        options: {
            out: { type: 'string' },
            'dry-run': { type: 'boolean', default: false },
            config: { type: 'string' },
            'no-history': { type: 'boolean', default: false },
        },
    });
    const [basePath, incomingPath] = positionals;
    if (!basePath || !incomingPath || positionals.length > 2) {
        throw new UsageError('merge needs exactly two workbook paths');
    }

    const config = await loadConfig(values.config);
    const result = await mergeWorkbookFiles(basePath, incomingPath, config.merge);
    formatMergeSummary(result).forEach((line) => io.out(line));

    if (values['dry-run']) {
        io.out('Dry run: nothing written.');
        return EXIT_OK;
    }

    const targetPath = values.out ?? basePath;
    const persisted = await persistWorkbook(basePath, result.workbook, targetPath, {
        backupSuffix: config.persistence.backupSuffix,
    });
    if (!persisted.ok) throw persisted.error;

    io.out(`Saved: ${persisted.targetPath}`);
    io.out(`Backup: ${persisted.backupPath}`);

    recordHistory(config, !values['no-history'], {
        operation: 'merge',
        basePath,
        incomingPath,
        targetPath: persisted.targetPath,
        backupPath: persisted.backupPath,
        sheetsMerged: result.totals.sheetsMerged,
        rowsAdded: result.totals.rowsAdded,
        stats: result.sheetStats,
    }, io);

    return EXIT_OK;
}

async function runSheets(args: string[], io: CliIO): Promise<number> {
    const { positionals } = parseArgs({ args, allowPositionals: true, options: {} });
    const [basePath, incomingPath] = positionals;
    if (!basePath || !incomingPath) throw new UsageError('sheets needs two workbook paths');

    const catalog = resolveSheets(await listSheetNames(basePath), await listSheetNames(incomingPath));
    io.out(`Common: ${catalog.common.join(', ') || '(none)'}`);
    io.out(`Base only: ${catalog.baseOnly.join(', ') || '(none)'}`);
    io.out(`Incoming only: ${catalog.incomingOnly.join(', ') || '(none)'}`);
    if (!catalog.hasCommon) {
        io.out('No common sheets: merge will compare the first sheet of each workbook.');
    }
    return EXIT_OK;
}

function parseColumnArg(arg: string, availableColumns: string[]): YieldColumnSpec {
    const eq = arg.indexOf('=');
    if (eq <= 0) throw new UsageError(`--column expects name=method, got '${arg}'`);
    return parseYieldMethod(arg.slice(0, eq).trim(), arg.slice(eq + 1), availableColumns);
}

async function runYield(args: string[], io: CliIO): Promise<number> {
    const { values, positionals } = parseArgs({
        args,
        allowPositionals: true,
        options: {
            out: { type: 'string' },
            sheet: { type: 'string' },
            column: { type: 'string', multiple: true },
            strict: { type: 'boolean', default: false },
            config: { type: 'string' },
            'no-history': { type: 'boolean', default: false },
        },
    });
    const [inputPath] = positionals;
    if (!inputPath || positionals.length > 1) throw new UsageError('yield needs exactly one workbook path');

    const config = await loadConfig(values.config);
    const yieldConfig = { ...config.yield };
    if (values.sheet) yieldConfig.targetSheet = values.sheet;
    if (values.strict) yieldConfig.onFormulaError = 'throw';

    const workbook = await readWorkbook(inputPath, { headerRow: config.merge.headerRow });

    if (values.column && values.column.length > 0) {
        const target = workbook.sheets.find((s) => s.name === yieldConfig.targetSheet) ?? workbook.sheets[0];
        const available = target ? target.columns : [];
        yieldConfig.columns = values.column.map((arg) => parseColumnArg(arg, available));
    }

    const applied = applyYield(workbook, yieldConfig);

    const targetPath = values.out ?? defaultYieldOutputPath(inputPath);
    const persisted = await persistWorkbook(inputPath, applied.workbook, targetPath, {
        backupSuffix: config.persistence.yieldBackupSuffix,
    });
    if (!persisted.ok) throw persisted.error;

    io.out(`Modified: ${applied.sheetName}`);
    yieldConfig.columns.forEach((spec) => io.out(`  - ${describeYieldSpec(spec)}`));
    applied.zeroFilled.forEach((z) => io.out(`  ! ${z.column} set to 0: ${z.reason}`));
    io.out(`Saved: ${persisted.targetPath}`);
    io.out(`Backup: ${persisted.backupPath}`);

    recordHistory(config, !values['no-history'], {
        operation: 'yield',
        basePath: inputPath,
        targetPath: persisted.targetPath,
        backupPath: persisted.backupPath,
        sheetsMerged: 1,
        rowsAdded: 0,
        stats: { sheet: applied.sheetName, columns: yieldConfig.columns },
    }, io);

    return EXIT_OK;
}

async function runHistory(args: string[], io: CliIO): Promise<number> {
    const { values } = parseArgs({
        args,
        options: {
            limit: { type: 'string', default: '20' },
            clear: { type: 'boolean', default: false },
            config: { type: 'string' },
        },
    });
    const limit = Number(values.limit);
    if (!Number.isInteger(limit) || limit < 1) throw new UsageError('--limit must be a positive integer');

    const config = await loadConfig(values.config);
    const history = openHistory(config, true);
    if (!history) {
        io.out('History is disabled.');
        return EXIT_OK;
    }

    try {
        if (values.clear) {
            io.out(`Cleared ${history.clear()} entries.`);
            return EXIT_OK;
        }
        const entries = history.list(limit);
        if (entries.length === 0) io.out('No recorded operations.');
        entries.forEach((e) => {
            const source = e.incomingPath ? `${e.basePath} <- ${e.incomingPath}` : e.basePath;
            io.out(`#${e.id} ${e.createdAt} ${e.operation} ${source} -> ${e.targetPath} (+${e.rowsAdded} rows)`);
        });
    } finally {
        history.close();
    }
    return EXIT_OK;
}

// =============================================================================
// Entry
// =============================================================================

export async function runCli(argv: string[], io: CliIO = defaultIO): Promise<number> {
    const [command, ...rest] = argv;

    try {
        switch (command) {
            case 'merge':
                return await runMerge(rest, io);
            case 'sheets':
                return await runSheets(rest, io);
            case 'yield':
                return await runYield(rest, io);
            case 'history':
                return await runHistory(rest, io);
            case undefined:
            case 'help':
            case '--help':
            case '-h':
                io.out(USAGE);
                return command === undefined ? EXIT_USAGE : EXIT_OK;
            default:
                throw new UsageError(`Unknown command '${command}'`);
        }
    } catch (error) {
        if (error instanceof UsageError || (error instanceof TypeError && 'code' in error && String(error.code).startsWith('ERR_PARSE_ARGS'))) {
            io.err(error.message);
            io.err(USAGE);
            return EXIT_USAGE;
        }
        if (error instanceof MergeError) {
            io.err(`Failed (${error.code}): ${error.message}`);
        } else if (error instanceof YieldFormulaError) {
            io.err(`Failed: [yield] ${error.message}`);
        } else {
            console.error('[CLI] Unexpected error', error);
            io.err(`Failed: ${describeError(error)}`);
        }
        return EXIT_FAILURE;
    }
}
