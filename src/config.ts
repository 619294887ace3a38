import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { MergeError, describeError } from './utils/errors';
import type { FingerprintStrategy } from './utils/keyManager';
import { MERGE_BACKUP_SUFFIX, YIELD_BACKUP_SUFFIX } from './utils/persistence';
import { DEFAULT_MERGE_OPTIONS, type MergeOptions } from './utils/workbookMerger';
import { DEFAULT_YIELD_CONFIG, type YieldColumnSpec, type YieldConfig } from './utils/yieldCalculator';

// =============================================================================
// Types
// =============================================================================

export interface PersistenceConfig {
    backupSuffix: string;
    yieldBackupSuffix: string;
}

export interface ToolkitConfig {
    merge: MergeOptions;
    persistence: PersistenceConfig;
    yield: YieldConfig;
    /** null disables the history log */
    historyDbPath: string | null;
}

export type Env = Record<string, string | undefined>;

export function defaultHistoryDbPath(): string {
    return path.join(os.homedir(), '.sheetfold', 'history.db');
}

export function defaultConfig(): ToolkitConfig {
    return {
        merge: { ...DEFAULT_MERGE_OPTIONS },
        persistence: {
            backupSuffix: MERGE_BACKUP_SUFFIX,
            yieldBackupSuffix: YIELD_BACKUP_SUFFIX,
        },
        yield: {
            targetSheet: DEFAULT_YIELD_CONFIG.targetSheet,
            columns: DEFAULT_YIELD_CONFIG.columns.map((c) => ({ ...c })),
            onFormulaError: DEFAULT_YIELD_CONFIG.onFormulaError,
        },
        historyDbPath: defaultHistoryDbPath(),
    };
}

// =============================================================================
// Validation
// =============================================================================

function invalid(message: string): MergeError {
    return new MergeError('resolve', 'INVALID_CONFIG', message);
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFingerprint(value: unknown): value is FingerprintStrategy {
    return value === 'exact' || value === 'sha256';
}

function readBoolean(source: Record<string, unknown>, key: string, fallback: boolean): boolean {
    const value = source[key];
    if (value === undefined) return fallback;
    if (typeof value !== 'boolean') throw invalid(`'${key}' must be a boolean`);
    return value;
}

function readString(source: Record<string, unknown>, key: string, fallback: string): string {
    const value = source[key];
    if (value === undefined) return fallback;
    if (typeof value !== 'string' || value === '') throw invalid(`'${key}' must be a non-empty string`);
    return value;
}

function parseColumnSpec(value: unknown, index: number): YieldColumnSpec {
    if (!isRecord(value)) throw invalid(`yield.columns[${index}] must be an object`);
    const { column, mode } = value;
    if (typeof column !== 'string' || column === '') throw invalid(`yield.columns[${index}].column must be a non-empty string`);

    switch (mode) {
        case 'constant':
            if (typeof value.value !== 'number') throw invalid(`yield.columns[${index}].value must be a number`);
            return { column, mode: 'constant', value: value.value };
        case 'copyColumn':
            if (typeof value.source !== 'string') throw invalid(`yield.columns[${index}].source must be a string`);
            return { column, mode: 'copyColumn', source: value.source };
        case 'expression':
            if (typeof value.formula !== 'string') throw invalid(`yield.columns[${index}].formula must be a string`);
            return { column, mode: 'expression', formula: value.formula };
        default:
            throw invalid(`yield.columns[${index}].mode must be constant, copyColumn or expression`);
    }
}

/**
 * Layer a parsed JSON document over a base configuration
 */
export function mergeConfig(base: ToolkitConfig, raw: unknown): ToolkitConfig {
    if (!isRecord(raw)) throw invalid('Configuration must be a JSON object');
    const config: ToolkitConfig = {
        merge: { ...base.merge },
        persistence: { ...base.persistence },
        yield: { ...base.yield, columns: [...base.yield.columns] },
        historyDbPath: base.historyDbPath,
    };

    if (raw.merge !== undefined) {
        if (!isRecord(raw.merge)) throw invalid("'merge' must be an object");
        const merge = raw.merge;
        if (merge.fingerprint !== undefined) {
            if (!isFingerprint(merge.fingerprint)) throw invalid("'fingerprint' must be 'exact' or 'sha256'");
            config.merge.fingerprint = merge.fingerprint;
        }
        config.merge.dropRepeatedIncoming = readBoolean(merge, 'dropRepeatedIncoming', config.merge.dropRepeatedIncoming);
        config.merge.appendIncomingOnlySheets = readBoolean(merge, 'appendIncomingOnlySheets', config.merge.appendIncomingOnlySheets);
        if (merge.headerRow !== undefined) {
            if (typeof merge.headerRow !== 'number' || !Number.isInteger(merge.headerRow) || merge.headerRow < 1) {
                throw invalid("'headerRow' must be a positive integer");
            }
            config.merge.headerRow = merge.headerRow;
        }
    }

    if (raw.persistence !== undefined) {
        if (!isRecord(raw.persistence)) throw invalid("'persistence' must be an object");
        config.persistence.backupSuffix = readString(raw.persistence, 'backupSuffix', config.persistence.backupSuffix);
        config.persistence.yieldBackupSuffix = readString(raw.persistence, 'yieldBackupSuffix', config.persistence.yieldBackupSuffix);
    }

    if (raw.yield !== undefined) {
        if (!isRecord(raw.yield)) throw invalid("'yield' must be an object");
        config.yield.targetSheet = readString(raw.yield, 'targetSheet', config.yield.targetSheet);
        const onFormulaError = raw.yield.onFormulaError;
        if (onFormulaError !== undefined) {
            if (onFormulaError !== 'zero' && onFormulaError !== 'throw') throw invalid("'onFormulaError' must be 'zero' or 'throw'");
            config.yield.onFormulaError = onFormulaError;
        }
        const columns = raw.yield.columns;
        if (columns !== undefined) {
            if (!Array.isArray(columns)) throw invalid("'yield.columns' must be an array");
            config.yield.columns = columns.map((c: unknown, i: number) => parseColumnSpec(c, i));
        }
    }

    const historyDbPath = raw.historyDbPath;
    if (historyDbPath === null || typeof historyDbPath === 'string') {
        config.historyDbPath = historyDbPath;
    } else if (historyDbPath !== undefined) {
        throw invalid("'historyDbPath' must be a string or null");
    }

    return config;
}

export function applyEnv(base: ToolkitConfig, env: Env): ToolkitConfig {
    const config: ToolkitConfig = {
        ...base,
        merge: { ...base.merge },
        yield: { ...base.yield },
    };

    const historyDb = env.SHEETFOLD_HISTORY_DB;
    if (historyDb !== undefined && historyDb !== '') {
        config.historyDbPath = historyDb.toLowerCase() === 'off' ? null : historyDb;
    }

    const fingerprint = env.SHEETFOLD_FINGERPRINT;
    if (fingerprint !== undefined && fingerprint !== '') {
        if (!isFingerprint(fingerprint)) throw invalid("SHEETFOLD_FINGERPRINT must be 'exact' or 'sha256'");
        config.merge.fingerprint = fingerprint;
    }

    const targetSheet = env.SHEETFOLD_TARGET_SHEET;
    if (targetSheet !== undefined && targetSheet !== '') {
        config.yield.targetSheet = targetSheet;
    }

    return config;
}

/**
 * Defaults, then the JSON file (when given), then environment variables
 */
export async function loadConfig(filePath?: string, env: Env = process.env): Promise<ToolkitConfig> {
    let config = defaultConfig();

    if (filePath) {
        let text: string;
        try {
            text = await fs.readFile(filePath, 'utf8');
        } catch (error) {
            throw new MergeError('resolve', 'INVALID_CONFIG', `Cannot read config ${filePath}: ${describeError(error)}`, error);
        }

        let raw: unknown;
        try {
            raw = JSON.parse(text);
        } catch (error) {
            throw new MergeError('resolve', 'INVALID_CONFIG', `Config ${filePath} is not valid JSON: ${describeError(error)}`, error);
        }

        config = mergeConfig(config, raw);
        console.log(`[Config] Loaded ${filePath}`);
    }

    return applyEnv(config, env);
}
