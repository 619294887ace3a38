import fs from 'fs/promises';
import path from 'path';
import type { Workbook } from 'exceljs';
import { buildExcelWorkbook, loadExcelWorkbook, type ParsedWorkbook } from './excelParser';
import { MergeError, describeError } from './errors';

export const MERGE_BACKUP_SUFFIX = '.backup.xlsx';
export const YIELD_BACKUP_SUFFIX = '.yield_backup.xlsx';

export interface PersistOptions {
    backupSuffix?: string;
}

export type PersistResult =
    | { ok: true; targetPath: string; backupPath: string }
    | { ok: false; error: MergeError };

/**
 * Backup location beside the original: "data/lot.xlsx" -> "data/lot.backup.xlsx"
 */
export function backupPathFor(originalPath: string, suffix: string = MERGE_BACKUP_SUFFIX): string {
    const { dir, name } = path.parse(originalPath);
    return path.join(dir, `${name}${suffix}`);
}

function tempPathFor(targetPath: string): string {
    const { dir, base } = path.parse(targetPath);
    return path.join(dir, `.${base}.${process.pid}.${Date.now()}.tmp`);
}

async function removeQuietly(filePath: string): Promise<void> {
    try {
        await fs.rm(filePath, { force: true });
    } catch (error) {
        console.warn(`[Persist] Could not remove temp file ${filePath}:`, error);
    }
}

/**
 * Write a workbook through a temp file in the target directory, then rename it into place,
 * so an interrupted write never leaves a half-written target.
 */
export async function writeAtomically(workbook: Workbook, targetPath: string): Promise<void> {
    await fs.mkdir(path.dirname(targetPath), { recursive: true });

    const tempPath = tempPathFor(targetPath);
    try {
        await workbook.xlsx.writeFile(tempPath);
        await fs.rename(tempPath, targetPath);
    } catch (error) {
        await removeQuietly(tempPath);
        throw error;
    }
}

export async function createBackup(originalPath: string, suffix: string = MERGE_BACKUP_SUFFIX): Promise<string> {
    const backupPath = backupPathFor(originalPath, suffix);
    try {
        const original = await loadExcelWorkbook(originalPath);
        await writeAtomically(original, backupPath);
    } catch (error) {
        console.error(`[Persist] Backup of ${originalPath} failed:`, error);
        throw new MergeError('persist', 'BACKUP_FAILURE', `Backup failed: ${describeError(error)}`, error);
    }
    console.log(`[Persist] Backup created: ${backupPath}`);
    return backupPath;
}

/**
 * Back up the original base workbook, then write `workbook` to `targetPath`.
 * Nothing is written to `targetPath` unless the backup succeeded, and the target may not be the backup itself.
 */
export async function persistWorkbook(
    originalBasePath: string,
    workbook: ParsedWorkbook,
    targetPath: string,
    options?: PersistOptions
): Promise<PersistResult> {
    const { backupSuffix = MERGE_BACKUP_SUFFIX } = options || {};

    if (path.resolve(targetPath) === path.resolve(backupPathFor(originalBasePath, backupSuffix))) {
        return {
            ok: false,
            error: new MergeError('persist', 'INVALID_TARGET', `Target ${targetPath} is the backup location of ${originalBasePath}`),
        };
    }

    let backupPath: string;
    try {
        backupPath = await createBackup(originalBasePath, backupSuffix);
    } catch (error) {
        if (error instanceof MergeError) return { ok: false, error };
        throw error;
    }

    console.log(`[Persist] Saving merged file to: ${targetPath}`);
    try {
        await writeAtomically(buildExcelWorkbook(workbook), targetPath);
    } catch (error) {
        console.error(`[Persist] Failed to write ${targetPath}:`, error);
        return {
            ok: false,
            error: new MergeError('persist', 'WRITE_FAILURE', `Write failed (backup kept at ${backupPath}): ${describeError(error)}`, error),
        };
    }

    workbook.sheets.forEach((sheet) => {
        console.log(`[Persist] Saved sheet '${sheet.name}' with ${sheet.data.length} rows`);
    });

    return { ok: true, targetPath, backupPath };
}
