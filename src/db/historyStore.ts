import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';

// -------------------------------------------------------------------------
// [Database] - Merge history log
// -------------------------------------------------------------------------

export type HistoryOperation = 'merge' | 'yield';

export interface HistoryEntryInput {
    operation: HistoryOperation;
    basePath: string;
    incomingPath?: string | null;
    targetPath: string;
    backupPath: string;
    sheetsMerged: number;
    rowsAdded: number;
    stats?: unknown;
}

export interface HistoryEntry {
    id: number;
    operation: HistoryOperation;
    basePath: string;
    incomingPath: string | null;
    targetPath: string;
    backupPath: string;
    sheetsMerged: number;
    rowsAdded: number;
    statsJson: string | null;
    createdAt: string;
}

interface HistoryRow {
    id: number;
    operation: string;
    base_path: string;
    incoming_path: string | null;
    target_path: string;
    backup_path: string;
    sheets_merged: number;
    rows_added: number;
    stats_json: string | null;
    created_at: string;
}

function toEntry(row: HistoryRow): HistoryEntry {
    return {
        id: row.id,
        operation: row.operation === 'yield' ? 'yield' : 'merge',
        basePath: row.base_path,
        incomingPath: row.incoming_path,
        targetPath: row.target_path,
        backupPath: row.backup_path,
        sheetsMerged: row.sheets_merged,
        rowsAdded: row.rows_added,
        statsJson: row.stats_json,
        createdAt: row.created_at,
    };
}

export class HistoryStore {
    private readonly db: Database.Database;

    constructor(dbPath: string) {
        if (dbPath !== ':memory:') {
            fs.mkdirSync(path.dirname(dbPath), { recursive: true });
        }
        this.db = new Database(dbPath);

        this.db.prepare(`
            CREATE TABLE IF NOT EXISTS merge_history (
                id INTEGER PRIMARY KEY AUTOINCREMENT,
                operation TEXT NOT NULL,
                base_path TEXT NOT NULL,
                incoming_path TEXT,
                target_path TEXT NOT NULL,
                backup_path TEXT NOT NULL,
                sheets_merged INTEGER NOT NULL DEFAULT 0,
                rows_added INTEGER NOT NULL DEFAULT 0,
                stats_json TEXT,
                created_at DATETIME DEFAULT CURRENT_TIMESTAMP
            )
        `).run();
    }

    record(entry: HistoryEntryInput): number {
        try {
            const stmt = this.db.prepare(`
                INSERT INTO merge_history (operation, base_path, incoming_path, target_path, backup_path, sheets_merged, rows_added, stats_json)
                VALUES (?, ?, ?, ?, ?, ?, ?, ?)
            `);
            const info = stmt.run(
                entry.operation,
                entry.basePath,
                entry.incomingPath ?? null,
                entry.targetPath,
                entry.backupPath,
                entry.sheetsMerged,
                entry.rowsAdded,
                entry.stats === undefined ? null : JSON.stringify(entry.stats)
            );
            return Number(info.lastInsertRowid);
        } catch (error) {
            console.error('[DB] Save history entry failed:', error);
            throw error;
        }
    }

    list(limit: number = 20): HistoryEntry[] {
        try {
            const rows = this.db
                .prepare<[number], HistoryRow>('SELECT * FROM merge_history ORDER BY id DESC LIMIT ?')
                .all(limit);
            return rows.map(toEntry);
        } catch (error) {
            console.error('[DB] Get history failed:', error);
            throw error;
        }
    }

    clear(): number {
        try {
            return this.db.prepare('DELETE FROM merge_history').run().changes;
        } catch (error) {
            console.error('[DB] Clear history failed:', error);
            throw error;
        }
    }

    close(): void {
        this.db.close();
    }
}
