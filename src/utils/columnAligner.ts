import { cloneTable, createRow, type Table } from './excelParser';

export interface AlignedPair<T extends Table> {
    alignedBase: T;
    alignedIncoming: T;
    allColumns: string[];
    addedToBase: string[];
    addedToIncoming: string[];
}

/**
 * Sorted union of both column sets (UTF-16 code unit order, same as Array.prototype.sort)
 */
export function unionColumns(a: readonly string[], b: readonly string[]): string[] {
    return [...new Set([...a, ...b])].sort();
}

function conformTo<T extends Table>(table: T, allColumns: string[]): { table: T; added: string[] } {
    const copy = cloneTable(table);
    const present = new Set(copy.columns);
    const added = allColumns.filter((col) => !present.has(col));

    copy.data = copy.data.map((row) => {
        const ordered = createRow();
        allColumns.forEach((col) => {
            ordered[col] = present.has(col) ? row[col] ?? null : null;
        });
        return ordered;
    });
    copy.columns = [...allColumns];

    return { table: copy, added };
}

/**
 * Bring two tables to the same column set and order.
 * Missing columns are null-filled; row counts and row order are unchanged; inputs are not touched.
 */
export function alignColumns<T extends Table>(base: T, incoming: T): AlignedPair<T> {
    const allColumns = unionColumns(base.columns, incoming.columns);

    const baseResult = conformTo(base, allColumns);
    const incomingResult = conformTo(incoming, allColumns);

    baseResult.added.forEach((col) => console.log(`[Aligner] Added missing column '${col}' to base table`));
    incomingResult.added.forEach((col) => console.log(`[Aligner] Added missing column '${col}' to incoming table`));

    return {
        alignedBase: baseResult.table,
        alignedIncoming: incomingResult.table,
        allColumns,
        addedToBase: baseResult.added,
        addedToIncoming: incomingResult.added,
    };
}
