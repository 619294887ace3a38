/**
 * Sheet name resolution between a base and an incoming workbook
 */

export interface SheetCatalog {
    /** Names present in both workbooks, in base order */
    common: string[];
    /** Names present only in the base workbook, in base order */
    baseOnly: string[];
    /** Names present only in the incoming workbook, in incoming order */
    incomingOnly: string[];
    hasCommon: boolean;
}

export function resolveSheets(baseSheetNames: readonly string[], incomingSheetNames: readonly string[]): SheetCatalog {
    const baseSet = new Set(baseSheetNames);
    const incomingSet = new Set(incomingSheetNames);

    const common: string[] = [];
    const baseOnly: string[] = [];

    for (const name of baseSet) {
        if (incomingSet.has(name)) common.push(name);
        else baseOnly.push(name);
    }

    const incomingOnly = [...incomingSet].filter((name) => !baseSet.has(name));

    console.log(`[Catalog] Base sheets: ${JSON.stringify([...baseSet])}`);
    console.log(`[Catalog] Incoming sheets: ${JSON.stringify([...incomingSet])}`);
    console.log(`[Catalog] Common sheets: ${JSON.stringify(common)}`);

    return {
        common,
        baseOnly,
        incomingOnly,
        hasCommon: common.length > 0,
    };
}
