/**
 * Error types shared by the merge pipeline and the yield layer
 */

export type MergeStage = 'resolve' | 'align' | 'detect' | 'merge' | 'persist' | 'yield';

export type MergeErrorCode =
    | 'SOURCE_UNREADABLE'
    | 'NO_SHEETS'
    | 'BACKUP_FAILURE'
    | 'WRITE_FAILURE'
    | 'INVALID_TARGET'
    | 'MERGE_FAILURE'
    | 'INVALID_CONFIG';

export class MergeError extends Error {
    readonly stage: MergeStage;
    readonly code: MergeErrorCode;

    constructor(stage: MergeStage, code: MergeErrorCode, message: string, cause?: unknown) {
        super(`[${stage}] ${message}`, cause === undefined ? undefined : { cause });
        this.name = 'MergeError';
        this.stage = stage;
        this.code = code;
    }
}

export class YieldFormulaError extends Error {
    readonly position: number;

    constructor(message: string, position: number) {
        super(`${message} at position ${position}`);
        this.name = 'YieldFormulaError';
        this.position = position;
    }
}

/**
 * Human-readable detail of an unknown thrown value
 */
export function describeError(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}

/**
 * Run a synchronous pipeline step, tagging anything it throws with the stage it failed in
 */
export function guardStage<T>(stage: MergeStage, message: string, step: () => T): T {
    try {
        return step();
    } catch (e) {
        if (e instanceof MergeError) throw e;
        console.error(`[${stage}] ${message}`, e);
        throw new MergeError(stage, 'MERGE_FAILURE', `${message}: ${describeError(e)}`, e);
    }
}
