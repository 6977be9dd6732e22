/**
 * Execution harness types.
 */

/**
 * Tables the harness itself reads through kysely.
 */
export interface EngineDatabase {
    sys_Write: {
        path: string;
        content: string | null;
    };
}

/**
 * One row of `sys_Write`: a file the template asked to be written.
 */
export interface SideEffectRecord {
    path: string;
    content: string;
}

/**
 * Options for opening an execution context.
 */
export interface EngineOptions {

    /** SQLite database file, or `:memory:` */
    database: string;
}

/**
 * Options for one template run.
 */
export interface ExecuteOptions {

    /** Run fini sections after a failed body (default true) */
    finiOnFailure?: boolean;
}

/**
 * Outcome of a successful run.
 */
export interface ExecutionResult {

    /** Value of the single column of the single row the query returned */
    text: string;

    /** `sys_Write` rows, ordered by path */
    effects: SideEffectRecord[];

    durationMs: number;
}
