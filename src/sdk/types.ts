/**
 * SDK Types
 *
 * Options accepted by the programmatic API.
 */
import type { CompileOptions } from '../core/template/index.js';
import type { CompiledQuery, Template } from '../core/template/index.js';

/**
 * A compiled template together with its sections, ready to run.
 */
export interface PreparedTemplate {
    template: Template;
    compiled: CompiledQuery;
}

/**
 * Options for running a prepared template.
 */
export interface RunOptions {

    /** SQLite database file, or `:memory:` (default) */
    database?: string;

    /** Run fini sections after a failed body (default true) */
    finiOnFailure?: boolean;
}

/**
 * Options for compiling and running in one call.
 */
export interface RenderOptions extends CompileOptions, RunOptions {}
