/**
 * CLI type definitions.
 */
import type { Writable } from 'node:stream';

/**
 * Parsed command line flags.
 */
export interface CliFlags {

    /** Print the SQL script instead of running it */
    sql: boolean;

    /** Database file; overrides settings and `ROWCAST_DB` */
    db?: string;

    /** Directory side-effect files are written under */
    prefix?: string;

    /** Errors only on stderr */
    quiet: boolean;

    /** Every event on stderr */
    verbose: boolean;
}

/**
 * Process surface the CLI runs against.
 *
 * The entry point passes the real process; tests pass buffers.
 */
export interface CliIo {
    stdout: Writable;
    stderr: Writable;
    cwd: string;
    env: Record<string, string | undefined>;

    /** Color log lines (default false) */
    color?: boolean;
}
