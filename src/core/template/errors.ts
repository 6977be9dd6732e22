/**
 * Template errors.
 *
 * One class per compilation stage so callers can tell a typo in the
 * template (lex/parse) from a broken macro graph (resolve), a query the
 * engine could not take (generate) and a failing script (execute).
 *
 * @example
 * ```typescript
 * const [compiled, err] = attemptSync(() => compile(source))
 *
 * if (err instanceof ParseError) {
 *     console.error(`line ${err.location.line}: expected ${err.expected}, found ${err.found}`)
 * }
 * ```
 */
import type { SourceLocation } from './types.js';

/**
 * Stage a template error was raised in.
 */
export type ErrorStage = 'lex' | 'parse' | 'resolve' | 'generate' | 'execute';

/**
 * Base class for every error raised while compiling or running a template.
 */
export abstract class TemplateError extends Error {

    abstract readonly stage: ErrorStage;

}

function at(location: SourceLocation): string {

    return `line ${location.line}, column ${location.column} (byte ${location.offset})`;

}

/**
 * Malformed tag, string or section marker.
 */
export class LexError extends TemplateError {

    override readonly name = 'LexError' as const;
    readonly stage = 'lex' as const;

    constructor(
        public readonly detail: string,
        public readonly location: SourceLocation,
    ) {

        super(`${detail} at ${at(location)}`);

    }

}

/**
 * Structural violation: mismatched nesting or a directive in an illegal position.
 */
export class ParseError extends TemplateError {

    override readonly name = 'ParseError' as const;
    readonly stage = 'parse' as const;

    constructor(
        public readonly expected: string,
        public readonly found: string,
        public readonly location: SourceLocation,
        public readonly detail?: string,
    ) {

        const prefix = detail ? `${detail}: ` : '';

        super(`${prefix}expected ${expected}, found ${found} at ${at(location)}`);

    }

}

export type ResolutionReason = 'unresolved' | 'duplicate' | 'cycle' | 'arity';

/**
 * Macro graph problem: unknown, redefined, recursive or misapplied macro.
 */
export class ResolutionError extends TemplateError {

    override readonly name = 'ResolutionError' as const;
    readonly stage = 'resolve' as const;

    constructor(
        public readonly reason: ResolutionReason,
        public readonly names: string[],
        detail?: string,
    ) {

        super(ResolutionError.describe(reason, names, detail));

    }

    private static describe(reason: ResolutionReason, names: string[], detail?: string): string {

        const suffix = detail ? ` (${detail})` : '';

        switch (reason) {

        case 'unresolved':
            return `Unknown macro: ${names.join(', ')}${suffix}`;
        case 'duplicate':
            return `Macro redefined: ${names.join(', ')}${suffix}`;
        case 'cycle':
            return `Recursive macro: ${names.join(' -> ')}${suffix}`;
        case 'arity':
            return `Wrong number of arguments for macro ${names.join(', ')}${suffix}`;

        }

    }

}

export type GenerationReason = 'depth' | 'alias' | 'schema';

/**
 * The AST is well formed but cannot be turned into a query the engine takes.
 */
export class GenerationError extends TemplateError {

    override readonly name = 'GenerationError' as const;
    readonly stage = 'generate' as const;

    constructor(
        public readonly reason: GenerationReason,
        message: string,
    ) {

        super(message);

    }

}

/**
 * Part of the run an execution failure happened in.
 */
export type ExecutionStage = 'init' | 'body' | 'fini';

/**
 * Engine failure while running a template.
 *
 * `detail` is the engine's message as reported.
 */
export class ExecutionError extends TemplateError {

    override readonly name = 'ExecutionError' as const;
    readonly stage = 'execute' as const;

    constructor(
        public readonly executionStage: ExecutionStage,
        public readonly detail: string,
        options?: { cause?: unknown },
    ) {

        super(`[${executionStage}] ${detail}`, options);

    }

}
