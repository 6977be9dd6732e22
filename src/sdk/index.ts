/**
 * rowcast SDK
 *
 * Programmatic access to the template compiler and the SQLite harness.
 *
 * @example
 * ```typescript
 * import { render } from 'rowcast/sdk'
 *
 * const { text, effects } = await render(`
 * %% init
 * CREATE TABLE Edge (up, dn);
 * INSERT INTO Edge VALUES ('a', 'b');
 * %% body
 * {% for Edge sep '\\n' %}{{ up }} -> {{ dn }}{% endfor %}
 * `)
 *
 * text  // 'a -> b'
 * ```
 */
import { readFile } from 'node:fs/promises';

import { attempt } from '@logosdx/utils';

import { observer } from '../core/observer.js';
import { compile, splitSections } from '../core/template/index.js';
import type { CompileOptions } from '../core/template/index.js';
import { execute, renderScript, withExecutionContext } from '../core/engine/index.js';
import type { ExecutionResult } from '../core/engine/index.js';

import type { PreparedTemplate, RenderOptions, RunOptions } from './types.js';

// ─────────────────────────────────────────────────────────────
// Entry Points
// ─────────────────────────────────────────────────────────────

/**
 * Compile a template source without running it.
 *
 * @throws LexError, ParseError, ResolutionError or GenerationError
 */
export function prepare(source: string, options: CompileOptions = {}): PreparedTemplate {

    const compiled = compile(source, options);

    return { template: splitSections(source), compiled };

}

/**
 * Run a prepared template in a fresh database context.
 *
 * @throws ExecutionError
 */
export async function run(prepared: PreparedTemplate, options: RunOptions = {}): Promise<ExecutionResult> {

    return withExecutionContext(
        { database: options.database ?? ':memory:' },
        (ctx) => execute(ctx, prepared.template, prepared.compiled, {
            finiOnFailure: options.finiOnFailure,
        }),
    );

}

/**
 * Compile and run a template source.
 *
 * @example
 * ```typescript
 * const { text } = await render("{{ 'hello' }}")
 * // text === 'hello'
 * ```
 */
export async function render(source: string, options: RenderOptions = {}): Promise<ExecutionResult> {

    return run(prepare(source, options), options);

}

/**
 * Read, compile and run a template file.
 */
export async function renderFile(filepath: string, options: RenderOptions = {}): Promise<ExecutionResult> {

    const [source, err] = await attempt(() => readFile(filepath, 'utf-8'));

    if (err) {

        observer.emit('error', { source: 'sdk', error: err, context: { filepath } });

        throw err;

    }

    return render(source, { ...options, filepath });

}

/**
 * The SQL script a prepared template would run.
 */
export function toScript(prepared: PreparedTemplate): string {

    return renderScript(prepared.template, prepared.compiled);

}

// ─────────────────────────────────────────────────────────────
// Re-exports
// ─────────────────────────────────────────────────────────────

export type { PreparedTemplate, RenderOptions, RunOptions } from './types.js';
export type { ExecutionResult, SideEffectRecord } from '../core/engine/index.js';
export type { CompileOptions, CompiledQuery, Template } from '../core/template/index.js';

export {
    TemplateError,
    LexError,
    ParseError,
    ResolutionError,
    GenerationError,
    ExecutionError,
} from '../core/template/index.js';

export { EffectPathError, writeEffects } from '../core/effects/index.js';
export { observer } from '../core/observer.js';
