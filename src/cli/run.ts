/**
 * CLI runner.
 *
 * Everything `rowcast SOURCE` does, minus argument parsing: load settings,
 * start the logger, compile, then either print the SQL script or run it,
 * print the rendered text and write the side-effect files.
 *
 * Rendered text goes to stdout untouched. Logs go to stderr.
 *
 * @example
 * ```typescript
 * const code = await runCli(['graph.rt'], { sql: false, quiet: false, verbose: false }, {
 *     stdout: process.stdout,
 *     stderr: process.stderr,
 *     cwd: process.cwd(),
 *     env: process.env,
 * })
 * ```
 */
import { createWriteStream } from 'node:fs';
import { mkdir, readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import type { Writable } from 'node:stream';

import { attempt } from '@logosdx/utils';

import { writeEffects } from '../core/effects/index.js';
import { Logger } from '../core/logger/index.js';
import type { LogLevel } from '../core/logger/index.js';
import { SettingsManager } from '../core/settings/index.js';
import type { Settings } from '../core/settings/index.js';
import { TemplateError } from '../core/template/index.js';
import { prepare, run, toScript } from '../sdk/index.js';
import type { CliFlags, CliIo } from './types.js';

const IN_MEMORY = ':memory:';

/**
 * Run the CLI for one template.
 *
 * @returns Exit code (0 for success, 1 for any failure)
 */
export async function runCli(input: readonly string[], flags: CliFlags, io: CliIo): Promise<number> {

    const [sourcePath] = input;

    if (sourcePath === undefined || input.length > 1) {

        io.stderr.write('rowcast: expected exactly one SOURCE argument (see --help)\n');

        return 1;

    }

    const manager = new SettingsManager(io.cwd, { env: io.env });
    const [settings, settingsErr] = await attempt(() => manager.load());

    if (settingsErr) {

        io.stderr.write(`rowcast: ${settingsErr.message}\n`);

        return 1;

    }

    const logger = await createLogger(settings, flags, io, sourcePath);

    logger.start();

    const [, err] = await attempt(() => renderSource(resolve(io.cwd, sourcePath), settings, flags, io));

    // Template errors were reported by the stage that raised them
    if (err && !(err instanceof TemplateError)) {

        logger.error(err.message);

    }

    await logger.stop();

    return err ? 1 : 0;

}

function logLevel(settings: Settings, flags: CliFlags): LogLevel {

    if (flags.quiet) return 'error';
    if (flags.verbose) return 'verbose';

    return settings.logging.level;

}

/**
 * Logger on stderr, plus the settings' log file when one is set.
 *
 * The file's directory is created first; when that fails the logger runs
 * without a file.
 */
async function createLogger(settings: Settings, flags: CliFlags, io: CliIo, sourcePath: string): Promise<Logger> {

    let fileStream: Writable | undefined;

    if (settings.logging.file) {

        const filePath = resolve(io.cwd, settings.logging.file);
        const [, mkdirErr] = await attempt(() => mkdir(dirname(filePath), { recursive: true }));

        if (!mkdirErr) {

            fileStream = createWriteStream(filePath, { flags: 'a' });

        }

    }

    return new Logger({
        config: {
            enabled: settings.logging.enabled,
            level: logLevel(settings, flags),
        },
        context: { source: sourcePath },
        console: io.stderr,
        file: fileStream,
        color: io.color ?? false,
    });

}

async function renderSource(filepath: string, settings: Settings, flags: CliFlags, io: CliIo): Promise<void> {

    const source = await readFile(filepath, 'utf-8');
    const prepared = prepare(source, {
        filepath,
        maxExpressionDepth: settings.compile.maxExpressionDepth,
    });

    if (flags.sql) {

        io.stdout.write(toScript(prepared));

        return;

    }

    const database = flags.db ?? settings.execute.database;
    const prefix = flags.prefix ?? settings.execute.prefix;

    const result = await run(prepared, {
        database: database === IN_MEMORY ? database : resolve(io.cwd, database),
        finiOnFailure: settings.execute.finiOnFailure,
    });

    io.stdout.write(result.text);

    await writeEffects(result.effects, {
        prefix: prefix === null ? null : resolve(io.cwd, prefix),
    });

}
