/**
 * Environment overrides.
 *
 * Applied after settings.yml and before CLI flags:
 *
 * | variable            | setting            |
 * | ------------------- | ------------------ |
 * | `ROWCAST_DB`        | `execute.database` |
 * | `ROWCAST_PREFIX`    | `execute.prefix`   |
 * | `ROWCAST_LOG_LEVEL` | `logging.level`    |
 */
import { parseLogLevel } from './schema.js';
import type { Settings } from './types.js';

export const ENV_DATABASE = 'ROWCAST_DB';
export const ENV_PREFIX = 'ROWCAST_PREFIX';
export const ENV_LOG_LEVEL = 'ROWCAST_LOG_LEVEL';

/**
 * Return settings with environment overrides applied.
 *
 * Empty variables are ignored.
 *
 * @throws SettingsValidationError for an unknown `ROWCAST_LOG_LEVEL`
 *
 * @example
 * ```typescript
 * const settings = applyEnvironment(loaded, { ROWCAST_PREFIX: 'out' })
 * settings.execute.prefix  // 'out'
 * ```
 */
export function applyEnvironment(
    settings: Settings,
    env: Record<string, string | undefined> = process.env,
): Settings {

    const database = env[ENV_DATABASE];
    const prefix = env[ENV_PREFIX];
    const level = env[ENV_LOG_LEVEL];

    return {
        logging: {
            ...settings.logging,
            level: level ? parseLogLevel(level.toLowerCase(), ENV_LOG_LEVEL) : settings.logging.level,
        },
        compile: { ...settings.compile },
        execute: {
            ...settings.execute,
            database: database || settings.execute.database,
            prefix: prefix || settings.execute.prefix,
        },
    };

}
