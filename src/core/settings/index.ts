/**
 * Settings Module
 *
 * Project settings from .rowcast/settings.yml, with `ROWCAST_*`
 * environment overrides.
 */

// Types
export type {
    LoggingConfig,
    CompileConfig,
    ExecuteConfig,
    Settings,
} from './types.js';

// Schemas and Validation
export {
    SettingsSchema,
    LogLevelSchema,
    SettingsValidationError,
    parseSettings,
    parseLogLevel,
} from './schema.js';

export type {
    SettingsSchemaType,
    SettingsInput,
    LoggingConfigSchemaType,
    CompileConfigSchemaType,
    ExecuteConfigSchemaType,
} from './schema.js';

// Defaults
export {
    DEFAULT_LOGGING_CONFIG,
    DEFAULT_COMPILE_CONFIG,
    DEFAULT_EXECUTE_CONFIG,
    SETTINGS_FILE_PATH,
    SETTINGS_DIR_PATH,
    createDefaultSettings,
} from './defaults.js';

// Environment
export { applyEnvironment, ENV_DATABASE, ENV_PREFIX, ENV_LOG_LEVEL } from './env.js';

// Manager
export { SettingsManager } from './manager.js';

export type { SettingsManagerOptions } from './manager.js';
