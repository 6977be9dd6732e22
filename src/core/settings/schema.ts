/**
 * Settings Zod schemas and validation.
 *
 * Settings control logging, compilation limits and how templates are run.
 * Validated on load; every field has a default, so an empty file is valid.
 */
import { z } from 'zod';

// ─────────────────────────────────────────────────────────────
// Base Schemas
// ─────────────────────────────────────────────────────────────

/**
 * Log level.
 */
export const LogLevelSchema = z.enum(['silent', 'error', 'warn', 'info', 'verbose']);

// ─────────────────────────────────────────────────────────────
// Section Schemas
// ─────────────────────────────────────────────────────────────

/**
 * Logging configuration schema.
 */
const LoggingConfigSchema = z.object({
    enabled: z.boolean().default(true),
    level: LogLevelSchema.default('info'),
    file: z.string().min(1).nullable().default(null),
});

/**
 * Compilation configuration schema.
 */
const CompileConfigSchema = z.object({
    maxExpressionDepth: z
        .number()
        .int()
        .min(10, 'maxExpressionDepth must be at least 10')
        .default(1000),
});

/**
 * Execution configuration schema.
 */
const ExecuteConfigSchema = z.object({
    database: z.string().min(1, 'Database path cannot be empty').default(':memory:'),
    prefix: z.string().min(1, 'Prefix cannot be empty').nullable().default(null),
    finiOnFailure: z.boolean().default(true),
});

// ─────────────────────────────────────────────────────────────
// Main Settings Schema
// ─────────────────────────────────────────────────────────────

/**
 * Complete settings schema.
 */
export const SettingsSchema = z.object({
    logging: LoggingConfigSchema.default({}),
    compile: CompileConfigSchema.default({}),
    execute: ExecuteConfigSchema.default({}),
});

// ─────────────────────────────────────────────────────────────
// Type Exports
// ─────────────────────────────────────────────────────────────

export type SettingsSchemaType = z.infer<typeof SettingsSchema>;
export type SettingsInput = z.input<typeof SettingsSchema>;
export type LoggingConfigSchemaType = z.infer<typeof LoggingConfigSchema>;
export type CompileConfigSchemaType = z.infer<typeof CompileConfigSchema>;
export type ExecuteConfigSchemaType = z.infer<typeof ExecuteConfigSchema>;

// ─────────────────────────────────────────────────────────────
// Validation Error
// ─────────────────────────────────────────────────────────────

/**
 * Error thrown when settings validation fails.
 */
export class SettingsValidationError extends Error {

    override readonly name = 'SettingsValidationError' as const;

    constructor(
        message: string,
        public readonly field: string,
        public readonly issues: z.ZodIssue[],
    ) {

        super(message);

    }

}

// ─────────────────────────────────────────────────────────────
// Validation Functions
// ─────────────────────────────────────────────────────────────

function fail(issues: z.ZodIssue[], fallback: string): never {

    const firstIssue = issues[0];
    const field = firstIssue?.path.join('.') || 'unknown';

    throw new SettingsValidationError(
        `${field}: ${firstIssue?.message ?? fallback}`,
        field,
        issues,
    );

}

/**
 * Parse and validate settings, filling defaults for missing fields.
 *
 * @throws SettingsValidationError if validation fails
 *
 * @example
 * ```typescript
 * const settings = parseSettings({ execute: { prefix: 'out' } })
 * // settings.logging.level === 'info' (default)
 * // settings.execute.database === ':memory:' (default)
 * ```
 */
export function parseSettings(settings: unknown): SettingsSchemaType {

    const result = SettingsSchema.safeParse(settings ?? {});

    if (!result.success) {

        fail(result.error.issues, 'Settings validation failed');

    }

    return result.data;

}

/**
 * Parse a log level from untyped input (environment, flags).
 *
 * @throws SettingsValidationError for an unknown level
 */
export function parseLogLevel(value: unknown, field = 'logging.level'): z.infer<typeof LogLevelSchema> {

    const result = LogLevelSchema.safeParse(value);

    if (!result.success) {

        fail(result.error.issues.map((issue) => ({ ...issue, path: field.split('.') })), 'Invalid log level');

    }

    return result.data;

}
