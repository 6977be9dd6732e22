import { describe, it, expect } from 'vitest';

import {
    parseSettings,
    parseLogLevel,
    SettingsValidationError,
} from '../../../src/core/settings/schema.js';
import { createDefaultSettings } from '../../../src/core/settings/defaults.js';

describe('settings: schema', () => {

    describe('parseSettings', () => {

        it('should fill every default for empty input', () => {

            expect(parseSettings({})).toEqual(createDefaultSettings());
            expect(parseSettings(null)).toEqual(createDefaultSettings());

        });

        it('should keep given fields and default the rest', () => {

            const settings = parseSettings({ execute: { prefix: 'out' }, logging: { level: 'warn' } });

            expect(settings.execute).toEqual({ database: ':memory:', prefix: 'out', finiOnFailure: true });
            expect(settings.logging).toEqual({ enabled: true, level: 'warn', file: null });
            expect(settings.compile.maxExpressionDepth).toBe(1000);

        });

        it('should reject a depth below the minimum', () => {

            expect(() => parseSettings({ compile: { maxExpressionDepth: 5 } }))
                .toThrow('compile.maxExpressionDepth: maxExpressionDepth must be at least 10');

        });

        it('should report the failing field', () => {

            try {

                parseSettings({ execute: { database: '' } });
                expect.unreachable();

            }
            catch (err) {

                expect(err).toBeInstanceOf(SettingsValidationError);

                if (err instanceof SettingsValidationError) {

                    expect(err.field).toBe('execute.database');
                    expect(err.message).toBe('execute.database: Database path cannot be empty');

                }

            }

        });

    });

    describe('parseLogLevel', () => {

        it('should accept known levels', () => {

            expect(parseLogLevel('verbose')).toBe('verbose');

        });

        it('should reject unknown levels under the given field', () => {

            expect(() => parseLogLevel('loud', 'ROWCAST_LOG_LEVEL')).toThrow(SettingsValidationError);
            expect(() => parseLogLevel('loud', 'ROWCAST_LOG_LEVEL')).toThrow(/^ROWCAST_LOG_LEVEL: /);

        });

    });

});
