import { describe, it, expect } from 'vitest';

import { admits, classifyEvent } from '../../../src/core/logger/classifier.js';

describe('logger: classifier', () => {

    describe('classifyEvent', () => {

        it('should classify failures and the catch-all error as error level', () => {

            expect(classifyEvent('error')).toBe('error');
            expect(classifyEvent('compile:failed')).toBe('error');
            expect(classifyEvent('stage:failed')).toBe('error');

        });

        it('should classify effect results by kind', () => {

            expect(classifyEvent('effects:warning')).toBe('warn');
            expect(classifyEvent('effects:written')).toBe('info');

        });

        it('should classify lifecycle events as debug level', () => {

            expect(classifyEvent('compile:before')).toBe('debug');
            expect(classifyEvent('stage:after')).toBe('debug');
            expect(classifyEvent('engine:open')).toBe('debug');
            expect(classifyEvent('settings:loaded')).toBe('debug');

        });

        it('should fall back on the suffix for unknown events', () => {

            expect(classifyEvent('cache:failed')).toBe('error');
            expect(classifyEvent('cache:error')).toBe('error');
            expect(classifyEvent('cache:warning')).toBe('warn');
            expect(classifyEvent('cache:written')).toBe('debug');
            expect(classifyEvent('terror')).toBe('debug');

        });

        it('should not treat inherited object keys as events', () => {

            expect(classifyEvent('toString')).toBe('debug');

        });

    });

    describe('admits', () => {

        it('should admit nothing when silent', () => {

            expect(admits('silent', 'error')).toBe(false);

        });

        it('should admit debug entries only when verbose', () => {

            expect(admits('info', 'debug')).toBe(false);
            expect(admits('verbose', 'debug')).toBe(true);

        });

        it('should compare entry severity against the configured level', () => {

            expect(admits('error', 'error')).toBe(true);
            expect(admits('error', 'warn')).toBe(false);
            expect(admits('warn', 'warn')).toBe(true);
            expect(admits('warn', 'info')).toBe(false);
            expect(admits('info', 'info')).toBe(true);

        });

    });

});
