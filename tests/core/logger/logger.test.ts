import { describe, it, expect, afterEach } from 'vitest';
import { Writable } from 'node:stream';

import { Logger } from '../../../src/core/logger/logger.js';
import { observer } from '../../../src/core/observer.js';

/**
 * Writable that keeps what it is given. Lines come back without their
 * leading timestamp.
 */
function collect() {

    const chunks: string[] = [];

    const stream = new Writable({
        write(chunk: Buffer | string, _encoding, callback) {

            chunks.push(chunk.toString());
            callback();

        },
    });

    return {
        stream,
        raw: () => chunks.join(''),
        lines: () => chunks
            .join('')
            .split('\n')
            .filter(Boolean)
            .map((line) => line.replace(/^\[[^\]]+\] /, '')),
    };

}

describe('logger: Logger', () => {

    const loggers: Logger[] = [];

    function make(...args: ConstructorParameters<typeof Logger>): Logger {

        const logger = new Logger(...args);
        loggers.push(logger);

        return logger;

    }

    afterEach(async () => {

        await Promise.all(loggers.splice(0).map((logger) => logger.stop()));

    });

    it('should move from idle to running to stopped', async () => {

        const logger = make();

        expect(logger.state).toBe('idle');

        logger.start();
        expect(logger.state).toBe('running');

        await logger.stop();
        expect(logger.state).toBe('stopped');

    });

    it('should not start when level is silent', () => {

        const logger = make({ config: { level: 'silent' } });

        logger.start();

        expect(logger.isEnabled).toBe(false);
        expect(logger.state).toBe('idle');

    });

    it('should write events at or above the configured level', () => {

        const sink = collect();
        const logger = make({ config: { level: 'info' }, console: sink.stream });

        logger.start();

        observer.emit('compile:before', { filepath: 'a.rt', bytes: 5 });
        observer.emit('effects:written', { path: 'a.txt', bytes: 3 });
        observer.emit('effects:warning', { message: '1 side-effect file(s) not written: no prefix directory given', count: 1 });

        expect(sink.lines()).toEqual([
            '[INFO ] [effects:written] Wrote a.txt (3 bytes)',
            '[WARN ] [effects:warning] 1 side-effect file(s) not written: no prefix directory given',
        ]);

    });

    it('should include event data at verbose level', () => {

        const sink = collect();
        const logger = make({ config: { level: 'verbose' }, console: sink.stream });

        logger.start();

        observer.emit('compile:before', { filepath: 'a.rt', bytes: 5 });

        expect(sink.lines()).toEqual([
            '[DEBUG] [compile:before] Compiling a.rt (5 bytes) {"filepath":"a.rt","bytes":5}',
        ]);

    });

    it('should stop writing after stop', async () => {

        const sink = collect();
        const logger = make({ console: sink.stream });

        logger.start();
        await logger.stop();

        observer.emit('effects:written', { path: 'a.txt', bytes: 3 });

        expect(sink.lines()).toEqual([]);

    });

    it('should write direct messages under the log event', () => {

        const sink = collect();
        const logger = make({ config: { level: 'warn' }, console: sink.stream });

        logger.start();

        logger.error('boom');
        logger.warn('careful');
        logger.info('hidden');
        logger.debug('hidden too');

        expect(sink.lines()).toEqual([
            '[ERROR] [log] boom',
            '[WARN ] [log] careful',
        ]);

    });

    it('should ignore direct messages before start', () => {

        const sink = collect();
        const logger = make({ console: sink.stream });

        logger.error('early');

        expect(sink.lines()).toEqual([]);

    });

    it('should write JSON lines with context to the file stream', async () => {

        const file = collect();
        const logger = make({ context: { source: 'a.rt', run: 1 }, file: file.stream });

        logger.start();

        observer.emit('effects:written', { path: 'a.txt', bytes: 3 });
        logger.error('boom', { code: 7 });

        await logger.stop();

        const entries: unknown[] = file.raw().trim().split('\n').map((line): unknown => JSON.parse(line));

        expect(entries).toEqual([
            {
                timestamp: expect.any(String),
                level: 'info',
                event: 'effects:written',
                message: 'Wrote a.txt (3 bytes)',
                context: { source: 'a.rt', run: 1 },
            },
            {
                timestamp: expect.any(String),
                level: 'error',
                event: 'log',
                message: 'boom',
                data: { code: 7 },
            },
        ]);

    });

    it('should report a failing file stream and keep writing to the console', async () => {

        const sink = collect();
        const file = new Writable({
            write(_chunk, _encoding, callback) {

                callback(new Error('disk full'));

            },
        });
        const logger = make({ console: sink.stream, file });

        logger.start();

        observer.emit('effects:written', { path: 'a.txt', bytes: 3 });
        await new Promise((resolve) => setImmediate(resolve));

        observer.emit('effects:written', { path: 'b.txt', bytes: 4 });

        expect(sink.lines()).toEqual([
            '[INFO ] [effects:written] Wrote a.txt (3 bytes)',
            '[ERROR] [error] Error in logger: disk full',
            '[INFO ] [effects:written] Wrote b.txt (4 bytes)',
        ]);

    });

    it('should write colored lines when color is on', () => {

        const sink = collect();
        const logger = make({ console: sink.stream, color: true });

        logger.start();

        observer.emit('effects:written', { path: 'a.txt', bytes: 3 });

        const line = sink.raw();

        expect(line.endsWith('Wrote a.txt (3 bytes)\n')).toBe(true);
        expect(line.startsWith('[')).toBe(false);

    });

});
