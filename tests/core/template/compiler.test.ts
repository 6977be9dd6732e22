import { describe, it, expect, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import { compile, compileFile } from '../../../src/core/template/compiler.js';
import { splitSections } from '../../../src/core/template/sections.js';
import { ParseError, ResolutionError } from '../../../src/core/template/errors.js';
import { observer } from '../../../src/core/observer.js';
import type { RowcastEventNames, RowcastEvents } from '../../../src/core/observer.js';

describe('template: compiler', () => {

    const cleanups: Array<() => void> = [];

    afterEach(() => {

        cleanups.splice(0).forEach((cleanup) => cleanup());

    });

    function record<E extends RowcastEventNames>(event: E): Array<RowcastEvents[E]> {

        const seen: Array<RowcastEvents[E]> = [];

        cleanups.push(observer.on(event, (data) => {

            seen.push(data);

        }));

        return seen;

    }

    it('should compile only the body sections', () => {

        const compiled = compile('%% init\nCREATE TABLE t (a);\n%% body\nx\n%% fini\nDROP TABLE t;\n');

        expect(compiled.query).toBe("SELECT 'x' || char(10) AS \"rendered\"");
        expect(compiled.statements).toEqual([]);
        expect(compiled.tables).toEqual([]);
        expect(compiled.macros).toEqual([]);

    });

    it('should accept a template already split into sections', () => {

        const template = splitSections('%% body\n{{ \'a\' }}');

        expect(compile(template).query).toBe("SELECT 'a' AS \"rendered\"");

    });

    it('should use a given schema instead of the init script', () => {

        const schema = new Map([['t', ['a']]]);

        expect(() => compile('{% for t %}{{ b }}{% endfor %}', { schema })).toThrow("Table 't' has no column 'b'");

    });

    it('should report compilation on the observer', () => {

        const before = record('compile:before');
        const after = record('compile:after');

        compile('{% macro m() %}x{% endmacro %}{% for T %}{{ call m() }}{% endfor %}', { filepath: 'a.rt' });

        expect(before).toEqual([{ filepath: 'a.rt', bytes: 67 }]);
        expect(after).toEqual([{
            filepath: 'a.rt',
            durationMs: expect.any(Number),
            tables: ['T'],
            macros: 1,
            statements: 0,
        }]);

    });

    it('should report the failing stage and rethrow', () => {

        const failed = record('compile:failed');

        expect(() => compile('{% for T %}')).toThrow(ParseError);
        expect(() => compile('{{ call nope() }}')).toThrow(ResolutionError);

        expect(failed).toEqual([
            { filepath: null, stage: 'parse', error: expect.stringContaining("Unclosed '{% for %}'") },
            { filepath: null, stage: 'resolve', error: 'Unknown macro: nope (line 1)' },
        ]);

    });

    describe('compileFile', () => {

        let dir: string | null = null;

        afterEach(async () => {

            if (dir) await rm(dir, { recursive: true, force: true });
            dir = null;

        });

        it('should read and compile a file', async () => {

            dir = await mkdtemp(join(tmpdir(), 'rowcast-compiler-'));

            const path = join(dir, 'hello.rt');
            await writeFile(path, 'hello');

            const after = record('compile:after');
            const compiled = await compileFile(path);

            expect(compiled.query).toBe("SELECT 'hello' AS \"rendered\"");
            expect(after).toMatchObject([{ filepath: path }]);

        });

        it('should emit an error event when the file cannot be read', async () => {

            const errors = record('error');
            const path = join(tmpdir(), 'rowcast-missing-template.rt');

            await expect(compileFile(path)).rejects.toThrow('ENOENT');

            expect(errors).toMatchObject([{ source: 'template', context: { filepath: path } }]);

        });

    });

});
