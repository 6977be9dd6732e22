import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, readFile, writeFile, rm } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { Writable } from 'node:stream';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import { runCli } from '../../src/cli/run.js';
import type { CliFlags } from '../../src/cli/types.js';

const PAGES = [
    '%% init',
    'CREATE TABLE Page (name TEXT, body TEXT);',
    "INSERT INTO Page VALUES ('b', 'Bee'), ('a', 'Ay');",
    '%% body',
    "{% file 'pages/' || name || '.txt' for Page %}{{ body }}{% endfile %}{% for Page order by name sep ',' %}{{ name }}{% endfor %}",
].join('\n');

function buffer() {

    const chunks: string[] = [];

    const stream = new Writable({
        write(chunk: Buffer | string, _encoding, callback) {

            chunks.push(chunk.toString());
            callback();

        },
    });

    return { stream, text: () => chunks.join('') };

}

describe('cli: runCli', () => {

    let cwd: string;

    beforeEach(async () => {

        cwd = await mkdtemp(join(tmpdir(), 'rowcast-cli-'));
        await writeFile(join(cwd, 'pages.rt'), PAGES);

    });

    afterEach(async () => {

        await rm(cwd, { recursive: true, force: true });

    });

    async function cli(input: string[], flags: Partial<CliFlags> = {}) {

        const stdout = buffer();
        const stderr = buffer();

        const code = await runCli(input, { sql: false, quiet: false, verbose: false, ...flags }, {
            stdout: stdout.stream,
            stderr: stderr.stream,
            cwd,
            env: {},
        });

        return { code, stdout: stdout.text(), stderr: stderr.text() };

    }

    it('should print the rendered text and write files under the prefix', async () => {

        const { code, stdout, stderr } = await cli(['pages.rt'], { prefix: 'out' });

        expect(code).toBe(0);
        expect(stdout).toBe('a,b');
        expect(await readFile(join(cwd, 'out', 'pages', 'a.txt'), 'utf-8')).toBe('Ay');
        expect(await readFile(join(cwd, 'out', 'pages', 'b.txt'), 'utf-8')).toBe('Bee');
        expect(stderr).toContain('[INFO ] [effects:written] Wrote pages/a.txt (2 bytes)');

    });

    it('should warn when files have nowhere to go', async () => {

        const { code, stdout, stderr } = await cli(['pages.rt']);

        expect(code).toBe(0);
        expect(stdout).toBe('a,b');
        expect(stderr).toContain('[WARN ] [effects:warning] 2 side-effect file(s) not written: no prefix directory given');
        expect(existsSync(join(cwd, 'pages'))).toBe(false);

    });

    it('should print only errors when quiet', async () => {

        const { code, stderr } = await cli(['pages.rt'], { quiet: true, prefix: 'out' });

        expect(code).toBe(0);
        expect(stderr).toBe('');

    });

    it('should print the script instead of running it', async () => {

        const { code, stdout } = await cli(['pages.rt'], { sql: true, prefix: 'out' });

        expect(code).toBe(0);
        expect(stdout.startsWith('DROP TABLE IF EXISTS "sys_Write";\n')).toBe(true);
        expect(stdout).toContain('CREATE TABLE Page (name TEXT, body TEXT);');
        expect(existsSync(join(cwd, 'out'))).toBe(false);

    });

    it('should take the prefix from settings', async () => {

        await mkdir(join(cwd, '.rowcast'));
        await writeFile(join(cwd, '.rowcast', 'settings.yml'), 'execute:\n    prefix: site\n');

        const { code } = await cli(['pages.rt']);

        expect(code).toBe(0);
        expect(await readFile(join(cwd, 'site', 'pages', 'a.txt'), 'utf-8')).toBe('Ay');

    });

    it('should create the log file directory', async () => {

        await mkdir(join(cwd, '.rowcast'));
        await writeFile(join(cwd, '.rowcast', 'settings.yml'), 'logging:\n    file: logs/rowcast.log\n');

        const { code, stdout } = await cli(['pages.rt'], { prefix: 'out' });

        expect(code).toBe(0);
        expect(stdout).toBe('a,b');

        const log = await readFile(join(cwd, 'logs', 'rowcast.log'), 'utf-8');
        const entries: unknown[] = log.trim().split('\n').map((line): unknown => JSON.parse(line));

        expect(entries).toContainEqual({
            timestamp: expect.any(String),
            level: 'info',
            event: 'effects:written',
            message: 'Wrote pages/a.txt (2 bytes)',
            context: { source: 'pages.rt' },
        });

    });

    it('should run without a log file when its directory cannot be made', async () => {

        await mkdir(join(cwd, '.rowcast'));
        await writeFile(join(cwd, '.rowcast', 'settings.yml'), 'logging:\n    file: logs/rowcast.log\n');
        await writeFile(join(cwd, 'logs'), 'not a directory');

        const { code, stdout } = await cli(['pages.rt'], { prefix: 'out' });

        expect(code).toBe(0);
        expect(stdout).toBe('a,b');
        expect(await readFile(join(cwd, 'logs'), 'utf-8')).toBe('not a directory');

    });

    it('should run against a database file', async () => {

        const { code } = await cli(['pages.rt'], { db: 'pages.db', quiet: true });

        expect(code).toBe(0);
        expect(existsSync(join(cwd, 'pages.db'))).toBe(true);

    });

    it('should fail without exactly one source', async () => {

        expect(await cli([])).toEqual({
            code: 1,
            stdout: '',
            stderr: 'rowcast: expected exactly one SOURCE argument (see --help)\n',
        });
        expect((await cli(['a.rt', 'b.rt'])).code).toBe(1);

    });

    it('should fail on invalid settings', async () => {

        await mkdir(join(cwd, '.rowcast'));
        await writeFile(join(cwd, '.rowcast', 'settings.yml'), 'logging:\n    level: loud\n');

        const { code, stderr } = await cli(['pages.rt']);

        expect(code).toBe(1);
        expect(stderr.startsWith('rowcast: logging.level: ')).toBe(true);

    });

    it('should report a template error and exit 1', async () => {

        await writeFile(join(cwd, 'bad.rt'), '{% for Page %}');

        const { code, stdout, stderr } = await cli(['bad.rt']);

        expect(code).toBe(1);
        expect(stdout).toBe('');
        expect(stderr).toContain(`[ERROR] [compile:failed] Failed to compile ${join(cwd, 'bad.rt')} (parse): `);

    });

    it('should report a missing source file', async () => {

        const { code, stderr } = await cli(['missing.rt']);

        expect(code).toBe(1);
        expect(stderr).toContain('[ERROR] [log] ENOENT');

    });

});
