/**
 * Table declarations read from a template's init script.
 *
 * Only the shape of `CREATE TABLE`, `CREATE VIEW`, `ALTER TABLE ... ADD`
 * and `DROP` statements is looked at; the script is not validated. The
 * generator uses the result to reject unknown columns before any SQL runs.
 *
 * @example
 * ```typescript
 * extractSchema('CREATE TABLE Edge (up TEXT, dn TEXT);')
 * // → Map { 'edge' => ['up', 'dn'], 'sys_write' => ['path', 'content'] }
 * ```
 */
import { scanSql, unquoteIdent } from './sql.js';
import type { SqlToken } from './sql.js';
import type { Schema } from './types.js';

/** Table every run writes side-effect files into */
export const WRITE_TABLE = 'sys_Write';
export const WRITE_COLUMNS = ['path', 'content'] as const;

const CONSTRAINT_WORDS = new Set(['constraint', 'primary', 'unique', 'check', 'foreign']);

function isName(token: SqlToken | undefined): token is SqlToken {

    return token?.kind === 'word' || token?.kind === 'ident';

}

function word(token: SqlToken | undefined): string {

    return token?.kind === 'word' ? token.text.toLowerCase() : '';

}

/**
 * Cursor over the significant tokens of a script.
 */
class Cursor {

    pos = 0;

    constructor(readonly tokens: SqlToken[]) {}

    peek(ahead = 0): SqlToken | undefined {

        return this.tokens[this.pos + ahead];

    }

    take(...words: string[]): boolean {

        if (!words.includes(word(this.peek()))) return false;

        this.pos++;

        return true;

    }

    /** Possibly schema-qualified name; returns the last part */
    name(): string | null {

        let token = this.peek();

        if (!isName(token)) return null;

        this.pos++;

        while (this.peek()?.text === '.' && isName(this.peek(1))) {

            token = this.peek(1);
            this.pos += 2;

        }

        return token ? unquoteIdent(token.text) : null;

    }

    /** Index of the `)` matching the `(` at the cursor */
    closing(): number {

        let depth = 0;

        for (let i = this.pos; i < this.tokens.length; i++) {

            const text = this.tokens[i]?.text;

            if (text === '(') depth++;
            if (text === ')' && --depth === 0) return i;

        }

        return this.tokens.length;

    }

}

/**
 * Read the tables an init script declares.
 *
 * Keys are lower-cased table names. Views and `CREATE TABLE ... AS SELECT`
 * map to `null`: the table exists but its columns are not known statically.
 * `sys_Write` is always present.
 */
export function extractSchema(init: string): Schema {

    const tables = new Map<string, string[] | null>();
    const cursor = new Cursor(
        scanSql(init).filter((token) => token.kind !== 'space' && token.kind !== 'comment'),
    );

    while (cursor.pos < cursor.tokens.length) {

        if (cursor.take('create')) {

            cursor.take('temp', 'temporary');
            cursor.take('virtual');

            const isView = cursor.take('view');

            if (!isView && !cursor.take('table')) continue;

            if (cursor.take('if')) {

                cursor.take('not');
                cursor.take('exists');

            }

            const name = cursor.name();

            if (name === null) continue;

            tables.set(name.toLowerCase(), isView ? null : readColumns(cursor));

        }
        else if (cursor.take('drop')) {

            if (!cursor.take('table', 'view')) continue;

            if (cursor.take('if')) cursor.take('exists');

            const name = cursor.name();

            if (name !== null) tables.delete(name.toLowerCase());

        }
        else if (cursor.take('alter')) {

            if (!cursor.take('table')) continue;

            const name = cursor.name()?.toLowerCase();

            if (name === undefined || !cursor.take('add')) continue;

            cursor.take('column');

            const column = cursor.name();
            const columns = tables.get(name);

            if (column !== null && columns) columns.push(column);

        }
        else {

            cursor.pos++;

        }

    }

    tables.set(WRITE_TABLE.toLowerCase(), [...WRITE_COLUMNS]);

    return tables;

}

/**
 * Column names of a `( ... )` definition list at the cursor, or null for
 * `AS SELECT` and `USING module(...)` forms.
 */
function readColumns(cursor: Cursor): string[] | null {

    if (cursor.peek()?.text !== '(') return null;

    const end = cursor.closing();
    const columns: string[] = [];
    let expectName = true;
    let depth = 0;

    for (let i = cursor.pos + 1; i < end; i++) {

        const token = cursor.tokens[i];

        if (!token) break;

        if (token.text === '(') depth++;
        else if (token.text === ')') depth--;
        else if (token.text === ',' && depth === 0) expectName = true;
        else if (expectName) {

            expectName = false;

            if (isName(token) && !CONSTRAINT_WORDS.has(word(token))) {

                columns.push(unquoteIdent(token.text));

            }

        }

    }

    cursor.pos = end + 1;

    return columns;

}
