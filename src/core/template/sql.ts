/**
 * SQL text helpers.
 *
 * A small word scanner used wherever template code has to look inside SQL
 * (directive headers, `where` clauses, the init script) without parsing it,
 * plus the quoting rules of the SQLite dialect the generator targets.
 */

export type SqlTokenKind =
    | 'word'
    | 'string'
    | 'ident'
    | 'param'
    | 'space'
    | 'comment'
    | 'punct';

export interface SqlToken {
    kind: SqlTokenKind;
    text: string;

    /** Index of the token's first character, offset by the scan base */
    start: number;
}

const WORD_CHAR_RE = /[A-Za-z0-9_$]/;
const SPACE_RE = /\s/;

function isWordChar(ch: string | undefined): boolean {

    return ch !== undefined && WORD_CHAR_RE.test(ch);

}

/**
 * Index just past a quoted run opened at `start`.
 *
 * The closing quote is doubled to escape it. Returns the text length when
 * the run is unterminated.
 */
export function skipQuoted(text: string, start: number, close: string): number {

    let i = start + 1;

    while (i < text.length) {

        if (text[i] === close) {

            if (close !== ']' && text[i + 1] === close) {

                i += 2;
                continue;

            }

            return i + 1;

        }

        i++;

    }

    return text.length;

}

/**
 * Split SQL into words, quoted strings, identifiers, parameters, comments,
 * whitespace and single punctuation characters.
 *
 * Joining every token's text gives back the input.
 *
 * @example
 * ```typescript
 * scanSql("e.up = 'x'").map((t) => t.kind)
 * // → ['word', 'punct', 'word', 'space', 'punct', 'space', 'string']
 * ```
 */
export function scanSql(text: string, base = 0): SqlToken[] {

    const tokens: SqlToken[] = [];
    let i = 0;

    const push = (kind: SqlTokenKind, end: number): void => {

        tokens.push({ kind, text: text.slice(i, end), start: base + i });
        i = end;

    };

    while (i < text.length) {

        const ch = text[i];
        const next = text[i + 1];

        if (ch === "'") {

            push('string', skipQuoted(text, i, "'"));

        }
        else if (ch === '"' || ch === '`') {

            push('ident', skipQuoted(text, i, ch));

        }
        else if (ch === '[') {

            push('ident', skipQuoted(text, i, ']'));

        }
        else if (ch === '-' && next === '-') {

            const newline = text.indexOf('\n', i);
            push('comment', newline === -1 ? text.length : newline);

        }
        else if (ch === '/' && next === '*') {

            const close = text.indexOf('*/', i + 2);
            push('comment', close === -1 ? text.length : close + 2);

        }
        else if (ch === '@' && isWordChar(next)) {

            let end = i + 1;
            while (isWordChar(text[end])) end++;
            push('param', end);

        }
        else if (isWordChar(ch)) {

            let end = i;
            while (isWordChar(text[end])) end++;
            push('word', end);

        }
        else if (ch !== undefined && SPACE_RE.test(ch)) {

            let end = i;
            while (end < text.length && SPACE_RE.test(text[end] ?? '')) end++;
            push('space', end);

        }
        else {

            push('punct', i + 1);

        }

    }

    return tokens;

}

// ─────────────────────────────────────────────────────────────
// Quoting
// ─────────────────────────────────────────────────────────────

/**
 * SQL expression text with the height of its parse tree.
 *
 * SQLite caps expression height (`SQLITE_MAX_EXPR_DEPTH`), so generated
 * code carries the height along with the text.
 */
export interface SqlExpr {
    sql: string;
    depth: number;
}

/** Longest `||` chain emitted flat; longer ones are grouped pairwise */
const FLAT_CONCAT = 16;

/**
 * Join SQL operands with `||`.
 *
 * Long chains are parenthesized into a balanced tree so their height grows
 * with the logarithm of the operand count.
 */
export function concatenate(parts: readonly string[]): SqlExpr {

    if (parts.length === 0) return { sql: "''", depth: 1 };

    if (parts.length <= FLAT_CONCAT) {

        return { sql: parts.join(' || '), depth: parts.length };

    }

    const mid = Math.ceil(parts.length / 2);
    const left = concatenate(parts.slice(0, mid));
    const right = concatenate(parts.slice(mid));

    return {
        sql: `(${left.sql}) || (${right.sql})`,
        depth: 1 + Math.max(left.depth, right.depth),
    };

}

/**
 * Operands of a string literal: quoted runs, with line feeds and carriage
 * returns as `char(10)` / `char(13)`.
 */
export function literalParts(value: string): string[] {

    const parts: string[] = [];
    let run = '';

    for (const ch of value) {

        if (ch === '\n' || ch === '\r') {

            if (run) parts.push(`'${run}'`);
            parts.push(ch === '\n' ? 'char(10)' : 'char(13)');
            run = '';
            continue;

        }

        run += ch === "'" ? "''" : ch;

    }

    if (run || parts.length === 0) parts.push(`'${run}'`);

    return parts;

}

/**
 * Quote a value as a SQLite string literal.
 *
 * @example
 * ```typescript
 * quoteLiteral("it's")    // → 'it''s'
 * quoteLiteral('a\nb')    // → 'a' || char(10) || 'b'
 * quoteLiteral('')        // → ''
 * ```
 */
export function quoteLiteral(value: string): string {

    return concatenate(literalParts(value)).sql;

}

/**
 * Quote an identifier for SQLite.
 *
 * @example
 * ```typescript
 * quoteIdent('Edge')    // → "Edge"
 * quoteIdent('a"b')     // → "a""b"
 * ```
 */
export function quoteIdent(name: string): string {

    return `"${name.replace(/"/g, '""')}"`;

}

/**
 * Strip the quoting from an identifier written `"x"`, `[x]` or `` `x` ``.
 */
export function unquoteIdent(text: string): string {

    const first = text[0];

    if (first === '"' || first === '`') {

        return text.slice(1, -1).split(`${first}${first}`).join(first);

    }

    if (first === '[') {

        return text.slice(1, -1);

    }

    return text;

}

export interface DecodedString {
    value: string;

    /** First unsupported backslash escape, when there is one */
    badEscape: string | null;
}

/**
 * Decode a single-quoted template string.
 *
 * `''` is a quote; `\n`, `\r`, `\t` and `\\` are escapes. Any other
 * backslash sequence is reported in `badEscape`.
 *
 * @example
 * ```typescript
 * decodeString("'a''b'")     // → { value: "a'b", badEscape: null }
 * decodeString("'x\\ny'")    // → { value: 'x\ny', badEscape: null }
 * decodeString("'\\q'")      // → { value: '', badEscape: '\\q' }
 * ```
 */
export function decodeString(raw: string): DecodedString {

    const body = raw.slice(1, -1);
    let value = '';

    for (let i = 0; i < body.length; i++) {

        const ch = body[i];

        if (ch === "'" && body[i + 1] === "'") {

            value += "'";
            i++;
            continue;

        }

        if (ch === '\\') {

            const next = body[i + 1];

            switch (next) {

            case 'n':
                value += '\n';
                break;
            case 'r':
                value += '\r';
                break;
            case 't':
                value += '\t';
                break;
            case '\\':
                value += '\\';
                break;
            default:
                return { value, badEscape: `\\${next ?? ''}` };

            }

            i++;
            continue;

        }

        value += ch;

    }

    return { value, badEscape: null };

}
