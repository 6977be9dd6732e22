/**
 * Template parser.
 *
 * Turns the lexer's token stream into the AST. Blocks are tracked on an
 * explicit frame stack, so nesting depth is bounded by memory rather than
 * by the call stack.
 *
 * Name binding happens here: every field reference is attached to the loop
 * it reads from, and every `@param` to the macro that declares it. The
 * generator only has to look names up.
 *
 * @example
 * ```typescript
 * const root = parse(tokenize('{% for Edge %}{{ up }}{% endfor %}'), source)
 * // → { type: 'sequence', children: [
 * //     { type: 'loop', name: 'Edge', table: 'Edge', body: { children: [
 * //         { type: 'field', source: 'Edge', column: 'up' } ] } } ] }
 * ```
 */
import { ParseError } from './errors.js';
import { decodeString, scanSql, skipQuoted, unquoteIdent } from './sql.js';
import type { SqlToken } from './sql.js';
import { trimEnd, trimStart } from './trim.js';
import type {
    AstNode,
    BlockKind,
    FieldRefNode,
    FileNode,
    LoopNode,
    LoopSource,
    MacroArg,
    MacroDefNode,
    OpenToken,
    ParamRefNode,
    SequenceNode,
    SortDirection,
    SqlFragment,
    SqlPart,
    Token,
} from './types.js';
import { locate } from './utils.js';

const NAME_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;
const FIELD_RE = /^(?:([A-Za-z_][A-Za-z0-9_]*)\s*\.\s*)?([A-Za-z_][A-Za-z0-9_]*)$/;
const PARAM_RE = /^@([A-Za-z_][A-Za-z0-9_]*)$/;
const MACRO_HEAD_RE = /^([A-Za-z_][A-Za-z0-9_]*)\s*\(([^()]*)\)$/;

// ─────────────────────────────────────────────────────────────
// Frames
// ─────────────────────────────────────────────────────────────

interface Frame {
    kind: 'root' | BlockKind;
    children: AstNode[];
    open: OpenToken | null;

    /** Loop name this frame makes visible, if any */
    loop: string | null;

    /** Declared parameters, for macro frames */
    params: string[];

    finish: (body: SequenceNode) => AstNode | null;
}

/**
 * Parse a token stream into the root sequence.
 *
 * @param tokens - Output of `tokenize`
 * @param source - Template source the token offsets point into
 * @throws ParseError on mismatched or misplaced blocks, unbound names and
 *   malformed directive headers
 */
export function parse(tokens: readonly Token[], source: string): SequenceNode {

    return new Parser(tokens, source).run();

}

class Parser {

    #tokens: readonly Token[];
    #source: string;
    #stack: Frame[];

    constructor(tokens: readonly Token[], source: string) {

        this.#tokens = tokens;
        this.#source = source;
        this.#stack = [{
            kind: 'root',
            children: [],
            open: null,
            loop: null,
            params: [],
            finish: () => null,
        }];

    }

    run(): SequenceNode {

        const tokens = this.#tokens;

        for (let i = 0; i < tokens.length; i++) {

            const token = tokens[i];

            if (!token) continue;

            switch (token.type) {

            case 'literal': {

                const prev = tokens[i - 1];
                const next = tokens[i + 1];
                let text = token.text;

                if (prev && prev.type !== 'literal') text = trimStart(text, prev.trimAfter);
                if (next && next.type !== 'literal') text = trimEnd(text, next.trimBefore);

                this.#push({ type: 'text', value: text });
                break;

            }
            case 'comment':
                break;
            case 'value':
                this.#push(this.#operand(token.expr, token.offset));
                break;
            case 'call':
                this.#push({
                    type: 'call',
                    name: token.name,
                    args: token.args.map((arg) => this.#operand(arg, token.offset)),
                    offset: token.offset,
                });
                break;
            case 'open':
                this.#open(token);
                break;
            case 'close':
                this.#close(token.kind, token.offset);
                break;

            }

        }

        const top = this.#top();

        if (top.open) {

            throw new ParseError(
                `'{% end${top.kind} %}'`,
                'end of input',
                locate(this.#source, this.#source.length),
                `Unclosed '{% ${top.kind} %}' opened at line ${locate(this.#source, top.open.offset).line}`,
            );

        }

        return { type: 'sequence', children: top.children };

    }

    #top(): Frame {

        const top = this.#stack[this.#stack.length - 1];

        if (!top) {

            throw new Error('Parser frame stack is empty');

        }

        return top;

    }

    #push(node: AstNode): void {

        const children = this.#top().children;

        if (node.type === 'text') {

            if (node.value === '') return;

            const last = children[children.length - 1];

            if (last?.type === 'text') {

                children[children.length - 1] = { type: 'text', value: last.value + node.value };
                return;

            }

        }

        children.push(node);

    }

    // ─────────────────────────────────────────────────────────────
    // Blocks
    // ─────────────────────────────────────────────────────────────

    #open(token: OpenToken): void {

        if (token.kind !== 'for' && this.#stack.length > 1) {

            throw new ParseError(
                'top-level position',
                `'{% ${token.kind} %}' inside '{% ${this.#top().kind} %}'`,
                locate(this.#source, token.offset),
                `'${token.kind}' blocks cannot be nested`,
            );

        }

        switch (token.kind) {

        case 'for':
            this.#openLoop(token);
            break;
        case 'macro':
            this.#openMacro(token);
            break;
        case 'file':
            this.#openFile(token);
            break;

        }

    }

    #openLoop(token: OpenToken): void {

        const reader = new HeaderReader(token.args, token.argsOffset, this.#source);
        const { source, separator } = this.#loopSource(reader, true);

        reader.expectEnd('where, order by or sep');

        this.#stack.push({
            kind: 'for',
            children: [],
            open: token,
            loop: source.name,
            params: [],
            finish: (body): LoopNode => ({
                type: 'loop',
                ...source,
                separator,
                body,
                offset: token.offset,
            }),
        });

    }

    #openMacro(token: OpenToken): void {

        const match = MACRO_HEAD_RE.exec(token.args);

        if (!match) {

            throw new ParseError(
                'NAME(@param, ...)',
                token.args === '' ? 'nothing' : `'${token.args}'`,
                locate(this.#source, token.argsOffset),
                'Malformed macro header',
            );

        }

        const name = match[1] ?? '';
        const list = (match[2] ?? '').trim();
        const params: string[] = [];

        for (const raw of list === '' ? [] : list.split(',')) {

            const param = PARAM_RE.exec(raw.trim())?.[1];

            if (!param || params.includes(param)) {

                throw new ParseError(
                    param ? 'distinct parameter names' : '@name',
                    `'${raw.trim()}'`,
                    locate(this.#source, token.argsOffset),
                    `Bad parameter list for macro '${name}'`,
                );

            }

            params.push(param);

        }

        this.#stack.push({
            kind: 'macro',
            children: [],
            open: token,
            loop: null,
            params,
            finish: (body): MacroDefNode => ({
                type: 'macro',
                name,
                params,
                body,
                offset: token.offset,
            }),
        });

    }

    #openFile(token: OpenToken): void {

        const reader = new HeaderReader(token.args, token.argsOffset, this.#source);
        const pathTokens = reader.until((word) => word === 'for');

        if (pathTokens.every(isBlank)) {

            throw new ParseError(
                'a path expression',
                reader.describeNext(),
                locate(this.#source, token.argsOffset),
                'Missing file path',
            );

        }

        let source: LoopSource | null = null;

        if (reader.takeWord('for')) {

            source = this.#loopSource(reader, false).source;

        }

        reader.expectEnd(source ? 'where or order by' : 'for');

        const path = this.#fragment(pathTokens, source ? [source.name] : []);

        this.#stack.push({
            kind: 'file',
            children: [],
            open: token,
            loop: source?.name ?? null,
            params: [],
            finish: (body): FileNode => ({
                type: 'file',
                path,
                source,
                body,
                offset: token.offset,
            }),
        });

    }

    #close(kind: BlockKind, offset: number): void {

        const top = this.#top();

        if (!top.open) {

            throw new ParseError(
                'an open block',
                `'{% end${kind} %}'`,
                locate(this.#source, offset),
                'Nothing to close',
            );

        }

        if (top.kind !== kind) {

            throw new ParseError(
                `'{% end${top.kind} %}'`,
                `'{% end${kind} %}'`,
                locate(this.#source, offset),
            );

        }

        this.#stack.pop();

        const node = top.finish({ type: 'sequence', children: top.children });

        if (node) this.#push(node);

    }

    /**
     * Parse `[NAME in] TABLE [where SQL] [order by COLUMN [asc|desc]] [sep 'TEXT']`.
     */
    #loopSource(reader: HeaderReader, allowSep: boolean): { source: LoopSource; separator: string } {

        const first = reader.name('table name');
        let name = first;
        let table = first;

        if (reader.takeWord('in')) {

            table = reader.name('table name');

        }

        if (!NAME_RE.test(name)) {

            throw new ParseError(
                'a plain loop name',
                `'${name}'`,
                locate(this.#source, reader.offset),
                'Name the loop with NAME in TABLE',
            );

        }

        let where: SqlFragment | null = null;
        let orderBy: string | null = null;
        let direction: SortDirection = 'asc';
        let separator: string | null = null;

        const clause = (word: string): boolean =>
            word === 'where' || word === 'order' || (allowSep && word === 'sep');

        for (let word = reader.peekWord(); word !== null && clause(word); word = reader.peekWord()) {

            const at = reader.offset;

            if (word === 'where' && where === null) {

                reader.takeWord('where');

                const condition = reader.until((next, after) =>
                    (next === 'order' && after === 'by') || (allowSep && next === 'sep'));

                if (condition.every(isBlank)) {

                    throw new ParseError('a condition', reader.describeNext(), locate(this.#source, at));

                }

                where = this.#fragment(condition, [name]);

            }
            else if (word === 'order' && orderBy === null) {

                reader.takeWord('order');

                if (!reader.takeWord('by')) {

                    throw new ParseError("'by'", reader.describeNext(), locate(this.#source, reader.offset));

                }

                orderBy = reader.name('column name');

                if (reader.takeWord('desc')) direction = 'desc';
                else reader.takeWord('asc');

            }
            else if (word === 'sep' && separator === null) {

                reader.takeWord('sep');
                separator = reader.text('quoted separator');

            }
            else {

                throw new ParseError(
                    'each clause at most once',
                    `a second '${word}'`,
                    locate(this.#source, at),
                );

            }

        }

        return {
            source: { name, table, where, orderBy, direction },
            separator: separator ?? '',
        };

    }

    // ─────────────────────────────────────────────────────────────
    // Names
    // ─────────────────────────────────────────────────────────────

    /**
     * Loops visible from the current position, innermost last.
     *
     * A macro body sees only loops opened inside it.
     */
    #visibleLoops(): string[] {

        const loops: string[] = [];

        for (let i = this.#stack.length - 1; i >= 0; i--) {

            const frame = this.#stack[i];

            if (!frame) continue;
            if (frame.loop !== null) loops.unshift(frame.loop);
            if (frame.kind === 'macro') break;

        }

        return loops;

    }

    #macroFrame(): Frame | null {

        return this.#stack.find((frame) => frame.kind === 'macro') ?? null;

    }

    #param(name: string, offset: number): ParamRefNode {

        const macro = this.#macroFrame();

        if (!macro) {

            throw new ParseError(
                'a macro body',
                `'@${name}'`,
                locate(this.#source, offset),
                'Parameters can only be used inside a macro',
            );

        }

        if (!macro.params.includes(name)) {

            throw new ParseError(
                `one of ${macro.params.length ? macro.params.map((p) => `@${p}`).join(', ') : 'no parameters'}`,
                `'@${name}'`,
                locate(this.#source, offset),
                'Undeclared macro parameter',
            );

        }

        return { type: 'param', name, offset };

    }

    #field(loop: string | undefined, column: string, offset: number, visible: string[]): FieldRefNode {

        const innermost = visible[visible.length - 1];

        if (loop === undefined) {

            if (innermost === undefined) {

                throw new ParseError(
                    'an enclosing loop',
                    `'${column}'`,
                    locate(this.#source, offset),
                    'Field reference outside any loop',
                );

            }

            return { type: 'field', source: innermost, column, offset };

        }

        if (!visible.includes(loop)) {

            throw new ParseError(
                visible.length ? `one of ${visible.join(', ')}` : 'an enclosing loop',
                `'${loop}'`,
                locate(this.#source, offset),
                `No open loop named '${loop}'`,
            );

        }

        return { type: 'field', source: loop, column, offset };

    }

    /**
     * Resolve a `{{ }}` expression or a macro call argument.
     *
     * A lone quoted string is text, a bare name or `LOOP.column` a field,
     * `@name` a parameter. Anything else is an SQL expression.
     */
    #operand(expr: string, offset: number): MacroArg {

        const text = expr.trim();

        if (text.startsWith("'") && text.length >= 2 && text.endsWith("'") && skipQuoted(text, 0, "'") === text.length) {

            return { type: 'text', value: this.#decode(text, offset) };

        }

        const param = PARAM_RE.exec(text);

        if (param) return this.#param(param[1] ?? '', offset);

        const field = FIELD_RE.exec(text);

        if (field) return this.#field(field[1], field[2] ?? '', offset, this.#visibleLoops());

        return { type: 'expr', sql: this.#fragment(scanSql(text, offset), []), offset };

    }

    #decode(raw: string, offset: number): string {

        const { value, badEscape } = decodeString(raw);

        if (badEscape !== null) {

            throw new ParseError(
                'one of \\n, \\r, \\t, \\\\',
                `'${badEscape}'`,
                locate(this.#source, offset),
                'Unsupported escape',
            );

        }

        return value;

    }

    /**
     * Lift `@param` and `LOOP.column` references out of raw SQL.
     */
    #fragment(tokens: SqlToken[], own: string[]): SqlFragment {

        const visible = [...this.#visibleLoops(), ...own];
        const parts: SqlPart[] = [];

        const text = (value: string): void => {

            const last = parts[parts.length - 1];

            if (last?.type === 'sql') parts[parts.length - 1] = { type: 'sql', text: last.text + value };
            else parts.push({ type: 'sql', text: value });

        };

        for (let i = 0; i < tokens.length; i++) {

            const token = tokens[i];

            if (!token) continue;

            if (token.kind === 'param') {

                parts.push(this.#param(token.text.slice(1), token.start));
                continue;

            }

            const dot = tokens[i + 1];
            const column = tokens[i + 2];
            const prev = tokens[i - 1];
            const loop = token.kind === 'word' || token.kind === 'ident' ? unquoteIdent(token.text) : null;

            if (
                loop !== null
                && visible.includes(loop)
                && dot?.text === '.'
                && (column?.kind === 'word' || column?.kind === 'ident')
                && prev?.text !== '.'
            ) {

                parts.push(this.#field(loop, unquoteIdent(column.text), token.start, visible));
                i += 2;
                continue;

            }

            text(token.text);

        }

        const last = parts.length - 1;

        return parts
            .map((part, index): SqlPart => {

                if (part.type !== 'sql') return part;

                let value = part.text;

                if (index === 0) value = value.trimStart();
                if (index === last) value = value.trimEnd();

                return { type: 'sql', text: value };

            })
            .filter((part) => part.type !== 'sql' || part.text !== '');

    }

}

function isBlank(token: SqlToken): boolean {

    return token.kind === 'space' || token.kind === 'comment';

}

// ─────────────────────────────────────────────────────────────
// Directive headers
// ─────────────────────────────────────────────────────────────

/**
 * Cursor over the SQL words of a directive header.
 */
class HeaderReader {

    #tokens: SqlToken[];
    #pos = 0;
    #end: number;
    #source: string;

    constructor(args: string, argsOffset: number, source: string) {

        this.#tokens = scanSql(args, argsOffset);
        this.#end = argsOffset + args.length;
        this.#source = source;

    }

    /** Source index of the next significant token */
    get offset(): number {

        return this.#peek()?.start ?? this.#end;

    }

    #peek(): SqlToken | undefined {

        while (this.#pos < this.#tokens.length) {

            const token = this.#tokens[this.#pos];

            if (token && !isBlank(token)) return token;
            this.#pos++;

        }

        return undefined;

    }

    /** Next token as a lower-cased keyword, or null when it is not a bare word */
    peekWord(): string | null {

        const token = this.#peek();

        return token?.kind === 'word' ? token.text.toLowerCase() : null;

    }

    takeWord(word: string): boolean {

        if (this.peekWord() !== word) return false;

        this.#pos++;

        return true;

    }

    describeNext(): string {

        const token = this.#peek();

        return token ? `'${token.text}'` : 'end of directive';

    }

    name(expected: string): string {

        const token = this.#peek();

        if (token?.kind !== 'word' && token?.kind !== 'ident') {

            throw new ParseError(expected, this.describeNext(), locate(this.#source, this.offset));

        }

        this.#pos++;

        return unquoteIdent(token.text);

    }

    text(expected: string): string {

        const token = this.#peek();

        if (token?.kind !== 'string' || !token.text.endsWith("'") || token.text.length < 2) {

            throw new ParseError(expected, this.describeNext(), locate(this.#source, this.offset));

        }

        this.#pos++;

        const { value, badEscape } = decodeString(token.text);

        if (badEscape !== null) {

            throw new ParseError(
                'one of \\n, \\r, \\t, \\\\',
                `'${badEscape}'`,
                locate(this.#source, token.start),
                'Unsupported escape',
            );

        }

        return value;

    }

    /**
     * Take raw tokens up to the first top-level word `stop` accepts.
     *
     * `stop` sees the lower-cased word and the word after it.
     */
    until(stop: (word: string, after: string | null) => boolean): SqlToken[] {

        const taken: SqlToken[] = [];
        let depth = 0;

        while (this.#pos < this.#tokens.length) {

            const token = this.#tokens[this.#pos];

            if (!token) break;

            if (token.kind === 'word' && depth === 0) {

                const word = token.text.toLowerCase();

                if (stop(word, this.#wordAfter(this.#pos))) break;

            }

            if (token.text === '(') depth++;
            if (token.text === ')') depth--;

            taken.push(token);
            this.#pos++;

        }

        return taken;

    }

    #wordAfter(index: number): string | null {

        for (let i = index + 1; i < this.#tokens.length; i++) {

            const token = this.#tokens[i];

            if (!token || isBlank(token)) continue;

            return token.kind === 'word' ? token.text.toLowerCase() : null;

        }

        return null;

    }

    expectEnd(expected: string): void {

        if (this.#peek()) {

            throw new ParseError(expected, this.describeNext(), locate(this.#source, this.offset));

        }

    }

}
