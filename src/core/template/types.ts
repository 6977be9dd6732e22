/**
 * Template compiler types.
 *
 * Covers the three stages of a compilation: section ranges cut from the
 * source, the token stream produced by the lexer, and the AST the parser
 * builds and the generator walks.
 */

// ─────────────────────────────────────────────────────────────
// Source
// ─────────────────────────────────────────────────────────────

/**
 * Half-open range of character indexes into the template source.
 */
export interface SectionRange {
    start: number;
    end: number;
}

/**
 * Section kinds a template can open with a `%% kind` marker line.
 */
export type SectionKind = 'init' | 'body' | 'fini';

/**
 * A template split into its sections.
 *
 * Ranges point into `source`; nothing is copied until a stage asks for text.
 */
export interface Template {
    source: string;
    init: SectionRange[];
    body: SectionRange[];
    fini: SectionRange[];
}

/**
 * Position of a construct in the template source.
 *
 * `offset` is counted in UTF-8 bytes, `line` and `column` are 1-based.
 */
export interface SourceLocation {
    offset: number;
    line: number;
    column: number;
}

// ─────────────────────────────────────────────────────────────
// Tokens
// ─────────────────────────────────────────────────────────────

/**
 * Whitespace trim level of a tag side.
 *
 * - 0: keep everything
 * - 1: horizontal whitespace up to the line boundary
 * - 2: level 1 plus one line break
 * - 3: all whitespace
 */
export type TrimLevel = 0 | 1 | 2 | 3;

/**
 * Block directives: each opens with `{% kind ... %}` and closes with `{% endkind %}`.
 */
export type BlockKind = 'for' | 'macro' | 'file';

interface TagToken {
    offset: number;
    trimBefore: TrimLevel;
    trimAfter: TrimLevel;
}

export interface LiteralToken {
    type: 'literal';
    text: string;
    offset: number;
}

export interface OpenToken extends TagToken {
    type: 'open';
    kind: BlockKind;
    args: string;
    argsOffset: number;
}

export interface CloseToken extends TagToken {
    type: 'close';
    kind: BlockKind;
}

export interface CallToken extends TagToken {
    type: 'call';
    name: string;
    args: string[];
}

export interface ValueToken extends TagToken {
    type: 'value';
    expr: string;
}

export interface CommentToken extends TagToken {
    type: 'comment';
}

export type Token =
    | LiteralToken
    | OpenToken
    | CloseToken
    | CallToken
    | ValueToken
    | CommentToken;

// ─────────────────────────────────────────────────────────────
// AST
// ─────────────────────────────────────────────────────────────

export interface TextNode {
    type: 'text';
    value: string;
}

/**
 * Column of the row a loop is currently positioned on.
 *
 * `source` is the loop's name, always one that is lexically open where the
 * reference appears.
 */
export interface FieldRefNode {
    type: 'field';
    source: string;
    column: string;
    offset: number;
}

/**
 * Occurrence of a macro parameter inside the macro's body.
 */
export interface ParamRefNode {
    type: 'param';
    name: string;
    offset: number;
}

/**
 * Raw SQL carried through to the query, with the references it contains
 * lifted out so the generator can bind them.
 */
export type SqlPart =
    | { type: 'sql'; text: string }
    | FieldRefNode
    | ParamRefNode;

export type SqlFragment = SqlPart[];

/**
 * SQL expression written in a substitution, rendered as text.
 *
 * Unqualified names are left to SQLite, which resolves them against the
 * innermost row source first.
 */
export interface ExprNode {
    type: 'expr';
    sql: SqlFragment;
    offset: number;
}

export type SortDirection = 'asc' | 'desc';

/**
 * Row source shared by loops and file blocks.
 */
export interface LoopSource {
    name: string;
    table: string;
    where: SqlFragment | null;
    orderBy: string | null;
    direction: SortDirection;
}

export interface LoopNode extends LoopSource {
    type: 'loop';
    separator: string;
    body: SequenceNode;
    offset: number;
}

export interface MacroDefNode {
    type: 'macro';
    name: string;
    params: string[];
    body: SequenceNode;
    offset: number;
}

/**
 * Value handed to a macro parameter.
 */
export type MacroArg = TextNode | FieldRefNode | ParamRefNode | ExprNode;

export interface MacroCallNode {
    type: 'call';
    name: string;
    args: MacroArg[];
    offset: number;
}

/**
 * Block whose rendered body becomes a `sys_Write` row instead of output.
 */
export interface FileNode {
    type: 'file';
    path: SqlFragment;
    source: LoopSource | null;
    body: SequenceNode;
    offset: number;
}

export interface SequenceNode {
    type: 'sequence';
    children: AstNode[];
}

export type AstNode =
    | TextNode
    | FieldRefNode
    | ParamRefNode
    | ExprNode
    | LoopNode
    | MacroDefNode
    | MacroCallNode
    | FileNode
    | SequenceNode;

// ─────────────────────────────────────────────────────────────
// Output
// ─────────────────────────────────────────────────────────────

/**
 * Result of compiling one template.
 *
 * @example
 * ```typescript
 * const compiled = compile(source)
 *
 * compiled.query       // SELECT printf(...) AS "rendered"
 * compiled.statements  // INSERT INTO "sys_Write" ... (one per file block)
 * compiled.tables      // ['Edge']
 * ```
 */
export interface CompiledQuery {

    /** Single SELECT evaluating to one row, one text column */
    query: string;

    /** Side-effect statements, run before `query` */
    statements: string[];

    /** Tables the query and statements read, sorted */
    tables: string[];

    /** Names of the macros the template defines, sorted */
    macros: string[];
}

/**
 * Columns declared for each table, keyed by lower-cased table name.
 *
 * `null` columns means the table exists but its columns are not known
 * statically (views, `CREATE TABLE ... AS SELECT`).
 */
export type Schema = ReadonlyMap<string, readonly string[] | null>;
