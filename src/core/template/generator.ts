/**
 * SQLite query generator.
 *
 * Walks the AST and emits one SELECT whose single value is the rendered
 * text, plus one INSERT per file block.
 *
 * ```
 * Text      'a' || char(10) || 'b'
 * Sequence  printf('a%sb', child)
 * FieldRef  "_d1_Edge"."up"
 * Expr      (upper("_d1_Edge"."up"))
 * Loop      (SELECT coalesce(group_concat("_r", sep ORDER BY "_k"), '')
 *            FROM (SELECT body AS "_r", "_d1_Edge"."up" AS "_k"
 *                  FROM "Edge" AS "_d1_Edge" WHERE ...))
 * ```
 *
 * The per-row body is projected by an inner SELECT so the aggregate always
 * reads a column of its own FROM clause, even when the body only references
 * outer loops. Macro calls are inlined: arguments are generated where the
 * call is, the body is generated with only its parameters in scope.
 */
import { GenerationError } from './errors.js';
import type { MacroTable } from './macros.js';
import { WRITE_COLUMNS, WRITE_TABLE } from './schema.js';
import { concatenate, literalParts, quoteIdent } from './sql.js';
import type { SqlExpr } from './sql.js';
import type {
    AstNode,
    ExprNode,
    FieldRefNode,
    FileNode,
    LoopNode,
    LoopSource,
    MacroArg,
    MacroCallNode,
    ParamRefNode,
    Schema,
    SequenceNode,
    SqlFragment,
} from './types.js';

/** SQLite's default `SQLITE_MAX_EXPR_DEPTH` */
export const DEFAULT_MAX_EXPRESSION_DEPTH = 1000;

/** `%s` arguments per printf call; SQLite caps function arguments at 127 */
const MAX_PRINTF_ARGS = 99;

/** Numeric suffixes tried when an alias collides with a table name */
const MAX_ALIAS_SUFFIX = 99;

export interface GeneratorOptions {

    /** Tables declared by the init script; columns are checked against it */
    schema?: Schema;

    /** Expression height past which generation fails */
    maxExpressionDepth?: number;
}

export interface GeneratedQuery {
    query: string;
    statements: string[];
    tables: string[];
}

interface LoopBinding {
    name: string;
    table: string;
    alias: string;
}

interface Scope {

    /** Loops visible to field references, innermost last */
    loops: LoopBinding[];

    /** Bound macro arguments */
    params: ReadonlyMap<string, SqlExpr>;

    /** Loop nesting depth, counting loops inlined from macros */
    depth: number;
}

const ROOT_SCOPE: Scope = { loops: [], params: new Map(), depth: 0 };

/**
 * Generate the query for a parsed template.
 *
 * @example
 * ```typescript
 * const generator = new QueryGenerator(macros, { schema: extractSchema(init) })
 * const { query, statements, tables } = generator.generate(root)
 * ```
 */
export class QueryGenerator {

    readonly #macros: MacroTable;
    readonly #schema: Schema;
    readonly #maxDepth: number;
    readonly #tables = new Set<string>();

    constructor(macros: MacroTable, options: GeneratorOptions = {}) {

        this.#macros = macros;
        this.#schema = options.schema ?? new Map();
        this.#maxDepth = options.maxExpressionDepth ?? DEFAULT_MAX_EXPRESSION_DEPTH;

    }

    /**
     * @throws GenerationError when the query would nest past the depth limit,
     *   an alias cannot be chosen, or a column is not declared
     */
    generate(root: SequenceNode): GeneratedQuery {

        this.#tables.clear();

        const statements = root.children
            .filter((child): child is FileNode => child.type === 'file')
            .map((file) => this.#file(file));

        const body = this.#sequence(root.children, ROOT_SCOPE, 0);

        return {
            query: `SELECT ${body.sql} AS "rendered"`,
            statements,
            tables: [...this.#tables].sort(),
        };

    }

    // ─────────────────────────────────────────────────────────────
    // Nodes
    // ─────────────────────────────────────────────────────────────

    #node(node: AstNode, scope: Scope, level: number): SqlExpr {

        switch (node.type) {

        case 'text':
            return this.#literal(node.value);
        case 'field':
            return this.#field(node, scope);
        case 'param':
            return this.#param(node, scope);
        case 'expr':
            return this.#expression(node, scope);
        case 'loop':
            return this.#loop(node, scope, level);
        case 'call':
            return this.#call(node, scope, level);
        case 'sequence':
            return this.#sequence(node.children, scope, level);
        case 'macro':
        case 'file':
            return this.#literal('');

        }

    }

    #literal(value: string): SqlExpr {

        return this.#check(concatenate(literalParts(value)));

    }

    #field(node: FieldRefNode, scope: Scope): SqlExpr {

        const binding = findLoop(scope, node.source);

        if (!binding) {

            throw new GenerationError('schema', `No loop named '${node.source}' is open for column '${node.column}'`);

        }

        this.#checkColumn(binding.table, node.column);

        return { sql: `${quoteIdent(binding.alias)}.${quoteIdent(node.column)}`, depth: 1 };

    }

    #param(node: ParamRefNode, scope: Scope): SqlExpr {

        const bound = scope.params.get(node.name);

        if (!bound) {

            throw new GenerationError('schema', `Parameter '@${node.name}' is not bound`);

        }

        return bound;

    }

    #expression(node: ExprNode, scope: Scope): SqlExpr {

        const inner = this.#fragment(node.sql, scope);

        return this.#check({ sql: `(${inner.sql})`, depth: inner.depth + 1 });

    }

    #arg(arg: MacroArg, scope: Scope): SqlExpr {

        switch (arg.type) {

        case 'text':
            return this.#literal(arg.value);
        case 'field':
            return this.#field(arg, scope);
        case 'param':
            return this.#param(arg, scope);
        case 'expr':
            return this.#expression(arg, scope);

        }

    }

    /**
     * Concatenate children with printf, folding text into the format string.
     */
    #sequence(children: readonly AstNode[], scope: Scope, level: number): SqlExpr {

        this.#guard(level + 1);

        const pieces: Array<string | SqlExpr> = [];

        for (const child of children) {

            if (child.type === 'macro' || child.type === 'file') continue;

            if (child.type === 'text') {

                const last = pieces[pieces.length - 1];

                if (typeof last === 'string') pieces[pieces.length - 1] = last + child.value;
                else pieces.push(child.value);

                continue;

            }

            pieces.push(this.#node(child, scope, level + 1));

        }

        if (pieces.every((piece) => typeof piece === 'string')) {

            return this.#literal(pieces.join(''));

        }

        return this.#printf(pieces);

    }

    #printf(pieces: ReadonlyArray<string | SqlExpr>): SqlExpr {

        const exprs = pieces.filter((piece): piece is SqlExpr => typeof piece !== 'string');

        if (exprs.length > MAX_PRINTF_ARGS) {

            const chunks: Array<Array<string | SqlExpr>> = [[]];
            let count = 0;

            for (const piece of pieces) {

                if (typeof piece !== 'string' && count === MAX_PRINTF_ARGS) {

                    chunks.push([]);
                    count = 0;

                }

                if (typeof piece !== 'string') count++;

                chunks[chunks.length - 1]?.push(piece);

            }

            return this.#printf(chunks.map((chunk) => this.#printf(chunk)));

        }

        const format = pieces
            .map((piece) => (typeof piece === 'string' ? piece.replace(/%/g, '%%') : '%s'))
            .join('');
        const literal = concatenate(literalParts(format));
        const args = [literal, ...exprs];

        return this.#check({
            sql: `printf(${args.map((arg) => arg.sql).join(', ')})`,
            depth: 1 + Math.max(...args.map((arg) => arg.depth)),
        });

    }

    #loop(node: LoopNode, scope: Scope, level: number): SqlExpr {

        this.#guard(level + 4);

        const { binding, inner } = this.#enter(node, scope);
        const body = this.#sequence(node.body.children, inner, level + 4);
        const separator = concatenate(literalParts(node.separator));
        const where = this.#where(node, inner);

        const projection = [`${body.sql} AS "_r"`];
        let order = '';

        if (node.orderBy !== null) {

            this.#checkColumn(node.table, node.orderBy);

            projection.push(`${quoteIdent(binding.alias)}.${quoteIdent(node.orderBy)} AS "_k"`);
            order = ` ORDER BY "_k" ${node.direction.toUpperCase()}`;

        }

        const rows = `SELECT ${projection.join(', ')} FROM ${quoteIdent(node.table)} AS ${quoteIdent(binding.alias)}${where.sql}`;

        return this.#check({
            sql: `(SELECT coalesce(group_concat("_r", ${separator.sql}${order}), '') FROM (${rows}))`,
            depth: 4 + Math.max(body.depth, separator.depth, where.depth),
        });

    }

    #call(node: MacroCallNode, scope: Scope, level: number): SqlExpr {

        const def = this.#macros.get(node.name);

        if (!def) {

            throw new GenerationError('schema', `Macro '${node.name}' is not defined`);

        }

        const params = new Map<string, SqlExpr>();

        def.params.forEach((param, index) => {

            const arg = node.args[index];

            if (arg) params.set(param, this.#arg(arg, scope));

        });

        return this.#sequence(def.body.children, { loops: [], params, depth: scope.depth }, level);

    }

    #file(node: FileNode): string {

        const columns = WRITE_COLUMNS.map(quoteIdent).join(', ');
        const head = `INSERT INTO ${quoteIdent(WRITE_TABLE)} (${columns})`;

        if (!node.source) {

            const path = this.#fragment(node.path, ROOT_SCOPE);
            const body = this.#sequence(node.body.children, ROOT_SCOPE, 1);

            return `${head} SELECT ${path.sql}, ${body.sql}`;

        }

        const { binding, inner } = this.#enter(node.source, ROOT_SCOPE);
        const path = this.#fragment(node.path, inner);
        const body = this.#sequence(node.body.children, inner, 1);
        const where = this.#where(node.source, inner);
        let order = '';

        if (node.source.orderBy !== null) {

            this.#checkColumn(node.source.table, node.source.orderBy);

            order = ` ORDER BY ${quoteIdent(binding.alias)}.${quoteIdent(node.source.orderBy)} ${node.source.direction.toUpperCase()}`;

        }

        return `${head} SELECT ${path.sql}, ${body.sql} FROM ${quoteIdent(node.source.table)} AS ${quoteIdent(binding.alias)}${where.sql}${order}`;

    }

    // ─────────────────────────────────────────────────────────────
    // Scopes
    // ─────────────────────────────────────────────────────────────

    #enter(source: LoopSource, scope: Scope): { binding: LoopBinding; inner: Scope } {

        this.#tables.add(source.table);

        const depth = scope.depth + 1;
        const binding: LoopBinding = {
            name: source.name,
            table: source.table,
            alias: this.#alias(depth, source.table),
        };

        return {
            binding,
            inner: { loops: [...scope.loops, binding], params: scope.params, depth },
        };

    }

    /**
     * `_d{depth}_{table}`, with a numeric suffix when that names a declared table.
     */
    #alias(depth: number, table: string): string {

        const base = `_d${depth}_${table}`;

        if (!this.#schema.has(base.toLowerCase())) return base;

        for (let suffix = 2; suffix <= MAX_ALIAS_SUFFIX; suffix++) {

            const candidate = `${base}_${suffix}`;

            if (!this.#schema.has(candidate.toLowerCase())) return candidate;

        }

        throw new GenerationError('alias', `No free alias for table '${table}' at loop depth ${depth}`);

    }

    #where(source: LoopSource, scope: Scope): SqlExpr {

        if (source.where === null) return { sql: '', depth: 0 };

        const condition = this.#fragment(source.where, scope);

        return { sql: ` WHERE ${condition.sql}`, depth: condition.depth };

    }

    /**
     * Raw SQL with its lifted references bound.
     */
    #fragment(fragment: SqlFragment, scope: Scope): SqlExpr {

        let sql = '';
        let depth = 1;

        for (const part of fragment) {

            if (part.type === 'sql') {

                sql += part.text;
                depth = Math.max(depth, 1 + nesting(part.text));
                continue;

            }

            const expr = part.type === 'field' ? this.#field(part, scope) : this.#param(part, scope);

            sql += part.type === 'param' ? `(${expr.sql})` : expr.sql;
            depth = Math.max(depth, 1 + expr.depth);

        }

        return this.#check({ sql, depth });

    }

    #checkColumn(table: string, column: string): void {

        const columns = this.#schema.get(table.toLowerCase());

        if (!columns) return;

        const wanted = column.toLowerCase();

        if (!columns.some((declared) => declared.toLowerCase() === wanted)) {

            throw new GenerationError('schema', `Table '${table}' has no column '${column}'`);

        }

    }

    // ─────────────────────────────────────────────────────────────
    // Limits
    // ─────────────────────────────────────────────────────────────

    #guard(level: number): void {

        if (level > this.#maxDepth) {

            throw new GenerationError(
                'depth',
                `Template nests deeper than the engine allows (expression depth limit ${this.#maxDepth})`,
            );

        }

    }

    #check(expr: SqlExpr): SqlExpr {

        this.#guard(expr.depth);

        return expr;

    }

}

function findLoop(scope: Scope, name: string): LoopBinding | undefined {

    for (let i = scope.loops.length - 1; i >= 0; i--) {

        const binding = scope.loops[i];

        if (binding?.name === name) return binding;

    }

    return undefined;

}

/**
 * Deepest parenthesis nesting in a run of SQL.
 */
function nesting(sql: string): number {

    let depth = 0;
    let max = 0;

    for (const ch of sql) {

        if (ch === '(') max = Math.max(max, ++depth);
        if (ch === ')') depth--;

    }

    return max;

}
