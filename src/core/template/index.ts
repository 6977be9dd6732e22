/**
 * Template compiler module.
 *
 * Compiles rowcast templates into a single SQLite query:
 * - `%% init` / `%% body` / `%% fini` sections
 * - `{% for %}` loops over tables, `{% macro %}` definitions, `{% file %}` blocks
 * - `{{ column }}` substitutions and `{{ call name(...) }}` macro calls
 *
 * @example
 * ```typescript
 * import { compile } from './core/template/index.js'
 *
 * const compiled = compile(source)
 *
 * console.log(compiled.query)
 * ```
 *
 * @module
 */

// Pipeline entry points
export { compile, compileFile } from './compiler.js';
export type { CompileOptions } from './compiler.js';

// Stages
export { splitSections, sectionRanges } from './sections.js';
export { tokenize } from './lexer.js';
export { parse } from './parser.js';
export { MacroTable, buildMacroTable, collectCalls } from './macros.js';
export { extractSchema, WRITE_TABLE, WRITE_COLUMNS } from './schema.js';
export { QueryGenerator, DEFAULT_MAX_EXPRESSION_DEPTH } from './generator.js';
export type { GeneratorOptions, GeneratedQuery } from './generator.js';

// Helpers
export { quoteLiteral, quoteIdent } from './sql.js';
export { trimStart, trimEnd } from './trim.js';
export { locate, sliceRanges } from './utils.js';

// Errors
export {
    TemplateError,
    LexError,
    ParseError,
    ResolutionError,
    GenerationError,
    ExecutionError,
} from './errors.js';
export type { ErrorStage, ExecutionStage, ResolutionReason, GenerationReason } from './errors.js';

// Types
export type {
    Template,
    SectionKind,
    SectionRange,
    SourceLocation,
    Token,
    TrimLevel,
    AstNode,
    SequenceNode,
    TextNode,
    FieldRefNode,
    ExprNode,
    ParamRefNode,
    LoopNode,
    LoopSource,
    MacroDefNode,
    MacroCallNode,
    MacroArg,
    FileNode,
    SqlFragment,
    SortDirection,
    CompiledQuery,
    Schema,
} from './types.js';
