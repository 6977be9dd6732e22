/**
 * Macro table.
 *
 * Macro definitions are hoisted out of the root sequence, so a macro may be
 * called before the point it is defined. The table is built once per
 * compilation and never changes afterwards.
 */
import { ResolutionError } from './errors.js';
import type { AstNode, MacroCallNode, MacroDefNode, SequenceNode } from './types.js';
import { locate } from './utils.js';

/**
 * Read-only view of the macros a template defines and the calls between them.
 */
export class MacroTable {

    readonly #defs: ReadonlyMap<string, MacroDefNode>;
    readonly #graph: ReadonlyMap<string, readonly string[]>;

    constructor(defs: ReadonlyMap<string, MacroDefNode>, graph: ReadonlyMap<string, readonly string[]>) {

        this.#defs = defs;
        this.#graph = graph;

    }

    get size(): number {

        return this.#defs.size;

    }

    has(name: string): boolean {

        return this.#defs.has(name);

    }

    get(name: string): MacroDefNode | undefined {

        return this.#defs.get(name);

    }

    /** Defined macro names, sorted */
    names(): string[] {

        return [...this.#defs.keys()].sort();

    }

    /** Distinct macros called from a macro's body, in call order */
    callees(name: string): readonly string[] {

        return this.#graph.get(name) ?? [];

    }

}

/**
 * Every macro call under a node in source order, macro definitions excluded.
 */
export function collectCalls(node: AstNode): MacroCallNode[] {

    const calls: MacroCallNode[] = [];
    const pending: AstNode[] = [node];

    for (let next = pending.pop(); next !== undefined; next = pending.pop()) {

        switch (next.type) {

        case 'call':
            calls.push(next);
            break;
        case 'sequence':
            pending.push(...[...next.children].reverse());
            break;
        case 'loop':
        case 'file':
            pending.push(next.body);
            break;
        default:
            break;

        }

    }

    return calls;

}

/**
 * Hoist the macro definitions of a parsed template and check the call graph.
 *
 * Checks run in order: redefinitions, unknown names, argument counts,
 * recursion.
 *
 * @param root - Parser output
 * @param source - Template source, for locations in error details
 * @throws ResolutionError
 *
 * @example
 * ```typescript
 * const table = buildMacroTable(parse(tokens, source), source)
 *
 * table.names()         // → ['edge', 'node']
 * table.callees('edge') // → ['node']
 * ```
 */
export function buildMacroTable(root: SequenceNode, source?: string): MacroTable {

    const where = (offset: number): string | undefined =>
        source === undefined ? undefined : `line ${locate(source, offset).line}`;

    const defs = new Map<string, MacroDefNode>();

    for (const child of root.children) {

        if (child.type !== 'macro') continue;

        if (defs.has(child.name)) {

            throw new ResolutionError('duplicate', [child.name], where(child.offset));

        }

        defs.set(child.name, child);

    }

    const bodyCalls = collectCalls(root);
    const macroCalls = new Map<string, MacroCallNode[]>();

    for (const def of defs.values()) {

        macroCalls.set(def.name, collectCalls(def.body));

    }

    const allCalls = [...bodyCalls, ...[...macroCalls.values()].flat()];
    const unknown = [...new Set(allCalls.filter((call) => !defs.has(call.name)).map((call) => call.name))];

    if (unknown.length > 0) {

        const first = allCalls.find((call) => !defs.has(call.name));

        throw new ResolutionError('unresolved', unknown, first ? where(first.offset) : undefined);

    }

    for (const call of allCalls) {

        const def = defs.get(call.name);

        if (def && def.params.length !== call.args.length) {

            const detail = [
                `expected ${def.params.length}, got ${call.args.length}`,
                where(call.offset),
            ].filter(Boolean).join(', ');

            throw new ResolutionError('arity', [call.name], detail);

        }

    }

    const graph = new Map<string, string[]>();

    for (const [name, calls] of macroCalls) {

        graph.set(name, [...new Set(calls.map((call) => call.name))]);

    }

    const cycle = findCycle(graph);

    if (cycle) {

        throw new ResolutionError('cycle', cycle);

    }

    return new MacroTable(defs, graph);

}

/**
 * First cycle in the call graph as a closed path (`['a', 'b', 'a']`), or null.
 */
function findCycle(graph: ReadonlyMap<string, readonly string[]>): string[] | null {

    const done = new Set<string>();
    const path: string[] = [];

    const visit = (name: string): string[] | null => {

        const open = path.indexOf(name);

        if (open !== -1) return [...path.slice(open), name];
        if (done.has(name)) return null;

        path.push(name);

        for (const callee of graph.get(name) ?? []) {

            const found = visit(callee);

            if (found) return found;

        }

        path.pop();
        done.add(name);

        return null;

    };

    for (const name of graph.keys()) {

        const found = visit(name);

        if (found) return found;

    }

    return null;

}
