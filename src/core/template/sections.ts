/**
 * Section splitter.
 *
 * A template is cut into init, body and fini sections by marker lines:
 *
 * ```
 * %% init
 * CREATE TABLE Edge (up, dn);
 * %% body
 * digraph { ... }
 * %% fini
 * DROP TABLE Edge;
 * %% done
 * ```
 *
 * Marker lines belong to no section. Text before the first marker, and
 * after `%% done`, is ignored. A source without any marker is all body.
 * Inside a body, a line starting `%% %%` is the escape for literal text
 * beginning with `%%`.
 */
import { LexError } from './errors.js';
import type { SectionKind, SectionRange, Template } from './types.js';
import { locate } from './utils.js';

const MARKER_RE = /^[ \t]*%%[ \t]+(init|body|code|fini|done)[ \t]*\r?$/;
const ESCAPE_RE = /^[ \t]*%%[ \t]+(?=%%)/;
const MARKER_LIKE_RE = /^[ \t]*%%(?:[ \t]|\r?$)/;

type SplitState = SectionKind | 'skip';

/**
 * Split a template source into its sections.
 *
 * @throws LexError on a `%%` line that is neither a marker nor an escape
 *
 * @example
 * ```typescript
 * const template = splitSections('%% init\nCREATE TABLE t (a);\n%% body\n{{ a }}')
 *
 * sliceRanges(template.source, template.init)  // → 'CREATE TABLE t (a);\n'
 * sliceRanges(template.source, template.body)  // → '{{ a }}'
 * ```
 */
export function splitSections(source: string): Template {

    const template: Template = { source, init: [], body: [], fini: [] };

    const hasMarker = source.split('\n').some((line) => MARKER_RE.test(line));

    let state: SplitState = hasMarker ? 'skip' : 'body';
    let rangeStart = 0;

    const close = (end: number): void => {

        if (state !== 'skip' && end > rangeStart) {

            template[state].push({ start: rangeStart, end });

        }

    };

    let lineStart = 0;

    while (lineStart < source.length) {

        const newline = source.indexOf('\n', lineStart);
        const lineEnd = newline === -1 ? source.length : newline;
        const nextLine = newline === -1 ? source.length : newline + 1;
        const line = source.slice(lineStart, lineEnd);

        const marker = MARKER_RE.exec(line);

        if (marker) {

            close(lineStart);
            state = toState(marker[1] ?? 'done');
            rangeStart = nextLine;

        }
        else if (state === 'body' && ESCAPE_RE.test(line)) {

            const escape = ESCAPE_RE.exec(line);
            const skip = escape ? escape[0].length : 0;

            close(lineStart);
            rangeStart = lineStart + skip;

        }
        else if (state !== 'skip' && MARKER_LIKE_RE.test(line)) {

            throw new LexError(
                `Unknown section marker '${line.trim()}'`,
                locate(source, lineStart),
            );

        }

        lineStart = nextLine;

    }

    close(source.length);

    return template;

}

function toState(word: string): SplitState {

    switch (word) {

    case 'init':
        return 'init';
    case 'body':
    case 'code':
        return 'body';
    case 'fini':
        return 'fini';
    default:
        return 'skip';

    }

}

/**
 * Ranges of one section kind, in the order they run.
 *
 * Fini sections run last-declared first so teardown mirrors setup.
 */
export function sectionRanges(template: Template, kind: SectionKind): SectionRange[] {

    return kind === 'fini' ? [...template.fini].reverse() : [...template[kind]];

}
