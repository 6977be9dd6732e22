import { describe, it, expect } from 'vitest';

import { tokenize } from '../../../src/core/template/lexer.js';
import { LexError } from '../../../src/core/template/errors.js';

describe('template: lexer', () => {

    it('should split literals and substitutions', () => {

        expect(tokenize('a{{ up }}b')).toEqual([
            { type: 'literal', text: 'a', offset: 0 },
            { type: 'value', expr: 'up', offset: 1, trimBefore: 0, trimAfter: 0 },
            { type: 'literal', text: 'b', offset: 9 },
        ]);

    });

    it('should read block directives and their arguments', () => {

        const tokens = tokenize("{% for Edge sep ', ' %}x{% endfor %}");

        expect(tokens).toEqual([
            {
                type: 'open',
                kind: 'for',
                args: "Edge sep ', '",
                argsOffset: 7,
                offset: 0,
                trimBefore: 1,
                trimAfter: 2,
            },
            { type: 'literal', text: 'x', offset: 23 },
            { type: 'close', kind: 'for', offset: 24, trimBefore: 1, trimAfter: 2 },
        ]);

    });

    it('should skip tag terminators inside quoted strings', () => {

        const [token] = tokenize("{{ 'a %} }} b' }}");

        expect(token).toEqual({ type: 'value', expr: "'a %} }} b'", offset: 0, trimBefore: 0, trimAfter: 0 });

    });

    it('should read trim markers on both sides', () => {

        const [token] = tokenize('{%- for x --%}');

        expect(token).toMatchObject({ type: 'open', args: 'x', trimBefore: 1, trimAfter: 2 });

    });

    it('should give unmarked block tags their line trims', () => {

        const tokens = tokenize('{% macro m() %}x{% endmacro %}{{ y }}');

        expect(tokens.map((token) => token.type === 'literal' ? null : [token.trimBefore, token.trimAfter])).toEqual([
            [1, 2],
            null,
            [2, 2],
            [0, 0],
        ]);

    });

    it('should turn block trims off with a plus marker', () => {

        const [open, , close] = tokenize('{%+ for x +%}y{%+ endfor -%}');

        expect(open).toMatchObject({ type: 'open', args: 'x', trimBefore: 0, trimAfter: 0 });
        expect(close).toMatchObject({ type: 'close', kind: 'for', trimBefore: 0, trimAfter: 1 });

    });

    it('should not read a plus as a marker in substitutions', () => {

        const [token] = tokenize('{{ +1 }}');

        expect(token).toEqual({ type: 'value', expr: '+1', offset: 0, trimBefore: 0, trimAfter: 0 });

    });

    it('should read up to three dashes', () => {

        const [token] = tokenize('{{--- x ---}}');

        expect(token).toMatchObject({ type: 'value', expr: 'x', trimBefore: 3, trimAfter: 3 });

    });

    it('should nest comments', () => {

        expect(tokenize('a{# x {# y #} z #}b')).toEqual([
            { type: 'literal', text: 'a', offset: 0 },
            { type: 'comment', offset: 1, trimBefore: 0, trimAfter: 0 },
            { type: 'literal', text: 'b', offset: 18 },
        ]);

    });

    it('should split macro call arguments on top-level commas', () => {

        const [token] = tokenize("{{ call edge(up, 'a,b', @p) }}");

        expect(token).toMatchObject({ type: 'call', name: 'edge', args: ['up', "'a,b'", '@p'] });

    });

    it('should read a call without arguments', () => {

        const [token] = tokenize('{{ call header() }}');

        expect(token).toMatchObject({ type: 'call', name: 'header', args: [] });

    });

    it('should only scan the given ranges', () => {

        const source = 'xx{{ a }}yy';

        expect(tokenize(source, [{ start: 2, end: 9 }])).toEqual([
            { type: 'value', expr: 'a', offset: 2, trimBefore: 0, trimAfter: 0 },
        ]);

    });

    describe('errors', () => {

        it('should report an unterminated tag at its opening delimiter', () => {

            expect(() => tokenize('x{% for T')).toThrow("Unterminated '{%' tag at line 1, column 2 (byte 1)");

        });

        it('should report offsets in bytes', () => {

            const error = catchLexError(() => tokenize('é{{ x'));

            expect(error.location).toEqual({ offset: 2, line: 1, column: 2 });

        });

        it('should report an unterminated string', () => {

            expect(() => tokenize("{{ 'abc }}")).toThrow('Unterminated string at line 1, column 4 (byte 3)');

        });

        it('should report an unterminated comment', () => {

            expect(() => tokenize('{# a {# b #}')).toThrow('Unterminated comment at line 1, column 1 (byte 0)');

        });

        it('should reject a stray comment closer', () => {

            expect(() => tokenize('a #} b')).toThrow("Unexpected '#}' outside a comment");

        });

        it('should reject an unknown directive', () => {

            expect(() => tokenize('{% loop T %}')).toThrow("Unknown directive 'loop'");

        });

        it('should reject arguments on a close directive', () => {

            expect(() => tokenize('{% endfor T %}')).toThrow("Unexpected arguments to 'endfor'");

        });

        it('should reject empty tags', () => {

            expect(() => tokenize('{%  %}')).toThrow('Empty directive');
            expect(() => tokenize('{{ }}')).toThrow('Empty substitution');

        });

        it('should reject a malformed macro call', () => {

            expect(() => tokenize('{{ call edge }}')).toThrow('Malformed macro call');
            expect(() => tokenize('{{ call edge(a,,b) }}')).toThrow('Malformed macro call');

        });

    });

});

function catchLexError(fn: () => unknown): LexError {

    try {

        fn();

    }
    catch (err) {

        if (err instanceof LexError) return err;
        throw err;

    }

    throw new Error('Expected a LexError');

}
