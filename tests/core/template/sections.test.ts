import { describe, it, expect } from 'vitest';

import { splitSections, sectionRanges } from '../../../src/core/template/sections.js';
import { sliceRanges } from '../../../src/core/template/utils.js';
import { LexError } from '../../../src/core/template/errors.js';

function texts(source: string, kind: 'init' | 'body' | 'fini'): string[] {

    const template = splitSections(source);

    return sectionRanges(template, kind).map((range) => source.slice(range.start, range.end));

}

describe('template: sections', () => {

    it('should treat a source without markers as one body section', () => {

        const template = splitSections('hello {{ x }}');

        expect(template.body).toEqual([{ start: 0, end: 13 }]);
        expect(template.init).toEqual([]);
        expect(template.fini).toEqual([]);

    });

    it('should split init and body on marker lines', () => {

        const source = '%% init\nCREATE TABLE t (a);\n%% body\n{{ a }}';
        const template = splitSections(source);

        expect(sliceRanges(source, template.init)).toBe('CREATE TABLE t (a);\n');
        expect(sliceRanges(source, template.body)).toBe('{{ a }}');

    });

    it('should accept code as an alias for body', () => {

        expect(texts('%% code\nx\n', 'body')).toEqual(['x\n']);

    });

    it('should ignore text before the first marker and after done', () => {

        const source = 'preamble\n%% body\nx\n%% done\ntrailing';

        expect(texts(source, 'body')).toEqual(['x\n']);
        expect(texts(source, 'init')).toEqual([]);

    });

    it('should return fini sections last declared first', () => {

        const source = '%% fini\nA\n%% body\nx\n%% fini\nB\n';

        expect(texts(source, 'fini')).toEqual(['B\n', 'A\n']);

    });

    it('should keep several body sections in source order', () => {

        const source = '%% body\none\n%% init\nCREATE TABLE t (a);\n%% body\ntwo\n';

        expect(texts(source, 'body')).toEqual(['one\n', 'two\n']);

    });

    it('should turn a %% %% line into literal text starting at the second %%', () => {

        const source = '%% body\n%% %% raw\nnext\n';

        expect(sliceRanges(source, splitSections(source).body)).toBe('%% raw\nnext\n');

    });

    it('should accept leading whitespace and CRLF on marker lines', () => {

        expect(texts('  %% body\r\nx', 'body')).toEqual(['x']);

    });

    it('should reject an unknown marker inside a section', () => {

        expect(() => splitSections('%% body\n%% bogus\n')).toThrow(LexError);
        expect(() => splitSections('%% body\n%% bogus\n')).toThrow(
            "Unknown section marker '%% bogus' at line 2, column 1 (byte 8)",
        );

    });

    it('should leave percent signs that are not markers alone', () => {

        expect(texts('%% body\n100%% sure\n', 'body')).toEqual(['100%% sure\n']);

    });

});
