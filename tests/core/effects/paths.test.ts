import { describe, it, expect } from 'vitest';
import { join, resolve } from 'node:path';

import {
    EffectPathError,
    validateEffectPath,
    resolveEffectPath,
} from '../../../src/core/effects/paths.js';

describe('effects: paths', () => {

    describe('validateEffectPath', () => {

        it('should accept relative paths made of the allowed characters', () => {

            expect(() => validateEffectPath('graphs/a-b_c.dot')).not.toThrow();
            expect(() => validateEffectPath('.hidden/file')).not.toThrow();

        });

        it('should reject an empty path', () => {

            expect(() => validateEffectPath('')).toThrow("Invalid side-effect path '': path is empty");

        });

        it('should reject characters outside the allowed set', () => {

            expect(() => validateEffectPath('a b.txt')).toThrow(EffectPathError);
            expect(() => validateEffectPath('a\\b')).toThrow(EffectPathError);
            expect(() => validateEffectPath('a:b')).toThrow(EffectPathError);

        });

        it('should reject absolute paths', () => {

            expect(() => validateEffectPath('/etc/passwd')).toThrow(
                "Invalid side-effect path '/etc/passwd': path is absolute",
            );

        });

        it('should reject dot segments', () => {

            expect(() => validateEffectPath('../a')).toThrow("'..' segment");
            expect(() => validateEffectPath('a/./b')).toThrow("'.' segment");

        });

        it('should reject empty segments', () => {

            expect(() => validateEffectPath('a//b')).toThrow('empty segment');
            expect(() => validateEffectPath('dir/')).toThrow('empty segment');

        });

    });

    describe('resolveEffectPath', () => {

        it('should resolve under the prefix', () => {

            expect(resolveEffectPath('out', 'x/y.txt')).toBe(join(resolve('out'), 'x', 'y.txt'));

        });

        it('should carry the reason on the error', () => {

            try {

                resolveEffectPath('out', '../escape');

            }
            catch (err) {

                expect(err).toBeInstanceOf(EffectPathError);
                expect(err).toMatchObject({ path: '../escape', reason: "'..' segment" });

                return;

            }

            throw new Error('Expected an EffectPathError');

        });

    });

});
