import { describe, it, expect } from 'vitest';

import { extractSchema } from '../../../src/core/template/schema.js';

describe('template: schema', () => {

    it('should read column lists', () => {

        const schema = extractSchema('CREATE TABLE Edge (up TEXT, dn TEXT);');

        expect(schema.get('edge')).toEqual(['up', 'dn']);

    });

    it('should always declare sys_Write', () => {

        expect(extractSchema('').get('sys_write')).toEqual(['path', 'content']);

    });

    it('should skip table constraints and nested parentheses', () => {

        const schema = extractSchema(
            'CREATE TEMP TABLE IF NOT EXISTS "Node" (id INTEGER PRIMARY KEY, label VARCHAR(20), UNIQUE (label))',
        );

        expect(schema.get('node')).toEqual(['id', 'label']);

    });

    it('should map views and AS SELECT tables to unknown columns', () => {

        const schema = extractSchema(
            'CREATE TABLE t (a); CREATE VIEW v AS SELECT a FROM t; CREATE TABLE t2 AS SELECT * FROM t;',
        );

        expect(schema.get('v')).toBeNull();
        expect(schema.get('t2')).toBeNull();
        expect(schema.get('t')).toEqual(['a']);

    });

    it('should follow DROP and ALTER TABLE ADD', () => {

        const schema = extractSchema(
            'CREATE TABLE a (x); CREATE TABLE b (y); DROP TABLE IF EXISTS b; ALTER TABLE a ADD COLUMN z TEXT;',
        );

        expect(schema.get('a')).toEqual(['x', 'z']);
        expect(schema.has('b')).toBe(false);

    });

    it('should ignore keywords inside strings and comments', () => {

        const schema = extractSchema("INSERT INTO log VALUES ('CREATE TABLE fake (q)'); -- CREATE TABLE other (r)");

        expect([...schema.keys()]).toEqual(['sys_write']);

    });

});
