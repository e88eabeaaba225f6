import { describe, expect, it } from 'vitest';
import { MalformedDocumentError, ShapeConflictError } from '@src/core/errors.js';
import { isNullable } from '@src/core/model/guards.js';
import { buildSchema } from '@src/core/parser/schema-builder.js';

describe('Core: Schema builder', () => {
    describe('shape selection', () => {
        it('should build a reference and drop sibling keywords', () => {
            const node = buildSchema({ $ref: '#/components/schemas/Pet', description: 'A pet', type: 'object' }, [], '3.0');
            expect(node).toEqual({ shape: 'reference', $ref: '#/components/schemas/Pet', description: 'A pet' });
        });

        it('should build a primitive with verbatim assertion keywords', () => {
            const node = buildSchema({ type: 'string', minLength: 2, enum: ['a', 'b'], 'x-order': 1 }, [], '3.0');
            expect(node).toEqual({
                shape: 'primitive',
                types: ['string'],
                subschemas: [],
                keywords: { minLength: 2, enum: ['a', 'b'] },
                extensions: { 'x-order': 1 },
            });
        });

        it('should infer an object from its facets', () => {
            const node = buildSchema({ required: ['id'], properties: { id: { type: 'integer' } } }, [], '3.0');
            expect(node.shape).toBe('object');
            if (node.shape === 'object') {
                expect(node.types).toEqual([]);
                expect(node.required).toEqual(['id']);
                expect(Array.from(node.properties.keys())).toEqual(['id']);
            }
        });

        it('should infer an array from items', () => {
            const node = buildSchema({ items: { type: 'string' }, maxItems: 3 }, [], '3.0');
            expect(node.shape).toBe('array');
            if (node.shape === 'array') {
                expect(node.items?.shape).toBe('primitive');
                expect(node.keywords).toEqual({ maxItems: 3 });
            }
        });

        it('should keep object facets beside composition members', () => {
            const node = buildSchema(
                { allOf: [{ $ref: '#/components/schemas/Base' }], properties: { extra: { type: 'string' } }, required: ['extra'] },
                [],
                '3.0',
            );
            expect(node.shape).toBe('composition');
            if (node.shape === 'composition') {
                expect(node.keyword).toBe('allOf');
                expect(node.members).toHaveLength(1);
                expect(node.required).toEqual(['extra']);
            }
        });

        it('should represent an empty composition list', () => {
            const node = buildSchema({ oneOf: [] }, [], '3.0');
            expect(node.shape === 'composition' && node.members.length).toBe(0);
        });

        it('should model `not` as a single member', () => {
            const node = buildSchema({ not: { type: 'null' } }, [], '3.1');
            expect(node.shape === 'composition' && node.keyword).toBe('not');
        });
    });

    describe('shape conflicts', () => {
        it('should reject two composition keywords on one node', () => {
            expect(() => buildSchema({ oneOf: [{}], anyOf: [{}] }, ['definitions', 'Pet'], '2.0')).toThrow(
                new ShapeConflictError("Schema combines composition keywords 'oneOf' and 'anyOf'; use one per node.", [
                    'definitions',
                    'Pet',
                ]),
            );
        });

        it('should reject array and object facets together', () => {
            expect(() => buildSchema({ items: {}, properties: {} }, [], '3.0')).toThrow(
                'Schema declares both array and object shape.',
            );
        });

        it('should reject items on a non-array type', () => {
            expect(() => buildSchema({ type: 'string', items: {} }, [], '3.0')).toThrow(
                "Schema of type string declares 'items'.",
            );
        });

        it('should reject object facets on a non-object type', () => {
            expect(() => buildSchema({ type: 'integer', required: ['a'] }, [], '3.0')).toThrow(
                'Schema of type integer declares object facets (required).',
            );
        });

        it('should reject a composition with array facets', () => {
            expect(() => buildSchema({ allOf: [{}], items: {} }, [], '3.0')).toThrow(
                "Schema declares 'allOf' together with array facets.",
            );
        });

        it('should reject a `not` that is not a single schema', () => {
            expect(() => buildSchema({ not: [{}] }, ['x'], '3.0')).toThrow(ShapeConflictError);
        });

        it('should reject a member list that is not an array', () => {
            expect(() => buildSchema({ anyOf: {} }, [], '3.0')).toThrow("'anyOf' must be an array of schemas, found object.");
        });

        it('should report a conflict as a malformed document', () => {
            expect(() => buildSchema({ oneOf: [], allOf: [] }, [], '3.0')).toThrow(MalformedDocumentError);
        });
    });

    describe('dialect rules', () => {
        it('should accept type arrays and boolean schemas only in 3.1', () => {
            const node = buildSchema({ type: ['string', 'null'] }, [], '3.1');
            expect(node.shape === 'primitive' && node.types).toEqual(['string', 'null']);
            expect(() => buildSchema({ type: ['string', 'null'] }, ['s'], '3.0')).toThrow(
                "Field 'type' must be a string, found array. (at #/s/type)",
            );
            expect(buildSchema(true, [], '3.1').shape).toBe('primitive');
            expect(buildSchema(false, [], '3.1').shape).toBe('composition');
        });

        it('should accept `file` only in Swagger 2.0', () => {
            expect(buildSchema({ type: 'file' }, [], '2.0').shape).toBe('primitive');
            expect(() => buildSchema({ type: 'file' }, [], '3.0')).toThrow('Unsupported schema type "file".');
        });

        it('should read the Swagger 2.0 discriminator as a property name', () => {
            const node = buildSchema({ type: 'object', discriminator: 'petType' }, [], '2.0');
            expect(node.shape !== 'reference' && node.discriminator).toEqual({
                propertyName: 'petType',
                mapping: new Map(),
                extensions: {},
            });
        });

        it('should answer isNullable with the keyword of each dialect', () => {
            expect(isNullable(buildSchema({ type: 'string', 'x-nullable': true }, [], '2.0'), '2.0')).toBe(true);
            expect(isNullable(buildSchema({ type: 'string', nullable: true }, [], '2.0'), '2.0')).toBe(false);
            expect(isNullable(buildSchema({ type: 'string', nullable: true }, [], '3.0'), '3.0')).toBe(true);
            expect(isNullable(buildSchema({ type: 'string' }, [], '3.0'), '3.0')).toBe(false);
            expect(isNullable(buildSchema({ type: ['string', 'null'] }, [], '3.1'), '3.1')).toBe(true);
            expect(isNullable(buildSchema({ type: 'string', nullable: true }, [], '3.1'), '3.1')).toBe(false);
            expect(isNullable(buildSchema({ $ref: '#/components/schemas/Pet' }, [], '3.0'), '3.0')).toBe(false);
        });

        it('should collect nested applicators as subschemas', () => {
            const node = buildSchema(
                { type: 'object', patternProperties: { '^x': { type: 'string' } }, propertyNames: { maxLength: 5 } },
                [],
                '3.1',
            );
            expect(node.shape !== 'reference' && node.subschemas.map(nested => `${nested.keyword}:${nested.key ?? ''}`)).toEqual([
                'propertyNames:',
                'patternProperties:^x',
            ]);
        });
    });
});
