import { describe, expect, it } from 'vitest';
import { MalformedDocumentError } from '@src/core/errors.js';
import { iterateOperations, iteratePathGroups, iteratePaths, iterateWebhooks } from '@src/core/model/traversal.js';
import { isReference } from '@src/core/model/guards.js';
import { parseDocument } from '@src/core/parser.js';
import { emptySpec30, emptySpec31, emptySwagger, info, okResponse } from '../fixtures/common.js';
import { museum31, newPetWebhook31, petstore30, petstoreSwagger } from '../fixtures/petstore.fixture.js';

describe('Core: parseDocument', () => {
    describe('dialect detection', () => {
        it('should detect each dialect from its version marker', () => {
            expect(parseDocument(emptySwagger).dialect).toBe('2.0');
            expect(parseDocument(emptySpec30).dialect).toBe('3.0');
            expect(parseDocument(emptySpec31).dialect).toBe('3.1');
        });

        it('should reject a missing or unsupported version', () => {
            const expected =
                'Unsupported or missing OpenAPI/Swagger version. Expected swagger: "2.x", openapi: "3.0.x" or openapi: "3.1.x".';
            expect(() => parseDocument({ info, paths: {} })).toThrow(expected);
            expect(() => parseDocument({ openapi: '4.0.0', info, paths: {} })).toThrow(expected);
        });

        it('should reject a non-object input', () => {
            expect(() => parseDocument('openapi: 3.0.0')).toThrow(new MalformedDocumentError('Specification must be an object.'));
            expect(() => parseDocument(null)).toThrow(MalformedDocumentError);
        });

        it('should honour a forced dialect only when the marker agrees', () => {
            expect(parseDocument(emptySpec30, '3.0').dialect).toBe('3.0');
            expect(() => parseDocument(emptySpec30, '3.1')).toThrow('Version marker does not match OpenAPI 3.1.');
        });
    });

    describe('required root fields', () => {
        it('should require info and its title and version', () => {
            expect(() => parseDocument({ openapi: '3.0.0', paths: {} })).toThrow("Specification must contain an 'info' object.");
            expect(() => parseDocument({ openapi: '3.0.0', info: { title: 'x' }, paths: {} })).toThrow(
                "Missing required string field 'version'. (at #/info)",
            );
            expect(() => parseDocument({ openapi: '3.0.0', info: { title: 1, version: '1' }, paths: {} })).toThrow(
                "Field 'title' must be a string, found number. (at #/info/title)",
            );
        });

        it('should require paths in Swagger 2.0 and OpenAPI 3.0', () => {
            expect(() => parseDocument({ swagger: '2.0', info })).toThrow("Swagger 2.0 specification must contain a 'paths' object.");
            expect(() => parseDocument({ openapi: '3.0.1', info })).toThrow("OpenAPI 3.0 specification must contain a 'paths' object.");
        });

        it('should accept a 3.1 document with only components', () => {
            const document = parseDocument({ openapi: '3.1.0', info, components: { schemas: { A: { type: 'string' } } } });
            expect(document.paths.size).toBe(0);
            expect(document.components.names('schemas')).toEqual(['A']);
        });

        it('should reject a 3.1 document without paths, webhooks or components', () => {
            expect(() => parseDocument({ openapi: '3.1.0', info })).toThrow(
                "OpenAPI 3.1 specification must contain at least one of 'paths', 'webhooks' or 'components'.",
            );
        });
    });

    describe('structural errors', () => {
        it('should reject a parameter without a name', () => {
            const spec = { ...emptySpec30, paths: { '/a': { get: { parameters: [{ in: 'query' }], responses: {} } } } };
            expect(() => parseDocument(spec)).toThrow(
                "Missing required string field 'name'. (at #/paths/~1a/get/parameters/0)",
            );
        });

        it('should reject a parameter location the dialect does not have', () => {
            const spec = {
                ...emptySpec30,
                paths: { '/a': { get: { parameters: [{ name: 'q', in: 'formData' }], responses: {} } } },
            };
            expect(() => parseDocument(spec)).toThrow(
                "Parameter 'q' has unsupported location 'formData'. Expected one of: query, header, path, cookie.",
            );
        });

        it('should reject a responses map that is not an object', () => {
            const spec = { ...emptySpec30, paths: { '/a': { get: { responses: [] } } } };
            expect(() => parseDocument(spec)).toThrow("Field 'responses' must be an object, found array. (at #/paths/~1a/get/responses)");
        });

        it('should reject an unknown security scheme type', () => {
            const spec = { ...emptySpec30, components: { securitySchemes: { s: { type: 'magic' } } } };
            expect(() => parseDocument(spec)).toThrow("Unknown security scheme type 'magic'. (at #/components/securitySchemes/s/type)");
        });

        it('should reject mutualTLS before OpenAPI 3.1', () => {
            const spec = { ...emptySpec30, components: { securitySchemes: { m: { type: 'mutualTLS' } } } };
            expect(() => parseDocument(spec)).toThrow("Unknown security scheme type 'mutualTLS'.");
        });

        it('should reject a body parameter without a schema in Swagger 2.0', () => {
            const spec = { ...emptySwagger, paths: { '/a': { post: { parameters: [{ name: 'b', in: 'body' }], responses: {} } } } };
            expect(() => parseDocument(spec)).toThrow("Body parameter 'b' must declare a 'schema'.");
        });

        it('should reject a parameter with both schema and content', () => {
            const parameter = { name: 'q', in: 'query', schema: {}, content: { 'application/json': {} } };
            const spec = { ...emptySpec30, paths: { '/a': { get: { parameters: [parameter], responses: {} } } } };
            expect(() => parseDocument(spec)).toThrow(
                "Parameter 'q' contains both 'schema' and 'content'. These fields are mutually exclusive.",
            );
        });

        it('should surface schema shape conflicts with their location', () => {
            const spec = { ...emptySpec30, components: { schemas: { Bad: { type: 'string', properties: {} } } } };
            expect(() => parseDocument(spec)).toThrow(
                'Schema of type string declares object facets (properties). (at #/components/schemas/Bad)',
            );
        });
    });

    describe('model', () => {
        it('should map Swagger 2.0 containers onto component kinds', () => {
            const document = parseDocument(petstoreSwagger);
            expect(document.components.names('schemas')).toEqual(['Pet', 'Error']);
            expect(document.components.names('parameters')).toEqual(['Limit']);
            expect(document.components.names('responses')).toEqual(['Error']);
            expect(document.components.names('securitySchemes')).toEqual(['petstore_auth', 'api_key']);
            expect(document.dialect === '2.0' && document.basePath).toBe('/v1');
        });

        it('should model inline Swagger 2.0 parameter types as a schema', () => {
            const document = parseDocument(petstoreSwagger);
            const limit = document.components.get('parameters', 'Limit');
            expect(limit && !isReference(limit) && limit.schema).toEqual({
                shape: 'primitive',
                types: ['integer'],
                format: 'int32',
                subschemas: [],
                keywords: {},
                extensions: {},
            });
        });

        it('should keep paths in document order and operations in method order', () => {
            const document = parseDocument(petstore30);
            expect(iteratePaths(document).map(entry => entry.key)).toEqual(['/pets', '/pets/{petId}']);
            const first = document.paths.get('/pets');
            expect(first && !isReference(first) && iterateOperations(first).map(([method]) => method)).toEqual(['get', 'post']);
        });

        it('should keep a path item reference unresolved', () => {
            const document = parseDocument(museum31);
            expect(document.paths.get('/events')).toEqual({ $ref: '#/components/pathItems/Events' });
        });

        it('should read webhooks only in 3.1', () => {
            const document = parseDocument(newPetWebhook31);
            expect(iterateWebhooks(document).map(entry => entry.path)).toEqual([['webhooks', 'newPet']]);
            expect(iterateWebhooks(parseDocument(petstore30))).toEqual([]);
            expect(iteratePathGroups(document).map(entry => entry.key)).toEqual(['newPet']);
        });

        it('should skip extension keys among paths and responses', () => {
            const spec = {
                ...emptySpec30,
                paths: { '/a': { get: { responses: { '200': okResponse, 'x-note': 'n' } } }, 'x-gateway': { enabled: true } },
            };
            const document = parseDocument(spec);
            expect(Array.from(document.paths.keys())).toEqual(['/a']);
        });

        it('should distinguish inherited from cleared operation security', () => {
            const spec = {
                ...emptySpec30,
                paths: {
                    '/a': { get: { responses: {} }, post: { security: [], responses: {} } },
                },
            };
            const item = parseDocument(spec).paths.get('/a');
            if (!item || isReference(item)) throw new Error('expected an inline path item');
            expect(item.operations.get('get')?.security).toBeUndefined();
            expect(item.operations.get('post')?.security).toEqual([]);
        });

        it('should deep-freeze the document', () => {
            const document = parseDocument(petstore30);
            expect(Object.isFrozen(document)).toBe(true);
            expect(Object.isFrozen(document.info)).toBe(true);
            expect(Object.isFrozen(document.tags)).toBe(true);
        });
    });
});
