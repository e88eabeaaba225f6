import { MalformedDocumentError } from '../errors.js';
import { PlainWriters, fromMap } from '../model/plain.js';
import { NodeReader } from '../parser/reader.js';
import type { OpenApi31Document } from '../types/document.js';
import { optional } from '../utils/object.js';
import type { DialectAdapter } from './dialect.js';
import { versionMarker } from './dialect.js';
import { parseOpenApiRoot, writeOpenApiRoot } from './openapi-3.js';

export const OPENAPI_3_1: DialectAdapter<'3.1'> = {
    dialect: '3.1',
    label: 'OpenAPI 3.1',
    componentKinds: [
        'schemas',
        'responses',
        'parameters',
        'examples',
        'requestBodies',
        'headers',
        'securitySchemes',
        'links',
        'callbacks',
        'pathItems',
    ],
    componentLocations: {
        schemas: ['components', 'schemas'],
        responses: ['components', 'responses'],
        parameters: ['components', 'parameters'],
        examples: ['components', 'examples'],
        requestBodies: ['components', 'requestBodies'],
        headers: ['components', 'headers'],
        securitySchemes: ['components', 'securitySchemes'],
        links: ['components', 'links'],
        callbacks: ['components', 'callbacks'],
        pathItems: ['components', 'pathItems'],
    },
    enforcesComponentNames: true,
    matches: raw => versionMarker(raw, 'openapi')?.startsWith('3.1') ?? false,

    parse(raw): OpenApi31Document {
        const reader = NodeReader.from(raw, [], 'Specification');
        if (!reader.has('paths') && !reader.has('webhooks') && !reader.has('components')) {
            throw new MalformedDocumentError(
                "OpenAPI 3.1 specification must contain at least one of 'paths', 'webhooks' or 'components'.",
            );
        }
        const { build, fields } = parseOpenApiRoot(reader, '3.1');
        return {
            dialect: '3.1',
            ...fields,
            webhooks: reader.map('webhooks', build.pathItemOrRef),
            ...optional('jsonSchemaDialect', reader.optionalString('jsonSchemaDialect')),
        };
    },

    pathGroups: document => [
        { location: ['paths'], items: document.paths },
        { location: ['webhooks'], items: document.webhooks },
    ],

    toPlainObject(document) {
        const write = new PlainWriters('3.1');
        const root = writeOpenApiRoot(document, write);
        // Keep at least one of the three root containers.
        const keepPaths = document.paths.size > 0 || (document.webhooks.size === 0 && document.components.isEmpty());
        return {
            ...root,
            ...(keepPaths ? { paths: fromMap(document.paths, write.pathItemOrRef) } : {}),
            ...(document.webhooks.size > 0 ? { webhooks: fromMap(document.webhooks, write.pathItemOrRef) } : {}),
            ...(document.jsonSchemaDialect === undefined ? {} : { jsonSchemaDialect: document.jsonSchemaDialect }),
        };
    },
};
