import { MalformedDocumentError } from '../errors.js';
import { PlainWriters, fromMap } from '../model/plain.js';
import { NodeReader } from '../parser/reader.js';
import type { OpenApi30Document } from '../types/document.js';
import type { DialectAdapter } from './dialect.js';
import { versionMarker } from './dialect.js';
import { parseOpenApiRoot, writeOpenApiRoot } from './openapi-3.js';

export const OPENAPI_3_0: DialectAdapter<'3.0'> = {
    dialect: '3.0',
    label: 'OpenAPI 3.0',
    componentKinds: ['schemas', 'responses', 'parameters', 'examples', 'requestBodies', 'headers', 'securitySchemes', 'links', 'callbacks'],
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
    },
    enforcesComponentNames: true,
    matches: raw => versionMarker(raw, 'openapi')?.startsWith('3.0') ?? false,

    parse(raw): OpenApi30Document {
        const reader = NodeReader.from(raw, [], 'Specification');
        if (!reader.has('paths')) {
            throw new MalformedDocumentError("OpenAPI 3.0 specification must contain a 'paths' object.");
        }
        const { fields } = parseOpenApiRoot(reader, '3.0');
        return { dialect: '3.0', ...fields };
    },

    pathGroups: document => [{ location: ['paths'], items: document.paths }],

    toPlainObject(document) {
        const write = new PlainWriters('3.0');
        return { ...writeOpenApiRoot(document, write), paths: fromMap(document.paths, write.pathItemOrRef) };
    },
};
