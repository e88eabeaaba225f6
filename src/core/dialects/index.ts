import { MalformedDocumentError } from '../errors.js';
import { isPlainObject } from '../parser/reader.js';
import type { Dialect, SpecDocument } from '../types/document.js';
import type { JsonObject } from '../types/json.js';
import type { AnyDialectAdapter, DialectAdapter, PathGroup } from './dialect.js';
import { OPENAPI_3_0 } from './openapi-3-0.js';
import { OPENAPI_3_1 } from './openapi-3-1.js';
import { SWAGGER_2 } from './swagger-2.js';

export type { AnyDialectAdapter, DialectAdapter, PathGroup } from './dialect.js';

/** The closed set of supported dialects. */
export const DIALECTS: { readonly [D in Dialect]: DialectAdapter<D> } = {
    '2.0': SWAGGER_2,
    '3.0': OPENAPI_3_0,
    '3.1': OPENAPI_3_1,
};

const DETECTION_ORDER: readonly AnyDialectAdapter[] = [SWAGGER_2, OPENAPI_3_0, OPENAPI_3_1];

export function isDialect(value: string): value is Dialect {
    return value === '2.0' || value === '3.0' || value === '3.1';
}

/**
 * Picks the adapter from the version marker: `swagger: "2.x"`,
 * `openapi: "3.0.x"` or `openapi: "3.1.x"`.
 */
export function detectDialect(raw: unknown): AnyDialectAdapter {
    if (!isPlainObject(raw)) {
        throw new MalformedDocumentError('Specification must be an object.');
    }
    const adapter = DETECTION_ORDER.find(candidate => candidate.matches(raw));
    if (!adapter) {
        throw new MalformedDocumentError(
            'Unsupported or missing OpenAPI/Swagger version. Expected swagger: "2.x", openapi: "3.0.x" or openapi: "3.1.x".',
        );
    }
    return adapter;
}

/** Adapter-typed dispatch over the dialect tag of a parsed document. */
export function pathGroups(document: SpecDocument): readonly PathGroup[] {
    switch (document.dialect) {
        case '2.0':
            return DIALECTS['2.0'].pathGroups(document);
        case '3.0':
            return DIALECTS['3.0'].pathGroups(document);
        case '3.1':
            return DIALECTS['3.1'].pathGroups(document);
    }
}

/**
 * Re-derives the plain structural form of a document. Building the result
 * again yields a model equal to `document`.
 */
export function toPlainObject(document: SpecDocument): JsonObject {
    switch (document.dialect) {
        case '2.0':
            return DIALECTS['2.0'].toPlainObject(document);
        case '3.0':
            return DIALECTS['3.0'].toPlainObject(document);
        case '3.1':
            return DIALECTS['3.1'].toPlainObject(document);
    }
}

export function adapterFor(document: SpecDocument): AnyDialectAdapter {
    return DIALECTS[document.dialect];
}
