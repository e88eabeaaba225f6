/**
 * @fileoverview
 * Entry point for building the document model from an already-deserialized
 * value. The dialect is taken from the version marker unless one is forced.
 */

import { DIALECTS, detectDialect } from './dialects/index.js';
import { MalformedDocumentError } from './errors.js';
import { isPlainObject } from './parser/reader.js';
import type { Dialect, SpecDocument } from './types/index.js';
import { deepFreeze } from './utils/index.js';

/**
 * Builds an immutable `SpecDocument`.
 *
 * @param raw The deserialized document (e.g. the output of `JSON.parse` or `yaml.load`).
 * @param dialect Forces a dialect; the version marker must still agree with it.
 * @throws {MalformedDocumentError} on the first structural problem, carrying its location.
 */
export function parseDocument(raw: unknown, dialect?: Dialect): SpecDocument {
    if (!isPlainObject(raw)) {
        throw new MalformedDocumentError('Specification must be an object.');
    }
    const adapter = dialect === undefined ? detectDialect(raw) : DIALECTS[dialect];
    if (!adapter.matches(raw)) {
        throw new MalformedDocumentError(`Version marker does not match ${adapter.label}.`);
    }
    const document: SpecDocument = adapter.parse(raw);
    return deepFreeze(document);
}
