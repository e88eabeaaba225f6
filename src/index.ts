// src/index.ts

import { parseDocument } from './core/parser.js';
import { SpecLoader } from './core/parser/spec-loader.js';
import type { SpecDocument, ValidationResult, ValidatorConfig } from './core/types/index.js';
import { validateDocument } from './core/validator/index.js';

export * from './core/types/index.js';
export * from './core/errors.js';
export * from './core/options.js';
export { parseDocument } from './core/parser.js';
export { DIALECTS, adapterFor, detectDialect, isDialect, toPlainObject } from './core/dialects/index.js';
export type { AnyDialectAdapter, DialectAdapter, PathGroup } from './core/dialects/index.js';
export { ComponentsContainer } from './core/model/components.js';
export { isNullable, isReference } from './core/model/guards.js';
export { iterateOperations, iteratePathGroups, iteratePaths, iterateWebhooks } from './core/model/traversal.js';
export type { PathEntry } from './core/model/traversal.js';
export { MAX_REFERENCE_CHAIN, ReferenceResolver, isExternalToken } from './core/parser/reference-resolver.js';
export type { ParsedToken, Resolution, ResolutionFailure, ResolutionFailureReason } from './core/parser/reference-resolver.js';
export { SpecLoader } from './core/parser/spec-loader.js';
export { assertValid, validateDocument } from './core/validator/index.js';
export { formatReport } from './core/report.js';
export { loadConfigFile, resolveConfig } from './core/config.js';
export type { CliFlags } from './core/config.js';

export interface ValidationRun {
    readonly document: SpecDocument;
    readonly result: ValidationResult;
}

/**
 * Loads, parses and validates the file named by `config.input`.
 * @throws {MalformedDocumentError} when the document cannot be modelled.
 * @throws {Error} when the file cannot be read or deserialized.
 */
export function validateFromConfig(config: ValidatorConfig): ValidationRun {
    const raw = SpecLoader.load(config.input);
    const document = parseDocument(raw, config.dialect);
    return { document, result: validateDocument(document, config.options) };
}
