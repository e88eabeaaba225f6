/**
 * @fileoverview
 * The validation engine. A run walks the whole document once, collecting
 * every issue instead of stopping at the first, then performs the usage pass.
 */

import { SpecValidationError } from '../errors.js';
import { referenceToken } from '../model/guards.js';
import { iteratePaths, iterateWebhooks } from '../model/traversal.js';
import type { OptionSet } from '../options.js';
import { STRICT } from '../options.js';
import type { SpecDocument, ValidationResult } from '../types/index.js';
import { ValidationContext } from './context.js';
import { checkSecurityRequirements, securityVisitor, tagVisitor } from './declarations.js';
import { checkComponentName, checkHostAndBasePath, checkInfo, fieldVisitor } from './fields.js';
import { checkReferenceCycle, linkVisitor, referenceVisitor } from './references.js';
import { schemaVisitor } from './schema-rules.js';
import { checkDuplicateTags, checkPathTemplates, operationIdVisitor, parameterVisitor } from './uniqueness.js';
import { checkUsage } from './usage.js';
import { DocumentWalker, combineVisitors } from './walker.js';

/**
 * Validates a parsed document.
 *
 * Issues are ordered by traversal: info, host and base path, external docs,
 * servers, path templates, paths, webhooks, components, top-level security,
 * tags, link targets and finally unused components and tags.
 *
 * @param options Flags that disable individual checks. The default is strict.
 */
export function validateDocument(document: SpecDocument, options: OptionSet = STRICT): ValidationResult {
    const ctx = new ValidationContext(document, options);
    const schemaPrefix = ctx.resolver.prefixOf('schemas');
    const pending: (() => void)[] = [];
    const visitor = combineVisitors(
        referenceVisitor(ctx),
        operationIdVisitor(ctx),
        parameterVisitor(ctx),
        tagVisitor(ctx),
        securityVisitor(ctx),
        schemaVisitor(ctx),
        fieldVisitor(ctx),
        linkVisitor(ctx, pending),
    );
    const walker = new DocumentWalker(visitor, document.dialect, schemaPrefix);

    checkInfo(ctx, document.info);
    checkHostAndBasePath(ctx, document);
    if (document.externalDocs) visitor.externalDocs?.(document.externalDocs, ['externalDocs']);
    if (document.dialect !== '2.0') walker.servers(document.servers, ['servers']);

    checkPathTemplates(ctx, document);
    for (const entry of iteratePaths(document)) {
        walker.pathItemOrRef(entry.item, entry.path);
    }
    for (const entry of iterateWebhooks(document)) {
        walker.pathItemOrRef(entry.item, entry.path);
    }

    const { components } = document;
    for (const kind of ctx.adapter.componentKinds) {
        for (const [name, value] of components.entries(kind)) {
            const path = ctx.componentPath(kind, name);
            checkComponentName(ctx, kind, name, path);
            walker.component(components, kind, name, path);
            if (referenceToken(value) !== undefined) checkReferenceCycle(ctx, kind, name, path);
        }
    }

    if (document.security) checkSecurityRequirements(ctx, document.security, ['security']);

    checkDuplicateTags(ctx, document.tags);
    document.tags.forEach((tag, index) => {
        if (tag.externalDocs) visitor.externalDocs?.(tag.externalDocs, ['tags', index, 'externalDocs']);
    });

    pending.forEach(check => check());
    checkUsage(ctx, schemaPrefix);

    return ctx.issues.length === 0
        ? { valid: true, issues: [] }
        : { valid: false, issues: Object.freeze([...ctx.issues]) };
}

/**
 * Like `validateDocument`, but throws when any issue is found.
 * @throws {SpecValidationError} carrying the issues.
 */
export function assertValid(document: SpecDocument, options: OptionSet = STRICT): void {
    const result = validateDocument(document, options);
    if (!result.valid) {
        throw new SpecValidationError(result.issues);
    }
}

export { ValidationContext } from './context.js';
export type { WalkVisitor } from './walker.js';
export { DocumentWalker } from './walker.js';
