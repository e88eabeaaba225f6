import type { ResolutionFailure } from '../parser/reference-resolver.js';
import type { ComponentKind, StructuralPath } from '../types/index.js';
import { encodeFragmentSegment, parsePointer, toPointer } from '../utils/index.js';
import type { ValidationContext } from './context.js';
import type { WalkVisitor } from './walker.js';

/** Turns a resolver failure into an issue at `path`. */
export function reportResolutionFailure(ctx: ValidationContext, failure: ResolutionFailure, path: StructuralPath): void {
    const { token: reference, message } = failure;
    switch (failure.reason) {
        case 'unresolved':
            ctx.report({ kind: 'UnresolvedReference', path, reference, external: false, message });
            return;
        case 'external':
            ctx.reportUnless('ignore-external-references', {
                kind: 'UnresolvedReference',
                path,
                reference,
                external: true,
                message,
            });
            return;
        case 'malformed':
            ctx.report({ kind: 'MalformedReference', path, reference, message });
            return;
        case 'cyclic':
            ctx.report({ kind: 'CyclicReference', path, reference, chain: failure.chain, message });
            return;
    }
}

/**
 * Checks the token at each reference position. Only the first link is
 * judged here; a broken link further down a chain is reported at the
 * component that holds it.
 */
export function referenceVisitor(ctx: ValidationContext): WalkVisitor {
    return {
        reference(kind, token, path) {
            const resolution = ctx.resolver.resolve(kind, token);
            if (!resolution.ok && resolution.failure.chain.length === 1) {
                reportResolutionFailure(ctx, resolution.failure, path);
            }
        },
    };
}

/** The internal token naming a component, e.g. `#/components/schemas/Pet`. */
export function componentToken(ctx: ValidationContext, kind: ComponentKind, name: string): string | undefined {
    const prefix = ctx.resolver.prefixOf(kind);
    return prefix === undefined ? undefined : `${prefix}${encodeFragmentSegment(name)}`;
}

/**
 * Reports a component that is itself a reference and lies on a reference
 * loop. Each component on the loop reports once.
 */
export function checkReferenceCycle(ctx: ValidationContext, kind: ComponentKind, name: string, path: StructuralPath): void {
    const token = componentToken(ctx, kind, name);
    if (token === undefined) return;
    const resolution = ctx.resolver.resolve(kind, token);
    if (!resolution.ok && resolution.failure.reason === 'cyclic' && resolution.failure.token === token) {
        reportResolutionFailure(ctx, resolution.failure, path);
    }
}

/**
 * Links name their target by `operationId` or by an `operationRef` pointer.
 * Both are checked once every operation of the document has been seen.
 * Pointers are compared by their decoded segments.
 */
export function linkVisitor(ctx: ValidationContext, pending: (() => void)[]): WalkVisitor {
    return {
        link(link, path) {
            const { operationId, operationRef } = link;
            if (operationId !== undefined) {
                pending.push(() => {
                    if (!ctx.operationIds.has(operationId)) {
                        ctx.report({
                            kind: 'UnresolvedReference',
                            path: [...path, 'operationId'],
                            reference: operationId,
                            external: false,
                            message: `Link target operationId '${operationId}' does not match any operation.`,
                        });
                    }
                });
            }
            if (operationRef !== undefined && operationRef.startsWith('#')) {
                pending.push(() => {
                    const segments = parsePointer(operationRef);
                    if (segments === undefined || !ctx.operationPointers.has(toPointer(segments))) {
                        ctx.report({
                            kind: 'UnresolvedReference',
                            path: [...path, 'operationRef'],
                            reference: operationRef,
                            external: false,
                            message: `Link target operationRef '${operationRef}' does not point at an operation.`,
                        });
                    }
                });
            }
        },
    };
}
