import { isReference } from '../model/guards.js';
import type { ParameterObject, RefOr, SpecDocument, StructuralPath, TagObject } from '../types/index.js';
import { getPathTemplateSignature, toPointer } from '../utils/index.js';
import type { ValidationContext } from './context.js';
import type { WalkVisitor } from './walker.js';

/**
 * Registers operationIds across paths, webhooks, callbacks and path item
 * components. A re-used id is reported at each later declaration.
 */
export function operationIdVisitor(ctx: ValidationContext): WalkVisitor {
    return {
        operation(operation, path) {
            ctx.operationPointers.add(toPointer(path));
            const id = operation.operationId;
            if (id === undefined || id === '') return;
            const at = [...path, 'operationId'];
            const first = ctx.operationIds.get(id);
            if (first === undefined) {
                ctx.operationIds.set(id, at);
                return;
            }
            ctx.reportUnless('ignore-non-unique-operation-ids', {
                kind: 'DuplicateIdentifier',
                scope: 'operationId',
                identifier: id,
                path: at,
                firstPath: first,
                message: `operationId '${id}' is already used at ${toPointer(first)}.`,
            });
        },
    };
}

/**
 * `(name, in)` must be unique within one parameter list. An operation list
 * may redeclare a path-level parameter to override it.
 */
export function parameterVisitor(ctx: ValidationContext): WalkVisitor {
    const identify = (parameter: RefOr<ParameterObject>): Pick<ParameterObject, 'name' | 'in'> | undefined => {
        if (!isReference(parameter)) return parameter;
        const resolution = ctx.resolver.resolve('parameters', parameter.$ref);
        return resolution.ok ? resolution.value : undefined;
    };

    return {
        parameterList(parameters, path) {
            const seen = new Map<string, StructuralPath>();
            parameters.forEach((parameter, index) => {
                const identity = identify(parameter);
                if (!identity) return;
                const key = `${identity.in}\u0000${identity.name}`;
                const at = [...path, index];
                const first = seen.get(key);
                if (first === undefined) {
                    seen.set(key, at);
                    return;
                }
                ctx.reportUnless('ignore-duplicate-parameters', {
                    kind: 'DuplicateIdentifier',
                    scope: 'parameter',
                    identifier: identity.name,
                    path: at,
                    firstPath: first,
                    message: `Parameter '${identity.name}' in ${identity.in} is already declared at ${toPointer(first)}.`,
                });
            });
        },
    };
}

/**
 * Templates must start with `/`; two templates that differ only in their
 * variable names (`/a/{x}` and `/a/{y}`) are ambiguous.
 */
export function checkPathTemplates(ctx: ValidationContext, document: SpecDocument): void {
    const signatures = new Map<string, StructuralPath>();
    for (const template of document.paths.keys()) {
        const path = ['paths', template];
        if (!template.startsWith('/')) {
            ctx.reportUnless('ignore-schema-errors', {
                kind: 'InvalidPathTemplate',
                path,
                template,
                message: `Path template '${template}' must start with '/'.`,
            });
        }
        const signature = getPathTemplateSignature(template);
        const first = signatures.get(signature);
        if (first === undefined) {
            signatures.set(signature, path);
            continue;
        }
        ctx.reportUnless('ignore-ambiguous-paths', {
            kind: 'DuplicateIdentifier',
            scope: 'path',
            identifier: template,
            path,
            firstPath: first,
            message: `Path template '${template}' is equivalent to ${toPointer(first)}.`,
        });
    }
}

export function checkDuplicateTags(ctx: ValidationContext, tags: readonly TagObject[]): void {
    const seen = new Map<string, StructuralPath>();
    tags.forEach((tag, index) => {
        const path = ['tags', index];
        const first = seen.get(tag.name);
        if (first === undefined) {
            seen.set(tag.name, path);
            return;
        }
        ctx.reportUnless('ignore-duplicate-tags', {
            kind: 'DuplicateIdentifier',
            scope: 'tag',
            identifier: tag.name,
            path,
            firstPath: first,
            message: `Tag '${tag.name}' is already declared at ${toPointer(first)}.`,
        });
    });
}
