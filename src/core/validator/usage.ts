import { iteratePathGroups } from '../model/traversal.js';
import { UNUSED_COMPONENT_OPTIONS } from '../options.js';
import type { ComponentKind, SecurityRequirement } from '../types/index.js';
import type { ValidationContext } from './context.js';
import { componentToken } from './references.js';
import type { WalkVisitor } from './walker.js';
import { DocumentWalker } from './walker.js';

/**
 * Marks every component reachable from paths, webhooks and security
 * requirements, following references transitively, then reports the
 * components and tags nothing reaches.
 */
export function checkUsage(ctx: ValidationContext, schemaPrefix: string | undefined): void {
    const { document } = ctx;
    const used = new Set<string>();
    const usedTags = new Set<string>();
    const queue: [ComponentKind, string][] = [];
    const key = (kind: ComponentKind, name: string) => `${kind}\u0000${name}`;

    const mark = (kind: ComponentKind, names: readonly string[]) => {
        for (const name of names) {
            if (used.has(key(kind, name))) continue;
            used.add(key(kind, name));
            queue.push([kind, name]);
        }
    };
    const markRequirements = (requirements: readonly SecurityRequirement[]) => {
        for (const requirement of requirements) {
            for (const name of requirement.keys()) {
                const token = componentToken(ctx, 'securitySchemes', name);
                if (token !== undefined) mark('securitySchemes', ctx.resolver.resolve('securitySchemes', token).names);
            }
        }
    };

    const visitor: WalkVisitor = {
        reference: (kind, token) => mark(kind, ctx.resolver.resolve(kind, token).names),
        operation: operation => operation.tags.forEach(tag => usedTags.add(tag)),
        securityRequirements: requirements => markRequirements(requirements),
    };
    const walker = new DocumentWalker(visitor, document.dialect, schemaPrefix);

    for (const entry of iteratePathGroups(document)) {
        walker.pathItemOrRef(entry.item, entry.path);
    }
    if (document.security) markRequirements(document.security);

    for (let next = queue.shift(); next !== undefined; next = queue.shift()) {
        const [kind, name] = next;
        walker.component(document.components, kind, name, ctx.componentPath(kind, name));
    }

    for (const kind of ctx.adapter.componentKinds) {
        for (const name of document.components.names(kind)) {
            if (used.has(key(kind, name))) continue;
            ctx.reportUnless(UNUSED_COMPONENT_OPTIONS[kind], {
                kind: 'UnusedComponent',
                path: ctx.componentPath(kind, name),
                componentKind: kind,
                name,
                message: `Component '${name}' in ${kind} is never used.`,
            });
        }
    }

    document.tags.forEach((tag, index) => {
        if (usedTags.has(tag.name)) return;
        ctx.reportUnless('ignore-unused-tags', {
            kind: 'UnusedTag',
            path: ['tags', index],
            tag: tag.name,
            message: `Tag '${tag.name}' is not used by any operation.`,
        });
    });
}
