import type { SecurityRequirement, SecurityScheme, StructuralPath } from '../types/index.js';
import { OAUTH_FLOW_NAMES } from '../types/index.js';
import type { ValidationContext } from './context.js';
import { componentToken } from './references.js';
import type { WalkVisitor } from './walker.js';

/** Every operation tag must be declared in the top-level `tags` list. */
export function tagVisitor(ctx: ValidationContext): WalkVisitor {
    const declared = new Set(ctx.document.tags.map(tag => tag.name));
    return {
        operation(operation, path) {
            operation.tags.forEach((tag, index) => {
                if (declared.has(tag)) return;
                ctx.reportUnless('ignore-missing-tags', {
                    kind: 'UndeclaredTagUsed',
                    path: [...path, 'tags', index],
                    tag,
                    message: `Tag '${tag}' is not declared in the top-level tags list.`,
                });
            });
        },
    };
}

/** Scopes an OAuth2 scheme declares; `undefined` for schemes without scopes. */
export function declaredScopes(scheme: SecurityScheme): ReadonlySet<string> | undefined {
    if (scheme.type !== 'oauth2') return undefined;
    if ('flow' in scheme) return new Set(scheme.scopes.keys());
    const scopes = new Set<string>();
    for (const name of OAUTH_FLOW_NAMES) {
        for (const scope of scheme.flows[name]?.scopes.keys() ?? []) scopes.add(scope);
    }
    return scopes;
}

/**
 * Requirement names must exist among the security schemes, and the scopes
 * of an OAuth2 requirement must be declared by its scheme.
 */
export function checkSecurityRequirements(
    ctx: ValidationContext,
    requirements: readonly SecurityRequirement[],
    path: StructuralPath,
): void {
    const { components } = ctx.document;
    requirements.forEach((requirement, index) => {
        for (const [name, scopes] of requirement) {
            const at = [...path, index, name];
            const token = componentToken(ctx, 'securitySchemes', name);
            if (!components.has('securitySchemes', name) || token === undefined) {
                ctx.reportUnless('ignore-missing-security-schemes', {
                    kind: 'UndeclaredSecuritySchemeUsed',
                    path: at,
                    scheme: name,
                    message: `Security scheme '${name}' is not declared.`,
                });
                continue;
            }
            // A scheme that fails to resolve is reported at its declaration.
            const resolution = ctx.resolver.resolve('securitySchemes', token);
            const declared = resolution.ok ? declaredScopes(resolution.value) : undefined;
            if (!declared) continue;
            scopes.forEach((scope, scopeIndex) => {
                if (declared.has(scope)) return;
                ctx.reportUnless('ignore-missing-security-schemes', {
                    kind: 'UndeclaredScope',
                    path: [...at, scopeIndex],
                    scheme: name,
                    scope,
                    message: `Scope '${scope}' is not declared by security scheme '${name}'.`,
                });
            });
        }
    });
}

export function securityVisitor(ctx: ValidationContext): WalkVisitor {
    return {
        securityRequirements: (requirements, path) => checkSecurityRequirements(ctx, requirements, path),
    };
}
