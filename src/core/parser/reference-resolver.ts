import { adapterFor } from '../dialects/index.js';
import type { ComponentsContainer } from '../model/components.js';
import { isResolvedComponent, referenceToken } from '../model/guards.js';
import type { ComponentKind, ResolvedComponent, SpecDocument } from '../types/document.js';
import { COMPONENT_KINDS } from '../types/document.js';
import type { StructuralPath } from '../types/json.js';
import { hasUriScheme, isUrl, parsePointer, toPointer } from '../utils/index.js';

/** Upper bound on the links followed by one `resolve` call. */
export const MAX_REFERENCE_CHAIN = 64;

export type ParsedToken =
    | { readonly type: 'component'; readonly kind: ComponentKind; readonly name: string }
    /** A well-formed pointer into the document that does not name a component. */
    | { readonly type: 'pointer'; readonly segments: readonly string[] }
    | { readonly type: 'external' }
    | { readonly type: 'malformed' };

export type ResolutionFailureReason = 'unresolved' | 'external' | 'malformed' | 'cyclic';

export interface ResolutionFailure {
    readonly reason: ResolutionFailureReason;
    /** The token whose lookup failed; the last entry of `chain`. */
    readonly token: string;
    readonly chain: readonly string[];
    readonly message: string;
}

export type Resolution<K extends ComponentKind> =
    | {
          readonly ok: true;
          readonly value: ResolvedComponent<K>;
          /** Component names visited, the resolved one last. */
          readonly names: readonly string[];
          readonly chain: readonly string[];
      }
    | { readonly ok: false; readonly failure: ResolutionFailure; readonly names: readonly string[] };

/**
 * Resolves reference tokens against the components of one document.
 *
 * Internal tokens follow the dialect's component grammar
 * (`#/definitions/<name>` for Swagger 2.0, `#/components/<kind>/<name>` for
 * OpenAPI 3.x). Chains of components that are themselves references are
 * followed; the structure of the resolved value is never entered, so
 * recursive schemas resolve in a single step. External tokens are only
 * checked syntactically.
 */
export class ReferenceResolver {
    constructor(
        private readonly components: ComponentsContainer,
        private readonly locations: Readonly<Partial<Record<ComponentKind, StructuralPath>>>,
    ) {}

    static forDocument(document: SpecDocument): ReferenceResolver {
        return new ReferenceResolver(document.components, adapterFor(document).componentLocations);
    }

    parseToken(token: string): ParsedToken {
        if (!token.startsWith('#')) {
            return isExternalToken(token) ? { type: 'external' } : { type: 'malformed' };
        }
        const segments = parsePointer(token);
        if (segments === undefined) return { type: 'malformed' };

        for (const [kind, location] of this.locationEntries()) {
            if (segments.length !== location.length + 1) continue;
            if (location.every((segment, index) => segments[index] === segment)) {
                return { type: 'component', kind, name: segments[location.length] ?? '' };
            }
        }
        return { type: 'pointer', segments };
    }

    /** Pointer prefix of a component kind, e.g. `#/components/schemas/`. */
    prefixOf(kind: ComponentKind): string | undefined {
        const location = this.locations[kind];
        return location && `${toPointer(location)}/`;
    }

    resolve<K extends ComponentKind>(kind: K, token: string): Resolution<K> {
        const chain: string[] = [];
        const names: string[] = [];
        const fail = (reason: ResolutionFailureReason, current: string, message: string): Resolution<K> => ({
            ok: false,
            failure: { reason, token: current, chain: [...chain], message },
            names,
        });

        let current = token;
        while (chain.length < MAX_REFERENCE_CHAIN) {
            if (chain.includes(current)) {
                chain.push(current);
                return fail('cyclic', current, `Cyclic reference: ${chain.join(' -> ')}.`);
            }
            chain.push(current);

            const parsed = this.parseToken(current);
            switch (parsed.type) {
                case 'malformed':
                    return fail('malformed', current, `Malformed reference '${current}'.`);
                case 'external':
                    return fail('external', current, `External reference '${current}' cannot be resolved.`);
                case 'pointer':
                    return fail(
                        'unresolved',
                        current,
                        `Reference '${current}' does not point at a component (expected ${this.prefixOf(kind) ?? 'a component pointer'}<name>).`,
                    );
                case 'component':
                    break;
            }
            if (parsed.kind !== kind) {
                return fail('unresolved', current, `Reference '${current}' points at ${parsed.kind}, expected ${kind}.`);
            }

            const value = this.components.get(kind, parsed.name);
            if (value === undefined) {
                return fail('unresolved', current, `Reference '${current}' does not resolve: no ${kind} entry named '${parsed.name}'.`);
            }
            names.push(parsed.name);
            if (isResolvedComponent<K>(value)) {
                return { ok: true, value, names, chain };
            }
            const next = referenceToken(value);
            if (next === undefined) {
                return fail('malformed', current, `Component '${parsed.name}' is neither a reference nor an inline ${kind} entry.`);
            }
            current = next;
        }
        return fail('cyclic', current, `Reference chain starting at '${token}' exceeds ${MAX_REFERENCE_CHAIN} links.`);
    }

    private locationEntries(): [ComponentKind, StructuralPath][] {
        const entries: [ComponentKind, StructuralPath][] = [];
        for (const kind of COMPONENT_KINDS) {
            const location = this.locations[kind];
            if (location) entries.push([kind, location]);
        }
        return entries;
    }
}

/**
 * An external token is an absolute URL, or a relative file path optionally
 * followed by a `#fragment`. Whitespace is never allowed.
 */
export function isExternalToken(token: string): boolean {
    if (token.length === 0 || /\s/.test(token)) return false;
    if (hasUriScheme(token)) return isUrl(token);
    const [file, ...fragments] = token.split('#');
    return file !== undefined && file.length > 0 && fragments.length <= 1;
}
