import type { ComponentKind, ComponentTypes, Dialect, RefOr, Reference, ResolvedComponent } from '../types/document.js';
import type { SchemaNode } from '../types/schema.js';

/**
 * Distinguishes a reference from the inline object at a `RefOr` position.
 * Reference schema nodes carry `$ref` as well and satisfy the guard.
 */
export function isReference<T extends object>(value: RefOr<T>): value is Reference {
    return '$ref' in value && typeof value.$ref === 'string';
}

/** Narrows a stored component to its inline form. */
export function isResolvedComponent<K extends ComponentKind>(value: ComponentTypes[K]): value is ResolvedComponent<K> {
    return !('$ref' in value);
}

/** The `$ref` token of a value, if it is a reference. */
export function referenceToken(value: object): string | undefined {
    return '$ref' in value && typeof value.$ref === 'string' ? value.$ref : undefined;
}

/**
 * Whether a schema admits `null`: `x-nullable` in Swagger 2.0, `nullable`
 * in OpenAPI 3.0, a `"null"` entry in `type` in OpenAPI 3.1.
 * A reference node is never nullable by itself.
 */
export function isNullable(node: SchemaNode, dialect: Dialect): boolean {
    if (node.shape === 'reference') return false;
    switch (dialect) {
        case '2.0':
            return node.extensions['x-nullable'] === true;
        case '3.0':
            return node.nullable === true;
        case '3.1':
            return node.types.includes('null');
    }
}
