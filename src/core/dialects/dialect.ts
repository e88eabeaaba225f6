import type {
    ComponentKind,
    Dialect,
    DocumentOf,
    PathItemObject,
    RefOr,
} from '../types/document.js';
import type { JsonObject, StructuralPath } from '../types/json.js';

/** A map of path items together with the root key it lives under. */
export interface PathGroup {
    readonly location: StructuralPath;
    readonly items: ReadonlyMap<string, RefOr<PathItemObject>>;
}

/**
 * The shared contract every dialect implements. Traversal and validation only
 * talk to a document through its adapter, so adding a dialect means adding an
 * adapter and registering it in `DIALECTS`.
 */
export interface DialectAdapter<D extends Dialect = Dialect> {
    readonly dialect: D;
    /** Human-readable name, e.g. `OpenAPI 3.1`. */
    readonly label: string;
    /** Component kinds the dialect can declare, in traversal order. */
    readonly componentKinds: readonly ComponentKind[];
    /** Root location of each component kind's container. */
    readonly componentLocations: Readonly<Partial<Record<ComponentKind, StructuralPath>>>;
    /** Whether component names must match `^[a-zA-Z0-9.\-_]+$`. */
    readonly enforcesComponentNames: boolean;
    /** Tests the version marker of a deserialized root. */
    matches(raw: Readonly<Record<string, unknown>>): boolean;
    parse(raw: Readonly<Record<string, unknown>>): DocumentOf<D>;
    pathGroups(document: DocumentOf<D>): readonly PathGroup[];
    toPlainObject(document: DocumentOf<D>): JsonObject;
}

/** Reads the version marker (`swagger` or `openapi`) of a root object. */
export function versionMarker(raw: Readonly<Record<string, unknown>>, key: 'swagger' | 'openapi'): string | undefined {
    const value = raw[key];
    return typeof value === 'string' ? value : undefined;
}

export type AnyDialectAdapter = { [D in Dialect]: DialectAdapter<D> }[Dialect];

