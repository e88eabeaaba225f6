import { pathGroups } from '../dialects/index.js';
import type {
    HttpMethod,
    OperationObject,
    PathItemObject,
    RefOr,
    SpecDocument,
} from '../types/document.js';
import type { StructuralPath } from '../types/json.js';

export interface PathEntry {
    /** Route template, or the webhook name. */
    readonly key: string;
    readonly item: RefOr<PathItemObject>;
    readonly path: StructuralPath;
}

function entriesOf(location: StructuralPath, items: ReadonlyMap<string, RefOr<PathItemObject>>): PathEntry[] {
    return Array.from(items, ([key, item]) => ({ key, item, path: [...location, key] }));
}

/** Path items under `paths`, in document order. */
export function iteratePaths(document: SpecDocument): PathEntry[] {
    return entriesOf(['paths'], document.paths);
}

/** Webhook path items; empty for dialects without webhooks. */
export function iterateWebhooks(document: SpecDocument): PathEntry[] {
    return document.dialect === '3.1' ? entriesOf(['webhooks'], document.webhooks) : [];
}

/** Every path item container of the document: `paths`, then `webhooks`. */
export function iteratePathGroups(document: SpecDocument): PathEntry[] {
    return pathGroups(document).flatMap(group => entriesOf(group.location, group.items));
}

/** Operations of a path item in method order. */
export function iterateOperations(pathItem: PathItemObject): [HttpMethod, OperationObject][] {
    return Array.from(pathItem.operations);
}
