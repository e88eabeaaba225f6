// ===================================================================================
// Plain structural values
// ===================================================================================

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/** One step of a structural location: an object key or an array index. */
export type PathSegment = string | number;

/** A structural location inside a document, e.g. `['paths', '/pets', 'get']`. */
export type StructuralPath = readonly PathSegment[];
