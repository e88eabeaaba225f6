import type { JsonObject } from './json.js';

// ===================================================================================
// Schema Node Model
// ===================================================================================

/** Values accepted by the `type` keyword. `file` only exists in Swagger 2.0. */
export type SchemaType = 'string' | 'number' | 'integer' | 'boolean' | 'null' | 'object' | 'array' | 'file';

export type CompositionKeyword = 'allOf' | 'oneOf' | 'anyOf' | 'not';

export interface Discriminator {
    readonly propertyName: string;
    readonly mapping: ReadonlyMap<string, string>;
    readonly extensions: JsonObject;
}

/**
 * A schema nested under an applicator keyword the model does not give a
 * dedicated field, such as `patternProperties`, `prefixItems` or `if`.
 * `key` is the map key or list index under that keyword, absent when the
 * keyword holds a single schema.
 */
export interface NestedSchema {
    readonly keyword: string;
    readonly key?: string | number;
    readonly schema: SchemaNode;
}

interface SchemaBase {
    /** Declared `type` values in document order. Empty when `type` is absent. */
    readonly types: readonly SchemaType[];
    readonly title?: string;
    readonly description?: string;
    readonly format?: string;
    /** The OpenAPI 3.0 `nullable` keyword. `isNullable` answers for every dialect. */
    readonly nullable?: boolean;
    readonly readOnly?: boolean;
    readonly writeOnly?: boolean;
    readonly deprecated?: boolean;
    readonly discriminator?: Discriminator;
    readonly subschemas: readonly NestedSchema[];
    /** Assertion and annotation keywords carried verbatim (`minimum`, `enum`, `xml`, ...). */
    readonly keywords: JsonObject;
    readonly extensions: JsonObject;
}

export interface PrimitiveSchema extends SchemaBase {
    readonly shape: 'primitive';
}

export interface ObjectSchema extends SchemaBase {
    readonly shape: 'object';
    readonly properties: ReadonlyMap<string, SchemaNode>;
    readonly required: readonly string[];
    readonly additionalProperties?: boolean | SchemaNode;
}

export interface ArraySchema extends SchemaBase {
    readonly shape: 'array';
    readonly items?: SchemaNode;
}

/**
 * A node combining member schemas. It may carry object facets next to its
 * members (`allOf` + `properties` is a common way to extend a base type).
 */
export interface CompositionSchema extends SchemaBase {
    readonly shape: 'composition';
    readonly keyword: CompositionKeyword;
    readonly members: readonly SchemaNode[];
    readonly properties: ReadonlyMap<string, SchemaNode>;
    readonly required: readonly string[];
}

/**
 * The only way a schema can point at another one, itself included.
 * Recursive types are always expressed through this node, so a schema
 * tree is finite.
 */
export interface ReferenceSchema {
    readonly shape: 'reference';
    readonly $ref: string;
    readonly summary?: string;
    readonly description?: string;
}

export type SchemaNode = PrimitiveSchema | ObjectSchema | ArraySchema | CompositionSchema | ReferenceSchema;

export type SchemaShape = SchemaNode['shape'];
