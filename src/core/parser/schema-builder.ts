import { MalformedDocumentError, ShapeConflictError } from '../errors.js';
import type { Dialect } from '../types/document.js';
import type { StructuralPath } from '../types/json.js';
import type {
    CompositionKeyword,
    Discriminator,
    NestedSchema,
    SchemaNode,
    SchemaType,
} from '../types/schema.js';
import { optional } from '../utils/object.js';
import { NodeReader, describeType, isPlainObject } from './reader.js';

const SCHEMA_TYPES: readonly SchemaType[] = ['string', 'number', 'integer', 'boolean', 'null', 'object', 'array', 'file'];

export const COMPOSITION_KEYWORDS: readonly CompositionKeyword[] = ['allOf', 'oneOf', 'anyOf', 'not'];

/** Applicators holding one schema. A boolean value stays an assertion keyword. */
export const SINGLE_SUBSCHEMA_KEYWORDS = [
    'propertyNames',
    'contains',
    'if',
    'then',
    'else',
    'additionalItems',
    'unevaluatedItems',
    'unevaluatedProperties',
    'contentSchema',
] as const;

/** Applicators holding a name -> schema map. */
export const MAP_SUBSCHEMA_KEYWORDS = ['patternProperties', 'dependentSchemas', '$defs'] as const;

/** Applicators holding a list of schemas. */
export const LIST_SUBSCHEMA_KEYWORDS = ['prefixItems'] as const;

const OBJECT_FACETS = ['properties', 'additionalProperties', 'required'] as const;
const ARRAY_FACETS = ['items'] as const;

const BASE_KEYWORDS = [
    '$ref',
    'type',
    'title',
    'description',
    'format',
    'nullable',
    'readOnly',
    'writeOnly',
    'deprecated',
    'discriminator',
    ...COMPOSITION_KEYWORDS,
    ...OBJECT_FACETS,
    ...ARRAY_FACETS,
];

/**
 * Builds one schema node from its deserialized form.
 *
 * Exactly one shape is chosen per node: `$ref` wins over everything else
 * (sibling keywords other than `summary`/`description` are not kept), then
 * a composition keyword, then array facets, then object facets, else the
 * node is primitive. Contradicting facets raise `ShapeConflictError`.
 */
export function buildSchema(value: unknown, path: StructuralPath, dialect: Dialect): SchemaNode {
    if (typeof value === 'boolean' && dialect === '3.1') {
        return value ? emptySchema() : buildSchema({ not: {} }, path, dialect);
    }
    const reader = NodeReader.from(value, path, 'Schema');

    if (reader.has('$ref')) {
        const ref = reader.raw('$ref');
        if (typeof ref !== 'string') {
            throw new MalformedDocumentError(`Field '$ref' must be a string, found ${describeType(ref)}.`, reader.at('$ref'));
        }
        return {
            shape: 'reference',
            $ref: ref,
            ...optional('summary', reader.optionalString('summary')),
            ...optional('description', reader.optionalString('description')),
        };
    }

    const types = readTypes(reader, dialect);
    const compositions = COMPOSITION_KEYWORDS.filter(keyword => reader.has(keyword));
    const arrayFacets = ARRAY_FACETS.filter(keyword => reader.has(keyword));
    const objectFacets = OBJECT_FACETS.filter(keyword => reader.has(keyword));

    if (compositions.length > 1) {
        throw new ShapeConflictError(
            `Schema combines composition keywords ${compositions.map(k => `'${k}'`).join(' and ')}; use one per node.`,
            path,
        );
    }

    const consumed = new Set<string>(BASE_KEYWORDS);
    const base = {
        types,
        ...optional('title', reader.optionalString('title')),
        ...optional('description', reader.optionalString('description')),
        ...optional('format', reader.optionalString('format')),
        ...optional('nullable', reader.optionalBoolean('nullable')),
        ...optional('readOnly', reader.optionalBoolean('readOnly')),
        ...optional('writeOnly', reader.optionalBoolean('writeOnly')),
        ...optional('deprecated', reader.optionalBoolean('deprecated')),
        ...optional('discriminator', buildDiscriminator(reader, dialect)),
        subschemas: readSubschemas(reader, dialect, consumed),
        extensions: reader.extensions(),
    };
    const keywords = reader.rest(consumed);

    const keyword = compositions[0];
    if (keyword !== undefined) {
        if (arrayFacets.length > 0 || types.includes('array')) {
            throw new ShapeConflictError(`Schema declares '${keyword}' together with array facets.`, path);
        }
        return {
            shape: 'composition',
            ...base,
            keywords,
            keyword,
            members: readMembers(reader, keyword, dialect),
            properties: reader.map('properties', (entry, entryPath) => buildSchema(entry, entryPath, dialect)),
            required: reader.stringList('required') ?? [],
        };
    }

    const arrayLike = arrayFacets.length > 0 || types.includes('array');
    const objectLike = objectFacets.length > 0 || types.includes('object');

    if (arrayLike && objectLike) {
        throw new ShapeConflictError('Schema declares both array and object shape.', path);
    }

    if (arrayLike) {
        if (arrayFacets.length > 0 && types.length > 0 && !types.includes('array')) {
            throw new ShapeConflictError(`Schema of type ${types.join(', ')} declares 'items'.`, path);
        }
        const items = reader.raw('items');
        return {
            shape: 'array',
            ...base,
            keywords,
            ...optional('items', items === undefined ? undefined : buildSchema(items, reader.at('items'), dialect)),
        };
    }

    if (objectLike) {
        if (objectFacets.length > 0 && types.length > 0 && !types.includes('object')) {
            throw new ShapeConflictError(
                `Schema of type ${types.join(', ')} declares object facets (${objectFacets.join(', ')}).`,
                path,
            );
        }
        return {
            shape: 'object',
            ...base,
            keywords,
            properties: reader.map('properties', (entry, entryPath) => buildSchema(entry, entryPath, dialect)),
            required: reader.stringList('required') ?? [],
            ...optional('additionalProperties', readAdditionalProperties(reader, dialect)),
        };
    }

    return { shape: 'primitive', ...base, keywords };
}

function emptySchema(): SchemaNode {
    return { shape: 'primitive', types: [], subschemas: [], keywords: {}, extensions: {} };
}

function readTypes(reader: NodeReader, dialect: Dialect): SchemaType[] {
    const raw = reader.raw('type');
    if (raw === undefined) return [];
    let values: readonly unknown[];
    if (typeof raw === 'string') {
        values = [raw];
    } else if (Array.isArray(raw) && dialect === '3.1') {
        values = raw;
    } else {
        throw new MalformedDocumentError(
            dialect === '3.1'
                ? `Field 'type' must be a string or an array of strings, found ${describeType(raw)}.`
                : `Field 'type' must be a string, found ${describeType(raw)}.`,
            reader.at('type'),
        );
    }
    return values.map((value, index) => {
        const type = SCHEMA_TYPES.find(candidate => candidate === value);
        if (type === undefined || (type === 'file' && dialect !== '2.0')) {
            throw new MalformedDocumentError(
                `Unsupported schema type ${JSON.stringify(value)}.`,
                typeof raw === 'string' ? reader.at('type') : reader.at('type', index),
            );
        }
        return type;
    });
}

function readMembers(reader: NodeReader, keyword: CompositionKeyword, dialect: Dialect): SchemaNode[] {
    const raw = reader.raw(keyword);
    if (keyword === 'not') {
        if (!isPlainObject(raw) && typeof raw !== 'boolean') {
            throw new ShapeConflictError(`'not' must hold a single schema, found ${describeType(raw)}.`, reader.at('not'));
        }
        return [buildSchema(raw, reader.at('not'), dialect)];
    }
    if (!Array.isArray(raw)) {
        throw new MalformedDocumentError(`'${keyword}' must be an array of schemas, found ${describeType(raw)}.`, reader.at(keyword));
    }
    return raw.map((member, index) => buildSchema(member, reader.at(keyword, index), dialect));
}

function readAdditionalProperties(reader: NodeReader, dialect: Dialect): boolean | SchemaNode | undefined {
    const raw = reader.raw('additionalProperties');
    if (raw === undefined || typeof raw === 'boolean') return raw;
    return buildSchema(raw, reader.at('additionalProperties'), dialect);
}

function buildDiscriminator(reader: NodeReader, dialect: Dialect): Discriminator | undefined {
    const raw = reader.raw('discriminator');
    // Swagger 2.0 declares the discriminator as a bare property name.
    if (dialect === '2.0' && typeof raw === 'string') {
        return { propertyName: raw, mapping: new Map(), extensions: {} };
    }
    const discriminator = reader.optionalObject('discriminator', 'Discriminator');
    if (!discriminator) return undefined;
    return {
        propertyName: discriminator.requiredString('propertyName'),
        mapping: discriminator.map('mapping', (value, path) => {
            if (typeof value !== 'string') {
                throw new MalformedDocumentError(`Discriminator mapping values must be strings, found ${describeType(value)}.`, path);
            }
            return value;
        }),
        extensions: discriminator.extensions(),
    };
}

function readSubschemas(reader: NodeReader, dialect: Dialect, consumed: Set<string>): NestedSchema[] {
    const result: NestedSchema[] = [];
    const canHold = (value: unknown) => isPlainObject(value) || (dialect === '3.1' && typeof value === 'boolean');

    for (const keyword of SINGLE_SUBSCHEMA_KEYWORDS) {
        const raw = reader.raw(keyword);
        if (isPlainObject(raw)) {
            consumed.add(keyword);
            result.push({ keyword, schema: buildSchema(raw, reader.at(keyword), dialect) });
        }
    }
    for (const keyword of MAP_SUBSCHEMA_KEYWORDS) {
        if (!reader.has(keyword)) continue;
        consumed.add(keyword);
        for (const [key, schema] of reader.map(keyword, (value, path) => buildSchema(value, path, dialect))) {
            result.push({ keyword, key, schema });
        }
    }
    for (const keyword of LIST_SUBSCHEMA_KEYWORDS) {
        const raw = reader.optionalArray(keyword);
        if (!raw || !raw.every(canHold)) continue;
        consumed.add(keyword);
        raw.forEach((value, key) => {
            result.push({ keyword, key, schema: buildSchema(value, reader.at(keyword, key), dialect) });
        });
    }
    return result;
}
