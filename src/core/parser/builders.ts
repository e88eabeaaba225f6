/**
 * @fileoverview
 * Builders for the vocabulary shared by all dialects: info, tags, path items,
 * operations, parameters, responses and the OpenAPI 3.x media-type family.
 * Each builder takes the deserialized value and its structural path and
 * either returns a model object or throws `MalformedDocumentError`.
 */

import { MalformedDocumentError } from '../errors.js';
import type {
    CallbackObject,
    ContactObject,
    Dialect,
    EncodingObject,
    ExampleObject,
    ExternalDocumentationObject,
    HeaderObject,
    HttpMethod,
    InfoObject,
    LicenseObject,
    LinkObject,
    MediaTypeObject,
    OperationObject,
    ParameterLocation,
    ParameterObject,
    PathItemObject,
    RefOr,
    Reference,
    RequestBodyObject,
    ResponseObject,
    SecurityRequirement,
    ServerObject,
    ServerVariableObject,
    TagObject,
} from '../types/document.js';
import { HTTP_METHODS } from '../types/document.js';
import type { StructuralPath } from '../types/json.js';
import { optional } from '../utils/object.js';
import { NodeReader, describeType, isPlainObject } from './reader.js';
import { buildSchema } from './schema-builder.js';

const PARAMETER_LOCATIONS: Readonly<Record<Dialect, readonly ParameterLocation[]>> = {
    '2.0': ['query', 'header', 'path', 'formData', 'body'],
    '3.0': ['query', 'header', 'path', 'cookie'],
    '3.1': ['query', 'header', 'path', 'cookie'],
};

/** Parameter fields of Swagger 2.0 that are not part of the inline type declaration. */
const SWAGGER_PARAMETER_FIELDS = new Set(['name', 'in', 'description', 'required', 'allowEmptyValue', 'schema']);

export function isReferenceValue(value: unknown): value is Record<string, unknown> & { $ref: unknown } {
    return isPlainObject(value) && '$ref' in value;
}

export function buildReference(value: unknown, path: StructuralPath): Reference {
    const reader = NodeReader.from(value, path, 'Reference');
    return {
        $ref: reader.requiredString('$ref'),
        ...optional('summary', reader.optionalString('summary')),
        ...optional('description', reader.optionalString('description')),
    };
}

/** Builds a position that may hold either a `$ref` or the object itself. */
export function refOr<T>(value: unknown, path: StructuralPath, build: (value: unknown, path: StructuralPath) => T): RefOr<T> {
    return isReferenceValue(value) ? buildReference(value, path) : build(value, path);
}

export function buildInfo(value: unknown, path: StructuralPath): InfoObject {
    const reader = NodeReader.from(value, path, "The 'info' object");
    return {
        title: reader.requiredString('title'),
        version: reader.requiredString('version'),
        ...optional('summary', reader.optionalString('summary')),
        ...optional('description', reader.optionalString('description')),
        ...optional('termsOfService', reader.optionalString('termsOfService')),
        ...optional('contact', mapOptional(reader, 'contact', buildContact)),
        ...optional('license', mapOptional(reader, 'license', buildLicense)),
        extensions: reader.extensions(),
    };
}

function buildContact(value: unknown, path: StructuralPath): ContactObject {
    const reader = NodeReader.from(value, path, 'Contact');
    return {
        ...optional('name', reader.optionalString('name')),
        ...optional('url', reader.optionalString('url')),
        ...optional('email', reader.optionalString('email')),
        extensions: reader.extensions(),
    };
}

function buildLicense(value: unknown, path: StructuralPath): LicenseObject {
    const reader = NodeReader.from(value, path, 'License');
    const url = reader.optionalString('url');
    const identifier = reader.optionalString('identifier');
    if (url !== undefined && identifier !== undefined) {
        throw new MalformedDocumentError(
            "License object cannot contain both 'url' and 'identifier' fields. They are mutually exclusive.",
            path,
        );
    }
    return {
        name: reader.requiredString('name'),
        ...optional('url', url),
        ...optional('identifier', identifier),
        extensions: reader.extensions(),
    };
}

export function buildExternalDocs(value: unknown, path: StructuralPath): ExternalDocumentationObject {
    const reader = NodeReader.from(value, path, 'External Documentation');
    return {
        url: reader.requiredString('url'),
        ...optional('description', reader.optionalString('description')),
        extensions: reader.extensions(),
    };
}

export function buildTag(value: unknown, path: StructuralPath): TagObject {
    const reader = NodeReader.from(value, path, 'Tag');
    return {
        name: reader.requiredString('name'),
        ...optional('description', reader.optionalString('description')),
        ...optional('externalDocs', mapOptional(reader, 'externalDocs', buildExternalDocs)),
        extensions: reader.extensions(),
    };
}

export function buildServer(value: unknown, path: StructuralPath): ServerObject {
    const reader = NodeReader.from(value, path, 'Server');
    return {
        url: reader.requiredString('url'),
        ...optional('description', reader.optionalString('description')),
        variables: reader.map('variables', buildServerVariable),
        extensions: reader.extensions(),
    };
}

function buildServerVariable(value: unknown, path: StructuralPath): ServerVariableObject {
    const reader = NodeReader.from(value, path, 'Server Variable');
    return {
        default: reader.requiredString('default'),
        ...optional('enum', reader.stringList('enum')),
        ...optional('description', reader.optionalString('description')),
        extensions: reader.extensions(),
    };
}

export function buildSecurityRequirement(value: unknown, path: StructuralPath): SecurityRequirement {
    const reader = NodeReader.from(value, path, 'Security Requirement');
    const requirement = new Map<string, readonly string[]>();
    for (const [name] of reader.entries()) {
        requirement.set(name, reader.stringList(name) ?? []);
    }
    return requirement;
}

function buildExample(value: unknown, path: StructuralPath): ExampleObject {
    const reader = NodeReader.from(value, path, 'Example');
    return {
        ...optional('summary', reader.optionalString('summary')),
        ...optional('description', reader.optionalString('description')),
        ...optional('value', reader.optionalJson('value')),
        ...optional('externalValue', reader.optionalString('externalValue')),
        extensions: reader.extensions(),
    };
}

/** Reads `examples` as a map of Example Objects (OpenAPI 3.x). */
function buildExamples(reader: NodeReader, dialect: Dialect): ReadonlyMap<string, RefOr<ExampleObject>> {
    if (dialect === '2.0') return new Map<string, RefOr<ExampleObject>>();
    return reader.map('examples', (value, path) => refOr(value, path, buildExample));
}

/**
 * Builder set bound to one dialect. The dialect decides parameter
 * locations, inline Swagger 2.0 type declarations and which OpenAPI 3.x
 * fields exist at all.
 */
export class DocumentBuilders {
    constructor(public readonly dialect: Dialect) {}

    schema = (value: unknown, path: StructuralPath) => buildSchema(value, path, this.dialect);

    example = buildExample;

    pathItem = (value: unknown, path: StructuralPath): PathItemObject => {
        const reader = NodeReader.from(value, path, 'Path Item');
        const operations = new Map<HttpMethod, OperationObject>();
        for (const method of HTTP_METHODS) {
            if (reader.has(method)) {
                operations.set(method, this.operation(reader.raw(method), reader.at(method)));
            }
        }
        return {
            ...optional('summary', reader.optionalString('summary')),
            ...optional('description', reader.optionalString('description')),
            operations,
            parameters: reader.list('parameters', this.parameterOrRef),
            servers: this.dialect === '2.0' ? [] : reader.list('servers', buildServer),
            extensions: reader.extensions(),
        };
    };

    pathItemOrRef = (value: unknown, path: StructuralPath): RefOr<PathItemObject> => refOr(value, path, this.pathItem);

    operation = (value: unknown, path: StructuralPath): OperationObject => {
        const reader = NodeReader.from(value, path, 'Operation');
        const swagger = this.dialect === '2.0';
        return {
            ...optional('operationId', reader.optionalString('operationId')),
            ...optional('summary', reader.optionalString('summary')),
            ...optional('description', reader.optionalString('description')),
            tags: reader.stringList('tags') ?? [],
            parameters: reader.list('parameters', this.parameterOrRef),
            ...optional('requestBody', swagger ? undefined : mapOptional(reader, 'requestBody', this.requestBodyOrRef)),
            responses: reader.patterned('responses', this.responseOrRef),
            callbacks: swagger ? new Map() : reader.map('callbacks', this.callbackOrRef),
            ...optional('security', reader.has('security') ? reader.list('security', buildSecurityRequirement) : undefined),
            ...optional('deprecated', reader.optionalBoolean('deprecated')),
            servers: swagger ? [] : reader.list('servers', buildServer),
            ...optional('externalDocs', mapOptional(reader, 'externalDocs', buildExternalDocs)),
            ...optional('consumes', swagger ? reader.stringList('consumes') : undefined),
            ...optional('produces', swagger ? reader.stringList('produces') : undefined),
            ...optional('schemes', swagger ? reader.stringList('schemes') : undefined),
            extensions: reader.extensions(),
        };
    };

    parameter = (value: unknown, path: StructuralPath): ParameterObject => {
        const reader = NodeReader.from(value, path, 'Parameter');
        const name = reader.requiredString('name');
        const location = reader.requiredString('in');
        const allowed = PARAMETER_LOCATIONS[this.dialect];
        const parameterIn = allowed.find(candidate => candidate === location);
        if (parameterIn === undefined) {
            throw new MalformedDocumentError(
                `Parameter '${name}' has unsupported location '${location}'. Expected one of: ${allowed.join(', ')}.`,
                reader.at('in'),
            );
        }

        const common = {
            name,
            in: parameterIn,
            ...optional('description', reader.optionalString('description')),
            ...optional('required', reader.optionalBoolean('required')),
            ...optional('allowEmptyValue', reader.optionalBoolean('allowEmptyValue')),
            extensions: reader.extensions(),
        };

        if (this.dialect === '2.0') {
            if (parameterIn === 'body') {
                const schema = reader.raw('schema');
                if (schema === undefined) {
                    throw new MalformedDocumentError(`Body parameter '${name}' must declare a 'schema'.`, path);
                }
                return { ...common, schema: this.schema(schema, reader.at('schema')), content: new Map(), examples: new Map() };
            }
            const inline = reader.rest(SWAGGER_PARAMETER_FIELDS);
            return {
                ...common,
                ...optional('schema', Object.keys(inline).length > 0 ? this.schema(inline, path) : undefined),
                content: new Map(),
                examples: new Map(),
            };
        }

        if (reader.has('schema') && reader.has('content')) {
            throw new MalformedDocumentError(
                `Parameter '${name}' contains both 'schema' and 'content'. These fields are mutually exclusive.`,
                path,
            );
        }
        return {
            ...common,
            ...optional('deprecated', reader.optionalBoolean('deprecated')),
            ...optional('style', reader.optionalString('style')),
            ...optional('explode', reader.optionalBoolean('explode')),
            ...optional('allowReserved', reader.optionalBoolean('allowReserved')),
            ...optional('schema', mapOptional(reader, 'schema', this.schema)),
            content: reader.map('content', this.mediaType),
            ...optional('example', reader.optionalJson('example')),
            examples: buildExamples(reader, this.dialect),
        };
    };

    parameterOrRef = (value: unknown, path: StructuralPath): RefOr<ParameterObject> => refOr(value, path, this.parameter);

    header = (value: unknown, path: StructuralPath): HeaderObject => {
        const reader = NodeReader.from(value, path, 'Header');
        if (this.dialect === '2.0') {
            const inline = reader.rest(new Set(['description']));
            return {
                ...optional('description', reader.optionalString('description')),
                ...optional('schema', Object.keys(inline).length > 0 ? this.schema(inline, path) : undefined),
                content: new Map(),
                examples: new Map(),
                extensions: reader.extensions(),
            };
        }
        return {
            ...optional('description', reader.optionalString('description')),
            ...optional('required', reader.optionalBoolean('required')),
            ...optional('deprecated', reader.optionalBoolean('deprecated')),
            ...optional('style', reader.optionalString('style')),
            ...optional('explode', reader.optionalBoolean('explode')),
            ...optional('schema', mapOptional(reader, 'schema', this.schema)),
            content: reader.map('content', this.mediaType),
            ...optional('example', reader.optionalJson('example')),
            examples: buildExamples(reader, this.dialect),
            extensions: reader.extensions(),
        };
    };

    headerOrRef = (value: unknown, path: StructuralPath): RefOr<HeaderObject> =>
        this.dialect === '2.0' ? this.header(value, path) : refOr(value, path, this.header);

    mediaType = (value: unknown, path: StructuralPath): MediaTypeObject => {
        const reader = NodeReader.from(value, path, 'Media Type');
        return {
            ...optional('schema', mapOptional(reader, 'schema', this.schema)),
            ...optional('example', reader.optionalJson('example')),
            examples: buildExamples(reader, this.dialect),
            encoding: reader.map('encoding', this.encoding),
            extensions: reader.extensions(),
        };
    };

    encoding = (value: unknown, path: StructuralPath): EncodingObject => {
        const reader = NodeReader.from(value, path, 'Encoding');
        return {
            ...optional('contentType', reader.optionalString('contentType')),
            headers: reader.map('headers', this.headerOrRef),
            ...optional('style', reader.optionalString('style')),
            ...optional('explode', reader.optionalBoolean('explode')),
            ...optional('allowReserved', reader.optionalBoolean('allowReserved')),
            extensions: reader.extensions(),
        };
    };

    response = (value: unknown, path: StructuralPath): ResponseObject => {
        const reader = NodeReader.from(value, path, 'Response');
        const swagger = this.dialect === '2.0';
        return {
            ...optional('description', reader.optionalString('description')),
            headers: reader.map('headers', this.headerOrRef),
            content: swagger ? new Map() : reader.map('content', this.mediaType),
            links: swagger ? new Map() : reader.map('links', this.linkOrRef),
            ...optional('schema', swagger ? mapOptional(reader, 'schema', this.schema) : undefined),
            ...optional('examples', swagger ? reader.optionalJsonObject('examples') : undefined),
            extensions: reader.extensions(),
        };
    };

    responseOrRef = (value: unknown, path: StructuralPath): RefOr<ResponseObject> => refOr(value, path, this.response);

    requestBody = (value: unknown, path: StructuralPath): RequestBodyObject => {
        const reader = NodeReader.from(value, path, 'Request Body');
        return {
            ...optional('description', reader.optionalString('description')),
            content: reader.map('content', this.mediaType),
            ...optional('required', reader.optionalBoolean('required')),
            extensions: reader.extensions(),
        };
    };

    requestBodyOrRef = (value: unknown, path: StructuralPath): RefOr<RequestBodyObject> =>
        refOr(value, path, this.requestBody);

    link = (value: unknown, path: StructuralPath): LinkObject => {
        const reader = NodeReader.from(value, path, 'Link');
        return {
            ...optional('operationRef', reader.optionalString('operationRef')),
            ...optional('operationId', reader.optionalString('operationId')),
            ...optional('parameters', reader.optionalJsonObject('parameters')),
            ...optional('requestBody', reader.optionalJson('requestBody')),
            ...optional('description', reader.optionalString('description')),
            ...optional('server', mapOptional(reader, 'server', buildServer)),
            extensions: reader.extensions(),
        };
    };

    linkOrRef = (value: unknown, path: StructuralPath): RefOr<LinkObject> => refOr(value, path, this.link);

    callback = (value: unknown, path: StructuralPath): CallbackObject => {
        const reader = NodeReader.from(value, path, 'Callback');
        const expressions = new Map<string, RefOr<PathItemObject>>();
        for (const [expression, item] of reader.entries()) {
            if (!expression.startsWith('x-')) {
                expressions.set(expression, this.pathItemOrRef(item, reader.at(expression)));
            }
        }
        return { expressions, extensions: reader.extensions() };
    };

    callbackOrRef = (value: unknown, path: StructuralPath): RefOr<CallbackObject> => refOr(value, path, this.callback);
}

/** Applies `build` to an optional field, keeping absence as `undefined`. */
export function mapOptional<T>(
    reader: NodeReader,
    key: string,
    build: (value: unknown, path: StructuralPath) => T,
): T | undefined {
    return reader.has(key) ? build(reader.raw(key), reader.at(key)) : undefined;
}

/** Reads a map field whose values must be strings (e.g. OAuth scopes). */
export function buildStringMap(reader: NodeReader, key: string): ReadonlyMap<string, string> {
    return reader.map(key, (value, path) => {
        if (typeof value !== 'string') {
            throw new MalformedDocumentError(`Values of '${key}' must be strings, found ${describeType(value)}.`, path);
        }
        return value;
    });
}
