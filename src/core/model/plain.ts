/**
 * @fileoverview
 * Re-derives the plain structural form of model objects. Writing a model
 * out and building it again yields an equal model.
 */

import type {
    CallbackObject,
    ContactObject,
    Dialect,
    EncodingObject,
    ExampleObject,
    ExternalDocumentationObject,
    HeaderObject,
    InfoObject,
    LicenseObject,
    LinkObject,
    MediaTypeObject,
    OAuthFlowObject,
    OperationObject,
    ParameterObject,
    PathItemObject,
    RefOr,
    Reference,
    RequestBodyObject,
    ResponseObject,
    SecurityRequirement,
    SecurityScheme,
    ServerObject,
    TagObject,
} from '../types/document.js';
import { OAUTH_FLOW_NAMES } from '../types/document.js';
import type { JsonObject, JsonValue } from '../types/json.js';
import type { SchemaNode } from '../types/schema.js';
import { isReference } from './guards.js';

type Writer<T> = (value: T) => JsonValue;

/** Copies the defined entries of `fields` into a JSON object. */
export function compact(fields: Record<string, JsonValue | undefined>): JsonObject {
    const result: JsonObject = {};
    for (const [key, value] of Object.entries(fields)) {
        if (value !== undefined) result[key] = value;
    }
    return result;
}

export function fromMap<T>(map: ReadonlyMap<string, T>, write: Writer<T>): JsonObject {
    const result: JsonObject = {};
    for (const [key, value] of map) {
        result[key] = write(value);
    }
    return result;
}

/** Writes a component section; an empty one is omitted. */
export function writeSection<T>(entries: readonly [string, T][], write: Writer<T>): JsonObject | undefined {
    return entries.length > 0 ? fromMap(new Map(entries), write) : undefined;
}

/** Like `fromMap`, but an empty map is omitted. */
function nonEmptyMap<T>(map: ReadonlyMap<string, T>, write: Writer<T>): JsonObject | undefined {
    return map.size > 0 ? fromMap(map, write) : undefined;
}

function nonEmptyList<T>(list: readonly T[], write: Writer<T>): JsonValue[] | undefined {
    return list.length > 0 ? list.map(write) : undefined;
}

function strings(list: readonly string[] | undefined): JsonValue[] | undefined {
    return list === undefined ? undefined : [...list];
}

export function writeReference(reference: Reference): JsonObject {
    return compact({ $ref: reference.$ref, summary: reference.summary, description: reference.description });
}

export function writeRefOr<T extends object>(write: (value: T) => JsonObject): Writer<RefOr<T>> {
    return value => (isReference(value) ? writeReference(value) : write(value));
}

export function writeSecurityRequirement(requirement: SecurityRequirement): JsonObject {
    return fromMap(requirement, scopes => [...scopes]);
}

export function writeExternalDocs(docs: ExternalDocumentationObject): JsonObject {
    return compact({ url: docs.url, description: docs.description, ...docs.extensions });
}

export function writeTag(tag: TagObject): JsonObject {
    return compact({
        name: tag.name,
        description: tag.description,
        externalDocs: tag.externalDocs && writeExternalDocs(tag.externalDocs),
        ...tag.extensions,
    });
}

function writeContact(contact: ContactObject): JsonObject {
    return compact({ name: contact.name, url: contact.url, email: contact.email, ...contact.extensions });
}

function writeLicense(license: LicenseObject): JsonObject {
    return compact({ name: license.name, url: license.url, identifier: license.identifier, ...license.extensions });
}

export function writeInfo(info: InfoObject): JsonObject {
    return compact({
        title: info.title,
        version: info.version,
        summary: info.summary,
        description: info.description,
        termsOfService: info.termsOfService,
        contact: info.contact && writeContact(info.contact),
        license: info.license && writeLicense(info.license),
        ...info.extensions,
    });
}

export function writeServer(server: ServerObject): JsonObject {
    return compact({
        url: server.url,
        description: server.description,
        variables: nonEmptyMap(server.variables, variable =>
            compact({
                default: variable.default,
                enum: strings(variable.enum),
                description: variable.description,
                ...variable.extensions,
            }),
        ),
        ...server.extensions,
    });
}

function writeOAuthFlow(flow: OAuthFlowObject): JsonObject {
    return compact({
        authorizationUrl: flow.authorizationUrl,
        tokenUrl: flow.tokenUrl,
        refreshUrl: flow.refreshUrl,
        scopes: fromMap(flow.scopes, description => description),
        ...flow.extensions,
    });
}

export function writeSecurityScheme(scheme: SecurityScheme): JsonObject {
    const common = { type: scheme.type, description: scheme.description };
    switch (scheme.type) {
        case 'basic':
        case 'mutualTLS':
            return compact({ ...common, ...scheme.extensions });
        case 'apiKey':
            return compact({ ...common, name: scheme.name, in: scheme.in, ...scheme.extensions });
        case 'http':
            return compact({ ...common, scheme: scheme.scheme, bearerFormat: scheme.bearerFormat, ...scheme.extensions });
        case 'openIdConnect':
            return compact({ ...common, openIdConnectUrl: scheme.openIdConnectUrl, ...scheme.extensions });
        case 'oauth2': {
            if ('flow' in scheme) {
                return compact({
                    ...common,
                    flow: scheme.flow,
                    authorizationUrl: scheme.authorizationUrl,
                    tokenUrl: scheme.tokenUrl,
                    scopes: fromMap(scheme.scopes, description => description),
                    ...scheme.extensions,
                });
            }
            const flows: JsonObject = {};
            for (const name of OAUTH_FLOW_NAMES) {
                const flow = scheme.flows[name];
                if (flow) flows[name] = writeOAuthFlow(flow);
            }
            return compact({ ...common, flows, ...scheme.extensions });
        }
    }
}

function writeExample(example: ExampleObject): JsonObject {
    return compact({
        summary: example.summary,
        description: example.description,
        value: example.value,
        externalValue: example.externalValue,
        ...example.extensions,
    });
}

/** Writes a schema node, including the Swagger 2.0 string discriminator. */
export function writeSchema(node: SchemaNode, dialect: Dialect): JsonObject {
    if (node.shape === 'reference') {
        return writeReference(node);
    }
    const child = (schema: SchemaNode) => writeSchema(schema, dialect);
    const result: JsonObject = {};

    if (node.types.length === 1) {
        result.type = node.types[0];
    } else if (node.types.length > 1) {
        result.type = [...node.types];
    }
    Object.assign(
        result,
        compact({
            title: node.title,
            description: node.description,
            format: node.format,
            nullable: node.nullable,
            readOnly: node.readOnly,
            writeOnly: node.writeOnly,
            deprecated: node.deprecated,
        }),
    );
    if (node.discriminator) {
        result.discriminator =
            dialect === '2.0'
                ? node.discriminator.propertyName
                : compact({
                      propertyName: node.discriminator.propertyName,
                      mapping: nonEmptyMap(node.discriminator.mapping, value => value),
                      ...node.discriminator.extensions,
                  });
    }

    switch (node.shape) {
        case 'composition':
            result[node.keyword] = node.keyword === 'not' ? child(node.members[0]) : node.members.map(child);
            if (node.properties.size > 0) result.properties = fromMap(node.properties, child);
            if (node.required.length > 0) result.required = [...node.required];
            break;
        case 'object':
            // An object shape inferred from its facets alone must keep one.
            if (node.properties.size > 0 || !node.types.includes('object')) {
                result.properties = fromMap(node.properties, child);
            }
            if (node.required.length > 0) result.required = [...node.required];
            if (node.additionalProperties !== undefined) {
                result.additionalProperties =
                    typeof node.additionalProperties === 'boolean'
                        ? node.additionalProperties
                        : child(node.additionalProperties);
            }
            break;
        case 'array':
            if (node.items) result.items = child(node.items);
            break;
        case 'primitive':
            break;
    }

    for (const nested of node.subschemas) {
        const written = child(nested.schema);
        if (nested.key === undefined) {
            result[nested.keyword] = written;
        } else if (typeof nested.key === 'number') {
            const list = result[nested.keyword];
            result[nested.keyword] = Array.isArray(list) ? [...list, written] : [written];
        } else {
            const map = result[nested.keyword];
            const entries = typeof map === 'object' && map !== null && !Array.isArray(map) ? map : {};
            result[nested.keyword] = { ...entries, [nested.key]: written };
        }
    }

    return { ...result, ...node.keywords, ...node.extensions };
}

/**
 * Writer set bound to one dialect, the inverse of `DocumentBuilders`.
 */
export class PlainWriters {
    constructor(public readonly dialect: Dialect) {}

    schema = (node: SchemaNode): JsonObject => writeSchema(node, this.dialect);

    example = writeExample;

    pathItem = (item: PathItemObject): JsonObject => {
        const result: JsonObject = compact({ summary: item.summary, description: item.description });
        for (const [method, operation] of item.operations) {
            result[method] = this.operation(operation);
        }
        return compact({
            ...result,
            parameters: nonEmptyList(item.parameters, this.parameterOrRef),
            servers: nonEmptyList(item.servers, writeServer),
            ...item.extensions,
        });
    };

    pathItemOrRef = writeRefOr(this.pathItem);

    operation = (operation: OperationObject): JsonObject =>
        compact({
            operationId: operation.operationId,
            summary: operation.summary,
            description: operation.description,
            tags: nonEmptyList(operation.tags, tag => tag),
            parameters: nonEmptyList(operation.parameters, this.parameterOrRef),
            requestBody: operation.requestBody && this.requestBodyOrRef(operation.requestBody),
            responses: fromMap(operation.responses, this.responseOrRef),
            callbacks: nonEmptyMap(operation.callbacks, this.callbackOrRef),
            security: operation.security?.map(writeSecurityRequirement),
            deprecated: operation.deprecated,
            servers: nonEmptyList(operation.servers, writeServer),
            externalDocs: operation.externalDocs && writeExternalDocs(operation.externalDocs),
            consumes: strings(operation.consumes),
            produces: strings(operation.produces),
            schemes: strings(operation.schemes),
            ...operation.extensions,
        });

    parameter = (parameter: ParameterObject): JsonObject => {
        const common = {
            name: parameter.name,
            in: parameter.in,
            description: parameter.description,
            required: parameter.required,
            allowEmptyValue: parameter.allowEmptyValue,
        };
        if (this.dialect === '2.0') {
            if (parameter.in === 'body') {
                return compact({ ...common, schema: parameter.schema && this.schema(parameter.schema), ...parameter.extensions });
            }
            return compact({ ...common, ...(parameter.schema && this.schema(parameter.schema)), ...parameter.extensions });
        }
        return compact({
            ...common,
            deprecated: parameter.deprecated,
            style: parameter.style,
            explode: parameter.explode,
            allowReserved: parameter.allowReserved,
            schema: parameter.schema && this.schema(parameter.schema),
            content: nonEmptyMap(parameter.content, this.mediaType),
            example: parameter.example,
            examples: nonEmptyMap(parameter.examples, this.exampleOrRef),
            ...parameter.extensions,
        });
    };

    parameterOrRef = writeRefOr(this.parameter);

    header = (header: HeaderObject): JsonObject => {
        if (this.dialect === '2.0') {
            return compact({
                description: header.description,
                ...(header.schema && this.schema(header.schema)),
                ...header.extensions,
            });
        }
        return compact({
            description: header.description,
            required: header.required,
            deprecated: header.deprecated,
            style: header.style,
            explode: header.explode,
            schema: header.schema && this.schema(header.schema),
            content: nonEmptyMap(header.content, this.mediaType),
            example: header.example,
            examples: nonEmptyMap(header.examples, this.exampleOrRef),
            ...header.extensions,
        });
    };

    headerOrRef = writeRefOr(this.header);

    exampleOrRef = writeRefOr(writeExample);

    mediaType = (mediaType: MediaTypeObject): JsonObject =>
        compact({
            schema: mediaType.schema && this.schema(mediaType.schema),
            example: mediaType.example,
            examples: nonEmptyMap(mediaType.examples, this.exampleOrRef),
            encoding: nonEmptyMap(mediaType.encoding, this.encoding),
            ...mediaType.extensions,
        });

    encoding = (encoding: EncodingObject): JsonObject =>
        compact({
            contentType: encoding.contentType,
            headers: nonEmptyMap(encoding.headers, this.headerOrRef),
            style: encoding.style,
            explode: encoding.explode,
            allowReserved: encoding.allowReserved,
            ...encoding.extensions,
        });

    response = (response: ResponseObject): JsonObject =>
        compact({
            description: response.description,
            headers: nonEmptyMap(response.headers, this.headerOrRef),
            content: nonEmptyMap(response.content, this.mediaType),
            links: nonEmptyMap(response.links, this.linkOrRef),
            schema: response.schema && this.schema(response.schema),
            examples: response.examples,
            ...response.extensions,
        });

    responseOrRef = writeRefOr(this.response);

    requestBody = (body: RequestBodyObject): JsonObject =>
        compact({
            description: body.description,
            content: fromMap(body.content, this.mediaType),
            required: body.required,
            ...body.extensions,
        });

    requestBodyOrRef = writeRefOr(this.requestBody);

    link = (link: LinkObject): JsonObject =>
        compact({
            operationRef: link.operationRef,
            operationId: link.operationId,
            parameters: link.parameters,
            requestBody: link.requestBody,
            description: link.description,
            server: link.server && writeServer(link.server),
            ...link.extensions,
        });

    linkOrRef = writeRefOr(this.link);

    callback = (callback: CallbackObject): JsonObject => ({
        ...fromMap(callback.expressions, this.pathItemOrRef),
        ...callback.extensions,
    });

    callbackOrRef = writeRefOr(this.callback);
}
