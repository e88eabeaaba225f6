/**
 * @fileoverview
 * Read-only traversal of a document model that reports every position to a
 * visitor together with its structural path. References are reported, never
 * entered: the walker stays inside the subtree it was handed.
 */

import type { ComponentsContainer } from '../model/components.js';
import { isReference } from '../model/guards.js';
import type {
    CallbackObject,
    ComponentKind,
    Dialect,
    ExternalDocumentationObject,
    HeaderObject,
    LinkObject,
    MediaTypeObject,
    OperationObject,
    ParameterObject,
    PathItemObject,
    RefOr,
    RequestBodyObject,
    ResponseObject,
    SchemaNode,
    SecurityRequirement,
    SecurityScheme,
    ServerObject,
    StructuralPath,
} from '../types/index.js';
import { encodeFragmentSegment, hasUriScheme } from '../utils/index.js';

export type InlineSchema = Exclude<SchemaNode, { shape: 'reference' }>;

/** Hooks of a traversal. All are optional. */
export interface WalkVisitor {
    reference?(kind: ComponentKind, token: string, path: StructuralPath): void;
    schema?(node: InlineSchema, path: StructuralPath): void;
    pathItem?(item: PathItemObject, path: StructuralPath): void;
    operation?(operation: OperationObject, path: StructuralPath): void;
    /** A path-level or operation-level parameter list. */
    parameterList?(parameters: readonly RefOr<ParameterObject>[], path: StructuralPath): void;
    /** An inline parameter, wherever it is declared. */
    parameter?(parameter: ParameterObject, path: StructuralPath): void;
    server?(server: ServerObject, path: StructuralPath): void;
    securityRequirements?(requirements: readonly SecurityRequirement[], path: StructuralPath): void;
    response?(response: ResponseObject, path: StructuralPath): void;
    link?(link: LinkObject, path: StructuralPath): void;
    externalDocs?(docs: ExternalDocumentationObject, path: StructuralPath): void;
    securityScheme?(scheme: SecurityScheme, path: StructuralPath): void;
}

/**
 * Turns a discriminator mapping value into a reference token. A bare name
 * (no `/`, no URI scheme) names a schema component.
 */
export function mappingToken(value: string, schemaPrefix: string | undefined): string {
    if (schemaPrefix === undefined || value.startsWith('#') || value.includes('/') || hasUriScheme(value)) {
        return value;
    }
    return `${schemaPrefix}${encodeFragmentSegment(value)}`;
}

export class DocumentWalker {
    constructor(
        private readonly visitor: WalkVisitor,
        private readonly dialect: Dialect,
        private readonly schemaPrefix: string | undefined,
    ) {}

    private refOr<T extends object>(
        kind: ComponentKind,
        value: RefOr<T>,
        path: StructuralPath,
        walk: (inline: T, path: StructuralPath) => void,
    ): void {
        if (isReference(value)) {
            this.visitor.reference?.(kind, value.$ref, path);
        } else {
            walk(value, path);
        }
    }

    /** Walks one component entry stored at `path`. */
    component(components: ComponentsContainer, kind: ComponentKind, name: string, path: StructuralPath): void {
        switch (kind) {
            case 'schemas': {
                const value = components.get('schemas', name);
                if (value) this.schema(value, path);
                return;
            }
            case 'responses': {
                const value = components.get('responses', name);
                if (value) this.refOr('responses', value, path, this.response);
                return;
            }
            case 'parameters': {
                const value = components.get('parameters', name);
                if (value) this.refOr('parameters', value, path, this.parameter);
                return;
            }
            case 'examples': {
                const value = components.get('examples', name);
                if (value) this.refOr('examples', value, path, () => undefined);
                return;
            }
            case 'requestBodies': {
                const value = components.get('requestBodies', name);
                if (value) this.refOr('requestBodies', value, path, this.requestBody);
                return;
            }
            case 'headers': {
                const value = components.get('headers', name);
                if (value) this.refOr('headers', value, path, this.header);
                return;
            }
            case 'securitySchemes': {
                const value = components.get('securitySchemes', name);
                if (value) this.refOr('securitySchemes', value, path, this.securityScheme);
                return;
            }
            case 'links': {
                const value = components.get('links', name);
                if (value) this.refOr('links', value, path, this.link);
                return;
            }
            case 'callbacks': {
                const value = components.get('callbacks', name);
                if (value) this.refOr('callbacks', value, path, this.callback);
                return;
            }
            case 'pathItems': {
                const value = components.get('pathItems', name);
                if (value) this.pathItemOrRef(value, path);
                return;
            }
        }
    }

    pathItemOrRef = (item: RefOr<PathItemObject>, path: StructuralPath): void => {
        this.refOr('pathItems', item, path, this.pathItem);
    };

    pathItem = (item: PathItemObject, path: StructuralPath): void => {
        this.visitor.pathItem?.(item, path);
        this.servers(item.servers, [...path, 'servers']);
        this.parameters(item.parameters, [...path, 'parameters']);
        for (const [method, operation] of item.operations) {
            this.operation(operation, [...path, method]);
        }
    };

    operation = (operation: OperationObject, path: StructuralPath): void => {
        this.visitor.operation?.(operation, path);
        if (operation.externalDocs) this.visitor.externalDocs?.(operation.externalDocs, [...path, 'externalDocs']);
        this.servers(operation.servers, [...path, 'servers']);
        this.parameters(operation.parameters, [...path, 'parameters']);
        if (operation.requestBody) {
            this.refOr('requestBodies', operation.requestBody, [...path, 'requestBody'], this.requestBody);
        }
        for (const [status, response] of operation.responses) {
            this.refOr('responses', response, [...path, 'responses', status], this.response);
        }
        for (const [name, callback] of operation.callbacks) {
            this.refOr('callbacks', callback, [...path, 'callbacks', name], this.callback);
        }
        if (operation.security) this.securityRequirements(operation.security, [...path, 'security']);
    };

    servers(servers: readonly ServerObject[], path: StructuralPath): void {
        servers.forEach((server, index) => this.visitor.server?.(server, [...path, index]));
    }

    securityRequirements(requirements: readonly SecurityRequirement[], path: StructuralPath): void {
        this.visitor.securityRequirements?.(requirements, path);
    }

    private parameters(parameters: readonly RefOr<ParameterObject>[], path: StructuralPath): void {
        this.visitor.parameterList?.(parameters, path);
        parameters.forEach((parameter, index) => {
            this.refOr('parameters', parameter, [...path, index], this.parameter);
        });
    }

    parameter = (parameter: ParameterObject, path: StructuralPath): void => {
        this.visitor.parameter?.(parameter, path);
        if (parameter.schema) {
            // Swagger 2.0 non-body parameters declare their type inline.
            const inline = this.dialect === '2.0' && parameter.in !== 'body';
            this.schema(parameter.schema, inline ? path : [...path, 'schema']);
        }
        this.content(parameter.content, path);
        this.examples(parameter.examples, path);
    };

    header = (header: HeaderObject, path: StructuralPath): void => {
        if (header.schema) {
            this.schema(header.schema, this.dialect === '2.0' ? path : [...path, 'schema']);
        }
        this.content(header.content, path);
        this.examples(header.examples, path);
    };

    private content(content: ReadonlyMap<string, MediaTypeObject>, path: StructuralPath): void {
        for (const [mediaType, value] of content) {
            this.mediaType(value, [...path, 'content', mediaType]);
        }
    }

    private examples(examples: ReadonlyMap<string, RefOr<object>>, path: StructuralPath): void {
        for (const [name, example] of examples) {
            this.refOr('examples', example, [...path, 'examples', name], () => undefined);
        }
    }

    private mediaType(mediaType: MediaTypeObject, path: StructuralPath): void {
        if (mediaType.schema) this.schema(mediaType.schema, [...path, 'schema']);
        this.examples(mediaType.examples, path);
        for (const [property, encoding] of mediaType.encoding) {
            for (const [name, header] of encoding.headers) {
                this.refOr('headers', header, [...path, 'encoding', property, 'headers', name], this.header);
            }
        }
    }

    response = (response: ResponseObject, path: StructuralPath): void => {
        this.visitor.response?.(response, path);
        for (const [name, header] of response.headers) {
            this.refOr('headers', header, [...path, 'headers', name], this.header);
        }
        this.content(response.content, path);
        for (const [name, link] of response.links) {
            this.refOr('links', link, [...path, 'links', name], this.link);
        }
        if (response.schema) this.schema(response.schema, [...path, 'schema']);
    };

    requestBody = (body: RequestBodyObject, path: StructuralPath): void => {
        this.content(body.content, path);
    };

    link = (link: LinkObject, path: StructuralPath): void => {
        this.visitor.link?.(link, path);
        if (link.server) this.visitor.server?.(link.server, [...path, 'server']);
    };

    callback = (callback: CallbackObject, path: StructuralPath): void => {
        for (const [expression, item] of callback.expressions) {
            this.pathItemOrRef(item, [...path, expression]);
        }
    };

    securityScheme = (scheme: SecurityScheme, path: StructuralPath): void => {
        this.visitor.securityScheme?.(scheme, path);
    };

    schema = (node: SchemaNode, path: StructuralPath): void => {
        if (node.shape === 'reference') {
            this.visitor.reference?.('schemas', node.$ref, path);
            return;
        }
        this.visitor.schema?.(node, path);

        if (node.discriminator) {
            for (const [key, value] of node.discriminator.mapping) {
                this.visitor.reference?.('schemas', mappingToken(value, this.schemaPrefix), [
                    ...path,
                    'discriminator',
                    'mapping',
                    key,
                ]);
            }
        }

        switch (node.shape) {
            case 'composition':
                if (node.keyword === 'not') {
                    node.members.forEach(member => this.schema(member, [...path, 'not']));
                } else {
                    node.members.forEach((member, index) => this.schema(member, [...path, node.keyword, index]));
                }
                this.properties(node.properties, path);
                break;
            case 'object':
                this.properties(node.properties, path);
                if (node.additionalProperties !== undefined && typeof node.additionalProperties !== 'boolean') {
                    this.schema(node.additionalProperties, [...path, 'additionalProperties']);
                }
                break;
            case 'array':
                if (node.items) this.schema(node.items, [...path, 'items']);
                break;
            case 'primitive':
                break;
        }

        for (const nested of node.subschemas) {
            this.schema(nested.schema, nested.key === undefined ? [...path, nested.keyword] : [...path, nested.keyword, nested.key]);
        }
    };

    private properties(properties: ReadonlyMap<string, SchemaNode>, path: StructuralPath): void {
        for (const [name, property] of properties) {
            this.schema(property, [...path, 'properties', name]);
        }
    }
}

/** Runs the hooks of several visitors in order. */
export function combineVisitors(...visitors: WalkVisitor[]): WalkVisitor {
    return {
        reference: (kind, token, path) => visitors.forEach(v => v.reference?.(kind, token, path)),
        schema: (node, path) => visitors.forEach(v => v.schema?.(node, path)),
        pathItem: (item, path) => visitors.forEach(v => v.pathItem?.(item, path)),
        operation: (operation, path) => visitors.forEach(v => v.operation?.(operation, path)),
        parameterList: (parameters, path) => visitors.forEach(v => v.parameterList?.(parameters, path)),
        parameter: (parameter, path) => visitors.forEach(v => v.parameter?.(parameter, path)),
        server: (server, path) => visitors.forEach(v => v.server?.(server, path)),
        securityRequirements: (requirements, path) => visitors.forEach(v => v.securityRequirements?.(requirements, path)),
        response: (response, path) => visitors.forEach(v => v.response?.(response, path)),
        link: (link, path) => visitors.forEach(v => v.link?.(link, path)),
        externalDocs: (docs, path) => visitors.forEach(v => v.externalDocs?.(docs, path)),
        securityScheme: (scheme, path) => visitors.forEach(v => v.securityScheme?.(scheme, path)),
    };
}
