/**
 * @fileoverview
 * Pieces shared by the OpenAPI 3.0 and 3.1 adapters: the `components`
 * container, security schemes with OAuth flows, and the common root fields.
 */

import { MalformedDocumentError } from '../errors.js';
import { ComponentsContainer } from '../model/components.js';
import {
    PlainWriters,
    compact,
    writeExternalDocs,
    writeInfo,
    writeRefOr,
    writeSecurityRequirement,
    writeSecurityScheme,
    writeSection,
    writeServer,
    writeTag,
} from '../model/plain.js';
import {
    DocumentBuilders,
    buildExternalDocs,
    buildInfo,
    buildSecurityRequirement,
    buildServer,
    buildStringMap,
    buildTag,
    mapOptional,
    refOr,
} from '../parser/builders.js';
import { NodeReader } from '../parser/reader.js';
import type {
    OAuthFlowName,
    OAuthFlowObject,
    OpenApi30Document,
    OpenApi31Document,
    OpenApiSecurityScheme,
} from '../types/document.js';
import { OAUTH_FLOW_NAMES } from '../types/document.js';
import type { JsonObject, StructuralPath } from '../types/json.js';
import { optional } from '../utils/object.js';

export type OpenApiDialect = '3.0' | '3.1';

function buildOAuthFlow(value: unknown, path: StructuralPath): OAuthFlowObject {
    const reader = NodeReader.from(value, path, 'OAuth Flow');
    return {
        ...optional('authorizationUrl', reader.optionalString('authorizationUrl')),
        ...optional('tokenUrl', reader.optionalString('tokenUrl')),
        ...optional('refreshUrl', reader.optionalString('refreshUrl')),
        scopes: buildStringMap(reader, 'scopes'),
        extensions: reader.extensions(),
    };
}

export function buildOpenApiSecurityScheme(dialect: OpenApiDialect) {
    return (value: unknown, path: StructuralPath): OpenApiSecurityScheme => {
        const reader = NodeReader.from(value, path, 'Security Scheme');
        const type = reader.requiredString('type');
        const base = {
            ...optional('description', reader.optionalString('description')),
            extensions: reader.extensions(),
        };
        switch (type) {
            case 'apiKey': {
                const location = reader.requiredString('in');
                if (location !== 'query' && location !== 'header' && location !== 'cookie') {
                    throw new MalformedDocumentError(
                        `API key location must be 'query', 'header' or 'cookie', found '${location}'.`,
                        reader.at('in'),
                    );
                }
                return { type, name: reader.requiredString('name'), in: location, ...base };
            }
            case 'http':
                return {
                    type,
                    scheme: reader.requiredString('scheme'),
                    ...optional('bearerFormat', reader.optionalString('bearerFormat')),
                    ...base,
                };
            case 'oauth2': {
                const flowsReader = reader.requiredObject('flows', 'OAuth Flows');
                const flows: Partial<Record<OAuthFlowName, OAuthFlowObject>> = {};
                for (const name of OAUTH_FLOW_NAMES) {
                    const flow = mapOptional(flowsReader, name, buildOAuthFlow);
                    if (flow) flows[name] = flow;
                }
                return { type, flows, ...base };
            }
            case 'openIdConnect':
                return { type, openIdConnectUrl: reader.requiredString('openIdConnectUrl'), ...base };
            case 'mutualTLS':
                if (dialect === '3.1') return { type, ...base };
                break;
        }
        throw new MalformedDocumentError(`Unknown security scheme type '${type}'.`, reader.at('type'));
    };
}

/** Reads `components`; `pathItems` exists only in 3.1. */
export function buildComponents(reader: NodeReader, build: DocumentBuilders, dialect: OpenApiDialect): ComponentsContainer {
    const components = reader.optionalObject('components', "The 'components' object");
    if (!components) return ComponentsContainer.create();
    const securityScheme = buildOpenApiSecurityScheme(dialect);
    return ComponentsContainer.create({
        schemas: components.map('schemas', build.schema),
        responses: components.map('responses', build.responseOrRef),
        parameters: components.map('parameters', build.parameterOrRef),
        examples: components.map('examples', (value, path) => refOr(value, path, build.example)),
        requestBodies: components.map('requestBodies', build.requestBodyOrRef),
        headers: components.map('headers', build.headerOrRef),
        securitySchemes: components.map('securitySchemes', (value, path) => refOr(value, path, securityScheme)),
        links: components.map('links', build.linkOrRef),
        callbacks: components.map('callbacks', build.callbackOrRef),
        pathItems: dialect === '3.1' ? components.map('pathItems', build.pathItemOrRef) : new Map(),
    });
}

/** Root fields shared by both OpenAPI 3.x documents. */
export function parseOpenApiRoot(reader: NodeReader, dialect: OpenApiDialect) {
    if (!reader.has('info')) {
        throw new MalformedDocumentError("Specification must contain an 'info' object.");
    }
    const build = new DocumentBuilders(dialect);
    return {
        build,
        fields: {
            openapi: reader.requiredString('openapi'),
            info: buildInfo(reader.raw('info'), reader.at('info')),
            servers: reader.list('servers', buildServer),
            paths: reader.patterned('paths', build.pathItemOrRef),
            components: buildComponents(reader, build, dialect),
            tags: reader.list('tags', buildTag),
            ...optional('security', reader.has('security') ? reader.list('security', buildSecurityRequirement) : undefined),
            ...optional('externalDocs', mapOptional(reader, 'externalDocs', buildExternalDocs)),
            extensions: reader.extensions(),
        },
    };
}

function writeComponents(components: ComponentsContainer, write: PlainWriters): JsonObject | undefined {
    if (components.isEmpty()) return undefined;
    return compact({
        schemas: writeSection(components.entries('schemas'), write.schema),
        responses: writeSection(components.entries('responses'), write.responseOrRef),
        parameters: writeSection(components.entries('parameters'), write.parameterOrRef),
        examples: writeSection(components.entries('examples'), write.exampleOrRef),
        requestBodies: writeSection(components.entries('requestBodies'), write.requestBodyOrRef),
        headers: writeSection(components.entries('headers'), write.headerOrRef),
        securitySchemes: writeSection(components.entries('securitySchemes'), writeRefOr(writeSecurityScheme)),
        links: writeSection(components.entries('links'), write.linkOrRef),
        callbacks: writeSection(components.entries('callbacks'), write.callbackOrRef),
        pathItems: writeSection(components.entries('pathItems'), write.pathItemOrRef),
    });
}

/** Writes the root fields shared by both OpenAPI 3.x documents. */
export function writeOpenApiRoot(document: OpenApi30Document | OpenApi31Document, write: PlainWriters): JsonObject {
    return compact({
        openapi: document.openapi,
        info: writeInfo(document.info),
        servers: document.servers.length > 0 ? document.servers.map(writeServer) : undefined,
        components: writeComponents(document.components, write),
        security: document.security?.map(writeSecurityRequirement),
        tags: document.tags.length > 0 ? document.tags.map(writeTag) : undefined,
        externalDocs: document.externalDocs && writeExternalDocs(document.externalDocs),
        ...document.extensions,
    });
}
