import { MalformedDocumentError } from '../errors.js';
import { ComponentsContainer } from '../model/components.js';
import {
    PlainWriters,
    compact,
    fromMap,
    writeExternalDocs,
    writeInfo,
    writeRefOr,
    writeSecurityRequirement,
    writeSecurityScheme,
    writeSection,
    writeTag,
} from '../model/plain.js';
import {
    DocumentBuilders,
    buildExternalDocs,
    buildInfo,
    buildSecurityRequirement,
    buildStringMap,
    buildTag,
    mapOptional,
} from '../parser/builders.js';
import { NodeReader } from '../parser/reader.js';
import type {
    SwaggerDocument,
    SwaggerOAuth2Flow,
    SwaggerSecurityScheme,
} from '../types/document.js';
import type { JsonObject, StructuralPath } from '../types/json.js';
import { optional } from '../utils/object.js';
import type { DialectAdapter } from './dialect.js';
import { versionMarker } from './dialect.js';

const OAUTH2_FLOWS: readonly SwaggerOAuth2Flow[] = ['implicit', 'password', 'application', 'accessCode'];

export function buildSwaggerSecurityScheme(value: unknown, path: StructuralPath): SwaggerSecurityScheme {
    const reader = NodeReader.from(value, path, 'Security Scheme');
    const type = reader.requiredString('type');
    const base = {
        ...optional('description', reader.optionalString('description')),
        extensions: reader.extensions(),
    };
    switch (type) {
        case 'basic':
            return { type, ...base };
        case 'apiKey': {
            const location = reader.requiredString('in');
            if (location !== 'query' && location !== 'header') {
                throw new MalformedDocumentError(
                    `API key location must be 'query' or 'header', found '${location}'.`,
                    reader.at('in'),
                );
            }
            return { type, name: reader.requiredString('name'), in: location, ...base };
        }
        case 'oauth2': {
            const flowName = reader.requiredString('flow');
            const flow = OAUTH2_FLOWS.find(candidate => candidate === flowName);
            if (flow === undefined) {
                throw new MalformedDocumentError(
                    `Unknown OAuth2 flow '${flowName}'. Expected one of: ${OAUTH2_FLOWS.join(', ')}.`,
                    reader.at('flow'),
                );
            }
            return {
                type,
                flow,
                ...optional('authorizationUrl', reader.optionalString('authorizationUrl')),
                ...optional('tokenUrl', reader.optionalString('tokenUrl')),
                scopes: buildStringMap(reader, 'scopes'),
                ...base,
            };
        }
        default:
            throw new MalformedDocumentError(`Unknown security scheme type '${type}'.`, reader.at('type'));
    }
}

function parse(raw: Readonly<Record<string, unknown>>): SwaggerDocument {
    const reader = NodeReader.from(raw, [], 'Specification');
    if (!reader.has('info')) {
        throw new MalformedDocumentError("Specification must contain an 'info' object.");
    }
    if (!reader.has('paths')) {
        throw new MalformedDocumentError("Swagger 2.0 specification must contain a 'paths' object.");
    }
    const build = new DocumentBuilders('2.0');
    const securitySchemes = reader.map('securityDefinitions', buildSwaggerSecurityScheme);

    return {
        dialect: '2.0',
        swagger: reader.requiredString('swagger'),
        info: buildInfo(reader.raw('info'), reader.at('info')),
        ...optional('host', reader.optionalString('host')),
        ...optional('basePath', reader.optionalString('basePath')),
        ...optional('schemes', reader.stringList('schemes')),
        ...optional('consumes', reader.stringList('consumes')),
        ...optional('produces', reader.stringList('produces')),
        paths: reader.patterned('paths', build.pathItemOrRef),
        components: ComponentsContainer.create({
            schemas: reader.map('definitions', build.schema),
            parameters: reader.map('parameters', build.parameter),
            responses: reader.map('responses', build.response),
            securitySchemes,
        }),
        tags: reader.list('tags', buildTag),
        ...optional('security', reader.has('security') ? reader.list('security', buildSecurityRequirement) : undefined),
        ...optional('externalDocs', mapOptional(reader, 'externalDocs', buildExternalDocs)),
        extensions: reader.extensions(),
    };
}

function toPlainObject(document: SwaggerDocument): JsonObject {
    const write = new PlainWriters('2.0');
    const { components } = document;

    return compact({
        swagger: document.swagger,
        info: writeInfo(document.info),
        host: document.host,
        basePath: document.basePath,
        schemes: document.schemes && [...document.schemes],
        consumes: document.consumes && [...document.consumes],
        produces: document.produces && [...document.produces],
        paths: fromMap(document.paths, write.pathItemOrRef),
        definitions: writeSection(components.entries('schemas'), write.schema),
        parameters: writeSection(components.entries('parameters'), write.parameterOrRef),
        responses: writeSection(components.entries('responses'), write.responseOrRef),
        securityDefinitions: writeSection(components.entries('securitySchemes'), writeRefOr(writeSecurityScheme)),
        security: document.security?.map(writeSecurityRequirement),
        tags: document.tags.length > 0 ? document.tags.map(writeTag) : undefined,
        externalDocs: document.externalDocs && writeExternalDocs(document.externalDocs),
        ...document.extensions,
    });
}

export const SWAGGER_2: DialectAdapter<'2.0'> = {
    dialect: '2.0',
    label: 'Swagger 2.0',
    componentKinds: ['schemas', 'parameters', 'responses', 'securitySchemes'],
    componentLocations: {
        schemas: ['definitions'],
        parameters: ['parameters'],
        responses: ['responses'],
        securitySchemes: ['securityDefinitions'],
    },
    enforcesComponentNames: false,
    matches: raw => versionMarker(raw, 'swagger')?.startsWith('2.') ?? false,
    parse,
    pathGroups: document => [{ location: ['paths'], items: document.paths }],
    toPlainObject,
};
