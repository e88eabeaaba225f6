// ===================================================================================
// Spec Document Model
// ===================================================================================

import type { ComponentsContainer } from '../model/components.js';
import type { JsonObject, JsonValue } from './json.js';
import type { SchemaNode } from './schema.js';

/** The supported specification dialects. Exactly one is active per document. */
export type Dialect = '2.0' | '3.0' | '3.1';

export type HttpMethod = 'get' | 'put' | 'post' | 'delete' | 'options' | 'head' | 'patch' | 'trace';

/** Operation slots of a Path Item in the order they are traversed. */
export const HTTP_METHODS: readonly HttpMethod[] = ['get', 'put', 'post', 'delete', 'options', 'head', 'patch', 'trace'];

/**
 * A pointer to a component or external resource. Never dereferenced at
 * construction time; see `ReferenceResolver`.
 */
export interface Reference {
    readonly $ref: string;
    readonly summary?: string;
    readonly description?: string;
}

export type RefOr<T> = Reference | T;

export interface ContactObject {
    readonly name?: string;
    readonly url?: string;
    readonly email?: string;
    readonly extensions: JsonObject;
}

export interface LicenseObject {
    readonly name: string;
    readonly url?: string;
    readonly identifier?: string;
    readonly extensions: JsonObject;
}

export interface InfoObject {
    readonly title: string;
    readonly version: string;
    readonly summary?: string;
    readonly description?: string;
    readonly termsOfService?: string;
    readonly contact?: ContactObject;
    readonly license?: LicenseObject;
    readonly extensions: JsonObject;
}

export interface ExternalDocumentationObject {
    readonly url: string;
    readonly description?: string;
    readonly extensions: JsonObject;
}

export interface TagObject {
    readonly name: string;
    readonly description?: string;
    readonly externalDocs?: ExternalDocumentationObject;
    readonly extensions: JsonObject;
}

export interface ServerVariableObject {
    readonly default: string;
    readonly enum?: readonly string[];
    readonly description?: string;
    readonly extensions: JsonObject;
}

export interface ServerObject {
    readonly url: string;
    readonly description?: string;
    readonly variables: ReadonlyMap<string, ServerVariableObject>;
    readonly extensions: JsonObject;
}

export type ParameterLocation = 'query' | 'header' | 'path' | 'cookie' | 'body' | 'formData';

export interface ExampleObject {
    readonly summary?: string;
    readonly description?: string;
    readonly value?: JsonValue;
    readonly externalValue?: string;
    readonly extensions: JsonObject;
}

export interface EncodingObject {
    readonly contentType?: string;
    readonly headers: ReadonlyMap<string, RefOr<HeaderObject>>;
    readonly style?: string;
    readonly explode?: boolean;
    readonly allowReserved?: boolean;
    readonly extensions: JsonObject;
}

export interface MediaTypeObject {
    readonly schema?: SchemaNode;
    readonly example?: JsonValue;
    readonly examples: ReadonlyMap<string, RefOr<ExampleObject>>;
    readonly encoding: ReadonlyMap<string, EncodingObject>;
    readonly extensions: JsonObject;
}

/**
 * A parameter. In Swagger 2.0 a non-body parameter declares its type inline
 * (`type`, `format`, `items`, ...); those keywords are modelled as `schema`.
 */
export interface ParameterObject {
    readonly name: string;
    readonly in: ParameterLocation;
    readonly description?: string;
    readonly required?: boolean;
    readonly deprecated?: boolean;
    readonly allowEmptyValue?: boolean;
    readonly style?: string;
    readonly explode?: boolean;
    readonly allowReserved?: boolean;
    readonly schema?: SchemaNode;
    readonly content: ReadonlyMap<string, MediaTypeObject>;
    readonly example?: JsonValue;
    readonly examples: ReadonlyMap<string, RefOr<ExampleObject>>;
    readonly extensions: JsonObject;
}

/** Swagger 2.0 headers declare their type inline, modelled as `schema` like parameters. */
export interface HeaderObject {
    readonly description?: string;
    readonly required?: boolean;
    readonly deprecated?: boolean;
    readonly style?: string;
    readonly explode?: boolean;
    readonly schema?: SchemaNode;
    readonly content: ReadonlyMap<string, MediaTypeObject>;
    readonly example?: JsonValue;
    readonly examples: ReadonlyMap<string, RefOr<ExampleObject>>;
    readonly extensions: JsonObject;
}

export interface LinkObject {
    readonly operationRef?: string;
    readonly operationId?: string;
    readonly parameters?: JsonObject;
    readonly requestBody?: JsonValue;
    readonly description?: string;
    readonly server?: ServerObject;
    readonly extensions: JsonObject;
}

export interface ResponseObject {
    /** Required by every dialect; kept optional so an omission is reported instead of aborting the parse. */
    readonly description?: string;
    readonly headers: ReadonlyMap<string, RefOr<HeaderObject>>;
    readonly content: ReadonlyMap<string, MediaTypeObject>;
    readonly links: ReadonlyMap<string, RefOr<LinkObject>>;
    /** Swagger 2.0 response body schema. */
    readonly schema?: SchemaNode;
    /** Swagger 2.0 examples keyed by MIME type. */
    readonly examples?: JsonObject;
    readonly extensions: JsonObject;
}

export interface RequestBodyObject {
    readonly description?: string;
    readonly content: ReadonlyMap<string, MediaTypeObject>;
    readonly required?: boolean;
    readonly extensions: JsonObject;
}

/** Runtime expression -> Path Item describing the out-of-band request. */
export interface CallbackObject {
    readonly expressions: ReadonlyMap<string, RefOr<PathItemObject>>;
    readonly extensions: JsonObject;
}

/** Security scheme name -> required scopes. */
export type SecurityRequirement = ReadonlyMap<string, readonly string[]>;

export interface OperationObject {
    readonly operationId?: string;
    readonly summary?: string;
    readonly description?: string;
    readonly tags: readonly string[];
    readonly parameters: readonly RefOr<ParameterObject>[];
    readonly requestBody?: RefOr<RequestBodyObject>;
    readonly responses: ReadonlyMap<string, RefOr<ResponseObject>>;
    readonly callbacks: ReadonlyMap<string, RefOr<CallbackObject>>;
    /** `undefined` inherits the document requirements, `[]` removes them. */
    readonly security?: readonly SecurityRequirement[];
    readonly deprecated?: boolean;
    readonly servers: readonly ServerObject[];
    readonly externalDocs?: ExternalDocumentationObject;
    readonly consumes?: readonly string[];
    readonly produces?: readonly string[];
    readonly schemes?: readonly string[];
    readonly extensions: JsonObject;
}

export interface PathItemObject {
    readonly summary?: string;
    readonly description?: string;
    readonly operations: ReadonlyMap<HttpMethod, OperationObject>;
    readonly parameters: readonly RefOr<ParameterObject>[];
    readonly servers: readonly ServerObject[];
    readonly extensions: JsonObject;
}

// -----------------------------------------------------------------------------------
// Security schemes
// -----------------------------------------------------------------------------------

interface SecuritySchemeBase {
    readonly description?: string;
    readonly extensions: JsonObject;
}

export interface BasicSecurityScheme extends SecuritySchemeBase {
    readonly type: 'basic';
}

export interface ApiKeySecurityScheme extends SecuritySchemeBase {
    readonly type: 'apiKey';
    readonly name: string;
    readonly in: 'query' | 'header' | 'cookie';
}

export interface HttpSecurityScheme extends SecuritySchemeBase {
    readonly type: 'http';
    readonly scheme: string;
    readonly bearerFormat?: string;
}

export type SwaggerOAuth2Flow = 'implicit' | 'password' | 'application' | 'accessCode';

/** Swagger 2.0 OAuth2: a single flow per scheme. */
export interface SwaggerOAuth2SecurityScheme extends SecuritySchemeBase {
    readonly type: 'oauth2';
    readonly flow: SwaggerOAuth2Flow;
    readonly authorizationUrl?: string;
    readonly tokenUrl?: string;
    readonly scopes: ReadonlyMap<string, string>;
}

export interface OAuthFlowObject {
    readonly authorizationUrl?: string;
    readonly tokenUrl?: string;
    readonly refreshUrl?: string;
    readonly scopes: ReadonlyMap<string, string>;
    readonly extensions: JsonObject;
}

export type OAuthFlowName = 'implicit' | 'password' | 'clientCredentials' | 'authorizationCode';

export const OAUTH_FLOW_NAMES: readonly OAuthFlowName[] = ['implicit', 'password', 'clientCredentials', 'authorizationCode'];

export interface OAuth2SecurityScheme extends SecuritySchemeBase {
    readonly type: 'oauth2';
    readonly flows: Readonly<Partial<Record<OAuthFlowName, OAuthFlowObject>>>;
}

export interface OpenIdConnectSecurityScheme extends SecuritySchemeBase {
    readonly type: 'openIdConnect';
    readonly openIdConnectUrl: string;
}

export interface MutualTlsSecurityScheme extends SecuritySchemeBase {
    readonly type: 'mutualTLS';
}

export type SwaggerSecurityScheme = BasicSecurityScheme | ApiKeySecurityScheme | SwaggerOAuth2SecurityScheme;

export type OpenApiSecurityScheme =
    | ApiKeySecurityScheme
    | HttpSecurityScheme
    | OAuth2SecurityScheme
    | OpenIdConnectSecurityScheme
    | MutualTlsSecurityScheme;

export type SecurityScheme = SwaggerSecurityScheme | OpenApiSecurityScheme;

// -----------------------------------------------------------------------------------
// Components
// -----------------------------------------------------------------------------------

/** The value stored under each component kind. */
export interface ComponentTypes {
    schemas: SchemaNode;
    responses: RefOr<ResponseObject>;
    parameters: RefOr<ParameterObject>;
    examples: RefOr<ExampleObject>;
    requestBodies: RefOr<RequestBodyObject>;
    headers: RefOr<HeaderObject>;
    securitySchemes: RefOr<SecurityScheme>;
    links: RefOr<LinkObject>;
    callbacks: RefOr<CallbackObject>;
    pathItems: RefOr<PathItemObject>;
}

export type ComponentKind = keyof ComponentTypes;

/** Component kinds in traversal order. */
export const COMPONENT_KINDS: readonly ComponentKind[] = [
    'schemas',
    'responses',
    'parameters',
    'examples',
    'requestBodies',
    'headers',
    'securitySchemes',
    'links',
    'callbacks',
    'pathItems',
];

/** A component value once any reference has been followed. */
export type ResolvedComponent<K extends ComponentKind> = Exclude<ComponentTypes[K], Reference>;

export type ComponentRegistry = {
    readonly [K in ComponentKind]: ReadonlyMap<string, ComponentTypes[K]>;
};

// -----------------------------------------------------------------------------------
// Documents
// -----------------------------------------------------------------------------------

interface DocumentBase {
    readonly info: InfoObject;
    /** Route template -> Path Item, in document order. */
    readonly paths: ReadonlyMap<string, RefOr<PathItemObject>>;
    readonly components: ComponentsContainer;
    readonly tags: readonly TagObject[];
    readonly security?: readonly SecurityRequirement[];
    readonly externalDocs?: ExternalDocumentationObject;
    readonly extensions: JsonObject;
}

/** Swagger 2.0: reusable artifacts live in `definitions`, `parameters`, `responses` and `securityDefinitions`. */
export interface SwaggerDocument extends DocumentBase {
    readonly dialect: '2.0';
    readonly swagger: string;
    readonly host?: string;
    readonly basePath?: string;
    readonly schemes?: readonly string[];
    readonly consumes?: readonly string[];
    readonly produces?: readonly string[];
}

export interface OpenApi30Document extends DocumentBase {
    readonly dialect: '3.0';
    readonly openapi: string;
    readonly servers: readonly ServerObject[];
}

export interface OpenApi31Document extends DocumentBase {
    readonly dialect: '3.1';
    readonly openapi: string;
    readonly servers: readonly ServerObject[];
    readonly webhooks: ReadonlyMap<string, RefOr<PathItemObject>>;
    readonly jsonSchemaDialect?: string;
}

export type SpecDocument = SwaggerDocument | OpenApi30Document | OpenApi31Document;

export type DocumentOf<D extends Dialect> = Extract<SpecDocument, { dialect: D }>;
