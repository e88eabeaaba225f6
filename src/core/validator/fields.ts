import type { ValidationOption } from '../options.js';
import type {
    ComponentKind,
    InfoObject,
    ParameterObject,
    SecurityScheme,
    ServerObject,
    SpecDocument,
    StructuralPath,
} from '../types/index.js';
import { OAUTH_FLOW_NAMES } from '../types/index.js';
import { isHttpUrl, quoteList } from '../utils/index.js';
import type { ValidationContext } from './context.js';
import type { WalkVisitor } from './walker.js';

/** Swagger 2.0 `host`: a name or address with an optional port, nothing else. */
export const HOST_PATTERN = /^[^{}\/ :\\]+(?::\d+)?$/;

const SERVER_VARIABLE = /\{([a-zA-Z0-9.\-_]+)\}/g;

/** Component names of OpenAPI 3.x. */
export const COMPONENT_NAME_PATTERN = /^[a-zA-Z0-9.\-_]+$/;

function isBlank(value: string | undefined): boolean {
    return value === undefined || value.trim() === '';
}

function requireField(
    ctx: ValidationContext,
    flag: ValidationOption,
    value: string | undefined,
    field: string,
    path: StructuralPath,
    what: string,
): void {
    if (!isBlank(value)) return;
    ctx.reportUnless(flag, {
        kind: 'EmptyRequiredField',
        path: [...path, field],
        field,
        message: `${what} must not be empty.`,
    });
}

export function checkUrl(ctx: ValidationContext, value: string | undefined, path: StructuralPath): void {
    if (value === undefined || value === '' || isHttpUrl(value)) return;
    ctx.reportUnless('ignore-invalid-urls', {
        kind: 'InvalidUrl',
        path,
        value,
        message: `'${value}' is not an absolute http(s) URL.`,
    });
}

export function checkInfo(ctx: ValidationContext, info: InfoObject): void {
    const path = ['info'];
    requireField(ctx, 'ignore-empty-info-title', info.title, 'title', path, 'info.title');
    requireField(ctx, 'ignore-empty-info-version', info.version, 'version', path, 'info.version');
    checkUrl(ctx, info.termsOfService, [...path, 'termsOfService']);
    if (info.contact) {
        checkUrl(ctx, info.contact.url, [...path, 'contact', 'url']);
        const email = info.contact.email;
        if (email !== undefined && !email.includes('@')) {
            ctx.reportUnless('ignore-invalid-urls', {
                kind: 'InvalidEmail',
                path: [...path, 'contact', 'email'],
                value: email,
                message: `'${email}' is not an email address.`,
            });
        }
    }
    if (info.license) checkUrl(ctx, info.license.url, [...path, 'license', 'url']);
}

export function checkHostAndBasePath(ctx: ValidationContext, document: SpecDocument): void {
    if (document.dialect !== '2.0') return;
    const { host, basePath } = document;
    if (host !== undefined && !HOST_PATTERN.test(host)) {
        ctx.reportUnless('ignore-invalid-urls', {
            kind: 'InvalidUrl',
            path: ['host'],
            value: host,
            message: `'${host}' is not a host name with an optional port.`,
        });
    }
    if (basePath !== undefined && !basePath.startsWith('/')) {
        ctx.reportUnless('ignore-invalid-urls', {
            kind: 'InvalidUrl',
            path: ['basePath'],
            value: basePath,
            message: `basePath '${basePath}' must start with '/'.`,
        });
    }
}

/**
 * Every `{name}` in a server URL must be a declared variable, every variable
 * must appear in the URL, and a variable with an `enum` must default to one
 * of its values.
 */
export function checkServer(ctx: ValidationContext, server: ServerObject, path: StructuralPath): void {
    for (const [name, variable] of server.variables) {
        if (variable.enum === undefined || variable.enum.includes(variable.default)) continue;
        ctx.report({
            kind: 'InvalidServerVariableDefault',
            path: [...path, 'variables', name, 'default'],
            variable: name,
            value: variable.default,
            allowed: variable.enum,
            message: `Default '${variable.default}' of server variable '${name}' is not one of ${quoteList(variable.enum)}.`,
        });
    }

    const unused = new Set(server.variables.keys());
    for (const [, name] of server.url.matchAll(SERVER_VARIABLE)) {
        if (server.variables.has(name)) {
            unused.delete(name);
            continue;
        }
        ctx.report({
            kind: 'UndefinedServerVariable',
            path: [...path, 'url'],
            variable: name,
            message: `Server URL uses '{${name}}', which is not declared in variables.`,
        });
    }
    for (const name of unused) {
        ctx.reportUnless('ignore-unused-server-variables', {
            kind: 'UnusedServerVariable',
            path: [...path, 'variables', name],
            variable: name,
            message: `Server variable '${name}' is not used in the URL.`,
        });
    }
}

function checkPathParameter(ctx: ValidationContext, parameter: ParameterObject, path: StructuralPath): void {
    if (parameter.in !== 'path' || parameter.required === true) return;
    ctx.report({
        kind: 'OptionalPathParameter',
        path: [...path, 'required'],
        name: parameter.name,
        message: `Path parameter '${parameter.name}' must be required.`,
    });
}

function checkSecurityScheme(ctx: ValidationContext, scheme: SecurityScheme, path: StructuralPath): void {
    switch (scheme.type) {
        case 'openIdConnect':
            checkUrl(ctx, scheme.openIdConnectUrl, [...path, 'openIdConnectUrl']);
            return;
        case 'oauth2':
            if ('flow' in scheme) {
                if (scheme.scopes.size === 0) {
                    ctx.report({
                        kind: 'EmptyRequiredField',
                        path: [...path, 'scopes'],
                        field: 'scopes',
                        message: 'OAuth2 scopes must not be empty.',
                    });
                }
                checkUrl(ctx, scheme.authorizationUrl, [...path, 'authorizationUrl']);
                checkUrl(ctx, scheme.tokenUrl, [...path, 'tokenUrl']);
                return;
            }
            for (const name of OAUTH_FLOW_NAMES) {
                const flow = scheme.flows[name];
                if (!flow) continue;
                const at = [...path, 'flows', name];
                checkUrl(ctx, flow.authorizationUrl, [...at, 'authorizationUrl']);
                checkUrl(ctx, flow.tokenUrl, [...at, 'tokenUrl']);
                checkUrl(ctx, flow.refreshUrl, [...at, 'refreshUrl']);
            }
            return;
        default:
            return;
    }
}

export function fieldVisitor(ctx: ValidationContext): WalkVisitor {
    return {
        externalDocs(docs, path) {
            requireField(ctx, 'ignore-empty-external-documentation-url', docs.url, 'url', path, 'externalDocs.url');
            checkUrl(ctx, docs.url, [...path, 'url']);
        },
        response(response, path) {
            requireField(
                ctx,
                'ignore-empty-response-description',
                response.description,
                'description',
                path,
                'Response description',
            );
        },
        securityScheme(scheme, path) {
            checkSecurityScheme(ctx, scheme, path);
        },
        parameter(parameter, path) {
            checkPathParameter(ctx, parameter, path);
        },
        server(server, path) {
            checkServer(ctx, server, path);
        },
    };
}

/** OpenAPI 3.x component names must match `^[a-zA-Z0-9.\-_]+$`. */
export function checkComponentName(
    ctx: ValidationContext,
    kind: ComponentKind,
    name: string,
    path: StructuralPath,
): void {
    if (!ctx.adapter.enforcesComponentNames || COMPONENT_NAME_PATTERN.test(name)) return;
    ctx.reportUnless('ignore-invalid-component-names', {
        kind: 'InvalidComponentName',
        path,
        componentKind: kind,
        name,
        message: `Component name '${name}' in ${kind} must match ${COMPONENT_NAME_PATTERN.source}.`,
    });
}
