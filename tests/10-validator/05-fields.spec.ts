import { describe, expect, it } from 'vitest';
import { IGNORE_EMPTY_REQUIRED_FIELDS } from '@src/core/options.js';
import { parseDocument } from '@src/core/parser.js';
import { validateDocument } from '@src/core/validator/index.js';
import { emptySpec30, emptySpec31, emptySwagger, info, okResponse } from '../fixtures/common.js';
import { issuesOf, summaryOf } from '../shared/helpers.js';

describe('Validator: Field rules', () => {
    describe('required fields', () => {
        it('should report an empty title and a blank version', () => {
            const spec = { ...emptySpec30, info: { title: '', version: '  ' } };
            expect(issuesOf(spec)).toEqual([
                {
                    kind: 'EmptyRequiredField',
                    path: ['info', 'title'],
                    pointer: '#/info/title',
                    field: 'title',
                    message: 'info.title must not be empty.',
                },
                {
                    kind: 'EmptyRequiredField',
                    path: ['info', 'version'],
                    pointer: '#/info/version',
                    field: 'version',
                    message: 'info.version must not be empty.',
                },
            ]);
        });

        it('should report responses without a description', () => {
            const spec = {
                ...emptySpec30,
                paths: { '/pets': { get: { responses: { '200': { description: '' }, '404': {} } } } },
            };
            const issues = issuesOf(spec);
            expect(issues.map(issue => [issue.pointer, issue.message])).toEqual([
                ['#/paths/~1pets/get/responses/200/description', 'Response description must not be empty.'],
                ['#/paths/~1pets/get/responses/404/description', 'Response description must not be empty.'],
            ]);
        });

        it('should report an empty external documentation url', () => {
            const spec = { ...emptySpec30, externalDocs: { url: '' } };
            expect(issuesOf(spec)).toEqual([
                {
                    kind: 'EmptyRequiredField',
                    path: ['externalDocs', 'url'],
                    pointer: '#/externalDocs/url',
                    field: 'url',
                    message: 'externalDocs.url must not be empty.',
                },
            ]);
        });

        it('should accept all of them with the IGNORE_EMPTY_REQUIRED_FIELDS preset', () => {
            const spec = {
                ...emptySwagger,
                info: { title: '', version: '' },
                externalDocs: { url: '' },
                paths: { '/pets': { get: { responses: { default: { description: '' } } } } },
            };
            expect(summaryOf(spec)).toEqual([
                'EmptyRequiredField @ #/info/title',
                'EmptyRequiredField @ #/info/version',
                'EmptyRequiredField @ #/externalDocs/url',
                'EmptyRequiredField @ #/paths/~1pets/get/responses/default/description',
            ]);
            expect(validateDocument(parseDocument(spec), IGNORE_EMPTY_REQUIRED_FIELDS)).toEqual({ valid: true, issues: [] });
        });
    });

    describe('URLs and emails', () => {
        it('should check the info object in field order', () => {
            const spec = {
                ...emptySpec30,
                info: {
                    ...info,
                    termsOfService: 'terms.html',
                    contact: { url: 'example.com/support', email: 'support.example.com' },
                    license: { name: 'MIT', url: 'ftp://example.com/license' },
                },
            };
            const issues = issuesOf(spec);
            expect(issues.map(issue => [issue.kind, issue.pointer, issue.message])).toEqual([
                ['InvalidUrl', '#/info/termsOfService', "'terms.html' is not an absolute http(s) URL."],
                ['InvalidUrl', '#/info/contact/url', "'example.com/support' is not an absolute http(s) URL."],
                ['InvalidEmail', '#/info/contact/email', "'support.example.com' is not an email address."],
                ['InvalidUrl', '#/info/license/url', "'ftp://example.com/license' is not an absolute http(s) URL."],
            ]);
            expect(issuesOf(spec, 'ignore-invalid-urls')).toEqual([]);
        });

        it('should check external documentation of the root, operations and tags', () => {
            const spec = {
                ...emptySpec30,
                externalDocs: { url: 'docs' },
                tags: [{ name: 'pets', externalDocs: { url: 'https://example.com/pets' } }, { name: 'store', externalDocs: { url: '/store' } }],
                paths: {
                    '/pets': {
                        get: { tags: ['pets', 'store'], externalDocs: { url: 'pets.md' }, responses: { '200': okResponse } },
                    },
                },
            };
            expect(summaryOf(spec)).toEqual([
                'InvalidUrl @ #/externalDocs/url',
                'InvalidUrl @ #/paths/~1pets/get/externalDocs/url',
                'InvalidUrl @ #/tags/1/externalDocs/url',
            ]);
        });

        it('should check security scheme URLs', () => {
            const spec = {
                ...emptySpec30,
                security: [{ oidc: [] }, { oauth: [] }],
                components: {
                    securitySchemes: {
                        oidc: { type: 'openIdConnect', openIdConnectUrl: '/.well-known/openid-configuration' },
                        oauth: {
                            type: 'oauth2',
                            flows: {
                                password: { tokenUrl: '/token', refreshUrl: 'https://example.com/refresh', scopes: {} },
                            },
                        },
                    },
                },
            };
            expect(summaryOf(spec)).toEqual([
                'InvalidUrl @ #/components/securitySchemes/oidc/openIdConnectUrl',
                'InvalidUrl @ #/components/securitySchemes/oauth/flows/password/tokenUrl',
            ]);
        });

        it('should check Swagger 2.0 OAuth2 URLs', () => {
            const spec = {
                ...emptySwagger,
                security: [{ oauth: [] }],
                securityDefinitions: {
                    oauth: { type: 'oauth2', flow: 'password', tokenUrl: 'token', scopes: { read: 'read access' } },
                },
            };
            expect(summaryOf(spec)).toEqual(['InvalidUrl @ #/securityDefinitions/oauth/tokenUrl']);
        });

        it('should check the Swagger 2.0 host and basePath', () => {
            const spec = { ...emptySwagger, host: 'https://api.example.com', basePath: 'api' };
            expect(issuesOf(spec)).toEqual([
                {
                    kind: 'InvalidUrl',
                    path: ['host'],
                    pointer: '#/host',
                    value: 'https://api.example.com',
                    message: "'https://api.example.com' is not a host name with an optional port.",
                },
                {
                    kind: 'InvalidUrl',
                    path: ['basePath'],
                    pointer: '#/basePath',
                    value: 'api',
                    message: "basePath 'api' must start with '/'.",
                },
            ]);
            expect(issuesOf(spec, 'ignore-invalid-urls')).toEqual([]);
        });

        it('should accept a host with a port', () => {
            expect(issuesOf({ ...emptySwagger, host: 'localhost:8080', basePath: '/' })).toEqual([]);
        });
    });

    describe('servers', () => {
        const withServers = (servers: object[]) => ({ ...emptySpec30, servers });

        it('should report variables missing from the declaration, unused ones and defaults outside the enum', () => {
            const spec = withServers([
                {
                    url: 'https://{host}:{port}/v1',
                    variables: {
                        port: { default: '80', enum: ['8443', '443'] },
                        stage: { default: 'beta' },
                    },
                },
            ]);
            expect(issuesOf(spec)).toEqual([
                {
                    kind: 'InvalidServerVariableDefault',
                    path: ['servers', 0, 'variables', 'port', 'default'],
                    pointer: '#/servers/0/variables/port/default',
                    variable: 'port',
                    value: '80',
                    allowed: ['8443', '443'],
                    message: 'Default \'80\' of server variable \'port\' is not one of "8443" and "443".',
                },
                {
                    kind: 'UndefinedServerVariable',
                    path: ['servers', 0, 'url'],
                    pointer: '#/servers/0/url',
                    variable: 'host',
                    message: "Server URL uses '{host}', which is not declared in variables.",
                },
                {
                    kind: 'UnusedServerVariable',
                    path: ['servers', 0, 'variables', 'stage'],
                    pointer: '#/servers/0/variables/stage',
                    variable: 'stage',
                    message: "Server variable 'stage' is not used in the URL.",
                },
            ]);
        });

        it('should silence unused variables with their flag only', () => {
            const spec = withServers([{ url: 'https://{host}', variables: { region: { default: 'eu' } } }]);
            expect(summaryOf(spec, 'ignore-unused-server-variables')).toEqual(['UndefinedServerVariable @ #/servers/0/url']);
        });

        it('should accept a variable used twice', () => {
            const spec = withServers([{ url: 'https://{env}.example.com/{env}', variables: { env: { default: 'prod' } } }]);
            expect(issuesOf(spec)).toEqual([]);
        });

        it('should check path item, operation and link servers', () => {
            const broken = { url: '/{missing}' };
            const spec = {
                ...emptySpec31,
                paths: {
                    '/pets': {
                        servers: [broken],
                        get: {
                            operationId: 'listPets',
                            servers: [broken],
                            responses: {
                                '200': { ...okResponse, links: { Self: { operationId: 'listPets', server: broken } } },
                            },
                        },
                    },
                },
            };
            expect(summaryOf(spec)).toEqual([
                'UndefinedServerVariable @ #/paths/~1pets/servers/0/url',
                'UndefinedServerVariable @ #/paths/~1pets/get/servers/0/url',
                'UndefinedServerVariable @ #/paths/~1pets/get/responses/200/links/Self/server/url',
            ]);
        });
    });

    describe('path parameters', () => {
        it('should report a path parameter that is not required', () => {
            const spec = {
                ...emptySpec30,
                paths: {
                    '/a/{id}': {
                        get: { parameters: [{ name: 'id', in: 'path', schema: { type: 'string' } }], responses: {} },
                    },
                },
            };
            expect(issuesOf(spec)).toEqual([
                {
                    kind: 'OptionalPathParameter',
                    path: ['paths', '/a/{id}', 'get', 'parameters', 0, 'required'],
                    pointer: '#/paths/~1a~1{id}/get/parameters/0/required',
                    name: 'id',
                    message: "Path parameter 'id' must be required.",
                },
            ]);
        });

        it('should check Swagger 2.0 parameter components', () => {
            const spec = {
                ...emptySwagger,
                paths: { '/a/{id}': { parameters: [{ $ref: '#/parameters/Id' }], get: { responses: {} } } },
                parameters: { Id: { name: 'id', in: 'path', required: false, type: 'string' } },
            };
            expect(summaryOf(spec)).toEqual(['OptionalPathParameter @ #/parameters/Id/required']);
        });
    });

    describe('OAuth2 scopes', () => {
        it('should report a Swagger 2.0 scheme without scopes', () => {
            const spec = {
                ...emptySwagger,
                security: [{ oauth: [] }],
                securityDefinitions: {
                    oauth: { type: 'oauth2', flow: 'password', tokenUrl: 'https://example.com/token', scopes: {} },
                },
            };
            expect(issuesOf(spec)).toEqual([
                {
                    kind: 'EmptyRequiredField',
                    path: ['securityDefinitions', 'oauth', 'scopes'],
                    pointer: '#/securityDefinitions/oauth/scopes',
                    field: 'scopes',
                    message: 'OAuth2 scopes must not be empty.',
                },
            ]);
        });
    });

    describe('component names', () => {
        const schemas = { 'Pet Model': { type: 'object' }, 'Pet.v2_final-1': { type: 'object' } };

        it('should report OpenAPI 3.x names outside the allowed characters', () => {
            expect(issuesOf({ ...emptySpec31, components: { schemas } }, 'ignore-unused-schemas')).toEqual([
                {
                    kind: 'InvalidComponentName',
                    path: ['components', 'schemas', 'Pet Model'],
                    pointer: '#/components/schemas/Pet Model',
                    componentKind: 'schemas',
                    name: 'Pet Model',
                    message: 'Component name \'Pet Model\' in schemas must match ^[a-zA-Z0-9.\\-_]+$.',
                },
            ]);
        });

        it('should be silenced by its flag', () => {
            const raw = { ...emptySpec30, components: { schemas } };
            expect(issuesOf(raw, 'ignore-unused-schemas', 'ignore-invalid-component-names')).toEqual([]);
        });

        it('should not apply to Swagger 2.0 definitions', () => {
            expect(issuesOf({ ...emptySwagger, definitions: schemas }, 'ignore-unused-schemas')).toEqual([]);
        });
    });
});
