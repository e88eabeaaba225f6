/**
 * Well-formed documents, one per dialect. Every component and tag they
 * declare is used, so each validates without issues under strict options.
 */

export const petstoreSwagger = {
    swagger: '2.0',
    info: { title: 'Pet Store', version: '1.0.0', license: { name: 'MIT' } },
    host: 'petstore.example.com',
    basePath: '/v1',
    schemes: ['https'],
    consumes: ['application/json'],
    produces: ['application/json'],
    tags: [{ name: 'pets', description: 'Everything about pets' }],
    paths: {
        '/pets': {
            get: {
                operationId: 'listPets',
                tags: ['pets'],
                parameters: [{ $ref: '#/parameters/Limit' }],
                responses: {
                    '200': {
                        description: 'A paged array of pets',
                        headers: { 'x-next': { type: 'string', description: 'Link to the next page' } },
                        schema: { type: 'array', items: { $ref: '#/definitions/Pet' } },
                    },
                    default: { $ref: '#/responses/Error' },
                },
            },
            post: {
                operationId: 'createPet',
                tags: ['pets'],
                security: [{ petstore_auth: ['write:pets'] }],
                parameters: [{ name: 'pet', in: 'body', required: true, schema: { $ref: '#/definitions/Pet' } }],
                responses: { '201': { description: 'Created' } },
            },
        },
        '/pets/{petId}': {
            get: {
                operationId: 'showPetById',
                tags: ['pets'],
                parameters: [{ name: 'petId', in: 'path', required: true, type: 'string' }],
                responses: {
                    '200': { description: 'Expected response', schema: { $ref: '#/definitions/Pet' } },
                    default: { $ref: '#/responses/Error' },
                },
            },
        },
    },
    definitions: {
        Pet: {
            type: 'object',
            discriminator: 'petType',
            required: ['id', 'name', 'petType'],
            properties: {
                id: { type: 'integer', format: 'int64' },
                name: { type: 'string' },
                petType: { type: 'string' },
            },
        },
        Error: {
            type: 'object',
            required: ['code', 'message'],
            properties: { code: { type: 'integer', format: 'int32' }, message: { type: 'string' } },
        },
    },
    parameters: {
        Limit: { name: 'limit', in: 'query', required: false, type: 'integer', format: 'int32' },
    },
    responses: {
        Error: { description: 'Unexpected error', schema: { $ref: '#/definitions/Error' } },
    },
    securityDefinitions: {
        petstore_auth: {
            type: 'oauth2',
            flow: 'implicit',
            authorizationUrl: 'https://petstore.example.com/oauth/dialog',
            scopes: { 'write:pets': 'modify pets', 'read:pets': 'read pets' },
        },
        api_key: { type: 'apiKey', name: 'api_key', in: 'header' },
    },
    security: [{ api_key: [] }],
};

export const petstore30 = {
    openapi: '3.0.3',
    info: {
        title: 'Pet Store',
        version: '1.0.0',
        termsOfService: 'https://example.com/terms',
        contact: { name: 'API Support', url: 'https://example.com/support', email: 'support@example.com' },
        license: { name: 'MIT', url: 'https://opensource.org/licenses/MIT' },
    },
    servers: [{ url: 'https://api.example.com/{version}', variables: { version: { default: 'v1', enum: ['v1', 'v2'] } } }],
    tags: [{ name: 'pets', description: 'Pet operations', externalDocs: { url: 'https://example.com/docs/pets' } }],
    externalDocs: { description: 'Guides', url: 'https://example.com/docs' },
    paths: {
        '/pets': {
            get: {
                operationId: 'listPets',
                tags: ['pets'],
                parameters: [{ $ref: '#/components/parameters/Limit' }],
                responses: {
                    '200': {
                        description: 'A list of pets',
                        headers: { 'X-Rate-Limit': { $ref: '#/components/headers/RateLimit' } },
                        content: {
                            'application/json': { schema: { type: 'array', items: { $ref: '#/components/schemas/Pet' } } },
                        },
                    },
                    default: { $ref: '#/components/responses/Error' },
                },
            },
            post: {
                operationId: 'createPet',
                tags: ['pets'],
                security: [{ petstore_auth: ['write:pets'] }],
                requestBody: { $ref: '#/components/requestBodies/NewPet' },
                responses: {
                    '201': {
                        description: 'Created',
                        content: {
                            'application/json': {
                                schema: { $ref: '#/components/schemas/Pet' },
                                examples: { cat: { $ref: '#/components/examples/Cat' } },
                            },
                        },
                        links: { GetPet: { $ref: '#/components/links/GetPetById' } },
                    },
                },
                callbacks: { onAdopted: { $ref: '#/components/callbacks/Adopted' } },
            },
        },
        '/pets/{petId}': {
            parameters: [{ name: 'petId', in: 'path', required: true, schema: { type: 'integer', format: 'int64' } }],
            get: {
                operationId: 'showPetById',
                tags: ['pets'],
                responses: {
                    '200': {
                        description: 'A pet',
                        content: { 'application/json': { schema: { $ref: '#/components/schemas/Pet' } } },
                    },
                    default: { $ref: '#/components/responses/Error' },
                },
            },
        },
    },
    components: {
        schemas: {
            Pet: {
                type: 'object',
                required: ['id', 'name'],
                properties: {
                    id: { type: 'integer', format: 'int64' },
                    name: { type: 'string' },
                    tag: { type: 'string', nullable: true },
                    owner: { $ref: '#/components/schemas/Owner' },
                },
            },
            Owner: {
                type: 'object',
                properties: {
                    name: { type: 'string' },
                    pets: { type: 'array', items: { $ref: '#/components/schemas/Pet' } },
                },
            },
            NewPet: { allOf: [{ $ref: '#/components/schemas/Pet' }], required: ['name'] },
            Error: {
                type: 'object',
                required: ['code', 'message'],
                properties: { code: { type: 'integer', format: 'int32' }, message: { type: 'string' } },
            },
        },
        responses: {
            Error: {
                description: 'Unexpected error',
                content: { 'application/json': { schema: { $ref: '#/components/schemas/Error' } } },
            },
        },
        parameters: {
            Limit: { name: 'limit', in: 'query', required: false, schema: { type: 'integer', maximum: 100 } },
        },
        examples: {
            Cat: { summary: 'A cat', value: { id: 1, name: 'Tom' } },
        },
        requestBodies: {
            NewPet: {
                required: true,
                content: { 'application/json': { schema: { $ref: '#/components/schemas/NewPet' } } },
            },
        },
        headers: {
            RateLimit: { description: 'Calls per hour', schema: { type: 'integer' } },
        },
        securitySchemes: {
            petstore_auth: {
                type: 'oauth2',
                flows: {
                    implicit: {
                        authorizationUrl: 'https://example.com/oauth/authorize',
                        scopes: { 'write:pets': 'modify pets', 'read:pets': 'read pets' },
                    },
                },
            },
            api_key: { type: 'apiKey', name: 'api_key', in: 'header' },
        },
        links: {
            GetPetById: { operationId: 'showPetById', parameters: { petId: '$response.body#/id' } },
        },
        callbacks: {
            Adopted: {
                '{$request.body#/callbackUrl}': {
                    post: {
                        operationId: 'petAdopted',
                        requestBody: { content: { 'application/json': { schema: { $ref: '#/components/schemas/Pet' } } } },
                        responses: { '200': { description: 'Acknowledged' } },
                    },
                },
            },
        },
    },
    security: [{ api_key: [] }],
};

/** One webhook whose request body references the `Pet` schema. */
export const newPetWebhook31 = {
    openapi: '3.1.0',
    info: { title: 'Webhook Example', version: '1.0.0' },
    webhooks: {
        newPet: {
            post: {
                requestBody: {
                    description: 'Information about a new pet in the system',
                    content: { 'application/json': { schema: { $ref: '#/components/schemas/Pet' } } },
                },
                responses: {
                    '200': { description: 'Return a 200 status to indicate that the data was received successfully' },
                },
            },
        },
    },
    components: {
        schemas: {
            Pet: {
                required: ['id', 'name'],
                properties: {
                    id: { type: 'integer', format: 'int64' },
                    name: { type: 'string' },
                    tag: { type: 'string' },
                },
            },
        },
    },
};

/** OpenAPI 3.1 features: path item components, type arrays, mutualTLS, discriminator mappings. */
export const museum31 = {
    openapi: '3.1.0',
    info: { title: 'Museum', version: '1.0.0', license: { name: 'MIT', identifier: 'MIT' } },
    jsonSchemaDialect: 'https://spec.openapis.org/oas/3.1/dialect/base',
    tags: [{ name: 'events' }],
    paths: {
        '/events': { $ref: '#/components/pathItems/Events' },
    },
    webhooks: {
        eventCancelled: {
            post: {
                operationId: 'eventCancelled',
                tags: ['events'],
                requestBody: { content: { 'application/json': { schema: { $ref: '#/components/schemas/Event' } } } },
                responses: { '204': { description: 'Received' } },
            },
        },
    },
    components: {
        schemas: {
            Event: {
                oneOf: [{ $ref: '#/components/schemas/Lecture' }, { $ref: '#/components/schemas/Tour' }],
                discriminator: { propertyName: 'kind', mapping: { lecture: 'Lecture', tour: '#/components/schemas/Tour' } },
            },
            Lecture: {
                type: 'object',
                required: ['kind'],
                properties: { kind: { const: 'lecture' }, speaker: { type: ['string', 'null'] } },
            },
            Tour: {
                type: 'object',
                required: ['kind'],
                properties: { kind: { const: 'tour' }, stops: { type: 'array', items: { type: 'string' } } },
            },
        },
        pathItems: {
            Events: {
                get: {
                    operationId: 'listEvents',
                    tags: ['events'],
                    security: [{ mtls: [] }],
                    responses: {
                        '200': {
                            description: 'Events',
                            content: {
                                'application/json': { schema: { type: 'array', items: { $ref: '#/components/schemas/Event' } } },
                            },
                        },
                    },
                },
            },
        },
        securitySchemes: {
            mtls: { type: 'mutualTLS' },
        },
    },
};
