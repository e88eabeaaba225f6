export const info = { title: 'Test API', version: '1.0.0' };

/** The smallest document each dialect accepts. */
export const emptySwagger = { swagger: '2.0', info, paths: {} };
export const emptySpec30 = { openapi: '3.0.3', info, paths: {} };
export const emptySpec31 = { openapi: '3.1.0', info, paths: {} };

export const okResponse = { description: 'ok' };
