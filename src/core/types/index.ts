export * from './json.js';
export * from './schema.js';
export * from './document.js';
export * from './issues.js';
export * from './config.js';
