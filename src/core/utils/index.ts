export * from './string.js';
export * from './json-pointer.js';
export * from './path-template.js';
export * from './freeze.js';
export * from './object.js';
