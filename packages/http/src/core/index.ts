// Functional core exports
// Pure functions for HTTP request handling

export * from './http-utils.js';
export * from './types.js';
