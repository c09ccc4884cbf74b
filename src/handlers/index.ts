export * from './types.js';
export * from './filter.js';
export * from './redirect.js';
export * from './uri-filter.js';
