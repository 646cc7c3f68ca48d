export * from './types.js';
export * from './feed.js';
export * from './errors.js';
export * from './logger.js';
