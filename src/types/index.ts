export * from './config.js';
export * from './generation.js';
export * from './errors.js';
export * from './record.js';
