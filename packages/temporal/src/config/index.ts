/**
 * Configuration module
 */

export * from './types.js';
export * from './defaults.js';
export * from './config-loader.js';
