/**
 * Type exports
 */

export * from './temporal.js';
export * from './entity.js';
