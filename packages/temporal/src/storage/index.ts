/**
 * Storage Module
 *
 * Persistence layer for temporal facts and relations.
 */

export * from './interface.js';
export * from './factory.js';
export * from './sqlite/client.js';
export * from './sqlite/storage.js';
