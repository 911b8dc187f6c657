/**
 * Entity model module
 */

export * from './types.js';
export * from './entities.js';
