/**
 * Version model.
 */

export * from './ParsedVersion.js';
