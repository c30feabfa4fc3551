/**
 * Finite Field Module
 *
 * Field configurations, element construction, the few arithmetic operations
 * expression canonicalization needs, and the canonical field codec.
 */

export * from './config.js';
export * from './element.js';
export * from './operations.js';
export * from './serialization.js';
