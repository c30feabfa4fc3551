/**
 * Circuit Module
 */

export * from './circuit.js';
