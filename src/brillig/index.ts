/**
 * Brillig Module
 *
 * Instruction set, program container and foreign call state of the embedded
 * register machine.
 */

export * from './types.js';
export * from './program.js';
export * from './foreign-call.js';
