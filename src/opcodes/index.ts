/**
 * Opcodes Module
 *
 * The top-level opcode union and the payloads it carries: black-box calls,
 * memory operations and directives.
 */

export * from './black-box.js';
export * from './memory.js';
export * from './directives.js';
export * from './opcode.js';
