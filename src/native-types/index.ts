/**
 * Native Types Module
 *
 * Witnesses, canonically ordered witness sets and expressions: the values
 * every opcode is built from.
 */

export * from './witness.js';
export * from './expression.js';
