/**
 * Serialization Module
 *
 * Canonical payload encoding, the gzip envelope, and byte sink helpers.
 */

export { BinaryWriter } from './writer.js';
export { BinaryReader } from './reader.js';
export { serializeCircuit } from './encode.js';
export { deserializeCircuit, type DecodeOptions } from './decode.js';
export {
  compressPayload,
  decompressPayload,
  encodeCircuit,
  decodeCircuit,
  circuitToBase64,
  circuitFromBase64,
  ENVELOPE_COMPRESSION_LEVEL,
} from './envelope.js';
export { writeCircuit, writeCircuitFile, readCircuitFile } from './io.js';
