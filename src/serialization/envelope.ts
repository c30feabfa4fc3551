/**
 * Compression Envelope
 *
 * Circuits travel gzip-compressed. The header is pinned so that output is a
 * pure function of the circuit: modification time 0 and the OS byte set to
 * 255 ("unknown") regardless of the host. Decompression accepts any
 * conforming gzip producer.
 */

import zlib from 'node:zlib';
import type { Circuit } from '../circuit/circuit.js';
import { isDebugEnabled } from '../config.js';
import { invalidConfigError, malformedCompressionEnvelopeError } from '../errors.js';
import { serializeCircuit } from './encode.js';
import { deserializeCircuit, type DecodeOptions } from './decode.js';

/** gzip magic bytes followed by the deflate method id */
const GZIP_MAGIC = [0x1f, 0x8b, 0x08] as const;
const GZIP_HEADER_SIZE = 10;
const GZIP_OS_OFFSET = 9;
const GZIP_OS_UNKNOWN = 0xff;

/** Level every circuit envelope is written with; it also fixes the XFL header byte */
export const ENVELOPE_COMPRESSION_LEVEL = 6;

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Debug logging utility
 */
function debugLog(message: string, data?: Record<string, unknown>): void {
  if (isDebugEnabled()) {
    const timestamp = new Date().toISOString();
    const prefix = `[${timestamp}] [circuit-ir:envelope]`;
    if (data) {
      console.debug(`${prefix} ${message}`, data);
    } else {
      console.debug(`${prefix} ${message}`);
    }
  }
}

/**
 * Compress a payload into the deterministic gzip envelope
 *
 * @param payload - Uncompressed bytes
 * @param level - gzip level 0-9. Only the default produces circuit envelopes
 *   that match other encoders.
 */
export function compressPayload(payload: Uint8Array, level = ENVELOPE_COMPRESSION_LEVEL): Uint8Array {
  if (!Number.isInteger(level) || level < 0 || level > 9) {
    throw invalidConfigError('level', level, [0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
  }

  // zlib already writes mtime 0; only the OS byte depends on the host
  const compressed = new Uint8Array(zlib.gzipSync(payload, { level }));
  compressed[GZIP_OS_OFFSET] = GZIP_OS_UNKNOWN;

  debugLog('Compressed payload', { payloadBytes: payload.length, compressedBytes: compressed.length, level });
  return compressed;
}

/**
 * Decompress a gzip envelope
 *
 * @throws CircuitIrError MALFORMED_COMPRESSION_ENVELOPE for a bad header, a
 *   corrupt deflate body or a checksum mismatch
 */
export function decompressPayload(envelope: Uint8Array): Uint8Array {
  if (envelope.length < GZIP_HEADER_SIZE) {
    throw malformedCompressionEnvelopeError(`expected at least ${GZIP_HEADER_SIZE} bytes, got ${envelope.length}`);
  }
  if (GZIP_MAGIC.some((byte, i) => envelope[i] !== byte)) {
    throw malformedCompressionEnvelopeError('missing gzip header');
  }

  let payload: Uint8Array;
  try {
    payload = new Uint8Array(zlib.gunzipSync(envelope));
  } catch (error) {
    throw malformedCompressionEnvelopeError('corrupt gzip stream', error);
  }

  debugLog('Decompressed payload', { compressedBytes: envelope.length, payloadBytes: payload.length });
  return payload;
}

/**
 * Serialize and compress a circuit
 */
export function encodeCircuit(circuit: Circuit): Uint8Array {
  return compressPayload(serializeCircuit(circuit), ENVELOPE_COMPRESSION_LEVEL);
}

/**
 * Decompress and deserialize a circuit
 *
 * @example
 * ```typescript
 * const circuit = decodeCircuit(await readFile('main.circuit'));
 * ```
 */
export function decodeCircuit(envelope: Uint8Array, options?: DecodeOptions): Circuit {
  return deserializeCircuit(decompressPayload(envelope), options);
}

/**
 * Encode a circuit as standard base64 text
 */
export function circuitToBase64(circuit: Circuit): string {
  return Buffer.from(encodeCircuit(circuit)).toString('base64');
}

/**
 * Decode a circuit from standard base64 text; surrounding whitespace is ignored
 */
export function circuitFromBase64(text: string, options?: DecodeOptions): Circuit {
  const trimmed = text.trim();
  if (trimmed.length % 4 !== 0 || !BASE64_PATTERN.test(trimmed)) {
    throw malformedCompressionEnvelopeError('input is not standard base64');
  }
  return decodeCircuit(new Uint8Array(Buffer.from(trimmed, 'base64')), options);
}
