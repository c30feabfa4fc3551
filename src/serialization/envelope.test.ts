import { describe, it, expect, beforeEach } from 'vitest';
import zlib from 'node:zlib';
import {
  compressPayload,
  decompressPayload,
  encodeCircuit,
  decodeCircuit,
  circuitToBase64,
  circuitFromBase64,
  ENVELOPE_COMPRESSION_LEVEL,
} from './envelope.js';
import { serializeCircuit } from './encode.js';
import { configure, resetConfig } from '../config.js';
import { ErrorCode } from '../errors.js';
import { catchCircuitIrError } from '../test-utils/errors.js';
import { additionCircuit, memoryOpCircuit } from '../test-utils/golden-circuits.js';

const payload = new TextEncoder().encode('circuit payload circuit payload');

describe('Compression envelope', () => {
  beforeEach(() => {
    resetConfig();
  });

  describe('compressPayload', () => {
    it('should write mtime 0 and OS 255 at the default level', () => {
      expect([...compressPayload(payload).subarray(0, 10)]).toEqual([
        0x1f, 0x8b, 0x08, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0xff,
      ]);
    });

    it('should keep the OS byte fixed at other levels', () => {
      const compressed = compressPayload(payload, 9);
      expect(compressed[8]).toBe(0x02);
      expect(compressed[9]).toBe(0xff);
    });

    it('should not let configuration change the bytes of a circuit', () => {
      const reference = encodeCircuit(additionCircuit());
      const base64 = circuitToBase64(additionCircuit());

      configure({ field: 'bls12_381', validateWitnessBounds: true, validateExpressions: true });
      const configured = encodeCircuit(additionCircuit());

      expect(configured).toEqual(reference);
      expect([...configured.subarray(0, 10)]).toEqual([
        0x1f, 0x8b, 0x08, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0xff,
      ]);
      expect(circuitToBase64(additionCircuit())).toBe(base64);
      expect(reference).toEqual(compressPayload(serializeCircuit(additionCircuit()), ENVELOPE_COMPRESSION_LEVEL));
    });

    it('should reject a level outside 0-9', () => {
      const error = catchCircuitIrError(() => compressPayload(payload, 10));
      expect(error.code).toBe(ErrorCode.INVALID_CONFIG);
      expect(error.details?.['option']).toBe('level');
    });

    it.each([-1, 2.5, Number.NaN])('should reject level %s', (level) => {
      expect(catchCircuitIrError(() => compressPayload(payload, level)).code).toBe(ErrorCode.INVALID_CONFIG);
    });

    it('should round-trip through decompressPayload', () => {
      expect(decompressPayload(compressPayload(payload))).toEqual(payload);
    });
  });

  describe('decompressPayload', () => {
    it('should accept gzip streams from any producer', () => {
      const foreign = new Uint8Array(zlib.gzipSync(payload, { level: 1 }));
      expect(decompressPayload(foreign)).toEqual(payload);
    });

    it('should reject input shorter than a gzip header', () => {
      const error = catchCircuitIrError(() => decompressPayload(new Uint8Array([0x1f, 0x8b])));
      expect(error.code).toBe(ErrorCode.MALFORMED_COMPRESSION_ENVELOPE);
      expect(error.details).toEqual({ reason: 'expected at least 10 bytes, got 2' });
    });

    it('should reject a missing gzip magic', () => {
      const error = catchCircuitIrError(() => decompressPayload(serializeCircuit(additionCircuit())));
      expect(error.code).toBe(ErrorCode.MALFORMED_COMPRESSION_ENVELOPE);
      expect(error.details).toEqual({ reason: 'missing gzip header' });
    });

    it('should reject a checksum mismatch and keep the cause', () => {
      const corrupted = compressPayload(payload);
      const crcOffset = corrupted.length - 8;
      corrupted[crcOffset] = (corrupted[crcOffset] ?? 0) ^ 0xff;

      const error = catchCircuitIrError(() => decompressPayload(corrupted));
      expect(error.code).toBe(ErrorCode.MALFORMED_COMPRESSION_ENVELOPE);
      expect(error.details).toEqual({ reason: 'corrupt gzip stream' });
      expect(error.cause).toBeInstanceOf(Error);
    });

    it('should reject a truncated stream', () => {
      const compressed = compressPayload(payload);
      const error = catchCircuitIrError(() => decompressPayload(compressed.subarray(0, compressed.length - 4)));
      expect(error.code).toBe(ErrorCode.MALFORMED_COMPRESSION_ENVELOPE);
    });
  });

  describe('circuit helpers', () => {
    it('should decode what encodeCircuit wrote', () => {
      const circuit = memoryOpCircuit();
      expect(decodeCircuit(encodeCircuit(circuit))).toEqual(circuit);
    });

    it('should produce standard base64', () => {
      const text = circuitToBase64(additionCircuit());
      expect(text.startsWith('H4sIAAAAAAAA/')).toBe(true);
      expect(circuitFromBase64(`  ${text}\n`)).toEqual(additionCircuit());
    });

    it('should reject text that is not base64', () => {
      const error = catchCircuitIrError(() => circuitFromBase64('not base64!'));
      expect(error.code).toBe(ErrorCode.MALFORMED_COMPRESSION_ENVELOPE);
      expect(error.details).toEqual({ reason: 'input is not standard base64' });
    });
  });
});
