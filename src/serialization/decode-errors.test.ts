/**
 * Every format error the decoder can raise, with the offset it reports
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { BinaryWriter } from './writer.js';
import { deserializeCircuit } from './decode.js';
import { serializeCircuit } from './encode.js';
import { ErrorCode } from '../errors.js';
import { resetConfig } from '../config.js';
import { BN254_SCALAR_FIELD, BLS12_381_SCALAR_FIELD } from '../field/config.js';
import { catchCircuitIrError } from '../test-utils/errors.js';
import { additionCircuit } from '../test-utils/golden-circuits.js';

const ZERO_HEX = '0'.repeat(64);
const ONE_HEX = '0'.repeat(63) + '1';
const TWO_HEX = '0'.repeat(63) + '2';

/**
 * A circuit with currentWitnessIndex 1 and one opcode written by `writeOpcode`
 */
function singleOpcode(writeOpcode: (writer: BinaryWriter) => void): Uint8Array {
  const writer = new BinaryWriter();
  writer.writeUint32(1);
  writer.writeLength(1);
  writeOpcode(writer);
  writer.writeLength(0);
  writer.writeLength(0);
  writer.writeLength(0);
  return writer.finish();
}

function constantExpression(writer: BinaryWriter, hex: string): void {
  writer.writeLength(0);
  writer.writeLength(0);
  writer.writeString(hex);
}

/**
 * A Brillig opcode with no inputs, outputs or results, whose bytecode is a
 * single instruction written by `writeInstruction`. The instruction starts at
 * offset 48.
 */
function singleInstruction(writeInstruction: (writer: BinaryWriter) => void): Uint8Array {
  return singleOpcode((writer) => {
    writer.writeUint32(3);
    writer.writeLength(0);
    writer.writeLength(0);
    writer.writeLength(0);
    writer.writeLength(1);
    writeInstruction(writer);
    writer.writeUint8(0);
  });
}

describe('Decoding errors', () => {
  beforeEach(() => {
    resetConfig();
  });

  describe('TRUNCATED_INPUT', () => {
    it('should report an empty input', () => {
      const error = catchCircuitIrError(() => deserializeCircuit(new Uint8Array(0)));
      expect(error.code).toBe(ErrorCode.TRUNCATED_INPUT);
      expect(error.details).toEqual({ offset: 0, needed: 4, available: 0 });
    });

    it('should report input that ends in the middle of a witness', () => {
      const payload = serializeCircuit(additionCircuit());
      const error = catchCircuitIrError(() => deserializeCircuit(payload.subarray(0, payload.length - 1)));
      expect(error.code).toBe(ErrorCode.TRUNCATED_INPUT);
      expect(error.details).toEqual({ offset: payload.length - 4, needed: 4, available: 3 });
    });

    it('should report a length prefix larger than the remaining input', () => {
      const writer = new BinaryWriter();
      writer.writeUint32(1);
      writer.writeUint32(0xffffffff);
      writer.writeUint32(0xffffffff);
      const error = catchCircuitIrError(() => deserializeCircuit(writer.finish()));
      expect(error.code).toBe(ErrorCode.TRUNCATED_INPUT);
      expect(error.details?.['offset']).toBe(12);
      expect(error.details?.['available']).toBe(0);
    });

    it('should report every strict prefix of a valid payload', () => {
      const payload = serializeCircuit(additionCircuit());
      for (let length = 0; length < payload.length; length++) {
        expect(catchCircuitIrError(() => deserializeCircuit(payload.subarray(0, length))).code).toBe(
          ErrorCode.TRUNCATED_INPUT
        );
      }
    });
  });

  it('should reject bytes after the end of the circuit', () => {
    const payload = serializeCircuit(additionCircuit());
    const padded = new Uint8Array(payload.length + 1);
    padded.set(payload);
    const error = catchCircuitIrError(() => deserializeCircuit(padded));
    expect(error.code).toBe(ErrorCode.TRAILING_BYTES);
    expect(error.details).toEqual({ offset: payload.length, remaining: 1 });
  });

  it('should reject an unknown opcode tag', () => {
    const error = catchCircuitIrError(() => deserializeCircuit(singleOpcode((writer) => writer.writeUint32(6))));
    expect(error.code).toBe(ErrorCode.UNKNOWN_OPCODE_TAG);
    expect(error.details).toEqual({ tag: 6, offset: 12 });
  });

  it('should reject an unknown black box function', () => {
    const payload = singleOpcode((writer) => {
      writer.writeUint32(1);
      writer.writeUint32(14);
    });
    const error = catchCircuitIrError(() => deserializeCircuit(payload));
    expect(error.code).toBe(ErrorCode.UNKNOWN_BLACK_BOX_VARIANT);
    expect(error.details).toEqual({ tag: 14, offset: 16 });
  });

  it('should reject an unknown brillig instruction', () => {
    const error = catchCircuitIrError(() => deserializeCircuit(singleInstruction((writer) => writer.writeUint32(15))));
    expect(error.code).toBe(ErrorCode.UNKNOWN_BRILLIG_OPCODE_TAG);
    expect(error.details).toEqual({ tag: 15, offset: 48 });
  });

  describe('UNKNOWN_VARIANT_TAG', () => {
    it('should reject an unknown directive', () => {
      const payload = singleOpcode((writer) => {
        writer.writeUint32(2);
        writer.writeUint32(3);
      });
      const error = catchCircuitIrError(() => deserializeCircuit(payload));
      expect(error.code).toBe(ErrorCode.UNKNOWN_VARIANT_TAG);
      expect(error.details).toEqual({ type: 'Directive', tag: 3, offset: 16 });
    });

    it('should reject an unknown field operation', () => {
      const payload = singleInstruction((writer) => {
        writer.writeUint32(0);
        writer.writeUint64(0n);
        writer.writeUint32(5);
        writer.writeUint64(0n);
        writer.writeUint64(0n);
      });
      const error = catchCircuitIrError(() => deserializeCircuit(payload));
      expect(error.code).toBe(ErrorCode.UNKNOWN_VARIANT_TAG);
      expect(error.details).toEqual({ type: 'BinaryFieldOp', tag: 5, offset: 60 });
    });

    it('should reject an unknown register or memory descriptor', () => {
      const payload = singleInstruction((writer) => {
        writer.writeUint32(8);
        writer.writeString('f');
        writer.writeLength(1);
        writer.writeUint32(3);
      });
      const error = catchCircuitIrError(() => deserializeCircuit(payload));
      expect(error.code).toBe(ErrorCode.UNKNOWN_VARIANT_TAG);
      expect(error.details).toEqual({ type: 'RegisterOrMemory', tag: 3, offset: 69 });
    });
  });

  describe('NON_CANONICAL_FIELD_ELEMENT', () => {
    const arithmeticWithConstant = (hex: string) =>
      singleOpcode((writer) => {
        writer.writeUint32(0);
        constantExpression(writer, hex);
      });

    it('should reject the modulus', () => {
      const hex = BN254_SCALAR_FIELD.modulus.toString(16);
      const error = catchCircuitIrError(() => deserializeCircuit(arithmeticWithConstant(hex)));
      expect(error.code).toBe(ErrorCode.NON_CANONICAL_FIELD_ELEMENT);
      expect(error.details?.['value']).toBe(hex);
      expect(error.details?.['reason']).toBe('value exceeds modulus');
    });

    it('should reject uppercase digits', () => {
      const error = catchCircuitIrError(() => deserializeCircuit(arithmeticWithConstant('0'.repeat(63) + 'F')));
      expect(error.code).toBe(ErrorCode.NON_CANONICAL_FIELD_ELEMENT);
      expect(error.details?.['reason']).toBe('not lowercase hex');
    });

    it('should reject a short encoding', () => {
      const error = catchCircuitIrError(() => deserializeCircuit(arithmeticWithConstant('1')));
      expect(error.code).toBe(ErrorCode.NON_CANONICAL_FIELD_ELEMENT);
      expect(error.details?.['reason']).toBe('expected 64 hex characters, got 1');
    });

    it('should accept a value below the configured field modulus only', () => {
      const hex = BN254_SCALAR_FIELD.modulus.toString(16);
      const circuit = deserializeCircuit(arithmeticWithConstant(hex), { field: 'bls12_381' });
      const [opcode] = circuit.opcodes;
      expect(opcode?.type === 'Arithmetic' && opcode.expression.qC).toEqual({
        value: BN254_SCALAR_FIELD.modulus,
        field: BLS12_381_SCALAR_FIELD,
      });
    });
  });

  it('should reject an option flag other than 0 or 1', () => {
    const payload = singleOpcode((writer) => {
      writer.writeUint32(3);
      writer.writeLength(0);
      writer.writeLength(0);
      writer.writeLength(0);
      writer.writeLength(0);
      writer.writeUint8(2);
    });
    const error = catchCircuitIrError(() => deserializeCircuit(payload));
    expect(error.code).toBe(ErrorCode.INVALID_OPTION_TAG);
    expect(error.details).toEqual({ flag: 2, offset: 48 });
  });

  it('should reject a foreign call name that is not UTF-8', () => {
    const payload = singleInstruction((writer) => {
      writer.writeUint32(8);
      writer.writeLength(1);
      writer.writeBytes(new Uint8Array([0xff]));
      writer.writeLength(0);
      writer.writeLength(0);
    });
    const error = catchCircuitIrError(() => deserializeCircuit(payload));
    expect(error.code).toBe(ErrorCode.INVALID_UTF8);
    expect(error.details).toEqual({ offset: 60, length: 1 });
  });

  it('should decode a register index beyond the safe integer range', () => {
    const payload = singleInstruction((writer) => {
      writer.writeUint32(4);
      writer.writeUint64(2n ** 54n);
    });
    const circuit = deserializeCircuit(payload);
    const [opcode] = circuit.opcodes;
    expect(opcode?.type === 'Brillig' && opcode.brillig.bytecode).toEqual([{ type: 'Jump', location: 2n ** 54n }]);
  });

  describe('MALFORMED_MEMORY_OP', () => {
    const memoryOp = (writeOperation: (writer: BinaryWriter) => void, writeValue: (writer: BinaryWriter) => void) =>
      singleOpcode((writer) => {
        writer.writeUint32(4);
        writer.writeUint32(0);
        writeOperation(writer);
        constantExpression(writer, ZERO_HEX);
        writeValue(writer);
        writer.writeUint8(0);
      });

    const witnessExpression = (coefficientHex: string) => (writer: BinaryWriter) => {
      writer.writeLength(0);
      writer.writeLength(1);
      writer.writeString(coefficientHex);
      writer.writeUint32(0);
      writer.writeString(ZERO_HEX);
    };

    it('should reject an operation that is not a constant', () => {
      const payload = memoryOp(witnessExpression(ONE_HEX), witnessExpression(ONE_HEX));
      const error = catchCircuitIrError(() => deserializeCircuit(payload));
      expect(error.code).toBe(ErrorCode.MALFORMED_MEMORY_OP);
      expect(error.details).toEqual({ reason: 'operation is not a constant', offset: 20 });
    });

    it('should reject an operation other than read or write', () => {
      const payload = memoryOp((writer) => constantExpression(writer, TWO_HEX), witnessExpression(ONE_HEX));
      const error = catchCircuitIrError(() => deserializeCircuit(payload));
      expect(error.code).toBe(ErrorCode.MALFORMED_MEMORY_OP);
      expect(error.details).toEqual({ reason: 'unknown operation 2', offset: 20 });
    });

    it('should reject a read whose destination is not a single witness', () => {
      const payload = memoryOp((writer) => constantExpression(writer, ZERO_HEX), witnessExpression(TWO_HEX));
      const error = catchCircuitIrError(() => deserializeCircuit(payload));
      expect(error.code).toBe(ErrorCode.MALFORMED_MEMORY_OP);
      expect(error.details).toEqual({ reason: 'read destination is not a single witness', offset: 20 });
    });
  });
});
