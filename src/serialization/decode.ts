/**
 * Circuit Decoder
 *
 * Reads a canonical payload back into a circuit. The format is closed:
 * every discriminant must be known, every field element canonical and every
 * byte consumed. Any violation throws a CircuitIrError and no partial
 * circuit is returned.
 */

import type { FieldConfig, FieldName } from '../types.js';
import type { Expression, LinearTerm, MulTerm } from '../native-types/expression.js';
import type { Witness } from '../native-types/witness.js';
import type { Circuit } from '../circuit/circuit.js';
import type { Opcode } from '../opcodes/opcode.js';
import type { BlackBoxFuncCall, FunctionInput } from '../opcodes/black-box.js';
import type { Directive } from '../opcodes/directives.js';
import type { MemOp } from '../opcodes/memory.js';
import type { Brillig, BrilligInputs, BrilligOutputs } from '../brillig/program.js';
import type {
  BlackBoxOp,
  BrilligOpcode,
  ForeignCallOutput,
  ForeignCallResult,
  HeapArray,
  HeapVector,
  RegisterOrMemory,
} from '../brillig/types.js';
import { BINARY_FIELD_OPS, BINARY_INT_OPS } from '../brillig/types.js';
import { MEM_OP_CODES, readAtMemIndex, writeToMemIndex } from '../opcodes/memory.js';
import { createCircuit } from '../circuit/circuit.js';
import { expressionToConstant, expressionToWitness } from '../native-types/expression.js';
import { getFieldConfig } from '../field/config.js';
import { getConfig, isDebugEnabled } from '../config.js';
import {
  malformedMemoryOpError,
  unknownBlackBoxVariantError,
  unknownBrilligOpcodeTagError,
  unknownOpcodeTagError,
  unknownVariantTagError,
} from '../errors.js';
import { validateCircuit, type ValidationOptions } from '../validation.js';
import { BinaryReader } from './reader.js';

/**
 * Per-call decoding options; unset options fall back to `getConfig()`
 */
export interface DecodeOptions extends Partial<ValidationOptions> {
  /** Field the decoded elements belong to */
  field?: FieldName;
}

interface ResolvedDecodeOptions extends ValidationOptions {
  field: FieldConfig;
}

/**
 * Debug logging utility
 */
function debugLog(message: string, data?: Record<string, unknown>): void {
  if (isDebugEnabled()) {
    const timestamp = new Date().toISOString();
    const prefix = `[${timestamp}] [circuit-ir:decode]`;
    if (data) {
      console.debug(`${prefix} ${message}`, data);
    } else {
      console.debug(`${prefix} ${message}`);
    }
  }
}

function resolveDecodeOptions(options: DecodeOptions): ResolvedDecodeOptions {
  const config = getConfig();
  return {
    field: getFieldConfig(options.field ?? config.field),
    validateWitnessBounds: options.validateWitnessBounds ?? config.validateWitnessBounds,
    validateMemoryBlocks: options.validateMemoryBlocks ?? config.validateMemoryBlocks,
    validateExpressions: options.validateExpressions ?? config.validateExpressions,
  };
}

/**
 * Decoder state: the reader plus the field elements are decoded into
 */
class CircuitDecoder {
  constructor(
    private readonly reader: BinaryReader,
    private readonly field: FieldConfig
  ) {}

  /**
   * Read a u32 discriminant, returning it with the offset it started at
   */
  private readTag(): { tag: number; offset: number } {
    const offset = this.reader.position;
    return { tag: this.reader.readUint32(), offset };
  }

  readWitness(): Witness {
    return this.reader.readUint32();
  }

  readWitnesses(): Witness[] {
    return this.reader.readVec(() => this.readWitness());
  }

  readExpression(): Expression {
    const mulTerms = this.reader.readVec((): MulTerm => {
      const coefficient = this.reader.readFieldElement(this.field);
      const wA = this.readWitness();
      const wB = this.readWitness();
      return [coefficient, wA, wB];
    });
    const linearCombinations = this.reader.readVec((): LinearTerm => {
      const coefficient = this.reader.readFieldElement(this.field);
      return [coefficient, this.readWitness()];
    });
    const qC = this.reader.readFieldElement(this.field);
    return { mulTerms, linearCombinations, qC };
  }

  private readExpressions(): Expression[] {
    return this.reader.readVec(() => this.readExpression());
  }

  private readFunctionInput(): FunctionInput {
    const witness = this.readWitness();
    return { witness, numBits: this.reader.readUint32() };
  }

  private readFunctionInputs(): FunctionInput[] {
    return this.reader.readVec(() => this.readFunctionInput());
  }

  private readWitnessPair(): readonly [Witness, Witness] {
    const first = this.readWitness();
    return [first, this.readWitness()];
  }

  readBlackBoxFuncCall(): BlackBoxFuncCall {
    const { tag, offset } = this.readTag();
    switch (tag) {
      case 0:
      case 1: {
        const lhs = this.readFunctionInput();
        const rhs = this.readFunctionInput();
        return { name: tag === 0 ? 'AND' : 'XOR', lhs, rhs, output: this.readWitness() };
      }
      case 2:
        return { name: 'RANGE', input: this.readFunctionInput() };
      case 3:
      case 4:
      case 11: {
        const inputs = this.readFunctionInputs();
        const outputs = this.readWitnesses();
        const name = tag === 3 ? 'SHA256' : tag === 4 ? 'Blake2s' : 'Keccak256';
        return { name, inputs, outputs };
      }
      case 5: {
        const publicKeyX = this.readFunctionInput();
        const publicKeyY = this.readFunctionInput();
        const signature = this.readFunctionInputs();
        const message = this.readFunctionInputs();
        return { name: 'SchnorrVerify', publicKeyX, publicKeyY, signature, message, output: this.readWitness() };
      }
      case 6: {
        const inputs = this.readFunctionInputs();
        const domainSeparator = this.reader.readUint32();
        return { name: 'Pedersen', inputs, domainSeparator, outputs: this.readWitnessPair() };
      }
      case 7: {
        const inputs = this.readFunctionInputs();
        return { name: 'HashToField128Security', inputs, output: this.readWitness() };
      }
      case 8:
      case 9: {
        const publicKeyX = this.readFunctionInputs();
        const publicKeyY = this.readFunctionInputs();
        const signature = this.readFunctionInputs();
        const hashedMessage = this.readFunctionInputs();
        return {
          name: tag === 8 ? 'EcdsaSecp256k1' : 'EcdsaSecp256r1',
          publicKeyX,
          publicKeyY,
          signature,
          hashedMessage,
          output: this.readWitness(),
        };
      }
      case 10: {
        const low = this.readFunctionInput();
        const high = this.readFunctionInput();
        return { name: 'FixedBaseScalarMul', low, high, outputs: this.readWitnessPair() };
      }
      case 12: {
        const inputs = this.readFunctionInputs();
        const varMessageSize = this.readFunctionInput();
        return { name: 'Keccak256VariableLength', inputs, varMessageSize, outputs: this.readWitnesses() };
      }
      case 13: {
        const verificationKey = this.readFunctionInputs();
        const proof = this.readFunctionInputs();
        const publicInputs = this.readFunctionInputs();
        const keyHash = this.readFunctionInput();
        const inputAggregationObject = this.reader.readOption(() => this.readFunctionInputs());
        const outputAggregationObject = this.readWitnesses();
        return {
          name: 'RecursiveAggregation',
          verificationKey,
          proof,
          publicInputs,
          keyHash,
          ...(inputAggregationObject !== undefined ? { inputAggregationObject } : {}),
          outputAggregationObject,
        };
      }
      default:
        throw unknownBlackBoxVariantError(tag, offset);
    }
  }

  private readDirective(): Directive {
    const { tag, offset } = this.readTag();
    switch (tag) {
      case 0: {
        const a = this.readExpression();
        const b = this.readExpression();
        const q = this.readWitness();
        const r = this.readWitness();
        const predicate = this.reader.readOption(() => this.readExpression());
        return { type: 'Quotient', a, b, q, r, ...(predicate !== undefined ? { predicate } : {}) };
      }
      case 1: {
        const a = this.readExpression();
        const b = this.readWitnesses();
        return { type: 'ToLeRadix', a, b, radix: this.reader.readUint32() };
      }
      case 2: {
        const inputs = this.reader.readVec(() => this.readExpressions());
        const tuple = this.reader.readUint32();
        const bits = this.readWitnesses();
        const sortBy = this.reader.readVec(() => this.reader.readUint32());
        return { type: 'PermutationSort', inputs, tuple, bits, sortBy };
      }
      default:
        throw unknownVariantTagError('Directive', tag, offset);
    }
  }

  private readHeapArray(): HeapArray {
    const pointer = this.reader.readUint64();
    return { pointer, size: this.reader.readUint64() };
  }

  private readHeapVector(): HeapVector {
    const pointer = this.reader.readUint64();
    return { pointer, size: this.reader.readUint64() };
  }

  private readRegisterOrMemory(): RegisterOrMemory {
    const { tag, offset } = this.readTag();
    switch (tag) {
      case 0:
        return { type: 'RegisterIndex', index: this.reader.readUint64() };
      case 1:
        return { type: 'HeapArray', ...this.readHeapArray() };
      case 2:
        return { type: 'HeapVector', ...this.readHeapVector() };
      default:
        throw unknownVariantTagError('RegisterOrMemory', tag, offset);
    }
  }

  private readBlackBoxOp(): BlackBoxOp {
    const { tag, offset } = this.readTag();
    switch (tag) {
      case 0:
      case 1:
      case 2: {
        const message = this.readHeapVector();
        const type = tag === 0 ? 'Sha256' : tag === 1 ? 'Blake2s' : 'Keccak256';
        return { type, message, output: this.readHeapArray() };
      }
      case 3: {
        const message = this.readHeapVector();
        return { type: 'HashToField128Security', message, output: this.reader.readUint64() };
      }
      case 4:
      case 5: {
        const hashedMsg = this.readHeapVector();
        const publicKeyX = this.readHeapArray();
        const publicKeyY = this.readHeapArray();
        const signature = this.readHeapArray();
        return {
          type: tag === 4 ? 'EcdsaSecp256k1' : 'EcdsaSecp256r1',
          hashedMsg,
          publicKeyX,
          publicKeyY,
          signature,
          result: this.reader.readUint64(),
        };
      }
      case 6: {
        const publicKeyX = this.reader.readUint64();
        const publicKeyY = this.reader.readUint64();
        const message = this.readHeapVector();
        const signature = this.readHeapVector();
        return { type: 'SchnorrVerify', publicKeyX, publicKeyY, message, signature, result: this.reader.readUint64() };
      }
      case 7: {
        const inputs = this.readHeapVector();
        const domainSeparator = this.reader.readUint64();
        return { type: 'Pedersen', inputs, domainSeparator, output: this.readHeapArray() };
      }
      case 8: {
        const low = this.reader.readUint64();
        const high = this.reader.readUint64();
        return { type: 'FixedBaseScalarMul', low, high, result: this.readHeapArray() };
      }
      default:
        throw unknownVariantTagError('BlackBoxOp', tag, offset);
    }
  }

  readBrilligOpcode(): BrilligOpcode {
    const { tag, offset } = this.readTag();
    switch (tag) {
      case 0: {
        const destination = this.reader.readUint64();
        const opOffset = this.reader.position;
        const opTag = this.reader.readUint32();
        const op = BINARY_FIELD_OPS[opTag];
        if (op === undefined) {
          throw unknownVariantTagError('BinaryFieldOp', opTag, opOffset);
        }
        const lhs = this.reader.readUint64();
        return { type: 'BinaryFieldOp', destination, op, lhs, rhs: this.reader.readUint64() };
      }
      case 1: {
        const destination = this.reader.readUint64();
        const opOffset = this.reader.position;
        const opTag = this.reader.readUint32();
        const op = BINARY_INT_OPS[opTag];
        if (op === undefined) {
          throw unknownVariantTagError('BinaryIntOp', opTag, opOffset);
        }
        const bitSize = this.reader.readUint32();
        const lhs = this.reader.readUint64();
        return { type: 'BinaryIntOp', destination, op, bitSize, lhs, rhs: this.reader.readUint64() };
      }
      case 2:
      case 3: {
        const condition = this.reader.readUint64();
        const location = this.reader.readUint64();
        return { type: tag === 2 ? 'JumpIfNot' : 'JumpIf', condition, location };
      }
      case 4:
        return { type: 'Jump', location: this.reader.readUint64() };
      case 5:
        return { type: 'Call', location: this.reader.readUint64() };
      case 6: {
        const destination = this.reader.readUint64();
        return { type: 'Const', destination, value: this.reader.readFieldElement(this.field) };
      }
      case 7:
        return { type: 'Return' };
      case 8: {
        const name = this.reader.readString();
        const destinations = this.reader.readVec(() => this.readRegisterOrMemory());
        const inputs = this.reader.readVec(() => this.readRegisterOrMemory());
        return { type: 'ForeignCall', function: name, destinations, inputs };
      }
      case 9: {
        const destination = this.reader.readUint64();
        return { type: 'Mov', destination, source: this.reader.readUint64() };
      }
      case 10: {
        const destination = this.reader.readUint64();
        return { type: 'Load', destination, sourcePointer: this.reader.readUint64() };
      }
      case 11: {
        const destinationPointer = this.reader.readUint64();
        return { type: 'Store', destinationPointer, source: this.reader.readUint64() };
      }
      case 12:
        return { type: 'BlackBox', op: this.readBlackBoxOp() };
      case 13:
        return { type: 'Trap' };
      case 14:
        return { type: 'Stop' };
      default:
        throw unknownBrilligOpcodeTagError(tag, offset);
    }
  }

  private readForeignCallOutput(): ForeignCallOutput {
    const { tag, offset } = this.readTag();
    switch (tag) {
      case 0:
        return { type: 'Single', value: this.reader.readFieldElement(this.field) };
      case 1:
        return { type: 'Array', values: this.reader.readVec(() => this.reader.readFieldElement(this.field)) };
      default:
        throw unknownVariantTagError('ForeignCallOutput', tag, offset);
    }
  }

  private readForeignCallResult(): ForeignCallResult {
    return { values: this.reader.readVec(() => this.readForeignCallOutput()) };
  }

  private readBrilligInputs(): BrilligInputs {
    const { tag, offset } = this.readTag();
    switch (tag) {
      case 0:
        return { type: 'Single', expression: this.readExpression() };
      case 1:
        return { type: 'Array', expressions: this.readExpressions() };
      default:
        throw unknownVariantTagError('BrilligInputs', tag, offset);
    }
  }

  private readBrilligOutputs(): BrilligOutputs {
    const { tag, offset } = this.readTag();
    switch (tag) {
      case 0:
        return { type: 'Simple', witness: this.readWitness() };
      case 1:
        return { type: 'Array', witnesses: this.readWitnesses() };
      default:
        throw unknownVariantTagError('BrilligOutputs', tag, offset);
    }
  }

  readBrillig(): Brillig {
    const inputs = this.reader.readVec(() => this.readBrilligInputs());
    const outputs = this.reader.readVec(() => this.readBrilligOutputs());
    const foreignCallResults = this.reader.readVec(() => this.readForeignCallResult());
    const bytecode = this.reader.readVec(() => this.readBrilligOpcode());
    const predicate = this.reader.readOption(() => this.readExpression());
    return {
      inputs,
      outputs,
      foreignCallResults,
      bytecode,
      ...(predicate !== undefined ? { predicate } : {}),
    };
  }

  /**
   * Read the three-expression wire form and recover a read or a write
   */
  private readMemOp(): MemOp {
    const offset = this.reader.position;
    const operation = this.readExpression();
    const index = this.readExpression();
    const value = this.readExpression();

    const code = expressionToConstant(operation);
    if (code === undefined) {
      throw malformedMemoryOpError('operation is not a constant', offset);
    }
    if (code.value === MEM_OP_CODES.write) {
      return writeToMemIndex(index, value);
    }
    if (code.value === MEM_OP_CODES.read) {
      const destination = expressionToWitness(value);
      if (destination === undefined) {
        throw malformedMemoryOpError('read destination is not a single witness', offset);
      }
      return readAtMemIndex(index, destination);
    }
    throw malformedMemoryOpError(`unknown operation ${code.value}`, offset);
  }

  readOpcode(): Opcode {
    const { tag, offset } = this.readTag();
    switch (tag) {
      case 0:
        return { type: 'Arithmetic', expression: this.readExpression() };
      case 1:
        return { type: 'BlackBoxFuncCall', call: this.readBlackBoxFuncCall() };
      case 2:
        return { type: 'Directive', directive: this.readDirective() };
      case 3:
        return { type: 'Brillig', brillig: this.readBrillig() };
      case 4: {
        const blockId = this.reader.readUint32();
        const op = this.readMemOp();
        const predicate = this.reader.readOption(() => this.readExpression());
        return { type: 'MemoryOp', blockId, op, ...(predicate !== undefined ? { predicate } : {}) };
      }
      case 5: {
        const blockId = this.reader.readUint32();
        return { type: 'MemoryInit', blockId, init: this.readWitnesses() };
      }
      default:
        throw unknownOpcodeTagError(tag, offset);
    }
  }

  readCircuit(): Circuit {
    const currentWitnessIndex = this.readWitness();
    const opcodes = this.reader.readVec(() => this.readOpcode());
    const privateParameters = this.readWitnesses();
    const publicParameters = this.readWitnesses();
    const returnValues = this.readWitnesses();
    return createCircuit({ currentWitnessIndex, opcodes, privateParameters, publicParameters, returnValues });
  }
}

/**
 * Deserialize a circuit from its uncompressed payload
 *
 * @param bytes - Canonical payload, as produced by `serializeCircuit`
 * @param options - Field and structural checks; defaults come from `getConfig()`
 * @returns The decoded circuit
 * @throws CircuitIrError on any format violation, trailing bytes, or a
 *   failed structural check
 *
 * @example
 * ```typescript
 * const circuit = deserializeCircuit(payload, { validateWitnessBounds: true });
 * ```
 */
export function deserializeCircuit(bytes: Uint8Array, options: DecodeOptions = {}): Circuit {
  const resolved = resolveDecodeOptions(options);
  const reader = new BinaryReader(bytes);
  const circuit = new CircuitDecoder(reader, resolved.field).readCircuit();
  reader.expectEnd();

  validateCircuit(circuit, resolved);

  debugLog('Decoded circuit', {
    bytes: bytes.length,
    opcodes: circuit.opcodes.length,
    currentWitnessIndex: circuit.currentWitnessIndex,
  });
  return circuit;
}
