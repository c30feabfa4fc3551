/**
 * Circuit Encoder
 *
 * Writes a circuit as its canonical payload. Every union is written as a u32
 * discriminant from its `*_TAGS` table followed by the variant's fields in
 * declaration order. Encoding is total over well-formed values; the only
 * failure is an integer that does not fit its wire width.
 */

import type { Expression } from '../native-types/expression.js';
import type { Witness } from '../native-types/witness.js';
import type { Circuit } from '../circuit/circuit.js';
import type { Opcode } from '../opcodes/opcode.js';
import { OPCODE_TAGS } from '../opcodes/opcode.js';
import { BLACK_BOX_FUNC_TAGS, type BlackBoxFuncCall, type FunctionInput } from '../opcodes/black-box.js';
import { DIRECTIVE_TAGS, type Directive } from '../opcodes/directives.js';
import { MEM_OP_CODES, type MemOp } from '../opcodes/memory.js';
import { BRILLIG_INPUTS_TAGS, BRILLIG_OUTPUTS_TAGS, type Brillig } from '../brillig/program.js';
import {
  BINARY_FIELD_OPS,
  BINARY_INT_OPS,
  BLACK_BOX_OP_TAGS,
  BRILLIG_OPCODE_TAGS,
  FOREIGN_CALL_OUTPUT_TAGS,
  REGISTER_OR_MEMORY_TAGS,
  type BlackBoxOp,
  type BrilligOpcode,
  type ForeignCallResult,
  type HeapArray,
  type HeapVector,
  type RegisterOrMemory,
} from '../brillig/types.js';
import { createFieldElement } from '../field/element.js';
import { expressionFromConstant, expressionFromWitness } from '../native-types/expression.js';
import { BinaryWriter } from './writer.js';

export function writeWitness(writer: BinaryWriter, witness: Witness): void {
  writer.writeUint32(witness);
}

export function writeExpression(writer: BinaryWriter, expression: Expression): void {
  writer.writeVec(expression.mulTerms, ([coefficient, wA, wB]) => {
    writer.writeFieldElement(coefficient);
    writeWitness(writer, wA);
    writeWitness(writer, wB);
  });
  writer.writeVec(expression.linearCombinations, ([coefficient, witness]) => {
    writer.writeFieldElement(coefficient);
    writeWitness(writer, witness);
  });
  writer.writeFieldElement(expression.qC);
}

function writeFunctionInput(writer: BinaryWriter, input: FunctionInput): void {
  writeWitness(writer, input.witness);
  writer.writeUint32(input.numBits);
}

function writeFunctionInputs(writer: BinaryWriter, inputs: readonly FunctionInput[]): void {
  writer.writeVec(inputs, (input) => writeFunctionInput(writer, input));
}

function writeWitnesses(writer: BinaryWriter, witnesses: readonly Witness[]): void {
  writer.writeVec(witnesses, (witness) => writeWitness(writer, witness));
}

export function writeBlackBoxFuncCall(writer: BinaryWriter, call: BlackBoxFuncCall): void {
  writer.writeUint32(BLACK_BOX_FUNC_TAGS[call.name]);
  switch (call.name) {
    case 'AND':
    case 'XOR':
      writeFunctionInput(writer, call.lhs);
      writeFunctionInput(writer, call.rhs);
      writeWitness(writer, call.output);
      break;
    case 'RANGE':
      writeFunctionInput(writer, call.input);
      break;
    case 'SHA256':
    case 'Blake2s':
    case 'Keccak256':
      writeFunctionInputs(writer, call.inputs);
      writeWitnesses(writer, call.outputs);
      break;
    case 'SchnorrVerify':
      writeFunctionInput(writer, call.publicKeyX);
      writeFunctionInput(writer, call.publicKeyY);
      writeFunctionInputs(writer, call.signature);
      writeFunctionInputs(writer, call.message);
      writeWitness(writer, call.output);
      break;
    case 'Pedersen':
      writeFunctionInputs(writer, call.inputs);
      writer.writeUint32(call.domainSeparator);
      writeWitness(writer, call.outputs[0]);
      writeWitness(writer, call.outputs[1]);
      break;
    case 'HashToField128Security':
      writeFunctionInputs(writer, call.inputs);
      writeWitness(writer, call.output);
      break;
    case 'EcdsaSecp256k1':
    case 'EcdsaSecp256r1':
      writeFunctionInputs(writer, call.publicKeyX);
      writeFunctionInputs(writer, call.publicKeyY);
      writeFunctionInputs(writer, call.signature);
      writeFunctionInputs(writer, call.hashedMessage);
      writeWitness(writer, call.output);
      break;
    case 'FixedBaseScalarMul':
      writeFunctionInput(writer, call.low);
      writeFunctionInput(writer, call.high);
      writeWitness(writer, call.outputs[0]);
      writeWitness(writer, call.outputs[1]);
      break;
    case 'Keccak256VariableLength':
      writeFunctionInputs(writer, call.inputs);
      writeFunctionInput(writer, call.varMessageSize);
      writeWitnesses(writer, call.outputs);
      break;
    case 'RecursiveAggregation':
      writeFunctionInputs(writer, call.verificationKey);
      writeFunctionInputs(writer, call.proof);
      writeFunctionInputs(writer, call.publicInputs);
      writeFunctionInput(writer, call.keyHash);
      writer.writeOption(call.inputAggregationObject, (inputs) => writeFunctionInputs(writer, inputs));
      writeWitnesses(writer, call.outputAggregationObject);
      break;
  }
}

function writeDirective(writer: BinaryWriter, directive: Directive): void {
  writer.writeUint32(DIRECTIVE_TAGS[directive.type]);
  switch (directive.type) {
    case 'Quotient':
      writeExpression(writer, directive.a);
      writeExpression(writer, directive.b);
      writeWitness(writer, directive.q);
      writeWitness(writer, directive.r);
      writer.writeOption(directive.predicate, (predicate) => writeExpression(writer, predicate));
      break;
    case 'ToLeRadix':
      writeExpression(writer, directive.a);
      writeWitnesses(writer, directive.b);
      writer.writeUint32(directive.radix);
      break;
    case 'PermutationSort':
      writer.writeVec(directive.inputs, (tuple) =>
        writer.writeVec(tuple, (expression) => writeExpression(writer, expression))
      );
      writer.writeUint32(directive.tuple);
      writeWitnesses(writer, directive.bits);
      writer.writeVec(directive.sortBy, (column) => writer.writeUint32(column));
      break;
  }
}

function writeHeapArray(writer: BinaryWriter, array: HeapArray): void {
  writer.writeUint64(array.pointer);
  writer.writeUint64(array.size);
}

function writeHeapVector(writer: BinaryWriter, vector: HeapVector): void {
  writer.writeUint64(vector.pointer);
  writer.writeUint64(vector.size);
}

function writeRegisterOrMemory(writer: BinaryWriter, item: RegisterOrMemory): void {
  writer.writeUint32(REGISTER_OR_MEMORY_TAGS[item.type]);
  switch (item.type) {
    case 'RegisterIndex':
      writer.writeUint64(item.index);
      break;
    case 'HeapArray':
      writeHeapArray(writer, item);
      break;
    case 'HeapVector':
      writeHeapVector(writer, item);
      break;
  }
}

function writeBlackBoxOp(writer: BinaryWriter, op: BlackBoxOp): void {
  writer.writeUint32(BLACK_BOX_OP_TAGS[op.type]);
  switch (op.type) {
    case 'Sha256':
    case 'Blake2s':
    case 'Keccak256':
      writeHeapVector(writer, op.message);
      writeHeapArray(writer, op.output);
      break;
    case 'HashToField128Security':
      writeHeapVector(writer, op.message);
      writer.writeUint64(op.output);
      break;
    case 'EcdsaSecp256k1':
    case 'EcdsaSecp256r1':
      writeHeapVector(writer, op.hashedMsg);
      writeHeapArray(writer, op.publicKeyX);
      writeHeapArray(writer, op.publicKeyY);
      writeHeapArray(writer, op.signature);
      writer.writeUint64(op.result);
      break;
    case 'SchnorrVerify':
      writer.writeUint64(op.publicKeyX);
      writer.writeUint64(op.publicKeyY);
      writeHeapVector(writer, op.message);
      writeHeapVector(writer, op.signature);
      writer.writeUint64(op.result);
      break;
    case 'Pedersen':
      writeHeapVector(writer, op.inputs);
      writer.writeUint64(op.domainSeparator);
      writeHeapArray(writer, op.output);
      break;
    case 'FixedBaseScalarMul':
      writer.writeUint64(op.low);
      writer.writeUint64(op.high);
      writeHeapArray(writer, op.result);
      break;
  }
}

export function writeBrilligOpcode(writer: BinaryWriter, opcode: BrilligOpcode): void {
  writer.writeUint32(BRILLIG_OPCODE_TAGS[opcode.type]);
  switch (opcode.type) {
    case 'BinaryFieldOp':
      writer.writeUint64(opcode.destination);
      writer.writeUint32(BINARY_FIELD_OPS.indexOf(opcode.op));
      writer.writeUint64(opcode.lhs);
      writer.writeUint64(opcode.rhs);
      break;
    case 'BinaryIntOp':
      writer.writeUint64(opcode.destination);
      writer.writeUint32(BINARY_INT_OPS.indexOf(opcode.op));
      writer.writeUint32(opcode.bitSize);
      writer.writeUint64(opcode.lhs);
      writer.writeUint64(opcode.rhs);
      break;
    case 'JumpIfNot':
    case 'JumpIf':
      writer.writeUint64(opcode.condition);
      writer.writeUint64(opcode.location);
      break;
    case 'Jump':
    case 'Call':
      writer.writeUint64(opcode.location);
      break;
    case 'Const':
      writer.writeUint64(opcode.destination);
      writer.writeFieldElement(opcode.value);
      break;
    case 'ForeignCall':
      writer.writeString(opcode.function);
      writer.writeVec(opcode.destinations, (item) => writeRegisterOrMemory(writer, item));
      writer.writeVec(opcode.inputs, (item) => writeRegisterOrMemory(writer, item));
      break;
    case 'Mov':
      writer.writeUint64(opcode.destination);
      writer.writeUint64(opcode.source);
      break;
    case 'Load':
      writer.writeUint64(opcode.destination);
      writer.writeUint64(opcode.sourcePointer);
      break;
    case 'Store':
      writer.writeUint64(opcode.destinationPointer);
      writer.writeUint64(opcode.source);
      break;
    case 'BlackBox':
      writeBlackBoxOp(writer, opcode.op);
      break;
    case 'Return':
    case 'Trap':
    case 'Stop':
      break;
  }
}

function writeForeignCallResult(writer: BinaryWriter, result: ForeignCallResult): void {
  writer.writeVec(result.values, (output) => {
    writer.writeUint32(FOREIGN_CALL_OUTPUT_TAGS[output.type]);
    if (output.type === 'Single') {
      writer.writeFieldElement(output.value);
    } else {
      writer.writeVec(output.values, (value) => writer.writeFieldElement(value));
    }
  });
}

export function writeBrillig(writer: BinaryWriter, program: Brillig): void {
  writer.writeVec(program.inputs, (input) => {
    writer.writeUint32(BRILLIG_INPUTS_TAGS[input.type]);
    if (input.type === 'Single') {
      writeExpression(writer, input.expression);
    } else {
      writer.writeVec(input.expressions, (expression) => writeExpression(writer, expression));
    }
  });
  writer.writeVec(program.outputs, (output) => {
    writer.writeUint32(BRILLIG_OUTPUTS_TAGS[output.type]);
    if (output.type === 'Simple') {
      writeWitness(writer, output.witness);
    } else {
      writeWitnesses(writer, output.witnesses);
    }
  });
  writer.writeVec(program.foreignCallResults, (result) => writeForeignCallResult(writer, result));
  writer.writeVec(program.bytecode, (opcode) => writeBrilligOpcode(writer, opcode));
  writer.writeOption(program.predicate, (predicate) => writeExpression(writer, predicate));
}

/**
 * Write a memory operation in its three-expression wire form
 */
function writeMemOp(writer: BinaryWriter, op: MemOp): void {
  const field = op.index.qC.field;
  writeExpression(writer, expressionFromConstant(createFieldElement(MEM_OP_CODES[op.kind], field)));
  writeExpression(writer, op.index);
  if (op.kind === 'read') {
    writeExpression(writer, expressionFromWitness(op.destination, field));
  } else {
    writeExpression(writer, op.value);
  }
}

export function writeOpcode(writer: BinaryWriter, opcode: Opcode): void {
  writer.writeUint32(OPCODE_TAGS[opcode.type]);
  switch (opcode.type) {
    case 'Arithmetic':
      writeExpression(writer, opcode.expression);
      break;
    case 'BlackBoxFuncCall':
      writeBlackBoxFuncCall(writer, opcode.call);
      break;
    case 'Directive':
      writeDirective(writer, opcode.directive);
      break;
    case 'Brillig':
      writeBrillig(writer, opcode.brillig);
      break;
    case 'MemoryOp':
      writer.writeUint32(opcode.blockId);
      writeMemOp(writer, opcode.op);
      writer.writeOption(opcode.predicate, (predicate) => writeExpression(writer, predicate));
      break;
    case 'MemoryInit':
      writer.writeUint32(opcode.blockId);
      writeWitnesses(writer, opcode.init);
      break;
  }
}

/**
 * Serialize a circuit to its canonical, uncompressed payload
 *
 * Witness sets are already ascending and duplicate-free, so two circuits
 * that compare equal always produce the same bytes.
 */
export function serializeCircuit(circuit: Circuit): Uint8Array {
  const writer = new BinaryWriter();
  writeWitness(writer, circuit.currentWitnessIndex);
  writer.writeVec(circuit.opcodes, (opcode) => writeOpcode(writer, opcode));
  writeWitnesses(writer, circuit.privateParameters.toArray());
  writeWitnesses(writer, circuit.publicParameters.toArray());
  writeWitnesses(writer, circuit.returnValues.toArray());
  return writer.finish();
}
