import { describe, it, expect } from 'vitest';
import {
  BLACK_BOX_FUNC_TAGS,
  blackBoxFuncName,
  blackBoxInputs,
  blackBoxOutputs,
  type BlackBoxFuncCall,
} from './black-box.js';

const byte = (witness: number) => ({ witness, numBits: 8 });

describe('Black box functions', () => {
  it('should assign consecutive wire tags', () => {
    expect(Object.values(BLACK_BOX_FUNC_TAGS)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13]);
    expect(BLACK_BOX_FUNC_TAGS.FixedBaseScalarMul).toBe(10);
    expect(BLACK_BOX_FUNC_TAGS.RecursiveAggregation).toBe(13);
  });

  it('should name primitives the way front ends spell them', () => {
    const call: BlackBoxFuncCall = {
      name: 'FixedBaseScalarMul',
      low: { witness: 1, numBits: 128 },
      high: { witness: 2, numBits: 128 },
      outputs: [3, 4],
    };
    expect(blackBoxFuncName(call)).toBe('fixed_base_scalar_mul');
    expect(blackBoxFuncName({ name: 'RANGE', input: byte(1) })).toBe('range');
  });

  it('should list operands and results of a schnorr verification in wire order', () => {
    const call: BlackBoxFuncCall = {
      name: 'SchnorrVerify',
      publicKeyX: { witness: 1, numBits: 254 },
      publicKeyY: { witness: 2, numBits: 254 },
      signature: [byte(3), byte(4)],
      message: [byte(5)],
      output: 6,
    };
    expect(blackBoxInputs(call).map((input) => input.witness)).toEqual([1, 2, 3, 4, 5]);
    expect(blackBoxOutputs(call)).toEqual([6]);
  });

  it('should include the optional aggregation object only when present', () => {
    const base = {
      name: 'RecursiveAggregation' as const,
      verificationKey: [byte(1)],
      proof: [byte(2)],
      publicInputs: [byte(3)],
      keyHash: byte(4),
      outputAggregationObject: [6, 7],
    };
    expect(blackBoxInputs(base).map((input) => input.witness)).toEqual([1, 2, 3, 4]);
    expect(blackBoxInputs({ ...base, inputAggregationObject: [byte(5)] }).map((input) => input.witness)).toEqual([
      1, 2, 3, 4, 5,
    ]);
    expect(blackBoxOutputs(base)).toEqual([6, 7]);
  });

  it('should report no outputs for a range check', () => {
    expect(blackBoxOutputs({ name: 'RANGE', input: byte(1) })).toEqual([]);
  });
});
