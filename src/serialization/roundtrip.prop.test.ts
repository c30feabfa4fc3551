/**
 * Property-Based Tests for the Wire Format
 *
 * - decode(encode(c)) equals c for generated well-formed circuits
 * - Encoding is deterministic
 * - Term order and pre-merged duplicates never change the bytes
 */

import { describe, it, expect, beforeEach } from 'vitest';
import * as fc from 'fast-check';
import {
  FAST_PROPERTY_TEST_CONFIG,
  PROPERTY_TEST_CONFIG,
  arbitraryCircuit,
  arbitraryFieldElement,
  arbitraryWitness,
} from '../test-utils/property-test-config.js';
import { serializeCircuit } from './encode.js';
import { deserializeCircuit } from './decode.js';
import { encodeCircuit, decodeCircuit, circuitToBase64, circuitFromBase64 } from './envelope.js';
import { resetConfig } from '../config.js';
import { BN254_SCALAR_FIELD } from '../field/config.js';
import { createExpression, type LinearTerm, type MulTerm } from '../native-types/expression.js';
import { arithmetic, brillig } from '../opcodes/opcode.js';
import { createCircuit } from '../circuit/circuit.js';
import { createBrillig } from '../brillig/program.js';
import { heapVector, registerIndex } from '../brillig/types.js';

describe('Wire format round trip', () => {
  beforeEach(() => {
    resetConfig();
  });

  it('should decode every encoded circuit to an equal circuit', () => {
    fc.assert(
      fc.property(arbitraryCircuit(), (circuit) => {
        expect(decodeCircuit(encodeCircuit(circuit))).toEqual(circuit);
      }),
      FAST_PROPERTY_TEST_CONFIG
    );
  });

  it('should re-serialize a decoded payload to the same bytes', () => {
    fc.assert(
      fc.property(arbitraryCircuit(), (circuit) => {
        const payload = serializeCircuit(circuit);
        expect(serializeCircuit(deserializeCircuit(payload))).toEqual(payload);
      }),
      FAST_PROPERTY_TEST_CONFIG
    );
  });

  it('should encode deterministically', () => {
    fc.assert(
      fc.property(arbitraryCircuit(), (circuit) => {
        expect(encodeCircuit(circuit)).toEqual(encodeCircuit(circuit));
      }),
      FAST_PROPERTY_TEST_CONFIG
    );
  });

  it('should round-trip through base64', () => {
    fc.assert(
      fc.property(arbitraryCircuit(), (circuit) => {
        expect(circuitFromBase64(circuitToBase64(circuit))).toEqual(circuit);
      }),
      FAST_PROPERTY_TEST_CONFIG
    );
  });

  it('should keep register indices above the safe integer range exact', () => {
    const high = 2n ** 60n;
    const circuit = createCircuit({
      currentWitnessIndex: 1,
      opcodes: [
        brillig(
          createBrillig({
            inputs: [],
            outputs: [],
            bytecode: [
              {
                type: 'ForeignCall',
                function: 'far',
                destinations: [registerIndex(high)],
                inputs: [heapVector(high + 1n, 2n ** 64n - 1n)],
              },
              { type: 'Mov', destination: high, source: high + 3n },
              { type: 'Jump', location: high },
            ],
          })
        ),
      ],
    });

    const decoded = decodeCircuit(encodeCircuit(circuit));
    expect(decoded).toEqual(circuit);
    const [opcode] = decoded.opcodes;
    expect(opcode?.type === 'Brillig' && opcode.brillig.bytecode[1]).toEqual({
      type: 'Mov',
      destination: 1152921504606846976n,
      source: 1152921504606846979n,
    });
  });

  it('should not depend on the order terms and witnesses were supplied in', () => {
    const field = BN254_SCALAR_FIELD;
    const linearTerm = fc.tuple(arbitraryFieldElement(field), arbitraryWitness(50)).map((t): LinearTerm => t);
    const mulTerm = fc
      .tuple(arbitraryFieldElement(field), arbitraryWitness(50), arbitraryWitness(50))
      .map((t): MulTerm => t);

    fc.assert(
      fc.property(
        fc.array(linearTerm, { maxLength: 6 }),
        fc.array(mulTerm, { maxLength: 4 }),
        fc.array(arbitraryWitness(50), { maxLength: 6 }),
        (linearCombinations, mulTerms, parameters) => {
          const build = (reverse: boolean) => {
            const order = <T>(items: T[]): T[] => (reverse ? [...items].reverse() : items);
            const swapped = mulTerms.map(([c, a, b]): MulTerm => (reverse ? [c, b, a] : [c, a, b]));
            return createCircuit({
              currentWitnessIndex: 51,
              opcodes: [
                arithmetic(
                  createExpression({ linearCombinations: order(linearCombinations), mulTerms: order(swapped) }, field)
                ),
              ],
              privateParameters: order(parameters),
            });
          };
          expect(serializeCircuit(build(true))).toEqual(serializeCircuit(build(false)));
        }
      ),
      PROPERTY_TEST_CONFIG
    );
  });
});
