/**
 * Byte-exact compatibility with the reference encodings
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { serializeCircuit } from './encode.js';
import { deserializeCircuit } from './decode.js';
import { encodeCircuit, decodeCircuit, decompressPayload, circuitFromBase64 } from './envelope.js';
import { resetConfig } from '../config.js';
import { circuitOpcodeCounts, circuitPublicInputs } from '../circuit/circuit.js';
import {
  GOLDEN_CIRCUITS,
  inverterCircuit,
  loadGoldenFixtures,
  type GoldenCircuitName,
} from '../test-utils/golden-circuits.js';

const fixtures = loadGoldenFixtures();
const names = Object.keys(GOLDEN_CIRCUITS).filter((name): name is GoldenCircuitName => name in fixtures.circuits);

const GZIP_HEADER = [0x1f, 0x8b, 0x08, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0xff];

function toHex(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('hex');
}

function fromBase64(text: string): Uint8Array {
  return new Uint8Array(Buffer.from(text, 'base64'));
}

describe('Golden encodings', () => {
  beforeEach(() => {
    resetConfig();
  });

  it('should cover every reference circuit', () => {
    expect(names).toHaveLength(7);
  });

  describe.each(names)('%s', (name) => {
    const build = GOLDEN_CIRCUITS[name];
    const fixture = fixtures.circuits[name];

    it('should serialize to the pinned payload', () => {
      expect(toHex(serializeCircuit(build()))).toBe(fixture.payload);
    });

    it('should deserialize the pinned payload to the same circuit', () => {
      const payload = new Uint8Array(Buffer.from(fixture.payload, 'hex'));
      expect(deserializeCircuit(payload)).toEqual(build());
    });

    it('should write the fixed gzip header', () => {
      expect([...encodeCircuit(build()).subarray(0, 10)]).toEqual(GZIP_HEADER);
    });

    it('should compress to a stream that inflates to the pinned payload', () => {
      expect(toHex(decompressPayload(encodeCircuit(build())))).toBe(fixture.payload);
    });

    it('should encode identically on every call', () => {
      expect(encodeCircuit(build())).toEqual(encodeCircuit(build()));
    });

    it('should decode the reference envelope', () => {
      const reference = fromBase64(fixture.compressed);
      expect([...reference.subarray(0, 10)]).toEqual(GZIP_HEADER);
      expect(decodeCircuit(reference)).toEqual(build());
    });
  });
});

describe('Circuits from a compiler front end', () => {
  beforeEach(() => {
    resetConfig();
  });

  it('should decode the inverter circuit to its known structure', () => {
    const circuit = circuitFromBase64(fixtures.foreignEncoder.inverter);

    expect(circuit.currentWitnessIndex).toBe(6);
    expect(circuit.privateParameters.toArray()).toEqual([1]);
    expect(circuit.publicParameters.toArray()).toEqual([2]);
    expect(circuit.returnValues.toArray()).toEqual([]);
    expect(circuitPublicInputs(circuit).toArray()).toEqual([2]);
    expect(circuitOpcodeCounts(circuit)).toEqual({
      Arithmetic: 4,
      BlackBoxFuncCall: 0,
      Directive: 0,
      Brillig: 1,
      MemoryOp: 0,
      MemoryInit: 0,
    });
    expect(circuit).toEqual(inverterCircuit());
  });

  it('should carry the brillig program with its predicate', () => {
    const [, opcode] = circuitFromBase64(fixtures.foreignEncoder.inverter).opcodes;
    expect(opcode?.type).toBe('Brillig');
    if (opcode?.type !== 'Brillig') {
      return;
    }
    expect(opcode.brillig.bytecode.map((instruction) => instruction.type)).toEqual([
      'JumpIfNot',
      'Const',
      'BinaryFieldOp',
      'Stop',
    ]);
    expect(opcode.brillig.predicate?.qC.value).toBe(1n);
    expect(opcode.brillig.foreignCallResults).toEqual([]);
  });

  it('should re-encode the inverter to a stream that decodes to the same circuit', () => {
    const circuit = circuitFromBase64(fixtures.foreignEncoder.inverter);
    expect(decodeCircuit(encodeCircuit(circuit))).toEqual(circuit);
  });
});
