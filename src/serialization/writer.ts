/**
 * Binary Writer
 *
 * Little-endian primitive encoder for the circuit wire format. Integers are
 * range-checked against their wire width before anything is written.
 */

import type { FieldElement } from '../types.js';
import { integerOutOfRangeError } from '../errors.js';
import { fieldElementToHex } from '../field/serialization.js';

const MAX_U8 = 0xff;
const MAX_U32 = 0xffffffff;
const MAX_U64 = 0xffffffffffffffffn;

const textEncoder = new TextEncoder();

export class BinaryWriter {
  private buffer: Uint8Array;
  private view: DataView;
  private offset: number;

  constructor(initialCapacity = 256) {
    this.buffer = new Uint8Array(initialCapacity);
    this.view = new DataView(this.buffer.buffer);
    this.offset = 0;
  }

  get length(): number {
    return this.offset;
  }

  private ensureCapacity(bytes: number): void {
    const required = this.offset + bytes;
    if (required <= this.buffer.length) {
      return;
    }
    let capacity = Math.max(this.buffer.length * 2, 16);
    while (capacity < required) {
      capacity *= 2;
    }
    const grown = new Uint8Array(capacity);
    grown.set(this.buffer.subarray(0, this.offset));
    this.buffer = grown;
    this.view = new DataView(grown.buffer);
  }

  writeUint8(value: number): void {
    if (!Number.isInteger(value) || value < 0 || value > MAX_U8) {
      throw integerOutOfRangeError(value, 'u8');
    }
    this.ensureCapacity(1);
    this.view.setUint8(this.offset, value);
    this.offset += 1;
  }

  writeUint32(value: number): void {
    if (!Number.isInteger(value) || value < 0 || value > MAX_U32) {
      throw integerOutOfRangeError(value, 'u32');
    }
    this.ensureCapacity(4);
    this.view.setUint32(this.offset, value, true);
    this.offset += 4;
  }

  writeUint64(value: bigint): void {
    if (value < 0n || value > MAX_U64) {
      throw integerOutOfRangeError(value, 'u64');
    }
    this.ensureCapacity(8);
    this.view.setBigUint64(this.offset, value, true);
    this.offset += 8;
  }

  /**
   * Write a u64 element or byte count
   */
  writeLength(count: number): void {
    if (!Number.isSafeInteger(count) || count < 0) {
      throw integerOutOfRangeError(count, 'u64');
    }
    this.writeUint64(BigInt(count));
  }

  writeBytes(bytes: Uint8Array): void {
    this.ensureCapacity(bytes.length);
    this.buffer.set(bytes, this.offset);
    this.offset += bytes.length;
  }

  /**
   * Write a u64 byte length followed by the UTF-8 bytes
   */
  writeString(value: string): void {
    const bytes = textEncoder.encode(value);
    this.writeLength(bytes.length);
    this.writeBytes(bytes);
  }

  /**
   * Write a field element as its canonical hex string
   */
  writeFieldElement(element: FieldElement): void {
    this.writeString(fieldElementToHex(element));
  }

  /**
   * Write a u64 count followed by each item
   */
  writeVec<T>(items: readonly T[], writeItem: (item: T) => void): void {
    this.writeLength(items.length);
    for (const item of items) {
      writeItem(item);
    }
  }

  /**
   * Write a presence flag, then the value when there is one
   */
  writeOption<T>(value: T | undefined, writeValue: (value: T) => void): void {
    if (value === undefined) {
      this.writeUint8(0);
    } else {
      this.writeUint8(1);
      writeValue(value);
    }
  }

  /**
   * Copy of the bytes written so far
   */
  finish(): Uint8Array {
    return this.buffer.slice(0, this.offset);
  }
}
