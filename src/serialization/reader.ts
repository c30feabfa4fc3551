/**
 * Binary Reader
 *
 * Little-endian primitive decoder for the circuit wire format. Every read is
 * bounds-checked: running out of input raises TRUNCATED_INPUT with the
 * offset the read started at.
 */

import type { FieldConfig, FieldElement } from '../types.js';
import {
  invalidOptionTagError,
  invalidUtf8Error,
  trailingBytesError,
  truncatedInputError,
} from '../errors.js';
import { fieldElementFromHex } from '../field/serialization.js';

const TWO_POW_32 = 0x100000000;

const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

export class BinaryReader {
  private view: DataView;
  private offset: number;

  constructor(bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    this.offset = 0;
  }

  get position(): number {
    return this.offset;
  }

  get length(): number {
    return this.view.byteLength;
  }

  get remaining(): number {
    return this.view.byteLength - this.offset;
  }

  private require(bytes: number): void {
    if (bytes > this.remaining) {
      throw truncatedInputError(this.offset, bytes, this.remaining);
    }
  }

  readUint8(): number {
    this.require(1);
    const value = this.view.getUint8(this.offset);
    this.offset += 1;
    return value;
  }

  readUint32(): number {
    this.require(4);
    const value = this.view.getUint32(this.offset, true);
    this.offset += 4;
    return value;
  }

  readUint64(): bigint {
    this.require(8);
    const value = this.view.getBigUint64(this.offset, true);
    this.offset += 8;
    return value;
  }

  /**
   * Read a u64 element count
   *
   * Every element takes at least one byte, so a count larger than the
   * remaining input is reported as truncation before anything is allocated.
   */
  readLength(): number {
    this.require(8);
    const low = this.view.getUint32(this.offset, true);
    const high = this.view.getUint32(this.offset + 4, true);
    this.offset += 8;
    const count = high * TWO_POW_32 + low;
    if (count > this.remaining) {
      throw truncatedInputError(this.offset, count, this.remaining);
    }
    return count;
  }

  readBytes(length: number): Uint8Array {
    this.require(length);
    const bytes = new Uint8Array(this.view.buffer, this.view.byteOffset + this.offset, length);
    this.offset += length;
    return bytes;
  }

  /**
   * Read a u64 byte length followed by that many UTF-8 bytes
   */
  readString(): string {
    const length = this.readLength();
    const start = this.offset;
    const bytes = this.readBytes(length);
    try {
      return utf8Decoder.decode(bytes);
    } catch {
      throw invalidUtf8Error(start, length);
    }
  }

  /**
   * Read a field element from its canonical hex string
   */
  readFieldElement(field: FieldConfig): FieldElement {
    return fieldElementFromHex(this.readString(), field);
  }

  readVec<T>(readItem: () => T): T[] {
    const count = this.readLength();
    const items: T[] = [];
    for (let i = 0; i < count; i++) {
      items.push(readItem());
    }
    return items;
  }

  /**
   * Read a presence flag, then the value when the flag is 1
   */
  readOption<T>(readValue: () => T): T | undefined {
    const start = this.offset;
    const flag = this.readUint8();
    if (flag === 0) {
      return undefined;
    }
    if (flag !== 1) {
      throw invalidOptionTagError(flag, start);
    }
    return readValue();
  }

  /**
   * Fail unless every byte has been consumed
   */
  expectEnd(): void {
    if (this.remaining !== 0) {
      throw trailingBytesError(this.offset, this.remaining);
    }
  }
}
