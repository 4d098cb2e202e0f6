/**
 * Bit-packed message buffers for client packets.
 *
 * Values are packed least-significant bit first. Multi-byte helpers are thin
 * wrappers over `writeBits`/`readBits`, so a byte written after three single
 * bits straddles two bytes of the buffer.
 *
 * @module core/bitstream
 */

import { MAX_STRING_CHARS } from "../constants.js";

/**
 * Thrown when a reader runs past the end of its buffer.
 */
export class MessageOverflowError extends Error {
  readonly name = "MessageOverflowError";

  constructor(
    public readonly requestedBits: number,
    public readonly remainingBits: number,
  ) {
    super(`Read of ${requestedBits} bits past end of message (${remainingBits} bits left)`);
  }
}

export class BitWriter {
  private buffer: Uint8Array;
  private bitLength = 0;

  constructor(initialCapacity: number = 256) {
    this.buffer = new Uint8Array(Math.max(1, initialCapacity));
  }

  /**
   * Write the low `bits` bits of `value` (1..32).
   */
  writeBits(value: number, bits: number): void {
    if (!Number.isInteger(bits) || bits < 1 || bits > 32) {
      throw new Error(`BitWriter.writeBits: bit count must be 1..32. Got: ${bits}`);
    }
    this.ensureCapacity(this.bitLength + bits);
    for (let i = 0; i < bits; i++) {
      if ((value >>> i) & 1) {
        const byteIndex = this.bitLength >> 3;
        this.buffer[byteIndex] = (this.buffer[byteIndex] ?? 0) | (1 << (this.bitLength & 7));
      }
      this.bitLength++;
    }
  }

  writeByte(value: number): void {
    this.writeBits(value & 0xff, 8);
  }

  writeShort(value: number): void {
    this.writeBits(value & 0xffff, 16);
  }

  writeLong(value: number): void {
    this.writeBits(value | 0, 32);
  }

  /**
   * NUL-terminated string; characters are written as their low byte.
   */
  writeString(text: string): void {
    for (let i = 0; i < text.length; i++) {
      this.writeByte(text.charCodeAt(i));
    }
    this.writeByte(0);
  }

  writeData(data: Uint8Array): void {
    for (const byte of data) {
      this.writeByte(byte);
    }
  }

  get lengthInBits(): number {
    return this.bitLength;
  }

  toBytes(): Uint8Array {
    return this.buffer.slice(0, (this.bitLength + 7) >> 3);
  }

  private ensureCapacity(bits: number): void {
    const needed = (bits + 7) >> 3;
    if (needed <= this.buffer.length) {
      return;
    }
    let size = this.buffer.length;
    while (size < needed) {
      size *= 2;
    }
    const grown = new Uint8Array(size);
    grown.set(this.buffer);
    this.buffer = grown;
  }
}

export class BitReader {
  private readonly data: Uint8Array;
  private bitOffset = 0;

  constructor(data: Uint8Array) {
    this.data = data;
  }

  get remainingBits(): number {
    return this.data.length * 8 - this.bitOffset;
  }

  /**
   * Read `bits` bits (1..32) as an unsigned value.
   */
  readBits(bits: number): number {
    if (!Number.isInteger(bits) || bits < 1 || bits > 32) {
      throw new Error(`BitReader.readBits: bit count must be 1..32. Got: ${bits}`);
    }
    if (bits > this.remainingBits) {
      throw new MessageOverflowError(bits, this.remainingBits);
    }
    let value = 0;
    for (let i = 0; i < bits; i++) {
      const byte = this.data[this.bitOffset >> 3] ?? 0;
      if ((byte >> (this.bitOffset & 7)) & 1) {
        value |= 1 << i;
      }
      this.bitOffset++;
    }
    return value >>> 0;
  }

  readByte(): number {
    return this.readBits(8);
  }

  /**
   * Signed 16-bit read.
   */
  readShort(): number {
    return (this.readBits(16) << 16) >> 16;
  }

  /**
   * Signed 32-bit read.
   */
  readLong(): number {
    return this.readBits(32) | 0;
  }

  /**
   * Read up to the NUL terminator. High-bit bytes and `%` come back as `.`,
   * and characters past `maxLength - 1` are consumed but discarded.
   */
  readString(maxLength: number = MAX_STRING_CHARS): string {
    let text = "";
    for (;;) {
      let c = this.readByte();
      if (c === 0) {
        break;
      }
      if (c === 0x25 || c > 127) {
        c = 0x2e;
      }
      if (text.length < maxLength - 1) {
        text += String.fromCharCode(c);
      }
    }
    return text;
  }

  readData(length: number): Uint8Array {
    const out = new Uint8Array(length);
    for (let i = 0; i < length; i++) {
      out[i] = this.readByte();
    }
    return out;
  }
}
