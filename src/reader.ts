// Bounds-checked reads over an immutable byte buffer

import { StructuralBoundsError } from './errors.js';
import type { FourCC } from './types.js';

/**
 * Random-access reader. Every read checks its range and throws
 * {@link StructuralBoundsError} when it falls outside the buffer.
 */
export class SafeReader {
  private readonly view: DataView;

  constructor(readonly bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get length(): number {
    return this.bytes.length;
  }

  /** Whether `size` bytes starting at `offset` lie inside the buffer. */
  has(offset: number, size: number): boolean {
    return Number.isInteger(offset) && Number.isInteger(size) &&
      offset >= 0 && size >= 0 && offset + size <= this.bytes.length;
  }

  ensure(offset: number, size: number): void {
    if (!this.has(offset, size)) {
      throw new StructuralBoundsError(offset, size, this.bytes.length);
    }
  }

  u8(offset: number): number {
    this.ensure(offset, 1);
    return this.view.getUint8(offset);
  }

  u16be(offset: number): number {
    this.ensure(offset, 2);
    return this.view.getUint16(offset, false);
  }

  u16le(offset: number): number {
    this.ensure(offset, 2);
    return this.view.getUint16(offset, true);
  }

  i16be(offset: number): number {
    this.ensure(offset, 2);
    return this.view.getInt16(offset, false);
  }

  u32be(offset: number): number {
    this.ensure(offset, 4);
    return this.view.getUint32(offset, false);
  }

  u32le(offset: number): number {
    this.ensure(offset, 4);
    return this.view.getUint32(offset, true);
  }

  /** Four bytes as a one-char-per-byte code. */
  fourcc(offset: number): FourCC {
    this.ensure(offset, 4);
    return String.fromCharCode(...this.bytes.subarray(offset, offset + 4));
  }

  /** Copy of `size` bytes; the result never aliases the input buffer. */
  bytesAt(offset: number, size: number): Uint8Array {
    this.ensure(offset, size);
    // Buffer#slice shares memory, so copy through a fresh Uint8Array
    return new Uint8Array(this.bytes.subarray(offset, offset + size));
  }

  /** Reader over a sub-range. Offsets in the returned reader start at zero. */
  sub(offset: number, size: number): SafeReader {
    this.ensure(offset, size);
    return new SafeReader(this.bytes.subarray(offset, offset + size));
  }

  matches(offset: number, signature: Uint8Array): boolean {
    if (!this.has(offset, signature.length)) {
      return false;
    }
    for (let i = 0; i < signature.length; i++) {
      if (this.bytes[offset + i] !== signature[i]) {
        return false;
      }
    }
    return true;
  }

  /** First offset at or after `from` where `signature` occurs, or -1. */
  indexOf(signature: Uint8Array, from = 0): number {
    const last = this.bytes.length - signature.length;
    for (let offset = Math.max(0, from); offset <= last; offset++) {
      if (this.matches(offset, signature)) {
        return offset;
      }
    }
    return -1;
  }
}
