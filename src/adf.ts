// AppleSingle/AppleDouble support for extracting resource forks

import { SafeReader } from './reader.js';

export class NotADFError extends Error {
  constructor(message?: string) {
    super(message);
    this.name = 'NotADFError';
  }
}

export const ADF_ENTRYNUM_RESOURCEFORK = 2;

const APPLESINGLE_MAGIC = 0x00051600;
const APPLEDOUBLE_MAGIC = 0x00051607;
const ADF_VERSION = 0x00020000;

export function isAdf(data: Uint8Array): boolean {
  const reader = new SafeReader(data);
  if (!reader.has(0, 8)) {
    return false;
  }
  const magic = reader.u32be(0);
  return (magic === APPLEDOUBLE_MAGIC || magic === APPLESINGLE_MAGIC) &&
    reader.u32be(4) === ADF_VERSION;
}

/**
 * Entry id → entry bytes. Throws {@link NotADFError} for other containers and
 * `StructuralBoundsError` when the entry table points outside the buffer.
 */
export function unpackAdf(data: Uint8Array): Map<number, Uint8Array> {
  if (!isAdf(data)) {
    throw new NotADFError('Not an AppleSingle/AppleDouble file');
  }

  const reader = new SafeReader(data);

  // Skip filler (16 bytes)
  const numEntries = reader.u16be(24);

  const entries = new Map<number, Uint8Array>();
  let entryPos = 26;

  for (let i = 0; i < numEntries; i++) {
    const entryId = reader.u32be(entryPos);
    const offset = reader.u32be(entryPos + 4);
    const length = reader.u32be(entryPos + 8);

    entryPos += 12;

    entries.set(entryId, reader.sub(offset, length).bytes);
  }

  return entries;
}
