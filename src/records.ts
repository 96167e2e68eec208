// Signature-driven record tokenizer shared by the binary container parsers

import type { IParseContext } from './context.js';
import { PropertyValidationError, StructuralBoundsError } from './errors.js';
import { SafeReader } from './reader.js';
import { fourccToBytes, sanitizeTypeName } from './textio.js';
import type { FourCC, PiplFormat, RawProperty } from './types.js';

export interface RecordMatch {
  property: RawProperty;
  /** Offset just past the record's payload. */
  end: number;
}

export interface RecordSignature {
  readonly signature: FourCC;
  readonly source: PiplFormat;
  /** Returns null to reject the candidate; may throw {@link StructuralBoundsError}. */
  read(reader: SafeReader, offset: number, context: IParseContext): RecordMatch | null;
}

export interface ScanOptions {
  start?: number;
  end?: number;
  /** Added to record offsets so they refer to the original buffer. */
  baseOffset?: number;
  /** Records already taken by a structured walk, keyed by start offset, valued by end offset. */
  consumed?: ReadonlyMap<number, number>;
}

export function makeRawProperty(
  typeTag: FourCC,
  payload: Uint8Array,
  source: PiplFormat,
  offset: number
): RawProperty {
  return Object.freeze({ typeTag, payload, declaredLength: payload.length, source, offset });
}

/**
 * `{"8BIM"}{type}{4 skipped bytes}{BE u32 length}{payload}`
 */
export const MAC_RECORD: RecordSignature = {
  signature: '8BIM',
  source: 'rsrc',
  read(reader, offset) {
    const typeTag = reader.fourcc(offset + 4);
    const length = reader.u32be(offset + 12);
    const payload = reader.bytesAt(offset + 16, length);
    return {
      property: makeRawProperty(typeTag, payload, 'rsrc', offset),
      end: offset + 16 + length
    };
  }
};

/**
 * `{"MIB8"}{type, reversed}{zero padding}{LE u32 length}{payload}`
 */
export const WIN_RECORD: RecordSignature = {
  signature: 'MIB8',
  source: 'pe',
  read(reader, offset, context) {
    const typeTag = reader.fourcc(offset + 4);

    let cursor = offset + 8;
    const limit = cursor + context.config.winPaddingLookahead;
    while (cursor < limit && reader.has(cursor, 1) && reader.u8(cursor) === 0) {
      cursor++;
    }

    const length = reader.u32le(cursor);
    const max = context.config.maxWinPropertyLength;
    if (length <= 0 || length >= max) {
      context.report(new PropertyValidationError(
        `MIB8 record '${sanitizeTypeName(typeTag)}' has implausible length ${length} (expected 0 < n < ${max})`,
        offset
      ));
      return null;
    }

    const payload = reader.bytesAt(cursor + 4, length);
    return {
      property: makeRawProperty(typeTag, payload, 'pe', offset),
      end: cursor + 4 + length
    };
  }
};

/**
 * Walks `reader` looking for any of `signatures`. A match is handed to its
 * signature's reader; on success scanning resumes right after the payload,
 * otherwise one byte further on.
 */
export function scanRecords(
  reader: SafeReader,
  signatures: readonly RecordSignature[],
  context: IParseContext,
  options: ScanOptions = {}
): RawProperty[] {
  const table = signatures.map(entry => ({ entry, bytes: fourccToBytes(entry.signature) }));
  const start = options.start ?? 0;
  const end = Math.min(options.end ?? reader.length, reader.length);
  const baseOffset = options.baseOffset ?? 0;
  const properties: RawProperty[] = [];

  let offset = start;
  while (offset + 4 <= end) {
    const taken = options.consumed?.get(offset);
    if (taken !== undefined) {
      offset = Math.max(taken, offset + 1);
      continue;
    }

    const hit = table.find(({ bytes }) => reader.matches(offset, bytes));
    if (!hit) {
      offset++;
      continue;
    }

    const match = readGuarded(hit.entry, reader, offset, context);
    if (!match) {
      offset++;
      continue;
    }

    context.log.debug(
      `found ${hit.entry.signature} record '${sanitizeTypeName(match.property.typeTag)}' ` +
      `(${match.property.declaredLength} bytes) at 0x${(baseOffset + offset).toString(16)}`
    );
    const { typeTag, payload, source } = match.property;
    properties.push(
      baseOffset === 0 ? match.property : makeRawProperty(typeTag, payload, source, baseOffset + offset)
    );
    offset = Math.max(match.end, offset + 1);
  }

  return properties;
}

export function readGuarded(
  signature: RecordSignature,
  reader: SafeReader,
  offset: number,
  context: IParseContext
): RecordMatch | null {
  try {
    return signature.read(reader, offset, context);
  } catch (error) {
    if (error instanceof StructuralBoundsError) {
      context.report(error);
      return null;
    }
    throw error;
  }
}
