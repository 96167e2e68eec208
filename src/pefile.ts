// Windows PE (.aex) resource section location and MIB8 record extraction

import { createParseContext, type IParseContext } from './context.js';
import { SafeReader } from './reader.js';
import { WIN_RECORD, scanRecords } from './records.js';
import type { ContainerParseResult } from './types.js';

export const RESOURCE_SECTION_NAME = '.rsrc';

const DOS_HEADER_SIZE = 64;
const E_LFANEW_OFFSET = 60;
const COFF_HEADER_END = 24; // PE signature (4) + COFF file header (20)
const SECTION_HEADER_SIZE = 40;

export interface PeSection {
  name: string;
  virtualSize: number;
  virtualAddress: number;
  rawSize: number;
  rawOffset: number;
}

export interface PeImage {
  peHeaderOffset: number;
  sections: PeSection[];
}

export interface ResourceBlob {
  reader: SafeReader;
  /** Offset of the blob within the file. */
  baseOffset: number;
  /** Section name the blob was taken from, or null for the whole file. */
  section: string | null;
}

/** DOS + PE + section table. Returns null when the buffer isn't a PE image. */
export function readPeImage(reader: SafeReader, context: IParseContext): PeImage | null {
  if (!reader.has(0, DOS_HEADER_SIZE) || reader.u8(0) !== 0x4D || reader.u8(1) !== 0x5A) { // 'MZ'
    return null;
  }

  const peHeaderOffset = reader.u32le(E_LFANEW_OFFSET);
  if (!reader.has(peHeaderOffset, COFF_HEADER_END) || reader.fourcc(peHeaderOffset) !== 'PE\0\0') {
    context.log.debug(`e_lfanew 0x${peHeaderOffset.toString(16)} does not point at a PE signature`);
    return null;
  }

  const numSections = reader.u16le(peHeaderOffset + 6);
  const optionalHeaderSize = reader.u16le(peHeaderOffset + 20);
  const sectionTable = peHeaderOffset + COFF_HEADER_END + optionalHeaderSize;

  const sections: PeSection[] = [];
  for (let i = 0; i < numSections; i++) {
    const entry = sectionTable + i * SECTION_HEADER_SIZE;
    if (!reader.has(entry, SECTION_HEADER_SIZE)) {
      context.log.debug(`section table truncated after ${i} of ${numSections} entries`);
      break;
    }

    sections.push({
      name: new TextDecoder('latin1').decode(reader.bytesAt(entry, 8)).replace(/\0+$/, ''),
      virtualSize: reader.u32le(entry + 8),
      virtualAddress: reader.u32le(entry + 12),
      rawSize: reader.u32le(entry + 16),
      rawOffset: reader.u32le(entry + 20),
    });
  }

  return { peHeaderOffset, sections };
}

/** The `.rsrc` section clipped to the buffer, else the whole file. */
export function locateResourceBlob(reader: SafeReader, image: PeImage | null): ResourceBlob {
  const whole: ResourceBlob = { reader, baseOffset: 0, section: null };
  const section = image?.sections.find(s => s.name === RESOURCE_SECTION_NAME);
  if (!section || section.rawOffset >= reader.length) {
    return whole;
  }

  const size = Math.min(section.rawSize, reader.length - section.rawOffset);
  if (size <= 0) {
    return whole;
  }

  return {
    reader: reader.sub(section.rawOffset, size),
    baseOffset: section.rawOffset,
    section: section.name
  };
}

export class PeResourceParser {
  static fromBytes(data: Uint8Array, context: IParseContext = createParseContext()): ContainerParseResult {
    const reader = new SafeReader(data);
    const image = readPeImage(reader, context);
    const blob = locateResourceBlob(reader, image);

    if (blob.section === null) {
      context.log.debug('no usable .rsrc section, scanning the whole file for MIB8 records');
    }

    let properties = scanRecords(blob.reader, [WIN_RECORD], context, { baseOffset: blob.baseOffset });

    // Packed binaries keep the PiPL outside the section table's .rsrc
    if (properties.length === 0 && blob.section !== null) {
      context.log.debug(`no MIB8 records inside ${blob.section}, scanning the whole file`);
      properties = scanRecords(reader, [WIN_RECORD], context);
    }

    return { properties, resources: [] };
  }
}
