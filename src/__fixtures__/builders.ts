// In-memory container builders for tests

export type Bytes = Uint8Array | number[];

export interface FixtureResource {
  type: string;
  id: number;
  data: Uint8Array;
  name?: string;
}

function ascii(text: string): Uint8Array {
  return Uint8Array.from(text, c => c.charCodeAt(0) & 0xFF);
}

export function concat(...parts: Bytes[]): Uint8Array {
  const arrays = parts.map(part => (part instanceof Uint8Array ? part : Uint8Array.from(part)));
  const result = new Uint8Array(arrays.reduce((sum, part) => sum + part.length, 0));
  let pos = 0;
  for (const part of arrays) {
    result.set(part, pos);
    pos += part.length;
  }
  return result;
}

export function u32be(value: number): Uint8Array {
  const bytes = new Uint8Array(4);
  new DataView(bytes.buffer).setUint32(0, value >>> 0, false);
  return bytes;
}

export function u32le(value: number): Uint8Array {
  const bytes = new Uint8Array(4);
  new DataView(bytes.buffer).setUint32(0, value >>> 0, true);
  return bytes;
}

export function text(value: string): Uint8Array {
  return new TextEncoder().encode(value);
}

/** `{"8BIM"}{tag}{4 zero bytes}{BE length}{payload}` */
export function macRecord(tag: string, payload: Bytes): Uint8Array {
  const data = concat(payload);
  return concat(ascii('8BIM'), ascii(tag), [0, 0, 0, 0], u32be(data.length), data);
}

/** `{"MIB8"}{tag}{padding zero bytes}{LE length}{payload}`; `tag` is written as given. */
export function winRecord(tag: string, payload: Bytes, padding = 4): Uint8Array {
  const data = concat(payload);
  return concat(ascii('MIB8'), ascii(tag), new Uint8Array(padding), u32le(data.length), data);
}

export interface PiplBodyOptions {
  /** Prefix `{u32 version}{u32 count}`. */
  header?: boolean;
  /** Pad each record to a multiple of 4 bytes. */
  align?: boolean;
  version?: number;
  /** Overrides the count written in the header. */
  count?: number;
}

export function piplBody(records: Array<[string, Bytes]>, options: PiplBodyOptions = {}): Uint8Array {
  const { header = true, align = false, version = 0 } = options;
  const parts: Uint8Array[] = [];
  if (header) {
    parts.push(u32be(version), u32be(options.count ?? records.length));
  }
  for (const [tag, payload] of records) {
    const record = macRecord(tag, payload);
    parts.push(record);
    const pad = align ? (4 - (record.length % 4)) % 4 : 0;
    if (pad) {
      parts.push(new Uint8Array(pad));
    }
  }
  return concat(...parts);
}

export interface ForkOptions {
  /** Zero bytes appended to the data area until it is at least this long. */
  minDataSize?: number;
}

/**
 * Writes a resource fork: 16-byte header, data area, then a 30-byte map
 * header, type list, reference lists and name list.
 */
export function buildResourceFork(resources: FixtureResource[], options: ForkOptions = {}): Uint8Array {
  const byType = new Map<string, FixtureResource[]>();
  for (const resource of resources) {
    const list = byType.get(resource.type) ?? [];
    list.push(resource);
    byType.set(resource.type, list);
  }

  const dataOffsets = new Map<FixtureResource, number>();
  const dataParts: Uint8Array[] = [];
  let dataSize = 0;
  for (const resource of resources) {
    dataOffsets.set(resource, dataSize);
    dataParts.push(u32be(resource.data.length), resource.data);
    dataSize += 4 + resource.data.length;
  }
  if (dataSize < (options.minDataSize ?? 0)) {
    dataParts.push(new Uint8Array((options.minDataSize ?? 0) - dataSize));
    dataSize = options.minDataSize ?? 0;
  }

  const typeListSize = 2 + byType.size * 8;
  const referenceListSize = resources.length * 12;
  const nameParts: Uint8Array[] = [];
  let nameSize = 0;
  const nameOffsets = new Map<FixtureResource, number>();
  for (const list of byType.values()) {
    for (const resource of list) {
      if (resource.name !== undefined) {
        nameOffsets.set(resource, nameSize);
        const name = ascii(resource.name);
        nameParts.push(Uint8Array.of(name.length), name);
        nameSize += 1 + name.length;
      }
    }
  }

  const dataOffset = 16;
  const mapOffset = dataOffset + dataSize;
  const typeListOffset = 30;
  const nameListOffset = typeListOffset + typeListSize + referenceListSize;
  const mapSize = nameListOffset + nameSize;

  const header = concat(u32be(dataOffset), u32be(mapOffset), u32be(dataSize), u32be(mapSize));

  const map = new Uint8Array(mapSize);
  const view = new DataView(map.buffer);
  map.set(header, 0);
  view.setUint16(24, typeListOffset, false);
  view.setUint16(26, nameListOffset, false);
  view.setUint16(typeListOffset, byType.size - 1, false);

  let typePos = typeListOffset + 2;
  let refListOffset = typeListSize; // relative to the type list
  for (const [type, list] of byType) {
    map.set(ascii(type), typePos);
    view.setUint16(typePos + 4, list.length - 1, false);
    view.setUint16(typePos + 6, refListOffset, false);
    typePos += 8;

    let refPos = typeListOffset + refListOffset;
    for (const resource of list) {
      view.setInt16(refPos, resource.id, false);
      view.setUint16(refPos + 2, nameOffsets.get(resource) ?? 0xFFFF, false);
      view.setUint32(refPos + 4, dataOffsets.get(resource) ?? 0, false);
      refPos += 12;
    }
    refListOffset += list.length * 12;
  }
  map.set(concat(...nameParts), nameListOffset);

  return concat(header, ...dataParts, map);
}

/** AppleDouble (or AppleSingle) file whose only entry is the resource fork. */
export function wrapAppleDouble(resourceFork: Uint8Array, magic = 0x00051607): Uint8Array {
  const headerSize = 26 + 12;
  return concat(
    u32be(magic),
    u32be(0x00020000),
    new Uint8Array(16),
    [0, 1],
    u32be(2),
    u32be(headerSize),
    u32be(resourceFork.length),
    resourceFork
  );
}

export interface PeOptions {
  /** Bytes placed in the `.text` section. */
  text?: Uint8Array;
  /** Bytes placed in the `.rsrc` section; the section is left out when undefined. */
  rsrc?: Uint8Array;
}

const FILE_ALIGNMENT = 0x200;
const OPTIONAL_HEADER_SIZE = 16;

function alignUp(value: number): number {
  return Math.ceil(value / FILE_ALIGNMENT) * FILE_ALIGNMENT;
}

/** DOS stub, PE signature, COFF header, a short optional header and the section table. */
export function buildPeImage(options: PeOptions = {}): Uint8Array {
  const sections: Array<[string, Uint8Array]> = [['.text', options.text ?? new Uint8Array(16)]];
  if (options.rsrc !== undefined) {
    sections.push(['.rsrc', options.rsrc]);
  }

  const peOffset = 64;
  const sectionTable = peOffset + 24 + OPTIONAL_HEADER_SIZE;
  const headersEnd = alignUp(sectionTable + sections.length * 40);

  const layout: Array<{ name: string; data: Uint8Array; rawOffset: number; rawSize: number }> = [];
  let cursor = headersEnd;
  for (const [name, data] of sections) {
    const rawSize = alignUp(Math.max(data.length, 1));
    layout.push({ name, data, rawOffset: cursor, rawSize });
    cursor += rawSize;
  }

  const image = new Uint8Array(cursor);
  const view = new DataView(image.buffer);
  image.set(ascii('MZ'), 0);
  view.setUint32(60, peOffset, true);
  image.set(ascii('PE\0\0'), peOffset);
  view.setUint16(peOffset + 4, 0x8664, true);
  view.setUint16(peOffset + 6, sections.length, true);
  view.setUint16(peOffset + 20, OPTIONAL_HEADER_SIZE, true);

  layout.forEach((section, i) => {
    const entry = sectionTable + i * 40;
    image.set(ascii(section.name), entry);
    view.setUint32(entry + 8, section.data.length, true);
    view.setUint32(entry + 12, 0x1000 * (i + 1), true);
    view.setUint32(entry + 16, section.rawSize, true);
    view.setUint32(entry + 20, section.rawOffset, true);
    image.set(section.data, section.rawOffset);
  });

  return image;
}

export function rcpScript(resourceId: number, body: string[]): string {
  return [
    '#include "AEConfig.h"',
    '',
    `${resourceId} PiPL DISCARDABLE`,
    'BEGIN',
    ...body.map(line => `\t${line}`),
    'END',
    ''
  ].join('\n');
}
