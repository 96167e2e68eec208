// Resource fork parsing

import { unpackAdf, NotADFError, ADF_ENTRYNUM_RESOURCEFORK } from './adf.js';
import { createParseContext, type IParseContext } from './context.js';
import { StructuralBoundsError } from './errors.js';
import { SafeReader } from './reader.js';
import { MAC_RECORD, makeRawProperty, readGuarded, scanRecords } from './records.js';
import { fourccToBytes } from './textio.js';
import type { ContainerParseResult, PiplResourceHeader, RawProperty } from './types.js';

export const PIPL_RESOURCE_TYPE = 'PiPL';

const MAP_HEADER_SIZE = 30;
const REFERENCE_SIZE = 12;
const NO_NAME = 0xFFFF;

export interface PiplResource extends PiplResourceHeader {
  readonly flags: number;
  /** Absolute offset of the first byte after the resource's length prefix. */
  payloadOffset: number;
  length: number;
}

export class ResourceForkParser {
  static fromBytes(data: Uint8Array, context: IParseContext = createParseContext()): ContainerParseResult {
    const reader = new SafeReader(ResourceForkParser.unwrap(data, context));
    const properties: RawProperty[] = [];
    const resources: PiplResourceHeader[] = [];
    const consumed = new Map<number, number>();

    if (ResourceForkParser.isPlausible(reader, context.config.minForkMapGap)) {
      try {
        for (const resource of ResourceForkParser.readPiplResources(reader, context)) {
          const { id, name, flags } = resource;
          resources.push(name === undefined ? { id, flags } : { id, name, flags });
          properties.push(...ResourceForkParser.walkPiplBody(reader, resource, consumed, context));
        }
      } catch (error) {
        if (!(error instanceof StructuralBoundsError)) {
          throw error;
        }
        context.report(error);
        context.log.info('resource map is unreadable, falling back to 8BIM scan');
      }
    } else {
      context.log.debug('resource fork header offsets are implausible, using 8BIM scan only');
    }

    // Secondary pass: picks up records outside any PiPL the map pointed at.
    properties.push(...scanRecords(reader, [MAC_RECORD], context, { consumed }));

    return { properties, resources };
  }

  /** Returns the resource fork inside an AppleSingle/AppleDouble wrapper, or `data` itself. */
  static unwrap(data: Uint8Array, context: IParseContext): Uint8Array {
    try {
      const adfResfork = unpackAdf(data).get(ADF_ENTRYNUM_RESOURCEFORK);
      if (!adfResfork) {
        context.log.debug('AppleDouble container has no resource fork entry');
        return data;
      }
      return adfResfork;
    } catch (error) {
      if (error instanceof NotADFError) {
        return data;
      }
      if (error instanceof StructuralBoundsError) {
        context.report(error);
        return data;
      }
      throw error;
    }
  }

  static isPlausible(reader: SafeReader, minGap: number): boolean {
    if (!reader.has(0, 16)) {
      return false;
    }

    const dataOffset = reader.u32be(0);
    const mapOffset = reader.u32be(4);
    const dataLength = reader.u32be(8);
    const mapLength = reader.u32be(12);

    if (dataOffset === 0 || dataOffset >= reader.length || mapOffset >= reader.length) {
      return false;
    }
    if (dataOffset + dataLength > reader.length || mapOffset + mapLength > reader.length) {
      return false;
    }
    return mapOffset > dataOffset &&
      mapOffset - dataOffset > minGap &&
      mapLength >= MAP_HEADER_SIZE;
  }

  static readPiplResources(reader: SafeReader, context: IParseContext): PiplResource[] {
    const dataOffset = reader.u32be(0);
    const mapOffset = reader.u32be(4);
    const mapLength = reader.u32be(12);

    const map = reader.sub(mapOffset, mapLength);

    // Skip copy of resource header (16 bytes), next map handle (4), file ref (2), attributes (2)
    const typeListOffsetInMap = map.u16be(24);
    const nameListOffsetInMap = map.u16be(26);

    const storedTypeCount = map.u16be(typeListOffsetInMap);
    const numTypes = storedTypeCount === 0xFFFF ? 0 : storedTypeCount + 1;

    const resources: PiplResource[] = [];
    let pos = typeListOffsetInMap + 2;

    for (let i = 0; i < numTypes; i++, pos += 8) {
      const typeName = map.fourcc(pos);
      const resourceCount = map.u16be(pos + 4) + 1;
      const resourceListOffset = map.u16be(pos + 6);

      if (typeName !== PIPL_RESOURCE_TYPE) {
        continue;
      }

      let resPos = typeListOffsetInMap + resourceListOffset;
      for (let j = 0; j < resourceCount; j++, resPos += REFERENCE_SIZE) {
        const id = map.i16be(resPos);
        const nameOffset = map.u16be(resPos + 2);
        const packedAttr = map.u32be(resPos + 4);

        const flags = (packedAttr & 0xFF000000) >>> 24;
        const actualDataOffset = dataOffset + (packedAttr & 0x00FFFFFF);

        if (!reader.has(actualDataOffset, 4)) {
          context.report(new StructuralBoundsError(actualDataOffset, 4, reader.length));
          context.log.warn(`Skipping resource ${typeName}:${id} - data offset out of bounds`);
          continue;
        }
        const length = reader.u32be(actualDataOffset);
        if (!reader.has(actualDataOffset + 4, length)) {
          context.report(new StructuralBoundsError(actualDataOffset + 4, length, reader.length));
          context.log.warn(`Skipping resource ${typeName}:${id} - data length out of bounds`);
          continue;
        }

        const name = ResourceForkParser.readName(map, nameListOffsetInMap, nameOffset);
        const location = { flags, payloadOffset: actualDataOffset + 4, length };
        resources.push(name === undefined ? { id, ...location } : { id, name, ...location });
      }
    }

    return resources;
  }

  private static readName(map: SafeReader, nameListOffset: number, nameOffset: number): string | undefined {
    if (nameOffset === NO_NAME) {
      return undefined;
    }
    const namePos = nameListOffset + nameOffset;
    if (!map.has(namePos, 1)) {
      return undefined;
    }
    const nameLength = map.u8(namePos);
    if (!map.has(namePos + 1, nameLength)) {
      return undefined;
    }
    return new TextDecoder('latin1').decode(map.bytesAt(namePos + 1, nameLength));
  }

  /**
   * A PiPL body is either bare records or `{u32 version}{u32 count}` followed by
   * records. Mac-built bodies pad each payload to 4 bytes, so the next record is
   * looked for at the aligned offset when it isn't right after the payload.
   */
  static walkPiplBody(
    reader: SafeReader,
    resource: PiplResource,
    consumed: Map<number, number>,
    context: IParseContext
  ): RawProperty[] {
    const signature = fourccToBytes(MAC_RECORD.signature);
    const properties: RawProperty[] = [];
    const body = reader.sub(resource.payloadOffset, resource.length);

    let pos = 0;
    let remaining: number | undefined;

    try {
      if (!body.matches(0, signature)) {
        remaining = body.u32be(4);
        pos = 8;
      }

      while ((remaining === undefined || remaining > 0) && body.has(pos, 16)) {
        if (!body.matches(pos, signature)) {
          const aligned = (pos + 3) & ~3;
          if (aligned === pos || !body.matches(aligned, signature)) {
            break;
          }
          pos = aligned;
        }

        const match = readGuarded(MAC_RECORD, body, pos, context);
        if (!match) {
          break;
        }

        const absolute = resource.payloadOffset + pos;
        const { typeTag, payload } = match.property;
        properties.push(makeRawProperty(typeTag, payload, 'rsrc', absolute));
        consumed.set(absolute, resource.payloadOffset + match.end);

        pos = match.end;
        if (remaining !== undefined) {
          remaining--;
        }
      }
    } catch (error) {
      if (!(error instanceof StructuralBoundsError)) {
        throw error;
      }
      context.report(error);
    }

    if (remaining !== undefined && remaining > 0) {
      context.log.debug(`PiPL ${resource.id}: ${remaining} declared properties were not found in the body`);
    }

    return properties;
  }
}
