// Resource-compiler script (.rcp) PiPL block parsing

import { createParseContext, type IParseContext } from './context.js';
import { DecodeAmbiguityWarning, PropertyValidationError } from './errors.js';
import { makeRawProperty } from './records.js';
import { fourccFromBytes } from './textio.js';
import type { ContainerParseResult, FourCC, RawProperty } from './types.js';

export interface ScriptField {
  text: string;
  line: number;
}

export interface PiplBlock {
  resourceId: number;
  fields: ScriptField[];
}

const PROPERTY_SIGNATURE = '"MIB8"';
const BLOCK_HEADER = /(\d+)\s+PiPL\s+DISCARDABLE\s+BEGIN\b/;
const ZERO_ID = /^RSCS32\(\s*0+\s*\)$/;
const LEGACY_ZERO_ID = /^0+[lL]$/;
const LENGTH = /^RSCS32\(\s*(\d+)\s*\)$|^(\d+)[lL]?$/;
const HEX_TAG = /^0[xX]([0-9a-fA-F]{1,8})[lL]?$/;
const NUMBER = /^([+-]?)(0[xX][0-9a-fA-F]+|\d+)[lLuU]*$/;
const QUOTED = /^"(.*)"$/s;

/** Strict UTF-8 first; text that isn't valid UTF-8 is read as Latin-1. */
export function decodeScriptText(data: Uint8Array | string): string {
  if (typeof data === 'string') {
    return data;
  }
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(data);
  } catch (error) {
    if (error instanceof TypeError) {
      return new TextDecoder('latin1').decode(data);
    }
    throw error;
  }
}

/** Removes comments outside string literals. Newlines survive so line numbers stay put. */
export function stripComments(text: string): string {
  let result = '';
  let inString = false;

  for (let i = 0; i < text.length; i++) {
    const c = text[i];
    const next = text[i + 1];

    if (inString) {
      result += c;
      if (c === '\\' && next !== undefined) {
        result += next;
        i++;
      } else if (c === '"') {
        inString = false;
      }
      continue;
    }

    if (c === '/' && next === '*') {
      const close = text.indexOf('*/', i + 2);
      const end = close === -1 ? text.length : close + 2;
      result += text.slice(i, end).replace(/[^\n]/g, '');
      i = end - 1;
      continue;
    }
    if (c === '/' && next === '/') {
      const newline = text.indexOf('\n', i);
      i = (newline === -1 ? text.length : newline) - 1;
      continue;
    }

    if (c === '"') {
      inString = true;
    }
    result += c;
  }

  return result;
}

/** Top-level comma/newline separated fields, up to the closing `END`. */
export function tokenizeBody(text: string, start: number, startLine: number): ScriptField[] {
  const fields: ScriptField[] = [];
  let line = startLine;
  let current = '';
  let inString = false;

  const flush = (): boolean => {
    const trimmed = current.trim();
    current = '';
    if (trimmed === 'END') {
      return true;
    }
    if (trimmed) {
      fields.push({ text: trimmed, line });
    }
    return false;
  };

  for (let i = start; i < text.length; i++) {
    const c = text[i];

    if (inString) {
      current += c;
      if (c === '\\' && i + 1 < text.length && text[i + 1] !== '\n') {
        current += text[++i];
      } else if (c === '"') {
        inString = false;
      }
      continue;
    }

    if (c === '"') {
      inString = true;
      current += c;
    } else if (c === ',') {
      if (flush()) {
        return fields;
      }
    } else if (c === '\n') {
      if (flush()) {
        return fields;
      }
      line++;
    } else {
      current += c;
    }
  }

  flush();
  return fields;
}

export function findPiplBlock(text: string): PiplBlock | null {
  const clean = stripComments(text);
  const match = BLOCK_HEADER.exec(clean);
  if (!match) {
    return null;
  }

  const bodyStart = match.index + match[0].length;
  const startLine = clean.slice(0, bodyStart).split('\n').length;

  return {
    resourceId: parseInt(match[1], 10),
    fields: tokenizeBody(clean, bodyStart, startLine)
  };
}

/** Bytes of a C string literal body: `\xHH`, `\0`, `\\` and `\"` escapes, UTF-8 elsewhere. */
export function decodeStringLiteral(inner: string): Uint8Array {
  const encoder = new TextEncoder();
  const bytes: number[] = [];
  let plain = '';

  const flushPlain = () => {
    if (plain) {
      bytes.push(...encoder.encode(plain));
      plain = '';
    }
  };

  for (let i = 0; i < inner.length; i++) {
    const c = inner[i];
    if (c !== '\\' || i + 1 >= inner.length) {
      plain += c;
      continue;
    }

    const next = inner[i + 1];
    const hex = inner.slice(i + 2, i + 4);
    if (next === 'x' && /^[0-9a-fA-F]{2}$/.test(hex)) {
      flushPlain();
      bytes.push(parseInt(hex, 16));
      i += 3;
    } else if (next === '0') {
      flushPlain();
      bytes.push(0);
      i += 1;
    } else if (next === '\\' || next === '"') {
      plain += next;
      i += 1;
    } else {
      plain += c;
    }
  }

  flushPlain();
  return Uint8Array.from(bytes);
}

function parseNumber(text: string): number | undefined {
  const match = NUMBER.exec(text);
  if (!match) {
    return undefined;
  }
  const magnitude = parseInt(match[2], match[2].toLowerCase().startsWith('0x') ? 16 : 10);
  return match[1] === '-' ? -magnitude : magnitude;
}

export interface DecodedData {
  data: Uint8Array;
  /** The item was neither quoted text nor numbers and is kept as its text. */
  raw: boolean;
  /** A number did not fit its field width and was masked. */
  truncated: boolean;
}

function fitsWidth(value: number, bits: 16 | 32): boolean {
  const limit = 2 ** bits;
  return value >= -(limit / 2) && value < limit;
}

/** Turns one data item into payload bytes. */
export function decodeDataFields(fields: readonly string[]): DecodedData {
  const quoted = fields.map(field => QUOTED.exec(field));
  if (fields.length > 0 && quoted.every(match => match !== null)) {
    const parts = quoted.map(match => decodeStringLiteral(match?.[1] ?? ''));
    const data = new Uint8Array(parts.reduce((sum, part) => sum + part.length, 0));
    let pos = 0;
    for (const part of parts) {
      data.set(part, pos);
      pos += part.length;
    }
    return { data, raw: false, truncated: false };
  }

  const values = fields.map(parseNumber);
  const numbers = values.filter((value): value is number => value !== undefined);
  if (fields.length > 0 && numbers.length === fields.length) {
    if (numbers.length === 2) {
      const data = new Uint8Array(4);
      const view = new DataView(data.buffer);
      view.setUint16(0, numbers[0] & 0xFFFF, false);
      view.setUint16(2, numbers[1] & 0xFFFF, false);
      return { data, raw: false, truncated: !numbers.every(value => fitsWidth(value, 16)) };
    }

    const data = new Uint8Array(numbers.length * 4);
    const view = new DataView(data.buffer);
    numbers.forEach((value, i) => view.setUint32(i * 4, value >>> 0, false));
    return { data, raw: false, truncated: !numbers.every(value => fitsWidth(value, 32)) };
  }

  return { data: new TextEncoder().encode(fields.join(', ')), raw: true, truncated: false };
}

function parseTag(text: string): FourCC | undefined {
  const quoted = QUOTED.exec(text);
  if (quoted) {
    const bytes = decodeStringLiteral(quoted[1]);
    return bytes.length >= 4 ? fourccFromBytes(bytes.subarray(0, 4)) : String.fromCharCode(...bytes);
  }

  const hex = HEX_TAG.exec(text);
  if (hex) {
    const bytes = new Uint8Array(4);
    new DataView(bytes.buffer).setUint32(0, parseInt(hex[1], 16), false);
    return fourccFromBytes(bytes);
  }

  return undefined;
}

function parseLength(text: string): number | undefined {
  const match = LENGTH.exec(text);
  if (!match) {
    return undefined;
  }
  return parseInt(match[1] ?? match[2], 10);
}

export class RcpParser {
  static fromText(input: Uint8Array | string, context: IParseContext = createParseContext()): ContainerParseResult {
    const block = findPiplBlock(decodeScriptText(input));
    if (!block) {
      context.log.debug('no "<id> PiPL DISCARDABLE BEGIN" block found');
      return { properties: [], resources: [] };
    }

    return {
      properties: RcpParser.parseFields(block.fields, context),
      resources: [{ id: block.resourceId }]
    };
  }

  static parseFields(fields: readonly ScriptField[], context: IParseContext): RawProperty[] {
    const properties: RawProperty[] = [];
    const isZeroId = (i: number, legacy: boolean) =>
      i < fields.length && (ZERO_ID.test(fields[i].text) || (legacy && LEGACY_ZERO_ID.test(fields[i].text)));

    let i = 0;
    while (i < fields.length) {
      if (fields[i].text !== PROPERTY_SIGNATURE) {
        i++;
        continue;
      }

      const line = fields[i].line;
      i++;
      while (isZeroId(i, false)) i++;

      const typeTag = i < fields.length ? parseTag(fields[i].text) : undefined;
      if (typeTag === undefined) {
        context.report(new PropertyValidationError(`MIB8 on line ${line} has no type tag`, line));
        continue;
      }
      i++;
      while (isZeroId(i, true)) i++;

      const declared = i < fields.length ? parseLength(fields[i].text) : undefined;
      if (declared === undefined) {
        context.report(new PropertyValidationError(`MIB8 '${typeTag}' on line ${line} has no length`, line));
        continue;
      }
      i++;
      while (isZeroId(i, false)) i++;

      if (i >= fields.length || fields[i].text === PROPERTY_SIGNATURE) {
        context.report(new PropertyValidationError(`MIB8 '${typeTag}' on line ${line} has no data`, line));
        continue;
      }

      const dataLine = fields[i].line;
      const dataFields: string[] = [];
      while (i < fields.length && fields[i].line === dataLine && fields[i].text !== PROPERTY_SIGNATURE) {
        dataFields.push(fields[i].text);
        i++;
      }

      const { data, raw, truncated } = decodeDataFields(dataFields);
      if (raw) {
        context.report(new DecodeAmbiguityWarning(
          `data for '${typeTag}' on line ${dataLine} is neither a string nor numbers; kept as text`
        ));
      }
      if (truncated) {
        context.report(new DecodeAmbiguityWarning(
          `data for '${typeTag}' on line ${dataLine} has a number wider than its field; masked`
        ));
      }
      if (data.length !== declared) {
        context.log.debug(`'${typeTag}' on line ${line}: script says ${declared} bytes, data has ${data.length}`);
      }

      properties.push(makeRawProperty(typeTag, data, 'rcp', line));
    }

    return properties;
  }
}
