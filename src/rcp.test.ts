// Unit tests for resource-compiler script parsing

import { describe, it, expect } from 'vitest';
import { rcpScript } from './__fixtures__/builders.js';
import { createParseContext } from './context.js';
import { DecodeAmbiguityWarning, PropertyValidationError } from './errors.js';
import { LogLevel } from './logger.js';
import { decodeString } from './decode.js';
import { normalizeProperty } from './normalize.js';
import {
  RcpParser,
  decodeDataFields,
  decodeScriptText,
  decodeStringLiteral,
  findPiplBlock,
  stripComments
} from './rcp.js';

const quiet = { logLevel: LogLevel.silent };

describe('RcpParser', () => {
  it('should parse a one-line PiPL body', () => {
    const script = '16000 PiPL DISCARDABLE BEGIN "MIB8", "eman", RSCS32(0), RSCS32(5), "Test\\0", END';
    const result = RcpParser.fromText(script, createParseContext(quiet));

    expect(result.resources).toEqual([{ id: 16000 }]);
    expect(result.properties).toHaveLength(1);
    expect(result.properties[0].typeTag).toBe('eman');
    expect(Array.from(result.properties[0].payload)).toEqual([0x54, 0x65, 0x73, 0x74, 0x00]);

    const canonical = normalizeProperty(result.properties[0]);
    expect(canonical.tag).toBe('name');
    expect(decodeString(canonical.payload)).toBe('Test');
  });

  it('should parse the legacy multi-line form', () => {
    const script = rcpScript(16000, [
      '0x0001,',
      '0L,',
      '0x00000002L,',
      '"MIB8",',
      '0x646E696BL,',
      '0L,',
      '4L,',
      '"eFKT",',
      '"MIB8",',
      '"RVPe",',
      '0L,',
      '4L,',
      '2, 0,',
      '"MIB8",',
      '"OLGe",',
      '0L,',
      '4L,',
      '0x02000400L',
    ]);
    const result = RcpParser.fromText(new TextEncoder().encode(script), createParseContext(quiet));

    expect(result.properties.map(p => p.typeTag)).toEqual(['dnik', 'RVPe', 'OLGe']);
    expect(result.properties.map(p => p.offset)).toEqual([8, 13, 18]);
    expect(result.properties.map(p => Array.from(p.payload))).toEqual([
      [0x65, 0x46, 0x4B, 0x54],
      [0x00, 0x02, 0x00, 0x00],
      [0x02, 0x00, 0x04, 0x00],
    ]);
    expect(result.properties.every(p => p.source === 'rcp')).toBe(true);
  });

  it('should ignore comments between fields', () => {
    const script = '16000 PiPL DISCARDABLE BEGIN /* props */ "MIB8", "eman", // name\n RSCS32(0), RSCS32(5), "Test\\0", END';
    const result = RcpParser.fromText(script, createParseContext(quiet));

    expect(result.properties.map(p => p.typeTag)).toEqual(['eman']);
    expect(result.properties[0].offset).toBe(1);
  });

  it('should truncate long tags to four characters', () => {
    const script = '1 PiPL DISCARDABLE BEGIN "MIB8", "emanXX", RSCS32(0), RSCS32(2), "ab", END';
    expect(RcpParser.fromText(script, createParseContext(quiet)).properties[0].typeTag).toBe('eman');
  });

  it('should record a malformed property and carry on', () => {
    const script = rcpScript(16000, [
      '"MIB8", "eman", RSCS32(0), RSCS32(5),',
      '"MIB8", "dnik", RSCS32(0), RSCS32(4), "eFKT",',
      '"MIB8", RSCS32(0)',
    ]);
    const context = createParseContext(quiet);
    const result = RcpParser.fromText(script, context);

    expect(result.properties.map(p => p.typeTag)).toEqual(['dnik']);
    expect(context.diagnostics).toHaveLength(2);
    expect(context.diagnostics.every(issue => issue instanceof PropertyValidationError)).toBe(true);
    expect(context.diagnostics.map(issue => issue.message)).toEqual([
      "MIB8 'eman' on line 5 has no data",
      'MIB8 on line 7 has no type tag',
    ]);
  });

  it('should keep unrecognised data as text with a warning', () => {
    const script = '1 PiPL DISCARDABLE BEGIN "MIB8", "abcd", RSCS32(0), RSCS32(7), foo bar, END';
    const context = createParseContext(quiet);
    const result = RcpParser.fromText(script, context);

    expect(new TextDecoder().decode(result.properties[0].payload)).toBe('foo bar');
    expect(context.diagnostics).toHaveLength(1);
    expect(context.diagnostics[0]).toBeInstanceOf(DecodeAmbiguityWarning);
  });

  it('should warn when a number does not fit its field', () => {
    const script = [
      '1 PiPL DISCARDABLE BEGIN',
      '"MIB8", "RVPe", RSCS32(0), RSCS32(4), 70000, 1,',
      '"MIB8", "REVe", RSCS32(0), RSCS32(4), 0x100000001,',
      '"MIB8", "FNIe", RSCS32(0), RSCS32(4), 0xFFFFFFFF,',
      'END'
    ].join('\n');
    const context = createParseContext(quiet);
    const result = RcpParser.fromText(script, context);

    expect(result.properties.map(p => Array.from(p.payload))).toEqual([
      [0x11, 0x70, 0x00, 0x01],
      [0x00, 0x00, 0x00, 0x01],
      [0xFF, 0xFF, 0xFF, 0xFF],
    ]);
    expect(context.diagnostics.map(issue => issue.message)).toEqual([
      "data for 'RVPe' on line 2 has a number wider than its field; masked",
      "data for 'REVe' on line 3 has a number wider than its field; masked",
    ]);
  });

  it('should return no properties for a block cut off mid-property', () => {
    const context = createParseContext(quiet);
    const result = RcpParser.fromText('16000 PiPL DISCARDABLE BEGIN "MIB8", "eman"', context);

    expect(result.properties).toEqual([]);
    expect(context.diagnostics.map(issue => issue.message)).toEqual(["MIB8 'eman' on line 1 has no length"]);
  });

  it('should return nothing for random bytes', () => {
    const noise = Uint8Array.from({ length: 600 }, (_, i) => (i * 7 + 3) & 0xFF);
    expect(RcpParser.fromText(noise, createParseContext(quiet))).toEqual({ properties: [], resources: [] });
  });

  it('should return nothing when there is no PiPL block', () => {
    expect(RcpParser.fromText('STRINGTABLE BEGIN END', createParseContext(quiet))).toEqual({
      properties: [],
      resources: []
    });
  });
});

describe('script helpers', () => {
  it('should decode invalid UTF-8 as Latin-1', () => {
    expect(decodeScriptText(Uint8Array.from([0x50, 0xE9]))).toBe('Pé');
    expect(decodeScriptText(new TextEncoder().encode('Pé'))).toBe('Pé');
  });

  it('should strip comments outside string literals', () => {
    expect(stripComments('"http://x" // c\nA /* b\nc */ D')).toBe('"http://x" \nA \n D');
  });

  it('should report the resource id and field lines', () => {
    const block = findPiplBlock('x\n42 PiPL DISCARDABLE\nBEGIN\n"MIB8",\n"eman"\nEND');
    expect(block?.resourceId).toBe(42);
    expect(block?.fields).toEqual([
      { text: '"MIB8"', line: 4 },
      { text: '"eman"', line: 5 },
    ]);
  });

  it('should decode string escapes', () => {
    expect(Array.from(decodeStringLiteral('a\\x41\\0\\"\\\\'))).toEqual([0x61, 0x41, 0x00, 0x22, 0x5C]);
  });

  it('should pack numeric data by count', () => {
    expect(Array.from(decodeDataFields(['1']).data)).toEqual([0, 0, 0, 1]);
    expect(Array.from(decodeDataFields(['2', '0']).data)).toEqual([0, 2, 0, 0]);
    expect(Array.from(decodeDataFields(['-1', '2']).data)).toEqual([0xFF, 0xFF, 0, 2]);
    expect(Array.from(decodeDataFields(['1', '2', '3']).data)).toEqual([0, 0, 0, 1, 0, 0, 0, 2, 0, 0, 0, 3]);
    expect(Array.from(decodeDataFields(['0x10L']).data)).toEqual([0, 0, 0, 0x10]);
    expect(Array.from(decodeDataFields(['-1']).data)).toEqual([0xFF, 0xFF, 0xFF, 0xFF]);
  });

  it('should flag numbers masked to their field width', () => {
    expect(decodeDataFields(['65535', '-32768']).truncated).toBe(false);
    expect(decodeDataFields(['65536', '0']).truncated).toBe(true);
    expect(decodeDataFields(['-32769', '0']).truncated).toBe(true);
    expect(decodeDataFields(['4294967295']).truncated).toBe(false);
    expect(decodeDataFields(['4294967296']).truncated).toBe(true);
  });

  it('should concatenate adjacent quoted fields', () => {
    const { data, raw } = decodeDataFields(['"ab"', '"\\x43"']);
    expect(Array.from(data)).toEqual([0x61, 0x62, 0x43]);
    expect(raw).toBe(false);
  });
});
