// Unit tests for the signature-driven record scanner

import { describe, it, expect } from 'vitest';
import { concat, macRecord, text, u32be, winRecord } from './__fixtures__/builders.js';
import { createParseContext } from './context.js';
import { PropertyValidationError } from './errors.js';
import { LogLevel } from './logger.js';
import { SafeReader } from './reader.js';
import { MAC_RECORD, WIN_RECORD, scanRecords } from './records.js';

const quiet = { logLevel: LogLevel.silent };

describe('scanRecords', () => {
  it('should find 8BIM records and resume after each payload', () => {
    const data = concat([1, 2, 3], macRecord('kind', text('eFKT')), macRecord('name', text('Test')));
    const properties = scanRecords(new SafeReader(data), [MAC_RECORD], createParseContext(quiet));

    expect(properties.map(p => p.typeTag)).toEqual(['kind', 'name']);
    expect(properties.map(p => p.offset)).toEqual([3, 23]);
    expect(new TextDecoder().decode(properties[1].payload)).toBe('Test');
    expect(properties[0].declaredLength).toBe(4);
    expect(properties[0].source).toBe('rsrc');
  });

  it('should skip offsets already consumed', () => {
    const data = concat(macRecord('kind', text('eFKT')), macRecord('name', text('Test')));
    const properties = scanRecords(new SafeReader(data), [MAC_RECORD], createParseContext(quiet), {
      consumed: new Map([[0, 20]])
    });

    expect(properties.map(p => p.offset)).toEqual([20]);
  });

  it('should add the base offset to record offsets', () => {
    const data = concat([1, 2, 3], macRecord('kind', text('eFKT')));
    const properties = scanRecords(new SafeReader(data), [MAC_RECORD], createParseContext(quiet), { baseOffset: 100 });

    expect(properties.map(p => p.offset)).toEqual([103]);
  });

  it('should record a bounds diagnostic for a truncated record', () => {
    const data = concat(text('8BIMkind'), [0, 0, 0, 0], u32be(100), [1, 2]);
    const context = createParseContext(quiet);
    const properties = scanRecords(new SafeReader(data), [MAC_RECORD], context);

    expect(properties).toEqual([]);
    expect(context.diagnostics.map(issue => issue.code)).toEqual(['STRUCTURAL_BOUNDS']);
  });
});

describe('WIN_RECORD', () => {
  it('should skip zero padding before the little-endian length', () => {
    const data = concat([9, 9], winRecord('REVe', [1, 0, 0, 0]));
    const properties = scanRecords(new SafeReader(data), [WIN_RECORD], createParseContext(quiet));

    expect(properties).toHaveLength(1);
    expect(properties[0].typeTag).toBe('REVe');
    expect(properties[0].offset).toBe(2);
    expect(Array.from(properties[0].payload)).toEqual([1, 0, 0, 0]);
    expect(properties[0].source).toBe('pe');
  });

  it('should read a length that follows the tag directly', () => {
    const data = winRecord('REVe', [1, 0, 0, 0], 0);
    const properties = scanRecords(new SafeReader(data), [WIN_RECORD], createParseContext(quiet));

    expect(properties.map(p => Array.from(p.payload))).toEqual([[1, 0, 0, 0]]);
  });

  it('should reject lengths outside the configured bound', () => {
    const context = createParseContext({ ...quiet, maxWinPropertyLength: 8 });
    const properties = scanRecords(new SafeReader(winRecord('REVe', new Uint8Array(8).fill(1))), [WIN_RECORD], context);

    expect(properties).toEqual([]);
    expect(context.diagnostics).toHaveLength(1);
    expect(context.diagnostics[0]).toBeInstanceOf(PropertyValidationError);
    expect(context.diagnostics[0].message).toBe("MIB8 record 'REVe' has implausible length 8 (expected 0 < n < 8)");
  });

  it('should bound the padding lookahead', () => {
    // Stops after two zeros, so the length reads as 0x00040000
    const context = createParseContext({ ...quiet, winPaddingLookahead: 2 });
    const properties = scanRecords(new SafeReader(winRecord('REVe', [1, 0, 0, 0], 4)), [WIN_RECORD], context);

    expect(properties).toEqual([]);
    expect(context.diagnostics.map(issue => issue.code)).toEqual(['PROPERTY_VALIDATION']);
  });
});
