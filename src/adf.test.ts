// Unit tests for AppleSingle/AppleDouble unwrapping

import { describe, it, expect } from 'vitest';
import { buildResourceFork, piplBody, text, wrapAppleDouble } from './__fixtures__/builders.js';
import { ADF_ENTRYNUM_RESOURCEFORK, NotADFError, isAdf, unpackAdf } from './adf.js';
import { StructuralBoundsError } from './errors.js';

describe('AppleDouble', () => {
  const fork = buildResourceFork([{ type: 'PiPL', id: 16000, data: piplBody([['kind', text('eFKT')]]) }]);

  it('should extract the resource fork entry', () => {
    const adf = wrapAppleDouble(fork);
    expect(isAdf(adf)).toBe(true);
    expect(isAdf(fork)).toBe(false);

    const entry = unpackAdf(adf).get(ADF_ENTRYNUM_RESOURCEFORK);
    expect(entry && Array.from(entry)).toEqual(Array.from(fork));
  });

  it('should accept AppleSingle files', () => {
    const single = wrapAppleDouble(fork, 0x00051600);
    expect(isAdf(single)).toBe(true);
    expect(unpackAdf(single).get(ADF_ENTRYNUM_RESOURCEFORK)?.length).toBe(fork.length);
  });

  it('should throw NotADFError for other data', () => {
    expect(() => unpackAdf(fork)).toThrow(NotADFError);
  });

  it('should throw StructuralBoundsError for a truncated entry', () => {
    expect(() => unpackAdf(wrapAppleDouble(fork).subarray(0, 50))).toThrow(StructuralBoundsError);
  });
});
