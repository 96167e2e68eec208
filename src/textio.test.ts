// Unit tests for FourCC helpers

import { describe, it, expect } from 'vitest';
import { fourccFromBytes, fourccToBytes, reverseFourCC, sanitizeTypeName, toHex } from './textio.js';

describe('textio', () => {
  it('should convert between codes and bytes', () => {
    expect(fourccFromBytes(Uint8Array.from([0x38, 0x42, 0x49, 0x4D]))).toBe('8BIM');
    expect(Array.from(fourccToBytes('MIB8'))).toEqual([0x4D, 0x49, 0x42, 0x38]);
    expect(() => fourccFromBytes(Uint8Array.from([1, 2, 3]))).toThrow(`restype isn't 4 bytes`);
  });

  it('should reverse codes', () => {
    expect(reverseFourCC('eman')).toBe('name');
    expect(reverseFourCC('MIB8')).toBe('8BIM');
  });

  it('should escape non-printable bytes and percent signs', () => {
    expect(sanitizeTypeName(Uint8Array.from([0x61, 0x25, 0x01, 0x62]))).toBe('a%25%01b');
    expect(sanitizeTypeName('ab  ')).toBe('ab');
    expect(sanitizeTypeName('    ')).toBe('    ');
  });

  it('should hex-encode in upper case', () => {
    expect(toHex(Uint8Array.from([0x01, 0xAB, 0x00]))).toBe('01AB00');
  });
});
