// Utilities for FourCC codes and type name display

import type { FourCC } from './types.js';

export function fourccFromBytes(restype: Uint8Array): FourCC {
  if (restype.length !== 4) {
    throw new Error(`restype isn't 4 bytes`);
  }
  return String.fromCharCode(...restype);
}

/** Inverse of {@link fourccFromBytes}; each char contributes its low byte. */
export function fourccToBytes(code: FourCC): Uint8Array {
  const result = new Uint8Array(code.length);
  for (let i = 0; i < code.length; i++) {
    result[i] = code.charCodeAt(i) & 0xFF;
  }
  return result;
}

export function reverseFourCC(code: FourCC): FourCC {
  return Array.from(code).reverse().join('');
}

/** Printable form of a type code: non-printable bytes become `%XX`. */
export function sanitizeTypeName(restype: Uint8Array | FourCC): string {
  const bytes = typeof restype === 'string' ? fourccToBytes(restype) : restype;

  let result = '';
  for (const byte of bytes) {
    if (byte >= 32 && byte <= 126 && byte !== 0x25) { // printable ASCII except '%'
      result += String.fromCharCode(byte);
    } else {
      result += `%${byte.toString(16).toUpperCase().padStart(2, '0')}`;
    }
  }

  // Remove trailing spaces but keep them if they're all spaces
  if (!isAllSpaces(bytes)) {
    result = result.replace(/ +$/, '');
  }

  return result;
}

function isAllSpaces(data: Uint8Array): boolean {
  return data.every(byte => byte === 0x20);
}

export function toHex(data: Uint8Array): string {
  return Array.from(data)
    .map(byte => byte.toString(16).padStart(2, '0'))
    .join('')
    .toUpperCase();
}
