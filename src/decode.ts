// Payload decoders for PiPL property values

import { PLUGIN_KINDS, type FlagTable } from './aeflags.js';
import { reverseFourCC, sanitizeTypeName } from './textio.js';
import { Stage, type EffectVersion, type EffectVersionLayout, type VersionPair } from './types.js';

export const NO_FLAGS = 'none';

export type StringForm = 'pascal' | 'cstring' | 'raw';

export interface DecodedString {
  value: string;
  form: StringForm;
}

const utf8 = new TextDecoder('utf-8');

/**
 * Pascal string when the length byte fits the payload, else a C string up to
 * the first NUL, else every byte. Invalid UTF-8 becomes U+FFFD.
 */
export function decodeStringDetailed(payload: Uint8Array): DecodedString {
  if (payload.length > 1 && payload[0] > 0 && payload[0] <= payload.length - 1) {
    return { value: utf8.decode(payload.subarray(1, 1 + payload[0])), form: 'pascal' };
  }

  const nul = payload.indexOf(0);
  if (nul !== -1) {
    return { value: utf8.decode(payload.subarray(0, nul)), form: 'cstring' };
  }

  return { value: utf8.decode(payload), form: 'raw' };
}

export function decodeString(payload: Uint8Array): string {
  return decodeStringDetailed(payload).value;
}

export function decodeWord(payload: Uint8Array): number | undefined {
  if (payload.length < 4) {
    return undefined;
  }
  return new DataView(payload.buffer, payload.byteOffset, 4).getUint32(0, false);
}

export function decodeVersionPair(payload: Uint8Array): VersionPair {
  if (payload.length < 4) {
    return { major: 0, minor: 0 };
  }
  const view = new DataView(payload.buffer, payload.byteOffset, 4);
  return { major: view.getUint16(0, false), minor: view.getUint16(2, false) };
}

function toStage(value: number): Stage {
  switch (value) {
    case Stage.Alpha: return Stage.Alpha;
    case Stage.Beta: return Stage.Beta;
    case Stage.Release: return Stage.Release;
    default: return Stage.Develop;
  }
}

/**
 * bit-packed:  major[26:30)<<3 | major[19:22), minor[15:19), bugfix[11:15), stage[9:11), build[0:9)
 * place-value: major*524288 + minor*32768 + bugfix*2048 + stage*512 + build
 */
export function decodeEffectVersion(word: number, layout: EffectVersionLayout): EffectVersion {
  const value = word >>> 0;

  if (layout === 'bit-packed') {
    return {
      major: (((value >>> 26) & 0xF) << 3) | ((value >>> 19) & 0x7),
      minor: (value >>> 15) & 0xF,
      bugfix: (value >>> 11) & 0xF,
      stage: toStage((value >>> 9) & 0x3),
      build: value & 0x1FF
    };
  }

  let rest = value;
  const major = Math.floor(rest / 524288);
  rest %= 524288;
  const minor = Math.floor(rest / 32768);
  rest %= 32768;
  const bugfix = Math.floor(rest / 2048);
  rest %= 2048;
  const stage = toStage(Math.floor(rest / 512));
  return { major, minor, bugfix, stage, build: rest % 512 };
}

/** Inverse of {@link decodeEffectVersion}; fields are masked to their widths. */
export function encodeEffectVersion(version: EffectVersion, layout: EffectVersionLayout): number {
  const minor = version.minor & 0xF;
  const bugfix = version.bugfix & 0xF;
  const stage = version.stage & 0x3;
  const build = version.build & 0x1FF;

  if (layout === 'bit-packed') {
    const major = version.major & 0x7F;
    return (
      (((major >>> 3) & 0xF) << 26) |
      ((major & 0x7) << 19) |
      (minor << 15) |
      (bugfix << 11) |
      (stage << 9) |
      build
    ) >>> 0;
  }

  return version.major * 524288 + minor * 32768 + bugfix * 2048 + stage * 512 + build;
}

export function formatEffectVersion(version: EffectVersion): string {
  return `${version.major}.${version.minor}.${version.bugfix} ${Stage[version.stage]} (Build ${version.build})`;
}

export function formatHex32(value: number): string {
  return `0x${(value >>> 0).toString(16).toUpperCase().padStart(8, '0')}`;
}

export function decodeFlags(value: number, table: FlagTable): string[] {
  const bits = value >>> 0;
  if (bits === 0) {
    return [NO_FLAGS];
  }

  const names: string[] = [];
  for (let bit = 0; bit < 32; bit++) {
    const mask = (1 << bit) >>> 0;
    if ((bits & mask) !== 0) {
      names.push(table.get(mask) ?? formatHex32(mask));
    }
  }
  return names;
}

/** Plug-in kind name; codes stored byte-reversed are recognised too. */
export function decodeKind(payload: Uint8Array): string {
  const code = sanitizeTypeName(payload.subarray(0, 4));
  return PLUGIN_KINDS.get(code) ?? PLUGIN_KINDS.get(reverseFourCC(code)) ?? code;
}
