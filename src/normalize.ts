// Tag canonicalization and payload byte-order fix-up

import { reverseFourCC } from './textio.js';
import type { CanonicalProperty, FourCC, KnownTag, RawProperty } from './types.js';

// [stored form, canonical form]
const ALIAS_PAIRS: ReadonlyArray<readonly [FourCC, FourCC]> = [
  ['dnik', 'kind'],
  ['eman', 'name'],
  ['gtac', 'catg'],
  ['4668', '8664'],
  ['46im', 'mi64'],
  ['46am', 'ma64'],
  ['ANMe', 'eMNA'],
  ['RVPe', 'ePVR'],
  ['RVSe', 'eSVR'],
  ['REVe', 'eVER'],
  ['FNIe', 'eINF'],
  ['OLGe', 'eGLO'],
  ['2LGe', 'eGL2'],
  ['LFea', 'aeFL'],
];

export const TAG_ALIASES: ReadonlyMap<FourCC, FourCC> = new Map(ALIAS_PAIRS);

export const STORED_FORMS: ReadonlyMap<FourCC, FourCC> = new Map(
  ALIAS_PAIRS.map(([stored, canonical]) => [canonical, stored] as const)
);

export const CANONICAL_FOURCC: ReadonlyMap<FourCC, KnownTag> = new Map<FourCC, KnownTag>([
  ['kind', 'kind'],
  ['name', 'name'],
  ['catg', 'catg'],
  ['eMNA', 'unique-id'],
  ['8664', 'win64-entry'],
  ['mi64', 'mac-intel64-entry'],
  ['ma64', 'mac-arm64-entry'],
  ['ePVR', 'pipl-version'],
  ['eSVR', 'spec-version'],
  ['eVER', 'effect-version'],
  ['eINF', 'info-flags'],
  ['eGLO', 'global-flags'],
  ['eGL2', 'global-flags-2'],
  ['aeFL', 'reserved'],
]);

// Payloads stored little-endian in PE resources
const VERSION_PAIR_TAGS: ReadonlySet<KnownTag> = new Set<KnownTag>(['pipl-version', 'spec-version']);
const WORD_TAGS: ReadonlySet<KnownTag> = new Set<KnownTag>([
  'effect-version',
  'info-flags',
  'global-flags',
  'global-flags-2',
  'reserved',
]);

export function resolveTag(code: FourCC): { fourcc: FourCC; tag: KnownTag } | undefined {
  const canonical = CANONICAL_FOURCC.has(code) ? code : TAG_ALIASES.get(code);
  if (canonical === undefined) {
    return undefined;
  }
  const tag = CANONICAL_FOURCC.get(canonical);
  return tag === undefined ? undefined : { fourcc: canonical, tag };
}

/**
 * Little-endian numeric payload → big-endian. Only the leading words move;
 * strings, entry points and short payloads come back unchanged.
 */
export function toBigEndian(tag: KnownTag, payload: Uint8Array): Uint8Array {
  if (payload.length < 4) {
    return payload;
  }

  let head: number[];
  if (VERSION_PAIR_TAGS.has(tag)) {
    head = [payload[1], payload[0], payload[3], payload[2]];
  } else if (WORD_TAGS.has(tag)) {
    head = [payload[3], payload[2], payload[1], payload[0]];
  } else {
    return payload;
  }

  const swapped = new Uint8Array(payload.length);
  swapped.set(payload);
  swapped.set(head, 0);
  return swapped;
}

export function normalizeProperty(raw: RawProperty): CanonicalProperty {
  // PE resources store the code byte-reversed; the stored form is tried second
  const candidates = raw.source === 'pe' ? [reverseFourCC(raw.typeTag), raw.typeTag] : [raw.typeTag];

  for (const candidate of candidates) {
    const resolved = resolveTag(candidate);
    if (!resolved) {
      continue;
    }
    const payload = raw.source === 'pe' ? toBigEndian(resolved.tag, raw.payload) : raw.payload;
    const property: CanonicalProperty = {
      tag: resolved.tag,
      fourcc: resolved.fourcc,
      originalTag: raw.typeTag,
      payload,
      length: payload.length,
      source: raw.source,
      offset: raw.offset,
      unknown: false
    };
    return Object.freeze(property);
  }

  const property: CanonicalProperty = {
    tag: 'unknown',
    fourcc: raw.typeTag,
    originalTag: raw.typeTag,
    payload: raw.payload,
    length: raw.payload.length,
    source: raw.source,
    offset: raw.offset,
    unknown: true
  };
  return Object.freeze(property);
}

export function normalizeProperties(raw: readonly RawProperty[]): CanonicalProperty[] {
  return raw.map(normalizeProperty);
}
