// Property converters for the known PiPL tags

import { AE_OUT_FLAGS, AE_OUT_FLAGS_2, PIPL_PROPERTY_LABELS } from './aeflags.js';
import {
  decodeEffectVersion,
  decodeFlags,
  decodeKind,
  decodeString,
  decodeVersionPair,
  decodeWord,
  formatEffectVersion,
  formatHex32
} from './decode.js';
import { PiplError, PropertyValidationError } from './errors.js';
import type { FlagTable } from './aeflags.js';
import { sanitizeTypeName, toHex } from './textio.js';
import type {
  CanonicalProperty,
  CanonicalTag,
  ConvertedProperty,
  EffectVersion,
  PropertyConverter,
  VersionPair
} from './types.js';

export interface EffectVersionValue {
  raw: number;
  version: EffectVersion;
  text: string;
}

export interface FlagsValue {
  raw: number;
  names: string[];
}

function requireWord(property: CanonicalProperty): number {
  const word = decodeWord(property.payload);
  if (word === undefined) {
    throw new PropertyValidationError(
      `'${property.fourcc}' needs 4 bytes, payload has ${property.length}`,
      property.offset
    );
  }
  return word;
}

export function quoteRez(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

export class Base16Converter implements PropertyConverter<string> {
  constructor(readonly label = 'Data') {}

  unpack(property: CanonicalProperty): string {
    return toHex(property.payload);
  }

  toRez(hex: string): string {
    return `$"${hex}"`;
  }
}

export class StringConverter implements PropertyConverter<string> {
  constructor(readonly label: string) {}

  unpack(property: CanonicalProperty): string {
    return decodeString(property.payload);
  }

  toRez(value: string): string {
    return quoteRez(value);
  }
}

export class KindConverter implements PropertyConverter<string> {
  readonly label = PIPL_PROPERTY_LABELS.kind;

  unpack(property: CanonicalProperty): string {
    if (property.length < 4) {
      throw new PropertyValidationError(`kind needs 4 bytes, payload has ${property.length}`, property.offset);
    }
    return decodeKind(property.payload);
  }

  toRez(value: string): string {
    return value;
  }
}

export class VersionPairConverter implements PropertyConverter<VersionPair> {
  constructor(readonly label: string) {}

  unpack(property: CanonicalProperty): VersionPair {
    requireWord(property);
    return decodeVersionPair(property.payload);
  }

  toRez(value: VersionPair): string {
    return `${value.major}, ${value.minor}`;
  }
}

/** Listing and descriptor read the bit-packed layout. */
export class EffectVersionConverter implements PropertyConverter<EffectVersionValue> {
  readonly label = PIPL_PROPERTY_LABELS['effect-version'];

  unpack(property: CanonicalProperty): EffectVersionValue {
    const raw = requireWord(property);
    const version = decodeEffectVersion(raw, 'bit-packed');
    return { raw, version, text: formatEffectVersion(version) };
  }

  toRez(value: EffectVersionValue): string {
    return `${value.raw} /* ${value.text} */`;
  }
}

export class FlagsConverter implements PropertyConverter<FlagsValue> {
  constructor(readonly label: string, private readonly table: FlagTable) {}

  unpack(property: CanonicalProperty): FlagsValue {
    const raw = requireWord(property);
    return { raw, names: decodeFlags(raw, this.table) };
  }

  toRez(value: FlagsValue): string {
    return `${formatHex32(value.raw)} /* ${value.names.join(' | ')} */`;
  }
}

export class WordConverter implements PropertyConverter<number> {
  constructor(readonly label: string) {}

  unpack(property: CanonicalProperty): number {
    return requireWord(property);
  }

  toRez(value: number): string {
    return formatHex32(value);
  }
}

export const standardConverters: ReadonlyMap<CanonicalTag, PropertyConverter> = new Map<CanonicalTag, PropertyConverter>([
  ['kind', new KindConverter()],
  ['name', new StringConverter(PIPL_PROPERTY_LABELS.name)],
  ['catg', new StringConverter(PIPL_PROPERTY_LABELS.catg)],
  ['unique-id', new StringConverter(PIPL_PROPERTY_LABELS['unique-id'])],
  ['win64-entry', new StringConverter(PIPL_PROPERTY_LABELS['win64-entry'])],
  ['mac-intel64-entry', new StringConverter(PIPL_PROPERTY_LABELS['mac-intel64-entry'])],
  ['mac-arm64-entry', new StringConverter(PIPL_PROPERTY_LABELS['mac-arm64-entry'])],
  ['pipl-version', new VersionPairConverter(PIPL_PROPERTY_LABELS['pipl-version'])],
  ['spec-version', new VersionPairConverter(PIPL_PROPERTY_LABELS['spec-version'])],
  ['effect-version', new EffectVersionConverter()],
  ['info-flags', new WordConverter(PIPL_PROPERTY_LABELS['info-flags'])],
  ['global-flags', new FlagsConverter(PIPL_PROPERTY_LABELS['global-flags'], AE_OUT_FLAGS)],
  ['global-flags-2', new FlagsConverter(PIPL_PROPERTY_LABELS['global-flags-2'], AE_OUT_FLAGS_2)],
  ['reserved', new WordConverter(PIPL_PROPERTY_LABELS.reserved)],
]);

/** Listing keyword: the tag's label, or the quoted code for unknown tags. */
export function labelFor(property: CanonicalProperty, converters = standardConverters): string {
  const converter = converters.get(property.tag);
  return converter ? converter.label : `'${sanitizeTypeName(property.fourcc)}'`;
}

/**
 * Runs the tag's converter. Unknown tags, and payloads the converter rejects,
 * come back as base16 `data`; a rejection also sets `conversionError`.
 */
export function convertProperty(
  property: CanonicalProperty,
  index: number,
  converters: ReadonlyMap<CanonicalTag, PropertyConverter> = standardConverters
): ConvertedProperty {
  const wrapper: ConvertedProperty = {
    index,
    tag: property.tag,
    fourcc: sanitizeTypeName(property.fourcc),
    length: property.length
  };

  const converter = converters.get(property.tag);
  if (!converter) {
    wrapper.data = new Base16Converter().unpack(property);
    return wrapper;
  }

  try {
    wrapper.obj = converter.unpack(property);
  } catch (convertException) {
    if (!(convertException instanceof PiplError)) {
      throw convertException;
    }
    wrapper.conversionError = convertException.message;
    wrapper.data = new Base16Converter().unpack(property);
  }
  return wrapper;
}
