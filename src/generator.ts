// Descriptor, Rez-style listing and summary built from canonical properties

import { AE_OUT_FLAGS, AE_OUT_FLAGS_2 } from './aeflags.js';
import type { IParseContext } from './context.js';
import {
  decodeEffectVersion,
  decodeFlags,
  encodeEffectVersion,
  decodeKind,
  decodeStringDetailed,
  decodeVersionPair,
  decodeWord,
  formatEffectVersion,
  formatHex32,
  NO_FLAGS
} from './decode.js';
import { DecodeAmbiguityWarning, PiplError } from './errors.js';
import { Base16Converter, labelFor, quoteRez, standardConverters } from './resconverters.js';
import { sanitizeTypeName } from './textio.js';
import type {
  CanonicalProperty,
  CanonicalTag,
  EffectVersion,
  EntryPoints,
  PiplResourceHeader,
  PiplSummary,
  PluginDescriptor,
  PropertyConverter,
  VersionPair
} from './types.js';
import { Stage } from './types.js';

export const DEFAULT_RESOURCE_ID = 16000;

type DescriptorDraft = { -readonly [K in keyof PluginDescriptor]: PluginDescriptor[K] };

const ENTRY_POINT_FIELDS: ReadonlyMap<CanonicalTag, keyof EntryPoints> = new Map<CanonicalTag, keyof EntryPoints>([
  ['win64-entry', 'win64'],
  ['mac-intel64-entry', 'macIntel64'],
  ['mac-arm64-entry', 'macArm64'],
]);

/**
 * Folds properties into a descriptor. When a tag repeats, the first
 * occurrence wins. Payloads too short for their tag leave the field unset.
 */
export function buildDescriptor(properties: readonly CanonicalProperty[], context?: IParseContext): PluginDescriptor {
  const entryPoints: EntryPoints = {};
  const draft: DescriptorDraft = { entryPoints };
  const seen = new Set<CanonicalTag>();

  const ambiguous = (property: CanonicalProperty, detail: string) =>
    context?.report(new DecodeAmbiguityWarning(
      `'${sanitizeTypeName(property.originalTag)}' at ${property.offset}: ${detail}`
    ));

  const text = (property: CanonicalProperty): string => {
    const decoded = decodeStringDetailed(property.payload);
    if (decoded.value.includes('\uFFFD')) {
      ambiguous(property, 'string is not valid UTF-8, undecodable bytes replaced');
    }
    return decoded.value;
  };

  const word = (property: CanonicalProperty): number | undefined => {
    const value = decodeWord(property.payload);
    if (value === undefined) {
      ambiguous(property, `expected 4 bytes, got ${property.length}; value skipped`);
    }
    return value;
  };

  const versionPair = (property: CanonicalProperty): VersionPair => {
    if (property.length < 4) {
      ambiguous(property, `expected 4 bytes, got ${property.length}; read as 0.0`);
    }
    return Object.freeze(decodeVersionPair(property.payload));
  };

  for (const property of properties) {
    if (property.unknown || seen.has(property.tag)) {
      continue;
    }
    seen.add(property.tag);

    const entryField = ENTRY_POINT_FIELDS.get(property.tag);
    if (entryField) {
      entryPoints[entryField] = text(property);
      continue;
    }

    switch (property.tag) {
      case 'kind':
        if (property.length < 4) {
          ambiguous(property, `expected 4 bytes, got ${property.length}; value skipped`);
        } else {
          draft.kind = decodeKind(property.payload);
        }
        break;
      case 'name':
        draft.name = text(property);
        break;
      case 'catg':
        draft.category = text(property);
        break;
      case 'unique-id':
        draft.uniqueId = text(property);
        break;
      case 'pipl-version':
        draft.piplVersion = versionPair(property);
        break;
      case 'spec-version':
        draft.specVersion = versionPair(property);
        break;
      case 'effect-version': {
        const raw = word(property);
        if (raw !== undefined) {
          draft.effectVersionRaw = raw;
          draft.effectVersion = Object.freeze(decodeEffectVersion(raw, 'bit-packed'));
        }
        break;
      }
      case 'info-flags':
        draft.infoFlags = word(property);
        break;
      case 'global-flags': {
        const raw = word(property);
        if (raw !== undefined) {
          draft.globalFlags = Object.freeze(decodeFlags(raw, AE_OUT_FLAGS));
        }
        break;
      }
      case 'global-flags-2': {
        const raw = word(property);
        if (raw !== undefined) {
          draft.globalFlags2 = Object.freeze(decodeFlags(raw, AE_OUT_FLAGS_2));
        }
        break;
      }
      case 'reserved':
        draft.reserved = word(property);
        break;
    }
  }

  Object.freeze(entryPoints);
  return Object.freeze(draft);
}

function renderValue(property: CanonicalProperty, converter: PropertyConverter | undefined): string {
  const hex = new Base16Converter();
  if (!converter) {
    return hex.toRez(hex.unpack(property));
  }

  try {
    return converter.toRez(converter.unpack(property));
  } catch (error) {
    if (!(error instanceof PiplError)) {
      throw error;
    }
    return `${hex.toRez(hex.unpack(property))} /* ${error.message} */`;
  }
}

/**
 * Rez source for one PiPL resource. Entries keep parse order and carry their
 * 1-based index in a leading comment.
 */
export function renderListing(
  properties: readonly CanonicalProperty[],
  resource: number | PiplResourceHeader = DEFAULT_RESOURCE_ID,
  converters: ReadonlyMap<CanonicalTag, PropertyConverter> = standardConverters
): string {
  const { id, name } = typeof resource === 'number' ? { id: resource, name: undefined } : resource;
  const header = name === undefined ? `${id}` : `${id}, ${quoteRez(name)}`;
  const lines = [`resource 'PiPL' (${header}) {`, '\t{'];

  properties.forEach((property, i) => {
    const label = labelFor(property, converters);
    const value = renderValue(property, converters.get(property.tag));
    lines.push(`\t\t/* [${i + 1}] */ ${label} { ${value} },`);
  });

  lines.push('\t}', '};');
  return lines.join('\n') + '\n';
}

function formatVersionPair(pair: VersionPair | undefined): string | undefined {
  return pair ? `${pair.major}.${pair.minor}` : undefined;
}

/** Aggregate view; the effect version here reads the place-value layout. */
export function buildSummary(properties: readonly CanonicalProperty[], descriptor: PluginDescriptor): PiplSummary {
  const propertyTypes: Record<string, number> = {};
  const unknownTags: string[] = [];

  for (const property of properties) {
    propertyTypes[property.tag] = (propertyTypes[property.tag] ?? 0) + 1;
    if (property.unknown) {
      const code = sanitizeTypeName(property.fourcc);
      if (!unknownTags.includes(code)) {
        unknownTags.push(code);
      }
    }
  }

  const raw = descriptor.effectVersionRaw;
  const placeValue: EffectVersion | undefined = raw === undefined ? undefined : decodeEffectVersion(raw, 'place-value');

  return Object.freeze({
    pluginName: descriptor.name,
    category: descriptor.category,
    uniqueId: descriptor.uniqueId,
    entryPoints: descriptor.entryPoints,
    totalProperties: properties.length,
    propertyTypes: Object.freeze(propertyTypes),
    effectVersion: placeValue ? formatEffectVersion(placeValue) : undefined,
    effectVersionRaw: raw,
    piplVersion: formatVersionPair(descriptor.piplVersion),
    specVersion: formatVersionPair(descriptor.specVersion),
    globalFlags: descriptor.globalFlags,
    globalFlags2: descriptor.globalFlags2,
    unknownTags: Object.freeze(unknownTags),
  });
}

export function renderSummary(summary: PiplSummary): string {
  const rows: Array<[string, string | undefined]> = [
    ['Plugin name', summary.pluginName],
    ['Category', summary.category],
    ['Match name', summary.uniqueId],
    ['Win64 entry', summary.entryPoints.win64],
    ['Mac Intel entry', summary.entryPoints.macIntel64],
    ['Mac ARM entry', summary.entryPoints.macArm64],
    ['PiPL version', summary.piplVersion],
    ['Spec version', summary.specVersion],
    [
      'Effect version',
      summary.effectVersion === undefined || summary.effectVersionRaw === undefined
        ? undefined
        : `${summary.effectVersion} [${formatHex32(summary.effectVersionRaw)}]`
    ],
    ['Global flags', summary.globalFlags?.join(', ')],
    ['Global flags 2', summary.globalFlags2?.join(', ')],
  ];

  const counts = Object.entries(summary.propertyTypes).map(([tag, count]) => `${tag} ${count}`);
  rows.push(['Properties', `${summary.totalProperties}${counts.length ? ` (${counts.join(', ')})` : ''}`]);
  if (summary.unknownTags.length) {
    rows.push(['Unknown tags', summary.unknownTags.join(', ')]);
  }

  return rows
    .filter((row): row is [string, string] => row[1] !== undefined)
    .map(([label, value]) => `${`${label}:`.padEnd(16)}${value}`)
    .join('\n') + '\n';
}

const CONFIG_DEFAULTS = {
  name: 'Unknown Plugin',
  category: 'Utility',
  uniqueId: 'UNKNOWN',
  version: { major: 1, minor: 0, bugfix: 0, stage: Stage.Develop, build: 1 }
} as const;

const STAGE_MACROS: Readonly<Record<Stage, string>> = {
  [Stage.Develop]: 'PF_Stage_DEVELOP',
  [Stage.Alpha]: 'PF_Stage_ALPHA',
  [Stage.Beta]: 'PF_Stage_BETA',
  [Stage.Release]: 'PF_Stage_RELEASE',
};

function flagsDefine(macro: string, names: readonly string[] | undefined): string[] {
  const set = (names ?? []).filter(name => name !== NO_FLAGS);
  if (set.length === 0) {
    return [];
  }
  return [
    '',
    `#define ${macro} ( \\`,
    ...set.map((name, i) => `\t${name}${i === set.length - 1 ? ' )' : ' + \\'}`),
  ];
}

/**
 * Reconstructs the plug-in's `Config.h` defines. The version macros come from
 * the place-value reading of the effect version; missing values fall back to
 * the SDK template defaults.
 */
export function renderConfigHeader(summary: PiplSummary): string {
  const raw = summary.effectVersionRaw;
  const version: EffectVersion = raw === undefined
    ? CONFIG_DEFAULTS.version
    : decodeEffectVersion(raw, 'place-value');

  const entries: Array<[string, string | undefined]> = [
    ['Windows 64-bit', summary.entryPoints.win64],
    ['macOS Intel 64-bit', summary.entryPoints.macIntel64],
    ['macOS ARM 64-bit', summary.entryPoints.macArm64],
  ];

  const lines = [
    '// Plug-in information',
    `#define FX_NAME ${quoteRez(summary.pluginName ?? CONFIG_DEFAULTS.name)}`,
    `#define FX_CATEGORY ${quoteRez(summary.category ?? CONFIG_DEFAULTS.category)}`,
    `#define FX_UNIQUEID ${quoteRez(summary.uniqueId ?? CONFIG_DEFAULTS.uniqueId)}`,
    '',
    '// Version information',
    `#define MAJOR_VERSION ${version.major}`,
    `#define MINOR_VERSION ${version.minor}`,
    `#define BUG_VERSION ${version.bugfix}`,
    `#define STAGE_VERSION ${version.stage} // ${STAGE_MACROS[version.stage]}`,
    `#define BUILD_VERSION ${version.build}`,
    '',
    `#define RESSOURCEVERSION ${encodeEffectVersion(version, 'place-value')}`,
  ];

  const known = entries.filter((entry): entry is [string, string] => entry[1] !== undefined);
  if (known.length) {
    lines.push('', '// Entry points', ...known.map(([platform, symbol]) => `// ${platform}: ${quoteRez(symbol)}`));
  }

  lines.push(
    ...flagsDefine('FX_OUT_FLAGS', summary.globalFlags),
    ...flagsDefine('FX_OUT_FLAGS2', summary.globalFlags2)
  );

  return lines.join('\n') + '\n';
}
