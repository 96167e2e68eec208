// Type definitions for the PiPL extraction pipeline

import type { PiplError } from './errors.js';

export type PiplFormat = 'rsrc' | 'pe' | 'rcp';

/** Four one-byte characters, e.g. `eVER`. */
export type FourCC = string;

export interface RawProperty {
  readonly typeTag: FourCC;
  readonly payload: Uint8Array;
  /** Always equal to `payload.length`. */
  readonly declaredLength: number;
  readonly source: PiplFormat;
  /** Byte offset of the record, or the line number for script text. */
  readonly offset: number;
}

/** Identity of one PiPL resource as the container names it. */
export interface PiplResourceHeader {
  readonly id: number;
  readonly name?: string;
  /** Resource attribute byte from a fork's reference list. */
  readonly flags?: number;
}

export interface ContainerParseResult {
  readonly properties: RawProperty[];
  /** PiPL resources seen while walking the container, if it names any. */
  readonly resources: PiplResourceHeader[];
}

export const CANONICAL_TAGS = [
  'kind',
  'name',
  'catg',
  'unique-id',
  'win64-entry',
  'mac-intel64-entry',
  'mac-arm64-entry',
  'pipl-version',
  'spec-version',
  'effect-version',
  'info-flags',
  'global-flags',
  'global-flags-2',
  'reserved',
] as const;

export type KnownTag = (typeof CANONICAL_TAGS)[number];
export type CanonicalTag = KnownTag | 'unknown';

export interface CanonicalProperty {
  readonly tag: CanonicalTag;
  /** Canonical code (`eVER`), or the stored code when the tag is unknown. */
  readonly fourcc: FourCC;
  readonly originalTag: FourCC;
  readonly payload: Uint8Array;
  readonly length: number;
  readonly source: PiplFormat;
  readonly offset: number;
  readonly unknown: boolean;
}

export enum Stage {
  Develop = 0,
  Alpha = 1,
  Beta = 2,
  Release = 3,
}

export type EffectVersionLayout = 'bit-packed' | 'place-value';

export interface EffectVersion {
  major: number;
  minor: number;
  bugfix: number;
  stage: Stage;
  build: number;
}

export interface VersionPair {
  major: number;
  minor: number;
}

export interface EntryPoints {
  win64?: string;
  macIntel64?: string;
  macArm64?: string;
}

export interface PluginDescriptor {
  readonly kind?: string;
  readonly name?: string;
  readonly category?: string;
  readonly uniqueId?: string;
  readonly entryPoints: Readonly<EntryPoints>;
  readonly piplVersion?: Readonly<VersionPair>;
  readonly specVersion?: Readonly<VersionPair>;
  readonly effectVersion?: Readonly<EffectVersion>;
  readonly effectVersionRaw?: number;
  readonly infoFlags?: number;
  readonly globalFlags?: readonly string[];
  readonly globalFlags2?: readonly string[];
  readonly reserved?: number;
}

export interface PiplSummary {
  readonly pluginName?: string;
  readonly category?: string;
  readonly uniqueId?: string;
  readonly entryPoints: Readonly<EntryPoints>;
  readonly totalProperties: number;
  readonly propertyTypes: Readonly<Record<string, number>>;
  readonly effectVersion?: string;
  readonly effectVersionRaw?: number;
  readonly piplVersion?: string;
  readonly specVersion?: string;
  readonly globalFlags?: readonly string[];
  readonly globalFlags2?: readonly string[];
  readonly unknownTags: readonly string[];
}

export interface PropertyConverter<T = unknown> {
  /** Resource-script keyword used in the decompiled listing. */
  readonly label: string;
  unpack(property: CanonicalProperty): T;
  toRez(value: T): string;
}

export interface ConvertedProperty {
  index: number;
  tag: CanonicalTag;
  fourcc: FourCC;
  length: number;
  obj?: unknown;
  data?: string; // hex encoded fallback
  conversionError?: string;
}

export interface ExtractionResult {
  readonly format: PiplFormat;
  readonly path?: string;
  readonly resourceId: number;
  readonly resourceName?: string;
  readonly resourceFlags?: number;
  readonly raw: readonly RawProperty[];
  readonly properties: readonly CanonicalProperty[];
  readonly descriptor: PluginDescriptor;
  readonly listing: string;
  readonly summary: PiplSummary;
  readonly diagnostics: readonly PiplError[];
  readonly noPropertiesFound: boolean;
}
