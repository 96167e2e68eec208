// Main API for the aepipl library

import { readdirSync, readFileSync, statSync } from 'node:fs';
import { basename, extname, join } from 'node:path';

import { resolveConfig, type PiplConfig } from './config.js';
import { ParseContext, type IParseContext } from './context.js';
import { DEFAULT_STRATEGIES, detectFormat, type DetectionStrategy } from './detect.js';
import { FileReadError } from './errors.js';
import { buildDescriptor, buildSummary, DEFAULT_RESOURCE_ID, renderListing } from './generator.js';
import { normalizeProperties } from './normalize.js';
import { PeResourceParser } from './pefile.js';
import { RcpParser } from './rcp.js';
import { standardConverters } from './resconverters.js';
import { ResourceForkParser } from './resfork.js';
import type {
  CanonicalTag,
  ContainerParseResult,
  ExtractionResult,
  PiplFormat,
  PiplResourceHeader,
  PropertyConverter,
  RawProperty
} from './types.js';

export interface ExtractOptions extends Partial<PiplConfig> {
  /** Skips detection. */
  format?: PiplFormat;
  /** Only used as a detection hint. */
  path?: string;
  strategies?: readonly DetectionStrategy[];
  converters?: ReadonlyMap<CanonicalTag, PropertyConverter>;
}

const RESOURCE_FILE_EXTENSION = '.rsrc';
const BUNDLE_EXTENSION = '.plugin';

export function parseContainer(data: Uint8Array, format: PiplFormat, context: IParseContext): ContainerParseResult {
  switch (format) {
    case 'rsrc':
      return ResourceForkParser.fromBytes(data, context);
    case 'pe':
      return PeResourceParser.fromBytes(data, context);
    case 'rcp':
      return RcpParser.fromText(data, context);
  }
}

export function parseProperties(data: Uint8Array, format: PiplFormat, options: Partial<PiplConfig> = {}): RawProperty[] {
  return parseContainer(data, format, new ParseContext(resolveConfig(options))).properties;
}

export function extract(data: Uint8Array, options: ExtractOptions = {}): ExtractionResult {
  const config = resolveConfig(options);
  const context = new ParseContext(config);
  const format = options.format ?? detectFormat(
    { data, path: options.path },
    options.strategies ?? DEFAULT_STRATEGIES,
    config
  );

  const container = parseContainer(data, format, context);
  const properties = normalizeProperties(container.properties);
  const resource: PiplResourceHeader = container.resources[0] ?? { id: DEFAULT_RESOURCE_ID };
  const descriptor = buildDescriptor(properties, context);

  if (properties.length === 0) {
    context.log.info(`no PiPL properties found${options.path === undefined ? '' : ` in ${options.path}`}`);
  }

  return Object.freeze({
    format,
    path: options.path,
    resourceId: resource.id,
    resourceName: resource.name,
    resourceFlags: resource.flags,
    raw: Object.freeze(container.properties),
    properties: Object.freeze(properties),
    descriptor,
    listing: renderListing(properties, resource, options.converters ?? standardConverters),
    summary: buildSummary(properties, descriptor),
    diagnostics: Object.freeze([...context.diagnostics]),
    noPropertiesFound: properties.length === 0
  });
}

function findResourceFiles(dir: string): string[] {
  const found: string[] = [];
  for (const entry of readdirSync(dir, { withFileTypes: true })) {
    const full = join(dir, entry.name);
    if (entry.isDirectory()) {
      found.push(...findResourceFiles(full));
    } else if (extname(entry.name).toLowerCase() === RESOURCE_FILE_EXTENSION) {
      found.push(full);
    }
  }
  return found.sort();
}

/**
 * A `.plugin` bundle (or any directory) resolves to its
 * `Contents/Resources/*.rsrc`, else to the first `.rsrc` anywhere inside it.
 */
export function resolveInputPath(path: string): string {
  let isDirectory: boolean;
  try {
    isDirectory = statSync(path).isDirectory();
  } catch (error) {
    throw new FileReadError(path, error);
  }
  if (!isDirectory) {
    return path;
  }

  try {
    const resources = join(path, 'Contents', 'Resources');
    const preferred = statSync(resources, { throwIfNoEntry: false })?.isDirectory()
      ? readdirSync(resources)
        .filter(name => extname(name).toLowerCase() === RESOURCE_FILE_EXTENSION)
        .sort()
        .map(name => join(resources, name))
      : [];
    const candidate = preferred[0] ?? findResourceFiles(path)[0];
    if (candidate !== undefined) {
      return candidate;
    }
  } catch (error) {
    throw new FileReadError(path, error);
  }

  const kind = extname(path).toLowerCase() === BUNDLE_EXTENSION ? 'bundle' : 'directory';
  throw new FileReadError(path, new Error(`${kind} ${basename(path)} contains no ${RESOURCE_FILE_EXTENSION} file`));
}

export function extractFromFile(path: string, options: ExtractOptions = {}): ExtractionResult {
  const resolved = resolveInputPath(path);

  let data: Uint8Array;
  try {
    data = readFileSync(resolved);
  } catch (error) {
    throw new FileReadError(resolved, error);
  }

  return extract(data, { ...options, path: resolved });
}

// Re-export types and utilities
export * from './types.js';
export * from './errors.js';
export * from './config.js';
export * from './context.js';
export * from './logger.js';
export * from './reader.js';
export * from './textio.js';
export * from './adf.js';
export * from './records.js';
export * from './resfork.js';
export * from './pefile.js';
export * from './rcp.js';
export * from './normalize.js';
export * from './aeflags.js';
export * from './decode.js';
export * from './resconverters.js';
export * from './generator.js';
export * from './jsonio.js';
export * from './detect.js';
