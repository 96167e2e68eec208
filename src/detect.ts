// Container format detection

import { extname } from 'node:path';

import { isAdf } from './adf.js';
import { defaultConfig, type PiplConfig } from './config.js';
import { FormatDetectionError } from './errors.js';
import { buildLeveledLogger } from './logger.js';
import { SafeReader } from './reader.js';
import { fourccToBytes } from './textio.js';
import type { PiplFormat } from './types.js';

export interface DetectionInput {
  readonly data: Uint8Array;
  readonly path?: string;
}

export interface DetectionView extends DetectionInput {
  /** First `detectionHeadSize` bytes of `data`. */
  readonly head: Uint8Array;
}

export interface DetectionStrategy {
  readonly name: string;
  detect(view: DetectionView): PiplFormat | undefined;
}

const EXTENSIONS: ReadonlyMap<string, PiplFormat> = new Map<string, PiplFormat>([
  ['.rsrc', 'rsrc'],
  ['.rcp', 'rcp'],
  ['.rc', 'rcp'],
  ['.aex', 'pe'],
]);

const MIN_BARE_FORK_SIZE = 256;

export const extensionStrategy: DetectionStrategy = {
  name: 'extension',
  detect({ path }) {
    return path === undefined ? undefined : EXTENSIONS.get(extname(path).toLowerCase());
  }
};

export const scriptStrategy: DetectionStrategy = {
  name: 'script',
  detect({ head }) {
    const text = new TextDecoder('latin1').decode(head);
    return text.includes('PiPL') && text.includes('BEGIN') ? 'rcp' : undefined;
  }
};

export const peStrategy: DetectionStrategy = {
  name: 'pe',
  detect({ data }) {
    return new SafeReader(data).matches(0, fourccToBytes('MZ')) ? 'pe' : undefined;
  }
};

export const resourceForkStrategy: DetectionStrategy = {
  name: 'rsrc',
  detect({ data, head }) {
    if (new SafeReader(head).indexOf(fourccToBytes('8BIM')) !== -1 || isAdf(data)) {
      return 'rsrc';
    }
    return data.length > MIN_BARE_FORK_SIZE ? 'rsrc' : undefined;
  }
};

export const DEFAULT_STRATEGIES: readonly DetectionStrategy[] = Object.freeze([
  extensionStrategy,
  scriptStrategy,
  peStrategy,
  resourceForkStrategy,
]);

/** First strategy to claim the input wins. */
export function detectFormat(
  input: DetectionInput,
  strategies: readonly DetectionStrategy[] = DEFAULT_STRATEGIES,
  config: PiplConfig = defaultConfig
): PiplFormat {
  const view: DetectionView = {
    data: input.data,
    path: input.path,
    head: input.data.subarray(0, config.detectionHeadSize)
  };

  const log = buildLeveledLogger({ logger: config.logger, level: config.logLevel });

  for (const strategy of strategies) {
    const format = strategy.detect(view);
    if (format !== undefined) {
      log.debug(`format ${format} detected by ${strategy.name} strategy`);
      return format;
    }
  }

  throw new FormatDetectionError(
    `No container signature matched${input.path === undefined ? '' : ` for ${input.path}`}`,
    input.path
  );
}
