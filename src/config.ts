// Extraction settings and their defaults

import { LogLevel, type ILogger } from './logger.js';

export interface PiplConfig {
  readonly logger: ILogger;
  readonly logLevel: LogLevel;
  /** Smallest data-to-map gap for which the structured resource-fork walk is attempted. */
  readonly minForkMapGap: number;
  /** How many zero padding bytes may sit between a MIB8 tag and its length. */
  readonly winPaddingLookahead: number;
  /** Exclusive upper bound for a MIB8 property length. */
  readonly maxWinPropertyLength: number;
  /** Bytes inspected by the content-based detection strategies. */
  readonly detectionHeadSize: number;
}

export const defaultConfig: PiplConfig = Object.freeze({
  logger: console,
  logLevel: LogLevel.warn,
  minForkMapGap: 400,
  winPaddingLookahead: 8,
  maxWinPropertyLength: 10000,
  detectionHeadSize: 1024,
});

export function resolveConfig(overrides: Partial<PiplConfig> = {}): PiplConfig {
  return Object.freeze({
    logger: overrides.logger ?? defaultConfig.logger,
    logLevel: overrides.logLevel ?? defaultConfig.logLevel,
    minForkMapGap: overrides.minForkMapGap ?? defaultConfig.minForkMapGap,
    winPaddingLookahead: overrides.winPaddingLookahead ?? defaultConfig.winPaddingLookahead,
    maxWinPropertyLength: overrides.maxWinPropertyLength ?? defaultConfig.maxWinPropertyLength,
    detectionHeadSize: overrides.detectionHeadSize ?? defaultConfig.detectionHeadSize,
  });
}
