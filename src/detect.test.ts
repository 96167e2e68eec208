// Unit tests for format detection

import { describe, it, expect } from 'vitest';
import { buildPeImage, buildResourceFork, concat, macRecord, piplBody, text, wrapAppleDouble } from './__fixtures__/builders.js';
import { resolveConfig } from './config.js';
import { DEFAULT_STRATEGIES, detectFormat, type DetectionStrategy } from './detect.js';
import { FormatDetectionError } from './errors.js';
import { LogLevel } from './logger.js';

const config = resolveConfig({ logLevel: LogLevel.silent });
const noise = (length: number) => Uint8Array.from({ length }, (_, i) => (i * 7 + 3) & 0xFF);

describe('detectFormat', () => {
  it('should trust known file extensions', () => {
    expect(detectFormat({ data: noise(10), path: 'Blur.AEX' }, DEFAULT_STRATEGIES, config)).toBe('pe');
    expect(detectFormat({ data: noise(10), path: 'Blur.rc' }, DEFAULT_STRATEGIES, config)).toBe('rcp');
    expect(detectFormat({ data: noise(10), path: 'Blur.rcp' }, DEFAULT_STRATEGIES, config)).toBe('rcp');
    expect(detectFormat({ data: noise(10), path: 'Blur.rsrc' }, DEFAULT_STRATEGIES, config)).toBe('rsrc');
  });

  it('should recognise script text', () => {
    const data = text('16000 PiPL DISCARDABLE BEGIN END');
    expect(detectFormat({ data, path: 'Blur.txt' }, DEFAULT_STRATEGIES, config)).toBe('rcp');
  });

  it('should recognise PE images', () => {
    expect(detectFormat({ data: buildPeImage() }, DEFAULT_STRATEGIES, config)).toBe('pe');
  });

  it('should recognise resource forks', () => {
    const fork = buildResourceFork([{ type: 'PiPL', id: 16000, data: piplBody([['kind', text('eFKT')]]) }]);
    expect(fork.length).toBeLessThan(256);
    expect(detectFormat({ data: fork }, DEFAULT_STRATEGIES, config)).toBe('rsrc');
    expect(detectFormat({ data: wrapAppleDouble(new Uint8Array(4)) }, DEFAULT_STRATEGIES, config)).toBe('rsrc');
    expect(detectFormat({ data: noise(300) }, DEFAULT_STRATEGIES, config)).toBe('rsrc');
  });

  it('should throw FormatDetectionError when nothing matches', () => {
    expect(() => detectFormat({ data: noise(100) }, DEFAULT_STRATEGIES, config)).toThrow(FormatDetectionError);
    expect(() => detectFormat({ data: noise(100), path: 'a.bin' }, DEFAULT_STRATEGIES, config))
      .toThrow('No container signature matched for a.bin');
  });

  it('should only look at the configured head size', () => {
    const data = concat(new Uint8Array(32).fill(0x20), text('PiPL BEGIN'), macRecord('kind', text('eFKT')));
    expect(detectFormat({ data }, DEFAULT_STRATEGIES, config)).toBe('rcp');

    const short = resolveConfig({ logLevel: LogLevel.silent, detectionHeadSize: 16 });
    expect(() => detectFormat({ data }, DEFAULT_STRATEGIES, short)).toThrow(FormatDetectionError);
  });

  it('should try caller strategies in order', () => {
    const always: DetectionStrategy = { name: 'always', detect: () => 'rcp' };
    expect(detectFormat({ data: buildPeImage() }, [always, ...DEFAULT_STRATEGIES], config)).toBe('rcp');
  });
});
