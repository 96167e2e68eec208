// Unit tests for settings, logging and the parse context

import { describe, it, expect } from 'vitest';
import { defaultConfig, resolveConfig } from './config.js';
import { createParseContext } from './context.js';
import { DecodeAmbiguityWarning, PropertyValidationError } from './errors.js';
import { buildLeveledLogger, LogLevel, type ILogger } from './logger.js';

function recordingLogger(lines: string[]): ILogger {
  const push = (level: string) => (...data: unknown[]) => {
    lines.push(`${level}: ${data.join(' ')}`);
  };
  return {
    debug: push('debug'),
    info: push('info'),
    warn: push('warn'),
    error: push('error'),
    group: push('group'),
    groupEnd: () => {}
  };
}

describe('resolveConfig', () => {
  it('should fill unset options from the defaults', () => {
    const config = resolveConfig({ minForkMapGap: 10 });
    expect(config.minForkMapGap).toBe(10);
    expect(config.winPaddingLookahead).toBe(8);
    expect(config.maxWinPropertyLength).toBe(10000);
    expect(config.detectionHeadSize).toBe(1024);
    expect(config.logLevel).toBe(LogLevel.warn);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(defaultConfig)).toBe(true);
  });
});

describe('buildLeveledLogger', () => {
  it('should drop messages below the configured level', () => {
    const lines: string[] = [];
    const log = buildLeveledLogger({ logger: recordingLogger(lines), level: LogLevel.warn });
    log.debug('a');
    log.info('b');
    log.warn('c');
    log.error('d');
    expect(lines).toEqual(['warn: c', 'error: d']);
  });

  it('should silence everything at the silent level', () => {
    const lines: string[] = [];
    const log = buildLeveledLogger({ logger: recordingLogger(lines), level: LogLevel.silent });
    log.error('x');
    log.group('y');
    expect(lines).toEqual([]);
  });
});

describe('ParseContext', () => {
  it('should collect diagnostics and log ambiguities at warn', () => {
    const lines: string[] = [];
    const context = createParseContext({ logger: recordingLogger(lines), logLevel: LogLevel.warn });

    context.report(new PropertyValidationError('bad length', 12));
    context.report(new DecodeAmbiguityWarning('kept as text'));

    expect(context.diagnostics.map(issue => issue.code)).toEqual(['PROPERTY_VALIDATION', 'DECODE_AMBIGUITY']);
    expect(lines).toEqual(['warn: DecodeAmbiguityWarning: kept as text']);
  });

  it('should log every other diagnostic at debug', () => {
    const lines: string[] = [];
    const context = createParseContext({ logger: recordingLogger(lines), logLevel: LogLevel.debug });
    context.report(new PropertyValidationError('bad length', 12));
    expect(lines).toEqual(['debug: PropertyValidationError: bad length']);
  });
});
