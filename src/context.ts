// Per-invocation parse state: settings, leveled logger and collected diagnostics

import { resolveConfig, type PiplConfig } from './config.js';
import type { PiplError } from './errors.js';
import { buildLeveledLogger, type ILogger } from './logger.js';

export interface IParseContext {
  readonly config: PiplConfig;
  readonly log: ILogger;
  readonly diagnostics: readonly PiplError[];
  report(issue: PiplError): void;
}

export class ParseContext implements IParseContext {
  readonly log: ILogger;
  private readonly issues: PiplError[] = [];

  constructor(readonly config: PiplConfig = resolveConfig()) {
    this.log = buildLeveledLogger({ logger: config.logger, level: config.logLevel });
  }

  get diagnostics(): readonly PiplError[] {
    return this.issues;
  }

  /** Records a non-fatal issue; the caller carries on with whatever it could salvage. */
  report(issue: PiplError): void {
    this.issues.push(issue);
    if (issue.code === 'DECODE_AMBIGUITY') {
      this.log.warn(`${issue.name}: ${issue.message}`);
    } else {
      this.log.debug(`${issue.name}: ${issue.message}`);
    }
  }
}

export function createParseContext(overrides?: Partial<PiplConfig>): ParseContext {
  return new ParseContext(resolveConfig(overrides));
}
