/**
 * Check and finding type definitions.
 */
import type { CheckId, Config } from '../config/schema.js';
import type { ToolRunner } from '../tools/types.js';
import type { CanonIgnore } from '../../utils/canonignore.js';
import type { Logger } from '../../utils/logger.js';

/**
 * `pass` findings are the success lines of a run; only errors and warnings
 * are counted.
 */
export type FindingStatus = 'pass' | 'error' | 'warning';

export interface Finding {
  check: CheckId;
  status: FindingStatus;
  /** Finding code from ErrorCodes */
  code: string;
  message: string;
  /** Path relative to the project root, forward slashes */
  file?: string;
  /** 1-based line of the first occurrence */
  line?: number;
}

export interface CheckResult {
  check: CheckId;
  title: string;
  findings: Finding[];
  durationMs: number;
}

/**
 * Everything a check may read while it runs.
 */
export interface CheckContext {
  projectRoot: string;
  config: Config;
  runner: ToolRunner;
  ignore: CanonIgnore;
  /** Restricts file scans to these relative paths (e.g. staged files) */
  onlyFiles?: ReadonlySet<string>;
  logger: Logger;
}

export interface DocumentationCheck {
  readonly id: CheckId;
  /** Section header shown before the check's findings */
  readonly title: string;
  run(context: CheckContext): Promise<Finding[]>;
}
