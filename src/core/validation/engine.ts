/**
 * Validation engine: runs the selected checks one at a time and aggregates
 * their findings.
 */
import type { CheckId, Config } from '../config/schema.js';
import type { CheckContext, CheckResult, DocumentationCheck } from '../checks/types.js';
import type { ToolRunner } from '../tools/types.js';
import { getCheck } from '../checks/registry.js';
import type { CanonIgnore } from '../../utils/canonignore.js';
import { logger as rootLogger, type Logger } from '../../utils/logger.js';
import type { RunOptions, RunResult, RunSummary } from './types.js';

export interface EngineOptions {
  ignore: CanonIgnore;
  /** Restrict file scans to these relative paths */
  onlyFiles?: Iterable<string>;
  logger?: Logger;
  /** Replace the registered check implementations (tests) */
  resolveCheck?: (id: CheckId) => DocumentationCheck | undefined;
}

export class ValidationEngine {
  private readonly context: CheckContext;
  private readonly resolveCheck: (id: CheckId) => DocumentationCheck | undefined;

  constructor(projectRoot: string, config: Config, runner: ToolRunner, options: EngineOptions) {
    this.context = {
      projectRoot,
      config,
      runner,
      ignore: options.ignore,
      logger: options.logger ?? rootLogger.child('engine'),
    };
    if (options.onlyFiles) {
      this.context.onlyFiles = new Set(options.onlyFiles);
    }
    this.resolveCheck = options.resolveCheck ?? getCheck;
  }

  /**
   * Run checks sequentially in the given order. Checks disabled in config
   * are skipped entirely.
   */
  async run(checkIds: CheckId[], options: RunOptions = {}): Promise<RunResult> {
    const results: CheckResult[] = [];

    for (const id of checkIds) {
      if (!this.context.config.checks[id].enabled) {
        this.context.logger.debug(`Check ${id} disabled in config`);
        continue;
      }
      const check = this.resolveCheck(id);
      if (!check) {
        this.context.logger.warn(`No implementation registered for check ${id}`);
        continue;
      }

      const started = performance.now();
      const findings = await check.run(this.context);
      const result: CheckResult = {
        check: id,
        title: check.title,
        findings,
        durationMs: performance.now() - started,
      };
      results.push(result);
      options.onCheck?.(result);
    }

    return {
      mode: options.mode ?? 'custom',
      checks: results,
      summary: summarize(results),
    };
  }
}

export function summarize(results: CheckResult[]): RunSummary {
  let errors = 0;
  let warnings = 0;
  let passed = 0;
  for (const finding of results.flatMap((r) => r.findings)) {
    if (finding.status === 'error') errors++;
    else if (finding.status === 'warning') warnings++;
    else passed++;
  }
  return {
    errors,
    warnings,
    passed,
    status: errors > 0 ? 'fail' : warnings > 0 ? 'warn' : 'pass',
  };
}
