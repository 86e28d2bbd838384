/**
 * JSON output formatter for machine consumption.
 */
import type { RunResult } from '../../core/validation/types.js';
import type { Finding } from '../../core/checks/types.js';
import type { IFormatter, FormatOptions } from './types.js';

export class JsonFormatter implements IFormatter {
  private readonly errorsOnly: boolean;
  private readonly showPassing: boolean;

  constructor(options: Partial<FormatOptions> = {}) {
    this.errorsOnly = options.errorsOnly ?? false;
    this.showPassing = options.showPassing ?? true;
  }

  formatRun(run: RunResult): string {
    return JSON.stringify({
      mode: run.mode,
      summary: run.summary,
      checks: run.checks.map((c) => ({
        check: c.check,
        title: c.title,
        duration_ms: Math.round(c.durationMs),
        findings: c.findings.filter((f) => this.keep(f)).map(transformFinding),
      })),
    }, null, 2);
  }

  private keep(finding: Finding): boolean {
    if (finding.status === 'pass') return this.showPassing;
    if (finding.status === 'warning') return !this.errorsOnly;
    return true;
  }
}

function transformFinding(finding: Finding): Record<string, unknown> {
  return {
    status: finding.status,
    code: finding.code,
    message: finding.message,
    file: finding.file ?? null,
    line: finding.line ?? null,
  };
}
