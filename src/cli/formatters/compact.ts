/**
 * Compact output formatter for CI and pre-commit hooks.
 * Format: file:line: SEVERITY [check] message
 */
import type { RunResult } from '../../core/validation/types.js';
import type { Finding } from '../../core/checks/types.js';
import type { IFormatter, FormatOptions } from './types.js';

export class CompactFormatter implements IFormatter {
  private readonly errorsOnly: boolean;

  constructor(options: Partial<FormatOptions> = {}) {
    this.errorsOnly = options.errorsOnly ?? false;
  }

  formatRun(run: RunResult): string {
    const lines: string[] = [];
    for (const finding of run.checks.flatMap((c) => c.findings)) {
      if (finding.status === 'pass') continue;
      if (finding.status === 'warning' && this.errorsOnly) continue;
      lines.push(formatFinding(finding));
    }
    const { errors, warnings } = run.summary;
    lines.push(`${errors} error(s), ${warnings} warning(s)`);
    return lines.join('\n');
  }
}

export function formatFinding(finding: Finding): string {
  const location = finding.file
    ? `${finding.file}${finding.line !== undefined ? `:${finding.line}` : ''}`
    : '-';
  const severity = finding.status === 'error' ? 'ERROR' : 'WARN';
  return `${location}: ${severity} [${finding.check}] ${finding.message}`;
}
