/**
 * Human-readable output: coloured status lines grouped by check.
 */
import chalk, { Chalk, type ChalkInstance } from 'chalk';
import type { RunResult, RunSummary } from '../../core/validation/types.js';
import type { CheckResult, Finding } from '../../core/checks/types.js';
import type { IFormatter, FormatOptions } from './types.js';

const SYMBOLS: Record<Finding['status'], string> = {
  pass: '✓',
  error: '✗',
  warning: '⚠',
};

/**
 * Renders the run as sections. `formatHeader`, `formatCheck` and
 * `formatSummary` are exposed separately so the check command can stream
 * each section as soon as its check finishes.
 */
export class HumanFormatter implements IFormatter {
  private readonly options: FormatOptions;
  private readonly color: ChalkInstance;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      colors: options.colors ?? true,
      showPassing: options.showPassing ?? true,
      errorsOnly: options.errorsOnly ?? false,
    };
    this.color = this.options.colors ? chalk : new Chalk({ level: 0 });
  }

  formatHeader(): string {
    return ['Documentation Validation', '========================'].join('\n');
  }

  formatCheck(result: CheckResult): string {
    const lines = [`\n${this.color.green(`=== ${result.title} ===`)}`];
    for (const finding of result.findings) {
      if (finding.status === 'pass' && !this.options.showPassing) continue;
      if (finding.status === 'warning' && this.options.errorsOnly) continue;
      lines.push(this.formatFinding(finding));
    }
    return lines.join('\n');
  }

  formatSummary(summary: RunSummary): string {
    const lines = [
      `\n${this.color.green('=== Validation Summary ===')}`,
      `Errors: ${summary.errors}`,
      `Warnings: ${summary.warnings}`,
    ];
    if (summary.status === 'fail') {
      lines.push(this.color.red('Validation FAILED'));
    } else if (summary.status === 'warn') {
      lines.push(this.color.yellow('Validation PASSED with warnings'));
    } else {
      lines.push(this.color.green('Validation PASSED'));
    }
    return lines.join('\n');
  }

  formatRun(run: RunResult): string {
    return [
      this.formatHeader(),
      ...run.checks.map((c) => this.formatCheck(c)),
      this.formatSummary(run.summary),
    ].join('\n');
  }

  private formatFinding(finding: Finding): string {
    const text = `${SYMBOLS[finding.status]} ${finding.message}`;
    switch (finding.status) {
      case 'pass':
        return this.color.green(text);
      case 'error':
        return this.color.red(text);
      case 'warning':
        return this.color.yellow(text);
    }
  }
}
