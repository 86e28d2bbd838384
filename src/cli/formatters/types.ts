/**
 * Formatter type definitions.
 */
import type { RunResult } from '../../core/validation/types.js';

export type OutputFormat = 'human' | 'json' | 'compact';

export interface FormatOptions {
  /** Use colors in output */
  colors: boolean;
  /** Show success lines (default: true) */
  showPassing: boolean;
  /** Hide warnings (default: false) */
  errorsOnly: boolean;
}

export interface IFormatter {
  /**
   * Format a complete run.
   */
  formatRun(run: RunResult): string;
}
