/**
 * Validation run type definitions.
 */
import type { CheckResult } from '../checks/types.js';

export type RunStatus = 'pass' | 'warn' | 'fail';

export interface RunSummary {
  errors: number;
  warnings: number;
  /** Success lines emitted */
  passed: number;
  status: RunStatus;
}

export interface RunResult {
  /** Label of the selection, e.g. `all`, `pre-commit`, `rest+proto` */
  mode: string;
  checks: CheckResult[];
  summary: RunSummary;
}

/**
 * Check selector flags, one per CLI option.
 */
export interface CheckSelection {
  rest?: boolean;
  openapi?: boolean;
  graphql?: boolean;
  proto?: boolean;
  markdown?: boolean;
  sphinx?: boolean;
  preCommit?: boolean;
  all?: boolean;
}

export interface RunOptions {
  mode?: string;
  /** Called after each check finishes, in run order */
  onCheck?: (result: CheckResult) => void;
}
