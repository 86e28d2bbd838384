/**
 * Mapping from CLI selectors to the checks they run.
 */
import { CHECK_IDS, type CheckId } from '../config/schema.js';
import type { CheckSelection } from './types.js';

/** Checks run by `--pre-commit`: fast, file-local ones only. */
export const PRE_COMMIT_CHECKS: readonly CheckId[] = ['markdown', 'formatting'];

const SINGLE_SELECTORS = ['rest', 'openapi', 'graphql', 'proto', 'markdown', 'sphinx'] as const;

export interface SelectedChecks {
  mode: string;
  checks: CheckId[];
}

/**
 * Resolve selector flags. No flag, or `--all`, selects every check; several
 * flags select their union. Order always follows CHECK_IDS.
 */
export function selectChecks(selection: CheckSelection): SelectedChecks {
  const wanted = new Set<CheckId>();
  const labels: string[] = [];

  for (const selector of SINGLE_SELECTORS) {
    if (selection[selector]) {
      wanted.add(selector);
      labels.push(selector);
    }
  }
  if (selection.preCommit) {
    PRE_COMMIT_CHECKS.forEach((id) => wanted.add(id));
    labels.unshift('pre-commit');
  }

  if (selection.all || wanted.size === 0) {
    return { mode: 'all', checks: [...CHECK_IDS] };
  }
  return {
    mode: labels.join('+'),
    checks: CHECK_IDS.filter((id) => wanted.has(id)),
  };
}
