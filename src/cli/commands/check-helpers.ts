/**
 * Helper functions for the check command.
 */
import type { ExitCodes } from '../../core/config/schema.js';
import type { RunSummary } from '../../core/validation/types.js';
import { getStagedFiles, isGitRepository } from '../../utils/git.js';
import { logger } from '../../utils/logger.js';
import { CompactFormatter, HumanFormatter, JsonFormatter, type IFormatter, type OutputFormat } from '../formatters/index.js';

const OUTPUT_FORMATS: readonly OutputFormat[] = ['human', 'json', 'compact'];

/**
 * Map a run summary to the process exit code.
 */
export function getExitCode(summary: RunSummary, exitCodes: ExitCodes, failOnWarning: boolean): number {
  if (summary.errors > 0) {
    return exitCodes.error;
  }
  if (summary.warnings > 0) {
    return failOnWarning ? exitCodes.error : exitCodes.warning_only;
  }
  return exitCodes.success;
}

export function parseOutputFormat(value: string): OutputFormat {
  const match = OUTPUT_FORMATS.find((f) => f === value);
  if (!match) {
    throw new Error(`Unknown format "${value}" (expected ${OUTPUT_FORMATS.join(', ')})`);
  }
  return match;
}

/**
 * Staged files for `--staged`. Outside a git work tree the restriction is
 * dropped with a warning and every file is checked.
 */
export async function resolveStagedFiles(projectRoot: string): Promise<string[] | undefined> {
  if (!(await isGitRepository(projectRoot))) {
    logger.warn('--staged ignored: not inside a git repository');
    return undefined;
  }
  return getStagedFiles(projectRoot);
}

export interface FormatterSettings {
  colors: boolean;
  quiet: boolean;
  errorsOnly: boolean;
}

export function createFormatter(format: OutputFormat, settings: FormatterSettings): IFormatter {
  const errorsOnly = settings.errorsOnly;
  switch (format) {
    case 'json':
      return new JsonFormatter({ errorsOnly, showPassing: !settings.quiet });
    case 'compact':
      return new CompactFormatter({ errorsOnly });
    default:
      return new HumanFormatter({ colors: settings.colors, showPassing: !settings.quiet, errorsOnly });
  }
}
