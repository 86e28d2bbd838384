/**
 * reStructuredText syntax check via `rstcheck`.
 */
import { ToolFileCheck } from './base.js';
import type { ToolRunResult } from '../tools/types.js';
import type { CheckContext } from './types.js';
import { ErrorCodes } from '../../utils/errors.js';

/**
 * rstcheck prints `(ERROR/3)` style markers; either those or a non-zero exit
 * fail the file.
 */
export class RestCheck extends ToolFileCheck {
  readonly id = 'rest' as const;
  readonly title = 'Validating reStructuredText Files';
  protected readonly tool = 'rstcheck' as const;
  protected readonly patterns = ['**/*.rst'];
  protected readonly failureCode = ErrorCodes.REST_INVALID;

  protected directory(context: CheckContext): string {
    return context.config.paths.rest_source;
  }

  protected buildArgs(file: string): string[] {
    return [file];
  }

  protected isFailure(result: ToolRunResult, output: string): boolean {
    return result.exitCode !== 0 || output.includes('ERROR');
  }

  protected successMessage(file: string): string {
    return `reST valid: ${file}`;
  }

  protected failureMessage(file: string): string {
    return `reST validation failed: ${file}`;
  }
}
