/**
 * OpenAPI document check via `swagger-cli validate`.
 */
import { ToolFileCheck } from './base.js';
import type { ToolRunResult } from '../tools/types.js';
import type { CheckContext } from './types.js';
import { ErrorCodes } from '../../utils/errors.js';

export class OpenApiCheck extends ToolFileCheck {
  readonly id = 'openapi' as const;
  readonly title = 'Validating OpenAPI Specifications';
  protected readonly tool = 'swagger-cli' as const;
  protected readonly patterns = ['**/*.{yaml,yml}'];
  protected readonly failureCode = ErrorCodes.OPENAPI_INVALID;

  protected directory(context: CheckContext): string {
    return context.config.paths.openapi;
  }

  protected buildArgs(file: string): string[] {
    return ['validate', file];
  }

  /** swagger-cli reports `<file> is valid` on success. */
  protected isFailure(_result: ToolRunResult, output: string): boolean {
    return !output.includes('is valid');
  }

  protected successMessage(file: string): string {
    return `OpenAPI valid: ${file}`;
  }

  protected failureMessage(file: string): string {
    return `OpenAPI validation failed: ${file}`;
  }
}
