/**
 * Protocol Buffers check: each file must compile with `protoc`.
 */
import * as os from 'node:os';
import { ToolFileCheck } from './base.js';
import type { ToolRunResult } from '../tools/types.js';
import type { CheckContext } from './types.js';
import { ErrorCodes } from '../../utils/errors.js';

export class ProtoCheck extends ToolFileCheck {
  readonly id = 'proto' as const;
  readonly title = 'Validating Protocol Buffers';
  protected readonly tool = 'protoc' as const;
  protected readonly patterns = ['**/*.proto'];
  protected readonly failureCode = ErrorCodes.PROTO_INVALID;

  protected directory(context: CheckContext): string {
    return context.config.paths.proto;
  }

  protected buildArgs(file: string, context: CheckContext): string[] {
    return [
      `--proto_path=${context.config.paths.proto}`,
      `--descriptor_set_out=${os.devNull}`,
      file,
    ];
  }

  protected isFailure(result: ToolRunResult): boolean {
    return result.exitCode !== 0;
  }

  protected successMessage(file: string): string {
    return `Proto valid: ${file}`;
  }

  protected failureMessage(file: string): string {
    return `Proto validation failed: ${file}`;
  }
}
