/**
 * Markdown lint of the changelog and architecture decision records.
 */
import * as path from 'node:path';
import { ToolFileCheck } from './base.js';
import type { ToolRunResult } from '../tools/types.js';
import type { CheckContext, Finding } from './types.js';
import { ErrorCodes } from '../../utils/errors.js';
import { fileExists, toPosixRelative } from '../../utils/file-system.js';

/**
 * Lints `CHANGELOG.md` and every `.md` under the decisions directory. Neither
 * being present is not a finding; there is simply nothing to lint.
 */
export class MarkdownCheck extends ToolFileCheck {
  readonly id = 'markdown' as const;
  readonly title = 'Validating Markdown Files';
  protected readonly tool = 'markdownlint' as const;
  protected readonly patterns = ['**/*.md'];
  protected readonly failureCode = ErrorCodes.MARKDOWN_INVALID;

  protected directory(context: CheckContext): string {
    return context.config.paths.decisions;
  }

  async run(context: CheckContext): Promise<Finding[]> {
    const required = await this.requireTool(context, this.tool);
    if ('missing' in required) {
      return [required.missing];
    }

    const findings: Finding[] = [];
    for (const file of await this.targets(context)) {
      findings.push(await this.checkFile(context, required.tool, file));
    }
    return findings;
  }

  /** Changelog first, then decision records in path order. */
  async targets(context: CheckContext): Promise<string[]> {
    const { changelog } = context.config.paths;
    const files: string[] = [];

    if (await fileExists(path.resolve(context.projectRoot, changelog))) {
      files.push(...this.scope(context, [toPosixRelative(context.projectRoot, changelog)]));
    }

    const decisions = this.directory(context);
    if (await this.directoryExists(context, decisions)) {
      files.push(...await this.listFiles(context, decisions, this.patterns));
    }
    return files;
  }

  protected buildArgs(file: string): string[] {
    return [file];
  }

  protected isFailure(result: ToolRunResult): boolean {
    return result.exitCode !== 0;
  }

  protected successMessage(file: string): string {
    return `Markdown valid: ${file}`;
  }

  protected failureMessage(file: string): string {
    return `Markdown validation failed: ${file}`;
  }
}
