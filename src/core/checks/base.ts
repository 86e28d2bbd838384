/**
 * Shared plumbing for documentation checks.
 */
import * as path from 'node:path';
import type { CheckId, ToolName } from '../config/schema.js';
import type { ResolvedTool, ToolRunResult } from '../tools/types.js';
import { combinedOutput, resolveTool } from '../tools/catalog.js';
import { globFiles, isDirectory, toPosixRelative } from '../../utils/file-system.js';
import { ErrorCodes } from '../../utils/errors.js';
import type { CheckContext, DocumentationCheck, Finding } from './types.js';

export interface ListFilesOptions {
  /** Include dotfiles and dot-directories */
  dot?: boolean;
}

export interface FindingOptions {
  file?: string;
  line?: number;
}

/**
 * Base class for checks. Provides finding factories, scoped file listing
 * and tool resolution.
 */
export abstract class BaseDocumentationCheck implements DocumentationCheck {
  abstract readonly id: CheckId;
  abstract readonly title: string;

  abstract run(context: CheckContext): Promise<Finding[]>;

  protected pass(message: string, options: FindingOptions = {}): Finding {
    return this.finding('pass', ErrorCodes.PASSED, message, options);
  }

  protected error(code: string, message: string, options: FindingOptions = {}): Finding {
    return this.finding('error', code, message, options);
  }

  protected warning(code: string, message: string, options: FindingOptions = {}): Finding {
    return this.finding('warning', code, message, options);
  }

  /**
   * Resolve a tool and confirm it is on PATH. Returns the warning to report
   * when it is not.
   */
  protected async requireTool(
    context: CheckContext,
    name: ToolName
  ): Promise<{ tool: ResolvedTool } | { missing: Finding }> {
    const tool = resolveTool(name, context.config);
    if (await context.runner.isAvailable(tool.command, context.projectRoot)) {
      return { tool };
    }
    return {
      missing: this.warning(
        ErrorCodes.TOOL_MISSING,
        `${tool.command} not installed. Install: ${tool.installHint}`
      ),
    };
  }

  protected runTool(context: CheckContext, tool: ResolvedTool, args: string[]): Promise<ToolRunResult> {
    context.logger.debug(`${tool.command} ${[...tool.args, ...args].join(' ')}`);
    return context.runner.run(tool.command, [...tool.args, ...args], {
      cwd: context.projectRoot,
      timeoutMs: context.config.validation.tool_timeout_ms,
    });
  }

  protected directoryExists(context: CheckContext, relativeDir: string): Promise<boolean> {
    return isDirectory(path.resolve(context.projectRoot, relativeDir));
  }

  /**
   * List files under a directory, relative to the project root, with
   * .canonignore and the optional file restriction applied.
   */
  protected async listFiles(
    context: CheckContext,
    relativeDir: string,
    patterns: string[],
    options: ListFilesOptions = {}
  ): Promise<string[]> {
    const base = toPosixRelative(context.projectRoot, relativeDir).replace(/\/+$/, '');
    const globs = patterns.map((p) => (base === '' || base === '.' ? p : `${base}/${p}`));
    const files = await globFiles(globs, { cwd: context.projectRoot, dot: options.dot });
    return this.scope(context, files);
  }

  /**
   * Apply .canonignore and the optional file restriction to relative paths.
   */
  protected scope(context: CheckContext, files: string[]): string[] {
    const kept = context.ignore.filter(files);
    const only = context.onlyFiles;
    return only ? kept.filter((f) => only.has(f)) : kept;
  }

  private finding(
    status: Finding['status'],
    code: string,
    message: string,
    options: FindingOptions
  ): Finding {
    const finding: Finding = { check: this.id, status, code, message };
    if (options.file !== undefined) finding.file = options.file;
    if (options.line !== undefined) finding.line = options.line;
    return finding;
  }
}

/**
 * A check that runs one external tool per file found under a directory.
 */
export abstract class ToolFileCheck extends BaseDocumentationCheck {
  protected abstract readonly tool: ToolName;
  protected abstract readonly patterns: string[];
  protected abstract readonly failureCode: string;

  /** Directory to scan, relative to the project root */
  protected abstract directory(context: CheckContext): string;

  protected abstract buildArgs(file: string, context: CheckContext): string[];

  /** Whether the tool's result means the file is invalid */
  protected abstract isFailure(result: ToolRunResult, output: string): boolean;

  protected abstract successMessage(file: string): string;

  protected abstract failureMessage(file: string): string;

  async run(context: CheckContext): Promise<Finding[]> {
    const required = await this.requireTool(context, this.tool);
    if ('missing' in required) {
      return [required.missing];
    }

    const dir = this.directory(context);
    if (!(await this.directoryExists(context, dir))) {
      return [this.warning(ErrorCodes.DIRECTORY_MISSING, `No ${dir} directory found`)];
    }

    const findings: Finding[] = [];
    for (const file of await this.listFiles(context, dir, this.patterns)) {
      findings.push(await this.checkFile(context, required.tool, file));
    }
    return findings;
  }

  protected async checkFile(context: CheckContext, tool: ResolvedTool, file: string): Promise<Finding> {
    const result = await this.runTool(context, tool, this.buildArgs(file, context));
    const output = combinedOutput(result);
    if (result.timedOut || this.isFailure(result, output)) {
      if (output.trim()) {
        context.logger.debug(output.trim());
      }
      const suffix = result.timedOut ? ' (timed out)' : '';
      return this.error(this.failureCode, `${this.failureMessage(file)}${suffix}`, { file });
    }
    return this.pass(this.successMessage(file), { file });
  }
}
