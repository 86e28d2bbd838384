/**
 * Tool runner contracts.
 */
import type { ToolName } from '../config/schema.js';

export interface ToolRunResult {
  /** Process exit code, null when the process was killed */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  /** True when the run exceeded its timeout and was killed */
  timedOut: boolean;
}

export interface ToolRunOptions {
  cwd: string;
  timeoutMs?: number;
}

/**
 * Executes external linters. Checks only talk to this interface, so tests
 * substitute an in-process fake.
 */
export interface ToolRunner {
  /** Relative command paths resolve against `cwd`, as they do for `run` */
  isAvailable(command: string, cwd?: string): Promise<boolean>;
  run(command: string, args: string[], options: ToolRunOptions): Promise<ToolRunResult>;
}

/**
 * A catalog entry with config overrides applied.
 */
export interface ResolvedTool {
  name: ToolName;
  command: string;
  /** Arguments placed before the check's own */
  args: string[];
  installHint: string;
}
