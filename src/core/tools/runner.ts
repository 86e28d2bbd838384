/**
 * Subprocess-backed tool runner.
 */
import { execFile } from 'node:child_process';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { ToolError, ErrorCodes } from '../../utils/errors.js';
import type { ToolRunner, ToolRunResult, ToolRunOptions } from './types.js';

const MAX_OUTPUT_BYTES = 16 * 1024 * 1024;

/**
 * Spawn failures reported as a failed run of that file rather than an
 * exception: a shim whose interpreter is gone, or output past the buffer.
 */
const FAILED_RUN_CODES = new Set(['ENOENT', 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER']);

export interface ProcessToolRunnerOptions {
  /** Environment used for PATH lookup and for the child process */
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
}

/**
 * Runs tools with `execFile` (no shell) and resolves availability against
 * PATH without spawning anything.
 */
export class ProcessToolRunner implements ToolRunner {
  private readonly env: NodeJS.ProcessEnv;
  private readonly platform: NodeJS.Platform;
  private readonly availability = new Map<string, Promise<boolean>>();

  constructor(options: ProcessToolRunnerOptions = {}) {
    this.env = options.env ?? process.env;
    this.platform = options.platform ?? process.platform;
  }

  isAvailable(command: string, cwd?: string): Promise<boolean> {
    const key = isPath(command) ? path.resolve(cwd ?? process.cwd(), command) : command;
    let cached = this.availability.get(key);
    if (!cached) {
      cached = this.lookup(key);
      this.availability.set(key, cached);
    }
    return cached;
  }

  run(command: string, args: string[], options: ToolRunOptions): Promise<ToolRunResult> {
    return new Promise((resolve, reject) => {
      execFile(
        command,
        args,
        {
          cwd: options.cwd,
          env: this.env,
          timeout: options.timeoutMs ?? 0,
          maxBuffer: MAX_OUTPUT_BYTES,
          encoding: 'utf8',
          windowsHide: true,
        },
        (error, stdout, stderr) => {
          if (!error) {
            resolve({ exitCode: 0, stdout, stderr, timedOut: false });
            return;
          }
          if (typeof error.code === 'string' && FAILED_RUN_CODES.has(error.code)) {
            resolve({
              exitCode: null,
              stdout,
              stderr: stderr ? `${stderr}\n${error.message}` : error.message,
              timedOut: false,
            });
            return;
          }
          if (typeof error.code === 'string') {
            reject(new ToolError(
              ErrorCodes.TOOL_SPAWN_FAILED,
              `Failed to run ${command}: ${error.message}`,
              { command, args, errno: error.code }
            ));
            return;
          }
          resolve({
            exitCode: typeof error.code === 'number' ? error.code : null,
            stdout,
            stderr,
            timedOut: error.killed === true && error.signal !== null && error.signal !== undefined,
          });
        }
      );
    });
  }

  private async lookup(command: string): Promise<boolean> {
    if (isPath(command)) {
      return isExecutable(command);
    }
    const dirs = (this.env.PATH ?? this.env.Path ?? '').split(path.delimiter).filter(Boolean);
    const extensions = this.platform === 'win32'
      ? ['', ...(this.env.PATHEXT ?? '.EXE;.CMD;.BAT;.COM').split(';').filter(Boolean)]
      : [''];

    for (const dir of dirs) {
      for (const ext of extensions) {
        if (await isExecutable(path.join(dir, command + ext))) {
          return true;
        }
      }
    }
    return false;
  }
}

function isPath(command: string): boolean {
  return command.includes('/') || command.includes('\\');
}

async function isExecutable(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.promises.stat(filePath);
    if (!stat.isFile()) return false;
    await fs.promises.access(filePath, fs.constants.X_OK);
    return true;
  } catch { /* missing or not executable */
    return false;
  }
}
