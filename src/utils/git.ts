/**
 * Git queries used by pre-commit runs.
 */
import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFile);

const GIT_COMMAND_TIMEOUT_MS = 10000;

/**
 * Check if the directory is inside a git work tree.
 */
export async function isGitRepository(projectRoot: string): Promise<boolean> {
  try {
    await execFileAsync('git', ['rev-parse', '--is-inside-work-tree'], {
      cwd: projectRoot,
      encoding: 'utf-8',
      timeout: GIT_COMMAND_TIMEOUT_MS,
    });
    return true;
  } catch { /* not a git repo or git unavailable */
    return false;
  }
}

/**
 * List staged files (added, copied, modified, renamed), relative to the
 * project root with forward slashes.
 */
export async function getStagedFiles(projectRoot: string): Promise<string[]> {
  try {
    const { stdout } = await execFileAsync(
      'git',
      ['diff', '--cached', '--name-only', '--relative', '--diff-filter=ACMR'],
      { cwd: projectRoot, encoding: 'utf-8', timeout: GIT_COMMAND_TIMEOUT_MS }
    );
    return parseNameList(stdout);
  } catch { /* not a git repo or git command failed */
    return [];
  }
}

export function parseNameList(stdout: string): string[] {
  return stdout
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}
