/**
 * .canonignore support - gitignore-style patterns that exclude files from
 * every check.
 */
import { join } from 'node:path';
import ignore, { type Ignore } from 'ignore';
import { fileExists, readFile } from './file-system.js';

export const CANONIGNORE_FILENAME = '.canonignore';

/**
 * Patterns written by `canon-check init`.
 */
export const DEFAULT_IGNORE_PATTERNS = [
  'node_modules/',
  'docs/build/',
  '_build/',
  '.git/',
];

export interface CanonIgnore {
  /**
   * Check if a path (relative to the project root) is ignored.
   */
  ignores(filePath: string): boolean;

  /**
   * Keep only the paths that are not ignored.
   */
  filter(filePaths: string[]): string[];

  patterns(): string[];
}

/**
 * Load .canonignore from the project root.
 * A missing file yields an empty filter; defaults only exist in the file
 * that `init` writes.
 */
export async function loadCanonIgnore(projectRoot: string): Promise<CanonIgnore> {
  const ignorePath = join(projectRoot, CANONIGNORE_FILENAME);
  if (!(await fileExists(ignorePath))) {
    return createCanonIgnore([]);
  }
  return createCanonIgnore(parseCanonIgnore(await readFile(ignorePath)));
}

export function createCanonIgnore(patterns: string[]): CanonIgnore {
  const ig: Ignore = ignore().add(patterns);
  const ignores = (filePath: string): boolean => ig.ignores(filePath.replace(/\\/g, '/'));

  return {
    ignores,
    filter: (filePaths) => filePaths.filter((fp) => !ignores(fp)),
    patterns: () => [...patterns],
  };
}

/**
 * Parse ignore-file content: blank lines and `#` comments are dropped.
 */
export function parseCanonIgnore(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}
