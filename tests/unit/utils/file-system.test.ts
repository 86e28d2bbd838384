/**
 * Tests for file-system utilities.
 */
import { describe, it, expect, afterEach } from 'vitest';
import { join } from 'node:path';
import {
  globFiles,
  isBinaryContent,
  isDirectory,
  fileExists,
  toPosixRelative,
  writeFile,
  readFile,
} from '../../../src/utils/file-system.js';
import { createProject, removeProject } from '../../helpers/project.js';

describe('file-system', () => {
  let root: string | undefined;

  afterEach(async () => {
    if (root) await removeProject(root);
    root = undefined;
  });

  it('globs sorted relative paths and skips node_modules and dotfiles', async () => {
    root = await createProject({
      'docs/b.md': '# B\n',
      'docs/a.md': '# A\n',
      'docs/.draft.md': '# Draft\n',
      'docs/node_modules/pkg/README.md': '# Pkg\n',
    });

    expect(await globFiles('docs/**/*.md', { cwd: root })).toEqual(['docs/a.md', 'docs/b.md']);
  });

  it('includes dotfiles when asked', async () => {
    root = await createProject({
      'docs/a.md': '# A\n',
      'docs/.draft.md': '# Draft\n',
      'docs/.hidden/c.md': '# C\n',
    });

    expect(await globFiles('docs/**/*.md', { cwd: root, dot: true })).toEqual([
      'docs/.draft.md',
      'docs/.hidden/c.md',
      'docs/a.md',
    ]);
  });

  it('writes files and creates parent directories', async () => {
    root = await createProject();
    const target = join(root, 'nested/dir/file.txt');

    await writeFile(target, 'content');

    expect(await readFile(target)).toBe('content');
    expect(await fileExists(target)).toBe(true);
    expect(await isDirectory(join(root, 'nested'))).toBe(true);
    expect(await fileExists(join(root, 'nested'))).toBe(false);
  });

  it('detects binary content by NUL bytes', () => {
    expect(isBinaryContent(Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x00, 0x01]))).toBe(true);
    expect(isBinaryContent(Buffer.from('plain text — with unicode', 'utf-8'))).toBe(false);
  });

  it('makes absolute paths relative to the root', () => {
    expect(toPosixRelative('/project', '/project/docs/a.md')).toBe('docs/a.md');
    expect(toPosixRelative('/project', 'docs/a.md')).toBe('docs/a.md');
  });
});
