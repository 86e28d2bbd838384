/**
 * Tests for the tools command.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { collectToolStatus, createToolsCommand, formatToolStatus } from '../../../../src/cli/commands/tools.js';
import { getDefaultConfig } from '../../../../src/core/config/loader.js';
import { TOOL_NAMES } from '../../../../src/core/config/schema.js';
import { resolveTool } from '../../../../src/core/tools/catalog.js';
import { FakeToolRunner } from '../../../helpers/fake-runner.js';
import { createProject, removeProject } from '../../../helpers/project.js';

describe('collectToolStatus', () => {
  it('reports availability per tool', async () => {
    const runner = new FakeToolRunner({ protoc: () => ({}) });
    const statuses = await collectToolStatus(runner, TOOL_NAMES.map((n) => resolveTool(n, getDefaultConfig())));

    expect(statuses.map((s) => [s.name, s.available])).toEqual([
      ['rstcheck', false],
      ['swagger-cli', false],
      ['protoc', true],
      ['markdownlint', false],
      ['sphinx-build', false],
    ]);
    expect(statuses[0]?.installHint).toBe('pip install rstcheck');
  });
});

describe('formatToolStatus', () => {
  it('lists installed tools and install hints', () => {
    const output = formatToolStatus([
      { name: 'protoc', command: 'protoc', available: true, installHint: 'https://grpc.io/docs/protoc-installation/' },
      { name: 'markdownlint', command: 'markdownlint-cli2', available: false, installHint: 'npm install -g markdownlint-cli' },
    ]);

    expect(output.split('\n').map((line) => line.replace(/\u001b\[\d+m/g, ''))).toEqual([
      '✓ protoc',
      '⚠ markdownlint (markdownlint-cli2) not installed. Install: npm install -g markdownlint-cli',
      'GraphQL schemas are validated in-process; no tool needed.',
    ]);
  });
});

describe('tools command', () => {
  let root: string;

  beforeEach(async () => {
    root = await createProject({ '.canon/config.yaml': 'tools:\n  rstcheck:\n    command: rstcheck-venv\n' });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeProject(root);
  });

  it('prints JSON with configured commands', async () => {
    const consoleLog = vi.spyOn(console, 'log').mockImplementation(() => {});
    const command = createToolsCommand({ createRunner: () => new FakeToolRunner({ 'rstcheck-venv': () => ({}) }) });

    await command.parseAsync(['node', 'tools', '--json', '--root', root]);

    const parsed: unknown = JSON.parse(String(consoleLog.mock.calls[0]?.[0]));
    expect(parsed).toHaveProperty([0], {
      name: 'rstcheck',
      command: 'rstcheck-venv',
      available: true,
      installHint: 'pip install rstcheck',
    });
    expect(parsed).toHaveProperty(['length'], 5);
  });
});
