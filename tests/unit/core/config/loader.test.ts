/**
 * Tests for configuration loading.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { loadConfig, getDefaultConfig, getConfigPath } from '../../../../src/core/config/loader.js';
import { ConfigError, ErrorCodes } from '../../../../src/utils/errors.js';
import { createProject, removeProject } from '../../../helpers/project.js';

describe('loadConfig', () => {
  let root: string;

  beforeEach(async () => {
    root = await createProject();
  });

  afterEach(async () => {
    await removeProject(root);
  });

  it('returns defaults when no config file exists', async () => {
    const config = await loadConfig(root);

    expect(config).toEqual(getDefaultConfig());
    expect(config.paths).toEqual({
      docs: 'docs',
      rest_source: 'docs/source',
      sphinx_build: 'docs/build',
      decisions: 'docs/decisions',
      changelog: 'CHANGELOG.md',
      openapi: 'api-specs',
      graphql: 'graphql',
      proto: 'proto',
    });
    expect(config.validation).toEqual({
      fail_on_warning: false,
      tool_timeout_ms: 120000,
      exit_codes: { success: 0, error: 1, warning_only: 0 },
    });
    expect(config.checks.formatting.enabled).toBe(true);
    expect(config.tools.rstcheck).toEqual({ args: [] });
  });

  it('merges a partial config file with defaults', async () => {
    await removeProject(root);
    root = await createProject({
      '.canon/config.yaml': [
        'paths:',
        '  openapi: specs',
        'tools:',
        '  markdownlint:',
        '    command: markdownlint-cli2',
        'checks:',
        '  sphinx:',
        '    enabled: false',
        'formatting:',
        '  patterns:',
        '    - name: TODO',
        '      pattern: "\\\\bTODO\\\\b"',
        '',
      ].join('\n'),
    });

    const config = await loadConfig(root);

    expect(config.paths.openapi).toBe('specs');
    expect(config.paths.docs).toBe('docs');
    expect(config.tools.markdownlint).toEqual({ command: 'markdownlint-cli2', args: [] });
    expect(config.checks.sphinx.enabled).toBe(false);
    expect(config.checks.rest.enabled).toBe(true);
    expect(config.formatting.patterns).toEqual([{ name: 'TODO', pattern: '\\bTODO\\b' }]);
    expect(config.formatting.forbid_emoji).toBe(true);
  });

  it('treats an empty file as all defaults', async () => {
    await removeProject(root);
    root = await createProject({ '.canon/config.yaml': '' });

    expect(await loadConfig(root)).toEqual(getDefaultConfig());
  });

  it('rejects values of the wrong type', async () => {
    await removeProject(root);
    root = await createProject({ '.canon/config.yaml': 'validation:\n  tool_timeout_ms: soon\n' });

    await expect(loadConfig(root)).rejects.toBeInstanceOf(ConfigError);
    await expect(loadConfig(root)).rejects.toMatchObject({ code: ErrorCodes.CONFIG_LOAD_ERROR });
  });

  it('rejects an invalid forbidden pattern', async () => {
    await removeProject(root);
    root = await createProject({
      '.canon/config.yaml': 'formatting:\n  patterns:\n    - name: broken\n      pattern: "("\n',
    });

    await expect(loadConfig(root)).rejects.toThrow('Invalid regular expression');
  });

  it('rejects malformed YAML', async () => {
    await removeProject(root);
    root = await createProject({ '.canon/config.yaml': 'paths: [unclosed\n' });

    await expect(loadConfig(root)).rejects.toBeInstanceOf(ConfigError);
  });

  it('fails when an explicit config path does not exist', async () => {
    await expect(loadConfig(root, 'custom.yaml')).rejects.toThrow('Config file not found');
  });

  it('loads an explicit config path', async () => {
    await removeProject(root);
    root = await createProject({ 'ci/canon.yaml': 'paths:\n  proto: schemas/proto\n' });

    const config = await loadConfig(root, 'ci/canon.yaml');
    expect(config.paths.proto).toBe('schemas/proto');
  });

  it('resolves the default config path under the project root', () => {
    expect(getConfigPath('/project')).toBe('/project/.canon/config.yaml');
  });
});
