/**
 * Tests for the validation engine.
 */
import { describe, it, expect, vi } from 'vitest';
import { ValidationEngine, summarize } from '../../../../src/core/validation/engine.js';
import { ConfigSchema, type CheckId } from '../../../../src/core/config/schema.js';
import type { CheckResult, DocumentationCheck, Finding } from '../../../../src/core/checks/types.js';
import { createCanonIgnore } from '../../../../src/utils/canonignore.js';
import { FakeToolRunner } from '../../../helpers/fake-runner.js';
import { silentLogger } from '../../../helpers/project.js';

function stubCheck(id: CheckId, statuses: Finding['status'][]): DocumentationCheck {
  return {
    id,
    title: `Stub ${id}`,
    run: vi.fn(async () => statuses.map((status, i) => ({ check: id, status, code: 'X', message: `${id} ${i}` }))),
  };
}

function result(statuses: Finding['status'][]): CheckResult {
  return {
    check: 'rest',
    title: 'Stub',
    durationMs: 0,
    findings: statuses.map((status) => ({ check: 'rest', status, code: 'X', message: status })),
  };
}

describe('summarize', () => {
  it('passes with no findings', () => {
    expect(summarize([])).toEqual({ errors: 0, warnings: 0, passed: 0, status: 'pass' });
  });

  it('counts success lines without affecting status', () => {
    expect(summarize([result(['pass', 'pass'])])).toEqual({ errors: 0, warnings: 0, passed: 2, status: 'pass' });
  });

  it('is warn when only warnings were found', () => {
    expect(summarize([result(['warning']), result(['pass'])]).status).toBe('warn');
  });

  it('is fail when any error was found', () => {
    expect(summarize([result(['warning', 'error']), result(['error'])])).toEqual({
      errors: 2,
      warnings: 1,
      passed: 0,
      status: 'fail',
    });
  });
});

describe('ValidationEngine', () => {
  const checks: Record<string, DocumentationCheck> = {
    rest: stubCheck('rest', ['pass', 'error']),
    proto: stubCheck('proto', ['warning']),
    formatting: stubCheck('formatting', ['pass']),
  };

  function createEngine(config = ConfigSchema.parse({})) {
    return new ValidationEngine('/project', config, new FakeToolRunner(), {
      ignore: createCanonIgnore([]),
      logger: silentLogger(),
      resolveCheck: (id) => checks[id],
    });
  }

  it('runs checks in the given order and aggregates findings', async () => {
    const run = await createEngine().run(['rest', 'proto', 'formatting'], { mode: 'all' });

    expect(run.mode).toBe('all');
    expect(run.checks.map((c) => [c.check, c.title, c.findings.length])).toEqual([
      ['rest', 'Stub rest', 2],
      ['proto', 'Stub proto', 1],
      ['formatting', 'Stub formatting', 1],
    ]);
    expect(run.summary).toEqual({ errors: 1, warnings: 1, passed: 2, status: 'fail' });
  });

  it('reports each check as it finishes', async () => {
    const seen: string[] = [];
    await createEngine().run(['proto', 'formatting'], { onCheck: (r) => seen.push(r.check) });
    expect(seen).toEqual(['proto', 'formatting']);
  });

  it('skips checks disabled in config', async () => {
    const config = ConfigSchema.parse({ checks: { rest: { enabled: false } } });
    const run = await createEngine(config).run(['rest', 'formatting']);
    expect(run.checks.map((c) => c.check)).toEqual(['formatting']);
    expect(run.summary.status).toBe('pass');
  });

  it('skips ids without an implementation', async () => {
    const run = await createEngine().run(['graphql', 'proto']);
    expect(run.checks.map((c) => c.check)).toEqual(['proto']);
  });

  it('passes the project context to every check', async () => {
    const check = stubCheck('sphinx', []);
    const engine = new ValidationEngine('/project', ConfigSchema.parse({}), new FakeToolRunner(), {
      ignore: createCanonIgnore([]),
      onlyFiles: ['docs/a.md'],
      logger: silentLogger(),
      resolveCheck: () => check,
    });

    await engine.run(['sphinx']);

    expect(check.run).toHaveBeenCalledWith(expect.objectContaining({
      projectRoot: '/project',
      onlyFiles: new Set(['docs/a.md']),
    }));
  });
});
