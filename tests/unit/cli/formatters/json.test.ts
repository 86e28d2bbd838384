/**
 * Tests for the JSON formatter.
 */
import { describe, it, expect } from 'vitest';
import { JsonFormatter } from '../../../../src/cli/formatters/json.js';
import { sampleRun } from '../../../helpers/run-result.js';

describe('JsonFormatter', () => {
  it('serializes mode, summary and findings', () => {
    const parsed: unknown = JSON.parse(new JsonFormatter().formatRun(sampleRun()));

    expect(parsed).toMatchObject({
      mode: 'all',
      summary: { errors: 2, warnings: 1, passed: 2, status: 'fail' },
    });
    expect(parsed).toHaveProperty(['checks', 0, 'duration_ms'], 12);
    expect(parsed).toHaveProperty(['checks', 2, 'duration_ms'], 4);
    expect(parsed).toHaveProperty(['checks', 2, 'findings', 1], {
      status: 'error',
      code: 'D009',
      message: 'Emdashes (—) found in docs/guide.md:3 (1 occurrence), violates core canon',
      file: 'docs/guide.md',
      line: 3,
    });
    expect(parsed).toHaveProperty(['checks', 1, 'findings', 0, 'file'], null);
  });

  it('drops passes and warnings on request', () => {
    const output = new JsonFormatter({ showPassing: false, errorsOnly: true }).formatRun(sampleRun());
    const parsed: unknown = JSON.parse(output);

    expect(parsed).toHaveProperty(['checks', 0, 'findings', 'length'], 1);
    expect(parsed).toHaveProperty(['checks', 1, 'findings', 'length'], 0);
    expect(parsed).toHaveProperty(['checks', 2, 'findings', 'length'], 1);
  });
});
