/**
 * Tests for check selection.
 */
import { describe, it, expect } from 'vitest';
import { selectChecks, PRE_COMMIT_CHECKS } from '../../../../src/core/validation/modes.js';
import { CHECK_IDS } from '../../../../src/core/config/schema.js';
import type { CheckSelection } from '../../../../src/core/validation/types.js';

describe('selectChecks', () => {
  it('runs every check when no selector is given', () => {
    expect(selectChecks({})).toEqual({ mode: 'all', checks: [...CHECK_IDS] });
  });

  it('runs every check in canonical order for --all', () => {
    expect(selectChecks({ all: true }).checks).toEqual([
      'rest',
      'openapi',
      'graphql',
      'proto',
      'markdown',
      'sphinx',
      'access-level',
      'formatting',
    ]);
  });

  it.each([
    ['rest'],
    ['openapi'],
    ['graphql'],
    ['proto'],
    ['markdown'],
    ['sphinx'],
  ] as const)('maps --%s to a single check', (selector) => {
    const selection: CheckSelection = {};
    selection[selector] = true;
    expect(selectChecks(selection)).toEqual({ mode: selector, checks: [selector] });
  });

  it('runs markdown and formatting for --pre-commit', () => {
    expect(selectChecks({ preCommit: true })).toEqual({
      mode: 'pre-commit',
      checks: ['markdown', 'formatting'],
    });
  });

  it('runs strictly fewer checks for --pre-commit than --all', () => {
    const preCommit = selectChecks({ preCommit: true }).checks;
    const all = selectChecks({ all: true }).checks;
    expect(preCommit.length).toBeLessThan(all.length);
    expect(preCommit.every((id) => all.includes(id))).toBe(true);
    expect(preCommit).toEqual([...PRE_COMMIT_CHECKS]);
  });

  it('combines selectors in canonical order', () => {
    expect(selectChecks({ sphinx: true, rest: true, preCommit: true })).toEqual({
      mode: 'pre-commit+rest+sphinx',
      checks: ['rest', 'markdown', 'sphinx', 'formatting'],
    });
  });

  it('lets --all win over other selectors', () => {
    expect(selectChecks({ proto: true, all: true }).mode).toBe('all');
  });
});
