/**
 * Tests for YAML utilities.
 */
import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { parseYaml, parseYamlWithSchema, formatZodError } from '../../../src/utils/yaml.js';
import { SystemError, ErrorCodes } from '../../../src/utils/errors.js';

const Schema = z.object({
  name: z.string(),
  retries: z.number().default(3),
});

describe('parseYaml', () => {
  it('parses mappings', () => {
    expect(parseYaml('a: 1\nb: [x, y]\n')).toEqual({ a: 1, b: ['x', 'y'] });
  });

  it('throws a SystemError on invalid YAML', () => {
    expect(() => parseYaml('a: [1, 2\n')).toThrow(SystemError);
  });
});

describe('parseYamlWithSchema', () => {
  it('applies schema defaults', () => {
    expect(parseYamlWithSchema('name: docs\n', Schema)).toEqual({ name: 'docs', retries: 3 });
  });

  it('reports schema violations with their path', () => {
    try {
      parseYamlWithSchema('name: 5\n', Schema);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(SystemError);
      expect(error).toMatchObject({ code: ErrorCodes.INVALID_SCHEMA });
      expect(String(error)).toContain('name:');
    }
  });
});

describe('formatZodError', () => {
  it('joins issues with their paths', () => {
    const result = z.object({ a: z.object({ b: z.number() }) }).safeParse({ a: { b: 'x' } });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodError(result.error)).toMatch(/^a\.b: /);
    }
  });
});
