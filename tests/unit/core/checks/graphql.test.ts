/**
 * Tests for the in-process GraphQL schema check.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { GraphQLCheck, validateSchemaSource } from '../../../../src/core/checks/graphql.js';
import { FakeToolRunner } from '../../../helpers/fake-runner.js';
import { createContext, createProject, removeProject } from '../../../helpers/project.js';

describe('validateSchemaSource', () => {
  it('accepts a valid schema', () => {
    expect(validateSchemaSource('type Query {\n  hello: String\n}\n')).toBeNull();
  });

  it('reports syntax errors with their line', () => {
    const problem = validateSchemaSource('type Query {\n  hello:\n}\n');
    expect(problem?.line).toBe(3);
    expect(problem?.message).toMatch(/^Syntax Error/);
  });

  it('reports unresolved types', () => {
    const problem = validateSchemaSource('type Query {\n  user: User\n}\n');
    expect(problem?.message).toContain('Unknown type "User"');
  });
});

describe('GraphQLCheck', () => {
  let root: string;
  const check = new GraphQLCheck();
  const runner = new FakeToolRunner();

  afterEach(async () => {
    await removeProject(root);
  });

  it('warns when the schema directory is missing', async () => {
    root = await createProject();
    expect(await check.run(createContext(root, runner))).toEqual([
      {
        check: 'graphql',
        status: 'warning',
        code: 'W002',
        message: 'No graphql directory found',
      },
    ]);
  });

  describe('with schemas', () => {
    beforeEach(async () => {
      root = await createProject({
        'graphql/schema.graphql': 'type Query { hello: String }\n',
        'graphql/legacy/broken.gql': 'type Query {\n  hello:\n}\n',
        'graphql/README.md': 'not a schema',
      });
    });

    it('validates .graphql and .gql files without any external tool', async () => {
      const findings = await check.run(createContext(root, runner));
      expect(findings.map((f) => [f.status, f.file])).toEqual([
        ['error', 'graphql/legacy/broken.gql'],
        ['pass', 'graphql/schema.graphql'],
      ]);
      expect(findings[0]?.line).toBe(3);
      expect(findings[0]?.message).toMatch(/^GraphQL validation failed: graphql\/legacy\/broken\.gql: Syntax Error/);
      expect(findings[1]?.message).toBe('GraphQL valid: graphql/schema.graphql');
      expect(runner.calls).toEqual([]);
    });
  });
});
