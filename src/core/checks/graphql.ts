/**
 * GraphQL SDL check. Schemas are built in-process with `graphql`, which
 * catches both syntax errors and unresolved or invalid type definitions.
 */
import * as path from 'node:path';
import { buildSchema, GraphQLError } from 'graphql';
import { BaseDocumentationCheck } from './base.js';
import type { CheckContext, Finding } from './types.js';
import { ErrorCodes } from '../../utils/errors.js';
import { readFile } from '../../utils/file-system.js';

export interface SchemaProblem {
  message: string;
  line?: number;
}

/**
 * Build an SDL document and report the first problem, or null when the
 * schema is valid.
 */
export function validateSchemaSource(source: string): SchemaProblem | null {
  try {
    buildSchema(source);
    return null;
  } catch (error) {
    if (error instanceof GraphQLError) {
      const line = error.locations?.[0]?.line;
      return line === undefined ? { message: error.message } : { message: error.message, line };
    }
    if (error instanceof Error) {
      return { message: error.message };
    }
    throw error;
  }
}

export class GraphQLCheck extends BaseDocumentationCheck {
  readonly id = 'graphql' as const;
  readonly title = 'Validating GraphQL Schemas';

  async run(context: CheckContext): Promise<Finding[]> {
    const dir = context.config.paths.graphql;
    if (!(await this.directoryExists(context, dir))) {
      return [this.warning(ErrorCodes.DIRECTORY_MISSING, `No ${dir} directory found`)];
    }

    const findings: Finding[] = [];
    for (const file of await this.listFiles(context, dir, ['**/*.{graphql,gql}'])) {
      const source = await readFile(path.resolve(context.projectRoot, file));
      const problem = validateSchemaSource(source);
      if (problem) {
        findings.push(this.error(
          ErrorCodes.GRAPHQL_INVALID,
          `GraphQL validation failed: ${file}: ${problem.message}`,
          { file, line: problem.line }
        ));
      } else {
        findings.push(this.pass(`GraphQL valid: ${file}`, { file }));
      }
    }
    return findings;
  }
}
