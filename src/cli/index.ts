/**
 * CLI program definition.
 */
import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { createCheckCommand } from './commands/check.js';
import { createInitCommand } from './commands/init.js';
import { createToolsCommand } from './commands/tools.js';
import type { ToolRunner } from '../core/tools/types.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

const PackageJsonSchema = z.object({ version: z.string() });

/**
 * Read the version from package.json. The file sits two levels up from
 * both src/cli and dist/cli.
 */
function readVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'));
  return PackageJsonSchema.parse(raw).version;
}

export interface CliDependencies {
  createRunner?: () => ToolRunner;
}

/** Create the CLI program. */
export function createCli(dependencies: CliDependencies = {}): Command {
  const program = new Command()
    .name('canon-check')
    .description('Validate documentation against its writing canons')
    .version(readVersion());

  program.addCommand(createCheckCommand(dependencies), { isDefault: true });
  program.addCommand(createInitCommand());
  program.addCommand(createToolsCommand(dependencies));
  return program;
}
