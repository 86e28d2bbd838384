/**
 * The tools command: report which external linters can be found.
 */
import { Command } from 'commander';
import * as path from 'node:path';
import chalk from 'chalk';
import { loadConfig } from '../../core/config/loader.js';
import { TOOL_NAMES, type ToolName } from '../../core/config/schema.js';
import { resolveTool } from '../../core/tools/catalog.js';
import { ProcessToolRunner } from '../../core/tools/runner.js';
import type { ToolRunner } from '../../core/tools/types.js';
import { logger } from '../../utils/logger.js';

export interface ToolStatus {
  name: ToolName;
  command: string;
  available: boolean;
  installHint: string;
}

interface ToolsOptions {
  json?: boolean;
  root?: string;
  config?: string;
}

export function createToolsCommand(dependencies: { createRunner?: () => ToolRunner } = {}): Command {
  const createRunner = dependencies.createRunner ?? (() => new ProcessToolRunner());

  return new Command('tools')
    .description('List the external linters and whether they are installed')
    .option('--json', 'Output in JSON format')
    .option('--root <dir>', 'Project root (default: current directory)')
    .option('--config <path>', 'Path to config file')
    .action(async (options: ToolsOptions) => {
      try {
        const projectRoot = path.resolve(options.root ?? process.cwd());
        const config = await loadConfig(projectRoot, options.config);
        const statuses = await collectToolStatus(
          createRunner(),
          TOOL_NAMES.map((n) => resolveTool(n, config)),
          projectRoot
        );
        console.log(options.json ? JSON.stringify(statuses, null, 2) : formatToolStatus(statuses));
      } catch (error) {
        logger.error('Failed to inspect tools', error instanceof Error ? error : undefined);
        process.exit(1);
      }
    });
}

export async function collectToolStatus(
  runner: ToolRunner,
  tools: Array<{ name: ToolName; command: string; installHint: string }>,
  projectRoot?: string
): Promise<ToolStatus[]> {
  const statuses: ToolStatus[] = [];
  for (const tool of tools) {
    statuses.push({
      name: tool.name,
      command: tool.command,
      available: await runner.isAvailable(tool.command, projectRoot),
      installHint: tool.installHint,
    });
  }
  return statuses;
}

export function formatToolStatus(statuses: ToolStatus[]): string {
  const lines = statuses.map((s) => {
    const label = s.command === s.name ? s.name : `${s.name} (${s.command})`;
    return s.available
      ? chalk.green(`✓ ${label}`)
      : chalk.yellow(`⚠ ${label} not installed. Install: ${s.installHint}`);
  });
  lines.push(chalk.dim('GraphQL schemas are validated in-process; no tool needed.'));
  return lines.join('\n');
}
