/**
 * The init command: write default configuration files.
 */
import { Command } from 'commander';
import * as path from 'node:path';
import chalk from 'chalk';
import { DEFAULT_CONFIG_PATH } from '../../core/config/loader.js';
import { CANONIGNORE_FILENAME } from '../../utils/canonignore.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import { fileExists, writeFile } from '../../utils/file-system.js';
import { logger as log } from '../../utils/logger.js';
import { CANONIGNORE_TEMPLATE, CONFIG_TEMPLATE } from './init-templates.js';

export interface InitOptions {
  force?: boolean;
  root?: string;
}

export function createInitCommand(): Command {
  return new Command('init')
    .description('Create .canon/config.yaml and .canonignore with defaults')
    .option('--force', 'Overwrite existing files')
    .option('--root <dir>', 'Project root (default: current directory)')
    .action(async (options: InitOptions) => {
      try {
        await runInit(options);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

/**
 * Write the default files. Returns the paths written, relative to the root.
 */
export async function runInit(options: InitOptions): Promise<string[]> {
  const projectRoot = path.resolve(options.root ?? process.cwd());
  const configPath = path.join(projectRoot, DEFAULT_CONFIG_PATH);

  if (!options.force && (await fileExists(configPath))) {
    throw new ConfigError(
      ErrorCodes.CONFIG_EXISTS,
      `${DEFAULT_CONFIG_PATH} already exists. Use --force to overwrite.`,
      { path: configPath }
    );
  }

  const written: string[] = [];
  await writeFile(configPath, CONFIG_TEMPLATE);
  written.push(DEFAULT_CONFIG_PATH);
  log.success(`Created ${DEFAULT_CONFIG_PATH}`);

  const ignorePath = path.join(projectRoot, CANONIGNORE_FILENAME);
  if (options.force || !(await fileExists(ignorePath))) {
    await writeFile(ignorePath, CANONIGNORE_TEMPLATE);
    written.push(CANONIGNORE_FILENAME);
    log.success(`Created ${CANONIGNORE_FILENAME}`);
  }

  log.info(`Next: run ${chalk.cyan('canon-check tools')} to see which linters are installed`);
  return written;
}
