/**
 * The check command: validate the documentation tree.
 */
import { Command } from 'commander';
import * as path from 'node:path';
import { loadConfig } from '../../core/config/loader.js';
import { ValidationEngine } from '../../core/validation/engine.js';
import { selectChecks } from '../../core/validation/modes.js';
import type { RunResult } from '../../core/validation/types.js';
import { ProcessToolRunner } from '../../core/tools/runner.js';
import type { ToolRunner } from '../../core/tools/types.js';
import { loadCanonIgnore } from '../../utils/canonignore.js';
import { logger } from '../../utils/logger.js';
import { HumanFormatter } from '../formatters/index.js';
import { createFormatter, getExitCode, parseOutputFormat, resolveStagedFiles } from './check-helpers.js';

export interface CheckCommandOptions {
  rest?: boolean;
  openapi?: boolean;
  graphql?: boolean;
  proto?: boolean;
  markdown?: boolean;
  sphinx?: boolean;
  preCommit?: boolean;
  all?: boolean;
  root?: string;
  config?: string;
  format: string;
  json?: boolean;
  strict?: boolean;
  staged?: boolean;
  errorsOnly?: boolean;
  quiet?: boolean;
  verbose?: boolean;
  color: boolean;
}

export interface CheckCommandDependencies {
  createRunner?: () => ToolRunner;
}

export function createCheckCommand(dependencies: CheckCommandDependencies = {}): Command {
  const createRunner = dependencies.createRunner ?? (() => new ProcessToolRunner());

  return new Command('check')
    .description('Validate documentation against the canons and external linters')
    .option('--rest', 'Validate reStructuredText files with rstcheck')
    .option('--openapi', 'Validate OpenAPI specifications with swagger-cli')
    .option('--graphql', 'Validate GraphQL schemas')
    .option('--proto', 'Validate Protocol Buffers with protoc')
    .option('--markdown', 'Validate CHANGELOG and decision records with markdownlint')
    .option('--sphinx', 'Run a Sphinx build with warnings as errors')
    .option('--pre-commit', 'Quick validation: markdown and formatting rules')
    .option('--all', 'Run every check (default)')
    .option('--root <dir>', 'Project root (default: current directory)')
    .option('--config <path>', 'Path to config file')
    .option('--format <format>', 'Output format: human, json, or compact', 'human')
    .option('--json', 'Output in JSON format')
    .option('--strict', 'Treat warnings as errors')
    .option('--staged', 'Only scan files staged in git')
    .option('--errors-only', 'Hide warnings in output (still counted)')
    .option('--quiet', 'Hide success lines and info logs')
    .option('--verbose', 'Show debug logs and tool output')
    .option('--no-color', 'Disable colored output')
    .action(async (options: CheckCommandOptions) => {
      let exitCode: number;
      try {
        exitCode = await runCheck(options, createRunner());
      } catch (error) {
        logger.error('Validation failed', error instanceof Error ? error : undefined);
        exitCode = 1;
      }
      process.exit(exitCode);
    });
}

/**
 * Run the selected checks, print the report and return the exit code.
 */
export async function runCheck(options: CheckCommandOptions, runner: ToolRunner): Promise<number> {
  if (options.verbose) {
    logger.setLevel('debug');
  } else if (options.quiet) {
    logger.setLevel('warn');
  }

  const projectRoot = path.resolve(options.root ?? process.cwd());
  const config = await loadConfig(projectRoot, options.config);
  const format = options.json ? 'json' : parseOutputFormat(options.format);
  const { mode, checks } = selectChecks(options);

  const ignore = await loadCanonIgnore(projectRoot);
  const onlyFiles = options.staged ? await resolveStagedFiles(projectRoot) : undefined;

  const formatter = createFormatter(format, {
    colors: options.color !== false,
    quiet: options.quiet ?? false,
    errorsOnly: options.errorsOnly ?? false,
  });
  logger.debug(`Running ${mode}: ${checks.join(', ')}`, { projectRoot });

  const engine = new ValidationEngine(projectRoot, config, runner, { ignore, onlyFiles });
  let run: RunResult;
  if (formatter instanceof HumanFormatter) {
    console.log(formatter.formatHeader());
    run = await engine.run(checks, {
      mode,
      onCheck: (result) => console.log(formatter.formatCheck(result)),
    });
    console.log(formatter.formatSummary(run.summary));
  } else {
    run = await engine.run(checks, { mode });
    console.log(formatter.formatRun(run));
  }

  const failOnWarning = options.strict === true || config.validation.fail_on_warning;
  return getExitCode(run.summary, config.validation.exit_codes, failOnWarning);
}
