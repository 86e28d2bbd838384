/**
 * External collaborators and how to install them.
 */
import type { Config, ToolName } from '../config/schema.js';
import type { ResolvedTool } from './types.js';

export const TOOL_INSTALL_HINTS: Record<ToolName, string> = {
  rstcheck: 'pip install rstcheck',
  'swagger-cli': 'npm install -g @apidevtools/swagger-cli',
  protoc: 'https://grpc.io/docs/protoc-installation/',
  markdownlint: 'npm install -g markdownlint-cli',
  'sphinx-build': 'pip install sphinx',
};

export function resolveTool(name: ToolName, config: Config): ResolvedTool {
  const settings = config.tools[name];
  return {
    name,
    command: settings.command ?? name,
    args: [...settings.args],
    installHint: TOOL_INSTALL_HINTS[name],
  };
}

/** Combined stdout and stderr, the way `2>&1` would show it. */
export function combinedOutput(result: { stdout: string; stderr: string }): string {
  if (!result.stderr) return result.stdout;
  if (!result.stdout) return result.stderr;
  return `${result.stdout}\n${result.stderr}`;
}
