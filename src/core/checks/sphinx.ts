/**
 * Full Sphinx build with warnings treated as errors.
 */
import * as path from 'node:path';
import { BaseDocumentationCheck } from './base.js';
import type { CheckContext, Finding } from './types.js';
import { combinedOutput } from '../tools/catalog.js';
import { ErrorCodes } from '../../utils/errors.js';
import { fileExists } from '../../utils/file-system.js';

export class SphinxCheck extends BaseDocumentationCheck {
  readonly id = 'sphinx' as const;
  readonly title = 'Validating Sphinx Build';

  async run(context: CheckContext): Promise<Finding[]> {
    const required = await this.requireTool(context, 'sphinx-build');
    if ('missing' in required) {
      return [required.missing];
    }

    const { rest_source: source, sphinx_build: output } = context.config.paths;
    const hasConf = await fileExists(path.resolve(context.projectRoot, source, 'conf.py'));
    if (!hasConf) {
      return [this.warning(ErrorCodes.SPHINX_CONFIG_MISSING, 'No Sphinx configuration found')];
    }

    const result = await this.runTool(context, required.tool, ['-W', '-b', 'html', source, output]);
    const log = combinedOutput(result);
    if (result.timedOut || !log.includes('build succeeded')) {
      if (log.trim()) {
        context.logger.debug(log.trim());
      }
      return [this.error(ErrorCodes.SPHINX_FAILED, result.timedOut ? 'Sphinx build failed (timed out)' : 'Sphinx build failed')];
    }
    return [this.pass('Sphinx build succeeded')];
  }
}
