/**
 * Access-level banner check for reST documents.
 */
import * as path from 'node:path';
import { BaseDocumentationCheck } from './base.js';
import type { CheckContext, Finding } from './types.js';
import { AccessLevelSchema, type AccessLevel } from '../config/schema.js';
import { ErrorCodes } from '../../utils/errors.js';
import { readFile } from '../../utils/file-system.js';

/** Tier names indexed by level number (1-based). */
export const ACCESS_LEVELS: readonly AccessLevel[] = AccessLevelSchema.options;

export type BannerStatus =
  | { kind: 'missing' }
  | { kind: 'unnumbered' }
  | { kind: 'valid'; level: number; name: AccessLevel }
  | { kind: 'unknown'; level: number };

/**
 * Locate the banner marker and read the level number that follows it, as in
 * `INTERNAL DOCUMENTATION - Level 2`.
 */
export function readBanner(content: string, marker: string): BannerStatus {
  const index = content.indexOf(marker);
  if (index === -1) {
    return { kind: 'missing' };
  }
  const match = /^\s*(\d+)/.exec(content.slice(index + marker.length));
  if (!match) {
    return { kind: 'unnumbered' };
  }
  const level = Number(match[1]);
  const name = ACCESS_LEVELS[level - 1];
  return name === undefined ? { kind: 'unknown', level } : { kind: 'valid', level, name };
}

/**
 * Every reST page must carry the access-level banner. Missing banners are
 * warnings; classification is applied by authors, not enforced here.
 */
export class AccessLevelCheck extends BaseDocumentationCheck {
  readonly id = 'access-level' as const;
  readonly title = 'Checking Access Level Warnings';

  async run(context: CheckContext): Promise<Finding[]> {
    const dir = context.config.paths.rest_source;
    if (!(await this.directoryExists(context, dir))) {
      return [];
    }

    const { marker } = context.config.access_level;
    const findings: Finding[] = [];
    for (const file of await this.listFiles(context, dir, ['**/*.rst'])) {
      const banner = readBanner(await readFile(path.resolve(context.projectRoot, file)), marker);
      if (banner.kind === 'missing') {
        findings.push(this.warning(
          ErrorCodes.ACCESS_LEVEL_MISSING,
          `Missing access level warning: ${file}`,
          { file }
        ));
      } else if (banner.kind === 'unknown') {
        findings.push(this.warning(
          ErrorCodes.ACCESS_LEVEL_UNKNOWN,
          `Unknown access level ${banner.level} (expected 1-${ACCESS_LEVELS.length}): ${file}`,
          { file }
        ));
      }
    }
    return findings;
  }
}
