/**
 * Core-canon formatting rules: no emoji and no em-dashes anywhere in the
 * documentation tree, plus any extra patterns from config.
 */
import * as path from 'node:path';
import { BaseDocumentationCheck } from './base.js';
import type { CheckContext, Finding } from './types.js';
import type { FormattingSettings } from '../config/schema.js';
import { ErrorCodes } from '../../utils/errors.js';
import { isBinaryContent, readFileBuffer } from '../../utils/file-system.js';

/**
 * A forbidden-character rule. `source` is compiled with the `u` flag.
 */
export interface FormattingRule {
  name: string;
  source: string;
  code: string;
  /** Error message for one offending file */
  describe(file: string, line: number, count: number): string;
  /** Pass message when no file offends */
  clean: string;
}

/**
 * Characters shown as emoji by default, and text pictographs forced into
 * emoji presentation with U+FE0F (e.g. the warning sign).
 */
export const EMOJI_PATTERN = '\\p{Emoji_Presentation}|\\p{Extended_Pictographic}\\uFE0F';

export const EM_DASH_PATTERN = '\\u2014';

export interface RuleMatch {
  /** 1-based line of the first match */
  line: number;
  count: number;
}

/**
 * Count matches of a rule in text. Returns null when there are none.
 */
export function findRuleMatches(content: string, source: string): RuleMatch | null {
  const regex = new RegExp(source, 'gu');
  let first = -1;
  let count = 0;
  for (const match of content.matchAll(regex)) {
    if (match[0].length === 0) continue;
    if (first === -1) first = match.index ?? 0;
    count++;
  }
  if (count === 0) {
    return null;
  }
  return { line: content.slice(0, first).split('\n').length, count };
}

export function buildFormattingRules(settings: FormattingSettings): FormattingRule[] {
  const rules: FormattingRule[] = [];

  if (settings.forbid_emoji) {
    rules.push({
      name: 'emoji',
      source: EMOJI_PATTERN,
      code: ErrorCodes.EMOJI_FOUND,
      describe: (file, line, count) =>
        `Emojis found in ${file}:${line} (${count} occurrence${count === 1 ? '' : 's'}), violates core canon`,
      clean: 'No emojis found',
    });
  }

  if (settings.forbid_em_dash) {
    rules.push({
      name: 'em-dash',
      source: EM_DASH_PATTERN,
      code: ErrorCodes.EM_DASH_FOUND,
      describe: (file, line, count) =>
        `Emdashes (—) found in ${file}:${line} (${count} occurrence${count === 1 ? '' : 's'}), violates core canon`,
      clean: 'No emdashes found',
    });
  }

  for (const pattern of settings.patterns) {
    rules.push({
      name: pattern.name,
      source: pattern.pattern,
      code: ErrorCodes.FORBIDDEN_PATTERN,
      describe: (file, line, count) =>
        `${pattern.message ?? `Forbidden pattern "${pattern.name}" found`} in ${file}:${line} (${count} occurrence${count === 1 ? '' : 's'})`,
      clean: `No ${pattern.name} found`,
    });
  }

  return rules;
}

export class FormattingCheck extends BaseDocumentationCheck {
  readonly id = 'formatting' as const;
  readonly title = 'Checking Formatting Rules (No Emojis, No Emdashes)';

  async run(context: CheckContext): Promise<Finding[]> {
    const dir = context.config.paths.docs;
    if (!(await this.directoryExists(context, dir))) {
      context.logger.debug(`No ${dir} directory, skipping formatting rules`);
      return [];
    }

    const rules = buildFormattingRules(context.config.formatting);
    const offences = new Map<string, Finding[]>(rules.map((r) => [r.name, []]));

    // Dotfiles and dot-directories are part of the tree too.
    for (const file of await this.listFiles(context, dir, ['**/*'], { dot: true })) {
      const buffer = await readFileBuffer(path.resolve(context.projectRoot, file));
      if (isBinaryContent(buffer)) {
        context.logger.debug(`Skipping binary file ${file}`);
        continue;
      }
      const content = buffer.toString('utf-8');
      for (const rule of rules) {
        const match = findRuleMatches(content, rule.source);
        if (match) {
          offences.get(rule.name)?.push(this.error(
            rule.code,
            rule.describe(file, match.line, match.count),
            { file, line: match.line }
          ));
        }
      }
    }

    // Errors for a rule stay together, in rule order, then file order.
    return rules.flatMap((rule) => {
      const found = offences.get(rule.name) ?? [];
      return found.length > 0 ? found : [this.pass(rule.clean)];
    });
  }
}
