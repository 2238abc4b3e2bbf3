/**
 * Changelog configuration: the JSON file shape and its compiled form.
 *
 * The file is data only. Patterns are validated and compiled here, so a bad
 * regular expression is reported when the file is loaded rather than halfway
 * through a run.
 *
 * @module config/schema
 */

import { z } from 'zod';
import { ConfigError } from '../errors';
import { groupRules } from '../changelog/rules';
import type { Rule, RuleSet } from '../changelog/rules';

export interface ChangelogConfig {
  rules: RuleSet;
  /** Title of the block holding commits after the newest release tag. */
  unreleasedVersionLabel: string;
  /** Tags whose name matches at the start are release boundaries. */
  tagFilter: RegExp;
  /** Separates paragraphs in commit bodies. */
  bodySplit: RegExp;
}

export const DEFAULT_UNRELEASED_LABEL = 'unreleased';
export const DEFAULT_TAG_FILTER = 'v?\\d+\\.\\d+(\\.\\d+)?';
export const DEFAULT_BODY_SPLIT = '\\n\\n';

function isValidRegExp(source: string): boolean {
  try {
    new RegExp(source);
    return true;
  } catch {
    return false;
  }
}

const pattern = z.string().refine(isValidRegExp, source => ({
  message: `Invalid regular expression: ${source}`,
}));

export const changelogConfigSchema = z
  .object({
    ignore: z.array(pattern).default([]),
    replace: z
      .array(z.object({ pattern, replacement: z.string() }).strict())
      .default([]),
    sections: z
      .array(z.object({ label: z.string().min(1), patterns: z.array(pattern).nullable() }).strict())
      .default([]),
    unreleasedVersionLabel: z.string().min(1).default(DEFAULT_UNRELEASED_LABEL),
    tagFilter: pattern.default(DEFAULT_TAG_FILTER),
    bodySplit: pattern.default(DEFAULT_BODY_SPLIT),
  })
  .strict();

export type ChangelogConfigFile = z.input<typeof changelogConfigSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `  ${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('\n');
}

/**
 * Validates a parsed config document and compiles its patterns.
 * @param source - Shown in error messages (usually the file path).
 * @throws ConfigError listing every invalid field.
 */
export function parseConfig(value: unknown, source = 'config'): ChangelogConfig {
  const result = changelogConfigSchema.safeParse(value);
  if (!result.success) {
    throw new ConfigError(`Invalid changelog config in ${source}:\n${formatIssues(result.error)}`);
  }
  const data = result.data;

  const rules: Rule[] = [
    ...data.ignore.map((p): Rule => ({ kind: 'ignore', pattern: new RegExp(p) })),
    ...data.replace.map((r): Rule => ({
      kind: 'replace',
      pattern: new RegExp(r.pattern, 'g'),
      replacement: r.replacement,
    })),
    ...data.sections.map((s): Rule => ({
      kind: 'section',
      label: s.label,
      patterns: s.patterns === null ? null : s.patterns.map(p => new RegExp(p)),
    })),
  ];

  return {
    rules: groupRules(rules),
    unreleasedVersionLabel: data.unreleasedVersionLabel,
    tagFilter: new RegExp(data.tagFilter),
    bodySplit: new RegExp(data.bodySplit, 'm'),
  };
}

/** Configuration used when a file sets nothing. */
export function defaultConfig(): ChangelogConfig {
  return parseConfig({}, 'defaults');
}
