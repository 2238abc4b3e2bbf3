/**
 * Commit classification rules.
 *
 * Three layers, evaluated against the commit subject:
 * - ignore rules drop the commit entirely
 * - section rules pick the heading it is listed under (first match wins)
 * - replace rules rewrite the subject before it is printed
 *
 * @module changelog/rules
 */

import type { Commit } from '../git/commit';
import { finalDot, indent, paragraphWrap, textWrap, ucfirst } from '../text/format';

// ── Types ──

export interface IgnoreRule {
  kind: 'ignore';
  pattern: RegExp;
}

export interface ReplaceRule {
  kind: 'replace';
  /** Compiled with the global flag: every match is replaced. */
  pattern: RegExp;
  /** Replacement text; `$1`-style group references are honoured. */
  replacement: string;
}

export interface SectionRule {
  kind: 'section';
  label: string;
  /** null matches any subject. */
  patterns: RegExp[] | null;
}

export type Rule = IgnoreRule | ReplaceRule | SectionRule;

/** Rules grouped by kind, each list in declaration order. */
export interface RuleSet {
  ignore: IgnoreRule[];
  replace: ReplaceRule[];
  sections: SectionRule[];
}

export interface ClassifiedEntry {
  /** Section label, or null when no section rule matched. */
  section: string | null;
  /** Rendered list item, blank-line terminated. */
  text: string;
}

// ── Matching ──

/** `RegExp.test` without the `lastIndex` state a global/sticky regexp carries. */
function searches(pattern: RegExp, text: string): boolean {
  pattern.lastIndex = 0;
  return pattern.test(text);
}

export function groupRules(rules: readonly Rule[]): RuleSet {
  const set: RuleSet = { ignore: [], replace: [], sections: [] };
  for (const rule of rules) {
    switch (rule.kind) {
      case 'ignore':
        set.ignore.push(rule);
        break;
      case 'replace':
        set.replace.push(rule);
        break;
      case 'section':
        set.sections.push(rule);
        break;
    }
  }
  return set;
}

/** Whether any ignore pattern matches anywhere in the subject. */
export function isIgnored(rules: RuleSet, subject: string): boolean {
  return rules.ignore.some(rule => searches(rule.pattern, subject));
}

/** Label of the first section rule matching the subject, or null. */
export function matchSection(rules: RuleSet, subject: string): string | null {
  for (const rule of rules.sections) {
    if (rule.patterns === null) return rule.label;
    if (rule.patterns.some(pattern => searches(pattern, subject))) return rule.label;
  }
  return null;
}

/** Applies every replace rule, in declaration order. */
export function rewriteSubject(rules: RuleSet, subject: string): string {
  return rules.replace.reduce(
    (current, rule) => current.replace(globalPattern(rule.pattern), rule.replacement),
    subject,
  );
}

function globalPattern(pattern: RegExp): RegExp {
  if (pattern.global) {
    pattern.lastIndex = 0;
    return pattern;
  }
  return new RegExp(pattern.source, pattern.flags + 'g');
}

/** Declared section labels, in the order their blocks are printed. */
export function sectionOrder(rules: RuleSet): string[] {
  return rules.sections.map(rule => rule.label);
}

// ── Entries ──

/**
 * Renders a commit as an RST list item: the subject (rewritten, capitalized,
 * terminated, signed with the author name) wrapped under `- `, followed by
 * the indented body when there is one.
 */
export function renderEntry(subject: string, authorName: string, body: string, bodySplit: RegExp): string {
  const line = ucfirst(`${finalDot(subject)} [${authorName}]`);
  let entry = indent(textWrap(line).join('\n'), '  ', '- ').trim() + '\n\n';
  if (body) {
    entry += indent(paragraphWrap(body, bodySplit)) + '\n\n';
  }
  return entry;
}

/**
 * Runs the rule layers on one commit.
 * @returns null when the commit is ignored.
 */
export function classifyCommit(rules: RuleSet, commit: Commit, bodySplit: RegExp): ClassifiedEntry | null {
  if (isIgnored(rules, commit.subject)) return null;

  const section = matchSection(rules, commit.subject);
  const subject = rewriteSubject(rules, commit.subject);
  return {
    section,
    text: renderEntry(subject, commit.authorName, commit.body, bodySplit),
  };
}
