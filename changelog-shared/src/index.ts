/**
 * Public API for changelog-shared.
 */

// Errors
export {
  ChangelogError,
  ShellError,
  NotFoundError,
  OrderingError,
  ConfigTypeError,
  MalformedOutputError,
  ConfigError,
} from './errors';

// Text
export { WRAP_WIDTH, ucfirst, finalDot, indent, textWrap, paragraphWrap } from './text/format';

// Shell
export { runShell, wrapCommand, swrapCommand, shellQuote, formatShellFailure } from './shell/exec';
export type { ShellResult, RunOptions, WrapOptions, CommandRunner } from './shell/exec';

// Git
export { Commit, COMMIT_FIELDS, COMMIT_FORMAT, FIELD_SEPARATOR, parseCommitRecord } from './git/commit';
export type { CommitData } from './git/commit';
export { inflateConfig } from './git/inflate';
export type { ConfigTree, InflateOptions } from './git/inflate';
export { GitRepository, EARLIEST, TIP } from './git/repository';
export type { CommitRef, GitRepositoryOptions, Logger } from './git/repository';

// Rules
export {
  groupRules,
  isIgnored,
  matchSection,
  rewriteSubject,
  sectionOrder,
  renderEntry,
  classifyCommit,
} from './changelog/rules';
export type { Rule, IgnoreRule, ReplaceRule, SectionRule, RuleSet, ClassifiedEntry } from './changelog/rules';

// Rendering and assembly
export { DOCUMENT_TITLE, OTHER_LABEL, renderRelease, renderChangelog, changelogToJson } from './changelog/renderer';
export type { ReleaseBlock, ReleaseJson } from './changelog/renderer';
export {
  matchesAtStart,
  releaseTags,
  assembleReleases,
  buildReleases,
  generateChangelog,
} from './changelog/assembler';
export type { CommitSource } from './changelog/assembler';

// Config
export {
  changelogConfigSchema,
  parseConfig,
  defaultConfig,
  DEFAULT_UNRELEASED_LABEL,
  DEFAULT_TAG_FILTER,
  DEFAULT_BODY_SPLIT,
} from './config/schema';
export type { ChangelogConfig, ChangelogConfigFile } from './config/schema';
export { loadConfigFile } from './config/load';
export {
  resolveConfigPath,
  normalizePath,
  CONFIG_ENV_VAR,
  CONFIG_GIT_SECTION,
  CONFIG_GIT_KEY,
  CONFIG_FILENAME,
  SYSTEM_CONFIG_PATH,
} from './config/resolve';
