/**
 * Splits repository history into release blocks and renders the changelog.
 *
 * History is walked from the tip back to the earliest commit. Commits
 * collect under the unreleased label until the first release tag is met;
 * from then on each tagged commit opens the block it titles, so a release
 * lists its tagged commit and everything before it down to the previous
 * release tag.
 *
 * @module changelog/assembler
 */

import type { ChangelogConfig } from '../config/schema';
import type { Commit } from '../git/commit';
import type { GitRepository } from '../git/repository';
import { classifyCommit, sectionOrder } from './rules';
import { renderChangelog } from './renderer';
import type { ReleaseBlock } from './renderer';

/** The slice of `GitRepository` the assembler reads. */
export type CommitSource = Pick<GitRepository, 'history' | 'tags'>;

/** Whether `pattern` matches `text` at its first character. */
export function matchesAtStart(pattern: RegExp, text: string): boolean {
  const sticky = new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, '') + 'y');
  return sticky.test(text);
}

/** Tags acting as release boundaries, newest first. */
export function releaseTags(tags: readonly Commit[], tagFilter: RegExp): Commit[] {
  return tags.filter(tag => matchesAtStart(tagFilter, tag.identifier)).reverse();
}

function releaseTitle(tag: Commit, commit: Commit): string {
  return `${tag.identifier} (${commit.date})`;
}

/**
 * Groups `history` (oldest first) into release blocks, newest block first.
 * Blocks left without entries are dropped.
 */
export function assembleReleases(history: readonly Commit[], tags: readonly Commit[], config: ChangelogConfig): ReleaseBlock[] {
  const boundaries = releaseTags(tags, config.tagFilter);
  const blocks: ReleaseBlock[] = [];
  let current: ReleaseBlock = { title: config.unreleasedVersionLabel, sections: new Map() };

  const flush = (): void => {
    if (current.sections.size > 0) blocks.push(current);
  };

  for (let i = history.length - 1; i >= 0; i--) {
    const commit = history[i];

    const tag = boundaries.find(candidate => candidate.equals(commit));
    if (tag) {
      flush();
      current = { title: releaseTitle(tag, commit), sections: new Map() };
    }

    const entry = classifyCommit(config.rules, commit, config.bodySplit);
    if (!entry) continue;

    const entries = current.sections.get(entry.section);
    if (entries) {
      entries.push(entry.text);
    } else {
      current.sections.set(entry.section, [entry.text]);
    }
  }

  flush();
  return blocks;
}

/** Reads history and tags from `repository` and groups them into release blocks. */
export function buildReleases(repository: CommitSource, config: ChangelogConfig): ReleaseBlock[] {
  return assembleReleases(repository.history(), repository.tags(), config);
}

/** Produces the complete ReStructuredText changelog for `repository`. */
export function generateChangelog(repository: CommitSource, config: ChangelogConfig): string {
  return renderChangelog(buildReleases(repository, config), sectionOrder(config.rules));
}
