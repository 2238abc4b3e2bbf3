/**
 * Read-only query surface over a git repository.
 *
 * Every query is one blocking git invocation run from the repository path;
 * nothing is cached beyond the identity facts resolved at construction.
 *
 * @module git/repository
 */

import * as path from 'path';
import { MalformedOutputError, NotFoundError, OrderingError, ShellError } from '../errors';
import { runShell, shellQuote, swrapCommand } from '../shell/exec';
import type { CommandRunner, WrapOptions } from '../shell/exec';
import { Commit, COMMIT_FORMAT, parseCommitRecord } from './commit';
import { inflateConfig } from './inflate';
import type { ConfigTree } from './inflate';

/** Identifier of the oldest commit reachable from the tip. `~` cannot occur in a ref name. */
export const EARLIEST = '~earliest';
/** Identifier of the current branch head. */
export const TIP = 'HEAD';

export type CommitRef = string | Commit;

export type Logger = (message: string) => void;

export interface GitRepositoryOptions {
  /** Runs git commands (default: the system shell). */
  runner?: CommandRunner;
  /** Receives every git command before it runs. */
  log?: Logger;
}

export class GitRepository {
  /** Absolute path every command runs from. */
  readonly path: string;
  readonly bare: boolean;
  /** Working tree root, or null for a bare repository. */
  readonly toplevel: string | null;
  readonly gitDir: string;

  private readonly runner: CommandRunner;
  private readonly log: Logger | undefined;

  constructor(repositoryPath: string, options: GitRepositoryOptions = {}) {
    this.path = path.resolve(repositoryPath);
    this.runner = options.runner ?? runShell;
    this.log = options.log;

    this.bare = this.git('git rev-parse --is-bare-repository') === 'true';
    this.toplevel = this.bare ? null : this.git('git rev-parse --show-toplevel');
    this.gitDir = path.resolve(this.path, this.git('git rev-parse --git-dir'));
  }

  /** Runs a command from the repository path and returns its trimmed stdout. */
  git(command: string, options: Omit<WrapOptions, 'cwd'> = {}): string {
    this.log?.(`$ ${command}`);
    return swrapCommand(this.runner, command, { ...options, cwd: this.path });
  }

  /**
   * Looks up a commit by hash, tag, branch or one of `EARLIEST` / `TIP`.
   * @throws NotFoundError when git cannot resolve the identifier.
   */
  commit(identifier: string): Commit {
    const revision = identifier === EARLIEST ? this.earliestHash() : identifier;
    let output: string;
    try {
      output = this.git(`git log -1 --pretty=format:${COMMIT_FORMAT} ${shellQuote(revision)} --`);
    } catch (err) {
      if (err instanceof ShellError) {
        throw new NotFoundError(identifier);
      }
      throw err;
    }
    return parseCommitRecord(identifier, output);
  }

  private earliestHash(): string {
    const roots = this.git('git rev-list --max-parents=0 HEAD').split('\n');
    const last = roots[roots.length - 1];
    if (!last) {
      throw new MalformedOutputError('git rev-list returned no root commit');
    }
    return last;
  }

  private toCommit(ref: CommitRef): Commit {
    return typeof ref === 'string' ? this.commit(ref) : ref;
  }

  /**
   * Commits reachable from `newer` but not from `older`, oldest first.
   * @throws OrderingError when `newer` does not descend from `older`.
   */
  range(older: CommitRef = EARLIEST, newer: CommitRef = TIP): Commit[] {
    const from = this.toCommit(older);
    const to = this.toCommit(newer);
    if (from.equals(to)) return [];

    const listing = this.git(`git rev-list ${from.shortHash}..${to.shortHash}`);
    if (!listing) {
      throw new OrderingError(from.identifier, to.identifier);
    }
    return listing
      .split('\n')
      .reverse()
      .map(hash => this.commit(hash));
  }

  /** The whole history reachable from the tip, oldest first, earliest commit included. */
  history(): Commit[] {
    const earliest = this.commit(EARLIEST);
    return [earliest, ...this.range(earliest, TIP)];
  }

  /**
   * All tags as commits identified by tag name, by committer timestamp
   * ascending; equal timestamps are ordered by name.
   */
  tags(): Commit[] {
    const names = this.git('git tag -l')
      .split('\n')
      .filter(name => name !== '');
    return names
      .map(name => this.commit(name))
      .sort((a, b) =>
        a.committerTimestamp - b.committerTimestamp ||
        (a.identifier < b.identifier ? -1 : a.identifier > b.identifier ? 1 : 0));
  }

  /** `git config -l` as a nested mapping. */
  config(): ConfigTree {
    const flat = new Map<string, string>();
    for (const line of this.git('git config -l').split('\n')) {
      if (line === '') continue;
      const at = line.indexOf('=');
      if (at === -1) {
        flat.set(line, '');
      } else {
        flat.set(line.slice(0, at), line.slice(at + 1));
      }
    }
    return inflateConfig(flat);
  }
}
