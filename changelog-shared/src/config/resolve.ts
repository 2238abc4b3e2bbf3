/**
 * Config file lookup.
 *
 * Candidates, first hit wins:
 * 1. `RST_CHANGELOG_CONFIG` environment variable (must exist)
 * 2. git config `rst-changelog.rc-path`, relative to the working tree (must exist)
 * 3. `.rst-changelog.json` at the working tree root (not for bare repositories)
 * 4. `~/.rst-changelog.json`
 * 5. `/etc/rst-changelog.json`
 *
 * @module config/resolve
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigError } from '../errors';
import type { GitRepository } from '../git/repository';

export const CONFIG_ENV_VAR = 'RST_CHANGELOG_CONFIG';
export const CONFIG_GIT_SECTION = 'rst-changelog';
export const CONFIG_GIT_KEY = 'rc-path';
export const CONFIG_FILENAME = '.rst-changelog.json';
export const SYSTEM_CONFIG_PATH = '/etc/rst-changelog.json';

interface Candidate {
  /** Evaluated only when earlier candidates found nothing. */
  locate: () => string | null;
  /** Explicitly configured: a missing file is an error, not a fallthrough. */
  required: boolean;
}

/** Expands a leading `~` and makes `filePath` absolute against `cwd`. */
export function normalizePath(filePath: string, cwd?: string): string {
  const expanded = filePath === '~' || filePath.startsWith('~/')
    ? path.join(os.homedir(), filePath.slice(1))
    : filePath;
  if (path.isAbsolute(expanded)) return expanded;
  return path.resolve(cwd || process.cwd(), expanded);
}

function gitConfiguredPath(repository: GitRepository): string | null {
  const section = repository.config()[CONFIG_GIT_SECTION];
  if (section === undefined || typeof section === 'string') return null;
  const value = section[CONFIG_GIT_KEY];
  if (typeof value !== 'string' || value === '') return null;
  return normalizePath(value, repository.toplevel ?? repository.path);
}

function candidates(repository: GitRepository, env: NodeJS.ProcessEnv): Candidate[] {
  const fromEnv = env[CONFIG_ENV_VAR];
  return [
    { locate: () => (fromEnv ? normalizePath(fromEnv) : null), required: true },
    { locate: () => gitConfiguredPath(repository), required: true },
    { locate: () => (repository.toplevel ? path.join(repository.toplevel, CONFIG_FILENAME) : null), required: false },
    { locate: () => path.join(os.homedir(), CONFIG_FILENAME), required: false },
    { locate: () => SYSTEM_CONFIG_PATH, required: false },
  ];
}

/**
 * Finds the config file for `repository`.
 * @returns The file path, or null when no candidate exists.
 * @throws ConfigError when an explicitly configured file is missing.
 */
export function resolveConfigPath(repository: GitRepository, env: NodeJS.ProcessEnv = process.env): string | null {
  for (const candidate of candidates(repository, env)) {
    const filePath = candidate.locate();
    if (!filePath) continue;
    if (fs.existsSync(filePath)) return filePath;
    if (candidate.required) {
      throw new ConfigError(`File '${filePath}' does not exist.`);
    }
  }
  return null;
}
