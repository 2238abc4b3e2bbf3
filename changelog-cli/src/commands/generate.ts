/**
 * `rst-changelog [repository]`: print the ReST changelog of a git repository.
 *
 * Opens the repository, finds and loads the config file, then walks the
 * history and writes the changelog (or its JSON form) to stdout.
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import {
  GitRepository,
  buildReleases,
  changelogToJson,
  loadConfigFile,
  renderChangelog,
  resolveConfigPath,
  sectionOrder,
  normalizePath,
  ConfigError,
} from 'changelog-shared';
import type { CommandRunner, Logger } from 'changelog-shared';

export interface GenerateOptions {
  /** Explicit config file; skips lookup. */
  config?: string;
  json?: boolean;
  verbose?: boolean;
}

export interface GenerateDeps {
  runner?: CommandRunner;
  env?: NodeJS.ProcessEnv;
  log?: Logger;
}

/** Produces the command's stdout for `repositoryPath`. */
export function renderForRepository(
  repositoryPath: string,
  opts: GenerateOptions,
  deps: GenerateDeps = {},
): string {
  const repository = new GitRepository(repositoryPath, { runner: deps.runner, log: deps.log });

  const configPath = opts.config
    ? normalizePath(opts.config)
    : resolveConfigPath(repository, deps.env ?? process.env);
  if (!configPath) {
    throw new ConfigError('No rst-changelog config file found anywhere.');
  }
  deps.log?.(`Using config file ${configPath}`);
  const config = loadConfigFile(configPath);

  const releases = buildReleases(repository, config);
  const order = sectionOrder(config.rules);

  if (opts.json) {
    return JSON.stringify(changelogToJson(releases, order), null, 2) + '\n';
  }
  return renderChangelog(releases, order);
}

function stderrLogger(message: string): void {
  process.stderr.write(chalk.dim(message) + '\n');
}

export async function generateAction(repository: string | undefined, _opts: Record<string, unknown>, cmd: Command): Promise<void> {
  const opts = cmd.opts<GenerateOptions>();

  try {
    const output = renderForRepository(repository || '.', opts, {
      log: opts.verbose ? stderrLogger : undefined,
    });
    process.stdout.write(output);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    process.stderr.write(chalk.red(`Error: ${msg}\n`));
    process.exit(1);
  }
}
