#!/usr/bin/env node

import { Command } from 'commander';
import { version } from '../package.json';

const program = new Command();

program
  .name('rst-changelog')
  .description(
    'Print a ReStructuredText changelog of a git repository to stdout.\n\n' +
    'The config file is looked up in this order:\n' +
    '  - the RST_CHANGELOG_CONFIG environment variable\n' +
    '  - git config rst-changelog.rc-path\n' +
    '  - .rst-changelog.json at the root of the working tree\n' +
    '  - ~/.rst-changelog.json\n' +
    '  - /etc/rst-changelog.json',
  )
  .version(version)
  .argument('[repository]', 'Path of the git repository (default: cwd)')
  .option('-c, --config <path>', 'Use this config file instead of looking one up')
  .option('--json', 'Output release blocks as JSON')
  .option('--verbose', 'Log git commands to stderr')
  // Loaded on demand so --help and --version stay cheap
  .action(async (repository: string | undefined, _opts: Record<string, unknown>, cmd: Command) => {
    const { generateAction } = await import('./commands/generate');
    return generateAction(repository, _opts, cmd);
  });

program.parseAsync().catch((err: unknown) => {
  const msg = err instanceof Error ? err.message : String(err);
  process.stderr.write(`Error: ${msg}\n`);
  process.exit(1);
});
