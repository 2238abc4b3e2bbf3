import { describe, it, expect, vi, beforeEach } from 'vitest';
import * as fs from 'fs';
import { resolveConfigPath, normalizePath } from './resolve';
import { GitRepository } from '../git/repository';
import { createFakeGit } from '../testing/fakeGit';
import type { FakeGit, FakeRepoSpec } from '../testing/fakeGit';
import { ConfigError } from '../errors';

vi.mock('fs', async (importOriginal) => {
  const actual = await importOriginal<typeof import('fs')>();
  return { ...actual, existsSync: vi.fn() };
});

vi.mock('os', async (importOriginal) => {
  const actual = await importOriginal<typeof import('os')>();
  return { ...actual, homedir: () => '/home/tester' };
});

const BASE: FakeRepoSpec = {
  commits: [{ hash: 'aaa1111', subject: 'init', time: 1700000000 }],
  toplevel: '/repo',
};

let fake: FakeGit;

function openRepo(spec: Partial<FakeRepoSpec> = {}): GitRepository {
  fake = createFakeGit({ ...BASE, ...spec });
  return new GitRepository('/repo', { runner: fake.runner });
}

function existing(...paths: string[]): void {
  vi.mocked(fs.existsSync).mockImplementation((p: fs.PathLike) => paths.includes(String(p)));
}

describe('normalizePath', () => {
  it('keeps absolute paths', () => {
    expect(normalizePath('/etc/rc.json', '/repo')).toBe('/etc/rc.json');
  });

  it('resolves relative paths against cwd', () => {
    expect(normalizePath('conf/rc.json', '/repo')).toBe('/repo/conf/rc.json');
  });

  it('expands the home directory', () => {
    expect(normalizePath('~/rc.json')).toBe('/home/tester/rc.json');
  });
});

describe('resolveConfigPath', () => {
  beforeEach(() => {
    existing();
  });

  it('prefers the environment variable and does not query git config', () => {
    existing('/cfg/a.json', '/repo/.rst-changelog.json');
    const repo = openRepo();

    expect(resolveConfigPath(repo, { RST_CHANGELOG_CONFIG: '/cfg/a.json' })).toBe('/cfg/a.json');
    expect(fake.commands).not.toContain('git config -l');
  });

  it('fails when the environment variable names a missing file', () => {
    const repo = openRepo();
    expect(() => resolveConfigPath(repo, { RST_CHANGELOG_CONFIG: '/cfg/a.json' })).toThrow(ConfigError);
    expect(() => resolveConfigPath(repo, { RST_CHANGELOG_CONFIG: '/cfg/a.json' })).toThrow(
      "File '/cfg/a.json' does not exist.",
    );
  });

  it('uses the git config path relative to the working tree', () => {
    existing('/repo/conf/changelog.json', '/repo/.rst-changelog.json');
    const repo = openRepo({ config: ['rst-changelog.rc-path=conf/changelog.json'] });
    expect(resolveConfigPath(repo, {})).toBe('/repo/conf/changelog.json');
  });

  it('fails when the git config path is missing', () => {
    const repo = openRepo({ config: ['rst-changelog.rc-path=conf/changelog.json'] });
    expect(() => resolveConfigPath(repo, {})).toThrow("File '/repo/conf/changelog.json' does not exist.");
  });

  it('falls back to the working tree file', () => {
    existing('/repo/.rst-changelog.json', '/home/tester/.rst-changelog.json');
    expect(resolveConfigPath(openRepo(), {})).toBe('/repo/.rst-changelog.json');
  });

  it('falls back to the home directory file', () => {
    existing('/home/tester/.rst-changelog.json', '/etc/rst-changelog.json');
    expect(resolveConfigPath(openRepo(), {})).toBe('/home/tester/.rst-changelog.json');
  });

  it('falls back to the system-wide file', () => {
    existing('/etc/rst-changelog.json');
    expect(resolveConfigPath(openRepo(), {})).toBe('/etc/rst-changelog.json');
  });

  it('skips the working tree file of a bare repository', () => {
    existing('/repo/.rst-changelog.json');
    expect(resolveConfigPath(openRepo({ bare: true }), {})).toBeNull();
  });

  it('returns null when nothing exists', () => {
    expect(resolveConfigPath(openRepo(), {})).toBeNull();
  });
});
