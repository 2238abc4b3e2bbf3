/**
 * Shell command execution.
 *
 * A `CommandRunner` only reports what happened; deciding whether an exit
 * status is a failure is left to `wrapCommand` and its accepted set.
 *
 * @module shell/exec
 */

import { spawnSync } from 'child_process';
import { ShellError } from '../errors';
import { indent } from '../text/format';

export interface ShellResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface RunOptions {
  /** Working directory of the command (default: process cwd). */
  cwd?: string;
}

export type CommandRunner = (command: string, options?: RunOptions) => ShellResult;

export interface WrapOptions extends RunOptions {
  /** Exit codes treated as success (default `[0]`). */
  acceptedExitCodes?: readonly number[];
}

const MAX_BUFFER = 256 * 1024 * 1024;

/** Runs `command` through the system shell and blocks until it exits. */
export const runShell: CommandRunner = (command, options = {}) => {
  const result = spawnSync(command, {
    cwd: options.cwd,
    shell: true,
    encoding: 'utf-8',
    maxBuffer: MAX_BUFFER,
    stdio: ['ignore', 'pipe', 'pipe'],
  });
  if (result.error) {
    throw result.error;
  }
  return {
    stdout: result.stdout ?? '',
    stderr: result.stderr ?? '',
    // null status means the process was killed by a signal
    exitCode: result.status ?? -1,
  };
};

function chomp(text: string): string {
  return text.endsWith('\n') ? text.slice(0, -1) : text;
}

export function formatShellFailure(command: string, result: ShellResult): string {
  const blocks: string[] = [];
  if (result.stdout) {
    blocks.push(`stdout:\n${indent(chomp(result.stdout), '| ')}`);
  }
  if (result.stderr) {
    blocks.push(`stderr:\n${indent(chomp(result.stderr), '| ')}`);
  }
  const header = `Wrapped command '${command}' exited with errorlevel ${result.exitCode}.`;
  if (blocks.length === 0) return header;
  return `${header}\n${indent(blocks.join('\n'), '  ')}`;
}

/**
 * Runs `command` and returns its stdout.
 * @throws ShellError when the exit code is not accepted.
 */
export function wrapCommand(runner: CommandRunner, command: string, options: WrapOptions = {}): string {
  const accepted = options.acceptedExitCodes ?? [0];
  const result = runner(command, { cwd: options.cwd });
  if (!accepted.includes(result.exitCode)) {
    throw new ShellError(
      formatShellFailure(command, result),
      command,
      result.exitCode,
      result.stdout,
      result.stderr,
    );
  }
  return result.stdout;
}

/** Same as `wrapCommand`, with surrounding whitespace stripped from stdout. */
export function swrapCommand(runner: CommandRunner, command: string, options: WrapOptions = {}): string {
  return wrapCommand(runner, command, options).trim();
}

/** Quotes one argument for a POSIX shell. */
export function shellQuote(arg: string): string {
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}
