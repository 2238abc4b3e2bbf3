/**
 * Error types raised by the changelog pipeline.
 *
 * Nothing in the core recovers from these; they surface to the CLI,
 * which prints the message and exits.
 *
 * @module errors
 */

export class ChangelogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A shell command exited with a status outside the accepted set. */
export class ShellError extends ChangelogError {
  readonly command: string;
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;

  constructor(message: string, command: string, exitCode: number, stdout: string, stderr: string) {
    super(message);
    this.command = command;
    this.exitCode = exitCode;
    this.stdout = stdout;
    this.stderr = stderr;
  }
}

/** A commit or tag identifier does not resolve to a revision. */
export class NotFoundError extends ChangelogError {
  readonly identifier: string;

  constructor(identifier: string) {
    super(`Given commit identifier '${identifier}' doesn't exist`);
    this.identifier = identifier;
  }
}

/** The "older" end of a range is not an ancestor of the "newer" end. */
export class OrderingError extends ChangelogError {
  constructor(older: string, newer: string) {
    super(`Seems that '${newer}' is earlier than '${older}'`);
  }
}

/** A flattened config key assigns into a key that already holds a scalar. */
export class ConfigTypeError extends ChangelogError {
  readonly key: string;

  constructor(key: string) {
    super(`Cannot inflate key '${key}': a value is already assigned to one of its sections`);
    this.key = key;
  }
}

/** git answered with output that does not have the expected shape. */
export class MalformedOutputError extends ChangelogError {}

/** The changelog config file is missing, unreadable or invalid. */
export class ConfigError extends ChangelogError {}
