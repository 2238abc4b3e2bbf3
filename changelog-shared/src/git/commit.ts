/**
 * Commit records parsed from `git log` output.
 *
 * @module git/commit
 */

import { MalformedOutputError } from '../errors';

/** Fields queried for every commit, in output order. */
export const COMMIT_FIELDS = [
  ['shortHash', '%h'],
  ['subject', '%s'],
  ['authorName', '%an'],
  ['authorDate', '%ad'],
  ['authorTimestamp', '%at'],
  ['committerName', '%cn'],
  ['committerTimestamp', '%ct'],
  ['rawBody', '%B'],
  ['body', '%b'],
] as const;

/** NUL never occurs in commit text, so it safely separates fields. */
export const FIELD_SEPARATOR = '\x00';

/** `--pretty=format:` argument producing one NUL-separated record. */
export const COMMIT_FORMAT = COMMIT_FIELDS.map(([, placeholder]) => placeholder).join('%x00');

export interface CommitData {
  /** Identifier the commit was looked up by (hash, tag, branch or sentinel). */
  identifier: string;
  shortHash: string;
  subject: string;
  authorName: string;
  authorDate: string;
  /** Seconds since epoch. */
  authorTimestamp: number;
  committerName: string;
  /** Seconds since epoch. */
  committerTimestamp: number;
  /** Full message, subject included. */
  rawBody: string;
  /** Message without the subject line. */
  body: string;
}

export class Commit implements CommitData {
  readonly identifier: string;
  readonly shortHash: string;
  readonly subject: string;
  readonly authorName: string;
  readonly authorDate: string;
  readonly authorTimestamp: number;
  readonly committerName: string;
  readonly committerTimestamp: number;
  readonly rawBody: string;
  readonly body: string;

  constructor(data: CommitData) {
    this.identifier = data.identifier;
    this.shortHash = data.shortHash;
    this.subject = data.subject;
    this.authorName = data.authorName;
    this.authorDate = data.authorDate;
    this.authorTimestamp = data.authorTimestamp;
    this.committerName = data.committerName;
    this.committerTimestamp = data.committerTimestamp;
    this.rawBody = data.rawBody;
    this.body = data.body;
    Object.freeze(this);
  }

  /** Author date as UTC `YYYY-MM-DD`. */
  get date(): string {
    return new Date(this.authorTimestamp * 1000).toISOString().slice(0, 10);
  }

  /** Same revision, whatever identifier each side was resolved from. */
  equals(other: Commit): boolean {
    return this.shortHash === other.shortHash;
  }

  toString(): string {
    return `<Commit '${this.identifier}'>`;
  }
}

function parseTimestamp(identifier: string, field: string, value: string): number {
  if (!/^-?\d+$/.test(value)) {
    throw new MalformedOutputError(`Invalid ${field} '${value}' for commit '${identifier}'`);
  }
  return parseInt(value, 10);
}

/**
 * Builds a `Commit` from one record formatted with `COMMIT_FORMAT`.
 * @throws MalformedOutputError on a wrong field count or a non-integer timestamp.
 */
export function parseCommitRecord(identifier: string, output: string): Commit {
  const values = output.trim().split(FIELD_SEPARATOR).map(value => value.trim());
  if (values.length !== COMMIT_FIELDS.length) {
    throw new MalformedOutputError(
      `Expected ${COMMIT_FIELDS.length} fields for commit '${identifier}', got ${values.length}`,
    );
  }
  const [shortHash, subject, authorName, authorDate, authorTs, committerName, committerTs, rawBody, body] = values;
  return new Commit({
    identifier,
    shortHash,
    subject,
    authorName,
    authorDate,
    authorTimestamp: parseTimestamp(identifier, 'author timestamp', authorTs),
    committerName,
    committerTimestamp: parseTimestamp(identifier, 'committer timestamp', committerTs),
    rawBody,
    body,
  });
}
