/**
 * Plain-text helpers for laying out changelog entries.
 *
 * @module text/format
 */

/** Column at which subjects and bodies are wrapped. */
export const WRAP_WIDTH = 70;

const TAB_SIZE = 8;
const NO_COMMIT_MESSAGE = 'No commit message.';
const ENDS_WITH_ALNUM = /[\p{L}\p{N}]$/u;

/** Upper-cases the first character. */
export function ucfirst(text: string): string {
  if (text.length === 0) return text;
  return text.charAt(0).toUpperCase() + text.slice(1);
}

/**
 * Terminates a sentence: appends a period after a trailing letter or digit.
 * Empty text is replaced by a placeholder message.
 */
export function finalDot(text: string): string {
  if (text.length === 0) return NO_COMMIT_MESSAGE;
  if (ENDS_WITH_ALNUM.test(text)) return text + '.';
  return text;
}

/**
 * Prefixes every line of `text` with `prefix`.
 *
 * With `firstLinePrefix`, the first line takes that prefix instead and the
 * following lines are aligned under it with spaces.
 */
export function indent(text: string, prefix = '  ', firstLinePrefix?: string): string {
  const lines = text.split('\n');
  if (firstLinePrefix !== undefined) {
    const hanging = ' '.repeat(firstLinePrefix.length);
    return lines.map((line, i) => (i === 0 ? firstLinePrefix : hanging) + line).join('\n');
  }
  return lines.map(line => prefix + line).join('\n');
}

function expandTabs(text: string): string {
  let column = 0;
  let out = '';
  for (const ch of text) {
    if (ch === '\t') {
      const pad = TAB_SIZE - (column % TAB_SIZE);
      out += ' '.repeat(pad);
      column += pad;
    } else if (ch === '\n' || ch === '\r') {
      out += ch;
      column = 0;
    } else {
      out += ch;
      column++;
    }
  }
  return out;
}

/**
 * Greedy word wrap.
 *
 * Whitespace characters all count as single spaces and runs of them are
 * kept inside a line; whitespace is dropped at line ends and at the start
 * of continuation lines. Words are never split: a word wider than `width`
 * gets a line to itself.
 */
export function textWrap(text: string, width = WRAP_WIDTH): string[] {
  const munged = expandTabs(text).replace(/[\t\n\v\f\r ]/g, ' ');
  // Reversed so the next chunk is always at the end.
  const chunks = munged.split(/( +)/).filter(chunk => chunk !== '').reverse();
  const lines: string[] = [];

  while (chunks.length > 0) {
    const current: string[] = [];
    let currentLength = 0;

    if (lines.length > 0 && isBlank(chunks[chunks.length - 1])) {
      chunks.pop();
    }

    while (chunks.length > 0) {
      const next = chunks[chunks.length - 1];
      if (currentLength + next.length > width) break;
      current.push(next);
      currentLength += next.length;
      chunks.pop();
    }

    const next = chunks[chunks.length - 1];
    if (next !== undefined && next.length > width && current.length === 0) {
      current.push(next);
      chunks.pop();
    }

    if (current.length > 0 && isBlank(current[current.length - 1])) {
      current.pop();
    }
    if (current.length > 0) {
      lines.push(current.join(''));
    }
  }

  return lines;
}

function isBlank(chunk: string): boolean {
  return chunk.trim() === '';
}

/**
 * Wraps each paragraph of `text` on its own.
 *
 * Paragraphs are split on `separator`, wrapped after trimming, and joined
 * back with single newlines.
 */
export function paragraphWrap(text: string, separator: RegExp = /\n\n/m): string {
  return text
    .split(separator)
    .map(paragraph => textWrap(paragraph.trim()).join('\n'))
    .join('\n')
    .trim();
}
