import { describe, it, expect } from 'vitest';
import { ucfirst, finalDot, indent, textWrap, paragraphWrap, WRAP_WIDTH } from './format';

describe('ucfirst', () => {
  it('upper-cases the first character only', () => {
    expect(ucfirst('fix bug in parser')).toBe('Fix bug in parser');
  });

  it('leaves empty text alone', () => {
    expect(ucfirst('')).toBe('');
  });

  it('keeps leading whitespace', () => {
    expect(ucfirst(' crash')).toBe(' crash');
  });
});

describe('finalDot', () => {
  it('appends a period after a letter', () => {
    expect(finalDot('Add feature')).toBe('Add feature.');
  });

  it('appends a period after a digit', () => {
    expect(finalDot('Bump to v2')).toBe('Bump to v2.');
  });

  it('keeps existing punctuation', () => {
    expect(finalDot('Done!')).toBe('Done!');
    expect(finalDot('Fixed (again)')).toBe('Fixed (again)');
  });

  it('replaces empty text with a placeholder', () => {
    expect(finalDot('')).toBe('No commit message.');
  });
});

describe('indent', () => {
  it('prefixes every line', () => {
    expect(indent('first\nsecond', '| ')).toBe('| first\n| second');
  });

  it('defaults to two spaces', () => {
    expect(indent('a\nb')).toBe('  a\n  b');
  });

  it('prefixes empty lines too', () => {
    expect(indent('a\n\nb', '> ')).toBe('> a\n> \n> b');
  });

  it('aligns continuation lines under a first-line prefix', () => {
    expect(indent('first\nsecond\nthird', '  ', '- ')).toBe('- first\n  second\n  third');
    expect(indent('x\ny', '>', '10. ')).toBe('10. x\n    y');
  });

  it('round-trips by stripping the prefix from every line', () => {
    const samples = ['one line', 'two\nlines', '\nleading blank', 'trailing blank\n', ''];
    for (const text of samples) {
      const stripped = indent(text, '| ')
        .split('\n')
        .map(line => line.slice('| '.length))
        .join('\n');
      expect(stripped).toBe(text);
    }
  });
});

describe('textWrap', () => {
  it('keeps short text on one line', () => {
    expect(textWrap('one two three')).toEqual(['one two three']);
  });

  it('breaks greedily at the width', () => {
    expect(textWrap('aaaa bbbb cccc', 9)).toEqual(['aaaa bbbb', 'cccc']);
  });

  it('fills lines up to the default width', () => {
    const text = Array(20).fill('abcd').join(' ');
    const lines = textWrap(text);
    expect(WRAP_WIDTH).toBe(70);
    expect(lines).toHaveLength(2);
    expect(lines[0]).toBe(Array(14).fill('abcd').join(' '));
    expect(lines[1]).toBe(Array(6).fill('abcd').join(' '));
  });

  it('preserves runs of spaces inside a line', () => {
    expect(textWrap('Fix  crash.')).toEqual(['Fix  crash.']);
  });

  it('treats newlines as spaces', () => {
    expect(textWrap('a\nb')).toEqual(['a b']);
  });

  it('expands tabs to eight-column stops', () => {
    expect(textWrap('a\tb')).toEqual(['a       b']);
  });

  it('never splits a long word', () => {
    const word = 'x'.repeat(12);
    expect(textWrap(`a ${word} b`, 10)).toEqual(['a', word, 'b']);
  });

  it('never splits on hyphens', () => {
    expect(textWrap('well-known', 5)).toEqual(['well-known']);
  });

  it('returns no lines for blank text', () => {
    expect(textWrap('')).toEqual([]);
    expect(textWrap('   ')).toEqual([]);
  });
});

describe('paragraphWrap', () => {
  it('wraps paragraphs separately and joins them with single newlines', () => {
    const text = 'first para\nstill first\n\nsecond para\n';
    expect(paragraphWrap(text)).toBe('first para still first\nsecond para');
  });

  it('wraps long paragraphs', () => {
    const text = Array(20).fill('abcd').join(' ');
    expect(paragraphWrap(text)).toBe(
      `${Array(14).fill('abcd').join(' ')}\n${Array(6).fill('abcd').join(' ')}`,
    );
  });

  it('splits on a custom separator', () => {
    expect(paragraphWrap('a\n---\nb', /\n-{3}\n/m)).toBe('a\nb');
  });

  it('returns empty text for an empty body', () => {
    expect(paragraphWrap('')).toBe('');
  });
});
