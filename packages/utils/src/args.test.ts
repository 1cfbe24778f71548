import { describe, expect, it } from 'vitest';
import { formatCommandLine, quoteArg, splitFlags } from './args.js';

describe('splitFlags', () => {
  it('splits on any run of whitespace', () => {
    expect(splitFlags('  -an\t -sn   -t 5 ')).toEqual(['-an', '-sn', '-t', '5']);
  });

  it('returns nothing for empty or missing input', () => {
    expect(splitFlags(undefined)).toEqual([]);
    expect(splitFlags('')).toEqual([]);
    expect(splitFlags('   ')).toEqual([]);
  });
});

describe('quoteArg', () => {
  it('leaves shell-safe arguments alone', () => {
    expect(quoteArg('fps=24,scale=320:-1')).toBe('fps=24,scale=320:-1');
    expect(quoteArg('-c:v')).toBe('-c:v');
  });

  it('single-quotes arguments with spaces', () => {
    expect(quoteArg('my clip.mp4')).toBe(`'my clip.mp4'`);
  });

  it('escapes embedded single quotes', () => {
    expect(quoteArg(`it's`)).toBe(`'it'\\''s'`);
  });

  it('quotes the empty string', () => {
    expect(quoteArg('')).toBe(`''`);
  });
});

describe('formatCommandLine', () => {
  it('joins the command and quoted arguments', () => {
    expect(formatCommandLine('jp2a', ['--width=80', '/tmp/a b.png'])).toBe(
      `jp2a --width=80 '/tmp/a b.png'`
    );
  });
});
