import { describe, expect, it } from 'vitest';
import { isErrnoException, isObject } from './guards.js';

describe('guards', () => {
  it('accepts only plain objects', () => {
    expect(isObject({ sixel: {} })).toBe(true);
    expect(isObject([])).toBe(false);
    expect(isObject(null)).toBe(false);
    expect(isObject('sixel')).toBe(false);
  });

  it('recognises errors carrying an errno code', () => {
    expect(isErrnoException(Object.assign(new Error('missing'), { code: 'ENOENT' }))).toBe(true);
    expect(isErrnoException(new Error('plain'))).toBe(false);
    expect(isErrnoException({ code: 'ENOENT' })).toBe(false);
  });
});
