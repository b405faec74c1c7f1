import { describe, expect, it } from 'vitest';
import { expandHome } from '../../src/cli/expand-home.js';
import { boxHeading, formatBytes } from '../../src/cli/output.js';

describe('boxHeading', () => {
  it('centres the title inside a double-line box', () => {
    expect(boxHeading('COMPLETE')).toEqual([
      `╔${'═'.repeat(70)}╗`,
      `║${' '.repeat(31)}COMPLETE${' '.repeat(31)}║`,
      `╚${'═'.repeat(70)}╝`,
    ]);
  });
});

describe('formatBytes', () => {
  it('shows bytes with separators and kilobytes with one decimal', () => {
    expect(formatBytes(2048)).toBe('2,048 bytes (2.0 KB)');
    expect(formatBytes(100)).toBe('100 bytes (0.1 KB)');
  });
});

describe('expandHome', () => {
  it('expands a leading tilde', () => {
    expect(expandHome('~', '/home/me')).toBe('/home/me');
    expect(expandHome('~/.config/nvim', '/home/me')).toBe('/home/me/.config/nvim');
  });

  it('leaves other paths alone', () => {
    expect(expandHome('/abs/path', '/home/me')).toBe('/abs/path');
    expect(expandHome('~other/x', '/home/me')).toBe('~other/x');
  });
});
