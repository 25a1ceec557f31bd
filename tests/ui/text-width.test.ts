import { describe, expect, it } from 'vitest';
import { getDisplayWidth, getVisibleWidth, padVisibleWidth } from '../../src/ui/text-width.js';

describe('ui text width', () => {
  it('counts ASCII as single-width', () => {
    expect(getDisplayWidth('abc')).toBe(3);
  });

  it('counts Chinese characters as double-width', () => {
    expect(getDisplayWidth('中文')).toBe(4);
  });

  it('counts emoji as double-width and combining marks as zero', () => {
    expect(getDisplayWidth('🍕')).toBe(2);
    expect(getDisplayWidth('🍕 pizza')).toBe(8);
    expect(getDisplayWidth('cafe\u0301')).toBe(4);
    expect(getDisplayWidth('caf\u00e9')).toBe(4);
  });

  it('ignores escape sequences when measuring styled text', () => {
    expect(getVisibleWidth('\x1B[1m\x1B[38;5;220mbold\x1B[39m\x1B[22m')).toBe(4);
    expect(getVisibleWidth('\x1B[4m中\x1B[24m')).toBe(2);
  });

  it('pads styled text by visible width', () => {
    expect(padVisibleWidth('\x1B[1mab\x1B[22m', 5)).toBe('\x1B[1mab\x1B[22m   ');
    expect(padVisibleWidth('中a', 4)).toBe('中a ');
    expect(padVisibleWidth('too wide', 3)).toBe('too wide');
    expect(padVisibleWidth('cafe\u0301', 6)).toBe('cafe\u0301  ');
    expect(padVisibleWidth('\x1B[1m🍕\x1B[22m', 3)).toBe('\x1B[1m🍕\x1B[22m ');
  });
});
