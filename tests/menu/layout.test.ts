import { describe, expect, it } from 'vitest';
import {
  computeMaxWidth,
  computeMenuLayout,
  computeOptionsPerPage,
  computePageCount,
  formatPageIndicator,
  getPageBounds,
} from '../../src/menu/layout.js';

function labels(count: number): string[] {
  return Array.from({ length: count }, (_, index) => `option ${index}`);
}

describe('menu layout', () => {
  it('reserves six rows and clamps to the option count', () => {
    expect(computeOptionsPerPage(20, 3)).toBe(3);
    expect(computeOptionsPerPage(10, 10)).toBe(4);
    expect(computeOptionsPerPage(40, 100)).toBe(34);
  });

  it('always shows at least one option per page', () => {
    expect(computeOptionsPerPage(6, 5)).toBe(1);
    expect(computeOptionsPerPage(2, 5)).toBe(1);
    expect(computeOptionsPerPage(0, 1)).toBe(1);
  });

  it('accepts a different reserved row count', () => {
    expect(computeOptionsPerPage(10, 20, 2)).toBe(8);
    expect(computeOptionsPerPage(10, 20, 0)).toBe(10);
  });

  it('computes page count by ceiling division', () => {
    expect(computePageCount(10, 4)).toBe(3);
    expect(computePageCount(8, 4)).toBe(2);
    expect(computePageCount(1, 1)).toBe(1);
    expect(computePageCount(3, 3)).toBe(1);
  });

  it('keeps pages just large enough for every option', () => {
    for (let count = 1; count <= 25; count += 1) {
      for (let rows = 0; rows <= 40; rows += 3) {
        const perPage = computeOptionsPerPage(rows, count);
        const pages = computePageCount(count, perPage);
        expect(perPage).toBeGreaterThanOrEqual(1);
        expect(perPage).toBeLessThanOrEqual(count);
        expect(pages * perPage).toBeGreaterThanOrEqual(count);
        expect((pages - 1) * perPage).toBeLessThan(count);
      }
    }
  });

  it('takes the widest of labels, title and message', () => {
    expect(computeMaxWidth(['a', 'abc'], '', '')).toBe(3);
    expect(computeMaxWidth(['a', 'abc'], 'title!', '')).toBe(6);
    expect(computeMaxWidth(['a'], undefined, 'a longer message')).toBe(16);
  });

  it('measures full-width characters as two columns', () => {
    expect(computeMaxWidth(['归档', 'ab'])).toBe(4);
  });

  it('splits ten options into pages of four', () => {
    const layout = computeMenuLayout(labels(10), undefined, undefined, 10);
    expect(layout.optionsPerPage).toBe(4);
    expect(layout.pageCount).toBe(3);
    expect(getPageBounds(layout, 0)).toEqual({ pageStart: 0, pageEnd: 3 });
    expect(getPageBounds(layout, 1)).toEqual({ pageStart: 4, pageEnd: 7 });
    expect(getPageBounds(layout, 2)).toEqual({ pageStart: 8, pageEnd: 9 });
  });

  it('widens content to fit the page indicator', () => {
    const layout = computeMenuLayout(['a', 'b', 'c'], undefined, undefined, 7);
    expect(layout.optionsPerPage).toBe(1);
    expect(layout.pageCount).toBe(3);
    expect(layout.maxWidth).toBe(1);
    expect(layout.contentWidth).toBe(formatPageIndicator(2, 3).length);
    expect(formatPageIndicator(2, 3)).toBe('Page 3 of 3');
  });

  it('does not widen a single page', () => {
    const layout = computeMenuLayout(['a', 'b', 'c'], undefined, undefined, 20);
    expect(layout.pageCount).toBe(1);
    expect(layout.contentWidth).toBe(1);
  });
});
