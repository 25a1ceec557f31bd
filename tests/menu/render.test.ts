import { Chalk } from 'chalk';
import stripAnsi from 'strip-ansi';
import { describe, expect, it } from 'vitest';
import { computeMenuLayout } from '../../src/menu/layout.js';
import { createNavigationState, goToPage } from '../../src/menu/navigation.js';
import { resolveMenuProps } from '../../src/menu/props.js';
import {
  computeIndent,
  computeVerticalPadding,
  countChromeLines,
  getBoxWidth,
  renderFrame,
  renderMenuLines,
  type MenuView,
} from '../../src/menu/render.js';
import type { MenuProps } from '../../src/types.js';
import { getVisibleWidth } from '../../src/ui/text-width.js';

const plain = new Chalk({ level: 0 });
const colored = new Chalk({ level: 2 });

function createView(labels: string[], props: Partial<MenuProps>, rows: number, page = 0): MenuView {
  const resolved = resolveMenuProps(props);
  const layout = computeMenuLayout(labels, resolved.title, resolved.message, rows, resolved.reservedRows);
  return {
    labels,
    props: resolved,
    layout,
    navigation: page === 0 ? createNavigationState(layout) : goToPage(layout, page),
  };
}

const greekView = createView(['alpha', 'beta', 'gamma'], { title: 'Menu', message: 'bye', selectedColor: 220 }, 20);

describe('menu render', () => {
  it('lays out title, options and footer inside a fixed-width box', () => {
    expect(renderMenuLines(greekView, plain)).toEqual([
      '         ',
      '  Menu   ',
      '         ',
      '  alpha  ',
      '  beta   ',
      '  gamma  ',
      '         ',
      '  bye    ',
      '         ',
    ]);
  });

  it('omits title and footer lines when they are empty', () => {
    const view = createView(['one', 'two'], { title: '', message: '' }, 20);
    expect(renderMenuLines(view, plain)).toEqual(['       ', '  one  ', '  two  ', '       ']);
  });

  it('shows a page indicator and only the current page when paginated', () => {
    const labels = Array.from({ length: 10 }, (_, index) => `option ${index}`);
    const first = createView(labels, {}, 10);
    expect(renderMenuLines(first, plain)).toEqual([
      '               ',
      '  option 0     ',
      '  option 1     ',
      '  option 2     ',
      '  option 3     ',
      '  Page 1 of 3  ',
      '               ',
    ]);

    const last = createView(labels, {}, 10, 2);
    expect(renderMenuLines(last, plain)).toEqual([
      '               ',
      '  option 8     ',
      '  option 9     ',
      '  Page 3 of 3  ',
      '               ',
    ]);
  });

  it('wraps every line in the background and text colors', () => {
    for (const line of renderMenuLines(greekView, colored)) {
      expect(line.startsWith('\x1B[48;5;8m\x1B[38;5;15m')).toBe(true);
      expect(line.endsWith('\x1B[39m\x1B[49m')).toBe(true);
    }
  });

  it('highlights the selected option and switches back to the text color', () => {
    const lines = renderMenuLines(greekView, colored);
    expect(lines[3]).toContain('\x1B[1m\x1B[38;5;220malpha\x1B[38;5;15m\x1B[22m');
    expect(lines[4]).not.toContain('\x1B[1m');
  });

  it('underlines the title and colors the footer', () => {
    const view = createView(['a'], { title: 'T', message: 'm', titleColor: 99, msgColor: 7 }, 20);
    const lines = renderMenuLines(view, colored);
    expect(lines[1]).toContain('\x1B[1m\x1B[4m\x1B[38;5;99mT\x1B[38;5;15m\x1B[24m\x1B[22m');
    expect(lines[5]).toContain('\x1B[38;5;7mm\x1B[38;5;15m');
  });

  it('keeps the same visible width on every line whatever the decoration', () => {
    const labels = ['short', 'a much longer label', '归档', '🍕 pizza', 'cafe\u0301', 'x'];
    for (const page of [0, 1]) {
      const view = createView(labels, { title: 'Title', message: 'footer', reservedRows: 0 }, 3, page);
      const width = getBoxWidth(view.layout);
      expect(width).toBe(view.layout.contentWidth + 4);
      for (const line of renderMenuLines(view, colored)) {
        expect(getVisibleWidth(line)).toBe(width);
      }
    }
  });

  it('pads emoji and combining marks by the columns they draw', () => {
    const view = createView(['🍕 pizza', 'cafe\u0301'], {}, 20);
    expect(view.layout.contentWidth).toBe(8);
    expect(renderMenuLines(view, plain)).toEqual([
      ' '.repeat(12),
      '  🍕 pizza  ',
      '  cafe\u0301      ',
      ' '.repeat(12),
    ]);
  });

  it('centers the box in the terminal', () => {
    const frame = renderFrame(greekView, { rows: 20, columns: 40 }, plain);
    expect(frame.verticalPadding).toBe(6);
    expect(frame.lines[3]).toBe(`${' '.repeat(16)}  alpha  `);
  });

  it('clamps padding and indent on a small terminal', () => {
    expect(computeIndent(6, 9)).toBe(0);
    expect(computeVerticalPadding(4, 3, 6)).toBe(0);
    expect(countChromeLines(greekView.props, greekView.layout)).toBe(6);
  });

  it('produces identical output when redrawn with the same state', () => {
    const first = renderFrame(greekView, { rows: 20, columns: 40 }, colored);
    const second = renderFrame(greekView, { rows: 20, columns: 40 }, colored);
    expect(second).toEqual(first);
    expect(stripAnsi(first.lines.join('\n'))).toBe(stripAnsi(second.lines.join('\n')));
  });
});
