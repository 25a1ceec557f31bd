import type { ChalkInstance } from 'chalk';
import { Defaults } from '../consts/index.js';
import type { MenuLayout, NavigationState, ResolvedMenuProps, TerminalSize } from '../types.js';
import { padVisibleWidth } from '../ui/text-width.js';
import { formatPageIndicator } from './layout.js';

export interface MenuView {
  labels: ReadonlyArray<string>;
  props: ResolvedMenuProps;
  layout: MenuLayout;
  navigation: NavigationState;
}

export interface MenuFrame {
  /**
   * Empty lines written before the box to center it vertically.
   */
  verticalPadding: number;
  lines: string[];
}

export function getBoxWidth(layout: MenuLayout): number {
  return layout.contentWidth + Defaults.BoxPadding;
}

/**
 * Rows the box uses besides the option lines.
 */
export function countChromeLines(props: ResolvedMenuProps, layout: MenuLayout): number {
  let lines = 2;
  if (props.title) {
    lines += 2;
  }
  if (layout.pageCount > 1) {
    lines += 1;
  }
  if (props.message) {
    lines += 2;
  }
  return lines;
}

export function computeVerticalPadding(rows: number, optionsPerPage: number, chromeLines: number): number {
  return Math.max(Math.floor(rows / 2) - Math.floor((optionsPerPage + chromeLines) / 2), 0);
}

export function computeIndent(columns: number, boxWidth: number): number {
  return Math.max(Math.floor(columns / 2) - Math.floor(boxWidth / 2), 0);
}

function renderBoxLine(content: string, boxWidth: number, props: ResolvedMenuProps, chalk: ChalkInstance): string {
  const field = padVisibleWidth(`  ${content}`, boxWidth);
  return chalk.bgAnsi256(props.bgColor).ansi256(props.fgColor)(field);
}

/**
 * Lines of the box for the current state, without indentation.
 *
 * Styling wraps the visible text only; padding is added afterwards from the stripped width,
 * so every line has the same visible width whatever decoration it carries.
 */
export function renderMenuLines(view: MenuView, chalk: ChalkInstance): string[] {
  const { labels, props, layout, navigation } = view;
  const boxWidth = getBoxWidth(layout);
  const line = (content: string): string => renderBoxLine(content, boxWidth, props, chalk);

  const lines: string[] = [line('')];

  if (props.title) {
    lines.push(line(chalk.bold.underline.ansi256(props.titleColor)(props.title)));
    lines.push(line(''));
  }

  for (let index = navigation.pageStart; index <= navigation.pageEnd; index += 1) {
    const label = labels[index] ?? '';
    if (index === navigation.selectedOption) {
      lines.push(line(chalk.bold.ansi256(props.selectedColor)(label)));
    } else {
      lines.push(line(label));
    }
  }

  if (layout.pageCount > 1) {
    lines.push(line(formatPageIndicator(navigation.selectedPage, layout.pageCount)));
  }

  if (props.message) {
    lines.push(line(''));
    lines.push(line(chalk.ansi256(props.msgColor)(props.message)));
  }

  lines.push(line(''));
  return lines;
}

export function renderFrame(view: MenuView, size: TerminalSize, chalk: ChalkInstance): MenuFrame {
  const indent = ' '.repeat(computeIndent(size.columns, getBoxWidth(view.layout)));
  const verticalPadding = computeVerticalPadding(
    size.rows,
    view.layout.optionsPerPage,
    countChromeLines(view.props, view.layout),
  );

  return {
    verticalPadding,
    lines: renderMenuLines(view, chalk).map((line) => `${indent}${line}`),
  };
}
