import { Defaults } from '../consts/index.js';
import type { MenuLayout, PageBounds } from '../types.js';
import { getDisplayWidth } from '../ui/text-width.js';

function clamp(value: number, min: number, max: number): number {
  const out = value < min ? min : value;
  return out > max ? max : out;
}

export function computeOptionsPerPage(
  rows: number,
  optionCount: number,
  reservedRows: number = Defaults.ReservedRows,
): number {
  return clamp(rows - reservedRows, 1, optionCount);
}

export function computePageCount(optionCount: number, optionsPerPage: number): number {
  return Math.floor((optionCount - 1) / optionsPerPage) + 1;
}

/**
 * Empty title/message count as absent.
 */
export function computeMaxWidth(labels: ReadonlyArray<string>, title?: string, message?: string): number {
  let maxWidth = 0;
  for (const label of labels) {
    maxWidth = Math.max(maxWidth, getDisplayWidth(label));
  }
  if (title) {
    maxWidth = Math.max(maxWidth, getDisplayWidth(title));
  }
  if (message) {
    maxWidth = Math.max(maxWidth, getDisplayWidth(message));
  }
  return maxWidth;
}

export function formatPageIndicator(page: number, pageCount: number): string {
  return `Page ${page + 1} of ${pageCount}`;
}

export function computeMenuLayout(
  labels: ReadonlyArray<string>,
  title: string | undefined,
  message: string | undefined,
  rows: number,
  reservedRows: number = Defaults.ReservedRows,
): MenuLayout {
  const optionCount = labels.length;
  const optionsPerPage = computeOptionsPerPage(rows, optionCount, reservedRows);
  const pageCount = computePageCount(optionCount, optionsPerPage);
  const maxWidth = computeMaxWidth(labels, title, message);

  // The last indicator is the widest one.
  const contentWidth =
    pageCount > 1 ? Math.max(maxWidth, getDisplayWidth(formatPageIndicator(pageCount - 1, pageCount))) : maxWidth;

  return { optionCount, optionsPerPage, pageCount, maxWidth, contentWidth };
}

export function getPageBounds(layout: MenuLayout, page: number): PageBounds {
  const pageStart = page * layout.optionsPerPage;
  const pageEnd = Math.min(pageStart + layout.optionsPerPage, layout.optionCount) - 1;
  return { pageStart, pageEnd };
}
