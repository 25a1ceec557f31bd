import stringWidth from 'string-width';
import stripAnsi from 'strip-ansi';

/**
 * Columns the text occupies in a terminal: wide CJK and emoji count 2, combining marks 0.
 * Expects plain text; use {@link getVisibleWidth} for styled text.
 */
export function getDisplayWidth(text: string): number {
  return stringWidth(text);
}

export function getVisibleWidth(text: string): number {
  return stringWidth(stripAnsi(text));
}

/**
 * Right-pads styled text with spaces until its visible width reaches `targetWidth`.
 */
export function padVisibleWidth(text: string, targetWidth: number): string {
  const pad = Math.max(targetWidth - getVisibleWidth(text), 0);
  return `${text}${' '.repeat(pad)}`;
}
