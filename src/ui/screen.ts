import { Defaults } from '../consts/index.js';
import type { TerminalSize } from '../types.js';

function resolveSizeValue(value: number | undefined, fallback: number): number {
  if (typeof value === 'number' && Number.isFinite(value) && value > 0) {
    return Math.floor(value);
  }
  return fallback;
}

/**
 * Streams that are not attached to a terminal report no size; those fall back to 24x80.
 */
export function resolveTerminalSize(options: { rows?: number; columns?: number } = {}): TerminalSize {
  return {
    rows: resolveSizeValue(options.rows, Defaults.TerminalRows),
    columns: resolveSizeValue(options.columns, Defaults.TerminalColumns),
  };
}
