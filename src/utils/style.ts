import chalk, { Chalk, type ChalkInstance } from 'chalk';
import { STYLE_ENV } from '../consts/index.js';
import type { StyleSetting } from '../types.js';

const detectedChalkLevel = chalk.level;

export function normalizeStyleSetting(value: unknown): StyleSetting | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }

  const normalized = value.trim().toLowerCase();
  if (normalized === 'on' || normalized === 'off') {
    return normalized;
  }
  return undefined;
}

export function resolveStyleSetting(configStyle: StyleSetting, env: NodeJS.ProcessEnv = process.env): StyleSetting {
  const envStyle = normalizeStyleSetting(env[STYLE_ENV]);
  return envStyle ?? configStyle;
}

/**
 * Applies the setting to the shared chalk instance used by the log helpers.
 */
export function applyStyleSetting(style: StyleSetting): void {
  if (style === 'off') {
    chalk.level = 0;
    return;
  }

  // Force basic ANSI colors by default, even when stdout is piped by shell wrapper.
  chalk.level = Math.max(detectedChalkLevel, 1) as 1 | 2 | 3;
}

/**
 * Chalk instance for drawing menus. Menus use 8-bit colors, so anything below 256-color support is raised.
 */
export function createMenuChalk(style: StyleSetting = resolveStyleSetting('on')): ChalkInstance {
  if (style === 'off') {
    return new Chalk({ level: 0 });
  }
  return new Chalk({ level: Math.max(detectedChalkLevel, 2) as 2 | 3 });
}
