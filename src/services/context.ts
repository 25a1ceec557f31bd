import { readFileSync } from 'node:fs';
import { FORCE_INTERACTIVE_ENV } from '../consts/index.js';
import type { MenuRuntime } from '../menu/menu.js';
import type { StyleSetting } from '../types.js';
import { NodeTerminal, type TerminalDriver } from '../ui/terminal-driver.js';
import { createMenuChalk, resolveStyleSetting } from '../utils/style.js';

export interface CommandContext {
  readonly version: string;
  style: StyleSetting;
  isInteractive(): boolean;
  createTerminal(): TerminalDriver;
}

export function readPackageVersion(): string {
  // Same relative location from src/services and dist/services.
  const raw: unknown = JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf8'));
  if (typeof raw === 'object' && raw !== null && 'version' in raw && typeof raw.version === 'string') {
    return raw.version;
  }
  return '0.0.0';
}

interface TtyState {
  isTTY?: boolean;
}

export interface TerminalStreams<Output extends TtyState> {
  stdin: TtyState & { setRawMode?: unknown };
  stdout: Output;
  stderr: Output;
}

/**
 * Stream a menu draws on: stdout when it is a terminal, otherwise stderr when stdout is captured
 * (`choice=$(console-menu pick a b)`) and CONSOLE_MENU_FORCE_INTERACTIVE=1. Undefined when keys
 * cannot be read in raw mode or no terminal would show the menu.
 */
export function resolveDrawStream<Output extends TtyState>(
  streams: TerminalStreams<Output>,
  env: NodeJS.ProcessEnv = process.env,
): Output | undefined {
  if (!streams.stdin.isTTY || typeof streams.stdin.setRawMode !== 'function') {
    return undefined;
  }
  if (streams.stdout.isTTY) {
    return streams.stdout;
  }
  if (env[FORCE_INTERACTIVE_ENV] === '1' && streams.stderr.isTTY) {
    return streams.stderr;
  }
  return undefined;
}

export function createCommandContext(): CommandContext {
  const streams: TerminalStreams<NodeJS.WriteStream> = {
    stdin: process.stdin,
    stdout: process.stdout,
    stderr: process.stderr,
  };
  return {
    version: readPackageVersion(),
    style: resolveStyleSetting('on'),
    isInteractive: () => resolveDrawStream(streams) !== undefined,
    createTerminal: () => new NodeTerminal(process.stdin, resolveDrawStream(streams) ?? process.stdout),
  };
}

export function createMenuRuntime(ctx: CommandContext): Required<MenuRuntime> {
  return {
    terminal: ctx.createTerminal(),
    chalk: createMenuChalk(ctx.style),
  };
}
