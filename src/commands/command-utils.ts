import { InvalidArgumentError, type Command } from 'commander';
import { APP_NAME, FORCE_INTERACTIVE_ENV } from '../consts/index.js';
import { isColorCode } from '../menu/props.js';
import type { CommandContext } from '../services/context.js';
import type { MenuProps, StyleSetting } from '../types.js';
import { normalizeStyleSetting } from '../utils/style.js';
import { error, errorMessage } from '../utils/terminal.js';

export interface MenuStyleOptions {
  title?: string;
  message?: string;
  bg?: number;
  fg?: number;
  titleColor?: number;
  selectedColor?: number;
  messageColor?: number;
}

export async function runAction(action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (e) {
    error(errorMessage(e));
    process.exitCode = 1;
  }
}

export function ensureInteractive(ctx: CommandContext): void {
  if (!ctx.isInteractive()) {
    throw new Error(
      `${APP_NAME} needs an interactive terminal. Set ${FORCE_INTERACTIVE_ENV}=1 to draw on stderr when stdout is captured.`,
    );
  }
}

export function parseColorOption(value: string): number {
  const color = Number(value);
  if (!value.trim() || !isColorCode(color)) {
    throw new InvalidArgumentError('Color must be an integer between 0 and 255.');
  }
  return color;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!value.trim() || !Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Value must be a positive integer.');
  }
  return parsed;
}

export function parseStyleOption(value: string): StyleSetting {
  const style = normalizeStyleSetting(value);
  if (style === undefined) {
    throw new InvalidArgumentError('Style must be on or off.');
  }
  return style;
}

export function addMenuStyleOptions(command: Command): Command {
  return command
    .option('-t, --title <title>', 'Title shown above the options')
    .option('-m, --message <message>', 'Footer message shown below the options')
    .option('--bg <color>', 'Background color (0-255)', parseColorOption)
    .option('--fg <color>', 'Text color (0-255)', parseColorOption)
    .option('--title-color <color>', 'Title color (0-255)', parseColorOption)
    .option('--selected-color <color>', 'Selected option color (0-255)', parseColorOption)
    .option('--message-color <color>', 'Footer message color (0-255)', parseColorOption);
}

export function toMenuProps(options: MenuStyleOptions): Partial<MenuProps> {
  return {
    ...(options.title !== undefined ? { title: options.title } : {}),
    ...(options.message !== undefined ? { message: options.message } : {}),
    ...(options.bg !== undefined ? { bgColor: options.bg } : {}),
    ...(options.fg !== undefined ? { fgColor: options.fg } : {}),
    ...(options.titleColor !== undefined ? { titleColor: options.titleColor } : {}),
    ...(options.selectedColor !== undefined ? { selectedColor: options.selectedColor } : {}),
    ...(options.messageColor !== undefined ? { msgColor: options.messageColor } : {}),
  };
}
