import { Defaults } from '../consts/index.js';
import type { MenuOption, MenuProps, ResolvedMenuProps } from '../types.js';

/**
 * Default configuration. Override single fields with a spread:
 *
 * ```ts
 * new Menu(options, { ...defaultMenuProps(), title: 'My Menu' });
 * ```
 */
export function defaultMenuProps(): MenuProps {
  return {
    title: '',
    message: '',
    exitOnAction: true,
    bgColor: 8,
    fgColor: 15,
    titleColor: undefined,
    selectedColor: undefined,
    msgColor: 7,
    reservedRows: Defaults.ReservedRows,
  };
}

/**
 * An option that does nothing when confirmed. With `exitOnAction` it works as a "leave" entry.
 */
export function exitOption(label = 'exit'): MenuOption {
  return { label, action: () => {} };
}

export function isColorCode(value: unknown): value is number {
  return Number.isInteger(value) && Number(value) >= 0 && Number(value) <= 255;
}

function assertColor(name: string, value: number): number {
  if (!isColorCode(value)) {
    throw new Error(`Menu ${name} must be an integer between 0 and 255, got ${String(value)}.`);
  }
  return value;
}

export function resolveMenuProps(props: Partial<MenuProps> = {}): ResolvedMenuProps {
  const defaults = defaultMenuProps();
  const merged: MenuProps = {
    ...defaults,
    ...props,
    title: props.title ?? defaults.title,
    message: props.message ?? defaults.message,
    exitOnAction: props.exitOnAction ?? defaults.exitOnAction,
    bgColor: props.bgColor ?? defaults.bgColor,
    fgColor: props.fgColor ?? defaults.fgColor,
  };
  const fgColor = assertColor('fgColor', merged.fgColor);
  const reservedRows = merged.reservedRows ?? Defaults.ReservedRows;

  if (!Number.isInteger(reservedRows) || reservedRows < 0) {
    throw new Error(`Menu reservedRows must be a non-negative integer, got ${String(reservedRows)}.`);
  }

  return {
    title: merged.title.length > 0 ? merged.title : undefined,
    message: merged.message.length > 0 ? merged.message : undefined,
    exitOnAction: merged.exitOnAction,
    bgColor: assertColor('bgColor', merged.bgColor),
    fgColor,
    titleColor: assertColor('titleColor', merged.titleColor ?? fgColor),
    selectedColor: assertColor('selectedColor', merged.selectedColor ?? fgColor),
    msgColor: assertColor('msgColor', merged.msgColor ?? fgColor),
    reservedRows,
  };
}
