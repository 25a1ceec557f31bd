import { isColorCode } from '../menu/props.js';
import type { MenuProps } from '../types.js';
import { readJsoncFile } from '../utils/json.js';

export type MenuOptionDefinition =
  | { label: string; kind: 'print'; text: string; pause?: boolean }
  | { label: string; kind: 'command'; command: string; pause: boolean }
  | { label: string; kind: 'menu'; menu: MenuDefinition };

export interface MenuDefinition {
  props: Partial<MenuProps>;
  options: MenuOptionDefinition[];
}

type ColorField = 'bgColor' | 'fgColor' | 'titleColor' | 'selectedColor' | 'msgColor';

const COLOR_FIELDS = new Map<string, ColorField>([
  ['bg', 'bgColor'],
  ['fg', 'fgColor'],
  ['title', 'titleColor'],
  ['selected', 'selectedColor'],
  ['message', 'msgColor'],
]);

const ACTION_FIELDS = ['print', 'command', 'menu'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function fail(source: string, at: string, message: string): never {
  throw new Error(`${source}: ${at} ${message}`);
}

class DefinitionReader {
  constructor(private readonly source: string) {}

  optionalString(record: Record<string, unknown>, key: string, at: string): string | undefined {
    const value = record[key];
    if (value === undefined) {
      return undefined;
    }
    if (typeof value !== 'string') {
      fail(this.source, at, 'must be a string.');
    }
    return value;
  }

  optionalBoolean(record: Record<string, unknown>, key: string, at: string): boolean | undefined {
    const value = record[key];
    if (value === undefined) {
      return undefined;
    }
    if (typeof value !== 'boolean') {
      fail(this.source, at, 'must be true or false.');
    }
    return value;
  }

  readColors(value: unknown, prefix: string): Partial<MenuProps> {
    if (value === undefined) {
      return {};
    }
    if (!isRecord(value)) {
      fail(this.source, `${prefix}colors`, 'must be an object.');
    }

    const props: Partial<MenuProps> = {};
    for (const [key, color] of Object.entries(value)) {
      const field = COLOR_FIELDS.get(key);
      if (field === undefined) {
        fail(this.source, `${prefix}colors.${key}`, `is not a known color (${[...COLOR_FIELDS.keys()].join(', ')}).`);
      }
      if (!isColorCode(color)) {
        fail(this.source, `${prefix}colors.${key}`, 'must be an integer between 0 and 255.');
      }
      props[field] = color;
    }
    return props;
  }

  readOption(value: unknown, at: string): MenuOptionDefinition {
    if (!isRecord(value)) {
      fail(this.source, at, 'must be an object.');
    }

    const label = value.label;
    if (typeof label !== 'string') {
      fail(this.source, `${at}.label`, 'must be a string.');
    }

    const present = ACTION_FIELDS.filter((field) => value[field] !== undefined);
    if (present.length !== 1) {
      fail(this.source, at, `must have exactly one of ${ACTION_FIELDS.join(', ')}.`);
    }

    if (value.menu !== undefined) {
      return { label, kind: 'menu', menu: this.readMenu(value.menu, `${at}.menu.`) };
    }

    const pause = this.optionalBoolean(value, 'pause', `${at}.pause`);
    const command = this.optionalString(value, 'command', `${at}.command`);
    if (command !== undefined) {
      if (!command.trim()) {
        fail(this.source, `${at}.command`, 'must not be empty.');
      }
      return { label, kind: 'command', command, pause: pause ?? false };
    }

    const text = this.optionalString(value, 'print', `${at}.print`) ?? '';
    return { label, kind: 'print', text, pause };
  }

  readMenu(value: unknown, prefix: string): MenuDefinition {
    if (!isRecord(value)) {
      fail(this.source, prefix ? prefix.slice(0, -1) : 'menu', 'must be an object.');
    }

    const props: Partial<MenuProps> = this.readColors(value.colors, prefix);
    const title = this.optionalString(value, 'title', `${prefix}title`);
    const message = this.optionalString(value, 'message', `${prefix}message`);
    const exitOnAction = this.optionalBoolean(value, 'exitOnAction', `${prefix}exitOnAction`);
    if (title !== undefined) {
      props.title = title;
    }
    if (message !== undefined) {
      props.message = message;
    }
    if (exitOnAction !== undefined) {
      props.exitOnAction = exitOnAction;
    }

    const options = value.options;
    if (!Array.isArray(options) || options.length === 0) {
      fail(this.source, `${prefix}options`, 'must be a non-empty array.');
    }

    return {
      props,
      options: options.map((option: unknown, index) => this.readOption(option, `${prefix}options[${index}]`)),
    };
  }
}

/**
 * Validates a parsed menu file. Errors name the source and the offending path, e.g.
 * `tools.jsonc: options[1].command must not be empty.`
 */
export function parseMenuDefinition(value: unknown, source: string): MenuDefinition {
  return new DefinitionReader(source).readMenu(value, '');
}

export async function loadMenuDefinition(filePath: string): Promise<MenuDefinition> {
  return parseMenuDefinition(await readJsoncFile(filePath), filePath);
}
