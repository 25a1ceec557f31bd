export type KeyName = 'up' | 'down' | 'left' | 'right' | 'enter' | 'escape' | 'backspace' | 'interrupt' | 'other';

export type Key = { name: KeyName } | { name: 'char'; char: string };

/**
 * Shape of the second argument of readline's `keypress` event.
 */
export interface Keypress {
  name?: string;
  sequence?: string;
  ctrl?: boolean;
  meta?: boolean;
  shift?: boolean;
}

const NAMED_KEYS = new Map<string, KeyName>([
  ['up', 'up'],
  ['down', 'down'],
  ['left', 'left'],
  ['right', 'right'],
  ['return', 'enter'],
  ['enter', 'enter'],
  ['escape', 'escape'],
  ['backspace', 'backspace'],
]);

function isPrintableChar(value: string): boolean {
  if ([...value].length !== 1) {
    return false;
  }
  const code = value.codePointAt(0);
  return code !== undefined && code > 31 && code !== 127;
}

export function classifyKeypress(value: string | undefined, key: Keypress | undefined): Key {
  if (key?.ctrl && key.name === 'c') {
    return { name: 'interrupt' };
  }

  const named = key?.name === undefined ? undefined : NAMED_KEYS.get(key.name);
  if (named !== undefined) {
    return { name: named };
  }

  if (value !== undefined && !key?.ctrl && !key?.meta && isPrintableChar(value)) {
    return { name: 'char', char: value };
  }

  return { name: 'other' };
}

export function isCharKey(key: Key, ...chars: string[]): boolean {
  return key.name === 'char' && chars.includes(key.char);
}
