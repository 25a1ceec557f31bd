import readline from 'node:readline';
import { Ansi } from '../consts/index.js';
import type { TerminalSize } from '../types.js';
import { classifyKeypress, type Key, type Keypress } from './keys.js';
import { resolveTerminalSize } from './screen.js';

/**
 * Terminal primitives a menu draws and reads through.
 */
export interface TerminalDriver {
  size(): TerminalSize;
  /**
   * Resolves with the next key. Unrecognized input arrives as `{ name: 'other' }`.
   */
  readKey(): Promise<Key>;
  write(text: string): void;
  writeLine(text: string): void;
  hideCursor(): void;
  showCursor(): void;
  flush(): void;
}

export type KeyInput = NodeJS.ReadableStream & {
  isTTY?: boolean;
  isRaw?: boolean;
  setRawMode?: (mode: boolean) => unknown;
};

export interface ScreenOutput {
  rows?: number;
  columns?: number;
  write(chunk: string): boolean;
}

interface PendingRead {
  resolve(key: Key): void;
  reject(error: Error): void;
}

/**
 * {@link TerminalDriver} over Node streams.
 *
 * Writes are buffered until {@link flush}. Raw mode is only on while a key read is pending, so
 * actions run against a normal terminal. Keys decoded from one chunk (a paste, auto-repeat) are
 * queued and handed out by later reads.
 */
export class NodeTerminal implements TerminalDriver {
  private buffer: string[] = [];
  private readonly keys: Key[] = [];
  private pendingRead: PendingRead | undefined;
  private inputError: Error | undefined;
  private listening = false;

  constructor(
    private readonly input: KeyInput = process.stdin,
    private readonly output: ScreenOutput = process.stdout,
  ) {}

  size(): TerminalSize {
    return resolveTerminalSize({ rows: this.output.rows, columns: this.output.columns });
  }

  write(text: string): void {
    this.buffer.push(text);
  }

  writeLine(text: string): void {
    this.buffer.push(`${text}\n`);
  }

  hideCursor(): void {
    this.write(Ansi.HideCursor);
  }

  showCursor(): void {
    this.write(Ansi.ShowCursor);
  }

  flush(): void {
    if (this.buffer.length === 0) {
      return;
    }
    const chunk = this.buffer.join('');
    this.buffer = [];
    this.output.write(chunk);
  }

  readKey(): Promise<Key> {
    this.flush();
    this.listen();

    const queued = this.keys.shift();
    if (queued !== undefined) {
      return Promise.resolve(queued);
    }
    if (this.inputError !== undefined) {
      return Promise.reject(this.inputError);
    }

    const input = this.input;
    const wasRaw = input.isRaw === true;
    if (input.isTTY && input.setRawMode) {
      input.setRawMode(true);
    }

    return new Promise<Key>((resolve, reject) => {
      const settle = (): void => {
        this.pendingRead = undefined;
        if (input.isTTY && input.setRawMode) {
          input.setRawMode(wasRaw);
        }
        input.pause();
      };

      this.pendingRead = {
        resolve: (key) => {
          settle();
          resolve(key);
        },
        reject: (error) => {
          settle();
          reject(error);
        },
      };
      input.resume();
    });
  }

  private listen(): void {
    if (this.listening) {
      return;
    }
    this.listening = true;

    readline.emitKeypressEvents(this.input);
    this.input.on('keypress', (value: string | undefined, key: Keypress | undefined) => {
      this.receive(classifyKeypress(value, key));
    });
    this.input.on('end', () => this.fail(new Error('Input stream ended while waiting for a key.')));
    this.input.on('error', (error: Error) => this.fail(error));
  }

  private receive(key: Key): void {
    if (this.pendingRead) {
      this.pendingRead.resolve(key);
      return;
    }
    this.keys.push(key);
  }

  private fail(error: Error): void {
    this.inputError = error;
    this.pendingRead?.reject(error);
  }
}
