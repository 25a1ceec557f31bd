import type { ChalkInstance } from 'chalk';
import { Ansi } from '../consts/index.js';
import type { MenuLayout, MenuOption, MenuProps, NavigationState, ResolvedMenuProps } from '../types.js';
import { NodeTerminal, type TerminalDriver } from '../ui/terminal-driver.js';
import { createMenuChalk } from '../utils/style.js';
import { computeMenuLayout } from './layout.js';
import { applyMenuKey, createNavigationState } from './navigation.js';
import { resolveMenuProps } from './props.js';
import { renderFrame } from './render.js';

export interface MenuRuntime {
  terminal?: TerminalDriver;
  chalk?: ChalkInstance;
}

/**
 * Interactive console menu.
 *
 * ```ts
 * const menu = new Menu(
 *   [
 *     { label: 'option 1', action: () => console.log('option one!') },
 *     { label: 'option 2', action: () => console.log('option two!') },
 *   ],
 *   { ...defaultMenuProps(), title: 'Pick one' },
 * );
 * await menu.show();
 * ```
 *
 * Keys: arrows or `h j k l` to move (`b`/`w` also flip pages), enter to confirm, esc, `q` or
 * backspace to leave. Options that do not fit the terminal are split into pages.
 */
export class Menu {
  private readonly options: ReadonlyArray<MenuOption>;
  private readonly labels: ReadonlyArray<string>;
  private readonly props: ResolvedMenuProps;
  private readonly terminal: TerminalDriver;
  private readonly chalk: ChalkInstance;
  private layout: MenuLayout;
  private navigation: NavigationState;
  private cursorHidden = false;

  constructor(options: ReadonlyArray<MenuOption>, props: Partial<MenuProps> = {}, runtime: MenuRuntime = {}) {
    if (options.length === 0) {
      throw new Error('Menu options cannot be empty.');
    }

    this.options = [...options];
    this.labels = this.options.map((option) => option.label);
    this.props = resolveMenuProps(props);
    this.terminal = runtime.terminal ?? new NodeTerminal();
    this.chalk = runtime.chalk ?? createMenuChalk();
    this.layout = this.computeLayout();
    this.navigation = createNavigationState(this.layout);
  }

  get selectedIndex(): number {
    return this.navigation.selectedOption;
  }

  get selectedPage(): number {
    return this.navigation.selectedPage;
  }

  get optionsPerPage(): number {
    return this.layout.optionsPerPage;
  }

  get pageCount(): number {
    return this.layout.pageCount;
  }

  /**
   * Runs the menu until it is left or, with `exitOnAction`, an option is confirmed.
   *
   * Errors from the terminal or from an action are rethrown after the screen is cleared and the
   * cursor is shown again.
   */
  async show(): Promise<void> {
    this.layout = this.computeLayout();
    this.navigation = createNavigationState(this.layout);

    try {
      this.hideCursor();
      // Push earlier output up so the box does not draw over it.
      this.terminal.write('\n'.repeat(Math.max(this.terminal.size().rows - 1, 0)));
      this.draw();
      await this.runNavigation();
    } finally {
      this.restoreTerminal();
    }
  }

  private async runNavigation(): Promise<void> {
    for (;;) {
      const key = await this.terminal.readKey();
      const update = applyMenuKey(this.navigation, this.layout, key);
      this.navigation = update.state;

      if (update.action === 'exit') {
        return;
      }

      if (update.action === 'confirm') {
        const option = this.options[this.navigation.selectedOption];
        if (this.props.exitOnAction) {
          this.restoreTerminal();
          await option?.action();
          return;
        }
        await option?.action();
        // The action may have printed or opened another menu; take the screen back.
        this.hideCursor();
      }

      this.draw();
    }
  }

  private computeLayout(): MenuLayout {
    return computeMenuLayout(
      this.labels,
      this.props.title,
      this.props.message,
      this.terminal.size().rows,
      this.props.reservedRows,
    );
  }

  private draw(): void {
    const frame = renderFrame(
      { labels: this.labels, props: this.props, layout: this.layout, navigation: this.navigation },
      this.terminal.size(),
      this.chalk,
    );

    this.terminal.write(Ansi.ClearScreen);
    this.terminal.write('\n'.repeat(frame.verticalPadding));
    for (const line of frame.lines) {
      this.terminal.writeLine(line);
    }
    this.terminal.flush();
  }

  private hideCursor(): void {
    this.terminal.hideCursor();
    this.cursorHidden = true;
  }

  private restoreTerminal(): void {
    if (!this.cursorHidden) {
      return;
    }
    this.cursorHidden = false;
    this.terminal.write(Ansi.ClearScreen);
    this.terminal.showCursor();
    this.terminal.flush();
  }
}
