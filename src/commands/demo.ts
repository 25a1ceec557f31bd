import type { Command } from 'commander';
import { Color, Defaults } from '../consts/index.js';
import { Menu, type MenuRuntime } from '../menu/menu.js';
import { createMenuRuntime, type CommandContext } from '../services/context.js';
import { info } from '../utils/terminal.js';
import { ensureInteractive, parsePositiveInt, runAction } from './command-utils.js';

/**
 * A paginated menu whose items count how often they were confirmed, plus one item that opens a nested menu.
 */
export function createDemoMenu(count: number, runtime: MenuRuntime, tally: Map<string, number>): Menu {
  const nested = new Menu(
    [
      { label: 'Back', action: () => {} },
      { label: 'Also back', action: () => {} },
    ],
    {
      title: 'Nested menu',
      message: 'Any choice returns',
      bgColor: Color.DarkGray,
      fgColor: Color.White,
      titleColor: Color.Purple,
      selectedColor: Color.Yellow,
    },
    runtime,
  );

  const items = Array.from({ length: count }, (_, index) => {
    const label = `Item ${index + 1}`;
    return {
      label,
      action: () => {
        tally.set(label, (tally.get(label) ?? 0) + 1);
      },
    };
  });

  return new Menu(
    [{ label: 'Open nested menu', action: () => nested.show() }, ...items],
    {
      title: 'console-menu demo',
      message: 'enter: select  esc/q: leave',
      exitOnAction: false,
      bgColor: Color.Blue,
      fgColor: Color.White,
      titleColor: Color.Yellow,
      selectedColor: Color.Black,
      msgColor: Color.LightGray,
    },
    runtime,
  );
}

export function registerDemoCommand(program: Command, ctx: CommandContext): void {
  program
    .command('demo')
    .description('Show a paginated demo menu with a nested menu')
    .option('-c, --count <count>', 'Number of items', parsePositiveInt, Defaults.DemoOptionCount)
    .action((options: { count: number }) =>
      runAction(async () => {
        ensureInteractive(ctx);

        const tally = new Map<string, number>();
        await createDemoMenu(options.count, createMenuRuntime(ctx), tally).show();

        if (tally.size === 0) {
          info('Nothing was confirmed.');
          return;
        }
        for (const [label, times] of tally) {
          info(`${label} confirmed ${times} time(s).`);
        }
      }),
    );
}
