import type { Command } from 'commander';
import { Menu } from '../menu/menu.js';
import { createMenuRuntime, type CommandContext } from '../services/context.js';
import { addMenuStyleOptions, ensureInteractive, runAction, toMenuProps, type MenuStyleOptions } from './command-utils.js';

interface PickOptions extends MenuStyleOptions {
  index?: boolean;
}

export function registerPickCommand(program: Command, ctx: CommandContext): void {
  addMenuStyleOptions(
    program
      .command('pick')
      .description('Show a menu of labels and print the one that is confirmed')
      .argument('<labels...>', 'Option labels, in display order'),
  )
    .option('-i, --index', 'Print the 0-based index instead of the label')
    .action((labels: string[], options: PickOptions) =>
      runAction(async () => {
        ensureInteractive(ctx);

        const picked: { index?: number } = {};
        const menu = new Menu(
          labels.map((label, index) => ({
            label,
            action: () => {
              picked.index = index;
            },
          })),
          { ...toMenuProps(options), exitOnAction: true },
          createMenuRuntime(ctx),
        );
        await menu.show();

        if (picked.index === undefined) {
          process.exitCode = 1;
          return;
        }
        console.log(options.index ? String(picked.index) : labels[picked.index]);
      }),
    );
}
