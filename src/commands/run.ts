import { spawn } from 'node:child_process';
import path from 'node:path';
import type { Command } from 'commander';
import { Menu, type MenuRuntime } from '../menu/menu.js';
import { createMenuRuntime, type CommandContext } from '../services/context.js';
import { loadMenuDefinition, type MenuDefinition, type MenuOptionDefinition } from '../services/definition.js';
import type { MenuAction } from '../types.js';
import { warn } from '../utils/terminal.js';
import { ensureInteractive, runAction } from './command-utils.js';

export interface DefinitionRuntime extends Required<MenuRuntime> {
  runCommand(command: string): Promise<number | null>;
}

/**
 * Runs `command` through the shell with the terminal handed over. Resolves with the exit code, or null when
 * the process was killed by a signal.
 */
export function runShellCommand(command: string): Promise<number | null> {
  return new Promise<number | null>((resolve, reject) => {
    const child = spawn(command, { shell: true, stdio: 'inherit' });
    child.once('error', reject);
    child.once('exit', (code) => resolve(code));
  });
}

async function waitForKey(runtime: DefinitionRuntime): Promise<void> {
  runtime.terminal.writeLine(runtime.chalk.dim('Press any key to continue'));
  runtime.terminal.flush();
  await runtime.terminal.readKey();
}

/**
 * `staysOpen` is true when the menu redraws after the action; printed text then waits for a key
 * unless the option sets `pause: false`.
 */
function createAction(option: MenuOptionDefinition, runtime: DefinitionRuntime, staysOpen: boolean): MenuAction {
  if (option.kind === 'menu') {
    const nested = buildMenu(option.menu, runtime);
    return () => nested.show();
  }

  if (option.kind === 'command') {
    return async () => {
      runtime.terminal.flush();
      const code = await runtime.runCommand(option.command);
      if (code !== 0) {
        warn(`${option.command} exited with ${code === null ? 'a signal' : `code ${code}`}.`);
      }
      if (option.pause) {
        await waitForKey(runtime);
      }
    };
  }

  return async () => {
    runtime.terminal.writeLine(option.text);
    runtime.terminal.flush();
    if (option.pause ?? staysOpen) {
      await waitForKey(runtime);
    }
  };
}

export function buildMenu(definition: MenuDefinition, runtime: DefinitionRuntime): Menu {
  const staysOpen = definition.props.exitOnAction === false;
  return new Menu(
    definition.options.map((option) => ({ label: option.label, action: createAction(option, runtime, staysOpen) })),
    definition.props,
    { terminal: runtime.terminal, chalk: runtime.chalk },
  );
}

export function registerRunCommand(program: Command, ctx: CommandContext): void {
  program
    .command('run')
    .description('Show a menu described by a JSONC file')
    .argument('<file>', 'Menu definition file')
    .addHelpText('after', '\nIn a menu with "exitOnAction": false, printed text waits for a key unless "pause" is false.')
    .action((file: string) =>
      runAction(async () => {
        const definition = await loadMenuDefinition(path.resolve(file));
        ensureInteractive(ctx);
        await buildMenu(definition, { ...createMenuRuntime(ctx), runCommand: runShellCommand }).show();
      }),
    );
}
