import { Command } from 'commander';
import { APP_DESCRIPTION, APP_NAME } from '../consts/index.js';
import type { CommandContext } from '../services/context.js';
import type { StyleSetting } from '../types.js';
import { applyStyleSetting, resolveStyleSetting } from '../utils/style.js';
import { parseStyleOption } from './command-utils.js';
import { registerDemoCommand } from './demo.js';
import { registerPickCommand } from './pick.js';
import { registerRunCommand } from './run.js';

export function createProgram(ctx: CommandContext): Command {
  const program = new Command();

  program
    .name(APP_NAME)
    .description(APP_DESCRIPTION)
    .version(ctx.version)
    .option('--style <style>', 'Colored output: on or off', parseStyleOption);

  program.hook('preAction', () => {
    const { style } = program.opts<{ style?: StyleSetting }>();
    ctx.style = resolveStyleSetting(style ?? ctx.style);
    applyStyleSetting(ctx.style);
  });

  registerPickCommand(program, ctx);
  registerRunCommand(program, ctx);
  registerDemoCommand(program, ctx);

  return program;
}
