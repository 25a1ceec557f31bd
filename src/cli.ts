#!/usr/bin/env node
import { createProgram } from './commands/index.js';
import { createCommandContext } from './services/context.js';
import { errorMessage, fatal } from './utils/terminal.js';

async function main(): Promise<void> {
  const program = createProgram(createCommandContext());
  await program.parseAsync(process.argv);
}

main().catch((e: unknown) => {
  fatal(errorMessage(e));
});
