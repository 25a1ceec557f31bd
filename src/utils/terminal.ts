import chalk from 'chalk';

type BadgeColor = 'cyan' | 'yellow' | 'red';

function styleBadge(label: string, color: BadgeColor): string {
  if (color === 'cyan') {
    return chalk.black.bgCyan(` ${label} `);
  }
  if (color === 'yellow') {
    return chalk.black.bgYellow(` ${label} `);
  }
  return chalk.white.bgRed(` ${label} `);
}

export function info(message: string): void {
  console.log(`${styleBadge('INFO', 'cyan')} ${chalk.cyan(message)}`);
}

export function warn(message: string): void {
  console.log(`${styleBadge('WARN', 'yellow')} ${chalk.yellow(message)}`);
}

export function error(message: string): void {
  console.error(`${styleBadge('ERROR', 'red')} ${chalk.red(message)}`);
}

export function fatal(message: string): never {
  console.error(`${styleBadge('FATAL', 'red')} ${chalk.red(message)}`);
  process.exit(1);
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
