import { Chalk } from 'chalk';
import { describe, expect, it } from 'vitest';
import { createDemoMenu } from '../../src/commands/demo.js';
import { FakeTerminal, key } from '../helpers/fake-terminal.js';

const chalk = new Chalk({ level: 0 });

describe('demo menu', () => {
  it('counts confirmations per item', async () => {
    const terminal = new FakeTerminal([key.down, key.enter, key.enter, key.down, key.enter, key.escape]);
    const tally = new Map<string, number>();

    await createDemoMenu(3, { terminal, chalk }, tally).show();

    expect([...tally]).toEqual([
      ['Item 1', 2],
      ['Item 2', 1],
    ]);
  });

  it('returns from the nested menu without counting anything', async () => {
    const terminal = new FakeTerminal([key.enter, key.down, key.enter, key.escape]);
    const tally = new Map<string, number>();

    await createDemoMenu(3, { terminal, chalk }, tally).show();

    expect(tally.size).toBe(0);
    expect(terminal.remainingKeys).toBe(0);
  });

  it('pages a long item list on a short terminal', () => {
    const menu = createDemoMenu(30, { terminal: new FakeTerminal([], { rows: 16, columns: 80 }), chalk }, new Map());
    expect(menu.optionsPerPage).toBe(10);
    expect(menu.pageCount).toBe(4);
  });
});
