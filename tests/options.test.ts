import { Command, CommanderError } from 'commander';
import { describe, test, expect } from 'vitest';
import { parsePositiveInt } from '../src/commands/options.ts';

function createProgram(): Command {
  return new Command()
    .exitOverride()
    .configureOutput({ writeErr: () => {}, writeOut: () => {} })
    .option('--concurrency <n>', 'Tickers fetched at once', parsePositiveInt, 5)
    .option('--limit <n>', 'Number of runs', parsePositiveInt, 20);
}

describe('parsePositiveInt', () => {
  test('parses base-10 counts', () => {
    expect(parsePositiveInt('8')).toBe(8);
    expect(parsePositiveInt(' 12 ')).toBe(12);
  });

  test.each(['0', '-3', '2.5', 'abc', ''])('rejects "%s"', (value) => {
    expect(() => parsePositiveInt(value)).toThrow('expected a positive integer');
  });
});

describe('count options under commander', () => {
  test('defaults apply when the flag is absent', () => {
    const opts = createProgram().parse([], { from: 'user' }).opts();
    expect(opts).toEqual({ concurrency: 5, limit: 20 });
  });

  test('the default is not used as a radix', () => {
    const opts = createProgram()
      .parse(['--concurrency', '8', '--limit', '50'], { from: 'user' })
      .opts();
    expect(opts).toEqual({ concurrency: 8, limit: 50 });
  });

  test('invalid counts stop parsing', () => {
    expect(() =>
      createProgram().parse(['--concurrency', '0'], { from: 'user' })
    ).toThrow(CommanderError);
  });
});
