import chalk from 'chalk';

type LogLevel = 'info' | 'success' | 'warn' | 'error' | 'debug';

const LOG_PREFIXES: Record<LogLevel, string> = {
  info: chalk.blue('ℹ'),
  success: chalk.green('✓'),
  warn: chalk.yellow('⚠'),
  error: chalk.red('✗'),
  debug: chalk.gray('⋯'),
};

/** DEBUG=true, 1 or yes turns on debug output without -v */
const isDebugEnv = (): boolean => {
  const debug = process.env.DEBUG;
  return debug === 'true' || debug === '1' || debug === 'yes';
};

class Logger {
  private verbose = false;
  private toStderr = false;

  setVerbose(verbose: boolean): void {
    this.verbose = verbose;
  }

  /** Send everything except `error` to stderr, keeping stdout for data (--json) */
  setStderr(toStderr: boolean): void {
    this.toStderr = toStderr;
  }

  private write(line: string, args: unknown[]): void {
    if (this.toStderr) {
      console.error(line, ...args);
    } else {
      console.log(line, ...args);
    }
  }

  isVerbose(): boolean {
    return this.verbose || isDebugEnv();
  }

  info(message: string, ...args: unknown[]): void {
    this.write(`${LOG_PREFIXES.info} ${message}`, args);
  }

  success(message: string, ...args: unknown[]): void {
    this.write(`${LOG_PREFIXES.success} ${chalk.green(message)}`, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.write(`${LOG_PREFIXES.warn} ${chalk.yellow(message)}`, args);
  }

  error(message: string, ...args: unknown[]): void {
    console.error(`${LOG_PREFIXES.error} ${chalk.red(message)}`, ...args);
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.isVerbose()) {
      this.write(`${LOG_PREFIXES.debug} ${chalk.gray(message)}`, args);
    }
  }

  valuation(ticker: string, upsidePct: number, recommendation: string): void {
    const color =
      upsidePct >= 10 ? chalk.green : upsidePct >= -10 ? chalk.yellow : chalk.red;
    const sign = upsidePct >= 0 ? '+' : '';
    this.write(
      `  ${chalk.bold(ticker.padEnd(6))} ` +
        `${color(`${sign}${upsidePct.toFixed(1)}%`.padStart(8))}  ` +
        `${chalk.gray(recommendation)}`,
      []
    );
  }

  divider(): void {
    this.write(chalk.gray('─'.repeat(60)), []);
  }

  header(title: string): void {
    this.write('', []);
    this.write(chalk.bold.cyan(title), []);
    this.divider();
  }
}

export const logger = new Logger();
