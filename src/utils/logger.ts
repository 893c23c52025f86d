/**
 * Console logger for the repodoc CLI
 *
 * Emoji-prefixed levels, quiet/verbose switches, optional ISO timestamps for CI
 * logs and a small spinner for long-running steps.
 */

import chalk, { Chalk, type ChalkInstance } from 'chalk';

export interface LoggerOptions {
  /** Only errors are printed */
  quiet: boolean;
  /** Debug messages are printed */
  verbose: boolean;
  noColor: boolean;
  /** Prefix every line with an ISO timestamp (disables the spinner) */
  timestamps: boolean;
}

export interface SpinnerController {
  update(text: string): void;
  succeed(text?: string): void;
  fail(text?: string): void;
  stop(): void;
}

const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];

const NOOP_SPINNER: SpinnerController = {
  update: () => {},
  succeed: () => {},
  fail: () => {},
  stop: () => {},
};

export class Logger {
  private options: LoggerOptions;
  private colors: ChalkInstance;

  constructor(options: Partial<LoggerOptions> = {}) {
    this.options = {
      quiet: options.quiet ?? false,
      verbose: options.verbose ?? false,
      noColor: options.noColor ?? false,
      timestamps: options.timestamps ?? false,
    };
    this.colors = this.pickColors();
  }

  configure(options: Partial<LoggerOptions>): void {
    this.options = { ...this.options, ...options };
    this.colors = this.pickColors();
  }

  getOptions(): LoggerOptions {
    return { ...this.options };
  }

  private pickColors(): ChalkInstance {
    return this.options.noColor ? new Chalk({ level: 0 }) : chalk;
  }

  private format(prefix: string, message: string): string {
    const line = `${prefix} ${message}`;
    return this.options.timestamps ? `[${new Date().toISOString()}] ${line}` : line;
  }

  private out(line: string): void {
    if (this.options.quiet) return;
    console.log(line);
  }

  discovery(message: string): void {
    this.out(this.format('🔍', this.colors.cyan(message)));
  }

  inference(message: string): void {
    this.out(this.format('🧠', this.colors.magenta(message)));
  }

  success(message: string): void {
    this.out(this.format(this.colors.green('✓'), message));
  }

  warning(message: string): void {
    this.out(this.format(this.colors.yellow('⚠'), message));
  }

  error(message: string): void {
    console.error(this.format(this.colors.red('✗'), message));
  }

  debug(message: string): void {
    if (!this.options.verbose) return;
    this.out(this.format(this.colors.gray('→'), this.colors.gray(message)));
  }

  section(title: string): void {
    this.out(this.colors.bold(`=== ${title} ===`));
  }

  info(key: string, value: string | number): void {
    this.out(`  ${this.colors.dim(`${key}:`)} ${value}`);
  }

  listItem(text: string, indent = 0): void {
    this.out(`${'  '.repeat(indent)}• ${text}`);
  }

  blank(): void {
    this.out('');
  }

  /**
   * Start a spinner. Animated only on a TTY; a no-op when quiet, and plain
   * log lines when timestamps are on.
   */
  spinner(text: string): SpinnerController {
    if (this.options.quiet) {
      return NOOP_SPINNER;
    }

    if (this.options.timestamps) {
      return {
        update: () => {},
        succeed: (done) => this.success(done ?? text),
        fail: (failed) => this.error(failed ?? text),
        stop: () => {},
      };
    }

    let current = text;
    let frame = 0;
    const stream = process.stdout;
    const animated = stream.isTTY === true;
    let timer: NodeJS.Timeout | undefined;

    const clearLine = (): void => {
      if (animated) stream.write('\r\x1b[K');
    };

    if (animated) {
      timer = setInterval(() => {
        frame = (frame + 1) % SPINNER_FRAMES.length;
        stream.write(`\r${this.colors.cyan(SPINNER_FRAMES[frame])} ${current}`);
      }, 80);
      timer.unref();
    }

    const stop = (): void => {
      if (timer) {
        clearInterval(timer);
        timer = undefined;
        clearLine();
      }
    };

    return {
      update: (next) => {
        current = next;
      },
      succeed: (done) => {
        stop();
        this.success(done ?? current);
      },
      fail: (failed) => {
        stop();
        this.error(failed ?? current);
      },
      stop,
    };
  }
}

export const logger = new Logger();

/**
 * Configure the shared logger instance
 */
export function configureLogger(options: Partial<LoggerOptions>): void {
  logger.configure(options);
}

export default logger;
