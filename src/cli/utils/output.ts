/**
 * Output formatting utilities for CLI
 */

import chalk, { Chalk } from 'chalk';
import type { ChalkInstance } from 'chalk';
import ora from 'ora';

/**
 * Output format types
 */
export enum OutputFormat {
  HUMAN = 'human',
  JSON = 'json'
}

/**
 * Symbols for terminal output
 */
const symbols = {
  success: '✓',
  error: '✗',
  warning: '⚠',
  info: 'ℹ',
  bullet: '•'
};

export type Details = Record<string, unknown>;
export type Cell = string | number | boolean | null;

/**
 * Where formatted lines go; tests capture them
 */
export interface OutputSink {
  out(line: string): void;
  err(line: string): void;
}

export const consoleSink: OutputSink = {
  out: (line) => console.log(line),
  err: (line) => console.error(line)
};

/**
 * Progress indicator around a long-running step
 */
export interface Spinner {
  succeed(text: string): void;
  fail(text: string): void;
}

export interface OutputFormatterOptions {
  format?: OutputFormat;
  color?: boolean;
  sink?: OutputSink;
  /** Animate spinners (default: when stdout is a TTY) */
  spinners?: boolean;
}

/**
 * Output formatter class
 */
export class OutputFormatter {
  private format: OutputFormat;
  private readonly paint: ChalkInstance;
  private readonly sink: OutputSink;
  private readonly spinners: boolean;
  private quiet = false;

  constructor(options: OutputFormatterOptions = {}) {
    const tty = process.stdout.isTTY === true;
    this.format = options.format ?? OutputFormat.HUMAN;
    this.paint = (options.color ?? tty) ? chalk : new Chalk({ level: 0 });
    this.sink = options.sink ?? consoleSink;
    this.spinners = options.spinners ?? tty;
  }

  /**
   * Outputs success message
   */
  success(message: string, data?: Details): void {
    if (this.format === OutputFormat.JSON) {
      this.json({ status: 'success', message, ...data });
      return;
    }
    if (this.quiet) return;
    this.sink.out(`${this.paint.green(symbols.success)} ${message}`);
    if (data) {
      this.details(data);
    }
  }

  /**
   * Outputs error message; DocWiki errors contribute their code
   */
  error(message: string, error?: unknown): void {
    if (this.format === OutputFormat.JSON) {
      this.json({ status: 'error', message, error: error === undefined ? undefined : describeFailure(error) });
      return;
    }
    this.sink.err(`${this.paint.red(symbols.error)} ${this.paint.red(message)}`);
    if (error instanceof Error && error.message !== message) {
      this.sink.err(`  ${this.paint.dim(error.message)}`);
    }
  }

  /**
   * Outputs warning message
   */
  warning(message: string, details?: Details): void {
    if (this.format === OutputFormat.JSON) {
      this.json({ status: 'warning', message, ...details });
      return;
    }
    this.sink.err(`${this.paint.yellow(symbols.warning)} ${this.paint.yellow(message)}`);
    if (details) {
      this.details(details);
    }
  }

  /**
   * Outputs info message
   */
  info(message: string, details?: Details): void {
    if (this.format === OutputFormat.JSON) {
      this.json({ status: 'info', message, ...details });
      return;
    }
    if (this.quiet) return;
    this.sink.out(`${this.paint.blue(symbols.info)} ${message}`);
    if (details) {
      this.details(details);
    }
  }

  /**
   * Outputs a table; JSON mode emits one object per row keyed by header
   */
  table(headers: string[], rows: Cell[][]): void {
    if (this.format === OutputFormat.JSON) {
      const data = rows.map((row) => Object.fromEntries(headers.map((header, i) => [header, row[i] ?? null])));
      this.json({ type: 'table', headers, data });
      return;
    }

    const text = (cell: Cell | undefined): string => (cell === null || cell === undefined ? '' : String(cell));
    const widths = headers.map((h, i) => Math.max(h.length, ...rows.map((r) => text(r[i]).length)));

    this.sink.out(this.paint.bold(headers.map((h, i) => h.padEnd(widths[i] ?? 0)).join(' │ ')));
    this.sink.out(this.paint.dim(widths.map((w) => '─'.repeat(w)).join('─┼─')));
    for (const row of rows) {
      this.sink.out(headers.map((_, i) => text(row[i]).padEnd(widths[i] ?? 0)).join(' │ '));
    }
  }

  /**
   * Outputs a list
   */
  list(items: string[], ordered: boolean = false): void {
    if (this.format === OutputFormat.JSON) {
      this.json({ type: 'list', items, ordered });
      return;
    }
    items.forEach((item, i) => {
      const prefix = ordered ? `${i + 1}.` : symbols.bullet;
      this.sink.out(`  ${this.paint.dim(prefix)} ${item}`);
    });
  }

  /**
   * Outputs raw JSON
   */
  json(data: unknown): void {
    this.sink.out(JSON.stringify(data, null, 2));
  }

  /**
   * Creates a spinner; static in JSON mode, quiet mode and on non-TTY output
   */
  spinner(text: string): Spinner {
    if (this.format === OutputFormat.HUMAN && this.spinners && !this.quiet) {
      const spinner = ora({ text, color: 'cyan' }).start();
      return {
        succeed: (done) => {
          spinner.succeed(done);
        },
        fail: (failed) => {
          spinner.fail(failed);
        }
      };
    }

    return {
      succeed: () => undefined,
      fail: () => undefined
    };
  }

  setFormat(format: OutputFormat): void {
    this.format = format;
  }

  getFormat(): OutputFormat {
    return this.format;
  }

  /**
   * Suppress success and info lines; errors and warnings still print
   */
  setQuiet(quiet: boolean): void {
    this.quiet = quiet;
  }

  /**
   * Outputs details (key-value pairs)
   */
  private details(data: Details): void {
    for (const [key, value] of Object.entries(data)) {
      if (value === undefined) continue;
      const formattedKey = key
        .replace(/([a-z])([A-Z])/g, '$1 $2')
        .replace(/_/g, ' ')
        .replace(/\b\w/g, (l) => l.toUpperCase());
      const shown = value === null ? '-' : typeof value === 'object' ? JSON.stringify(value) : String(value);
      this.sink.out(`  ${this.paint.dim(formattedKey + ':')} ${shown}`);
    }
  }
}

function describeFailure(error: unknown): Details {
  if (!(error instanceof Error)) {
    return { name: 'Error', message: String(error) };
  }
  const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
  return { name: error.name, message: error.message, code };
}
