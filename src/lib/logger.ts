/**
 * Console output for clonebox.
 *
 * Human mode prints symbol-prefixed lines as they happen. JSON mode stays
 * quiet and collects one result object that `flush()` prints at exit. One
 * Logger is built per process and reaches every component through the
 * engine context.
 */

import type { CloneboxError } from '../core/errors.js';

export type OutputMode = 'human' | 'json';

export type LogLevel = 'debug' | 'info' | 'success' | 'warning' | 'error';

export type StepStatus = 'starting' | 'completed' | 'failed' | 'undone';

/**
 * The object printed in JSON mode
 */
export interface JsonOutput {
  success: boolean;
  command?: string;
  data?: unknown;
  warnings?: string[];
  error?: {
    code: string;
    message: string;
    suggestion?: string;
    details?: Record<string, unknown>;
  };
}

export interface LoggerOptions {
  /** Emit debug messages (default: false) */
  verbose?: boolean;
}

const LEVEL_PREFIX: Record<LogLevel, string> = {
  debug: '· ',
  info: '',
  success: '✓ ',
  warning: '⚠ ',
  error: '✗ ',
};

const STEP_SYMBOL: Record<StepStatus, string> = {
  starting: '→',
  completed: '✓',
  failed: '✗',
  undone: '↩',
};

/**
 * Lay out rows under headers, columns two spaces apart, trailing blanks cut.
 */
export function formatTable(headers: string[], rows: string[][]): string[] {
  const widths = headers.map((header, column) =>
    rows.reduce((widest, row) => Math.max(widest, (row[column] ?? '').length), header.length)
  );
  const line = (cells: string[]): string =>
    cells.map((cell, column) => cell.padEnd(widths[column] ?? 0)).join('  ').trimEnd();
  return [line(headers), ...rows.map(line)];
}

export class Logger {
  private readonly mode: OutputMode;
  private readonly verbose: boolean;
  private readonly output: JsonOutput = { success: true };
  private depth = 0;

  constructor(mode: OutputMode = 'human', options: LoggerOptions = {}) {
    this.mode = mode;
    this.verbose = options.verbose ?? false;
  }

  static fromOptions(options: { json?: boolean; verbose?: boolean }): Logger {
    return new Logger(options.json ? 'json' : 'human', { verbose: options.verbose });
  }

  getMode(): OutputMode {
    return this.mode;
  }

  isVerbose(): boolean {
    return this.verbose;
  }

  indent(): void {
    this.depth++;
  }

  dedent(): void {
    this.depth = Math.max(0, this.depth - 1);
  }

  /**
   * Print one line at the current depth. Errors and debug lines go to
   * stderr, warnings to console.warn, everything else to stdout.
   */
  private write(level: LogLevel, message: string): void {
    const line = `${'  '.repeat(this.depth)}${LEVEL_PREFIX[level]}${message}`;
    switch (level) {
      case 'debug':
      case 'error':
        console.error(line);
        break;
      case 'warning':
        console.warn(line);
        break;
      default:
        console.log(line);
    }
  }

  private get human(): boolean {
    return this.mode === 'human';
  }

  /**
   * Shown only with --verbose, in either mode, on stderr so JSON on
   * stdout stays parseable.
   */
  debug(message: string): void {
    if (this.verbose) {
      this.write('debug', message);
    }
  }

  info(message: string): void {
    if (this.human) {
      this.write('info', message);
    }
  }

  success(message: string): void {
    if (this.human) {
      this.write('success', message);
    }
  }

  /**
   * In JSON mode the warning lands in `warnings` of the result object.
   */
  warning(message: string): void {
    if (this.human) {
      this.write('warning', message);
      return;
    }
    this.output.warnings = [...(this.output.warnings ?? []), message];
  }

  /**
   * Report a failure. The suggestion of a clonebox error is printed as a
   * `Fix:` line, or carried in the JSON error.
   */
  error(message: string, error?: CloneboxError): void {
    if (this.human) {
      this.write('error', message);
      if (error?.suggestion) {
        console.error(`${'  '.repeat(this.depth)}  Fix: ${error.suggestion}`);
      }
      return;
    }
    this.output.success = false;
    this.output.error = { code: error?.code ?? 'UNKNOWN', message, suggestion: error?.suggestion };
  }

  /** One transaction step of a VM operation. */
  step(vmName: string, step: string, status: StepStatus): void {
    if (!this.human) {
      return;
    }
    const line = `${'  '.repeat(this.depth)}${STEP_SYMBOL[status]} ${vmName}: ${step}`;
    if (status === 'failed') {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  table(headers: string[], rows: string[][]): void {
    if (this.human) {
      for (const line of formatTable(headers, rows)) {
        this.write('info', line);
      }
    }
  }

  newline(): void {
    if (this.human) {
      console.log();
    }
  }

  setCommand(command: string): void {
    this.output.command = command;
  }

  setData(data: unknown): void {
    this.output.data = data;
  }

  setSuccess(success: boolean): void {
    this.output.success = success;
  }

  /**
   * Print the collected result object; a no-op in human mode.
   */
  flush(): void {
    if (!this.human) {
      console.log(JSON.stringify(this.output, null, 2));
    }
  }

  /** The collected result object, for tests. */
  getJsonBuffer(): JsonOutput {
    return this.output;
  }
}
