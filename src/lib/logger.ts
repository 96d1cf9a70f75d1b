/**
 * Logger for disk-source
 *
 * Supports human-readable and JSON output modes, plus debug messages
 * enabled by --verbose.
 */

import type { DiskSourceError } from '../core/errors.js';

/**
 * Output mode for the logger
 */
export type OutputMode = 'human' | 'json';

/**
 * Log level for messages
 */
export type LogLevel = 'debug' | 'info' | 'success' | 'warning' | 'error';

/**
 * JSON output structure for library diagnostics
 */
export interface JsonOutput {
  success: boolean;
  messages: Array<{ level: LogLevel; message: string }>;
  error?: {
    code: string;
    message: string;
    suggestion?: string;
  };
}

export interface LoggerOptions {
  mode?: OutputMode;
  /** Emit debug messages (default: false) */
  verbose?: boolean;
}

/**
 * Logger class supporting human-readable and JSON output modes.
 *
 * Human mode writes symbols to the console as messages arrive; debug
 * output goes to stderr so it never mixes with command results.
 * JSON mode collects messages and emits a single JSON object at flush.
 */
export class Logger {
  private mode: OutputMode;
  private verbose: boolean;
  private jsonBuffer: JsonOutput;
  private indentLevel: number = 0;

  constructor(options: LoggerOptions = {}) {
    this.mode = options.mode ?? 'human';
    this.verbose = options.verbose ?? false;
    this.jsonBuffer = { success: true, messages: [] };
  }

  setMode(mode: OutputMode): void {
    this.mode = mode;
  }

  getMode(): OutputMode {
    return this.mode;
  }

  isVerbose(): boolean {
    return this.verbose;
  }

  indent(): void {
    this.indentLevel++;
  }

  dedent(): void {
    if (this.indentLevel > 0) {
      this.indentLevel--;
    }
  }

  private getIndent(): string {
    return '  '.repeat(this.indentLevel);
  }

  private record(level: LogLevel, message: string): void {
    this.jsonBuffer.messages.push({ level, message });
  }

  /**
   * Log a debug message. Dropped unless the logger is verbose.
   */
  debug(message: string): void {
    if (!this.verbose) return;

    if (this.mode === 'human') {
      console.error(`${this.getIndent()}[DEBUG] ${message}`);
    } else {
      this.record('debug', message);
    }
  }

  info(message: string): void {
    if (this.mode === 'human') {
      console.log(`${this.getIndent()}${message}`);
    } else {
      this.record('info', message);
    }
  }

  success(message: string): void {
    if (this.mode === 'human') {
      console.log(`${this.getIndent()}✓ ${message}`);
    } else {
      this.record('success', message);
    }
  }

  warning(message: string): void {
    if (this.mode === 'human') {
      console.warn(`${this.getIndent()}⚠ ${message}`);
    } else {
      this.record('warning', message);
    }
  }

  /**
   * Log an error message, with the fix suggestion of `error` if any.
   */
  error(message: string, error?: DiskSourceError): void {
    if (this.mode === 'human') {
      console.error(`${this.getIndent()}✗ ${message}`);
      if (error?.suggestion) {
        console.error(`${this.getIndent()}  Fix: ${error.suggestion}`);
      }
    } else {
      this.jsonBuffer.success = false;
      this.jsonBuffer.error = {
        code: error?.code ?? 'UNKNOWN',
        message,
        suggestion: error?.suggestion,
      };
    }
  }

  /**
   * Flush JSON output to stdout.
   *
   * Only does something in JSON mode.
   */
  flush(): void {
    if (this.mode === 'json') {
      console.log(JSON.stringify(this.jsonBuffer, null, 2));
    }
  }

  /**
   * Get the JSON buffer (for testing).
   */
  getJsonBuffer(): JsonOutput {
    return this.jsonBuffer;
  }

  /**
   * Create a logger from CLI options.
   */
  static fromOptions(options: { json?: boolean; verbose?: boolean }): Logger {
    return new Logger({
      mode: options.json ? 'json' : 'human',
      verbose: options.verbose === true,
    });
  }
}

/**
 * Global logger instance.
 *
 * Quiet apart from info and above; the CLI replaces it according to its
 * options.
 */
export let logger = new Logger();

/**
 * Set the global logger instance.
 */
export function setLogger(newLogger: Logger): void {
  logger = newLogger;
}

/**
 * Create and set a new logger with the specified options.
 */
export function configureLogger(options: LoggerOptions): Logger {
  logger = new Logger(options);
  return logger;
}
