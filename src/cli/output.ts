/**
 * CLI Output Layer
 *
 * Provides consistent output formatting for CLI commands in both
 * human-readable and JSON modes.
 */

import { getExitCode, isDiskSourceError, type DiskSourceError, type ErrorCode } from '../core/errors.js';
import type { StorageFileFormat, StorageType } from '../storage/enums.js';
import { getActualType, isEmpty, isLocalStorage, isRelative } from '../storage/predicates.js';
import { iterateChain } from '../storage/source.js';
import type { SharedStorageSource } from '../storage/types.js';

// =============================================================================
// Output Types
// =============================================================================

/**
 * Standard output format for --json mode
 */
export interface CommandResult {
  success: boolean;
  command: string;
  chain?: ChainElementInfo[];
  path?: string;
  index?: number;
  key?: string | null;
  document?: string;
  warnings?: string[];
  error?: ErrorOutput;
  summary?: Record<string, number | string>;
}

/**
 * One chain element as shown by `inspect`
 */
export interface ChainElementInfo {
  index: number;
  type: StorageType;
  format: StorageFileFormat;
  location: string;
  empty: boolean;
  local: boolean;
  relative: boolean;
}

/**
 * Error output format for JSON mode
 */
export interface ErrorOutput {
  code: ErrorCode | string;
  message: string;
  suggestion?: string;
  details?: Record<string, unknown>;
}

/**
 * Human-readable location of one element: path, pool volume or host list.
 */
export function describeLocation(src: SharedStorageSource): string {
  if (src.type === 'volume' && src.srcpool) {
    return `${src.srcpool.pool ?? '?'}/${src.srcpool.volume ?? '?'}`;
  }
  if (src.type === 'network') {
    const hosts = src.hosts
      .map((host) => (host.transport === 'unix' ? `unix:${host.socket ?? ''}` : `${host.name ?? ''}:${host.port}`))
      .join(',');
    return `${src.protocol}://${hosts}/${src.path ?? ''}`;
  }
  return src.path ?? '-';
}

/**
 * Summarize every element of a chain, top image first.
 */
export function describeChain(src: SharedStorageSource): ChainElementInfo[] {
  return [...iterateChain(src)].map((node) => ({
    index: node.id,
    type: getActualType(node),
    format: node.format,
    location: describeLocation(node),
    empty: isEmpty(node),
    local: isLocalStorage(node),
    relative: isRelative(node),
  }));
}

// =============================================================================
// OutputFormatter Class
// =============================================================================

/**
 * Output mode for the formatter
 */
export type OutputMode = 'human' | 'json';

/**
 * CLI-specific output formatter.
 *
 * Provides high-level methods for formatting command output in both
 * human-readable and JSON modes. In JSON mode, output is collected
 * and emitted as a single JSON object at flush.
 */
export class OutputFormatter {
  private mode: OutputMode;
  private result: CommandResult;
  private indentLevel: number = 0;

  constructor(command: string, options: { json?: boolean } = {}) {
    this.mode = options.json ? 'json' : 'human';
    this.result = {
      success: true,
      command,
    };
  }

  getMode(): OutputMode {
    return this.mode;
  }

  isJson(): boolean {
    return this.mode === 'json';
  }

  // ===========================================================================
  // Indentation
  // ===========================================================================

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

  // ===========================================================================
  // Basic Output Methods
  // ===========================================================================

  success(message: string): void {
    if (this.mode === 'human') {
      console.log(`${this.getIndent()}✓ ${message}`);
    }
  }

  /**
   * Print an error message and mark the command failed.
   */
  error(message: string, error?: DiskSourceError): void {
    this.result.success = false;

    if (this.mode === 'human') {
      console.error(`${this.getIndent()}✗ ${message}`);
      if (error?.suggestion) {
        console.error(`${this.getIndent()}  Fix: ${error.suggestion}`);
      }
    }

    this.result.error = {
      code: error?.code ?? 'UNKNOWN',
      message,
      suggestion: error?.suggestion,
    };
  }

  info(message: string): void {
    if (this.mode === 'human') {
      console.log(`${this.getIndent()}${message}`);
    }
  }

  /**
   * Print a warning; in JSON mode it is listed under `warnings`.
   */
  warning(message: string): void {
    if (this.mode === 'human') {
      console.warn(`${this.getIndent()}⚠ ${message}`);
    }

    this.result.warnings = [...(this.result.warnings ?? []), message];
  }

  newline(): void {
    if (this.mode === 'human') {
      console.log();
    }
  }

  // ===========================================================================
  // Table Output
  // ===========================================================================

  /**
   * Print a table of data.
   *
   * @param headers - Column headers
   * @param rows - Row data
   */
  table(headers: string[], rows: string[][]): void {
    if (this.mode === 'human') {
      // Calculate column widths
      const widths = headers.map((h, i) => {
        const maxRowWidth = Math.max(...rows.map((r) => (r[i] ?? '').length));
        return Math.max(h.length, maxRowWidth);
      });

      const headerLine = headers.map((h, i) => h.padEnd(widths[i] ?? 0)).join('  ');
      console.log(`${this.getIndent()}${headerLine.trimEnd()}`);

      for (const row of rows) {
        const rowLine = row.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join('  ');
        console.log(`${this.getIndent()}${rowLine.trimEnd()}`);
      }
    }
  }

  // ===========================================================================
  // Validate Output
  // ===========================================================================

  /**
   * Print validation success.
   */
  validationSuccess(target: string, chain: ChainElementInfo[]): void {
    const top = chain[0];

    if (this.mode === 'human') {
      this.success('Disk description valid');
      this.indent();
      this.info(`Target: ${target}`);
      if (top) {
        this.info(`Source: ${top.location} (${top.type}, ${top.format})`);
      }
      this.info(`Chain length: ${chain.length}`);
      this.dedent();
    }

    this.result.summary = {
      target,
      chainLength: chain.length,
    };
  }

  /**
   * Print validation errors.
   */
  validationError(errors: Array<{ path: string; message: string }>): void {
    this.result.success = false;

    if (this.mode === 'human') {
      this.error('Disk description invalid');
      this.newline();
      for (const err of errors) {
        console.log(`  - ${err.path}: ${err.message}`);
      }
    }

    this.result.error = {
      code: 'CONFIG_VALIDATION_FAILED',
      message: 'Disk description validation failed',
      details: { errors },
    };
  }

  // ===========================================================================
  // Inspect Output
  // ===========================================================================

  /**
   * Print the chain table.
   */
  chainTable(target: string, chain: ChainElementInfo[]): void {
    if (this.mode === 'human') {
      this.info(`Disk: ${target}`);
      this.newline();

      const headers = ['INDEX', 'TYPE', 'FORMAT', 'LOCATION', 'FLAGS'];
      const rows = chain.map((element) => [
        String(element.index),
        element.type,
        element.format,
        element.location,
        formatFlags(element),
      ]);

      this.indent();
      this.table(headers, rows);
      this.dedent();

      this.newline();
      this.info(`${chain.length} image${chain.length === 1 ? '' : 's'} in chain.`);
    }

    this.result.chain = chain;
  }

  /**
   * Print a rendered document verbatim.
   */
  document(text: string): void {
    if (this.mode === 'human') {
      process.stdout.write(text);
    }

    this.result.document = text;
  }

  // ===========================================================================
  // Single-value Output
  // ===========================================================================

  canonicalPath(input: string, canonical: string): void {
    if (this.mode === 'human') {
      console.log(canonical);
    }

    this.result.path = canonical;
    this.result.summary = { input };
  }

  chainIndex(name: string, index: number): void {
    if (this.mode === 'human') {
      console.log(String(index));
    }

    this.result.index = index;
    this.result.summary = { name };
  }

  /**
   * Print a device key; a device without one prints nothing in human mode
   * and `null` in JSON mode.
   */
  deviceKey(device: string, key: string | undefined): void {
    if (this.mode === 'human') {
      if (key === undefined) {
        this.warning(`No key reported for ${device}`);
      } else {
        console.log(key);
      }
    }

    this.result.key = key ?? null;
    this.result.summary = { device };
  }

  // ===========================================================================
  // JSON Output
  // ===========================================================================

  /**
   * Get the command result object.
   */
  getResult(): CommandResult {
    return this.result;
  }

  /**
   * Flush output.
   *
   * In JSON mode, prints the collected JSON.
   * In human mode, does nothing (output was printed inline).
   */
  flush(): void {
    if (this.mode === 'json') {
      console.log(JSON.stringify(this.result, null, 2));
    }
  }
}

function formatFlags(element: ChainElementInfo): string {
  const flags: string[] = [];
  if (element.empty) flags.push('empty');
  if (element.local) flags.push('local');
  if (element.relative) flags.push('relative');
  return flags.join(',');
}

/**
 * Create an OutputFormatter from CLI options.
 */
export function createOutput(
  command: string,
  options: { json?: boolean }
): OutputFormatter {
  return new OutputFormatter(command, options);
}

/**
 * Report `error` through `output` and exit with its exit code.
 */
export function handleError(output: OutputFormatter, error: unknown): never {
  if (isDiskSourceError(error)) {
    output.error(error.message, error);
  } else if (error instanceof Error) {
    output.error(error.message);
  } else {
    output.error(String(error));
  }

  output.flush();
  process.exit(getExitCode(error));
}
