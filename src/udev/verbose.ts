/**
 * Verbose Output Helpers
 *
 * Formats helper-program invocations for --verbose CLI output.
 * Used by CommandExecutor to print commands to stderr before execution.
 */

/**
 * Prefix for verbose command output lines.
 */
const PREFIX = '[CMD] ';

/**
 * ANSI SGR 90: bright black (gray) foreground.
 */
const ANSI_GRAY = '\x1b[90m';

/**
 * ANSI SGR 0: reset all attributes.
 */
const ANSI_RESET = '\x1b[0m';

/**
 * Check whether stderr supports ANSI escape codes.
 *
 * Returns true when stderr is a TTY (interactive terminal).
 */
export function supportsAnsi(): boolean {
  return Boolean(process.stderr.isTTY);
}

/**
 * Quote one argument for display if it contains shell-significant
 * characters.
 */
export function quoteArgument(arg: string): string {
  if (arg !== '' && /^[A-Za-z0-9_@%+=:,./-]+$/.test(arg)) {
    return arg;
  }
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

/**
 * Format a command line for verbose output.
 *
 * Produces one `[CMD] program arg...` line fenced by blank lines,
 * optionally wrapped in ANSI gray when `ansi` is true.
 *
 * @returns Formatted string ready for `process.stderr.write()`
 */
export function formatCommand(program: string, args: readonly string[], ansi: boolean): string {
  const line = [program, ...args].map(quoteArgument).join(' ');
  const plain = `\n${PREFIX}${line}\n\n`;

  if (ansi) {
    return `${ANSI_GRAY}${plain}${ANSI_RESET}`;
  }

  return plain;
}
