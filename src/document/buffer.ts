/**
 * Indented Output Buffer
 *
 * Accumulates markup lines with a running indent and escapes attribute
 * values on the way in.
 */

const ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;',
};

/**
 * Escape a value for use inside a quoted attribute or text node.
 */
export function escapeMarkup(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => ESCAPES[ch] ?? ch);
}

export class IndentedBuffer {
  private lines: string[] = [];
  private indentLevel: number = 0;

  /**
   * Add one line at the current indent.
   */
  addLine(text: string): void {
    this.lines.push(`${' '.repeat(this.indentLevel)}${text}`);
  }

  /**
   * Add a line built from a template where `%s` is replaced by the escaped
   * value. Nothing is added when the value is undefined.
   */
  addEscaped(template: string, value: string | undefined): void {
    if (value === undefined) return;
    const escaped = escapeMarkup(value);
    this.addLine(template.replace('%s', () => escaped));
  }

  /**
   * Change the indent by the given number of spaces; never below zero.
   */
  adjustIndent(delta: number): void {
    this.indentLevel = Math.max(0, this.indentLevel + delta);
  }

  isEmpty(): boolean {
    return this.lines.length === 0;
  }

  /**
   * Joined content, one trailing newline per line.
   */
  toString(): string {
    return this.lines.map((line) => `${line}\n`).join('');
  }
}
