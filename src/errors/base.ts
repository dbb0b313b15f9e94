/**
 * Base error class for all line chart errors.
 * Carries an optional hint shown under the message by `format()`.
 */
export class LineChartError extends Error {
  readonly hint?: string;

  constructor(message: string, hint?: string) {
    super(message);
    this.name = 'LineChartError';
    this.hint = hint;
  }

  format(): string {
    const lines: string[] = [];

    lines.push(`error: ${this.message}`);
    lines.push(`  --> ${this._getExpression()}`);
    lines.push('   |');
    lines.push(`   └── ${this._getDetail()}`);

    if (this.hint) {
      lines.push('');
      lines.push(`help: ${this.hint}`);
    }

    return lines.join('\n');
  }

  protected _getExpression(): string {
    return '(expression)';
  }

  protected _getDetail(): string {
    return this.message;
  }
}
