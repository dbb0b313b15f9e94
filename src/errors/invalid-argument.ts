import { LineChartError } from './base';

/**
 * Error thrown when a caller passes a value outside an operation's contract.
 */
export class InvalidArgumentError extends LineChartError {
  readonly argument: string;
  readonly reason: string;

  constructor(argument: string, reason: string, hint?: string) {
    super(`invalid argument '${argument}': ${reason}`, hint);
    this.name = 'InvalidArgumentError';
    this.argument = argument;
    this.reason = reason;
  }

  protected override _getExpression(): string {
    return this.argument;
  }

  protected override _getDetail(): string {
    return `'${this.argument}' ${this.reason}`;
  }
}
