/**
 * Error hierarchy shared by the ledger, the decoders and the CLI.
 *
 * Errors are returned through neverthrow Results rather than thrown; the CLI
 * boundary is the only place that converts them into exit codes.
 */

export interface DomainErrorContext {
  additionalContext?: Record<string, unknown> | undefined;
  clientId?: number | undefined;
  transactionId?: number | undefined;
}

/**
 * Base domain error
 */
export abstract class DomainError extends Error {
  abstract readonly code: string;
  abstract readonly severity: 'error' | 'warning';

  readonly timestamp: string;
  readonly clientId?: number | undefined;
  readonly transactionId?: number | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(message: string, context?: DomainErrorContext) {
    super(message);
    this.timestamp = new Date().toISOString();
    this.clientId = context?.clientId;
    this.transactionId = context?.transactionId;
    this.context = context?.additionalContext;
    this.name = this.constructor.name;
  }

  toJSON() {
    return {
      clientId: this.clientId,
      code: this.code,
      context: this.context,
      message: this.message,
      name: this.name,
      severity: this.severity,
      timestamp: this.timestamp,
      transactionId: this.transactionId,
    };
  }
}

/**
 * Raised by the positive-decimal guard for zero, negative or unparseable amounts
 */
export class InvalidAmountError extends DomainError {
  readonly code = 'INVALID_AMOUNT';
  readonly severity = 'error' as const;

  constructor(
    public readonly value: string,
    message = 'value must be positive and non-zero',
    context?: DomainErrorContext
  ) {
    super(message, context);
  }
}
