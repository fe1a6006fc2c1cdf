import { DomainError } from '@txledger/core';

/**
 * A CSV data row that could not be turned into a ledger event.
 * The row is skipped; later rows are unaffected.
 */
export class RowDecodeError extends DomainError {
  readonly code = 'ROW_DECODE_ERROR';
  readonly severity = 'warning' as const;

  /**
   * @param line 1-based line number of the row in the input
   * @param reason why the row was rejected
   */
  constructor(
    public readonly line: number,
    public readonly reason: string,
    public readonly fields: readonly string[] = []
  ) {
    super(`Invalid row at line ${line}: ${reason}`, { additionalContext: { fields, line } });
  }
}
