import { DomainError, type ClientId, type TransactionId } from '@txledger/core';
import type { Decimal } from 'decimal.js';

export type LedgerOperation = 'deposit' | 'withdraw' | 'dispute' | 'resolve' | 'chargeback';

/**
 * A ledger operation whose preconditions did not hold. No state was changed.
 *
 * Permissive stores log and drop these; strict stores return them.
 */
export abstract class LedgerError extends DomainError {
  readonly severity = 'warning' as const;

  constructor(
    public readonly operation: LedgerOperation,
    clientId: ClientId,
    transactionId: TransactionId,
    message: string
  ) {
    super(message, { clientId, transactionId });
  }
}

export class UnknownClientError extends LedgerError {
  readonly code = 'UNKNOWN_CLIENT';

  constructor(operation: LedgerOperation, clientId: ClientId, transactionId: TransactionId) {
    super(operation, clientId, transactionId, `Cannot ${operation}: client ${clientId} has no account`);
  }
}

export class AccountLockedError extends LedgerError {
  readonly code = 'ACCOUNT_LOCKED';

  constructor(operation: LedgerOperation, clientId: ClientId, transactionId: TransactionId) {
    super(operation, clientId, transactionId, `Cannot ${operation}: account ${clientId} is locked`);
  }
}

export class TransactionNotFoundError extends LedgerError {
  readonly code = 'TRANSACTION_NOT_FOUND';

  /**
   * @param expectedState where the transaction had to be: open for disputes, disputed for resolve/chargeback
   */
  constructor(
    operation: LedgerOperation,
    clientId: ClientId,
    transactionId: TransactionId,
    public readonly expectedState: 'open' | 'disputed'
  ) {
    super(
      operation,
      clientId,
      transactionId,
      `Cannot ${operation}: transaction ${transactionId} is not ${expectedState === 'open' ? 'open' : 'under dispute'} on account ${clientId}`
    );
  }
}

export class InsufficientFundsError extends LedgerError {
  readonly code = 'INSUFFICIENT_FUNDS';

  constructor(
    clientId: ClientId,
    transactionId: TransactionId,
    public readonly requested: Decimal,
    public readonly available: Decimal
  ) {
    super(
      'withdraw',
      clientId,
      transactionId,
      `Cannot withdraw ${requested.toFixed()}: available balance of account ${clientId} is ${available.toFixed()}`
    );
  }
}
