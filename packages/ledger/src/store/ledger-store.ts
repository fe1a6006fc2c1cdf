import { assertNever, type ClientId, type PositiveDecimal, type TransactionId } from '@txledger/core';
import type { Result } from 'neverthrow';

import type { LedgerError } from '../errors/ledger-errors.js';
import type { AccountSnapshot } from '../types/account-snapshot.js';
import type { LedgerEvent } from '../types/ledger-event.js';

/**
 * How a store reports an operation whose preconditions fail.
 *
 * - permissive: log at debug level and return ok
 * - strict: return the LedgerError
 *
 * Fixed per store instance.
 */
export const LEDGER_MODES = ['permissive', 'strict'] as const;

export type LedgerMode = (typeof LEDGER_MODES)[number];

export type LedgerResult = Result<void, LedgerError>;

/**
 * The five state transitions of the ledger
 */
export interface LedgerOperations {
  deposit(clientId: ClientId, transactionId: TransactionId, amount: PositiveDecimal): Promise<LedgerResult>;
  withdraw(clientId: ClientId, transactionId: TransactionId, amount: PositiveDecimal): Promise<LedgerResult>;
  dispute(clientId: ClientId, transactionId: TransactionId): Promise<LedgerResult>;
  resolve(clientId: ClientId, transactionId: TransactionId): Promise<LedgerResult>;
  chargeback(clientId: ClientId, transactionId: TransactionId): Promise<LedgerResult>;
}

/**
 * Storage backend for client accounts.
 *
 * Collaborators feed events through `apply` and read results through `snapshotAll`.
 */
export interface LedgerStore extends LedgerOperations {
  readonly mode: LedgerMode;

  apply(event: LedgerEvent): Promise<LedgerResult>;

  /**
   * One snapshot per known client, ordered by ascending client id
   */
  snapshotAll(): Promise<AccountSnapshot[]>;
}

/**
 * Route an event to the matching operation
 */
export function dispatchLedgerEvent(operations: LedgerOperations, event: LedgerEvent): Promise<LedgerResult> {
  switch (event.type) {
    case 'deposit':
      return operations.deposit(event.clientId, event.transactionId, event.amount);
    case 'withdrawal':
      return operations.withdraw(event.clientId, event.transactionId, event.amount);
    case 'dispute':
      return operations.dispute(event.clientId, event.transactionId);
    case 'resolve':
      return operations.resolve(event.clientId, event.transactionId);
    case 'chargeback':
      return operations.chargeback(event.clientId, event.transactionId);
    default:
      return assertNever(event, 'Unknown ledger event');
  }
}

/**
 * Sort snapshots by ascending client id
 */
export function sortSnapshots(snapshots: AccountSnapshot[]): AccountSnapshot[] {
  return snapshots.sort((a, b) => a.clientId - b.clientId);
}
