import type { ClientId, PositiveDecimal, TransactionId } from '@txledger/core';
import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import {
  AccountLockedError,
  InsufficientFundsError,
  TransactionNotFoundError,
  type LedgerError,
  type LedgerOperation,
} from '../errors/ledger-errors.js';
import type { AccountSnapshot } from '../types/account-snapshot.js';

import { createTransactionRecord, typeAdjustedAmount, type TransactionRecord } from './transaction-record.js';

/**
 * Balances and dispute state of a single client.
 *
 * Every transition either applies completely or returns an error without
 * touching any field. A transaction id lives in at most one of the open and
 * held maps. Once locked by a chargeback, only deposits are accepted.
 */
export class ClientAccount {
  private available = new Decimal(0);
  private held = new Decimal(0);
  private locked = false;

  /** Deposits and withdrawals that can still be disputed */
  private readonly openTransactions = new Map<TransactionId, TransactionRecord>();

  /** Transactions under dispute */
  private readonly heldTransactions = new Map<TransactionId, TransactionRecord>();

  constructor(readonly clientId: ClientId) {}

  /**
   * Always applied, also on a locked account. A repeated transaction id overwrites the open record;
   * while that id is under dispute the held record is kept and the new movement is not disputable.
   */
  deposit(transactionId: TransactionId, amount: PositiveDecimal): void {
    this.recordOpen(transactionId, createTransactionRecord('deposit', amount));
    this.available = this.available.plus(amount.toDecimal());
  }

  withdraw(transactionId: TransactionId, amount: PositiveDecimal): Result<void, LedgerError> {
    const unlocked = this.ensureUnlocked('withdraw', transactionId);
    if (unlocked.isErr()) return unlocked;

    const requested = amount.toDecimal();
    if (this.available.lessThan(requested)) {
      return err(new InsufficientFundsError(this.clientId, transactionId, requested, this.available));
    }

    this.recordOpen(transactionId, createTransactionRecord('withdrawal', amount));
    this.available = this.available.minus(requested);
    return ok(undefined);
  }

  /**
   * Moves the transaction's type-adjusted amount from available to held.
   * Disputing a withdrawal makes held negative and raises available.
   */
  dispute(transactionId: TransactionId): Result<void, LedgerError> {
    const unlocked = this.ensureUnlocked('dispute', transactionId);
    if (unlocked.isErr()) return unlocked;

    const record = this.openTransactions.get(transactionId);
    if (!record) {
      return err(new TransactionNotFoundError('dispute', this.clientId, transactionId, 'open'));
    }

    const amount = typeAdjustedAmount(record);
    this.openTransactions.delete(transactionId);
    this.heldTransactions.set(transactionId, record);
    this.held = this.held.plus(amount);
    this.available = this.available.minus(amount);
    return ok(undefined);
  }

  /**
   * Reverses a dispute; the transaction can be disputed again afterwards.
   */
  resolve(transactionId: TransactionId): Result<void, LedgerError> {
    const unlocked = this.ensureUnlocked('resolve', transactionId);
    if (unlocked.isErr()) return unlocked;

    const record = this.heldTransactions.get(transactionId);
    if (!record) {
      return err(new TransactionNotFoundError('resolve', this.clientId, transactionId, 'disputed'));
    }

    const amount = typeAdjustedAmount(record);
    this.heldTransactions.delete(transactionId);
    this.openTransactions.set(transactionId, record);
    this.held = this.held.minus(amount);
    this.available = this.available.plus(amount);
    return ok(undefined);
  }

  /**
   * Drops the disputed amount from held for good and locks the account.
   * Nothing is returned to available.
   */
  chargeback(transactionId: TransactionId): Result<void, LedgerError> {
    const unlocked = this.ensureUnlocked('chargeback', transactionId);
    if (unlocked.isErr()) return unlocked;

    const record = this.heldTransactions.get(transactionId);
    if (!record) {
      return err(new TransactionNotFoundError('chargeback', this.clientId, transactionId, 'disputed'));
    }

    this.heldTransactions.delete(transactionId);
    this.held = this.held.minus(typeAdjustedAmount(record));
    this.locked = true;
    return ok(undefined);
  }

  isLocked(): boolean {
    return this.locked;
  }

  /**
   * Where a transaction currently sits, if the account still tracks it
   */
  transactionState(transactionId: TransactionId): 'open' | 'disputed' | undefined {
    if (this.openTransactions.has(transactionId)) return 'open';
    if (this.heldTransactions.has(transactionId)) return 'disputed';
    return undefined;
  }

  toSnapshot(): AccountSnapshot {
    return {
      clientId: this.clientId,
      available: this.available,
      held: this.held,
      total: this.available.plus(this.held),
      locked: this.locked,
    };
  }

  private recordOpen(transactionId: TransactionId, record: TransactionRecord): void {
    if (this.heldTransactions.has(transactionId)) return;
    this.openTransactions.set(transactionId, record);
  }

  private ensureUnlocked(operation: LedgerOperation, transactionId: TransactionId): Result<void, LedgerError> {
    return this.locked ? err(new AccountLockedError(operation, this.clientId, transactionId)) : ok(undefined);
  }
}
