import type { ClientId, PositiveDecimal, TransactionId } from '@txledger/core';
import { getLogger, type Logger } from '@txledger/logger';
import { err, ok } from 'neverthrow';

import { ClientAccount } from '../domain/client-account.js';
import { UnknownClientError, type LedgerOperation } from '../errors/ledger-errors.js';
import type { AccountSnapshot } from '../types/account-snapshot.js';
import type { LedgerEvent } from '../types/ledger-event.js';

import {
  dispatchLedgerEvent,
  sortSnapshots,
  type LedgerMode,
  type LedgerResult,
  type LedgerStore,
} from './ledger-store.js';

export interface InMemoryLedgerStoreOptions {
  mode?: LedgerMode | undefined;
}

/**
 * Single map of client id to account.
 *
 * Each operation runs to completion without yielding, so one event is
 * applied at a time in call order. Wrap in SerializedLedgerStore when
 * operations may come from several async sources.
 */
export class InMemoryLedgerStore implements LedgerStore {
  readonly mode: LedgerMode;

  private readonly accounts = new Map<ClientId, ClientAccount>();
  private readonly logger: Logger;

  constructor(options: InMemoryLedgerStoreOptions = {}) {
    this.mode = options.mode ?? 'permissive';
    this.logger = getLogger('InMemoryLedgerStore');
  }

  /**
   * Creates the account on first use. Allowed on locked accounts.
   */
  async deposit(clientId: ClientId, transactionId: TransactionId, amount: PositiveDecimal): Promise<LedgerResult> {
    let account = this.accounts.get(clientId);
    if (!account) {
      account = new ClientAccount(clientId);
      this.accounts.set(clientId, account);
    }

    account.deposit(transactionId, amount);
    return ok(undefined);
  }

  async withdraw(clientId: ClientId, transactionId: TransactionId, amount: PositiveDecimal): Promise<LedgerResult> {
    return this.mutate('withdraw', clientId, transactionId, (account) => account.withdraw(transactionId, amount));
  }

  async dispute(clientId: ClientId, transactionId: TransactionId): Promise<LedgerResult> {
    return this.mutate('dispute', clientId, transactionId, (account) => account.dispute(transactionId));
  }

  async resolve(clientId: ClientId, transactionId: TransactionId): Promise<LedgerResult> {
    return this.mutate('resolve', clientId, transactionId, (account) => account.resolve(transactionId));
  }

  async chargeback(clientId: ClientId, transactionId: TransactionId): Promise<LedgerResult> {
    return this.mutate('chargeback', clientId, transactionId, (account) => account.chargeback(transactionId));
  }

  apply(event: LedgerEvent): Promise<LedgerResult> {
    return dispatchLedgerEvent(this, event);
  }

  async snapshotAll(): Promise<AccountSnapshot[]> {
    return sortSnapshots([...this.accounts.values()].map((account) => account.toSnapshot()));
  }

  /**
   * Look up the account and run a transition on it. Never creates an account.
   */
  private mutate(
    operation: LedgerOperation,
    clientId: ClientId,
    transactionId: TransactionId,
    transition: (account: ClientAccount) => LedgerResult
  ): LedgerResult {
    const account = this.accounts.get(clientId);
    const result: LedgerResult = account
      ? transition(account)
      : err(new UnknownClientError(operation, clientId, transactionId));

    if (result.isOk() || this.mode === 'strict') {
      return result;
    }

    this.logger.debug(
      { clientId, code: result.error.code, operation, transactionId },
      `Ignoring ${operation}: ${result.error.message}`
    );
    return ok(undefined);
  }
}
