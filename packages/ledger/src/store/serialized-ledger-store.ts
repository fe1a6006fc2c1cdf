import type { ClientId, PositiveDecimal, TransactionId } from '@txledger/core';

import type { AccountSnapshot } from '../types/account-snapshot.js';
import type { LedgerEvent } from '../types/ledger-event.js';

import { dispatchLedgerEvent, type LedgerMode, type LedgerResult, type LedgerStore } from './ledger-store.js';

const noop = (): void => {
  /* empty */
};

/**
 * Wraps another store so that operations on one client run one after the
 * other, in call order, while different clients proceed independently.
 *
 * snapshotAll waits for every queued operation before reading.
 */
export class SerializedLedgerStore implements LedgerStore {
  private readonly queues = new Map<ClientId, Promise<unknown>>();

  constructor(private readonly inner: LedgerStore) {}

  get mode(): LedgerMode {
    return this.inner.mode;
  }

  deposit(clientId: ClientId, transactionId: TransactionId, amount: PositiveDecimal): Promise<LedgerResult> {
    return this.enqueue(clientId, () => this.inner.deposit(clientId, transactionId, amount));
  }

  withdraw(clientId: ClientId, transactionId: TransactionId, amount: PositiveDecimal): Promise<LedgerResult> {
    return this.enqueue(clientId, () => this.inner.withdraw(clientId, transactionId, amount));
  }

  dispute(clientId: ClientId, transactionId: TransactionId): Promise<LedgerResult> {
    return this.enqueue(clientId, () => this.inner.dispute(clientId, transactionId));
  }

  resolve(clientId: ClientId, transactionId: TransactionId): Promise<LedgerResult> {
    return this.enqueue(clientId, () => this.inner.resolve(clientId, transactionId));
  }

  chargeback(clientId: ClientId, transactionId: TransactionId): Promise<LedgerResult> {
    return this.enqueue(clientId, () => this.inner.chargeback(clientId, transactionId));
  }

  apply(event: LedgerEvent): Promise<LedgerResult> {
    return dispatchLedgerEvent(this, event);
  }

  async snapshotAll(): Promise<AccountSnapshot[]> {
    await Promise.all(this.queues.values());
    return this.inner.snapshotAll();
  }

  /**
   * Number of clients with queued or running operations
   */
  pendingClients(): number {
    return this.queues.size;
  }

  private enqueue(clientId: ClientId, task: () => Promise<LedgerResult>): Promise<LedgerResult> {
    const tail = this.queues.get(clientId) ?? Promise.resolve();
    const run = tail.then(() => task());

    // Keep the queue moving when a task rejects; the caller still sees the rejection through `run`
    const settled = run.then(noop, noop);
    this.queues.set(clientId, settled);
    void settled.then(() => {
      if (this.queues.get(clientId) === settled) {
        this.queues.delete(clientId);
      }
    });

    return run;
  }
}
