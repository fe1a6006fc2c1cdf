import type { ClientId, PositiveDecimal, TransactionId } from '@txledger/core';

export const LEDGER_EVENT_TYPES = ['deposit', 'withdrawal', 'dispute', 'resolve', 'chargeback'] as const;

export type LedgerEventType = (typeof LEDGER_EVENT_TYPES)[number];

interface LedgerEventBase {
  clientId: ClientId;
  transactionId: TransactionId;
}

export interface DepositEvent extends LedgerEventBase {
  type: 'deposit';
  amount: PositiveDecimal;
}

export interface WithdrawalEvent extends LedgerEventBase {
  type: 'withdrawal';
  amount: PositiveDecimal;
}

/**
 * Claim against an earlier deposit or withdrawal of the same client
 */
export interface DisputeEvent extends LedgerEventBase {
  type: 'dispute';
}

export interface ResolveEvent extends LedgerEventBase {
  type: 'resolve';
}

export interface ChargebackEvent extends LedgerEventBase {
  type: 'chargeback';
}

/**
 * A validated ledger event. Amounts are already guaranteed positive.
 */
export type LedgerEvent = DepositEvent | WithdrawalEvent | DisputeEvent | ResolveEvent | ChargebackEvent;
