import { assertNever, type PositiveDecimal } from '@txledger/core';
import type { Decimal } from 'decimal.js';

export type TransactionKind = 'deposit' | 'withdrawal';

/**
 * What an account remembers about a deposit or withdrawal so it can be disputed later
 */
export interface TransactionRecord {
  readonly kind: TransactionKind;
  readonly amount: PositiveDecimal;
}

export function createTransactionRecord(kind: TransactionKind, amount: PositiveDecimal): TransactionRecord {
  return { kind, amount };
}

/**
 * Amount moved between available and held while the transaction is disputed:
 * +amount for a deposit, -amount for a withdrawal.
 */
export function typeAdjustedAmount(record: TransactionRecord): Decimal {
  switch (record.kind) {
    case 'deposit':
      return record.amount.toDecimal();
    case 'withdrawal':
      return record.amount.toDecimal().negated();
    default:
      return assertNever(record.kind, 'Unknown transaction kind');
  }
}
