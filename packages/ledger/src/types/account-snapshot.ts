import type { ClientId } from '@txledger/core';
import type { Decimal } from 'decimal.js';

/**
 * Point-in-time summary of one client account.
 *
 * `available`, `held` and `total` can be negative after a withdrawal is disputed.
 */
export interface AccountSnapshot {
  clientId: ClientId;
  available: Decimal;
  held: Decimal;
  total: Decimal;
  locked: boolean;
}
