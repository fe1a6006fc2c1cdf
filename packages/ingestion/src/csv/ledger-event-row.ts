import {
  assertNever,
  ClientIdSchema,
  PositiveDecimal,
  TransactionIdSchema,
  formatZodIssues,
  fromZod,
  isDecimalLiteral,
} from '@txledger/core';
import { LEDGER_EVENT_TYPES, type LedgerEvent } from '@txledger/ledger';
import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

export const REQUIRED_COLUMNS = ['type', 'client', 'tx', 'amount'] as const;

export type LedgerEventColumn = (typeof REQUIRED_COLUMNS)[number];

export type RawLedgerEventRow = Record<LedgerEventColumn, string>;

export const LedgerEventRowSchema = z.object({
  type: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(
      z.enum(LEDGER_EVENT_TYPES, {
        errorMap: () => ({ message: `Must be one of ${LEDGER_EVENT_TYPES.join(', ')}` }),
      })
    ),
  client: ClientIdSchema,
  tx: TransactionIdSchema,
  amount: z.string().trim(),
});

export type LedgerEventRow = z.infer<typeof LedgerEventRowSchema>;

/**
 * Check a non-empty amount field: a plain decimal literal that passes the positive guard
 */
function parseAmount(amount: string): Result<PositiveDecimal, string> {
  if (!isDecimalLiteral(amount)) {
    return err(`amount: Not a plain decimal: ${amount}`);
  }

  return PositiveDecimal.create(amount).mapErr((error) => `amount: ${error.message}`);
}

/**
 * Validate one row and build the matching event.
 *
 * Deposits and withdrawals require an amount. Claim rows may leave it empty,
 * but a non-empty amount must still be valid.
 *
 * @returns the event, or a one-line description of what is wrong with the row
 */
export function parseLedgerEventRow(raw: RawLedgerEventRow): Result<LedgerEvent, string> {
  const validated = fromZod(LedgerEventRowSchema, raw);
  if (validated.isErr()) {
    return err(formatZodIssues(validated.error));
  }

  const { type, client: clientId, tx: transactionId, amount } = validated.value;
  const parsedAmount = amount === '' ? undefined : parseAmount(amount);
  if (parsedAmount !== undefined && parsedAmount.isErr()) {
    return err(parsedAmount.error);
  }

  switch (type) {
    case 'deposit':
    case 'withdrawal': {
      if (!parsedAmount) {
        return err(`amount: Required for ${type}`);
      }

      const event: LedgerEvent = { type, clientId, transactionId, amount: parsedAmount.value };
      return ok(event);
    }
    case 'dispute':
    case 'resolve':
    case 'chargeback':
      return ok({ type, clientId, transactionId });
    default:
      return assertNever(type);
  }
}
