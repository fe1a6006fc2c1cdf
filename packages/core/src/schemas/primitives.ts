import { z } from 'zod';

export const MAX_CLIENT_ID = 65_535;
export const MAX_TRANSACTION_ID = 4_294_967_295;

/**
 * Digits only - no sign, no fraction, no exponent
 */
const UnsignedIntegerStringSchema = z.string().trim().regex(/^\d+$/, 'Must be an unsigned integer');

/**
 * Client identifier: unsigned 16-bit integer given as a decimal string
 */
export const ClientIdSchema = UnsignedIntegerStringSchema.transform((val) => Number(val)).pipe(
  z.number().int().max(MAX_CLIENT_ID, `Client id must be at most ${MAX_CLIENT_ID}`)
);

/**
 * Transaction identifier: unsigned 32-bit integer given as a decimal string
 */
export const TransactionIdSchema = UnsignedIntegerStringSchema.transform((val) => Number(val)).pipe(
  z.number().int().max(MAX_TRANSACTION_ID, `Transaction id must be at most ${MAX_TRANSACTION_ID}`)
);

export type ClientId = z.infer<typeof ClientIdSchema>;
export type TransactionId = z.infer<typeof TransactionIdSchema>;
