import { LEDGER_MODES } from '@txledger/ledger';
import { z } from 'zod';

export const LedgerModeSchema = z.enum(LEDGER_MODES);

const envSchema = z.object({
  TXLEDGER_LEDGER_MODE: z.string().trim().toLowerCase().pipe(LedgerModeSchema).default('permissive'),
});

export type ValidatedEnv = z.infer<typeof envSchema>;

let validatedEnv: ValidatedEnv | undefined;

/**
 * Validates environment variables on first access.
 * Caches the result for subsequent calls.
 * @throws Error if validation fails
 */
function validateEnv(): ValidatedEnv {
  if (!validatedEnv) {
    validatedEnv = parseEnv(process.env);
  }
  return validatedEnv;
}

/**
 * Validate an environment object without touching the cache.
 * @throws Error listing every invalid variable
 */
export function parseEnv(env: NodeJS.ProcessEnv): ValidatedEnv {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const errors = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }
  return result.data;
}

/**
 * Get the ledger operating mode.
 *
 * - permissive: failed preconditions are logged and ignored
 * - strict: failed preconditions are returned to the caller as typed errors
 */
export function getLedgerMode(): ValidatedEnv['TXLEDGER_LEDGER_MODE'] {
  return validateEnv().TXLEDGER_LEDGER_MODE;
}

/**
 * Drop the cached environment (tests change process.env between cases)
 */
export function resetEnvCache(): void {
  validatedEnv = undefined;
}
