import { LEDGER_MODES } from '@txledger/ledger';
import { z } from 'zod';

export const VerboseFlagSchema = z.object({
  verbose: z.boolean().optional(),
});

export const OutputFileSchema = z.object({
  output: z.string().trim().min(1, 'Output path must not be empty').optional(),
});

/**
 * Process command options (validated at CLI boundary)
 */
export const ProcessCommandOptionsSchema = z
  .object({
    mode: z
      .string()
      .trim()
      .toLowerCase()
      .pipe(z.enum(LEDGER_MODES, { errorMap: () => ({ message: 'Mode must be either "permissive" or "strict"' }) }))
      .optional(),
  })
  .extend(OutputFileSchema.shape)
  .extend(VerboseFlagSchema.shape);

export const InputPathSchema = z.string().trim().min(1, 'Input file path is required');
