import { getLedgerMode } from '@txledger/env';
import { InMemoryLedgerStore, SerializedLedgerStore, type LedgerMode } from '@txledger/ledger';
import { flushLoggers, getLogger, setLogLevel } from '@txledger/logger';
import type { Command } from 'commander';
import type { z } from 'zod';

import { displayCliError } from '../shared/cli-error.js';
import { runHandler } from '../shared/command-execution.js';
import { ExitCodes } from '../shared/exit-codes.js';
import { InputNotFoundError, writeFileAtomically } from '../shared/file-utils.js';
import { ProcessCommandOptionsSchema } from '../shared/schemas.js';

import { ProcessHandler } from './process-handler.js';
import { buildProcessParams, formatCsvOutput, resolveLedgerMode, resolveLogLevel } from './process-utils.js';

const logger = getLogger('ProcessCommand');

/**
 * Process command options validated by Zod at CLI boundary
 */
export type ProcessCommandOptions = z.infer<typeof ProcessCommandOptionsSchema>;

/**
 * Register the process command. It is the default command, so `txledger <input>` runs it.
 */
export function registerProcessCommand(program: Command): void {
  program
    .command('process', { isDefault: true })
    .description('Apply a CSV file of ledger events and print the resulting client accounts')
    .argument('<input>', 'CSV file with type, client, tx and amount columns')
    .option('-m, --mode <mode>', 'How failed operations are handled: permissive or strict (default: TXLEDGER_LEDGER_MODE)')
    .option('-o, --output <file>', 'Write the account CSV to a file instead of stdout')
    .option('-v, --verbose', 'Log at debug level')
    .action(async (input: unknown, rawOptions: unknown) => {
      await executeProcessCommand(input, rawOptions);
    });
}

/**
 * Execute the process command.
 */
async function executeProcessCommand(input: unknown, rawOptions: unknown): Promise<void> {
  // Validate options at CLI boundary with Zod
  const validationResult = ProcessCommandOptionsSchema.safeParse(rawOptions);
  if (!validationResult.success) {
    const firstError = validationResult.error.issues[0];
    displayCliError(new Error(firstError?.message ?? 'Invalid options'), ExitCodes.INVALID_ARGS);
  }

  const paramsResult = buildProcessParams(input);
  if (paramsResult.isErr()) {
    displayCliError(paramsResult.error, ExitCodes.INVALID_ARGS);
  }

  const options = validationResult.data;

  const level = resolveLogLevel(options.verbose);
  if (level) {
    setLogLevel(level);
  }

  let mode: LedgerMode;
  try {
    mode = resolveLedgerMode(options.mode, getLedgerMode);
  } catch (error) {
    // Invalid TXLEDGER_LEDGER_MODE
    displayCliError(error instanceof Error ? error : new Error(String(error)), ExitCodes.INVALID_ARGS);
  }

  const store = new SerializedLedgerStore(new InMemoryLedgerStore({ mode }));
  const result = await runHandler(new ProcessHandler(store), paramsResult.value);

  if (result.isErr()) {
    flushLoggers();
    displayCliError(
      result.error,
      result.error instanceof InputNotFoundError ? ExitCodes.NOT_FOUND : ExitCodes.GENERAL_ERROR
    );
  }

  const output = formatCsvOutput(result.value.csv);

  if (options.output) {
    const written = await writeFileAtomically(options.output, output);
    if (written.isErr()) {
      flushLoggers();
      displayCliError(
        new Error(`Failed to write ${options.output}: ${written.error.message}`),
        ExitCodes.GENERAL_ERROR
      );
    }
    logger.info({ output: written.value }, 'Wrote account summary');
  } else {
    process.stdout.write(output);
  }

  flushLoggers();
}
