// Pure utility functions for process command
// All functions are pure - no side effects

import type { LedgerMode } from '@txledger/ledger';
import type { LogLevel } from '@txledger/logger';
import { err, ok, type Result } from 'neverthrow';

import { InputPathSchema } from '../shared/schemas.js';

/**
 * Process handler parameters.
 */
export interface ProcessHandlerParams {
  /** CSV file with one ledger event per row */
  inputPath: string;
}

/**
 * Counters reported once the whole input has been read.
 */
export interface ProcessSummary {
  /** Data rows read, header excluded */
  rowsRead: number;

  /** Rows that did not decode into an event */
  rowsRejected: number;

  /** Events the ledger accepted */
  eventsApplied: number;

  /** Events the ledger rejected (strict mode only) */
  eventsRejected: number;
}

export function createProcessSummary(): ProcessSummary {
  return { eventsApplied: 0, eventsRejected: 0, rowsRead: 0, rowsRejected: 0 };
}

/**
 * Build process parameters from the positional argument.
 */
export function buildProcessParams(input: unknown): Result<ProcessHandlerParams, Error> {
  const parsed = InputPathSchema.safeParse(input);
  if (!parsed.success) {
    return err(new Error(parsed.error.issues[0]?.message ?? 'Invalid input file path'));
  }

  return ok({ inputPath: parsed.data });
}

/**
 * The --mode flag wins over the environment.
 */
export function resolveLedgerMode(flag: LedgerMode | undefined, fromEnv: () => LedgerMode): LedgerMode {
  return flag ?? fromEnv();
}

/**
 * --verbose lowers the log level to debug; otherwise LOGGER_LOG_LEVEL applies.
 */
export function resolveLogLevel(verbose: boolean | undefined): LogLevel | undefined {
  return verbose ? 'debug' : undefined;
}

/**
 * Terminate non-empty CSV with a newline. Empty output stays empty.
 */
export function formatCsvOutput(csv: string): string {
  return csv.length > 0 ? `${csv}\n` : '';
}
