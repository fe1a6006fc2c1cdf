import { createReadStream, type ReadStream } from 'node:fs';

import { wrapError } from '@txledger/core';
import { formatSnapshotsCsv, readLedgerEvents } from '@txledger/ingestion';
import type { LedgerStore } from '@txledger/ledger';
import { getLogger } from '@txledger/logger';
import { err, ok, type Result } from 'neverthrow';

import type { CommandHandler } from '../shared/command-execution.js';
import { checkReadableFile } from '../shared/file-utils.js';

import { createProcessSummary, type ProcessHandlerParams, type ProcessSummary } from './process-utils.js';

const logger = getLogger('ProcessHandler');

/**
 * Result of the process operation.
 */
export interface ProcessResult {
  /** Account snapshots encoded as CSV, empty when no account exists */
  csv: string;

  summary: ProcessSummary;
}

/**
 * Process handler - streams a CSV file of events through a ledger store
 * and encodes the resulting accounts.
 *
 * Invalid rows and rejected events are logged and skipped; only a missing or
 * unreadable input fails the operation.
 */
export class ProcessHandler implements CommandHandler<ProcessHandlerParams, ProcessResult> {
  private input: ReadStream | undefined;

  constructor(private readonly store: LedgerStore) {}

  /**
   * Execute the process operation.
   */
  async execute(params: ProcessHandlerParams): Promise<Result<ProcessResult, Error>> {
    const { inputPath } = params;

    const readable = await checkReadableFile(inputPath);
    if (readable.isErr()) {
      return err(readable.error);
    }

    logger.debug({ inputPath, mode: this.store.mode }, 'Processing ledger events');

    const summary = createProcessSummary();
    this.input = createReadStream(inputPath);

    try {
      for await (const decoded of readLedgerEvents(this.input)) {
        summary.rowsRead++;

        if (decoded.isErr()) {
          summary.rowsRejected++;
          logger.warn({ line: decoded.error.line, reason: decoded.error.reason }, 'Skipping invalid row');
          continue;
        }

        const applied = await this.store.apply(decoded.value);
        if (applied.isErr()) {
          summary.eventsRejected++;
          logger.warn(
            {
              clientId: applied.error.clientId,
              code: applied.error.code,
              transactionId: applied.error.transactionId,
            },
            applied.error.message
          );
          continue;
        }

        summary.eventsApplied++;
      }
    } catch (error) {
      return wrapError(error, `Failed to read ${inputPath}`);
    }

    const snapshots = await this.store.snapshotAll();
    logger.info({ ...summary, accounts: snapshots.length }, 'Processed ledger events');

    return ok({ csv: formatSnapshotsCsv(snapshots), summary });
  }

  /**
   * Cleanup resources.
   */
  destroy(): void {
    this.input?.destroy();
    this.input = undefined;
  }
}
