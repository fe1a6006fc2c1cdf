import type { Readable } from 'node:stream';

import { formatZodIssues } from '@txledger/core';
import type { LedgerEvent } from '@txledger/ledger';
import { getLogger } from '@txledger/logger';
import { parse } from 'csv-parse';
import { err, type Result } from 'neverthrow';
import { z } from 'zod';

import { REQUIRED_COLUMNS, parseLedgerEventRow, type LedgerEventColumn } from './ledger-event-row.js';
import { RowDecodeError } from './row-decode-error.js';

const logger = getLogger('csv-event-reader');

/**
 * Shape csv-parse yields with `info: true`
 */
const ParsedRecordSchema = z.object({
  info: z.object({ lines: z.number().int() }),
  record: z.array(z.string()),
});

export type HeaderLayout =
  | { kind: 'complete'; columns: Record<LedgerEventColumn, number>; width: number }
  | { kind: 'incomplete'; missing: LedgerEventColumn[] };

/**
 * Map the required columns to their positions. Names are compared trimmed and lowercased.
 */
export function resolveHeader(names: readonly string[]): HeaderLayout {
  const normalized = names.map((name) => name.trim().toLowerCase());
  const positions = REQUIRED_COLUMNS.map((column) => normalized.indexOf(column));
  const missing = REQUIRED_COLUMNS.filter((_column, i) => positions[i] === -1);

  if (missing.length > 0) {
    return { kind: 'incomplete', missing };
  }

  const [type = 0, client = 0, tx = 0, amount = 0] = positions;
  return { kind: 'complete', columns: { amount, client, tx, type }, width: names.length };
}

/**
 * Turn one data row into an event, or explain why it was rejected
 */
export function decodeRow(
  header: HeaderLayout,
  fields: readonly string[],
  line: number
): Result<LedgerEvent, RowDecodeError> {
  if (header.kind === 'incomplete') {
    return err(new RowDecodeError(line, `Header is missing column(s): ${header.missing.join(', ')}`, fields));
  }

  if (fields.length > header.width) {
    return err(new RowDecodeError(line, `Expected at most ${header.width} fields, found ${fields.length}`, fields));
  }

  // Short rows read their missing trailing fields as empty
  const field = (column: LedgerEventColumn) => fields[header.columns[column]] ?? '';

  return parseLedgerEventRow({
    amount: field('amount'),
    client: field('client'),
    tx: field('tx'),
    type: field('type'),
  }).mapErr((reason) => new RowDecodeError(line, reason, fields));
}

/**
 * Stream ledger events out of CSV input, one result per data row.
 *
 * The first record is the header. Invalid rows come out as RowDecodeError and
 * do not stop the iteration; a read or parser failure is thrown.
 */
export async function* readLedgerEvents(input: Readable): AsyncGenerator<Result<LedgerEvent, RowDecodeError>> {
  const parser = parse({
    bom: true,
    info: true,
    relax_column_count: true,
    skip_empty_lines: true,
    trim: true,
  });
  input.on('error', (error) => parser.destroy(error));

  const records: AsyncIterable<unknown> = input.pipe(parser);
  let header: HeaderLayout | undefined;

  for await (const chunk of records) {
    const parsed = ParsedRecordSchema.safeParse(chunk);
    if (!parsed.success) {
      throw new Error(`Unexpected record from CSV parser: ${formatZodIssues(parsed.error)}`);
    }

    const { info, record } = parsed.data;

    if (!header) {
      header = resolveHeader(record);
      if (header.kind === 'incomplete') {
        logger.warn({ header: record, missing: header.missing }, 'CSV header is missing required columns');
      } else {
        logger.debug({ header: record }, 'Read CSV header');
      }
      continue;
    }

    yield decodeRow(header, record, info.lines);
  }
}
