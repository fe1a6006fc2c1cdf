export { readLedgerEvents, resolveHeader, decodeRow } from './csv/csv-event-reader.js';
export type { HeaderLayout } from './csv/csv-event-reader.js';
export { parseLedgerEventRow, LedgerEventRowSchema, REQUIRED_COLUMNS } from './csv/ledger-event-row.js';
export type { LedgerEventColumn, LedgerEventRow, RawLedgerEventRow } from './csv/ledger-event-row.js';
export { RowDecodeError } from './csv/row-decode-error.js';
export { formatSnapshotsCsv, SNAPSHOT_CSV_HEADERS } from './csv/snapshot-csv-writer.js';
