import { formatRoundedDecimal } from '@txledger/core';
import type { AccountSnapshot } from '@txledger/ledger';

export const SNAPSHOT_CSV_HEADERS = ['client', 'available', 'held', 'total', 'locked'] as const;

/**
 * Render snapshots as CSV, in the order given.
 *
 * Lines are joined with "\n" without a trailing newline; an empty list renders as "".
 */
export function formatSnapshotsCsv(snapshots: readonly AccountSnapshot[]): string {
  if (snapshots.length === 0) return '';

  const rows = snapshots.map((snapshot) =>
    [
      String(snapshot.clientId),
      formatRoundedDecimal(snapshot.available),
      formatRoundedDecimal(snapshot.held),
      formatRoundedDecimal(snapshot.total),
      String(snapshot.locked),
    ].join(',')
  );

  return [SNAPSHOT_CSV_HEADERS.join(','), ...rows].join('\n');
}
