import type { AccountSnapshot } from '@txledger/ledger';
import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';

import { formatSnapshotsCsv } from '../snapshot-csv-writer.js';

function snapshot(clientId: number, available: string, held: string, total: string, locked = false): AccountSnapshot {
  return {
    clientId,
    available: new Decimal(available),
    held: new Decimal(held),
    total: new Decimal(total),
    locked,
  };
}

describe('formatSnapshotsCsv', () => {
  it('should render an empty list as an empty string', () => {
    expect(formatSnapshotsCsv([])).toBe('');
  });

  it('should write the header and one line per snapshot in the given order', () => {
    const csv = formatSnapshotsCsv([snapshot(3, '9', '0', '9'), snapshot(1, '100.0000', '100.12', '200.12', true)]);

    expect(csv).toBe(['client,available,held,total,locked', '3,9,0,9,false', '1,100,100.12,200.12,true'].join('\n'));
  });

  it('should round half away from zero to four places', () => {
    const csv = formatSnapshotsCsv([
      snapshot(1, '1.234549', '0.0000499', '1.23461779'),
      snapshot(2, '0.00005', '-0.00005', '-2.71828'),
    ]);

    expect(csv.split('\n').slice(1)).toEqual(['1,1.2345,0,1.2346,false', '2,0.0001,-0.0001,-2.7183,false']);
  });

  it('should never print negative zero', () => {
    const csv = formatSnapshotsCsv([snapshot(7, '-0.00001', '-0', '0.00001')]);

    expect(csv.split('\n')[1]).toBe('7,0,0,0,false');
  });
});
