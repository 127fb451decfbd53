import { describe, it, expect } from 'vitest';
import { exportResultSetToCsv } from '../../src/services/export/csv.js';
import type { ResultSet } from '../../src/services/contact-search/types.js';

function lines(buffer: Buffer): string[] {
  return buffer.toString('utf8').replace(/^\uFEFF/, '').split(/\r?\n/);
}

describe('exportResultSetToCsv', () => {
  it('writes fixed columns followed by sorted attribute columns', async () => {
    const resultSet: ResultSet = {
      records: [
        {
          contactId: 'c-1',
          initiatedAt: Date.UTC(2024, 2, 1, 10),
          queue: 'Sales',
          agent: 'ann',
          attributes: { tier: 'gold', channel: 'VOICE' },
        },
      ],
      partial: false,
      stats: { requests: 1, pages: 1, fetched: 1, duplicates: 0, discarded: 0 },
    };

    const csv = lines(await exportResultSetToCsv(resultSet));

    expect(csv[0]).toBe('Contact Id,Initiated At,Queue,Agent,channel,tier');
    expect(csv[1]).toBe('c-1,2024-03-01T10:00:00.000Z,Sales,ann,VOICE,gold');
  });

  it('writes only the header for an empty result', async () => {
    const csv = lines(
      await exportResultSetToCsv({
        records: [],
        partial: true,
        stats: { requests: 0, pages: 0, fetched: 0, duplicates: 0, discarded: 0 },
      }),
    );

    expect(csv[0]).toBe('Contact Id,Initiated At,Queue,Agent');
    expect(csv.slice(1).every(line => line === '')).toBe(true);
  });
});
