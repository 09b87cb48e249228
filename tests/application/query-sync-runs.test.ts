import { describe, it, expect, vi } from 'vitest';
import { listSyncRuns } from '../../src/application/query-sync-runs.js';
import type { Database } from '../../src/infrastructure/index.js';

function fakeDb(rows: unknown[]) {
  const limit = vi.fn().mockResolvedValue(rows);
  const db = {
    select: vi.fn(() => ({ from: vi.fn(() => ({ orderBy: vi.fn(() => ({ limit })) })) })),
  } as unknown as Database;
  return { db, limit };
}

describe('listSyncRuns', () => {
  it('defaults to 20 runs', async () => {
    const { db, limit } = fakeDb([]);
    await expect(listSyncRuns(db, {})).resolves.toEqual({ data: [], count: 0, limit: 20 });
    expect(limit).toHaveBeenCalledWith(20);
  });

  it('clamps the limit to [1, 100]', async () => {
    const high = fakeDb([]);
    await listSyncRuns(high.db, { limit: 500 });
    expect(high.limit).toHaveBeenCalledWith(100);

    const low = fakeDb([]);
    await listSyncRuns(low.db, { limit: 0 });
    expect(low.limit).toHaveBeenCalledWith(1);
  });
});
