import { describe, it, expect, vi } from 'vitest';
import {
  createSyncMappingStore,
  findSyncMappings,
  insertSyncRun,
  listRecentSyncRuns,
  syncMappings,
  syncRuns,
} from '../../src/infrastructure/index.js';
import type { Database } from '../../src/infrastructure/index.js';

describe('sync mapping repository', () => {
  it('upserts on the sync key', async () => {
    const onConflictDoUpdate = vi.fn().mockResolvedValue(undefined);
    const values = vi.fn(() => ({ onConflictDoUpdate }));
    const insert = vi.fn(() => ({ values }));
    const db = { insert } as unknown as Database;

    await createSyncMappingStore(db).save({
      syncKey: '2025-08-02|高岡七夕まつり',
      remoteId: 'remote-1',
      title: '高岡七夕まつり',
      startDate: '2025-08-02',
    });

    expect(insert).toHaveBeenCalledWith(syncMappings);
    expect(values).toHaveBeenCalledWith(expect.objectContaining({
      sync_key: '2025-08-02|高岡七夕まつり',
      remote_id: 'remote-1',
      start_date: '2025-08-02',
    }));
    expect(onConflictDoUpdate).toHaveBeenCalledWith({
      target: syncMappings.sync_key,
      set: expect.objectContaining({ remote_id: 'remote-1', title: '高岡七夕まつり' }),
    });
  });

  it('skips the query for no keys', async () => {
    const select = vi.fn();
    const db = { select } as unknown as Database;

    const found = await findSyncMappings(db, []);

    expect(found.size).toBe(0);
    expect(select).not.toHaveBeenCalled();
  });

  it('maps stored keys to remote ids', async () => {
    const where = vi.fn().mockResolvedValue([{ sync_key: 'k1', remote_id: 'r1' }]);
    const db = { select: vi.fn(() => ({ from: vi.fn(() => ({ where })) })) } as unknown as Database;

    const found = await findSyncMappings(db, ['k1', 'k2']);

    expect([...found]).toEqual([['k1', 'r1']]);
  });
});

describe('sync run repository', () => {
  it('assigns a run id and defaults the calendar counters', async () => {
    const values = vi.fn().mockResolvedValue(undefined);
    const insert = vi.fn(() => ({ values }));
    const db = { insert } as unknown as Database;
    const startedAt = new Date('2025-07-01T00:00:00Z');

    const runId = await insertSyncRun(db, {
      startedAt,
      finishedAt: startedAt,
      processed: 3,
      accepted: 2,
      failed: 1,
      merged: 1,
      qualityFiltered: 0,
      skipped: 0,
      conflicts: 0,
      averageQuality: 71.5,
      grade: 'C',
    });

    expect(runId).toMatch(/^[0-9a-f-]{36}$/);
    expect(insert).toHaveBeenCalledWith(syncRuns);
    expect(values).toHaveBeenCalledWith(expect.objectContaining({
      run_id: runId,
      processed: 3,
      inserted: 0,
      updated: 0,
      sync_failed: 0,
      average_quality: 71.5,
    }));
  });

  it('lists newest runs first with the given limit', async () => {
    const limit = vi.fn().mockResolvedValue([]);
    const db = {
      select: vi.fn(() => ({ from: vi.fn(() => ({ orderBy: vi.fn(() => ({ limit })) })) })),
    } as unknown as Database;

    await expect(listRecentSyncRuns(db, 7)).resolves.toEqual([]);
    expect(limit).toHaveBeenCalledWith(7);
  });
});
