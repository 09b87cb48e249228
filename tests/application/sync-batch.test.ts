import { describe, it, expect, vi } from 'vitest';
import { syncBatch } from '../../src/application/index.js';
import type { CalendarGateway, SyncBatchDeps } from '../../src/application/index.js';
import { syncKey } from '../../src/domain/index.js';
import { DEFAULT_PIPELINE_CONFIG } from '../../src/infrastructure/index.js';
import { fakeLogger, makeRecord, TODAY } from '../helpers.js';

const listing = {
  title: '高岡七夕まつり',
  start: '2025年8月2日',
  end: '2025年8月9日',
  location: '高岡駅前広場',
  site: 'toyama-navi',
  url: 'https://example.jp/e/1',
  description: '午後1時～3時 主催：高岡七夕まつり実行委員会 TEL 0766-20-1234 入場無料',
};

const key = syncKey(makeRecord({ title: '高岡七夕まつり', timing: { startDate: '2025-08-02' } }));
const startedAt = new Date('2025-07-01T00:00:00Z');

function setup(mappings: ReadonlyMap<string, string>) {
  const insert = vi.fn().mockResolvedValue({ id: 'cal-1' });
  const update = vi.fn().mockResolvedValue(undefined);
  const gateway: CalendarGateway = { insert, update };
  const save = vi.fn().mockResolvedValue(undefined);
  const findMappings = vi.fn().mockResolvedValue(mappings);
  const recordRun = vi.fn().mockResolvedValue('run-1');
  const log = fakeLogger();

  const deps: SyncBatchDeps = {
    settings: DEFAULT_PIPELINE_CONFIG.settings,
    today: TODAY,
    log,
    minQualityScore: 0,
    timeZone: 'Asia/Tokyo',
    gateway,
    store: { save },
    findMappings,
    recordRun,
    nowFn: () => startedAt,
  };
  return { deps, insert, update, save, findMappings, recordRun, log };
}

describe('syncBatch', () => {
  it('inserts new events, stores their mapping and records the counts', async () => {
    const { deps, insert, save, findMappings, recordRun } = setup(new Map());

    const result = await syncBatch([listing], deps);

    expect(findMappings).toHaveBeenCalledWith([key]);
    expect(insert).toHaveBeenCalledTimes(1);
    expect(save).toHaveBeenCalledWith({
      syncKey: key,
      remoteId: 'cal-1',
      title: '高岡七夕まつり',
      startDate: '2025-08-02',
    });
    expect(result?.runId).toBe('run-1');
    expect(result?.sync).toEqual({ inserted: 1, updated: 0, failed: 0 });
    expect(recordRun).toHaveBeenCalledWith(expect.objectContaining({
      startedAt,
      finishedAt: startedAt,
      processed: 1,
      accepted: 1,
      failed: 0,
      merged: 0,
      inserted: 1,
      updated: 0,
      syncFailed: 0,
      skipped: 0,
      conflicts: 0,
    }));
  });

  it('updates events already on the calendar', async () => {
    const { deps, insert, update, recordRun } = setup(new Map([[key, 'cal-1']]));

    const result = await syncBatch([listing], deps);

    expect(insert).not.toHaveBeenCalled();
    expect(update).toHaveBeenCalledWith('cal-1', expect.objectContaining({ summary: '高岡七夕まつり' }));
    expect(result?.sync).toEqual({ inserted: 0, updated: 1, failed: 0 });
    expect(recordRun).toHaveBeenCalledWith(expect.objectContaining({ inserted: 0, updated: 1, syncFailed: 0 }));
  });

  it('records nothing when no listing survives ingestion', async () => {
    const { deps, findMappings, recordRun, log } = setup(new Map());

    const result = await syncBatch([{ title: '', start: '8/2', site: 'x' }], deps);

    expect(result).toBeNull();
    expect(findMappings).not.toHaveBeenCalled();
    expect(recordRun).not.toHaveBeenCalled();
    expect(log.warn).toHaveBeenCalledWith({ processed: 1, failed: 1 }, 'Batch produced no records');
  });
});
