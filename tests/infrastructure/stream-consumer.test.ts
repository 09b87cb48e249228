import { describe, it, expect, vi } from 'vitest';
import type { Redis } from 'ioredis';
import { completeBatch, readBatch, startConsumer } from '../../src/infrastructure/worker/index.js';
import { fakeLogger } from '../helpers.js';

const STREAM = 'raw_events_stream';

function entry(id: string, title: string): [string, string[]] {
  return [id, ['site', 'x', 'record', JSON.stringify({ title })]];
}

function fakeRedis(replies: unknown[]) {
  const xreadgroup = vi.fn();
  for (const reply of replies) xreadgroup.mockResolvedValueOnce(reply);
  xreadgroup.mockResolvedValue(null);
  const fake = {
    xgroup: vi.fn().mockResolvedValue('OK'),
    xreadgroup,
    xack: vi.fn().mockResolvedValue(1),
    xdel: vi.fn().mockResolvedValue(1),
  };
  return { fake, redis: fake as unknown as Redis };
}

describe('readBatch', () => {
  it('drains pending entries first, then new ones without blocking', async () => {
    const { fake, redis } = fakeRedis([
      [[STREAM, [entry('1-0', '朝市')]]],
      [[STREAM, [entry('2-0', '夜市')]]],
    ]);

    const batch = await readBatch(redis, 10, 250);

    expect(batch.ids).toEqual(['1-0', '2-0']);
    expect(batch.records).toEqual([{ title: '朝市' }, { title: '夜市' }]);
    expect(fake.xreadgroup.mock.calls[0]?.at(-1)).toBe('0');
    expect(fake.xreadgroup.mock.calls[1]?.at(-1)).toBe('>');
    expect(fake.xreadgroup.mock.calls[1]).not.toContain('BLOCK');
    expect(fake.xreadgroup).toHaveBeenCalledTimes(3);
  });

  it('blocks for new entries when nothing is pending', async () => {
    const { fake, redis } = fakeRedis([[[STREAM, []]]]);

    const batch = await readBatch(redis, 10, 250);

    expect(batch.ids).toEqual([]);
    const blocking = fake.xreadgroup.mock.calls[1] ?? [];
    expect(blocking[blocking.indexOf('BLOCK') + 1]).toBe(250);
  });

  it('acknowledges deleted pending entries without decoding them', async () => {
    const { redis } = fakeRedis([[[STREAM, [['3-0', []]]]]]);

    const batch = await readBatch(redis, 1, 250);

    expect(batch.ids).toEqual(['3-0']);
    expect(batch.records).toEqual([]);
  });
});

describe('completeBatch', () => {
  it('acks then deletes the ids', async () => {
    const { fake, redis } = fakeRedis([]);
    await completeBatch(redis, ['1-0', '2-0']);
    expect(fake.xack).toHaveBeenCalledWith(STREAM, 'pipeline_workers', '1-0', '2-0');
    expect(fake.xdel).toHaveBeenCalledWith(STREAM, '1-0', '2-0');
  });

  it('does nothing for an empty batch', async () => {
    const { fake, redis } = fakeRedis([]);
    await completeBatch(redis, []);
    expect(fake.xack).not.toHaveBeenCalled();
  });
});

describe('startConsumer', () => {
  it('hands the batch to the handler and acknowledges it afterwards', async () => {
    const { fake, redis } = fakeRedis([[[STREAM, [entry('1-0', '朝市')]]]]);
    const controller = new AbortController();
    const handler = vi.fn(async () => {
      controller.abort();
    });

    await startConsumer(redis, fakeLogger(), controller.signal, handler, { batchSize: 5, blockMs: 10 });

    expect(handler).toHaveBeenCalledWith([{ title: '朝市' }]);
    expect(fake.xack).toHaveBeenCalledWith(STREAM, 'pipeline_workers', '1-0');
    expect(fake.xdel).toHaveBeenCalledWith(STREAM, '1-0');
  });

  it('leaves the batch pending when the handler fails', async () => {
    const { fake, redis } = fakeRedis([[[STREAM, [entry('1-0', '朝市')]]]]);
    const controller = new AbortController();
    const log = fakeLogger();
    const handler = vi.fn(async () => {
      controller.abort();
      throw new Error('database unavailable');
    });

    await startConsumer(redis, log, controller.signal, handler, { batchSize: 5, blockMs: 10 });

    expect(fake.xack).not.toHaveBeenCalled();
    expect(log.info).toHaveBeenLastCalledWith('Consumer stopped');
  });

  it('tolerates an existing consumer group', async () => {
    const { fake, redis } = fakeRedis([]);
    fake.xgroup.mockRejectedValue(new Error('BUSYGROUP Consumer Group name already exists'));
    const controller = new AbortController();
    controller.abort();
    const log = fakeLogger();

    await startConsumer(redis, log, controller.signal, vi.fn(), { batchSize: 5 });

    expect(log.debug).toHaveBeenCalledWith({ group: 'pipeline_workers' }, 'Consumer group already exists');
    expect(fake.xreadgroup).not.toHaveBeenCalled();
  });

  it('fails on any other group creation error', async () => {
    const { fake, redis } = fakeRedis([]);
    fake.xgroup.mockRejectedValue(new Error('NOPERM'));
    const controller = new AbortController();

    await expect(
      startConsumer(redis, fakeLogger(), controller.signal, vi.fn(), { batchSize: 5 }),
    ).rejects.toThrow('NOPERM');
  });
});
