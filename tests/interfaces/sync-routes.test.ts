import { describe, it, expect, vi, beforeAll, afterAll } from 'vitest';
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import fp from 'fastify-plugin';
import type { Database } from '../../src/infrastructure/index.js';
import { syncRoutes } from '../../src/interfaces/http/index.js';

describe('GET /api/v1/sync/runs', () => {
  let app: FastifyInstance;
  const limit = vi.fn().mockResolvedValue([]);

  beforeAll(async () => {
    const db = {
      select: () => ({ from: () => ({ orderBy: () => ({ limit }) }) }),
    } as unknown as Database;

    app = Fastify({ logger: false });
    await app.register(fp(async (f) => {
      f.decorate('syncDb', db);
    }, { name: 'sync-db' }));
    await app.register(syncRoutes);
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  it('lists recent runs with the default limit', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/v1/sync/runs' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ data: [], count: 0, limit: 20 });
  });

  it('clamps large limits', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/v1/sync/runs?limit=500' });
    expect(res.json().limit).toBe(100);
    expect(limit).toHaveBeenLastCalledWith(100);
  });

  it('rejects a non-integer limit', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/v1/sync/runs?limit=abc' });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: 'limit must be an integer' });
  });
});
