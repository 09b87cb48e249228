import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import { DEFAULT_PIPELINE_CONFIG } from '../../src/infrastructure/index.js';
import { pipelineRoutes } from '../../src/interfaces/http/index.js';

describe('POST /api/v1/pipeline/run', () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    app = Fastify({ logger: false });
    await app.register(pipelineRoutes, {
      config: DEFAULT_PIPELINE_CONFIG,
      now: () => new Date('2025-07-01T00:00:00Z'),
    });
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  it('runs the pipeline and merges cross-site duplicates', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/v1/pipeline/run',
      payload: [
        { title: '高岡七夕まつり', start: '8/2', end: '8/9', location: '高岡駅前広場', site: 'toyama-navi' },
        { title: '第72回 高岡七夕まつり', start: '8/2', end: '8/9', location: '高岡駅前広場', site: 'takaoka-info' },
      ],
    });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.report.processing.finalCount).toBe(1);
    expect(body.report.processing.completedSteps).toEqual(['ingest', 'geocode', 'deduplicate', 'validate', 'schedule', 'report']);
    expect(body.events[0].sources).toEqual(['takaoka-info', 'toyama-navi']);
    expect(body.conflicts).toEqual([]);
    expect(body.failures).toEqual([]);
  });

  it('answers 422 when no record survives ingestion', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/v1/pipeline/run',
      payload: [{ title: '', start: '8/2', site: 'x' }],
    });

    expect(res.statusCode).toBe(422);
    expect(res.json()).toEqual({
      error: 'No records to process',
      code: 'NO_RECORDS',
      failures: [{ index: 0, title: '', reason: 'empty title' }],
    });
  });
});
