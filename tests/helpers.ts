import { vi } from 'vitest';
import { createEventRecord } from '../src/domain/index.js';
import type { EventDraft, EventRecord } from '../src/domain/index.js';

/**
 * Factory for test records with sensible defaults.
 * Override any draft field via the partial parameter.
 */
export function makeRecord(overrides: Partial<EventDraft> = {}): EventRecord {
  return createEventRecord({
    title: '高岡七夕まつり',
    timing: { startDate: '2025-08-02' },
    sourceSite: 'toyama-navi',
    ...overrides,
  });
}

/** Minimal fake logger. */
export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
  } as unknown as import('pino').Logger;
}

/** Fixed "today" for deterministic date handling. */
export const TODAY = '2025-07-01';
