import { randomUUID } from 'node:crypto';
import type { CalendarEventBody, CalendarGateway } from '../../application/index.js';
import type { Log } from '../../application/index.js';

/**
 * Calendar gateway that only logs what it would send.
 *
 * Inserts are answered with a generated `dry-run-` id so the sync mapping
 * table still fills in and later runs plan updates for known events.
 */
export class DryRunCalendarGateway implements CalendarGateway {
  constructor(
    private readonly log: Log,
    private readonly newId: () => string = randomUUID,
  ) {}

  async insert(body: CalendarEventBody): Promise<{ id: string }> {
    const id = `dry-run-${this.newId()}`;
    this.log.info({ id, summary: body.summary, start: body.start }, 'Calendar insert (dry run)');
    return { id };
  }

  async update(remoteId: string, body: CalendarEventBody): Promise<void> {
    this.log.info({ id: remoteId, summary: body.summary, start: body.start }, 'Calendar update (dry run)');
  }
}
