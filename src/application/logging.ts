import type { BaseLogger } from 'pino';

/**
 * The slice of a pino logger the use cases write to. Both a standalone
 * `pino()` instance and Fastify's `request.log` satisfy it.
 */
export type Log = Pick<BaseLogger, 'debug' | 'info' | 'warn' | 'error'>;
