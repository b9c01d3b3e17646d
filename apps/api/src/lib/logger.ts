import { type FastifyBaseLogger } from 'fastify';

// ---------------------------------------------------------------------------
// Ledger logger
// ---------------------------------------------------------------------------

/**
 * The slice of pino the services use. Fastify's `app.log` satisfies it, as
 * does a bare `pino()` instance.
 */
export type LedgerLogger = Pick<FastifyBaseLogger, 'debug' | 'info' | 'warn' | 'error'>;
