import { type FastifyInstance } from 'fastify';
import fp from 'fastify-plugin';
import rateLimit, { type RateLimitOptions } from '@fastify/rate-limit';
import { RateLimitedError } from '../lib/errors.js';

// ---------------------------------------------------------------------------
// Rate limit tiers:
//   Default:  RATE_LIMIT_MAX req/min per IP (100 unless configured)
//   Import:   5 req/min per IP
// ---------------------------------------------------------------------------

export interface RateLimitPluginOptions {
  /** Override default max for testing. */
  defaultMax?: number;
}

async function rateLimitPlugin(app: FastifyInstance, opts: RateLimitPluginOptions) {
  await app.register(rateLimit, {
    max: opts.defaultMax ?? 100,
    timeWindow: '1 minute',
    keyGenerator: (request) => request.ip,
    // Thrown by the plugin and rendered by the error handler.
    errorResponseBuilder: (_request, context) =>
      new RateLimitedError(Math.ceil(context.ttl / 1000)),
  });
}

/**
 * CSV import: 5 req/min per IP.
 * Use as route-level config: { config: { rateLimit: importRateLimit() } }
 */
export function importRateLimit(): RateLimitOptions {
  return {
    max: 5,
    timeWindow: '1 minute',
  };
}

export const rateLimitPluginFp = fp(rateLimitPlugin, {
  name: 'rate-limit-plugin',
});
