import { randomUUID } from 'node:crypto';
import { pathToFileURL } from 'node:url';
import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import helmet from '@fastify/helmet';
import cors from '@fastify/cors';
import {
  serializerCompiler,
  validatorCompiler,
} from 'fastify-type-provider-zod';
import { getEnv } from './lib/env.js';
import { createDatabase } from './lib/db.js';
import { type LedgerLogger } from './lib/logger.js';
import { createUnitOfWork, type UnitOfWork } from './lib/unit-of-work.js';
import { errorHandlerPluginFp } from './plugins/error-handler.plugin.js';
import { rateLimitPluginFp } from './plugins/rate-limit.plugin.js';
import { statusRoutes } from './domains/status/status.routes.js';
import { examinationRoutes } from './domains/examination/examination.routes.js';
import { toothHistoryRoutes } from './domains/tooth-history/tooth-history.routes.js';
import { visitRoutes } from './domains/visit/visit.routes.js';
import { transferRoutes } from './domains/transfer/transfer.routes.js';

// ---------------------------------------------------------------------------
// App dependencies
// ---------------------------------------------------------------------------

export interface AppDeps {
  uow: UnitOfWork;
  historyPageSize: number;
  /** Defaults to the Fastify request logger's root instance. */
  logger?: LedgerLogger;
  now?: () => Date;
  rateLimitMax?: number;
  corsOrigin?: string;
}

// ---------------------------------------------------------------------------
// App factory
// ---------------------------------------------------------------------------

export async function buildApp(
  deps: AppDeps,
  opts: FastifyServerOptions = {},
): Promise<FastifyInstance> {
  const app = Fastify({
    logger: {
      level: process.env.LOG_LEVEL ?? 'info',
    },
    genReqId: () => randomUUID(),
    ...opts,
  });

  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  await app.register(helmet);
  await app.register(cors, {
    origin: deps.corsOrigin ?? process.env.CORS_ORIGIN ?? 'http://localhost:3000',
  });
  await app.register(rateLimitPluginFp, { defaultMax: deps.rateLimitMax });
  await app.register(errorHandlerPluginFp);

  app.get('/health', async () => ({ status: 'ok' }));

  const logger = deps.logger ?? app.log;
  const base = { uow: deps.uow, logger, now: deps.now };

  await app.register(statusRoutes, {
    deps: { serviceDeps: { uow: deps.uow, logger } },
  });
  await app.register(examinationRoutes, { deps: { serviceDeps: base } });
  await app.register(toothHistoryRoutes, {
    deps: { serviceDeps: { ...base, historyPageSize: deps.historyPageSize } },
  });
  await app.register(visitRoutes, { deps: { serviceDeps: base } });
  await app.register(transferRoutes, { deps: { serviceDeps: base } });

  return app;
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  const env = getEnv();
  const connection = createDatabase(env.DATABASE_URL);

  const app = await buildApp(
    {
      uow: createUnitOfWork(connection.db),
      historyPageSize: env.HISTORY_PAGE_SIZE,
      rateLimitMax: env.RATE_LIMIT_MAX,
      corsOrigin: env.CORS_ORIGIN,
    },
    { logger: { level: env.LOG_LEVEL } },
  );

  app.addHook('onClose', async () => {
    await connection.close();
  });

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      app.log.info({ signal }, 'shutting down');
      app.close().then(
        () => process.exit(0),
        (err: unknown) => {
          app.log.error({ err }, 'shutdown failed');
          process.exit(1);
        },
      );
    });
  }

  await app.listen({ port: env.API_PORT, host: env.API_HOST });
}

// Start server when run directly
const entry = process.argv[1];
if (entry !== undefined && import.meta.url === pathToFileURL(entry).href) {
  main().catch((err: unknown) => {
    console.error(err);
    process.exit(1);
  });
}
