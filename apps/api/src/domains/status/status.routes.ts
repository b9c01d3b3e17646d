import { type FastifyInstance } from 'fastify';
import {
  createCustomStatusSchema,
  updateCustomStatusSchema,
  statusCodeParamSchema,
  statusLookupQuerySchema,
  setStatusActiveSchema,
} from '@tooth-ledger/shared/schemas/status.schema.js';
import { createStatusHandlers, type StatusHandlerDeps } from './status.handlers.js';

// ---------------------------------------------------------------------------
// Status Registry Routes
// ---------------------------------------------------------------------------

export async function statusRoutes(
  app: FastifyInstance,
  opts: { deps: StatusHandlerDeps },
) {
  const handlers = createStatusHandlers(opts.deps);

  app.get('/api/v1/statuses', {
    handler: handlers.listActiveHandler,
  });

  app.get('/api/v1/statuses/custom', {
    handler: handlers.listCustomHandler,
  });

  app.get('/api/v1/statuses/:code', {
    schema: { params: statusCodeParamSchema, querystring: statusLookupQuerySchema },
    handler: handlers.resolveHandler,
  });

  app.post('/api/v1/statuses', {
    schema: { body: createCustomStatusSchema },
    handler: handlers.registerHandler,
  });

  app.patch('/api/v1/statuses/:code', {
    schema: { params: statusCodeParamSchema, body: updateCustomStatusSchema },
    handler: handlers.updateHandler,
  });

  app.put('/api/v1/statuses/:code/active', {
    schema: { params: statusCodeParamSchema, body: setStatusActiveSchema },
    handler: handlers.setActiveHandler,
  });
}
