import { type FastifyInstance } from 'fastify';
import { patientIdParamSchema } from '@tooth-ledger/shared/schemas/patient.schema.js';
import { importCsvSchema } from '@tooth-ledger/shared/schemas/transfer.schema.js';
import { importRateLimit } from '../../plugins/rate-limit.plugin.js';
import { createTransferHandlers, type TransferHandlerDeps } from './transfer.handlers.js';

// ---------------------------------------------------------------------------
// Import / Export Routes
// ---------------------------------------------------------------------------

export async function transferRoutes(
  app: FastifyInstance,
  opts: { deps: TransferHandlerDeps },
) {
  const handlers = createTransferHandlers(opts.deps);

  app.get('/api/v1/patients/:patientId/export', {
    schema: { params: patientIdParamSchema },
    handler: handlers.exportPatientHandler,
  });

  app.get('/api/v1/export', {
    handler: handlers.exportAllHandler,
  });

  app.post('/api/v1/import', {
    schema: { body: importCsvSchema },
    config: { rateLimit: importRateLimit() },
    bodyLimit: 25 * 1024 * 1024,
    handler: handlers.importHandler,
  });
}
