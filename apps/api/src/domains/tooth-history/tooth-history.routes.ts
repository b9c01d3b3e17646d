import { type FastifyInstance } from 'fastify';
import { patientIdParamSchema } from '@tooth-ledger/shared/schemas/patient.schema.js';
import { examinationParamsSchema } from '@tooth-ledger/shared/schemas/examination.schema.js';
import {
  toothParamsSchema,
  recordTypeQuerySchema,
  recordToothEntrySchema,
  toothStatisticsQuerySchema,
} from '@tooth-ledger/shared/schemas/tooth-history.schema.js';
import {
  createToothHistoryHandlers,
  type ToothHistoryHandlerDeps,
} from './tooth-history.handlers.js';

// ---------------------------------------------------------------------------
// Tooth History Routes
// ---------------------------------------------------------------------------

const EXAMINATION_PATH = '/api/v1/patients/:patientId/examinations/:examinationId';

export async function toothHistoryRoutes(
  app: FastifyInstance,
  opts: { deps: ToothHistoryHandlerDeps },
) {
  const handlers = createToothHistoryHandlers(opts.deps);

  app.post(`${EXAMINATION_PATH}/teeth/:toothNumber/entries`, {
    schema: { params: toothParamsSchema, body: recordToothEntrySchema },
    handler: handlers.recordHandler,
  });

  app.get(`${EXAMINATION_PATH}/teeth/:toothNumber/status`, {
    schema: { params: toothParamsSchema, querystring: recordTypeQuerySchema },
    handler: handlers.currentStatusHandler,
  });

  app.get(`${EXAMINATION_PATH}/teeth/:toothNumber/history`, {
    schema: { params: toothParamsSchema, querystring: recordTypeQuerySchema },
    handler: handlers.historyHandler,
  });

  app.get(`${EXAMINATION_PATH}/chart`, {
    schema: { params: examinationParamsSchema, querystring: recordTypeQuerySchema },
    handler: handlers.chartHandler,
  });

  app.get('/api/v1/patients/:patientId/chart', {
    schema: { params: patientIdParamSchema, querystring: recordTypeQuerySchema },
    handler: handlers.currentChartHandler,
  });

  app.get('/api/v1/patients/:patientId/tooth-statistics', {
    schema: { params: patientIdParamSchema, querystring: toothStatisticsQuerySchema },
    handler: handlers.statisticsHandler,
  });
}
