import { type FastifyInstance } from 'fastify';
import { patientIdParamSchema } from '@tooth-ledger/shared/schemas/patient.schema.js';
import { examinationParamsSchema } from '@tooth-ledger/shared/schemas/examination.schema.js';
import {
  createVisitSchema,
  visitDateRangeQuerySchema,
  visitStatisticsQuerySchema,
} from '@tooth-ledger/shared/schemas/visit.schema.js';
import { createVisitHandlers, type VisitHandlerDeps } from './visit.handlers.js';

// ---------------------------------------------------------------------------
// Visit Routes
// ---------------------------------------------------------------------------

const EXAMINATION_PATH = '/api/v1/patients/:patientId/examinations/:examinationId';

export async function visitRoutes(
  app: FastifyInstance,
  opts: { deps: VisitHandlerDeps },
) {
  const handlers = createVisitHandlers(opts.deps);

  app.post(`${EXAMINATION_PATH}/visits`, {
    schema: { params: examinationParamsSchema, body: createVisitSchema },
    handler: handlers.addHandler,
  });

  app.get(`${EXAMINATION_PATH}/visits`, {
    schema: { params: examinationParamsSchema },
    handler: handlers.listForExaminationHandler,
  });

  app.get(`${EXAMINATION_PATH}/visits/total`, {
    schema: { params: examinationParamsSchema },
    handler: handlers.totalHandler,
  });

  app.get('/api/v1/patients/:patientId/visits', {
    schema: { params: patientIdParamSchema },
    handler: handlers.listForPatientHandler,
  });

  app.get('/api/v1/visits', {
    schema: { querystring: visitDateRangeQuerySchema },
    handler: handlers.listByDateRangeHandler,
  });

  app.get('/api/v1/visit-statistics', {
    schema: { querystring: visitStatisticsQuerySchema },
    handler: handlers.statisticsHandler,
  });
}
