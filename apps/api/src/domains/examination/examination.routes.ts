import { type FastifyInstance } from 'fastify';
import { patientIdParamSchema } from '@tooth-ledger/shared/schemas/patient.schema.js';
import {
  createExaminationSchema,
  updateExaminationSchema,
  examinationParamsSchema,
  examinationStatisticsQuerySchema,
} from '@tooth-ledger/shared/schemas/examination.schema.js';
import {
  createExaminationHandlers,
  type ExaminationHandlerDeps,
} from './examination.handlers.js';

// ---------------------------------------------------------------------------
// Examination Routes
// ---------------------------------------------------------------------------

export async function examinationRoutes(
  app: FastifyInstance,
  opts: { deps: ExaminationHandlerDeps },
) {
  const handlers = createExaminationHandlers(opts.deps);

  app.get('/api/v1/patients/:patientId/examinations', {
    schema: { params: patientIdParamSchema },
    handler: handlers.listHandler,
  });

  app.get('/api/v1/patients/:patientId/examinations/current', {
    schema: { params: patientIdParamSchema },
    handler: handlers.currentHandler,
  });

  app.get('/api/v1/patients/:patientId/examination-statistics', {
    schema: { params: patientIdParamSchema, querystring: examinationStatisticsQuerySchema },
    handler: handlers.statisticsHandler,
  });

  app.post('/api/v1/patients/:patientId/examinations', {
    schema: { params: patientIdParamSchema, body: createExaminationSchema },
    handler: handlers.createHandler,
  });

  app.get('/api/v1/patients/:patientId/examinations/:examinationId', {
    schema: { params: examinationParamsSchema },
    handler: handlers.getHandler,
  });

  app.patch('/api/v1/patients/:patientId/examinations/:examinationId', {
    schema: { params: examinationParamsSchema, body: updateExaminationSchema },
    handler: handlers.updateHandler,
  });

  app.delete('/api/v1/patients/:patientId/examinations/:examinationId', {
    schema: { params: examinationParamsSchema },
    handler: handlers.deleteHandler,
  });
}
