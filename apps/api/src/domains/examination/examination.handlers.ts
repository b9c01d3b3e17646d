import { type FastifyRequest, type FastifyReply } from 'fastify';
import { type PatientIdParam } from '@tooth-ledger/shared/schemas/patient.schema.js';
import {
  type CreateExamination,
  type UpdateExamination,
  type ExaminationParams,
  type ExaminationStatisticsQuery,
} from '@tooth-ledger/shared/schemas/examination.schema.js';
import {
  createExamination,
  getCurrentExamination,
  listExaminations,
  getExamination,
  updateExamination,
  deleteExamination,
  getExaminationStatistics,
  type ExaminationServiceDeps,
} from './examination.service.js';

// ---------------------------------------------------------------------------
// Handler dependencies
// ---------------------------------------------------------------------------

export interface ExaminationHandlerDeps {
  serviceDeps: ExaminationServiceDeps;
}

// ---------------------------------------------------------------------------
// Handler factory
// ---------------------------------------------------------------------------

export function createExaminationHandlers(deps: ExaminationHandlerDeps) {
  const { serviceDeps } = deps;

  async function listHandler(
    request: FastifyRequest<{ Params: PatientIdParam }>,
    reply: FastifyReply,
  ) {
    const examinations = await listExaminations(serviceDeps, request.params.patientId);
    return reply.code(200).send({ data: examinations });
  }

  async function currentHandler(
    request: FastifyRequest<{ Params: PatientIdParam }>,
    reply: FastifyReply,
  ) {
    const examination = await getCurrentExamination(serviceDeps, request.params.patientId);
    return reply.code(200).send({ data: examination });
  }

  async function createHandler(
    request: FastifyRequest<{ Params: PatientIdParam; Body: CreateExamination }>,
    reply: FastifyReply,
  ) {
    const body = request.body;
    const examination = await createExamination(serviceDeps, request.params.patientId, {
      examinationDate: body.examination_date,
      chiefComplaint: body.chief_complaint,
      findings: body.findings,
      diagnosis: body.diagnosis,
      treatmentPlan: body.treatment_plan,
      notes: body.notes,
    });
    return reply.code(201).send({ data: examination });
  }

  async function getHandler(
    request: FastifyRequest<{ Params: ExaminationParams }>,
    reply: FastifyReply,
  ) {
    const examination = await getExamination(serviceDeps, request.params);
    return reply.code(200).send({ data: examination });
  }

  async function updateHandler(
    request: FastifyRequest<{ Params: ExaminationParams; Body: UpdateExamination }>,
    reply: FastifyReply,
  ) {
    const body = request.body;
    const examination = await updateExamination(serviceDeps, request.params, {
      examinationDate: body.examination_date,
      chiefComplaint: body.chief_complaint,
      findings: body.findings,
      diagnosis: body.diagnosis,
      treatmentPlan: body.treatment_plan,
      notes: body.notes,
    });
    return reply.code(200).send({ data: examination });
  }

  async function deleteHandler(
    request: FastifyRequest<{ Params: ExaminationParams }>,
    reply: FastifyReply,
  ) {
    await deleteExamination(serviceDeps, request.params);
    return reply.code(204).send();
  }

  async function statisticsHandler(
    request: FastifyRequest<{ Params: PatientIdParam; Querystring: ExaminationStatisticsQuery }>,
    reply: FastifyReply,
  ) {
    const statistics = await getExaminationStatistics(
      serviceDeps,
      request.params.patientId,
      request.query.as_of,
    );
    return reply.code(200).send({ data: statistics });
  }

  return {
    listHandler,
    currentHandler,
    createHandler,
    getHandler,
    updateHandler,
    deleteHandler,
    statisticsHandler,
  };
}
