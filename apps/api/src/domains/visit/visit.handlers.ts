import { type FastifyRequest, type FastifyReply } from 'fastify';
import { type PatientIdParam } from '@tooth-ledger/shared/schemas/patient.schema.js';
import { type ExaminationParams } from '@tooth-ledger/shared/schemas/examination.schema.js';
import {
  type CreateVisit,
  type VisitDateRangeQuery,
  type VisitStatisticsQuery,
} from '@tooth-ledger/shared/schemas/visit.schema.js';
import {
  addVisit,
  getExaminationTotal,
  getVisitStatistics,
  listExaminationVisits,
  listPatientVisits,
  listVisitsByDateRange,
  type VisitServiceDeps,
} from './visit.service.js';

// ---------------------------------------------------------------------------
// Handler dependencies
// ---------------------------------------------------------------------------

export interface VisitHandlerDeps {
  serviceDeps: VisitServiceDeps;
}

// ---------------------------------------------------------------------------
// Handler factory
// ---------------------------------------------------------------------------

export function createVisitHandlers(deps: VisitHandlerDeps) {
  const { serviceDeps } = deps;

  async function addHandler(
    request: FastifyRequest<{ Params: ExaminationParams; Body: CreateVisit }>,
    reply: FastifyReply,
  ) {
    const body = request.body;
    const result = await addVisit(serviceDeps, request.params, {
      visitDate: body.visit_date,
      amountPaid: body.amount_paid,
      chiefComplaint: body.chief_complaint,
      diagnosis: body.diagnosis,
      treatmentPerformed: body.treatment_performed,
      advice: body.advice,
      affectedTeeth: body.affected_teeth,
      toothFindings: body.tooth_findings,
    });
    return reply.code(201).send({ data: result });
  }

  async function listForExaminationHandler(
    request: FastifyRequest<{ Params: ExaminationParams }>,
    reply: FastifyReply,
  ) {
    const visits = await listExaminationVisits(serviceDeps, request.params);
    return reply.code(200).send({ data: visits });
  }

  async function totalHandler(
    request: FastifyRequest<{ Params: ExaminationParams }>,
    reply: FastifyReply,
  ) {
    const total = await getExaminationTotal(serviceDeps, request.params);
    return reply.code(200).send({
      data: { examinationId: request.params.examinationId, total },
    });
  }

  async function listForPatientHandler(
    request: FastifyRequest<{ Params: PatientIdParam }>,
    reply: FastifyReply,
  ) {
    const visits = await listPatientVisits(serviceDeps, request.params.patientId);
    return reply.code(200).send({ data: visits });
  }

  async function listByDateRangeHandler(
    request: FastifyRequest<{ Querystring: VisitDateRangeQuery }>,
    reply: FastifyReply,
  ) {
    const visits = await listVisitsByDateRange(serviceDeps, request.query.from, request.query.to);
    return reply.code(200).send({ data: visits });
  }

  async function statisticsHandler(
    request: FastifyRequest<{ Querystring: VisitStatisticsQuery }>,
    reply: FastifyReply,
  ) {
    const statistics = await getVisitStatistics(serviceDeps, {
      from: request.query.from,
      to: request.query.to,
    });
    return reply.code(200).send({ data: statistics });
  }

  return {
    addHandler,
    listForExaminationHandler,
    totalHandler,
    listForPatientHandler,
    listByDateRangeHandler,
    statisticsHandler,
  };
}
