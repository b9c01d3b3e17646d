import { type FastifyRequest, type FastifyReply } from 'fastify';
import { type PatientIdParam } from '@tooth-ledger/shared/schemas/patient.schema.js';
import { type ExaminationParams } from '@tooth-ledger/shared/schemas/examination.schema.js';
import {
  type ToothParams,
  type RecordTypeQuery,
  type RecordToothEntry,
  type ToothStatisticsQuery,
} from '@tooth-ledger/shared/schemas/tooth-history.schema.js';
import {
  recordToothEntry,
  getCurrentToothStatus,
  listToothHistory,
  getToothChart,
  getCurrentToothChart,
  getToothStatistics,
  type ToothHistoryServiceDeps,
} from './tooth-history.service.js';

// ---------------------------------------------------------------------------
// Handler dependencies
// ---------------------------------------------------------------------------

export interface ToothHistoryHandlerDeps {
  serviceDeps: ToothHistoryServiceDeps;
}

function scopeOf(params: { patientId: number; examinationId: number }) {
  return { patientId: params.patientId, examinationId: params.examinationId };
}

// ---------------------------------------------------------------------------
// Handler factory
// ---------------------------------------------------------------------------

export function createToothHistoryHandlers(deps: ToothHistoryHandlerDeps) {
  const { serviceDeps } = deps;

  async function recordHandler(
    request: FastifyRequest<{ Params: ToothParams; Body: RecordToothEntry }>,
    reply: FastifyReply,
  ) {
    const { params, body } = request;
    const entry = await recordToothEntry(serviceDeps, scopeOf(params), {
      toothNumber: params.toothNumber,
      recordType: body.record_type,
      statuses: body.statuses,
      description: body.description,
      dateRecorded: body.date_recorded,
    });
    return reply.code(201).send({ data: entry });
  }

  async function currentStatusHandler(
    request: FastifyRequest<{ Params: ToothParams; Querystring: RecordTypeQuery }>,
    reply: FastifyReply,
  ) {
    const { params, query } = request;
    const status = await getCurrentToothStatus(
      serviceDeps,
      scopeOf(params),
      params.toothNumber,
      query.record_type,
    );
    return reply.code(200).send({ data: status });
  }

  async function historyHandler(
    request: FastifyRequest<{ Params: ToothParams; Querystring: RecordTypeQuery }>,
    reply: FastifyReply,
  ) {
    const { params, query } = request;
    const entries = await listToothHistory(
      serviceDeps,
      scopeOf(params),
      params.toothNumber,
      query.record_type,
    );
    return reply.code(200).send({ data: entries });
  }

  async function chartHandler(
    request: FastifyRequest<{ Params: ExaminationParams; Querystring: RecordTypeQuery }>,
    reply: FastifyReply,
  ) {
    const chart = await getToothChart(
      serviceDeps,
      scopeOf(request.params),
      request.query.record_type,
    );
    return reply.code(200).send({ data: chart });
  }

  async function currentChartHandler(
    request: FastifyRequest<{ Params: PatientIdParam; Querystring: RecordTypeQuery }>,
    reply: FastifyReply,
  ) {
    const chart = await getCurrentToothChart(
      serviceDeps,
      request.params.patientId,
      request.query.record_type,
    );
    return reply.code(200).send({ data: chart });
  }

  async function statisticsHandler(
    request: FastifyRequest<{ Params: PatientIdParam; Querystring: ToothStatisticsQuery }>,
    reply: FastifyReply,
  ) {
    const statistics = await getToothStatistics(
      serviceDeps,
      request.params.patientId,
      request.query.as_of,
    );
    return reply.code(200).send({ data: statistics });
  }

  return {
    recordHandler,
    currentStatusHandler,
    historyHandler,
    chartHandler,
    currentChartHandler,
    statisticsHandler,
  };
}
