import { type FastifyRequest, type FastifyReply } from 'fastify';
import { EXPORT_FILE_PREFIX } from '@tooth-ledger/shared/constants/transfer.constants.js';
import { type PatientIdParam } from '@tooth-ledger/shared/schemas/patient.schema.js';
import { type ImportCsv } from '@tooth-ledger/shared/schemas/transfer.schema.js';
import { toIsoDate } from '@tooth-ledger/shared/utils/date.utils.js';
import {
  exportPatientCsv,
  exportAllCsv,
  importCsv,
  type TransferServiceDeps,
} from './transfer.service.js';

// ---------------------------------------------------------------------------
// Handler dependencies
// ---------------------------------------------------------------------------

export interface TransferHandlerDeps {
  serviceDeps: TransferServiceDeps;
}

function sendCsv(reply: FastifyReply, fileName: string, csv: string) {
  return reply
    .code(200)
    .header('content-type', 'text/csv; charset=utf-8')
    .header('content-disposition', `attachment; filename="${fileName}"`)
    .send(csv);
}

// ---------------------------------------------------------------------------
// Handler factory
// ---------------------------------------------------------------------------

export function createTransferHandlers(deps: TransferHandlerDeps) {
  const { serviceDeps } = deps;
  const stamp = () => toIsoDate(serviceDeps.now?.());

  async function exportPatientHandler(
    request: FastifyRequest<{ Params: PatientIdParam }>,
    reply: FastifyReply,
  ) {
    const { patientId } = request.params;
    const csv = await exportPatientCsv(serviceDeps, patientId);
    return sendCsv(reply, `${EXPORT_FILE_PREFIX}-patient-${patientId}-${stamp()}.csv`, csv);
  }

  async function exportAllHandler(_request: FastifyRequest, reply: FastifyReply) {
    const csv = await exportAllCsv(serviceDeps);
    return sendCsv(reply, `${EXPORT_FILE_PREFIX}-${stamp()}.csv`, csv);
  }

  async function importHandler(
    request: FastifyRequest<{ Body: ImportCsv }>,
    reply: FastifyReply,
  ) {
    const result = await importCsv(serviceDeps, request.body.content);
    return reply.code(200).send({ data: result });
  }

  return {
    exportPatientHandler,
    exportAllHandler,
    importHandler,
  };
}
