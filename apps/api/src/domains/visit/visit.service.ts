import { RecordType } from '@tooth-ledger/shared/constants/tooth.constants.js';
import { type SelectToothHistoryEntry } from '@tooth-ledger/shared/schemas/db/tooth-history.schema.js';
import {
  type InsertVisitRecord,
  type SelectVisitRecord,
} from '@tooth-ledger/shared/schemas/db/visit.schema.js';
import { isIsoDate, toIsoDate } from '@tooth-ledger/shared/utils/date.utils.js';
import { formatCents, parseAmountToCents, sumAmounts } from '@tooth-ledger/shared/utils/money.utils.js';
import { isValidToothNumber, normaliseToothList } from '@tooth-ledger/shared/utils/tooth.utils.js';
import { InvalidToothError, NotFoundError, ValidationError } from '../../lib/errors.js';
import { type LedgerLogger } from '../../lib/logger.js';
import { type UnitOfWork } from '../../lib/unit-of-work.js';
import { assertExaminationScope, type LedgerScope } from '../examination/examination.service.js';
import { appendToothEntry } from '../tooth-history/tooth-history.service.js';

// ---------------------------------------------------------------------------
// Dependency interfaces
// ---------------------------------------------------------------------------

export interface VisitServiceDeps {
  uow: UnitOfWork;
  logger: LedgerLogger;
  now?: () => Date;
}

// ---------------------------------------------------------------------------
// Input / output types
// ---------------------------------------------------------------------------

export interface AddVisitInput {
  visitDate?: string;
  amountPaid: string | number;
  chiefComplaint?: string;
  diagnosis?: string;
  treatmentPerformed?: string;
  advice?: string;
  affectedTeeth?: readonly number[];
  /**
   * When present, each affected tooth also gets a doctor_finding entry with
   * these statuses. Patient-reported problems are never derived from a visit.
   */
  toothFindings?: { statuses: readonly string[] };
}

/** Inclusive ISO bounds; an absent bound is open. */
export interface VisitDateRange {
  from?: string;
  to?: string;
}

export interface VisitStatistics {
  from: string | null;
  to: string | null;
  totalVisits: number;
  totalRevenue: string;
}

export interface AddVisitResult {
  visit: SelectVisitRecord;
  derivedEntries: SelectToothHistoryEntry[];
}

// ---------------------------------------------------------------------------
// Service: add
// ---------------------------------------------------------------------------

/**
 * Validates a visit for insertion: amount in cents, ISO visit date (default
 * `today`), FDI affected teeth stored as a sorted set.
 */
export function prepareVisit(
  scope: LedgerScope,
  input: Omit<AddVisitInput, 'toothFindings'>,
  today: string,
): InsertVisitRecord & { visitDate: string; affectedTeeth: number[] } {
  const cents = parseAmountToCents(input.amountPaid);
  if (cents === null) {
    throw new ValidationError(
      'amount_paid must be a non-negative amount with at most two decimals',
      { field: 'amount_paid', value: input.amountPaid },
    );
  }

  const visitDate = input.visitDate ?? today;
  if (!isIsoDate(visitDate)) {
    throw new ValidationError('visit_date must be a valid YYYY-MM-DD date', { field: 'visit_date' });
  }

  const affectedTeeth = normaliseToothList(input.affectedTeeth ?? []);
  for (const tooth of affectedTeeth) {
    if (!isValidToothNumber(tooth)) throw new InvalidToothError(tooth);
  }

  return {
    patientId: scope.patientId,
    examinationId: scope.examinationId,
    visitDate,
    amountPaid: formatCents(cents),
    chiefComplaint: (input.chiefComplaint ?? '').trim(),
    diagnosis: (input.diagnosis ?? '').trim(),
    treatmentPerformed: (input.treatmentPerformed ?? '').trim(),
    advice: (input.advice ?? '').trim(),
    affectedTeeth,
  };
}

/**
 * Inserts the visit and any derived tooth entries in one transaction.
 */
export async function addVisit(
  deps: VisitServiceDeps,
  scope: LedgerScope,
  input: AddVisitInput,
): Promise<AddVisitResult> {
  const today = toIsoDate(deps.now?.());
  const record = prepareVisit(scope, input, today);
  const findings = input.toothFindings;
  if (findings && record.affectedTeeth.length === 0) {
    throw new ValidationError('tooth_findings requires at least one affected tooth', {
      field: 'affected_teeth',
    });
  }

  const result = await deps.uow.write(async (repos) => {
    await assertExaminationScope(repos, scope);
    const visit = await repos.visits.insert(record);

    const derivedEntries: SelectToothHistoryEntry[] = [];
    if (findings) {
      for (const toothNumber of record.affectedTeeth) {
        derivedEntries.push(
          await appendToothEntry(
            repos,
            scope,
            {
              toothNumber,
              recordType: RecordType.DOCTOR_FINDING,
              statuses: findings.statuses,
              description: visit.treatmentPerformed || visit.diagnosis,
              dateRecorded: record.visitDate,
            },
            today,
          ),
        );
      }
    }

    return { visit, derivedEntries };
  });

  deps.logger.info(
    {
      ...scope,
      visitId: result.visit.id,
      amountPaid: result.visit.amountPaid,
      derivedEntries: result.derivedEntries.length,
    },
    'visit recorded',
  );
  return result;
}

// ---------------------------------------------------------------------------
// Service: totals and listings
// ---------------------------------------------------------------------------

/**
 * Sum of amount_paid over the examination's visits, recomputed on every call.
 */
export async function getExaminationTotal(
  deps: VisitServiceDeps,
  scope: LedgerScope,
): Promise<string> {
  const amounts = await deps.uow.read(async (repos) => {
    await assertExaminationScope(repos, scope);
    return repos.visits.listAmountsForExamination(scope.examinationId);
  });
  return sumAmounts(amounts);
}

/**
 * Chronological by visit date, then insertion order.
 */
export async function listExaminationVisits(
  deps: VisitServiceDeps,
  scope: LedgerScope,
): Promise<SelectVisitRecord[]> {
  return deps.uow.read(async (repos) => {
    await assertExaminationScope(repos, scope);
    return repos.visits.listForExamination(scope.examinationId);
  });
}

/**
 * Every visit of the patient across examinations, newest first.
 */
export async function listPatientVisits(
  deps: VisitServiceDeps,
  patientId: number,
): Promise<SelectVisitRecord[]> {
  return deps.uow.read(async (repos) => {
    const patient = await repos.patients.findById(patientId);
    if (!patient) throw new NotFoundError('Patient');
    return repos.visits.listForPatient(patientId);
  });
}

// ---------------------------------------------------------------------------
// Service: reporting
// ---------------------------------------------------------------------------

function assertDateRange(range: VisitDateRange): void {
  for (const field of ['from', 'to'] as const) {
    const value = range[field];
    if (value !== undefined && !isIsoDate(value)) {
      throw new ValidationError(`${field} must be a valid YYYY-MM-DD date`, { field });
    }
  }
  if (range.from !== undefined && range.to !== undefined && range.from > range.to) {
    throw new ValidationError('from must not be after to', { field: 'from' });
  }
}

/**
 * Visits of every patient dated within [from, to], oldest first.
 */
export async function listVisitsByDateRange(
  deps: VisitServiceDeps,
  from: string,
  to: string,
): Promise<SelectVisitRecord[]> {
  assertDateRange({ from, to });
  return deps.uow.read((repos) => repos.visits.listInDateRange(from, to));
}

/**
 * Visit count and revenue across all patients, summed in cents.
 */
export async function getVisitStatistics(
  deps: VisitServiceDeps,
  range: VisitDateRange = {},
): Promise<VisitStatistics> {
  assertDateRange(range);
  const visits = await deps.uow.read((repos) => repos.visits.listInDateRange(range.from, range.to));
  return {
    from: range.from ?? null,
    to: range.to ?? null,
    totalVisits: visits.length,
    totalRevenue: sumAmounts(visits.map((v) => v.amountPaid)),
  };
}
