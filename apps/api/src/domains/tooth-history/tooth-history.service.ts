import {
  DEFAULT_STATUS_CODE,
} from '@tooth-ledger/shared/constants/status.constants.js';
import {
  RECENT_HISTORY_WINDOW_DAYS,
  RECORD_TYPES,
  RecordType,
  TOOTH_NUMBERS,
} from '@tooth-ledger/shared/constants/tooth.constants.js';
import { type SelectToothHistoryEntry } from '@tooth-ledger/shared/schemas/db/tooth-history.schema.js';
import { addDays, isIsoDate, toIsoDate } from '@tooth-ledger/shared/utils/date.utils.js';
import { describeTooth, formatToothNumber, isValidToothNumber } from '@tooth-ledger/shared/utils/tooth.utils.js';
import { InvalidToothError, NotFoundError, ValidationError } from '../../lib/errors.js';
import { type LedgerLogger } from '../../lib/logger.js';
import { type LedgerRepositories, type UnitOfWork } from '../../lib/unit-of-work.js';
import {
  assertExaminationScope,
  resolveScope,
  type LedgerScope,
} from '../examination/examination.service.js';
import { resolveStatusCodes } from '../status/status.service.js';

// ---------------------------------------------------------------------------
// Dependency interfaces
// ---------------------------------------------------------------------------

export interface ToothHistoryServiceDeps {
  uow: UnitOfWork;
  logger: LedgerLogger;
  /** Rows fetched per round trip while iterating a tooth's history. */
  historyPageSize: number;
  now?: () => Date;
}

// ---------------------------------------------------------------------------
// Input / output types
// ---------------------------------------------------------------------------

export interface RecordToothEntryInput {
  toothNumber: number;
  recordType: string;
  statuses: readonly string[];
  description?: string;
  dateRecorded?: string;
}

export interface CurrentToothStatus {
  toothNumber: number;
  recordType: RecordType;
  statuses: string[];
  entry: SelectToothHistoryEntry | null;
}

export interface ToothChartItem {
  toothNumber: number;
  label: string;
  /** e.g. "Upper Left 2.6" */
  name: string;
  statuses: string[];
  entries: number;
  lastRecorded: string | null;
}

export interface ToothChart {
  patientId: number;
  examinationId: number;
  recordType: RecordType;
  teeth: ToothChartItem[];
}

export interface ToothStatistics {
  patientId: number;
  asOf: string;
  totalEntries: number;
  byRecordType: Record<RecordType, number>;
  recentSince: string;
  recentEntries: number;
}

// ---------------------------------------------------------------------------
// Validation helpers
// ---------------------------------------------------------------------------

export function isRecordType(value: string): value is RecordType {
  return RECORD_TYPES.some((t) => t === value);
}

export function assertToothNumber(toothNumber: number): void {
  if (!isValidToothNumber(toothNumber)) {
    throw new InvalidToothError(toothNumber);
  }
}

export function assertRecordType(value: string): RecordType {
  if (!isRecordType(value)) {
    throw new ValidationError(`record_type must be one of: ${RECORD_TYPES.join(', ')}`, {
      field: 'record_type',
    });
  }
  return value;
}

// ---------------------------------------------------------------------------
// Transaction-level write (shared with visits and import)
// ---------------------------------------------------------------------------

/**
 * Validates and appends one entry inside the caller's unit of work. Always
 * inserts; earlier entries are never touched.
 */
export async function appendToothEntry(
  repos: LedgerRepositories,
  scope: LedgerScope,
  input: RecordToothEntryInput,
  today: string,
): Promise<SelectToothHistoryEntry> {
  assertToothNumber(input.toothNumber);
  const recordType = assertRecordType(input.recordType);
  const dateRecorded = input.dateRecorded ?? today;
  if (!isIsoDate(dateRecorded)) {
    throw new ValidationError('date_recorded must be a valid YYYY-MM-DD date', {
      field: 'date_recorded',
    });
  }

  const statuses = await resolveStatusCodes(repos.statuses, input.statuses);
  await assertExaminationScope(repos, scope);

  return repos.toothHistory.insert({
    patientId: scope.patientId,
    examinationId: scope.examinationId,
    toothNumber: input.toothNumber,
    recordType,
    statuses,
    description: (input.description ?? '').trim(),
    dateRecorded,
  });
}

// ---------------------------------------------------------------------------
// Service: record
// ---------------------------------------------------------------------------

export async function recordToothEntry(
  deps: ToothHistoryServiceDeps,
  scope: LedgerScope,
  input: RecordToothEntryInput,
): Promise<SelectToothHistoryEntry> {
  const today = toIsoDate(deps.now?.());
  const entry = await deps.uow.write((repos) => appendToothEntry(repos, scope, input, today));

  deps.logger.info(
    {
      ...scope,
      entryId: entry.id,
      toothNumber: entry.toothNumber,
      recordType: entry.recordType,
      statuses: entry.statuses,
    },
    'tooth history entry recorded',
  );
  return entry;
}

// ---------------------------------------------------------------------------
// Service: current status
// ---------------------------------------------------------------------------

/**
 * Statuses of the newest entry for this tooth and stream in this examination.
 * With no entry the tooth is normal; nothing carries over from other
 * examinations or from the other stream.
 */
export async function getCurrentToothStatus(
  deps: ToothHistoryServiceDeps,
  scope: LedgerScope,
  toothNumber: number,
  recordType: string,
): Promise<CurrentToothStatus> {
  assertToothNumber(toothNumber);
  const type = assertRecordType(recordType);

  const latest = await deps.uow.read(async (repos) => {
    await assertExaminationScope(repos, scope);
    return repos.toothHistory.findLatest(scope.examinationId, toothNumber, type);
  });

  return {
    toothNumber,
    recordType: type,
    statuses: latest ? [...latest.statuses] : [DEFAULT_STATUS_CODE],
    entry: latest ?? null,
  };
}

// ---------------------------------------------------------------------------
// Service: history
// ---------------------------------------------------------------------------

/**
 * Entries for one tooth and stream, oldest first, fetched page by page with
 * an id cursor. Each iteration starts again from the first entry.
 */
export function toothHistory(
  deps: ToothHistoryServiceDeps,
  scope: LedgerScope,
  toothNumber: number,
  recordType: string,
): AsyncIterable<SelectToothHistoryEntry> {
  assertToothNumber(toothNumber);
  const type = assertRecordType(recordType);
  const pageSize = Math.max(1, deps.historyPageSize);

  return {
    async *[Symbol.asyncIterator]() {
      await deps.uow.read((repos) => assertExaminationScope(repos, scope));

      let afterId = 0;
      for (;;) {
        const page = await deps.uow.read((repos) =>
          repos.toothHistory.listPage(scope.examinationId, toothNumber, type, afterId, pageSize),
        );
        yield* page;
        if (page.length < pageSize) return;
        afterId = page[page.length - 1].id;
      }
    },
  };
}

export async function listToothHistory(
  deps: ToothHistoryServiceDeps,
  scope: LedgerScope,
  toothNumber: number,
  recordType: string,
): Promise<SelectToothHistoryEntry[]> {
  const entries: SelectToothHistoryEntry[] = [];
  for await (const entry of toothHistory(deps, scope, toothNumber, recordType)) {
    entries.push(entry);
  }
  return entries;
}

// ---------------------------------------------------------------------------
// Service: chart
// ---------------------------------------------------------------------------

/**
 * Current status of all 32 teeth for one stream of one examination.
 */
export async function getToothChart(
  deps: ToothHistoryServiceDeps,
  scope: LedgerScope,
  recordType: string,
): Promise<ToothChart> {
  const type = assertRecordType(recordType);

  const { latest, counts } = await deps.uow.read(async (repos) => {
    await assertExaminationScope(repos, scope);
    return {
      latest: await repos.toothHistory.listLatestPerTooth(scope.examinationId, type),
      counts: await repos.toothHistory.countPerTooth(scope.examinationId, type),
    };
  });

  const latestByTooth = new Map(latest.map((e) => [e.toothNumber, e]));
  const countByTooth = new Map(counts.map((c) => [c.toothNumber, c.entries]));

  return {
    patientId: scope.patientId,
    examinationId: scope.examinationId,
    recordType: type,
    teeth: TOOTH_NUMBERS.map((toothNumber) => {
      const entry = latestByTooth.get(toothNumber);
      return {
        toothNumber,
        label: formatToothNumber(toothNumber),
        name: describeTooth(toothNumber),
        statuses: entry ? [...entry.statuses] : [DEFAULT_STATUS_CODE],
        entries: countByTooth.get(toothNumber) ?? 0,
        lastRecorded: entry?.dateRecorded ?? null,
      };
    }),
  };
}

/**
 * Chart of the patient's current examination. NOT_FOUND when the patient has
 * no examination yet.
 */
export async function getCurrentToothChart(
  deps: ToothHistoryServiceDeps,
  patientId: number,
  recordType: string,
): Promise<ToothChart> {
  const scope = await resolveScope(deps, patientId);
  return getToothChart(deps, scope, recordType);
}

// ---------------------------------------------------------------------------
// Service: statistics
// ---------------------------------------------------------------------------

/**
 * Entry totals across all of a patient's examinations, split by stream, plus
 * how many were recorded in the trailing window ending on `asOf`.
 */
export async function getToothStatistics(
  deps: ToothHistoryServiceDeps,
  patientId: number,
  asOf?: string,
): Promise<ToothStatistics> {
  const today = asOf ?? toIsoDate(deps.now?.());
  if (!isIsoDate(today)) {
    throw new ValidationError('as_of must be a valid YYYY-MM-DD date', { field: 'as_of' });
  }
  const recentSince = addDays(today, -RECENT_HISTORY_WINDOW_DAYS);

  const { all, recent } = await deps.uow.read(async (repos) => {
    const patient = await repos.patients.findById(patientId);
    if (!patient) throw new NotFoundError('Patient');
    return {
      all: await repos.toothHistory.countByRecordType(patientId),
      recent: await repos.toothHistory.countByRecordType(patientId, recentSince),
    };
  });

  const byRecordType: Record<RecordType, number> = {
    [RecordType.PATIENT_PROBLEM]: 0,
    [RecordType.DOCTOR_FINDING]: 0,
  };
  for (const row of all) {
    if (isRecordType(row.recordType)) byRecordType[row.recordType] = row.entries;
  }

  return {
    patientId,
    asOf: today,
    totalEntries: all.reduce((sum, row) => sum + row.entries, 0),
    byRecordType,
    recentSince,
    recentEntries: recent.reduce((sum, row) => sum + row.entries, 0),
  };
}
