import {
  FLAT_EXPORT_COLUMNS,
  FLAT_ROW_KIND_ORDER,
  FlatRowKind,
  IMPORT_COLUMN_ALIASES,
  LIST_SEPARATOR,
  type FlatExportColumn,
} from '@tooth-ledger/shared/constants/transfer.constants.js';
import { type ZodError } from 'zod';
import {
  type InsertExamination,
  type SelectExamination,
} from '@tooth-ledger/shared/schemas/db/examination.schema.js';
import { type SelectPatient } from '@tooth-ledger/shared/schemas/db/patient.schema.js';
import { patientReferenceSchema } from '@tooth-ledger/shared/schemas/patient.schema.js';
import { type FlatRow } from '@tooth-ledger/shared/schemas/transfer.schema.js';
import { buildCsv, detectDelimiter, parseCsvContent } from '@tooth-ledger/shared/utils/csv.utils.js';
import { parseFlexibleDate, toIsoDate } from '@tooth-ledger/shared/utils/date.utils.js';
import { normaliseAmount } from '@tooth-ledger/shared/utils/money.utils.js';
import { parseToothNumber } from '@tooth-ledger/shared/utils/tooth.utils.js';
import {
  AppError,
  ImportRowError,
  NotFoundError,
  type ImportRowErrorEntry,
} from '../../lib/errors.js';
import { type LedgerLogger } from '../../lib/logger.js';
import { type LedgerRepositories, type UnitOfWork } from '../../lib/unit-of-work.js';
import { prepareExamination } from '../examination/examination.service.js';
import { type PatientChanges } from '../patient/patient.repository.js';
import { resolveStatusCodes } from '../status/status.service.js';
import { appendToothEntry, assertRecordType } from '../tooth-history/tooth-history.service.js';
import { prepareVisit } from '../visit/visit.service.js';

// ---------------------------------------------------------------------------
// Dependency interfaces
// ---------------------------------------------------------------------------

export interface TransferServiceDeps {
  uow: UnitOfWork;
  logger: LedgerLogger;
  now?: () => Date;
}

// ---------------------------------------------------------------------------
// Result types
// ---------------------------------------------------------------------------

export interface ImportResult {
  totalRows: number;
  created: number;
  updated: number;
  examinationsCreated: number;
  teethRestored: number;
  visitsRestored: number;
  skipped: number;
  errors: ImportRowErrorEntry[];
}

export type ImportInputRow = Partial<Record<FlatExportColumn, string>>;

type RowOutcome =
  | 'created'
  | 'updated'
  | 'examinationCreated'
  | 'toothRestored'
  | 'visitRestored'
  | 'skipped';

type ChildStream = 'teeth' | 'visits';

/** Content keys of the rows an examination held before the import began. */
interface ExaminationBaseline {
  teeth: Map<string, number>;
  visits: Map<string, number>;
}

interface AppliedRow {
  outcome: RowOutcome;
  patientId?: number;
  examinationId?: number;
  baseline?: ExaminationBaseline;
  /** Pre-existing row a skipped child row was matched against */
  consumed?: { examinationId: number; stream: ChildStream; key: string };
}

// ============================================================================
// Export
// ============================================================================

function blankRow(kind: FlatRowKind, phone: string): FlatRow {
  return {
    kind,
    phone,
    full_name: '',
    email: '',
    address: '',
    date_of_birth: '',
    examination_ref: '',
    examination_date: '',
    chief_complaint: '',
    findings: '',
    diagnosis: '',
    treatment_plan: '',
    notes: '',
    tooth_number: '',
    record_type: '',
    statuses: '',
    description: '',
    date_recorded: '',
    visit_date: '',
    amount_paid: '',
    treatment_performed: '',
    advice: '',
    affected_teeth: '',
  };
}

/**
 * Patient row, then each examination (oldest first) followed by its tooth
 * entries and visits. examination_ref is the source examination id.
 */
async function flattenPatient(
  repos: LedgerRepositories,
  patient: SelectPatient,
): Promise<FlatRow[]> {
  const rows: FlatRow[] = [
    {
      ...blankRow(FlatRowKind.PATIENT, patient.phone),
      full_name: patient.fullName,
      email: patient.email ?? '',
      address: patient.address ?? '',
      date_of_birth: patient.dateOfBirth ?? '',
    },
  ];

  const examinations = await repos.examinations.listForPatientChronological(patient.id);
  for (const exam of examinations) {
    const ref = String(exam.id);
    rows.push({
      ...blankRow(FlatRowKind.EXAMINATION, patient.phone),
      examination_ref: ref,
      examination_date: exam.examinationDate,
      chief_complaint: exam.chiefComplaint,
      findings: exam.findings,
      diagnosis: exam.diagnosis,
      treatment_plan: exam.treatmentPlan,
      notes: exam.notes,
    });

    const entries = await repos.toothHistory.listForExamination(exam.id);
    for (const entry of entries) {
      rows.push({
        ...blankRow(FlatRowKind.TOOTH_HISTORY, patient.phone),
        examination_ref: ref,
        tooth_number: String(entry.toothNumber),
        record_type: entry.recordType,
        statuses: entry.statuses.join(LIST_SEPARATOR),
        description: entry.description,
        date_recorded: entry.dateRecorded,
      });
    }

    const visits = await repos.visits.listForExamination(exam.id);
    for (const visit of visits) {
      rows.push({
        ...blankRow(FlatRowKind.VISIT, patient.phone),
        examination_ref: ref,
        visit_date: visit.visitDate,
        amount_paid: normaliseAmount(visit.amountPaid) ?? visit.amountPaid,
        chief_complaint: visit.chiefComplaint,
        diagnosis: visit.diagnosis,
        treatment_performed: visit.treatmentPerformed,
        advice: visit.advice,
        affected_teeth: visit.affectedTeeth.join(LIST_SEPARATOR),
      });
    }
  }

  return rows;
}

export async function exportFlat(
  deps: TransferServiceDeps,
  patientId: number,
): Promise<FlatRow[]> {
  return deps.uow.read(async (repos) => {
    const patient = await repos.patients.findById(patientId);
    if (!patient) throw new NotFoundError('Patient');
    return flattenPatient(repos, patient);
  });
}

export async function exportAll(deps: TransferServiceDeps): Promise<FlatRow[]> {
  return deps.uow.read(async (repos) => {
    const rows: FlatRow[] = [];
    for (const patient of await repos.patients.listAll()) {
      rows.push(...(await flattenPatient(repos, patient)));
    }
    return rows;
  });
}

export function renderFlatCsv(rows: readonly FlatRow[]): string {
  return buildCsv(FLAT_EXPORT_COLUMNS, rows);
}

export async function exportPatientCsv(
  deps: TransferServiceDeps,
  patientId: number,
): Promise<string> {
  const rows = await exportFlat(deps, patientId);
  deps.logger.info({ patientId, rows: rows.length }, 'patient ledger exported');
  return renderFlatCsv(rows);
}

export async function exportAllCsv(deps: TransferServiceDeps): Promise<string> {
  const rows = await exportAll(deps);
  deps.logger.info({ rows: rows.length }, 'full ledger exported');
  return renderFlatCsv(rows);
}

// ============================================================================
// Import
// ============================================================================

interface ImportContext {
  today: string;
  /** phone → patient id, filled as patient rows commit */
  patients: Map<string, number>;
  /** phone + examination_ref → examination id */
  examinations: Map<string, number>;
  /** examination ids already bound to a reference of this file */
  claimed: Set<number>;
  /** matched examinations only; created ones start empty */
  baselines: Map<number, ExaminationBaseline>;
}

function examinationKey(phone: string, ref: string): string {
  return `${phone}\u0000${ref}`;
}

// --- Duplicate detection ---
// A child row is skipped only against a row that existed before the import,
// and each pre-existing row absorbs at most one imported row.

interface ToothContent {
  toothNumber: number;
  recordType: string;
  dateRecorded: string;
  description: string;
  statuses: readonly string[];
}

interface VisitContent {
  visitDate: string;
  amountPaid?: string;
  chiefComplaint?: string;
  diagnosis?: string;
  treatmentPerformed?: string;
  advice?: string;
  affectedTeeth?: readonly number[];
}

function toothKey(entry: ToothContent): string {
  return JSON.stringify([
    entry.toothNumber,
    entry.recordType,
    entry.dateRecorded,
    entry.description,
    entry.statuses,
  ]);
}

function visitKey(visit: VisitContent): string {
  const amount = visit.amountPaid ?? '0';
  return JSON.stringify([
    visit.visitDate,
    normaliseAmount(amount) ?? amount,
    visit.chiefComplaint ?? '',
    visit.diagnosis ?? '',
    visit.treatmentPerformed ?? '',
    visit.advice ?? '',
    visit.affectedTeeth ?? [],
  ]);
}

function countKeys(keys: readonly string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const key of keys) counts.set(key, (counts.get(key) ?? 0) + 1);
  return counts;
}

async function loadBaseline(
  repos: LedgerRepositories,
  examinationId: number,
): Promise<ExaminationBaseline> {
  const entries = await repos.toothHistory.listForExamination(examinationId);
  const visits = await repos.visits.listForExamination(examinationId);
  return {
    teeth: countKeys(entries.map(toothKey)),
    visits: countKeys(visits.map(visitKey)),
  };
}

function hasPreexisting(
  ctx: ImportContext,
  examinationId: number,
  stream: ChildStream,
  key: string,
): boolean {
  return (ctx.baselines.get(examinationId)?.[stream].get(key) ?? 0) > 0;
}

function consumePreexisting(
  ctx: ImportContext,
  consumed: { examinationId: number; stream: ChildStream; key: string },
): void {
  const counts = ctx.baselines.get(consumed.examinationId)?.[consumed.stream];
  const remaining = counts?.get(consumed.key) ?? 0;
  if (counts && remaining > 0) counts.set(consumed.key, remaining - 1);
}

function sameExaminationText(stored: SelectExamination, record: InsertExamination): boolean {
  return (
    stored.chiefComplaint === (record.chiefComplaint ?? '') &&
    stored.findings === (record.findings ?? '') &&
    stored.diagnosis === (record.diagnosis ?? '') &&
    stored.treatmentPlan === (record.treatmentPlan ?? '') &&
    stored.notes === (record.notes ?? '')
  );
}

// --- Row helpers ---

function splitList(value: string): string[] {
  return value
    .split(LIST_SEPARATOR)
    .map((v) => v.trim())
    .filter((v) => v !== '');
}

function requireField(row: FlatRow, rowNumber: number, field: FlatExportColumn): string {
  const value = row[field];
  if (value === '') {
    throw new ImportRowError(rowNumber, `Missing ${field}`, field, 'MISSING_FIELD');
  }
  return value;
}

function importDate(
  row: FlatRow,
  rowNumber: number,
  field: FlatExportColumn,
  fallback?: string,
): string {
  const raw = row[field];
  if (raw === '') {
    if (fallback !== undefined) return fallback;
    throw new ImportRowError(rowNumber, `Missing ${field}`, field, 'MISSING_FIELD');
  }
  const parsed = parseFlexibleDate(raw);
  if (parsed === null) {
    throw new ImportRowError(rowNumber, `Invalid date in ${field}: ${raw}`, field, 'INVALID_DATE');
  }
  return parsed;
}

async function findPatientId(
  repos: LedgerRepositories,
  ctx: ImportContext,
  phone: string,
  rowNumber: number,
): Promise<number> {
  const known = ctx.patients.get(phone);
  if (known !== undefined) return known;
  const patient = await repos.patients.findByPhone(phone);
  if (!patient) {
    throw new ImportRowError(rowNumber, `No patient with phone ${phone}`, 'phone', 'UNKNOWN_PATIENT');
  }
  return patient.id;
}

function findExaminationId(ctx: ImportContext, row: FlatRow, rowNumber: number): number {
  const ref = requireField(row, rowNumber, 'examination_ref');
  const id = ctx.examinations.get(examinationKey(row.phone, ref));
  if (id === undefined) {
    throw new ImportRowError(
      rowNumber,
      `No examination row with reference ${ref} for phone ${row.phone}`,
      'examination_ref',
      'UNKNOWN_EXAMINATION',
    );
  }
  return id;
}

// --- Patient rows ---

function invalidFieldError(error: ZodError, rowNumber: number): ImportRowError {
  const issue = error.issues[0];
  const field = typeof issue.path[0] === 'string' ? issue.path[0] : undefined;
  return new ImportRowError(rowNumber, issue.message, field, 'INVALID_FIELD');
}

async function importPatientRow(
  repos: LedgerRepositories,
  row: FlatRow,
  rowNumber: number,
): Promise<AppliedRow> {
  const phone = requireField(row, rowNumber, 'phone');
  const dateOfBirth = row.date_of_birth === '' ? undefined : importDate(row, rowNumber, 'date_of_birth');

  const existing = await repos.patients.findByPhone(phone);
  if (existing) {
    // Non-empty cells overwrite; blanks keep what is stored
    const checked = patientReferenceSchema.partial().safeParse({
      full_name: row.full_name === '' ? undefined : row.full_name,
      email: row.email === '' ? undefined : row.email,
      address: row.address === '' ? undefined : row.address,
    });
    if (!checked.success) throw invalidFieldError(checked.error, rowNumber);
    const { full_name: fullName, email, address } = checked.data;

    const changes: PatientChanges = {};
    if (fullName !== undefined && fullName !== existing.fullName) changes.fullName = fullName;
    if (email !== undefined && email !== existing.email) changes.email = email;
    if (address !== undefined && address !== existing.address) changes.address = address;
    if (dateOfBirth !== undefined && dateOfBirth !== existing.dateOfBirth) {
      changes.dateOfBirth = dateOfBirth;
    }
    if (Object.keys(changes).length === 0) {
      return { outcome: 'skipped', patientId: existing.id };
    }
    await repos.patients.update(existing.id, changes);
    return { outcome: 'updated', patientId: existing.id };
  }

  const parsed = patientReferenceSchema.safeParse({
    full_name: row.full_name,
    phone,
    email: row.email === '' ? undefined : row.email,
    address: row.address === '' ? undefined : row.address,
    date_of_birth: dateOfBirth,
  });
  if (!parsed.success) throw invalidFieldError(parsed.error, rowNumber);

  const created = await repos.patients.create({
    fullName: parsed.data.full_name,
    phone: parsed.data.phone,
    email: parsed.data.email ?? null,
    address: parsed.data.address ?? null,
    dateOfBirth: parsed.data.date_of_birth ?? null,
  });
  return { outcome: 'created', patientId: created.id };
}

// --- Examination rows ---

async function importExaminationRow(
  repos: LedgerRepositories,
  ctx: ImportContext,
  row: FlatRow,
  rowNumber: number,
): Promise<AppliedRow> {
  const phone = requireField(row, rowNumber, 'phone');
  requireField(row, rowNumber, 'examination_ref');
  const patientId = await findPatientId(repos, ctx, phone, rowNumber);

  const record = prepareExamination(
    patientId,
    {
      examinationDate: importDate(row, rowNumber, 'examination_date'),
      chiefComplaint: row.chief_complaint,
      findings: row.findings,
      diagnosis: row.diagnosis,
      treatmentPlan: row.treatment_plan,
      notes: row.notes,
    },
    ctx.today,
  );

  // Every descriptive field must agree, and one stored examination answers
  // for at most one reference of the file
  const candidates = await repos.examinations.listForPatientOnDate(patientId, record.examinationDate);
  const match = candidates.find((e) => !ctx.claimed.has(e.id) && sameExaminationText(e, record));
  if (match) {
    return {
      outcome: 'skipped',
      examinationId: match.id,
      baseline: await loadBaseline(repos, match.id),
    };
  }

  const created = await repos.examinations.create(record);
  return { outcome: 'examinationCreated', examinationId: created.id };
}

// --- Tooth history rows ---

async function importToothRow(
  repos: LedgerRepositories,
  ctx: ImportContext,
  row: FlatRow,
  rowNumber: number,
): Promise<AppliedRow> {
  const phone = requireField(row, rowNumber, 'phone');
  const patientId = await findPatientId(repos, ctx, phone, rowNumber);
  const examinationId = findExaminationId(ctx, row, rowNumber);
  const scope = { patientId, examinationId };

  const toothNumber = parseToothNumber(requireField(row, rowNumber, 'tooth_number'));
  if (toothNumber === null) {
    throw new ImportRowError(
      rowNumber,
      `Invalid tooth number: ${row.tooth_number}`,
      'tooth_number',
      'INVALID_TOOTH',
    );
  }
  const recordType = assertRecordType(requireField(row, rowNumber, 'record_type'));
  const statuses = await resolveStatusCodes(repos.statuses, splitList(row.statuses));
  const dateRecorded = importDate(row, rowNumber, 'date_recorded', ctx.today);
  const description = row.description.trim();

  const key = toothKey({ toothNumber, recordType, dateRecorded, description, statuses });
  if (hasPreexisting(ctx, examinationId, 'teeth', key)) {
    return { outcome: 'skipped', consumed: { examinationId, stream: 'teeth', key } };
  }

  await appendToothEntry(
    repos,
    scope,
    { toothNumber, recordType, statuses, description, dateRecorded },
    ctx.today,
  );
  return { outcome: 'toothRestored' };
}

// --- Visit rows ---

async function importVisitRow(
  repos: LedgerRepositories,
  ctx: ImportContext,
  row: FlatRow,
  rowNumber: number,
): Promise<AppliedRow> {
  const phone = requireField(row, rowNumber, 'phone');
  const patientId = await findPatientId(repos, ctx, phone, rowNumber);
  const examinationId = findExaminationId(ctx, row, rowNumber);

  const affectedTeeth: number[] = [];
  for (const value of splitList(row.affected_teeth)) {
    const tooth = parseToothNumber(value);
    if (tooth === null) {
      throw new ImportRowError(rowNumber, `Invalid tooth number: ${value}`, 'affected_teeth', 'INVALID_TOOTH');
    }
    affectedTeeth.push(tooth);
  }

  const record = prepareVisit(
    { patientId, examinationId },
    {
      visitDate: importDate(row, rowNumber, 'visit_date', ctx.today),
      amountPaid: row.amount_paid === '' ? '0' : row.amount_paid,
      chiefComplaint: row.chief_complaint,
      diagnosis: row.diagnosis,
      treatmentPerformed: row.treatment_performed,
      advice: row.advice,
      affectedTeeth,
    },
    ctx.today,
  );

  const key = visitKey(record);
  if (hasPreexisting(ctx, examinationId, 'visits', key)) {
    return { outcome: 'skipped', consumed: { examinationId, stream: 'visits', key } };
  }

  await repos.visits.insert(record);
  return { outcome: 'visitRestored' };
}

// --- Row normalisation and error mapping ---

function normaliseRow(input: ImportInputRow): FlatRow {
  const row = blankRow(FlatRowKind.PATIENT, '');
  for (const column of FLAT_EXPORT_COLUMNS) {
    row[column] = (input[column] ?? '').trim();
  }
  // Patient-only files carry no kind column
  if (row.kind === '') row.kind = FlatRowKind.PATIENT;
  row.kind = row.kind.toLowerCase();
  return row;
}

function isFlatRowKind(value: string): value is FlatRowKind {
  return FLAT_ROW_KIND_ORDER.some((k) => k === value);
}

const FIELD_BY_ERROR_CODE: Readonly<Partial<Record<string, FlatExportColumn>>> = {
  INVALID_TOOTH: 'tooth_number',
  UNKNOWN_STATUS: 'statuses',
};

function detailsField(details: unknown): string | undefined {
  if (typeof details === 'object' && details !== null && 'field' in details) {
    return typeof details.field === 'string' ? details.field : undefined;
  }
  return undefined;
}

function toImportRowError(err: unknown, rowNumber: number, kind: FlatRowKind): ImportRowError {
  if (err instanceof ImportRowError) return err;
  if (err instanceof AppError) {
    let field = detailsField(err.details) ?? FIELD_BY_ERROR_CODE[err.code];
    if (err.code === 'INVALID_TOOTH' && kind === FlatRowKind.VISIT) field = 'affected_teeth';
    return new ImportRowError(rowNumber, err.message, field, err.code);
  }
  const message = err instanceof Error ? err.message : String(err);
  return new ImportRowError(rowNumber, message, undefined, 'PERSISTENCE_ERROR');
}

/**
 * Applies flat rows patient → examination → tooth_history → visit, each row
 * in its own transaction. A failed row is recorded and the import continues.
 * Row numbers are 1-based positions in `rows`.
 */
export async function importRows(
  deps: TransferServiceDeps,
  rows: readonly ImportInputRow[],
): Promise<ImportResult> {
  const result: ImportResult = {
    totalRows: rows.length,
    created: 0,
    updated: 0,
    examinationsCreated: 0,
    teethRestored: 0,
    visitsRestored: 0,
    skipped: 0,
    errors: [],
  };
  const ctx: ImportContext = {
    today: toIsoDate(deps.now?.()),
    patients: new Map(),
    examinations: new Map(),
    claimed: new Set(),
    baselines: new Map(),
  };

  const buckets = new Map<FlatRowKind, Array<{ row: FlatRow; rowNumber: number }>>(
    FLAT_ROW_KIND_ORDER.map((k) => [k, []]),
  );
  rows.forEach((input, index) => {
    const row = normaliseRow(input);
    const rowNumber = index + 1;
    if (!isFlatRowKind(row.kind)) {
      result.errors.push(
        new ImportRowError(rowNumber, `Unknown row kind: ${row.kind}`, 'kind', 'INVALID_KIND').toEntry(),
      );
      return;
    }
    buckets.get(row.kind)?.push({ row, rowNumber });
  });

  for (const kind of FLAT_ROW_KIND_ORDER) {
    for (const { row, rowNumber } of buckets.get(kind) ?? []) {
      let applied: AppliedRow;
      try {
        applied = await deps.uow.write((repos) => {
          switch (kind) {
            case FlatRowKind.PATIENT:
              return importPatientRow(repos, row, rowNumber);
            case FlatRowKind.EXAMINATION:
              return importExaminationRow(repos, ctx, row, rowNumber);
            case FlatRowKind.TOOTH_HISTORY:
              return importToothRow(repos, ctx, row, rowNumber);
            case FlatRowKind.VISIT:
              return importVisitRow(repos, ctx, row, rowNumber);
          }
        });
      } catch (err) {
        const rowError = toImportRowError(err, rowNumber, kind);
        deps.logger.warn(rowError.toEntry(), 'import row rejected');
        result.errors.push(rowError.toEntry());
        continue;
      }

      // References become visible to later rows only once the row committed
      if (applied.patientId !== undefined) {
        ctx.patients.set(row.phone, applied.patientId);
      }
      if (applied.examinationId !== undefined) {
        ctx.examinations.set(examinationKey(row.phone, row.examination_ref), applied.examinationId);
        ctx.claimed.add(applied.examinationId);
        if (applied.baseline) ctx.baselines.set(applied.examinationId, applied.baseline);
      }
      if (applied.consumed) consumePreexisting(ctx, applied.consumed);

      switch (applied.outcome) {
        case 'created':
          result.created++;
          break;
        case 'updated':
          result.updated++;
          break;
        case 'examinationCreated':
          result.examinationsCreated++;
          break;
        case 'toothRestored':
          result.teethRestored++;
          break;
        case 'visitRestored':
          result.visitsRestored++;
          break;
        case 'skipped':
          result.skipped++;
          break;
      }
    }
  }

  result.errors.sort((a, b) => a.row - b.row);

  deps.logger.info(
    {
      totalRows: result.totalRows,
      created: result.created,
      updated: result.updated,
      examinationsCreated: result.examinationsCreated,
      teethRestored: result.teethRestored,
      visitsRestored: result.visitsRestored,
      skipped: result.skipped,
      errors: result.errors.length,
    },
    'import completed',
  );
  return result;
}

/**
 * Maps a CSV header cell to an export column: exact column names first
 * (spaces read as underscores), then known aliases.
 */
export function mapImportHeader(header: string): FlatExportColumn | undefined {
  const lowered = header.trim().toLowerCase();
  const underscored = lowered.replace(/\s+/g, '_');
  const direct = FLAT_EXPORT_COLUMNS.find((c) => c === underscored);
  return direct ?? IMPORT_COLUMN_ALIASES.get(lowered);
}

/**
 * Parses CSV content (header row required) and imports it. Unknown columns
 * are ignored. Row numbers in errors count data rows from 1.
 */
export async function importCsv(
  deps: TransferServiceDeps,
  content: string,
): Promise<ImportResult> {
  const firstLine = content.split(/\r?\n/, 1)[0] ?? '';
  const [header, ...records] = parseCsvContent(content, detectDelimiter(firstLine));

  const columns = (header ?? []).map(mapImportHeader);
  if (!columns.includes('phone')) {
    return {
      totalRows: records.length,
      created: 0,
      updated: 0,
      examinationsCreated: 0,
      teethRestored: 0,
      visitsRestored: 0,
      skipped: 0,
      errors: [
        new ImportRowError(0, 'CSV header has no phone column', 'phone', 'MISSING_COLUMN').toEntry(),
      ],
    };
  }

  const rows = records.map((cells) => {
    const row: ImportInputRow = {};
    columns.forEach((column, i) => {
      if (column !== undefined && row[column] === undefined) row[column] = cells[i] ?? '';
    });
    return row;
  });

  return importRows(deps, rows);
}
