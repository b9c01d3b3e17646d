import { RECENT_HISTORY_WINDOW_DAYS } from '@tooth-ledger/shared/constants/tooth.constants.js';
import {
  type InsertExamination,
  type SelectExamination,
} from '@tooth-ledger/shared/schemas/db/examination.schema.js';
import { addDays, isIsoDate, toIsoDate } from '@tooth-ledger/shared/utils/date.utils.js';
import { ConflictError, NotFoundError, ScopeViolationError, ValidationError } from '../../lib/errors.js';
import { type LedgerLogger } from '../../lib/logger.js';
import { type LedgerRepositories, type UnitOfWork } from '../../lib/unit-of-work.js';
import { type ExaminationChanges } from './examination.repository.js';

// ---------------------------------------------------------------------------
// Dependency interfaces
// ---------------------------------------------------------------------------

export interface ExaminationServiceDeps {
  uow: UnitOfWork;
  logger: LedgerLogger;
  /** Clock for default dates. */
  now?: () => Date;
}

// ---------------------------------------------------------------------------
// Scope
// ---------------------------------------------------------------------------

/**
 * The explicit (patient, examination) pair every ledger call runs under.
 * Switching examinations means passing a different value; nothing is stored.
 */
export interface LedgerScope {
  patientId: number;
  examinationId: number;
}

// ---------------------------------------------------------------------------
// Input types
// ---------------------------------------------------------------------------

export interface ExaminationInput {
  examinationDate?: string;
  chiefComplaint?: string;
  findings?: string;
  diagnosis?: string;
  treatmentPlan?: string;
  notes?: string;
}

export interface ExaminationStatistics {
  patientId: number;
  asOf: string;
  totalExaminations: number;
  recentSince: string;
  recentExaminations: number;
}

interface ExaminationText {
  chiefComplaint: string;
  findings: string;
  diagnosis: string;
  treatmentPlan: string;
  notes: string;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * A record needs a chief complaint or at least one other descriptive field.
 */
function assertHasContent(text: ExaminationText): void {
  const hasDetails = [text.findings, text.diagnosis, text.treatmentPlan, text.notes].some(
    (v) => v.trim() !== '',
  );
  if (text.chiefComplaint.trim() === '' && !hasDetails) {
    throw new ValidationError(
      'Examination needs a chief complaint or at least one of findings, diagnosis, treatment plan or notes',
    );
  }
}

function assertDate(value: string, field: string): void {
  if (!isIsoDate(value)) {
    throw new ValidationError(`${field} must be a valid YYYY-MM-DD date`, { field });
  }
}

async function assertPatientExists(repos: LedgerRepositories, patientId: number): Promise<void> {
  const patient = await repos.patients.findById(patientId);
  if (!patient) throw new NotFoundError('Patient');
}

/**
 * Loads the scoped examination and checks it belongs to the scoped patient.
 */
export async function assertExaminationScope(
  repos: LedgerRepositories,
  scope: LedgerScope,
): Promise<SelectExamination> {
  const examination = await repos.examinations.findById(scope.examinationId);
  if (!examination) throw new NotFoundError('Examination');
  if (examination.patientId !== scope.patientId) {
    throw new ScopeViolationError(scope.examinationId, scope.patientId);
  }
  return examination;
}

// ---------------------------------------------------------------------------
// Service: create
// ---------------------------------------------------------------------------

/**
 * Trims and validates an examination for insertion. The date defaults to
 * `today`.
 */
export function prepareExamination(
  patientId: number,
  input: ExaminationInput,
  today: string,
): InsertExamination {
  const text: ExaminationText = {
    chiefComplaint: (input.chiefComplaint ?? '').trim(),
    findings: (input.findings ?? '').trim(),
    diagnosis: (input.diagnosis ?? '').trim(),
    treatmentPlan: (input.treatmentPlan ?? '').trim(),
    notes: (input.notes ?? '').trim(),
  };
  assertHasContent(text);

  const examinationDate = input.examinationDate ?? today;
  assertDate(examinationDate, 'examination_date');

  return { patientId, examinationDate, ...text };
}

export async function createExamination(
  deps: ExaminationServiceDeps,
  patientId: number,
  input: ExaminationInput,
): Promise<SelectExamination> {
  const record = prepareExamination(patientId, input, toIsoDate(deps.now?.()));

  const examination = await deps.uow.write(async (repos) => {
    await assertPatientExists(repos, patientId);
    return repos.examinations.create(record);
  });

  deps.logger.info(
    { patientId, examinationId: examination.id, examinationDate: examination.examinationDate },
    'examination created',
  );
  return examination;
}

// ---------------------------------------------------------------------------
// Service: queries
// ---------------------------------------------------------------------------

/**
 * Latest examination_date, ties broken by highest id. Null when the patient
 * has none.
 */
export async function getCurrentExamination(
  deps: ExaminationServiceDeps,
  patientId: number,
): Promise<SelectExamination | null> {
  return deps.uow.read(async (repos) => {
    await assertPatientExists(repos, patientId);
    const latest = await repos.examinations.findLatestForPatient(patientId);
    return latest ?? null;
  });
}

export async function listExaminations(
  deps: ExaminationServiceDeps,
  patientId: number,
): Promise<SelectExamination[]> {
  return deps.uow.read(async (repos) => {
    await assertPatientExists(repos, patientId);
    return repos.examinations.listForPatient(patientId);
  });
}

export async function getExamination(
  deps: ExaminationServiceDeps,
  scope: LedgerScope,
): Promise<SelectExamination> {
  return deps.uow.read((repos) => assertExaminationScope(repos, scope));
}

/**
 * Explicit examination id, or the patient's current examination when omitted.
 */
export async function resolveScope(
  deps: ExaminationServiceDeps,
  patientId: number,
  examinationId?: number,
): Promise<LedgerScope> {
  return deps.uow.read(async (repos) => {
    if (examinationId !== undefined) {
      await assertExaminationScope(repos, { patientId, examinationId });
      return { patientId, examinationId };
    }
    await assertPatientExists(repos, patientId);
    const current = await repos.examinations.findLatestForPatient(patientId);
    if (!current) throw new NotFoundError('Examination');
    return { patientId, examinationId: current.id };
  });
}

// ---------------------------------------------------------------------------
// Service: statistics
// ---------------------------------------------------------------------------

/**
 * Examination count for the patient, plus those dated inside the trailing
 * window ending on `asOf`.
 */
export async function getExaminationStatistics(
  deps: ExaminationServiceDeps,
  patientId: number,
  asOf?: string,
): Promise<ExaminationStatistics> {
  const today = asOf ?? toIsoDate(deps.now?.());
  if (!isIsoDate(today)) {
    throw new ValidationError('as_of must be a valid YYYY-MM-DD date', { field: 'as_of' });
  }
  const recentSince = addDays(today, -RECENT_HISTORY_WINDOW_DAYS);

  return deps.uow.read(async (repos) => {
    await assertPatientExists(repos, patientId);
    return {
      patientId,
      asOf: today,
      totalExaminations: await repos.examinations.countForPatient(patientId),
      recentSince,
      recentExaminations: await repos.examinations.countForPatient(patientId, recentSince),
    };
  });
}

// ---------------------------------------------------------------------------
// Service: update / delete
// ---------------------------------------------------------------------------

export async function updateExamination(
  deps: ExaminationServiceDeps,
  scope: LedgerScope,
  input: ExaminationInput,
): Promise<SelectExamination> {
  const changes: ExaminationChanges = {};
  if (input.examinationDate !== undefined) {
    assertDate(input.examinationDate, 'examination_date');
    changes.examinationDate = input.examinationDate;
  }
  if (input.chiefComplaint !== undefined) changes.chiefComplaint = input.chiefComplaint.trim();
  if (input.findings !== undefined) changes.findings = input.findings.trim();
  if (input.diagnosis !== undefined) changes.diagnosis = input.diagnosis.trim();
  if (input.treatmentPlan !== undefined) changes.treatmentPlan = input.treatmentPlan.trim();
  if (input.notes !== undefined) changes.notes = input.notes.trim();

  const updated = await deps.uow.write(async (repos) => {
    const current = await assertExaminationScope(repos, scope);
    assertHasContent({
      chiefComplaint: changes.chiefComplaint ?? current.chiefComplaint,
      findings: changes.findings ?? current.findings,
      diagnosis: changes.diagnosis ?? current.diagnosis,
      treatmentPlan: changes.treatmentPlan ?? current.treatmentPlan,
      notes: changes.notes ?? current.notes,
    });
    const row = await repos.examinations.update(scope.examinationId, changes);
    if (!row) throw new NotFoundError('Examination');
    return row;
  });

  deps.logger.info(
    { ...scope, fields: Object.keys(changes) },
    'examination updated',
  );
  return updated;
}

/**
 * Only an examination with no tooth history and no visits can be deleted.
 */
export async function deleteExamination(
  deps: ExaminationServiceDeps,
  scope: LedgerScope,
): Promise<void> {
  await deps.uow.write(async (repos) => {
    await assertExaminationScope(repos, scope);
    const children = await repos.examinations.countChildren(scope.examinationId);
    if (children.toothHistoryEntries > 0 || children.visitRecords > 0) {
      throw new ConflictError(
        'Examination has recorded tooth history or visits and cannot be deleted',
        children,
      );
    }
    await repos.examinations.delete(scope.examinationId);
  });

  deps.logger.info({ ...scope }, 'examination deleted');
}
