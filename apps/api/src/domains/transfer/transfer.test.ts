import { describe, it, expect, beforeEach } from 'vitest';
import { FLAT_EXPORT_COLUMNS } from '@tooth-ledger/shared/constants/transfer.constants.js';
import {
  createInMemoryLedger,
  fixedClock,
  seedPatient,
  silentLogger,
  type InMemoryLedger,
} from '../../../test/helpers/in-memory-ledger.js';
import { createExamination } from '../examination/examination.service.js';
import { recordToothEntry } from '../tooth-history/tooth-history.service.js';
import { addVisit, getExaminationTotal } from '../visit/visit.service.js';
import {
  exportAllCsv,
  exportFlat,
  importCsv,
  importRows,
  mapImportHeader,
} from './transfer.service.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const clock = fixedClock('2024-06-10');

function depsFor(ledger: InMemoryLedger) {
  return {
    uow: ledger.uow,
    logger: silentLogger,
    historyPageSize: 50,
    now: clock,
  };
}

/**
 * Two patients; Ana has two examinations, Ben one. Examinations are created
 * patient by patient so ids follow file order on re-import.
 */
async function populate(ledger: InMemoryLedger) {
  const deps = depsFor(ledger);
  const ana = await seedPatient(ledger, {
    fullName: 'Ana Diaz',
    phone: '0911000111',
    email: 'ana@example.com',
    dateOfBirth: '1990-07-04',
  });
  const ben = await seedPatient(ledger, {
    fullName: 'Ben Okafor',
    phone: '0922000222',
    address: '12 Harbour Rd, Flat 3',
  });

  const first = await createExamination(deps, ana.id, {
    examinationDate: '2024-01-10',
    chiefComplaint: 'Pain upper left',
    notes: 'Line one\nLine two',
  });
  const second = await createExamination(deps, ana.id, {
    examinationDate: '2024-06-01',
    chiefComplaint: 'Check-up',
  });
  const third = await createExamination(deps, ben.id, {
    examinationDate: '2024-02-02',
    diagnosis: 'Gingivitis',
  });

  const anaFirst = { patientId: ana.id, examinationId: first.id };
  const anaSecond = { patientId: ana.id, examinationId: second.id };
  const benFirst = { patientId: ben.id, examinationId: third.id };

  await recordToothEntry(deps, anaFirst, {
    toothNumber: 11,
    recordType: 'patient_problem',
    statuses: ['toothache'],
  });
  await recordToothEntry(deps, anaFirst, {
    toothNumber: 11,
    recordType: 'doctor_finding',
    statuses: ['caries_deep', 'pulpitis'],
    description: 'Mesial, "deep"',
  });
  await recordToothEntry(deps, anaFirst, {
    toothNumber: 21,
    recordType: 'doctor_finding',
    statuses: ['missing'],
  });
  await recordToothEntry(deps, anaSecond, {
    toothNumber: 21,
    recordType: 'doctor_finding',
    statuses: ['normal'],
  });

  await addVisit(deps, anaFirst, {
    amountPaid: '120.5',
    treatmentPerformed: 'Root canal',
    affectedTeeth: [11],
    toothFindings: { statuses: ['root_canal'] },
  });
  await addVisit(deps, anaSecond, { amountPaid: 0 });
  await addVisit(deps, benFirst, { amountPaid: '35', advice: 'Floss daily' });

  return { ana, ben };
}

let source: InMemoryLedger;
let sourceDeps: ReturnType<typeof depsFor>;

beforeEach(() => {
  source = createInMemoryLedger();
  sourceDeps = depsFor(source);
});

// ---------------------------------------------------------------------------
// export
// ---------------------------------------------------------------------------

describe('exportFlat', () => {
  it('flattens a patient into patient, examination, tooth and visit rows', async () => {
    const { ana } = await populate(source);

    const rows = await exportFlat(sourceDeps, ana.id);

    expect(rows.map((r) => r.kind)).toEqual([
      'patient',
      'examination',
      'tooth_history',
      'tooth_history',
      'tooth_history',
      'tooth_history',
      'visit',
      'examination',
      'tooth_history',
      'visit',
    ]);
    expect(rows[0]).toMatchObject({
      phone: '0911000111',
      full_name: 'Ana Diaz',
      email: 'ana@example.com',
      address: '',
      date_of_birth: '1990-07-04',
    });
    expect(rows[1]).toMatchObject({
      examination_ref: '1',
      examination_date: '2024-01-10',
      chief_complaint: 'Pain upper left',
    });
    expect(rows[3]).toMatchObject({
      examination_ref: '1',
      tooth_number: '11',
      record_type: 'doctor_finding',
      statuses: 'caries_deep|pulpitis',
      description: 'Mesial, "deep"',
      date_recorded: '2024-06-10',
    });
    expect(rows[5]).toMatchObject({
      tooth_number: '11',
      statuses: 'root_canal',
      description: 'Root canal',
    });
    expect(rows[6]).toMatchObject({
      examination_ref: '1',
      visit_date: '2024-06-10',
      amount_paid: '120.50',
      treatment_performed: 'Root canal',
      affected_teeth: '11',
    });
    expect(rows[8]).toMatchObject({ examination_ref: '2', statuses: 'normal' });
  });

  it('returns NOT_FOUND for an unknown patient', async () => {
    await expect(exportFlat(sourceDeps, 42)).rejects.toMatchObject({
      statusCode: 404,
      message: 'Patient not found',
    });
  });
});

describe('exportAllCsv', () => {
  it('writes the column header first', async () => {
    const csv = await exportAllCsv(sourceDeps);
    expect(csv).toBe(`${FLAT_EXPORT_COLUMNS.join(',')}\n`);
  });
});

// ---------------------------------------------------------------------------
// import
// ---------------------------------------------------------------------------

describe('importCsv', () => {
  it('restores an export into an empty ledger', async () => {
    await populate(source);
    const csv = await exportAllCsv(sourceDeps);

    const target = createInMemoryLedger();
    const targetDeps = depsFor(target);
    const result = await importCsv(targetDeps, csv);

    expect(result).toEqual({
      totalRows: 13,
      created: 2,
      updated: 0,
      examinationsCreated: 3,
      teethRestored: 5,
      visitsRestored: 3,
      skipped: 0,
      errors: [],
    });
    expect(await exportAllCsv(targetDeps)).toBe(csv);
  });

  it('skips everything when the same file is imported again', async () => {
    await populate(source);
    const csv = await exportAllCsv(sourceDeps);

    const result = await importCsv(sourceDeps, csv);

    expect(result).toMatchObject({
      totalRows: 13,
      created: 0,
      updated: 0,
      examinationsCreated: 0,
      teethRestored: 0,
      visitsRestored: 0,
      skipped: 13,
      errors: [],
    });
    expect(await exportAllCsv(sourceDeps)).toBe(csv);
  });

  it('matches patients by phone and reads older patient-only headers', async () => {
    await seedPatient(source);
    const content = [
      'Phone Number;Name;Email',
      '0900000001;Test Patient Updated;new@example.com',
      '0900000003;New Person;',
      '0900000004;;',
      '',
    ].join('\n');

    const result = await importCsv(sourceDeps, content);

    expect(result).toMatchObject({ totalRows: 3, created: 1, updated: 1, skipped: 0 });
    expect(result.errors).toEqual([
      { row: 3, field: 'full_name', code: 'INVALID_FIELD', message: expect.any(String) },
    ]);
    expect(source.tables().patients.map((p) => [p.phone, p.fullName, p.email])).toEqual([
      ['0900000001', 'Test Patient Updated', 'new@example.com'],
      ['0900000003', 'New Person', null],
    ]);
  });

  it('keeps repeated identical entries and visits of one examination', async () => {
    const ana = await seedPatient(source, { fullName: 'Ana Diaz', phone: '0911000111' });
    const exam = await createExamination(sourceDeps, ana.id, {
      examinationDate: '2024-06-01',
      chiefComplaint: 'Toothache',
    });
    const scope = { patientId: ana.id, examinationId: exam.id };
    for (let i = 0; i < 2; i += 1) {
      await recordToothEntry(sourceDeps, scope, {
        toothNumber: 11,
        recordType: 'patient_problem',
        statuses: ['toothache'],
      });
      await addVisit(sourceDeps, scope, { visitDate: '2024-06-02', amountPaid: 50 });
    }
    const csv = await exportAllCsv(sourceDeps);

    const target = createInMemoryLedger();
    const targetDeps = depsFor(target);
    const result = await importCsv(targetDeps, csv);

    expect(result).toMatchObject({
      totalRows: 6,
      examinationsCreated: 1,
      teethRestored: 2,
      visitsRestored: 2,
      skipped: 0,
      errors: [],
    });
    expect(await getExaminationTotal(targetDeps, { patientId: 1, examinationId: 1 })).toBe('100.00');
    expect(await exportAllCsv(targetDeps)).toBe(csv);
  });

  it('adds only the copies a matched examination does not already hold', async () => {
    const ana = await seedPatient(source, { fullName: 'Ana Diaz', phone: '0911000111' });
    const exam = await createExamination(sourceDeps, ana.id, {
      examinationDate: '2024-06-01',
      chiefComplaint: 'Toothache',
    });
    const scope = { patientId: ana.id, examinationId: exam.id };
    await addVisit(sourceDeps, scope, { visitDate: '2024-06-02', amountPaid: 50 });

    const result = await importRows(sourceDeps, [
      { kind: 'patient', phone: '0911000111', full_name: 'Ana Diaz' },
      {
        kind: 'examination',
        phone: '0911000111',
        examination_ref: 'E1',
        examination_date: '2024-06-01',
        chief_complaint: 'Toothache',
      },
      { kind: 'visit', phone: '0911000111', examination_ref: 'E1', visit_date: '2024-06-02', amount_paid: '50' },
      { kind: 'visit', phone: '0911000111', examination_ref: 'E1', visit_date: '2024-06-02', amount_paid: '50.00' },
    ]);

    expect(result).toMatchObject({ examinationsCreated: 0, visitsRestored: 1, skipped: 3, errors: [] });
    expect(await getExaminationTotal(sourceDeps, scope)).toBe('100.00');
  });

  it('keeps same-day examinations apart when only their findings differ', async () => {
    const ana = await seedPatient(source, { fullName: 'Ana Diaz', phone: '0911000111' });
    const fracture = await createExamination(sourceDeps, ana.id, {
      examinationDate: '2024-06-01',
      findings: 'Fracture 21',
    });
    const abscess = await createExamination(sourceDeps, ana.id, {
      examinationDate: '2024-06-01',
      findings: 'Abscess 36',
    });
    await recordToothEntry(sourceDeps, { patientId: ana.id, examinationId: fracture.id }, {
      toothNumber: 21,
      recordType: 'doctor_finding',
      statuses: ['fracture'],
    });
    await recordToothEntry(sourceDeps, { patientId: ana.id, examinationId: abscess.id }, {
      toothNumber: 36,
      recordType: 'doctor_finding',
      statuses: ['abscess'],
    });
    const csv = await exportAllCsv(sourceDeps);

    const target = createInMemoryLedger();
    const targetDeps = depsFor(target);
    const result = await importCsv(targetDeps, csv);

    expect(result).toMatchObject({ examinationsCreated: 2, teethRestored: 2, skipped: 0, errors: [] });
    const tables = target.tables();
    expect(tables.examinations.map((e) => [e.id, e.findings])).toEqual([
      [1, 'Fracture 21'],
      [2, 'Abscess 36'],
    ]);
    expect(tables.toothHistory.map((e) => [e.toothNumber, e.examinationId])).toEqual([
      [21, 1],
      [36, 2],
    ]);

    const again = await importCsv(targetDeps, csv);
    expect(again).toMatchObject({ examinationsCreated: 0, teethRestored: 0, skipped: 5 });
  });

  it('never binds two references of one file to the same examination', async () => {
    const ana = await seedPatient(source, { fullName: 'Ana Diaz', phone: '0911000111' });
    await createExamination(sourceDeps, ana.id, {
      examinationDate: '2024-06-01',
      chiefComplaint: 'Check-up',
    });
    const exam = (ref: string) => ({
      kind: 'examination',
      phone: '0911000111',
      examination_ref: ref,
      examination_date: '2024-06-01',
      chief_complaint: 'Check-up',
    });

    const result = await importRows(sourceDeps, [exam('E1'), exam('E2')]);

    expect(result).toMatchObject({ examinationsCreated: 1, skipped: 1, errors: [] });
    expect(source.tables().examinations.map((e) => e.id)).toEqual([1, 2]);
  });

  it('reports a missing phone column without importing', async () => {
    const result = await importCsv(sourceDeps, 'name,email\nAna,ana@example.com\n');

    expect(result).toEqual({
      totalRows: 1,
      created: 0,
      updated: 0,
      examinationsCreated: 0,
      teethRestored: 0,
      visitsRestored: 0,
      skipped: 0,
      errors: [
        { row: 0, field: 'phone', code: 'MISSING_COLUMN', message: 'CSV header has no phone column' },
      ],
    });
  });
});

describe('importRows', () => {
  it('applies rows by kind, collecting per-row errors', async () => {
    const result = await importRows(sourceDeps, [
      {
        kind: 'visit',
        phone: '0911',
        examination_ref: 'A',
        visit_date: '2024-03-16',
        amount_paid: '45.5',
        affected_teeth: '27|2.6',
      },
      { kind: 'patient', phone: '0911', full_name: 'Ana Diaz' },
      {
        kind: 'examination',
        phone: '0911',
        examination_ref: 'A',
        examination_date: '15/03/2024',
        chief_complaint: 'Pain',
      },
      {
        kind: 'tooth_history',
        phone: '0911',
        examination_ref: 'A',
        tooth_number: '2.6',
        record_type: 'doctor_finding',
        statuses: 'caries_deep|pulpitis',
        date_recorded: '2024-03-15',
      },
      {
        kind: 'tooth_history',
        phone: '0911',
        examination_ref: 'A',
        tooth_number: '19',
        record_type: 'doctor_finding',
        statuses: 'filling',
      },
      {
        kind: 'tooth_history',
        phone: '0911',
        examination_ref: 'B',
        tooth_number: '11',
        record_type: 'patient_problem',
        statuses: 'toothache',
      },
      { kind: 'visit', phone: '0911', examination_ref: 'A', amount_paid: '-1' },
      {
        kind: 'examination',
        phone: '0999',
        examination_ref: 'Z',
        examination_date: '2024-03-01',
        chief_complaint: 'Pain',
      },
      { kind: 'appointment', phone: '0911' },
      {
        kind: 'tooth_history',
        phone: '0911',
        examination_ref: 'A',
        tooth_number: '11',
        record_type: 'doctor_finding',
        statuses: 'sparkly',
      },
    ]);

    expect(result).toMatchObject({
      totalRows: 10,
      created: 1,
      updated: 0,
      examinationsCreated: 1,
      teethRestored: 1,
      visitsRestored: 1,
      skipped: 0,
    });
    expect(result.errors).toEqual([
      {
        row: 5,
        field: 'tooth_number',
        code: 'INVALID_TOOTH',
        message: 'Invalid tooth number: 19',
      },
      {
        row: 6,
        field: 'examination_ref',
        code: 'UNKNOWN_EXAMINATION',
        message: 'No examination row with reference B for phone 0911',
      },
      {
        row: 7,
        field: 'amount_paid',
        code: 'VALIDATION_ERROR',
        message: 'amount_paid must be a non-negative amount with at most two decimals',
      },
      {
        row: 8,
        field: 'phone',
        code: 'UNKNOWN_PATIENT',
        message: 'No patient with phone 0999',
      },
      { row: 9, field: 'kind', code: 'INVALID_KIND', message: 'Unknown row kind: appointment' },
      {
        row: 10,
        field: 'statuses',
        code: 'UNKNOWN_STATUS',
        message: 'Unknown or inactive status: sparkly',
      },
    ]);

    const tables = source.tables();
    expect(tables.examinations[0].examinationDate).toBe('2024-03-15');
    expect(tables.toothHistory.map((e) => [e.toothNumber, e.statuses])).toEqual([
      [26, ['caries_deep', 'pulpitis']],
    ]);
    expect(tables.visits.map((v) => [v.amountPaid, v.affectedTeeth])).toEqual([
      ['45.50', [26, 27]],
    ]);
  });
  it('validates the cells that update an existing patient', async () => {
    await seedPatient(source, { phone: '0933', email: 'kept@example.com' });

    const result = await importRows(sourceDeps, [
      { kind: 'patient', phone: '0933', email: 'not an email' },
    ]);

    expect(result).toMatchObject({ updated: 0, skipped: 0 });
    expect(result.errors).toEqual([
      { row: 1, field: 'email', code: 'INVALID_FIELD', message: expect.any(String) },
    ]);
    expect(source.tables().patients[0].email).toBe('kept@example.com');
  });
});

describe('mapImportHeader', () => {
  it.each([
    ['Phone', 'phone'],
    ['Phone Number', 'phone'],
    ['Full Name', 'full_name'],
    ['DOB', 'date_of_birth'],
    ['Amount', 'amount_paid'],
    ['Treatment Performed', 'treatment_performed'],
  ])('maps %s to %s', (header, column) => {
    expect(mapImportHeader(header)).toBe(column);
  });

  it('ignores unknown headers', () => {
    expect(mapImportHeader('Insurance')).toBeUndefined();
  });

  it('ignores headers named like object members', () => {
    expect(mapImportHeader('constructor')).toBeUndefined();
    expect(mapImportHeader('toString')).toBeUndefined();
  });
});
