import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { startLedgerApp, type LedgerApp } from '../../helpers/ledger-app.js';

let ctx: LedgerApp;

beforeEach(async () => {
  ctx = await startLedgerApp();
});

afterEach(async () => {
  await ctx.app.close();
});

describe('transfer routes', () => {
  it('exports a patient as CSV and imports it back unchanged', async () => {
    const { app, patientId, examPath, createExam } = ctx;
    const examId = await createExam({ examination_date: '2024-06-01', chief_complaint: 'Pain' });
    await app.inject({
      method: 'POST',
      url: examPath(examId, '/teeth/21/entries'),
      payload: { record_type: 'doctor_finding', statuses: ['missing'] },
    });

    const exported = await app.inject({
      method: 'GET',
      url: `/api/v1/patients/${patientId}/export`,
    });
    expect(exported.statusCode).toBe(200);
    expect(exported.headers['content-type']).toBe('text/csv; charset=utf-8');
    expect(exported.headers['content-disposition']).toBe(
      `attachment; filename="tooth-ledger-export-patient-${patientId}-2024-06-10.csv"`,
    );

    const imported = await app.inject({
      method: 'POST',
      url: '/api/v1/import',
      payload: { content: exported.body },
    });
    expect(imported.statusCode).toBe(200);
    expect(imported.json().data).toMatchObject({ totalRows: 3, skipped: 3, errors: [] });
  });

  it('returns 404 when exporting an unknown patient', async () => {
    const res = await ctx.app.inject({ method: 'GET', url: '/api/v1/patients/999/export' });
    expect(res.statusCode).toBe(404);
    expect(res.json().error.code).toBe('NOT_FOUND');
  });
});
