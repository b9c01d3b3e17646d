import { expect } from 'vitest';
import { type FastifyInstance } from 'fastify';
import { buildApp } from '../../src/server.js';
import {
  createInMemoryLedger,
  fixedClock,
  seedPatient,
  silentLogger,
  type InMemoryLedger,
} from './in-memory-ledger.js';

// ---------------------------------------------------------------------------
// App over an in-memory ledger, one patient seeded, clock at 2024-06-10
// ---------------------------------------------------------------------------

export interface LedgerApp {
  ledger: InMemoryLedger;
  app: FastifyInstance;
  patientId: number;
  examPath(examinationId: number, suffix?: string): string;
  createExam(body: Record<string, unknown>): Promise<number>;
}

export async function startLedgerApp(): Promise<LedgerApp> {
  const ledger = createInMemoryLedger();
  const app = await buildApp(
    {
      uow: ledger.uow,
      logger: silentLogger,
      historyPageSize: 2,
      now: fixedClock('2024-06-10'),
    },
    { logger: false },
  );
  await app.ready();
  const patientId = (await seedPatient(ledger, { fullName: 'Ana Diaz', phone: '0911000111' })).id;

  return {
    ledger,
    app,
    patientId,
    examPath(examinationId, suffix = '') {
      return `/api/v1/patients/${patientId}/examinations/${examinationId}${suffix}`;
    },
    async createExam(body) {
      const res = await app.inject({
        method: 'POST',
        url: `/api/v1/patients/${patientId}/examinations`,
        payload: body,
      });
      expect(res.statusCode).toBe(201);
      return res.json().data.id;
    },
  };
}
