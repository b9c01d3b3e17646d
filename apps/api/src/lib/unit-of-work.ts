import { type Database } from './db.js';
import { AppError, PersistenceError } from './errors.js';
import {
  createPatientRepository,
  type PatientRepository,
} from '../domains/patient/patient.repository.js';
import {
  createStatusRepository,
  type StatusRepository,
} from '../domains/status/status.repository.js';
import {
  createExaminationRepository,
  type ExaminationRepository,
} from '../domains/examination/examination.repository.js';
import {
  createToothHistoryRepository,
  type ToothHistoryRepository,
} from '../domains/tooth-history/tooth-history.repository.js';
import {
  createVisitRepository,
  type VisitRepository,
} from '../domains/visit/visit.repository.js';

// ---------------------------------------------------------------------------
// Repositories bound to one connection or transaction
// ---------------------------------------------------------------------------

export interface LedgerRepositories {
  patients: PatientRepository;
  statuses: StatusRepository;
  examinations: ExaminationRepository;
  toothHistory: ToothHistoryRepository;
  visits: VisitRepository;
}

export function createLedgerRepositories(db: Database): LedgerRepositories {
  return {
    patients: createPatientRepository(db),
    statuses: createStatusRepository(db),
    examinations: createExaminationRepository(db),
    toothHistory: createToothHistoryRepository(db),
    visits: createVisitRepository(db),
  };
}

// ---------------------------------------------------------------------------
// Unit of work
// ---------------------------------------------------------------------------

export type LedgerWork<T> = (repos: LedgerRepositories) => Promise<T>;

export interface UnitOfWork {
  /** Runs outside the write queue, on the shared pool. */
  read<T>(work: LedgerWork<T>): Promise<T>;
  /** Serialised with every other write and run in one transaction. */
  write<T>(work: LedgerWork<T>): Promise<T>;
}

/**
 * In-process FIFO for write transactions. A failed task rejects its own
 * promise and the next task still runs.
 */
export function createWriteQueue() {
  let tail: Promise<void> = Promise.resolve();

  return function enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = tail.then(task);
    tail = run.then(
      () => undefined,
      () => undefined, // reported to the caller through `run`
    );
    return run;
  };
}

/**
 * Domain errors pass through untouched; anything else from the storage layer
 * becomes a PersistenceError.
 */
export function toLedgerError(err: unknown, action: string): AppError {
  if (err instanceof AppError) return err;
  return new PersistenceError(`Failed to ${action}`, err);
}

export function createUnitOfWork(db: Database): UnitOfWork {
  const enqueue = createWriteQueue();
  const pooled = createLedgerRepositories(db);

  return {
    async read<T>(work: LedgerWork<T>): Promise<T> {
      try {
        return await work(pooled);
      } catch (err) {
        throw toLedgerError(err, 'read ledger');
      }
    },

    write<T>(work: LedgerWork<T>): Promise<T> {
      return enqueue(async () => {
        try {
          return await db.transaction(async (tx) => work(createLedgerRepositories(tx)));
        } catch (err) {
          throw toLedgerError(err, 'write ledger; transaction rolled back');
        }
      });
    },
  };
}
