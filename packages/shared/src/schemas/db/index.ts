// Barrel export for Drizzle DB schemas
export { patients } from './patient.schema.js';
export type { InsertPatient, SelectPatient } from './patient.schema.js';

export { customStatuses } from './status.schema.js';
export type {
  InsertCustomStatus,
  SelectCustomStatus,
} from './status.schema.js';

export { examinations } from './examination.schema.js';
export type {
  InsertExamination,
  SelectExamination,
} from './examination.schema.js';

export { toothHistoryEntries } from './tooth-history.schema.js';
export type {
  InsertToothHistoryEntry,
  SelectToothHistoryEntry,
} from './tooth-history.schema.js';

export { visitRecords } from './visit.schema.js';
export type {
  InsertVisitRecord,
  SelectVisitRecord,
} from './visit.schema.js';
