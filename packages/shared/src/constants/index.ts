export {
  RecordType,
  RECORD_TYPES,
  Quadrant,
  QUADRANT_LABELS,
  TEETH_PER_QUADRANT,
  TOOTH_NUMBERS,
  RECENT_HISTORY_WINDOW_DAYS,
} from './tooth.constants.js';

export {
  StatusCategory,
  STATUS_CATEGORIES,
  STATUS_CATEGORY_LABELS,
  DEFAULT_STATUS_CODE,
  FALLBACK_STATUS_COLOR,
  STATUS_CODE_PATTERN,
  STATUS_COLOR_PATTERN,
  BUILTIN_STATUSES,
} from './status.constants.js';
export type { BuiltInStatus } from './status.constants.js';

export {
  FlatRowKind,
  FLAT_ROW_KIND_ORDER,
  FLAT_EXPORT_COLUMNS,
  LIST_SEPARATOR,
  IMPORT_COLUMN_ALIASES,
  EXPORT_FILE_PREFIX,
} from './transfer.constants.js';
export type { FlatExportColumn } from './transfer.constants.js';
