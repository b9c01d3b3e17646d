import {
  BUILTIN_STATUSES,
  DEFAULT_STATUS_CODE,
  FALLBACK_STATUS_COLOR,
  STATUS_CATEGORIES,
  STATUS_CATEGORY_LABELS,
  STATUS_CODE_PATTERN,
  STATUS_COLOR_PATTERN,
  StatusCategory,
  type BuiltInStatus,
} from '@tooth-ledger/shared/constants/status.constants.js';
import { type SelectCustomStatus } from '@tooth-ledger/shared/schemas/db/status.schema.js';
import {
  DuplicateStatusError,
  NotFoundError,
  UnknownStatusError,
  ValidationError,
} from '../../lib/errors.js';
import { type LedgerLogger } from '../../lib/logger.js';
import { type UnitOfWork } from '../../lib/unit-of-work.js';
import { type StatusRepository, type CustomStatusChanges } from './status.repository.js';

// ---------------------------------------------------------------------------
// Dependency interfaces
// ---------------------------------------------------------------------------

export interface StatusServiceDeps {
  uow: UnitOfWork;
  logger: LedgerLogger;
}

// ---------------------------------------------------------------------------
// Output types
// ---------------------------------------------------------------------------

export interface StatusDescriptor {
  code: string;
  displayName: string;
  color: string;
  category: StatusCategory;
  builtIn: boolean;
  isActive: boolean;
}

export interface StatusGroup {
  category: StatusCategory;
  label: string;
  statuses: StatusDescriptor[];
}

// ---------------------------------------------------------------------------
// Input types
// ---------------------------------------------------------------------------

export interface RegisterCustomStatusInput {
  code: string;
  displayName: string;
  color: string;
  category?: StatusCategory;
}

export interface UpdateCustomStatusInput {
  displayName?: string;
  color?: string;
  category?: StatusCategory;
  isActive?: boolean;
}

// ---------------------------------------------------------------------------
// Built-in catalogue
// ---------------------------------------------------------------------------

const BUILTIN_BY_CODE: ReadonlyMap<string, BuiltInStatus> = new Map(
  BUILTIN_STATUSES.map((s) => [s.code, s]),
);

export function normaliseStatusCode(code: string): string {
  return code.trim().toLowerCase();
}

export function isBuiltInStatus(code: string): boolean {
  return BUILTIN_BY_CODE.has(normaliseStatusCode(code));
}

function toCategory(value: string): StatusCategory {
  return STATUS_CATEGORIES.find((c) => c === value) ?? StatusCategory.OTHER;
}

function fromBuiltIn(status: BuiltInStatus): StatusDescriptor {
  return {
    code: status.code,
    displayName: status.displayName,
    color: status.color,
    category: status.category,
    builtIn: true,
    isActive: true,
  };
}

function fromCustom(row: SelectCustomStatus): StatusDescriptor {
  return {
    code: row.code,
    displayName: row.displayName,
    color: row.color,
    category: toCategory(row.category),
    builtIn: false,
    isActive: row.isActive,
  };
}

// ---------------------------------------------------------------------------
// Repository-level helpers (usable inside a unit of work)
// ---------------------------------------------------------------------------

/**
 * Built-in, or an active custom status. Anything else is UNKNOWN_STATUS.
 */
export async function resolveStatusWith(
  repo: StatusRepository,
  code: string,
): Promise<StatusDescriptor> {
  const normalised = normaliseStatusCode(code);
  const builtIn = BUILTIN_BY_CODE.get(normalised);
  if (builtIn) return fromBuiltIn(builtIn);

  const custom = await repo.findCustomByCode(normalised);
  if (!custom || !custom.isActive) {
    throw new UnknownStatusError(code);
  }
  return fromCustom(custom);
}

/**
 * Write-boundary check for a status list: trims and lower-cases, drops
 * repeats (first occurrence wins), then resolves each code.
 */
export async function resolveStatusCodes(
  repo: StatusRepository,
  codes: readonly string[],
): Promise<string[]> {
  const normalised: string[] = [];
  for (const code of codes) {
    const value = normaliseStatusCode(code);
    if (value === '') {
      throw new ValidationError('Status codes must not be blank');
    }
    if (!normalised.includes(value)) normalised.push(value);
  }

  if (normalised.length === 0) {
    throw new ValidationError('At least one status is required');
  }
  if (normalised.length > 1 && normalised.includes(DEFAULT_STATUS_CODE)) {
    throw new ValidationError(
      `'${DEFAULT_STATUS_CODE}' cannot be combined with other statuses`,
      { statuses: normalised },
    );
  }

  for (const code of normalised) {
    await resolveStatusWith(repo, code);
  }
  return normalised;
}

// ---------------------------------------------------------------------------
// Service: resolve / describe
// ---------------------------------------------------------------------------

export async function resolveStatus(
  deps: StatusServiceDeps,
  code: string,
): Promise<StatusDescriptor> {
  return deps.uow.read((repos) => resolveStatusWith(repos.statuses, code));
}

/**
 * For rendering stored entries: answers for inactive customs too, and falls
 * back to the raw code in grey for anything the registry no longer knows.
 */
export async function describeStatus(
  deps: StatusServiceDeps,
  code: string,
): Promise<StatusDescriptor> {
  const normalised = normaliseStatusCode(code);
  const builtIn = BUILTIN_BY_CODE.get(normalised);
  if (builtIn) return fromBuiltIn(builtIn);

  const custom = await deps.uow.read((repos) => repos.statuses.findCustomByCode(normalised));
  if (custom) return fromCustom(custom);

  return {
    code,
    displayName: code,
    color: FALLBACK_STATUS_COLOR,
    category: StatusCategory.OTHER,
    builtIn: false,
    isActive: false,
  };
}

// ---------------------------------------------------------------------------
// Service: listings
// ---------------------------------------------------------------------------

/**
 * Active statuses for selection, grouped by clinical category in display
 * order. Built-ins keep catalogue order; customs follow by display name.
 */
export async function listActiveStatuses(
  deps: StatusServiceDeps,
): Promise<StatusGroup[]> {
  const customs = await deps.uow.read((repos) => repos.statuses.listActiveCustom());

  return STATUS_CATEGORIES.map((category) => {
    const builtIns = BUILTIN_STATUSES.filter((s) => s.category === category).map(fromBuiltIn);
    const extra = customs
      .map(fromCustom)
      .filter((s) => s.category === category)
      .sort((a, b) => a.displayName.localeCompare(b.displayName));

    return {
      category,
      label: STATUS_CATEGORY_LABELS[category],
      statuses: [...builtIns, ...extra],
    };
  });
}

export async function listCustomStatuses(
  deps: StatusServiceDeps,
): Promise<StatusDescriptor[]> {
  const rows = await deps.uow.read((repos) => repos.statuses.listCustom());
  return rows.map(fromCustom);
}

// ---------------------------------------------------------------------------
// Service: registerCustom
// ---------------------------------------------------------------------------

export async function registerCustomStatus(
  deps: StatusServiceDeps,
  input: RegisterCustomStatusInput,
): Promise<StatusDescriptor> {
  const code = normaliseStatusCode(input.code);
  if (!STATUS_CODE_PATTERN.test(code)) {
    throw new ValidationError(
      'Status code must start with a letter and use lower-case letters, digits and underscores',
      { field: 'code' },
    );
  }
  if (!STATUS_COLOR_PATTERN.test(input.color)) {
    throw new ValidationError('Colour must be #RRGGBB', { field: 'color' });
  }
  const displayName = input.displayName.trim();
  if (displayName === '') {
    throw new ValidationError('Display name is required', { field: 'display_name' });
  }

  const created = await deps.uow.write(async (repos) => {
    if (BUILTIN_BY_CODE.has(code)) {
      throw new DuplicateStatusError(code);
    }
    const existing = await repos.statuses.findCustomByCode(code);
    if (existing) {
      throw new DuplicateStatusError(code);
    }
    return repos.statuses.createCustom({
      code,
      displayName,
      color: input.color.toUpperCase(),
      category: input.category ?? StatusCategory.OTHER,
      isActive: true,
    });
  });

  deps.logger.info({ statusCode: created.code, category: created.category }, 'custom status registered');
  return fromCustom(created);
}

// ---------------------------------------------------------------------------
// Service: updateCustom / setActive
// ---------------------------------------------------------------------------

export async function updateCustomStatus(
  deps: StatusServiceDeps,
  code: string,
  input: UpdateCustomStatusInput,
): Promise<StatusDescriptor> {
  const normalised = normaliseStatusCode(code);
  if (BUILTIN_BY_CODE.has(normalised)) {
    throw new ValidationError('Built-in statuses cannot be modified', { status: normalised });
  }

  const changes: CustomStatusChanges = {};
  if (input.displayName !== undefined) {
    const displayName = input.displayName.trim();
    if (displayName === '') {
      throw new ValidationError('Display name is required', { field: 'display_name' });
    }
    changes.displayName = displayName;
  }
  if (input.color !== undefined) {
    if (!STATUS_COLOR_PATTERN.test(input.color)) {
      throw new ValidationError('Colour must be #RRGGBB', { field: 'color' });
    }
    changes.color = input.color.toUpperCase();
  }
  if (input.category !== undefined) changes.category = input.category;
  if (input.isActive !== undefined) changes.isActive = input.isActive;

  const updated = await deps.uow.write(async (repos) => {
    const row = await repos.statuses.updateCustom(normalised, changes);
    if (!row) throw new NotFoundError('Custom status');
    return row;
  });

  deps.logger.info({ statusCode: updated.code, changes }, 'custom status updated');
  return fromCustom(updated);
}

/**
 * Deactivated statuses disappear from selection and from resolve; stored
 * entries that use them are untouched.
 */
export async function setCustomStatusActive(
  deps: StatusServiceDeps,
  code: string,
  isActive: boolean,
): Promise<StatusDescriptor> {
  return updateCustomStatus(deps, code, { isActive });
}
