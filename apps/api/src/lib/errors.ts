export class AppError extends Error {
  constructor(
    public statusCode: number,
    public code: string,
    message: string,
    public details?: unknown
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(400, 'VALIDATION_ERROR', message, details);
  }
}

export class InvalidToothError extends AppError {
  constructor(toothNumber: number | string) {
    super(400, 'INVALID_TOOTH', `Invalid tooth number: ${toothNumber}`, {
      toothNumber,
    });
  }
}

export class UnknownStatusError extends AppError {
  constructor(code: string) {
    super(400, 'UNKNOWN_STATUS', `Unknown or inactive status: ${code}`, {
      status: code,
    });
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string) {
    super(404, 'NOT_FOUND', `${resource} not found`);
  }
}

export class ConflictError extends AppError {
  constructor(message: string, details?: unknown) {
    super(409, 'CONFLICT', message, details);
  }
}

export class DuplicateStatusError extends AppError {
  constructor(code: string) {
    super(409, 'DUPLICATE_STATUS', `Status code already exists: ${code}`, {
      status: code,
    });
  }
}

export class ScopeViolationError extends AppError {
  constructor(examinationId: number, patientId: number) {
    super(
      422,
      'SCOPE_VIOLATION',
      `Examination ${examinationId} does not belong to patient ${patientId}`,
      { examinationId, patientId },
    );
  }
}

export class RateLimitedError extends AppError {
  constructor(retryAfterSeconds: number) {
    super(
      429,
      'RATE_LIMITED',
      `Rate limit exceeded. Retry after ${retryAfterSeconds} seconds.`,
      { retryAfterSeconds },
    );
  }
}

export interface ImportRowErrorEntry {
  row: number;
  field?: string;
  code: string;
  message: string;
}

/**
 * One rejected import row. Collected into the import result, never thrown
 * out of an import.
 */
export class ImportRowError extends AppError {
  constructor(
    public row: number,
    message: string,
    public field?: string,
    public reason: string = 'INVALID_ROW',
  ) {
    super(422, 'IMPORT_ROW_ERROR', message, { row, field, reason });
  }

  toEntry(): ImportRowErrorEntry {
    const entry: ImportRowErrorEntry = {
      row: this.row,
      code: this.reason,
      message: this.message,
    };
    if (this.field !== undefined) entry.field = this.field;
    return entry;
  }
}

export class PersistenceError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(500, 'PERSISTENCE_ERROR', message);
    this.cause = cause;
  }
}
