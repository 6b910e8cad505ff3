export const ErrorCode = {
  SCHEMA_ERROR: "SCHEMA_ERROR",
  DATA_INTEGRITY_ERROR: "DATA_INTEGRITY_ERROR",
  VALIDATION_ERROR: "VALIDATION_ERROR",
  SOURCE_ERROR: "SOURCE_ERROR",
  CONFIG_ERROR: "CONFIG_ERROR",
  INTERNAL_ERROR: "INTERNAL_ERROR",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export type ApiError = {
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
  };
};

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly statusCode: number = 500,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "AppError";
  }

  toApiError(): ApiError {
    return {
      error: {
        code: this.code,
        message: this.message,
        ...(this.details && { details: this.details }),
      },
    };
  }
}

/**
 * A required column (entity name, entity code, or a year inside the
 * requested range) is absent from the input table.
 */
export class SchemaError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.SCHEMA_ERROR, message, 500, details);
    this.name = "SchemaError";
  }
}

/**
 * The long table holds the same (entityCode, year) pair twice. Only reachable
 * when a table did not come out of `reshape`.
 */
export class DataIntegrityError extends AppError {
  constructor(entityCode: string, year: number) {
    super(
      ErrorCode.DATA_INTEGRITY_ERROR,
      `Duplicate row for ${entityCode} in ${year}`,
      500,
      { entityCode, year }
    );
    this.name = "DataIntegrityError";
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.VALIDATION_ERROR, message, 400, details);
    this.name = "ValidationError";
  }
}

export class SourceError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.SOURCE_ERROR, message, 502, details);
    this.name = "SourceError";
  }
}

export class ConfigError extends AppError {
  constructor(message: string) {
    super(ErrorCode.CONFIG_ERROR, message, 500);
    this.name = "ConfigError";
  }
}
