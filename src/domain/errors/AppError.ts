/**
 * Erros de domínio com status HTTP e código estável para o envelope de resposta.
 *
 * Erros 5xx levam apenas uma mensagem fixa ao cliente; a causa original (`cause`)
 * vai somente para o log.
 */

export interface FieldViolation {
  field: string;
  message: string;
  file_index?: number;
}

export class AppError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(params: {
    statusCode: number;
    code: string;
    message: string;
    details?: Record<string, unknown>;
    cause?: unknown;
  }) {
    super(params.message, params.cause === undefined ? undefined : { cause: params.cause });
    this.name = "AppError";
    this.statusCode = params.statusCode;
    this.code = params.code;
    this.details = params.details;
  }
}

export class ValidationError extends AppError {
  readonly violations: FieldViolation[];

  constructor(params: { code?: string; message: string; violations?: FieldViolation[]; details?: Record<string, unknown> }) {
    const violations = params.violations ?? [];
    super({
      statusCode: 400,
      code: params.code ?? "VALIDATION_ERROR",
      message: params.message,
      details: params.details ?? (violations.length > 0 ? { validation_errors: violations } : undefined),
    });
    this.name = "ValidationError";
    this.violations = violations;
  }
}

export type ConflictField = "email" | "national_id";

export class ConflictError extends AppError {
  readonly field: ConflictField;

  constructor(field: ConflictField) {
    super({
      statusCode: 409,
      code: field === "email" ? "EMAIL_ALREADY_REGISTERED" : "NATIONAL_ID_ALREADY_REGISTERED",
      message: field === "email" ? "Email is already registered" : "National ID is already registered",
      details: { field },
    });
    this.name = "ConflictError";
    this.field = field;
  }
}

export type Backend = "storage" | "database";

export class BackendUnavailableError extends AppError {
  readonly backend: Backend;

  constructor(params: { backend: Backend; code: string; message: string; cause?: unknown }) {
    super({ statusCode: 500, code: params.code, message: params.message, cause: params.cause });
    this.name = "BackendUnavailableError";
    this.backend = params.backend;
  }
}

export class InternalError extends AppError {
  constructor(message = "Internal server error", cause?: unknown) {
    super({ statusCode: 500, code: "INTERNAL_ERROR", message, cause });
    this.name = "InternalError";
  }
}
