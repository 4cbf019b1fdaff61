export type ErrorCode =
  | "invalid_request"
  | "not_found"
  | "forbidden"
  | "conflict"
  | "integrity_failed"
  | "range_invalid"
  | "service_auth_not_configured"
  | "service_auth_scope_missing"
  | "anchoring_disabled"
  | "rate_limited"
  | "internal_error";

export type ErrorResponse = {
  error: ErrorCode;
  message: string;
  details?: string;
  debug?: { cause?: string; hint?: string };
};

type ErrorOptions = {
  details?: string;
  debug?: { cause?: string; hint?: string };
  devMode?: boolean;
};

export const makeErrorResponse = (
  error: ErrorCode,
  message: string,
  options: ErrorOptions = {}
): ErrorResponse => {
  const response: ErrorResponse = { error, message };
  if (options.details) {
    response.details = options.details;
  }
  if (options.devMode && options.debug) {
    response.debug = options.debug;
  }
  return response;
};

export type LedgerErrorKind =
  | "validation"
  | "authorization"
  | "conflict"
  | "not_found"
  | "integrity"
  | "range";

const KIND_STATUS: Record<LedgerErrorKind, number> = {
  validation: 400,
  authorization: 403,
  conflict: 409,
  not_found: 404,
  integrity: 422,
  range: 416
};

const KIND_RESPONSE_CODE: Record<LedgerErrorKind, ErrorCode> = {
  validation: "invalid_request",
  authorization: "forbidden",
  conflict: "conflict",
  not_found: "not_found",
  integrity: "integrity_failed",
  range: "range_invalid"
};

/**
 * Base of the registry and ledger failure taxonomy. `code` is a stable snake_case reason
 * (e.g. `data_hash_duplicate`); the message is for humans.
 */
export class LedgerError extends Error {
  readonly kind: LedgerErrorKind;
  readonly code: string;
  readonly statusCode: number;

  constructor(kind: LedgerErrorKind, code: string, message?: string) {
    super(message ?? code);
    this.name = new.target.name;
    this.kind = kind;
    this.code = code;
    this.statusCode = KIND_STATUS[kind];
  }

  get responseCode(): ErrorCode {
    return KIND_RESPONSE_CODE[this.kind];
  }
}

export class ValidationError extends LedgerError {
  constructor(code: string, message?: string) {
    super("validation", code, message);
  }
}

export class AuthorizationError extends LedgerError {
  constructor(code: string, message?: string) {
    super("authorization", code, message);
  }
}

export class ConflictError extends LedgerError {
  constructor(code: string, message?: string) {
    super("conflict", code, message);
  }
}

export class NotFoundError extends LedgerError {
  constructor(code: string, message?: string) {
    super("not_found", code, message);
  }
}

export class IntegrityError extends LedgerError {
  constructor(code: string, message?: string) {
    super("integrity", code, message);
  }
}

// Named apart from the built-in RangeError so both stay usable in one module.
export class HistoryRangeError extends LedgerError {
  constructor(code: string, message?: string) {
    super("range", code, message);
  }
}

export const isLedgerError = (error: unknown): error is LedgerError => error instanceof LedgerError;
