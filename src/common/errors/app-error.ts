export enum ErrorCode {
  // Validation
  INVALID_REQUEST = 'invalid_request',

  // State
  INVALID_STATE = 'invalid_state',
  NOT_FOUND = 'not_found',

  // Reconciliation
  MALFORMED_TIMESTAMP = 'malformed_timestamp',
  NO_APPLICABLE_TIER = 'no_applicable_tier',
  CORRUPT_PERSISTED_STATE = 'corrupt_persisted_state',

  // Upstream account API
  UPSTREAM_AUTH_EXPIRED = 'upstream_auth_expired',
  UPSTREAM_NETWORK_ERROR = 'upstream_network_error',
  UPSTREAM_NO_DATA = 'upstream_no_data',

  // Limits
  RATE_LIMITED = 'rate_limited',

  // System
  INTERNAL_ERROR = 'internal_error',
}

const statusCodeMap: Record<ErrorCode, number> = {
  [ErrorCode.INVALID_REQUEST]: 400,
  [ErrorCode.INVALID_STATE]: 409,
  [ErrorCode.NOT_FOUND]: 404,
  [ErrorCode.MALFORMED_TIMESTAMP]: 422,
  [ErrorCode.NO_APPLICABLE_TIER]: 422,
  [ErrorCode.CORRUPT_PERSISTED_STATE]: 500,
  [ErrorCode.UPSTREAM_AUTH_EXPIRED]: 502,
  [ErrorCode.UPSTREAM_NETWORK_ERROR]: 502,
  [ErrorCode.UPSTREAM_NO_DATA]: 502,
  [ErrorCode.RATE_LIMITED]: 429,
  [ErrorCode.INTERNAL_ERROR]: 500,
};

export type UpstreamFailureCode =
  | ErrorCode.UPSTREAM_AUTH_EXPIRED
  | ErrorCode.UPSTREAM_NETWORK_ERROR
  | ErrorCode.UPSTREAM_NO_DATA;

const upstreamCodes: ReadonlySet<ErrorCode> = new Set([
  ErrorCode.UPSTREAM_AUTH_EXPIRED,
  ErrorCode.UPSTREAM_NETWORK_ERROR,
  ErrorCode.UPSTREAM_NO_DATA,
]);

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly statusCode: number;
  public readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCodeMap[code];
    this.details = details;

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }

  static notFound(resource = 'Resource') {
    return new AppError(ErrorCode.NOT_FOUND, `${resource} not found`);
  }

  static invalidState(message: string, details?: Record<string, unknown>) {
    return new AppError(ErrorCode.INVALID_STATE, message, details);
  }

  static invalidRequest(message: string, details?: Record<string, unknown>) {
    return new AppError(ErrorCode.INVALID_REQUEST, message, details);
  }

  static malformedTimestamp(raw: string, reason: string) {
    return new AppError(ErrorCode.MALFORMED_TIMESTAMP, `Malformed timestamp "${raw}": ${reason}`, {
      raw,
    });
  }

  static noApplicableTier() {
    return new AppError(ErrorCode.NO_APPLICABLE_TIER, 'Ladder tier list is empty');
  }

  static corruptPersistedState(entryId: string, reason: string) {
    return new AppError(
      ErrorCode.CORRUPT_PERSISTED_STATE,
      `Persisted state for ${entryId} is unreadable: ${reason}`,
      { entryId }
    );
  }

  static upstream(code: UpstreamFailureCode, message: string, details?: Record<string, unknown>) {
    return new AppError(code, message, details);
  }
}

export function isAppError(error: unknown, code?: ErrorCode): error is AppError {
  return error instanceof AppError && (code === undefined || error.code === code);
}

export function isUpstreamFailure(error: unknown): error is AppError {
  return error instanceof AppError && upstreamCodes.has(error.code);
}
