/**
 * Error envelope types for API responses.
 *
 * All error responses follow the shape:
 * { error: { code: string, message: string, details?: Record<string, unknown> } }
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * API-level error codes. Domain errors carry their own codes.
 */
export type ApiErrorCode =
  | "VALIDATION_ERROR"
  | "CALLER_REQUIRED"
  | "UNAUTHORIZED"
  | "FORBIDDEN"
  | "INTERNAL_ERROR";

// =============================================================================
// Error Response
// =============================================================================

export interface ErrorDetail {
  readonly code: ApiErrorCode | string;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

// =============================================================================
// Factory
// =============================================================================

export function createErrorEnvelope(
  code: ApiErrorCode | string,
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope {
  const error: ErrorDetail = { code, message };
  if (details !== undefined) {
    return { error: { ...error, details } };
  }
  return { error };
}

// =============================================================================
// Request Errors
// =============================================================================

export type RequestErrorStatus = 400 | 401 | 403 | 404;

/**
 * Error raised by request handling itself (bad input, missing caller).
 * Rendered by the global error handler with its own status.
 */
export class RequestError extends Error {
  public readonly code: ApiErrorCode;
  public readonly status: RequestErrorStatus;
  public readonly details: Record<string, unknown> | undefined;

  constructor(
    code: ApiErrorCode,
    status: RequestErrorStatus,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "RequestError";
    this.code = code;
    this.status = status;
    this.details = details;
  }
}
