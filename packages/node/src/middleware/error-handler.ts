/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps ledger and custody error codes to HTTP status codes. Bigint
 * details are rendered as decimal strings.
 */

import type { Context } from "hono";
import { CustodyError } from "@strongbox/custody";
import { LedgerError } from "@strongbox/ledger";
import { createErrorEnvelope, RequestError } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

type ErrorStatus = 400 | 403 | 409 | 422 | 500 | 502;

const STATUS_MAP: Record<string, ErrorStatus> = {
  // Input
  ZERO_AMOUNT: 400,
  INVALID_AMOUNT: 400,
  INVALID_ADDRESS: 400,
  INVALID_SNAPSHOT: 400,

  // Rejected by the ledger or the conversion result
  ZERO_PROCEEDS: 422,
  CAPACITY_EXCEEDED: 422,
  INSUFFICIENT_BALANCE: 422,
  WITHDRAWAL_CEILING_EXCEEDED: 422,

  // Collaborators
  TRANSFER_FAILED: 502,
  EXCHANGE_FAILED: 502,

  // Concurrency
  REENTRANT_CALL: 409,
  DRAFT_CLOSED: 409,
  CONCURRENT_MODIFICATION: 409,

  // Access
  UNAUTHORIZED: 403,
};

function renderDetails(
  details: Readonly<Record<string, bigint | string | number>>,
): Record<string, string | number> {
  const rendered: Record<string, string | number> = {};
  for (const [key, value] of Object.entries(details)) {
    rendered[key] = typeof value === "bigint" ? value.toString() : value;
  }
  return rendered;
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  if (err instanceof RequestError) {
    return c.json(createErrorEnvelope(err.code, err.message, err.details), err.status);
  }

  if (err instanceof LedgerError || err instanceof CustodyError) {
    const status: ErrorStatus = STATUS_MAP[err.code] ?? 500;
    // Don't leak internal details
    if (status === 500) {
      return c.json(createErrorEnvelope(err.code, "Internal server error"), 500);
    }
    const details = renderDetails(err.details);
    return c.json(
      createErrorEnvelope(err.code, err.message, Object.keys(details).length > 0 ? details : undefined),
      status,
    );
  }

  return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
}
