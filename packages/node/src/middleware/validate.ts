/**
 * Zod request validation.
 *
 * Parses the JSON body or the query string against a schema and throws
 * a VALIDATION_ERROR RequestError (400) listing the issues on failure.
 */

import type { Context } from "hono";
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import type { AppEnv } from "../types/api-contract.js";
import { RequestError } from "../types/error.js";

/**
 * Validate the JSON request body.
 */
export async function readBody<T>(
  c: Context<AppEnv>,
  schema: ZodType<T, ZodTypeDef, unknown>,
): Promise<T> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw new RequestError("VALIDATION_ERROR", 400, "Invalid JSON in request body");
  }

  const result = schema.safeParse(body);
  if (!result.success) {
    throw new RequestError("VALIDATION_ERROR", 400, "Request body validation failed", {
      issues: formatZodErrors(result.error),
    });
  }
  return result.data;
}

/**
 * Validate query parameters.
 */
export function readQuery<T>(
  c: Context<AppEnv>,
  schema: ZodType<T, ZodTypeDef, unknown>,
): T {
  const result = schema.safeParse(c.req.query());
  if (!result.success) {
    throw new RequestError("VALIDATION_ERROR", 400, "Invalid query parameters", {
      issues: formatZodErrors(result.error),
    });
  }
  return result.data;
}

function formatZodErrors(error: ZodError): readonly { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
