import type { Context } from "hono";
import type { Address } from "@strongbox/types";
import type { AppEnv } from "../types/api-contract.js";
import { RequestError } from "../types/error.js";

/**
 * Address the authenticated request acts for.
 */
export function callerOf(c: Context<AppEnv>): Address {
  const address = c.get("auth").address;
  if (address === undefined) {
    throw new RequestError("CALLER_REQUIRED", 400, "Request does not identify a caller address");
  }
  return address;
}
