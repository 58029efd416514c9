/**
 * Runtime Type Guards
 *
 * Narrowing functions for values that reach custody as plain strings
 * (request bodies, environment variables).
 */

import type { AssetId, TokenFailurePolicy } from "./custody.js";
import { NATIVE_ASSET } from "./custody.js";

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;
const FAILURE_POLICIES = new Set<string>(["retain", "refund"]);

/**
 * The native marker, or anything shaped like an address. Checksums are
 * validated where viem is available.
 */
export function isAssetId(value: unknown): value is AssetId {
  return value === NATIVE_ASSET || (typeof value === "string" && ADDRESS_PATTERN.test(value));
}

export function isTokenFailurePolicy(value: unknown): value is TokenFailurePolicy {
  return typeof value === "string" && FAILURE_POLICIES.has(value);
}
