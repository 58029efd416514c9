/**
 * Authentication middleware.
 *
 * Supports two strategies:
 * 1. API key via X-Api-Key header → looked up in the configured key registry
 * 2. JWT bearer token via Authorization header → HMAC-SHA256 signature verify
 *
 * On success, sets `c.set("auth", authContext)` with the caller address
 * custody acts for. On failure, returns 401 or 403.
 */

import { createHmac, timingSafeEqual } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import { isAddress } from "viem";
import { z } from "zod";
import type { Address } from "@strongbox/types";
import type { AppEnv } from "../types/api-contract.js";
import type { ApiKeyRecord, AuthContext, JwtClaims, Permission } from "../types/auth.js";
import { hasPermission } from "../types/auth.js";
import { createErrorEnvelope } from "../types/error.js";

export const CALLER_HEADER = "X-Caller-Address";

// =============================================================================
// Auth Middleware
// =============================================================================

export interface AuthConfig {
  /** Map of API key → record */
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
  /** JWT HMAC secret (if JWT auth is enabled) */
  readonly jwtSecret?: string | undefined;
  /** Expected JWT issuer */
  readonly jwtIssuer?: string | undefined;
}

/**
 * Create authentication middleware.
 *
 * Tries X-Api-Key first, then Authorization: Bearer.
 * Returns 401 if neither is present or valid.
 */
export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    let auth: AuthContext | undefined;

    // Strategy 1: API Key
    const apiKey = c.req.header("X-Api-Key");
    if (apiKey !== undefined) {
      const record = config.apiKeys.get(apiKey);
      if (record === undefined) {
        return c.json(createErrorEnvelope("UNAUTHORIZED", "Invalid API key"), 401);
      }
      auth = {
        type: "api-key",
        identity: record.key,
        role: record.role,
        address: record.address,
      };
    }

    // Strategy 2: JWT Bearer
    if (auth === undefined) {
      const authHeader = c.req.header("Authorization");
      if (authHeader !== undefined && authHeader.startsWith("Bearer ")) {
        if (config.jwtSecret === undefined) {
          return c.json(
            createErrorEnvelope("UNAUTHORIZED", "JWT authentication not configured"),
            401,
          );
        }
        const claims = verifyJwt(authHeader.slice(7), config.jwtSecret, config.jwtIssuer);
        if (claims === undefined) {
          return c.json(createErrorEnvelope("UNAUTHORIZED", "Invalid or expired JWT"), 401);
        }
        auth = {
          type: "jwt",
          identity: claims.sub,
          role: claims.role,
          address: claims.sub,
        };
      }
    }

    if (auth === undefined) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Authentication required"), 401);
    }

    c.set("auth", auth);
    return next();
  };
}

/**
 * Development mode: every request is an admin acting for the address in
 * the X-Caller-Address header. A missing or malformed header leaves the
 * caller unset.
 */
export function unsecuredMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const caller = c.req.header(CALLER_HEADER);
    c.set("auth", {
      type: "unsecured",
      identity: "anonymous",
      role: "admin",
      address: caller !== undefined && isAddress(caller) ? lowercase(caller) : undefined,
    });
    return next();
  };
}

// =============================================================================
// Permission Guard
// =============================================================================

/**
 * Create a permission guard middleware.
 *
 * Must run AFTER authMiddleware. Returns 403 if the authenticated
 * role lacks the required permission.
 */
export function requirePermission(permission: Permission): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const auth = c.get("auth");
    if (!hasPermission(auth.role, permission)) {
      return c.json(
        createErrorEnvelope("FORBIDDEN", `Role '${auth.role}' lacks '${permission}' permission`),
        403,
      );
    }
    return next();
  };
}

// =============================================================================
// JWT Helpers
// =============================================================================

const JwtHeaderSchema = z.object({ alg: z.literal("HS256") });

const JwtPayloadSchema = z.object({
  sub: z.string().refine((value): value is Address => isAddress(value)).transform(lowercase),
  role: z.enum(["admin", "operator", "viewer"]),
  iss: z.string().default(""),
  exp: z.number(),
  iat: z.number(),
});

/**
 * Verify a JWT token using HMAC-SHA256.
 *
 * Minimal verifier: only HS256, `sub` must be the caller's address.
 *
 * @returns Decoded claims, or undefined if invalid/expired.
 */
export function verifyJwt(
  token: string,
  secret: string,
  expectedIssuer?: string,
): JwtClaims | undefined {
  const [headerB64, payloadB64, signatureB64, ...rest] = token.split(".");
  if (headerB64 === undefined || payloadB64 === undefined || signatureB64 === undefined || rest.length > 0) {
    return undefined;
  }

  const expected = Buffer.from(sign(`${headerB64}.${payloadB64}`, secret));
  const actual = Buffer.from(signatureB64);
  if (expected.length !== actual.length || !timingSafeEqual(expected, actual)) {
    return undefined;
  }

  if (!JwtHeaderSchema.safeParse(decodeSegment(headerB64)).success) {
    return undefined;
  }
  const payload = JwtPayloadSchema.safeParse(decodeSegment(payloadB64));
  if (!payload.success) {
    return undefined;
  }

  const claims = payload.data;
  if (claims.exp < Math.floor(Date.now() / 1000)) {
    return undefined;
  }
  if (expectedIssuer !== undefined && claims.iss !== expectedIssuer) {
    return undefined;
  }
  return claims;
}

/**
 * Create a signed JWT for testing/bootstrapping.
 */
export function signJwt(
  claims: Omit<JwtClaims, "iat"> & { iat?: number },
  secret: string,
): string {
  const header = Buffer.from(JSON.stringify({ alg: "HS256", typ: "JWT" })).toString("base64url");
  const payload = Buffer.from(
    JSON.stringify({ ...claims, iat: claims.iat ?? Math.floor(Date.now() / 1000) }),
  ).toString("base64url");
  return `${header}.${payload}.${sign(`${header}.${payload}`, secret)}`;
}

function sign(input: string, secret: string): string {
  return createHmac("sha256", secret).update(input).digest("base64url");
}

/** Parsed JSON of a base64url segment, or undefined when it is not JSON. */
function decodeSegment(segment: string): unknown {
  try {
    return JSON.parse(Buffer.from(segment, "base64url").toString("utf-8"));
  } catch {
    return undefined;
  }
}

function lowercase(address: Address): Address {
  return `0x${address.slice(2).toLowerCase()}`;
}
