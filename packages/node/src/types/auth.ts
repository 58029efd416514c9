/**
 * Authentication and authorization types.
 *
 * Supports two auth strategies:
 * 1. API key via X-Api-Key header
 * 2. JWT bearer token via Authorization header
 *
 * Role hierarchy: admin > operator > viewer
 */

import type { Address } from "@strongbox/types";

// =============================================================================
// Roles & Permissions
// =============================================================================

export type Role = "admin" | "operator" | "viewer";

/** Permission levels for role-based access control */
export type Permission = "read" | "write" | "admin";

/** Which permissions each role grants */
export const ROLE_PERMISSIONS: Record<Role, readonly Permission[]> = {
  viewer: ["read"],
  operator: ["read", "write"],
  admin: ["read", "write", "admin"],
};

/**
 * Check whether a role has a specific permission.
 */
export function hasPermission(role: Role, permission: Permission): boolean {
  return ROLE_PERMISSIONS[role].includes(permission);
}

// =============================================================================
// Auth Context
// =============================================================================

/**
 * Resolved authentication context, set by the auth middleware.
 *
 * `address` is the account custody acts for. It is absent only in
 * unsecured mode when the request names no caller.
 */
export interface AuthContext {
  readonly type: "api-key" | "jwt" | "unsecured";
  readonly identity: string;
  readonly role: Role;
  readonly address?: Address | undefined;
}

// =============================================================================
// API Key Record
// =============================================================================

export interface ApiKeyRecord {
  readonly key: string;
  readonly role: Role;
  readonly address: Address;
}

// =============================================================================
// JWT Claims
// =============================================================================

export interface JwtClaims {
  /** Caller address */
  readonly sub: Address;
  readonly role: Role;
  readonly iss: string;
  readonly exp: number;
  readonly iat: number;
}
