/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes. Tests create the app
 * through this factory without starting the HTTP server.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { CustodyService } from "./services/custody-service.js";
import type { CustodyServiceConfig } from "./services/custody-service.js";
import {
  authMiddleware,
  handleError,
  loggerMiddleware,
  requestIdMiddleware,
  unsecuredMiddleware,
} from "./middleware/index.js";
import type { AuthConfig, RequestLogEntry } from "./middleware/index.js";
import {
  createAccountRoutes,
  createCustodyRoutes,
  createDepositRoutes,
  createHealthRoutes,
  createRecordRoutes,
  createSandboxRoutes,
  createWithdrawalRoutes,
} from "./routes/index.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: CustodyServiceConfig;
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
  /** Auth configuration. When provided, auth middleware is enabled. */
  readonly auth?: AuthConfig | undefined;
  /** Mount the sandbox routes. Default: true */
  readonly enableSandbox?: boolean | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: CustodyService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const service = new CustodyService(options.serviceConfig);
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(handleError);

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  if (options.auth !== undefined) {
    app.use("/api/*", authMiddleware(options.auth));
  } else {
    // Unsecured mode (tests, dev): X-Caller-Address header
    app.use("/api/*", unsecuredMiddleware());
  }

  app.route("/api/v1/deposits", createDepositRoutes(service));
  app.route("/api/v1/withdrawals", createWithdrawalRoutes(service));
  app.route("/api/v1/account", createAccountRoutes(service));
  app.route("/api/v1/custody", createCustodyRoutes(service));
  app.route("/api/v1/records", createRecordRoutes(service));

  if (options.enableSandbox !== false) {
    app.route("/api/v1/sandbox", createSandboxRoutes(service));
  }

  return { app, service };
}
