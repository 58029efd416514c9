/**
 * @strongbox/node — Entry point.
 *
 * Bootstraps the Hono app, loads config, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { fileURLToPath } from "node:url";
import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig, parseApiKeys, parseSandboxRates } from "./config.js";
import type { AppConfig } from "./config.js";
import { createApp } from "./app.js";
import type { AuthConfig } from "./middleware/auth.js";
import type { CustodyServiceConfig } from "./services/custody-service.js";
import type { ApiKeyRecord } from "./types/auth.js";
import { toRecordDto } from "./types/dto.js";

// =============================================================================
// Re-exports (package public API)
// =============================================================================

export { CustodyService } from "./services/custody-service.js";
export type { CustodyServiceConfig } from "./services/custody-service.js";
export { loadConfig, parseApiKeys, parseSandboxRates, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedApiKey, SandboxRate } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./types/index.js";

// =============================================================================
// Bootstrap
// =============================================================================

/**
 * Translate validated environment into the custody service configuration.
 */
export function serviceConfigFrom(config: AppConfig): CustodyServiceConfig {
  return {
    custody: {
      custody: config.CUSTODY_ADDRESS,
      owner: config.OWNER_ADDRESS,
      settlement: {
        address: config.SETTLEMENT_ADDRESS,
        symbol: config.SETTLEMENT_SYMBOL,
        decimals: config.SETTLEMENT_DECIMALS,
      },
      nativeWrapper: config.NATIVE_WRAPPER_ADDRESS,
      capacity: config.CAPACITY,
      withdrawalCeiling: config.WITHDRAWAL_CEILING,
      deadlineWindowSeconds: config.DEADLINE_WINDOW_SECONDS,
      tokenFailurePolicy: config.TOKEN_FAILURE_POLICY,
    },
    exchange: config.EXCHANGE_ADDRESS,
    rates: parseSandboxRates(config.SANDBOX_RATES),
    liquidity: config.SANDBOX_LIQUIDITY,
  };
}

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  // Build auth config from env vars
  let authConfig: AuthConfig | undefined;
  const parsedKeys = parseApiKeys(config.API_KEYS);
  if (parsedKeys.length > 0 || config.JWT_SECRET !== undefined) {
    const keyMap = new Map<string, ApiKeyRecord>();
    for (const k of parsedKeys) {
      keyMap.set(k.key, k);
    }
    authConfig = {
      apiKeys: keyMap,
      jwtSecret: config.JWT_SECRET,
      jwtIssuer: config.JWT_ISSUER,
    };
    logger.info(
      { apiKeyCount: parsedKeys.length, jwtEnabled: config.JWT_SECRET !== undefined },
      "Auth configured",
    );
  } else {
    logger.warn("No API keys or JWT secret configured, running in unsecured mode");
  }

  const { app, service } = createApp({
    serviceConfig: {
      ...serviceConfigFrom(config),
      onRecordError: (err, record) => {
        logger.error({ err, sequence: record.sequence }, "Record subscriber failed");
      },
    },
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${String(entry.status)}`);
    },
    auth: authConfig,
    enableSandbox: config.SANDBOX_ROUTES,
  });

  const subscription = service.onRecord((record) => {
    logger.info({ record: toRecordDto(record) }, `Custody ${record.kind} committed`);
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    {
      port: config.PORT,
      host: config.HOST,
      settlement: config.SETTLEMENT_SYMBOL,
      capacity: config.CAPACITY.toString(),
      withdrawalCeiling: config.WITHDRAWAL_CEILING.toString(),
    },
    "Strongbox node started",
  );

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    subscription.unsubscribe();
    server.close(() => {
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

// Only run when executed directly (not when imported)
if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().catch((err: unknown) => {
    // eslint-disable-next-line no-console
    console.error("Fatal startup error:", err);
    process.exit(1);
  });
}
