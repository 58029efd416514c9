/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe: custody holds at least what it owes
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { CustodyService } from "../services/custody-service.js";

export function createHealthRoutes(service: CustodyService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", async (c) => {
    const report = await service.custody.verifySolvency();
    const body = {
      status: report.solvent ? "ready" : "not_ready",
      solvent: report.solvent,
      busy: service.custody.busy,
      timestamp: new Date().toISOString(),
    };
    return report.solvent ? c.json(body, 200) : c.json(body, 503);
  });

  return routes;
}
