/**
 * Custody overview routes.
 *
 * GET /api/v1/custody          — Limits, counters and settlement currency
 * GET /api/v1/custody/total    — Aggregate custodied value (owner only)
 * GET /api/v1/custody/solvency — Holdings against obligations (admin)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { AmountDto } from "../types/dto.js";
import { toSolvencyDto } from "../types/dto.js";
import { requirePermission } from "../middleware/auth.js";
import type { CustodyService } from "../services/custody-service.js";
import { callerOf } from "./caller.js";

export function createCustodyRoutes(service: CustodyService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();
  const { custody } = service;

  routes.get("/", requirePermission("read"), (c) => {
    return c.json({
      data: {
        settlement: custody.config.settlement,
        capacity: custody.capacity.toString(),
        withdrawalCeiling: custody.withdrawalCeiling.toString(),
        headroom: custody.headroom.toString(),
        depositCount: custody.depositCount,
        withdrawalCount: custody.withdrawalCount,
        tokenFailurePolicy: custody.config.tokenFailurePolicy,
      },
    });
  });

  routes.get("/total", requirePermission("admin"), (c) => {
    const units = custody.totalCustodied(callerOf(c));
    const total: AmountDto = { units: units.toString(), money: custody.toMoney(units) };
    return c.json({ data: total });
  });

  routes.get("/solvency", requirePermission("admin"), async (c) => {
    const report = await custody.verifySolvency();
    return c.json({ data: toSolvencyDto(report) });
  });

  return routes;
}
