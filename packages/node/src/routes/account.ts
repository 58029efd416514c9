/**
 * GET /api/v1/account — The caller's custodied balance.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { AmountDto } from "../types/dto.js";
import { requirePermission } from "../middleware/auth.js";
import type { CustodyService } from "../services/custody-service.js";
import { callerOf } from "./caller.js";

export function createAccountRoutes(service: CustodyService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", requirePermission("read"), (c) => {
    const address = callerOf(c);
    const units = service.custody.balanceOf(address);
    const balance: AmountDto = { units: units.toString(), money: service.custody.toMoney(units) };
    return c.json({ data: { address, balance } });
  });

  return routes;
}
