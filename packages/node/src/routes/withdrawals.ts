/**
 * POST /api/v1/withdrawals — Release settlement currency to the caller.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { toRecordDto, WithdrawalSchema } from "../types/dto.js";
import { readBody } from "../middleware/validate.js";
import { requirePermission } from "../middleware/auth.js";
import type { CustodyService } from "../services/custody-service.js";
import { callerOf } from "./caller.js";

export function createWithdrawalRoutes(service: CustodyService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", requirePermission("write"), async (c) => {
    const body = await readBody(c, WithdrawalSchema);
    const record = await service.custody.withdraw(callerOf(c), body.amount);
    return c.json({ data: toRecordDto(record) }, 201);
  });

  return routes;
}
