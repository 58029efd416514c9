/**
 * Deposit routes.
 *
 * POST /api/v1/deposits/native — Convert native value and credit the caller
 * POST /api/v1/deposits/asset  — Pull a token, convert it and credit the caller
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AssetDepositSchema, NativeDepositSchema, toRecordDto } from "../types/dto.js";
import { readBody } from "../middleware/validate.js";
import { requirePermission } from "../middleware/auth.js";
import type { CustodyService } from "../services/custody-service.js";
import { callerOf } from "./caller.js";

export function createDepositRoutes(service: CustodyService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/native", requirePermission("write"), async (c) => {
    const body = await readBody(c, NativeDepositSchema);
    const record = await service.custody.depositNative(callerOf(c), body.value, body.minProceeds);
    return c.json({ data: toRecordDto(record) }, 201);
  });

  routes.post("/asset", requirePermission("write"), async (c) => {
    const body = await readBody(c, AssetDepositSchema);
    const record = await service.custody.depositAsset(
      callerOf(c),
      body.asset,
      body.amount,
      body.minProceeds,
    );
    return c.json({ data: toRecordDto(record) }, 201);
  });

  return routes;
}
