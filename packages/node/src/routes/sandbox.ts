/**
 * Sandbox routes over the in-process token bank.
 *
 * POST /api/v1/sandbox/mint     — Credit tokens or native value (admin)
 * POST /api/v1/sandbox/approve  — Let custody pull the caller's tokens
 * GET  /api/v1/sandbox/holdings — The caller's bank balances
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { SandboxApproveSchema, SandboxMintSchema } from "../types/dto.js";
import { readBody } from "../middleware/validate.js";
import { requirePermission } from "../middleware/auth.js";
import type { CustodyService } from "../services/custody-service.js";
import { callerOf } from "./caller.js";

export function createSandboxRoutes(service: CustodyService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/mint", requirePermission("admin"), async (c) => {
    const body = await readBody(c, SandboxMintSchema);
    service.mint(body.asset, body.to, body.amount);
    return c.json({ data: { asset: body.asset, to: body.to, amount: body.amount.toString() } }, 201);
  });

  routes.post("/approve", requirePermission("write"), async (c) => {
    const body = await readBody(c, SandboxApproveSchema);
    const owner = callerOf(c);
    service.approve(owner, body.asset, body.amount);
    return c.json({ data: { owner, asset: body.asset, amount: body.amount.toString() } });
  });

  routes.get("/holdings", requirePermission("read"), (c) => {
    const holdings = service.holdings(callerOf(c));
    return c.json({
      data: {
        native: holdings.native.toString(),
        settlement: holdings.settlement.toString(),
      },
    });
  });

  return routes;
}
