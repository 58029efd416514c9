/**
 * GET /api/v1/records — Committed deposit and withdrawal records (admin).
 *
 * Query: kind, user, fromSequence, limit (1-100, default 20).
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ListRecordsQuerySchema, toRecordDto } from "../types/dto.js";
import { readQuery } from "../middleware/validate.js";
import { requirePermission } from "../middleware/auth.js";
import type { CustodyService } from "../services/custody-service.js";

export function createRecordRoutes(service: CustodyService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", requirePermission("admin"), (c) => {
    const query = readQuery(c, ListRecordsQuerySchema);
    const records = service.records.list(query);
    return c.json({
      data: records.map(toRecordDto),
      total: service.records.size,
    });
  });

  return routes;
}
