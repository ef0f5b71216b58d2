import { AuditActionSchema } from "@schoolcore/db/schema";
import { Hono } from "hono";
import { z } from "zod";
import { zValidator } from "@hono/zod-validator";
import { authMiddleware, requireRole } from "@/middleware/auth";
import { rejectInvalid } from "@/lib/validate";
import type { AppEnv } from "@/types";

export const auditLogsRouter = new Hono<AppEnv>();

const DAY_MS = 24 * 60 * 60 * 1000;

const listQuery = z.object({
  modelName: z.string().trim().min(1).optional(),
  action: AuditActionSchema.optional(),
  days: z.coerce.number().int().min(1).max(365).default(30),
});

auditLogsRouter.use(authMiddleware, requireRole("admin"));

auditLogsRouter.get("/", zValidator("query", listQuery, rejectInvalid), async (c) => {
  const { schoolId } = c.get("user");
  const { modelName, action, days } = c.req.valid("query");

  const since = new Date(Date.now() - days * DAY_MS).toISOString();
  const logs = await c.get("store").listAuditLogs(schoolId, { modelName, action, since });
  return c.json({ success: true, data: logs });
});
