import { ProxyStatusSchema } from "@schoolcore/db/schema";
import { Hono } from "hono";
import { z } from "zod";
import { zValidator } from "@hono/zod-validator";
import { authMiddleware } from "@/middleware/auth";
import { InvalidTransitionError, NotFoundError } from "@/errors";
import { audit } from "@/lib/audit";
import {
  affectedPeriods,
  assignProxy,
  eligibleSubstitutes,
  transitionProxy,
  type ProxyTransition,
} from "@/lib/proxy-matcher";
import { idParam, isoDate } from "@/lib/schemas";
import { loadProxySnapshot } from "@/lib/snapshots";
import { rejectInvalid } from "@/lib/validate";
import type { AppEnv } from "@/types";

export const proxiesRouter = new Hono<AppEnv>();

const listQuery = z.object({
  date: isoDate.optional(),
  status: ProxyStatusSchema.optional(),
});

const coverageQuery = z.object({ date: isoDate.optional() });

const assignSchema = z.object({
  absenceId: z.uuid(),
  classroomId: z.uuid(),
  period: z.int().min(1),
  proxyTeacherId: z.uuid(),
  subject: z.string().trim().max(100).optional(),
  reason: z.string().trim().max(200).optional(),
});

proxiesRouter.use(authMiddleware);

proxiesRouter.get("/", zValidator("query", listQuery, rejectInvalid), async (c) => {
  const { schoolId } = c.get("user");
  const proxies = await c.get("store").listProxies(schoolId, c.req.valid("query"));
  return c.json({ success: true, data: proxies });
});

proxiesRouter.get(
  "/coverage",
  zValidator("query", coverageQuery, rejectInvalid),
  async (c) => {
    const { schoolId } = c.get("user");
    const date = c.req.valid("query").date ?? c.get("today")();

    const snapshot = await loadProxySnapshot(c.get("store"), schoolId, date);
    const needs = affectedPeriods(snapshot).map((need) => ({
      ...need,
      candidates: need.existingProxy ? [] : eligibleSubstitutes(snapshot, need),
    }));

    return c.json({ success: true, data: { date, needs } });
  }
);

proxiesRouter.post(
  "/assign",
  zValidator("json", assignSchema, rejectInvalid),
  async (c) => {
    const store = c.get("store");
    const { schoolId, userId } = c.get("user");
    const request = c.req.valid("json");

    const absence = await store.findAbsence(schoolId, request.absenceId);
    if (!absence) throw new NotFoundError("Absence not found");

    const snapshot = await loadProxySnapshot(store, schoolId, absence.date);
    const record = assignProxy(snapshot, request, c.get("today")());
    const proxy = await store.createProxy({ ...record, assignedBy: userId });

    await audit(c, {
      action: "create",
      modelName: "ProxyRecord",
      objectId: proxy.id,
      objectDisplay: `${proxy.subject} P${proxy.period} on ${proxy.date}`,
      changes: {
        proxyTeacherId: { old: null, new: proxy.proxyTeacherId },
        status: { old: null, new: proxy.status },
      },
    });

    return c.json({ success: true, data: proxy }, 201);
  }
);

function transitionRoute(next: ProxyTransition["status"]) {
  return proxiesRouter.post(
    `/:id/${next === "completed" ? "complete" : "cancel"}`,
    zValidator("param", idParam, rejectInvalid),
    async (c) => {
      const store = c.get("store");
      const { schoolId } = c.get("user");
      const { id } = c.req.valid("param");

      const proxy = await store.findProxy(schoolId, id);
      if (!proxy) throw new NotFoundError("Proxy not found");

      const change = transitionProxy(proxy, next);
      const updated = await store.updateProxyStatus(proxy.id, change);
      if (!updated) {
        // moved on since it was read, e.g. cancelled by an absence retraction
        const current = await store.findProxy(schoolId, id);
        if (!current) throw new NotFoundError("Proxy not found");
        throw new InvalidTransitionError(current.status, next);
      }

      await audit(c, {
        action: "update",
        modelName: "ProxyRecord",
        objectId: updated.id,
        objectDisplay: `${updated.subject} P${updated.period} on ${updated.date}`,
        changes: { status: { old: proxy.status, new: updated.status } },
      });

      return c.json({ success: true, data: updated });
    }
  );
}

transitionRoute("completed");
transitionRoute("cancelled");
