import { Hono } from "hono";
import { z } from "zod";
import { zValidator } from "@hono/zod-validator";
import { authMiddleware } from "@/middleware/auth";
import { ValidationError } from "@/errors";
import { audit, creationChanges, diffChanges } from "@/lib/audit";
import { isoDate } from "@/lib/schemas";
import { rejectInvalid } from "@/lib/validate";
import type { SchoolStore } from "@/store/types";
import type { AppEnv } from "@/types";

export const absencesRouter = new Hono<AppEnv>();

const listQuery = z.object({ date: isoDate.optional() });

const markAbsentSchema = z.object({
  teacherIds: z.array(z.uuid()).min(1),
  date: isoDate,
  reason: z.string().trim().max(200).default(""),
});

const markPresentSchema = z.object({
  teacherIds: z.array(z.uuid()).min(1),
  date: isoDate,
});

absencesRouter.use(authMiddleware);

absencesRouter.get("/", zValidator("query", listQuery, rejectInvalid), async (c) => {
  const { schoolId } = c.get("user");
  const { date } = c.req.valid("query");
  const absences = await c.get("store").listAbsences(schoolId, date);
  return c.json({ success: true, data: absences });
});

async function requireTeachers(
  store: SchoolStore,
  schoolId: string,
  teacherIds: readonly string[]
) {
  const ids = [...new Set(teacherIds)];
  const roster = await store.listTeachers(schoolId);
  const known = new Set(roster.map((t) => t.id));
  const missing = ids.filter((id) => !known.has(id));
  if (missing.length > 0) {
    throw new ValidationError("Some teachers not found", { missing });
  }
  return ids;
}

absencesRouter.post(
  "/bulk/mark-absent",
  zValidator("json", markAbsentSchema, rejectInvalid),
  async (c) => {
    const { schoolId } = c.get("user");
    const input = c.req.valid("json");

    const store = c.get("store");
    const teacherIds = await requireTeachers(store, schoolId, input.teacherIds);
    const previous = new Map(
      (await store.listAbsences(schoolId, input.date)).map((a) => [
        a.teacherId,
        { status: a.status, reason: a.reason },
      ])
    );
    const absences = await store.markAbsent(schoolId, teacherIds, input.date, input.reason);

    for (const absence of absences) {
      const before = previous.get(absence.teacherId);
      const after = { status: absence.status, reason: absence.reason };
      await audit(c, {
        action: before ? "update" : "create",
        modelName: "Absence",
        objectId: absence.id,
        objectDisplay: `Absence on ${absence.date}`,
        changes: before ? diffChanges(before, after) : creationChanges(after),
      });
    }

    return c.json({ success: true, data: absences });
  }
);

absencesRouter.post(
  "/bulk/mark-present",
  zValidator("json", markPresentSchema, rejectInvalid),
  async (c) => {
    const { schoolId } = c.get("user");
    const input = c.req.valid("json");

    const teacherIds = await requireTeachers(c.get("store"), schoolId, input.teacherIds);
    const result = await c.get("store").markPresent(schoolId, teacherIds, input.date);

    for (const absence of result.retracted) {
      await audit(c, {
        action: "update",
        modelName: "Absence",
        objectId: absence.id,
        objectDisplay: `Absence on ${absence.date}`,
        changes: { status: { old: "absent", new: "present" } },
      });
    }

    return c.json({ success: true, data: result });
  }
);
