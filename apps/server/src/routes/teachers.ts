import { Hono } from "hono";
import { z } from "zod";
import { zValidator } from "@hono/zod-validator";
import { authMiddleware, requireRole } from "@/middleware/auth";
import { audit, creationChanges } from "@/lib/audit";
import { requireTeacher } from "@/lib/lookups";
import { proxyScheduleForDay } from "@/lib/proxy-matcher";
import { idParam, isoDate } from "@/lib/schemas";
import { loadProxySnapshot } from "@/lib/snapshots";
import { rejectInvalid } from "@/lib/validate";
import type { AppEnv } from "@/types";

export const teachersRouter = new Hono<AppEnv>();

const createTeacherSchema = z.object({
  fullName: z.string().trim().min(1).max(120),
});

const scheduleQuery = z.object({ date: isoDate.optional() });

teachersRouter.use(authMiddleware);

teachersRouter.get("/", async (c) => {
  const { schoolId } = c.get("user");
  const teachers = await c.get("store").listTeachers(schoolId);
  return c.json({ success: true, data: teachers });
});

teachersRouter.post(
  "/",
  requireRole("admin"),
  zValidator("json", createTeacherSchema, rejectInvalid),
  async (c) => {
    const { schoolId } = c.get("user");
    const teacher = await c.get("store").createTeacher(schoolId, c.req.valid("json"));

    await audit(c, {
      action: "create",
      modelName: "Teacher",
      objectId: teacher.id,
      objectDisplay: teacher.fullName,
      changes: creationChanges({ fullName: teacher.fullName }),
    });

    return c.json({ success: true, data: teacher }, 201);
  }
);

teachersRouter.get(
  "/:id/proxy-schedule",
  zValidator("param", idParam, rejectInvalid),
  zValidator("query", scheduleQuery, rejectInvalid),
  async (c) => {
    const store = c.get("store");
    const { schoolId } = c.get("user");
    const { id } = c.req.valid("param");
    const date = c.req.valid("query").date ?? c.get("today")();

    const teacher = await requireTeacher(store, schoolId, id);
    const snapshot = await loadProxySnapshot(store, schoolId, date);
    const schedule = proxyScheduleForDay(snapshot, teacher.id, c.get("periodsPerDay"));

    return c.json({ success: true, data: { teacher, ...schedule } });
  }
);
