import { WeekdaySchema } from "@schoolcore/db/schema";
import { Hono } from "hono";
import { z } from "zod";
import { zValidator } from "@hono/zod-validator";
import { authMiddleware, requireRole } from "@/middleware/auth";
import { ConflictError } from "@/errors";
import { audit, creationChanges } from "@/lib/audit";
import { requireClassroom, requireTeacher } from "@/lib/lookups";
import { rejectInvalid } from "@/lib/validate";
import type { AppEnv } from "@/types";

export const timetableRouter = new Hono<AppEnv>();

const listQuery = z.object({
  classroomId: z.uuid().optional(),
  teacherId: z.uuid().optional(),
  day: WeekdaySchema.optional(),
});

const createEntrySchema = z.object({
  classroomId: z.uuid(),
  day: WeekdaySchema,
  period: z.int().min(1),
  subject: z.string().trim().min(1).max(100),
  teacherId: z.uuid().nullable().default(null),
});

timetableRouter.use(authMiddleware);

timetableRouter.get("/", zValidator("query", listQuery, rejectInvalid), async (c) => {
  const { schoolId } = c.get("user");
  const entries = await c.get("store").listTimetable(schoolId, c.req.valid("query"));
  return c.json({ success: true, data: entries });
});

timetableRouter.post(
  "/",
  requireRole("admin"),
  zValidator("json", createEntrySchema, rejectInvalid),
  async (c) => {
    const store = c.get("store");
    const { schoolId } = c.get("user");
    const input = c.req.valid("json");

    const classroom = await requireClassroom(store, schoolId, input.classroomId);
    if (input.teacherId) await requireTeacher(store, schoolId, input.teacherId);

    const occupied = await store.listTimetable(schoolId, {
      classroomId: classroom.id,
      day: input.day,
    });
    if (occupied.some((entry) => entry.period === input.period)) {
      throw new ConflictError(
        `${classroom.name} already has period ${input.period} on ${input.day}`
      );
    }

    const entry = await store.createTimetableEntry(schoolId, input);

    await audit(c, {
      action: "create",
      modelName: "TimetableEntry",
      objectId: entry.id,
      objectDisplay: `${classroom.name} ${entry.day} P${entry.period}`,
      changes: creationChanges({
        subject: entry.subject,
        teacherId: entry.teacherId,
      }),
    });

    return c.json({ success: true, data: entry }, 201);
  }
);
