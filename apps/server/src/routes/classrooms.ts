import type { Classroom } from "@schoolcore/db/schema";
import { Hono } from "hono";
import { z } from "zod";
import { zValidator } from "@hono/zod-validator";
import { authMiddleware, requireRole } from "@/middleware/auth";
import { NotFoundError, ValidationError } from "@/errors";
import {
  aggregate,
  buildCalendar,
  buildMarks,
  classifyDay,
  resolveDateRange,
  sumAggregates,
} from "@/lib/attendance-accounting";
import { audit, creationChanges, diffChanges } from "@/lib/audit";
import { requireClassroom, requireYear } from "@/lib/lookups";
import { idParam, isoDate, weekendDaysInput } from "@/lib/schemas";
import { rejectInvalid } from "@/lib/validate";
import { parseWeekendDays } from "@/lib/weekend";
import type { AppEnv } from "@/types";

export const classRouter = new Hono<AppEnv>();

// the JSON-text form is what older clients send
const weekendDaysField = z.union([weekendDaysInput, z.string()]);

const createClassroomSchema = z.object({
  academicYearId: z.uuid().optional(),
  name: z.string().trim().min(1).max(50),
  startDate: isoDate.nullish(),
  endDate: isoDate.nullish(),
  weekendDays: weekendDaysField.default([]),
});

const updateClassroomSchema = z.object({
  name: z.string().trim().min(1).max(50).optional(),
  startDate: isoDate.nullish(),
  endDate: isoDate.nullish(),
  weekendDays: weekendDaysField.optional(),
});

const listQuery = z.object({ yearId: z.uuid().optional() });
const attendanceQuery = z.object({
  yearId: z.uuid().optional(),
  date: isoDate.optional(),
});

function normalizeWeekendDays(value: number[] | string): number[] {
  return [...parseWeekendDays(value)].sort((a, b) => a - b);
}

function assertDateOrder(startDate?: string | null, endDate?: string | null) {
  if (startDate && endDate && endDate < startDate) {
    throw new ValidationError("End date must not be before start date");
  }
}

function serialize(classroom: Classroom) {
  return { ...classroom, weekendDays: normalizeWeekendDays(classroom.weekendDays) };
}

classRouter.use(authMiddleware);

classRouter.get("/", zValidator("query", listQuery, rejectInvalid), async (c) => {
  const { schoolId } = c.get("user");
  const { yearId } = c.req.valid("query");
  const classrooms = await c.get("store").listClassrooms(schoolId, yearId);
  return c.json({ success: true, data: classrooms.map(serialize) });
});

classRouter.post(
  "/",
  requireRole("admin"),
  zValidator("json", createClassroomSchema, rejectInvalid),
  async (c) => {
    const store = c.get("store");
    const { schoolId } = c.get("user");
    const input = c.req.valid("json");

    assertDateOrder(input.startDate, input.endDate);
    const year = await requireYear(store, schoolId, input.academicYearId);

    const classroom = await store.createClassroom(schoolId, {
      academicYearId: year.id,
      name: input.name,
      startDate: input.startDate ?? null,
      endDate: input.endDate ?? null,
      weekendDays: normalizeWeekendDays(input.weekendDays),
    });

    await audit(c, {
      action: "create",
      modelName: "Classroom",
      objectId: classroom.id,
      objectDisplay: `${classroom.name} (${year.label})`,
      changes: creationChanges({
        name: classroom.name,
        startDate: classroom.startDate,
        endDate: classroom.endDate,
        weekendDays: classroom.weekendDays,
      }),
    });

    return c.json({ success: true, data: serialize(classroom) }, 201);
  }
);

classRouter.get("/:id", zValidator("param", idParam, rejectInvalid), async (c) => {
  const { schoolId } = c.get("user");
  const { id } = c.req.valid("param");
  const classroom = await requireClassroom(c.get("store"), schoolId, id);
  return c.json({ success: true, data: serialize(classroom) });
});

classRouter.patch(
  "/:id",
  requireRole("admin"),
  zValidator("param", idParam, rejectInvalid),
  zValidator("json", updateClassroomSchema, rejectInvalid),
  async (c) => {
    const store = c.get("store");
    const { schoolId } = c.get("user");
    const { id } = c.req.valid("param");
    const input = c.req.valid("json");

    const before = await requireClassroom(store, schoolId, id);
    const patch = {
      ...(input.name !== undefined && { name: input.name }),
      ...(input.startDate !== undefined && { startDate: input.startDate }),
      ...(input.endDate !== undefined && { endDate: input.endDate }),
      ...(input.weekendDays !== undefined && {
        weekendDays: normalizeWeekendDays(input.weekendDays),
      }),
    };
    assertDateOrder(
      patch.startDate !== undefined ? patch.startDate : before.startDate,
      patch.endDate !== undefined ? patch.endDate : before.endDate
    );

    const updated = await store.updateClassroom(schoolId, id, patch);
    if (!updated) throw new NotFoundError("Classroom not found");

    await audit(c, {
      action: "update",
      modelName: "Classroom",
      objectId: updated.id,
      objectDisplay: updated.name,
      changes: diffChanges(serialize(before), serialize(updated)),
    });

    return c.json({ success: true, data: serialize(updated) });
  }
);

classRouter.get(
  "/:id/students",
  zValidator("param", idParam, rejectInvalid),
  async (c) => {
    const store = c.get("store");
    const { schoolId } = c.get("user");
    const { id } = c.req.valid("param");

    await requireClassroom(store, schoolId, id);
    const students = await store.listStudents(schoolId, id);
    return c.json({ success: true, data: students });
  }
);

classRouter.get(
  "/:id/attendance",
  zValidator("param", idParam, rejectInvalid),
  zValidator("query", attendanceQuery, rejectInvalid),
  async (c) => {
    const store = c.get("store");
    const { schoolId } = c.get("user");
    const { id } = c.req.valid("param");
    const { yearId, date } = c.req.valid("query");

    const classroom = await requireClassroom(store, schoolId, id);
    const year = await requireYear(store, schoolId, yearId ?? classroom.academicYearId);
    const [students, holidays] = await Promise.all([
      store.listStudents(schoolId, id),
      store.listHolidays(schoolId, year.id),
    ]);

    const range = resolveDateRange({ classroom, academicYear: year });
    const records = await store.listAttendance(schoolId, {
      academicYearId: year.id,
      studentIds: students.map((s) => s.id),
      ...(range && { from: range.start, to: range.end }),
    });
    const calendar = buildCalendar(holidays, classroom.weekendDays);

    const rows = students.map((student) => {
      const marks = buildMarks(records.filter((r) => r.studentId === student.id));
      return {
        student,
        summary: range ? aggregate(calendar, marks, range) : sumAggregates([]),
        day: date ? classifyDay(calendar, marks, date) : null,
      };
    });

    return c.json({
      success: true,
      data: {
        classroom: serialize(classroom),
        range,
        summary: sumAggregates(rows.map((row) => row.summary)),
        students: rows,
      },
    });
  }
);
