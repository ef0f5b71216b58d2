import { Hono } from "hono";
import { z } from "zod";
import { zValidator } from "@hono/zod-validator";
import { authMiddleware, requireRole } from "@/middleware/auth";
import { ConflictError } from "@/errors";
import {
  aggregate,
  buildCalendar,
  buildMarks,
  classifyRange,
  monthlyBreakdown,
  resolveDateRange,
  sumAggregates,
} from "@/lib/attendance-accounting";
import { audit, creationChanges } from "@/lib/audit";
import { requireClassroom, requireStudent, requireYear } from "@/lib/lookups";
import { idParam } from "@/lib/schemas";
import { rejectInvalid } from "@/lib/validate";
import type { AppEnv } from "@/types";

export const studentsRouter = new Hono<AppEnv>();

const createStudentSchema = z.object({
  classroomId: z.uuid(),
  fullName: z.string().trim().min(1).max(120),
  enrollmentNumber: z.string().trim().min(1).max(40),
});

const attendanceQuery = z.object({ yearId: z.uuid().optional() });

studentsRouter.use(authMiddleware);

studentsRouter.post(
  "/",
  requireRole("admin"),
  zValidator("json", createStudentSchema, rejectInvalid),
  async (c) => {
    const store = c.get("store");
    const { schoolId } = c.get("user");
    const input = c.req.valid("json");

    const classroom = await requireClassroom(store, schoolId, input.classroomId);
    const enrolled = await store.findEnrollment(
      schoolId,
      input.enrollmentNumber,
      classroom.academicYearId
    );
    if (enrolled) {
      throw new ConflictError(
        `Enrollment number ${input.enrollmentNumber} is already in ${enrolled.classroom.name} this academic year`
      );
    }

    const student = await store.createStudent(schoolId, input);

    await audit(c, {
      action: "create",
      modelName: "Student",
      objectId: student.id,
      objectDisplay: `${student.fullName} (${student.enrollmentNumber})`,
      changes: creationChanges({
        fullName: student.fullName,
        enrollmentNumber: student.enrollmentNumber,
        classroom: classroom.name,
      }),
    });

    return c.json({ success: true, data: student }, 201);
  }
);

studentsRouter.get("/:id", zValidator("param", idParam, rejectInvalid), async (c) => {
  const { schoolId } = c.get("user");
  const { id } = c.req.valid("param");
  const student = await requireStudent(c.get("store"), schoolId, id);
  return c.json({ success: true, data: student });
});

studentsRouter.get(
  "/:id/attendance",
  zValidator("param", idParam, rejectInvalid),
  zValidator("query", attendanceQuery, rejectInvalid),
  async (c) => {
    const store = c.get("store");
    const { schoolId } = c.get("user");
    const { id } = c.req.valid("param");
    const { yearId } = c.req.valid("query");

    const student = await requireStudent(store, schoolId, id);
    const { classroom } = student;
    const year = await requireYear(store, schoolId, yearId ?? classroom.academicYearId);

    const range = resolveDateRange({ classroom, academicYear: year });
    if (!range) {
      return c.json({
        success: true,
        data: { student, range: null, days: [], summary: sumAggregates([]), monthly: [] },
      });
    }

    const [holidays, records] = await Promise.all([
      store.listHolidays(schoolId, year.id),
      store.listAttendance(schoolId, {
        academicYearId: year.id,
        studentIds: [student.id],
        from: range.start,
        to: range.end,
      }),
    ]);

    const calendar = buildCalendar(holidays, classroom.weekendDays);
    const marks = buildMarks(records);

    return c.json({
      success: true,
      data: {
        student,
        range,
        days: classifyRange(calendar, marks, range),
        summary: aggregate(calendar, marks, range),
        monthly: monthlyBreakdown(calendar, marks, range),
      },
    });
  }
);
