import type { Holiday } from "@schoolcore/db/schema";
import { Hono } from "hono";
import { z } from "zod";
import { zValidator } from "@hono/zod-validator";
import { authMiddleware } from "@/middleware/auth";
import { ValidationError } from "@/errors";
import {
  buildCalendar,
  buildMarks,
  classifyDay,
  resolveDateRange,
} from "@/lib/attendance-accounting";
import {
  clampToToday,
  classroomStatistics,
  periodStatistics,
  schoolStatistics,
  type ClassroomAttendance,
} from "@/lib/attendance-statistics";
import { audit } from "@/lib/audit";
import { requireClassroom, requireYear } from "@/lib/lookups";
import { isoDate } from "@/lib/schemas";
import { rejectInvalid } from "@/lib/validate";
import type { StudentWithClassroom } from "@/store/types";
import type { AppEnv } from "@/types";

export const attendanceRouter = new Hono<AppEnv>();

const bulkAttendanceSchema = z.object({
  yearId: z.uuid().optional(),
  attendance: z
    .array(
      z.object({
        studentId: z.uuid(),
        date: isoDate,
        present: z.boolean(),
      })
    )
    .max(5000),
  // (student, date) pairs the client had on screen; omitted ones become pending
  window: z
    .object({
      studentIds: z.array(z.uuid()).max(500),
      dates: z.array(isoDate).max(400),
    })
    .optional(),
});

type BulkAttendance = z.infer<typeof bulkAttendanceSchema>;

const statisticsQuery = z.object({
  yearId: z.uuid().optional(),
  classroomId: z.uuid().optional(),
  period: z.enum(["daily", "weekly", "monthly", "overall"]).default("monthly"),
});

const key = (studentId: string, date: string) => `${studentId}:${date}`;

function validateRecords(
  input: BulkAttendance,
  context: {
    academicYearId: string;
    students: ReadonlyMap<string, StudentWithClassroom>;
    holidays: readonly Holiday[];
    today: string;
  }
): string[] {
  const errors: string[] = [];
  const seen = new Set<string>();

  input.attendance.forEach((record, index) => {
    const prefix = `Record ${index + 1}`;
    const student = context.students.get(record.studentId);

    if (!student) {
      errors.push(`${prefix}: student not found`);
      return;
    }
    if (student.classroom.academicYearId !== context.academicYearId) {
      errors.push(`${prefix}: student is not enrolled in this academic year`);
      return;
    }
    if (record.date > context.today) {
      errors.push(`${prefix}: cannot mark attendance for a future date (${record.date})`);
      return;
    }

    const calendar = buildCalendar(context.holidays, student.classroom.weekendDays);
    const day = classifyDay(calendar, new Map(), record.date);
    if (day.status === "holiday") {
      errors.push(`${prefix}: ${record.date} is a holiday (${day.label})`);
      return;
    }
    if (day.status === "weekend") {
      errors.push(`${prefix}: ${record.date} is a weekend (${day.label})`);
      return;
    }

    const recordKey = key(record.studentId, record.date);
    if (seen.has(recordKey)) {
      errors.push(`${prefix}: duplicate entry for ${student.fullName} on ${record.date}`);
      return;
    }
    seen.add(recordKey);
  });

  for (const studentId of input.window?.studentIds ?? []) {
    const student = context.students.get(studentId);
    if (!student || student.classroom.academicYearId !== context.academicYearId) {
      errors.push(`Window: student ${studentId} not found in this academic year`);
    }
  }

  return errors;
}

attendanceRouter.post(
  "/bulk",
  authMiddleware,
  zValidator("json", bulkAttendanceSchema, rejectInvalid),
  async (c) => {
    const store = c.get("store");
    const { schoolId } = c.get("user");
    const input = c.req.valid("json");

    const year = await requireYear(store, schoolId, input.yearId);
    const studentIds = new Set([
      ...input.attendance.map((r) => r.studentId),
      ...(input.window?.studentIds ?? []),
    ]);
    const [students, holidays] = await Promise.all([
      store.findStudentsByIds(schoolId, [...studentIds]),
      store.listHolidays(schoolId, year.id),
    ]);

    const errors = validateRecords(input, {
      academicYearId: year.id,
      students: new Map(students.map((s) => [s.id, s])),
      holidays,
      today: c.get("today")(),
    });
    if (errors.length > 0) {
      throw new ValidationError("Attendance batch rejected", { errors });
    }

    const submitted = new Set(input.attendance.map((r) => key(r.studentId, r.date)));
    const window = input.window ?? { studentIds: [], dates: [] };
    const deletions = window.studentIds.flatMap((studentId) =>
      window.dates
        .filter((date) => !submitted.has(key(studentId, date)))
        .map((date) => ({ studentId, date }))
    );

    const result = await store.saveAttendance(schoolId, {
      academicYearId: year.id,
      upserts: input.attendance,
      deletions,
    });

    await audit(c, {
      action: "update",
      modelName: "Attendance",
      objectId: year.id,
      objectDisplay: `Attendance batch (${year.label})`,
      changes: {
        saved: { old: null, new: result.saved },
        deleted: { old: null, new: result.deleted },
      },
    });

    return c.json({ success: true, data: result });
  }
);

attendanceRouter.get(
  "/statistics",
  authMiddleware,
  zValidator("query", statisticsQuery, rejectInvalid),
  async (c) => {
    const store = c.get("store");
    const { schoolId } = c.get("user");
    const { yearId, classroomId, period } = c.req.valid("query");
    const today = c.get("today")();

    const classroom = classroomId
      ? await requireClassroom(store, schoolId, classroomId)
      : undefined;
    const year = await requireYear(store, schoolId, yearId ?? classroom?.academicYearId);
    if (classroom && classroom.academicYearId !== year.id) {
      throw new ValidationError("Classroom is not in this academic year");
    }

    const classrooms = classroom ? [classroom] : await store.listClassrooms(schoolId, year.id);
    const [rosters, holidays] = await Promise.all([
      Promise.all(classrooms.map((room) => store.listStudents(schoolId, room.id))),
      store.listHolidays(schoolId, year.id),
    ]);
    const records = await store.listAttendance(schoolId, {
      academicYearId: year.id,
      studentIds: rosters.flat().map((s) => s.id),
      to: today,
    });

    const sources: ClassroomAttendance[] = classrooms.map((room, index) => ({
      classroomId: room.id,
      classroomName: room.name,
      calendar: buildCalendar(holidays, room.weekendDays),
      range: clampToToday(resolveDateRange({ classroom: room, academicYear: year }), today),
      students: (rosters[index] ?? []).map((student) =>
        buildMarks(records.filter((r) => r.studentId === student.id))
      ),
    }));
    const perClassroom = sources.map(classroomStatistics);
    const yearRange = clampToToday(resolveDateRange({ academicYear: year }), today);

    return c.json({
      success: true,
      data: {
        year: { id: year.id, label: year.label },
        asOf: today,
        period,
        school: schoolStatistics(perClassroom),
        classrooms: perClassroom,
        periods: yearRange ? periodStatistics(sources, yearRange, period) : [],
      },
    });
  }
);
