import { randomUUID } from "node:crypto";
import { beforeEach, describe, expect, it } from "vitest";
import { addStudent, authHeader, jsonRequest, seedSchool } from "../helpers/fixtures";

let ctx: ReturnType<typeof seedSchool>;
let asha: ReturnType<typeof addStudent>;
let ravi: ReturnType<typeof addStudent>;

beforeEach(() => {
  ctx = seedSchool();
  asha = addStudent(ctx.store, ctx.schoolId, ctx.classroom.id, "Asha");
  ravi = addStudent(ctx.store, ctx.schoolId, ctx.classroom.id, "Ravi");
  ctx.store.holidays.push({
    id: randomUUID(),
    academicYearId: ctx.year.id,
    date: "2025-06-05",
    name: "Founders Day",
  });
});

function mark(studentId: string, date: string, present: boolean) {
  ctx.store.attendance.push({
    id: randomUUID(),
    studentId,
    academicYearId: ctx.year.id,
    date,
    present,
  });
}

function marksOf(studentId: string) {
  return ctx.store.attendance
    .filter((a) => a.studentId === studentId)
    .map((a) => [a.date, a.present])
    .sort();
}

describe("POST /attendance/bulk", () => {
  it("upserts records and clears omitted days inside the window", async () => {
    mark(asha.id, "2025-06-03", true);
    mark(asha.id, "2025-06-04", true);
    mark(ravi.id, "2025-06-04", false);

    const res = await ctx.app.request(
      "/attendance/bulk",
      jsonRequest(ctx.staffToken, {
        attendance: [
          { studentId: asha.id, date: "2025-06-02", present: true },
          { studentId: asha.id, date: "2025-06-03", present: false },
        ],
        window: {
          studentIds: [asha.id],
          dates: ["2025-06-02", "2025-06-03", "2025-06-04"],
        },
      })
    );

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ success: true, data: { saved: 2, deleted: 1 } });
    expect(marksOf(asha.id)).toEqual([
      ["2025-06-02", true],
      ["2025-06-03", false],
    ]);
    expect(marksOf(ravi.id)).toEqual([["2025-06-04", false]]);
    expect(ctx.store.auditLogs.map((log) => log.modelName)).toEqual(["Attendance"]);
  });

  it("leaves other days alone without a window", async () => {
    mark(asha.id, "2025-06-04", true);

    const res = await ctx.app.request(
      "/attendance/bulk",
      jsonRequest(ctx.staffToken, {
        attendance: [{ studentId: asha.id, date: "2025-06-02", present: false }],
      })
    );

    expect(await res.json()).toEqual({ success: true, data: { saved: 1, deleted: 0 } });
    expect(marksOf(asha.id)).toEqual([
      ["2025-06-02", false],
      ["2025-06-04", true],
    ]);
  });

  it("rejects the whole batch when any record is invalid", async () => {
    const stranger = randomUUID();
    const res = await ctx.app.request(
      "/attendance/bulk",
      jsonRequest(ctx.staffToken, {
        attendance: [
          { studentId: ravi.id, date: "2025-06-02", present: true },
          { studentId: asha.id, date: "2025-06-07", present: true },
          { studentId: asha.id, date: "2025-06-05", present: true },
          { studentId: asha.id, date: "2025-06-11", present: true },
          { studentId: stranger, date: "2025-06-02", present: true },
          { studentId: ravi.id, date: "2025-06-02", present: false },
        ],
      })
    );

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      success: false,
      error: "Attendance batch rejected",
      code: "VALIDATION_ERROR",
      details: {
        errors: [
          "Record 2: 2025-06-07 is a weekend (Saturday)",
          "Record 3: 2025-06-05 is a holiday (Founders Day)",
          "Record 4: cannot mark attendance for a future date (2025-06-11)",
          "Record 5: student not found",
          "Record 6: duplicate entry for Ravi on 2025-06-02",
        ],
      },
    });
    expect(ctx.store.attendance).toEqual([]);
  });

  it("rejects students from another academic year", async () => {
    const nextYear = {
      id: randomUUID(),
      schoolId: ctx.schoolId,
      label: "2026-2027",
      startDate: "2026-06-01",
      endDate: "2027-03-31",
      isCurrent: false,
    };
    ctx.store.years.push(nextYear);

    const res = await ctx.app.request(
      "/attendance/bulk",
      jsonRequest(ctx.staffToken, {
        yearId: nextYear.id,
        attendance: [{ studentId: asha.id, date: "2025-06-02", present: true }],
      })
    );

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      details: { errors: ["Record 1: student is not enrolled in this academic year"] },
    });
  });

  it("answers malformed bodies with the schema error", async () => {
    const res = await ctx.app.request(
      "/attendance/bulk",
      jsonRequest(ctx.staffToken, {
        attendance: [{ studentId: asha.id, date: "2025-6-2", present: true }],
      })
    );

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ success: false, error: "Invalid request schema" });
  });

  it("requires a token", async () => {
    const res = await ctx.app.request("/attendance/bulk", { method: "POST" });
    expect(res.status).toBe(401);
  });
});

describe("GET /students/:id/attendance", () => {
  it("reports days, totals and the monthly split", async () => {
    mark(asha.id, "2025-06-02", true);
    mark(asha.id, "2025-06-03", true);
    mark(asha.id, "2025-06-04", true);
    mark(asha.id, "2025-06-09", false);

    const res = await ctx.app.request(
      `/students/${asha.id}/attendance`,
      authHeader(ctx.staffToken)
    );
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      success: true,
      data: {
        range: { start: "2025-06-01", end: "2025-06-10" },
        summary: {
          present: 3,
          absent: 1,
          holiday: 1,
          weekend: 3,
          pending: 2,
          totalDays: 10,
          allowedDays: 6,
          percentage: 50,
        },
        days: expect.arrayContaining([
          { date: "2025-06-05", status: "holiday", label: "Founders Day" },
        ]),
        monthly: [{ label: "June 2025", start: "2025-06-01", end: "2025-06-10" }],
      },
    });
  });
});

describe("GET /classrooms/:id/attendance", () => {
  it("sums per-student totals and shows one day's marks", async () => {
    mark(asha.id, "2025-06-02", true);
    mark(ravi.id, "2025-06-02", false);

    const res = await ctx.app.request(
      `/classrooms/${ctx.classroom.id}/attendance?date=2025-06-02`,
      authHeader(ctx.staffToken)
    );
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      data: {
        summary: {
          present: 1,
          absent: 1,
          holiday: 2,
          weekend: 6,
          pending: 10,
          totalDays: 20,
          allowedDays: 12,
          percentage: 8,
        },
        students: [{ day: { label: "Present" } }, { day: { label: "Absent" } }],
      },
    });
  });
});

describe("GET /attendance/statistics", () => {
  const schoolDays = ["2025-06-02", "2025-06-03", "2025-06-04", "2025-06-06", "2025-06-09", "2025-06-10"];

  it("reports per-classroom completion and school totals up to today", async () => {
    ctx.store.classrooms.push({
      id: randomUUID(),
      schoolId: ctx.schoolId,
      academicYearId: ctx.year.id,
      name: "Grade 6B",
      startDate: null,
      endDate: null,
      weekendDays: [0, 6],
    });
    for (const date of schoolDays) mark(asha.id, date, true);
    mark(ravi.id, "2025-06-02", true);

    const res = await ctx.app.request("/attendance/statistics", authHeader(ctx.staffToken));

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      data: {
        year: { id: ctx.year.id, label: "2025-2026" },
        asOf: "2025-06-10",
        period: "monthly",
        school: {
          totalClassrooms: 2,
          classroomsCompleted: 0,
          classroomsPending: 2,
          totalStudents: 2,
          expectedRecords: 12,
          recordedRecords: 7,
          pendingRecords: 5,
        },
        classrooms: [
          { classroomName: "Grade 5A", studentCount: 2, isCompleted: false },
          {
            classroomName: "Grade 6B",
            studentCount: 0,
            range: { start: "2025-06-01", end: "2025-06-10" },
          },
        ],
        periods: [
          { label: "June 2025", start: "2025-06-01", end: "2025-06-10", present: 7, pending: 5 },
        ],
      },
    });
  });

  it("narrows to one classroom and marks it completed once every day is recorded", async () => {
    for (const date of schoolDays) {
      mark(asha.id, date, true);
      mark(ravi.id, date, date !== "2025-06-09");
    }

    const res = await ctx.app.request(
      `/attendance/statistics?classroomId=${ctx.classroom.id}&period=weekly`,
      authHeader(ctx.staffToken)
    );

    expect(await res.json()).toMatchObject({
      data: {
        school: { totalClassrooms: 1, classroomsCompleted: 1, classroomsPending: 0 },
        classrooms: [{ isCompleted: true, pendingRecords: 0, recordedRecords: 12 }],
        periods: [
          { label: "Week 1", start: "2025-06-01", end: "2025-06-07", present: 8 },
          { label: "Week 2", start: "2025-06-08", end: "2025-06-10", present: 3, absent: 1 },
        ],
      },
    });
  });

  it("rejects an unknown period", async () => {
    const res = await ctx.app.request(
      "/attendance/statistics?period=hourly",
      authHeader(ctx.staffToken)
    );
    expect(res.status).toBe(400);
  });
});
