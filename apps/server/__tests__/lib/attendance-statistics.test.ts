import { describe, expect, it } from "vitest";
import { buildCalendar, buildMarks } from "@/lib/attendance-accounting";
import {
  clampToToday,
  classroomStatistics,
  periodStatistics,
  schoolStatistics,
  splitRange,
  type ClassroomAttendance,
} from "@/lib/attendance-statistics";

// June 2025: the 1st is a Sunday, the 5th a holiday
const calendar = buildCalendar([{ date: "2025-06-05", name: "Founders Day" }], [0, 6]);
const range = { start: "2025-06-01", end: "2025-06-10" };
const schoolDays = ["2025-06-02", "2025-06-03", "2025-06-04", "2025-06-06", "2025-06-09", "2025-06-10"];

const partial = buildMarks([
  { date: "2025-06-02", present: true },
  { date: "2025-06-03", present: true },
  { date: "2025-06-04", present: true },
  { date: "2025-06-09", present: false },
]);
const complete = buildMarks(schoolDays.map((date) => ({ date, present: true })));

function classroom(name: string, students: ClassroomAttendance["students"]): ClassroomAttendance {
  return { classroomId: name, classroomName: name, calendar, range, students };
}

describe("classroomStatistics", () => {
  it("counts expected, recorded and pending student-days", () => {
    expect(classroomStatistics(classroom("5A", [partial, complete]))).toEqual({
      classroomId: "5A",
      classroomName: "5A",
      studentCount: 2,
      range,
      summary: {
        present: 9,
        absent: 1,
        holiday: 2,
        weekend: 6,
        pending: 2,
        totalDays: 20,
        allowedDays: 12,
        percentage: 75,
      },
      expectedRecords: 12,
      recordedRecords: 10,
      pendingRecords: 2,
      isCompleted: false,
    });
  });

  it("marks a classroom completed once nothing is pending", () => {
    expect(classroomStatistics(classroom("5B", [complete])).isCompleted).toBe(true);
  });

  it("never completes a classroom without students", () => {
    const empty = classroomStatistics(classroom("5C", []));
    expect(empty).toMatchObject({ studentCount: 0, expectedRecords: 0, isCompleted: false });
  });

  it("reports zeros when the range is unknown", () => {
    const stats = classroomStatistics({ ...classroom("5D", [complete]), range: null });
    expect(stats).toMatchObject({ expectedRecords: 0, recordedRecords: 0, isCompleted: false });
  });
});

describe("schoolStatistics", () => {
  it("rolls classrooms up with completed and pending counts", () => {
    const rooms = [
      classroomStatistics(classroom("5A", [partial, complete])),
      classroomStatistics(classroom("5B", [complete])),
      classroomStatistics(classroom("5C", [])),
    ];

    expect(schoolStatistics(rooms)).toEqual({
      totalClassrooms: 3,
      classroomsCompleted: 1,
      classroomsPending: 2,
      totalStudents: 3,
      expectedRecords: 18,
      recordedRecords: 16,
      pendingRecords: 2,
      summary: {
        present: 15,
        absent: 1,
        holiday: 3,
        weekend: 9,
        pending: 2,
        totalDays: 30,
        allowedDays: 18,
        percentage: 83,
      },
    });
  });
});

describe("clampToToday", () => {
  it("cuts the end at today", () => {
    expect(clampToToday({ start: "2025-06-01", end: "2025-06-30" }, "2025-06-10")).toEqual({
      start: "2025-06-01",
      end: "2025-06-10",
    });
    expect(clampToToday(range, "2025-07-01")).toEqual(range);
    expect(clampToToday(null, "2025-06-10")).toBeNull();
  });
});

describe("splitRange", () => {
  it("cuts seven-day weeks from the range start", () => {
    expect(splitRange({ start: "2025-06-01", end: "2025-06-20" }, "weekly")).toEqual([
      { label: "Week 1", range: { start: "2025-06-01", end: "2025-06-07" } },
      { label: "Week 2", range: { start: "2025-06-08", end: "2025-06-14" } },
      { label: "Week 3", range: { start: "2025-06-15", end: "2025-06-20" } },
    ]);
  });

  it("cuts calendar months across a year end", () => {
    expect(
      splitRange({ start: "2025-12-15", end: "2026-01-10" }, "monthly").map((c) => c.label)
    ).toEqual(["December 2025", "January 2026"]);
  });

  it("labels days by date and keeps overall whole", () => {
    expect(
      splitRange({ start: "2025-06-01", end: "2025-06-03" }, "daily").map((c) => c.label)
    ).toEqual(["2025-06-01", "2025-06-02", "2025-06-03"]);
    expect(splitRange(range, "overall")).toEqual([{ label: "Overall", range }]);
  });

  it("is empty for a reversed range", () => {
    expect(splitRange({ start: "2025-06-10", end: "2025-06-01" }, "daily")).toEqual([]);
  });
});

describe("periodStatistics", () => {
  it("sums every student per week", () => {
    const weeks = periodStatistics([classroom("5A", [partial, complete])], range, "weekly");

    expect(weeks).toEqual([
      {
        label: "Week 1",
        start: "2025-06-01",
        end: "2025-06-07",
        present: 7,
        absent: 0,
        holiday: 2,
        weekend: 4,
        pending: 1,
        totalDays: 14,
        allowedDays: 8,
        percentage: 88,
      },
      {
        label: "Week 2",
        start: "2025-06-08",
        end: "2025-06-10",
        present: 2,
        absent: 1,
        holiday: 0,
        weekend: 2,
        pending: 1,
        totalDays: 6,
        allowedDays: 4,
        percentage: 50,
      },
    ]);
  });

  it("only counts days inside each classroom's own range", () => {
    const late = { ...classroom("5E", [complete]), range: { start: "2025-06-09", end: "2025-06-10" } };
    const [overall] = periodStatistics([late], range, "overall");
    expect(overall).toMatchObject({ present: 2, totalDays: 2 });
  });
});
