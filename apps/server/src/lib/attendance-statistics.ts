import {
  aggregate,
  sumAggregates,
  type AttendanceAggregate,
  type AttendanceMarks,
  type SchoolCalendar,
} from "./attendance-accounting";
import { addDays, lastDayOfMonth, monthLabel, type DateRange, type IsoDate } from "./dates";

export type StatisticsPeriod = "daily" | "weekly" | "monthly" | "overall";

/** One classroom's inputs: its calendar, its resolved range and a marks map per student. */
export type ClassroomAttendance = {
  classroomId: string;
  classroomName: string;
  calendar: SchoolCalendar;
  range: DateRange | null;
  students: readonly AttendanceMarks[];
};

export type ClassroomStatistics = {
  classroomId: string;
  classroomName: string;
  studentCount: number;
  range: DateRange | null;
  summary: AttendanceAggregate;
  expectedRecords: number;
  recordedRecords: number;
  pendingRecords: number;
  isCompleted: boolean;
};

export type SchoolStatistics = {
  totalClassrooms: number;
  classroomsCompleted: number;
  classroomsPending: number;
  totalStudents: number;
  expectedRecords: number;
  recordedRecords: number;
  pendingRecords: number;
  summary: AttendanceAggregate;
};

export type PeriodStatistics = AttendanceAggregate & {
  label: string;
  start: IsoDate;
  end: IsoDate;
};

/** Cuts the range off at today; days after today are not due yet. */
export function clampToToday(range: DateRange | null, today: IsoDate): DateRange | null {
  if (!range) return null;
  return { start: range.start, end: range.end < today ? range.end : today };
}

function intersect(a: DateRange, b: DateRange): DateRange {
  return {
    start: a.start > b.start ? a.start : b.start,
    end: a.end < b.end ? a.end : b.end,
  };
}

function totalsOver(source: ClassroomAttendance, window: DateRange): AttendanceAggregate {
  if (!source.range) return sumAggregates([]);
  const overlap = intersect(source.range, window);
  return sumAggregates(
    source.students.map((marks) => aggregate(source.calendar, marks, overlap))
  );
}

/**
 * Expected records are the student-days that need a mark; a classroom is
 * completed once none of them is pending. A classroom without students
 * never counts as completed.
 */
export function classroomStatistics(source: ClassroomAttendance): ClassroomStatistics {
  const summary = source.range ? totalsOver(source, source.range) : sumAggregates([]);
  const studentCount = source.students.length;

  return {
    classroomId: source.classroomId,
    classroomName: source.classroomName,
    studentCount,
    range: source.range,
    summary,
    expectedRecords: summary.allowedDays,
    recordedRecords: summary.present + summary.absent,
    pendingRecords: summary.pending,
    isCompleted: studentCount > 0 && summary.pending === 0,
  };
}

export function schoolStatistics(classrooms: readonly ClassroomStatistics[]): SchoolStatistics {
  const completed = classrooms.filter((c) => c.isCompleted).length;
  const summary = sumAggregates(classrooms.map((c) => c.summary));

  return {
    totalClassrooms: classrooms.length,
    classroomsCompleted: completed,
    classroomsPending: classrooms.length - completed,
    totalStudents: classrooms.reduce((sum, c) => sum + c.studentCount, 0),
    expectedRecords: summary.allowedDays,
    recordedRecords: summary.present + summary.absent,
    pendingRecords: summary.pending,
    summary,
  };
}

function chunkEnd(start: IsoDate, period: Exclude<StatisticsPeriod, "overall">): IsoDate {
  switch (period) {
    case "daily":
      return start;
    case "weekly":
      return addDays(start, 6);
    case "monthly":
      return lastDayOfMonth(Number(start.slice(0, 4)), Number(start.slice(5, 7)));
  }
}

/** Splits a range into labelled chunks; weeks run seven days from the range start. */
export function splitRange(
  range: DateRange,
  period: StatisticsPeriod
): { label: string; range: DateRange }[] {
  if (range.start > range.end) return [];
  if (period === "overall") return [{ label: "Overall", range }];

  const chunks: { label: string; range: DateRange }[] = [];
  let start = range.start;
  for (let week = 1; start <= range.end; week += 1) {
    const stop = chunkEnd(start, period);
    const end = stop < range.end ? stop : range.end;
    const label =
      period === "daily"
        ? start
        : period === "weekly"
          ? `Week ${week}`
          : monthLabel(Number(start.slice(0, 4)), Number(start.slice(5, 7)));
    chunks.push({ label, range: { start, end } });
    start = addDays(end, 1);
  }
  return chunks;
}

export function periodStatistics(
  sources: readonly ClassroomAttendance[],
  range: DateRange,
  period: StatisticsPeriod
): PeriodStatistics[] {
  return splitRange(range, period).map(({ label, range: chunk }) => ({
    label,
    start: chunk.start,
    end: chunk.end,
    ...sumAggregates(sources.map((source) => totalsOver(source, chunk))),
  }));
}
