import { ValidationError } from "@/errors";
import {
  capitalize,
  eachDay,
  lastDayOfMonth,
  monthLabel,
  toIsoDate,
  weekdayIndex,
  weekdayName,
  type DateRange,
  type IsoDate,
} from "./dates";
import { parseWeekendDays, type WeekendMask } from "./weekend";

export type DayStatus = "present" | "absent" | "holiday" | "weekend" | "pending";

export type DayClassification = {
  date: IsoDate;
  status: DayStatus;
  label: string;
};

export type AttendanceAggregate = {
  present: number;
  absent: number;
  holiday: number;
  weekend: number;
  pending: number;
  totalDays: number;
  allowedDays: number;
  percentage: number;
};

export type MonthlyAggregate = AttendanceAggregate & {
  year: number;
  month: number;
  label: string;
  start: IsoDate;
  end: IsoDate;
};

export type SchoolCalendar = {
  holidays: ReadonlyMap<IsoDate, string>;
  weekendDays: WeekendMask;
};

/** Committed present/absent marks for one subject, by date. */
export type AttendanceMarks = ReadonlyMap<IsoDate, boolean>;

type HolidayInput = { date: string | Date; name?: string | null };
type MarkInput = { date: string | Date; present: boolean };
type Bounds = { startDate?: string | null; endDate?: string | null };

export function buildCalendar(
  holidays: readonly HolidayInput[],
  weekendDays: unknown
): SchoolCalendar {
  const byDate = new Map<IsoDate, string>();
  for (const holiday of holidays) {
    const date = toIsoDate(holiday.date);
    if (date && !byDate.has(date)) {
      byDate.set(date, holiday.name?.trim() || "Holiday");
    }
  }
  return { holidays: byDate, weekendDays: parseWeekendDays(weekendDays) };
}

export function buildMarks(records: readonly MarkInput[]): AttendanceMarks {
  const marks = new Map<IsoDate, boolean>();
  for (const record of records) {
    const date = toIsoDate(record.date);
    if (date) marks.set(date, record.present);
  }
  return marks;
}

/**
 * Classroom dates win over academic-year dates, field by field.
 * Null when either end stays unknown.
 */
export function resolveDateRange(sources: {
  classroom?: Bounds | null;
  academicYear?: Bounds | null;
}): DateRange | null {
  const startRaw = sources.classroom?.startDate ?? sources.academicYear?.startDate;
  const endRaw = sources.classroom?.endDate ?? sources.academicYear?.endDate;
  if (!startRaw || !endRaw) return null;

  const start = toIsoDate(startRaw);
  const end = toIsoDate(endRaw);
  if (!start || !end) return null;
  return { start, end };
}

export function classifyDay(
  calendar: SchoolCalendar,
  marks: AttendanceMarks,
  date: string | Date
): DayClassification {
  const day = toIsoDate(date);
  if (!day) {
    throw new ValidationError(`Invalid date: ${String(date)}`);
  }

  const holidayName = calendar.holidays.get(day);
  if (holidayName !== undefined) {
    return { date: day, status: "holiday", label: holidayName };
  }

  if (calendar.weekendDays.has(weekdayIndex(day))) {
    return { date: day, status: "weekend", label: capitalize(weekdayName(day)) };
  }

  const mark = marks.get(day);
  if (mark === undefined) {
    return { date: day, status: "pending", label: "Not Marked" };
  }
  return mark
    ? { date: day, status: "present", label: "Present" }
    : { date: day, status: "absent", label: "Absent" };
}

export function classifyRange(
  calendar: SchoolCalendar,
  marks: AttendanceMarks,
  range: DateRange
): DayClassification[] {
  return eachDay(range).map((day) => classifyDay(calendar, marks, day));
}

function finalize(
  counts: Pick<AttendanceAggregate, "present" | "absent" | "holiday" | "weekend" | "pending">
): AttendanceAggregate {
  const allowedDays = counts.present + counts.absent + counts.pending;
  const totalDays = allowedDays + counts.holiday + counts.weekend;
  const percentage =
    allowedDays > 0 ? Math.round((counts.present / allowedDays) * 100) : 0;
  return { ...counts, totalDays, allowedDays, percentage };
}

export function aggregate(
  calendar: SchoolCalendar,
  marks: AttendanceMarks,
  range: DateRange
): AttendanceAggregate {
  const counts = { present: 0, absent: 0, holiday: 0, weekend: 0, pending: 0 };
  for (const day of classifyRange(calendar, marks, range)) {
    counts[day.status] += 1;
  }
  return finalize(counts);
}

/** Componentwise sum; used for classroom totals over per-student aggregates. */
export function sumAggregates(
  parts: readonly AttendanceAggregate[]
): AttendanceAggregate {
  const counts = { present: 0, absent: 0, holiday: 0, weekend: 0, pending: 0 };
  for (const part of parts) {
    counts.present += part.present;
    counts.absent += part.absent;
    counts.holiday += part.holiday;
    counts.weekend += part.weekend;
    counts.pending += part.pending;
  }
  return finalize(counts);
}

function assertBalanced(row: AttendanceAggregate, label: string): void {
  const sum = row.present + row.absent + row.holiday + row.weekend + row.pending;
  if (sum !== row.totalDays) {
    throw new Error(
      `Attendance totals for ${label} do not balance: ${sum} != ${row.totalDays}`
    );
  }
}

export function monthlyBreakdown(
  calendar: SchoolCalendar,
  marks: AttendanceMarks,
  range: DateRange
): MonthlyAggregate[] {
  const rows: MonthlyAggregate[] = [];
  let start = range.start;

  while (start <= range.end) {
    const year = Number(start.slice(0, 4));
    const month = Number(start.slice(5, 7));
    const monthEnd = lastDayOfMonth(year, month);
    const end = monthEnd < range.end ? monthEnd : range.end;
    const label = monthLabel(year, month);

    const totals = aggregate(calendar, marks, { start, end });
    assertBalanced(totals, label);
    rows.push({ year, month, label, start, end, ...totals });

    if (monthEnd >= range.end) break;
    start = nextMonthStart(year, month);
  }

  return rows;
}

function nextMonthStart(year: number, month: number): IsoDate {
  return month === 12
    ? `${year + 1}-01-01`
    : `${year}-${String(month + 1).padStart(2, "0")}-01`;
}
