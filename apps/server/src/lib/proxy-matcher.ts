import type {
  Absence,
  Classroom,
  ProxyRecord,
  ProxyStatus,
  Teacher,
  TimetableEntry,
  Weekday,
} from "@schoolcore/db/schema";
import {
  AlreadyAssignedError,
  InvalidDateError,
  InvalidTransitionError,
  NotFoundError,
  SelfAssignmentError,
  TeacherUnavailableError,
  ValidationError,
} from "@/errors";
import { toIsoDate, weekdayName, type IsoDate } from "./dates";

export type TimetableSlot = Pick<
  TimetableEntry,
  "classroomId" | "day" | "period" | "subject" | "teacherId"
>;
export type SnapshotAbsence = Pick<Absence, "id" | "teacherId" | "date" | "status">;
export type SnapshotProxy = Pick<
  ProxyRecord,
  | "id"
  | "classroomId"
  | "day"
  | "period"
  | "originalTeacherId"
  | "proxyTeacherId"
  | "date"
  | "status"
>;

export type ProxySnapshot = {
  date: IsoDate;
  absences: readonly SnapshotAbsence[];
  timetable: readonly TimetableSlot[];
  proxies: readonly SnapshotProxy[];
  teachers: readonly Pick<Teacher, "id" | "fullName">[];
  classrooms?: readonly Pick<Classroom, "id" | "name">[];
};

export type CoverageNeed = {
  classroomId: string;
  classroomName: string;
  day: Weekday;
  period: number;
  subject: string;
  absenceId: string;
  absentTeacherId: string;
  absentTeacherName: string;
  existingProxy: SnapshotProxy | null;
};

export type UnavailableReason = "has scheduled class" | "already proxying this period";

export type SubstituteCandidate = {
  teacherId: string;
  fullName: string;
  proxyCount: number;
  unavailableReason: UnavailableReason | null;
  available: boolean;
};

export type AssignProxyRequest = {
  absenceId: string;
  classroomId: string;
  period: number;
  proxyTeacherId: string;
  subject?: string;
  reason?: string;
};

export type NewProxyRecord = {
  absenceId: string;
  classroomId: string;
  day: Weekday;
  period: number;
  originalTeacherId: string;
  proxyTeacherId: string;
  subject: string;
  date: IsoDate;
  status: "assigned";
  reason: string;
};

export type ProxyDaySchedule = {
  teacherId: string;
  date: IsoDate;
  day: Weekday;
  proxies: SnapshotProxy[];
  freePeriods: number[];
  totalPeriods: number;
};

const UNKNOWN = "Unknown";

function isActive(proxy: Pick<SnapshotProxy, "status">): boolean {
  return proxy.status !== "cancelled";
}

function snapshotDay(snapshot: ProxySnapshot): { date: IsoDate; day: Weekday } {
  const date = toIsoDate(snapshot.date);
  if (!date) throw new ValidationError(`Invalid date: ${snapshot.date}`);
  return { date, day: weekdayName(date) };
}

function sameDate(value: string, date: IsoDate): boolean {
  return toIsoDate(value) === date;
}

function absentOn(snapshot: ProxySnapshot, date: IsoDate): SnapshotAbsence[] {
  return snapshot.absences.filter(
    (a) => a.status === "absent" && sameDate(a.date, date)
  );
}

function teacherName(snapshot: ProxySnapshot, teacherId: string): string {
  return snapshot.teachers.find((t) => t.id === teacherId)?.fullName ?? UNKNOWN;
}

function classroomName(snapshot: ProxySnapshot, classroomId: string): string {
  return snapshot.classrooms?.find((c) => c.id === classroomId)?.name ?? UNKNOWN;
}

export function affectedPeriods(snapshot: ProxySnapshot): CoverageNeed[] {
  const { date, day } = snapshotDay(snapshot);
  const needs: CoverageNeed[] = [];

  for (const absence of absentOn(snapshot, date)) {
    const seen = new Set<string>();

    for (const slot of snapshot.timetable) {
      if (slot.teacherId !== absence.teacherId || slot.day !== day) continue;

      // duplicate timetable rows for one slot: first one wins
      const key = `${slot.classroomId}:${slot.period}`;
      if (seen.has(key)) continue;
      seen.add(key);

      const existingProxy =
        snapshot.proxies.find(
          (p) =>
            isActive(p) &&
            p.originalTeacherId === absence.teacherId &&
            p.classroomId === slot.classroomId &&
            p.period === slot.period &&
            sameDate(p.date, date)
        ) ?? null;

      needs.push({
        classroomId: slot.classroomId,
        classroomName: classroomName(snapshot, slot.classroomId),
        day,
        period: slot.period,
        subject: slot.subject,
        absenceId: absence.id,
        absentTeacherId: absence.teacherId,
        absentTeacherName: teacherName(snapshot, absence.teacherId),
        existingProxy,
      });
    }
  }

  return needs.sort(
    (a, b) =>
      a.period - b.period || a.classroomName.localeCompare(b.classroomName)
  );
}

function proxyCountFor(snapshot: ProxySnapshot, teacherId: string, date: IsoDate) {
  return snapshot.proxies.filter(
    (p) => isActive(p) && p.proxyTeacherId === teacherId && sameDate(p.date, date)
  ).length;
}

function unavailableReasonFor(
  snapshot: ProxySnapshot,
  teacherId: string,
  date: IsoDate,
  day: Weekday,
  period: number
): UnavailableReason | null {
  const hasClass = snapshot.timetable.some(
    (t) => t.teacherId === teacherId && t.day === day && t.period === period
  );
  if (hasClass) return "has scheduled class";

  const alreadyProxying = snapshot.proxies.some(
    (p) =>
      isActive(p) &&
      p.proxyTeacherId === teacherId &&
      p.day === day &&
      p.period === period &&
      sameDate(p.date, date)
  );
  if (alreadyProxying) return "already proxying this period";

  return null;
}

/**
 * Every teacher who is in school that day, with the reason they cannot take
 * this period if any. Available teachers come first, then the lightest
 * proxy load.
 */
export function eligibleSubstitutes(
  snapshot: ProxySnapshot,
  need: Pick<CoverageNeed, "period">
): SubstituteCandidate[] {
  const { date, day } = snapshotDay(snapshot);
  const absentIds = new Set(absentOn(snapshot, date).map((a) => a.teacherId));

  return snapshot.teachers
    .filter((teacher) => !absentIds.has(teacher.id))
    .map((teacher) => {
      const unavailableReason = unavailableReasonFor(
        snapshot,
        teacher.id,
        date,
        day,
        need.period
      );
      return {
        teacherId: teacher.id,
        fullName: teacher.fullName,
        proxyCount: proxyCountFor(snapshot, teacher.id, date),
        unavailableReason,
        available: unavailableReason === null,
      };
    })
    .sort((a, b) => {
      if (a.available !== b.available) return a.available ? -1 : 1;
      return a.proxyCount - b.proxyCount || a.fullName.localeCompare(b.fullName);
    });
}

/**
 * Validates a proxy assignment against the day's snapshot and returns the
 * record to store. Only the current day can be staffed.
 */
export function assignProxy(
  snapshot: ProxySnapshot,
  request: AssignProxyRequest,
  today: IsoDate
): NewProxyRecord {
  const absence = snapshot.absences.find((a) => a.id === request.absenceId);
  if (!absence) throw new NotFoundError("Absence not found");
  if (absence.status !== "absent") {
    throw new ValidationError("Absence was retracted; the teacher is present");
  }

  const date = toIsoDate(absence.date);
  if (!date) throw new ValidationError(`Invalid date: ${absence.date}`);
  if (date !== today) {
    throw new InvalidDateError(
      `Proxies can only be assigned for today (${today}), not ${date}`
    );
  }

  if (request.proxyTeacherId === absence.teacherId) {
    throw new SelfAssignmentError();
  }

  const day = weekdayName(date);
  const active = snapshot.proxies.find(
    (p) =>
      isActive(p) &&
      p.classroomId === request.classroomId &&
      p.period === request.period &&
      sameDate(p.date, date)
  );
  if (active) {
    throw new AlreadyAssignedError({
      proxyId: active.id,
      proxyTeacherId: active.proxyTeacherId,
    });
  }

  if (snapshot.classrooms && !snapshot.classrooms.some((c) => c.id === request.classroomId)) {
    throw new NotFoundError("Classroom not found");
  }

  const slot = snapshot.timetable.find(
    (t) =>
      t.classroomId === request.classroomId &&
      t.day === day &&
      t.period === request.period &&
      t.teacherId === absence.teacherId
  );
  if (!slot) {
    throw new ValidationError(
      `The absent teacher has no class in period ${request.period} on ${day}`
    );
  }

  if (!snapshot.teachers.some((t) => t.id === request.proxyTeacherId)) {
    throw new NotFoundError("Proxy teacher not found");
  }

  const substituteAbsent = absentOn(snapshot, date).some(
    (a) => a.teacherId === request.proxyTeacherId
  );
  if (substituteAbsent) {
    throw new TeacherUnavailableError("absent on this date");
  }

  const reason = unavailableReasonFor(
    snapshot,
    request.proxyTeacherId,
    date,
    day,
    request.period
  );
  if (reason) throw new TeacherUnavailableError(reason);

  return {
    absenceId: absence.id,
    classroomId: request.classroomId,
    day,
    period: request.period,
    originalTeacherId: absence.teacherId,
    proxyTeacherId: request.proxyTeacherId,
    subject: request.subject?.trim() || slot.subject,
    date,
    status: "assigned",
    reason: request.reason ?? "",
  };
}

export type ProxyTransition = {
  status: Exclude<ProxyStatus, "assigned">;
  completedAt: string | null;
};

/** assigned → completed | cancelled; both targets are terminal. */
export function transitionProxy(
  proxy: Pick<ProxyRecord, "status">,
  next: Exclude<ProxyStatus, "assigned">,
  now: Date = new Date()
): ProxyTransition {
  if (proxy.status !== "assigned") {
    throw new InvalidTransitionError(proxy.status, next);
  }
  return {
    status: next,
    completedAt: next === "completed" ? now.toISOString() : null,
  };
}

export function proxyScheduleForDay(
  snapshot: ProxySnapshot,
  teacherId: string,
  periodsPerDay: number
): ProxyDaySchedule {
  const { date, day } = snapshotDay(snapshot);

  const proxies = snapshot.proxies
    .filter(
      (p) => isActive(p) && p.proxyTeacherId === teacherId && sameDate(p.date, date)
    )
    .sort((a, b) => a.period - b.period);

  const busy = new Set(proxies.map((p) => p.period));
  for (const slot of snapshot.timetable) {
    if (slot.teacherId === teacherId && slot.day === day) busy.add(slot.period);
  }

  const freePeriods: number[] = [];
  for (let period = 1; period <= periodsPerDay; period++) {
    if (!busy.has(period)) freePeriods.push(period);
  }

  return { teacherId, date, day, proxies, freePeriods, totalPeriods: periodsPerDay };
}
