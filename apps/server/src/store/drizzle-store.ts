import {
  absences,
  academicYears,
  attendance,
  auditLogs,
  classrooms,
  holidays,
  proxies,
  schools,
  students,
  teachers,
  timetableEntries,
  users,
  and,
  desc,
  eq,
  gte,
  inArray,
  lte,
  getTableColumns,
  sql,
  type Database,
  type ProxyStatus,
  type SQL,
} from "@schoolcore/db";
import { AlreadyAssignedError, ConflictError } from "@/errors";
import type {
  AttendanceBatch,
  AttendanceQuery,
  AuditQuery,
  ClassroomPatch,
  NewAcademicYear,
  NewAuditEntry,
  NewClassroom,
  NewStudent,
  NewTimetableEntry,
  NewUser,
  ProxyQuery,
  SchoolStore,
  TimetableQuery,
} from "./types";
import type { NewProxyRecord } from "@/lib/proxy-matcher";

const UNIQUE_VIOLATION = "23505";

// drizzle wraps driver errors, the pg error sits in `cause`
function isUniqueViolation(error: unknown): boolean {
  let current: unknown = error;
  while (current instanceof Error) {
    if ("code" in current && current.code === UNIQUE_VIOLATION) return true;
    current = current.cause;
  }
  return false;
}

export class DrizzleStore implements SchoolStore {
  constructor(private readonly db: Database) {}

  async findUserByEmail(email: string) {
    return this.db.query.users.findFirst({ where: eq(users.email, email) });
  }

  async createSchoolWithAdmin(
    schoolName: string,
    admin: Omit<NewUser, "schoolId" | "role">
  ) {
    try {
      return await this.db.transaction(async (tx) => {
        const [school] = await tx.insert(schools).values({ name: schoolName }).returning();
        if (!school) throw new Error("Failed to create school");

        const [user] = await tx
          .insert(users)
          .values({ ...admin, schoolId: school.id, role: "admin" })
          .returning();
        if (!user) throw new Error("Failed to create user");

        return { school, user };
      });
    } catch (error) {
      if (isUniqueViolation(error)) throw new ConflictError("Email already exists");
      throw error;
    }
  }

  async createUser(user: NewUser) {
    try {
      const [created] = await this.db.insert(users).values(user).returning();
      if (!created) throw new Error("Failed to create user");
      return created;
    } catch (error) {
      if (isUniqueViolation(error)) throw new ConflictError("Email already exists");
      throw error;
    }
  }

  async listYears(schoolId: string) {
    return this.db
      .select()
      .from(academicYears)
      .where(eq(academicYears.schoolId, schoolId))
      .orderBy(desc(academicYears.startDate));
  }

  async findYear(schoolId: string, id: string) {
    return this.db.query.academicYears.findFirst({
      where: and(eq(academicYears.id, id), eq(academicYears.schoolId, schoolId)),
    });
  }

  async findCurrentYear(schoolId: string) {
    return this.db.query.academicYears.findFirst({
      where: and(
        eq(academicYears.schoolId, schoolId),
        eq(academicYears.isCurrent, true)
      ),
    });
  }

  async createYear(schoolId: string, year: NewAcademicYear) {
    return this.db.transaction(async (tx) => {
      if (year.isCurrent) {
        await tx
          .update(academicYears)
          .set({ isCurrent: false })
          .where(eq(academicYears.schoolId, schoolId));
      }
      const [created] = await tx
        .insert(academicYears)
        .values({ ...year, schoolId })
        .returning();
      if (!created) throw new Error("Failed to create academic year");
      return created;
    });
  }

  async setCurrentYear(schoolId: string, id: string) {
    return this.db.transaction(async (tx) => {
      const target = await tx.query.academicYears.findFirst({
        where: and(eq(academicYears.id, id), eq(academicYears.schoolId, schoolId)),
      });
      if (!target) return undefined;

      await tx
        .update(academicYears)
        .set({ isCurrent: false })
        .where(eq(academicYears.schoolId, schoolId));
      const [updated] = await tx
        .update(academicYears)
        .set({ isCurrent: true })
        .where(eq(academicYears.id, id))
        .returning();
      return updated;
    });
  }

  async listClassrooms(schoolId: string, academicYearId?: string) {
    const filters: SQL[] = [eq(classrooms.schoolId, schoolId)];
    if (academicYearId) filters.push(eq(classrooms.academicYearId, academicYearId));
    return this.db
      .select()
      .from(classrooms)
      .where(and(...filters))
      .orderBy(classrooms.name);
  }

  async findClassroom(schoolId: string, id: string) {
    return this.db.query.classrooms.findFirst({
      where: and(eq(classrooms.id, id), eq(classrooms.schoolId, schoolId)),
    });
  }

  async createClassroom(schoolId: string, classroom: NewClassroom) {
    try {
      const [created] = await this.db
        .insert(classrooms)
        .values({ ...classroom, schoolId })
        .returning();
      if (!created) throw new Error("Failed to create classroom");
      return created;
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError("A classroom with this name already exists for the year");
      }
      throw error;
    }
  }

  async updateClassroom(schoolId: string, id: string, patch: ClassroomPatch) {
    const [updated] = await this.db
      .update(classrooms)
      .set(patch)
      .where(and(eq(classrooms.id, id), eq(classrooms.schoolId, schoolId)))
      .returning();
    return updated;
  }

  async listStudents(schoolId: string, classroomId: string) {
    return this.db
      .select()
      .from(students)
      .where(
        and(eq(students.schoolId, schoolId), eq(students.classroomId, classroomId))
      )
      .orderBy(students.enrollmentNumber);
  }

  async findStudent(schoolId: string, id: string) {
    return this.db.query.students.findFirst({
      where: and(eq(students.id, id), eq(students.schoolId, schoolId)),
      with: { classroom: true },
    });
  }

  async findStudentsByIds(schoolId: string, ids: readonly string[]) {
    if (ids.length === 0) return [];
    return this.db.query.students.findMany({
      where: and(eq(students.schoolId, schoolId), inArray(students.id, [...ids])),
      with: { classroom: true },
    });
  }

  async findEnrollment(
    schoolId: string,
    enrollmentNumber: string,
    academicYearId: string
  ) {
    const [row] = await this.db
      .select({ student: students, classroom: classrooms })
      .from(students)
      .innerJoin(classrooms, eq(students.classroomId, classrooms.id))
      .where(
        and(
          eq(students.schoolId, schoolId),
          eq(students.enrollmentNumber, enrollmentNumber),
          eq(classrooms.academicYearId, academicYearId)
        )
      )
      .limit(1);
    return row ? { ...row.student, classroom: row.classroom } : undefined;
  }

  async createStudent(schoolId: string, student: NewStudent) {
    const [created] = await this.db
      .insert(students)
      .values({ ...student, schoolId })
      .returning();
    if (!created) throw new Error("Failed to create student");
    return created;
  }

  async listHolidays(schoolId: string, academicYearId: string) {
    return this.db
      .select(getTableColumns(holidays))
      .from(holidays)
      .innerJoin(academicYears, eq(holidays.academicYearId, academicYears.id))
      .where(
        and(
          eq(academicYears.schoolId, schoolId),
          eq(holidays.academicYearId, academicYearId)
        )
      )
      .orderBy(holidays.date);
  }

  async createHoliday(
    _schoolId: string,
    holiday: { academicYearId: string; date: string; name: string }
  ) {
    try {
      const [created] = await this.db.insert(holidays).values(holiday).returning();
      if (!created) throw new Error("Failed to create holiday");
      return created;
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError(`A holiday already exists on ${holiday.date}`);
      }
      throw error;
    }
  }

  async deleteHoliday(schoolId: string, id: string) {
    const owned = await this.db
      .select({ id: holidays.id })
      .from(holidays)
      .innerJoin(academicYears, eq(holidays.academicYearId, academicYears.id))
      .where(and(eq(holidays.id, id), eq(academicYears.schoolId, schoolId)));
    if (owned.length === 0) return undefined;

    const [deleted] = await this.db
      .delete(holidays)
      .where(eq(holidays.id, id))
      .returning();
    return deleted;
  }

  async listAttendance(schoolId: string, query: AttendanceQuery) {
    if (query.studentIds.length === 0) return [];

    const filters: SQL[] = [
      eq(students.schoolId, schoolId),
      eq(attendance.academicYearId, query.academicYearId),
      inArray(attendance.studentId, [...query.studentIds]),
    ];
    if (query.from) filters.push(gte(attendance.date, query.from));
    if (query.to) filters.push(lte(attendance.date, query.to));

    return this.db
      .select(getTableColumns(attendance))
      .from(attendance)
      .innerJoin(students, eq(attendance.studentId, students.id))
      .where(and(...filters))
      .orderBy(attendance.date);
  }

  async saveAttendance(_schoolId: string, batch: AttendanceBatch) {
    return this.db.transaction(async (tx) => {
      let deleted = 0;
      for (const target of batch.deletions) {
        const removed = await tx
          .delete(attendance)
          .where(
            and(
              eq(attendance.studentId, target.studentId),
              eq(attendance.date, target.date),
              eq(attendance.academicYearId, batch.academicYearId)
            )
          )
          .returning({ id: attendance.id });
        deleted += removed.length;
      }

      if (batch.upserts.length > 0) {
        await tx
          .insert(attendance)
          .values(
            batch.upserts.map((mark) => ({
              ...mark,
              academicYearId: batch.academicYearId,
            }))
          )
          .onConflictDoUpdate({
            target: [attendance.studentId, attendance.date, attendance.academicYearId],
            set: { present: sql`excluded.present` },
          });
      }

      return { saved: batch.upserts.length, deleted };
    });
  }

  async listTeachers(schoolId: string) {
    return this.db
      .select()
      .from(teachers)
      .where(eq(teachers.schoolId, schoolId))
      .orderBy(teachers.fullName);
  }

  async findTeacher(schoolId: string, id: string) {
    return this.db.query.teachers.findFirst({
      where: and(eq(teachers.id, id), eq(teachers.schoolId, schoolId)),
    });
  }

  async createTeacher(schoolId: string, teacher: { fullName: string }) {
    const [created] = await this.db
      .insert(teachers)
      .values({ ...teacher, schoolId })
      .returning();
    if (!created) throw new Error("Failed to create teacher");
    return created;
  }

  async listTimetable(schoolId: string, query: TimetableQuery = {}) {
    const filters: SQL[] = [eq(classrooms.schoolId, schoolId)];
    if (query.classroomId) filters.push(eq(timetableEntries.classroomId, query.classroomId));
    if (query.teacherId) filters.push(eq(timetableEntries.teacherId, query.teacherId));
    if (query.day) filters.push(eq(timetableEntries.day, query.day));

    return this.db
      .select(getTableColumns(timetableEntries))
      .from(timetableEntries)
      .innerJoin(classrooms, eq(timetableEntries.classroomId, classrooms.id))
      .where(and(...filters))
      .orderBy(timetableEntries.day, timetableEntries.period);
  }

  async createTimetableEntry(_schoolId: string, entry: NewTimetableEntry) {
    const [created] = await this.db.insert(timetableEntries).values(entry).returning();
    if (!created) throw new Error("Failed to create timetable entry");
    return created;
  }

  async listAbsences(schoolId: string, date?: string) {
    const filters: SQL[] = [eq(teachers.schoolId, schoolId)];
    if (date) filters.push(eq(absences.date, date));

    return this.db
      .select(getTableColumns(absences))
      .from(absences)
      .innerJoin(teachers, eq(absences.teacherId, teachers.id))
      .where(and(...filters))
      .orderBy(desc(absences.date));
  }

  async findAbsence(schoolId: string, id: string) {
    const [row] = await this.db
      .select(getTableColumns(absences))
      .from(absences)
      .innerJoin(teachers, eq(absences.teacherId, teachers.id))
      .where(and(eq(absences.id, id), eq(teachers.schoolId, schoolId)));
    return row;
  }

  async markAbsent(
    _schoolId: string,
    teacherIds: readonly string[],
    date: string,
    reason: string
  ) {
    if (teacherIds.length === 0) return [];
    return this.db
      .insert(absences)
      .values(teacherIds.map((teacherId) => ({ teacherId, date, reason })))
      .onConflictDoUpdate({
        target: [absences.teacherId, absences.date],
        set: { reason, status: "absent" },
      })
      .returning();
  }

  async markPresent(_schoolId: string, teacherIds: readonly string[], date: string) {
    if (teacherIds.length === 0) return { retracted: [], cancelledProxies: 0 };

    return this.db.transaction(async (tx) => {
      const retracted = await tx
        .update(absences)
        .set({ status: "present" })
        .where(
          and(
            inArray(absences.teacherId, [...teacherIds]),
            eq(absences.date, date),
            eq(absences.status, "absent")
          )
        )
        .returning();

      if (retracted.length === 0) return { retracted, cancelledProxies: 0 };

      const cancelled = await tx
        .update(proxies)
        .set({ status: "cancelled" })
        .where(
          and(
            inArray(
              proxies.absenceId,
              retracted.map((a) => a.id)
            ),
            eq(proxies.status, "assigned")
          )
        )
        .returning({ id: proxies.id });

      return { retracted, cancelledProxies: cancelled.length };
    });
  }

  async listProxies(schoolId: string, query: ProxyQuery = {}) {
    const filters: SQL[] = [eq(classrooms.schoolId, schoolId)];
    if (query.date) filters.push(eq(proxies.date, query.date));
    if (query.status) filters.push(eq(proxies.status, query.status));

    return this.db
      .select(getTableColumns(proxies))
      .from(proxies)
      .innerJoin(classrooms, eq(proxies.classroomId, classrooms.id))
      .where(and(...filters))
      .orderBy(desc(proxies.date), desc(proxies.createdAt));
  }

  async findProxy(schoolId: string, id: string) {
    const [row] = await this.db
      .select(getTableColumns(proxies))
      .from(proxies)
      .innerJoin(classrooms, eq(proxies.classroomId, classrooms.id))
      .where(and(eq(proxies.id, id), eq(classrooms.schoolId, schoolId)));
    return row;
  }

  async createProxy(proxy: NewProxyRecord & { assignedBy: string | null }) {
    try {
      const [created] = await this.db.insert(proxies).values(proxy).returning();
      if (!created) throw new Error("Failed to create proxy");
      return created;
    } catch (error) {
      if (isUniqueViolation(error)) throw new AlreadyAssignedError();
      throw error;
    }
  }

  async updateProxyStatus(
    id: string,
    change: { status: ProxyStatus; completedAt: string | null }
  ) {
    const [updated] = await this.db
      .update(proxies)
      .set(change)
      .where(and(eq(proxies.id, id), eq(proxies.status, "assigned")))
      .returning();
    return updated;
  }

  async recordAudit(entry: NewAuditEntry) {
    const [created] = await this.db.insert(auditLogs).values(entry).returning();
    if (!created) throw new Error("Failed to record audit log");
    return created;
  }

  async listAuditLogs(schoolId: string, query: AuditQuery) {
    const filters: SQL[] = [
      eq(auditLogs.schoolId, schoolId),
      gte(auditLogs.timestamp, query.since),
    ];
    if (query.modelName) filters.push(eq(auditLogs.modelName, query.modelName));
    if (query.action) filters.push(eq(auditLogs.action, query.action));

    return this.db
      .select()
      .from(auditLogs)
      .where(and(...filters))
      .orderBy(desc(auditLogs.timestamp));
  }
}
