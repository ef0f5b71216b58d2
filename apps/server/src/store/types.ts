import type {
  Absence,
  AcademicYear,
  AttendanceRecord,
  AuditAction,
  AuditLog,
  Classroom,
  Holiday,
  ProxyRecord,
  ProxyStatus,
  School,
  Student,
  Teacher,
  TimetableEntry,
  User,
  UserRole,
  Weekday,
} from "@schoolcore/db/schema";
import type { NewProxyRecord } from "@/lib/proxy-matcher";

export type NewUser = {
  schoolId: string;
  name: string;
  email: string;
  password: string;
  role: UserRole;
};

export type NewAcademicYear = {
  label: string;
  startDate: string | null;
  endDate: string | null;
  isCurrent: boolean;
};

export type NewClassroom = {
  academicYearId: string;
  name: string;
  startDate: string | null;
  endDate: string | null;
  weekendDays: number[];
};

export type ClassroomPatch = Partial<Omit<NewClassroom, "academicYearId">>;

export type NewStudent = {
  classroomId: string;
  fullName: string;
  enrollmentNumber: string;
};

export type StudentWithClassroom = Student & { classroom: Classroom };

export type AttendanceQuery = {
  academicYearId: string;
  studentIds: readonly string[];
  from?: string;
  to?: string;
};

export type AttendanceMark = { studentId: string; date: string; present: boolean };

export type AttendanceBatch = {
  academicYearId: string;
  upserts: readonly AttendanceMark[];
  deletions: readonly { studentId: string; date: string }[];
};

export type TimetableQuery = {
  classroomId?: string;
  teacherId?: string;
  day?: Weekday;
};

export type NewTimetableEntry = {
  classroomId: string;
  day: Weekday;
  period: number;
  subject: string;
  teacherId: string | null;
};

export type ProxyQuery = { date?: string; status?: ProxyStatus };

export type NewAuditEntry = {
  schoolId: string;
  action: AuditAction;
  performedBy: string | null;
  modelName: string;
  objectId: string;
  objectDisplay: string;
  changes: Record<string, { old: unknown; new: unknown }>;
};

export type AuditQuery = {
  modelName?: string;
  action?: AuditAction;
  since: string;
};

/**
 * Persistence seam for the HTTP layer. Every read is scoped to a school;
 * multi-row writes are atomic.
 */
export interface SchoolStore {
  findUserByEmail(email: string): Promise<User | undefined>;
  createSchoolWithAdmin(
    schoolName: string,
    admin: Omit<NewUser, "schoolId" | "role">
  ): Promise<{ school: School; user: User }>;
  createUser(user: NewUser): Promise<User>;

  listYears(schoolId: string): Promise<AcademicYear[]>;
  findYear(schoolId: string, id: string): Promise<AcademicYear | undefined>;
  findCurrentYear(schoolId: string): Promise<AcademicYear | undefined>;
  createYear(schoolId: string, year: NewAcademicYear): Promise<AcademicYear>;
  setCurrentYear(schoolId: string, id: string): Promise<AcademicYear | undefined>;

  listClassrooms(schoolId: string, academicYearId?: string): Promise<Classroom[]>;
  findClassroom(schoolId: string, id: string): Promise<Classroom | undefined>;
  createClassroom(schoolId: string, classroom: NewClassroom): Promise<Classroom>;
  updateClassroom(
    schoolId: string,
    id: string,
    patch: ClassroomPatch
  ): Promise<Classroom | undefined>;

  listStudents(schoolId: string, classroomId: string): Promise<Student[]>;
  findStudent(schoolId: string, id: string): Promise<StudentWithClassroom | undefined>;
  findStudentsByIds(
    schoolId: string,
    ids: readonly string[]
  ): Promise<StudentWithClassroom[]>;
  findEnrollment(
    schoolId: string,
    enrollmentNumber: string,
    academicYearId: string
  ): Promise<StudentWithClassroom | undefined>;
  createStudent(schoolId: string, student: NewStudent): Promise<Student>;

  listHolidays(schoolId: string, academicYearId: string): Promise<Holiday[]>;
  createHoliday(
    schoolId: string,
    holiday: { academicYearId: string; date: string; name: string }
  ): Promise<Holiday>;
  deleteHoliday(schoolId: string, id: string): Promise<Holiday | undefined>;

  listAttendance(schoolId: string, query: AttendanceQuery): Promise<AttendanceRecord[]>;
  saveAttendance(
    schoolId: string,
    batch: AttendanceBatch
  ): Promise<{ saved: number; deleted: number }>;

  listTeachers(schoolId: string): Promise<Teacher[]>;
  findTeacher(schoolId: string, id: string): Promise<Teacher | undefined>;
  createTeacher(schoolId: string, teacher: { fullName: string }): Promise<Teacher>;

  listTimetable(schoolId: string, query?: TimetableQuery): Promise<TimetableEntry[]>;
  createTimetableEntry(schoolId: string, entry: NewTimetableEntry): Promise<TimetableEntry>;

  listAbsences(schoolId: string, date?: string): Promise<Absence[]>;
  findAbsence(schoolId: string, id: string): Promise<Absence | undefined>;
  markAbsent(
    schoolId: string,
    teacherIds: readonly string[],
    date: string,
    reason: string
  ): Promise<Absence[]>;
  /** Retracts absences and cancels their still-assigned proxies. */
  markPresent(
    schoolId: string,
    teacherIds: readonly string[],
    date: string
  ): Promise<{ retracted: Absence[]; cancelledProxies: number }>;

  listProxies(schoolId: string, query?: ProxyQuery): Promise<ProxyRecord[]>;
  findProxy(schoolId: string, id: string): Promise<ProxyRecord | undefined>;
  /** Throws AlreadyAssignedError when the period already has an active proxy. */
  createProxy(proxy: NewProxyRecord & { assignedBy: string | null }): Promise<ProxyRecord>;
  /** Moves an assigned proxy only; undefined when it is missing or no longer assigned. */
  updateProxyStatus(
    id: string,
    change: { status: ProxyStatus; completedAt: string | null }
  ): Promise<ProxyRecord | undefined>;

  recordAudit(entry: NewAuditEntry): Promise<AuditLog>;
  listAuditLogs(schoolId: string, query: AuditQuery): Promise<AuditLog[]>;
}
