import { sql } from "drizzle-orm";
import {
  boolean,
  date,
  index,
  integer,
  jsonb,
  pgEnum,
  pgTable,
  text,
  timestamp,
  unique,
  uniqueIndex,
  uuid,
} from "drizzle-orm/pg-core";
import { z } from "zod";

export const USER_ROLES = ["admin", "staff"] as const;
export const WEEKDAYS = [
  "monday",
  "tuesday",
  "wednesday",
  "thursday",
  "friday",
  "saturday",
  "sunday",
] as const;
export const ABSENCE_STATUSES = ["absent", "present"] as const;
export const PROXY_STATUSES = ["assigned", "completed", "cancelled"] as const;
export const AUDIT_ACTIONS = ["create", "update", "delete"] as const;

export const UserRoleSchema = z.enum(USER_ROLES);
export const WeekdaySchema = z.enum(WEEKDAYS);
export const AbsenceStatusSchema = z.enum(ABSENCE_STATUSES);
export const ProxyStatusSchema = z.enum(PROXY_STATUSES);
export const AuditActionSchema = z.enum(AUDIT_ACTIONS);

export type UserRole = z.infer<typeof UserRoleSchema>;
export type Weekday = z.infer<typeof WeekdaySchema>;
export type AbsenceStatus = z.infer<typeof AbsenceStatusSchema>;
export type ProxyStatus = z.infer<typeof ProxyStatusSchema>;
export type AuditAction = z.infer<typeof AuditActionSchema>;

export const userRole = pgEnum("user_role", USER_ROLES);
export const weekday = pgEnum("weekday", WEEKDAYS);
export const absenceStatus = pgEnum("absence_status", ABSENCE_STATUSES);
export const proxyStatus = pgEnum("proxy_status", PROXY_STATUSES);
export const auditAction = pgEnum("audit_action", AUDIT_ACTIONS);

export const schools = pgTable("schools", {
  id: uuid("id").primaryKey().defaultRandom(),
  name: text("name").notNull(),
});

export const users = pgTable("users", {
  id: uuid("id").primaryKey().defaultRandom(),
  schoolId: uuid("school_id")
    .notNull()
    .references(() => schools.id, { onDelete: "cascade" }),
  name: text("name").notNull(),
  email: text("email").notNull().unique(),
  password: text("password").notNull(),
  role: userRole("role").notNull().default("staff"),
});

export const academicYears = pgTable(
  "academic_years",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    schoolId: uuid("school_id")
      .notNull()
      .references(() => schools.id, { onDelete: "cascade" }),
    label: text("label").notNull(),
    startDate: date("start_date", { mode: "string" }),
    endDate: date("end_date", { mode: "string" }),
    isCurrent: boolean("is_current").notNull().default(false),
  },
  (t) => [
    uniqueIndex("academic_years_one_current_idx")
      .on(t.schoolId)
      .where(sql`${t.isCurrent}`),
  ]
);

export const classrooms = pgTable(
  "classrooms",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    schoolId: uuid("school_id")
      .notNull()
      .references(() => schools.id, { onDelete: "cascade" }),
    academicYearId: uuid("academic_year_id")
      .notNull()
      .references(() => academicYears.id, { onDelete: "cascade" }),
    name: text("name").notNull(),
    startDate: date("start_date", { mode: "string" }),
    endDate: date("end_date", { mode: "string" }),
    // legacy rows hold a JSON string instead of an array
    weekendDays: jsonb("weekend_days")
      .$type<number[] | string>()
      .notNull()
      .default([]),
  },
  (t) => [unique("classrooms_name_year_key").on(t.schoolId, t.academicYearId, t.name)]
);

export const students = pgTable(
  "students",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    schoolId: uuid("school_id")
      .notNull()
      .references(() => schools.id, { onDelete: "cascade" }),
    classroomId: uuid("classroom_id")
      .notNull()
      .references(() => classrooms.id, { onDelete: "cascade" }),
    fullName: text("full_name").notNull(),
    enrollmentNumber: text("enrollment_number").notNull(),
  },
  (t) => [index("students_classroom_idx").on(t.classroomId)]
);

export const holidays = pgTable(
  "holidays",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    academicYearId: uuid("academic_year_id")
      .notNull()
      .references(() => academicYears.id, { onDelete: "cascade" }),
    date: date("date", { mode: "string" }).notNull(),
    name: text("name").notNull().default(""),
  },
  (t) => [unique("holidays_year_date_key").on(t.academicYearId, t.date)]
);

export const attendance = pgTable(
  "attendance",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    studentId: uuid("student_id")
      .notNull()
      .references(() => students.id, { onDelete: "cascade" }),
    academicYearId: uuid("academic_year_id")
      .notNull()
      .references(() => academicYears.id, { onDelete: "cascade" }),
    date: date("date", { mode: "string" }).notNull(),
    present: boolean("present").notNull(),
  },
  (t) => [
    unique("attendance_student_date_year_key").on(
      t.studentId,
      t.date,
      t.academicYearId
    ),
    index("attendance_year_date_idx").on(t.academicYearId, t.date),
  ]
);

export const teachers = pgTable("teachers", {
  id: uuid("id").primaryKey().defaultRandom(),
  schoolId: uuid("school_id")
    .notNull()
    .references(() => schools.id, { onDelete: "cascade" }),
  fullName: text("full_name").notNull(),
});

export const timetableEntries = pgTable(
  "timetable_entries",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    classroomId: uuid("classroom_id")
      .notNull()
      .references(() => classrooms.id, { onDelete: "cascade" }),
    day: weekday("day").notNull(),
    period: integer("period").notNull(),
    subject: text("subject").notNull(),
    teacherId: uuid("teacher_id").references(() => teachers.id, {
      onDelete: "set null",
    }),
  },
  (t) => [
    index("timetable_classroom_day_idx").on(t.classroomId, t.day),
    index("timetable_teacher_day_idx").on(t.teacherId, t.day),
  ]
);

export const absences = pgTable(
  "absences",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    teacherId: uuid("teacher_id")
      .notNull()
      .references(() => teachers.id, { onDelete: "cascade" }),
    date: date("date", { mode: "string" }).notNull(),
    reason: text("reason").notNull().default(""),
    status: absenceStatus("status").notNull().default("absent"),
  },
  (t) => [unique("absences_teacher_date_key").on(t.teacherId, t.date)]
);

export const proxies = pgTable(
  "proxies",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    absenceId: uuid("absence_id")
      .notNull()
      .references(() => absences.id, { onDelete: "cascade" }),
    classroomId: uuid("classroom_id")
      .notNull()
      .references(() => classrooms.id, { onDelete: "cascade" }),
    day: weekday("day").notNull(),
    period: integer("period").notNull(),
    originalTeacherId: uuid("original_teacher_id")
      .notNull()
      .references(() => teachers.id, { onDelete: "cascade" }),
    proxyTeacherId: uuid("proxy_teacher_id")
      .notNull()
      .references(() => teachers.id, { onDelete: "cascade" }),
    subject: text("subject").notNull(),
    date: date("date", { mode: "string" }).notNull(),
    status: proxyStatus("status").notNull().default("assigned"),
    reason: text("reason").notNull().default(""),
    assignedBy: uuid("assigned_by").references(() => users.id, {
      onDelete: "set null",
    }),
    completedAt: timestamp("completed_at", { mode: "string" }),
    createdAt: timestamp("created_at", { mode: "string" }).notNull().defaultNow(),
  },
  (t) => [
    uniqueIndex("proxies_active_slot_idx")
      .on(t.classroomId, t.period, t.date)
      .where(sql`${t.status} <> 'cancelled'`),
    index("proxies_date_status_idx").on(t.date, t.status),
  ]
);

export const auditLogs = pgTable(
  "audit_logs",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    schoolId: uuid("school_id")
      .notNull()
      .references(() => schools.id, { onDelete: "cascade" }),
    action: auditAction("action").notNull(),
    performedBy: uuid("performed_by").references(() => users.id, {
      onDelete: "set null",
    }),
    modelName: text("model_name").notNull(),
    objectId: text("object_id").notNull(),
    objectDisplay: text("object_display").notNull().default(""),
    changes: jsonb("changes")
      .$type<Record<string, { old: unknown; new: unknown }>>()
      .notNull()
      .default({}),
    timestamp: timestamp("timestamp", { mode: "string" }).notNull().defaultNow(),
  },
  (t) => [index("audit_logs_school_time_idx").on(t.schoolId, t.timestamp)]
);

export type School = typeof schools.$inferSelect;
export type User = typeof users.$inferSelect;
export type AcademicYear = typeof academicYears.$inferSelect;
export type Classroom = typeof classrooms.$inferSelect;
export type Student = typeof students.$inferSelect;
export type Holiday = typeof holidays.$inferSelect;
export type AttendanceRecord = typeof attendance.$inferSelect;
export type Teacher = typeof teachers.$inferSelect;
export type TimetableEntry = typeof timetableEntries.$inferSelect;
export type Absence = typeof absences.$inferSelect;
export type ProxyRecord = typeof proxies.$inferSelect;
export type AuditLog = typeof auditLogs.$inferSelect;
