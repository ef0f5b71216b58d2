import { relations } from "drizzle-orm";
import {
  absences,
  academicYears,
  attendance,
  classrooms,
  holidays,
  proxies,
  schools,
  students,
  teachers,
  timetableEntries,
  users,
} from "./schema";

export const schoolsRelations = relations(schools, ({ many }) => ({
  users: many(users),
  academicYears: many(academicYears),
  classrooms: many(classrooms),
  teachers: many(teachers),
}));

export const usersRelations = relations(users, ({ one }) => ({
  school: one(schools, {
    fields: [users.schoolId],
    references: [schools.id],
  }),
}));

export const academicYearsRelations = relations(
  academicYears,
  ({ one, many }) => ({
    school: one(schools, {
      fields: [academicYears.schoolId],
      references: [schools.id],
    }),
    classrooms: many(classrooms),
    holidays: many(holidays),
  })
);

export const classroomsRelations = relations(classrooms, ({ one, many }) => ({
  academicYear: one(academicYears, {
    fields: [classrooms.academicYearId],
    references: [academicYears.id],
  }),
  students: many(students),
  timetableEntries: many(timetableEntries),
}));

export const studentsRelations = relations(students, ({ one, many }) => ({
  classroom: one(classrooms, {
    fields: [students.classroomId],
    references: [classrooms.id],
  }),
  attendanceRecords: many(attendance),
}));

export const holidaysRelations = relations(holidays, ({ one }) => ({
  academicYear: one(academicYears, {
    fields: [holidays.academicYearId],
    references: [academicYears.id],
  }),
}));

export const attendanceRelations = relations(attendance, ({ one }) => ({
  student: one(students, {
    fields: [attendance.studentId],
    references: [students.id],
  }),
}));

export const teachersRelations = relations(teachers, ({ many }) => ({
  timetableEntries: many(timetableEntries),
  absences: many(absences),
}));

export const timetableEntriesRelations = relations(
  timetableEntries,
  ({ one }) => ({
    classroom: one(classrooms, {
      fields: [timetableEntries.classroomId],
      references: [classrooms.id],
    }),
    teacher: one(teachers, {
      fields: [timetableEntries.teacherId],
      references: [teachers.id],
    }),
  })
);

export const absencesRelations = relations(absences, ({ one, many }) => ({
  teacher: one(teachers, {
    fields: [absences.teacherId],
    references: [teachers.id],
  }),
  proxies: many(proxies),
}));

export const proxiesRelations = relations(proxies, ({ one }) => ({
  absence: one(absences, {
    fields: [proxies.absenceId],
    references: [absences.id],
  }),
}));
