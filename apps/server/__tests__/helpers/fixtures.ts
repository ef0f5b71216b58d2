import { randomUUID } from "node:crypto";
import { createApp } from "@/app";
import { signToken } from "@/middleware/auth";
import { MemoryStore } from "./memory-store";

export const TODAY = "2025-06-10";

/**
 * One school with a current 2025-2026 year, a Sunday/Saturday-weekend
 * classroom and an admin plus a staff login.
 */
export function seedSchool(store = new MemoryStore()) {
  const schoolId = randomUUID();
  store.schools.push({ id: schoolId, name: "Test School" });

  const admin = {
    id: randomUUID(),
    schoolId,
    name: "Admin",
    email: "admin@example.com",
    password: "not-a-hash",
    role: "admin" as const,
  };
  const staff = { ...admin, id: randomUUID(), email: "staff@example.com", role: "staff" as const };
  store.users.push(admin, staff);

  const year = {
    id: randomUUID(),
    schoolId,
    label: "2025-2026",
    startDate: "2025-06-01",
    endDate: "2026-03-31",
    isCurrent: true,
  };
  store.years.push(year);

  const classroom = {
    id: randomUUID(),
    schoolId,
    academicYearId: year.id,
    name: "Grade 5A",
    startDate: "2025-06-01",
    endDate: "2025-06-10",
    weekendDays: [0, 6],
  };
  store.classrooms.push(classroom);

  const app = createApp({
    store,
    today: () => TODAY,
    periodsPerDay: 6,
    corsOrigin: "http://localhost:5173",
    logRequests: false,
  });

  return {
    app,
    store,
    schoolId,
    year,
    classroom,
    adminToken: signToken({ userId: admin.id, schoolId, role: "admin" }),
    staffToken: signToken({ userId: staff.id, schoolId, role: "staff" }),
  };
}

export function addStudent(
  store: MemoryStore,
  schoolId: string,
  classroomId: string,
  fullName: string
) {
  const student = {
    id: randomUUID(),
    schoolId,
    classroomId,
    fullName,
    enrollmentNumber: `E-${store.students.length + 1}`,
  };
  store.students.push(student);
  return student;
}

export function addTeacher(store: MemoryStore, schoolId: string, fullName: string) {
  const teacher = { id: randomUUID(), schoolId, fullName };
  store.teachers.push(teacher);
  return teacher;
}

export function jsonRequest(token: string, body: unknown, method = "POST"): RequestInit {
  return {
    method,
    headers: {
      Authorization: `Bearer ${token}`,
      "Content-Type": "application/json",
    },
    body: JSON.stringify(body),
  };
}

export function authHeader(token: string): RequestInit {
  return { headers: { Authorization: `Bearer ${token}` } };
}
