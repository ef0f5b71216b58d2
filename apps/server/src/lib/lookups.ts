import { NotFoundError } from "@/errors";
import type { SchoolStore } from "@/store/types";

export async function requireYear(
  store: SchoolStore,
  schoolId: string,
  yearId?: string
) {
  const year = yearId
    ? await store.findYear(schoolId, yearId)
    : await store.findCurrentYear(schoolId);
  if (!year) throw new NotFoundError("Academic year not found");
  return year;
}

export async function requireClassroom(store: SchoolStore, schoolId: string, id: string) {
  const classroom = await store.findClassroom(schoolId, id);
  if (!classroom) throw new NotFoundError("Classroom not found");
  return classroom;
}

export async function requireStudent(store: SchoolStore, schoolId: string, id: string) {
  const student = await store.findStudent(schoolId, id);
  if (!student) throw new NotFoundError("Student not found");
  return student;
}

export async function requireTeacher(store: SchoolStore, schoolId: string, id: string) {
  const teacher = await store.findTeacher(schoolId, id);
  if (!teacher) throw new NotFoundError("Teacher not found");
  return teacher;
}
