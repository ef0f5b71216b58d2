import type { SchoolStore } from "@/store/types";
import { weekdayName, type IsoDate } from "./dates";
import type { ProxySnapshot } from "./proxy-matcher";

/** Everything the proxy matcher needs for one school day. */
export async function loadProxySnapshot(
  store: SchoolStore,
  schoolId: string,
  date: IsoDate
): Promise<ProxySnapshot> {
  const [absences, timetable, proxies, teachers, classrooms] = await Promise.all([
    store.listAbsences(schoolId, date),
    store.listTimetable(schoolId, { day: weekdayName(date) }),
    store.listProxies(schoolId, { date }),
    store.listTeachers(schoolId),
    store.listClassrooms(schoolId),
  ]);
  return { date, absences, timetable, proxies, teachers, classrooms };
}
