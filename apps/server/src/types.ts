import type { JWTPayload } from "@/middleware/auth";
import type { IsoDate } from "@/lib/dates";
import type { SchoolStore } from "@/store/types";

export type AppVariables = {
  store: SchoolStore;
  today: () => IsoDate;
  periodsPerDay: number;
  user: JWTPayload;
};

export type AppEnv = { Variables: AppVariables };
