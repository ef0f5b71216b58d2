import { Hono } from "hono";
import { cors } from "hono/cors";
import { HTTPException } from "hono/http-exception";
import { logger } from "hono/logger";
import { AppError } from "./errors";
import type { IsoDate } from "./lib/dates";
import { absencesRouter } from "./routes/absences";
import { attendanceRouter } from "./routes/attendance";
import { auditLogsRouter } from "./routes/audit-logs";
import { authRouter } from "./routes/auth";
import { classRouter } from "./routes/classrooms";
import { holidaysRouter } from "./routes/holidays";
import { proxiesRouter } from "./routes/proxies";
import { studentsRouter } from "./routes/students";
import { teachersRouter } from "./routes/teachers";
import { timetableRouter } from "./routes/timetable";
import { yearsRouter } from "./routes/years";
import type { SchoolStore } from "./store/types";
import type { AppEnv } from "./types";

export type AppOptions = {
  store: SchoolStore;
  today: () => IsoDate;
  periodsPerDay: number;
  corsOrigin: string;
  logRequests?: boolean;
};

export function createApp(options: AppOptions) {
  const app = new Hono<AppEnv>();

  if (options.logRequests ?? true) app.use(logger());
  app.use(
    "/*",
    cors({
      origin: options.corsOrigin,
      allowMethods: ["GET", "POST", "PATCH", "DELETE", "OPTIONS"],
    })
  );
  app.use(async (c, next) => {
    c.set("store", options.store);
    c.set("today", options.today);
    c.set("periodsPerDay", options.periodsPerDay);
    await next();
  });

  app.get("/", (c) => {
    return c.text("OK");
  });

  app.route("/auth", authRouter);
  app.route("/years", yearsRouter);
  app.route("/classrooms", classRouter);
  app.route("/students", studentsRouter);
  app.route("/holidays", holidaysRouter);
  app.route("/attendance", attendanceRouter);
  app.route("/teachers", teachersRouter);
  app.route("/timetable", timetableRouter);
  app.route("/absences", absencesRouter);
  app.route("/proxies", proxiesRouter);
  app.route("/audit-logs", auditLogsRouter);

  app.notFound((c) => c.json({ success: false, error: "Not found" }, 404));

  app.onError((err, c) => {
    if (err instanceof AppError) {
      return c.json(
        {
          success: false,
          error: err.message,
          code: err.code,
          ...(err.details !== undefined && { details: err.details }),
        },
        err.status
      );
    }
    if (err instanceof HTTPException) {
      return c.json({ success: false, error: err.message }, err.status);
    }

    console.error(`Unhandled error on ${c.req.method} ${c.req.path}:`, err);
    return c.json({ success: false, error: "Internal server error" }, 500);
  });

  return app;
}
