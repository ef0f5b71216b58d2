import "dotenv/config";
import { createEnv } from "@t3-oss/env-core";
import { z } from "zod";

export const env = createEnv({
  server: {
    DATABASE_URL: z.string().min(1),
    JWT_SECRET: z.string().min(1),
    CORS_ORIGIN: z.url(),
    PORT: z.coerce.number().int().positive().default(3000),
    // calendar "today" for attendance and proxy rules
    SCHOOL_TIMEZONE: z.string().min(1).default("UTC"),
    PERIODS_PER_DAY: z.coerce.number().int().positive().default(8),
  },
  runtimeEnv: process.env,
  emptyStringAsUndefined: true,
});
