import { db } from "@schoolcore/db";
import { env } from "@schoolcore/env/server";
import { serve } from "@hono/node-server";
import { createApp } from "./app";
import { todayIn } from "./lib/dates";
import { DrizzleStore } from "./store/drizzle-store";

const app = createApp({
  store: new DrizzleStore(db),
  today: () => todayIn(env.SCHOOL_TIMEZONE),
  periodsPerDay: env.PERIODS_PER_DAY,
  corsOrigin: env.CORS_ORIGIN,
});

serve(
  {
    fetch: app.fetch,
    port: env.PORT,
  },
  (info) => {
    console.log(`Server is running on http://localhost:${info.port}`);
  }
);
