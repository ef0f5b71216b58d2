import { env } from "@schoolcore/env/server";
import { drizzle } from "drizzle-orm/node-postgres";

import * as relations from "./relations";
import * as schema from "./schema";

export const db = drizzle({
  connection: { connectionString: env.DATABASE_URL },
  schema: { ...schema, ...relations },
});

export type Database = typeof db;
export * from "./schema";
export {
  eq,
  and,
  gte,
  lte,
  inArray,
  desc,
  sql,
  getTableColumns,
  type SQL,
} from "drizzle-orm";
