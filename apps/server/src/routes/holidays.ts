import { Hono } from "hono";
import { z } from "zod";
import { zValidator } from "@hono/zod-validator";
import { authMiddleware, requireRole } from "@/middleware/auth";
import { ConflictError, NotFoundError } from "@/errors";
import { audit, creationChanges } from "@/lib/audit";
import { requireYear } from "@/lib/lookups";
import { idParam, isoDate } from "@/lib/schemas";
import { rejectInvalid } from "@/lib/validate";
import type { AppEnv } from "@/types";

export const holidaysRouter = new Hono<AppEnv>();

const listQuery = z.object({ yearId: z.uuid().optional() });

const createHolidaySchema = z.object({
  yearId: z.uuid().optional(),
  date: isoDate,
  name: z.string().trim().max(100).default(""),
});

holidaysRouter.use(authMiddleware);

holidaysRouter.get("/", zValidator("query", listQuery, rejectInvalid), async (c) => {
  const store = c.get("store");
  const { schoolId } = c.get("user");
  const { yearId } = c.req.valid("query");

  const year = await requireYear(store, schoolId, yearId);
  const holidays = await store.listHolidays(schoolId, year.id);
  return c.json({ success: true, data: holidays });
});

holidaysRouter.post(
  "/",
  requireRole("admin"),
  zValidator("json", createHolidaySchema, rejectInvalid),
  async (c) => {
    const store = c.get("store");
    const { schoolId } = c.get("user");
    const input = c.req.valid("json");

    const year = await requireYear(store, schoolId, input.yearId);
    const existing = await store.listHolidays(schoolId, year.id);
    if (existing.some((h) => h.date === input.date)) {
      throw new ConflictError(`A holiday already exists on ${input.date}`);
    }

    const holiday = await store.createHoliday(schoolId, {
      academicYearId: year.id,
      date: input.date,
      name: input.name || "Holiday",
    });

    await audit(c, {
      action: "create",
      modelName: "Holiday",
      objectId: holiday.id,
      objectDisplay: `${holiday.name} (${holiday.date})`,
      changes: creationChanges({ date: holiday.date, name: holiday.name }),
    });

    return c.json({ success: true, data: holiday }, 201);
  }
);

holidaysRouter.delete(
  "/:id",
  requireRole("admin"),
  zValidator("param", idParam, rejectInvalid),
  async (c) => {
    const { schoolId } = c.get("user");
    const { id } = c.req.valid("param");

    const holiday = await c.get("store").deleteHoliday(schoolId, id);
    if (!holiday) throw new NotFoundError("Holiday not found");

    await audit(c, {
      action: "delete",
      modelName: "Holiday",
      objectId: holiday.id,
      objectDisplay: `${holiday.name} (${holiday.date})`,
      changes: {
        date: { old: holiday.date, new: null },
        name: { old: holiday.name, new: null },
      },
    });

    return c.json({ success: true, data: holiday });
  }
);
