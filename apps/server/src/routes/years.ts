import { Hono } from "hono";
import { z } from "zod";
import { zValidator } from "@hono/zod-validator";
import { authMiddleware, requireRole } from "@/middleware/auth";
import { NotFoundError, ValidationError } from "@/errors";
import { audit, creationChanges } from "@/lib/audit";
import { idParam, isoDate } from "@/lib/schemas";
import { rejectInvalid } from "@/lib/validate";
import type { AppEnv } from "@/types";

export const yearsRouter = new Hono<AppEnv>();

const createYearSchema = z.object({
  label: z.string().regex(/^\d{4}-\d{4}$/, "Expected a label like 2025-2026"),
  startDate: isoDate.nullish(),
  endDate: isoDate.nullish(),
  isCurrent: z.boolean().default(false),
});

yearsRouter.use(authMiddleware);

yearsRouter.get("/", async (c) => {
  const { schoolId } = c.get("user");
  const years = await c.get("store").listYears(schoolId);
  return c.json({ success: true, data: years });
});

yearsRouter.post(
  "/",
  requireRole("admin"),
  zValidator("json", createYearSchema, rejectInvalid),
  async (c) => {
    const { schoolId } = c.get("user");
    const input = c.req.valid("json");

    if (input.startDate && input.endDate && input.endDate <= input.startDate) {
      throw new ValidationError("End date must be after start date");
    }

    const year = await c.get("store").createYear(schoolId, {
      label: input.label,
      startDate: input.startDate ?? null,
      endDate: input.endDate ?? null,
      isCurrent: input.isCurrent,
    });

    await audit(c, {
      action: "create",
      modelName: "AcademicYear",
      objectId: year.id,
      objectDisplay: year.label,
      changes: creationChanges({
        label: year.label,
        startDate: year.startDate,
        endDate: year.endDate,
        isCurrent: year.isCurrent,
      }),
    });

    return c.json({ success: true, data: year }, 201);
  }
);

yearsRouter.post(
  "/:id/current",
  requireRole("admin"),
  zValidator("param", idParam, rejectInvalid),
  async (c) => {
    const { schoolId } = c.get("user");
    const { id } = c.req.valid("param");

    const year = await c.get("store").setCurrentYear(schoolId, id);
    if (!year) throw new NotFoundError("Academic year not found");

    await audit(c, {
      action: "update",
      modelName: "AcademicYear",
      objectId: year.id,
      objectDisplay: year.label,
      changes: { isCurrent: { old: false, new: true } },
    });

    return c.json({ success: true, data: year });
  }
);
