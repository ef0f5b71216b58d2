import { z } from "zod";
import { toIsoDate } from "./dates";

export const isoDate = z
  .string()
  .refine((value) => toIsoDate(value) === value, "Expected a YYYY-MM-DD date");

export const idParam = z.object({ id: z.uuid() });

export const weekendDaysInput = z.array(z.int().min(0).max(6)).max(7);
