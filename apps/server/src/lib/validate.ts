import type { Context } from "hono";

/** zValidator hook giving every route the same 400 body. */
export function rejectInvalid(result: { success: boolean }, c: Context) {
  if (!result.success) {
    return c.json({ success: false, error: "Invalid request schema" }, 400);
  }
}
