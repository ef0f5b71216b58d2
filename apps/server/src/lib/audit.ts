import type { AuditAction } from "@schoolcore/db/schema";
import type { Context } from "hono";
import type { AppEnv } from "@/types";

export type AuditChanges = Record<string, { old: unknown; new: unknown }>;

/** `{ field: { old: null, new: value } }` for every field of a new row. */
export function creationChanges(fields: Record<string, unknown>): AuditChanges {
  const changes: AuditChanges = {};
  for (const [field, value] of Object.entries(fields)) {
    changes[field] = { old: null, new: value };
  }
  return changes;
}

export function diffChanges(
  before: Record<string, unknown>,
  after: Record<string, unknown>
): AuditChanges {
  const changes: AuditChanges = {};
  for (const [field, value] of Object.entries(after)) {
    if (JSON.stringify(before[field]) !== JSON.stringify(value)) {
      changes[field] = { old: before[field] ?? null, new: value };
    }
  }
  return changes;
}

/**
 * Audit writes never undo the action they describe: a failure is logged and
 * the request carries on.
 */
export async function audit(
  c: Context<AppEnv>,
  entry: {
    action: AuditAction;
    modelName: string;
    objectId: string;
    objectDisplay: string;
    changes?: AuditChanges;
  }
): Promise<void> {
  const user = c.get("user");
  try {
    await c.get("store").recordAudit({
      ...entry,
      schoolId: user.schoolId,
      performedBy: user.userId,
      changes: entry.changes ?? {},
    });
  } catch (error) {
    console.error(
      `Audit logging failed for ${entry.action} ${entry.modelName} ${entry.objectId}:`,
      error
    );
  }
}
