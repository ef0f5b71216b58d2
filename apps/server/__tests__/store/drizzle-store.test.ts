import { afterEach, describe, expect, it, vi } from "vitest";
import { db } from "@schoolcore/db";
import { ConflictError } from "@/errors";
import { DrizzleStore } from "@/store/drizzle-store";

// drizzle rethrows driver errors with the pg error as `cause`
function wrappedPgError(code: string) {
  const pgError = Object.assign(new Error("duplicate key value"), { code });
  return new Error("Failed query: insert into \"users\"", { cause: pgError });
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("DrizzleStore.createSchoolWithAdmin", () => {
  const admin = { name: "Meera", email: "meera@example.com", password: "not-a-hash" };

  it("maps a unique violation on the admin email to a conflict", async () => {
    vi.spyOn(db, "transaction").mockRejectedValue(wrappedPgError("23505"));
    const store = new DrizzleStore(db);

    const attempt = store.createSchoolWithAdmin("Hillside", admin);

    await expect(attempt).rejects.toBeInstanceOf(ConflictError);
    await expect(attempt).rejects.toThrow("Email already exists");
  });

  it("passes other database errors through", async () => {
    const failure = wrappedPgError("57P01");
    vi.spyOn(db, "transaction").mockRejectedValue(failure);
    const store = new DrizzleStore(db);

    await expect(store.createSchoolWithAdmin("Hillside", admin)).rejects.toBe(failure);
  });
});
