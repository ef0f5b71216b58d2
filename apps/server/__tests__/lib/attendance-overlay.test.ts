import { describe, expect, it } from "vitest";
import { AttendanceOverlay } from "@/lib/attendance-overlay";

const committed = new Map([
  ["2025-06-02", true],
  ["2025-06-03", false],
]);

describe("AttendanceOverlay", () => {
  it("cycles an unmarked day present, absent, pending, present", () => {
    const overlay = new AttendanceOverlay();
    const seen = [1, 2, 3, 4].map(() => overlay.toggle("2025-06-04", committed));
    expect(seen).toEqual([true, false, null, true]);
  });

  it("flips a committed mark on the first toggle", () => {
    const overlay = new AttendanceOverlay();
    expect(overlay.toggle("2025-06-02", committed)).toBe(false);
    expect(overlay.toggle("2025-06-03", committed)).toBe(true);
  });

  it("layers edits over committed marks without mutating them", () => {
    const overlay = new AttendanceOverlay();
    overlay.set("2025-06-02", null);
    overlay.set("2025-06-04", true);

    const merged = overlay.apply(committed);
    expect([...merged.entries()].sort()).toEqual([
      ["2025-06-03", false],
      ["2025-06-04", true],
    ]);
    expect(committed.get("2025-06-02")).toBe(true);
  });

  it("submits reset days only through the window", () => {
    const overlay = new AttendanceOverlay();
    overlay.set("2025-06-04", false);
    overlay.set("2025-06-02", null);

    expect(overlay.toSubmission("student-1")).toEqual({
      attendance: [{ studentId: "student-1", date: "2025-06-04", present: false }],
      window: { studentIds: ["student-1"], dates: ["2025-06-02", "2025-06-04"] },
    });
  });

  it("clears after commit and discard", () => {
    const overlay = new AttendanceOverlay();
    overlay.set("2025-06-04", true);
    expect(overlay.hasChanges()).toBe(true);

    const merged = overlay.commit(committed);
    expect(merged.get("2025-06-04")).toBe(true);
    expect(overlay.size).toBe(0);

    overlay.set("2025-06-05", true);
    overlay.discard();
    expect(overlay.get("2025-06-05")).toBeUndefined();
  });
});
