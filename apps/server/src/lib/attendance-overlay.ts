import type { AttendanceMarks } from "./attendance-accounting";
import type { IsoDate } from "./dates";

/** `null` means the day was reset to pending. */
export type OverlayValue = boolean | null;

export type AttendanceSubmission = {
  attendance: { studentId: string; date: IsoDate; present: boolean }[];
  window: { studentIds: string[]; dates: IsoDate[] };
};

/**
 * Provisional attendance edits for one student, held until saved. Reads go
 * through the overlay first and fall back to the committed marks.
 */
export class AttendanceOverlay {
  private readonly edits = new Map<IsoDate, OverlayValue>();

  get size(): number {
    return this.edits.size;
  }

  hasChanges(): boolean {
    return this.edits.size > 0;
  }

  get(date: IsoDate): OverlayValue | undefined {
    return this.edits.get(date);
  }

  set(date: IsoDate, value: OverlayValue): void {
    this.edits.set(date, value);
  }

  /**
   * First toggle flips the committed mark (or marks present when there is
   * none); after that it cycles present → absent → pending → present.
   */
  toggle(date: IsoDate, committed: AttendanceMarks): OverlayValue {
    const current = this.edits.get(date);

    let next: OverlayValue;
    if (current === undefined) {
      const stored = committed.get(date);
      next = stored === undefined ? true : !stored;
    } else if (current === true) next = false;
    else if (current === false) next = null;
    else next = true;

    this.edits.set(date, next);
    return next;
  }

  apply(committed: AttendanceMarks): AttendanceMarks {
    const merged = new Map(committed);
    for (const [date, value] of this.edits) {
      if (value === null) merged.delete(date);
      else merged.set(date, value);
    }
    return merged;
  }

  /**
   * Dates reset to pending are left out of `attendance` but stay in
   * `window`, which is how the save endpoint knows to delete them.
   */
  toSubmission(studentId: string): AttendanceSubmission {
    const attendance: AttendanceSubmission["attendance"] = [];
    for (const [date, present] of this.edits) {
      if (present !== null) attendance.push({ studentId, date, present });
    }
    return {
      attendance,
      window: { studentIds: [studentId], dates: [...this.edits.keys()].sort() },
    };
  }

  commit(committed: AttendanceMarks): AttendanceMarks {
    const merged = this.apply(committed);
    this.edits.clear();
    return merged;
  }

  discard(): void {
    this.edits.clear();
  }
}
