export type WeekendMask = ReadonlySet<number>;

function isWeekdayIndex(value: unknown): value is number {
  return Number.isInteger(value) && Number(value) >= 0 && Number(value) <= 6;
}

/**
 * Weekend days come back from storage either as a number array or as the
 * JSON text of one. Anything else reads as "no weekend days".
 */
export function parseWeekendDays(value: unknown): WeekendMask {
  let candidate = value;

  if (typeof candidate === "string") {
    try {
      candidate = JSON.parse(candidate);
    } catch {
      return new Set();
    }
  }

  if (!Array.isArray(candidate)) return new Set();

  return new Set(candidate.filter(isWeekdayIndex));
}
