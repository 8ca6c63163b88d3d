/** Half-open interval `[start, end)`. */
export interface TimeRange {
  start: Date;
  end: Date;
}

/**
 * Two half-open ranges overlap iff each starts before the other ends.
 * Covers partial overlap and containment alike; ranges that merely touch
 * (one ends exactly when the other starts) do not overlap.
 */
export function rangesOverlap(a: TimeRange, b: TimeRange): boolean {
  return (
    a.start.getTime() < b.end.getTime() && b.start.getTime() < a.end.getTime()
  );
}

/** Open-ended window bounds are `null`. */
export function isWithinWindow(
  range: TimeRange,
  windowStart: Date | null,
  windowEnd: Date | null,
): boolean {
  if (windowStart && range.start.getTime() < windowStart.getTime()) {
    return false;
  }
  if (windowEnd && range.end.getTime() > windowEnd.getTime()) {
    return false;
  }
  return true;
}

export function durationInHours(range: TimeRange): number {
  return (range.end.getTime() - range.start.getTime()) / 3_600_000;
}

export function formatUtc(date: Date): string {
  return `${date.toISOString().slice(0, 16).replace('T', ' ')} UTC`;
}
