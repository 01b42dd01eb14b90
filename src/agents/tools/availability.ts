import type { BusyInterval } from "../../google/types.js";

export type TimeRange = { start: number; end: number }; // epoch ms

/** Parse and merge busy intervals from every calendar into sorted, disjoint ranges. */
export function mergeBusy(calendars: Record<string, BusyInterval[]>): TimeRange[] {
  const ranges = Object.values(calendars)
    .flat()
    .map((b) => ({ start: Date.parse(b.start), end: Date.parse(b.end) }))
    .filter((r) => Number.isFinite(r.start) && Number.isFinite(r.end) && r.end > r.start)
    .sort((a, b) => a.start - b.start);

  const merged: TimeRange[] = [];
  for (const range of ranges) {
    const last = merged.at(-1);
    if (last && range.start <= last.end) {
      last.end = Math.max(last.end, range.end);
    } else {
      merged.push({ ...range });
    }
  }
  return merged;
}

export function overlapping(busy: TimeRange[], window: TimeRange): TimeRange[] {
  return busy.filter((b) => b.start < window.end && b.end > window.start);
}

/**
 * Gaps inside `window` of at least `minDurationMs` that touch no busy range.
 */
export function findFreeSlots(
  busy: TimeRange[],
  window: TimeRange,
  minDurationMs: number,
): TimeRange[] {
  const slots: TimeRange[] = [];
  let cursor = window.start;
  for (const range of overlapping(busy, window)) {
    if (range.start - cursor >= minDurationMs) {
      slots.push({ start: cursor, end: range.start });
    }
    cursor = Math.max(cursor, range.end);
  }
  if (window.end - cursor >= minDurationMs) {
    slots.push({ start: cursor, end: window.end });
  }
  return slots;
}
