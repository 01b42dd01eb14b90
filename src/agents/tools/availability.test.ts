import { describe, expect, it } from "vitest";

import { findFreeSlots, mergeBusy, overlapping } from "./availability.js";

const t = (hhmm: string) => Date.parse(`2024-10-15T${hhmm}:00Z`);

describe("mergeBusy", () => {
  it("merges overlapping and touching intervals across calendars", () => {
    expect(
      mergeBusy({
        primary: [
          { start: "2024-10-15T10:00:00Z", end: "2024-10-15T11:00:00Z" },
          { start: "2024-10-15T13:00:00Z", end: "2024-10-15T14:00:00Z" },
        ],
        "ada@example.com": [
          { start: "2024-10-15T10:30:00Z", end: "2024-10-15T11:30:00Z" },
          { start: "2024-10-15T11:30:00Z", end: "2024-10-15T12:00:00Z" },
          { start: "garbage", end: "2024-10-15T12:00:00Z" },
        ],
      }),
    ).toEqual([
      { start: t("10:00"), end: t("12:00") },
      { start: t("13:00"), end: t("14:00") },
    ]);
  });
});

describe("findFreeSlots", () => {
  const window = { start: t("09:00"), end: t("18:00") };

  it("returns gaps long enough for the meeting", () => {
    const busy = [
      { start: t("09:30"), end: t("10:00") },
      { start: t("10:15"), end: t("12:00") },
      { start: t("17:00"), end: t("19:00") },
    ];
    expect(findFreeSlots(busy, window, 30 * 60_000)).toEqual([
      { start: t("09:00"), end: t("09:30") },
      { start: t("12:00"), end: t("17:00") },
    ]);
  });

  it("returns the whole window when nothing is booked", () => {
    expect(findFreeSlots([], window, 60_000)).toEqual([window]);
  });

  it("returns nothing when the day is full", () => {
    expect(findFreeSlots([{ start: t("08:00"), end: t("20:00") }], window, 60_000)).toEqual(
      [],
    );
  });
});

describe("overlapping", () => {
  it("treats touching ranges as non-overlapping", () => {
    const busy = [{ start: t("10:00"), end: t("11:00") }];
    expect(overlapping(busy, { start: t("11:00"), end: t("12:00") })).toEqual([]);
    expect(overlapping(busy, { start: t("10:59"), end: t("12:00") })).toEqual(busy);
  });
});
