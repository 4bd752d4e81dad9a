import { describe, expect, it } from "vitest";

import {
  addDays,
  expectedIntervalsForDay,
  localDate,
  localDayBounds,
  localMinute,
  periodKeyForDate,
  toUtcIso,
} from "../time.js";

const LONDON = "Europe/London";

describe("toUtcIso", () => {
  it("normalizes offsets to UTC with milliseconds", () => {
    expect(toUtcIso("2024-03-01T00:00:00+01:00")).toBe("2024-02-29T23:00:00.000Z");
  });

  it("returns null for text that is not a timestamp", () => {
    expect(toUtcIso("yesterday")).toBeNull();
  });
});

describe("local days", () => {
  it("takes the calendar date in the zone", () => {
    expect(localDate("2024-06-30T23:30:00.000Z", LONDON)).toBe("2024-07-01");
  });

  it("bounds a summer day at local midnight", () => {
    expect(localDayBounds("2024-06-01", LONDON)).toEqual({
      from: "2024-05-31T23:00:00.000Z",
      to: "2024-06-01T23:00:00.000Z",
    });
  });

  it("counts 46 and 50 half hours on clock-change days", () => {
    expect(expectedIntervalsForDay("2024-01-15", LONDON)).toBe(48);
    expect(expectedIntervalsForDay("2024-03-31", LONDON)).toBe(46);
    expect(expectedIntervalsForDay("2024-10-27", LONDON)).toBe(50);
  });

  it("steps back over a leap day", () => {
    expect(addDays("2024-03-01", -1)).toBe("2024-02-29");
  });

  it("shows the wall-clock minute", () => {
    expect(localMinute(new Date("2024-07-01T11:05:00.000Z"), LONDON)).toBe("2024-07-01 12:05");
  });
});

describe("periodKeyForDate", () => {
  it("labels ISO weeks by their week-year", () => {
    expect(periodKeyForDate("2024-01-03", "week")).toBe("2024-W01");
    expect(periodKeyForDate("2024-12-30", "week")).toBe("2025-W01");
  });

  it("labels months and the ungrouped total", () => {
    expect(periodKeyForDate("2024-01-03", "month")).toBe("2024-01");
    expect(periodKeyForDate("2024-01-03", "none")).toBe("total");
  });
});
