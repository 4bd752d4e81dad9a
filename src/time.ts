/**
 * Calendar and timestamp helpers shared by the store, cost engine and alerts.
 *
 * Every timestamp the system persists is a UTC ISO-8601 string with
 * milliseconds ("2024-01-01T00:00:00.000Z"), so lexical order equals
 * chronological order. Calendar days are always taken in a named zone.
 */
import { DateTime } from "luxon";

export type GroupBy = "none" | "day" | "week" | "month";

/**
 * Half-open time window [from, to) in UTC ISO form.
 */
export type TimeWindow = Readonly<{
  from: string;
  to: string;
}>;

/**
 * Normalize any ISO timestamp (with Z or an offset) to UTC ISO.
 * Returns null for unparseable input.
 */
export function toUtcIso(value: string): string | null {
  const parsed = DateTime.fromISO(value, { setZone: true });
  if (!parsed.isValid) {
    return null;
  }
  return parsed.toUTC().toISO();
}

export function toMillis(iso: string): number {
  return DateTime.fromISO(iso, { zone: "utc" }).toMillis();
}

/**
 * Local calendar date (yyyy-MM-dd) of a UTC timestamp.
 */
export function localDate(iso: string, zone: string): string {
  return DateTime.fromISO(iso, { zone: "utc" }).setZone(zone).toFormat("yyyy-MM-dd");
}

/**
 * UTC bounds of a local calendar day: [start, end).
 */
export function localDayBounds(date: string, zone: string): TimeWindow {
  const start = DateTime.fromISO(date, { zone }).startOf("day");
  const end = start.plus({ days: 1 });
  return { from: isoOf(start), to: isoOf(end) };
}

/**
 * Half-hour intervals in a local day: 48 normally, 46 or 50 on clock changes.
 */
export function expectedIntervalsForDay(date: string, zone: string): number {
  const bounds = localDayBounds(date, zone);
  return Math.round((toMillis(bounds.to) - toMillis(bounds.from)) / 1_800_000);
}

/**
 * Calendar date `days` after `date` (negative for before).
 *
 * @example
 * addDays("2024-03-01", -1) // "2024-02-29"
 */
export function addDays(date: string, days: number): string {
  return DateTime.fromISO(date, { zone: "utc" }).plus({ days }).toFormat("yyyy-MM-dd");
}

/**
 * Wall-clock minute of an instant in a zone, e.g. "2024-01-03 12:00".
 */
export function localMinute(now: Date, zone: string): string {
  return DateTime.fromJSDate(now).setZone(zone).toFormat("yyyy-MM-dd HH:mm");
}

/**
 * Group label for a local date.
 *
 * @example
 * periodKeyForDate("2024-01-03", "week") // "2024-W01"
 */
export function periodKeyForDate(date: string, groupBy: GroupBy): string {
  if (groupBy === "none") {
    return "total";
  }

  const day = DateTime.fromISO(date, { zone: "utc" });
  switch (groupBy) {
    case "day":
      return day.toFormat("yyyy-MM-dd");
    case "week":
      return day.toFormat("kkkk-'W'WW");
    case "month":
      return day.toFormat("yyyy-MM");
  }
}

/**
 * Midnight UTC `days` days before `now`.
 */
export function daysAgo(days: number, now: Date): string {
  return isoOf(
    DateTime.fromJSDate(now, { zone: "utc" }).minus({ days }).startOf("day"),
  );
}

export function minutesBefore(minutes: number, now: Date): string {
  return isoOf(DateTime.fromJSDate(now, { zone: "utc" }).minus({ minutes }));
}

function isoOf(value: DateTime): string {
  return value.toUTC().toISO() ?? value.toJSDate().toISOString();
}
