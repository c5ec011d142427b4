import { InvalidDayError } from "./errors.js";
import { DayStringSchema, type Weekday } from "./types.js";

const MS_PER_DAY = 1000 * 60 * 60 * 24;

const WEEKDAY_NAMES = ["sun", "mon", "tue", "wed", "thu", "fri", "sat"] as const;

const FULL_WEEKDAY_NAMES = {
  monday: "mon",
  tuesday: "tue",
  wednesday: "wed",
  thursday: "thu",
  friday: "fri",
  saturday: "sat",
  sunday: "sun",
} as const satisfies Record<string, Weekday>;

/**
 * Parse a day string (YYYY-MM-DD) to a UTC Date.
 *
 * Does not validate; use {@link isDayString} or {@link parseDayStrict}
 * when the input comes from outside.
 */
export function parseDayString(day: string): Date {
  return new Date(`${day}T00:00:00Z`);
}

/**
 * Formats a UTC date as YYYY-MM-DD string.
 */
export function formatDayString(date: Date): string {
  const year = date.getUTCFullYear().toString().padStart(4, "0");
  const month = (date.getUTCMonth() + 1).toString().padStart(2, "0");
  const day = date.getUTCDate().toString().padStart(2, "0");
  return `${year}-${month}-${day}`;
}

/**
 * True when `value` is a real calendar day in YYYY-MM-DD format.
 * Rejects overflowing dates such as `2026-02-30`.
 */
export function isDayString(value: unknown): value is string {
  if (typeof value !== "string" || !DayStringSchema.safeParse(value).success) return false;
  const parsed = parseDayString(value);
  return !Number.isNaN(parsed.getTime()) && formatDayString(parsed) === value;
}

/**
 * Parses a day string, throwing {@link InvalidDayError} when it is not a
 * valid calendar day.
 */
export function parseDayStrict(day: string): Date {
  if (!isDayString(day)) {
    throw new InvalidDayError(day);
  }
  return parseDayString(day);
}

/**
 * Returns the day `offset` days after `day` (negative offsets go back).
 *
 * @example
 * ```typescript
 * addDays("2026-01-31", 1); // "2026-02-01"
 * addDays("2026-01-01", -1); // "2025-12-31"
 * ```
 */
export function addDays(day: string, offset: number): string {
  const date = parseDayString(day);
  date.setUTCDate(date.getUTCDate() + offset);
  return formatDayString(date);
}

/**
 * Calendar days from `start` to `end` (negative when `end` precedes `start`).
 *
 * @example
 * ```typescript
 * daysBetween("2026-01-01", "2026-01-05"); // 4
 * ```
 */
export function daysBetween(start: string, end: string): number {
  const ms = parseDayString(end).getTime() - parseDayString(start).getTime();
  return Math.round(ms / MS_PER_DAY);
}

/**
 * Helper to get the short weekday name of a day string.
 * Day strings are timezone-agnostic, so the UTC weekday is used.
 */
export function toWeekdayUTC(day: string): Weekday {
  const index = parseDayString(day).getUTCDay();
  return WEEKDAY_NAMES[index] ?? "sun";
}

/**
 * Normalizes a weekday label (`"mon"`, `"Monday"`, …) to {@link Weekday}.
 * Returns undefined for anything else.
 */
export function normalizeWeekday(value: unknown): Weekday | undefined {
  if (typeof value !== "string") return undefined;
  const lowered = value.trim().toLowerCase();
  for (const short of WEEKDAY_NAMES) {
    if (short === lowered) return short;
  }
  for (const [full, short] of Object.entries(FULL_WEEKDAY_NAMES)) {
    if (full === lowered) return short;
  }
  return undefined;
}

/**
 * Generates the day strings from `start` to `end`, both inclusive.
 *
 * @example
 * ```typescript
 * generateDays("2025-12-30", "2026-01-02");
 * // ["2025-12-30", "2025-12-31", "2026-01-01", "2026-01-02"]
 * ```
 */
export function generateDays(start: string, end: string): string[] {
  const days: string[] = [];
  const current = parseDayString(start);
  const last = parseDayString(end);

  while (current <= last) {
    days.push(formatDayString(current));
    current.setUTCDate(current.getUTCDate() + 1);
  }

  return days;
}

/**
 * Smallest of the given day strings, ignoring undefined entries.
 * Day strings compare correctly as plain strings.
 */
export function minDay(...days: ReadonlyArray<string | undefined>): string | undefined {
  let result: string | undefined;
  for (const day of days) {
    if (day !== undefined && (result === undefined || day < result)) result = day;
  }
  return result;
}

/**
 * Largest of the given day strings, ignoring undefined entries.
 */
export function maxDay(...days: ReadonlyArray<string | undefined>): string | undefined {
  let result: string | undefined;
  for (const day of days) {
    if (day !== undefined && (result === undefined || day > result)) result = day;
  }
  return result;
}

/**
 * Plain code-unit string comparison, independent of locale.
 */
export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
