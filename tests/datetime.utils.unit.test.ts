import { describe, expect, it } from "vitest";
import {
  addDays,
  daysBetween,
  generateDays,
  isDayString,
  maxDay,
  minDay,
  normalizeWeekday,
  parseDayStrict,
  toWeekdayUTC,
} from "../src/datetime.utils.js";
import { InvalidDayError } from "../src/errors.js";

describe("isDayString", () => {
  it("should accept real calendar days", () => {
    expect(isDayString("2026-01-31")).toBe(true);
    expect(isDayString("2024-02-29")).toBe(true);
  });

  it("should reject overflowing days and other formats", () => {
    expect(isDayString("2026-02-30")).toBe(false);
    expect(isDayString("2026-1-5")).toBe(false);
    expect(isDayString("2026-01-05T00:00:00Z")).toBe(false);
    expect(isDayString(20260105)).toBe(false);
    expect(isDayString(undefined)).toBe(false);
  });
});

describe("parseDayStrict", () => {
  it("should return midnight UTC", () => {
    expect(parseDayStrict("2026-03-01").toISOString()).toBe("2026-03-01T00:00:00.000Z");
  });

  it("should throw InvalidDayError carrying the value", () => {
    expect(() => parseDayStrict("not-a-day")).toThrow(InvalidDayError);
    try {
      parseDayStrict("2026-13-01");
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidDayError);
      if (error instanceof InvalidDayError) {
        expect(error.value).toBe("2026-13-01");
        expect(error.message).toBe('Invalid day string: "2026-13-01" (expected YYYY-MM-DD)');
      }
    }
  });
});

describe("day arithmetic", () => {
  it("should cross month and year boundaries", () => {
    expect(addDays("2026-01-31", 1)).toBe("2026-02-01");
    expect(addDays("2026-01-01", -1)).toBe("2025-12-31");
    expect(addDays("2026-03-10", 0)).toBe("2026-03-10");
  });

  it("should count signed calendar days", () => {
    expect(daysBetween("2026-01-01", "2026-01-05")).toBe(4);
    expect(daysBetween("2026-01-05", "2026-01-01")).toBe(-4);
    expect(daysBetween("2026-03-28", "2026-03-30")).toBe(2);
  });

  it("should generate inclusive ranges", () => {
    expect(generateDays("2025-12-30", "2026-01-02")).toEqual([
      "2025-12-30",
      "2025-12-31",
      "2026-01-01",
      "2026-01-02",
    ]);
    expect(generateDays("2026-01-02", "2026-01-01")).toEqual([]);
  });

  it("should pick the extreme days and ignore undefined", () => {
    expect(minDay("2026-02-01", undefined, "2026-01-15")).toBe("2026-01-15");
    expect(maxDay(undefined, "2026-02-01", "2026-01-15")).toBe("2026-02-01");
    expect(minDay()).toBeUndefined();
  });
});

describe("weekdays", () => {
  it("should use the UTC weekday", () => {
    expect(toWeekdayUTC("2026-01-05")).toBe("mon");
    expect(toWeekdayUTC("2026-01-11")).toBe("sun");
  });

  it("should normalize short and full names case-insensitively", () => {
    expect(normalizeWeekday("Wed")).toBe("wed");
    expect(normalizeWeekday(" SATURDAY ")).toBe("sat");
    expect(normalizeWeekday("someday")).toBeUndefined();
    expect(normalizeWeekday(3)).toBeUndefined();
  });
});
