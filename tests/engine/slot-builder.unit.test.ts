import { describe, expect, it } from "vitest";
import { GlobalConfigSchema } from "../../src/config.js";
import { buildDailySlots } from "../../src/engine/slot-builder.js";
import { InvalidDayError } from "../../src/errors.js";
import { parseCalendarConstraint } from "../../src/types.js";

const config = GlobalConfigSchema.parse({
  dailyCapMinutes: 180,
  dailyCapToleranceMinutes: 30,
  sleepHoursPerDay: 8,
  sleepOverridesByDate: { "2026-01-06": 21 },
});

describe("buildDailySlots", () => {
  it("should build one slot per day in ascending order", () => {
    const slots = buildDailySlots({
      startDate: "2026-01-05",
      endDate: "2026-01-08",
      config,
      constraints: [],
    });
    expect(slots.map((slot) => slot.slotId)).toEqual([
      "slot-2026-01-05",
      "slot-2026-01-06",
      "slot-2026-01-07",
      "slot-2026-01-08",
    ]);
    expect(slots[0]).toEqual({
      slotId: "slot-2026-01-05",
      date: "2026-01-05",
      capMinutes: 180,
      toleranceMinutes: 30,
      maxMinutes: 210,
      sleepHours: 8,
      blockedMinutes: 0,
      blockedConstraints: [],
      capOverrideMinutes: null,
    });
  });

  it("should deduct weekday blocks from cap and tolerance total", () => {
    const [wednesday] = buildDailySlots({
      startDate: "2026-01-07",
      endDate: "2026-01-07",
      config,
      constraints: [
        parseCalendarConstraint({ constraintId: "gym", type: "blocked", weekday: "wed", blockedMinutes: 60 }),
        parseCalendarConstraint({ constraintId: "choir", type: "blocked", weekday: "Wednesday", blockedMinutes: 0 }),
        parseCalendarConstraint({ constraintId: "misc", type: "reminder", weekday: "wed", blockedMinutes: 500 }),
      ],
    });
    expect(wednesday?.capMinutes).toBe(120);
    expect(wednesday?.toleranceMinutes).toBe(30);
    expect(wednesday?.maxMinutes).toBe(150);
    expect(wednesday?.blockedConstraints).toEqual(["choir", "gym"]);
  });

  it("should apply the most restrictive cap override", () => {
    const [monday] = buildDailySlots({
      startDate: "2026-01-05",
      endDate: "2026-01-05",
      config,
      constraints: [
        parseCalendarConstraint({ constraintId: "a", type: "cap_override", date: "2026-01-05", capOverrideMinutes: 100 }),
        parseCalendarConstraint({ constraintId: "b", type: "cap_override", weekday: "mon", capOverrideMinutes: 80 }),
      ],
    });
    expect(monday?.capOverrideMinutes).toBe(80);
    expect(monday?.capMinutes).toBe(80);
    expect(monday?.maxMinutes).toBe(110);
  });

  it("should bound capacity by awake time", () => {
    const slots = buildDailySlots({
      startDate: "2026-01-06",
      endDate: "2026-01-06",
      config,
      constraints: [],
    });
    expect(slots[0]?.sleepHours).toBe(21);
    expect(slots[0]?.capMinutes).toBe(180);
    expect(slots[0]?.toleranceMinutes).toBe(0);
    expect(slots[0]?.maxMinutes).toBe(180);
  });

  it("should clamp large blocks at zero", () => {
    const [slot] = buildDailySlots({
      startDate: "2026-01-05",
      endDate: "2026-01-05",
      config,
      constraints: [
        parseCalendarConstraint({ constraintId: "trip", type: "blocked", date: "2026-01-05", blockedMinutes: 300 }),
      ],
    });
    expect(slot?.capMinutes).toBe(0);
    expect(slot?.toleranceMinutes).toBe(0);
    expect(slot?.maxMinutes).toBe(0);
    expect(slot?.blockedMinutes).toBe(300);
  });

  it("should throw on an invalid horizon bound", () => {
    expect(() =>
      buildDailySlots({ startDate: "2026-01-32", endDate: "2026-02-01", config, constraints: [] }),
    ).toThrow(InvalidDayError);
  });
});
