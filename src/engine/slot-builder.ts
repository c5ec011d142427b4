import { resolveSleepHours, type GlobalConfig } from "../config.js";
import {
  compareStrings,
  generateDays,
  normalizeWeekday,
  parseDayStrict,
  toWeekdayUTC,
} from "../datetime.utils.js";
import type { CalendarConstraint, DailySlot } from "../types.js";

/**
 * Global settings read by {@link buildDailySlots}.
 */
export type SlotConfig = Pick<
  GlobalConfig,
  | "dailyCapMinutes"
  | "dailyCapToleranceMinutes"
  | "sleepHoursPerDay"
  | "sleepOverridesByWeekday"
  | "sleepOverridesByDate"
>;

function appliesToDay(constraint: CalendarConstraint, day: string): boolean {
  if (constraint.date === day) return true;
  const weekday = normalizeWeekday(constraint.weekday);
  return weekday !== undefined && weekday === toWeekdayUTC(day);
}

function compareConstraints(a: CalendarConstraint, b: CalendarConstraint): number {
  return (
    compareStrings(a.constraintId, b.constraintId) ||
    compareStrings(a.type, b.type) ||
    compareStrings(a.date ?? "", b.date ?? "") ||
    compareStrings(a.weekday ?? "", b.weekday ?? "")
  );
}

export function slotIdForDay(day: string): string {
  return `slot-${day}`;
}

/**
 * Builds one capacity slot per day from `startDate` to `endDate`
 * (inclusive), ascending.
 *
 * Per day:
 * 1. Sleep hours resolve by date, then weekday, then the global default;
 *    awake minutes are `round((24 − sleep) · 60)`.
 * 2. `cap_override` constraints replace the global cap with the minimum
 *    of their values.
 * 3. The cap and the cap plus tolerance are clamped to the awake minutes.
 * 4. The sum of `blocked` minutes is deducted from both.
 *
 * Constraint types other than `blocked` and `cap_override` are ignored.
 *
 * @throws {InvalidDayError} when either bound is not a valid day
 *
 * @example
 * ```ts
 * const slots = buildDailySlots({
 *   startDate: "2026-01-05",
 *   endDate: "2026-01-11",
 *   config: resolveEffectiveConfig({}, []).config.global,
 *   constraints: [
 *     parseCalendarConstraint({ constraintId: "gym", type: "blocked", weekday: "wed", blockedMinutes: 60 }),
 *   ],
 * });
 * slots[2]?.maxMinutes; // 150
 * ```
 */
export function buildDailySlots(args: {
  startDate: string;
  endDate: string;
  config: SlotConfig;
  constraints: readonly CalendarConstraint[];
}): DailySlot[] {
  const { startDate, endDate, config } = args;
  parseDayStrict(startDate);
  parseDayStrict(endDate);

  const constraints = args.constraints.toSorted(compareConstraints);
  const baseCap = config.dailyCapMinutes;
  const baseTolerance = config.dailyCapToleranceMinutes;

  return generateDays(startDate, endDate).map((day) => {
    const sleepHours = resolveSleepHours(config, day);
    const awakeMinutes = Math.max(0, Math.round((24 - sleepHours) * 60));

    const capOverrides: number[] = [];
    let blockedMinutes = 0;
    const blockedConstraints: string[] = [];

    for (const constraint of constraints) {
      if (!appliesToDay(constraint, day)) continue;
      if (constraint.type === "cap_override") {
        capOverrides.push(constraint.capOverrideMinutes);
      } else if (constraint.type === "blocked") {
        blockedMinutes += constraint.blockedMinutes;
        blockedConstraints.push(constraint.constraintId);
      }
    }

    const capOverrideMinutes = capOverrides.length > 0 ? Math.min(...capOverrides) : null;
    const capPreSleep = capOverrideMinutes ?? baseCap;
    const capWithSleep = Math.max(0, Math.min(capPreSleep, awakeMinutes));
    const totalWithTolerance = Math.max(0, Math.min(capPreSleep + baseTolerance, awakeMinutes));

    const capMinutes = Math.max(0, capWithSleep - blockedMinutes);
    const totalMinutes = Math.max(0, totalWithTolerance - blockedMinutes);
    const toleranceMinutes = Math.max(0, totalMinutes - capMinutes);

    return {
      slotId: slotIdForDay(day),
      date: day,
      capMinutes,
      toleranceMinutes,
      maxMinutes: capMinutes + toleranceMinutes,
      sleepHours,
      blockedMinutes,
      blockedConstraints,
      capOverrideMinutes,
    };
  });
}
