import { addDays, compareStrings } from "../datetime.utils.js";
import { SLACK_SUBJECT_ID, type AllocationRecord } from "../types.js";

/**
 * How humane a plan feels: few single-subject days, no long same-subject
 * runs, several subjects per day.
 *
 * @category Metrics
 */
export interface HumanityMetrics {
  activeDays: number;
  /** Share of active days with a single subject. Lower is better. */
  monoDayRatio: number;
  /** Longest run of consecutive days with the same subject. Lower is better. */
  maxSameSubjectStreakDays: number;
  /** Mean distinct subjects per active day over all distinct subjects. Higher is better. */
  subjectVarietyIndex: number;
  /** Composite in [0, 1]. */
  humanityScore: number;
}

const clamp01 = (value: number) => Math.min(1, Math.max(0, value));

function longestStreak(days: readonly string[]): number {
  let longest = 0;
  let current = 0;
  let previous: string | undefined;
  for (const day of days) {
    current = previous !== undefined && addDays(previous, 1) === day ? current + 1 : 1;
    longest = Math.max(longest, current);
    previous = day;
  }
  return longest;
}

/**
 * Humanity metrics over the non-slack records with positive minutes.
 *
 * `humanityScore = clamp01(0.4·(1 − monoDayRatio) + 0.4·subjectVarietyIndex + 0.2 / max(1, maxSameSubjectStreakDays))`
 *
 * @example
 * ```ts
 * computeHumanityMetrics([
 *   { slotId: "s1", date: "2026-01-01", subjectId: "math", minutes: 60, bucket: "base" },
 *   { slotId: "s1", date: "2026-01-01", subjectId: "physics", minutes: 30, bucket: "base" },
 * ]).monoDayRatio; // 0
 * ```
 */
export function computeHumanityMetrics(
  allocations: readonly Pick<AllocationRecord, "date" | "subjectId" | "minutes">[],
): HumanityMetrics {
  const subjectsByDay = new Map<string, Set<string>>();
  const daysBySubject = new Map<string, Set<string>>();

  for (const { date, subjectId, minutes } of allocations) {
    if (subjectId === SLACK_SUBJECT_ID || subjectId === "" || minutes <= 0) continue;
    let subjects = subjectsByDay.get(date);
    if (!subjects) {
      subjects = new Set();
      subjectsByDay.set(date, subjects);
    }
    subjects.add(subjectId);

    let days = daysBySubject.get(subjectId);
    if (!days) {
      days = new Set();
      daysBySubject.set(subjectId, days);
    }
    days.add(date);
  }

  const activeDays = subjectsByDay.size;
  let monoDays = 0;
  let subjectDayPairs = 0;
  for (const subjects of subjectsByDay.values()) {
    if (subjects.size === 1) monoDays++;
    subjectDayPairs += subjects.size;
  }

  let maxSameSubjectStreakDays = 0;
  for (const days of daysBySubject.values()) {
    maxSameSubjectStreakDays = Math.max(
      maxSameSubjectStreakDays,
      longestStreak([...days].toSorted(compareStrings)),
    );
  }

  const monoDayRatio = activeDays > 0 ? monoDays / activeDays : 0;
  const subjectVarietyIndex =
    activeDays > 0 ? subjectDayPairs / activeDays / daysBySubject.size : 0;
  const streakScore = 1 / Math.max(1, maxSameSubjectStreakDays);

  return {
    activeDays,
    monoDayRatio,
    maxSameSubjectStreakDays,
    subjectVarietyIndex,
    humanityScore: clamp01(0.4 * (1 - monoDayRatio) + 0.4 * subjectVarietyIndex + 0.2 * streakScore),
  };
}
