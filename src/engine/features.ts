import { daysBetween } from "../datetime.utils.js";
import type { Subject } from "../types.js";
import type { AllocationSlot } from "./allocator.js";
import type { ScoreFeatures } from "./scoring.js";
import { isWithinWindow, studyWindowOf } from "./windows.js";

/**
 * Static Phase 1 features of every subject, as seen from `referenceDay`.
 *
 * - `urgency = 1 / (1 + daysToExam / 7)`, 0 without an exam
 * - `priority = max(0, priority) / highest priority`
 * - `completionGap = 1 − completionInitial`
 * - `difficulty = min(1, difficultyCoeff / 2)`
 * - `windowPressure = min(1, base minutes / capacity inside the study window)`
 * - `modeAlignment = 1`
 * - `concentrationPenalty = share of all base minutes`
 *
 * `streakPenalty` is left to the allocator.
 *
 * @category Scoring
 */
export function computeScoreFeatures(args: {
  subjects: readonly Subject[];
  baseMinutesBySubject: Readonly<Record<string, number>>;
  slots: readonly AllocationSlot[];
  referenceDay: string;
}): Record<string, Partial<ScoreFeatures>> {
  const { subjects, baseMinutesBySubject, slots, referenceDay } = args;

  const maxPriority = Math.max(0, ...subjects.map((s) => s.priority));
  const totalBase = subjects.reduce(
    (sum, s) => sum + (baseMinutesBySubject[s.subjectId] ?? 0),
    0,
  );

  const features: Record<string, Partial<ScoreFeatures>> = {};
  for (const subject of subjects) {
    const window = studyWindowOf(subject);
    const base = baseMinutesBySubject[subject.subjectId] ?? 0;
    const capacity = slots
      .filter((slot) => isWithinWindow(window, slot.date))
      .reduce((sum, slot) => sum + Math.max(0, slot.maxMinutes), 0);

    let windowPressure = 0;
    if (base > 0) windowPressure = capacity > 0 ? Math.min(1, base / capacity) : 1;

    features[subject.subjectId] = {
      urgency:
        window.examDay === undefined
          ? 0
          : 1 / (1 + Math.max(0, daysBetween(referenceDay, window.examDay)) / 7),
      priority: maxPriority > 0 ? Math.max(0, subject.priority) / maxPriority : 0,
      completionGap: 1 - subject.completionInitial,
      difficulty: Math.min(1, subject.difficultyCoeff / 2),
      windowPressure,
      modeAlignment: 1,
      concentrationPenalty: totalBase > 0 ? base / totalBase : 0,
    };
  }
  return features;
}
