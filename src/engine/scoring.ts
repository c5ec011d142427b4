import { addDays, compareStrings, daysBetween, parseDayStrict } from "../datetime.utils.js";
import type { Subject } from "../types.js";

// ============================================================================
// Weighted Score
// ============================================================================

/**
 * Inputs of the candidate score. Callers supply values already in
 * comparable ranges (typically [0, 1]); no normalization happens here.
 *
 * @category Scoring
 */
export interface ScoreFeatures {
  urgency: number;
  priority: number;
  completionGap: number;
  difficulty: number;
  windowPressure: number;
  modeAlignment: number;
  concentrationPenalty: number;
  /** Continuity and variety penalty, only set during forward allocation. */
  streakPenalty: number;
}

/**
 * Weight of each {@link ScoreFeatures} term.
 *
 * @category Scoring
 */
export interface ScoreWeights {
  urgency: number;
  priority: number;
  gap: number;
  difficulty: number;
  window: number;
  mode: number;
  concentration: number;
  streak: number;
}

/**
 * Default score weights.
 *
 * The positive terms sum to 0.95; `concentration` and `streak` are
 * subtracted.
 *
 * @example Custom weights
 * ```ts
 * computeScore(features, { ...DEFAULT_SCORE_WEIGHTS, urgency: 0.5 });
 * ```
 */
export const DEFAULT_SCORE_WEIGHTS = {
  urgency: 0.35,
  priority: 0.2,
  gap: 0.15,
  difficulty: 0.1,
  window: 0.1,
  mode: 0.05,
  concentration: 0.05,
  streak: 0.15,
} as const satisfies ScoreWeights;

/**
 * Weighted linear score of a candidate. Larger is better; missing features
 * count as 0.
 *
 * `score = Σ w·feature − w.concentration·concentrationPenalty − w.streak·streakPenalty`
 */
export function computeScore(
  features: Partial<ScoreFeatures>,
  weights: ScoreWeights = DEFAULT_SCORE_WEIGHTS,
): number {
  return (
    weights.urgency * (features.urgency ?? 0) +
    weights.priority * (features.priority ?? 0) +
    weights.gap * (features.completionGap ?? 0) +
    weights.difficulty * (features.difficulty ?? 0) +
    weights.window * (features.windowPressure ?? 0) +
    weights.mode * (features.modeAlignment ?? 0) -
    weights.concentration * (features.concentrationPenalty ?? 0) -
    weights.streak * (features.streakPenalty ?? 0)
  );
}

// ============================================================================
// Tie-break
// ============================================================================

/**
 * Days used when a subject has no exam at all.
 */
export const NO_EXAM_DAYS = 1_000_000_000;

/**
 * `[daysToNearestExam, -priority, subjectId]`, compared element-wise
 * ascending by {@link compareTieBreakerKeys}.
 *
 * @category Scoring
 */
export type TieBreakerKey = readonly [daysToExam: number, negativePriority: number, subjectId: string];

/**
 * Deterministic tie-break key of a subject as seen from `referenceDay`.
 *
 * Order: nearest exam first, then higher priority, then `subjectId`.
 * Exams in the past count as 0 days away. When `examDates` is empty the
 * selected exam date is used; without any exam the subject sorts last.
 *
 * @throws {InvalidDayError} when `referenceDay` is not a valid day
 *
 * @example
 * ```ts
 * const keyed = subjects.map((s) => [tieBreakerKey(s, "2026-01-01"), s] as const);
 * keyed.toSorted(([a], [b]) => compareTieBreakerKeys(a, b));
 * ```
 */
export function tieBreakerKey(
  subject: Pick<Subject, "subjectId" | "priority" | "examDates" | "selectedExamDate">,
  referenceDay: string,
): TieBreakerKey {
  parseDayStrict(referenceDay);

  const exams =
    subject.examDates.length > 0
      ? subject.examDates
      : subject.selectedExamDate !== undefined
        ? [subject.selectedExamDate]
        : [];
  const nearest = exams.toSorted(compareStrings)[0];
  const daysToExam =
    nearest === undefined ? NO_EXAM_DAYS : Math.max(0, daysBetween(referenceDay, nearest));

  return [daysToExam, -subject.priority, subject.subjectId];
}

export function compareTieBreakerKeys(a: TieBreakerKey, b: TieBreakerKey): number {
  if (a[0] !== b[0]) return a[0] - b[0];
  if (a[1] !== b[1]) return a[1] - b[1];
  return compareStrings(a[2], b[2]);
}

// ============================================================================
// Continuity Penalty
// ============================================================================

/**
 * Settings of {@link computeRecentContinuityPenalty}.
 *
 * @category Scoring
 */
export interface ContinuityConfig {
  enabled: boolean;
  /** How many days back the consecutive-day streak is counted. */
  lookbackDays: number;
  /** Days before the reference day used for the minute share. */
  rollingWindowDays: number;
  streakThresholdDays: number;
  rollingShareThreshold: number;
  streakPenaltyFactor: number;
  rollingPenaltyFactor: number;
  maxPenalty: number;
}

export const DEFAULT_CONTINUITY_CONFIG = {
  enabled: true,
  lookbackDays: 7,
  rollingWindowDays: 5,
  streakThresholdDays: 2,
  rollingShareThreshold: 0.6,
  streakPenaltyFactor: 0.2,
  rollingPenaltyFactor: 0.5,
  maxPenalty: 1,
} as const satisfies ContinuityConfig;

/**
 * Read access to past study minutes, per day and per subject.
 */
export interface MinuteHistory {
  minutesOn(day: string, subjectId: string): number;
  totalMinutesOn(day: string): number;
}

/**
 * Penalty for a subject that has been studied on many consecutive days or
 * dominates the recent days.
 *
 * Two contributions are summed and capped at `maxPenalty`:
 * - the streak of consecutive days before `referenceDay` (at most
 *   `lookbackDays`) beyond `streakThresholdDays`, times `streakPenaltyFactor`;
 * - the subject's share of all minutes in the `rollingWindowDays` before
 *   `referenceDay` beyond `rollingShareThreshold`, times `rollingPenaltyFactor`.
 *
 * Returns 0 when the config is disabled.
 *
 * @throws {InvalidDayError} when `referenceDay` is not a valid day
 */
export function computeRecentContinuityPenalty(args: {
  subjectId: string;
  referenceDay: string;
  history: MinuteHistory;
  config?: Partial<ContinuityConfig>;
}): number {
  const config: ContinuityConfig = { ...DEFAULT_CONTINUITY_CONFIG, ...args.config };
  if (!config.enabled) return 0;
  parseDayStrict(args.referenceDay);

  const { subjectId, referenceDay, history } = args;

  let streak = 0;
  for (let offset = 1; offset <= config.lookbackDays; offset++) {
    if (history.minutesOn(addDays(referenceDay, -offset), subjectId) <= 0) break;
    streak++;
  }
  const streakPenalty =
    Math.max(0, streak - config.streakThresholdDays) * config.streakPenaltyFactor;

  let subjectMinutes = 0;
  let totalMinutes = 0;
  for (let offset = 1; offset <= config.rollingWindowDays; offset++) {
    const day = addDays(referenceDay, -offset);
    subjectMinutes += history.minutesOn(day, subjectId);
    totalMinutes += history.totalMinutesOn(day);
  }
  const share = totalMinutes > 0 ? subjectMinutes / totalMinutes : 0;
  const rollingPenalty =
    Math.max(0, share - config.rollingShareThreshold) * config.rollingPenaltyFactor;

  return Math.min(config.maxPenalty, streakPenalty + rollingPenalty);
}
