/**
 * Deterministic study-time allocation and rebalancing.
 *
 * Turns subjects with credit loads and exam dates into a day-by-day study
 * plan that respects daily capacity, sleep, calendar constraints and exam
 * deadlines, then swaps sessions between days to make the plan less
 * monotonous.
 *
 * @remarks
 * ## Core Concepts
 *
 * **Workload**: each subject's credits become base minutes (required) and
 * buffer minutes (safety margin). Buffer is only scheduled once a subject's
 * base is fully placed. See {@link computeSubjectWorkload}.
 *
 * **Slots**: one capacity envelope per day, `capMinutes` plus
 * `toleranceMinutes`, bounded by awake time. See {@link buildDailySlots}.
 *
 * **Allocation**: a three-phase greedy pass (forward base, pre-exam buffer,
 * gap fill) picks subjects by weighted score with a deterministic
 * tie-break. Unused capacity becomes explicit `__slack__` records. See
 * {@link allocatePlan}.
 *
 * **Rebalancing**: a bounded local search swaps subjects between records
 * when it improves the {@link HumanityMetrics} without losing feasibility.
 * See {@link rebalanceAllocations}.
 *
 * **Decision trace**: every allocation and swap is logged with the rules
 * applied. Timestamps are synthetic, so identical input gives an identical
 * trace.
 *
 * @example Plan two subjects
 * ```typescript
 * import { runPlanner } from "study-planner";
 *
 * const result = runPlanner({
 *   globalConfig: { dailyCapMinutes: 150, humanDistributionMode: "balanced" },
 *   subjects: [
 *     { subjectId: "analysis", cfu: 9, difficultyCoeff: 1.3, examDates: ["2026-02-12"], startAt: "2026-01-12" },
 *     { subjectId: "chemistry", cfu: 6, priority: 2, examDates: ["2026-02-05"], startAt: "2026-01-12" },
 *   ],
 *   calendarConstraints: [{ constraintId: "lab", type: "blocked", weekday: "thu", blockedMinutes: 90 }],
 *   generatedAt: "2026-01-12T07:00:00Z",
 * });
 *
 * for (const day of result.dailyPlan) {
 *   console.log(day.date, day.studyMinutes, day.slackMinutes);
 * }
 * ```
 *
 * @example Replan after recording sessions
 * ```typescript
 * const next = runPlanner({
 *   ...input,
 *   previousPlan: result.plan,
 *   replanContext: { fromDate: "2026-01-19" },
 *   manualSessions: [
 *     { subjectId: "analysis", date: "2026-01-15", plannedMinutes: 60, actualMinutesDone: 45, status: "partial" },
 *   ],
 * });
 * next.stabilityScore;
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Domain types
// ============================================================================

export type {
  Weekday,
  StrategyMode,
  ConcentrationMode,
  DistributionMode,
  Subject,
  SubjectInput,
  CalendarConstraint,
  CalendarConstraintInput,
  ManualSession,
  ManualSessionInput,
  ManualSessionStatus,
  DailySlot,
  AllocationBucket,
  AllocationRecord,
  SubjectWorkload,
} from "./types.js";

export {
  SubjectSchema,
  CalendarConstraintSchema,
  ManualSessionSchema,
  WeekdaySchema,
  DayStringSchema,
  SLACK_SUBJECT_ID,
  parseSubject,
  parseCalendarConstraint,
  parseManualSession,
} from "./types.js";

// ============================================================================
// Errors
// ============================================================================

export { InvalidDayError } from "./errors.js";

// ============================================================================
// Configuration
// ============================================================================

export {
  GlobalConfigSchema,
  SubjectOverridesSchema,
  ALLOWED_OVERRIDE_KEYS,
  resolveEffectiveConfig,
  resolveSleepHours,
  applyWindowOverrides,
} from "./config.js";

export type {
  GlobalConfig,
  GlobalConfigInput,
  SubjectOverrides,
  EffectiveConfig,
  ConfigIssue,
} from "./config.js";

// ============================================================================
// Dates
// ============================================================================

export { addDays, daysBetween, generateDays, isDayString, toWeekdayUTC } from "./datetime.utils.js";

// ============================================================================
// Workload and slots
// ============================================================================

export {
  computeSubjectWorkload,
  hoursToMinutes,
  DEFAULT_ATTENDANCE_HOURS_PER_CFU,
  HOURS_PER_CFU,
} from "./engine/workload.js";

export { buildDailySlots, slotIdForDay } from "./engine/slot-builder.js";
export type { SlotConfig } from "./engine/slot-builder.js";

// ============================================================================
// Scoring
// ============================================================================

export {
  computeScore,
  tieBreakerKey,
  compareTieBreakerKeys,
  computeRecentContinuityPenalty,
  DEFAULT_SCORE_WEIGHTS,
  DEFAULT_CONTINUITY_CONFIG,
  NO_EXAM_DAYS,
} from "./engine/scoring.js";

export type {
  ScoreFeatures,
  ScoreWeights,
  TieBreakerKey,
  ContinuityConfig,
  MinuteHistory,
} from "./engine/scoring.js";

export { computeScoreFeatures } from "./engine/features.js";
export { StudyHistory } from "./engine/history.js";

export {
  resolveDistribution,
  resolveConcentration,
  resolveStrategyMode,
  strategyWeight,
} from "./engine/distribution.js";

export type {
  DistributionSettings,
  ResolvedDistribution,
  ResolvedConcentration,
  ConcentrationSource,
} from "./engine/distribution.js";

export { examDayOf, studyWindowOf } from "./engine/windows.js";
export type { StudyWindow } from "./engine/windows.js";

// ============================================================================
// Allocation and rebalancing
// ============================================================================

export { allocatePlan, RULES } from "./engine/allocator.js";

export type {
  AllocatePlanOptions,
  AllocationDemand,
  AllocationResult,
  AllocationSlot,
} from "./engine/allocator.js";

export {
  rebalanceAllocations,
  feasibilityScore,
  RULE_REBALANCE_SWAP,
  RULE_REBALANCE_FALLBACK_SWAP,
} from "./engine/rebalance.js";

export type { RebalanceOptions, RebalanceConfig } from "./engine/rebalance.js";

export { DecisionTraceImpl } from "./engine/decision-trace.js";
export type { DecisionTrace, DecisionTraceEntry, DecisionInput } from "./engine/decision-trace.js";

// ============================================================================
// Replanning
// ============================================================================

export {
  readReplanWindow,
  splitPreviousPlan,
  computeManualProgress,
  extractLockedManualAllocations,
  applyLockedConstraintsToSlots,
  computeReallocationMetrics,
  buildCriticalWarnings,
} from "./engine/replan.js";

export type {
  ReplanWindow,
  ManualProgress,
  ReallocationMetrics,
  PlanWarning,
} from "./engine/replan.js";

// ============================================================================
// Metrics
// ============================================================================

export { computeHumanityMetrics } from "./metrics/humanity.js";
export type { HumanityMetrics } from "./metrics/humanity.js";

// ============================================================================
// Planner
// ============================================================================

export { runPlanner } from "./planner.js";
export type { PlannerInput, PlanResult, DailyPlanEntry } from "./planner.js";

export { logger } from "./logger.js";
export type { LogLevel } from "./logger.js";
