import {
  applyWindowOverrides,
  resolveEffectiveConfig,
  type ConfigIssue,
  type GlobalConfigInput,
} from "./config.js";
import { compareStrings, isDayString, maxDay, minDay } from "./datetime.utils.js";
import { allocatePlan, type AllocationDemand } from "./engine/allocator.js";
import { DecisionTraceImpl, type DecisionTraceEntry } from "./engine/decision-trace.js";
import { computeScoreFeatures } from "./engine/features.js";
import { rebalanceAllocations } from "./engine/rebalance.js";
import {
  applyLockedConstraintsToSlots,
  buildCriticalWarnings,
  computeManualProgress,
  computeReallocationMetrics,
  extractLockedManualAllocations,
  readReplanWindow,
  splitPreviousPlan,
  type PlanWarning,
} from "./engine/replan.js";
import { buildDailySlots } from "./engine/slot-builder.js";
import { computeSubjectWorkload, hoursToMinutes } from "./engine/workload.js";
import { logger } from "./logger.js";
import { computeHumanityMetrics, type HumanityMetrics } from "./metrics/humanity.js";
import {
  parseCalendarConstraint,
  parseManualSession,
  parseSubject,
  SLACK_SUBJECT_ID,
  type AllocationRecord,
  type CalendarConstraintInput,
  type DailySlot,
  type ManualSessionInput,
  type Subject,
  type SubjectInput,
  type SubjectWorkload,
} from "./types.js";

// ============================================================================
// Types
// ============================================================================

/**
 * Everything a planning run needs.
 *
 * @category Planner
 */
export interface PlannerInput {
  globalConfig?: GlobalConfigInput;
  subjects: SubjectInput[];
  calendarConstraints?: CalendarConstraintInput[];
  manualSessions?: ManualSessionInput[];
  /** Plan of an earlier run; records before `replanContext.fromDate` are kept. */
  previousPlan?: AllocationRecord[];
  replanContext?: { fromDate?: string | null };
  /** Inclusive planning horizon. Derived from the subjects when omitted. */
  horizon?: { startDate: string; endDate: string };
  /** ISO-8601 instant anchoring the decision trace timestamps. */
  generatedAt?: string;
  /** Hours actually attended per subject, replacing the per-credit estimate. */
  attendedCalendarHoursBySubject?: Record<string, number>;
  /** Per-run concentration mode per subject, ahead of the subject's overrides. */
  concentrationModeBySubject?: Record<string, string>;
}

/**
 * @category Planner
 */
export interface DailyPlanEntry {
  date: string;
  allocations: AllocationRecord[];
  studyMinutes: number;
  slackMinutes: number;
}

/**
 * Output of {@link runPlanner}.
 *
 * @category Planner
 */
export interface PlanResult {
  /** Preserved history plus the new horizon, sorted by `(date, slotId, subjectId)`. */
  plan: AllocationRecord[];
  dailyPlan: DailyPlanEntry[];
  /**
   * Capacity left for the engine after locked manual sessions. A day's
   * records in `plan` stay within `maxMinutes + (lockedMinutes ?? 0)`.
   */
  slotsInWindow: DailySlot[];
  workloadBySubject: Record<string, SubjectWorkload>;
  remainingBaseMinutes: Record<string, number>;
  remainingBufferMinutes: Record<string, number>;
  decisionTrace: DecisionTraceEntry[];
  reallocatedRatio: number;
  stabilityScore: number;
  humanity: HumanityMetrics;
  warnings: PlanWarning[];
  configIssues: ConfigIssue[];
}

// ============================================================================
// Helpers
// ============================================================================

const compareRecords = (a: AllocationRecord, b: AllocationRecord) =>
  compareStrings(a.date, b.date) ||
  compareStrings(a.slotId, b.slotId) ||
  compareStrings(a.subjectId, b.subjectId);

function resolveHorizon(
  input: PlannerInput,
  subjects: readonly Subject[],
): { startDate: string; endDate: string } | undefined {
  if (input.horizon) return input.horizon;

  const generatedDay = input.generatedAt?.slice(0, 10);
  const startDate =
    minDay(...subjects.map((s) => s.startAt)) ??
    (isDayString(generatedDay) ? generatedDay : undefined);
  const endDate = maxDay(
    ...subjects.map((s) => s.endBy ?? maxDay(...s.examDates, s.selectedExamDate)),
  );
  if (startDate === undefined || endDate === undefined || startDate > endDate) return undefined;
  return { startDate, endDate };
}

function traceStart(generatedAt: string | undefined, horizonStart: string | undefined): Date {
  if (generatedAt !== undefined) {
    const parsed = new Date(generatedAt);
    if (!Number.isNaN(parsed.getTime())) return parsed;
  }
  return horizonStart !== undefined ? new Date(`${horizonStart}T00:00:00Z`) : new Date(0);
}

function sumMinutesBySubject(records: readonly AllocationRecord[]): Map<string, number> {
  const totals = new Map<string, number>();
  for (const record of records) {
    totals.set(record.subjectId, (totals.get(record.subjectId) ?? 0) + record.minutes);
  }
  return totals;
}

function groupByDay(plan: readonly AllocationRecord[]): DailyPlanEntry[] {
  const byDay = new Map<string, DailyPlanEntry>();
  for (const record of plan) {
    let entry = byDay.get(record.date);
    if (!entry) {
      entry = { date: record.date, allocations: [], studyMinutes: 0, slackMinutes: 0 };
      byDay.set(record.date, entry);
    }
    entry.allocations.push(record);
    if (record.subjectId === SLACK_SUBJECT_ID) entry.slackMinutes += record.minutes;
    else entry.studyMinutes += record.minutes;
  }
  return [...byDay.values()].toSorted((a, b) => compareStrings(a.date, b.date));
}

// ============================================================================
// Planner
// ============================================================================

/**
 * Runs a complete planning pass: configuration, slots, workloads, manual
 * progress, allocation and rebalancing, then the replan bookkeeping.
 *
 * Identical input yields identical output, including the decision trace,
 * whose timestamps are anchored at `generatedAt`.
 *
 * @throws {ZodError} when a subject has no `subjectId`
 *
 * @example
 * ```ts
 * const result = runPlanner({
 *   globalConfig: { dailyCapMinutes: 120, humanDistributionMode: "balanced" },
 *   subjects: [
 *     { subjectId: "math", cfu: 6, examDates: ["2026-02-10"], startAt: "2026-01-05" },
 *     { subjectId: "physics", cfu: 9, examDates: ["2026-02-20"], startAt: "2026-01-05" },
 *   ],
 *   generatedAt: "2026-01-05T08:00:00Z",
 * });
 * result.dailyPlan[0]?.allocations;
 * ```
 */
export function runPlanner(input: PlannerInput): PlanResult {
  const parsedSubjects = input.subjects.map(parseSubject);
  const { config, issues } = resolveEffectiveConfig(input.globalConfig, parsedSubjects);
  const global = config.global;
  const subjects = parsedSubjects.map((subject) =>
    applyWindowOverrides(subject, config.bySubject[subject.subjectId]),
  );
  const constraints = (input.calendarConstraints ?? []).map(parseCalendarConstraint);
  const manualSessions = (input.manualSessions ?? []).map(parseManualSession);

  const { fromDate } = readReplanWindow(input);
  const horizon = resolveHorizon(input, subjects);

  let slots = horizon ? buildDailySlots({ ...horizon, config: global, constraints }) : [];
  if (fromDate !== null) slots = slots.filter((slot) => slot.date >= fromDate);
  const locked = extractLockedManualAllocations(manualSessions, fromDate);
  const slotsInWindow = applyLockedConstraintsToSlots(slots, locked);

  const progress = computeManualProgress(manualSessions);
  const pendingLocked = sumMinutesBySubject(
    extractLockedManualAllocations(
      manualSessions.filter((session) => session.status === "planned"),
      fromDate,
    ),
  );

  const workloadBySubject: Record<string, SubjectWorkload> = {};
  const demandBySubject: Record<string, AllocationDemand> = {};
  const baseMinutesBySubject: Record<string, number> = {};
  for (const subject of subjects) {
    const sid = subject.subjectId;
    const workload = computeSubjectWorkload(
      subject,
      config.bySubject[sid]?.subjectBufferPercent ?? global.subjectBufferPercent,
      input.attendedCalendarHoursBySubject?.[sid],
    );
    workloadBySubject[sid] = workload;

    const base = hoursToMinutes(workload.hoursBase);
    const buffer = hoursToMinutes(workload.hoursBuffer);
    const consumed =
      Math.max(0, progress[sid]?.effectiveDoneMinutes ?? 0) + (pendingLocked.get(sid) ?? 0);
    const excess = Math.max(0, consumed - base);

    demandBySubject[sid] = {
      baseMinutes: Math.max(0, base - consumed),
      bufferMinutes: Math.max(0, buffer - excess),
    };
    baseMinutesBySubject[sid] = Math.max(0, base - consumed);
  }

  const referenceDay = slotsInWindow[0]?.date ?? fromDate ?? horizon?.startDate;
  const scoreFeaturesBySubject =
    referenceDay === undefined
      ? {}
      : computeScoreFeatures({
          subjects,
          baseMinutesBySubject,
          slots: slotsInWindow,
          referenceDay,
        });

  const trace = new DecisionTraceImpl(traceStart(input.generatedAt, horizon?.startDate));
  logger.debug(
    `planning ${subjects.length} subjects over ${slotsInWindow.length} slots` +
      (fromDate !== null ? ` from ${fromDate}` : ""),
  );

  const allocation = allocatePlan({
    slots: slotsInWindow,
    subjects,
    demandBySubject,
    sessionMinutes: global.sessionDurationMinutes,
    scoreFeaturesBySubject,
    scoreWeights: global.scoreWeights,
    continuityConfig: global.continuity,
    distribution: global,
    subjectOverrides: config.bySubject,
    concentrationModeBySubject: input.concentrationModeBySubject,
    globalConcentrationMode: global.concentrationMode,
    defaultStrategyMode: global.defaultStrategyMode,
    decisionTrace: trace,
  });

  const rebalanced = rebalanceAllocations({
    allocations: [...allocation.allocations, ...locked],
    slots: slotsInWindow,
    subjects,
    config: global,
    subjectOverrides: config.bySubject,
    decisionTrace: trace,
    pastCutoff: fromDate,
    lockedAllocations: locked,
  });

  const { preserved, replannable } = splitPreviousPlan(input.previousPlan ?? [], fromDate);
  const plan = [...preserved, ...rebalanced].toSorted(compareRecords);
  const isStudy = (record: AllocationRecord) => record.subjectId !== SLACK_SUBJECT_ID;
  const { reallocatedRatio, stabilityScore } = computeReallocationMetrics(
    replannable.filter(isStudy),
    rebalanced.filter(isStudy),
  );

  const warnings = buildCriticalWarnings({ manualSessions, slotsInWindow });
  for (const warning of warnings) logger.warn(`${warning.code}: ${warning.message}`);

  const unmetBase = Object.values(allocation.remainingBaseMinutes).reduce((a, b) => a + b, 0);
  logger.info(
    `plan ready: ${plan.length} records, ${unmetBase} base minutes unplaced, stability ${stabilityScore.toFixed(3)}`,
  );

  return {
    plan,
    dailyPlan: groupByDay(plan),
    slotsInWindow,
    workloadBySubject,
    remainingBaseMinutes: allocation.remainingBaseMinutes,
    remainingBufferMinutes: allocation.remainingBufferMinutes,
    decisionTrace: trace.entries(),
    reallocatedRatio,
    stabilityScore,
    humanity: computeHumanityMetrics(plan),
    warnings,
    configIssues: issues,
  };
}
