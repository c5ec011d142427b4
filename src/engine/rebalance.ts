import type { GlobalConfig, SubjectOverrides } from "../config.js";
import { compareStrings, daysBetween, isDayString } from "../datetime.utils.js";
import { logger } from "../logger.js";
import { computeHumanityMetrics, type HumanityMetrics } from "../metrics/humanity.js";
import {
  SLACK_SUBJECT_ID,
  type AllocationRecord,
  type DailySlot,
  type StrategyMode,
  type Subject,
} from "../types.js";
import type { DecisionTrace } from "./decision-trace.js";
import { resolveStrategyMode } from "./distribution.js";
import { isWithinWindow, studyWindowOf, type StudyWindow } from "./windows.js";

export const RULE_REBALANCE_SWAP = "RULE_REBALANCE_SWAP";
export const RULE_REBALANCE_FALLBACK_SWAP = "RULE_REBALANCE_FALLBACK_SWAP";

/**
 * Global settings read by {@link rebalanceAllocations}.
 */
export type RebalanceConfig = Pick<
  GlobalConfig,
  | "maxSubjectsPerDay"
  | "rebalanceMaxSwaps"
  | "rebalanceMaxIterations"
  | "rebalanceNearDaysWindow"
  | "feasibilityRegressionTolerance"
  | "rebalanceAllowFallbackSwap"
  | "defaultStrategyMode"
>;

/**
 * @category Rebalancing
 */
export interface RebalanceOptions {
  allocations: readonly AllocationRecord[];
  /** Capacity per day; only `date`, `capMinutes`, `toleranceMinutes` and `lockedMinutes` are read. */
  slots: readonly Pick<DailySlot, "date" | "capMinutes" | "toleranceMinutes" | "lockedMinutes">[];
  subjects: readonly Subject[];
  config: RebalanceConfig;
  subjectOverrides?: Readonly<Record<string, SubjectOverrides>>;
  decisionTrace?: DecisionTrace;
  /** Records dated before this day are never moved. */
  pastCutoff?: string | null;
  /** Upper bound on accepted swaps, further capped by `config.rebalanceMaxSwaps`. */
  maxSwaps?: number;
  /** Locked manual records; their slots and manual days are never touched. */
  lockedAllocations?: readonly AllocationRecord[];
}

interface SwapCandidate {
  key: readonly [string, string, string, string, string, string];
  indexA: number;
  indexB: number;
}

// ============================================================================
// Feasibility
// ============================================================================

function allowedMinutesByDay(slots: RebalanceOptions["slots"]): Map<string, number> {
  const allowed = new Map<string, number>();
  for (const slot of slots) {
    const minutes =
      Math.max(0, slot.capMinutes) +
      Math.max(0, slot.toleranceMinutes) +
      Math.max(0, slot.lockedMinutes ?? 0);
    allowed.set(slot.date, (allowed.get(slot.date) ?? 0) + minutes);
  }
  return allowed;
}

/**
 * `1 / (1 + violations)`, where a violation is a record outside its
 * subject's study window or a day whose study minutes exceed its capacity.
 * Days without a slot have no capacity.
 */
export function feasibilityScore(
  allocations: readonly AllocationRecord[],
  allowedByDay: ReadonlyMap<string, number>,
  windows: ReadonlyMap<string, StudyWindow>,
): number {
  let violations = 0;
  const usedByDay = new Map<string, number>();

  for (const record of allocations) {
    if (record.subjectId === SLACK_SUBJECT_ID || record.subjectId === "") continue;
    usedByDay.set(record.date, (usedByDay.get(record.date) ?? 0) + Math.max(0, record.minutes));
    const window = windows.get(record.subjectId);
    if (window && !isWithinWindow(window, record.date)) violations++;
  }
  for (const [day, used] of usedByDay) {
    if (used > (allowedByDay.get(day) ?? 0)) violations++;
  }

  return 1 / (1 + violations);
}

function respectsMaxSubjectsPerDay(allocations: readonly AllocationRecord[], limit: number): boolean {
  const subjectsByDay = new Map<string, Set<string>>();
  for (const record of allocations) {
    if (record.subjectId === SLACK_SUBJECT_ID || record.subjectId === "") continue;
    const subjects = subjectsByDay.get(record.date) ?? new Set<string>();
    subjects.add(record.subjectId);
    if (subjects.size > limit) return false;
    subjectsByDay.set(record.date, subjects);
  }
  return true;
}

/** Names of the metric components that got strictly better. */
function humanityImprovements(before: HumanityMetrics, after: HumanityMetrics): string[] {
  const improved: string[] = [];
  if (after.monoDayRatio < before.monoDayRatio) improved.push("monoDayRatio");
  if (after.maxSameSubjectStreakDays < before.maxSameSubjectStreakDays) {
    improved.push("maxSameSubjectStreakDays");
  }
  if (after.subjectVarietyIndex > before.subjectVarietyIndex) improved.push("subjectVarietyIndex");
  return improved;
}

// ============================================================================
// Rebalancing
// ============================================================================

/**
 * Local search that swaps the subjects of two records to make the plan
 * more humane, never moving minutes, dates or buckets.
 *
 * Each iteration lists every eligible pair: both records mutable, different
 * subjects with the same strategy mode, same bucket, dates at most
 * `rebalanceNearDaysWindow` apart, and each subject inside its study window
 * on the other record's date. Pairs are tried in
 * `(dateA, subjectA, slotA, dateB, subjectB, slotB)` order and the first one
 * that keeps `maxSubjectsPerDay`, loses no more feasibility than
 * `feasibilityRegressionTolerance` and strictly improves one humanity
 * component is applied. With `rebalanceAllowFallbackSwap` the first pair
 * that passes the same gates without lowering the humanity score is
 * applied when no pair improves.
 *
 * A swap keeps every day's minutes and both subjects inside their windows,
 * so feasibility never drops below its starting value.
 *
 * Stops when an iteration applies nothing or the swap or iteration budget
 * runs out. Returns new records sorted by `(date, slotId, subjectId)`.
 *
 * @example
 * ```ts
 * const rebalanced = rebalanceAllocations({
 *   allocations: result.allocations,
 *   slots,
 *   subjects,
 *   config: effective.global,
 *   decisionTrace: trace,
 * });
 * ```
 */
export function rebalanceAllocations(options: RebalanceOptions): AllocationRecord[] {
  const { config, decisionTrace } = options;
  let working = options.allocations.map((record) => ({ ...record }));
  const sorted = () =>
    working.toSorted(
      (a, b) =>
        compareStrings(a.date, b.date) ||
        compareStrings(a.slotId, b.slotId) ||
        compareStrings(a.subjectId, b.subjectId),
    );
  if (working.length < 2) return sorted();

  const configuredMaxSwaps = config.rebalanceMaxSwaps;
  const maxSwaps = Math.max(0, Math.min(options.maxSwaps ?? configuredMaxSwaps, configuredMaxSwaps));
  const maxIterations = Math.max(0, config.rebalanceMaxIterations ?? configuredMaxSwaps);
  const nearDays = Math.max(0, config.rebalanceNearDaysWindow);
  const tolerance = config.feasibilityRegressionTolerance;
  const pastCutoff = options.pastCutoff ?? undefined;

  const locked = options.lockedAllocations ?? [];
  const lockedSlotIds = new Set(locked.map((record) => record.slotId));
  const lockedDates = new Set(
    locked.filter((record) => record.slotId.startsWith("manual-")).map((record) => record.date),
  );

  const windows = new Map<string, StudyWindow>();
  const strategyModes = new Map<string, StrategyMode>();
  for (const subject of options.subjects) {
    windows.set(subject.subjectId, studyWindowOf(subject));
    strategyModes.set(
      subject.subjectId,
      resolveStrategyMode(
        options.subjectOverrides?.[subject.subjectId]?.strategyMode,
        config.defaultStrategyMode,
      ),
    );
  }
  const allowed = allowedMinutesByDay(options.slots);

  const isImmutable = (record: AllocationRecord) =>
    lockedSlotIds.has(record.slotId) ||
    lockedDates.has(record.date) ||
    record.bucket === "manual_locked" ||
    record.slotId.startsWith("manual-") ||
    record.lockedByUser === true ||
    record.pinned === true ||
    (pastCutoff !== undefined && isDayString(record.date) && record.date < pastCutoff);

  const isMovable = (record: AllocationRecord) =>
    record.subjectId !== SLACK_SUBJECT_ID &&
    record.subjectId !== "" &&
    isDayString(record.date) &&
    !isImmutable(record);

  const fitsWindow = (subjectId: string, day: string) => {
    const window = windows.get(subjectId);
    return window === undefined || isWithinWindow(window, day);
  };

  let accepted = 0;
  let iterations = 0;
  while (accepted < maxSwaps && iterations < maxIterations) {
    iterations++;
    const baseFeasibility = feasibilityScore(working, allowed, windows);
    const before = computeHumanityMetrics(working);

    const candidates: SwapCandidate[] = [];
    working.forEach((a, indexA) => {
      if (!isMovable(a)) return;
      for (let indexB = indexA + 1; indexB < working.length; indexB++) {
        const b = working[indexB];
        if (!b || !isMovable(b) || a.subjectId === b.subjectId) continue;
        if (
          (strategyModes.get(a.subjectId) ?? "hybrid") !==
          (strategyModes.get(b.subjectId) ?? "hybrid")
        ) {
          continue;
        }
        if (a.bucket !== b.bucket) continue;
        if (Math.abs(daysBetween(a.date, b.date)) > nearDays) continue;
        if (!fitsWindow(a.subjectId, b.date) || !fitsWindow(b.subjectId, a.date)) continue;
        candidates.push({
          key: [a.date, a.subjectId, a.slotId, b.date, b.subjectId, b.slotId],
          indexA,
          indexB,
        });
      }
    });
    if (candidates.length === 0) break;
    candidates.sort((x, y) => {
      for (let i = 0; i < x.key.length; i++) {
        const order = compareStrings(x.key[i] ?? "", y.key[i] ?? "");
        if (order !== 0) return order;
      }
      return 0;
    });

    let fallback: { proposal: AllocationRecord[]; candidate: SwapCandidate; feasibility: number } | undefined;
    let applied = false;

    for (const candidate of candidates) {
      const proposal = working.map((record) => ({ ...record }));
      const a = proposal[candidate.indexA];
      const b = proposal[candidate.indexB];
      if (!a || !b) continue;
      const subjectA = a.subjectId;
      const subjectB = b.subjectId;
      a.subjectId = subjectB;
      b.subjectId = subjectA;

      if (!respectsMaxSubjectsPerDay(proposal, config.maxSubjectsPerDay)) continue;
      const feasibility = feasibilityScore(proposal, allowed, windows);
      if (feasibility + tolerance < baseFeasibility) continue;

      const after = computeHumanityMetrics(proposal);
      const improved = humanityImprovements(before, after);
      if (improved.length === 0) {
        if (
          config.rebalanceAllowFallbackSwap &&
          fallback === undefined &&
          after.humanityScore >= before.humanityScore
        ) {
          fallback = { proposal, candidate, feasibility };
        }
        continue;
      }

      working = proposal;
      accepted++;
      applied = true;
      decisionTrace?.record({
        slotId: `${a.slotId}|${b.slotId}`,
        candidateSubjects: [subjectA, subjectB],
        scoresBySubject: { [subjectA]: 0, [subjectB]: 0 },
        selectedSubjectId: `swap:${subjectA}<->${subjectB}`,
        appliedRules: [RULE_REBALANCE_SWAP],
        blockedConstraints: [],
        tradeoffNote: `Swap accepted: improves ${improved.join(", ")}; feasibility ${baseFeasibility.toFixed(3)}->${feasibility.toFixed(3)}.`,
        confidenceImpact: feasibility === baseFeasibility ? 0.002 : 0.003,
      });
      logger.debug(`rebalance swap ${subjectA}@${a.date} <-> ${subjectB}@${b.date}`);
      break;
    }

    if (!applied && fallback) {
      const { proposal, candidate, feasibility } = fallback;
      const a = proposal[candidate.indexA];
      const b = proposal[candidate.indexB];
      if (a && b) {
        working = proposal;
        accepted++;
        applied = true;
        decisionTrace?.record({
          slotId: `${a.slotId}|${b.slotId}`,
          candidateSubjects: [b.subjectId, a.subjectId],
          scoresBySubject: { [a.subjectId]: 0, [b.subjectId]: 0 },
          selectedSubjectId: `swap:${b.subjectId}<->${a.subjectId}`,
          appliedRules: [RULE_REBALANCE_FALLBACK_SWAP],
          blockedConstraints: [],
          tradeoffNote: `Fallback swap accepted: humanity score not lowered; feasibility ${baseFeasibility.toFixed(3)}->${feasibility.toFixed(3)}.`,
          confidenceImpact: 0,
        });
        logger.debug(`rebalance fallback swap ${b.subjectId}@${a.date} <-> ${a.subjectId}@${b.date}`);
      }
    }

    if (!applied) break;
  }

  logger.debug(`rebalance finished: ${accepted} swaps in ${iterations} iterations`);
  return sorted();
}
