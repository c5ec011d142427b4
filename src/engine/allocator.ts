import type { SubjectOverrides } from "../config.js";
import { compareStrings } from "../datetime.utils.js";
import { logger } from "../logger.js";
import {
  SLACK_SUBJECT_ID,
  type AllocationBucket,
  type AllocationRecord,
  type StrategyMode,
  type Subject,
} from "../types.js";
import type { DecisionTrace } from "./decision-trace.js";
import {
  concentrationBias,
  concentrationMultiplier,
  resolveConcentration,
  resolveDistribution,
  resolveStrategyMode,
  strategyRule,
  strategyWeight,
  type DistributionSettings,
  type ResolvedConcentration,
  type ResolvedDistribution,
} from "./distribution.js";
import { StudyHistory } from "./history.js";
import {
  compareTieBreakerKeys,
  computeRecentContinuityPenalty,
  computeScore,
  DEFAULT_SCORE_WEIGHTS,
  tieBreakerKey,
  type ContinuityConfig,
  type ScoreFeatures,
  type ScoreWeights,
  type TieBreakerKey,
} from "./scoring.js";
import { isWithinWindow, studyWindowOf, type StudyWindow } from "./windows.js";

// ============================================================================
// Types
// ============================================================================

/**
 * The part of a {@link DailySlot} the allocator reads.
 */
export interface AllocationSlot {
  slotId: string;
  date: string;
  maxMinutes: number;
}

/**
 * Minutes still to place for one subject.
 */
export interface AllocationDemand {
  baseMinutes: number;
  bufferMinutes: number;
}

/**
 * Inputs of {@link allocatePlan}.
 *
 * @category Allocation
 */
export interface AllocatePlanOptions {
  slots: readonly AllocationSlot[];
  subjects: readonly Subject[];
  demandBySubject: Readonly<Record<string, AllocationDemand>>;
  /** Allocation quantum. Defaults to 30. */
  sessionMinutes?: number;
  scoreFeaturesBySubject?: Readonly<Record<string, Partial<ScoreFeatures>>>;
  scoreWeights?: ScoreWeights;
  continuityConfig?: Partial<ContinuityConfig>;
  /** Global distribution layer. */
  distribution?: DistributionSettings;
  subjectOverrides?: Readonly<Record<string, SubjectOverrides>>;
  concentrationModeBySubject?: Readonly<Record<string, string>>;
  globalConcentrationMode?: string;
  defaultStrategyMode?: string;
  decisionTrace?: DecisionTrace;
}

/**
 * @category Allocation
 */
export interface AllocationResult {
  allocations: AllocationRecord[];
  remainingBaseMinutes: Record<string, number>;
  remainingBufferMinutes: Record<string, number>;
}

interface SubjectPlanState {
  subject: Subject;
  window: StudyWindow;
  examDay: string;
  remainingBase: number;
  remainingBuffer: number;
  features: Partial<ScoreFeatures>;
  distribution: ResolvedDistribution;
  concentration: ResolvedConcentration;
  strategy: StrategyMode;
}

interface Candidate {
  state: SubjectPlanState;
  score: number;
  tie: TieBreakerKey;
}

// ============================================================================
// Constants
// ============================================================================

const FAR_FUTURE_DAY = "9999-12-31";

export const RULES = {
  BASE_BEFORE_BUFFER: "RULE_BASE_BEFORE_BUFFER",
  SCORE_ORDER: "RULE_SCORE_ORDER",
  TIE_BREAK_DETERMINISTIC: "RULE_TIE_BREAK_DETERMINISTIC",
  LIMIT_CONSECUTIVE_BLOCKS: "RULE_LIMIT_CONSECUTIVE_BLOCKS",
  CONCENTRATION_MODE_PER_SUBJECT: "RULE_CONCENTRATION_MODE_PER_SUBJECT",
  PRE_EXAM_BUFFER: "RULE_PRE_EXAM_BUFFER",
  GAP_FILL_BUFFER: "RULE_GAP_FILL_BUFFER",
  GAP_FILL_SLACK: "RULE_GAP_FILL_SLACK",
} as const;

const VARIETY_PENALTY_PER_MISSING_SUBJECT = 0.25;
const CONCENTRATED_PENALTY_FACTOR = 0.5;

const byCandidateRank = (a: Candidate, b: Candidate) =>
  b.score - a.score || compareTieBreakerKeys(a.tie, b.tie);

// ============================================================================
// Allocation
// ============================================================================

/**
 * Places study minutes into daily slots in three phases.
 *
 * 1. **Forward base allocation.** Each slot is filled one session at a
 *    time with the best-scoring subject that still has base minutes,
 *    honoring distribution streak limits and same-day block limits.
 * 2. **Pre-exam buffer.** Subjects whose base is fully placed receive one
 *    buffer session per slot, up to their exam day, ranked by strategy
 *    weight.
 * 3. **Gap fill.** Remaining capacity takes one more round of buffer;
 *    whatever is still free becomes an explicit `slack` record.
 *
 * Slots are processed by `(date, slotId)` and subjects enumerated by
 * `subjectId`; choices are made by `(score desc, tie-break asc)`. A subject
 * never receives buffer while it has base minutes left. Only days inside a
 * subject's study window are considered.
 *
 * Never throws on infeasible input: unmet demand is left in the remaining
 * maps.
 *
 * @example
 * ```ts
 * const result = allocatePlan({
 *   slots: buildDailySlots({ startDate: "2026-01-05", endDate: "2026-01-18", config, constraints: [] }),
 *   subjects: [parseSubject({ subjectId: "math", examDates: ["2026-01-19"] })],
 *   demandBySubject: { math: { baseMinutes: 1200, bufferMinutes: 120 } },
 * });
 * ```
 */
export function allocatePlan(options: AllocatePlanOptions): AllocationResult {
  const sessionMinutes = Math.max(1, Math.floor(options.sessionMinutes ?? 30));
  const weights = options.scoreWeights ?? DEFAULT_SCORE_WEIGHTS;
  const trace = options.decisionTrace;
  const overrides = options.subjectOverrides ?? {};

  const slots = options.slots.toSorted(
    (a, b) => compareStrings(a.date, b.date) || compareStrings(a.slotId, b.slotId),
  );
  const states = options.subjects
    .toSorted((a, b) => compareStrings(a.subjectId, b.subjectId))
    .map((subject): SubjectPlanState => {
      const sid = subject.subjectId;
      const demand = options.demandBySubject[sid];
      const subjectLayer = overrides[sid];
      const window = studyWindowOf(subject);
      return {
        subject,
        window,
        examDay: window.examDay ?? FAR_FUTURE_DAY,
        remainingBase: Math.max(0, Math.round(demand?.baseMinutes ?? 0)),
        remainingBuffer: Math.max(0, Math.round(demand?.bufferMinutes ?? 0)),
        features: options.scoreFeaturesBySubject?.[sid] ?? {},
        distribution: resolveDistribution(subjectLayer, options.distribution),
        concentration: resolveConcentration(
          sid,
          options.concentrationModeBySubject?.[sid],
          subjectLayer?.concentrationMode,
          options.globalConcentrationMode,
        ),
        strategy: resolveStrategyMode(subjectLayer?.strategyMode, options.defaultStrategyMode),
      };
    });

  const allocations: AllocationRecord[] = [];
  const history = new StudyHistory();
  const freeBySlot: number[] = [];

  const place = (
    slot: AllocationSlot,
    subjectId: string,
    minutes: number,
    bucket: AllocationBucket,
  ) => {
    if (minutes <= 0) return;
    allocations.push({ slotId: slot.slotId, date: slot.date, subjectId, minutes, bucket });
    history.record(slot.date, subjectId, minutes);
  };

  const exceedsBlockLimit = (state: SubjectPlanState, day: string) =>
    state.distribution.mode !== "off" &&
    history.lastSubjectOn(day) === state.subject.subjectId &&
    history.consecutiveBlocksOn(day) + 1 > state.distribution.maxSameDayBlocks;

  const scoreForwardCandidate = (state: SubjectPlanState, day: string): number => {
    const sid = state.subject.subjectId;
    const continuityPenalty = computeRecentContinuityPenalty({
      subjectId: sid,
      referenceDay: day,
      history,
      config: options.continuityConfig,
    });

    const subjectsToday = new Set(history.subjectsOn(day)).add(sid);
    const varietyMissing = Math.max(
      0,
      state.distribution.targetDailySubjectVariety - subjectsToday.size,
    );
    const softPenalty =
      state.distribution.penaltyMultiplier * varietyMissing * VARIETY_PENALTY_PER_MISSING_SUBJECT;

    const concentrated = state.concentration.mode === "concentrated";
    const baseScore = computeScore(
      {
        ...state.features,
        concentrationPenalty:
          (state.features.concentrationPenalty ?? 0) * (concentrated ? CONCENTRATED_PENALTY_FACTOR : 1),
        streakPenalty: continuityPenalty + softPenalty,
      },
      weights,
    );
    const weight = strategyWeight(state.strategy, day, state.examDay, { damped: true });
    return (
      (baseScore + concentrationBias(state.concentration.mode)) *
      weight *
      concentrationMultiplier(state.concentration.mode)
    );
  };

  // Phase 1: forward base allocation
  slots.forEach((slot, index) => {
    const day = slot.date;
    let available = Math.max(0, Math.floor(slot.maxMinutes));

    while (available >= sessionMinutes) {
      const candidates: Candidate[] = [];
      for (const state of states) {
        if (state.remainingBase <= 0 || !isWithinWindow(state.window, day)) continue;
        const { mode, maxStreakDays } = state.distribution;
        if (
          (mode === "balanced" || mode === "strict") &&
          history.streakDaysBefore(state.subject.subjectId, day) >= maxStreakDays
        ) {
          continue;
        }
        candidates.push({
          state,
          score: scoreForwardCandidate(state, day),
          tie: tieBreakerKey(state.subject, day),
        });
      }
      if (candidates.length === 0) break;
      candidates.sort(byCandidateRank);

      let chosen = candidates[0];
      if (!chosen) break;
      let forcedSecondChoice = false;
      let tradeoffNote = "Highest score with deterministic tie-break.";

      if (exceedsBlockLimit(chosen.state, day)) {
        const alternative = candidates.slice(1).find((c) => !exceedsBlockLimit(c.state, day));
        if (alternative) {
          chosen = alternative;
          forcedSecondChoice = true;
          tradeoffNote = "Same-subject block limit reached: next valid candidate selected.";
        } else {
          tradeoffNote =
            "Same-subject block limit exception: no alternative candidate without breaking hard constraints.";
        }
      }

      const state = chosen.state;
      const sid = state.subject.subjectId;
      const concentrationApplied =
        state.concentration.source === "explicit" || state.concentration.source === "subject";
      if (concentrationApplied) {
        tradeoffNote += " Per-subject concentration mode applied to candidate scoring.";
      }

      const chunk = Math.min(sessionMinutes, available, state.remainingBase);
      place(slot, sid, chunk, "base");

      if (trace) {
        const appliedRules: string[] = [
          RULES.BASE_BEFORE_BUFFER,
          RULES.SCORE_ORDER,
          RULES.TIE_BREAK_DETERMINISTIC,
          strategyRule(state.strategy),
        ];
        if (forcedSecondChoice) appliedRules.push(RULES.LIMIT_CONSECUTIVE_BLOCKS);
        if (concentrationApplied) appliedRules.push(RULES.CONCENTRATION_MODE_PER_SUBJECT);
        trace.record({
          slotId: slot.slotId,
          candidateSubjects: candidates.map((c) => c.state.subject.subjectId),
          scoresBySubject: Object.fromEntries(
            candidates.map((c) => [c.state.subject.subjectId, c.score]),
          ),
          selectedSubjectId: sid,
          appliedRules,
          blockedConstraints: [],
          tradeoffNote,
          confidenceImpact: 0.01,
        });
      }

      state.remainingBase -= chunk;
      available -= chunk;
    }

    freeBySlot[index] = available;
  });

  const rankBufferCandidates = (day: string, requireBeforeExam: boolean): Candidate[] =>
    states
      .filter(
        (state) =>
          state.remainingBase <= 0 &&
          state.remainingBuffer > 0 &&
          isWithinWindow(state.window, day) &&
          (!requireBeforeExam || day <= state.examDay),
      )
      .map((state) => ({
        state,
        score: strategyWeight(state.strategy, day, state.examDay),
        tie: tieBreakerKey(state.subject, day),
      }))
      .toSorted(byCandidateRank);

  const fillBuffer = (
    slot: AllocationSlot,
    free: number,
    candidates: readonly Candidate[],
    rule: string,
    tradeoffNote: string,
    confidenceImpact: number,
  ): number => {
    let remaining = free;
    for (const candidate of candidates) {
      if (remaining < sessionMinutes) break;
      const state = candidate.state;
      const chunk = Math.min(sessionMinutes, remaining, state.remainingBuffer);
      place(slot, state.subject.subjectId, chunk, "buffer");
      trace?.record({
        slotId: slot.slotId,
        candidateSubjects: candidates.map((c) => c.state.subject.subjectId),
        scoresBySubject: Object.fromEntries(
          candidates.map((c) => [c.state.subject.subjectId, c.score]),
        ),
        selectedSubjectId: state.subject.subjectId,
        appliedRules: [rule, RULES.BASE_BEFORE_BUFFER, strategyRule(state.strategy)],
        blockedConstraints: [],
        tradeoffNote,
        confidenceImpact,
      });
      state.remainingBuffer -= chunk;
      remaining -= chunk;
    }
    return remaining;
  };

  // Phase 2: pre-exam buffer for subjects whose base is complete
  slots.forEach((slot, index) => {
    const free = freeBySlot[index] ?? 0;
    if (free < sessionMinutes) return;
    freeBySlot[index] = fillBuffer(
      slot,
      free,
      rankBufferCandidates(slot.date, true),
      RULES.PRE_EXAM_BUFFER,
      "Buffer placed for a subject with complete base before its exam.",
      0.005,
    );
  });

  // Phase 3: gap fill, then explicit slack
  slots.forEach((slot, index) => {
    let free = freeBySlot[index] ?? 0;
    if (free <= 0) return;
    if (free >= sessionMinutes) {
      free = fillBuffer(
        slot,
        free,
        rankBufferCandidates(slot.date, false),
        RULES.GAP_FILL_BUFFER,
        "Gap filled with available buffer.",
        0.002,
      );
    }
    if (free > 0) {
      place(slot, SLACK_SUBJECT_ID, free, "slack");
      trace?.record({
        slotId: slot.slotId,
        candidateSubjects: [],
        scoresBySubject: {},
        selectedSubjectId: SLACK_SUBJECT_ID,
        appliedRules: [RULES.GAP_FILL_SLACK],
        blockedConstraints: ["NO_ELIGIBLE_SUBJECT"],
        tradeoffNote: "Remaining minutes marked as explicit slack.",
        confidenceImpact: -0.01,
      });
    }
    freeBySlot[index] = 0;
  });

  const remainingBaseMinutes: Record<string, number> = {};
  const remainingBufferMinutes: Record<string, number> = {};
  for (const state of states) {
    remainingBaseMinutes[state.subject.subjectId] = state.remainingBase;
    remainingBufferMinutes[state.subject.subjectId] = state.remainingBuffer;
  }

  logger.debug(
    `allocated ${allocations.length} records over ${slots.length} slots for ${states.length} subjects`,
  );

  return { allocations, remainingBaseMinutes, remainingBufferMinutes };
}
