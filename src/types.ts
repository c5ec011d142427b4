/**
 * Core domain types for the study planner.
 *
 * Input records are normalized through zod schemas whose field-level
 * fallbacks make parsing total: a malformed field degrades to its default
 * instead of failing the whole record.
 *
 * @packageDocumentation
 */

import * as z from "zod";

// ============================================================================
// Calendar Primitives
// ============================================================================

/**
 * Short weekday identifier, as used by sleep overrides and recurring
 * calendar constraints.
 */
export type Weekday = "mon" | "tue" | "wed" | "thu" | "fri" | "sat" | "sun";

/**
 * Zod schema for {@link Weekday}.
 */
export const WeekdaySchema = z.enum(["mon", "tue", "wed", "thu", "fri", "sat", "sun"]);

/**
 * Calendar day in `YYYY-MM-DD` format.
 */
export const DayStringSchema = z.iso.date();

// ============================================================================
// Modes
// ============================================================================

/**
 * Temporal bias of allocation relative to the exam date.
 *
 * - `forward`: study early
 * - `backward`: study late
 * - `hybrid`: near-neutral, slight acceleration close to the exam
 */
export type StrategyMode = "forward" | "backward" | "hybrid";

export const STRATEGY_MODES = ["forward", "backward", "hybrid"] as const satisfies readonly StrategyMode[];

/**
 * Whether a subject prefers clustered sessions (`concentrated`) or spread
 * out sessions (`diffuse`).
 */
export type ConcentrationMode = "diffuse" | "concentrated";

export const CONCENTRATION_MODES = [
  "diffuse",
  "concentrated",
] as const satisfies readonly ConcentrationMode[];

/**
 * Anti-monotony policy applied during forward allocation.
 */
export type DistributionMode = "off" | "balanced" | "strict";

export const DISTRIBUTION_MODES = [
  "off",
  "balanced",
  "strict",
] as const satisfies readonly DistributionMode[];

// ============================================================================
// Subjects
// ============================================================================

const clampUnit = (value: number) => Math.min(1, Math.max(0, value));

/**
 * Subject record after normalization.
 *
 * Non-numeric `cfu` reads as 0, non-numeric `difficultyCoeff` as 1,
 * `completionInitial` is clamped into [0, 1], and exam dates that do not
 * parse are dropped. `examDates` is kept sorted ascending.
 */
export const SubjectSchema = z.object({
  subjectId: z.string().min(1),
  name: z.string().optional().catch(undefined),
  cfu: z.number().min(0).default(0).catch(0),
  difficultyCoeff: z.number().min(0).default(1).catch(1),
  priority: z.number().int().default(0).catch(0),
  completionInitial: z.number().transform(clampUnit).default(0).catch(0),
  attending: z.boolean().default(false).catch(false),
  attendanceHoursPerCfu: z.number().min(0).optional().catch(undefined),
  examDates: z
    .array(z.unknown())
    .transform((values) =>
      values
        .filter((value): value is string => DayStringSchema.safeParse(value).success)
        .toSorted(),
    )
    .default([])
    .catch([]),
  selectedExamDate: DayStringSchema.optional().catch(undefined),
  startAt: DayStringSchema.optional().catch(undefined),
  endBy: DayStringSchema.optional().catch(undefined),
  overrides: z.record(z.string(), z.unknown()).default({}).catch({}),
});

/**
 * A subject as consumed by the engine. See {@link SubjectSchema}.
 *
 * @category Subjects
 */
export type Subject = z.infer<typeof SubjectSchema>;

/**
 * A subject as accepted from callers, before normalization.
 *
 * @example
 * ```typescript
 * const math: SubjectInput = {
 *   subjectId: "math",
 *   cfu: 6,
 *   difficultyCoeff: 1.2,
 *   priority: 2,
 *   examDates: ["2026-02-10", "2026-02-24"],
 *   selectedExamDate: "2026-02-10",
 *   startAt: "2026-01-07",
 * };
 * ```
 *
 * @category Subjects
 */
export type SubjectInput = z.input<typeof SubjectSchema>;

export function parseSubject(input: SubjectInput): Subject {
  return SubjectSchema.parse(input);
}

// ============================================================================
// Calendar Constraints
// ============================================================================

/**
 * A calendar constraint applies to a specific `date`, to every day matching
 * `weekday`, or both. Unknown `type` values are kept and ignored by the
 * slot builder.
 */
export const CalendarConstraintSchema = z.object({
  constraintId: z.string().default("").catch(""),
  type: z.string().catch(""),
  date: z.string().optional().catch(undefined),
  weekday: z.string().optional().catch(undefined),
  blockedMinutes: z.number().int().min(0).default(0).catch(0),
  capOverrideMinutes: z.number().int().min(0).default(0).catch(0),
});

/**
 * @category Calendar
 */
export type CalendarConstraint = z.infer<typeof CalendarConstraintSchema>;

/**
 * @category Calendar
 */
export type CalendarConstraintInput = z.input<typeof CalendarConstraintSchema>;

export function parseCalendarConstraint(input: CalendarConstraintInput): CalendarConstraint {
  return CalendarConstraintSchema.parse(input);
}

// ============================================================================
// Manual Sessions
// ============================================================================

export type ManualSessionStatus = "planned" | "done" | "partial" | "skipped";

export const ManualSessionSchema = z.object({
  sessionId: z.string().min(1).optional().catch(undefined),
  subjectId: z.string().catch(""),
  date: z.string().catch(""),
  plannedMinutes: z.number().int().default(0).catch(0),
  actualMinutesDone: z.number().int().default(0).catch(0),
  status: z.enum(["planned", "done", "partial", "skipped"]).default("planned").catch("planned"),
  lockedByUser: z.boolean().default(false).catch(false),
  pinned: z.boolean().default(false).catch(false),
});

/**
 * A study session recorded or pinned by the user.
 *
 * @category Replan
 */
export type ManualSession = z.infer<typeof ManualSessionSchema>;

/**
 * @category Replan
 */
export type ManualSessionInput = z.input<typeof ManualSessionSchema>;

export function parseManualSession(input: ManualSessionInput): ManualSession {
  return ManualSessionSchema.parse(input);
}

// ============================================================================
// Slots and Allocations
// ============================================================================

/**
 * Per-day capacity envelope.
 *
 * Invariant: `0 <= capMinutes <= maxMinutes`, `maxMinutes = capMinutes + toleranceMinutes`,
 * and both are bounded by the awake minutes of the day.
 *
 * @category Slots
 */
export interface DailySlot {
  slotId: string;
  date: string;
  capMinutes: number;
  toleranceMinutes: number;
  maxMinutes: number;
  sleepHours: number;
  blockedMinutes: number;
  /** IDs of the `blocked` constraints deducted from this day. */
  blockedConstraints: string[];
  /** Most restrictive `cap_override` applied, or null when none. */
  capOverrideMinutes: number | null;
  /**
   * Minutes reserved by locked manual sessions, set during replanning.
   * `capMinutes` and `maxMinutes` are what is left after the reservation,
   * so the day's full ceiling is `maxMinutes + lockedMinutes`.
   */
  lockedMinutes?: number;
}

/**
 * Which budget an allocation record draws from.
 *
 * @category Allocations
 */
export type AllocationBucket = "base" | "buffer" | "slack" | "manual_locked";

/**
 * Sentinel subject for explicitly logged unused capacity.
 */
export const SLACK_SUBJECT_ID = "__slack__";

/**
 * Minutes of one subject placed into one slot.
 *
 * @category Allocations
 */
export interface AllocationRecord {
  slotId: string;
  date: string;
  subjectId: string;
  minutes: number;
  bucket: AllocationBucket;
  manualSessionId?: string;
  lockedByUser?: boolean;
  pinned?: boolean;
}

/**
 * Required study hours for one subject.
 *
 * @category Workload
 */
export interface SubjectWorkload {
  hoursTheoretical: number;
  attendanceDiscountHours: number;
  prepGapCoeff: number;
  hoursBase: number;
  hoursBuffer: number;
  hoursTarget: number;
}
