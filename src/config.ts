/**
 * Effective configuration: global tunables plus filtered per-subject
 * overrides.
 *
 * Parsing never throws. Invalid or missing values fall back to their
 * defaults and the problems are returned as {@link ConfigIssue} records.
 *
 * @packageDocumentation
 */

import * as z from "zod";
import { isDayString, normalizeWeekday, toWeekdayUTC } from "./datetime.utils.js";
import { DEFAULT_CONTINUITY_CONFIG, DEFAULT_SCORE_WEIGHTS } from "./engine/scoring.js";
import { logger } from "./logger.js";
import { DayStringSchema, type Subject } from "./types.js";

const clampUnit = (value: number) => Math.min(1, Math.max(0, value));

// ============================================================================
// Global Config
// ============================================================================

const C = DEFAULT_CONTINUITY_CONFIG;
const W = DEFAULT_SCORE_WEIGHTS;

const ContinuityConfigSchema = z.object({
  enabled: z.boolean().default(C.enabled).catch(C.enabled),
  lookbackDays: z.number().int().min(0).default(C.lookbackDays).catch(C.lookbackDays),
  rollingWindowDays: z
    .number()
    .int()
    .min(0)
    .default(C.rollingWindowDays)
    .catch(C.rollingWindowDays),
  streakThresholdDays: z
    .number()
    .min(0)
    .default(C.streakThresholdDays)
    .catch(C.streakThresholdDays),
  rollingShareThreshold: z
    .number()
    .min(0)
    .max(1)
    .default(C.rollingShareThreshold)
    .catch(C.rollingShareThreshold),
  streakPenaltyFactor: z
    .number()
    .min(0)
    .default(C.streakPenaltyFactor)
    .catch(C.streakPenaltyFactor),
  rollingPenaltyFactor: z
    .number()
    .min(0)
    .default(C.rollingPenaltyFactor)
    .catch(C.rollingPenaltyFactor),
  maxPenalty: z.number().min(0).default(C.maxPenalty).catch(C.maxPenalty),
});

const ScoreWeightsSchema = z.object({
  urgency: z.number().default(W.urgency).catch(W.urgency),
  priority: z.number().default(W.priority).catch(W.priority),
  gap: z.number().default(W.gap).catch(W.gap),
  difficulty: z.number().default(W.difficulty).catch(W.difficulty),
  window: z.number().default(W.window).catch(W.window),
  mode: z.number().default(W.mode).catch(W.mode),
  concentration: z.number().default(W.concentration).catch(W.concentration),
  streak: z.number().default(W.streak).catch(W.streak),
});

const SleepHoursSchema = z.number().min(0).max(24);

type SleepOverrideKey = (key: string) => string | undefined;

const dayKey: SleepOverrideKey = (key) => (isDayString(key) ? key : undefined);

function sleepHoursOf(value: unknown): number | undefined {
  const parsed = SleepHoursSchema.safeParse(value);
  return parsed.success ? parsed.data : undefined;
}

/** Keeps the entries with a usable key and hours in [0, 24]; drops the rest one by one. */
function sleepOverridesSchema(normalizeKey: SleepOverrideKey) {
  return z
    .record(z.string(), z.unknown())
    .transform((raw) => {
      const kept: Record<string, number> = {};
      for (const key of Object.keys(raw).toSorted()) {
        const normalized = normalizeKey(key);
        const hours = sleepHoursOf(raw[key]);
        if (normalized !== undefined && hours !== undefined) kept[normalized] = hours;
      }
      return kept;
    })
    .default({})
    .catch({});
}

const SLEEP_OVERRIDE_KEYS = {
  sleepOverridesByWeekday: normalizeWeekday,
  sleepOverridesByDate: dayKey,
} as const satisfies Record<string, SleepOverrideKey>;

/**
 * Global tunables. Every field falls back to its default when missing or
 * invalid. Mode fields stay raw strings here; they are normalized where
 * they are resolved so that invalid values can fall back per scope.
 */
export const GlobalConfigSchema = z.object({
  dailyCapMinutes: z.number().int().min(0).default(180).catch(180),
  dailyCapToleranceMinutes: z.number().int().min(0).default(30).catch(30),
  subjectBufferPercent: z.number().transform(clampUnit).default(0.1).catch(0.1),
  maxSubjectsPerDay: z.number().int().min(1).default(3).catch(3),
  sleepHoursPerDay: z
    .number()
    .transform((v) => Math.min(24, Math.max(0, v)))
    .default(8)
    .catch(8),
  sleepOverridesByWeekday: sleepOverridesSchema(SLEEP_OVERRIDE_KEYS.sleepOverridesByWeekday),
  sleepOverridesByDate: sleepOverridesSchema(SLEEP_OVERRIDE_KEYS.sleepOverridesByDate),
  sessionDurationMinutes: z.number().int().min(1).default(30).catch(30),
  defaultStrategyMode: z.string().default("hybrid").catch("hybrid"),
  concentrationMode: z.string().default("diffuse").catch("diffuse"),
  humanDistributionMode: z.string().default("off").catch("off"),
  maxSameSubjectStreakDays: z.number().int().min(1).optional().catch(undefined),
  maxSameSubjectConsecutiveBlocks: z.number().int().min(1).optional().catch(undefined),
  targetDailySubjectVariety: z.number().int().min(1).optional().catch(undefined),
  continuity: ContinuityConfigSchema.default({ ...DEFAULT_CONTINUITY_CONFIG }).catch({
    ...DEFAULT_CONTINUITY_CONFIG,
  }),
  scoreWeights: ScoreWeightsSchema.default({ ...DEFAULT_SCORE_WEIGHTS }).catch({
    ...DEFAULT_SCORE_WEIGHTS,
  }),
  rebalanceMaxSwaps: z.number().int().min(0).default(100).catch(100),
  rebalanceMaxIterations: z.number().int().min(0).optional().catch(undefined),
  rebalanceNearDaysWindow: z.number().int().min(0).default(2).catch(2),
  feasibilityRegressionTolerance: z.number().min(0).default(0).catch(0),
  rebalanceAllowFallbackSwap: z.boolean().default(false).catch(false),
  // Carried for downstream consumers; the engine does not read these.
  stabilityVsRecovery: z.number().transform(clampUnit).default(0.4).catch(0.4),
  criticalButPossibleThreshold: z.number().transform(clampUnit).default(0.8).catch(0.8),
  pomodoroEnabled: z.boolean().default(true).catch(true),
  pomodoroCountBreaksInCapacity: z.boolean().default(true).catch(true),
});

/**
 * @category Configuration
 */
export type GlobalConfig = z.infer<typeof GlobalConfigSchema>;

/**
 * @category Configuration
 */
export type GlobalConfigInput = z.input<typeof GlobalConfigSchema>;

// ============================================================================
// Subject Overrides
// ============================================================================

/**
 * Per-subject overrides. Only these keys are accepted; a value that does
 * not parse is dropped so the global layer applies instead.
 *
 * The pomodoro keys, `stabilityVsRecovery`, `criticalButPossibleThreshold`
 * and `maxSubjectsPerDay` are validated and passed through in
 * {@link EffectiveConfig.bySubject} without affecting allocation.
 */
export const SubjectOverridesSchema = z.object({
  strategyMode: z.string().optional().catch(undefined),
  concentrationMode: z.string().optional().catch(undefined),
  humanDistributionMode: z.string().optional().catch(undefined),
  maxSameSubjectStreakDays: z.number().int().min(1).optional().catch(undefined),
  maxSameSubjectConsecutiveBlocks: z.number().int().min(1).optional().catch(undefined),
  targetDailySubjectVariety: z.number().int().min(1).optional().catch(undefined),
  subjectBufferPercent: z.number().transform(clampUnit).optional().catch(undefined),
  startAt: DayStringSchema.optional().catch(undefined),
  endBy: DayStringSchema.optional().catch(undefined),
  stabilityVsRecovery: z.number().transform(clampUnit).optional().catch(undefined),
  criticalButPossibleThreshold: z.number().transform(clampUnit).optional().catch(undefined),
  maxSubjectsPerDay: z.number().int().min(1).optional().catch(undefined),
  pomodoroEnabled: z.boolean().optional().catch(undefined),
  pomodoroWorkMinutes: z.number().int().min(1).optional().catch(undefined),
  pomodoroShortBreakMinutes: z.number().int().min(0).optional().catch(undefined),
  pomodoroLongBreakMinutes: z.number().int().min(0).optional().catch(undefined),
  pomodoroLongBreakEvery: z.number().int().min(1).optional().catch(undefined),
  pomodoroCountBreaksInCapacity: z.boolean().optional().catch(undefined),
});

/**
 * @category Configuration
 */
export type SubjectOverrides = z.infer<typeof SubjectOverridesSchema>;

export const ALLOWED_OVERRIDE_KEYS = Object.keys(SubjectOverridesSchema.shape).toSorted();

/**
 * Resolved configuration consumed by the planner.
 *
 * @category Configuration
 */
export interface EffectiveConfig {
  global: GlobalConfig;
  bySubject: Record<string, SubjectOverrides>;
}

/**
 * A configuration problem found while resolving. Never thrown.
 *
 * @category Configuration
 */
export interface ConfigIssue {
  severity: "error" | "warning" | "info";
  code:
    | "INVALID_OVERRIDE_KEY"
    | "INVALID_OVERRIDE_VALUE"
    | "INVALID_CONFIG_VALUE"
    | "INFO_CLAMP_APPLIED";
  /** JSON-path-like location, e.g. `subjects[0].overrides.foo`. */
  path: string;
  message: string;
}

// ============================================================================
// Resolution
// ============================================================================

function clampIssues(raw: unknown, parsed: GlobalConfig): ConfigIssue[] {
  if (typeof raw !== "object" || raw === null) return [];
  const issues: ConfigIssue[] = [];
  const clampedKeys = [
    "subjectBufferPercent",
    "sleepHoursPerDay",
    "stabilityVsRecovery",
    "criticalButPossibleThreshold",
  ] as const;
  for (const key of clampedKeys) {
    const value: unknown = Reflect.get(raw, key);
    if (typeof value === "number" && Number.isFinite(value) && value !== parsed[key]) {
      issues.push({
        severity: "info",
        code: "INFO_CLAMP_APPLIED",
        path: `globalConfig.${key}`,
        message: `${key} was clamped from ${value} to ${parsed[key]}`,
      });
    }
  }
  return issues;
}

function sleepOverrideIssues(raw: unknown): ConfigIssue[] {
  if (typeof raw !== "object" || raw === null) return [];
  const issues: ConfigIssue[] = [];
  for (const [field, normalizeKey] of Object.entries(SLEEP_OVERRIDE_KEYS)) {
    const map: unknown = Reflect.get(raw, field);
    if (map === undefined) continue;
    if (typeof map !== "object" || map === null || Array.isArray(map)) {
      issues.push({
        severity: "warning",
        code: "INVALID_CONFIG_VALUE",
        path: `globalConfig.${field}`,
        message: `${field} must be an object; no overrides applied`,
      });
      continue;
    }
    for (const key of Object.keys(map).toSorted()) {
      if (normalizeKey(key) !== undefined && sleepHoursOf(Reflect.get(map, key)) !== undefined) continue;
      issues.push({
        severity: "warning",
        code: "INVALID_CONFIG_VALUE",
        path: `globalConfig.${field}.${key}`,
        message: `Sleep override "${key}" was dropped; expected a valid key and hours in [0, 24]`,
      });
    }
  }
  return issues;
}

function filterOverrides(
  overrides: Record<string, unknown>,
  subjectIndex: number,
  issues: ConfigIssue[],
): SubjectOverrides {
  const accepted: Record<string, unknown> = {};
  for (const key of Object.keys(overrides).toSorted()) {
    const path = `subjects[${subjectIndex}].overrides.${key}`;
    if (!ALLOWED_OVERRIDE_KEYS.includes(key)) {
      issues.push({
        severity: "error",
        code: "INVALID_OVERRIDE_KEY",
        path,
        message: `Override key "${key}" is not allowed; use one of: ${ALLOWED_OVERRIDE_KEYS.join(", ")}`,
      });
      continue;
    }
    accepted[key] = overrides[key];
  }

  const parsed = SubjectOverridesSchema.parse(accepted);
  for (const key of Object.keys(accepted).toSorted()) {
    if (accepted[key] !== undefined && Reflect.get(parsed, key) === undefined) {
      issues.push({
        severity: "warning",
        code: "INVALID_OVERRIDE_VALUE",
        path: `subjects[${subjectIndex}].overrides.${key}`,
        message: `Override "${key}" has an invalid value; the global setting applies`,
      });
    }
  }
  return parsed;
}

/**
 * Parses the global config and every subject's overrides.
 *
 * @example
 * ```ts
 * const { config, issues } = resolveEffectiveConfig(
 *   { dailyCapMinutes: 210 },
 *   subjects.map(parseSubject),
 * );
 * config.global.dailyCapToleranceMinutes; // 30
 * ```
 */
export function resolveEffectiveConfig(
  globalInput: GlobalConfigInput | undefined,
  subjects: readonly Subject[],
): { config: EffectiveConfig; issues: ConfigIssue[] } {
  const global = GlobalConfigSchema.parse(globalInput ?? {});
  const issues = [...clampIssues(globalInput, global), ...sleepOverrideIssues(globalInput)];

  const bySubject: Record<string, SubjectOverrides> = {};
  subjects.forEach((subject, index) => {
    bySubject[subject.subjectId] = filterOverrides(subject.overrides, index, issues);
  });

  for (const issue of issues) {
    if (issue.severity === "info") {
      logger.debug(`${issue.code} at ${issue.path}: ${issue.message}`);
    } else {
      logger.warn(`${issue.code} at ${issue.path}: ${issue.message}`);
    }
  }

  return { config: { global, bySubject }, issues };
}

/**
 * Sleep hours for `day`: by-date override, then by-weekday override, then
 * `sleepHoursPerDay`.
 */
export function resolveSleepHours(
  config: Pick<
    GlobalConfig,
    "sleepHoursPerDay" | "sleepOverridesByWeekday" | "sleepOverridesByDate"
  >,
  day: string,
): number {
  const byDate = config.sleepOverridesByDate[day];
  if (byDate !== undefined) return byDate;

  const byWeekday = config.sleepOverridesByWeekday[toWeekdayUTC(day)];
  if (byWeekday !== undefined) return byWeekday;

  return config.sleepHoursPerDay;
}

/**
 * Applies the window overrides (`startAt`, `endBy`) of a subject.
 */
export function applyWindowOverrides(subject: Subject, overrides?: SubjectOverrides): Subject {
  if (!overrides) return subject;
  return {
    ...subject,
    startAt: isDayString(overrides.startAt) ? overrides.startAt : subject.startAt,
    endBy: isDayString(overrides.endBy) ? overrides.endBy : subject.endBy,
  };
}
