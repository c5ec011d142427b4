/**
 * Layered resolution of the per-subject allocation settings.
 *
 * Each concern (distribution, concentration, strategy) has one pure
 * function that takes the subject layer and the global layer and returns
 * the fully resolved value. Hardcoded defaults form the last layer.
 */

import { daysBetween } from "../datetime.utils.js";
import { logger } from "../logger.js";
import {
  CONCENTRATION_MODES,
  DISTRIBUTION_MODES,
  STRATEGY_MODES,
  type ConcentrationMode,
  type DistributionMode,
  type StrategyMode,
} from "../types.js";

// ============================================================================
// Distribution
// ============================================================================

/**
 * One layer of distribution settings, as found in global config or in a
 * subject's overrides. Any field may be missing or invalid.
 */
export interface DistributionSettings {
  humanDistributionMode?: unknown;
  maxSameSubjectStreakDays?: unknown;
  maxSameSubjectConsecutiveBlocks?: unknown;
  targetDailySubjectVariety?: unknown;
}

/**
 * @category Allocation
 */
export interface ResolvedDistribution {
  mode: DistributionMode;
  /** Scales the same-day variety soft penalty. */
  penaltyMultiplier: number;
  maxStreakDays: number;
  maxSameDayBlocks: number;
  targetDailySubjectVariety: number;
}

const UNLIMITED = 1_000_000;

const MODE_LIMITS = {
  strict: { penaltyMultiplier: 2, maxStreakDays: 2, maxSameDayBlocks: 2, targetVariety: 3 },
  balanced: { penaltyMultiplier: 1, maxStreakDays: 3, maxSameDayBlocks: 3, targetVariety: 2 },
  off: {
    penaltyMultiplier: 0,
    maxStreakDays: UNLIMITED,
    maxSameDayBlocks: UNLIMITED,
    targetVariety: 1,
  },
} as const satisfies Record<
  DistributionMode,
  {
    penaltyMultiplier: number;
    maxStreakDays: number;
    maxSameDayBlocks: number;
    targetVariety: number;
  }
>;

function normalizeMode<T extends string>(raw: unknown, allowed: readonly T[]): T | undefined {
  if (typeof raw !== "string") return undefined;
  const lowered = raw.trim().toLowerCase();
  return allowed.find((mode) => mode === lowered);
}

function positiveInt(raw: unknown): number | undefined {
  if (typeof raw !== "number" || !Number.isFinite(raw)) return undefined;
  return Math.max(1, Math.floor(raw));
}

/**
 * Resolves distribution settings: subject layer, then global layer, then
 * the defaults of the resolved mode. Invalid values fall through to the
 * next layer; an invalid mode everywhere resolves to `off`.
 *
 * @example
 * ```ts
 * resolveDistribution({ maxSameSubjectStreakDays: 1 }, { humanDistributionMode: "strict" });
 * // { mode: "strict", penaltyMultiplier: 2, maxStreakDays: 1, maxSameDayBlocks: 2, targetDailySubjectVariety: 3 }
 * ```
 */
export function resolveDistribution(
  subjectLayer: DistributionSettings | undefined,
  globalLayer: DistributionSettings | undefined,
): ResolvedDistribution {
  const mode =
    normalizeMode(subjectLayer?.humanDistributionMode, DISTRIBUTION_MODES) ??
    normalizeMode(globalLayer?.humanDistributionMode, DISTRIBUTION_MODES) ??
    "off";
  const limits = MODE_LIMITS[mode];

  return {
    mode,
    penaltyMultiplier: limits.penaltyMultiplier,
    maxStreakDays:
      positiveInt(subjectLayer?.maxSameSubjectStreakDays) ??
      positiveInt(globalLayer?.maxSameSubjectStreakDays) ??
      limits.maxStreakDays,
    maxSameDayBlocks:
      positiveInt(subjectLayer?.maxSameSubjectConsecutiveBlocks) ??
      positiveInt(globalLayer?.maxSameSubjectConsecutiveBlocks) ??
      limits.maxSameDayBlocks,
    targetDailySubjectVariety:
      positiveInt(subjectLayer?.targetDailySubjectVariety) ??
      positiveInt(globalLayer?.targetDailySubjectVariety) ??
      limits.targetVariety,
  };
}

// ============================================================================
// Concentration
// ============================================================================

/**
 * Where a subject's concentration mode came from.
 *
 * - `explicit`: the per-run explicit map
 * - `subject`: the subject's overrides
 * - `global_fallback`: no subject-level value, global default used
 * - `invalid_fallback`: a subject-level value that is not a known mode,
 *   global default used
 */
export type ConcentrationSource = "explicit" | "subject" | "global_fallback" | "invalid_fallback";

export interface ResolvedConcentration {
  mode: ConcentrationMode;
  source: ConcentrationSource;
}

/**
 * Resolves a subject's concentration mode: explicit map entry, then the
 * subject's override, then the global default. A subject-level value that
 * does not match a known mode falls back to the global default, not to
 * `diffuse`.
 */
export function resolveConcentration(
  subjectId: string,
  explicitMode: unknown,
  subjectMode: unknown,
  globalMode: unknown,
): ResolvedConcentration {
  const global = normalizeMode(globalMode, CONCENTRATION_MODES) ?? "diffuse";
  const candidate = explicitMode ?? subjectMode;
  const source = explicitMode !== undefined ? "explicit" : "subject";

  if (candidate === undefined) {
    logger.debug(`concentration mode for "${subjectId}" not set; using global "${global}"`);
    return { mode: global, source: "global_fallback" };
  }

  const mode = normalizeMode(candidate, CONCENTRATION_MODES);
  if (mode === undefined) {
    logger.debug(
      `concentration mode ${JSON.stringify(candidate)} for "${subjectId}" is not valid; using global "${global}"`,
    );
    return { mode: global, source: "invalid_fallback" };
  }
  return { mode, source };
}

const CONCENTRATED_MULTIPLIER = 1.03;
const CONCENTRATED_BIAS = 0.01;

export function concentrationMultiplier(mode: ConcentrationMode): number {
  return mode === "concentrated" ? CONCENTRATED_MULTIPLIER : 1;
}

export function concentrationBias(mode: ConcentrationMode): number {
  return mode === "concentrated" ? CONCENTRATED_BIAS : 0;
}

// ============================================================================
// Strategy
// ============================================================================

/**
 * Resolves a subject's strategy mode: the subject's override when present,
 * otherwise the global default. Comparison is case-insensitive and any
 * unknown value resolves to `hybrid`.
 */
export function resolveStrategyMode(subjectMode: unknown, globalMode: unknown): StrategyMode {
  const raw = subjectMode ?? globalMode;
  return normalizeMode(raw, STRATEGY_MODES) ?? "hybrid";
}

/**
 * Multiplicative bias from the strategy mode and the distance to the exam.
 *
 * With `d` days to the exam (clamped at 0):
 * - forward: `1 + 0.40 · d/(d+2)`, larger far from the exam
 * - backward: `1 + 0.45 · 1/(1+d)`, larger close to the exam
 * - hybrid: `1 + 0.15 · 1/(1+d)`
 *
 * `damped` keeps only 25% of the hybrid deviation from 1, as used during
 * forward allocation.
 */
export function strategyWeight(
  mode: StrategyMode,
  day: string,
  examDay: string,
  options: { damped?: boolean } = {},
): number {
  const distance = Math.max(0, daysBetween(day, examDay));
  const nearRatio = 1 / (1 + distance);
  const farRatio = distance / (distance + 2);

  switch (mode) {
    case "forward":
      return 1 + 0.4 * farRatio;
    case "backward":
      return 1 + 0.45 * nearRatio;
    case "hybrid": {
      const weight = 1 + 0.15 * nearRatio;
      return options.damped ? 1 + (weight - 1) * 0.25 : weight;
    }
  }
}

const STRATEGY_RULES = {
  forward: "RULE_STRATEGY_MODE_FORWARD",
  backward: "RULE_STRATEGY_MODE_BACKWARD",
  hybrid: "RULE_STRATEGY_MODE_HYBRID",
} as const satisfies Record<StrategyMode, string>;

export function strategyRule(mode: StrategyMode): string {
  return STRATEGY_RULES[mode];
}
