import * as z from "zod";
import { isDayString } from "../datetime.utils.js";
import type { AllocationRecord, DailySlot, ManualSession } from "../types.js";

// ============================================================================
// Replan Window
// ============================================================================

/**
 * @category Replan
 */
export interface ReplanWindow {
  /** First replannable day, or null for a full plan. */
  fromDate: string | null;
}

const ReplanRequestSchema = z
  .object({
    replanContext: z
      .object({ fromDate: z.unknown() })
      .nullish()
      .catch(null),
  })
  .catch({ replanContext: null });

/**
 * Reads `replanContext.fromDate` from a plan request. Anything missing or
 * unparseable yields `{ fromDate: null }`.
 */
export function readReplanWindow(request: unknown): ReplanWindow {
  const fromDate = ReplanRequestSchema.parse(request ?? {}).replanContext?.fromDate;
  return { fromDate: isDayString(fromDate) ? fromDate : null };
}

/**
 * Partitions a previous plan at `fromDate`: records strictly before it are
 * preserved, the rest are replannable. Without a cutoff, and for records
 * whose date does not parse, everything is replannable.
 */
export function splitPreviousPlan<T extends Pick<AllocationRecord, "date">>(
  previous: readonly T[],
  fromDate: string | null,
): { preserved: T[]; replannable: T[] } {
  if (fromDate === null) return { preserved: [], replannable: [...previous] };

  const preserved: T[] = [];
  const replannable: T[] = [];
  for (const record of previous) {
    if (isDayString(record.date) && record.date < fromDate) {
      preserved.push(record);
    } else {
      replannable.push(record);
    }
  }
  return { preserved, replannable };
}

// ============================================================================
// Manual Sessions
// ============================================================================

/**
 * Per-subject totals over the manual sessions.
 *
 * @category Replan
 */
export interface ManualProgress {
  /** Minutes that count as studied. */
  effectiveDoneMinutes: number;
  plannedMinutes: number;
  skippedMinutes: number;
  skippedSessions: number;
}

/**
 * Folds manual sessions into per-subject progress.
 *
 * - `done` counts `max(planned, actual)`;
 * - `partial` counts `min(planned, max(0, actual))`;
 * - `planned` and `skipped` count nothing, and `skipped` also adds to the
 *   skipped totals.
 *
 * Sessions without a subject are ignored.
 */
export function computeManualProgress(
  sessions: readonly ManualSession[],
): Record<string, ManualProgress> {
  const progress: Record<string, ManualProgress> = {};

  for (const session of sessions) {
    if (session.subjectId === "") continue;
    const planned = session.plannedMinutes;
    const actual = session.actualMinutesDone;

    let done = 0;
    if (session.status === "done") done = Math.max(planned, actual);
    else if (session.status === "partial") done = Math.min(planned, Math.max(0, actual));

    const entry = (progress[session.subjectId] ??= {
      effectiveDoneMinutes: 0,
      plannedMinutes: 0,
      skippedMinutes: 0,
      skippedSessions: 0,
    });
    entry.effectiveDoneMinutes += done;
    entry.plannedMinutes += Math.max(0, planned);
    if (session.status === "skipped") {
      entry.skippedMinutes += Math.max(0, planned);
      entry.skippedSessions++;
    }
  }

  return progress;
}

/**
 * Turns locked or pinned, non-skipped manual sessions on or after
 * `fromDate` into `manual_locked` records in slot `manual-<date>`.
 * Sessions with an unparseable date are skipped.
 */
export function extractLockedManualAllocations(
  sessions: readonly ManualSession[],
  fromDate: string | null,
): AllocationRecord[] {
  const locked: AllocationRecord[] = [];

  sessions.forEach((session, index) => {
    if (session.status === "skipped") return;
    if (!session.lockedByUser && !session.pinned) return;
    if (!isDayString(session.date)) return;
    if (fromDate !== null && session.date < fromDate) return;

    locked.push({
      slotId: `manual-${session.date}`,
      date: session.date,
      subjectId: session.subjectId,
      minutes: Math.max(0, session.plannedMinutes),
      bucket: "manual_locked",
      manualSessionId: session.sessionId ?? `manual-${index}`,
      lockedByUser: session.lockedByUser,
      pinned: session.pinned,
    });
  });

  return locked;
}

/**
 * Deducts locked minutes from the slots of their days. The cap is kept as
 * far as the reduced maximum allows; the rest of the maximum becomes
 * tolerance.
 */
export function applyLockedConstraintsToSlots(
  slots: readonly DailySlot[],
  locked: readonly Pick<AllocationRecord, "date" | "minutes">[],
): DailySlot[] {
  const lockedByDate = new Map<string, number>();
  for (const record of locked) {
    lockedByDate.set(record.date, (lockedByDate.get(record.date) ?? 0) + record.minutes);
  }

  return slots.map((slot) => {
    const lockedMinutes = Math.max(0, lockedByDate.get(slot.date) ?? 0);
    const maxMinutes = Math.max(0, slot.maxMinutes - lockedMinutes);
    const capMinutes = Math.min(maxMinutes, slot.capMinutes);
    return {
      ...slot,
      capMinutes,
      toleranceMinutes: Math.max(0, maxMinutes - capMinutes),
      maxMinutes,
      lockedMinutes,
    };
  });
}

// ============================================================================
// Stability
// ============================================================================

/**
 * @category Replan
 */
export interface ReallocationMetrics {
  /** Share of previous records with no identical counterpart in the new plan. */
  reallocatedRatio: number;
  stabilityScore: number;
}

/**
 * Compares two horizons as multisets of `(date, subjectId, minutes)`.
 *
 * @example
 * ```ts
 * computeReallocationMetrics(
 *   [{ date: "2026-01-01", subjectId: "math", minutes: 60 }, { date: "2026-01-02", subjectId: "math", minutes: 60 }],
 *   [{ date: "2026-01-01", subjectId: "math", minutes: 60 }],
 * ); // { reallocatedRatio: 0.5, stabilityScore: 0.5 }
 * ```
 */
export function computeReallocationMetrics(
  previousHorizon: readonly Pick<AllocationRecord, "date" | "subjectId" | "minutes">[],
  newHorizon: readonly Pick<AllocationRecord, "date" | "subjectId" | "minutes">[],
): ReallocationMetrics {
  if (previousHorizon.length === 0) return { reallocatedRatio: 0, stabilityScore: 1 };

  const keyOf = (record: Pick<AllocationRecord, "date" | "subjectId" | "minutes">) =>
    JSON.stringify([record.date, record.subjectId, record.minutes]);
  const available = new Map<string, number>();
  for (const record of newHorizon) {
    const key = keyOf(record);
    available.set(key, (available.get(key) ?? 0) + 1);
  }

  let unchanged = 0;
  for (const record of previousHorizon) {
    const key = keyOf(record);
    const count = available.get(key) ?? 0;
    if (count > 0) {
      unchanged++;
      available.set(key, count - 1);
    }
  }

  const reallocatedRatio = Math.min(1, Math.max(0, 1 - unchanged / previousHorizon.length));
  return { reallocatedRatio, stabilityScore: Math.min(1, Math.max(0, 1 - reallocatedRatio)) };
}

// ============================================================================
// Warnings
// ============================================================================

/**
 * @category Replan
 */
export interface PlanWarning {
  code: string;
  severity: "critical" | "warning" | "info";
  message: string;
}

/**
 * Critical warning when every manual session was skipped and the replan
 * window has no capacity left to absorb them.
 */
export function buildCriticalWarnings(args: {
  manualSessions: readonly ManualSession[];
  slotsInWindow: readonly Pick<DailySlot, "maxMinutes">[];
}): PlanWarning[] {
  const { manualSessions, slotsInWindow } = args;
  if (manualSessions.length === 0) return [];

  const onlySkipped = manualSessions.every((session) => session.status === "skipped");
  const hasNewCapacity = slotsInWindow.some((slot) => slot.maxMinutes > 0);
  if (!onlySkipped || hasNewCapacity) return [];

  return [
    {
      code: "CRITICAL_ONLY_SKIPPED_AND_NO_NEW_SLOTS",
      severity: "critical",
      message: "All manual sessions were skipped and no new slot is available in the replan window.",
    },
  ];
}
