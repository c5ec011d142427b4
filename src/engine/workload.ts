import type { Subject, SubjectWorkload } from "../types.js";

/**
 * Attendance discount per credit when the subject does not set its own.
 */
export const DEFAULT_ATTENDANCE_HOURS_PER_CFU = 6;

/** Study hours per credit unit. */
export const HOURS_PER_CFU = 25;

/**
 * Required study hours for a subject.
 *
 * - `hoursTheoretical = cfu · 25`
 * - `prepGapCoeff = 2 − completionInitial`
 * - `hoursBase = max(0, (hoursTheoretical − attendanceDiscount) · difficultyCoeff · prepGapCoeff)`
 * - `hoursBuffer = hoursBase · bufferPercent`
 *
 * The attendance discount only applies to attending subjects: the
 * measured `attendedCalendarHours` when given, otherwise
 * `cfu · attendanceHoursPerCfu`.
 *
 * @param subject - normalized subject, see {@link parseSubject}
 * @param bufferPercent - buffer share in [0, 1]
 * @param attendedCalendarHours - hours actually attended, from the calendar
 *
 * @example
 * ```ts
 * const workload = computeSubjectWorkload(
 *   parseSubject({ subjectId: "math", cfu: 6, difficultyCoeff: 1.2, completionInitial: 0.25 }),
 *   0.1,
 * );
 * workload.hoursBase; // 315
 * ```
 */
export function computeSubjectWorkload(
  subject: Pick<
    Subject,
    "cfu" | "difficultyCoeff" | "completionInitial" | "attending" | "attendanceHoursPerCfu"
  >,
  bufferPercent: number,
  attendedCalendarHours?: number,
): SubjectWorkload {
  const cfu = subject.cfu;
  const completion = Math.min(1, Math.max(0, subject.completionInitial));

  let attendanceDiscountHours = 0;
  if (subject.attending) {
    attendanceDiscountHours =
      attendedCalendarHours !== undefined
        ? Math.max(0, attendedCalendarHours)
        : Math.max(0, cfu * (subject.attendanceHoursPerCfu ?? DEFAULT_ATTENDANCE_HOURS_PER_CFU));
  }

  const hoursTheoretical = cfu * HOURS_PER_CFU;
  const prepGapCoeff = 1 + (1 - completion);
  const hoursBase = Math.max(
    0,
    (hoursTheoretical - attendanceDiscountHours) * subject.difficultyCoeff * prepGapCoeff,
  );
  const hoursBuffer = Math.max(0, hoursBase * bufferPercent);

  return {
    hoursTheoretical,
    attendanceDiscountHours,
    prepGapCoeff,
    hoursBase,
    hoursBuffer,
    hoursTarget: hoursBase + hoursBuffer,
  };
}

/**
 * Hours to whole minutes, rounded to nearest and floored at 0.
 */
export function hoursToMinutes(hours: number): number {
  return Math.max(0, Math.round(hours * 60));
}
