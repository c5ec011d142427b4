import { minDay } from "../datetime.utils.js";
import type { Subject } from "../types.js";

/**
 * Inclusive range of days on which a subject may be studied. Either bound
 * may be open.
 *
 * @category Allocation
 */
export interface StudyWindow {
  startAt?: string;
  /** `min(endBy, examDay)`. */
  endBy?: string;
  /** The exam the subject is studied for: the selected one, else the earliest. */
  examDay?: string;
}

export function examDayOf(subject: Pick<Subject, "selectedExamDate" | "examDates">): string | undefined {
  return subject.selectedExamDate ?? subject.examDates[0];
}

export function studyWindowOf(
  subject: Pick<Subject, "startAt" | "endBy" | "selectedExamDate" | "examDates">,
): StudyWindow {
  const examDay = examDayOf(subject);
  return { startAt: subject.startAt, endBy: minDay(subject.endBy, examDay), examDay };
}

export function isWithinWindow(window: StudyWindow, day: string): boolean {
  if (window.startAt !== undefined && day < window.startAt) return false;
  if (window.endBy !== undefined && day > window.endBy) return false;
  return true;
}
