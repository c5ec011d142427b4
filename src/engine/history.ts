import { addDays, compareStrings } from "../datetime.utils.js";
import { SLACK_SUBJECT_ID } from "../types.js";
import type { MinuteHistory } from "./scoring.js";

/**
 * Minutes studied during one allocation run, per day and subject.
 *
 * The allocator owns one instance per run and mutates it only through
 * {@link StudyHistory.record}. Everything the continuity penalty, the
 * streak limits and the same-day block limits read is derived from it.
 *
 * @category Allocation
 */
export class StudyHistory implements MinuteHistory {
  #minutesByDay = new Map<string, Map<string, number>>();
  #totalByDay = new Map<string, number>();
  #lastSubjectByDay = new Map<string, string>();
  #consecutiveBlocksByDay = new Map<string, number>();

  /**
   * Registers `minutes` of `subjectId` on `day`. Slack and non-positive
   * amounts are ignored.
   *
   * Consecutive records of the same subject on the same day extend that
   * day's block run; any other subject restarts it at 1.
   */
  record(day: string, subjectId: string, minutes: number): void {
    if (subjectId === SLACK_SUBJECT_ID || minutes <= 0) return;

    let dayMinutes = this.#minutesByDay.get(day);
    if (!dayMinutes) {
      dayMinutes = new Map();
      this.#minutesByDay.set(day, dayMinutes);
    }
    dayMinutes.set(subjectId, (dayMinutes.get(subjectId) ?? 0) + minutes);
    this.#totalByDay.set(day, (this.#totalByDay.get(day) ?? 0) + minutes);

    if (this.#lastSubjectByDay.get(day) === subjectId) {
      this.#consecutiveBlocksByDay.set(day, (this.#consecutiveBlocksByDay.get(day) ?? 0) + 1);
    } else {
      this.#lastSubjectByDay.set(day, subjectId);
      this.#consecutiveBlocksByDay.set(day, 1);
    }
  }

  minutesOn(day: string, subjectId: string): number {
    return this.#minutesByDay.get(day)?.get(subjectId) ?? 0;
  }

  totalMinutesOn(day: string): number {
    return this.#totalByDay.get(day) ?? 0;
  }

  /** Subjects with minutes on `day`, sorted. */
  subjectsOn(day: string): string[] {
    const dayMinutes = this.#minutesByDay.get(day);
    return dayMinutes ? [...dayMinutes.keys()].toSorted(compareStrings) : [];
  }

  lastSubjectOn(day: string): string | undefined {
    return this.#lastSubjectByDay.get(day);
  }

  /** Length of the current same-subject block run on `day`. */
  consecutiveBlocksOn(day: string): number {
    return this.#consecutiveBlocksByDay.get(day) ?? 0;
  }

  /**
   * Consecutive days immediately before `day` on which `subjectId` was
   * studied.
   */
  streakDaysBefore(subjectId: string, day: string): number {
    let streak = 0;
    let cursor = addDays(day, -1);
    while (this.minutesOn(cursor, subjectId) > 0) {
      streak++;
      cursor = addDays(cursor, -1);
    }
    return streak;
  }
}
