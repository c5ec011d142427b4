import { describe, expect, it } from "vitest";
import { StudyHistory } from "../../src/engine/history.js";
import { SLACK_SUBJECT_ID } from "../../src/types.js";

describe("StudyHistory", () => {
  it("should accumulate minutes per day and subject", () => {
    const history = new StudyHistory();
    history.record("2026-01-01", "math", 30);
    history.record("2026-01-01", "math", 30);
    history.record("2026-01-01", "chem", 45);

    expect(history.minutesOn("2026-01-01", "math")).toBe(60);
    expect(history.totalMinutesOn("2026-01-01")).toBe(105);
    expect(history.subjectsOn("2026-01-01")).toEqual(["chem", "math"]);
    expect(history.subjectsOn("2026-01-02")).toEqual([]);
  });

  it("should ignore slack and empty records", () => {
    const history = new StudyHistory();
    history.record("2026-01-01", SLACK_SUBJECT_ID, 90);
    history.record("2026-01-01", "math", 0);
    expect(history.totalMinutesOn("2026-01-01")).toBe(0);
    expect(history.lastSubjectOn("2026-01-01")).toBeUndefined();
  });

  it("should track the same-subject block run of a day", () => {
    const history = new StudyHistory();
    history.record("2026-01-01", "math", 30);
    history.record("2026-01-01", "math", 30);
    expect(history.consecutiveBlocksOn("2026-01-01")).toBe(2);

    history.record("2026-01-01", "chem", 30);
    expect(history.lastSubjectOn("2026-01-01")).toBe("chem");
    expect(history.consecutiveBlocksOn("2026-01-01")).toBe(1);
  });

  it("should count the day streak before a day", () => {
    const history = new StudyHistory();
    history.record("2025-12-30", "math", 30);
    history.record("2025-12-31", "math", 30);
    history.record("2026-01-01", "math", 30);
    history.record("2026-01-02", "chem", 30);

    expect(history.streakDaysBefore("math", "2026-01-02")).toBe(3);
    expect(history.streakDaysBefore("math", "2026-01-03")).toBe(0);
    expect(history.streakDaysBefore("chem", "2026-01-03")).toBe(1);
  });
});
