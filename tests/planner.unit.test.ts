import { afterEach, describe, expect, it, vi } from "vitest";
import { ZodError } from "zod";
import { runPlanner, type PlannerInput } from "../src/planner.js";

afterEach(() => {
  vi.restoreAllMocks();
  vi.unstubAllEnvs();
});

describe("runPlanner", () => {
  it("should keep history before the cutoff and honor locked sessions", () => {
    const result = runPlanner({
      globalConfig: { dailyCapMinutes: 60, dailyCapToleranceMinutes: 0 },
      subjects: [{ subjectId: "math", cfu: 1, examDates: ["2026-01-04"], startAt: "2026-01-01" }],
      horizon: { startDate: "2026-01-01", endDate: "2026-01-04" },
      previousPlan: [
        { slotId: "old-1", date: "2026-01-01", subjectId: "math", minutes: 60, bucket: "base" },
        { slotId: "old-2", date: "2026-01-03", subjectId: "math", minutes: 60, bucket: "base" },
      ],
      replanContext: { fromDate: "2026-01-02" },
      manualSessions: [
        {
          sessionId: "m1",
          subjectId: "math",
          date: "2026-01-03",
          plannedMinutes: 30,
          lockedByUser: true,
        },
      ],
      generatedAt: "2026-01-01T00:00:00Z",
    });

    const slotIds = result.plan.map((r) => r.slotId);
    expect(slotIds).toContain("old-1");
    expect(slotIds).not.toContain("old-2");
    expect(result.plan.find((r) => r.manualSessionId === "m1")?.bucket).toBe("manual_locked");

    expect(result.slotsInWindow.map((s) => [s.date, s.maxMinutes, s.lockedMinutes])).toEqual([
      ["2026-01-02", 60, 0],
      ["2026-01-03", 30, 30],
      ["2026-01-04", 60, 0],
    ]);
    // 50 h base = 3000 min, minus 30 locked, minus 150 placed
    expect(result.workloadBySubject.math?.hoursBase).toBe(50);
    expect(result.remainingBaseMinutes).toEqual({ math: 2820 });
    expect(result.dailyPlan.map((d) => [d.date, d.studyMinutes])).toEqual([
      ["2026-01-01", 60],
      ["2026-01-02", 60],
      ["2026-01-03", 60],
      ["2026-01-04", 60],
    ]);
    expect(result.reallocatedRatio).toBe(1);
    expect(result.stabilityScore).toBe(0);
    expect(result.decisionTrace[0]?.timestamp).toBe("2026-01-01T00:00:01.000Z");
  });

  it("should keep each day within its remaining capacity plus locked minutes", () => {
    const result = runPlanner({
      globalConfig: { dailyCapMinutes: 60, dailyCapToleranceMinutes: 0 },
      subjects: [{ subjectId: "math", cfu: 1, examDates: ["2026-01-02"] }],
      horizon: { startDate: "2026-01-01", endDate: "2026-01-02" },
      manualSessions: [
        { sessionId: "m1", subjectId: "math", date: "2026-01-02", plannedMinutes: 90, pinned: true },
      ],
    });

    expect(result.slotsInWindow.map((s) => [s.date, s.maxMinutes, s.lockedMinutes])).toEqual([
      ["2026-01-01", 60, 0],
      ["2026-01-02", 0, 90],
    ]);
    expect(result.dailyPlan.map((d) => [d.date, d.studyMinutes])).toEqual([
      ["2026-01-01", 60],
      ["2026-01-02", 90],
    ]);
    for (const slot of result.slotsInWindow) {
      const used = result.plan
        .filter((r) => r.date === slot.date && r.subjectId !== "__slack__")
        .reduce((sum, r) => sum + r.minutes, 0);
      expect(used).toBeLessThanOrEqual(slot.maxMinutes + (slot.lockedMinutes ?? 0));
    }
  });

  it("should derive the horizon from the subjects", () => {
    const result = runPlanner({
      subjects: [{ subjectId: "math", cfu: 1, startAt: "2026-01-05", examDates: ["2026-01-09"] }],
    });
    expect(result.slotsInWindow.map((s) => s.date)).toEqual([
      "2026-01-05",
      "2026-01-06",
      "2026-01-07",
      "2026-01-08",
      "2026-01-09",
    ]);
  });

  it("should plan nothing when no horizon can be derived", () => {
    const result = runPlanner({ subjects: [{ subjectId: "math", cfu: 1 }] });
    expect(result.plan).toEqual([]);
    expect(result.slotsInWindow).toEqual([]);
    expect(result.remainingBaseMinutes).toEqual({ math: 3000 });
    expect(result.remainingBufferMinutes).toEqual({ math: 300 });
  });

  it("should let manual progress in excess of base reduce buffer", () => {
    const result = runPlanner({
      globalConfig: { dailyCapMinutes: 60, dailyCapToleranceMinutes: 0 },
      subjects: [{ subjectId: "math", cfu: 1, examDates: ["2026-01-10"] }],
      horizon: { startDate: "2026-01-01", endDate: "2026-01-01" },
      manualSessions: [
        { subjectId: "math", date: "2025-12-20", actualMinutesDone: 3100, status: "done" },
      ],
    });
    // buffer 300 - 100 excess - 60 placed
    expect(result.remainingBaseMinutes).toEqual({ math: 0 });
    expect(result.remainingBufferMinutes).toEqual({ math: 140 });
    expect(result.plan.map((r) => [r.bucket, r.minutes])).toEqual([
      ["buffer", 30],
      ["buffer", 30],
    ]);
  });

  it("should group the plan by day and log a summary", () => {
    vi.stubEnv("STUDY_PLANNER_LOG_LEVEL", "info");
    const info = vi.spyOn(console, "info").mockImplementation(() => {});

    const result = runPlanner({
      globalConfig: { dailyCapMinutes: 60, dailyCapToleranceMinutes: 0 },
      subjects: [{ subjectId: "math", cfu: 0, examDates: ["2026-01-02"] }],
      horizon: { startDate: "2026-01-01", endDate: "2026-01-02" },
    });

    expect(result.dailyPlan).toEqual([
      {
        date: "2026-01-01",
        allocations: [
          { slotId: "slot-2026-01-01", date: "2026-01-01", subjectId: "__slack__", minutes: 60, bucket: "slack" },
        ],
        studyMinutes: 0,
        slackMinutes: 60,
      },
      {
        date: "2026-01-02",
        allocations: [
          { slotId: "slot-2026-01-02", date: "2026-01-02", subjectId: "__slack__", minutes: 60, bucket: "slack" },
        ],
        studyMinutes: 0,
        slackMinutes: 60,
      },
    ]);
    expect(info).toHaveBeenCalledTimes(1);
    expect(info.mock.calls[0]?.[0]).toBe(
      "[study-planner] plan ready: 2 records, 0 base minutes unplaced, stability 1.000",
    );
  });

  it("should raise a critical warning when skipped sessions cannot be absorbed", () => {
    vi.stubEnv("STUDY_PLANNER_LOG_LEVEL", "warn");
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    const result = runPlanner({
      globalConfig: { dailyCapMinutes: 0, dailyCapToleranceMinutes: 0 },
      subjects: [{ subjectId: "math", cfu: 1, examDates: ["2026-01-03"] }],
      horizon: { startDate: "2026-01-01", endDate: "2026-01-03" },
      manualSessions: [{ subjectId: "math", date: "2025-12-30", plannedMinutes: 60, status: "skipped" }],
    });

    expect(result.warnings.map((w) => w.code)).toEqual(["CRITICAL_ONLY_SKIPPED_AND_NO_NEW_SLOTS"]);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0]?.[0]).toBe(
      "[study-planner] CRITICAL_ONLY_SKIPPED_AND_NO_NEW_SLOTS: All manual sessions were skipped and no new slot is available in the replan window.",
    );
  });

  it("should report override issues without throwing", () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const result = runPlanner({
      subjects: [{ subjectId: "math", cfu: 1, overrides: { colour: "blue" } }],
    });
    expect(result.configIssues.map((i) => i.code)).toEqual(["INVALID_OVERRIDE_KEY"]);
  });

  it("should reject a subject without id", () => {
    expect(() => runPlanner({ subjects: [{ subjectId: "" }] })).toThrow(ZodError);
  });

  it("should be deterministic", () => {
    const input = (): PlannerInput => ({
      globalConfig: {
        dailyCapMinutes: 150,
        humanDistributionMode: "balanced",
        rebalanceAllowFallbackSwap: true,
        rebalanceMaxSwaps: 10,
      },
      subjects: [
        { subjectId: "chem", cfu: 3, priority: 1, examDates: ["2026-01-12"], startAt: "2026-01-01" },
        { subjectId: "bio", cfu: 2, difficultyCoeff: 1.4, examDates: ["2026-01-09"], startAt: "2026-01-01" },
        {
          subjectId: "math",
          cfu: 4,
          examDates: ["2026-01-14", "2026-01-28"],
          selectedExamDate: "2026-01-14",
          startAt: "2026-01-02",
          overrides: { strategyMode: "forward", concentrationMode: "concentrated" },
        },
      ],
      calendarConstraints: [{ constraintId: "gym", type: "blocked", weekday: "tue", blockedMinutes: 60 }],
      generatedAt: "2026-01-01T07:30:00Z",
    });

    const first = runPlanner(input());
    const second = runPlanner(input());
    expect(second).toEqual(first);

    for (const slot of first.slotsInWindow) {
      const used = first.plan
        .filter((r) => r.date === slot.date && r.subjectId !== "__slack__")
        .reduce((sum, r) => sum + r.minutes, 0);
      expect(used).toBeLessThanOrEqual(slot.maxMinutes);
    }
  });
});
