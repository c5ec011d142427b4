import { describe, expect, it } from "vitest";
import { computeHumanityMetrics } from "../../src/metrics/humanity.js";
import { SLACK_SUBJECT_ID } from "../../src/types.js";

const entry = (date: string, subjectId: string, minutes = 60) => ({ date, subjectId, minutes });

describe("computeHumanityMetrics", () => {
  it("should compute the metric vector over study records", () => {
    const metrics = computeHumanityMetrics([
      entry("2026-01-01", "math"),
      entry("2026-01-01", "physics"),
      entry("2026-01-02", "math"),
      entry("2026-01-03", "math"),
      entry("2026-01-03", SLACK_SUBJECT_ID, 90),
      entry("2026-01-04", "physics", 0),
    ]);

    expect(metrics.activeDays).toBe(3);
    expect(metrics.monoDayRatio).toBeCloseTo(2 / 3);
    expect(metrics.maxSameSubjectStreakDays).toBe(3);
    // (2 + 1 + 1) / 3 days / 2 subjects
    expect(metrics.subjectVarietyIndex).toBeCloseTo(2 / 3);
    // 0.4 * 1/3 + 0.4 * 2/3 + 0.2 * 1/3
    expect(metrics.humanityScore).toBeCloseTo(0.46667, 4);
  });

  it("should only count consecutive calendar days as a streak", () => {
    const metrics = computeHumanityMetrics([
      entry("2026-01-03", "math"),
      entry("2026-01-01", "math"),
      entry("2026-01-31", "chem"),
      entry("2026-02-01", "chem"),
    ]);
    expect(metrics.maxSameSubjectStreakDays).toBe(2);
  });

  it("should handle an empty plan", () => {
    const metrics = computeHumanityMetrics([]);
    expect(metrics.activeDays).toBe(0);
    expect(metrics.monoDayRatio).toBe(0);
    expect(metrics.maxSameSubjectStreakDays).toBe(0);
    expect(metrics.subjectVarietyIndex).toBe(0);
    expect(metrics.humanityScore).toBeCloseTo(0.6);
  });
});
