import { describe, expect, it } from "vitest";
import { GlobalConfigSchema, type GlobalConfigInput } from "../../src/config.js";
import { DecisionTraceImpl } from "../../src/engine/decision-trace.js";
import { feasibilityScore, rebalanceAllocations } from "../../src/engine/rebalance.js";
import { parseSubject, type AllocationRecord } from "../../src/types.js";

const subjects = [
  parseSubject({ subjectId: "math", endBy: "2026-01-10", examDates: ["2026-01-12"] }),
  parseSubject({ subjectId: "physics", endBy: "2026-01-10", examDates: ["2026-01-12"] }),
];

function record(date: string, subjectId: string, extra: Partial<AllocationRecord> = {}): AllocationRecord {
  return { slotId: `slot-${date}`, date, subjectId, minutes: 60, bucket: "base", ...extra };
}

const config = (input: GlobalConfigInput = {}) =>
  GlobalConfigSchema.parse({ maxSubjectsPerDay: 3, rebalanceNearDaysWindow: 2, ...input });

const layout = (records: readonly AllocationRecord[]) => records.map((r) => [r.date, r.subjectId]);

const monotonousPlan = () => [
  record("2026-01-01", "math"),
  record("2026-01-02", "math"),
  record("2026-01-03", "math"),
  record("2026-01-04", "physics"),
];

describe("rebalanceAllocations", () => {
  it("should apply the first swap that shortens the longest streak", () => {
    const trace = new DecisionTraceImpl(new Date("2026-01-01T00:00:00Z"));
    const result = rebalanceAllocations({
      allocations: monotonousPlan(),
      slots: [],
      subjects,
      config: config(),
      decisionTrace: trace,
    });

    expect(layout(result)).toEqual([
      ["2026-01-01", "math"],
      ["2026-01-02", "physics"],
      ["2026-01-03", "math"],
      ["2026-01-04", "math"],
    ]);

    const entries = trace.entries();
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      slotId: "slot-2026-01-02|slot-2026-01-04",
      selectedSubjectId: "swap:math<->physics",
      appliedRules: ["RULE_REBALANCE_SWAP"],
      tradeoffNote: "Swap accepted: improves maxSameSubjectStreakDays; feasibility 0.200->0.200.",
      confidenceImpact: 0.002,
    });
  });

  it("should keep minutes, dates and buckets in place", () => {
    const input = monotonousPlan().map((r, i) => ({ ...r, minutes: 30 + i }));
    const result = rebalanceAllocations({ allocations: input, slots: [], subjects, config: config() });
    expect(result.map((r) => [r.slotId, r.minutes, r.bucket])).toEqual(
      input.map((r) => [r.slotId, r.minutes, r.bucket]),
    );
  });

  it("should not touch locked, pinned or past records", () => {
    const locked = monotonousPlan().map((r) =>
      r.subjectId === "physics" ? { ...r, lockedByUser: true } : r,
    );
    expect(
      layout(rebalanceAllocations({ allocations: locked, slots: [], subjects, config: config() })),
    ).toEqual(layout(monotonousPlan()));

    expect(
      layout(
        rebalanceAllocations({
          allocations: monotonousPlan(),
          slots: [],
          subjects,
          config: config(),
          pastCutoff: "2026-01-04",
        }),
      ),
    ).toEqual(layout(monotonousPlan()));
  });

  it("should treat manual days as immutable", () => {
    const manual = record("2026-01-02", "physics", { slotId: "manual-2026-01-02", bucket: "manual_locked" });
    const plan = [record("2026-01-01", "math"), record("2026-01-02", "math"), manual];
    const result = rebalanceAllocations({
      allocations: plan,
      slots: [],
      subjects,
      config: config(),
      lockedAllocations: [manual],
    });
    expect(layout(result)).toEqual([
      ["2026-01-01", "math"],
      ["2026-01-02", "physics"],
      ["2026-01-02", "math"],
    ]);
  });

  it("should respect the swap budget", () => {
    const result = rebalanceAllocations({
      allocations: monotonousPlan(),
      slots: [],
      subjects,
      config: config(),
      maxSwaps: 0,
    });
    expect(layout(result)).toEqual(layout(monotonousPlan()));
  });

  it("should reject swaps that exceed the subjects-per-day limit", () => {
    const plan = [
      record("2026-01-01", "math", { slotId: "a" }),
      record("2026-01-01", "math", { slotId: "b" }),
      record("2026-01-02", "physics", { slotId: "c" }),
      record("2026-01-02", "physics", { slotId: "d" }),
    ];
    const strict = rebalanceAllocations({
      allocations: plan,
      slots: [],
      subjects,
      config: config({ maxSubjectsPerDay: 1 }),
    });
    expect(layout(strict)).toEqual(layout(plan));

    const relaxed = rebalanceAllocations({ allocations: plan, slots: [], subjects, config: config() });
    expect(relaxed.map((r) => [r.slotId, r.subjectId])).toEqual([
      ["a", "physics"],
      ["b", "math"],
      ["c", "math"],
      ["d", "physics"],
    ]);
  });

  it("should only swap subjects with the same strategy mode", () => {
    const plan = [record("2026-01-01", "math"), record("2026-01-02", "math"), record("2026-01-03", "physics")];
    const result = rebalanceAllocations({
      allocations: plan,
      slots: [],
      subjects,
      config: config(),
      subjectOverrides: { physics: { strategyMode: "backward" } },
    });
    expect(layout(result)).toEqual(layout(plan));
  });

  it("should stop at the iteration budget even when swaps remain", () => {
    const result = rebalanceAllocations({
      allocations: monotonousPlan(),
      slots: [],
      subjects,
      config: config({ rebalanceMaxSwaps: 100, rebalanceMaxIterations: 0 }),
    });
    expect(layout(result)).toEqual(layout(monotonousPlan()));
  });

  describe("feasibility", () => {
    const withChem = [
      ...subjects,
      parseSubject({ subjectId: "chem", examDates: ["2026-01-12"] }),
    ];
    const slots = [
      { date: "2026-01-10", capMinutes: 60, toleranceMinutes: 0, lockedMinutes: 0 },
      { date: "2026-01-11", capMinutes: 60, toleranceMinutes: 0, lockedMinutes: 0 },
    ];
    const plan = () => [
      record("2026-01-10", "chem", { slotId: "s1" }),
      record("2026-01-11", "chem", { slotId: "s2" }),
      record("2026-01-11", "math", { slotId: "s3" }),
    ];
    const allowed = new Map([
      ["2026-01-10", 60],
      ["2026-01-11", 60],
    ]);
    const windows = new Map([
      ["math", { endBy: "2026-01-10" }],
      ["chem", { endBy: "2026-01-12" }],
    ]);

    it("should never end below the starting feasibility", () => {
      const trace = new DecisionTraceImpl(new Date("2026-01-01T00:00:00Z"));
      const result = rebalanceAllocations({
        allocations: plan(),
        slots,
        subjects: withChem,
        config: config({ feasibilityRegressionTolerance: 0 }),
        decisionTrace: trace,
      });

      expect(result.map((r) => [r.slotId, r.date, r.subjectId])).toEqual([
        ["s1", "2026-01-10", "math"],
        ["s2", "2026-01-11", "chem"],
        ["s3", "2026-01-11", "chem"],
      ]);
      // the overloaded day stays overloaded; the out-of-window record is fixed
      expect(feasibilityScore(plan(), allowed, windows)).toBeCloseTo(1 / 3);
      expect(feasibilityScore(result, allowed, windows)).toBe(0.5);

      expect(trace.entries()).toHaveLength(1);
      expect(trace.entries()[0]).toMatchObject({
        slotId: "s1|s3",
        selectedSubjectId: "swap:chem<->math",
        tradeoffNote: "Swap accepted: improves maxSameSubjectStreakDays; feasibility 0.333->0.500.",
        confidenceImpact: 0.003,
      });
    });
  });

  describe("fallback swap", () => {
    const plan = () => [record("2026-01-01", "math"), record("2026-01-02", "physics")];

    it("should accept a non-improving swap only when enabled", () => {
      const trace = new DecisionTraceImpl(new Date("2026-01-01T00:00:00Z"));
      const result = rebalanceAllocations({
        allocations: plan(),
        slots: [],
        subjects,
        config: config({
          rebalanceAllowFallbackSwap: true,
          rebalanceMaxSwaps: 1,
          rebalanceNearDaysWindow: 5,
        }),
        decisionTrace: trace,
      });

      expect(layout(result)).toEqual([
        ["2026-01-01", "physics"],
        ["2026-01-02", "math"],
      ]);
      expect(trace.entries()[0]?.appliedRules).toEqual(["RULE_REBALANCE_FALLBACK_SWAP"]);
    });

    it("should leave the plan alone when disabled", () => {
      const result = rebalanceAllocations({
        allocations: plan(),
        slots: [],
        subjects,
        config: config({ rebalanceNearDaysWindow: 5 }),
      });
      expect(layout(result)).toEqual(layout(plan()));
    });
  });
});

describe("feasibilityScore", () => {
  it("should count window and capacity violations", () => {
    const score = feasibilityScore(
      [record("2026-01-01", "math"), record("2026-01-05", "math")],
      new Map([
        ["2026-01-01", 30],
        ["2026-01-05", 120],
      ]),
      new Map([["math", { endBy: "2026-01-03" }]]),
    );
    expect(score).toBeCloseTo(1 / 3);
  });

  it("should ignore slack", () => {
    expect(
      feasibilityScore([record("2026-01-01", "__slack__")], new Map(), new Map()),
    ).toBe(1);
  });
});
