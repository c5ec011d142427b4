import { compareStrings } from "../datetime.utils.js";

/**
 * One allocation or swap decision.
 *
 * @category Decision Trace
 */
export interface DecisionTraceEntry {
  /** `d-000001`, `d-000002`, … in recording order. */
  decisionId: string;
  /** Run start plus one second per decision, ISO-8601 UTC. */
  timestamp: string;
  slotId: string;
  /** Sorted. */
  candidateSubjects: string[];
  /** Keys inserted in sorted order. */
  scoresBySubject: Record<string, number>;
  selectedSubjectId: string;
  appliedRules: string[];
  blockedConstraints: string[];
  tradeoffNote: string;
  confidenceImpact: number;
}

export type DecisionInput = Omit<DecisionTraceEntry, "decisionId" | "timestamp">;

/**
 * Append-only decision log.
 */
export interface DecisionTrace {
  record(decision: DecisionInput): void;
  /** Entries in chronological order. */
  entries(): DecisionTraceEntry[];
}

/**
 * Decision log whose timestamps are synthetic: the n-th decision is
 * stamped `start + n seconds`, so identical runs produce identical traces
 * regardless of wall-clock time.
 */
export class DecisionTraceImpl implements DecisionTrace {
  #start: Date;
  #sequence = 0;
  #items: DecisionTraceEntry[] = [];

  constructor(start: Date) {
    this.#start = new Date(start.getTime());
  }

  record(decision: DecisionInput): void {
    this.#sequence++;
    const timestamp = new Date(this.#start.getTime() + this.#sequence * 1000).toISOString();
    const scoresBySubject: Record<string, number> = {};
    for (const subjectId of Object.keys(decision.scoresBySubject).toSorted(compareStrings)) {
      scoresBySubject[subjectId] = decision.scoresBySubject[subjectId] ?? 0;
    }

    this.#items.push({
      decisionId: `d-${this.#sequence.toString().padStart(6, "0")}`,
      timestamp,
      slotId: decision.slotId,
      candidateSubjects: decision.candidateSubjects.toSorted(compareStrings),
      scoresBySubject,
      selectedSubjectId: decision.selectedSubjectId,
      appliedRules: [...decision.appliedRules],
      blockedConstraints: [...decision.blockedConstraints],
      tradeoffNote: decision.tradeoffNote,
      confidenceImpact: decision.confidenceImpact,
    });
  }

  entries(): DecisionTraceEntry[] {
    return this.#items.toSorted(
      (a, b) => compareStrings(a.timestamp, b.timestamp) || compareStrings(a.decisionId, b.decisionId),
    );
  }
}
