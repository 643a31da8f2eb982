import { pairCandidates } from "../src/pairing";
import {
  createPairLedger,
  isTerminal,
  markQueried,
  settle,
  settledVerdicts,
} from "../src/scan-state";
import type { CandidatePair, Verdict } from "../src/types";

const pairs: CandidatePair[] = pairCandidates([
  { kind: "NullBinding", variable: "x", line: 1, statement: "x = None" },
  { kind: "MemberAccess", variable: "x", line: 2, statement: "x.a" },
  { kind: "MemberAccess", variable: "x", line: 3, statement: "x.b" },
]);

function rejected(pair: CandidatePair): Verdict {
  return {
    pair,
    attempts: 1,
    status: "Rejected",
    isVulnerable: false,
    confidence: "high",
    severity: null,
    triggeringCondition: "",
    explanation: "guarded",
  };
}

describe("pair ledger", () => {
  it("should start every pair Pending", () => {
    const ledger = createPairLedger(pairs);

    expect(ledger.entries.map((entry) => entry.state)).toEqual(["Pending", "Pending"]);
    expect(settledVerdicts(ledger)).toEqual([]);
  });

  it("should move a pair through Queried to its verdict status", () => {
    const ledger = createPairLedger(pairs);

    markQueried(ledger, 0);
    expect(ledger.entries[0].state).toBe("Queried");

    settle(ledger, 0, rejected(pairs[0]));
    expect(ledger.entries[0].state).toBe("Rejected");
    expect(ledger.entries[1].state).toBe("Pending");
  });

  it("should refuse to settle a pair that was never queried", () => {
    const ledger = createPairLedger(pairs);

    expect(() => settle(ledger, 0, rejected(pairs[0]))).toThrow(
      "Illegal pair transition Pending -> Rejected for x@1->2",
    );
  });

  it("should refuse to query a pair twice", () => {
    const ledger = createPairLedger(pairs);
    markQueried(ledger, 1);

    expect(() => markQueried(ledger, 1)).toThrow("Illegal pair transition Queried -> Queried for x@1->3");
  });

  it("should keep a settled verdict terminal", () => {
    const ledger = createPairLedger(pairs);
    markQueried(ledger, 0);
    settle(ledger, 0, rejected(pairs[0]));

    expect(() => settle(ledger, 0, rejected(pairs[0]))).toThrow(
      "Illegal pair transition Rejected -> Rejected for x@1->2",
    );
  });

  it("should reject an unknown index", () => {
    expect(() => markQueried(createPairLedger(pairs), 5)).toThrow("No pair at index 5");
  });

  it("should return settled verdicts in pairing order", () => {
    const ledger = createPairLedger(pairs);
    for (const index of [1, 0]) {
      markQueried(ledger, index);
      settle(ledger, index, rejected(pairs[index]));
    }

    expect(settledVerdicts(ledger).map((verdict) => verdict.pair.sink.line)).toEqual([2, 3]);
  });

  it.each([
    ["Pending", false],
    ["Queried", false],
    ["Confirmed", true],
    ["Rejected", true],
    ["Inconclusive", true],
    ["Error", true],
  ] as const)("should report %s as terminal: %s", (state, expected) => {
    expect(isTerminal(state)).toBe(expected);
  });
});
