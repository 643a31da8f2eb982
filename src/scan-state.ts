import type { CandidatePair, Verdict, VerdictStatus } from "./types";

export type PairState = "Pending" | "Queried" | VerdictStatus;

const TRANSITIONS: Record<PairState, readonly PairState[]> = {
  Pending: ["Queried"],
  Queried: ["Confirmed", "Rejected", "Inconclusive", "Error"],
  Confirmed: [],
  Rejected: [],
  Inconclusive: [],
  Error: [],
};

export interface PairEntry {
  pair: CandidatePair;
  state: PairState;
  verdict: Verdict | null;
}

export interface PairLedger {
  entries: PairEntry[];
}

/**
 * Creates a ledger with every pair Pending, in pairing order.
 */
export function createPairLedger(pairs: readonly CandidatePair[]): PairLedger {
  return {
    entries: pairs.map((pair) => ({ pair, state: "Pending", verdict: null })),
  };
}

export function isTerminal(state: PairState): boolean {
  return TRANSITIONS[state].length === 0;
}

function transition(entry: PairEntry, next: PairState): void {
  if (!TRANSITIONS[entry.state].includes(next)) {
    throw new Error(
      `Illegal pair transition ${entry.state} -> ${next} for ${entry.pair.variable}@${entry.pair.source.line}->${entry.pair.sink.line}`,
    );
  }
  entry.state = next;
}

/**
 * Marks a pair as sent to the oracle.
 */
export function markQueried(ledger: PairLedger, index: number): void {
  transition(entryAt(ledger, index), "Queried");
}

/**
 * Stores the oracle's verdict; the verdict status becomes the terminal state.
 */
export function settle(ledger: PairLedger, index: number, verdict: Verdict): void {
  const entry = entryAt(ledger, index);
  transition(entry, verdict.status);
  entry.verdict = verdict;
}

/**
 * Verdicts of settled pairs, in pairing order.
 */
export function settledVerdicts(ledger: PairLedger): Verdict[] {
  const verdicts: Verdict[] = [];
  for (const entry of ledger.entries) {
    if (isTerminal(entry.state) && entry.verdict) {
      verdicts.push(entry.verdict);
    }
  }
  return verdicts;
}

function entryAt(ledger: PairLedger, index: number): PairEntry {
  const entry = ledger.entries[index];
  if (!entry) {
    throw new Error(`No pair at index ${index}`);
  }
  return entry;
}
