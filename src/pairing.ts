import type { Candidate, CandidatePair, MemberAccess, NullBinding } from "./types";

export function isNullBinding(candidate: Candidate): candidate is NullBinding {
  return candidate.kind === "NullBinding";
}

export function isMemberAccess(candidate: Candidate): candidate is MemberAccess {
  return candidate.kind === "MemberAccess";
}

/**
 * Pairs every NullBinding with every later MemberAccess on the same variable.
 *
 * Guard-blind on purpose: a rebinding or `is None` check between the two
 * sites does not remove the pair here, the oracle judges that. Every source
 * is paired independently, so two bindings before one sink yield two pairs.
 * Output order is source order, then sink order.
 */
export function pairCandidates(candidates: readonly Candidate[]): CandidatePair[] {
  const sources = candidates.filter(isNullBinding);
  const sinks = candidates.filter(isMemberAccess);
  const pairs: CandidatePair[] = [];

  for (const source of sources) {
    for (const sink of sinks) {
      if (sink.variable === source.variable && sink.line > source.line) {
        pairs.push({
          source,
          sink,
          variable: source.variable,
          distance: sink.line - source.line,
        });
      }
    }
  }

  return pairs;
}

/**
 * Counts pairs per variable, in first-seen order. Used for progress logging.
 */
export function countPairsByVariable(pairs: readonly CandidatePair[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const pair of pairs) {
    counts.set(pair.variable, (counts.get(pair.variable) ?? 0) + 1);
  }
  return counts;
}
