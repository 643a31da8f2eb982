import type { JudgmentRequest } from "./ai-client";
import { numberLines } from "./source-text";
import type { CandidatePair, FunctionUnit } from "./types";

export const JUDGMENT_SYSTEM_PROMPT = `You are a static-analysis assistant that judges null pointer dereference
candidates in Python code. For each candidate you receive one function, a line
where a variable is bound to None, and a later line where an attribute of that
variable is read or a method is called on it.

Decide whether some executable path reaches the dereference while the variable
still holds None. The path is safe when something on every path between the two
lines makes the None state unreachable at the dereference:
  - a conditional check (if x is None / if x / if not x) that returns, raises,
    continues or otherwise skips the dereference
  - an early return or raise
  - an exception handler around the dereference
  - a reassignment to a non-None value
  - a default-value substitution (x = x or default, x = y if x is None else x)

Reply with exactly one JSON object and nothing else, no Markdown fences:
{
  "vulnerable": true,
  "confidence": "high",
  "severity": "high",
  "condition": "when flag is False, user keeps its None value",
  "explanation": "the only reassignment happens inside if flag:"
}

Field rules:
  - vulnerable: true if a path exists on which the dereference sees None, false otherwise
  - confidence: "high", "medium", "low", or a number between 0 and 1
  - severity: "critical", "high", "medium" or "low" (only when vulnerable is true)
  - condition: the input or branch that triggers the dereference; empty when safe
  - explanation: one or two sentences naming the guard or the unguarded path`;

/**
 * Builds the judgment request for one candidate pair.
 * Lines are numbered with absolute file lines so the model and the
 * candidate sites agree.
 */
export function buildJudgmentRequest(pair: CandidatePair, unit: FunctionUnit): JudgmentRequest {
  const { source, sink, variable } = pair;

  const prompt = `File: ${unit.filePath}
Function: ${unit.name} (lines ${unit.startLine}-${unit.endLine})

\`\`\`python
${numberLines(unit.text, unit.startLine)}
\`\`\`

Candidate:
  - source: line ${source.line} binds \`${variable}\` to None: \`${source.statement}\`
  - sink: line ${sink.line} dereferences \`${variable}\`: \`${sink.statement}\`

Question: between line ${source.line} and line ${sink.line}, does a guard (conditional
check, early return, exception handler, reassignment or default-value
substitution) make the None state of \`${variable}\` unreachable at line ${sink.line}?
If not, describe the triggering condition. Answer with the JSON object only.`;

  return { system: JUDGMENT_SYSTEM_PROMPT, prompt };
}
