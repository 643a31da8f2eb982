import type { JudgmentClient, JudgmentRequest } from "../src/ai-client";
import type { FunctionUnit } from "../src/types";

export function makeUnit(name: string, lines: string[], startLine = 1, filePath = "app.py"): FunctionUnit {
  return {
    name,
    filePath,
    startLine,
    endLine: startLine + lines.length - 1,
    text: lines.join("\n"),
  };
}

/**
 * Judgment client that replays canned replies; an Error entry is thrown.
 */
export class ScriptedClient implements JudgmentClient {
  readonly name = "fake/judge";
  readonly requests: JudgmentRequest[] = [];
  private readonly script: Array<string | Error>;

  constructor(script: Array<string | Error>, private readonly fallback?: string) {
    this.script = [...script];
  }

  async complete(request: JudgmentRequest): Promise<string> {
    this.requests.push(request);
    const next = this.script.shift() ?? this.fallback;
    if (next === undefined) {
      throw new Error("No scripted reply left");
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }
}

export function vulnerableReply(condition: string, severity = "high", confidence: string | number = "high"): string {
  return JSON.stringify({
    vulnerable: true,
    confidence,
    severity,
    condition,
    explanation: `dereference reached when ${condition}`,
  });
}

export function safeReply(explanation: string): string {
  return JSON.stringify({
    vulnerable: false,
    confidence: "high",
    condition: "",
    explanation,
  });
}
