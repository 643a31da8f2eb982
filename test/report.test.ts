import {
  buildFileReport,
  buildScanReport,
  findingsOf,
  parseReport,
  serializeReport,
} from "../src/report";
import type {
  CandidatePair,
  FileScan,
  FunctionAnalysis,
  FunctionUnit,
  ScanResult,
  Verdict,
} from "../src/types";
import { makeUnit } from "./helpers";

function pairAt(variable: string, sourceLine: number, sinkLine: number): CandidatePair {
  return {
    source: { kind: "NullBinding", variable, line: sourceLine, statement: `${variable} = None` },
    sink: { kind: "MemberAccess", variable, line: sinkLine, statement: `${variable}.value` },
    variable,
    distance: sinkLine - sourceLine,
  };
}

function confirmed(pair: CandidatePair, severity: "critical" | "high" | "low", confidence: number | "high"): Verdict {
  return {
    pair,
    attempts: 1,
    status: "Confirmed",
    isVulnerable: true,
    confidence,
    severity,
    triggeringCondition: `${pair.variable} stays None`,
    explanation: `no guard before line ${pair.sink.line}`,
  };
}

function rejected(pair: CandidatePair): Verdict {
  return {
    pair,
    attempts: 1,
    status: "Rejected",
    isVulnerable: false,
    confidence: "medium",
    severity: null,
    triggeringCondition: "",
    explanation: "guarded",
  };
}

function inconclusive(pair: CandidatePair): Verdict {
  return {
    pair,
    attempts: 3,
    status: "Inconclusive",
    isVulnerable: false,
    confidence: null,
    severity: null,
    triggeringCondition: "",
    explanation: "Response contains no JSON object",
    error: "Response contains no JSON object",
  };
}

function analysis(unit: FunctionUnit, verdicts: Verdict[]): FunctionAnalysis {
  return { unit, candidates: [], pairs: verdicts.map((verdict) => verdict.pair), verdicts };
}

const loadUnit = makeUnit("load", ["def load():", "    a = None", "    b = None", "    a.value", "    b.value"], 1, "svc.py");
const safeUnit = makeUnit("safe", ["def safe():", "    c = None", "    c.value"], 7, "svc.py");
const saveUnit = makeUnit("save", ["def save():", "    d = None", "    d.value"], 11, "svc.py");

const serviceScan: FileScan = {
  file: "svc.py",
  functions: [
    analysis(loadUnit, [confirmed(pairAt("a", 2, 4), "high", "high"), confirmed(pairAt("b", 3, 5), "critical", 0.9)]),
    analysis(safeUnit, [rejected(pairAt("c", 8, 9))]),
    analysis(saveUnit, [inconclusive(pairAt("d", 12, 13))]),
  ],
  diagnostics: [
    {
      kind: "inconclusive",
      file: "svc.py",
      functionName: "save",
      variable: "d",
      sourceLine: 12,
      sinkLine: 13,
      message: "Response contains no JSON object",
    },
  ],
  aborted: false,
};

const utilScan: FileScan = {
  file: "util.py",
  functions: [analysis(makeUnit("trim", ["def trim(s=None):", "    return s.strip()"], 1, "util.py"), [
    confirmed(pairAt("s", 1, 2), "low", "high"),
  ])],
  diagnostics: [{ kind: "extraction", file: "util.py", functionName: "legacy", message: "Cannot parse function legacy at line 9" }],
  aborted: false,
};

const result: ScanResult = { target: "project", files: [serviceScan, utilScan], aborted: false };
const generatedAt = new Date("2026-01-15T08:30:00.000Z");

describe("buildFileReport", () => {
  it("should group confirmed findings by function and omit the rest", () => {
    const report = buildFileReport(serviceScan);

    expect(report.file).toBe("svc.py");
    expect(report.functionsAnalyzed).toBe(3);
    expect(report.pairsJudged).toBe(4);
    expect(report.functions).toEqual([
      {
        functionName: "load",
        startLine: 1,
        endLine: 5,
        source: "def load():\n    a = None\n    b = None\n    a.value\n    b.value",
        findings: [
          {
            functionName: "load",
            file: "svc.py",
            variable: "a",
            sourceLine: 2,
            sinkLine: 4,
            severity: "high",
            confidence: "high",
            condition: "a stays None",
            explanation: "no guard before line 4",
          },
          {
            functionName: "load",
            file: "svc.py",
            variable: "b",
            sourceLine: 3,
            sinkLine: 5,
            severity: "critical",
            confidence: 0.9,
            condition: "b stays None",
            explanation: "no guard before line 5",
          },
        ],
      },
    ]);
  });
});

describe("buildScanReport", () => {
  it("should summarize files, verdicts and severities", () => {
    const report = buildScanReport(result, { model: "dashscope/qwen-max", generatedAt });

    expect(report.tool).toEqual({ name: "npd-scan", version: "0.1.0" });
    expect(report.generatedAt).toBe("2026-01-15T08:30:00.000Z");
    expect(report.model).toBe("dashscope/qwen-max");
    expect(report.aborted).toBe(false);
    expect(report.summary).toEqual({
      filesScanned: 2,
      functionsAnalyzed: 4,
      pairsJudged: 5,
      totalFindings: 3,
      bySeverity: { critical: 1, high: 1, medium: 0, low: 1 },
      byStatus: { Confirmed: 3, Rejected: 1, Inconclusive: 1, Error: 0 },
    });
  });

  it("should collect diagnostics from every file in order", () => {
    const report = buildScanReport(result, { model: "m", generatedAt });

    expect(report.diagnostics.map((diagnostic) => `${diagnostic.kind}:${diagnostic.file}`)).toEqual([
      "inconclusive:svc.py",
      "extraction:util.py",
    ]);
  });

  it("should flatten findings in file, function and pair order", () => {
    const report = buildScanReport(result, { model: "m", generatedAt });

    expect(findingsOf(report).map((finding) => `${finding.file}:${finding.variable}`)).toEqual([
      "svc.py:a",
      "svc.py:b",
      "util.py:s",
    ]);
  });

  it("should carry the aborted flag", () => {
    const report = buildScanReport({ ...result, aborted: true }, { model: "m", generatedAt });
    expect(report.aborted).toBe(true);
  });
});

describe("report serialization", () => {
  it("should round-trip through JSON", () => {
    const report = buildScanReport(result, { model: "dashscope/qwen-max", generatedAt });

    const parsed = parseReport(serializeReport(report));

    expect(parsed).toEqual(report);
    expect(findingsOf(parsed)).toEqual(findingsOf(report));
  });

  it("should round-trip an empty scan", () => {
    const report = buildScanReport({ target: "empty", files: [], aborted: false }, { model: "m", generatedAt });

    expect(parseReport(serializeReport(report))).toEqual(report);
  });

  it("should indent the JSON output", () => {
    const report = buildScanReport({ target: "empty", files: [], aborted: false }, { model: "m", generatedAt });

    expect(serializeReport(report).split("\n")[1]).toBe('  "tool": {');
  });

  it("should reject a report with a malformed finding", () => {
    const report = buildScanReport(result, { model: "m", generatedAt });
    const json = serializeReport(report).replace('"severity": "critical"', '"severity": "urgent"');

    expect(() => parseReport(json)).toThrow();
  });
});
