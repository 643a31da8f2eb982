import { z } from "zod";
import { TOOL_NAME, TOOL_VERSION } from "./constants";
import { confidenceSchema } from "./response-parser";
import type {
  ConfirmedVerdict,
  Diagnostic,
  FileScan,
  Finding,
  FunctionUnit,
  ScanResult,
  Severity,
  Verdict,
  VerdictStatus,
} from "./types";

export interface FunctionFindings {
  functionName: string;
  startLine: number;
  endLine: number;
  /** The function's source text, as discovered. */
  source: string;
  findings: Finding[];
}

export interface FileReport {
  file: string;
  functionsAnalyzed: number;
  pairsJudged: number;
  functions: FunctionFindings[];
}

export interface ReportSummary {
  filesScanned: number;
  functionsAnalyzed: number;
  pairsJudged: number;
  totalFindings: number;
  bySeverity: Record<Severity, number>;
  byStatus: Record<VerdictStatus, number>;
}

export interface ScanReport {
  tool: { name: string; version: string };
  generatedAt: string;
  target: string;
  model: string;
  aborted: boolean;
  summary: ReportSummary;
  files: FileReport[];
  diagnostics: Diagnostic[];
}

export interface ReportMeta {
  model: string;
  generatedAt?: Date;
}

export const SEVERITY_ORDER: readonly Severity[] = ["critical", "high", "medium", "low"];

export function isConfirmed(verdict: Verdict): verdict is ConfirmedVerdict {
  return verdict.status === "Confirmed";
}

export function toFinding(unit: FunctionUnit, verdict: ConfirmedVerdict): Finding {
  return {
    functionName: unit.name,
    file: unit.filePath,
    variable: verdict.pair.variable,
    sourceLine: verdict.pair.source.line,
    sinkLine: verdict.pair.sink.line,
    severity: verdict.severity,
    confidence: verdict.confidence,
    condition: verdict.triggeringCondition,
    explanation: verdict.explanation,
  };
}

/**
 * Projects Confirmed verdicts of one file into findings grouped by function.
 * Keeps discovery order of functions and pair order within a function;
 * functions without findings are left out.
 */
export function buildFileReport(scan: FileScan): FileReport {
  const functions: FunctionFindings[] = [];
  let pairsJudged = 0;

  for (const analysis of scan.functions) {
    pairsJudged += analysis.verdicts.length;
    const findings = analysis.verdicts
      .filter(isConfirmed)
      .map((verdict) => toFinding(analysis.unit, verdict));

    if (findings.length > 0) {
      functions.push({
        functionName: analysis.unit.name,
        startLine: analysis.unit.startLine,
        endLine: analysis.unit.endLine,
        source: analysis.unit.text,
        findings,
      });
    }
  }

  return {
    file: scan.file,
    functionsAnalyzed: scan.functions.length,
    pairsJudged,
    functions,
  };
}

export function buildScanReport(result: ScanResult, meta: ReportMeta): ScanReport {
  const files = result.files.map(buildFileReport);
  const diagnostics = result.files.flatMap((scan) => scan.diagnostics);

  const bySeverity: Record<Severity, number> = { critical: 0, high: 0, medium: 0, low: 0 };
  const byStatus: Record<VerdictStatus, number> = {
    Confirmed: 0,
    Rejected: 0,
    Inconclusive: 0,
    Error: 0,
  };

  for (const scan of result.files) {
    for (const analysis of scan.functions) {
      for (const verdict of analysis.verdicts) {
        byStatus[verdict.status] += 1;
      }
    }
  }

  const findings = files.flatMap((file) => file.functions.flatMap((fn) => fn.findings));
  for (const finding of findings) {
    bySeverity[finding.severity] += 1;
  }

  return {
    tool: { name: TOOL_NAME, version: TOOL_VERSION },
    generatedAt: (meta.generatedAt ?? new Date()).toISOString(),
    target: result.target,
    model: meta.model,
    aborted: result.aborted,
    summary: {
      filesScanned: files.length,
      functionsAnalyzed: files.reduce((sum, file) => sum + file.functionsAnalyzed, 0),
      pairsJudged: files.reduce((sum, file) => sum + file.pairsJudged, 0),
      totalFindings: findings.length,
      bySeverity,
      byStatus,
    },
    files,
    diagnostics,
  };
}

/** Every finding of a report, in file, function and pair order. */
export function findingsOf(report: ScanReport): Finding[] {
  return report.files.flatMap((file) => file.functions.flatMap((fn) => fn.findings));
}

const severityEnum = z.enum(["critical", "high", "medium", "low"]);
const statusCounts = z.object({
  Confirmed: z.number(),
  Rejected: z.number(),
  Inconclusive: z.number(),
  Error: z.number(),
});

const findingSchema = z.object({
  functionName: z.string(),
  file: z.string(),
  variable: z.string(),
  sourceLine: z.number().int().positive(),
  sinkLine: z.number().int().positive(),
  severity: severityEnum,
  confidence: confidenceSchema,
  condition: z.string(),
  explanation: z.string(),
});

const diagnosticSchema = z.object({
  kind: z.enum(["extraction", "inconclusive", "transport"]),
  file: z.string(),
  functionName: z.string().optional(),
  variable: z.string().optional(),
  sourceLine: z.number().optional(),
  sinkLine: z.number().optional(),
  message: z.string(),
});

export const scanReportSchema = z.object({
  tool: z.object({ name: z.string(), version: z.string() }),
  generatedAt: z.string(),
  target: z.string(),
  model: z.string(),
  aborted: z.boolean(),
  summary: z.object({
    filesScanned: z.number(),
    functionsAnalyzed: z.number(),
    pairsJudged: z.number(),
    totalFindings: z.number(),
    bySeverity: z.object({
      critical: z.number(),
      high: z.number(),
      medium: z.number(),
      low: z.number(),
    }),
    byStatus: statusCounts,
  }),
  files: z.array(
    z.object({
      file: z.string(),
      functionsAnalyzed: z.number(),
      pairsJudged: z.number(),
      functions: z.array(
        z.object({
          functionName: z.string(),
          startLine: z.number(),
          endLine: z.number(),
          source: z.string(),
          findings: z.array(findingSchema),
        }),
      ),
    }),
  ),
  diagnostics: z.array(diagnosticSchema),
});

export function serializeReport(report: ScanReport): string {
  return JSON.stringify(report, null, 2);
}

/**
 * Parses a serialized report back, validating its shape.
 */
export function parseReport(json: string): ScanReport {
  return scanReportSchema.parse(JSON.parse(json));
}
