export interface FunctionUnit {
  name: string;
  filePath: string;
  startLine: number; // 1-based, the `def` line
  endLine: number; // 1-based, inclusive
  text: string;
}

export type CandidateKind = "NullBinding" | "MemberAccess";

export interface Candidate {
  kind: CandidateKind;
  variable: string;
  line: number; // absolute file line
  statement: string;
}

export interface NullBinding extends Candidate {
  kind: "NullBinding";
}

export interface MemberAccess extends Candidate {
  kind: "MemberAccess";
}

export interface CandidatePair {
  source: NullBinding;
  sink: MemberAccess;
  variable: string;
  distance: number;
}

export type ConfidenceLevel = "high" | "medium" | "low";

/** Either a score in [0, 1] or a categorical level, as returned by the model. */
export type Confidence = number | ConfidenceLevel;

export type Severity = "critical" | "high" | "medium" | "low";

export type VerdictStatus = "Confirmed" | "Rejected" | "Inconclusive" | "Error";

interface VerdictBase {
  pair: CandidatePair;
  /** Number of judgment requests sent for this pair. */
  attempts: number;
  triggeringCondition: string;
  explanation: string;
}

export interface ConfirmedVerdict extends VerdictBase {
  status: "Confirmed";
  isVulnerable: true;
  confidence: Confidence;
  severity: Severity;
}

export interface RejectedVerdict extends VerdictBase {
  status: "Rejected";
  isVulnerable: false;
  confidence: Confidence | null;
  severity: null;
}

export interface FailedVerdict extends VerdictBase {
  status: "Inconclusive" | "Error";
  isVulnerable: false;
  confidence: null;
  severity: null;
  error: string;
}

export type Verdict = ConfirmedVerdict | RejectedVerdict | FailedVerdict;

export interface Finding {
  functionName: string;
  file: string;
  variable: string;
  sourceLine: number;
  sinkLine: number;
  severity: Severity;
  confidence: Confidence;
  condition: string;
  explanation: string;
}

export type DiagnosticKind = "extraction" | "inconclusive" | "transport";

export interface Diagnostic {
  kind: DiagnosticKind;
  file: string;
  functionName?: string;
  variable?: string;
  sourceLine?: number;
  sinkLine?: number;
  message: string;
}

export interface FunctionAnalysis {
  unit: FunctionUnit;
  candidates: Candidate[];
  pairs: CandidatePair[];
  verdicts: Verdict[];
}

export interface FileScan {
  file: string;
  functions: FunctionAnalysis[];
  diagnostics: Diagnostic[];
  aborted: boolean;
}

export interface ScanResult {
  target: string;
  files: FileScan[];
  aborted: boolean;
}

export type ReportFormat = "json" | "markdown" | "html";

export interface ModelConfig {
  provider: string;
  modelName: string;
  apiKey: string;
  /** Overrides the provider's default endpoint (OpenAI-compatible providers only). */
  baseURL?: string;
}

export interface ScanConfig {
  target: string;
  outputDir: string;
  formats: ReportFormat[];
  maxRetries: number;
  timeoutMs: number;
  retryBaseMs: number;
  debug: boolean;
}

export interface ParsedArgs {
  target: string;
  outputDir?: string;
  format?: string;
  maxRetries?: string;
  timeout?: string;
  debug: boolean;
}
