import { readFileSync } from "fs";
import { debugError, debugLog } from "./debug";
import { ExtractionError } from "./errors";
import { extractCandidates } from "./extractor";
import { countPairsByVariable, pairCandidates } from "./pairing";
import { PythonSourceParser, type FunctionDiscoverer } from "./python-parser";
import { createPairLedger, markQueried, settle, settledVerdicts } from "./scan-state";
import { collectSourceFiles } from "./target-files";
import type {
  Candidate,
  CandidatePair,
  Diagnostic,
  FileScan,
  FunctionAnalysis,
  FunctionUnit,
  ScanResult,
  Verdict,
} from "./types";

/**
 * Judges one pair. Implementations must not share mutable state between
 * calls, so the sequential loop can be swapped for a worker pool that
 * reassembles results by pair index.
 */
export type PairJudge = (pair: CandidatePair, unit: FunctionUnit) => Promise<Verdict>;

export interface ScanServiceOptions {
  judge: PairJudge;
  discoverer?: FunctionDiscoverer;
  /** Checked between functions; an in-flight judgment is never interrupted. */
  signal?: AbortSignal;
}

/**
 * Drives extraction, pairing and judgment for every function of every file,
 * one function and one pair at a time, in discovery then pairing order.
 */
export class ScanService {
  private readonly judge: PairJudge;
  private readonly discoverer: FunctionDiscoverer;
  private readonly signal?: AbortSignal;

  constructor(options: ScanServiceOptions) {
    this.judge = options.judge;
    this.discoverer = options.discoverer ?? new PythonSourceParser();
    this.signal = options.signal;
  }

  /**
   * Scans a file or every source file under a directory.
   * Throws ConfigurationError if the target is unreadable.
   */
  async scanTarget(target: string): Promise<ScanResult> {
    const files = collectSourceFiles(target);
    debugLog(`📂 ${files.length} file(s) to scan under ${target}`);

    const scans: FileScan[] = [];
    for (const file of files) {
      if (this.signal?.aborted) {
        debugLog("Scan aborted before", file);
        return { target, files: scans, aborted: true };
      }
      const scan = await this.scanFile(file);
      scans.push(scan);
      if (scan.aborted) {
        return { target, files: scans, aborted: true };
      }
    }

    return { target, files: scans, aborted: false };
  }

  async scanFile(filePath: string): Promise<FileScan> {
    let source: string;
    try {
      source = readFileSync(filePath, "utf8");
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      debugError(`❌ Cannot read ${filePath}: ${message}`);
      return {
        file: filePath,
        functions: [],
        diagnostics: [{ kind: "extraction", file: filePath, message: `Cannot read file: ${message}` }],
        aborted: false,
      };
    }
    return this.scanSource(filePath, source);
  }

  async scanSource(filePath: string, source: string): Promise<FileScan> {
    debugLog(`📁 Analyzing ${filePath}`);
    let units: FunctionUnit[];
    try {
      units = this.discoverer.discoverFunctions(filePath, source);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      debugError(`❌ Cannot parse ${filePath}: ${message}`);
      return {
        file: filePath,
        functions: [],
        diagnostics: [{ kind: "extraction", file: filePath, message: `Cannot parse file: ${message}` }],
        aborted: false,
      };
    }

    const functions: FunctionAnalysis[] = [];
    const diagnostics: Diagnostic[] = [];

    for (const unit of units) {
      if (this.signal?.aborted) {
        debugLog(`Scan aborted before ${unit.name}`);
        return { file: filePath, functions, diagnostics, aborted: true };
      }

      const analysis = await this.analyzeFunction(unit, diagnostics);
      if (analysis) {
        functions.push(analysis);
      }
    }

    return { file: filePath, functions, diagnostics, aborted: false };
  }

  /**
   * Runs the pipeline on one function. Returns null, with a diagnostic,
   * when the function cannot be extracted.
   */
  private async analyzeFunction(
    unit: FunctionUnit,
    diagnostics: Diagnostic[],
  ): Promise<FunctionAnalysis | null> {
    debugLog(`🔍 ${unit.name} (lines ${unit.startLine}-${unit.endLine})`);

    let candidates: Candidate[];
    try {
      candidates = extractCandidates(unit);
    } catch (error: unknown) {
      if (!(error instanceof ExtractionError)) {
        throw error;
      }
      debugError(`   ❌ ${error.message}`);
      diagnostics.push({
        kind: "extraction",
        file: unit.filePath,
        functionName: unit.name,
        message: error.message,
      });
      return null;
    }

    const pairs = pairCandidates(candidates);
    if (pairs.length === 0) {
      debugLog("   ✅ No source/sink pairs");
      return { unit, candidates, pairs, verdicts: [] };
    }

    const byVariable = [...countPairsByVariable(pairs)]
      .map(([variable, count]) => `${variable}×${count}`)
      .join(", ");
    debugLog(`   🔹 ${pairs.length} candidate pair(s): ${byVariable}`);

    const ledger = createPairLedger(pairs);
    for (let index = 0; index < pairs.length; index++) {
      const pair = pairs[index];
      markQueried(ledger, index);
      const verdict = await this.judge(pair, unit);
      settle(ledger, index, verdict);
      debugLog(`   🤖 ${pair.variable} ${pair.source.line} → ${pair.sink.line}: ${verdict.status}`);

      const diagnostic = diagnosticFor(unit, verdict);
      if (diagnostic) {
        diagnostics.push(diagnostic);
      }
    }

    return { unit, candidates, pairs, verdicts: settledVerdicts(ledger) };
  }
}

function diagnosticFor(unit: FunctionUnit, verdict: Verdict): Diagnostic | null {
  if (verdict.status !== "Inconclusive" && verdict.status !== "Error") {
    return null;
  }
  return {
    kind: verdict.status === "Inconclusive" ? "inconclusive" : "transport",
    file: unit.filePath,
    functionName: unit.name,
    variable: verdict.pair.variable,
    sourceLine: verdict.pair.source.line,
    sinkLine: verdict.pair.sink.line,
    message: verdict.error,
  };
}
