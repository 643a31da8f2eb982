#!/usr/bin/env node
import { mkdirSync, writeFileSync } from "fs";
import { join, resolve } from "path";
import { createJudgmentClient } from "./ai-client";
import { getModelConfig, getScanConfig } from "./config";
import { debugLog, isDebugEnabled, setDebugMode } from "./debug";
import { ConfigurationError } from "./errors";
import { PathFeasibilityOracle } from "./oracle";
import { buildScanReport, serializeReport, type ScanReport } from "./report";
import { renderHtml, renderMarkdown, renderSummaryTable } from "./report-renderers";
import { ScanService } from "./scan-service";
import type { ReportFormat } from "./types";

export const EXIT_CLEAN = 0;
export const EXIT_FINDINGS = 1;
export const EXIT_CONFIGURATION = 2;
export const EXIT_FATAL = 3;

const REPORT_FILES: Record<ReportFormat, string> = {
  json: "npd-report.json",
  markdown: "npd-report.md",
  html: "npd-report.html",
};

function renderReport(report: ScanReport, format: ReportFormat): string {
  switch (format) {
    case "json":
      return serializeReport(report);
    case "markdown":
      return renderMarkdown(report);
    case "html":
      return renderHtml(report);
  }
}

/**
 * Writes the report in each requested format and returns the file paths.
 */
export function writeReports(report: ScanReport, outputDir: string, formats: ReportFormat[]): string[] {
  mkdirSync(outputDir, { recursive: true });
  return formats.map((format) => {
    const path = resolve(join(outputDir, REPORT_FILES[format]));
    writeFileSync(path, renderReport(report, format), "utf8");
    return path;
  });
}

/**
 * Runs one scan end to end and returns the process exit code.
 */
export async function run(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  const controller = new AbortController();
  const onInterrupt = () => {
    console.warn("\n⚠️  Interrupted, stopping after the current function...");
    controller.abort();
  };
  process.once("SIGINT", onInterrupt);

  try {
    const config = getScanConfig(argv, env);
    setDebugMode(config.debug);
    const modelConfig = getModelConfig(env);
    debugLog("Scan configuration:", { ...config, provider: modelConfig.provider, model: modelConfig.modelName });

    const oracle = new PathFeasibilityOracle(createJudgmentClient(modelConfig, config.timeoutMs), {
      maxRetries: config.maxRetries,
      retryBaseMs: config.retryBaseMs,
    });
    const scanner = new ScanService({
      judge: (pair, unit) => oracle.judge(pair, unit),
      signal: controller.signal,
    });

    console.log(`🚀 Scanning ${config.target} with ${oracle.modelName}`);
    const result = await scanner.scanTarget(config.target);
    const report = buildScanReport(result, { model: oracle.modelName });

    const { summary } = report;
    console.log(
      `\n${summary.totalFindings > 0 ? "⚠️" : "✅"}  ${summary.totalFindings} finding(s) in ${summary.filesScanned} file(s), ` +
        `${summary.functionsAnalyzed} function(s), ${summary.pairsJudged} pair(s) judged`,
    );
    if (summary.totalFindings > 0) {
      console.log(renderSummaryTable(report));
    }
    if (report.diagnostics.length > 0) {
      console.log(`ℹ️  ${report.diagnostics.length} diagnostic(s), see the report for details`);
    }
    if (result.aborted) {
      console.warn("⚠️  Scan aborted, results are partial");
    }

    for (const path of writeReports(report, config.outputDir, config.formats)) {
      console.log(`📄 ${path}`);
    }

    return summary.totalFindings > 0 ? EXIT_FINDINGS : EXIT_CLEAN;
  } catch (error: unknown) {
    if (error instanceof ConfigurationError) {
      console.error(`❌ ${error.message}`);
      return EXIT_CONFIGURATION;
    }
    // Stack traces only in debug mode
    console.error("❌ Scan failed:", error instanceof Error && !isDebugEnabled() ? error.message : error);
    return EXIT_FATAL;
  } finally {
    process.removeListener("SIGINT", onInterrupt);
  }
}

async function main(): Promise<void> {
  process.exitCode = await run(process.argv.slice(2));
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error("npd-scan failed:", error);
    process.exit(EXIT_FATAL);
  });
}
