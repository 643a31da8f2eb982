import { escapeHtml, escapeMarkdownInline } from "./html-utils";
import { findingsOf, SEVERITY_ORDER, type FunctionFindings, type ScanReport } from "./report";
import { numberLines } from "./source-text";
import type { Confidence, Diagnostic, Finding, Severity } from "./types";

const SEVERITY_ICONS: Record<Severity, string> = {
  critical: "🔴",
  high: "🟠",
  medium: "🟡",
  low: "🟢",
};

export function formatConfidence(confidence: Confidence): string {
  return typeof confidence === "number" ? confidence.toFixed(2) : confidence;
}

function formatLocation(diagnostic: Diagnostic): string {
  const parts = [diagnostic.file];
  if (diagnostic.functionName) parts.push(diagnostic.functionName);
  if (diagnostic.variable && diagnostic.sourceLine && diagnostic.sinkLine) {
    parts.push(`${diagnostic.variable} ${diagnostic.sourceLine} → ${diagnostic.sinkLine}`);
  }
  return parts.join(" / ");
}

/**
 * Findings ordered most severe first; ties keep report order.
 */
export function findingsBySeverity(report: ScanReport): Finding[] {
  return findingsOf(report)
    .map((finding, index) => ({ finding, index }))
    .sort(
      (a, b) =>
        SEVERITY_ORDER.indexOf(a.finding.severity) - SEVERITY_ORDER.indexOf(b.finding.severity) ||
        a.index - b.index,
    )
    .map(({ finding }) => finding);
}

export function renderMarkdown(report: ScanReport): string {
  const { summary } = report;
  const lines: string[] = [
    "# Null Pointer Dereference Report",
    "",
    `- **Target:** \`${escapeMarkdownInline(report.target)}\``,
    `- **Model:** ${report.model}`,
    `- **Generated:** ${report.generatedAt}`,
    `- **Tool:** ${report.tool.name} ${report.tool.version}`,
  ];
  if (report.aborted) {
    lines.push("- **Status:** aborted, results are partial");
  }

  lines.push(
    "",
    "## Summary",
    "",
    "| Files | Functions | Pairs judged | Findings |",
    "|---|---|---|---|",
    `| ${summary.filesScanned} | ${summary.functionsAnalyzed} | ${summary.pairsJudged} | ${summary.totalFindings} |`,
    "",
    "| Severity | Count |",
    "|---|---|",
    ...SEVERITY_ORDER.map((severity) => `| ${severity} | ${summary.bySeverity[severity]} |`),
    "",
    "| Status | Count |",
    "|---|---|",
    ...Object.entries(summary.byStatus).map(([status, count]) => `| ${status} | ${count} |`),
    "",
    "## Findings",
    "",
  );

  if (summary.totalFindings === 0) {
    lines.push("No null pointer dereferences found.", "");
  }

  for (const file of report.files) {
    if (file.functions.length === 0) continue;
    lines.push(`### \`${escapeMarkdownInline(file.file)}\``, "");

    for (const fn of file.functions) {
      lines.push(
        `#### \`${fn.functionName}\` (lines ${fn.startLine}-${fn.endLine})`,
        "",
        "```python",
        numberLines(fn.source, fn.startLine),
        "```",
        "",
      );
      for (const finding of fn.findings) {
        lines.push(
          `- ${SEVERITY_ICONS[finding.severity]} **${finding.severity}** \`${finding.variable}\`: line ${finding.sourceLine} → line ${finding.sinkLine}`,
          `  - Confidence: ${formatConfidence(finding.confidence)}`,
          `  - Condition: ${finding.condition}`,
          `  - Explanation: ${finding.explanation}`,
        );
      }
      lines.push("");
    }
  }

  if (report.diagnostics.length > 0) {
    lines.push("## Diagnostics", "", "| Kind | Location | Message |", "|---|---|---|");
    for (const diagnostic of report.diagnostics) {
      lines.push(
        `| ${diagnostic.kind} | ${escapeMarkdownInline(formatLocation(diagnostic))} | ${escapeMarkdownInline(diagnostic.message)} |`,
      );
    }
    lines.push("");
  }

  return lines.join("\n");
}

const HTML_STYLE = `
  body { font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", sans-serif; margin: 0; padding: 24px; background: #f7fafc; color: #2d3748; line-height: 1.5; }
  .container { max-width: 1100px; margin: 0 auto; }
  .stats { display: grid; grid-template-columns: repeat(auto-fit, minmax(160px, 1fr)); gap: 12px; }
  .stat-card { background: #fff; border-radius: 8px; padding: 16px; text-align: center; box-shadow: 0 1px 4px rgba(0,0,0,0.08); }
  .stat-card .number { font-size: 28px; font-weight: bold; }
  .finding { background: #fff; border-left: 6px solid #e53e3e; border-radius: 8px; padding: 16px; margin: 12px 0; box-shadow: 0 1px 4px rgba(0,0,0,0.08); }
  .severity-critical { border-left-color: #742a2a; }
  .severity-high { border-left-color: #e53e3e; }
  .severity-medium { border-left-color: #ed8936; }
  .severity-low { border-left-color: #48bb78; }
  .badge { display: inline-block; padding: 2px 10px; border-radius: 12px; color: #fff; font-size: 12px; font-weight: bold; text-transform: uppercase; background: #4a5568; }
  .badge-critical { background: #742a2a; }
  .badge-high { background: #c53030; }
  .badge-medium { background: #dd6b20; }
  .badge-low { background: #38a169; }
  pre { background: #edf2f7; padding: 12px; border-radius: 8px; overflow-x: auto; }
  pre code { padding: 0; }
  code { background: #edf2f7; padding: 1px 6px; border-radius: 4px; font-family: Menlo, Monaco, monospace; }
  table { border-collapse: collapse; width: 100%; background: #fff; }
  th, td { border: 1px solid #e2e8f0; padding: 6px 10px; text-align: left; }
`;

function renderStatCard(value: number, label: string): string {
  return `<div class="stat-card"><div class="number">${value}</div><div class="label">${escapeHtml(label)}</div></div>`;
}

function renderFunctionSourceHtml(fn: FunctionFindings): string {
  return [
    `<h4><code>${escapeHtml(fn.functionName)}</code> (lines ${fn.startLine}-${fn.endLine})</h4>`,
    `<pre><code>${escapeHtml(numberLines(fn.source, fn.startLine))}</code></pre>`,
  ].join("\n");
}

function renderFindingHtml(finding: Finding, functionName: string): string {
  const severity = escapeHtml(finding.severity);
  return [
    `<div class="finding severity-${severity}">`,
    `<h4><code>${escapeHtml(functionName)}</code> <span class="badge badge-${severity}">${severity}</span></h4>`,
    "<ul>",
    `<li><strong>Variable:</strong> <code>${escapeHtml(finding.variable)}</code></li>`,
    `<li><strong>Location:</strong> line ${finding.sourceLine} (None binding) → line ${finding.sinkLine} (dereference)</li>`,
    `<li><strong>Confidence:</strong> ${escapeHtml(formatConfidence(finding.confidence))}</li>`,
    `<li><strong>Condition:</strong> ${escapeHtml(finding.condition)}</li>`,
    `<li><strong>Explanation:</strong> ${escapeHtml(finding.explanation)}</li>`,
    "</ul>",
    "</div>",
  ].join("\n");
}

export function renderHtml(report: ScanReport): string {
  const { summary } = report;
  const body: string[] = [
    "<h1>Null Pointer Dereference Report</h1>",
    `<p>Target <code>${escapeHtml(report.target)}</code> · model ${escapeHtml(report.model)} · ${escapeHtml(report.generatedAt)} · ${escapeHtml(report.tool.name)} ${escapeHtml(report.tool.version)}</p>`,
  ];
  if (report.aborted) {
    body.push("<p><strong>Scan aborted, results are partial.</strong></p>");
  }

  body.push(
    "<h2>Summary</h2>",
    '<div class="stats">',
    renderStatCard(summary.totalFindings, "Findings"),
    renderStatCard(summary.filesScanned, "Files scanned"),
    renderStatCard(summary.functionsAnalyzed, "Functions analyzed"),
    renderStatCard(summary.pairsJudged, "Pairs judged"),
    ...SEVERITY_ORDER.filter((severity) => summary.bySeverity[severity] > 0).map((severity) =>
      renderStatCard(summary.bySeverity[severity], severity),
    ),
    "</div>",
    "<h2>Findings</h2>",
  );

  if (summary.totalFindings === 0) {
    body.push("<p>No null pointer dereferences found.</p>");
  }

  for (const file of report.files) {
    if (file.functions.length === 0) continue;
    body.push(`<h3><code>${escapeHtml(file.file)}</code></h3>`);
    for (const fn of file.functions) {
      body.push(renderFunctionSourceHtml(fn));
      for (const finding of fn.findings) {
        body.push(renderFindingHtml(finding, fn.functionName));
      }
    }
  }

  if (report.diagnostics.length > 0) {
    body.push(
      "<h2>Diagnostics</h2>",
      "<table>",
      "<tr><th>Kind</th><th>Location</th><th>Message</th></tr>",
      ...report.diagnostics.map(
        (diagnostic) =>
          `<tr><td>${escapeHtml(diagnostic.kind)}</td><td>${escapeHtml(formatLocation(diagnostic))}</td><td>${escapeHtml(diagnostic.message)}</td></tr>`,
      ),
      "</table>",
    );
  }

  return [
    "<!DOCTYPE html>",
    '<html lang="en">',
    "<head>",
    '<meta charset="UTF-8">',
    "<title>Null Pointer Dereference Report</title>",
    `<style>${HTML_STYLE}</style>`,
    "</head>",
    "<body>",
    '<div class="container">',
    ...body,
    "</div>",
    "</body>",
    "</html>",
    "",
  ].join("\n");
}

/**
 * One console line per finding, most severe first.
 */
export function renderSummaryTable(report: ScanReport): string {
  const rule = "=".repeat(70);
  const rows = findingsBySeverity(report).map(
    (finding, index) =>
      `${SEVERITY_ICONS[finding.severity]} #${index + 1} [${finding.severity.padEnd(8)}] ${finding.functionName.padEnd(20)} | ${finding.variable.padEnd(10)} | line ${String(finding.sourceLine).padStart(3)} → ${String(finding.sinkLine).padStart(3)} | ${finding.file}`,
  );
  return [rule, ...rows, rule].join("\n");
}
