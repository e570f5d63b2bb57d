/**
 * Report export: JSON, CSV, HTML, plain text and PDF
 */

import { createWriteStream, mkdirSync, writeFileSync } from "fs";
import { join } from "path";
import { createObjectCsvStringifier, createObjectCsvWriter } from "csv-writer";
import { marked } from "marked";
import PDFDocument from "pdfkit";
import { logger } from "../logging.js";
import type { SuiteReport, TestResult, TestStatus } from "./types.js";

export type ReportFormat = "json" | "csv" | "html" | "text" | "pdf";

export const REPORT_FORMATS: readonly ReportFormat[] = ["json", "csv", "html", "text", "pdf"];

export const DEFAULT_REPORT_FORMATS: readonly ReportFormat[] = ["json", "csv", "html", "text"];

const EXTENSIONS: Record<ReportFormat, string> = {
  json: "json",
  csv: "csv",
  html: "html",
  text: "txt",
  pdf: "pdf",
};

export const CSV_HEADER = [
  { id: "testId", title: "Test ID" },
  { id: "module", title: "Module" },
  { id: "requirementId", title: "Requirement" },
  { id: "requirementName", title: "Requirement Name" },
  { id: "name", title: "Test Name" },
  { id: "expectation", title: "Expectation" },
  { id: "status", title: "Status" },
  { id: "message", title: "Message" },
  { id: "errorCode", title: "Error Code" },
  { id: "durationMs", title: "Duration (ms)" },
  { id: "timestamp", title: "Timestamp" },
];

const STATUS_COLORS: Record<TestStatus, string> = {
  PASS: "#107c10",
  FAIL: "#d13438",
  ERROR: "#ff8c00",
  SKIPPED: "#666666",
};

export interface ExportedFile {
  format: ReportFormat;
  path: string;
}

export function reportStem(runId: string): string {
  return `rbac-test-report-${runId}`;
}

export function toCsvRecord(result: TestResult): Record<string, string | number> {
  return {
    testId: result.id,
    module: result.module,
    requirementId: result.requirementId,
    requirementName: result.requirementName,
    name: result.name,
    expectation: result.expectation,
    status: result.status,
    message: result.message,
    errorCode: result.errorCode ?? "",
    durationMs: result.durationMs,
    timestamp: result.timestamp,
  };
}

export function renderJson(report: SuiteReport): string {
  return JSON.stringify(report, null, 2);
}

export function renderCsv(report: SuiteReport): string {
  const stringifier = createObjectCsvStringifier({ header: CSV_HEADER });
  return stringifier.getHeaderString() + stringifier.stringifyRecords(report.results.map(toCsvRecord));
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

/**
 * Text from Azure (error messages, role names) placed into markdown: marked passes raw HTML
 * through, and a pipe would split a table cell
 */
export function escapeMarkdownText(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/\|/g, "\\|");
}

/**
 * Run summary as markdown; the HTML report renders it and MCP responses return it
 */
export function renderSummaryMarkdown(report: SuiteReport): string {
  const { metadata, summary } = report;
  let md = `# RBAC Test Report\n\n`;
  md += `| Property | Value |\n|---|---|\n`;
  md += `| Run ID | ${metadata.runId} |\n`;
  md += `| Subscription | ${metadata.subscriptionId} |\n`;
  md += `| Region | ${metadata.region} |\n`;
  md += `| Resource Group | ${metadata.resourceGroup} |\n`;
  if (metadata.roleName) md += `| Custom Role | ${escapeMarkdownText(metadata.roleName)} |\n`;
  md += `| Modules | ${metadata.modules.join(", ")} |\n`;
  md += `| Started | ${metadata.startedAt} |\n`;
  md += `| Duration | ${(metadata.durationMs / 1000).toFixed(1)}s |\n\n`;

  if (metadata.fatalError) {
    md += `> **Run aborted:** ${escapeMarkdownText(metadata.fatalError)}\n\n`;
  }

  md += `## Summary\n\n`;
  md += `- **Total:** ${summary.total}\n`;
  md += `- **Passed:** ${summary.passed}\n`;
  md += `- **Failed:** ${summary.failed}\n`;
  md += `- **Errors:** ${summary.errors}\n`;
  md += `- **Skipped:** ${summary.skipped}\n`;
  md += `- **Pass rate:** ${summary.passRate}%\n`;

  if (summary.byRequirement.length > 0) {
    md += `\n## By Requirement\n\n`;
    md += `| Requirement | Name | Total | Pass | Fail | Error | Skipped |\n|---|---|---|---|---|---|---|\n`;
    for (const r of summary.byRequirement) {
      md += `| ${r.requirementId} | ${r.requirementName} | ${r.total} | ${r.passed} | ${r.failed} | ${r.errors} | ${r.skipped} |\n`;
    }
  }

  if (report.cleanup) {
    md += `\n## Cleanup\n\n`;
    md += `${report.cleanup.succeeded} succeeded, ${report.cleanup.failed} failed\n`;
  }
  return md;
}

export function renderResultsMarkdown(results: readonly TestResult[]): string {
  let md = `| Test | Requirement | Name | Expectation | Status | Message |\n|---|---|---|---|---|---|\n`;
  for (const r of results) {
    md += `| ${r.id} | ${r.requirementId} | ${r.name} | ${r.expectation} | ${r.status} | ${escapeMarkdownText(r.message)} |\n`;
  }
  return md;
}

export function renderHtml(report: SuiteReport): string {
  const summaryHtml = marked.parser(marked.lexer(renderSummaryMarkdown(report)));
  const rows = report.results.map(r => `
        <tr>
          <td>${escapeHtml(r.id)}</td>
          <td>${escapeHtml(r.requirementId)}</td>
          <td>${escapeHtml(r.name)}</td>
          <td>${escapeHtml(r.expectation)}</td>
          <td class="status-${r.status.toLowerCase()}">${r.status}</td>
          <td>${escapeHtml(r.message)}</td>
          <td>${r.durationMs}</td>
        </tr>`).join("");

  return `<!DOCTYPE html>
<html>
<head>
  <meta charset="UTF-8">
  <title>RBAC Test Report ${escapeHtml(report.metadata.runId)}</title>
  <style>
    body { font-family: 'Segoe UI', Tahoma, Geneva, Verdana, sans-serif; margin: 40px; background: #f5f5f5; }
    .container { background: white; padding: 30px; border-radius: 8px; box-shadow: 0 2px 4px rgba(0,0,0,0.1); }
    h1 { color: #0078d4; border-bottom: 3px solid #0078d4; padding-bottom: 10px; }
    h2 { color: #333; margin-top: 30px; }
    table { width: 100%; border-collapse: collapse; margin: 20px 0; }
    th { background: #0078d4; color: white; padding: 12px; text-align: left; }
    td { padding: 10px; border-bottom: 1px solid #ddd; vertical-align: top; }
    tr:hover { background: #f9f9f9; }
    .status-pass { color: ${STATUS_COLORS.PASS}; font-weight: bold; }
    .status-fail { color: ${STATUS_COLORS.FAIL}; font-weight: bold; }
    .status-error { color: ${STATUS_COLORS.ERROR}; font-weight: bold; }
    .status-skipped { color: ${STATUS_COLORS.SKIPPED}; }
  </style>
</head>
<body>
  <div class="container">
    ${summaryHtml}
    <h2>Results</h2>
    <table>
      <tr><th>Test</th><th>Requirement</th><th>Name</th><th>Expectation</th><th>Status</th><th>Message</th><th>ms</th></tr>${rows}
    </table>
    <p class="metadata">Generated by azure-admin-toolkit ${escapeHtml(report.metadata.toolVersion)}</p>
  </div>
</body>
</html>
`;
}

const RULE = "=".repeat(80);

export function renderText(report: SuiteReport): string {
  const { metadata, summary } = report;
  const lines: string[] = [
    RULE,
    "RBAC TEST REPORT",
    RULE,
    `Run ID:         ${metadata.runId}`,
    `Subscription:   ${metadata.subscriptionId}`,
    `Region:         ${metadata.region}`,
    `Resource group: ${metadata.resourceGroup}`,
  ];
  if (metadata.roleName) lines.push(`Custom role:    ${metadata.roleName}`);
  lines.push(`Started:        ${metadata.startedAt}`);
  lines.push(`Finished:       ${metadata.finishedAt}`);
  if (metadata.fatalError) lines.push(`Fatal error:    ${metadata.fatalError}`);

  lines.push("", "SUMMARY", "-".repeat(80));
  lines.push(
    `Total: ${summary.total}  Passed: ${summary.passed}  Failed: ${summary.failed}  ` +
      `Errors: ${summary.errors}  Skipped: ${summary.skipped}  Pass rate: ${summary.passRate}%`
  );

  lines.push("", "RESULTS", "-".repeat(80));
  for (const r of report.results) {
    lines.push(`${`[${r.status}]`.padEnd(10)}${r.id.padEnd(10)}${r.name}`);
    lines.push(`${" ".repeat(20)}${r.message}`);
  }

  if (report.cleanup) {
    lines.push("", "CLEANUP", "-".repeat(80));
    for (const outcome of report.cleanup.outcomes) {
      lines.push(`${outcome.status.padEnd(14)}${outcome.description}`);
    }
  }
  lines.push(RULE);
  return lines.join("\n") + "\n";
}

const ABORTED = "Run aborted:";

export function pdfHeaderLines(report: SuiteReport): string[] {
  const { metadata } = report;
  const lines = [`Run: ${metadata.runId}  |  Subscription: ${metadata.subscriptionId}  |  Region: ${metadata.region}`];
  if (metadata.roleName) lines.push(`Custom role: ${metadata.roleName}`);
  if (metadata.fatalError) lines.push(`${ABORTED} ${metadata.fatalError}`);
  return lines;
}

export async function writePdf(report: SuiteReport, path: string): Promise<void> {
  const { summary } = report;
  const doc = new PDFDocument({ margin: 50 });
  const stream = createWriteStream(path);
  const finished = new Promise<void>((resolve, reject) => {
    stream.on("finish", () => resolve());
    stream.on("error", reject);
  });
  doc.pipe(stream);

  doc.fontSize(24).fillColor("#0078d4").text("RBAC Test Report", { align: "center" });
  doc.moveDown();

  doc.fontSize(10);
  for (const line of pdfHeaderLines(report)) {
    doc.fillColor(line.startsWith(ABORTED) ? STATUS_COLORS.FAIL : "#666").text(line);
  }
  doc.moveDown(2);

  doc.fontSize(16).fillColor("#000").text("Summary");
  doc.moveDown(0.5);
  doc.fontSize(12)
    .text(`Total: ${summary.total}`)
    .fillColor(STATUS_COLORS.PASS).text(`Passed: ${summary.passed}`)
    .fillColor(STATUS_COLORS.FAIL).text(`Failed: ${summary.failed}`)
    .fillColor(STATUS_COLORS.ERROR).text(`Errors: ${summary.errors}`)
    .fillColor(STATUS_COLORS.SKIPPED).text(`Skipped: ${summary.skipped}`)
    .fillColor("#000").text(`Pass rate: ${summary.passRate}%`);
  doc.moveDown(2);

  doc.fontSize(16).fillColor("#000").text("Results");
  doc.moveDown();
  for (const r of report.results) {
    doc.fontSize(10)
      .fillColor(STATUS_COLORS[r.status]).text(`[${r.status}] `, { continued: true })
      .fillColor("#000").text(`${r.id} ${r.name}: ${r.message}`);
  }

  doc.end();
  await finished;
}

/**
 * Write each requested format into outputDir; returns what was written
 */
export async function exportReport(
  report: SuiteReport,
  formats: readonly ReportFormat[],
  outputDir: string
): Promise<ExportedFile[]> {
  mkdirSync(outputDir, { recursive: true });
  const stem = reportStem(report.metadata.runId);
  const written: ExportedFile[] = [];

  for (const format of formats) {
    const path = join(outputDir, `${stem}.${EXTENSIONS[format]}`);
    switch (format) {
      case "json":
        writeFileSync(path, renderJson(report), "utf-8");
        break;
      case "csv": {
        const csvWriter = createObjectCsvWriter({ path, header: CSV_HEADER });
        await csvWriter.writeRecords(report.results.map(toCsvRecord));
        break;
      }
      case "html":
        writeFileSync(path, renderHtml(report), "utf-8");
        break;
      case "text":
        writeFileSync(path, renderText(report), "utf-8");
        break;
      case "pdf":
        await writePdf(report, path);
        break;
    }
    written.push({ format, path });
    logger.info(`Report written: ${path}`, undefined, "export");
  }
  return written;
}
