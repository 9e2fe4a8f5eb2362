import type { Finding, ValidationReport, Verdict } from "@shared/kernel-phase-format";
import { displaySegmentName, overallVerdict, summarizeFindings } from "./consistencyEngine";

export const EXIT_PASS = 0;
export const EXIT_FAIL = 1;

const SEVERITY_WIDTH = "WARNING".length;

export type ReportRecord = {
  file: string;
  format: string;
  segments: { name: string; shape: number[] }[];
  findings: { severity: Finding["severity"]; checkId: string; message: string }[];
  verdict: Verdict;
};

export const formatSegmentLine = (index: number, name: string, shape: readonly number[]): string =>
  `  [${index}] ${displaySegmentName(name)} (${shape.join(", ")})`;

export const formatFindingLine = (entry: Finding): string =>
  `${entry.severity.padEnd(SEVERITY_WIDTH)} ${entry.checkId}: ${entry.message}`;

/**
 * Human-readable transcript: header, catalog listing, one line per finding
 * and a verdict footer. Identical reports render to identical text.
 */
export function renderTranscript(report: ValidationReport): string {
  const summary = summarizeFindings(report.findings);
  const lines = [
    `validating: ${report.file}`,
    `format: ${report.format}`,
    ...report.segments.map((segment, index) => formatSegmentLine(index, segment.name, segment.shape)),
    ...report.findings.map(formatFindingLine),
    `verdict: ${report.verdict} (${summary.PASS} passed, ${summary.FAIL} failed, ${summary.WARNING} warnings)`,
  ];
  return `${lines.join("\n")}\n`;
}

export function exitStatusFor(result: readonly Finding[] | Verdict): number {
  const verdict = typeof result === "string" ? result : overallVerdict(result);
  return verdict === "PASS" ? EXIT_PASS : EXIT_FAIL;
}

export function toReportRecord(report: ValidationReport): ReportRecord {
  return {
    file: report.file,
    format: report.format,
    segments: report.segments.map((segment) => ({ name: segment.name, shape: [...segment.shape] })),
    findings: report.findings.map((entry) => ({ ...entry })),
    verdict: report.verdict,
  };
}
