import { formatISO } from "date-fns";
import type { Report } from "./types.js";
import { flattenReport } from "./aggregator.js";

export interface JsonReportItem {
  repository: string;
  file: string;
  line: number;
  kind: string;
  tag: string;
  text: string;
  snippet: string;
  critical: boolean;
  link: string;
}

export interface JsonReport {
  generatedAt: string;
  root: string;
  repositories: string[];
  skipped: string[];
  markers: string[];
  count: number;
  criticalCount: number;
  items: JsonReportItem[];
}

function toJsonReport(report: Report, generatedAt: Date): JsonReport {
  return {
    generatedAt: formatISO(generatedAt),
    root: report.root,
    repositories: [...report.repositories],
    skipped: [...report.skipped],
    markers: [...report.markerKinds],
    count: report.total,
    criticalCount: report.criticalCount,
    items: flattenReport(report).map((m) => ({
      repository: m.repository,
      file: m.filePath,
      line: m.line,
      kind: m.kind,
      tag: m.tag,
      text: m.text,
      snippet: m.snippet,
      critical: m.critical,
      link: m.link ?? "",
    })),
  };
}

export function renderJson(report: Report, generatedAt: Date = new Date()): string {
  return JSON.stringify(toJsonReport(report, generatedAt), null, 2) + "\n";
}
