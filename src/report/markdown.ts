import type { Marker } from "../scan/types.js";
import type { Report } from "./types.js";
import { OUTPUT } from "../config/constants.js";

/**
 * Markdown形式でフォーマット
 *
 * 生成時刻は含めない（同じツリーなら毎回同一バイト列になる）
 */
export function renderMarkdown(report: Report): string {
  const lines: string[] = [];

  // Header
  lines.push(`# ${OUTPUT.REPORT_TITLE}`);
  lines.push("");
  lines.push(`- Root scanned: \`${report.root}\``);
  lines.push(`- Repos scanned: ${report.repositories.length > 0 ? report.repositories.join(", ") : "(none)"}`);
  lines.push(`- Markers: ${report.markerKinds.join(", ")}`);
  if (report.skipped.length > 0) {
    lines.push(`- Skipped (unreadable): ${report.skipped.join(", ")}`);
  }
  lines.push("");

  lines.push(`**Total items:** ${report.total}`);
  lines.push(`**Critical items:** ${report.criticalCount}`);
  lines.push("");
  if (report.total === 0) {
    lines.push("> No TODO-like markers found in the scanned repositories.");
    lines.push("");
  }

  for (const section of report.sections) {
    lines.push(`## ${section.repository} (${section.total})`);
    lines.push("");

    for (const group of section.groups) {
      lines.push(`### ${group.kind} (${group.markers.length})`);
      lines.push("");
      for (const marker of group.markers) {
        lines.push(formatEntry(marker));
      }
      lines.push("");
    }
  }

  // 末尾の集計行
  lines.push("---");
  lines.push("");
  lines.push(`**Total items:** ${report.total}`);

  return lines.join("\n") + "\n";
}

export function formatEntry(marker: Marker): string {
  const reference = `\`${marker.filePath}:${marker.line}\``;
  const location = marker.link ? `[${reference}](${marker.link})` : reference;
  const tag = marker.tag ? ` **[${marker.tag}]**` : "";
  const critical = marker.critical ? " **critical**" : "";
  const body = marker.text || marker.snippet;
  return `- ${location}${tag}${critical} — ${body}`;
}
