import type { Marker } from "../scan/types.js";
import type { MarkerGroup, Report, ReportMeta, RepositorySection } from "./types.js";
import { compareCodeUnits } from "../utils/compare.js";

/**
 * 重複判定キー。(repository, filePath, line, kind, text) が同じなら同一
 */
function markerKey(marker: Marker): string {
  return JSON.stringify([marker.repository, marker.filePath, marker.line, marker.kind, marker.text]);
}

function compareMarkers(a: Marker, b: Marker): number {
  return (
    compareCodeUnits(a.repository, b.repository) ||
    compareCodeUnits(a.filePath, b.filePath) ||
    a.line - b.line ||
    compareCodeUnits(a.kind, b.kind) ||
    compareCodeUnits(a.text, b.text) ||
    compareCodeUnits(a.tag, b.tag) ||
    compareCodeUnits(a.snippet, b.snippet) ||
    compareCodeUnits(a.link ?? "", b.link ?? "")
  );
}

/**
 * マーカーを重複除去・整列し、リポジトリ→タグ種別でまとめる
 *
 * 入力順に依存しない（先にソートしてから隣接重複を落とす）。
 */
export function aggregate(markers: Iterable<Marker>, meta: ReportMeta): Report {
  const sorted = [...markers].sort(compareMarkers);

  const unique: Marker[] = [];
  let lastKey: string | null = null;
  for (const marker of sorted) {
    const key = markerKey(marker);
    if (key === lastKey) continue;
    unique.push(marker);
    lastKey = key;
  }

  const byRepository = new Map<string, Marker[]>();
  for (const marker of unique) {
    const existing = byRepository.get(marker.repository);
    if (existing) {
      existing.push(marker);
    } else {
      byRepository.set(marker.repository, [marker]);
    }
  }

  const sections: RepositorySection[] = [];
  for (const [repository, items] of byRepository) {
    sections.push({ repository, total: items.length, groups: groupByKind(items) });
  }

  const criticalCount = unique.filter((m) => m.critical).length;

  return {
    ...meta,
    sections,
    total: unique.length,
    criticalCount,
    hasCritical: criticalCount > 0,
  };
}

function groupByKind(items: readonly Marker[]): MarkerGroup[] {
  const byKind = new Map<string, Marker[]>();
  for (const item of items) {
    const existing = byKind.get(item.kind);
    if (existing) {
      existing.push(item);
    } else {
      byKind.set(item.kind, [item]);
    }
  }

  return [...byKind.keys()]
    .sort(compareCodeUnits)
    .map((kind) => ({ kind, markers: byKind.get(kind) ?? [] }));
}

export function flattenReport(report: Report): Marker[] {
  return report.sections.flatMap((section) => section.groups.flatMap((group) => group.markers));
}
