import type { MarkerKind, RawMarker } from "./types.js";
import { WORD_END, WORD_START, escapeRegExp } from "../utils/regex.js";

/**
 * マーカー行の正規表現を組み立てる
 *
 * - タグは単語境界必須・大文字小文字を区別（TODOLIST / MY_TODO / ÜTODO / todo は対象外）
 * - タグ直後の (payload) は tag として取り出す
 * - その後の ":" か "-" を1つ読み飛ばし、残りを本文とする
 */
function buildMarkerPattern(kinds: readonly MarkerKind[]): RegExp | null {
  if (kinds.length === 0) return null;
  // 長いタグを先に試す（FIXME と FIX が両方ある場合など）
  const alternatives = [...kinds]
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp)
    .join("|");
  return new RegExp(
    `${WORD_START}(${alternatives})${WORD_END}(?:\\s*\\(\\s*([^)]*?)\\s*\\))?\\s*[:\\-]?([\\s\\S]*)$`,
    "u"
  );
}

/**
 * ファイル内容からマーカーを1行ずつ取り出す
 *
 * 1物理行につき最初のタグのみ。継続行の結合はしない。
 * コメント内か文字列リテラル内かは区別しない（ヒューリスティック）。
 */
export function* extractMarkers(content: string, kinds: readonly MarkerKind[]): Generator<RawMarker> {
  const pattern = buildMarkerPattern(kinds);
  if (!pattern) return;

  const lines = content.split(/\r\n|\r|\n/);
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    const match = pattern.exec(line);
    if (!match) continue;

    const [, kind, tag = "", rest = ""] = match;
    yield {
      line: i + 1,
      kind,
      tag: tag.trim(),
      text: rest.trim(),
      snippet: line.slice(match.index).trim(),
    };
  }
}
