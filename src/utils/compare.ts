/**
 * ロケール非依存の文字列比較
 *
 * localeCompareは実行環境のICUで順序が変わるため、レポートの並びには使わない
 */
export function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
