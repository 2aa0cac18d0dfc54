import type { Marker, MarkerKind } from "../scan/types.js";

export interface MarkerGroup {
  readonly kind: MarkerKind;
  readonly markers: readonly Marker[];
}

export interface RepositorySection {
  readonly repository: string;
  readonly total: number;
  readonly groups: readonly MarkerGroup[];
}

export interface ReportMeta {
  /** 絶対パス */
  readonly root: string;
  /** 走査したリポジトリ（マーカー0件も含む） */
  readonly repositories: readonly string[];
  /** 読めずにスキップしたリポジトリ */
  readonly skipped: readonly string[];
  readonly markerKinds: readonly MarkerKind[];
}

export interface Report extends ReportMeta {
  readonly sections: readonly RepositorySection[];
  readonly total: number;
  readonly criticalCount: number;
  /** 参考情報。終了コードを決めるのは呼び出し側 */
  readonly hasCritical: boolean;
}
