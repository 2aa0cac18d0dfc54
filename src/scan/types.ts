/**
 * タグ種別。既定は TODO / FIXME / BUG だが設定で拡張できる
 */
export type MarkerKind = string;

/**
 * 1ファイル内で見つかったマーカー（リポジトリ情報を付与する前）
 */
export interface RawMarker {
  readonly line: number;
  readonly kind: MarkerKind;
  /** TODO(@alice) の "@alice"。無ければ "" */
  readonly tag: string;
  /** タグ以降の本文。無ければ "" */
  readonly text: string;
  /** タグから行末まで。分類器の入力 */
  readonly snippet: string;
}

export interface Marker extends RawMarker {
  readonly repository: string;
  /** リポジトリルートからの相対パス（"/"区切り） */
  readonly filePath: string;
  readonly critical: boolean;
  readonly link?: string;
}

export interface WalkedFile {
  readonly absolutePath: string;
  readonly relativePath: string;
  readonly size: number;
}

export interface WalkOptions {
  excludedDirs: ReadonlySet<string>;
  /** 空なら全ファイル対象 */
  includeExts: ReadonlySet<string>;
  maxFileSizeBytes: number;
}

export interface Repository {
  readonly name: string;
  readonly path: string;
}
