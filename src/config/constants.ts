/**
 * Centralized Configuration Constants
 *
 * マジックナンバーを排除し、全既定値を一箇所に集約
 */

// ========================================
// Markers
// ========================================

export const DEFAULT_MARKERS = ["TODO", "FIXME", "BUG"] as const;

// ========================================
// Repository discovery
// ========================================

export const DISCOVERY = {
  /** 自分自身（レポート出力先）のディレクトリ名 */
  SELF_NAME: "super",
  /** リポジトリ判定に使うVCSディレクトリ */
  VCS_MARKER: ".git",
  /** 既定のルート（selfの親） */
  ROOT: "..",
} as const;

// ========================================
// File walking
// ========================================

export const WALK = {
  /** これより大きいファイルは走査しない (1 MiB) */
  MAX_FILE_SIZE_BYTES: 1024 * 1024,
  /** バイナリ判定に読む先頭バイト数 */
  BINARY_SAMPLE_BYTES: 1024,
} as const;

export const DEFAULT_EXCLUDED_DIRS: readonly string[] = [
  ".git", ".hg", ".svn", ".idea", ".vscode",
  "node_modules", "dist", "build", "out", "target", "__pycache__", ".venv", "venv",
  ".next", ".turbo", ".tox", ".mypy_cache", ".pytest_cache",
];

/** 拡張子の無いファイルは小文字化したファイル名で照合 ("dockerfile") */
export const DEFAULT_INCLUDE_EXTS: readonly string[] = [
  ".py", ".kt", ".java", ".go", ".ts", ".tsx", ".js", ".jsx",
  ".rb", ".rs", ".c", ".h", ".cpp", ".hpp", ".cs",
  ".yaml", ".yml", ".json", ".sh", ".bash", ".zsh",
  ".md", ".txt", ".toml", ".ini", ".tf", ".tfvars", ".dockerfile", "dockerfile",
];

// ========================================
// Classification
// ========================================

export const CLASSIFIER = {
  /** 先頭何文字までキーワードを探すか */
  PREFIX_LENGTH: 100,
  KEYWORDS: ["urgent", "blocker", "security", "prod", "production", "p0", "sev1", "severe"],
} as const;

// ========================================
// Output
// ========================================

export const OUTPUT = {
  MARKDOWN_PATH: "TODO.md",
  CONFIG_FILE: "todo-collector.json",
  REPORT_TITLE: "Consolidated TODOs",
} as const;

export const EXIT_CODE = {
  OK: 0,
  FAILURE: 1,
  CRITICAL_FOUND: 2,
} as const;
