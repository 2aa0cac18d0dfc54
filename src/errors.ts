/**
 * Collector Error Types
 *
 * 致命的エラーのみクラス化する。ファイル単位・リポジトリ単位の失敗は
 * その場でログしてスキップするため、ここには含めない。
 */

/**
 * ルートディレクトリが存在しない、または読めない
 */
export class RootUnreadableError extends Error {
  constructor(
    public readonly root: string,
    public readonly reason: string
  ) {
    super(`Cannot read root directory '${root}': ${reason}`);
    this.name = "RootUnreadableError";
  }
}

/**
 * レポートファイルの書き込みに失敗
 */
export class ReportWriteError extends Error {
  constructor(
    public readonly path: string,
    public readonly reason: string
  ) {
    super(`Cannot write report '${path}': ${reason}`);
    this.name = "ReportWriteError";
  }
}

/**
 * 設定ファイルまたはCLIオプションが不正
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
