import { existsSync, mkdirSync, appendFileSync } from "fs";
import { join } from "path";
import { format } from "date-fns";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
}

export interface LoggerOptions {
  /** nullならファイル出力しない */
  logDir?: string | null;
  minLevel?: LogLevel;
  /** 既定はstderr。stdoutはサマリー行専用 */
  sink?: (line: string) => void;
}

const LOG_FLUSH_INTERVAL_MS = 100;

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export class Logger {
  private logDir: string | null;
  private minLevel: LogLevel;
  private sink: (line: string) => void;
  private levels: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
  };

  // バッファリング: 100ms間隔でバッチ書き込み
  private buffer: Map<string, string[]> = new Map();
  private flushTimer: ReturnType<typeof setInterval> | null = null;

  constructor(options: LoggerOptions = {}) {
    this.logDir = options.logDir ?? null;
    this.minLevel = options.minLevel ?? "info";
    this.sink = options.sink ?? ((line) => console.error(line));
    if (this.logDir) {
      this.ensureLogDir(this.logDir);
      this.startFlushTimer();
    }
  }

  private ensureLogDir(dir: string): void {
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  private startFlushTimer(): void {
    this.flushTimer = setInterval(() => {
      this.flush();
    }, LOG_FLUSH_INTERVAL_MS);
    // プロセス終了をブロックしない
    this.flushTimer.unref();
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getLevel(): LogLevel {
    return this.minLevel;
  }

  private shouldLog(level: LogLevel): boolean {
    return this.levels[level] >= this.levels[this.minLevel];
  }

  private formatEntry(entry: LogEntry): string {
    const contextStr = entry.context
      ? ` ${JSON.stringify(entry.context)}`
      : "";
    return `[${entry.timestamp}] [${entry.level.toUpperCase()}] ${entry.message}${contextStr}`;
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return;

    const now = new Date();
    const entry: LogEntry = {
      timestamp: format(now, "yyyy-MM-dd'T'HH:mm:ss.SSSxxx"),
      level,
      message,
      context,
    };

    const formatted = this.formatEntry(entry);
    this.sink(formatted);

    if (!this.logDir) return;

    // バッファに追加（日付ごとに分類）
    const logFile = join(this.logDir, `${format(now, "yyyy-MM-dd")}.log`);
    const existing = this.buffer.get(logFile);
    if (existing) {
      existing.push(formatted);
    } else {
      this.buffer.set(logFile, [formatted]);
    }
  }

  /**
   * バッファ内のログをファイルに書き出す
   */
  flush(): void {
    if (this.buffer.size === 0) return;

    for (const [logFile, lines] of this.buffer) {
      try {
        appendFileSync(logFile, lines.join("\n") + "\n");
      } catch (error) {
        // ロガー自身では記録できないのでsinkへ直接
        this.sink(`[logger] failed to append ${logFile}: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
    this.buffer.clear();
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log("debug", message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log("info", message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log("warn", message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log("error", message, context);
  }

  getLogFile(date: Date = new Date()): string | null {
    return this.logDir ? join(this.logDir, `${format(date, "yyyy-MM-dd")}.log`) : null;
  }

  /**
   * 終了時にバッファをフラッシュしタイマーを停止
   */
  shutdown(): void {
    this.flush();
    if (this.flushTimer) {
      clearInterval(this.flushTimer);
      this.flushTimer = null;
    }
  }
}

function levelFromEnv(): LogLevel {
  const raw = process.env.TODO_COLLECTOR_LOG_LEVEL;
  return raw && isLogLevel(raw) ? raw : "info";
}

export const logger = new Logger({
  logDir: process.env.TODO_COLLECTOR_LOG_DIR || null,
  minLevel: levelFromEnv(),
});
