import { existsSync, readFileSync } from "fs";
import { resolve } from "path";
import { z } from "zod";
import {
  CLASSIFIER,
  DEFAULT_EXCLUDED_DIRS,
  DEFAULT_INCLUDE_EXTS,
  DEFAULT_MARKERS,
  DISCOVERY,
  OUTPUT,
  WALK,
} from "./constants.js";
import { logger, type LogLevel } from "../core/logger.js";
import { ConfigError, errorMessage } from "../errors.js";
import { safeJsonParse } from "../utils/safe-json.js";

const nonEmpty = z.string().trim().min(1);

export const ConfigFileSchema = z
  .object({
    root: nonEmpty.optional(),
    self: nonEmpty.optional(),
    repos: z.array(nonEmpty).optional(),
    outMarkdown: nonEmpty.optional(),
    outJson: nonEmpty.optional(),
    markers: z.array(nonEmpty).min(1).optional(),
    includeExts: z.array(nonEmpty).optional(),
    extraExclude: z.array(nonEmpty).optional(),
    maxFileSizeBytes: z.number().int().positive().optional(),
    criticalWords: z.array(nonEmpty).optional(),
    criticalPrefixLength: z.number().int().positive().optional(),
    remoteLinks: z.boolean().optional(),
    branch: nonEmpty.optional(),
    failOnCritical: z.boolean().optional(),
    logLevel: z.enum(["debug", "info", "warn", "error"]).optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * commanderから受け取るオプション（未指定はundefined）
 */
export interface CliOptions {
  root?: string;
  self?: string;
  repos?: string[];
  outMd?: string;
  outJson?: string;
  marker?: string[];
  includeExt?: string[];
  extraExclude?: string[];
  maxFileSize?: number;
  criticalWords?: string[];
  /** --no-remote-links 指定時のみ false */
  remoteLinks?: boolean;
  branch?: string;
  failOnCritical?: boolean;
  config?: string;
  logLevel?: LogLevel;
}

export interface CollectorConfig {
  root: string;
  selfName: string;
  repos: string[];
  outMarkdown: string;
  outJson: string | null;
  markers: string[];
  includeExts: string[];
  excludedDirs: string[];
  maxFileSizeBytes: number;
  criticalWords: string[];
  criticalPrefixLength: number;
  remoteLinks: boolean;
  branch: string | null;
  failOnCritical: boolean;
  /** nullなら環境変数由来のレベルを維持 */
  logLevel: LogLevel | null;
}

/**
 * 設定ファイルを読み込む
 * 明示指定（--config）されたファイルが無い場合のみエラー
 */
export function loadConfigFile(path: string | undefined): ConfigFile {
  const configPath = resolve(path ?? OUTPUT.CONFIG_FILE);

  if (!existsSync(configPath)) {
    if (path) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    return {};
  }

  let content: string;
  try {
    content = readFileSync(configPath, "utf-8");
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${configPath}`, [errorMessage(error)]);
  }

  const result = safeJsonParse(content, ConfigFileSchema);
  if (!result.ok) {
    throw new ConfigError(`Invalid config file ${configPath}`, result.issues);
  }

  logger.debug("Loaded config file", { path: configPath });
  return result.data;
}

/**
 * 既定値 < 設定ファイル < CLI の順で上書き
 */
export function resolveConfig(cli: CliOptions, file: ConfigFile = {}): CollectorConfig {
  const markers = unique((cli.marker ?? file.markers ?? [...DEFAULT_MARKERS]).map((m) => m.trim().toUpperCase()).filter(Boolean));
  if (markers.length === 0) {
    throw new ConfigError("At least one marker is required");
  }

  return {
    root: cli.root ?? file.root ?? DISCOVERY.ROOT,
    selfName: cli.self ?? file.self ?? DISCOVERY.SELF_NAME,
    repos: unique(cli.repos ?? file.repos ?? []),
    outMarkdown: cli.outMd ?? file.outMarkdown ?? OUTPUT.MARKDOWN_PATH,
    outJson: cli.outJson ?? file.outJson ?? null,
    markers,
    includeExts: unique((cli.includeExt ?? file.includeExts ?? [...DEFAULT_INCLUDE_EXTS]).map((e) => e.trim().toLowerCase()).filter(Boolean)),
    excludedDirs: unique([...DEFAULT_EXCLUDED_DIRS, ...(file.extraExclude ?? []), ...(cli.extraExclude ?? [])]),
    maxFileSizeBytes: cli.maxFileSize ?? file.maxFileSizeBytes ?? WALK.MAX_FILE_SIZE_BYTES,
    criticalWords: unique(cli.criticalWords ?? file.criticalWords ?? [...CLASSIFIER.KEYWORDS]),
    criticalPrefixLength: file.criticalPrefixLength ?? CLASSIFIER.PREFIX_LENGTH,
    remoteLinks: cli.remoteLinks === false ? false : file.remoteLinks ?? true,
    branch: cli.branch ?? file.branch ?? null,
    failOnCritical: cli.failOnCritical ?? file.failOnCritical ?? false,
    logLevel: cli.logLevel ?? file.logLevel ?? null,
  };
}

function unique(values: readonly string[]): string[] {
  return [...new Set(values)];
}
