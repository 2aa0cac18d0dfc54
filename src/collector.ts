import { resolve } from "path";
import {
  createClassifier,
  extractMarkers,
  listRepositories,
  readTextFile,
  walkRepository,
  type Classifier,
  type ClassifierConfig,
  type Marker,
  type MarkerKind,
  type Repository,
  type WalkOptions,
} from "./scan/index.js";
import { aggregate, type Report } from "./report/index.js";
import { buildLineLink, detectRemote, type RemoteInfo } from "./git/remote.js";
import type { CollectorConfig } from "./config/config.js";
import { errorMessage } from "./errors.js";
import { logger } from "./core/logger.js";

export interface CollectOptions {
  root: string;
  selfName: string;
  /** 空なら兄弟ディレクトリを自動検出 */
  repos: readonly string[];
  markerKinds: readonly MarkerKind[];
  walk: WalkOptions;
  classifier: ClassifierConfig;
  remoteLinks: boolean;
  /** リンク用ブランチ。nullならリポジトリごとに検出 */
  branch: string | null;
}

export interface CollectDependencies {
  detectRemote: (repoDir: string) => RemoteInfo | null;
}

const defaultDependencies: CollectDependencies = { detectRemote: (dir) => detectRemote(dir) };

export function toCollectOptions(config: CollectorConfig): CollectOptions {
  return {
    root: config.root,
    selfName: config.selfName,
    repos: config.repos,
    markerKinds: config.markers,
    walk: {
      excludedDirs: new Set(config.excludedDirs),
      includeExts: new Set(config.includeExts),
      maxFileSizeBytes: config.maxFileSizeBytes,
    },
    classifier: Object.freeze({
      keywords: Object.freeze([...config.criticalWords]),
      prefixLength: config.criticalPrefixLength,
    }),
    remoteLinks: config.remoteLinks,
    branch: config.branch,
  };
}

/**
 * 列挙→走査→抽出→分類→集約 を1回実行してレポートを返す
 *
 * ルートの列挙失敗のみ例外（RootUnreadableError）。
 * ファイル・リポジトリ単位の失敗はログしてスキップする。
 */
export function collectTodos(options: CollectOptions, deps: CollectDependencies = defaultDependencies): Report {
  const root = resolve(options.root);
  const repositories = listRepositories(root, { selfName: options.selfName, only: options.repos });
  const isCritical = createClassifier(options.classifier);

  logger.info("Scanning repositories", { root, count: repositories.length });

  const markers: Marker[] = [];
  const scanned: string[] = [];
  const skipped: string[] = [];

  for (const repository of repositories) {
    try {
      const found = scanRepository(repository, options, isCritical, deps);
      markers.push(...found);
      scanned.push(repository.name);
      logger.debug("Repository scanned", { repository: repository.name, markers: found.length });
    } catch (error) {
      skipped.push(repository.name);
      logger.warn("Skipping unreadable repository", { repository: repository.name, error: errorMessage(error) });
    }
  }

  return aggregate(markers, {
    root,
    repositories: scanned,
    skipped,
    markerKinds: options.markerKinds,
  });
}

function scanRepository(
  repository: Repository,
  options: CollectOptions,
  isCritical: Classifier,
  deps: CollectDependencies
): Marker[] {
  const remote = options.remoteLinks ? deps.detectRemote(repository.path) : null;
  const branch = options.branch ?? remote?.defaultBranch ?? "main";

  const markers: Marker[] = [];
  for (const file of walkRepository(repository.path, options.walk)) {
    const content = readTextFile(file.absolutePath);
    if (content === null) continue;

    for (const raw of extractMarkers(content, options.markerKinds)) {
      const link = remote ? buildLineLink(remote, branch, file.relativePath, raw.line) : null;
      markers.push({
        ...raw,
        repository: repository.name,
        filePath: file.relativePath,
        critical: isCritical(raw.snippet),
        ...(link ? { link } : {}),
      });
    }
  }
  return markers;
}

export type { Report, RepositorySection, MarkerGroup } from "./report/index.js";
export type { Marker } from "./scan/index.js";
