import { existsSync, readdirSync, statSync } from "fs";
import { join, resolve } from "path";
import type { Repository } from "./types.js";
import { DISCOVERY } from "../config/constants.js";
import { RootUnreadableError, errorMessage } from "../errors.js";
import { logger } from "../core/logger.js";
import { compareCodeUnits } from "../utils/compare.js";

export interface ListRepositoriesOptions {
  /** 探索から除外するディレクトリ名 */
  selfName: string;
  /** 指定時は探索せずこの名前だけを使う */
  only?: readonly string[];
}

/**
 * ルート直下の兄弟リポジトリを名前順で列挙する
 *
 * ルート自体が読めない場合のみ RootUnreadableError。個々のエントリの失敗はスキップ。
 */
export function listRepositories(root: string, options: ListRepositoriesOptions): Repository[] {
  const rootPath = resolve(root);
  const entries = readRoot(rootPath);

  const names = options.only && options.only.length > 0
    ? [...new Set(options.only)]
    : entries.filter((name) => name !== options.selfName);

  const repositories: Repository[] = [];
  for (const name of names.sort(compareCodeUnits)) {
    if (!isPlainName(name)) {
      logger.warn("Skipping repository name outside the root", { name });
      continue;
    }
    const repoPath = join(rootPath, name);
    try {
      if (!statSync(repoPath).isDirectory()) {
        logger.debug("Skipping non-directory entry", { name });
        continue;
      }
      // 明示指定された場合は.gitの有無を問わない
      if (!options.only?.length && !existsSync(join(repoPath, DISCOVERY.VCS_MARKER))) {
        continue;
      }
      repositories.push({ name, path: repoPath });
    } catch (error) {
      logger.warn("Skipping unreadable repository entry", { name, error: errorMessage(error) });
    }
  }

  logger.debug("Repositories enumerated", { root: rootPath, count: repositories.length });
  return repositories;
}

// ルート直下の1階層のみ（"../x" や "a/b" は不可）
function isPlainName(name: string): boolean {
  return name.length > 0 && name !== "." && name !== ".." && !/[\\/]/.test(name);
}

function readRoot(rootPath: string): string[] {
  let isDirectory: boolean;
  try {
    isDirectory = statSync(rootPath).isDirectory();
  } catch (error) {
    throw new RootUnreadableError(rootPath, errorMessage(error));
  }
  if (!isDirectory) {
    throw new RootUnreadableError(rootPath, "not a directory");
  }

  try {
    return readdirSync(rootPath);
  } catch (error) {
    throw new RootUnreadableError(rootPath, errorMessage(error));
  }
}
