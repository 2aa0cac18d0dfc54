import { readdirSync, readFileSync, statSync, type Dirent } from "fs";
import { extname, join } from "path";
import type { WalkedFile, WalkOptions } from "./types.js";
import { WALK } from "../config/constants.js";
import { errorMessage } from "../errors.js";
import { logger } from "../core/logger.js";
import { compareCodeUnits } from "../utils/compare.js";

/**
 * リポジトリ配下の走査対象ファイルを列挙する
 *
 * 返り値は遅延評価で、for...of のたびにツリーを読み直す。
 * 除外ディレクトリ・ドットディレクトリ・サイズ上限超過はスキップ。
 * シンボリックリンクはファイルなら辿り、ディレクトリなら降りない。
 * リポジトリ直下のreaddir失敗だけは反復時に例外になる。
 */
export function walkRepository(repoDir: string, options: WalkOptions): Iterable<WalkedFile> {
  return {
    [Symbol.iterator]: () => walkDirectory(repoDir, "", options),
  };
}

function* walkDirectory(root: string, relDir: string, options: WalkOptions): Generator<WalkedFile> {
  const dir = relDir ? join(root, relDir) : root;

  let entries: Dirent[];
  try {
    entries = readdirSync(dir, { withFileTypes: true });
  } catch (error) {
    // リポジトリ直下が読めない場合は呼び出し側でリポジトリごとスキップ
    if (!relDir) throw error;
    logger.warn("Skipping unreadable directory", { dir, error: errorMessage(error) });
    return;
  }
  entries.sort((a, b) => compareCodeUnits(a.name, b.name));

  for (const entry of entries) {
    const relativePath = relDir ? `${relDir}/${entry.name}` : entry.name;
    const absolutePath = join(dir, entry.name);

    if (entry.isDirectory()) {
      if (!shouldExcludeDir(entry.name, options.excludedDirs)) {
        yield* walkDirectory(root, relativePath, options);
      }
      continue;
    }

    if (!entry.isFile() && !entry.isSymbolicLink()) continue;
    if (!matchesExtension(entry.name, options.includeExts)) continue;

    let size: number;
    try {
      const stat = statSync(absolutePath);
      if (!stat.isFile()) continue;
      size = stat.size;
    } catch (error) {
      // 走査中に消えた・壊れたリンク
      logger.debug("Skipping file that cannot be stat'ed", { file: absolutePath, error: errorMessage(error) });
      continue;
    }

    if (size > options.maxFileSizeBytes) {
      logger.debug("Skipping oversized file", { file: absolutePath, size });
      continue;
    }

    yield { absolutePath, relativePath, size };
  }
}

export function shouldExcludeDir(name: string, excluded: ReadonlySet<string>): boolean {
  return excluded.has(name) || name.startsWith(".");
}

export function matchesExtension(fileName: string, includeExts: ReadonlySet<string>): boolean {
  if (includeExts.size === 0) return true;
  const ext = extname(fileName).toLowerCase();
  return includeExts.has(ext || fileName.toLowerCase());
}

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * テキストとして読めるファイルのみ内容を返す
 * NULバイトを含む・UTF-8として不正・読み込み失敗の場合はnull
 */
export function readTextFile(path: string): string | null {
  let buffer: Buffer;
  try {
    buffer = readFileSync(path);
  } catch (error) {
    logger.debug("Skipping unreadable file", { file: path, error: errorMessage(error) });
    return null;
  }

  if (buffer.subarray(0, WALK.BINARY_SAMPLE_BYTES).includes(0)) {
    logger.debug("Skipping binary file", { file: path });
    return null;
  }

  try {
    return utf8.decode(buffer);
  } catch (error) {
    logger.debug("Skipping file that is not valid UTF-8", { file: path, error: errorMessage(error) });
    return null;
  }
}
