/**
 * Atomic File Write Utility
 *
 * .tmpファイルに書き込み→renameでアトミックに置換
 * 書き込み途中で落ちても前回のレポートが半端に壊れない
 */

import { existsSync, mkdirSync, renameSync, rmSync, writeFileSync } from "fs";
import { dirname } from "path";

export function atomicWriteFileSync(filePath: string, data: string): void {
  const dir = dirname(filePath);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  const tmpPath = `${filePath}.tmp`;
  writeFileSync(tmpPath, data, "utf-8");
  try {
    renameSync(tmpPath, filePath);
  } catch (error) {
    rmSync(tmpPath, { force: true });
    throw error;
  }
}
