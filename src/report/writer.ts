import { resolve } from "path";
import { atomicWriteFileSync } from "../utils/atomic-write.js";
import { ReportWriteError, errorMessage } from "../errors.js";
import { logger } from "../core/logger.js";

/**
 * レポートを丸ごと書き換える。失敗は ReportWriteError（致命的）
 */
export function writeReport(filePath: string, content: string): string {
  const target = resolve(filePath);
  try {
    atomicWriteFileSync(target, content);
  } catch (error) {
    throw new ReportWriteError(target, errorMessage(error));
  }
  logger.debug("Report written", { path: target, bytes: Buffer.byteLength(content) });
  return target;
}
