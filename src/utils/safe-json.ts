/**
 * Safe JSON Parse Utility
 *
 * try-catch内包のJSONパース＋zodスキーマ検証。
 * 失敗理由を呼び出し側で扱えるよう、nullではなく結果型で返す。
 */

import type { ZodType, ZodTypeDef } from "zod";

export type SafeJsonResult<T> =
  | { ok: true; data: T }
  | { ok: false; issues: string[] };

export function safeJsonParse<T>(
  content: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
): SafeJsonResult<T> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    return { ok: false, issues: [error instanceof Error ? error.message : String(error)] };
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    return {
      ok: false,
      issues: result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`),
    };
  }
  return { ok: true, data: result.data };
}
