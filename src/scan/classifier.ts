import { CLASSIFIER } from "../config/constants.js";
import { WORD_END, WORD_START, escapeRegExp } from "../utils/regex.js";

export interface ClassifierConfig {
  readonly keywords: readonly string[];
  /** キーワードの開始位置がこの文字数未満なら critical */
  readonly prefixLength: number;
}

export type Classifier = (text: string) => boolean;

export const DEFAULT_CLASSIFIER_CONFIG: ClassifierConfig = Object.freeze({
  keywords: Object.freeze([...CLASSIFIER.KEYWORDS]),
  prefixLength: CLASSIFIER.PREFIX_LENGTH,
});

/**
 * 重要度判定関数を作る
 *
 * 優先度は "TODO(P0): ..." のように先頭に書かれる前提なので、先頭 prefixLength 文字だけを見る。
 * 本文の奥にある "security vs. UX" のような記述で誤判定しないため。
 * キーワードは単語単位・大文字小文字無視（"reproductions" は "production" にマッチしない）。
 */
export function createClassifier(config: ClassifierConfig = DEFAULT_CLASSIFIER_CONFIG): Classifier {
  const keywords = config.keywords.map((k) => k.trim()).filter((k) => k.length > 0);
  const prefixLength = config.prefixLength;
  if (keywords.length === 0 || prefixLength <= 0) {
    return () => false;
  }

  const pattern = new RegExp(`${WORD_START}(?:${keywords.map(escapeRegExp).join("|")})${WORD_END}`, "iu");

  return (text: string): boolean => {
    const match = pattern.exec(text);
    return match !== null && match.index < prefixLength;
  };
}
