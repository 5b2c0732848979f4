import { splitChunks, splitTags, isTagSegment } from './tokenizer';

// ひらがな・カタカナ・漢字・半角カナ、句読点（。、）
const SOURCE_SCRIPT = /[\u3040-\u309f\u30a0-\u30ff\u3400-\u4dbf\u4e00-\u9fff\uff61-\uff9f\u3001\u3002]/;

// 翻訳後のテキストにも残りうる記号
const SOURCE_SCRIPT_EXTRA = /[\u3040-\u309f\u30a0-\u30ff\u3400-\u4dbf\u4e00-\u9fff\uff61-\uff9f\u3001\u3002\uff5e\u266a]/;

/**
 * タグの外側に原文の文字が含まれているか判定する
 * タグ名の中は検査しない。
 */
export function containsSourceScript(
  text: string,
  marker: string,
  includeExtra: boolean = false
): boolean {
  const pattern = includeExtra ? SOURCE_SCRIPT_EXTRA : SOURCE_SCRIPT;

  for (const chunk of splitChunks(text)) {
    const segments = splitTags(chunk, marker);
    for (let i = 0; i < segments.length; i++) {
      if (isTagSegment(i)) continue;
      if (pattern.test(segments[i])) {
        return true;
      }
    }
  }

  return false;
}
