/** 2セル分の幅で描画される記号 */
const WIDE_GLYPHS = new Set(['！', '？', '▼']);

/**
 * リテラル文字列の表示幅
 * 文字数（コードポイント単位）に、幅広記号1つにつき1を加算する。
 */
export function displayLength(text: string): number {
  let length = 0;
  for (const ch of text) {
    length += WIDE_GLYPHS.has(ch) ? 2 : 1;
  }
  return length;
}
