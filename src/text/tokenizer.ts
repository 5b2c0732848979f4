/**
 * 空白区切りのチャンク分割と、チャンク内のタグ分割
 * @module text/tokenizer
 */

const WHITESPACE = /\s/;

function isWhitespace(ch: string): boolean {
  return WHITESPACE.test(ch);
}

/**
 * 空白で区切ったチャンクの配列（空白自体はトークンにならない）
 * @example
 * splitChunks('  a  b\nc ') // ['a', 'b', 'c']
 */
export function splitChunks(text: string): string[] {
  const chunks: string[] = [];
  let current = '';

  for (const ch of text) {
    if (isWhitespace(ch)) {
      if (current !== '') {
        chunks.push(current);
        current = '';
      }
    } else {
      current += ch;
    }
  }
  if (current !== '') {
    chunks.push(current);
  }

  return chunks;
}

/**
 * 空白を保持したまま分割する
 * 戻り値は チャンク, 空白, チャンク, … の順で常に奇数長。連結すると入力に戻る。
 * @example
 * splitPreserving(' a  b') // ['', ' ', 'a', '  ', 'b']
 */
export function splitPreserving(text: string): string[] {
  const pieces: string[] = [];
  let current = '';
  let inWhitespace = false;

  for (const ch of text) {
    const ws = isWhitespace(ch);
    if (ws !== inWhitespace) {
      pieces.push(current);
      current = '';
      inWhitespace = ws;
    }
    current += ch;
  }
  pieces.push(current);

  // 空白で終わる場合は末尾に空チャンクを補う
  if (inWhitespace) {
    pieces.push('');
  }

  return pieces;
}

/**
 * チャンクをタグ区切り文字で分割する
 * リテラル, タグ, リテラル, … の順に並ぶ。区切りが対になっていれば奇数長。
 * @example
 * splitTags('Hi,$NAME$!', '$') // ['Hi,', 'NAME', '!']
 */
export function splitTags(chunk: string, marker: string): string[] {
  return chunk.split(marker);
}

export function isTagSegment(index: number): boolean {
  return index % 2 === 1;
}
