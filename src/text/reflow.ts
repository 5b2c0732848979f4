import { LengthTable } from '../types/projectConfig';
import logger from '../utils/logger';
import { displayLength } from './displayLength';
import { splitChunks, splitTags, isTagSegment } from './tokenizer';

export const DEFAULT_MAX_LENGTH = 30;

export interface ReflowOptions {
  tagLengths: LengthTable;
  marker: string;
  maxLength?: number;
}

/**
 * チャンク1つの表示幅
 * リテラル部分は表示幅、タグ部分は幅テーブルの値。未登録のタグは0として警告する。
 */
export function chunkLength(
  chunk: string,
  tagLengths: LengthTable,
  marker: string
): number {
  const segments = splitTags(chunk, marker);
  let length = 0;

  for (let i = 0; i < segments.length; i++) {
    if (!isTagSegment(i)) {
      length += displayLength(segments[i]);
      continue;
    }

    const tagLength = tagLengths.get(segments[i]);
    if (tagLength === undefined) {
      logger.warn('Tag has no configured length, counting it as zero', {
        tag: segments[i],
        chunk,
      });
      continue;
    }
    length += tagLength;
  }

  return length;
}

/**
 * 最大幅に収まるようチャンクを貪欲に詰め直す
 * チャンク（単語・タグ）の途中では絶対に改行しない。単独で最大幅を超えるチャンクはそのまま置く。
 */
export function reflow(text: string, options: ReflowOptions): string {
  const maxLength = options.maxLength ?? DEFAULT_MAX_LENGTH;
  const lines: string[] = [];
  let current: string[] = [];
  let currentLength = 0;

  for (const chunk of splitChunks(text)) {
    const length = chunkLength(chunk, options.tagLengths, options.marker);
    if (length > maxLength) {
      logger.warn('Chunk is longer than the line width', {
        chunk,
        length,
        maxLength,
      });
    }

    // 区切りの空白1つにつき1セル
    const tentative = currentLength + current.length + length;
    if (tentative > maxLength && (current.length > 0 || lines.length > 0)) {
      lines.push(current.join(' '));
      current = [chunk];
      currentLength = length;
    } else {
      current.push(chunk);
      currentLength += length;
    }
  }

  if (current.length > 0) {
    lines.push(current.join(' '));
  }

  return lines.join('\n');
}

/**
 * 折り返しを外して1行にする
 */
export function unwrap(text: string): string {
  return splitChunks(text).join(' ');
}
