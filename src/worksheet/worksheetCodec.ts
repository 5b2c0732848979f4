import { Entry, EntrySet } from '../types';
import { SequenceError } from '../services/errors';
import logger from '../utils/logger';

export const WORKSHEET_EXTENSION = '.txt';
export const INDEX_WIDTH = 5;

const COUNTER_LINE = /^\d{5}$/;
const COMMENT_LINE = /^(?:\/\/|#)\s*/;

export interface ParseOptions {
  /** 番号のずれを例外にする（既定はログを出して番号を合わせ直す） */
  strict?: boolean;

  /** ログ出力用のファイル名 */
  source?: string;
}

export function formatIndex(index: number): string {
  return String(index).padStart(INDEX_WIDTH, '0');
}

/**
 * エントリ列をワークシート形式の文字列にする
 * @example
 * serializeWorksheet([{ comments: ['原文'], lines: ['Text'] }])
 * // '00000\n// 原文\nText\n'
 */
export function serializeWorksheet(entries: EntrySet): string {
  const out: string[] = [];

  entries.forEach((entry, index) => {
    out.push(formatIndex(index));
    for (const comment of entry.comments) {
      out.push(`// ${comment}`);
    }
    out.push(...entry.lines);
  });

  return out.length > 0 ? `${out.join('\n')}\n` : '';
}

/**
 * ワークシート形式の文字列をエントリ列に戻す
 * @throws {SequenceError} strictモードで番号が連続していない場合
 */
export function parseWorksheet(
  text: string,
  options: ParseOptions = {}
): EntrySet {
  const entries: EntrySet = [];
  let comments: string[] = [];
  let lines: string[] = [];
  let counter = 0;
  let seenAnything = false;

  const finalize = () => {
    const entry: Entry = { comments, lines };
    entries.push(entry);
    comments = [];
    lines = [];
  };

  for (const raw of text.split('\n')) {
    const line = raw.trimEnd();

    if (COUNTER_LINE.test(line)) {
      const value = Number.parseInt(line, 10);
      seenAnything = true;

      if (value > 0) {
        finalize();
      }

      if (value !== counter) {
        const message = `Worksheet index out of sequence: expected ${formatIndex(counter)}, found ${line}`;
        if (options.strict) {
          throw new SequenceError(message, counter, value);
        }
        logger.error(message, { source: options.source });
        counter = value;
      }
      counter++;
      continue;
    }

    if (line.trim() === '') continue;
    seenAnything = true;

    if (COMMENT_LINE.test(line)) {
      comments.push(line.replace(COMMENT_LINE, ''));
    } else {
      lines.push(line);
    }
  }

  if (seenAnything) {
    finalize();
  }

  return entries;
}
