import * as fs from 'fs';
import * as path from 'path';
import { Entry, EntrySet, FileResult } from '../types';
import { classifyError, toError } from '../utils/errors';
import logger from '../utils/logger';
import {
  parseWorksheet,
  serializeWorksheet,
  ParseOptions,
  WORKSHEET_EXTENSION,
} from './worksheetCodec';

function sameLines(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((line, i) => line === b[i]);
}

/**
 * 同じファイルの複数バリアントを1つのエントリ列にまとめる
 * 先頭（基準）のセットの本文はコメントに、以降のセットの本文は基準と異なる場合のみ本文に追加する。
 * 基準が欠けているファイルはsetsの該当要素をundefinedで渡す。
 */
export function mergeEntrySets(sets: readonly (EntrySet | undefined)[]): EntrySet {
  const merged: EntrySet = [];
  const length = Math.max(0, ...sets.map((set) => set?.length ?? 0));

  for (let index = 0; index < length; index++) {
    const entry: Entry = { comments: [], lines: [] };

    sets.forEach((set, position) => {
      const source = set?.[index];
      if (!source) return;

      if (position === 0) {
        entry.comments = [...source.lines];
        return;
      }

      // 基準と同じ本文は重複させない
      if (!sameLines(source.lines, entry.comments)) {
        entry.lines.push(...source.lines);
      }
    });

    merged.push(entry);
  }

  return merged;
}

function listWorksheets(directory: string): string[] {
  return fs
    .readdirSync(directory)
    .filter((name) => path.extname(name).toLowerCase() === WORKSHEET_EXTENSION)
    .filter((name) => fs.statSync(path.join(directory, name)).isFile())
    .sort();
}

/**
 * 複数ディレクトリのワークシートをファイル名ごとにマージして書き出す
 * ディレクトリは名前順に並べ替え、最初のものを基準とする。
 * 1ファイルの読み込み・解析に失敗しても、残りのファイルのマージは続ける。
 * @returns ファイル名ごとの結果
 * @throws ディレクトリ自体を読めない場合
 */
export function mergeDirectories(
  directories: readonly string[],
  outputDir: string,
  parseOptions: Omit<ParseOptions, 'source'> = {}
): FileResult[] {
  const sorted = [...directories].sort();
  const byDirectory = sorted.map((directory) => new Set(listWorksheets(directory)));
  const names = [...new Set(byDirectory.flatMap((files) => [...files]))].sort();

  fs.mkdirSync(outputDir, { recursive: true });

  return names.map((name) => mergeFile(name, sorted, byDirectory, outputDir, parseOptions));
}

function mergeFile(
  name: string,
  directories: readonly string[],
  byDirectory: readonly Set<string>[],
  outputDir: string,
  parseOptions: Omit<ParseOptions, 'source'>
): FileResult {
  try {
    const sets = directories.map((directory, i) => {
      if (!byDirectory[i].has(name)) {
        logger.warn('Worksheet missing from directory', { directory, name });
        return undefined;
      }
      const file = path.join(directory, name);
      return parseWorksheet(fs.readFileSync(file, 'utf8'), {
        ...parseOptions,
        source: file,
      });
    });

    // 全ディレクトリの解析が済んでから書き出す
    const outputPath = path.join(outputDir, name);
    fs.writeFileSync(outputPath, serializeWorksheet(mergeEntrySets(sets)), 'utf8');
    logger.info('Merged worksheet written', {
      name,
      sources: directories.length,
      outputPath,
    });
    return { ok: true, file: name, operation: 'merge', output: outputPath };
  } catch (caught) {
    const error = toError(caught);
    const code = classifyError(error);
    logger.error('Failed to merge worksheet', { name, code, error });
    return { ok: false, file: name, code, error };
  }
}
