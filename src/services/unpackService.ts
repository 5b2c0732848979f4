import * as fs from 'fs';
import * as path from 'path';
import { Entry, EntrySet } from '../types';
import { ProjectConfig } from '../types/projectConfig';
import { DialogRecord, RecordStore } from '../records/recordStore';
import { containsSourceScript } from '../text/scriptDetector';
import { resolveAliases } from '../text/aliasResolver';
import { unwrap } from '../text/reflow';
import { serializeWorksheet, WORKSHEET_EXTENSION } from '../worksheet/worksheetCodec';
import logger from '../utils/logger';

function nonBlankLines(text: string): string[] {
  return text
    .replace(/\r\n/g, '\n')
    .split('\n')
    .map((line) => line.trimEnd())
    .filter((line) => line.trim() !== '');
}

export class UnpackService {
  constructor(
    private config: ProjectConfig,
    private recordStore: RecordStore
  ) {}

  /**
   * 1要素分のエントリを作る
   * 原文を含むテキストは改行を保ったまま出力し、コメントにも残す。
   * 翻訳済みのテキストは改行描画が有効なら1行に連結する。
   */
  buildEntry(record: DialogRecord): Entry {
    const { tagMarker } = this.config;
    const rawLines = nonBlankLines(record.text);
    const isSource = containsSourceScript(record.text, tagMarker, true);

    const comments = isSource && this.config.sourceComments ? [...rawLines] : [];

    let lines: string[];
    if (isSource || !this.config.lineBreaks) {
      lines = rawLines;
    } else {
      const joined = unwrap(record.text);
      lines = joined === '' ? [] : [joined];
    }

    if (this.config.aliasTags) {
      lines = lines.map((line) =>
        resolveAliases(line, this.config.aliases.encode, tagMarker)
      );
    }

    return { comments, lines };
  }

  buildEntries(records: readonly DialogRecord[]): EntrySet {
    return records.map((record) => this.buildEntry(record));
  }

  /**
   * レコードファイルを読み、同じ場所にワークシートを書き出す
   * @returns ワークシートのパス
   */
  unpackFile(filePath: string): string {
    const records = this.recordStore.read(filePath);
    const entries = this.buildEntries(records);

    const parsed = path.parse(filePath);
    const outputPath = path.join(parsed.dir, `${parsed.name}${WORKSHEET_EXTENSION}`);
    fs.writeFileSync(outputPath, serializeWorksheet(entries), 'utf8');

    logger.info('Worksheet written', {
      source: filePath,
      outputPath,
      entries: entries.length,
    });

    return outputPath;
  }
}
