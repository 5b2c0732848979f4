import * as fs from 'fs';
import * as path from 'path';
import { Entry, EntrySet } from '../types';
import { EntryOverride, LengthTable, ProjectConfig } from '../types/projectConfig';
import { DialogRecord, RecordStore } from '../records/recordStore';
import { containsSourceScript } from '../text/scriptDetector';
import { resolveAliases } from '../text/aliasResolver';
import { applySubstitutions } from '../text/substitution';
import { reflow } from '../text/reflow';
import { parseWorksheet } from '../worksheet/worksheetCodec';
import { StructuralMismatchError } from './errors';
import logger from '../utils/logger';

function mergeLengths(base: LengthTable, extra?: LengthTable): LengthTable {
  if (!extra || extra.size === 0) return base;
  return new Map([...base, ...extra]);
}

export class RepackService {
  constructor(
    private config: ProjectConfig,
    private recordStore: RecordStore,
    private strictSequence: boolean = false
  ) {}

  /**
   * 1エントリ分のテキストをゲーム用に整形する
   * 1. preserve指定ならそのまま
   * 2. タグのエイリアスを正式名に戻す
   * 3. 原文が残っていればそれ以上は変更しない
   * 4. 置換ルール（substitute: false で無効）
   * 5. 折り返し（改行描画が無効、またはmanual指定ならスキップ）
   */
  repackEntry(entry: Entry, record: DialogRecord, override?: EntryOverride): string {
    // 本文が空のエントリは元のテキストを残す
    if (entry.lines.length === 0) return record.text;

    const text = entry.lines.join('\n');
    if (override?.preserve) return text;

    const { tagMarker } = this.config;
    const decoded = resolveAliases(text, this.config.aliases.decode, tagMarker);
    if (containsSourceScript(decoded, tagMarker)) return decoded;

    const substituted =
      override?.substitute === false
        ? decoded
        : applySubstitutions(decoded, this.config.substitutions);

    if (!this.config.lineBreaks || override?.manual) return substituted;

    return reflow(substituted, {
      tagLengths: mergeLengths(this.config.tagLengths, override?.tagLengths),
      marker: tagMarker,
      maxLength: override?.maxLength ?? this.config.maxLength,
    });
  }

  /**
   * @throws {StructuralMismatchError} エントリ数と要素数が一致しない場合
   */
  buildTexts(
    fileId: string,
    entries: EntrySet,
    records: readonly DialogRecord[]
  ): string[] {
    if (entries.length !== records.length) {
      throw new StructuralMismatchError(
        `Entry count mismatch in ${fileId}: worksheet has ${entries.length}, records have ${records.length}`,
        entries.length,
        records.length
      );
    }

    return entries.map((entry, index) =>
      this.repackEntry(entry, records[index], this.config.overrides.get(fileId, index))
    );
  }

  /**
   * ワークシートを読み、同じ名前のレコードファイルへ書き戻す
   * 件数が合わない場合は何も書き込まない。
   * @returns 書き込んだレコードファイルのパス
   */
  repackFile(worksheetPath: string): string {
    const parsed = path.parse(worksheetPath);
    const recordPath = path.join(parsed.dir, `${parsed.name}${this.recordStore.extension}`);

    const entries = parseWorksheet(fs.readFileSync(worksheetPath, 'utf8'), {
      strict: this.strictSequence,
      source: worksheetPath,
    });
    const records = this.recordStore.read(recordPath);
    const texts = this.buildTexts(parsed.name, entries, records);

    this.recordStore.write(recordPath, texts);
    logger.info('Records updated', {
      worksheet: worksheetPath,
      recordPath,
      entries: entries.length,
    });

    return recordPath;
  }
}
