/**
 * プロジェクト設定の型定義
 */

/**
 * タグ名の相互変換表
 * encode: 正式名 → 翻訳者向けエイリアス
 * decode: エイリアス → 正式名（encodeの逆引き）
 */
export interface AliasMap {
  encode: ReadonlyMap<string, string>;
  decode: ReadonlyMap<string, string>;
}

/** タグ名 → 表示幅 */
export type LengthTable = ReadonlyMap<string, number>;

/** リテラル置換ルール（順序に意味がある） */
export interface SubstitutionRule {
  find: string;
  replace: string;
}

/**
 * ファイル・エントリ単位の上書き指定
 */
export interface EntryOverride {
  /** repack時の変換をすべてスキップ */
  preserve?: boolean;

  /** 折り返しのみスキップ */
  manual?: boolean;

  /** 置換ルールの適用（省略時は有効） */
  substitute?: boolean;

  /** 最大表示幅の上書き */
  maxLength?: number;

  /** タグ幅の上書き */
  tagLengths?: LengthTable;
}

export interface OverrideLookup {
  get(file: string, index: number): EntryOverride | undefined;
}

/**
 * 起動時に一度だけ読み込まれ、以後は読み取り専用
 */
export interface ProjectConfig {
  /** タグの区切り文字（1文字） */
  tagMarker: string;

  /** 既定の最大表示幅 */
  maxLength: number;

  /** ゲーム側で改行を描画する（unpackで連結、repackで折り返す） */
  lineBreaks: boolean;

  /** 原文を含むテキストをコメントとして出力する */
  sourceComments: boolean;

  /** unpack時にタグ名をエイリアスへ変換する */
  aliasTags: boolean;

  aliases: AliasMap;
  tagLengths: LengthTable;
  substitutions: readonly SubstitutionRule[];
  overrides: OverrideLookup;
}
