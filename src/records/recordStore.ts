/**
 * 構造化レコード（ゲームスクリプト）の読み書き
 * 要素の順序と個数は読み込み・書き戻しの間で変わらないこと。
 */
export interface DialogRecord {
  text: string;
}

export interface RecordStore {
  /** 拡張子（例: '.json'） */
  readonly extension: string;

  read(filePath: string): DialogRecord[];

  /**
   * 同じ位置の要素にテキストを書き戻す
   * @param texts 要素数と同じ長さであること
   */
  write(filePath: string, texts: readonly string[], outputPath?: string): void;
}
