/**
 * ワークシートの1エントリ
 * comments: 原文などの参照テキスト（repack対象外）
 * lines: 翻訳者が編集するテキスト
 */
export interface Entry {
  comments: string[];
  lines: string[];
}

/** 位置 = エントリ番号 */
export type EntrySet = Entry[];

export type Command =
  | { type: 'process'; files: string[] }
  | { type: 'merge'; directories: string[]; outputDir?: string }
  | { type: 'help' };

export type FileOperation = 'unpack' | 'repack' | 'merge';

export type FileResult =
  | { ok: true; file: string; operation: FileOperation; output: string }
  | { ok: false; file: string; code: ErrorCode; error: Error };

export enum ErrorCode {
  INVALID_EXTENSION = 'INVALID_EXTENSION',
  STRUCTURAL_MISMATCH = 'STRUCTURAL_MISMATCH',
  SEQUENCE_ERROR = 'SEQUENCE_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR',
  RECORD_FORMAT_ERROR = 'RECORD_FORMAT_ERROR',
  IO_ERROR = 'IO_ERROR',
  UNKNOWN = 'UNKNOWN',
}
