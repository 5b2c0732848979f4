import * as path from 'path';
import { ErrorCode, FileResult } from '../types';
import { UnpackService } from './unpackService';
import { RepackService } from './repackService';
import { mergeDirectories } from '../worksheet/mergeEngine';
import { WORKSHEET_EXTENSION } from '../worksheet/worksheetCodec';
import { WorksheetError, classifyError, toError } from '../utils/errors';
import logger from '../utils/logger';

/**
 * ファイル単位で処理し、1ファイルの失敗はバッチ全体を止めない
 */
export class BatchRunner {
  constructor(
    private unpackService: UnpackService,
    private repackService: RepackService,
    private recordExtension: string,
    private strictSequence: boolean = false
  ) {}

  /**
   * 拡張子で unpack / repack を振り分ける（入力順に逐次処理）
   */
  process(files: readonly string[]): FileResult[] {
    return files.map((file) => this.processFile(file));
  }

  processFile(file: string): FileResult {
    const ext = path.extname(file).toLowerCase();

    if (ext === this.recordExtension) {
      return this.attempt(file, 'unpack', () => this.unpackService.unpackFile(file));
    }
    if (ext === WORKSHEET_EXTENSION) {
      return this.attempt(file, 'repack', () => this.repackService.repackFile(file));
    }

    const error = new WorksheetError(
      `Unsupported file extension "${ext}"`,
      ErrorCode.INVALID_EXTENSION
    );
    logger.error('Invalid input file, skipping', { file, ext });
    return { ok: false, file, code: error.code, error };
  }

  /**
   * ディレクトリ群をマージする
   */
  merge(directories: readonly string[], outputDir: string): FileResult[] {
    try {
      return mergeDirectories(directories, outputDir, {
        strict: this.strictSequence,
      });
    } catch (caught) {
      const error = toError(caught);
      logger.error('Merge failed', { directories, outputDir, error });
      return [{ ok: false, file: outputDir, code: classifyError(error), error }];
    }
  }

  private attempt(
    file: string,
    operation: 'unpack' | 'repack',
    run: () => string
  ): FileResult {
    try {
      const output = run();
      return { ok: true, file, operation, output };
    } catch (caught) {
      const error = toError(caught);
      const code = classifyError(error);
      logger.error(`Failed to ${operation} file`, { file, code, error });
      return { ok: false, file, code, error };
    }
  }
}
