import { types } from 'util';
import { ErrorCode } from '../types';
import {
  ConfigValidationError,
  SequenceError,
  StructuralMismatchError,
} from '../services/errors';

export class WorksheetError extends Error {
  constructor(
    message: string,
    public code: ErrorCode,
    public originalError?: Error
  ) {
    super(message);
    this.name = 'WorksheetError';
    Object.setPrototypeOf(this, WorksheetError.prototype);
  }
}

/**
 * unknownなcatch値をErrorに正規化
 * 別のrealmで作られたError（fsのエラーなど）はinstanceofで判定できないため、isNativeErrorで見る。
 */
export function toError(value: unknown): Error {
  if (value instanceof Error || types.isNativeError(value)) {
    return value;
  }
  return new Error(String(value));
}

/**
 * エラーをFileResult用のエラーコードに分類する
 */
export function classifyError(error: Error): ErrorCode {
  if (error instanceof StructuralMismatchError) return ErrorCode.STRUCTURAL_MISMATCH;
  if (error instanceof SequenceError) return ErrorCode.SEQUENCE_ERROR;
  if (error instanceof ConfigValidationError) return ErrorCode.CONFIG_ERROR;
  if (error instanceof WorksheetError) return error.code;
  // fsのエラーは ENOENT, EACCES などのコードを持つ
  if ('code' in error && typeof error.code === 'string' && error.code.startsWith('E')) {
    return ErrorCode.IO_ERROR;
  }
  return ErrorCode.UNKNOWN;
}
