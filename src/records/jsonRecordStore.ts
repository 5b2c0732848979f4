import * as fs from 'fs';
import { z } from 'zod';
import { DialogRecord, RecordStore } from './recordStore';
import { WorksheetError, toError } from '../utils/errors';
import { ErrorCode } from '../types';

// 検証のみに使う。書き戻しはJSON.parseの結果を直接書き換え、キーの順序を保つ
const documentSchema = z.object({
  dialogs: z.array(z.object({ text: z.string() })),
});

type JsonObject = Record<string, unknown>;

interface ParsedDocument {
  root: JsonObject;
  dialogs: JsonObject[];
  texts: string[];
}

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const DEFAULT_INDENT = 2;

/**
 * 元ファイルのインデントを推定する
 */
function detectIndent(raw: string): string | number {
  const match = raw.match(/^[{[][^\S\n]*\r?\n([ \t]+)\S/);
  return match ? match[1] : DEFAULT_INDENT;
}

/**
 * `{ "dialogs": [{ "text": "..." }, ...] }` 形式のJSONスクリプト
 */
export class JsonRecordStore implements RecordStore {
  readonly extension = '.json';

  read(filePath: string): DialogRecord[] {
    return this.parse(filePath, fs.readFileSync(filePath, 'utf8')).texts.map((text) => ({
      text,
    }));
  }

  write(filePath: string, texts: readonly string[], outputPath: string = filePath): void {
    const raw = fs.readFileSync(filePath, 'utf8');
    const { root, dialogs } = this.parse(filePath, raw);

    if (dialogs.length !== texts.length) {
      throw new WorksheetError(
        `Record count changed: ${filePath} has ${dialogs.length} dialogs, got ${texts.length} texts`,
        ErrorCode.STRUCTURAL_MISMATCH
      );
    }

    // 既存のキーへの代入なので順序は変わらない
    dialogs.forEach((dialog, i) => {
      dialog.text = texts[i];
    });

    const newline = raw.includes('\r\n') ? '\r\n' : '\n';
    let output = JSON.stringify(root, null, detectIndent(raw));
    if (newline === '\r\n') {
      output = output.replace(/\n/g, '\r\n');
    }
    if (/\r?\n$/.test(raw)) {
      output += newline;
    }

    fs.writeFileSync(outputPath, output, 'utf8');
  }

  private parse(filePath: string, raw: string): ParsedDocument {
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      throw new WorksheetError(
        `Invalid JSON in ${filePath}`,
        ErrorCode.RECORD_FORMAT_ERROR,
        toError(error)
      );
    }

    const parsed = documentSchema.safeParse(data);
    const dialogs: unknown = isJsonObject(data) ? data.dialogs : undefined;
    if (!parsed.success || !isJsonObject(data) || !Array.isArray(dialogs)) {
      const issue = parsed.success ? undefined : parsed.error.issues[0]?.message;
      throw new WorksheetError(
        `Unexpected record layout in ${filePath}: ${issue ?? 'invalid'}`,
        ErrorCode.RECORD_FORMAT_ERROR
      );
    }

    return {
      root: data,
      dialogs: dialogs.filter(isJsonObject),
      texts: parsed.data.dialogs.map((dialog) => dialog.text),
    };
  }
}
