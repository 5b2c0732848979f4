import { AliasMap } from '../types/projectConfig';
import { ConfigValidationError } from '../services/errors';
import { splitPreserving, splitTags, isTagSegment } from './tokenizer';

/**
 * タグ位置のセグメントだけを対応表で置き換える
 * リテラルと空白はそのまま残す。
 */
export function resolveAliases(
  text: string,
  mapping: ReadonlyMap<string, string>,
  marker: string
): string {
  if (mapping.size === 0) return text;

  return splitPreserving(text)
    .map((piece, i) => {
      // 奇数番目は空白
      if (i % 2 === 1) return piece;

      return splitTags(piece, marker)
        .map((segment, j) =>
          isTagSegment(j) ? mapping.get(segment) ?? segment : segment
        )
        .join(marker);
    })
    .join('');
}

/**
 * 正式名 → エイリアスの対応から逆引きを含むAliasMapを作る
 * @throws エイリアスが重複している場合
 */
export function buildAliasMap(aliases: Record<string, string>): AliasMap {
  const encode = new Map<string, string>();
  const decode = new Map<string, string>();

  for (const [name, alias] of Object.entries(aliases)) {
    const existing = decode.get(alias);
    if (existing !== undefined) {
      throw new ConfigValidationError(
        `Config validation failed: alias "${alias}" is used by both "${existing}" and "${name}"`
      );
    }
    encode.set(name, alias);
    decode.set(alias, name);
  }

  return { encode, decode };
}
