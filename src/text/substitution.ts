import { SubstitutionRule } from '../types/projectConfig';

// 直後が引用符のカンマと行末のカンマには空白を足さない。改行はまたがない。
const LIST_COMMA = /[^\S\n]*,(?!["“”]|[^\S\n]*$)[^\S\n]*/gm;

// 数字の桁区切り（1, 000 → 1,000）
const NUMERIC_COMMA = /(?<=\d)[^\S\n]*,[^\S\n]*(?=\d)/g;

/**
 * 置換ルールを順に適用し、カンマ周りの空白を正規化する
 * ルールは正規表現ではなくリテラル文字列として扱う。前のルールの結果に次のルールが効く。
 */
export function applySubstitutions(
  text: string,
  rules: readonly SubstitutionRule[]
): string {
  let result = text;

  for (const rule of rules) {
    if (rule.find === '') continue;
    result = result.split(rule.find).join(rule.replace);
  }

  return result.replace(LIST_COMMA, ', ').replace(NUMERIC_COMMA, ',');
}
