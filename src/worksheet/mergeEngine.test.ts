import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { mergeEntrySets, mergeDirectories } from './mergeEngine';
import { parseWorksheet, serializeWorksheet } from './worksheetCodec';
import { EntrySet, ErrorCode } from '../types';
import { SequenceError } from '../services/errors';

describe('mergeEngine', () => {
  const japanese: EntrySet = [
    { comments: ['ignored'], lines: ['こんにちは'] },
    { comments: [], lines: ['さようなら', '二行目'] },
  ];
  const english: EntrySet = [
    { comments: [], lines: ['Hello'] },
    { comments: [], lines: ['Goodbye'] },
  ];

  describe('mergeEntrySets', () => {
    it('同じセット同士なら本文は空、コメントは基準の本文', () => {
      expect(mergeEntrySets([japanese, japanese])).toEqual([
        { comments: ['こんにちは'], lines: [] },
        { comments: ['さようなら', '二行目'], lines: [] },
      ]);
    });

    it('異なるセットは基準をコメント、2つ目を本文にする', () => {
      expect(mergeEntrySets([japanese, english])).toEqual([
        { comments: ['こんにちは'], lines: ['Hello'] },
        { comments: ['さようなら', '二行目'], lines: ['Goodbye'] },
      ]);
    });

    it('3つ目以降も基準と異なれば本文に追加する', () => {
      const french: EntrySet = [
        { comments: [], lines: ['Bonjour'] },
        { comments: [], lines: ['さようなら', '二行目'] },
      ];
      expect(mergeEntrySets([japanese, english, french])).toEqual([
        { comments: ['こんにちは'], lines: ['Hello', 'Bonjour'] },
        { comments: ['さようなら', '二行目'], lines: ['Goodbye'] },
      ]);
    });

    it('エントリ数が異なる場合は番号ごとに和集合をとる', () => {
      const longer: EntrySet = [...english, { comments: [], lines: ['Extra'] }];
      expect(mergeEntrySets([japanese, longer])).toEqual([
        { comments: ['こんにちは'], lines: ['Hello'] },
        { comments: ['さようなら', '二行目'], lines: ['Goodbye'] },
        { comments: [], lines: ['Extra'] },
      ]);
    });

    it('基準にないファイルは後続の本文だけになる', () => {
      expect(mergeEntrySets([undefined, english])).toEqual([
        { comments: [], lines: ['Hello'] },
        { comments: [], lines: ['Goodbye'] },
      ]);
    });
  });

  describe('mergeDirectories', () => {
    let root: string;

    beforeEach(() => {
      root = fs.mkdtempSync(path.join(os.tmpdir(), 'merge-'));
    });

    afterEach(() => {
      fs.rmSync(root, { recursive: true, force: true });
    });

    const writeSet = (dir: string, name: string, entries: EntrySet) => {
      fs.mkdirSync(path.join(root, dir), { recursive: true });
      fs.writeFileSync(path.join(root, dir, name), serializeWorksheet(entries));
    };

    it('ディレクトリを名前順に並べ、先頭を基準にする', () => {
      writeSet('b_en', 'intro.txt', english);
      writeSet('a_ja', 'intro.txt', japanese);
      const out = path.join(root, 'merged');

      // 引数の順序に関係なく a_ja が基準
      const results = mergeDirectories([path.join(root, 'b_en'), path.join(root, 'a_ja')], out);

      expect(results).toEqual([
        { ok: true, file: 'intro.txt', operation: 'merge', output: path.join(out, 'intro.txt') },
      ]);
      expect(parseWorksheet(fs.readFileSync(path.join(out, 'intro.txt'), 'utf8'))).toEqual([
        { comments: ['こんにちは'], lines: ['Hello'] },
        { comments: ['さようなら', '二行目'], lines: ['Goodbye'] },
      ]);
    });

    it('ファイル名ごとにマージし、ワークシート以外は無視する', () => {
      writeSet('a_ja', 'intro.txt', japanese);
      writeSet('a_ja', 'shop.txt', [{ comments: [], lines: ['いらっしゃい'] }]);
      writeSet('b_ja', 'intro.txt', japanese);
      fs.writeFileSync(path.join(root, 'b_ja', 'notes.md'), '# memo');
      const out = path.join(root, 'merged');

      const results = mergeDirectories([path.join(root, 'a_ja'), path.join(root, 'b_ja')], out);

      expect(results.map((result) => result.ok && result.output)).toEqual([
        path.join(out, 'intro.txt'),
        path.join(out, 'shop.txt'),
      ]);
      expect(fs.readFileSync(path.join(out, 'intro.txt'), 'utf8')).toBe(
        '00000\n// こんにちは\n00001\n// さようなら\n// 二行目\n'
      );
      expect(fs.readFileSync(path.join(out, 'shop.txt'), 'utf8')).toBe('00000\n// いらっしゃい\n');
    });

    it('解析に失敗したファイルだけを失敗とし、残りはマージする', () => {
      fs.mkdirSync(path.join(root, 'a'), { recursive: true });
      fs.writeFileSync(path.join(root, 'a', 'bad.txt'), '00000\nx\n00002\ny\n');
      writeSet('a', 'good.txt', english);
      writeSet('b', 'bad.txt', english);
      writeSet('b', 'good.txt', english);
      const out = path.join(root, 'merged');

      const results = mergeDirectories([path.join(root, 'a'), path.join(root, 'b')], out, {
        strict: true,
      });

      expect(results).toHaveLength(2);
      const [bad, good] = results;
      expect(bad.ok).toBe(false);
      expect(!bad.ok && bad.code).toBe(ErrorCode.SEQUENCE_ERROR);
      expect(!bad.ok && bad.error).toBeInstanceOf(SequenceError);
      expect(fs.existsSync(path.join(out, 'bad.txt'))).toBe(false);
      expect(good).toEqual({
        ok: true,
        file: 'good.txt',
        operation: 'merge',
        output: path.join(out, 'good.txt'),
      });
      expect(fs.readFileSync(path.join(out, 'good.txt'), 'utf8')).toBe(
        '00000\n// Hello\n00001\n// Goodbye\n'
      );
    });
  });
});
