import { splitChunks, splitPreserving, splitTags, isTagSegment } from './tokenizer';

describe('tokenizer', () => {
  describe('splitChunks', () => {
    it('空白の連続を区切りとして扱う', () => {
      expect(splitChunks('  Hello   there\nfriend\t! ')).toEqual([
        'Hello',
        'there',
        'friend',
        '!',
      ]);
    });

    it('空文字列・空白のみは空配列', () => {
      expect(splitChunks('')).toEqual([]);
      expect(splitChunks(' \n\t ')).toEqual([]);
    });

    it('全角スペースも区切りになる', () => {
      expect(splitChunks('はい　いいえ')).toEqual(['はい', 'いいえ']);
    });
  });

  describe('splitPreserving', () => {
    it('チャンクと空白を交互に返す', () => {
      expect(splitPreserving('a  b\nc')).toEqual(['a', '  ', 'b', '\n', 'c']);
    });

    it('先頭・末尾の空白の外側には空チャンクが入る', () => {
      expect(splitPreserving(' a ')).toEqual(['', ' ', 'a', ' ', '']);
    });

    it('常に奇数長で、連結すると元に戻る', () => {
      const inputs = ['', ' ', 'x', ' x', 'x ', ' $A$ b  c\n'];
      for (const input of inputs) {
        const pieces = splitPreserving(input);
        expect(pieces.length % 2).toBe(1);
        expect(pieces.join('')).toBe(input);
      }
    });
  });

  describe('splitTags', () => {
    it('リテラルとタグが交互に並ぶ', () => {
      expect(splitTags('Hi,$PLAYER_NAME$!', '$')).toEqual(['Hi,', 'PLAYER_NAME', '!']);
    });

    it('タグで始まり・終わるチャンクは空リテラルを含む', () => {
      expect(splitTags('$A$$B$', '$')).toEqual(['', 'A', '', 'B', '']);
    });

    it('タグがなければ1要素', () => {
      expect(splitTags('plain', '$')).toEqual(['plain']);
    });

    it('セグメントに区切り文字は含まれない', () => {
      const segments = splitTags('a$B$c$D$e', '$');
      expect(segments).toHaveLength(5);
      expect(segments.some((segment) => segment.includes('$'))).toBe(false);
    });
  });

  describe('isTagSegment', () => {
    it('奇数番目がタグ', () => {
      expect(isTagSegment(0)).toBe(false);
      expect(isTagSegment(1)).toBe(true);
      expect(isTagSegment(2)).toBe(false);
      expect(isTagSegment(3)).toBe(true);
    });
  });
});
