import { CommandParser } from './commandParser';

describe('CommandParser', () => {
  let parser: CommandParser;

  beforeEach(() => {
    parser = new CommandParser();
  });

  describe('processコマンド', () => {
    it('ファイル一覧を解析できる', () => {
      const result = parser.parse(['process', 'a.json', 'b.txt']);
      expect(result).toEqual({ type: 'process', files: ['a.json', 'b.txt'] });
    });

    it('ファイル指定がなければnullを返す', () => {
      expect(parser.parse(['process'])).toBeNull();
    });
  });

  describe('mergeコマンド', () => {
    it('2つ以上のディレクトリを解析できる', () => {
      const result = parser.parse(['merge', 'ja', 'en']);
      expect(result).toEqual({
        type: 'merge',
        directories: ['ja', 'en'],
        outputDir: undefined,
      });
    });

    it('--out で出力先を指定できる', () => {
      const result = parser.parse(['merge', 'ja', '--out', 'out', 'en']);
      expect(result).toEqual({
        type: 'merge',
        directories: ['ja', 'en'],
        outputDir: 'out',
      });
    });

    it('-o の短縮形も使える', () => {
      const result = parser.parse(['merge', '-o', 'out', 'ja', 'en', 'fr']);
      expect(result).toEqual({
        type: 'merge',
        directories: ['ja', 'en', 'fr'],
        outputDir: 'out',
      });
    });

    it('ディレクトリが1つだけならnullを返す', () => {
      expect(parser.parse(['merge', 'ja'])).toBeNull();
    });

    it('--out の値がなければnullを返す', () => {
      expect(parser.parse(['merge', 'ja', 'en', '--out'])).toBeNull();
    });
  });

  describe('その他', () => {
    it('引数なしならhelpを返す', () => {
      expect(parser.parse([])).toEqual({ type: 'help' });
    });

    it('--help でhelpを返す', () => {
      expect(parser.parse(['--help'])).toEqual({ type: 'help' });
    });

    it('不明なサブコマンドはnullを返す', () => {
      expect(parser.parse(['unpack', 'a.json'])).toBeNull();
    });
  });
});
