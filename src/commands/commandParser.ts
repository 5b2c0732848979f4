import { Command } from '../types';

const OUTPUT_FLAGS = ['--out', '-o'];

export class CommandParser {
  parse(argv: readonly string[]): Command | null {
    const [subcommand, ...rest] = argv;

    switch (subcommand) {
      case undefined:
      case 'help':
      case '--help':
      case '-h':
        return { type: 'help' };
      case 'process':
        return rest.length > 0 ? { type: 'process', files: [...rest] } : null;
      case 'merge':
        return this.parseMerge(rest);
      default:
        return null; // 不明なサブコマンド
    }
  }

  private parseMerge(args: readonly string[]): Command | null {
    const directories: string[] = [];
    let outputDir: string | undefined;

    for (let i = 0; i < args.length; i++) {
      if (OUTPUT_FLAGS.includes(args[i])) {
        const value = args[i + 1];
        if (value === undefined) return null;
        outputDir = value;
        i++;
      } else {
        directories.push(args[i]);
      }
    }

    // 基準と比較対象で最低2つ必要
    if (directories.length < 2) return null;

    return { type: 'merge', directories, outputDir };
  }
}
