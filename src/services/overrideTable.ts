import { EntryOverride, OverrideLookup } from '../types/projectConfig';

/**
 * (ファイル名, エントリ番号) をキーにした上書き指定の表
 */
export class OverrideTable implements OverrideLookup {
  private readonly table = new Map<string, Map<number, EntryOverride>>();

  set(file: string, index: number, override: EntryOverride): void {
    let byIndex = this.table.get(file);
    if (!byIndex) {
      byIndex = new Map();
      this.table.set(file, byIndex);
    }
    byIndex.set(index, override);
  }

  get(file: string, index: number): EntryOverride | undefined {
    return this.table.get(file)?.get(index);
  }

  get size(): number {
    let count = 0;
    for (const byIndex of this.table.values()) {
      count += byIndex.size;
    }
    return count;
  }
}
