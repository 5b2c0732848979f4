import * as fs from 'fs';
import * as yaml from 'js-yaml';
import {
  projectConfigSchema,
  ProjectConfigFile,
  OverrideFile,
} from '../config/projectConfig.schema';
import { EntryOverride, LengthTable, ProjectConfig } from '../types/projectConfig';
import { buildAliasMap } from '../text/aliasResolver';
import { ConfigValidationError } from './errors';
import { OverrideTable } from './overrideTable';
import logger from '../utils/logger';

function toLengthTable(lengths: Record<string, number>): LengthTable {
  return new Map(Object.entries(lengths));
}

function toOverride(raw: OverrideFile): EntryOverride {
  return {
    preserve: raw.preserve,
    manual: raw.manual,
    substitute: raw.substitute,
    maxLength: raw.max_len,
    tagLengths: raw.tag_lengths ? toLengthTable(raw.tag_lengths) : undefined,
  };
}

export class ProjectConfigLoader {
  /**
   * YAML設定ファイルを読み込む
   * @param filePath 設定ファイルのパス
   * @throws ファイルが存在しない、YAML構文エラー、バリデーションエラー
   */
  load(filePath: string): ProjectConfig {
    try {
      const fileContents = fs.readFileSync(filePath, 'utf8');
      const data: unknown = yaml.load(fileContents);
      const config = this.fromObject(data ?? {});

      logger.info('Project config loaded successfully', {
        filePath,
        aliases: config.aliases.encode.size,
        tagLengths: config.tagLengths.size,
        substitutions: config.substitutions.length,
      });

      return config;
    } catch (error) {
      logger.error('Failed to load project config', { filePath, error });
      throw error;
    }
  }

  /**
   * 設定ファイルがあれば読み込み、なければ既定値を使う
   */
  loadOrDefault(filePath: string): ProjectConfig {
    if (!fs.existsSync(filePath)) {
      logger.warn('Project config not found, using defaults', { filePath });
      return this.fromObject({});
    }
    return this.load(filePath);
  }

  /**
   * パース済みのデータを検証してProjectConfigを組み立てる
   * @throws {ConfigValidationError}
   */
  fromObject(data: unknown): ProjectConfig {
    const parsed = projectConfigSchema.safeParse(data);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigValidationError(`Config validation failed: ${issues}`);
    }

    return this.build(parsed.data);
  }

  private build(file: ProjectConfigFile): ProjectConfig {
    const overrides = new OverrideTable();
    for (const [name, byIndex] of Object.entries(file.overrides)) {
      for (const [index, raw] of Object.entries(byIndex)) {
        overrides.set(name, Number.parseInt(index, 10), toOverride(raw));
      }
    }

    return Object.freeze({
      tagMarker: file.tag_marker,
      maxLength: file.max_len,
      lineBreaks: file.line_breaks,
      sourceComments: file.source_comments,
      aliasTags: file.alias_tags,
      aliases: buildAliasMap(file.aliases),
      tagLengths: toLengthTable(file.tag_lengths),
      substitutions: Object.freeze([...file.substitutions]),
      overrides,
    });
  }
}
