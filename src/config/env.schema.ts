import { z } from 'zod';

export const envSchema = z.object({
  // プロジェクト設定ファイル
  WORKSHEET_CONFIG: z.string().min(1).default('worksheet.config.yaml'),

  // mergeコマンドの出力先
  MERGE_OUTPUT_DIR: z.string().min(1).default('merged'),

  // ワークシート番号のずれをエラーにする
  STRICT_SEQUENCE: z
    .string()
    .optional()
    .transform((val) => val === 'true'),

  // ログ設定
  LOG_LEVEL: z
    .enum(['debug', 'info', 'warn', 'error'])
    .default('info'),
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),
});

export type Env = z.infer<typeof envSchema>;
