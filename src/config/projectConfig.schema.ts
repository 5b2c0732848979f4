import { z } from 'zod';

const tagLengthsSchema = z.record(z.string().min(1), z.number().int().nonnegative());

const overrideSchema = z
  .object({
    preserve: z.boolean().optional(),
    manual: z.boolean().optional(),
    substitute: z.boolean().optional(),
    max_len: z.number().int().positive().optional(),
    tag_lengths: tagLengthsSchema.optional(),
  })
  .strict();

// [find, replace] または { find, replace }
const substitutionSchema = z
  .union([
    z.tuple([z.string().min(1), z.string()]),
    z.object({ find: z.string().min(1), replace: z.string() }),
  ])
  .transform((rule) =>
    Array.isArray(rule) ? { find: rule[0], replace: rule[1] } : rule
  );

export const projectConfigSchema = z.object({
  tag_marker: z.string().length(1, 'tag_marker must be a single character').default('$'),
  max_len: z.number().int().positive().default(30),
  line_breaks: z.boolean().default(true),
  source_comments: z.boolean().default(true),
  alias_tags: z.boolean().default(true),
  aliases: z.record(z.string().min(1), z.string().min(1)).default({}),
  tag_lengths: tagLengthsSchema.default({}),
  substitutions: z.array(substitutionSchema).default([]),
  // ファイル名（拡張子なし） → エントリ番号 → 上書き指定
  overrides: z
    .record(
      z.string().min(1),
      z.record(z.string().regex(/^\d+$/, 'override index must be numeric'), overrideSchema)
    )
    .default({}),
});

export type ProjectConfigFile = z.infer<typeof projectConfigSchema>;
export type OverrideFile = z.infer<typeof overrideSchema>;
