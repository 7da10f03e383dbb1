import { z } from 'zod';
import { DEFAULT_EXCLUDE_PATTERNS } from '../catalog/exclude.js';

export const CONFIG_FILE_NAME = 'prompt-merge.config.json';

export const ConfigSchema = z.object({
  templates: z
    .object({
      root: z.string().min(1).default('templates'),
      extensions: z
        .array(z.string().regex(/^\.[^./\\]+$/, 'Extensions must look like ".md"'))
        .min(1)
        .default(['.md']),
      exclude: z.array(z.string()).default(DEFAULT_EXCLUDE_PATTERNS),
    })
    .default({}),
  output: z
    .object({
      path: z.string().min(1).default('CLAUDE.md'),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
