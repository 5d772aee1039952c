import { z } from 'zod';

export const auditorConfigSchema = z
  .object({
    ignore_dirs: z.array(z.string().min(1)).max(100).optional(),
    error_on_warnings: z.boolean().optional(),
    model: z.string().min(1).max(100).optional(),
    code_block_name: z.string().max(200).optional(),
    auto_fix: z.boolean().optional(),
    include_classes: z.boolean().optional(),
    docstring_style: z.string().min(1).max(50).optional(),

    llm: z
      .object({
        temperature: z.number().min(0).max(2).optional(),
        max_tokens: z.number().int().min(64).max(32000).optional(),
        max_retries: z.number().int().min(0).max(10).optional(),
        retry_base_delay_ms: z.number().int().min(0).max(60000).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();
