import { z } from 'zod';

const RetrySchema = z.object({
  attempts: z.number().int().positive(),
  base_delay_ms: z.number().int().nonnegative()
});

export const PipelineFileSchema = z.object({
  collection: z
    .object({
      concurrency: z.number().int().positive().default(3),
      max_items: z.number().int().positive().default(12),
      admission_threshold: z.number().nonnegative().default(100000),
      soft_timeout_ms: z.number().int().positive().default(300000),
      call_timeout_ms: z.number().int().positive().default(30000)
    })
    .default({}),
  retries: z
    .object({
      login: RetrySchema.default({ attempts: 3, base_delay_ms: 2000 }),
      fetch: RetrySchema.default({ attempts: 3, base_delay_ms: 1000 })
    })
    .default({}),
  services: z
    .object({
      rapras: z
        .object({
          base_url: z.string().url().default('https://www.rapras.jp/')
        })
        .default({}),
      yahoo: z
        .object({
          login_url: z.string().url().default('https://login.yahoo.co.jp/config/login'),
          auctions_url: z.string().url().default('https://auctions.yahoo.co.jp/'),
          proxy_check_url: z.string().url().default('https://www.google.com/')
        })
        .default({})
    })
    .default({}),
  output: z
    .object({
      dir: z.string().min(1).default('output')
    })
    .default({})
});

export type PipelineFile = z.infer<typeof PipelineFileSchema>;

export const LlmFileSchema = z.object({
  default_provider: z.string().min(1),
  fallback_chain: z.array(z.string().min(1)).default([]),
  temperature: z.number().min(0).max(2).default(0),
  top_p: z.number().min(0).max(1).default(1),
  max_tokens: z.number().int().positive().default(64),
  timeouts: z
    .object({
      request_ms: z.number().int().positive().default(30000)
    })
    .default({}),
  retries: z
    .object({
      attempts: z.number().int().positive().default(2),
      base_delay_ms: z.number().int().positive().default(500),
      max_delay_ms: z.number().int().positive().default(4000)
    })
    .default({})
});

export type LlmFile = z.infer<typeof LlmFileSchema>;
