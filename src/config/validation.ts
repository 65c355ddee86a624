import { z } from 'zod';

export const configSchema = z
  .object({
    server: z.object({
      nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
      port: z.number().int().positive().default(8000),
      logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
      maxUploadSizeMB: z.number().positive().default(20),
    }),
    extraction: z.object({
      provider: z.enum(['openai', 'layout-service']).default('openai'),
      model: z.string().min(1).default('gpt-4o-mini'),
      apiKey: z.string().default(''),
      baseUrl: z.string().url().optional(),
      callTimeoutMs: z.number().int().positive().default(60_000),
      minConfidence: z.number().min(0).max(1).default(0.3),
      maxPages: z.number().int().positive().default(10),
      rasterDpi: z.number().int().min(72).max(600).default(150),
    }),
    reasoning: z.object({
      provider: z.enum(['openai', 'anthropic', 'openrouter', 'ollama']).default('ollama'),
      model: z.string().min(1).default('llama3.2:3b'),
      apiKey: z.string().default(''),
      baseUrl: z.string().url().optional(),
      maxTokens: z.number().int().positive().default(1500),
      temperature: z.number().min(0).max(2).default(0.1),
      callTimeoutMs: z.number().int().positive().default(60_000),
    }),
    pipeline: z.object({
      requestTimeoutMs: z.number().int().positive().default(180_000),
      concurrency: z.number().int().positive().default(4),
    }),
  })
  .superRefine((value, ctx) => {
    if (value.extraction.provider === 'openai' && value.extraction.apiKey.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['extraction', 'apiKey'],
        message: 'Required when extraction provider is openai',
      });
    }
    if (value.extraction.provider === 'layout-service' && !value.extraction.baseUrl) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['extraction', 'baseUrl'],
        message: 'Required when extraction provider is layout-service',
      });
    }
    if (value.reasoning.provider !== 'ollama' && value.reasoning.apiKey.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['reasoning', 'apiKey'],
        message: `Required when reasoning provider is ${value.reasoning.provider}`,
      });
    }
  });

export type Config = z.infer<typeof configSchema>;
export type ExtractionConfig = Config['extraction'];
export type ReasoningConfig = Config['reasoning'];
export type PipelineConfig = Config['pipeline'];
