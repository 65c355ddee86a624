import { ZodError } from 'zod';
import { ConfigurationError } from '../utils/errors.js';
import { configSchema, type Config } from './validation.js';

export type { Config, ExtractionConfig, ReasoningConfig, PipelineConfig } from './validation.js';

type Env = Record<string, string | undefined>;

const int = (value: string | undefined): number | undefined =>
  value ? parseInt(value, 10) : undefined;

const float = (value: string | undefined): number | undefined =>
  value ? parseFloat(value) : undefined;

const optional = (value: string | undefined): string | undefined =>
  value && value.trim().length > 0 ? value.trim() : undefined;

export function loadConfig(env: Env = process.env): Config {
  const rawConfig = {
    server: {
      nodeEnv: optional(env.NODE_ENV),
      port: int(env.PORT),
      logLevel: optional(env.LOG_LEVEL),
      maxUploadSizeMB: float(env.MAX_UPLOAD_SIZE_MB),
    },
    extraction: {
      provider: optional(env.EXTRACTION_PROVIDER),
      model: optional(env.EXTRACTION_MODEL),
      apiKey: env.EXTRACTION_API_KEY || env.OPENAI_API_KEY || '',
      baseUrl: optional(env.EXTRACTION_BASE_URL),
      callTimeoutMs: int(env.EXTRACTION_CALL_TIMEOUT_MS),
      minConfidence: float(env.EXTRACTION_MIN_CONFIDENCE),
      maxPages: int(env.EXTRACTION_MAX_PAGES),
      rasterDpi: int(env.EXTRACTION_RASTER_DPI),
    },
    reasoning: {
      provider: optional(env.REASONING_PROVIDER),
      model: optional(env.REASONING_MODEL),
      apiKey: env.REASONING_API_KEY || '',
      baseUrl: optional(env.REASONING_BASE_URL),
      maxTokens: int(env.REASONING_MAX_TOKENS),
      temperature: float(env.REASONING_TEMPERATURE),
      callTimeoutMs: int(env.REASONING_CALL_TIMEOUT_MS),
    },
    pipeline: {
      requestTimeoutMs: int(env.PIPELINE_REQUEST_TIMEOUT_MS),
      concurrency: int(env.PIPELINE_CONCURRENCY),
    },
  };

  try {
    return configSchema.parse(rawConfig);
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.issues.map(issue => ({
        field: issue.path.join('.'),
        message: issue.message,
      }));
      throw new ConfigurationError('Invalid configuration', issues);
    }
    throw error;
  }
}

/** Prints configuration issues the way the entry points expect, then exits. */
export function exitOnConfigError(error: unknown): never {
  if (error instanceof ConfigurationError) {
    console.error('\n❌ Invalid configuration:\n');
    for (const issue of error.issues) {
      console.error(`  ${issue.field}: ${issue.message}`);
    }
    console.error('\nCheck .env file and compare with .env.example\n');
  } else {
    console.error('Config error:', error);
  }
  process.exit(1);
}
