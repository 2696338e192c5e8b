import { z } from 'zod';

import { ConfigurationError } from './errors';
import { isLogLevel, type LogLevel } from './util/logger';

const DEFAULT_CORS_ORIGINS = ['http://localhost:8501', 'http://127.0.0.1:8501'];

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const envSchema = z.object({
  PORT: positiveInt(8000),
  LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .default('info')
    .refine(isLogLevel, { message: 'LOG_LEVEL must be one of debug, info, warn, error' }),
  OLLAMA_URL: z.string().trim().url().default('http://localhost:11434'),
  OLLAMA_MODEL: z.string().trim().min(1).default('mistral'),
  CLOUD_API_KEY: optionalString,
  GEMINI_API_KEY: optionalString,
  CLOUD_BASE_URL: z
    .string()
    .trim()
    .url()
    .default('https://generativelanguage.googleapis.com/v1beta/openai/'),
  CLOUD_MODEL: z.string().trim().min(1).default('gemini-1.5-flash'),
  GENERATION_TIMEOUT_MS: positiveInt(60_000),
  GENERATION_MAX_ATTEMPTS: positiveInt(1),
  RESUME_MAX_CHARS: positiveInt(4000),
  MAX_UPLOAD_BYTES: positiveInt(5 * 1024 * 1024),
  CORS_ALLOWED_ORIGINS: optionalString,
});

export type AppConfig = {
  port: number;
  logLevel: LogLevel;
  local: {
    url: string;
    model: string;
  };
  cloud: {
    apiKey?: string;
    baseUrl: string;
    model: string;
  };
  generation: {
    timeoutMs: number;
    maxAttempts: number;
  };
  resumeMaxChars: number;
  maxUploadBytes: number;
  corsOrigins: string[];
};

const parseOrigins = (raw: string | undefined): string[] => {
  const configured = (raw ?? '')
    .split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);

  return configured.length > 0 ? configured : DEFAULT_CORS_ORIGINS;
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${issues}`);
  }

  const parsed = result.data;

  return {
    port: parsed.PORT,
    logLevel: parsed.LOG_LEVEL,
    local: {
      url: parsed.OLLAMA_URL,
      model: parsed.OLLAMA_MODEL,
    },
    cloud: {
      apiKey: parsed.CLOUD_API_KEY ?? parsed.GEMINI_API_KEY,
      baseUrl: parsed.CLOUD_BASE_URL,
      model: parsed.CLOUD_MODEL,
    },
    generation: {
      timeoutMs: parsed.GENERATION_TIMEOUT_MS,
      maxAttempts: parsed.GENERATION_MAX_ATTEMPTS,
    },
    resumeMaxChars: parsed.RESUME_MAX_CHARS,
    maxUploadBytes: parsed.MAX_UPLOAD_BYTES,
    corsOrigins: parseOrigins(parsed.CORS_ALLOWED_ORIGINS),
  };
};

export const requireCloudApiKey = (config: Pick<AppConfig, 'cloud'>): string => {
  const { apiKey } = config.cloud;

  if (!apiKey) {
    throw new ConfigurationError(
      'Cloud model API key not configured. Set CLOUD_API_KEY (or GEMINI_API_KEY) to enable resume-based questions.',
    );
  }

  return apiKey;
};
