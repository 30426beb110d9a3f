import { z } from 'zod';
import { ConfigurationError } from './utils/errors.js';

export function readEnv(name: string): string | undefined {
  const value = typeof process !== 'undefined' ? process.env?.[name] : undefined;
  return value === '' ? undefined : value;
}

const temperatureFromEnv = (fallback: number) => z.coerce.number().min(0).max(2).default(fallback);
const intFromEnv = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  GEMINI_API_KEY: z.string().min(1).optional(),
  GEMINI_MODEL: z.string().min(1).default('gemini-1.5-flash'),
  GEMINI_API_BASE: z.string().url().default('https://generativelanguage.googleapis.com'),
  LLM_TIMEOUT_MS: intFromEnv(60_000),
  GENERATION_TEMPERATURE: temperatureFromEnv(0.7),
  GENERATION_RETRY_TEMPERATURE: temperatureFromEnv(0.4),
  GENERATION_MAX_TOKENS: intFromEnv(2048),
  GENERATION_MAX_TOKENS_CEILING: intFromEnv(8192),
  GENERATION_BACKOFF_MS: z.coerce.number().int().min(0).default(500),
  PROMPT_PREFIX_CHARS: intFromEnv(6000),
  PROMPT_SUFFIX_CHARS: intFromEnv(2000),
  PROMPT_TEMPLATE_PATH: z.string().min(1).optional(),
  BIBLE_DB_PATH: z.string().min(1).default('database/RVV.SQLite3'),
}).superRefine((env, ctx) => {
  if (env.GENERATION_RETRY_TEMPERATURE >= env.GENERATION_TEMPERATURE) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['GENERATION_RETRY_TEMPERATURE'], message: 'must be lower than GENERATION_TEMPERATURE' });
  }
  if (env.GENERATION_MAX_TOKENS_CEILING < env.GENERATION_MAX_TOKENS) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['GENERATION_MAX_TOKENS_CEILING'], message: 'must be at least GENERATION_MAX_TOKENS' });
  }
});

export interface GenerationSettings {
  temperature: number;
  retryTemperature: number;
  maxOutputTokens: number;
  maxOutputTokensCeiling: number;
  backoffMs: number;
  promptPrefixChars: number;
  promptSuffixChars: number;
}

export interface AppConfig {
  gemini: { apiKey?: string; model: string; apiBase: string; timeoutMs: number };
  generation: GenerationSettings;
  promptTemplatePath?: string;
  bibleDbPath: string;
}

const ENV_KEYS = Object.keys(EnvSchema.innerType().shape);

/**
 * Read and validate the process environment. Unset and empty variables fall
 * back to defaults; anything present but invalid raises ConfigurationError.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const raw: Record<string, string> = {};
  for (const key of ENV_KEYS) {
    const value = env[key];
    if (value !== undefined && value !== '') raw[key] = value;
  }
  const parsed = EnvSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }
  const e = parsed.data;
  return {
    gemini: { apiKey: e.GEMINI_API_KEY, model: e.GEMINI_MODEL, apiBase: e.GEMINI_API_BASE, timeoutMs: e.LLM_TIMEOUT_MS },
    generation: {
      temperature: e.GENERATION_TEMPERATURE,
      retryTemperature: e.GENERATION_RETRY_TEMPERATURE,
      maxOutputTokens: e.GENERATION_MAX_TOKENS,
      maxOutputTokensCeiling: e.GENERATION_MAX_TOKENS_CEILING,
      backoffMs: e.GENERATION_BACKOFF_MS,
      promptPrefixChars: e.PROMPT_PREFIX_CHARS,
      promptSuffixChars: e.PROMPT_SUFFIX_CHARS,
    },
    promptTemplatePath: e.PROMPT_TEMPLATE_PATH,
    bibleDbPath: e.BIBLE_DB_PATH,
  };
}

export function requireApiKey(config: AppConfig): string {
  if (!config.gemini.apiKey) throw new ConfigurationError('GEMINI_API_KEY environment variable is required', ['GEMINI_API_KEY: required']);
  return config.gemini.apiKey;
}
