import { z } from 'zod';
import { InvalidConfigurationError } from '@/lib/errors';
import type { StyleConfig } from '@/types/lecture';

export const FORMALITIES = ['casual', 'neutral', 'formal'] as const;
export const PROVIDERS = ['openai', 'openai-compatible', 'gemini', 'ollama'] as const;

export type ProviderName = (typeof PROVIDERS)[number];

export const BackoffSchema = z.object({
  initialDelayMs: z.number().min(0),
  maxDelayMs: z.number().min(0),
  multiplier: z.number().min(1),
  jitter: z.number().min(0).max(1)
});

export const PipelineConfigSchema = z
  .object({
    maxChunkChars: z.number().int().positive(),
    overlapChars: z.number().int().positive(),
    totalDurationSec: z.number().positive(),
    targetLanguage: z.string().trim().min(1),
    formality: z.enum(FORMALITIES),
    interactive: z.boolean(),
    guidance: z.string().trim().min(1).optional(),
    wordsPerMinute: z.number().min(60).max(240),
    maxRetryAttempts: z.number().int().min(1),
    concurrencyLimit: z.number().int().min(1),
    similarityThreshold: z.number().gt(0).max(1),
    backoff: BackoffSchema
  })
  .superRefine((cfg, ctx) => {
    if (cfg.overlapChars >= cfg.maxChunkChars) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['overlapChars'],
        message: `overlapChars (${cfg.overlapChars}) must be smaller than maxChunkChars (${cfg.maxChunkChars})`
      });
    }
    if (cfg.backoff.maxDelayMs < cfg.backoff.initialDelayMs) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['backoff', 'maxDelayMs'],
        message: 'maxDelayMs must be at least initialDelayMs'
      });
    }
  });

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

export type PipelineOverrides = Partial<Omit<PipelineConfig, 'backoff'>> & {
  backoff?: Partial<PipelineConfig['backoff']>;
};

export const ProviderConfigSchema = z.object({
  provider: z.enum(PROVIDERS),
  model: z.string().trim().min(1).optional(),
  baseUrl: z.string().url().optional(),
  apiKey: z.string().trim().min(1).optional(),
  temperature: z.number().min(0).max(2).optional()
});

export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;

type Env = Record<string, string | undefined>;

function opt(env: Env, name: string): string | undefined {
  const v = env[name];
  return v && v.trim() ? v.trim() : undefined;
}

function num(env: Env, name: string, def: number): number {
  const v = opt(env, name);
  return v === undefined ? def : Number(v);
}

function bool(env: Env, name: string, def: boolean): boolean {
  const v = opt(env, name);
  if (!v) return def;
  return ['1', 'true', 'yes', 'on'].includes(v.toLowerCase());
}

function envDefaults(env: Env) {
  const guidance = opt(env, 'LECTURE_GUIDANCE');
  return {
    maxChunkChars: num(env, 'LECTURE_MAX_CHUNK_CHARS', 8000),
    overlapChars: num(env, 'LECTURE_OVERLAP_CHARS', 400),
    totalDurationSec: Math.round(num(env, 'LECTURE_DURATION_MINUTES', 30) * 60),
    targetLanguage: opt(env, 'LECTURE_LANGUAGE') ?? 'en',
    formality: opt(env, 'LECTURE_FORMALITY') ?? 'neutral',
    interactive: bool(env, 'LECTURE_INTERACTIVE', true),
    ...(guidance ? { guidance } : {}),
    wordsPerMinute: num(env, 'LECTURE_WPM', 130),
    maxRetryAttempts: num(env, 'LECTURE_MAX_RETRY_ATTEMPTS', 3),
    concurrencyLimit: num(env, 'LECTURE_CONCURRENCY', 3),
    similarityThreshold: num(env, 'LECTURE_SIMILARITY_THRESHOLD', 0.9),
    backoff: {
      initialDelayMs: num(env, 'LECTURE_BACKOFF_MS', 1000),
      maxDelayMs: num(env, 'LECTURE_MAX_BACKOFF_MS', 30000),
      multiplier: 2,
      jitter: 0.25
    }
  };
}

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`);
}

/**
 * Merges overrides over the environment defaults and validates the result.
 * Throws InvalidConfigurationError listing every problem found.
 */
export function resolvePipelineConfig(overrides: PipelineOverrides = {}, env: Env = process.env): PipelineConfig {
  const base = envDefaults(env);
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined && key !== 'backoff') merged[key] = value;
  }
  const backoff: Record<string, unknown> = { ...base.backoff };
  for (const [key, value] of Object.entries(overrides.backoff ?? {})) {
    if (value !== undefined) backoff[key] = value;
  }
  merged.backoff = backoff;
  const parsed = PipelineConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new InvalidConfigurationError(formatIssues(parsed.error));
  }
  return parsed.data;
}

export function resolveProviderConfig(overrides: Partial<ProviderConfig> = {}, env: Env = process.env): ProviderConfig {
  const provider = overrides.provider ?? opt(env, 'LLM_PROVIDER') ?? 'openai';
  const apiKey =
    overrides.apiKey ??
    (provider === 'gemini'
      ? opt(env, 'GEMINI_API_KEY') ?? opt(env, 'GOOGLE_API_KEY')
      : provider === 'openai' || provider === 'openai-compatible'
        ? opt(env, 'OPENAI_API_KEY')
        : undefined);
  const raw = {
    provider,
    model: overrides.model ?? opt(env, 'LLM_MODEL'),
    baseUrl: overrides.baseUrl ?? opt(env, 'LLM_BASE_URL'),
    apiKey,
    temperature: overrides.temperature ?? (opt(env, 'LLM_TEMPERATURE') ? num(env, 'LLM_TEMPERATURE', 0.7) : undefined)
  };
  const parsed = ProviderConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidConfigurationError(formatIssues(parsed.error));
  }
  const cfg = parsed.data;
  if ((cfg.provider === 'openai' || cfg.provider === 'gemini') && !cfg.apiKey) {
    throw new InvalidConfigurationError(`${cfg.provider === 'gemini' ? 'GEMINI_API_KEY' : 'OPENAI_API_KEY'} missing`);
  }
  if (cfg.provider === 'openai-compatible' && !cfg.baseUrl) {
    throw new InvalidConfigurationError('LLM_BASE_URL is required for openai-compatible providers');
  }
  return cfg;
}

export function styleFromConfig(cfg: PipelineConfig): StyleConfig {
  return {
    targetLanguage: cfg.targetLanguage,
    formality: cfg.formality,
    totalDurationSec: cfg.totalDurationSec,
    interactive: cfg.interactive,
    guidance: cfg.guidance,
    wordsPerMinute: cfg.wordsPerMinute
  };
}
