import { describe, it, expect } from 'vitest';
import { resolvePipelineConfig, resolveProviderConfig, styleFromConfig } from '@/config/pipeline';
import { InvalidConfigurationError } from '@/lib/errors';

describe('resolvePipelineConfig', () => {
  it('uses the documented defaults', () => {
    const cfg = resolvePipelineConfig({}, {});
    expect(cfg).toEqual({
      maxChunkChars: 8000,
      overlapChars: 400,
      totalDurationSec: 1800,
      targetLanguage: 'en',
      formality: 'neutral',
      interactive: true,
      wordsPerMinute: 130,
      maxRetryAttempts: 3,
      concurrencyLimit: 3,
      similarityThreshold: 0.9,
      backoff: { initialDelayMs: 1000, maxDelayMs: 30000, multiplier: 2, jitter: 0.25 }
    });
  });

  it('reads the environment and lets overrides win', () => {
    const env = { LECTURE_DURATION_MINUTES: '45', LECTURE_LANGUAGE: 'ko', LECTURE_INTERACTIVE: 'false', LECTURE_CONCURRENCY: '5' };
    const cfg = resolvePipelineConfig({ concurrencyLimit: 1, targetLanguage: undefined, backoff: { jitter: 0 } }, env);
    expect(cfg.totalDurationSec).toBe(2700);
    expect(cfg.targetLanguage).toBe('ko');
    expect(cfg.interactive).toBe(false);
    expect(cfg.concurrencyLimit).toBe(1);
    expect(cfg.backoff).toEqual({ initialDelayMs: 1000, maxDelayMs: 30000, multiplier: 2, jitter: 0 });
  });

  it('reports every problem at once', () => {
    let error: unknown;
    try {
      resolvePipelineConfig({ maxChunkChars: 500, overlapChars: 500, concurrencyLimit: 0 }, {});
    } catch (err) {
      error = err;
    }
    expect(error).toBeInstanceOf(InvalidConfigurationError);
    expect(error).toMatchObject({
      code: 'INVALID_CONFIGURATION',
      issues: [
        'concurrencyLimit: Number must be greater than or equal to 1',
        'overlapChars: overlapChars (500) must be smaller than maxChunkChars (500)'
      ]
    });
  });

  it('rejects an unknown formality from the environment', () => {
    expect(() => resolvePipelineConfig({}, { LECTURE_FORMALITY: 'pirate' })).toThrow(InvalidConfigurationError);
  });

  it('derives the style handed to prompts', () => {
    const style = styleFromConfig(resolvePipelineConfig({ guidance: 'Keep it short.' }, {}));
    expect(style).toEqual({
      targetLanguage: 'en',
      formality: 'neutral',
      totalDurationSec: 1800,
      interactive: true,
      guidance: 'Keep it short.',
      wordsPerMinute: 130
    });
  });
});

describe('resolveProviderConfig', () => {
  it('requires an API key for hosted providers', () => {
    expect(() => resolveProviderConfig({}, {})).toThrow('OPENAI_API_KEY missing');
    expect(() => resolveProviderConfig({ provider: 'gemini' }, {})).toThrow('GEMINI_API_KEY missing');
  });

  it('picks the key and model for the selected provider', () => {
    const cfg = resolveProviderConfig({}, { LLM_PROVIDER: 'gemini', GOOGLE_API_KEY: 'test-secret', LLM_MODEL: 'gemini-2.5-flash' });
    expect(cfg).toEqual({ provider: 'gemini', apiKey: 'test-secret', model: 'gemini-2.5-flash', baseUrl: undefined, temperature: undefined });
  });

  it('runs a local model without a key', () => {
    expect(resolveProviderConfig({ provider: 'ollama' }, {}).provider).toBe('ollama');
  });

  it('needs a base URL for OpenAI-compatible endpoints', () => {
    expect(() => resolveProviderConfig({ provider: 'openai-compatible' }, {})).toThrow(InvalidConfigurationError);
  });
});
