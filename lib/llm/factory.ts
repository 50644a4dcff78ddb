import type { ProviderConfig } from '@/config/pipeline';
import { InvalidConfigurationError } from '@/lib/errors';
import { createGeminiGenerator } from './gemini';
import { createOllamaGenerator } from './ollama';
import { createOpenAICompatibleGenerator, createOpenAIGenerator } from './openai';
import type { TextGenerator } from './types';

export function createTextGenerator(config: ProviderConfig): TextGenerator {
  switch (config.provider) {
    case 'openai':
      return createOpenAIGenerator({
        apiKey: config.apiKey,
        model: config.model,
        baseUrl: config.baseUrl,
        temperature: config.temperature
      });
    case 'openai-compatible':
      return createOpenAICompatibleGenerator({
        apiKey: config.apiKey,
        model: config.model,
        baseUrl: config.baseUrl,
        temperature: config.temperature
      });
    case 'gemini':
      if (!config.apiKey) {
        throw new InvalidConfigurationError('GEMINI_API_KEY missing');
      }
      return createGeminiGenerator({
        apiKey: config.apiKey,
        model: config.model,
        baseUrl: config.baseUrl,
        temperature: config.temperature
      });
    case 'ollama':
      return createOllamaGenerator({
        model: config.model,
        baseUrl: config.baseUrl,
        temperature: config.temperature
      });
  }
}
