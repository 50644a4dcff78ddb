import OpenAI from 'openai';
import type { Response as ResponsesResult, ResponseCreateParamsNonStreaming } from 'openai/resources/responses/responses';
import type { ChatCompletion, ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import { recordUsage } from '@/lib/cost-tracker';
import {
  GenerationError,
  isTransientStatus,
  parseRetryAfter,
  REQUEST_TIMEOUT_MS,
  type GenerateRequest,
  type TextGenerator
} from './types';

export type OpenAIGeneratorOptions = {
  apiKey?: string;
  model?: string;
  baseUrl?: string;
  temperature?: number;
  client?: OpenAI;
};

function reasoningBlockFor(model: string): Pick<ResponseCreateParamsNonStreaming, 'reasoning'> {
  // Reasoning models take an effort setting instead of sampling knobs
  if (/gpt-5|^o\d/i.test(model)) {
    const effort = (process.env.OPENAI_REASONING_EFFORT || 'medium').trim().toLowerCase();
    if (effort === 'low' || effort === 'medium' || effort === 'high') {
      return { reasoning: { effort } };
    }
  }
  return {};
}

function makeClient(opts: OpenAIGeneratorOptions): OpenAI {
  if (opts.client) return opts.client;
  return new OpenAI({
    apiKey: opts.apiKey || 'not-needed',
    baseURL: opts.baseUrl,
    // retries belong to the segment gateway, not the SDK
    maxRetries: 0,
    timeout: REQUEST_TIMEOUT_MS
  });
}

function isUnsupportedTemperature(err: unknown) {
  return err instanceof Error && /Unsupported parameter: 'temperature'/.test(err.message);
}

export function toGenerationError(provider: string, err: unknown): unknown {
  if (err instanceof OpenAI.APIUserAbortError) return err;
  if (err instanceof OpenAI.APIConnectionError) {
    return new GenerationError(`${provider} connection error: ${err.message}`, { transient: true, cause: err });
  }
  if (err instanceof OpenAI.APIError) {
    const retryAfter = err.headers?.['retry-after'];
    return new GenerationError(`${provider} error ${err.status ?? ''}: ${err.message}`, {
      transient: isTransientStatus(err.status),
      status: err.status,
      retryAfterMs: parseRetryAfter(typeof retryAfter === 'string' ? retryAfter : undefined),
      cause: err
    });
  }
  return err;
}

function logCall(agent: string | undefined, kind: string, model: string) {
  console.info(`[LLM][agent=${agent || 'unknown'}] ${kind} model=${model}`);
}

function logDone(agent: string | undefined, model: string, input?: number | null, output?: number | null) {
  console.info(`[LLM][agent=${agent || 'unknown'}] done tokens in=${input ?? 'n/a'} out=${output ?? 'n/a'} model=${model}`);
}

/** OpenAI Responses API. */
export function createOpenAIGenerator(opts: OpenAIGeneratorOptions = {}): TextGenerator {
  const model = opts.model || process.env.OPENAI_MODEL || 'gpt-5-mini';
  const client = makeClient(opts);

  return {
    name: 'openai',
    model,
    async generate(req: GenerateRequest): Promise<string> {
      const temperature = req.temperature ?? opts.temperature;
      const buildPayload = (includeTemperature: boolean): ResponseCreateParamsNonStreaming => ({
        model,
        input: [
          ...(req.system ? [{ role: 'system' as const, content: req.system }] : []),
          { role: 'user' as const, content: req.prompt }
        ],
        text: { format: req.json ? { type: 'json_object' } : { type: 'text' } },
        ...(includeTemperature && typeof temperature === 'number' ? { temperature } : {}),
        ...(typeof req.maxOutputTokens === 'number' ? { max_output_tokens: req.maxOutputTokens } : {}),
        ...reasoningBlockFor(model)
      });

      logCall(req.agent, 'responses', model);
      let res: ResponsesResult;
      try {
        res = await client.responses.create(buildPayload(true), { signal: req.signal });
      } catch (err) {
        if (!isUnsupportedTemperature(err)) throw toGenerationError('OpenAI', err);
        // Retry once without temperature if this model disallows it
        try {
          res = await client.responses.create(buildPayload(false), { signal: req.signal });
        } catch (err2) {
          throw toGenerationError('OpenAI', err2);
        }
      }

      const usage = res.usage;
      if (usage) {
        logDone(req.agent, model, usage.input_tokens, usage.output_tokens);
        recordUsage(model, { inputTokens: usage.input_tokens, outputTokens: usage.output_tokens, totalTokens: usage.total_tokens }, 'openai');
      }

      const text = res.output_text;
      if (!text) {
        throw new GenerationError('OpenAI returned empty response', { transient: true });
      }
      return text.trim();
    }
  };
}

/**
 * Chat Completions against any OpenAI-compatible server (hosted gateways,
 * Gemini's compatibility endpoint, LM Studio, vLLM, llama.cpp server).
 */
export function createOpenAICompatibleGenerator(opts: OpenAIGeneratorOptions = {}): TextGenerator {
  const model = opts.model || process.env.OPENAI_MODEL || 'gpt-4o-mini';
  const client = makeClient(opts);

  return {
    name: 'openai-compatible',
    model,
    async generate(req: GenerateRequest): Promise<string> {
      const temperature = req.temperature ?? opts.temperature;
      const payload: ChatCompletionCreateParamsNonStreaming = {
        model,
        messages: [
          ...(req.system ? [{ role: 'system' as const, content: req.system }] : []),
          { role: 'user' as const, content: req.prompt }
        ],
        ...(typeof temperature === 'number' ? { temperature } : {}),
        ...(typeof req.maxOutputTokens === 'number' ? { max_tokens: req.maxOutputTokens } : {}),
        ...(req.json ? { response_format: { type: 'json_object' as const } } : {})
      };

      logCall(req.agent, 'chat', model);
      let res: ChatCompletion;
      try {
        res = await client.chat.completions.create(payload, { signal: req.signal });
      } catch (err) {
        throw toGenerationError('OpenAI-compatible', err);
      }

      const usage = res.usage;
      if (usage) {
        logDone(req.agent, model, usage.prompt_tokens, usage.completion_tokens);
        recordUsage(model, { inputTokens: usage.prompt_tokens, outputTokens: usage.completion_tokens, totalTokens: usage.total_tokens }, 'openai-compatible');
      }

      const text = res.choices[0]?.message?.content;
      if (!text) {
        throw new GenerationError('OpenAI-compatible server returned empty response', { transient: true });
      }
      return text.trim();
    }
  };
}
