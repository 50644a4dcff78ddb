import { z } from 'zod';
import { recordUsage } from '@/lib/cost-tracker';
import { fetchFailure, GenerationError, httpFailure, requestSignal, type GenerateRequest, type TextGenerator } from './types';

export interface OllamaGeneratorOpts {
  model?: string;
  baseUrl?: string;
  temperature?: number;
}

const OllamaResponseSchema = z.object({
  response: z.string().optional(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional()
});

/** Local model runner; no key, no spend. */
export function createOllamaGenerator(opts: OllamaGeneratorOpts = {}): TextGenerator {
  const model = opts.model || 'llama3.1';
  const baseUrl = (opts.baseUrl || 'http://localhost:11434').replace(/\/$/, '');

  return {
    name: 'ollama',
    model,
    async generate(req: GenerateRequest): Promise<string> {
      console.info(`[LLM][agent=${req.agent || 'unknown'}] generate model=${model}`);
      let res: Response;
      try {
        res = await fetch(`${baseUrl}/api/generate`, {
          method: 'POST',
          headers: { 'content-type': 'application/json' },
          signal: requestSignal(req.signal),
          body: JSON.stringify({
            model,
            system: req.system,
            prompt: req.prompt,
            stream: false,
            ...(req.json ? { format: 'json' } : {}),
            options: {
              temperature: req.temperature ?? opts.temperature,
              num_predict: req.maxOutputTokens
            }
          })
        });
      } catch (err) {
        throw fetchFailure('Ollama', err);
      }

      if (!res.ok) {
        throw await httpFailure('Ollama', res);
      }

      const parsed = OllamaResponseSchema.safeParse(await res.json());
      if (!parsed.success) {
        throw new GenerationError('Ollama returned an unexpected payload', { transient: true });
      }
      const body = parsed.data;
      recordUsage(model, { inputTokens: body.prompt_eval_count, outputTokens: body.eval_count }, 'ollama');

      const text = (body.response ?? '').trim();
      if (!text) {
        throw new GenerationError('Ollama returned empty response', { transient: true });
      }
      return text;
    }
  };
}
