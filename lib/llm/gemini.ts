import { z } from 'zod';
import { recordUsage } from '@/lib/cost-tracker';
import { fetchFailure, GenerationError, httpFailure, requestSignal, type GenerateRequest, type TextGenerator } from './types';

export interface GeminiGeneratorOpts {
  apiKey: string;
  model?: string;
  baseUrl?: string;
  temperature?: number;
}

const GeminiResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z.object({ parts: z.array(z.object({ text: z.string().optional() })).optional() }).optional(),
        finishReason: z.string().optional()
      })
    )
    .optional(),
  usageMetadata: z
    .object({
      promptTokenCount: z.number().optional(),
      candidatesTokenCount: z.number().optional(),
      totalTokenCount: z.number().optional()
    })
    .optional()
});

export function createGeminiGenerator(opts: GeminiGeneratorOpts): TextGenerator {
  const model = opts.model || 'gemini-2.0-flash';
  const baseUrl = (opts.baseUrl || 'https://generativelanguage.googleapis.com/v1beta').replace(/\/$/, '');

  return {
    name: 'gemini',
    model,
    async generate(req: GenerateRequest): Promise<string> {
      const url = `${baseUrl}/models/${model}:generateContent?key=${encodeURIComponent(opts.apiKey)}`;
      const temperature = req.temperature ?? opts.temperature;
      console.info(`[LLM][agent=${req.agent || 'unknown'}] generateContent model=${model}`);

      let res: Response;
      try {
        res = await fetch(url, {
          method: 'POST',
          headers: { 'content-type': 'application/json' },
          signal: requestSignal(req.signal),
          body: JSON.stringify({
            ...(req.system ? { systemInstruction: { parts: [{ text: req.system }] } } : {}),
            contents: [{ role: 'user', parts: [{ text: req.prompt }] }],
            generationConfig: {
              temperature,
              maxOutputTokens: req.maxOutputTokens,
              ...(req.json ? { responseMimeType: 'application/json' } : {})
            }
          })
        });
      } catch (err) {
        throw fetchFailure('Gemini', err);
      }

      if (!res.ok) {
        throw await httpFailure('Gemini', res);
      }

      const parsed = GeminiResponseSchema.safeParse(await res.json());
      if (!parsed.success) {
        throw new GenerationError('Gemini returned an unexpected payload', { transient: true });
      }
      const body = parsed.data;
      const usage = body.usageMetadata;
      if (usage) {
        console.info(
          `[LLM][agent=${req.agent || 'unknown'}] done tokens in=${usage.promptTokenCount ?? 'n/a'} out=${usage.candidatesTokenCount ?? 'n/a'} model=${model}`
        );
        recordUsage(
          model,
          { inputTokens: usage.promptTokenCount, outputTokens: usage.candidatesTokenCount, totalTokens: usage.totalTokenCount },
          'gemini'
        );
      }

      const parts = body.candidates?.[0]?.content?.parts ?? [];
      const text = parts.map((p) => p.text ?? '').join('').trim();
      if (!text) {
        const reason = body.candidates?.[0]?.finishReason ?? 'no candidates';
        // SAFETY / RECITATION blocks will not change on retry
        const transient = !/SAFETY|RECITATION|BLOCKLIST|PROHIBITED/i.test(reason);
        throw new GenerationError(`Gemini returned empty response (${reason})`, { transient });
      }
      return text;
    }
  };
}
