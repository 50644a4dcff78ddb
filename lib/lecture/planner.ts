import { z } from 'zod';
import { CancelledRunError, throwIfCancelled } from '@/lib/errors';
import { withRetry, type BackoffOptions } from '@/lib/llm/retry';
import type { TextGenerator } from '@/lib/llm/types';
import { loadPrompt } from '@/lib/prompts';
import type { LectureDocument, ScriptHeader, StyleConfig, TimedSegment } from '@/types/lecture';
import { parseWithSchema } from './parse';

export const HeaderSchema = z.object({
  title: z.string().trim().min(1),
  learningObjectives: z.array(z.string().trim()).min(1),
  keyTerms: z.array(z.string().trim()).optional()
});

const headerSystemPrompt = loadPrompt('lecture-header.system.md');

const MAX_CONTENT_CHARS = 16000;
const MAX_OBJECTIVES = 5;
const MAX_KEY_TERMS = 8;

export type PlanHeaderOptions = {
  generator: TextGenerator;
  maxAttempts: number;
  backoff: BackoffOptions;
  signal?: AbortSignal;
  random?: () => number;
};

function normalizeHeader(result: z.infer<typeof HeaderSchema>): ScriptHeader {
  const objectives = result.learningObjectives.filter((o) => o.length).slice(0, MAX_OBJECTIVES);
  const keyTerms = [...new Set(result.keyTerms?.filter((t) => t.length) ?? [])].slice(0, MAX_KEY_TERMS);
  return {
    title: result.title.replace(/\s+/g, ' '),
    learningObjectives: objectives,
    ...(keyTerms.length ? { keyTerms } : {})
  };
}

/**
 * Asks the model for the lecture title, objectives and key terms. Returns
 * null when planning fails for any reason other than cancellation; the caller
 * falls back to `fallbackHeader`.
 */
export async function planHeader(
  document: Pick<LectureDocument, 'text'>,
  style: StyleConfig,
  opts: PlanHeaderOptions
): Promise<ScriptHeader | null> {
  throwIfCancelled(opts.signal);
  const content = document.text.length > MAX_CONTENT_CHARS ? document.text.slice(0, MAX_CONTENT_CHARS) : document.text;
  const userPrompt = [
    `Language: ${style.targetLanguage}`,
    `Lecture length (minutes): ${Math.round(style.totalDurationSec / 60)}`,
    ...(style.guidance ? ['', 'Instructions from the lecturer:', style.guidance] : []),
    '',
    'TRANSCRIPT',
    content
  ].join('\n');

  try {
    const raw = await withRetry(
      () =>
        opts.generator.generate({
          system: headerSystemPrompt,
          prompt: userPrompt,
          temperature: 0.3,
          maxOutputTokens: 1200,
          json: true,
          signal: opts.signal,
          agent: 'LecturePlanner'
        }),
      { ...opts.backoff, maxAttempts: opts.maxAttempts, signal: opts.signal, random: opts.random }
    );
    const parsed = parseWithSchema(raw, HeaderSchema);
    if (!parsed.ok) {
      console.warn(`[lecture][planner] unusable header (${parsed.issue}); using fallback`);
      return null;
    }
    return normalizeHeader(parsed.value);
  } catch (err) {
    if (err instanceof CancelledRunError) throw err;
    console.warn(`[lecture][planner] header planning failed (${err instanceof Error ? err.message : String(err)}); using fallback`);
    return null;
  }
}

/** Header built from the document's first line and the first topic titles. */
export function fallbackHeader(document: Pick<LectureDocument, 'text' | 'sourceName'>, segments: readonly TimedSegment[]): ScriptHeader {
  const firstLine = document.text.split('\n').find((line) => line.trim().length)?.trim() ?? '';
  const title =
    (firstLine.length && firstLine.length <= 120 ? firstLine : undefined) ??
    segments[0]?.title ??
    document.sourceName ??
    'Lecture';
  const titles = [...new Set(segments.map((s) => s.title.trim()).filter(Boolean))].slice(0, MAX_OBJECTIVES);
  return {
    title: title.replace(/^#+\s*/, ''),
    learningObjectives: titles.map((t) => `Explain ${t}`)
  };
}
