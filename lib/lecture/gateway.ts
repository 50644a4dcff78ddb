import { MalformedSegmentError, TransformUnavailableError, throwIfCancelled } from '@/lib/errors';
import { RetryError, withRetry, type BackoffOptions } from '@/lib/llm/retry';
import type { GenerateRequest, TextGenerator } from '@/lib/llm/types';
import { fillPrompt, loadPrompt } from '@/lib/prompts';
import type { Chunk, LectureDocument, SegmentDraft, StyleConfig } from '@/types/lecture';
import { parseSegmentDraft, type SegmentDraftPayload } from './parse';
import { chunkText, ownLength } from './segmenter';

const segmentWriterSystemPrompt = loadPrompt('segment-writer.system.md');
const reformatTemplate = loadPrompt('segment-reformat.md');

const WRITER_TEMPERATURE = 0.7;
const MAX_RAW_ECHO_CHARS = 12000;

export type GatewayOptions = {
  document: Pick<LectureDocument, 'text'>;
  chunkCount: number;
  generator: TextGenerator;
  maxAttempts: number;
  backoff: BackoffOptions;
  signal?: AbortSignal;
  random?: () => number;
};

type Role = 'only' | 'opening' | 'middle' | 'closing';

function roleOf(chunk: Chunk, chunkCount: number): Role {
  if (chunkCount <= 1) return 'only';
  if (chunk.sequenceIndex === 0) return 'opening';
  if (chunk.sequenceIndex === chunkCount - 1) return 'closing';
  return 'middle';
}

const ROLE_BRIEF: Record<Role, string> = {
  only: 'This is the whole lecture: open with a hook and the learning objectives, teach the material, close with a recap and next steps.',
  opening: 'This is the opening part: start with an engaging hook, state what the audience will learn, then teach this part.',
  middle: 'This is a middle part: continue the lecture naturally from where the previous part stopped, without a new introduction.',
  closing: 'This is the closing part: teach this part, then recap the key takeaways and suggest next steps.'
};

const FORMALITY_BRIEF: Record<StyleConfig['formality'], string> = {
  casual: 'conversational and relaxed',
  neutral: 'clear and friendly, like a good university lecture',
  formal: 'formal and precise'
};

export function targetSecondsFor(chunk: Chunk, documentLength: number, style: StyleConfig): number {
  return (style.totalDurationSec * ownLength(chunk)) / Math.max(1, documentLength);
}

export function buildSegmentPrompt(
  chunk: Chunk,
  sourceText: string,
  contextHint: string,
  style: StyleConfig,
  chunkCount: number,
  documentLength: number
): string {
  const targetSeconds = targetSecondsFor(chunk, documentLength, style);
  const targetWords = Math.max(40, Math.round((targetSeconds / 60) * style.wordsPerMinute));
  return [
    `Part ${chunk.sequenceIndex + 1} of ${chunkCount}`,
    ROLE_BRIEF[roleOf(chunk, chunkCount)],
    `Language: ${style.targetLanguage}`,
    `Register: ${FORMALITY_BRIEF[style.formality]}`,
    `Interactive elements (questions/exercises): ${style.interactive ? 'required, 1-2 per topic' : 'none'}`,
    `Target speaking time for this part (sec): ${Math.round(targetSeconds)}`,
    `Target length for this part (words): about ${targetWords}`,
    ...(style.guidance ? ['', 'Instructions from the lecturer:', style.guidance] : []),
    '',
    'Where the previous part left off:',
    contextHint || '[Start of the transcript]',
    '',
    'TRANSCRIPT EXCERPT',
    sourceText
  ].join('\n');
}

/**
 * Model weights are relative within one part. They are rescaled so the
 * topics of a part add up to that part's share of the lecture, which keeps
 * parts comparable once the timeline spreads time over all of them.
 */
function toDraft(chunkIndex: number, payload: SegmentDraftPayload, style: StyleConfig, targetSeconds: number): SegmentDraft {
  const raw = payload.topics.map((topic) => topic.weight ?? 0);
  const sum = raw.reduce((acc, w) => acc + w, 0);
  return {
    chunkIndex,
    topics: payload.topics.map((topic, i) => {
      const checkpoints = style.interactive ? topic.checkpoints?.filter((c) => c.length > 0) : undefined;
      return {
        title: topic.title.replace(/\s+/g, ' '),
        body: topic.body.replace(/[ \t]+\n/g, '\n').trim(),
        weight: sum > 0 ? (raw[i] * targetSeconds) / sum : targetSeconds / raw.length,
        ...(checkpoints && checkpoints.length ? { checkpoints } : {})
      };
    })
  };
}

/**
 * Turns one chunk into a SegmentDraft. Transient provider failures are retried
 * with backoff inside this call; unusable output gets one stricter
 * reformatting request. Each invocation is self-contained.
 */
export async function transform(
  chunk: Chunk,
  contextHint: string,
  style: StyleConfig,
  opts: GatewayOptions
): Promise<SegmentDraft> {
  throwIfCancelled(opts.signal);
  const index = chunk.sequenceIndex;
  const text = opts.document.text;
  let attempts = 0;

  const call = async (request: GenerateRequest): Promise<string> => {
    try {
      return await withRetry(
        () => {
          attempts += 1;
          return opts.generator.generate({ ...request, signal: opts.signal });
        },
        {
          ...opts.backoff,
          maxAttempts: opts.maxAttempts,
          signal: opts.signal,
          random: opts.random,
          onRetry: (attempt, error, delayMs) => {
            console.warn(
              `[lecture][chunk=${index}] attempt ${attempt}/${opts.maxAttempts} failed (${error.message}); retrying in ${delayMs}ms`
            );
          }
        }
      );
    } catch (err) {
      if (err instanceof RetryError) {
        throw new TransformUnavailableError(index, attempts, err.cause);
      }
      throw err;
    }
  };

  const prompt = buildSegmentPrompt(chunk, chunkText(text, chunk), contextHint, style, opts.chunkCount, text.length);
  const targetSeconds = targetSecondsFor(chunk, text.length, style);
  const maxOutputTokens = Math.min(16000, Math.round((targetSeconds / 60) * style.wordsPerMinute * 2) + 1500);

  const raw = await call({
    system: segmentWriterSystemPrompt,
    prompt,
    temperature: WRITER_TEMPERATURE,
    maxOutputTokens,
    json: true,
    agent: `SegmentWriter#${index}`
  });

  const first = parseSegmentDraft(raw);
  if (first.ok) {
    return toDraft(index, first.value, style, targetSeconds);
  }

  console.warn(`[lecture][chunk=${index}] unusable segment (${first.issue}); asking for a reformat`);
  const repairedRaw = await call({
    system: segmentWriterSystemPrompt,
    prompt: fillPrompt(reformatTemplate, { issue: first.issue, raw: raw.slice(0, MAX_RAW_ECHO_CHARS) }),
    temperature: 0,
    maxOutputTokens,
    json: true,
    agent: `SegmentReformat#${index}`
  });

  const second = parseSegmentDraft(repairedRaw);
  if (!second.ok) {
    throw new MalformedSegmentError(index, 2, second.issue);
  }
  return toDraft(index, second.value, style, targetSeconds);
}
