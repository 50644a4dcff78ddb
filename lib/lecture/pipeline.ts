import { resolvePipelineConfig, styleFromConfig, type PipelineConfig, type PipelineOverrides } from '@/config/pipeline';
import { runWithCostTracking } from '@/lib/cost-tracker';
import { throwIfCancelled } from '@/lib/errors';
import type { TextGenerator } from '@/lib/llm/types';
import type { Chunk, LectureScript, ReviewReport, ScriptHeader, SegmentDraft, UsageSummary } from '@/types/lecture';
import { assemble } from './assembler';
import { buildDocument } from './document';
import { transform } from './gateway';
import { lectureRunId } from './ids';
import { fallbackHeader, planHeader } from './planner';
import { mapPool } from './pool';
import { reviewScript } from './review';
import { contextHintFor, segment } from './segmenter';
import { seamIndices, stitch } from './stitcher';
import { allocate } from './timeline';

export type LectureInput = {
  text: string;
  sourceName?: string;
};

export type GenerateLectureOptions = {
  generator: TextGenerator;
  overrides?: PipelineOverrides;
  /** Skips header planning when given. */
  header?: ScriptHeader;
  signal?: AbortSignal;
  env?: Record<string, string | undefined>;
  /** Spend limit for the run in USD; defaults to LECTURE_MAX_COST_USD. */
  costLimitUsd?: number;
  random?: () => number;
};

type PoolTask = { kind: 'header' } | { kind: 'chunk'; chunk: Chunk };
type PoolOutcome = { kind: 'header'; header: ScriptHeader | null } | { kind: 'chunk'; draft: SegmentDraft };

export type LectureResult = {
  runId: string;
  config: PipelineConfig;
  script: LectureScript;
  text: string;
  review: ReviewReport;
  usage: UsageSummary;
  chunks: Chunk[];
};

/**
 * transcript -> chunks -> drafts (bounded concurrency) -> timed segments
 * -> stitched segments -> rendered script. Any chunk failure or a
 * cancellation fails the whole run; no partial script is produced.
 */
export async function generateLecture(input: LectureInput, options: GenerateLectureOptions): Promise<LectureResult> {
  const config = resolvePipelineConfig(options.overrides, options.env);
  const style = styleFromConfig(config);
  const document = buildDocument(input.text, style, input.sourceName);
  const chunks = segment(document, config.maxChunkChars, config.overlapChars);
  const runId = lectureRunId(document.text, {
    ...config,
    provider: options.generator.name,
    model: options.generator.model
  });
  const { signal, generator } = options;
  const tag = `[lecture][run=${runId}]`;

  console.info(
    `${tag} ${document.text.length} chars, ${document.wordCount} words -> ${chunks.length} chunk(s) via ${generator.name}/${generator.model}`
  );

  const { value, usage } = await runWithCostTracking(
    runId,
    async () => {
      throwIfCancelled(signal);
      const retry = { maxAttempts: config.maxRetryAttempts, backoff: config.backoff, random: options.random };

      // Header planning shares the pool with the chunk transforms, so it counts
      // against the concurrency limit and is aborted with them.
      const tasks: PoolTask[] = chunks.map((chunk): PoolTask => ({ kind: 'chunk', chunk }));
      if (!options.header) tasks.unshift({ kind: 'header' });

      const outcomes = await mapPool(
        tasks,
        config.concurrencyLimit,
        async (task, _index, poolSignal): Promise<PoolOutcome> => {
          if (task.kind === 'header') {
            const header = await planHeader(document, style, { generator, ...retry, signal: poolSignal });
            return { kind: 'header', header };
          }
          const { chunk } = task;
          const draft = await transform(chunk, contextHintFor(document.text, chunk), style, {
            document,
            chunkCount: chunks.length,
            generator,
            maxAttempts: config.maxRetryAttempts,
            backoff: config.backoff,
            signal: poolSignal,
            random: options.random
          });
          console.info(`${tag} chunk ${chunk.sequenceIndex + 1}/${chunks.length} done (${draft.topics.length} topic(s))`);
          return { kind: 'chunk', draft };
        },
        signal
      );
      throwIfCancelled(signal);

      const drafts: SegmentDraft[] = [];
      let planned: ScriptHeader | null = options.header ?? null;
      for (const outcome of outcomes) {
        if (outcome.kind === 'chunk') drafts.push(outcome.draft);
        else planned = outcome.header;
      }

      const timed = allocate(drafts, style.totalDurationSec);
      const segments = stitch(timed, seamIndices(timed), {
        similarityThreshold: config.similarityThreshold,
        onMerge: (kept, dropped, similarity, atSeam) => {
          console.info(
            `${tag} merged "${dropped.title}" into "${kept.title}" (similarity ${similarity.toFixed(2)}${atSeam ? ', chunk seam' : ''})`
          );
        }
      });

      const header = planned ?? fallbackHeader(document, segments);
      const script: LectureScript = {
        header,
        segments,
        totalDurationSec: style.totalDurationSec,
        language: style.targetLanguage
      };
      return { script, text: assemble(segments, header) };
    },
    options.costLimitUsd
  );

  const review = reviewScript(value.script, style.wordsPerMinute);
  for (const warning of review.warnings) {
    console.warn(`${tag} review: ${warning}`);
  }
  console.info(
    `${tag} ${value.script.segments.length} segment(s), ${review.wordCount} words, $${usage.totalCostUsd.toFixed(4)}`
  );

  return { runId, config, script: value.script, text: value.text, review, usage, chunks };
}
