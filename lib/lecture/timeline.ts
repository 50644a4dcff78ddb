import { InvalidConfigurationError } from '@/lib/errors';
import type { SegmentDraft, TimedSegment } from '@/types/lecture';

/**
 * Spreads `totalDurationSec` over every topic of every draft, proportional to
 * topic weight. Start times are exact cumulative sums, so the last segment
 * ends at the total. All-zero weights split the time evenly.
 */
export function allocate(drafts: readonly SegmentDraft[], totalDurationSec: number): TimedSegment[] {
  if (!Number.isFinite(totalDurationSec) || totalDurationSec <= 0) {
    throw new InvalidConfigurationError(`total duration must be a positive number of seconds (got ${totalDurationSec})`);
  }

  const ordered = [...drafts].sort((a, b) => a.chunkIndex - b.chunkIndex);
  const flat = ordered.flatMap((draft) => draft.topics.map((topic) => ({ chunkIndex: draft.chunkIndex, topic })));
  if (!flat.length) return [];

  const weights = flat.map(({ topic }) => (Number.isFinite(topic.weight) && topic.weight > 0 ? topic.weight : 0));
  const totalWeight = weights.reduce((sum, w) => sum + w, 0);

  let cursor = 0;
  return flat.map(({ chunkIndex, topic }, i) => {
    const durationSec = totalWeight > 0 ? (totalDurationSec * weights[i]) / totalWeight : totalDurationSec / flat.length;
    const segment: TimedSegment = {
      chunkIndex,
      title: topic.title,
      body: topic.body,
      weight: weights[i],
      ...(topic.checkpoints?.length ? { checkpoints: [...topic.checkpoints] } : {}),
      startSec: cursor,
      durationSec
    };
    cursor += durationSec;
    return segment;
  });
}

/** Whole seconds for display; stored values stay unrounded. */
export function displaySeconds(seconds: number): number {
  return Math.round(seconds);
}
