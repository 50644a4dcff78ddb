import type { TimedSegment } from '@/types/lecture';

export const DEFAULT_SIMILARITY_THRESHOLD = 0.9;

const TERMINAL_PUNCTUATION = /[.!?…。！？]["'”’)\]]*$/u;

export type StitchOptions = {
  similarityThreshold?: number;
  onMerge?: (kept: TimedSegment, dropped: TimedSegment, similarity: number, atSeam: boolean) => void;
};

export function tokenize(text: string): string[] {
  return text.toLowerCase().normalize('NFKC').match(/[\p{L}\p{N}]+/gu) ?? [];
}

/** Jaccard index of two token sets, 0 when both are empty. */
export function tokenOverlap(a: readonly string[], b: readonly string[]): number {
  const left = new Set(a);
  const right = new Set(b);
  if (!left.size && !right.size) return 0;
  let shared = 0;
  for (const token of left) {
    if (right.has(token)) shared++;
  }
  return shared / (left.size + right.size - shared);
}

export function segmentSimilarity(a: TimedSegment, b: TimedSegment): number {
  return tokenOverlap(tokenize(`${a.title} ${a.body}`), tokenize(`${b.title} ${b.body}`));
}

/** Positions in `segments` where a new chunk's topics begin. */
export function seamIndices(segments: readonly TimedSegment[]): number[] {
  const seams: number[] = [];
  for (let i = 1; i < segments.length; i++) {
    if (segments[i].chunkIndex !== segments[i - 1].chunkIndex) seams.push(i);
  }
  return seams;
}

function mergePair(earlier: TimedSegment, later: TimedSegment): TimedSegment {
  const richer = tokenize(later.body).length > tokenize(earlier.body).length ? later : earlier;
  const checkpoints = [...new Set([...(earlier.checkpoints ?? []), ...(later.checkpoints ?? [])])];
  return {
    chunkIndex: earlier.chunkIndex,
    title: richer.title,
    body: richer.body,
    weight: earlier.weight + later.weight,
    ...(checkpoints.length ? { checkpoints } : {}),
    startSec: earlier.startSec,
    durationSec: later.startSec + later.durationSec - earlier.startSec
  };
}

export function endsMidThought(body: string): boolean {
  const trimmed = body.trimEnd();
  return trimmed.length > 0 && !TERMINAL_PUNCTUATION.test(trimmed);
}

function bridge(segment: TimedSegment, next: TimedSegment | undefined): TimedSegment {
  if (!endsMidThought(segment.body)) return segment;
  const body = segment.body.trimEnd();
  return {
    ...segment,
    body: next ? `${body}... This leads us into ${next.title}.` : `${body}...`
  };
}

/**
 * Folds adjacent near-duplicate topics into one and closes bodies that stop
 * mid-sentence. Order is never changed and the merged segment spans the time
 * of both originals, so every later start time stays where it was.
 */
export function stitch(
  segments: readonly TimedSegment[],
  chunkBoundaries: readonly number[],
  options: StitchOptions = {}
): TimedSegment[] {
  const threshold = options.similarityThreshold ?? DEFAULT_SIMILARITY_THRESHOLD;
  const seams = new Set(chunkBoundaries);
  const merged: TimedSegment[] = [];

  segments.forEach((segment, i) => {
    const previous = merged[merged.length - 1];
    if (previous) {
      const similarity = segmentSimilarity(previous, segment);
      if (similarity >= threshold) {
        const combined = mergePair(previous, segment);
        options.onMerge?.(combined, segment, similarity, seams.has(i));
        merged[merged.length - 1] = combined;
        return;
      }
    }
    merged.push({ ...segment });
  });

  return merged.map((segment, i) => bridge(segment, merged[i + 1]));
}
