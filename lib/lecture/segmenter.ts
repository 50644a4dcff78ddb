import { InvalidConfigurationError } from '@/lib/errors';
import type { Chunk, LectureDocument } from '@/types/lecture';

/** Share of a chunk, counted back from the hard cut, searched for a clean boundary. */
const BOUNDARY_LOOKBACK_RATIO = 0.1;
const CONTEXT_HINT_CHARS = 280;

function assertSizes(maxChunkChars: number, overlapChars: number) {
  const issues: string[] = [];
  if (!Number.isInteger(maxChunkChars) || maxChunkChars <= 0) {
    issues.push(`maxChunkChars must be a positive integer (got ${maxChunkChars})`);
  }
  if (!Number.isInteger(overlapChars) || overlapChars <= 0) {
    issues.push(`overlapChars must be a positive integer (got ${overlapChars})`);
  }
  if (!issues.length && overlapChars >= maxChunkChars) {
    issues.push(`overlapChars (${overlapChars}) must be smaller than maxChunkChars (${maxChunkChars})`);
  }
  if (issues.length) throw new InvalidConfigurationError(issues);
}

export function expectedChunkCount(length: number, maxChunkChars: number, overlapChars: number): number {
  if (length <= maxChunkChars) return 1;
  return Math.max(1, Math.ceil((length - overlapChars) / (maxChunkChars - overlapChars)));
}

function isParagraphBreak(text: string, p: number) {
  return text[p - 1] === '\n';
}

function isSentenceBreak(text: string, p: number) {
  return /\s/.test(text[p - 1] ?? '') && /[.!?…]["'”’)\]]?$/.test(text.slice(Math.max(0, p - 3), p - 1));
}

/**
 * Picks where a non-final chunk ends. A paragraph or sentence boundary inside
 * the lookback window is used only while the run can still finish in
 * `budget` chunks; otherwise the cut lands exactly on `hardEnd`.
 */
function pickEnd(text: string, start: number, hardEnd: number, overlap: number, index: number, budget: number, stride: number) {
  const window = Math.max(1, Math.floor((hardEnd - start) * BOUNDARY_LOOKBACK_RATIO));
  const minEnd = Math.max(start + overlap + 1, hardEnd - window);
  const fits = (end: number) => index + 1 + Math.ceil((text.length - end) / stride) <= budget;

  let paragraph = -1;
  let sentence = -1;
  for (let p = hardEnd; p >= minEnd; p--) {
    if (paragraph < 0 && isParagraphBreak(text, p)) paragraph = p;
    if (sentence < 0 && isSentenceBreak(text, p)) sentence = p;
    if (paragraph >= 0 && sentence >= 0) break;
  }

  if (paragraph >= 0 && fits(paragraph)) return paragraph;
  if (sentence >= 0 && fits(sentence)) return sentence;
  return hardEnd;
}

/**
 * Splits a document into overlapping windows of at most `maxChunkChars`.
 * Consecutive chunks share exactly `overlapChars` characters and together
 * cover the whole text.
 */
export function segment(document: Pick<LectureDocument, 'text'>, maxChunkChars: number, overlapChars: number): Chunk[] {
  assertSizes(maxChunkChars, overlapChars);
  const text = document.text;
  const length = text.length;
  if (length === 0) {
    throw new InvalidConfigurationError('document is empty');
  }

  if (length <= maxChunkChars) {
    return [{ sequenceIndex: 0, startOffset: 0, endOffset: length, overlapPrefixLen: 0, overlapSuffixLen: 0 }];
  }

  const budget = expectedChunkCount(length, maxChunkChars, overlapChars);
  const stride = maxChunkChars - overlapChars;
  const chunks: Chunk[] = [];
  let start = 0;

  for (;;) {
    const sequenceIndex = chunks.length;
    const overlapPrefixLen = sequenceIndex === 0 ? 0 : overlapChars;
    if (length - start <= maxChunkChars) {
      chunks.push({ sequenceIndex, startOffset: start, endOffset: length, overlapPrefixLen, overlapSuffixLen: 0 });
      return chunks;
    }
    const end = pickEnd(text, start, start + maxChunkChars, overlapChars, sequenceIndex, budget, stride);
    chunks.push({ sequenceIndex, startOffset: start, endOffset: end, overlapPrefixLen, overlapSuffixLen: overlapChars });
    start = end - overlapChars;
  }
}

export function chunkText(text: string, chunk: Chunk): string {
  return text.slice(chunk.startOffset, chunk.endOffset);
}

/** Characters this chunk contributes that no earlier chunk already covered. */
export function ownLength(chunk: Chunk): number {
  return chunk.endOffset - chunk.startOffset - chunk.overlapPrefixLen;
}

/**
 * The last sentences of source text right before `chunk`, used to point the
 * model at where the previous part left off.
 */
export function contextHintFor(text: string, chunk: Chunk, maxChars = CONTEXT_HINT_CHARS): string {
  if (chunk.startOffset === 0) return '';
  const tail = text
    .slice(Math.max(0, chunk.startOffset - maxChars), chunk.startOffset)
    .replace(/\s+/g, ' ')
    .trim();
  const boundary = tail.search(/[.!?]\s+\S/);
  if (boundary >= 0 && tail.length - boundary > 40) {
    return tail.slice(boundary + 1).trim();
  }
  return tail;
}
