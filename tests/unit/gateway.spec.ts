import { describe, it, expect } from 'vitest';
import { MalformedSegmentError, TransformUnavailableError } from '@/lib/errors';
import { transform, type GatewayOptions } from '@/lib/lecture/gateway';
import { GenerationError } from '@/lib/llm/types';
import type { Chunk, StyleConfig } from '@/types/lecture';
import { NO_BACKOFF, ScriptedGenerator, topicsJson } from '../helpers/scripted-generator';

const text = 'x'.repeat(300);
const chunks: Chunk[] = [
  { sequenceIndex: 0, startOffset: 0, endOffset: 120, overlapPrefixLen: 0, overlapSuffixLen: 20 },
  { sequenceIndex: 1, startOffset: 100, endOffset: 220, overlapPrefixLen: 20, overlapSuffixLen: 20 },
  { sequenceIndex: 2, startOffset: 200, endOffset: 300, overlapPrefixLen: 20, overlapSuffixLen: 0 }
];

const style: StyleConfig = {
  targetLanguage: 'en',
  formality: 'neutral',
  totalDurationSec: 600,
  interactive: true,
  wordsPerMinute: 120
};

const valid = topicsJson([{ title: 'Intro', body: 'Welcome to the lecture.', weight: 2, checkpoints: ['Why are we here?'] }]);
const transient = () => new GenerationError('service unavailable', { transient: true, status: 503 });

function options(generator: ScriptedGenerator, overrides: Partial<GatewayOptions> = {}): GatewayOptions {
  return { document: { text }, chunkCount: chunks.length, generator, maxAttempts: 3, backoff: NO_BACKOFF, ...overrides };
}

describe('transform', () => {
  it('turns a model reply into a SegmentDraft for the chunk', async () => {
    const generator = new ScriptedGenerator([valid]);
    const draft = await transform(chunks[1], 'Earlier context.', style, options(generator));
    expect(draft).toEqual({
      chunkIndex: 1,
      // the only topic takes the whole share: 600 s * 100 own chars / 300 chars
      topics: [{ title: 'Intro', body: 'Welcome to the lecture.', weight: 200, checkpoints: ['Why are we here?'] }]
    });
    expect(generator.requests).toHaveLength(1);
    expect(generator.requests[0].json).toBe(true);
    expect(generator.requests[0].agent).toBe('SegmentWriter#1');
  });

  it('describes the chunk role, target length and context in the prompt', async () => {
    const generator = new ScriptedGenerator([valid]);
    await transform(chunks[0], '', { ...style, guidance: 'Use cooking analogies.' }, options(generator));
    const prompt = generator.requests[0].prompt;
    expect(prompt).toContain('Part 1 of 3');
    expect(prompt).toContain('This is the opening part');
    // 600 s * 120 own chars / 300 chars = 240 s -> 480 words at 120 wpm
    expect(prompt).toContain('Target speaking time for this part (sec): 240');
    expect(prompt).toContain('Target length for this part (words): about 480');
    expect(prompt).toContain('Use cooking analogies.');
    expect(prompt).toContain('[Start of the transcript]');
    expect(prompt.endsWith('x'.repeat(120))).toBe(true);
  });

  it('marks the last chunk as the closing part', async () => {
    const generator = new ScriptedGenerator([valid]);
    await transform(chunks[2], 'hint', style, options(generator));
    expect(generator.requests[0].prompt).toContain('This is the closing part');
  });

  it('splits the share evenly when weights are missing and drops checkpoints when not interactive', async () => {
    const generator = new ScriptedGenerator([
      topicsJson([
        { title: 'A', body: 'B.', checkpoints: ['Q?'] },
        { title: 'C', body: 'D.' }
      ])
    ]);
    const draft = await transform(chunks[0], '', { ...style, interactive: false }, options(generator));
    expect(draft.topics).toEqual([
      { title: 'A', body: 'B.', weight: 120 },
      { title: 'C', body: 'D.', weight: 120 }
    ]);
  });

  it('rescales relative weights to the share of the chunk', async () => {
    const generator = new ScriptedGenerator([
      topicsJson([
        { title: 'A', body: 'B.', weight: 1 },
        { title: 'C', body: 'D.', weight: 3 }
      ])
    ]);
    const draft = await transform(chunks[0], '', style, options(generator));
    expect(draft.topics.map((t) => t.weight)).toEqual([60, 180]);
  });

  it('recovers after two transient failures within three attempts', async () => {
    const generator = new ScriptedGenerator([transient(), transient(), valid]);
    const draft = await transform(chunks[2], '', style, options(generator));
    expect(draft.chunkIndex).toBe(2);
    expect(generator.requests).toHaveLength(3);
  });

  it('fails with TransformUnavailable once attempts run out', async () => {
    const generator = new ScriptedGenerator([], transient());
    const error = await transform(chunks[2], '', style, options(generator)).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(TransformUnavailableError);
    expect(error).toMatchObject({ chunkIndex: 2, attempts: 3, code: 'TRANSFORM_UNAVAILABLE' });
  });

  it('does not retry a permanent failure', async () => {
    const generator = new ScriptedGenerator([new GenerationError('invalid api key', { transient: false, status: 401 })]);
    const error = await transform(chunks[0], '', style, options(generator)).catch((err: unknown) => err);
    expect(error).toMatchObject({ chunkIndex: 0, attempts: 1 });
    expect(generator.requests).toHaveLength(1);
  });

  it('asks once for a reformat when the reply is unusable', async () => {
    const generator = new ScriptedGenerator(['{"topics": []}', valid]);
    const draft = await transform(chunks[0], '', style, options(generator));
    expect(draft.topics[0].title).toBe('Intro');
    expect(generator.requests).toHaveLength(2);
    expect(generator.requests[1].temperature).toBe(0);
    expect(generator.requests[1].prompt).toContain('{"topics": []}');
  });

  it('accepts a fenced reply with a trailing comma', async () => {
    const generator = new ScriptedGenerator(['```json\n{"topics": [{"title": "T", "body": "B.", "weight": 1},]}\n```']);
    const draft = await transform(chunks[0], '', style, options(generator));
    expect(draft.topics).toEqual([{ title: 'T', body: 'B.', weight: 240 }]);
  });

  it('fails with MalformedSegment when the reformat is unusable too', async () => {
    const generator = new ScriptedGenerator(['{"topics": []}', '{"topics": [{"title": "only title"}]}']);
    const error = await transform(chunks[1], '', style, options(generator)).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(MalformedSegmentError);
    expect(error).toMatchObject({ chunkIndex: 1, attempts: 2, issue: 'topics.0.body: Required' });
  });
});
