import { describe, it, expect } from 'vitest';
import { InvalidConfigurationError } from '@/lib/errors';
import { allocate, displaySeconds } from '@/lib/lecture/timeline';
import type { SegmentDraft } from '@/types/lecture';

const draft = (chunkIndex: number, ...weights: number[]): SegmentDraft => ({
  chunkIndex,
  topics: weights.map((weight, i) => ({ title: `Topic ${chunkIndex}.${i}`, body: 'Body.', weight }))
});

describe('allocate', () => {
  it('splits the total in proportion to weight', () => {
    const timed = allocate([draft(0, 1), draft(1, 2), draft(2, 1)], 3600);
    expect(timed.map((s) => s.durationSec)).toEqual([900, 1800, 900]);
    expect(timed.map((s) => s.startSec)).toEqual([0, 900, 2700]);
  });

  it('follows chunk order, not input order', () => {
    const timed = allocate([draft(2, 1), draft(0, 1, 1), draft(1, 2)], 500);
    expect(timed.map((s) => s.title)).toEqual(['Topic 0.0', 'Topic 0.1', 'Topic 1.0', 'Topic 2.0']);
    expect(timed.map((s) => s.chunkIndex)).toEqual([0, 0, 1, 2]);
    expect(timed.map((s) => s.startSec)).toEqual([0, 100, 200, 400]);
  });

  it('keeps durations summing to the total with uneven weights', () => {
    const timed = allocate([draft(0, 0.3, 1.7), draft(1, 2.2), draft(2, 5)], 1234);
    const sum = timed.reduce((acc, s) => acc + s.durationSec, 0);
    expect(Math.abs(sum - 1234)).toBeLessThanOrEqual(1);
    for (let i = 1; i < timed.length; i++) {
      expect(timed[i].startSec).toBeGreaterThanOrEqual(timed[i - 1].startSec);
    }
    const last = timed[timed.length - 1];
    expect(last.startSec + last.durationSec).toBeCloseTo(1234, 6);
  });

  it('splits evenly when every weight is zero', () => {
    const timed = allocate([draft(0, 0, 0), draft(1, 0, 0)], 100);
    expect(timed.map((s) => s.durationSec)).toEqual([25, 25, 25, 25]);
  });

  it('gives zero-weight topics no time when others carry weight', () => {
    const timed = allocate([draft(0, 0, 3)], 90);
    expect(timed.map((s) => s.durationSec)).toEqual([0, 90]);
    expect(timed.map((s) => s.startSec)).toEqual([0, 0]);
  });

  it('rejects a non-positive total', () => {
    expect(() => allocate([draft(0, 1)], 0)).toThrow(InvalidConfigurationError);
    expect(() => allocate([draft(0, 1)], Number.NaN)).toThrow(InvalidConfigurationError);
  });

  it('returns nothing for no topics', () => {
    expect(allocate([], 60)).toEqual([]);
  });
});

describe('displaySeconds', () => {
  it('rounds to whole seconds', () => {
    expect(displaySeconds(899.5)).toBe(900);
    expect(displaySeconds(12.4)).toBe(12);
  });
});
