import { describe, it, expect } from 'vitest';
import { buildCaptions, formatSrtTime, formatVttTime } from '@/lib/lecture/captions';
import type { TimedSegment } from '@/types/lecture';

const segments: TimedSegment[] = [
  { chunkIndex: 0, title: 'Intro', body: 'Hello.', weight: 1, startSec: 0, durationSec: 90.5 },
  { chunkIndex: 1, title: 'Next', body: 'More.', weight: 1, startSec: 90.5, durationSec: 30 }
];

describe('captions', () => {
  it('formats clock times', () => {
    expect(formatSrtTime(3725.25)).toBe('01:02:05,250');
    expect(formatVttTime(0.5)).toBe('00:00:00.500');
  });

  it('writes one cue per segment', () => {
    const { srt, vtt } = buildCaptions(segments);
    expect(srt).toBe('1\n00:00:00,000 --> 00:01:30,500\nIntro\n\n2\n00:01:30,500 --> 00:02:00,500\nNext\n');
    expect(vtt).toBe('WEBVTT\n\n00:00:00.000 --> 00:01:30.500\nIntro\n\n00:01:30.500 --> 00:02:00.500\nNext\n');
  });
});
