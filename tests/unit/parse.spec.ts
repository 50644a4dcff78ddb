import { describe, it, expect } from 'vitest';
import { parseJsonFromModel, parseSegmentDraft } from '@/lib/lecture/parse';

describe('parseJsonFromModel', () => {
  it('reads plain JSON', () => {
    expect(parseJsonFromModel('{"a": 1}')).toEqual({ a: 1 });
  });

  it('reads a fenced block surrounded by chatter', () => {
    expect(parseJsonFromModel('Here you go:\n```json\n{"a": [1, 2]}\n```\nEnjoy!')).toEqual({ a: [1, 2] });
  });

  it('slices the outermost object out of prose', () => {
    expect(parseJsonFromModel('Sure! {"ok": true} Hope that helps.')).toEqual({ ok: true });
  });

  it('repairs single quotes and trailing commas', () => {
    expect(parseJsonFromModel("{'a': 1, 'b': [2, 3,],}")).toEqual({ a: 1, b: [2, 3] });
  });
});

describe('parseSegmentDraft', () => {
  it('accepts topics with optional weight and checkpoints', () => {
    const result = parseSegmentDraft('{"topics": [{"title": " Intro ", "body": "Hello."}]}');
    expect(result).toEqual({ ok: true, value: { topics: [{ title: 'Intro', body: 'Hello.' }] } });
  });

  it('names the first problem it finds', () => {
    expect(parseSegmentDraft('{"topics": []}')).toEqual({
      ok: false,
      issue: 'topics: Array must contain at least 1 element(s)'
    });
    expect(parseSegmentDraft('{"topics": [{"title": "T", "body": "B", "weight": -1}]}')).toEqual({
      ok: false,
      issue: 'topics.0.weight: Number must be greater than or equal to 0'
    });
    expect(parseSegmentDraft('{}')).toEqual({ ok: false, issue: 'topics: Required' });
  });
});
