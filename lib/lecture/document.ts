import { InvalidConfigurationError } from '@/lib/errors';
import type { LectureDocument, StyleConfig } from '@/types/lecture';

const NBSP = /\u00a0/g;

export function tidy(text: string): string {
  return text
    .replace(NBSP, ' ')
    .replace(/\r\n?/g, '\n')
    .replace(/[ \t]+\n/g, '\n')
    .replace(/[ \t]{2,}/g, ' ')
    .replace(/\n{3,}/g, '\n\n')
    .replace(/\.{4,}/g, '...')
    .trim();
}

export function countWords(text: string): number {
  return text.match(/[\p{L}\p{N}]+(?:['’][\p{L}\p{N}]+)*/gu)?.length ?? 0;
}

export function buildDocument(rawText: string, style: StyleConfig, sourceName?: string): LectureDocument {
  const text = tidy(rawText);
  if (!text) {
    throw new InvalidConfigurationError('input document is empty');
  }
  return Object.freeze({
    text,
    wordCount: countWords(text),
    totalDurationSec: style.totalDurationSec,
    language: style.targetLanguage,
    style: Object.freeze({ ...style }),
    sourceName
  });
}
