import type { TimedSegment } from '@/types/lecture';

type CaptionEntry = { index: number; start: number; end: number; text: string };

function timeline(segments: readonly TimedSegment[]): CaptionEntry[] {
  return segments.map((segment, idx) => ({
    index: idx + 1,
    start: segment.startSec,
    end: segment.startSec + segment.durationSec,
    text: segment.title.trim()
  }));
}

function pad(num: number, size = 2) {
  return String(num).padStart(size, '0');
}

function formatClock(seconds: number, separator: ',' | '.'): string {
  const totalMs = Math.round(Math.max(0, seconds) * 1000);
  const ms = totalMs % 1000;
  const totalSeconds = Math.floor(totalMs / 1000);
  const s = totalSeconds % 60;
  const m = Math.floor(totalSeconds / 60) % 60;
  const h = Math.floor(totalSeconds / 3600);
  return `${pad(h)}:${pad(m)}:${pad(s)}${separator}${pad(ms, 3)}`;
}

export function formatSrtTime(seconds: number): string {
  return formatClock(seconds, ',');
}

export function formatVttTime(seconds: number): string {
  return formatClock(seconds, '.');
}

function wrapLines(text: string, maxChars = 64): string[] {
  if (text.length <= maxChars) return [text];
  const words = text.split(/\s+/);
  const lines: string[] = [];
  let current = '';
  for (const word of words) {
    const candidate = current ? `${current} ${word}` : word;
    if (candidate.length > maxChars) {
      if (current) lines.push(current);
      current = word;
    } else {
      current = candidate;
    }
  }
  if (current) lines.push(current);
  return lines;
}

export function generateSrt(segments: readonly TimedSegment[]): string {
  const body = timeline(segments)
    .map((entry) => {
      const lines = wrapLines(entry.text).join('\n');
      return `${entry.index}\n${formatSrtTime(entry.start)} --> ${formatSrtTime(entry.end)}\n${lines}`;
    })
    .join('\n\n');
  return `${body}\n`;
}

export function generateVtt(segments: readonly TimedSegment[]): string {
  const body = timeline(segments)
    .map((entry) => {
      const lines = wrapLines(entry.text).join('\n');
      return `${formatVttTime(entry.start)} --> ${formatVttTime(entry.end)}\n${lines}`;
    })
    .join('\n\n');
  return `WEBVTT\n\n${body}\n`;
}

export function buildCaptions(segments: readonly TimedSegment[]): { srt: string; vtt: string } {
  return {
    srt: generateSrt(segments),
    vtt: generateVtt(segments)
  };
}
