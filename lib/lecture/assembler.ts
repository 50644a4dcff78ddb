import type { ScriptHeader, TimedSegment } from '@/types/lecture';
import { displaySeconds } from './timeline';

function pad(num: number, size = 2) {
  return String(num).padStart(size, '0');
}

/** `[MM:SS]`; minutes keep counting past 59. */
export function formatTimestamp(seconds: number): string {
  const total = Math.max(0, displaySeconds(seconds));
  return `[${pad(Math.floor(total / 60))}:${pad(total % 60)}]`;
}

function renderHeader(header: ScriptHeader): string[] {
  const lines = [`# ${header.title.trim()}`, ''];
  const objectives = header.learningObjectives.map((o) => o.trim()).filter(Boolean);
  if (objectives.length) {
    lines.push('## Learning Objectives', ...objectives.map((o) => `- ${o}`), '');
  }
  const terms = header.keyTerms?.map((t) => t.trim()).filter(Boolean) ?? [];
  if (terms.length) {
    lines.push(`Key terms: ${terms.join(', ')}`, '');
  }
  return lines;
}

function renderSegment(segment: TimedSegment): string[] {
  const lines = [`${formatTimestamp(segment.startSec)} ${segment.title.trim()}`, segment.body.trim()];
  if (segment.checkpoints?.length) {
    lines.push('', 'Check your understanding:', ...segment.checkpoints.map((c) => `- ${c.trim()}`));
  }
  lines.push('');
  return lines;
}

/** Pure rendering: the same header and segments always give the same text. */
export function assemble(segments: readonly TimedSegment[], header: ScriptHeader): string {
  const lines = [...renderHeader(header), ...segments.flatMap(renderSegment)];
  return `${lines.join('\n').trimEnd()}\n`;
}
