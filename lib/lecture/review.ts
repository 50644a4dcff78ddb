import type { LectureScript, ReviewReport } from '@/types/lecture';
import { countWords } from './document';
import { tokenize } from './stitcher';

export const MAX_LENGTH_DEVIATION = 0.2;
const MIN_KEY_TERM_USES = 2;
const MIN_OBJECTIVE_COVERAGE = 0.5;

const STOPWORDS = new Set(
  'a an and are as at be by can for from how in into is it of on or that the their this to understand use using what when why with explain describe identify apply learn students will'.split(
    ' '
  )
);

function countOccurrences(haystack: string, needle: string): number {
  if (!needle) return 0;
  let count = 0;
  let from = 0;
  for (;;) {
    const at = haystack.indexOf(needle, from);
    if (at < 0) return count;
    count++;
    from = at + needle.length;
  }
}

/**
 * Checks the finished script against the requested length and its own
 * header. Problems are reported as warnings; nothing here fails a run.
 */
export function reviewScript(script: LectureScript, wordsPerMinute: number): ReviewReport {
  const spoken = script.segments.map((s) => `${s.title}\n${s.body}`).join('\n');
  const wordCount = countWords(spoken);
  const targetWords = Math.round((script.totalDurationSec / 60) * wordsPerMinute);
  const deviation = targetWords > 0 ? (wordCount - targetWords) / targetWords : 0;
  const warnings: string[] = [];

  if (Math.abs(deviation) > MAX_LENGTH_DEVIATION) {
    warnings.push(
      `script has ${wordCount} words, ${Math.round(Math.abs(deviation) * 100)}% ${deviation > 0 ? 'above' : 'below'} the ${targetWords}-word target`
    );
  }

  const lower = spoken.toLowerCase();
  const bodyTokens = new Set(tokenize(spoken));

  const uncoveredObjectives = script.header.learningObjectives.filter((objective) => {
    const words = tokenize(objective).filter((w) => w.length > 2 && !STOPWORDS.has(w));
    if (!words.length) return false;
    const hits = words.filter((w) => bodyTokens.has(w)).length;
    return hits / words.length < MIN_OBJECTIVE_COVERAGE;
  });
  for (const objective of uncoveredObjectives) {
    warnings.push(`learning objective not covered: ${objective}`);
  }

  const underusedKeyTerms = (script.header.keyTerms ?? []).filter(
    (term) => countOccurrences(lower, term.toLowerCase()) < MIN_KEY_TERM_USES
  );
  for (const term of underusedKeyTerms) {
    warnings.push(`key term used fewer than ${MIN_KEY_TERM_USES} times: ${term}`);
  }

  return { wordCount, targetWords, deviation, uncoveredObjectives, underusedKeyTerms, warnings };
}
