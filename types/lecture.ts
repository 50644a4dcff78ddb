export type Formality = 'casual' | 'neutral' | 'formal';

export type StyleConfig = {
  targetLanguage: string;
  formality: Formality;
  totalDurationSec: number;
  interactive: boolean;
  guidance?: string;
  wordsPerMinute: number;
};

export type LectureDocument = {
  readonly text: string;
  readonly wordCount: number;
  readonly totalDurationSec: number;
  readonly language: string;
  readonly style: Readonly<StyleConfig>;
  readonly sourceName?: string;
};

export type Chunk = {
  sequenceIndex: number;
  startOffset: number;
  endOffset: number;
  overlapPrefixLen: number;
  overlapSuffixLen: number;
};

export type DraftTopic = {
  title: string;
  body: string;
  weight: number;
  checkpoints?: string[];
};

export type SegmentDraft = {
  chunkIndex: number;
  topics: DraftTopic[];
};

export type TimedSegment = {
  chunkIndex: number;
  title: string;
  body: string;
  weight: number;
  checkpoints?: string[];
  /** Seconds from script start, unrounded. */
  startSec: number;
  durationSec: number;
};

export type ScriptHeader = {
  title: string;
  learningObjectives: string[];
  keyTerms?: string[];
};

export type LectureScript = {
  header: ScriptHeader;
  segments: TimedSegment[];
  totalDurationSec: number;
  language: string;
};

export type ReviewReport = {
  wordCount: number;
  targetWords: number;
  deviation: number;
  uncoveredObjectives: string[];
  underusedKeyTerms: string[];
  warnings: string[];
};

export type UsageSummary = {
  totalCostUsd: number;
  totalInputTokens: number;
  totalOutputTokens: number;
  limitUsd: number;
  breakdown: { model: string; inputTokens: number; outputTokens: number; costUsd: number }[];
};

export type LectureManifest = {
  id: string;
  sourceName?: string;
  lang: string;
  header: ScriptHeader;
  segments: TimedSegment[];
  chunks: Chunk[];
  review: ReviewReport;
  usage: UsageSummary;
  provider: { name: string; model: string };
  files: { script: string; srt?: string; vtt?: string };
  createdAt: string;
  version: number;
};
