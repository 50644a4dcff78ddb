import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import type { Chunk, LectureManifest, ReviewReport, ScriptHeader, TimedSegment, UsageSummary } from '@/types/lecture';

export const MANIFEST_VERSION = 1;

const TimedSegmentSchema = z.object({
  chunkIndex: z.number().int().nonnegative(),
  title: z.string(),
  body: z.string(),
  weight: z.number(),
  checkpoints: z.array(z.string()).optional(),
  startSec: z.number(),
  durationSec: z.number()
});

const ManifestSchema = z.object({
  id: z.string().min(1),
  sourceName: z.string().optional(),
  lang: z.string(),
  header: z.object({
    title: z.string(),
    learningObjectives: z.array(z.string()),
    keyTerms: z.array(z.string()).optional()
  }),
  segments: z.array(TimedSegmentSchema),
  chunks: z.array(
    z.object({
      sequenceIndex: z.number().int(),
      startOffset: z.number().int(),
      endOffset: z.number().int(),
      overlapPrefixLen: z.number().int(),
      overlapSuffixLen: z.number().int()
    })
  ),
  review: z.object({
    wordCount: z.number(),
    targetWords: z.number(),
    deviation: z.number(),
    uncoveredObjectives: z.array(z.string()),
    underusedKeyTerms: z.array(z.string()),
    warnings: z.array(z.string())
  }),
  usage: z.object({
    totalCostUsd: z.number(),
    totalInputTokens: z.number(),
    totalOutputTokens: z.number(),
    limitUsd: z.number().nullable().transform((v) => v ?? Number.POSITIVE_INFINITY),
    breakdown: z.array(
      z.object({ model: z.string(), inputTokens: z.number(), outputTokens: z.number(), costUsd: z.number() })
    )
  }),
  provider: z.object({ name: z.string(), model: z.string() }),
  files: z.object({ script: z.string(), srt: z.string().optional(), vtt: z.string().optional() }),
  createdAt: z.string(),
  version: z.number().int()
});

export const SCRIPT_FILE = 'script.md';
export const SRT_FILE = 'captions.srt';
export const VTT_FILE = 'captions.vtt';
export const MANIFEST_FILE = 'manifest.json';

export function buildManifest(args: {
  id: string;
  sourceName?: string;
  lang: string;
  header: ScriptHeader;
  segments: TimedSegment[];
  chunks: Chunk[];
  review: ReviewReport;
  usage: UsageSummary;
  provider: { name: string; model: string };
  captions?: boolean;
  now?: Date;
}): LectureManifest {
  return {
    id: args.id,
    sourceName: args.sourceName,
    lang: args.lang,
    header: args.header,
    segments: args.segments,
    chunks: args.chunks,
    review: args.review,
    usage: args.usage,
    provider: args.provider,
    files: {
      script: SCRIPT_FILE,
      ...(args.captions ? { srt: SRT_FILE, vtt: VTT_FILE } : {})
    },
    createdAt: (args.now ?? new Date()).toISOString(),
    version: MANIFEST_VERSION
  };
}

/** Writes the script, optional captions and the manifest into `dir`. */
export async function writeArtifacts(
  dir: string,
  manifest: LectureManifest,
  script: string,
  captions?: { srt: string; vtt: string }
): Promise<string> {
  await mkdir(dir, { recursive: true });
  await writeFile(join(dir, manifest.files.script), script, 'utf8');
  if (captions && manifest.files.srt && manifest.files.vtt) {
    await writeFile(join(dir, manifest.files.srt), captions.srt, 'utf8');
    await writeFile(join(dir, manifest.files.vtt), captions.vtt, 'utf8');
  }
  const path = join(dir, MANIFEST_FILE);
  // Infinity has no JSON form; an unlimited budget is stored as null.
  await writeFile(
    path,
    JSON.stringify(manifest, (_key, value: unknown) => (value === Number.POSITIVE_INFINITY ? null : value), 2),
    'utf8'
  );
  return path;
}

export async function readManifest(dir: string): Promise<LectureManifest | null> {
  let data: string;
  try {
    data = await readFile(join(dir, MANIFEST_FILE), 'utf8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null;
    throw err;
  }
  return ManifestSchema.parse(JSON.parse(data));
}
