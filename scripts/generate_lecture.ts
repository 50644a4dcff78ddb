#!/usr/bin/env tsx
import 'dotenv/config';
import { join, parse as parsePath } from 'node:path';
import { Command } from 'commander';
import { FORMALITIES, PROVIDERS, resolveProviderConfig, type PipelineOverrides, type ProviderConfig } from '@/config/pipeline';
import { CancelledRunError, InvalidConfigurationError, isLectureError } from '@/lib/errors';
import { createTextGenerator } from '@/lib/llm/factory';
import { buildCaptions } from '@/lib/lecture/captions';
import { readTranscript } from '@/lib/lecture/ingest';
import { buildManifest, writeArtifacts } from '@/lib/lecture/manifest';
import { generateLecture } from '@/lib/lecture/pipeline';

type GenerateFlags = {
  out?: string;
  minutes?: string;
  lang?: string;
  formality?: string;
  interactive?: boolean;
  guidance?: string;
  wpm?: string;
  maxChunkChars?: string;
  overlapChars?: string;
  retries?: string;
  concurrency?: string;
  similarity?: string;
  backoffMs?: string;
  maxBackoffMs?: string;
  maxCost?: string;
  provider?: string;
  model?: string;
  baseUrl?: string;
  captions: boolean;
  stdout?: boolean;
};

function asNumber(input: string | undefined): number | undefined {
  return input === undefined ? undefined : Number(input);
}

function isOneOf<T extends string>(values: readonly T[], input: string): input is T {
  return values.some((v) => v === input);
}

function pick<T extends string>(name: string, values: readonly T[], input: string | undefined): T | undefined {
  if (input === undefined) return undefined;
  if (!isOneOf(values, input)) {
    throw new InvalidConfigurationError(`${name} must be one of ${values.join(', ')} (got ${input})`);
  }
  return input;
}

function overridesFromFlags(flags: GenerateFlags): PipelineOverrides {
  const minutes = asNumber(flags.minutes);
  return {
    maxChunkChars: asNumber(flags.maxChunkChars),
    overlapChars: asNumber(flags.overlapChars),
    totalDurationSec: minutes === undefined ? undefined : Math.round(minutes * 60),
    targetLanguage: flags.lang,
    formality: pick('formality', FORMALITIES, flags.formality),
    interactive: flags.interactive,
    guidance: flags.guidance,
    wordsPerMinute: asNumber(flags.wpm),
    maxRetryAttempts: asNumber(flags.retries),
    concurrencyLimit: asNumber(flags.concurrency),
    similarityThreshold: asNumber(flags.similarity),
    backoff: { initialDelayMs: asNumber(flags.backoffMs), maxDelayMs: asNumber(flags.maxBackoffMs) }
  };
}

function providerFromFlags(flags: GenerateFlags): Partial<ProviderConfig> {
  return { provider: pick('provider', PROVIDERS, flags.provider), model: flags.model, baseUrl: flags.baseUrl };
}

async function generate(input: string, flags: GenerateFlags) {
  const generator = createTextGenerator(resolveProviderConfig(providerFromFlags(flags)));
  const text = await readTranscript(input);

  const controller = new AbortController();
  const onSigint = () => {
    console.error('\nCancelling...');
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  try {
    const result = await generateLecture(
      { text, sourceName: parsePath(input).base },
      {
        generator,
        overrides: overridesFromFlags(flags),
        signal: controller.signal,
        costLimitUsd: asNumber(flags.maxCost)
      }
    );

    if (flags.stdout) {
      process.stdout.write(result.text);
    }

    const outDir = flags.out ?? join(process.cwd(), 'out', result.runId);
    const manifest = buildManifest({
      id: result.runId,
      sourceName: parsePath(input).base,
      lang: result.script.language,
      header: result.script.header,
      segments: result.script.segments,
      chunks: result.chunks,
      review: result.review,
      usage: result.usage,
      provider: { name: generator.name, model: generator.model },
      captions: flags.captions
    });
    const manifestPath = await writeArtifacts(
      outDir,
      manifest,
      result.text,
      flags.captions ? buildCaptions(result.script.segments) : undefined
    );
    console.error(`Wrote ${manifestPath}`);
    console.error(
      `Estimated cost: $${result.usage.totalCostUsd.toFixed(4)} (${result.usage.totalInputTokens + result.usage.totalOutputTokens} tokens)`
    );
  } finally {
    process.off('SIGINT', onSigint);
  }
}

const program = new Command();

program.name('generate_lecture').description('Turn a transcript into a timed lecture script');

program
  .command('generate')
  .argument('<input>', 'transcript file (.pdf or text)')
  .option('-o, --out <dir>', 'output directory (default: out/<run id>)')
  .option('-m, --minutes <n>', 'total lecture length in minutes')
  .option('-l, --lang <code>', 'target language')
  .option('--formality <level>', `one of ${FORMALITIES.join(', ')}`)
  .option('--interactive', 'include questions and exercises')
  .option('--no-interactive', 'leave out questions and exercises')
  .option('--guidance <text>', 'free-text instructions passed to every prompt')
  .option('--wpm <n>', 'speaking rate in words per minute')
  .option('--max-chunk-chars <n>', 'largest chunk sent to the model')
  .option('--overlap-chars <n>', 'characters shared by consecutive chunks')
  .option('--retries <n>', 'attempts per model call')
  .option('--concurrency <n>', 'chunks transformed at once')
  .option('--similarity <x>', 'near-duplicate threshold between 0 and 1')
  .option('--backoff-ms <n>', 'first retry delay')
  .option('--max-backoff-ms <n>', 'longest retry delay')
  .option('--max-cost <usd>', 'stop once estimated spend passes this amount')
  .option('--provider <name>', `one of ${PROVIDERS.join(', ')}`)
  .option('--model <name>', 'model name for the provider')
  .option('--base-url <url>', 'provider endpoint')
  .option('--no-captions', 'skip SRT/VTT output')
  .option('--stdout', 'also print the script to stdout')
  .action(async (input: string, flags: GenerateFlags) => {
    await generate(input, flags);
  });

async function main() {
  await program.parseAsync(process.argv);
}

main().catch((err: unknown) => {
  if (err instanceof CancelledRunError) {
    console.error('Run cancelled');
    process.exit(130);
  }
  if (isLectureError(err)) {
    console.error(`[${err.code}] ${err.message}`);
  } else {
    console.error(err);
  }
  process.exit(1);
});
