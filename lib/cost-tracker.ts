import { AsyncLocalStorage } from 'node:async_hooks';
import { getPricingForModel } from '@/config/pricing';
import type { UsageSummary } from '@/types/lecture';

export type TokenUsage = {
  inputTokens?: number | null;
  outputTokens?: number | null;
  totalTokens?: number | null;
};

type CostState = {
  totalCostUsd: number;
  totalInputTokens: number;
  totalOutputTokens: number;
  breakdown: UsageSummary['breakdown'];
  limitUsd: number;
  runId: string;
};

const storage = new AsyncLocalStorage<CostState>();
let callCounter = 0;
let cumulativeCostUsd = 0;

export class CostLimitError extends Error {
  readonly code = 'COST_LIMIT' as const;

  constructor(message: string) {
    super(message);
    this.name = 'CostLimitError';
  }
}

function limitFromEnv(): number {
  const parsed = Number(process.env.LECTURE_MAX_COST_USD ?? 'NaN');
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : Number.POSITIVE_INFINITY;
}

export async function runWithCostTracking<T>(
  runId: string,
  fn: () => Promise<T>,
  limitUsd: number = limitFromEnv()
): Promise<{ value: T; usage: UsageSummary }> {
  const state: CostState = {
    totalCostUsd: 0,
    totalInputTokens: 0,
    totalOutputTokens: 0,
    breakdown: [],
    limitUsd,
    runId
  };
  const value = await storage.run(state, fn);
  return { value, usage: summarize(state) };
}

function normalizeTokens(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  return null;
}

/**
 * Records one call's token usage against the active run. Outside a run this
 * is a no-op. Throws CostLimitError once the run's spend passes its limit.
 */
export function recordUsage(model: string, usage: TokenUsage, provider?: string) {
  const state = storage.getStore();
  if (!state) return;

  const pricing = getPricingForModel(model, provider);
  const inputTokens = normalizeTokens(usage.inputTokens);
  const outputTokens = normalizeTokens(usage.outputTokens);
  const totalTokens = normalizeTokens(usage.totalTokens);

  const inputTok = inputTokens ?? (totalTokens !== null ? Math.max(totalTokens - (outputTokens ?? 0), 0) : 0);
  const outputTok = outputTokens ?? (totalTokens !== null ? Math.max(totalTokens - inputTok, 0) : 0);

  const costUsd = (inputTok / 1000) * pricing.input + (outputTok / 1000) * pricing.output;

  state.totalInputTokens += inputTok;
  state.totalOutputTokens += outputTok;
  state.totalCostUsd += costUsd;
  state.breakdown.push({ model, inputTokens: inputTok, outputTokens: outputTok, costUsd });

  cumulativeCostUsd += costUsd;
  callCounter += 1;
  const fmt = (n: number) => n.toFixed(6);
  console.info(
    `[cost][run=${state.runId}][#${callCounter}] cost=$${fmt(costUsd)} run_total=$${fmt(state.totalCostUsd)} cum=$${fmt(
      cumulativeCostUsd
    )} tokens(in=${inputTok}, out=${outputTok}) model=${model}`
  );

  if (state.totalCostUsd > state.limitUsd) {
    throw new CostLimitError(`Cost limit exceeded: $${state.totalCostUsd.toFixed(4)} > $${state.limitUsd.toFixed(4)}`);
  }
}

function summarize(state: CostState): UsageSummary {
  return {
    totalCostUsd: state.totalCostUsd,
    totalInputTokens: state.totalInputTokens,
    totalOutputTokens: state.totalOutputTokens,
    limitUsd: state.limitUsd,
    breakdown: state.breakdown
  };
}
