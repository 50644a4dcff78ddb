import type { ProviderName } from '@/config/pipeline';

export type GenerateRequest = {
  system?: string;
  prompt: string;
  temperature?: number;
  maxOutputTokens?: number;
  /** Ask the provider for a JSON object response where it supports one. */
  json?: boolean;
  signal?: AbortSignal;
  agent?: string;
};

export interface TextGenerator {
  readonly name: ProviderName;
  readonly model: string;
  generate(request: GenerateRequest): Promise<string>;
}

export class GenerationError extends Error {
  readonly transient: boolean;
  readonly status?: number;
  readonly retryAfterMs?: number;

  constructor(
    message: string,
    options: { transient: boolean; status?: number; retryAfterMs?: number; cause?: unknown }
  ) {
    super(message, { cause: options.cause });
    this.name = 'GenerationError';
    this.transient = options.transient;
    this.status = options.status;
    this.retryAfterMs = options.retryAfterMs;
  }
}

export const REQUEST_TIMEOUT_MS = Number(process.env.LLM_TIMEOUT_MS ?? '120000');

/** The caller's signal, bounded by the per-request timeout. */
export function requestSignal(signal?: AbortSignal, timeoutMs: number = REQUEST_TIMEOUT_MS): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  return signal ? AbortSignal.any([signal, timeout]) : timeout;
}

const TRANSIENT_STATUSES = new Set([408, 409, 425, 429]);

export function isTransientStatus(status: number | undefined): boolean {
  if (typeof status !== 'number') return false;
  return TRANSIENT_STATUSES.has(status) || status >= 500;
}

const NETWORK_HINTS = ['econnreset', 'econnrefused', 'etimedout', 'socket hang up', 'fetch failed', 'network', 'timeout'];

export function looksLikeNetworkFailure(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  const msg = err.message.toLowerCase();
  return NETWORK_HINTS.some((hint) => msg.includes(hint));
}

export function parseRetryAfter(value: string | null | undefined): number | undefined {
  if (!value) return undefined;
  const seconds = Number(value);
  if (Number.isFinite(seconds) && seconds >= 0) return seconds * 1000;
  const date = Date.parse(value);
  if (Number.isFinite(date)) return Math.max(0, date - Date.now());
  return undefined;
}

/** Turns a non-OK fetch response into a classified GenerationError. */
export async function httpFailure(provider: string, res: Response): Promise<GenerationError> {
  const text = await res.text().catch(() => '');
  return new GenerationError(`${provider} API error ${res.status}: ${text.slice(0, 300)}`, {
    transient: isTransientStatus(res.status),
    status: res.status,
    retryAfterMs: parseRetryAfter(res.headers.get('retry-after'))
  });
}

function errorName(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('name' in err)) return undefined;
  return typeof err.name === 'string' ? err.name : undefined;
}

/**
 * Wraps a thrown fetch failure. Caller aborts are passed through untouched;
 * a request that ran out of time is transient.
 */
export function fetchFailure(provider: string, err: unknown): unknown {
  if (err instanceof GenerationError) return err;
  const name = errorName(err);
  if (name === 'AbortError') return err;
  if (name === 'TimeoutError') {
    return new GenerationError(`${provider} request timed out after ${REQUEST_TIMEOUT_MS}ms`, { transient: true, cause: err });
  }
  const message = err instanceof Error ? err.message : String(err);
  return new GenerationError(`${provider} request failed: ${message}`, {
    transient: looksLikeNetworkFailure(err),
    cause: err
  });
}
