import OpenAI from 'openai';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { createGeminiGenerator } from '@/lib/llm/gemini';
import { createOllamaGenerator } from '@/lib/llm/ollama';
import { toGenerationError } from '@/lib/llm/openai';
import { fetchFailure, GenerationError, httpFailure, requestSignal } from '@/lib/llm/types';

const fetchMock = vi.fn<typeof fetch>();

function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), { status: 200, headers: { 'content-type': 'application/json' }, ...init });
}

async function failureOf(promise: Promise<unknown>): Promise<unknown> {
  return promise.then(
    () => undefined,
    (err: unknown) => err
  );
}

beforeEach(() => {
  fetchMock.mockReset();
  vi.stubGlobal('fetch', fetchMock);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('gemini generator', () => {
  const gemini = createGeminiGenerator({ apiKey: 'test-secret', model: 'gemini-test' });

  it('returns the joined candidate text and asks for JSON when requested', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({ candidates: [{ content: { parts: [{ text: '{"topics":' }, { text: '[]}' }] } }] })
    );
    await expect(gemini.generate({ system: 'Be brief.', prompt: 'Hi', json: true })).resolves.toBe('{"topics":[]}');

    const [url, init] = fetchMock.mock.calls[0];
    expect(String(url)).toBe(
      'https://generativelanguage.googleapis.com/v1beta/models/gemini-test:generateContent?key=test-secret'
    );
    expect(JSON.parse(String(init?.body))).toMatchObject({
      systemInstruction: { parts: [{ text: 'Be brief.' }] },
      generationConfig: { responseMimeType: 'application/json' }
    });
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  it('treats 429 as transient and honours retry-after', async () => {
    fetchMock.mockResolvedValueOnce(new Response('slow down', { status: 429, headers: { 'retry-after': '2' } }));
    const error = await failureOf(gemini.generate({ prompt: 'Hi' }));
    expect(error).toBeInstanceOf(GenerationError);
    expect(error).toMatchObject({ transient: true, status: 429, retryAfterMs: 2000 });
  });

  it('treats 401 as permanent', async () => {
    fetchMock.mockResolvedValueOnce(new Response('bad key', { status: 401 }));
    const error = await failureOf(gemini.generate({ prompt: 'Hi' }));
    expect(error).toMatchObject({ transient: false, status: 401, message: 'Gemini API error 401: bad key' });
  });

  it('does not retry a safety block', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ candidates: [{ finishReason: 'SAFETY' }] }));
    const error = await failureOf(gemini.generate({ prompt: 'Hi' }));
    expect(error).toMatchObject({ transient: false, message: 'Gemini returned empty response (SAFETY)' });
  });
});

describe('ollama generator', () => {
  const ollama = createOllamaGenerator({ model: 'llama-test', baseUrl: 'http://127.0.0.1:11434/' });

  it('posts to the generate endpoint and returns the trimmed reply', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ response: '  hello  ', prompt_eval_count: 3, eval_count: 1 }));
    await expect(ollama.generate({ prompt: 'Hi', json: true })).resolves.toBe('hello');
    const [url, init] = fetchMock.mock.calls[0];
    expect(String(url)).toBe('http://127.0.0.1:11434/api/generate');
    expect(JSON.parse(String(init?.body))).toMatchObject({ model: 'llama-test', stream: false, format: 'json' });
  });

  it('treats a refused connection as transient', async () => {
    fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));
    const error = await failureOf(ollama.generate({ prompt: 'Hi' }));
    expect(error).toBeInstanceOf(GenerationError);
    expect(error).toMatchObject({ transient: true, message: 'Ollama request failed: fetch failed' });
  });
});

describe('httpFailure', () => {
  it('classifies server errors as transient without a retry hint', async () => {
    const error = await httpFailure('Test', new Response('boom', { status: 503 }));
    expect(error).toMatchObject({ transient: true, status: 503, retryAfterMs: undefined });
  });
});

describe('fetchFailure', () => {
  it('turns a timeout into a transient failure', () => {
    const error = fetchFailure('Test', new DOMException('The operation timed out.', 'TimeoutError'));
    expect(error).toBeInstanceOf(GenerationError);
    expect(error).toMatchObject({ transient: true });
  });

  it('passes caller aborts through untouched', () => {
    const abort = new DOMException('This operation was aborted', 'AbortError');
    expect(fetchFailure('Test', abort)).toBe(abort);
  });

  it('treats unknown failures as permanent', () => {
    expect(fetchFailure('Test', new Error('unsupported protocol'))).toMatchObject({ transient: false });
  });
});

describe('requestSignal', () => {
  it('aborts with a timeout once the limit passes', async () => {
    const signal = requestSignal(undefined, 5);
    await new Promise((resolve) => setTimeout(resolve, 30));
    expect(signal.aborted).toBe(true);
    expect(fetchFailure('Test', signal.reason)).toMatchObject({ transient: true });
  });

  it('follows the caller signal', () => {
    const controller = new AbortController();
    const signal = requestSignal(controller.signal, 60_000);
    controller.abort();
    expect(signal.aborted).toBe(true);
  });
});

describe('toGenerationError', () => {
  it('maps a rate limit to a transient error with its retry hint', () => {
    const err = OpenAI.APIError.generate(429, { message: 'slow' }, 'slow', { 'retry-after': '3' });
    expect(toGenerationError('OpenAI', err)).toMatchObject({ transient: true, status: 429, retryAfterMs: 3000 });
  });

  it('maps an auth failure to a permanent error', () => {
    const err = OpenAI.APIError.generate(401, { message: 'bad key' }, 'bad key', {});
    expect(toGenerationError('OpenAI', err)).toMatchObject({ transient: false, status: 401 });
  });

  it('maps a connection error to a transient error', () => {
    const err = new OpenAI.APIConnectionError({ message: 'socket closed' });
    expect(toGenerationError('OpenAI', err)).toMatchObject({ transient: true, message: 'OpenAI connection error: socket closed' });
  });

  it('passes user aborts through', () => {
    const err = new OpenAI.APIUserAbortError();
    expect(toGenerationError('OpenAI', err)).toBe(err);
  });
});
