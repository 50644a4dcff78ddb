import { jsonrepair } from 'jsonrepair';
import { z } from 'zod';

export const DraftTopicSchema = z.object({
  title: z.string().trim().min(1),
  body: z.string().trim().min(1),
  weight: z.number().finite().nonnegative().optional(),
  checkpoints: z.array(z.string().trim().min(1)).optional()
});

export const SegmentDraftPayloadSchema = z.object({
  topics: z.array(DraftTopicSchema).min(1)
});

export type SegmentDraftPayload = z.infer<typeof SegmentDraftPayloadSchema>;

export type ParseResult<T> = { ok: true; value: T } | { ok: false; issue: string };

function tryParse(value: string): unknown {
  try {
    return JSON.parse(value);
  } catch {
    return undefined;
  }
}

function tryRepair(value: string): unknown {
  try {
    return JSON.parse(jsonrepair(value));
  } catch {
    return undefined;
  }
}

function extractFenced(value: string): string | null {
  const match = value.match(/```(?:json)?\s*([\s\S]*?)\s*```/i);
  return match?.[1]?.trim() ?? null;
}

function extractObjectSlice(value: string): string | null {
  const start = value.indexOf('{');
  const end = value.lastIndexOf('}');
  if (start < 0 || end <= start) return null;
  return value.slice(start, end + 1);
}

/**
 * Pulls a JSON value out of model text: plain JSON, a fenced block, the
 * outermost object, and finally a jsonrepair pass over the best candidate.
 */
export function parseJsonFromModel(raw: string): unknown {
  const trimmed = raw.trim();
  const candidates = [trimmed, extractFenced(trimmed), extractObjectSlice(trimmed)].filter(
    (c): c is string => typeof c === 'string' && c.length > 0
  );
  for (const candidate of candidates) {
    const parsed = tryParse(candidate);
    if (parsed !== undefined) return parsed;
  }
  // repair the narrowest candidate first so fences and chatter never reach jsonrepair
  for (const candidate of [...candidates].reverse()) {
    const repaired = tryRepair(candidate);
    if (repaired !== undefined) return repaired;
  }
  return undefined;
}

export function parseWithSchema<T>(raw: string, schema: z.ZodType<T>): ParseResult<T> {
  const json = parseJsonFromModel(raw);
  if (json === undefined) {
    return { ok: false, issue: 'response did not contain parseable JSON' };
  }
  const result = schema.safeParse(json);
  if (!result.success) {
    const first = result.error.issues[0];
    const where = first?.path.length ? first.path.join('.') : 'root';
    return { ok: false, issue: `${where}: ${first?.message ?? 'invalid shape'}` };
  }
  return { ok: true, value: result.data };
}

export function parseSegmentDraft(raw: string): ParseResult<SegmentDraftPayload> {
  return parseWithSchema(raw, SegmentDraftPayloadSchema);
}
