import { createHash } from 'node:crypto';

export type HashInput = string | number | boolean | null | undefined | HashInput[] | { [key: string]: HashInput };

function withSortedKeys(value: HashInput): HashInput {
  if (Array.isArray(value)) return value.map(withSortedKeys);
  if (value === null || typeof value !== 'object') return value;
  const sorted: { [key: string]: HashInput } = {};
  for (const key of Object.keys(value).sort()) {
    const entry = value[key];
    if (entry !== undefined) sorted[key] = withSortedKeys(entry);
  }
  return sorted;
}

/** Stable key order, so `{a, b}` and `{b, a}` hash the same. Undefined fields are left out. */
export function canonicalJson(input: HashInput): string {
  return JSON.stringify(withSortedKeys(input)) ?? 'null';
}

export function hashLectureInput(text: string, config: { [key: string]: HashInput }): string {
  const hash = createHash('sha1');
  hash.update(text);
  hash.update('\n');
  hash.update(canonicalJson(config));
  return hash.digest('hex').slice(0, 16);
}

export function lectureRunId(text: string, config: { [key: string]: HashInput }): string {
  return `lec_${hashLectureInput(text, config)}`;
}
