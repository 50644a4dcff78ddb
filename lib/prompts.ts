import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

const PROMPTS_DIR = fileURLToPath(new URL('../prompts/', import.meta.url));

const cache = new Map<string, string>();

export function loadPrompt(name: string): string {
  const hit = cache.get(name);
  if (hit !== undefined) {
    return hit;
  }
  const text = readFileSync(`${PROMPTS_DIR}${name}`, 'utf-8').trim();
  cache.set(name, text);
  return text;
}

/** Replaces `{{key}}` placeholders; unknown keys are left as-is. */
export function fillPrompt(template: string, values: Record<string, string | number>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (whole, key: string) => (key in values ? String(values[key]) : whole));
}
