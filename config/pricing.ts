export type Pricing = {
  input: number; // USD per 1K input tokens
  output: number; // USD per 1K output tokens
};

const DEFAULT_PRICING: Pricing = { input: 0.01, output: 0.03 };
const FREE: Pricing = { input: 0, output: 0 };

const MODEL_PRICING: Record<string, Pricing> = {
  'gpt-5': { input: 0.00125, output: 0.01 },
  'gpt-5-mini': { input: 0.00025, output: 0.002 },
  'gpt-4.1-mini': { input: 0.0004, output: 0.0016 },
  'gpt-4o-mini': { input: 0.00015, output: 0.0006 },
  'gemini-2.0-flash': { input: 0.0001, output: 0.0004 },
  'gemini-2.5-flash': { input: 0.0003, output: 0.0025 }
};

function normalizeKey(model: string): string {
  return model.toLowerCase();
}

export function getPricingForModel(model: string | undefined, provider?: string): Pricing {
  if (provider === 'ollama') return FREE;
  if (!model) return DEFAULT_PRICING;
  const key = normalizeKey(model);
  if (MODEL_PRICING[key]) {
    return MODEL_PRICING[key];
  }
  // longest prefix wins (gpt-5-mini-2025 -> gpt-5-mini, not gpt-5)
  const match = Object.entries(MODEL_PRICING)
    .filter(([name]) => key.startsWith(name))
    .sort(([a], [b]) => b.length - a.length)[0];
  if (match) {
    return match[1];
  }
  return DEFAULT_PRICING;
}
