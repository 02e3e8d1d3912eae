export const OPENROUTER_MODELS = [
  'openai/gpt-4o',
  'openai/gpt-4o-mini',
  'openai/gpt-4-turbo',
  'openai/gpt-3.5-turbo',
  'anthropic/claude-3.5-sonnet',
  'anthropic/claude-3-haiku',
  'meta-llama/llama-3.2-3b-instruct',
  'meta-llama/llama-3.2-11b-instruct',
  'qwen/qwen-2.5-72b-instruct',
  'google/gemini-pro-1.5',
] as const;

export type OpenRouterModel = (typeof OPENROUTER_MODELS)[number];

const supported: ReadonlySet<string> = new Set(OPENROUTER_MODELS);

export const isOpenRouterModel = (model: string): model is OpenRouterModel => supported.has(model);
