export interface AppConfig {
  openRouter: {
    apiKey?: string;
    baseUrl: string;
    defaultModel: string;
    timeoutMs: number;
    maxRetries: number;
    appUrl: string;
    appTitle: string;
  };
  langfuse: {
    publicKey?: string;
    secretKey?: string;
    baseUrl?: string;
    enabled: boolean;
  };
  app: {
    port: number;
  };
}

const toNumber = (value: string | undefined, fallback: number): number => {
  const parsed = Number(value);
  return value !== undefined && value !== '' && Number.isFinite(parsed) ? parsed : fallback;
};

const present = (value: string | undefined): string | undefined => (value && value.trim() !== '' ? value : undefined);

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const publicKey = present(env.LANGFUSE_PUBLIC_KEY);
  const secretKey = present(env.LANGFUSE_SECRET_KEY);

  return {
    openRouter: {
      apiKey: present(env.OPENROUTER_API_KEY),
      baseUrl: env.OPENROUTER_BASE_URL ?? 'https://openrouter.ai/api/v1',
      defaultModel: env.OPENROUTER_DEFAULT_MODEL ?? 'openai/gpt-4o-mini',
      timeoutMs: toNumber(env.OPENROUTER_TIMEOUT_MS, 25_000),
      maxRetries: toNumber(env.OPENROUTER_MAX_RETRIES, 0),
      appUrl: env.APP_URL ?? 'http://localhost:4000',
      appTitle: env.APP_TITLE ?? 'Finance LLM Provider',
    },
    langfuse: {
      publicKey,
      secretKey,
      baseUrl: present(env.LANGFUSE_BASE_URL),
      enabled: publicKey !== undefined && secretKey !== undefined,
    },
    app: {
      port: toNumber(env.PORT, 4000),
    },
  };
};
