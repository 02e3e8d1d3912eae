import { describe, expect, it } from 'vitest';
import { loadConfig } from '../../../src/infrastructure/config/Config.js';

describe('loadConfig', () => {
  it('falls back to defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      openRouter: {
        apiKey: undefined,
        baseUrl: 'https://openrouter.ai/api/v1',
        defaultModel: 'openai/gpt-4o-mini',
        timeoutMs: 25_000,
        maxRetries: 0,
        appUrl: 'http://localhost:4000',
        appTitle: 'Finance LLM Provider',
      },
      langfuse: {
        publicKey: undefined,
        secretKey: undefined,
        baseUrl: undefined,
        enabled: false,
      },
      app: { port: 4000 },
    });
  });

  it('enables Langfuse only when both keys are present', () => {
    expect(loadConfig({ LANGFUSE_PUBLIC_KEY: 'pk-test' }).langfuse.enabled).toBe(false);
    expect(loadConfig({ LANGFUSE_SECRET_KEY: 'sk-test' }).langfuse.enabled).toBe(false);
    expect(loadConfig({ LANGFUSE_PUBLIC_KEY: 'pk-test', LANGFUSE_SECRET_KEY: '  ' }).langfuse.enabled).toBe(false);
    expect(loadConfig({ LANGFUSE_PUBLIC_KEY: 'pk-test', LANGFUSE_SECRET_KEY: 'sk-test' }).langfuse.enabled).toBe(true);
  });

  it('parses numeric settings and ignores invalid ones', () => {
    const config = loadConfig({ OPENROUTER_TIMEOUT_MS: '5000', OPENROUTER_MAX_RETRIES: 'many', PORT: '8080' });

    expect(config.openRouter.timeoutMs).toBe(5000);
    expect(config.openRouter.maxRetries).toBe(0);
    expect(config.app.port).toBe(8080);
  });
});
