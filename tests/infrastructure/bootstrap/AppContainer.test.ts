import { describe, expect, it } from 'vitest';
import { LangfuseObservability } from '../../../src/infrastructure/adapters/observability/LangfuseObservability.js';
import { OpenRouterProvider } from '../../../src/infrastructure/adapters/llm/openrouter/OpenRouterProvider.js';
import { AppContainer } from '../../../src/infrastructure/bootstrap/AppContainer.js';
import { loadConfig } from '../../../src/infrastructure/config/Config.js';

describe('AppContainer', () => {
  it('leaves the provider and tracing off without credentials', () => {
    const container = new AppContainer({ config: loadConfig({}) });

    expect(container.llmProvider).toBeNull();
    expect(container.observability).toBeNull();
    expect(container.hasOpenRouter()).toBe(false);
    expect(container.hasTracing()).toBe(false);
  });

  it('builds the OpenRouter provider without tracing when only the API key is set', () => {
    const container = new AppContainer({ config: loadConfig({ OPENROUTER_API_KEY: 'test-key' }) });

    expect(container.llmProvider).toBeInstanceOf(OpenRouterProvider);
    expect(container.observability).toBeNull();
  });

  it('builds Langfuse tracing when both keys are set', async () => {
    const container = new AppContainer({
      config: loadConfig({
        OPENROUTER_API_KEY: 'test-key',
        LANGFUSE_PUBLIC_KEY: 'pk-test',
        LANGFUSE_SECRET_KEY: 'sk-test',
        LANGFUSE_BASE_URL: 'http://127.0.0.1:1',
      }),
    });

    expect(container.observability).toBeInstanceOf(LangfuseObservability);
    expect(container.hasTracing()).toBe(true);

    await container.shutdown();
  });

  it('honours explicit null overrides', () => {
    const container = new AppContainer({
      config: loadConfig({ OPENROUTER_API_KEY: 'test-key' }),
      llmProvider: null,
    });

    expect(container.llmProvider).toBeNull();
  });
});
