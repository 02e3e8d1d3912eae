import { afterEach, describe, expect, it, vi } from 'vitest';
import { LangfuseObservability } from '../../../../src/infrastructure/adapters/observability/LangfuseObservability.js';

const createClient = () => {
  const handle = { generation: vi.fn(), update: vi.fn() };
  const client = {
    trace: vi.fn((_body: { name: string; input: unknown }) => handle),
    shutdownAsync: vi.fn(async () => undefined),
  };
  return { client, handle };
};

describe('LangfuseObservability', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('records a trace with a generation and its output', () => {
    const { client, handle } = createClient();
    const observability = new LangfuseObservability(client);

    observability.logGeneration({
      name: 'chat_response',
      model: 'openai/gpt-4o',
      input: [{ role: 'user', content: 'Hi' }],
      output: 'Hello',
      usage: { inputTokens: 3, outputTokens: 2, totalTokens: 5 },
    });

    expect(client.trace).toHaveBeenCalledWith({
      name: 'openrouter.chat_response',
      input: [{ role: 'user', content: 'Hi' }],
    });
    expect(handle.generation).toHaveBeenCalledWith({
      name: 'chat_response',
      model: 'openai/gpt-4o',
      input: [{ role: 'user', content: 'Hi' }],
      output: 'Hello',
      usage: { input: 3, output: 2, total: 5 },
    });
    expect(handle.update).toHaveBeenCalledWith({ output: 'Hello' });
  });

  it('omits usage when none is known', () => {
    const { client, handle } = createClient();

    new LangfuseObservability(client).logGeneration({
      name: 'auto_categorize',
      model: 'openai/gpt-4o-mini',
      input: { transactions: [] },
      output: [],
    });

    expect(handle.generation).toHaveBeenCalledWith({
      name: 'auto_categorize',
      model: 'openai/gpt-4o-mini',
      input: { transactions: [] },
      output: [],
      usage: undefined,
    });
  });

  it('swallows emission failures and warns instead', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const { client } = createClient();
    client.trace.mockImplementation(() => {
      throw new Error('401 Unauthorized');
    });

    expect(() =>
      new LangfuseObservability(client).logGeneration({
        name: 'auto_categorize',
        model: 'openai/gpt-4o-mini',
        input: {},
        output: [],
      }),
    ).not.toThrow();
    expect(warn).toHaveBeenCalledWith('Langfuse logging failed: 401 Unauthorized');
  });

  it('flushes the client on shutdown', async () => {
    const { client } = createClient();

    await new LangfuseObservability(client).shutdown();

    expect(client.shutdownAsync).toHaveBeenCalledTimes(1);
  });
});
