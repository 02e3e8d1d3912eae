import { Langfuse } from 'langfuse';
import { LlmGenerationLog, LlmObservabilityPort } from '../../../application/ports/LlmObservabilityPort.js';

interface TraceHandle {
  generation(body: {
    name: string;
    model: string;
    input: unknown;
    output: unknown;
    usage?: { input: number; output: number; total: number };
  }): unknown;
  update(body: { output: unknown }): unknown;
}

/** The part of the Langfuse client this adapter drives. */
export interface TraceClient {
  trace(body: { name: string; input: unknown }): TraceHandle;
  shutdownAsync(): Promise<void>;
}

export interface LangfuseConfig {
  publicKey: string;
  secretKey: string;
  baseUrl?: string;
}

export class LangfuseObservability implements LlmObservabilityPort {
  constructor(
    private readonly client: TraceClient,
    private readonly tracePrefix = 'openrouter',
  ) {}

  static fromConfig(config: LangfuseConfig): LangfuseObservability {
    return new LangfuseObservability(
      new Langfuse({
        publicKey: config.publicKey,
        secretKey: config.secretKey,
        baseUrl: config.baseUrl,
      }),
    );
  }

  logGeneration({ name, model, input, output, usage }: LlmGenerationLog): void {
    try {
      const trace = this.client.trace({ name: `${this.tracePrefix}.${name}`, input });
      trace.generation({
        name,
        model,
        input,
        output,
        usage: usage
          ? { input: usage.inputTokens, output: usage.outputTokens, total: usage.totalTokens }
          : undefined,
      });
      trace.update({ output });
    } catch (error) {
      console.warn(`Langfuse logging failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  async shutdown(): Promise<void> {
    try {
      await this.client.shutdownAsync();
    } catch (error) {
      console.warn(`Langfuse shutdown failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}
