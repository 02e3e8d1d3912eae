import { LlmObservabilityPort } from '../../application/ports/LlmObservabilityPort.js';
import { LlmProviderPort } from '../../application/ports/LlmProviderPort.js';
import { OpenRouterProvider } from '../adapters/llm/openrouter/OpenRouterProvider.js';
import { OpenAIResponsesApi, createOpenRouterClient } from '../adapters/llm/openrouter/ResponsesApi.js';
import { LangfuseObservability } from '../adapters/observability/LangfuseObservability.js';
import { AppConfig, loadConfig } from '../config/Config.js';

export interface AppContainerOverrides {
  config?: AppConfig;
  /** `null` forces the provider off even when an API key is configured. */
  llmProvider?: LlmProviderPort | null;
  observability?: LlmObservabilityPort | null;
}

export class AppContainer {
  readonly config: AppConfig;
  readonly observability: LlmObservabilityPort | null;
  readonly llmProvider: LlmProviderPort | null;

  constructor(overrides: AppContainerOverrides = {}) {
    this.config = overrides.config ?? loadConfig();

    if (overrides.observability !== undefined) {
      this.observability = overrides.observability;
    } else {
      const { publicKey, secretKey, baseUrl, enabled } = this.config.langfuse;
      this.observability =
        enabled && publicKey && secretKey ? LangfuseObservability.fromConfig({ publicKey, secretKey, baseUrl }) : null;
    }

    if (overrides.llmProvider !== undefined) {
      this.llmProvider = overrides.llmProvider;
    } else {
      const openRouter = this.config.openRouter;

      if (openRouter.apiKey) {
        const client = createOpenRouterClient({
          apiKey: openRouter.apiKey,
          baseUrl: openRouter.baseUrl,
          appUrl: openRouter.appUrl,
          appTitle: openRouter.appTitle,
          timeoutMs: openRouter.timeoutMs,
          maxRetries: openRouter.maxRetries,
        });
        this.llmProvider = new OpenRouterProvider(new OpenAIResponsesApi(client), {
          observability: this.observability,
        });
      } else {
        this.llmProvider = null;
      }
    }
  }

  hasOpenRouter(): boolean {
    return this.llmProvider !== null;
  }

  hasTracing(): boolean {
    return this.observability !== null;
  }

  async shutdown(): Promise<void> {
    await this.observability?.shutdown();
  }
}
