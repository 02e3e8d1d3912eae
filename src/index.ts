export * from './application/dto/AutoCategorizationDTO.js';
export * from './application/dto/AutoDetectedMerchantDTO.js';
export * from './application/dto/ChatDTO.js';
export * from './application/dto/TransactionInputDTO.js';
export * from './application/errors/ProviderError.js';
export * from './application/ports/LlmObservabilityPort.js';
export * from './application/ports/LlmProviderPort.js';
export { AutoCategorizer, type TransactionCategorizer } from './infrastructure/adapters/llm/openrouter/AutoCategorizer.js';
export { AutoMerchantDetector, type MerchantDetector } from './infrastructure/adapters/llm/openrouter/AutoMerchantDetector.js';
export { ChatConfig } from './infrastructure/adapters/llm/openrouter/ChatConfig.js';
export { ChatParser, type ChatResponseParser } from './infrastructure/adapters/llm/openrouter/ChatParser.js';
export { ChatStreamParser, type ChatChunkParser } from './infrastructure/adapters/llm/openrouter/ChatStreamParser.js';
export { OPENROUTER_MODELS, isOpenRouterModel, type OpenRouterModel } from './infrastructure/adapters/llm/openrouter/models.js';
export {
  MAX_TRANSACTIONS_PER_REQUEST,
  OpenRouterProvider,
  type OpenRouterHelpers,
  type OpenRouterProviderOptions,
} from './infrastructure/adapters/llm/openrouter/OpenRouterProvider.js';
export {
  OPENROUTER_BASE_URL,
  OpenAIResponsesApi,
  createOpenRouterClient,
  type ResponsesApi,
  type ResponsesRequest,
} from './infrastructure/adapters/llm/openrouter/ResponsesApi.js';
export { withProviderResponse } from './infrastructure/adapters/llm/withProviderResponse.js';
export { LangfuseObservability, type TraceClient } from './infrastructure/adapters/observability/LangfuseObservability.js';
export { AppContainer, type AppContainerOverrides } from './infrastructure/bootstrap/AppContainer.js';
export { loadConfig, type AppConfig } from './infrastructure/config/Config.js';
export { createApp } from './infrastructure/http/createApp.js';
