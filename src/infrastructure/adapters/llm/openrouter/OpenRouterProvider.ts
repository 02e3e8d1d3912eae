import OpenAI from 'openai';
import { AutoCategorizationDTO } from '../../../../application/dto/AutoCategorizationDTO.js';
import { AutoDetectedMerchantDTO } from '../../../../application/dto/AutoDetectedMerchantDTO.js';
import { ChatResponseDTO, ChatStreamChunkDTO } from '../../../../application/dto/ChatDTO.js';
import {
  IncompleteStreamError,
  OpenRouterError,
  ProviderError,
  TooManyTransactionsError,
} from '../../../../application/errors/ProviderError.js';
import { LlmGenerationLog, LlmObservabilityPort } from '../../../../application/ports/LlmObservabilityPort.js';
import {
  AutoCategorizeRequest,
  AutoDetectMerchantsRequest,
  ChatRequestOptions,
  ChatResponseOptions,
  LlmProviderPort,
  ProviderResponse,
} from '../../../../application/ports/LlmProviderPort.js';
import { withProviderResponse } from '../withProviderResponse.js';
import { AutoCategorizer, TransactionCategorizer } from './AutoCategorizer.js';
import { AutoMerchantDetector, MerchantDetector } from './AutoMerchantDetector.js';
import { ChatConfig } from './ChatConfig.js';
import { ChatParser, ChatResponseParser } from './ChatParser.js';
import { ChatChunkParser, ChatStreamParser } from './ChatStreamParser.js';
import { isOpenRouterModel } from './models.js';
import { readUsage } from './ResponseSchemas.js';
import { ResponsesApi, ResponsesRequest } from './ResponsesApi.js';

export const MAX_TRANSACTIONS_PER_REQUEST = 25;

export interface OpenRouterHelpers {
  categorizer: TransactionCategorizer;
  merchantDetector: MerchantDetector;
  chatParser: ChatResponseParser;
  chatStreamParser: ChatChunkParser;
}

export interface OpenRouterProviderOptions {
  /** Trace sink; omit to disable tracing entirely. */
  observability?: LlmObservabilityPort | null;
  helpers?: Partial<OpenRouterHelpers>;
}

type ResponseChunk = Extract<ChatStreamChunkDTO, { type: 'response' }>;

const isResponseChunk = (chunk: ChatStreamChunkDTO): chunk is ResponseChunk => chunk.type === 'response';

export const toOpenRouterError = (error: unknown): ProviderError => {
  if (error instanceof ProviderError) {
    return error;
  }

  if (error instanceof OpenAI.APIError) {
    return new OpenRouterError(error.message, { cause: error, details: { status: error.status } });
  }

  return new OpenRouterError(error instanceof Error ? error.message : String(error), { cause: error });
};

export class OpenRouterProvider implements LlmProviderPort {
  private readonly observability: LlmObservabilityPort | null;
  private readonly helpers: OpenRouterHelpers;

  constructor(
    private readonly responses: ResponsesApi,
    options: OpenRouterProviderOptions = {},
  ) {
    this.observability = options.observability ?? null;

    const chatParser = options.helpers?.chatParser ?? new ChatParser();
    this.helpers = {
      categorizer: options.helpers?.categorizer ?? new AutoCategorizer(responses),
      merchantDetector: options.helpers?.merchantDetector ?? new AutoMerchantDetector(responses),
      chatParser,
      chatStreamParser: options.helpers?.chatStreamParser ?? new ChatStreamParser(chatParser),
    };
  }

  supportsModel(model: string): boolean {
    return isOpenRouterModel(model);
  }

  async autoCategorize(request: AutoCategorizeRequest): Promise<ProviderResponse<AutoCategorizationDTO[]>> {
    return this.run('auto_categorize', async () => {
      const { transactions, userCategories, model } = request;
      this.assertBatchSize('auto-categorize', transactions.length);

      const result = await this.helpers.categorizer.autoCategorize({ transactions, userCategories, model });

      this.logGeneration({
        name: 'auto_categorize',
        model,
        input: { transactions, userCategories },
        output: result,
      });

      return result;
    });
  }

  async autoDetectMerchants(request: AutoDetectMerchantsRequest): Promise<ProviderResponse<AutoDetectedMerchantDTO[]>> {
    return this.run('auto_detect_merchants', async () => {
      const { transactions, userMerchants, model } = request;
      this.assertBatchSize('auto-detect merchants', transactions.length);

      const result = await this.helpers.merchantDetector.autoDetectMerchants({ transactions, userMerchants, model });

      this.logGeneration({
        name: 'auto_detect_merchants',
        model,
        input: { transactions, userMerchants },
        output: result,
      });

      return result;
    });
  }

  async chatResponse(prompt: string, options: ChatResponseOptions): Promise<ProviderResponse<ChatResponseDTO>> {
    const { streamer, ...request } = options;

    return this.run('chat_response', async () => {
      if (streamer) {
        const chunks = this.streamChatResponse(prompt, request);

        for (;;) {
          const next = await chunks.next();
          if (next.done) {
            return next.value;
          }

          try {
            streamer(next.value);
          } catch (error) {
            // Rethrown from inside the generator, which closes the upstream stream.
            await chunks.throw(error);
          }
        }
      }

      const config = new ChatConfig(request);
      const input = config.buildInput(prompt);
      const raw = await this.responses.create(this.buildChatRequest(input, config, request));
      const parsed = this.helpers.chatParser.parse(raw);

      this.logGeneration({
        name: 'chat_response',
        model: request.model,
        input,
        output: joinOutputText(parsed),
        usage: readUsage(raw),
      });

      return parsed;
    });
  }

  /**
   * Streams parsed chunks in arrival order. The sequence ends with exactly
   * one `response` chunk, whose data is also the generator's return value.
   * Throws IncompleteStreamError when the upstream stream closes without one,
   * and OpenRouterError when it reports a failed or incomplete response.
   */
  async *streamChatResponse(
    prompt: string,
    options: ChatRequestOptions,
  ): AsyncGenerator<ChatStreamChunkDTO, ChatResponseDTO, undefined> {
    const config = new ChatConfig(options);
    const input = config.buildInput(prompt);
    let received = 0;

    try {
      const events = await this.responses.stream(this.buildChatRequest(input, config, options));

      for await (const event of events) {
        const chunk = this.helpers.chatStreamParser.parse(event);
        if (chunk === null) {
          continue;
        }

        received += 1;

        if (isResponseChunk(chunk)) {
          this.logGeneration({
            name: 'chat_response',
            model: options.model,
            input,
            output: joinOutputText(chunk.data),
            usage: chunk.usage,
          });
          yield chunk;
          return chunk.data;
        }

        yield chunk;
      }
    } catch (error) {
      throw toOpenRouterError(error);
    }

    throw new IncompleteStreamError(received);
  }

  private buildChatRequest(
    input: OpenAI.Responses.ResponseInput,
    config: ChatConfig,
    options: ChatRequestOptions,
  ): ResponsesRequest {
    return {
      model: options.model,
      input,
      instructions: options.instructions ?? null,
      tools: config.tools,
      previous_response_id: options.previousResponseId ?? null,
    };
  }

  private assertBatchSize(task: string, size: number): void {
    if (size > MAX_TRANSACTIONS_PER_REQUEST) {
      throw new TooManyTransactionsError(task, MAX_TRANSACTIONS_PER_REQUEST, size);
    }
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<ProviderResponse<T>> {
    const response = await withProviderResponse(fn, toOpenRouterError);

    if (!response.success) {
      console.error(`❌ OpenRouter ${operation} failed: ${response.error.message}`);
    }

    return response;
  }

  private logGeneration(generation: LlmGenerationLog): void {
    try {
      this.observability?.logGeneration(generation);
    } catch (error) {
      console.warn(`Langfuse logging failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}

const joinOutputText = (response: ChatResponseDTO): string =>
  response.messages.map((message) => message.outputText).join('\n');
