import { AutoCategorizationDTO } from '../dto/AutoCategorizationDTO.js';
import { AutoDetectedMerchantDTO } from '../dto/AutoDetectedMerchantDTO.js';
import {
  ChatFunctionDefinitionDTO,
  ChatFunctionResultDTO,
  ChatResponseDTO,
  ChatStreamChunkDTO,
  ChatStreamer,
} from '../dto/ChatDTO.js';
import {
  CategorizableTransactionDTO,
  UserCategoryDTO,
  UserMerchantDTO,
} from '../dto/TransactionInputDTO.js';
import { ProviderError } from '../errors/ProviderError.js';

export type ProviderResponse<T> =
  | { success: true; data: T; error: null }
  | { success: false; data: null; error: ProviderError };

export interface AutoCategorizeRequest {
  transactions: CategorizableTransactionDTO[];
  userCategories: UserCategoryDTO[];
  model: string;
}

export interface AutoDetectMerchantsRequest {
  transactions: CategorizableTransactionDTO[];
  userMerchants: UserMerchantDTO[];
  model: string;
}

export interface ChatRequestOptions {
  model: string;
  instructions?: string;
  functions?: ChatFunctionDefinitionDTO[];
  functionResults?: ChatFunctionResultDTO[];
  previousResponseId?: string;
}

export interface ChatResponseOptions extends ChatRequestOptions {
  streamer?: ChatStreamer;
}

export interface LlmProviderPort {
  supportsModel(model: string): boolean;
  autoCategorize(request: AutoCategorizeRequest): Promise<ProviderResponse<AutoCategorizationDTO[]>>;
  autoDetectMerchants(request: AutoDetectMerchantsRequest): Promise<ProviderResponse<AutoDetectedMerchantDTO[]>>;
  chatResponse(prompt: string, options: ChatResponseOptions): Promise<ProviderResponse<ChatResponseDTO>>;
  streamChatResponse(prompt: string, options: ChatRequestOptions): AsyncGenerator<ChatStreamChunkDTO, ChatResponseDTO, undefined>;
}
