import OpenAI from 'openai';

export const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';

export type ResponsesRequest = Omit<OpenAI.Responses.ResponseCreateParamsNonStreaming, 'stream'>;

/**
 * The slice of the Responses API the adapter needs. Bodies come back as
 * `unknown` and are validated by the parsers, since OpenRouter relays
 * responses from many upstream vendors.
 */
export interface ResponsesApi {
  create(request: ResponsesRequest): Promise<unknown>;
  stream(request: ResponsesRequest): Promise<AsyncIterable<unknown>>;
}

export interface OpenRouterClientConfig {
  apiKey: string;
  baseUrl?: string;
  appUrl: string;
  appTitle: string;
  timeoutMs?: number;
  maxRetries?: number;
}

export const createOpenRouterClient = (config: OpenRouterClientConfig): OpenAI =>
  new OpenAI({
    baseURL: config.baseUrl ?? OPENROUTER_BASE_URL,
    apiKey: config.apiKey,
    timeout: config.timeoutMs ?? 25_000,
    maxRetries: config.maxRetries ?? 0,
    // OpenRouter attribution headers
    defaultHeaders: {
      'HTTP-Referer': config.appUrl,
      'X-Title': config.appTitle,
    },
  });

export class OpenAIResponsesApi implements ResponsesApi {
  constructor(private readonly client: OpenAI) {}

  async create(request: ResponsesRequest): Promise<unknown> {
    return this.client.responses.create({ ...request, stream: false });
  }

  async stream(request: ResponsesRequest): Promise<AsyncIterable<unknown>> {
    return this.client.responses.create({ ...request, stream: true });
  }
}
