import { ChatResponseDTO } from '../../src/application/dto/ChatDTO.js';
import {
  CategorizableTransactionDTO,
  UserCategoryDTO,
  UserMerchantDTO,
} from '../../src/application/dto/TransactionInputDTO.js';
import { ResponsesApi, ResponsesRequest } from '../../src/infrastructure/adapters/llm/openrouter/ResponsesApi.js';

export const TEST_MODEL = 'openai/gpt-4o-mini';

export const transaction = (
  id: string,
  overrides: Partial<CategorizableTransactionDTO> = {},
): CategorizableTransactionDTO => ({
  id,
  amount: 12.5,
  classification: 'expense',
  description: `Card purchase ${id}`,
  ...overrides,
});

export const transactions = (count: number): CategorizableTransactionDTO[] =>
  Array.from({ length: count }, (_, index) => transaction(`txn-${index + 1}`));

export const userCategories: UserCategoryDTO[] = [
  { id: 'cat-1', name: 'Groceries', classification: 'expense' },
  { id: 'cat-2', name: 'Dining Out', classification: 'expense' },
  { id: 'cat-3', name: 'Salary', classification: 'income' },
];

export const userMerchants: UserMerchantDTO[] = [
  { id: 'mer-1', name: 'Corner Bakery' },
  { id: 'mer-2', name: 'City Transit' },
];

export const rawUsage = { input_tokens: 12, output_tokens: 8, total_tokens: 20 };

/** Responses API body with a single assistant message. */
export const rawTextResponse = (text: string, id = 'resp_1') => ({
  id,
  object: 'response',
  model: TEST_MODEL,
  status: 'completed',
  output: [
    {
      type: 'message',
      id: 'msg_1',
      role: 'assistant',
      status: 'completed',
      content: [{ type: 'output_text', text, annotations: [] }],
    },
  ],
  usage: rawUsage,
});

export const parsedTextResponse = (text: string, id = 'resp_1'): ChatResponseDTO => ({
  id,
  model: TEST_MODEL,
  messages: [{ id: 'msg_1', outputText: text }],
  functionRequests: [],
});

export const textDelta = (delta: string) => ({ type: 'response.output_text.delta', delta, item_id: 'msg_1' });

export const completed = (response: unknown) => ({ type: 'response.completed', response });

/** In-process stand-in for the OpenRouter Responses endpoint. */
export class FakeResponsesApi implements ResponsesApi {
  readonly createRequests: ResponsesRequest[] = [];
  readonly streamRequests: ResponsesRequest[] = [];

  constructor(
    private readonly options: {
      response?: unknown;
      events?: unknown[];
      error?: Error;
    } = {},
  ) {}

  async create(request: ResponsesRequest): Promise<unknown> {
    this.createRequests.push(request);
    if (this.options.error) {
      throw this.options.error;
    }
    return this.options.response;
  }

  async stream(request: ResponsesRequest): Promise<AsyncIterable<unknown>> {
    this.streamRequests.push(request);
    if (this.options.error) {
      throw this.options.error;
    }

    const events = this.options.events ?? [];
    return (async function* () {
      yield* events;
    })();
  }
}
