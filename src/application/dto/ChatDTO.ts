import { z } from 'zod';

export const ChatFunctionDefinitionSchema = z.object({
  name: z.string().min(1),
  description: z.string(),
  paramsSchema: z.record(z.unknown()),
  strict: z.boolean().default(true),
});

export const ChatFunctionResultSchema = z.object({
  callId: z.string().min(1),
  output: z.unknown(),
});

export type ChatFunctionDefinitionDTO = z.input<typeof ChatFunctionDefinitionSchema>;
export type ChatFunctionResultDTO = z.infer<typeof ChatFunctionResultSchema>;

export interface ChatMessageDTO {
  id: string;
  outputText: string;
}

export interface ChatFunctionRequestDTO {
  id: string;
  callId: string;
  functionName: string;
  /** Raw JSON string exactly as the model produced it. */
  functionArgs: string;
}

export interface ChatResponseDTO {
  id: string;
  model: string;
  messages: ChatMessageDTO[];
  functionRequests: ChatFunctionRequestDTO[];
}

export interface ChatUsageDTO {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export type ChatStreamChunkDTO =
  | { type: 'output_text'; data: string; usage: null }
  | { type: 'response'; data: ChatResponseDTO; usage: ChatUsageDTO | null };

export type ChatStreamer = (chunk: ChatStreamChunkDTO) => void;
