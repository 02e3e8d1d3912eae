import { z } from 'zod';
import { ChatUsageDTO } from '../../../../application/dto/ChatDTO.js';
import { InvalidResponseError } from '../../../../application/errors/ProviderError.js';

export const RawUsageSchema = z.object({
  input_tokens: z.number(),
  output_tokens: z.number(),
  total_tokens: z.number(),
});

export const RawResponseSchema = z.object({
  id: z.string(),
  model: z.string(),
  output: z.array(z.object({ type: z.string() }).passthrough()),
  usage: RawUsageSchema.nullish(),
});

export const RawMessageItemSchema = z.object({
  type: z.literal('message'),
  id: z.string(),
  content: z.array(
    z.object({
      type: z.string(),
      text: z.string().optional(),
    }),
  ),
});

export const RawFunctionCallItemSchema = z.object({
  type: z.literal('function_call'),
  id: z.string().optional(),
  call_id: z.string(),
  name: z.string(),
  arguments: z.string(),
});

export const RawTextDeltaEventSchema = z.object({
  type: z.literal('response.output_text.delta'),
  delta: z.string(),
});

export const RawCompletedEventSchema = z.object({
  type: z.literal('response.completed'),
  response: z.unknown(),
});

export const RawFailedEventSchema = z.object({
  type: z.literal('response.failed'),
  response: z.object({
    id: z.string().optional(),
    error: z
      .object({
        code: z.string().nullish(),
        message: z.string(),
      })
      .nullish(),
  }),
});

export const RawIncompleteEventSchema = z.object({
  type: z.literal('response.incomplete'),
  response: z.object({
    id: z.string().optional(),
    incomplete_details: z.object({ reason: z.string().nullish() }).nullish(),
  }),
});

export const RawErrorEventSchema = z.object({
  type: z.literal('error'),
  code: z.string().nullish(),
  message: z.string(),
});

export type RawUsage = z.infer<typeof RawUsageSchema>;

export const toChatUsage = (usage: RawUsage | null | undefined): ChatUsageDTO | null =>
  usage
    ? {
        inputTokens: usage.input_tokens,
        outputTokens: usage.output_tokens,
        totalTokens: usage.total_tokens,
      }
    : null;

/** Usage block of a raw response body, or null when absent or malformed. */
export const readUsage = (raw: unknown): ChatUsageDTO | null => {
  const parsed = z.object({ usage: RawUsageSchema.nullish() }).safeParse(raw);
  return parsed.success ? toChatUsage(parsed.data.usage) : null;
};

export const parseRaw = <T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown, message: string): T => {
  const parsed = schema.safeParse(raw);

  if (!parsed.success) {
    throw new InvalidResponseError(message, { cause: parsed.error });
  }

  return parsed.data;
};
