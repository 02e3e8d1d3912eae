import { z } from 'zod';
import { ChatStreamChunkDTO } from '../../../../application/dto/ChatDTO.js';
import { OpenRouterError } from '../../../../application/errors/ProviderError.js';
import { ChatParser, ChatResponseParser } from './ChatParser.js';
import {
  RawCompletedEventSchema,
  RawErrorEventSchema,
  RawFailedEventSchema,
  RawIncompleteEventSchema,
  RawTextDeltaEventSchema,
  parseRaw,
  readUsage,
} from './ResponseSchemas.js';

export interface ChatChunkParser {
  /**
   * Returns null for events that carry nothing the caller needs. Throws an
   * OpenRouterError for events that end the response without a result.
   */
  parse(rawEvent: unknown): ChatStreamChunkDTO | null;
}

const EventTypeSchema = z.object({ type: z.string() });

export class ChatStreamParser implements ChatChunkParser {
  constructor(private readonly responseParser: ChatResponseParser = new ChatParser()) {}

  parse(rawEvent: unknown): ChatStreamChunkDTO | null {
    const event = EventTypeSchema.safeParse(rawEvent);
    if (!event.success) {
      return null;
    }

    switch (event.data.type) {
      case 'response.output_text.delta': {
        const delta = parseRaw(RawTextDeltaEventSchema, rawEvent, 'Malformed text delta event');
        return { type: 'output_text', data: delta.delta, usage: null };
      }
      case 'response.completed': {
        const completed = parseRaw(RawCompletedEventSchema, rawEvent, 'Malformed response.completed event');
        return {
          type: 'response',
          data: this.responseParser.parse(completed.response),
          usage: readUsage(completed.response),
        };
      }
      case 'response.failed': {
        const { response } = parseRaw(RawFailedEventSchema, rawEvent, 'Malformed response.failed event');
        throw new OpenRouterError(response.error?.message ?? 'OpenRouter response failed', {
          details: { event: 'response.failed', code: response.error?.code ?? null, responseId: response.id ?? null },
        });
      }
      case 'response.incomplete': {
        const { response } = parseRaw(RawIncompleteEventSchema, rawEvent, 'Malformed response.incomplete event');
        const reason = response.incomplete_details?.reason ?? null;
        throw new OpenRouterError(`OpenRouter response incomplete: ${reason ?? 'unknown reason'}`, {
          details: { event: 'response.incomplete', reason, responseId: response.id ?? null },
        });
      }
      case 'error': {
        const error = parseRaw(RawErrorEventSchema, rawEvent, 'Malformed error event');
        throw new OpenRouterError(error.message, { details: { event: 'error', code: error.code ?? null } });
      }
      default:
        return null;
    }
  }
}
