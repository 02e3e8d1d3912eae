import { ChatFunctionRequestDTO, ChatMessageDTO, ChatResponseDTO } from '../../../../application/dto/ChatDTO.js';
import { RawFunctionCallItemSchema, RawMessageItemSchema, RawResponseSchema, parseRaw } from './ResponseSchemas.js';

export interface ChatResponseParser {
  parse(raw: unknown): ChatResponseDTO;
}

/** Maps a Responses API body onto the provider-neutral chat response. */
export class ChatParser implements ChatResponseParser {
  parse(raw: unknown): ChatResponseDTO {
    const response = parseRaw(RawResponseSchema, raw, 'Malformed chat response from OpenRouter');
    const messages: ChatMessageDTO[] = [];
    const functionRequests: ChatFunctionRequestDTO[] = [];

    for (const item of response.output) {
      if (item.type === 'message') {
        const message = parseRaw(RawMessageItemSchema, item, 'Malformed message item in chat response');
        messages.push({
          id: message.id,
          outputText: message.content
            .filter((part) => part.type === 'output_text')
            .map((part) => part.text ?? '')
            .join('\n'),
        });
      } else if (item.type === 'function_call') {
        const call = parseRaw(RawFunctionCallItemSchema, item, 'Malformed function call in chat response');
        functionRequests.push({
          id: call.id ?? call.call_id,
          callId: call.call_id,
          functionName: call.name,
          functionArgs: call.arguments,
        });
      }
    }

    return {
      id: response.id,
      model: response.model,
      messages,
      functionRequests,
    };
  }
}
