import OpenAI from 'openai';
import { ChatFunctionDefinitionDTO, ChatFunctionResultDTO } from '../../../../application/dto/ChatDTO.js';

/** Builds the input items and tool list of a chat request. */
export class ChatConfig {
  constructor(
    private readonly options: {
      functions?: ChatFunctionDefinitionDTO[];
      functionResults?: ChatFunctionResultDTO[];
    } = {},
  ) {}

  get tools(): OpenAI.Responses.FunctionTool[] {
    return (this.options.functions ?? []).map(
      (fn): OpenAI.Responses.FunctionTool => ({
        type: 'function',
        name: fn.name,
        description: fn.description,
        parameters: fn.paramsSchema,
        strict: fn.strict ?? true,
      }),
    );
  }

  // Function results continue the previous response, so the prompt is not resent with them.
  buildInput(prompt: string): OpenAI.Responses.ResponseInput {
    const results = this.options.functionResults ?? [];

    if (results.length > 0) {
      return results.map(
        (result): OpenAI.Responses.ResponseInputItem.FunctionCallOutput => ({
          type: 'function_call_output',
          call_id: result.callId,
          output: typeof result.output === 'string' ? result.output : JSON.stringify(result.output ?? null),
        }),
      );
    }

    return [{ role: 'user', content: prompt }];
  }
}
