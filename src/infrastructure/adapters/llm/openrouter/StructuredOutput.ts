import { z } from 'zod';
import { InvalidResponseError } from '../../../../application/errors/ProviderError.js';
import { ChatParser } from './ChatParser.js';

const FENCED_JSON = /```(?:json)?\s*([\s\S]*?)```/;

/**
 * Reads the JSON document a structured-output request produced. Models that
 * ignore `text.format` tend to wrap the document in a markdown fence, so one
 * is stripped if present.
 */
export const parseStructuredOutput = <T>(
  raw: unknown,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  task: string,
): T => {
  const response = new ChatParser().parse(raw);
  const text = response.messages.find((message) => message.outputText.trim() !== '')?.outputText;

  if (!text) {
    throw new InvalidResponseError(`OpenRouter returned no output for ${task}`, {
      details: { responseId: response.id, model: response.model },
    });
  }

  const document = text.match(FENCED_JSON)?.[1] ?? text;

  let json: unknown;
  try {
    json = JSON.parse(document);
  } catch (error) {
    throw new InvalidResponseError(`OpenRouter returned invalid JSON for ${task}`, {
      cause: error,
      details: { responseId: response.id },
    });
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new InvalidResponseError(`OpenRouter output for ${task} does not match the expected schema`, {
      cause: parsed.error,
      details: { responseId: response.id },
    });
  }

  return parsed.data;
};

/** Structured outputs encode "no answer" as the string "null". */
export const normalizeNullable = (value: string | null): string | null => {
  if (value === null) {
    return null;
  }

  const trimmed = value.trim();
  return trimmed === '' || trimmed.toLowerCase() === 'null' ? null : trimmed;
};
