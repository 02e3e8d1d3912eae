/**
 * Error hierarchy for LLM providers.
 *
 * Every failure an adapter reports is a ProviderError; each provider narrows
 * it with its own subclass so callers can tell which integration failed.
 */

export class ProviderError extends Error {
  /** Provider that raised the error, e.g. "openrouter". */
  readonly provider: string;
  /** Structured context from the failing call, if any. */
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options: { provider: string; details?: Record<string, unknown>; cause?: unknown },
  ) {
    super(message, { cause: options.cause });
    this.name = 'ProviderError';
    this.provider = options.provider;
    this.details = options.details;
  }
}

export class OpenRouterError extends ProviderError {
  constructor(message: string, options: { details?: Record<string, unknown>; cause?: unknown } = {}) {
    super(message, { ...options, provider: 'openrouter' });
    this.name = 'OpenRouterError';
  }
}

/** Raised before any remote call when a batch exceeds the per-request cap. */
export class TooManyTransactionsError extends OpenRouterError {
  readonly limit: number;
  readonly received: number;

  constructor(task: string, limit: number, received: number) {
    super(`Too many transactions to ${task}. Max is ${limit} per request.`, {
      details: { limit, received },
    });
    this.name = 'TooManyTransactionsError';
    this.limit = limit;
    this.received = received;
  }
}

/** The model answered, but not in the shape the request asked for. */
export class InvalidResponseError extends OpenRouterError {
  constructor(message: string, options: { details?: Record<string, unknown>; cause?: unknown } = {}) {
    super(message, options);
    this.name = 'InvalidResponseError';
  }
}

/** A streamed chat ended without a completed response event. */
export class IncompleteStreamError extends OpenRouterError {
  constructor(chunksReceived: number) {
    super('Chat stream ended without a completed response.', { details: { chunksReceived } });
    this.name = 'IncompleteStreamError';
  }
}
