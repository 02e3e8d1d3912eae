import { ProviderError } from '../../../application/errors/ProviderError.js';
import { ProviderResponse } from '../../../application/ports/LlmProviderPort.js';

export type ErrorTransformer = (error: unknown) => ProviderError;

export const withProviderResponse = async <T>(
  operation: () => Promise<T>,
  transformError: ErrorTransformer,
): Promise<ProviderResponse<T>> => {
  try {
    const data = await operation();
    return { success: true, data, error: null };
  } catch (error) {
    return { success: false, data: null, error: transformError(error) };
  }
};
