import { ChatUsageDTO } from '../dto/ChatDTO.js';

export interface LlmGenerationLog {
  name: string;
  model: string;
  input: unknown;
  output: unknown;
  usage?: ChatUsageDTO | null;
}

export interface LlmObservabilityPort {
  /** Never throws: emission failures are reported locally and dropped. */
  logGeneration(generation: LlmGenerationLog): void;
  shutdown(): Promise<void>;
}
