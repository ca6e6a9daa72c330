import { CircuitBreakerStats } from '../../utils/retry.js';

/**
 * Interface for Ollama API client
 */
export interface IOllamaClient {
  /**
   * Generate a completion for a text prompt; resolves to the generated text
   */
  generate(model: string, prompt: string, systemPrompt?: string): Promise<string>;

  /**
   * Names of the models installed on the Ollama host
   */
  listModels(): Promise<string[]>;

  getCircuitBreakerStats(): CircuitBreakerStats;
}
