import { CohereClient, CohereError, CohereTimeoutError } from 'cohere-ai';
import { TransportError } from '@/errors';

export interface GenerationRequest {
  prompt: string;
  maxTokens: number;
  temperature: number;
  k: number;
  stopSequences: string[];
}

export interface GenerationCandidate {
  text: string;
}

/**
 * Anything that can turn a prompt into generation candidates.
 */
export interface TextGenerator {
  generate(request: GenerationRequest): Promise<GenerationCandidate[]>;
}

export interface CohereGeneratorOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
}

export class CohereTextGenerator implements TextGenerator {
  private client: CohereClient;
  private model: string;
  private timeoutInSeconds: number;

  constructor(options: CohereGeneratorOptions, client?: CohereClient) {
    this.client = client ?? new CohereClient({ token: options.apiKey });
    this.model = options.model;
    this.timeoutInSeconds = Math.max(1, Math.ceil(options.timeoutMs / 1000));
  }

  async generate(request: GenerationRequest): Promise<GenerationCandidate[]> {
    try {
      const response = await this.client.generate(
        {
          model: this.model,
          prompt: request.prompt,
          maxTokens: request.maxTokens,
          temperature: request.temperature,
          k: request.k,
          stopSequences: request.stopSequences,
          returnLikelihoods: 'NONE',
        },
        // no retry policy: one blocking call per operation
        { timeoutInSeconds: this.timeoutInSeconds, maxRetries: 0 }
      );
      return response.generations.map((generation) => ({ text: generation.text }));
    } catch (error) {
      if (error instanceof CohereTimeoutError) {
        throw new TransportError(`Cohere request timed out after ${this.timeoutInSeconds}s`, {
          service: 'cohere',
          cause: error,
        });
      }
      if (error instanceof CohereError) {
        throw new TransportError(`Cohere request failed: ${error.message}`, {
          service: 'cohere',
          status: error.statusCode,
          cause: error,
        });
      }
      throw error;
    }
  }
}
