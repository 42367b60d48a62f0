import { AssistantError, GenerationError, describeError } from '@/errors';
import type { Logger } from '@/lib/logger';
import type { BookRecord, OperationResult } from '@/types';
import type { GenerationRequest, TextGenerator } from '@/services/generationService';

export const ANALYSIS_APOLOGY = 'I apologize, but I encountered an error while analyzing the books.';

export const GENERATION_SETTINGS: Omit<GenerationRequest, 'prompt'> = {
  maxTokens: 500,
  temperature: 0.7,
  k: 0,
  stopSequences: [],
};

/**
 * Render books as consecutive four-line blocks separated by a blank line.
 */
export function buildContextBlock(books: BookRecord[]): string {
  return books
    .map(
      (book) =>
        `Book: ${book.title ?? 'Unknown title'}\n` +
        `Authors: ${book.authors.join(', ')}\n` +
        `Description: ${book.description}\n` +
        `Categories: ${book.categories.join(', ')}\n`
    )
    .join('\n');
}

export function buildAnalysisPrompt(context: string, question: string): string {
  return `Based on the following books information:

${context}

Question: ${question}

Please provide a detailed analysis of these books in relation to the question. Include relevant comparisons, themes, and insights.`;
}

export class AnalysisService {
  private generator: TextGenerator;
  private logger: Logger;

  constructor(generator: TextGenerator, logger: Logger) {
    this.generator = generator;
    this.logger = logger;
  }

  async analyze(books: BookRecord[], question: string): Promise<OperationResult<string>> {
    const prompt = buildAnalysisPrompt(buildContextBlock(books), question);
    this.logger.debug(`Analyzing ${books.length} books (prompt length ${prompt.length})`);

    try {
      const candidates = await this.generator.generate({ prompt, ...GENERATION_SETTINGS });
      const first = candidates[0];
      if (!first || typeof first.text !== 'string') {
        throw new GenerationError('Cohere returned no generations');
      }
      return { ok: true, value: first.text.trim() };
    } catch (error) {
      const failure =
        error instanceof AssistantError
          ? error
          : new GenerationError(describeError(error), { cause: error });
      this.logger.error(`Error analyzing books with Cohere: ${failure.message}`);
      return { ok: false, error: failure };
    }
  }
}
