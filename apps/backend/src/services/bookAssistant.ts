import type { AppConfig } from '@/config';
import type { Logger } from '@/lib/logger';
import type { BookRecord, OperationResult } from '@/types';
import { BookSearchService, DEFAULT_MAX_RESULTS } from '@/services/bookSearchService';
import { ANALYSIS_APOLOGY, AnalysisService } from '@/services/analysisService';
import {
  DEFAULT_MAX_RECOMMENDATIONS,
  RecommendationService,
} from '@/services/recommendationService';
import { CohereTextGenerator, type TextGenerator } from '@/services/generationService';

/**
 * Entry point for the three assistant operations.
 *
 * The `*Result` methods report transport and generation failures as values. The plain methods
 * fold those failures into an empty list or the apology string, so a caller cannot tell
 * "no results" from "service down".
 */
export class BookAssistant {
  readonly logger: Logger;
  private searchService: BookSearchService;
  private analysisService: AnalysisService;
  private recommendationService: RecommendationService;

  constructor(searchService: BookSearchService, generator: TextGenerator, logger: Logger) {
    this.logger = logger;
    this.searchService = searchService;
    this.analysisService = new AnalysisService(generator, logger);
    this.recommendationService = new RecommendationService(searchService, logger);
  }

  searchBooksResult(
    query: string,
    maxResults: number = DEFAULT_MAX_RESULTS
  ): Promise<OperationResult<BookRecord[]>> {
    return this.searchService.search(query, maxResults);
  }

  analyzeBooksResult(books: BookRecord[], question: string): Promise<OperationResult<string>> {
    return this.analysisService.analyze(books, question);
  }

  recommendSimilarBooksResult(
    bookTitle: string,
    maxRecommendations: number = DEFAULT_MAX_RECOMMENDATIONS
  ): Promise<OperationResult<BookRecord[]>> {
    return this.recommendationService.recommend(bookTitle, maxRecommendations);
  }

  async searchBooks(query: string, maxResults: number = DEFAULT_MAX_RESULTS): Promise<BookRecord[]> {
    const result = await this.searchBooksResult(query, maxResults);
    return result.ok ? result.value : [];
  }

  async analyzeBooks(books: BookRecord[], question: string): Promise<string> {
    const result = await this.analyzeBooksResult(books, question);
    return result.ok ? result.value : ANALYSIS_APOLOGY;
  }

  async recommendSimilarBooks(
    bookTitle: string,
    maxRecommendations: number = DEFAULT_MAX_RECOMMENDATIONS
  ): Promise<BookRecord[]> {
    const result = await this.recommendSimilarBooksResult(bookTitle, maxRecommendations);
    return result.ok ? result.value : [];
  }
}

export function createBookAssistant(config: AppConfig, logger: Logger): BookAssistant {
  const searchService = new BookSearchService(
    {
      apiKey: config.googleBooksApiKey,
      baseURL: config.googleBooksBaseUrl,
      timeoutMs: config.requestTimeoutMs,
    },
    logger
  );
  const generator = new CohereTextGenerator({
    apiKey: config.cohereApiKey,
    model: config.cohereModel,
    timeoutMs: config.requestTimeoutMs,
  });
  return new BookAssistant(searchService, generator, logger);
}
