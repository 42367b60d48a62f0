import type { AssistantError } from '@/errors';
import type { Logger } from '@/lib/logger';
import type { BookRecord, OperationResult } from '@/types';
import type { BookSearchService } from '@/services/bookSearchService';

export const DEFAULT_MAX_RECOMMENDATIONS = 3;

export class RecommendationService {
  private searchService: BookSearchService;
  private logger: Logger;

  constructor(searchService: BookSearchService, logger: Logger) {
    this.searchService = searchService;
    this.logger = logger;
  }

  /**
   * Suggest books sharing categories with `bookTitle`.
   *
   * Categories are searched in the order the reference book lists them and their hits are
   * concatenated before truncation, so earlier categories win. Hits titled exactly like the
   * requested title or the resolved reference title are dropped; repeats across categories
   * are kept. Only a failed reference lookup fails the call.
   */
  async recommend(
    bookTitle: string,
    maxRecommendations: number = DEFAULT_MAX_RECOMMENDATIONS
  ): Promise<OperationResult<BookRecord[]>> {
    const reference = await this.searchService.search(bookTitle, 1);
    if (!reference.ok) {
      return this.fail(reference.error);
    }

    const [referenceBook] = reference.value;
    if (!referenceBook) {
      this.logger.info(`No reference book found for "${bookTitle}"`);
      return { ok: true, value: [] };
    }

    const excludedTitles = new Set([bookTitle]);
    if (referenceBook.title !== undefined) {
      excludedTitles.add(referenceBook.title);
    }

    const similarBooks: BookRecord[] = [];
    for (const category of referenceBook.categories) {
      const result = await this.searchService.search(`subject:${category}`, maxRecommendations);
      if (!result.ok) {
        // a failed category counts as no hits; the remaining categories still run
        this.logger.warn(`Skipping category "${category}": ${result.error.message}`);
        continue;
      }

      similarBooks.push(
        ...result.value.filter(
          (book) => book.title === undefined || !excludedTitles.has(book.title)
        )
      );
    }

    this.logger.debug(
      `Collected ${similarBooks.length} candidates across ${referenceBook.categories.length} categories`
    );
    return { ok: true, value: similarBooks.slice(0, maxRecommendations) };
  }

  private fail(error: AssistantError): OperationResult<BookRecord[]> {
    this.logger.error(`Error recommending similar books: ${error.message}`);
    return { ok: false, error };
  }
}
