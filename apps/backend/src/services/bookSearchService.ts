import axios, { type AxiosInstance } from 'axios';
import { TransportError, describeError } from '@/errors';
import type { Logger } from '@/lib/logger';
import type { BookRecord, OperationResult, VolumeInfo, VolumesResponse } from '@/types';

export const DEFAULT_MAX_RESULTS = 5;

export interface BookSearchServiceOptions {
  apiKey: string;
  baseURL: string;
  timeoutMs: number;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

/**
 * Map one `volumeInfo` object onto a BookRecord, defaulting whatever is missing.
 */
export function toBookRecord(volumeInfo: VolumeInfo): BookRecord {
  const { pageCount } = volumeInfo;
  return {
    title: optionalString(volumeInfo.title),
    authors: stringList(volumeInfo.authors),
    description: optionalString(volumeInfo.description) ?? '',
    categories: stringList(volumeInfo.categories),
    previewLink: optionalString(volumeInfo.previewLink),
    pageCount: typeof pageCount === 'number' && Number.isInteger(pageCount) ? pageCount : undefined,
  };
}

export function parseVolumes(body: unknown): BookRecord[] {
  const response: VolumesResponse = isObject(body) ? body : {};
  const items = Array.isArray(response.items) ? response.items : [];

  return items.map((item: unknown) => {
    const volumeInfo = isObject(item) && isObject(item.volumeInfo) ? item.volumeInfo : {};
    return toBookRecord(volumeInfo);
  });
}

export class BookSearchService {
  private client: AxiosInstance;
  private apiKey: string;
  private logger: Logger;

  constructor(options: BookSearchServiceOptions, logger: Logger, client?: AxiosInstance) {
    this.apiKey = options.apiKey;
    this.logger = logger;
    this.client =
      client ??
      axios.create({
        baseURL: options.baseURL,
        timeout: options.timeoutMs,
        headers: { Accept: 'application/json' },
      });
  }

  /**
   * Run one volumes query. Records come back in the order the service returned them.
   */
  async search(
    query: string,
    maxResults: number = DEFAULT_MAX_RESULTS
  ): Promise<OperationResult<BookRecord[]>> {
    this.logger.debug(`Searching Google Books: "${query}" (maxResults=${maxResults})`);

    try {
      const response = await this.client.get<unknown>('', {
        params: { q: query, key: this.apiKey, maxResults },
      });
      const books = parseVolumes(response.data);
      this.logger.debug(`Google Books returned ${books.length} results for "${query}"`);
      return { ok: true, value: books };
    } catch (error) {
      const status = axios.isAxiosError(error) ? error.response?.status : undefined;
      const transportError = new TransportError(
        `Error searching Google Books API: ${describeError(error)}`,
        { service: 'google-books', status, cause: error }
      );
      this.logger.error(transportError.message);
      return { ok: false, error: transportError };
    }
  }
}
