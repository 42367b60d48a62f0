import type { Request, Response } from 'express';
import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import type { AssistantError } from '@/errors';
import { childLogger, type Logger } from '@/lib/logger';
import type { BookAssistant } from '@/services/bookAssistant';
import type { ApiErrorResponse, BookRecord, BookResponse } from '@/types';

const limit = z.number().int().min(1).max(40);

// Rejects blank input but passes the string through untouched; titles are compared exactly.
const nonBlank = (message: string) =>
  z.string().refine((value) => value.trim().length > 0, { message });

const searchSchema = z.object({
  query: nonBlank('query is required'),
  max_results: limit.optional(),
});

const bookSchema = z.object({
  title: z.string().optional(),
  authors: z.array(z.string()).default([]),
  description: z.string().default(''),
  categories: z.array(z.string()).default([]),
  preview_link: z.string().optional(),
  page_count: z.number().int().optional(),
});

const analyzeSchema = z
  .object({
    question: nonBlank('question is required'),
    books: z.array(bookSchema).optional(),
    query: nonBlank('query must not be blank').optional(),
    max_results: limit.optional(),
  })
  .refine((body) => body.books !== undefined || body.query !== undefined, {
    message: 'either books or query is required',
  });

const recommendSchema = z.object({
  title: nonBlank('title is required'),
  max_recommendations: limit.optional(),
});

export function toBookResponse(book: BookRecord): BookResponse {
  return {
    title: book.title,
    authors: book.authors,
    description: book.description,
    categories: book.categories,
    preview_link: book.previewLink,
    page_count: book.pageCount,
  };
}

function fromBookRequest(book: z.infer<typeof bookSchema>): BookRecord {
  return {
    title: book.title,
    authors: book.authors,
    description: book.description,
    categories: book.categories,
    previewLink: book.preview_link,
    pageCount: book.page_count,
  };
}

function sendInvalid(res: Response, error: z.ZodError): void {
  const body: ApiErrorResponse = {
    error: {
      code: 'INVALID_REQUEST',
      message: error.issues.map((issue) => issue.message).join('; '),
    },
  };
  res.status(400).json(body);
}

function sendFailure(res: Response, error: AssistantError, requestId: string): void {
  const body: ApiErrorResponse = {
    error: { code: error.code, message: error.message },
    request_id: requestId,
  };
  res.status(502).json(body);
}

export class AssistantController {
  private assistant: BookAssistant;
  private logger: Logger;

  constructor(assistant: BookAssistant, logger: Logger) {
    this.assistant = assistant;
    this.logger = logger;
  }

  health = async (_req: Request, res: Response): Promise<void> => {
    res.json({ status: 'ok' });
  };

  search = async (req: Request, res: Response): Promise<void> => {
    const parsed = searchSchema.safeParse(req.body);
    if (!parsed.success) {
      sendInvalid(res, parsed.error);
      return;
    }

    const requestId = uuidv4();
    const log = childLogger(this.logger, requestId);
    const { query, max_results } = parsed.data;
    log.info(`POST /search "${query}"`);

    const result = await this.assistant.searchBooksResult(query, max_results);
    if (!result.ok) {
      sendFailure(res, result.error, requestId);
      return;
    }
    res.json({ books: result.value.map(toBookResponse), request_id: requestId });
  };

  analyze = async (req: Request, res: Response): Promise<void> => {
    const parsed = analyzeSchema.safeParse(req.body);
    if (!parsed.success) {
      sendInvalid(res, parsed.error);
      return;
    }

    const requestId = uuidv4();
    const log = childLogger(this.logger, requestId);
    const { question, books, query, max_results } = parsed.data;

    let records: BookRecord[];
    if (books) {
      records = books.map(fromBookRequest);
    } else {
      // refine() guarantees query is present when books is not
      const searchResult = await this.assistant.searchBooksResult(query ?? '', max_results);
      if (!searchResult.ok) {
        sendFailure(res, searchResult.error, requestId);
        return;
      }
      records = searchResult.value;
    }

    log.info(`POST /analyze over ${records.length} books`);
    const result = await this.assistant.analyzeBooksResult(records, question);
    if (!result.ok) {
      sendFailure(res, result.error, requestId);
      return;
    }
    res.json({ analysis: result.value, request_id: requestId });
  };

  recommend = async (req: Request, res: Response): Promise<void> => {
    const parsed = recommendSchema.safeParse(req.body);
    if (!parsed.success) {
      sendInvalid(res, parsed.error);
      return;
    }

    const requestId = uuidv4();
    const log = childLogger(this.logger, requestId);
    const { title, max_recommendations } = parsed.data;
    log.info(`POST /recommend "${title}"`);

    const result = await this.assistant.recommendSimilarBooksResult(title, max_recommendations);
    if (!result.ok) {
      sendFailure(res, result.error, requestId);
      return;
    }
    res.json({ recommendations: result.value.map(toBookResponse), request_id: requestId });
  };
}
