import { describe, it, expect } from 'vitest';
import { BookSearchService } from '@/services/bookSearchService';
import { RecommendationService } from '@/services/recommendationService';
import { createFakeVolumesClient, createTestLogger, volumes, type FakeReply } from './helpers';

function setup(replies: Record<string, FakeReply>) {
  const { client, calls } = createFakeVolumesClient((params) => {
    const reply = replies[String(params.q)];
    return reply ?? volumes();
  });
  const logger = createTestLogger();
  const search = new BookSearchService(
    { apiKey: 'test-google-key', baseURL: 'http://books.test/volumes', timeoutMs: 1000 },
    logger,
    client
  );
  return { service: new RecommendationService(search, logger), calls, logger };
}

function titles(result: Awaited<ReturnType<RecommendationService['recommend']>>) {
  return result.ok ? result.value.map((book) => book.title) : result.error.message;
}

describe('RecommendationService.recommend()', () => {
  it('returns nothing when the reference title is not found', async () => {
    const { service, calls } = setup({
      zzzznonexistentbook123: { status: 200, data: { kind: 'books#volumes', totalItems: 0 } },
    });

    const result = await service.recommend('zzzznonexistentbook123');

    expect(result).toEqual({ ok: true, value: [] });
    expect(calls).toEqual([{ q: 'zzzznonexistentbook123', key: 'test-google-key', maxResults: 1 }]);
  });

  it('returns nothing when the reference book has no categories', async () => {
    const { service, calls } = setup({ Emma: volumes({ title: 'Emma' }) });

    const result = await service.recommend('Emma');

    expect(result).toEqual({ ok: true, value: [] });
    expect(calls).toHaveLength(1);
  });

  it('drops exact title matches but keeps similar titles', async () => {
    const { service, calls } = setup({
      Dune: volumes({ title: 'Dune', categories: ['Fiction'] }),
      'subject:Fiction': volumes(
        { title: 'Dune' },
        { title: 'Dune Messiah' },
        { title: 'dune' },
        { title: 'Children of Dune' }
      ),
    });

    const result = await service.recommend('Dune', 5);

    expect(titles(result)).toEqual(['Dune Messiah', 'dune', 'Children of Dune']);
    expect(calls[1]).toEqual({ q: 'subject:Fiction', key: 'test-google-key', maxResults: 5 });
  });

  it('prefers earlier categories and truncates after accumulating', async () => {
    const { service, calls } = setup({
      Foundation: volumes({ title: 'Foundation', categories: ['Fiction', 'Science'] }),
      'subject:Fiction': volumes({ title: 'F1' }, { title: 'F2' }, { title: 'F3' }),
      'subject:Science': volumes({ title: 'S1' }, { title: 'S2' }, { title: 'S3' }),
    });

    const result = await service.recommend('Foundation', 3);

    expect(titles(result)).toEqual(['F1', 'F2', 'F3']);
    expect(calls.map((params) => params.q)).toEqual([
      'Foundation',
      'subject:Fiction',
      'subject:Science',
    ]);
  });

  it('keeps duplicates that appear under several categories', async () => {
    const { service } = setup({
      Foundation: volumes({ title: 'Foundation', categories: ['Fiction', 'Science'] }),
      'subject:Fiction': volumes({ title: 'I, Robot' }),
      'subject:Science': volumes({ title: 'I, Robot' }, { title: 'Cosmos' }),
    });

    const result = await service.recommend('Foundation');

    expect(titles(result)).toEqual(['I, Robot', 'I, Robot', 'Cosmos']);
  });

  it('also drops the title the reference lookup resolved to', async () => {
    const resolved = 'Superintelligence: Paths, Dangers, Strategies';
    const { service } = setup({
      'Superintelligence by Nick Bostrom': volumes({ title: resolved, categories: ['Computers'] }),
      'subject:Computers': volumes({ title: resolved }, { title: 'Life 3.0' }, { title: 'Human Compatible' }),
    });

    const result = await service.recommend('Superintelligence by Nick Bostrom');

    expect(titles(result)).toEqual(['Life 3.0', 'Human Compatible']);
  });

  it('keeps untitled hits', async () => {
    const { service } = setup({
      Dune: volumes({ title: 'Dune', categories: ['Fiction'] }),
      'subject:Fiction': volumes({ authors: ['Anonymous'] }),
    });

    const result = await service.recommend('Dune');

    expect(result.ok && result.value).toEqual([
      { authors: ['Anonymous'], description: '', categories: [] },
    ]);
  });

  it('treats a failed category search as no hits and keeps going', async () => {
    const { service, logger, calls } = setup({
      Dune: volumes({ title: 'Dune', categories: ['Classics', 'Fiction'] }),
      'subject:Classics': { status: 500 },
      'subject:Fiction': volumes({ title: 'Hyperion' }),
    });

    const result = await service.recommend('Dune');

    expect(titles(result)).toEqual(['Hyperion']);
    expect(calls.map((params) => params.q)).toEqual(['Dune', 'subject:Classics', 'subject:Fiction']);
    expect(logger.warn).toHaveBeenCalledWith(
      'Skipping category "Classics": Error searching Google Books API: Request failed with status code 500'
    );
  });

  it('fails when the reference lookup fails', async () => {
    const { service, logger } = setup({ Dune: { status: 500 } });

    const result = await service.recommend('Dune');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toMatchObject({ kind: 'transport', status: 500 });
    expect(logger.error).toHaveBeenLastCalledWith(
      'Error recommending similar books: Error searching Google Books API: Request failed with status code 500'
    );
  });
});
