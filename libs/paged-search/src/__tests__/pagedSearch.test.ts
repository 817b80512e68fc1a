import { describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import type { Logger } from '@libs/http-client-core';
import {
  IncorrectDataReturnedError,
  PageTrigger,
  PagedSearch,
  createZodPageDecoder,
  type AccumulatedResponse,
  type PageFetcher,
  type PageRequestParams,
} from '../index';

type TestItem = { id: number };

type Reply = { count: number; total: number } | { error: Error } | { raw: unknown };

class FakePageFetcher implements PageFetcher {
  readonly requests: PageRequestParams[] = [];
  readonly signals: Array<AbortSignal | undefined> = [];

  constructor(private readonly replies: Reply[]) {}

  async fetchPage(params: PageRequestParams, signal?: AbortSignal): Promise<unknown> {
    this.requests.push(params);
    this.signals.push(signal);
    const reply = this.replies[Math.min(this.requests.length - 1, this.replies.length - 1)];
    if ('error' in reply) throw reply.error;
    if ('raw' in reply) return reply.raw;

    const offset = (params.page - 1) * params.perPage;
    return {
      total: reply.total,
      items: Array.from({ length: reply.count }, (_, i) => ({ id: offset + i })),
    };
  }

  get pages(): number[] {
    return this.requests.map((request) => request.page);
  }
}

const decoder = createZodPageDecoder({
  itemSchema: z.object({ id: z.number() }),
  totalField: 'total',
  itemsField: 'items',
});

const createSearch = (fetcher: PageFetcher, maxImagesPerPage = 50, logger: Logger = {}) =>
  new PagedSearch<TestItem>({ fetcher, decoder, maxImagesPerPage, logger });

async function* endless(): AsyncGenerator<void> {
  while (true) yield;
}

async function* none(): AsyncGenerator<void> {}

async function collect(responses: AsyncIterable<AccumulatedResponse<TestItem>>) {
  const emissions: AccumulatedResponse<TestItem>[] = [];
  try {
    for await (const response of responses) {
      emissions.push(response);
    }
    return { emissions, error: undefined };
  } catch (error) {
    return { emissions, error };
  }
}

async function pull(
  responses: AsyncGenerator<AccumulatedResponse<TestItem>, void, undefined>,
): Promise<AccumulatedResponse<TestItem>> {
  const next = await responses.next();
  if (next.done) throw new Error('sequence ended early');
  return next.value;
}

const counts = (emissions: AccumulatedResponse<TestItem>[]) => emissions.map((e) => e.images.length);

describe('PagedSearch.search', () => {
  it('returns images and the total when the fetcher works', async () => {
    const fetcher = new FakePageFetcher([{ count: 2, total: 123 }]);

    const { emissions, error } = await collect(createSearch(fetcher).search('cats', endless()));

    expect(error).toBeUndefined();
    expect(emissions).toHaveLength(1);
    expect(emissions[0].totalAvailable).toBe(123);
    expect(emissions[0].images).toEqual([{ id: 0 }, { id: 1 }]);
    expect(fetcher.requests).toEqual([{ query: 'cats', page: 1, perPage: 50 }]);
  });

  it('does not fetch before the sequence is pulled', async () => {
    const fetcher = new FakePageFetcher([{ count: 2, total: 2 }]);
    const responses = createSearch(fetcher).search('cats', none());

    expect(fetcher.requests).toHaveLength(0);

    await responses.next();
    expect(fetcher.pages).toEqual([1]);
  });

  it('completes only once the cumulative count reaches the total', async () => {
    const fetcher = new FakePageFetcher([{ count: 50, total: 150 }]);

    const { emissions, error } = await collect(createSearch(fetcher).search('cats', endless()));

    expect(error).toBeUndefined();
    expect(counts(emissions)).toEqual([50, 100, 150]);
    expect(fetcher.pages).toEqual([1, 2, 3]);
    expect(emissions[2].images.map((image) => image.id)).toEqual(Array.from({ length: 150 }, (_, i) => i));
  });

  it('stays open after two full pages below the total', async () => {
    const fetcher = new FakePageFetcher([{ count: 50, total: 150 }]);
    const trigger = new PageTrigger();
    const responses = createSearch(fetcher).search('cats', trigger);

    const first = await pull(responses);
    trigger.fire();
    const second = await pull(responses);

    expect(first.images).toHaveLength(50);
    expect(second.images).toHaveLength(100);
    expect(second.totalAvailable).toBe(150);

    trigger.fire();
    const third = await pull(responses);
    expect(third.images).toHaveLength(150);
    expect(await responses.next()).toEqual({ done: true, value: undefined });
    expect(fetcher.pages).toEqual([1, 2, 3]);
  });

  it('completes on a short page even though the total is higher', async () => {
    const fetcher = new FakePageFetcher([
      { count: 50, total: 200 },
      { count: 50, total: 200 },
      { count: 49, total: 200 },
    ]);

    const { emissions } = await collect(createSearch(fetcher).search('cats', endless()));

    expect(counts(emissions)).toEqual([50, 100, 149]);
    expect(fetcher.pages).toEqual([1, 2, 3]);
  });

  it('accumulates the sum of page sizes in fetch order', async () => {
    const fetcher = new FakePageFetcher([
      { count: 3, total: 100 },
      { count: 3, total: 100 },
      { count: 1, total: 100 },
    ]);

    const { emissions } = await collect(createSearch(fetcher, 3).search('cats', endless()));

    expect(counts(emissions)).toEqual([3, 6, 7]);
    expect(emissions[2].images.map((image) => image.id)).toEqual([0, 1, 2, 3, 4, 5, 6]);
    expect(fetcher.requests.map((request) => request.perPage)).toEqual([3, 3, 3]);
  });

  it('fetches page 1 once when the trigger fires before it resolves', async () => {
    const fetcher = new FakePageFetcher([{ count: 50, total: 150 }]);
    const trigger = new PageTrigger();
    const responses = createSearch(fetcher).search('cats', trigger);

    const first = responses.next();
    trigger.fire();
    await first;

    expect(fetcher.pages).toEqual([1]);

    const second = await pull(responses);
    expect(second.images).toHaveLength(100);
    expect(fetcher.pages).toEqual([1, 2]);
  });

  it('fails with IncorrectDataReturnedError when the total is missing', async () => {
    const fetcher = new FakePageFetcher([{ raw: { items: [] } }]);

    const { emissions, error } = await collect(createSearch(fetcher).search('cats', endless()));

    expect(emissions).toHaveLength(0);
    expect(error).toBeInstanceOf(IncorrectDataReturnedError);
    expect(fetcher.requests).toHaveLength(1);
  });

  it('stops fetching when a later page is malformed', async () => {
    const fetcher = new FakePageFetcher([
      { count: 50, total: 150 },
      { raw: { total: 150, items: [{ id: 'fifty' }] } },
      { count: 50, total: 150 },
    ]);

    const { emissions, error } = await collect(createSearch(fetcher).search('cats', endless()));

    expect(counts(emissions)).toEqual([50]);
    expect(error).toBeInstanceOf(IncorrectDataReturnedError);
    expect(error).toMatchObject({ page: 2 });
    expect(fetcher.pages).toEqual([1, 2]);
  });

  it('passes a page 2 fetch error through unchanged', async () => {
    const failure = new Error('not connected to internet');
    const fetcher = new FakePageFetcher([{ count: 50, total: 150 }, { error: failure }]);

    const { emissions, error } = await collect(createSearch(fetcher).search('cats', endless()));

    expect(error).toBe(failure);
    expect(counts(emissions)).toEqual([50]);
    expect(emissions[0].totalAvailable).toBe(150);
    expect(fetcher.pages).toEqual([1, 2]);
  });

  it('ends after the last page when the trigger ends', async () => {
    const fetcher = new FakePageFetcher([{ count: 50, total: 150 }]);

    const { emissions, error } = await collect(createSearch(fetcher).search('cats', none()));

    expect(error).toBeUndefined();
    expect(counts(emissions)).toEqual([50]);
    expect(fetcher.pages).toEqual([1]);
  });

  it('aborts the in-flight fetch and ends quietly when the signal fires', async () => {
    const fetchPage = vi.fn((_params: PageRequestParams, _signal?: AbortSignal) => new Promise<unknown>(() => undefined));
    const controller = new AbortController();
    const trigger = new PageTrigger();
    const responses = createSearch({ fetchPage }).search('cats', trigger, { signal: controller.signal });

    const pending = responses.next();
    controller.abort();

    await expect(pending).resolves.toEqual({ done: true, value: undefined });
    expect(fetchPage).toHaveBeenCalledTimes(1);
    expect(fetchPage.mock.calls[0][1]?.aborted).toBe(true);
    expect(trigger.isClosed).toBe(true);
  });

  it('ends quietly when aborted while waiting on a trigger that never fires', async () => {
    async function* neverFires(): AsyncGenerator<void> {
      await new Promise<never>(() => undefined);
    }
    const fetcher = new FakePageFetcher([{ count: 50, total: 150 }]);
    const controller = new AbortController();
    const responses = createSearch(fetcher).search('cats', neverFires(), { signal: controller.signal });

    await pull(responses);
    const pending = responses.next();
    await new Promise((resolve) => setTimeout(resolve, 10));
    controller.abort();

    await expect(pending).resolves.toEqual({ done: true, value: undefined });
    expect(fetcher.pages).toEqual([1]);
  });

  it('does nothing when the signal is already aborted', async () => {
    const fetcher = new FakePageFetcher([{ count: 2, total: 2 }]);
    const controller = new AbortController();
    controller.abort();

    const { emissions } = await collect(createSearch(fetcher).search('cats', endless(), { signal: controller.signal }));

    expect(emissions).toHaveLength(0);
    expect(fetcher.requests).toHaveLength(0);
  });

  it('stops fetching and closes the trigger when the consumer breaks out', async () => {
    const fetcher = new FakePageFetcher([{ count: 50, total: 150 }]);
    const trigger = new PageTrigger();

    for await (const response of createSearch(fetcher).search('cats', trigger)) {
      expect(response.images).toHaveLength(50);
      trigger.fire();
      break;
    }

    expect(trigger.isClosed).toBe(true);
    expect(fetcher.pages).toEqual([1]);
    expect(fetcher.signals[0]?.aborted).toBe(true);
  });

  it('runs every subscription as an independent session', async () => {
    const fetcher = new FakePageFetcher([{ count: 2, total: 2 }]);
    const search = createSearch(fetcher);

    const first = await collect(search.search('cats', none()));
    const second = await collect(search.search('dogs', none()));

    expect(counts(first.emissions)).toEqual([2]);
    expect(counts(second.emissions)).toEqual([2]);
    expect(fetcher.requests).toEqual([
      { query: 'cats', page: 1, perPage: 50 },
      { query: 'dogs', page: 1, perPage: 50 },
    ]);
  });

  it('logs completion and failure', async () => {
    const logger = { info: vi.fn(), warn: vi.fn() };

    await collect(createSearch(new FakePageFetcher([{ count: 2, total: 123 }]), 50, logger).search('cats', none()));
    expect(logger.info).toHaveBeenCalledWith(
      '[PagedSearch] Completed "cats" after page 1 (shortPage)',
      { query: 'cats', pages: 1, accumulated: 2, totalAvailable: 123 },
    );

    await collect(
      createSearch(new FakePageFetcher([{ error: new Error('offline') }]), 50, logger).search('dogs', none()),
    );
    expect(logger.warn).toHaveBeenCalledWith('[PagedSearch] Failed "dogs" on page 1', {
      query: 'dogs',
      page: 1,
      error: 'offline',
    });
  });
});
