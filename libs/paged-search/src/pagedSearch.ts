import type { Logger } from '@libs/http-client-core';
import { PagedSearchAccumulator } from './accumulator';
import type { AccumulatedResponse, PageDecoder, PageFetcher, PageRequestParams } from './types';

export const DEFAULT_MAX_IMAGES_PER_PAGE = 50;

export interface PagedSearchConfig<TItem> {
  fetcher: PageFetcher;
  decoder: PageDecoder<TItem>;
  maxImagesPerPage?: number;
  logger?: Logger;
}

export interface SearchOptions {
  /** Aborting ends the sequence quietly and aborts the in-flight fetch. */
  signal?: AbortSignal;
}

type Raced<T> = { aborted: true } | { aborted: false; value: T };

/**
 * Paginated search over an injected fetcher.
 *
 * `search()` returns a lazy sequence: nothing is fetched until the first
 * pull. Page 1 is fetched immediately, and each value pulled from `trigger`
 * requests the next page. Every successful page yields the accumulated
 * response so far. The sequence returns once pagination is exhausted or
 * the trigger ends, and throws the fetch or decode error that stopped it.
 *
 * @example
 * ```typescript
 * const trigger = new PageTrigger();
 * for await (const response of search.search('tulips', trigger)) {
 *   render(response.images);
 *   loadMoreButton.onclick = () => trigger.fire();
 * }
 * ```
 */
export class PagedSearch<TItem> {
  private readonly fetcher: PageFetcher;
  private readonly decoder: PageDecoder<TItem>;
  private readonly maxImagesPerPage: number;
  private readonly logger?: Logger;

  constructor(config: PagedSearchConfig<TItem>) {
    this.fetcher = config.fetcher;
    this.decoder = config.decoder;
    this.maxImagesPerPage = config.maxImagesPerPage ?? DEFAULT_MAX_IMAGES_PER_PAGE;
    this.logger = config.logger;
  }

  search(
    query: string,
    trigger: AsyncIterable<unknown>,
    options: SearchOptions = {},
  ): AsyncGenerator<AccumulatedResponse<TItem>, void, undefined> {
    return this.run(query, trigger, options.signal);
  }

  private async *run(
    query: string,
    trigger: AsyncIterable<unknown>,
    outerSignal: AbortSignal | undefined,
  ): AsyncGenerator<AccumulatedResponse<TItem>, void, undefined> {
    if (outerSignal?.aborted) return;

    const controller = new AbortController();
    const onOuterAbort = () => controller.abort(outerSignal?.reason);
    outerSignal?.addEventListener('abort', onOuterAbort, { once: true });

    const accumulator = new PagedSearchAccumulator<TItem>(query, this.maxImagesPerPage);
    const triggers = trigger[Symbol.asyncIterator]();
    let triggerPullPending = false;
    let request: PageRequestParams | undefined = accumulator.start();

    try {
      while (request && !controller.signal.aborted) {
        this.logger?.debug?.(`[PagedSearch] Fetching page ${request.page} for "${query}"`, {
          query,
          page: request.page,
          perPage: request.perPage,
        });

        const fetched = await raceAbort(this.fetcher.fetchPage(request, controller.signal), controller.signal);
        if (fetched.aborted) {
          this.logger?.debug?.(`[PagedSearch] Cancelled while fetching page ${request.page} for "${query}"`);
          return;
        }

        const page = this.decoder.decodePage(fetched.value, request.page);
        const { response, completionReason } = accumulator.receivePage(page);
        this.logger?.debug?.(`[PagedSearch] Page ${request.page} added ${page.items.length} items`, {
          query,
          page: request.page,
          accumulated: response.images.length,
          totalAvailable: response.totalAvailable,
        });

        yield response;

        if (completionReason) {
          this.logger?.info?.(`[PagedSearch] Completed "${query}" after page ${request.page} (${completionReason})`, {
            query,
            pages: request.page,
            accumulated: response.images.length,
            totalAvailable: response.totalAvailable,
          });
          return;
        }

        if (controller.signal.aborted) return;
        triggerPullPending = true;
        const signal = await raceAbort(triggers.next(), controller.signal);
        if (signal.aborted) return;
        triggerPullPending = false;
        if (signal.value.done) {
          this.logger?.debug?.(`[PagedSearch] Trigger ended for "${query}" after page ${request.page}`);
          return;
        }

        request = accumulator.advance();
      }
    } catch (error) {
      if (controller.signal.aborted) return;
      accumulator.fail(error);
      this.logger?.warn?.(`[PagedSearch] Failed "${query}" on page ${accumulator.currentPage}`, {
        query,
        page: accumulator.currentPage,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    } finally {
      outerSignal?.removeEventListener('abort', onOuterAbort);
      controller.abort();
      // A pull still parked on the trigger would block return() until the producer fires.
      if (!triggerPullPending) {
        await triggers.return?.();
      }
    }
  }
}

// Callers check `signal.aborted` before starting the raced operation.
function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<Raced<T>> {
  return new Promise<Raced<T>>((resolve, reject) => {
    const onAbort = () => resolve({ aborted: true });
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve({ aborted: false, value });
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}
