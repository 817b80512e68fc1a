import type { Logger } from '@libs/http-client-core';
import type { PagedSearch } from './pagedSearch';
import type { AccumulatedResponse } from './types';

interface ActiveSession {
  query: string;
  controller: AbortController;
}

export interface SearchSessionControllerConfig<TItem> {
  search: PagedSearch<TItem>;
  logger?: Logger;
}

/**
 * Keeps at most one live search: starting a new query aborts the session
 * it replaces, so stale pages never reach the consumer.
 */
export class SearchSessionController<TItem> {
  private readonly search: PagedSearch<TItem>;
  private readonly logger?: Logger;
  private active?: ActiveSession;

  constructor(config: SearchSessionControllerConfig<TItem>) {
    this.search = config.search;
    this.logger = config.logger;
  }

  get activeQuery(): string | undefined {
    return this.active?.query;
  }

  start(
    query: string,
    trigger: AsyncIterable<unknown>,
  ): AsyncGenerator<AccumulatedResponse<TItem>, void, undefined> {
    if (this.active) {
      this.logger?.debug?.(`[SearchSession] Replacing "${this.active.query}" with "${query}"`);
    }
    this.cancel();

    const session: ActiveSession = { query, controller: new AbortController() };
    this.active = session;
    return this.track(session, this.search.search(query, trigger, { signal: session.controller.signal }));
  }

  cancel(): void {
    if (!this.active) return;
    this.active.controller.abort();
    this.active = undefined;
  }

  private async *track(
    session: ActiveSession,
    responses: AsyncGenerator<AccumulatedResponse<TItem>, void, undefined>,
  ): AsyncGenerator<AccumulatedResponse<TItem>, void, undefined> {
    try {
      yield* responses;
    } finally {
      if (this.active === session) {
        this.active = undefined;
      }
    }
  }
}
